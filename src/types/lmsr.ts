/**
 * LMSR pool types.
 * q[i] = normalized balance of asset i, b = kappa * sum(q) is the liquidity parameter.
 * Amounts cross the kernel boundary as decimal strings.
 */

/** Per-asset normalized balances. Length n = number of assets (n >= 2). */
export type Balances = string[];

export interface AssetSpec {
  symbol: string;
  /** Settlement precision of the asset; amounts are quantized to this many decimal places. */
  decimals: number;
}

/** Guard thresholds and solver limits. Named so no literal lives inside the arithmetic. */
export interface KernelPolicy {
  /** Bound on |x| for exp(x), and on |ln x| for ln(x). */
  expInputLimit: number;
  /** Dispatcher: max |(q_i - q_j) / b| for the balanced regime. */
  balancedDeltaMax: number;
  /** Dispatcher: tau = a / b upper bound of the quadratic tier. */
  quadraticTauMax: number;
  /** Dispatcher: tau upper bound of the cubic tier (and of the surrogate overall). */
  cubicTauMax: number;
  /** Dispatcher: max |limit / r0 - 1| for the polynomial limit. */
  limitWindow: number;
  /** Factor applied to the cubic Taylor coefficient so the surrogate stays below the exact curve. */
  cubicDamping: number;
  /** Absolute tolerance on a - a_req(alpha) for the single-asset solver. */
  solverTolerance: number;
  /** Cap on bracketing plus bisection steps. */
  solverMaxIterations: number;
  /** Upper bound on the single-asset growth factor alpha. */
  alphaCeiling: number;
}

export interface PoolConfigInput {
  assets: AssetSpec[];
  kappa: string;
  /** One fee for every asset, or one per asset. Fractions in [0, 1). */
  fees: string | string[];
  protocolFeeShare?: string;
  protocolFeeReceiver?: string | null;
  /** Route two-asset swaps through the balanced-regime surrogate. */
  approximation?: boolean;
  policy?: Partial<KernelPolicy>;
}

/** Immutable pool parameters, frozen at construction. */
export interface PoolParams {
  readonly assets: readonly Readonly<AssetSpec>[];
  readonly kappa: string;
  readonly fees: readonly string[];
  readonly protocolFeeShare: string;
  readonly protocolFeeReceiver: string | null;
  readonly approximation: boolean;
  readonly policy: Readonly<KernelPolicy>;
}

export interface PoolState {
  balances: Balances;
  /** LP accounting value L. */
  totalShares: string;
}

export interface Transition<S> {
  state: PoolState;
  settlement: S;
}

export type SwapPath = "quadratic" | "cubic" | "exact";

export interface SwapRequest {
  inputIndex: number;
  outputIndex: number;
  amountIn: string;
  /** Maximum acceptable pair ratio after the swap. */
  limitRatio?: string;
  minOut?: string;
}

export interface SwapSettlement {
  /** Gross input taken from the caller, fee included. */
  amountIn: string;
  amountOut: string;
  fee: string;
  protocolFee: string;
  path: SwapPath;
  /** Input truncated at the limit ratio. */
  limited: boolean;
  /** Output capped at the available balance. */
  capped: boolean;
}

export interface MintRequest {
  /** Total value to deposit, in internal units, spread proportionally over the assets. */
  amount: string;
  minShares?: string;
}

export interface MintSettlement {
  deposits: string[];
  sharesMinted: string;
}

export interface BurnRequest {
  shares: string;
  minAmounts?: string[];
}

export interface BurnSettlement {
  amountsOut: string[];
  sharesBurned: string;
}

export interface SwapMintRequest {
  inputIndex: number;
  amountIn: string;
  minShares?: string;
}

export interface SwapMintSettlement {
  /** Amount taken from the caller, fee included. */
  amountIn: string;
  sharesMinted: string;
  fee: string;
  protocolFee: string;
  /** Solved growth factor alpha. */
  growthFactor: string;
  iterations: number;
}

export interface BurnSwapRequest {
  shares: string;
  targetIndex: number;
  minOut?: string;
}

export type RedeemOutcomeView =
  | { kind: "contribution"; assetIndex: number; amountIn: string; amountOut: string; capped: boolean }
  | { kind: "skipped"; assetIndex: number; reason: string };

export interface BurnSwapSettlement {
  amountOut: string;
  fee: string;
  protocolFee: string;
  sharesBurned: string;
  outcomes: RedeemOutcomeView[];
}

export interface PoolView {
  balances: Balances;
  totalShares: string;
  /** S(q). */
  size: string;
  /** b(q) = kappa * S(q). */
  liquidity: string;
  /** Marginal prices exp(q_i/b) / sum_j exp(q_j/b); they sum to 1. */
  prices: string[];
  /** LMSR cost C(q) = b * ln(sum_i exp(q_i / b)). */
  cost: string;
}
