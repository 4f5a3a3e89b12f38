/**
 * Caller-facing pool operations as pure state transitions.
 *
 * Each operation reads (params, state), runs fee composer -> dispatcher or
 * liquidity engine -> swap engine, quantizes the settlement to asset decimals and
 * returns a fresh state. A failure throws a KernelError and the input state is
 * left untouched, so callers either see the pre-state or the full post-state.
 */

import type { Decimal } from "decimal.js";
import { DEFAULT_KERNEL_POLICY } from "../config/index.js";
import type {
  BurnRequest,
  BurnSettlement,
  BurnSwapRequest,
  BurnSwapSettlement,
  KernelPolicy,
  MintRequest,
  MintSettlement,
  PoolConfigInput,
  PoolParams,
  PoolState,
  PoolView,
  RedeemOutcomeView,
  SwapMintRequest,
  SwapMintSettlement,
  SwapRequest,
  SwapSettlement,
  Transition,
} from "../types/lmsr.js";
import { dispatchExactIn } from "./approximation.js";
import { InvalidRequestError, SlippageExceededError, ZeroLiquidityError } from "./errors.js";
import { chargeOnInput, chargeOnOutput, grossUpInput, pairFee, splitProtocolFee } from "./fees.js";
import { proportionalBurn, proportionalMint, singleAssetMint, singleAssetRedeem } from "./liquidity-engine.js";
import { dec, roundDown, roundUp, SHARE_DECIMALS } from "./numeric.js";
import { computeB, logSumExpCost, marginalPrices, pairRatio, totalSize } from "./pricing.js";

interface KernelContext {
  q: Decimal[];
  totalShares: Decimal;
  kappa: Decimal;
  protocolShare: Decimal;
  policy: KernelPolicy;
}

function parseDecimal(value: string, field: string): Decimal {
  let parsed: Decimal;
  try {
    parsed = dec(value);
  } catch {
    throw new InvalidRequestError(`${field} is not a decimal number`, { field, value });
  }
  if (!parsed.isFinite()) {
    throw new InvalidRequestError(`${field} must be finite`, { field, value });
  }
  return parsed;
}

function parseAmount(value: string, field: string, decimals: number): Decimal {
  const parsed = parseDecimal(value, field);
  if (parsed.isNeg()) {
    throw new InvalidRequestError(`${field} must be non-negative`, { field, value });
  }
  if (parsed.decimalPlaces() > decimals) {
    throw new InvalidRequestError(`${field} has more than ${decimals} decimal places`, { field, value });
  }
  return parsed;
}

function parsePositiveAmount(value: string, field: string, decimals: number): Decimal {
  const parsed = parseAmount(value, field, decimals);
  if (parsed.isZero()) {
    throw new InvalidRequestError(`${field} must be positive`, { field, value });
  }
  return parsed;
}

/** Fraction in [0, 1). */
function parseRate(value: string, field: string): Decimal {
  const parsed = parseDecimal(value, field);
  if (parsed.isNeg() || parsed.gte(1)) {
    throw new InvalidRequestError(`${field} must be in [0, 1)`, { field, value });
  }
  return parsed;
}

function assertAssetIndex(params: PoolParams, index: number, field: string): void {
  if (!Number.isInteger(index) || index < 0 || index >= params.assets.length) {
    throw new InvalidRequestError(`${field} is not an asset of this pool`, { field, index, assets: params.assets.length });
  }
}

function checkMinimum(actual: Decimal, minimum: string | undefined, field: string, decimals: number): void {
  if (minimum === undefined) return;
  const bound = parseAmount(minimum, `min ${field}`, decimals);
  if (actual.lt(bound)) {
    throw new SlippageExceededError(field, actual.toFixed(), bound.toFixed());
  }
}

function openContext(params: PoolParams, state: PoolState): KernelContext {
  if (state.balances.length !== params.assets.length) {
    throw new InvalidRequestError("Balance vector does not match the pool's assets", {
      balances: state.balances.length,
      assets: params.assets.length,
    });
  }
  return {
    q: state.balances.map((v, k) => parseAmount(v, `balances[${k}]`, params.assets[k].decimals)),
    totalShares: parseAmount(state.totalShares, "totalShares", SHARE_DECIMALS),
    kappa: dec(params.kappa),
    protocolShare: dec(params.protocolFeeShare),
    policy: params.policy,
  };
}

/** Shares are issued against L, which must be positive. */
function shareBase(ctx: KernelContext, operation: string): Decimal {
  if (ctx.totalShares.lte(0)) {
    throw new ZeroLiquidityError({ operation, totalShares: ctx.totalShares.toFixed() });
  }
  return ctx.totalShares;
}

function commit(balances: Decimal[], totalShares: Decimal): PoolState {
  balances.forEach((qk, k) => {
    if (qk.isNeg()) {
      throw new InvalidRequestError("Operation would leave a negative balance", { index: k, balance: qk.toFixed() });
    }
  });
  if (totalSize(balances).lte(0)) {
    throw new ZeroLiquidityError({ operation: "commit" });
  }
  return {
    balances: balances.map((qk) => qk.toFixed()),
    totalShares: totalShares.toFixed(),
  };
}

const POLICY_KEYS: readonly (keyof KernelPolicy)[] = [
  "expInputLimit",
  "balancedDeltaMax",
  "quadraticTauMax",
  "cubicTauMax",
  "limitWindow",
  "cubicDamping",
  "solverTolerance",
  "solverMaxIterations",
  "alphaCeiling",
];

function mergePolicy(base: Readonly<KernelPolicy>, overrides: Partial<KernelPolicy> | undefined): KernelPolicy {
  const policy: KernelPolicy = { ...base };
  if (overrides === undefined) return policy;
  for (const key of POLICY_KEYS) {
    const value = overrides[key];
    if (value === undefined) continue;
    if (!Number.isFinite(value) || value <= 0) {
      throw new InvalidRequestError(`policy.${key} must be a positive number`, { key, value });
    }
    policy[key] = value;
  }
  if (!Number.isInteger(policy.solverMaxIterations)) {
    throw new InvalidRequestError("policy.solverMaxIterations must be an integer", {
      value: policy.solverMaxIterations,
    });
  }
  if (policy.quadraticTauMax > policy.cubicTauMax) {
    throw new InvalidRequestError("policy.quadraticTauMax must not exceed policy.cubicTauMax");
  }
  return policy;
}

/**
 * Validates the configuration record and freezes it for the pool's lifetime.
 * `basePolicy` supplies every policy entry the input leaves out.
 */
export function createPoolParams(
  input: PoolConfigInput,
  basePolicy: Readonly<KernelPolicy> = DEFAULT_KERNEL_POLICY
): PoolParams {
  const n = input.assets.length;
  if (n < 2) {
    throw new InvalidRequestError("A pool needs at least two assets", { assets: n });
  }
  const symbols = new Set<string>();
  for (const asset of input.assets) {
    if (asset.symbol.trim() === "" || symbols.has(asset.symbol)) {
      throw new InvalidRequestError("Asset symbols must be non-empty and unique", { symbol: asset.symbol });
    }
    symbols.add(asset.symbol);
    if (!Number.isInteger(asset.decimals) || asset.decimals < 0 || asset.decimals > SHARE_DECIMALS) {
      throw new InvalidRequestError(`Asset decimals must be an integer in [0, ${SHARE_DECIMALS}]`, {
        symbol: asset.symbol,
        decimals: asset.decimals,
      });
    }
  }

  const kappa = parseDecimal(input.kappa, "kappa");
  if (kappa.lte(0)) {
    throw new InvalidRequestError("kappa must be positive", { kappa: input.kappa });
  }

  const feeInput = input.fees;
  const rawFees = typeof feeInput === "string" ? input.assets.map(() => feeInput) : feeInput;
  if (rawFees.length !== n) {
    throw new InvalidRequestError("Fee vector length must match the asset count", { fees: rawFees.length, assets: n });
  }
  const fees = rawFees.map((f, k) => parseRate(f, `fees[${k}]`).toFixed());

  const protocolFeeShare = parseRate(input.protocolFeeShare ?? "0", "protocolFeeShare");
  const protocolFeeReceiver = input.protocolFeeReceiver?.trim() || null;
  if (protocolFeeShare.gt(0) && protocolFeeReceiver === null) {
    throw new InvalidRequestError("A protocol fee share needs a protocol fee receiver");
  }

  return Object.freeze({
    assets: Object.freeze(input.assets.map((a) => Object.freeze({ symbol: a.symbol, decimals: a.decimals }))),
    kappa: kappa.toFixed(),
    fees: Object.freeze(fees),
    protocolFeeShare: protocolFeeShare.toFixed(),
    protocolFeeReceiver,
    approximation: input.approximation ?? true,
    policy: Object.freeze(mergePolicy(basePolicy, input.policy)),
  });
}

/** Seeds the pool; L starts equal to S(q0). */
export function initializePool(params: PoolParams, seed: readonly string[]): PoolState {
  if (seed.length !== params.assets.length) {
    throw new InvalidRequestError("Seed length must match the asset count", {
      seed: seed.length,
      assets: params.assets.length,
    });
  }
  const q = seed.map((v, k) => parseAmount(v, `seed[${k}]`, params.assets[k].decimals));
  const size = totalSize(q);
  if (size.lte(0)) {
    throw new ZeroLiquidityError({ operation: "initialize" });
  }
  return commit(q, roundDown(size, SHARE_DECIMALS));
}

export function getPoolView(params: PoolParams, state: PoolState): PoolView {
  const ctx = openContext(params, state);
  const b = computeB(ctx.q, ctx.kappa);
  const limit = ctx.policy.expInputLimit;
  return {
    balances: [...state.balances],
    totalShares: state.totalShares,
    size: totalSize(ctx.q).toFixed(),
    liquidity: b.toFixed(SHARE_DECIMALS),
    prices: marginalPrices(ctx.q, b, limit).map((p) => p.toFixed(SHARE_DECIMALS)),
    cost: logSumExpCost(ctx.q, b, limit).toFixed(SHARE_DECIMALS),
  };
}

/** swap(i, j, amountIn, limitRatio?, minOut) -> (amountIn used, amountOut). */
export function swap(params: PoolParams, state: PoolState, request: SwapRequest): Transition<SwapSettlement> {
  const ctx = openContext(params, state);
  const i = request.inputIndex;
  const j = request.outputIndex;
  assertAssetIndex(params, i, "inputIndex");
  assertAssetIndex(params, j, "outputIndex");
  if (i === j) {
    throw new InvalidRequestError("inputIndex and outputIndex must differ", { inputIndex: i });
  }
  const decimalsIn = params.assets[i].decimals;
  const decimalsOut = params.assets[j].decimals;
  const amountIn = parsePositiveAmount(request.amountIn, "amountIn", decimalsIn);
  const limitRatio = request.limitRatio === undefined ? undefined : parseDecimal(request.limitRatio, "limitRatio");
  if (limitRatio !== undefined && limitRatio.lte(0)) {
    throw new InvalidRequestError("limitRatio must be positive", { limitRatio: request.limitRatio });
  }

  const b = computeB(ctx.q, ctx.kappa);
  const rate = pairFee(dec(params.fees[i]), dec(params.fees[j]));
  const charged = chargeOnInput(amountIn, rate, decimalsIn);
  if (charged.net.lte(0)) {
    throw new InvalidRequestError("amountIn does not cover the fee", { amountIn: request.amountIn });
  }

  const result = dispatchExactIn(
    { q: ctx.q, inputIndex: i, outputIndex: j, b, amount: charged.net, limitRatio },
    ctx.policy,
    params.approximation
  );

  let gross = amountIn;
  let fee = charged.fee;
  if (result.amountIn.lt(charged.net)) {
    const used = grossUpInput(roundUp(result.amountIn, decimalsIn), rate, decimalsIn, amountIn);
    gross = used.gross;
    fee = used.fee;
  }
  const amountOut = roundDown(result.amountOut, decimalsOut);
  checkMinimum(amountOut, request.minOut, "amountOut", decimalsOut);

  const split = splitProtocolFee(fee, ctx.protocolShare, decimalsIn);
  const balances = [...ctx.q];
  balances[i] = ctx.q[i].plus(gross).minus(split.protocol);
  balances[j] = ctx.q[j].minus(amountOut);

  return {
    state: commit(balances, ctx.totalShares),
    settlement: {
      amountIn: gross.toFixed(),
      amountOut: amountOut.toFixed(),
      fee: fee.toFixed(),
      protocolFee: split.protocol.toFixed(),
      path: result.path,
      limited: result.limited,
      capped: result.capped,
    },
  };
}

/** Proportional mint of `amount` internal units: alpha = amount / S. */
export function mint(params: PoolParams, state: PoolState, request: MintRequest): Transition<MintSettlement> {
  const ctx = openContext(params, state);
  const amount = parsePositiveAmount(request.amount, "amount", SHARE_DECIMALS);
  const size = totalSize(ctx.q);
  if (size.lte(0)) {
    throw new ZeroLiquidityError({ operation: "mint" });
  }
  const change = proportionalMint(ctx.q, shareBase(ctx, "mint"), amount.div(size));

  const deposits = change.deltas.map((d, k) => roundUp(d, params.assets[k].decimals));
  const shares = roundDown(change.shares, SHARE_DECIMALS);
  if (shares.lte(0)) {
    throw new InvalidRequestError("Deposit too small to mint shares", { amount: request.amount });
  }
  checkMinimum(shares, request.minShares, "sharesMinted", SHARE_DECIMALS);

  return {
    state: commit(
      ctx.q.map((qk, k) => qk.plus(deposits[k])),
      ctx.totalShares.plus(shares)
    ),
    settlement: {
      deposits: deposits.map((d) => d.toFixed()),
      sharesMinted: shares.toFixed(),
    },
  };
}

/** Proportional burn: alpha = shares / L, each asset pays alpha * q_k rounded down. */
export function burn(params: PoolParams, state: PoolState, request: BurnRequest): Transition<BurnSettlement> {
  const ctx = openContext(params, state);
  const shares = parsePositiveAmount(request.shares, "shares", SHARE_DECIMALS);
  if (shares.gt(ctx.totalShares)) {
    throw new InvalidRequestError("shares exceed the total supply", {
      shares: request.shares,
      totalShares: state.totalShares,
    });
  }
  const change = proportionalBurn(ctx.q, ctx.totalShares, shares.div(ctx.totalShares));
  const amountsOut = change.deltas.map((d, k) => roundDown(d, params.assets[k].decimals));

  if (request.minAmounts !== undefined) {
    if (request.minAmounts.length !== params.assets.length) {
      throw new InvalidRequestError("minAmounts length must match the asset count", {
        minAmounts: request.minAmounts.length,
        assets: params.assets.length,
      });
    }
    request.minAmounts.forEach((minimum, k) =>
      checkMinimum(amountsOut[k], minimum, `amountsOut[${k}]`, params.assets[k].decimals)
    );
  }

  return {
    state: commit(
      ctx.q.map((qk, k) => qk.minus(amountsOut[k])),
      ctx.totalShares.minus(shares)
    ),
    settlement: {
      amountsOut: amountsOut.map((a) => a.toFixed()),
      sharesBurned: shares.toFixed(),
    },
  };
}

/**
 * Single-asset mint: deposit asset i only, solve for the growth factor alpha.
 * `amountIn` reports what the pool takes: the whole offered deposit when the
 * root is interior (a_req(alpha) is within the solver tolerance of it), or the
 * grossed-up a_req at the ceiling.
 */
export function swapMint(params: PoolParams, state: PoolState, request: SwapMintRequest): Transition<SwapMintSettlement> {
  const ctx = openContext(params, state);
  const i = request.inputIndex;
  assertAssetIndex(params, i, "inputIndex");
  const decimalsIn = params.assets[i].decimals;
  const amountIn = parsePositiveAmount(request.amountIn, "amountIn", decimalsIn);
  const base = shareBase(ctx, "swapMint");

  const rate = dec(params.fees[i]);
  const charged = chargeOnInput(amountIn, rate, decimalsIn);
  if (charged.net.lte(0)) {
    throw new InvalidRequestError("amountIn does not cover the fee", { amountIn: request.amountIn });
  }
  const solved = singleAssetMint(ctx.q, i, charged.net, ctx.kappa, ctx.policy);

  // Within tolerance the whole deposit is taken; the sub-tolerance remainder stays in the pool.
  let gross = amountIn;
  let fee = charged.fee;
  if (solved.atCeiling) {
    const used = grossUpInput(roundUp(solved.amountIn, decimalsIn), rate, decimalsIn, amountIn);
    gross = used.gross;
    fee = used.fee;
  }
  const shares = roundDown(solved.alpha.times(base), SHARE_DECIMALS);
  if (shares.lte(0)) {
    throw new InvalidRequestError("Deposit too small to mint shares", { amountIn: request.amountIn });
  }
  checkMinimum(shares, request.minShares, "sharesMinted", SHARE_DECIMALS);

  const split = splitProtocolFee(fee, ctx.protocolShare, decimalsIn);
  const balances = [...ctx.q];
  balances[i] = ctx.q[i].plus(gross).minus(split.protocol);

  return {
    state: commit(balances, ctx.totalShares.plus(shares)),
    settlement: {
      amountIn: gross.toFixed(),
      sharesMinted: shares.toFixed(),
      fee: fee.toFixed(),
      protocolFee: split.protocol.toFixed(),
      growthFactor: solved.alpha.toFixed(SHARE_DECIMALS),
      iterations: solved.iterations,
    },
  };
}

/** Single-asset redeem: burn shares and take the whole payout in asset i. */
export function burnSwap(params: PoolParams, state: PoolState, request: BurnSwapRequest): Transition<BurnSwapSettlement> {
  const ctx = openContext(params, state);
  const i = request.targetIndex;
  assertAssetIndex(params, i, "targetIndex");
  const shares = parsePositiveAmount(request.shares, "shares", SHARE_DECIMALS);
  if (shares.gt(ctx.totalShares)) {
    throw new InvalidRequestError("shares exceed the total supply", {
      shares: request.shares,
      totalShares: state.totalShares,
    });
  }
  if (shares.eq(ctx.totalShares) && ctx.q.some((qk, k) => k !== i && qk.gt(0))) {
    throw new InvalidRequestError("Redeeming the whole supply into one asset would strand the other balances; use burn", {
      shares: request.shares,
      targetIndex: i,
    });
  }
  const decimalsOut = params.assets[i].decimals;
  const alpha = shares.div(ctx.totalShares);
  const redeemed = singleAssetRedeem(ctx.q, i, alpha, ctx.kappa, ctx.policy);

  const charged = chargeOnOutput(redeemed.payout, dec(params.fees[i]), decimalsOut);
  checkMinimum(charged.net, request.minOut, "amountOut", decimalsOut);
  const split = splitProtocolFee(charged.fee, ctx.protocolShare, decimalsOut);

  const balances = [...ctx.q];
  balances[i] = ctx.q[i].minus(charged.net).minus(split.protocol);

  const outcomes = redeemed.outcomes.map((o): RedeemOutcomeView =>
    o.kind === "contribution"
      ? {
          kind: "contribution",
          assetIndex: o.assetIndex,
          amountIn: roundDown(o.amountIn, params.assets[o.assetIndex].decimals).toFixed(),
          amountOut: roundDown(o.amountOut, decimalsOut).toFixed(),
          capped: o.capped,
        }
      : { kind: "skipped", assetIndex: o.assetIndex, reason: o.reason }
  );

  return {
    state: commit(balances, ctx.totalShares.minus(shares)),
    settlement: {
      amountOut: charged.net.toFixed(),
      fee: charged.fee.toFixed(),
      protocolFee: split.protocol.toFixed(),
      sharesBurned: shares.toFixed(),
      outcomes,
    },
  };
}

export function quoteSwap(params: PoolParams, state: PoolState, request: SwapRequest): SwapSettlement {
  return swap(params, state, request).settlement;
}

export function quoteSwapMint(params: PoolParams, state: PoolState, request: SwapMintRequest): SwapMintSettlement {
  return swapMint(params, state, request).settlement;
}

export function quoteBurnSwap(params: PoolParams, state: PoolState, request: BurnSwapRequest): BurnSwapSettlement {
  return burnSwap(params, state, request).settlement;
}

/** Pair ratio r(i, j) of the current state, for callers choosing a limit ratio. */
export function currentPairRatio(params: PoolParams, state: PoolState, inputIndex: number, outputIndex: number): string {
  const ctx = openContext(params, state);
  assertAssetIndex(params, inputIndex, "inputIndex");
  assertAssetIndex(params, outputIndex, "outputIndex");
  const b = computeB(ctx.q, ctx.kappa);
  return pairRatio(ctx.q, inputIndex, outputIndex, b, ctx.policy.expInputLimit).toFixed(SHARE_DECIMALS);
}
