/**
 * Liquidity engine: proportional mint/burn in closed form, and the two
 * single-asset operations built from swap-engine steps.
 *
 * Single-asset mint solves a_req(alpha) = alpha * q_i + sum_{j != i} x_j(alpha) = a,
 * where x_j(alpha) is the exact-out input that withdraws alpha * q_j. Each x_j is
 * convex and increasing, so a_req is strictly increasing and the root is unique.
 *
 * Single-asset redeem burns a fraction alpha, pays alpha * q_i directly and swaps
 * every other withdrawn share back into asset i on the reduced local state.
 */

import type { Decimal } from "decimal.js";
import type { KernelPolicy } from "../types/lmsr.js";
import { InvalidRequestError, SolverDidNotConvergeError, type KernelErrorCode } from "./errors.js";
import { checkedB, computeB, totalSize } from "./pricing.js";
import { dec, ONE, sum, ZERO } from "./numeric.js";
import { bracketAndBisect, type Probe } from "./solver.js";
import { evaluateExactIn, evaluateExactOut, openSwapStep, prepareSwapStep } from "./swap-engine.js";

export interface ProportionalChange {
  alpha: Decimal;
  /** Per-asset amount moved, alpha * q_k. */
  deltas: Decimal[];
  balances: Decimal[];
  /** alpha * L. */
  shares: Decimal;
}

function assertFraction(alpha: Decimal, allowAboveOne: boolean): void {
  if (!alpha.isFinite() || alpha.lte(0) || (!allowAboveOne && alpha.gt(1))) {
    throw new InvalidRequestError("Fraction out of range", { alpha: alpha.toString() });
  }
}

/** q -> (1 + alpha) q; b scales by the same factor. */
export function proportionalMint(q: readonly Decimal[], totalShares: Decimal, alpha: Decimal): ProportionalChange {
  assertFraction(alpha, true);
  const deltas = q.map((qk) => qk.times(alpha));
  return {
    alpha,
    deltas,
    balances: q.map((qk, k) => qk.plus(deltas[k])),
    shares: totalShares.times(alpha),
  };
}

/** q -> (1 - alpha) q for alpha in (0, 1]. */
export function proportionalBurn(q: readonly Decimal[], totalShares: Decimal, alpha: Decimal): ProportionalChange {
  assertFraction(alpha, false);
  const deltas = q.map((qk) => qk.times(alpha));
  return {
    alpha,
    deltas,
    balances: q.map((qk, k) => qk.minus(deltas[k])),
    shares: totalShares.times(alpha),
  };
}

export interface SingleAssetMintResult {
  alpha: Decimal;
  /** a_req(alpha*): input actually consumed, never above the offered amount. */
  amountIn: Decimal;
  iterations: number;
  atCeiling: boolean;
}

/** a_req(alpha) as a solver probe; any per-asset guard failure marks alpha infeasible. */
export function requiredInputProbe(
  q: readonly Decimal[],
  inputIndex: number,
  kappa: Decimal,
  policy: KernelPolicy
): (alpha: Decimal) => Probe {
  const b = computeB(q, kappa);
  const steps = q.flatMap((_, j) => (j === inputIndex ? [] : [openSwapStep(q, inputIndex, j, b, policy)]));
  return (alpha) => {
    let total = alpha.times(q[inputIndex]);
    for (const step of steps) {
      const x = evaluateExactOut(step, alpha.times(step.available));
      if (!x.ok) return { feasible: false, reason: x.error.code };
      total = total.plus(x.value);
    }
    return { feasible: true, value: total };
  };
}

export function singleAssetMint(
  q: readonly Decimal[],
  inputIndex: number,
  amount: Decimal,
  kappa: Decimal,
  policy: KernelPolicy
): SingleAssetMintResult {
  if (!Number.isInteger(inputIndex) || inputIndex < 0 || inputIndex >= q.length) {
    throw new InvalidRequestError("Invalid asset index", { inputIndex, assets: q.length });
  }
  const probe = requiredInputProbe(q, inputIndex, kappa, policy);
  const result = bracketAndBisect(probe, amount, {
    seed: amount.div(totalSize(q)),
    ceiling: dec(policy.alphaCeiling),
    tolerance: dec(policy.solverTolerance),
    maxIterations: policy.solverMaxIterations,
  });
  if (!result.converged) {
    throw new SolverDidNotConvergeError(result.iterations, result.reason, { inputIndex, amount: amount.toString() });
  }
  return {
    alpha: result.root,
    amountIn: result.value,
    iterations: result.iterations,
    atCeiling: result.atCeiling,
  };
}

export type RedeemOutcome =
  | { kind: "contribution"; assetIndex: number; amountIn: Decimal; amountOut: Decimal; capped: boolean }
  | { kind: "skipped"; assetIndex: number; reason: KernelErrorCode };

export interface SingleAssetRedeemResult {
  /** Y_i = alpha * q_i + sum of swap contributions. */
  payout: Decimal;
  direct: Decimal;
  outcomes: RedeemOutcome[];
}

export function singleAssetRedeem(
  q: readonly Decimal[],
  targetIndex: number,
  alpha: Decimal,
  kappa: Decimal,
  policy: KernelPolicy
): SingleAssetRedeemResult {
  if (!Number.isInteger(targetIndex) || targetIndex < 0 || targetIndex >= q.length) {
    throw new InvalidRequestError("Invalid asset index", { targetIndex, assets: q.length });
  }
  assertFraction(alpha, false);

  const direct = alpha.times(q[targetIndex]);
  const local = q.map((qk) => qk.times(ONE.minus(alpha)));
  const others = q.flatMap((_, j) => (j === targetIndex ? [] : [j]));
  const bLocal = checkedB(local, kappa);
  if (!bLocal.ok) {
    const reason = bLocal.error.code;
    const outcomes = others.map((assetIndex): RedeemOutcome => ({ kind: "skipped", assetIndex, reason }));
    return { payout: direct, direct, outcomes };
  }

  // b_local stays fixed; the running local state only tracks inventory already paid out.
  const outcomes = others.map((j): RedeemOutcome => {
    const withdrawn = alpha.times(q[j]);
    if (withdrawn.isZero()) {
      return { kind: "contribution", assetIndex: j, amountIn: ZERO, amountOut: ZERO, capped: false };
    }
    const step = prepareSwapStep(local, j, targetIndex, bLocal.value, policy);
    if (!step.ok) return { kind: "skipped", assetIndex: j, reason: step.error.code };
    const quote = evaluateExactIn(step.value, withdrawn);
    if (!quote.ok) return { kind: "skipped", assetIndex: j, reason: quote.error.code };
    local[targetIndex] = local[targetIndex].minus(quote.value.amountOut);
    local[j] = local[j].plus(quote.value.amountIn);
    return {
      kind: "contribution",
      assetIndex: j,
      amountIn: quote.value.amountIn,
      amountOut: quote.value.amountOut,
      capped: quote.value.capped,
    };
  });

  const swapped = sum(outcomes.map((o) => (o.kind === "contribution" ? o.amountOut : ZERO)));
  return { payout: direct.plus(swapped), direct, outcomes };
}
