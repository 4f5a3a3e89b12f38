/**
 * Balanced-regime dispatcher for two-asset exact-in swaps.
 *
 * With delta = (q_i - q_j)/b and tau = a/b, the exact output
 *   y = b * ln(1 + r0 * (1 - exp(-tau)))
 * expands around tau = 0 as
 *   b * (r0 tau - r0 (1 + r0) tau^2 / 2 + r0 (1 + r0)(1 + 2 r0) tau^3 / 6 - ...).
 * The quadratic tier stops after the tau^2 term. The cubic tier adds the tau^3
 * term scaled by `cubicDamping`, which keeps it under the exact curve up to
 * `cubicTauMax`. r0 is the exact pair ratio, so limit checks agree with the
 * exact engine.
 *
 * Any failed precondition forwards to the exact swap engine; the surrogate
 * never changes which requests succeed.
 */

import type { Decimal } from "decimal.js";
import type { KernelPolicy, SwapPath } from "../types/lmsr.js";
import { dec, inverse, ONE } from "./numeric.js";
import { exactIn, openSwapStep, prepareSwapStep, swapToLimit } from "./swap-engine.js";

export interface ExactInRequest {
  q: readonly Decimal[];
  inputIndex: number;
  outputIndex: number;
  b: Decimal;
  /** Fee-adjusted input. */
  amount: Decimal;
  limitRatio?: Decimal;
}

export interface DispatchResult {
  amountIn: Decimal;
  amountOut: Decimal;
  path: SwapPath;
  limited: boolean;
  capped: boolean;
}

const HALF = dec(0.5);
const SIXTH = ONE.div(6);

function isAssetIndex(index: number): boolean {
  return index === 0 || index === 1;
}

/** Surrogate of y/b as a polynomial in tau. */
export function surrogateOutputFactor(r0: Decimal, tau: Decimal, path: "quadratic" | "cubic", damping: number): Decimal {
  const onePlus = ONE.plus(r0);
  const quadratic = r0.times(tau).minus(r0.times(onePlus).times(tau.pow(2)).times(HALF));
  if (path === "quadratic") return quadratic;
  const cubic = r0.times(onePlus).times(ONE.plus(r0.times(2))).times(SIXTH).times(damping).times(tau.pow(3));
  return quadratic.plus(cubic);
}

/** Polynomial path, or null when a precondition fails. */
export function approximateExactIn(request: ExactInRequest, policy: KernelPolicy): DispatchResult | null {
  const { q, inputIndex, outputIndex, b, limitRatio } = request;
  if (q.length !== 2 || inputIndex === outputIndex || !isAssetIndex(inputIndex) || !isAssetIndex(outputIndex)) {
    return null;
  }
  const invB = inverse(b);
  const delta = q[inputIndex].minus(q[outputIndex]).times(invB);
  if (delta.abs().gt(policy.balancedDeltaMax)) return null;

  let amountIn = request.amount;
  let tau = amountIn.times(invB);
  if (tau.lte(0) || tau.gt(policy.cubicTauMax)) return null;

  const step = prepareSwapStep(q, inputIndex, outputIndex, b, policy);
  if (!step.ok) return null;
  const r0 = step.value.r0;
  let limited = false;
  if (limitRatio !== undefined) {
    // Limits at or below r0 are rejected by the exact engine.
    if (limitRatio.lte(r0)) return null;
    const x = limitRatio.div(r0).minus(ONE);
    if (x.gt(policy.limitWindow)) return null;
    // ln(1 + x) truncated after a negative term stays below the exact limit input.
    const limitInput = b.times(x.minus(x.pow(2).times(HALF)));
    if (amountIn.gt(limitInput)) {
      amountIn = limitInput;
      tau = amountIn.times(invB);
      limited = true;
    }
  }

  const path = tau.lte(policy.quadraticTauMax) ? "quadratic" : "cubic";
  const amountOut = b.times(surrogateOutputFactor(r0, tau, path, policy.cubicDamping));
  if (amountOut.gt(q[outputIndex])) return null;
  return { amountIn, amountOut, path, limited, capped: false };
}

/** Exact path: optional truncation at the limit, exact-in, capacity cap. */
export function exactSwap(request: ExactInRequest, policy: KernelPolicy): DispatchResult {
  const step = openSwapStep(request.q, request.inputIndex, request.outputIndex, request.b, policy);
  let amount = request.amount;
  let limited = false;
  if (request.limitRatio !== undefined) {
    const limit = swapToLimit(step, request.limitRatio);
    if (amount.gt(limit.amountIn)) {
      amount = limit.amountIn;
      limited = true;
    }
  }
  const quote = exactIn(step, amount);
  return {
    amountIn: quote.amountIn,
    amountOut: quote.amountOut,
    path: "exact",
    limited,
    capped: quote.capped,
  };
}

export function dispatchExactIn(request: ExactInRequest, policy: KernelPolicy, approximation: boolean): DispatchResult {
  if (approximation) {
    const approximated = approximateExactIn(request, policy);
    if (approximated !== null) return approximated;
  }
  return exactSwap(request, policy);
}
