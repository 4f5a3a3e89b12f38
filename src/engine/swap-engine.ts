/**
 * Two-asset swap engine. b is held at its pre-trade value for the whole step
 * (quasi-static) and only the (i, j) coordinates move; r0 = exp((q_i - q_j)/b).
 *
 *   exact-in:      y(a)  = b * ln(1 + r0 * (1 - exp(-a/b)))
 *   exact-out:     a(y)  = b * ln(r0 / (r0 + 1 - exp(y/b)))
 *   swap-to-limit: a_lim = b * ln(limit / r0),  y_lim = b * ln(1 + r0 * (1 - r0/limit))
 *   cap-and-invert: y = q_j,  a_cap = a(q_j)
 *
 * Every form is pure: the caller applies (delta q_i, delta q_j) exactly once.
 */

import type { Decimal } from "decimal.js";
import type { KernelPolicy } from "../types/lmsr.js";
import {
  InfeasibleOutputError,
  InvalidRequestError,
  LimitNotAboveCurrentError,
} from "./errors.js";
import {
  checkedExp,
  checkedLn,
  checkedRatio,
  dec,
  fail,
  guardPositive,
  inverse,
  ok,
  ONE,
  safeLn,
  unwrap,
  ZERO,
  type Guarded,
} from "./numeric.js";

export interface SwapStep {
  inputIndex: number;
  outputIndex: number;
  b: Decimal;
  invB: Decimal;
  /** Pair ratio at the start of the step, evaluated once. */
  r0: Decimal;
  /** Output inventory q_j. */
  available: Decimal;
  expLimit: number;
}

export interface ExactInQuote {
  amountIn: Decimal;
  amountOut: Decimal;
  capped: boolean;
}

export interface LimitQuote {
  amountIn: Decimal;
  amountOut: Decimal;
}

export function prepareSwapStep(
  q: readonly Decimal[],
  inputIndex: number,
  outputIndex: number,
  b: Decimal,
  policy: Pick<KernelPolicy, "expInputLimit">
): Guarded<SwapStep> {
  if (
    inputIndex === outputIndex ||
    !Number.isInteger(inputIndex) ||
    !Number.isInteger(outputIndex) ||
    inputIndex < 0 ||
    outputIndex < 0 ||
    inputIndex >= q.length ||
    outputIndex >= q.length
  ) {
    return fail(new InvalidRequestError("Invalid asset pair", { inputIndex, outputIndex, assets: q.length }));
  }
  const positive = guardPositive(b, "b");
  if (!positive.ok) return positive;
  const invB = inverse(b);
  const r0 = checkedRatio(q[inputIndex], q[outputIndex], invB, policy.expInputLimit);
  if (!r0.ok) return r0;
  return ok({
    inputIndex,
    outputIndex,
    b,
    invB,
    r0: r0.value,
    available: q[outputIndex],
    expLimit: policy.expInputLimit,
  });
}

export function openSwapStep(
  q: readonly Decimal[],
  inputIndex: number,
  outputIndex: number,
  b: Decimal,
  policy: Pick<KernelPolicy, "expInputLimit">
): SwapStep {
  return unwrap(prepareSwapStep(q, inputIndex, outputIndex, b, policy));
}

/** Reachable output supremum b * ln(1 + r0). */
export function outputAsymptote(step: SwapStep): Decimal {
  return step.b.times(safeLn(ONE.plus(step.r0), step.expLimit));
}

/** Input a(y) for a target output; the inner term r0 + 1 - exp(y/b) must stay positive. */
export function evaluateExactOut(step: SwapStep, amountOut: Decimal): Guarded<Decimal> {
  if (amountOut.isNeg()) {
    return fail(new InvalidRequestError("Output amount must be non-negative", { amountOut: amountOut.toString() }));
  }
  if (amountOut.isZero()) return ok(ZERO);
  const growth = checkedExp(amountOut.times(step.invB), step.expLimit);
  if (!growth.ok) return growth;
  const denominator = step.r0.plus(ONE).minus(growth.value);
  if (denominator.lte(0)) {
    return fail(new InfeasibleOutputError(amountOut.toString(), outputAsymptote(step).toString()));
  }
  const log = checkedLn(step.r0.div(denominator), step.expLimit);
  if (!log.ok) return log;
  return ok(step.b.times(log.value));
}

/** Truncate output at q_j and solve for the input that produces exactly q_j. */
export function evaluateCapAndInvert(step: SwapStep): Guarded<ExactInQuote> {
  if (step.available.isZero()) return ok({ amountIn: ZERO, amountOut: ZERO, capped: true });
  const growth = checkedExp(step.available.times(step.invB), step.expLimit);
  if (!growth.ok) return growth;
  const inner = guardPositive(step.r0.plus(ONE).minus(growth.value), "r0 + 1 - exp(q_j/b)");
  if (!inner.ok) return inner;
  const log = checkedLn(step.r0.div(inner.value), step.expLimit);
  if (!log.ok) return log;
  return ok({ amountIn: step.b.times(log.value), amountOut: step.available, capped: true });
}

export function evaluateExactIn(step: SwapStep, amountIn: Decimal): Guarded<ExactInQuote> {
  if (amountIn.isNeg()) {
    return fail(new InvalidRequestError("Input amount must be non-negative", { amountIn: amountIn.toString() }));
  }
  if (amountIn.isZero()) return ok({ amountIn: ZERO, amountOut: ZERO, capped: false });

  // exp(-a/b) below the exp range is zero at kernel precision: the output sits on the asymptote.
  const scaled = amountIn.times(step.invB);
  let decay = ZERO;
  if (scaled.lte(step.expLimit)) {
    const e = checkedExp(scaled.neg(), step.expLimit);
    if (!e.ok) return e;
    decay = e.value;
  }
  const inner = guardPositive(ONE.plus(step.r0.times(ONE.minus(decay))), "1 + r0 * (1 - exp(-a/b))");
  if (!inner.ok) return inner;
  const log = checkedLn(inner.value, step.expLimit);
  if (!log.ok) return log;
  const amountOut = step.b.times(log.value);

  if (amountOut.gte(step.available)) return evaluateCapAndInvert(step);
  return ok({ amountIn, amountOut, capped: false });
}

export function evaluateSwapToLimit(step: SwapStep, limitRatio: Decimal): Guarded<LimitQuote> {
  if (limitRatio.lte(step.r0)) {
    return fail(new LimitNotAboveCurrentError(limitRatio.toString(), step.r0.toString()));
  }
  const inLog = checkedLn(limitRatio.div(step.r0), step.expLimit);
  if (!inLog.ok) return inLog;
  const outInner = ONE.plus(step.r0.times(ONE.minus(step.r0.div(limitRatio))));
  const outLog = checkedLn(outInner, step.expLimit);
  if (!outLog.ok) return outLog;
  return ok({ amountIn: step.b.times(inLog.value), amountOut: step.b.times(outLog.value) });
}

export function exactIn(step: SwapStep, amountIn: Decimal.Value): ExactInQuote {
  return unwrap(evaluateExactIn(step, dec(amountIn)));
}

export function exactOut(step: SwapStep, amountOut: Decimal.Value): Decimal {
  return unwrap(evaluateExactOut(step, dec(amountOut)));
}

export function swapToLimit(step: SwapStep, limitRatio: Decimal.Value): LimitQuote {
  return unwrap(evaluateSwapToLimit(step, dec(limitRatio)));
}

export function capAndInvert(step: SwapStep): ExactInQuote {
  return unwrap(evaluateCapAndInvert(step));
}
