/**
 * LMSR pricing kernel with a state-dependent liquidity parameter.
 * Formulas:
 *   Size:    S(q) = sum_i q_i
 *   Depth:   b(q) = kappa * S(q)
 *   Cost:    C(q) = b * ln( sum_i exp(q_i / b) )
 *   Ratio:   r(i, j) = exp((q_i - q_j) / b)
 * Rescaling q by lambda rescales b by lambda, so every pair ratio is scale invariant.
 */

import type { Decimal } from "decimal.js";
import { DEFAULT_KERNEL_POLICY } from "../config/index.js";
import { ZeroLiquidityError } from "./errors.js";
import { fail, inverse, ok, ratio, safeExp, safeLn, sum, ZERO, unwrap, type Guarded } from "./numeric.js";

export function totalSize(q: readonly Decimal[]): Decimal {
  return sum(q);
}

export function checkedB(q: readonly Decimal[], kappa: Decimal): Guarded<Decimal> {
  const size = totalSize(q);
  if (size.lte(0)) return fail(new ZeroLiquidityError({ size: size.toString() }));
  return ok(kappa.times(size));
}

export function computeB(q: readonly Decimal[], kappa: Decimal): Decimal {
  return unwrap(checkedB(q, kappa));
}

/**
 * Shifted exponentials exp(q_i/b - M) with M = max_i(q_i/b).
 * Terms below the exp range underflow to zero; they are beyond kernel precision.
 */
function shiftedExponentials(q: readonly Decimal[], b: Decimal, limit: number): { max: Decimal; terms: Decimal[] } {
  const invB = inverse(b);
  const x = q.map((qi) => qi.times(invB));
  const max = x.reduce((a, c) => (a.gte(c) ? a : c));
  const terms = x.map((xi) => {
    const shifted = xi.minus(max);
    return shifted.lt(-limit) ? ZERO : safeExp(shifted, limit);
  });
  return { max, terms };
}

/**
 * Cost function via log-sum-exp: b * (M + ln sum_i exp(q_i/b - M)).
 * Used for invariant checks and the pool view, never on the swap path.
 */
export function logSumExpCost(
  q: readonly Decimal[],
  b: Decimal,
  limit: number = DEFAULT_KERNEL_POLICY.expInputLimit
): Decimal {
  const { max, terms } = shiftedExponentials(q, b, limit);
  return b.times(max.plus(safeLn(sum(terms), limit)));
}

/** exp((q_i - q_j) / b): the only pricing primitive the swap engine consumes. */
export function pairRatio(
  q: readonly Decimal[],
  i: number,
  j: number,
  b: Decimal,
  limit: number = DEFAULT_KERNEL_POLICY.expInputLimit
): Decimal {
  return ratio(q[i], q[j], inverse(b), limit);
}

/** Softmax prices p_i = exp(q_i/b) / sum_j exp(q_j/b); they sum to 1. */
export function marginalPrices(
  q: readonly Decimal[],
  b: Decimal,
  limit: number = DEFAULT_KERNEL_POLICY.expInputLimit
): Decimal[] {
  const { terms } = shiftedExponentials(q, b, limit);
  const total = sum(terms);
  return terms.map((t) => t.div(total));
}
