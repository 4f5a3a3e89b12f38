/**
 * Bracket-and-bisect root finder for a monotone increasing f with f(0) = 0.
 * Pure: the iteration cap and tolerance are explicit, and non-convergence is a
 * returned value rather than an exception or an unbounded loop.
 */

import type { Decimal } from "decimal.js";
import { dec, minDec, ZERO } from "./numeric.js";

/** One evaluation of f. An infeasible point lies beyond the root and narrows the bracket. */
export type Probe = { feasible: true; value: Decimal } | { feasible: false; reason: string };

export interface SolverOptions {
  /** First point tried; doubled until the bracket closes. */
  seed: Decimal;
  /** Largest x ever probed. */
  ceiling: Decimal;
  /** Converged once target - f(lo) <= tolerance. */
  tolerance: Decimal;
  maxIterations: number;
}

export type SolverResult =
  | { converged: true; root: Decimal; value: Decimal; iterations: number; atCeiling: boolean }
  | { converged: false; iterations: number; reason: string };

/**
 * Finds the largest probed x with f(x) <= target within tolerance.
 * The returned root always satisfies f(root) <= target, so the caller never
 * consumes more than it was given. If f(ceiling) is feasible and still below
 * target, the ceiling is returned with `atCeiling` set.
 */
export function bracketAndBisect(
  f: (x: Decimal) => Probe,
  target: Decimal,
  options: SolverOptions
): SolverResult {
  if (target.lte(0)) {
    return { converged: true, root: ZERO, value: ZERO, iterations: 0, atCeiling: false };
  }
  const half = dec(0.5);
  let lo = ZERO;
  let loValue = ZERO;
  let hi = options.ceiling;
  let iterations = 0;
  let x = minDec(options.seed.gt(0) ? options.seed : options.ceiling, options.ceiling);
  let lastReason = "bracket not closed";

  for (;;) {
    if (iterations >= options.maxIterations) {
      return { converged: false, iterations, reason: lastReason };
    }
    iterations++;
    const probe = f(x);
    if (!probe.feasible) {
      lastReason = probe.reason;
      hi = x;
      break;
    }
    if (probe.value.gte(target)) {
      hi = x;
      break;
    }
    lo = x;
    loValue = probe.value;
    if (target.minus(loValue).lte(options.tolerance)) {
      return { converged: true, root: lo, value: loValue, iterations, atCeiling: false };
    }
    if (x.gte(options.ceiling)) {
      return { converged: true, root: lo, value: loValue, iterations, atCeiling: true };
    }
    x = minDec(x.times(2), options.ceiling);
  }

  while (target.minus(loValue).gt(options.tolerance)) {
    if (iterations >= options.maxIterations) {
      return { converged: false, iterations, reason: `bisection exhausted (${lastReason})` };
    }
    iterations++;
    const mid = lo.plus(hi).times(half);
    const probe = f(mid);
    if (!probe.feasible) {
      lastReason = probe.reason;
      hi = mid;
    } else if (probe.value.gte(target)) {
      hi = mid;
    } else {
      lo = mid;
      loValue = probe.value;
    }
  }

  return { converged: true, root: lo, value: loValue, iterations, atCeiling: false };
}
