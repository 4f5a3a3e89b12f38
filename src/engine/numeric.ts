/**
 * Numeric safety layer. Every kernel computation runs on the `Dec` constructor
 * (fixed significant-digit precision, half-even rounding); exp and ln are only
 * reachable through the bounded helpers below.
 */

import { Decimal } from "decimal.js";
import { DEFAULT_KERNEL_POLICY } from "../config/index.js";
import { DomainError, NonPositiveDomainError, type KernelError } from "./errors.js";

export const KERNEL_PRECISION = 40;

/** LP shares and internal-unit amounts are quantized to this many decimal places. */
export const SHARE_DECIMALS = 18;

export const Dec = Decimal.clone({
  precision: KERNEL_PRECISION,
  rounding: Decimal.ROUND_HALF_EVEN,
});

export type Guarded<T> = { ok: true; value: T } | { ok: false; error: KernelError };

export function dec(v: Decimal.Value): Decimal {
  return new Dec(v);
}

export const ZERO = dec(0);
export const ONE = dec(1);

export function ok<T>(value: T): Guarded<T> {
  return { ok: true, value };
}

export function fail<T>(error: KernelError): Guarded<T> {
  return { ok: false, error };
}

export function unwrap<T>(guarded: Guarded<T>): T {
  if (guarded.ok) return guarded.value;
  throw guarded.error;
}

export function checkedExp(x: Decimal, limit: number = DEFAULT_KERNEL_POLICY.expInputLimit): Guarded<Decimal> {
  if (!x.isFinite() || x.abs().gt(limit)) {
    return fail(new DomainError("exp", x.toString(), { limit }));
  }
  return ok(x.exp());
}

export function checkedLn(x: Decimal, limit: number = DEFAULT_KERNEL_POLICY.expInputLimit): Guarded<Decimal> {
  if (!x.isFinite() || x.lte(0)) {
    return fail(new DomainError("ln", x.toString(), { limit }));
  }
  const y = x.ln();
  if (y.abs().gt(limit)) {
    return fail(new DomainError("ln", x.toString(), { limit }));
  }
  return ok(y);
}

export function safeExp(x: Decimal, limit?: number): Decimal {
  return unwrap(checkedExp(x, limit));
}

export function safeLn(x: Decimal, limit?: number): Decimal {
  return unwrap(checkedLn(x, limit));
}

/** Checks a term that will later be passed to ln. */
export function guardPositive(term: Decimal, label: string): Guarded<Decimal> {
  if (term.isFinite() && term.gt(0)) return ok(term);
  return fail(new NonPositiveDomainError(label, term.toString()));
}

export function requirePositive(term: Decimal, label: string): Decimal {
  return unwrap(guardPositive(term, label));
}

/** 1/b, computed once per call and threaded through every ratio. */
export function inverse(b: Decimal): Decimal {
  return ONE.div(requirePositive(b, "b"));
}

/** exp((a - c) / b) from the difference, never as a quotient of two exponentials. */
export function checkedRatio(a: Decimal, c: Decimal, invB: Decimal, limit?: number): Guarded<Decimal> {
  return checkedExp(a.minus(c).times(invB), limit);
}

export function ratio(a: Decimal, c: Decimal, invB: Decimal, limit?: number): Decimal {
  return unwrap(checkedRatio(a, c, invB, limit));
}

export function sum(values: readonly Decimal[]): Decimal {
  return values.reduce((acc, v) => acc.plus(v), ZERO);
}

/** Quantize toward +infinity: amounts the caller pays, fees. */
export function roundUp(x: Decimal, decimals: number): Decimal {
  return x.toDecimalPlaces(decimals, Decimal.ROUND_CEIL);
}

/** Quantize toward -infinity: amounts the caller receives, protocol carve-outs, minted shares. */
export function roundDown(x: Decimal, decimals: number): Decimal {
  return x.toDecimalPlaces(decimals, Decimal.ROUND_FLOOR);
}

export function minDec(a: Decimal, b: Decimal): Decimal {
  return a.lte(b) ? a : b;
}
