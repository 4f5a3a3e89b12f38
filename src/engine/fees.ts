/**
 * Fee composer. Fees are applied to nominal amounts before the fee-free swap
 * and liquidity engines run. The total fee rounds up (toward the pool) and the
 * protocol carve-out rounds down (toward the LPs).
 */

import type { Decimal } from "decimal.js";
import { minDec, ONE, roundDown, roundUp, ZERO } from "./numeric.js";

export interface FeeSplit {
  net: Decimal;
  fee: Decimal;
}

export interface GrossInput {
  gross: Decimal;
  fee: Decimal;
}

export interface ProtocolSplit {
  protocol: Decimal;
  retained: Decimal;
}

/** Effective fee of an i -> j swap: 1 - (1 - f_i)(1 - f_j). */
export function pairFee(inputFee: Decimal, outputFee: Decimal): Decimal {
  return ONE.minus(ONE.minus(inputFee).times(ONE.minus(outputFee)));
}

/** Fee charged on an input amount already quantized to `decimals`. */
export function chargeOnInput(amount: Decimal, rate: Decimal, decimals: number): FeeSplit {
  const fee = minDec(roundUp(amount.times(rate), decimals), amount);
  return { net: amount.minus(fee), fee };
}

/**
 * Gross input that nets `net` after the fee, for swaps that consumed less than
 * offered (limit or capacity cap). Never above `cap`, the amount the caller offered.
 */
export function grossUpInput(net: Decimal, rate: Decimal, decimals: number, cap: Decimal): GrossInput {
  const gross = rate.isZero() ? minDec(net, cap) : minDec(roundUp(net.div(ONE.minus(rate)), decimals), cap);
  return { gross, fee: gross.minus(net) };
}

/** Fee charged on an output amount; the net paid out rounds down. */
export function chargeOnOutput(amount: Decimal, rate: Decimal, decimals: number): FeeSplit {
  const floor = roundDown(amount, decimals);
  const fee = minDec(roundUp(amount.times(rate), decimals), floor);
  return { net: floor.minus(fee), fee };
}

export function splitProtocolFee(fee: Decimal, share: Decimal, decimals: number): ProtocolSplit {
  if (fee.lte(0) || share.lte(0)) return { protocol: ZERO, retained: fee };
  const protocol = roundDown(fee.times(share), decimals);
  return { protocol, retained: fee.minus(protocol) };
}
