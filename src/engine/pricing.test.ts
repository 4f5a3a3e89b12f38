import { describe, it, expect } from "vitest";
import { KernelErrorCode, ZeroLiquidityError } from "./errors.js";
import { dec, sum } from "./numeric.js";
import { checkedB, computeB, logSumExpCost, marginalPrices, pairRatio, totalSize } from "./pricing.js";

const kappa = dec("0.1");

function balances(...values: string[]) {
  return values.map((v) => dec(v));
}

describe("pricing kernel", () => {
  it("computes b = kappa * S(q)", () => {
    const q = balances("1000", "1000");
    expect(totalSize(q).toFixed()).toBe("2000");
    expect(computeB(q, kappa).toFixed()).toBe("200");
  });

  it("fails with zero liquidity when every balance is zero", () => {
    const q = balances("0", "0", "0");
    expect(() => computeB(q, kappa)).toThrow(ZeroLiquidityError);
    const guarded = checkedB(q, kappa);
    expect(guarded.ok).toBe(false);
    if (!guarded.ok) expect(guarded.error.code).toBe(KernelErrorCode.ZERO_LIQUIDITY);
  });

  it("evaluates the pair ratio from the balance difference", () => {
    const q = balances("1000", "1000");
    expect(pairRatio(q, 0, 1, computeB(q, kappa)).toFixed()).toBe("1");
  });

  it("keeps pair ratios unchanged under proportional rescaling", () => {
    const q = balances("100", "50", "25");
    const scaled = q.map((v) => v.times(2));
    for (const [i, j] of [
      [0, 1],
      [2, 0],
      [1, 2],
    ]) {
      const before = pairRatio(q, i, j, computeB(q, kappa));
      const after = pairRatio(scaled, i, j, computeB(scaled, kappa));
      expect(before.minus(after).abs().lt("1e-35")).toBe(true);
    }
  });

  it("computes the cost with the max shift", () => {
    const q = balances("1000", "1000");
    const cost = logSumExpCost(q, computeB(q, kappa));
    // 200 * (5 + ln 2)
    expect(cost.toFixed(12)).toBe("1138.629436111989");
  });

  it("returns softmax prices that sum to one", () => {
    const q = balances("1100", "900");
    const prices = marginalPrices(q, computeB(q, kappa));
    expect(prices).toHaveLength(2);
    expect(prices[0].toNumber()).toBeCloseTo(0.7310585786300049, 14);
    expect(prices[1].toNumber()).toBeCloseTo(0.2689414213699951, 14);
    expect(sum(prices).minus(1).abs().lt("1e-35")).toBe(true);
  });

  it("splits equal balances evenly", () => {
    const q = balances("10", "10", "10", "10");
    const prices = marginalPrices(q, computeB(q, kappa));
    expect(prices.map((p) => p.toFixed())).toEqual(["0.25", "0.25", "0.25", "0.25"]);
  });

  it("underflows far-out terms to zero instead of failing", () => {
    // Spread of 1e6 / (0.001 * 1e6) = 1000 units of b, far beyond the exp limit.
    const q = balances("1000000", "0");
    const prices = marginalPrices(q, computeB(q, dec("0.001")));
    expect(prices.map((p) => p.toFixed())).toEqual(["1", "0"]);
  });
});
