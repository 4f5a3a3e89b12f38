import { describe, it, expect } from "vitest";
import { DEFAULT_KERNEL_POLICY } from "../config/index.js";
import { InfeasibleOutputError, InvalidRequestError, KernelErrorCode, LimitNotAboveCurrentError } from "./errors.js";
import { dec } from "./numeric.js";
import { computeB } from "./pricing.js";
import {
  capAndInvert,
  evaluateExactIn,
  evaluateExactOut,
  exactIn,
  exactOut,
  openSwapStep,
  outputAsymptote,
  prepareSwapStep,
  swapToLimit,
} from "./swap-engine.js";

const kappa = dec("0.1");

function stepFor(values: string[], i: number, j: number) {
  const q = values.map((v) => dec(v));
  return openSwapStep(q, i, j, computeB(q, kappa), DEFAULT_KERNEL_POLICY);
}

describe("two-asset swap engine", () => {
  const balanced = stepFor(["1000", "1000"], 0, 1);

  it("caches b, 1/b and r0 on the step", () => {
    expect(balanced.b.toFixed()).toBe("200");
    expect(balanced.invB.toFixed()).toBe("0.005");
    expect(balanced.r0.toFixed()).toBe("1");
    expect(balanced.available.toFixed()).toBe("1000");
  });

  it("rejects an invalid pair", () => {
    const q = [dec(1000), dec(1000)];
    const result = prepareSwapStep(q, 1, 1, dec(200), DEFAULT_KERNEL_POLICY);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(InvalidRequestError);
    expect(() => openSwapStep(q, 0, 2, dec(200), DEFAULT_KERNEL_POLICY)).toThrow(InvalidRequestError);
  });

  describe("exact-in", () => {
    it("prices 100 in as 200 * ln(2 - e^-0.5)", () => {
      const quote = exactIn(balanced, "100");
      expect(quote.amountOut.toFixed(18)).toBe("66.359313150237245285");
      expect(quote.amountIn.toFixed()).toBe("100");
      expect(quote.capped).toBe(false);
    });

    it("returns zero for zero input", () => {
      const quote = exactIn(balanced, 0);
      expect(quote.amountOut.toFixed()).toBe("0");
    });

    it("is strictly increasing and concave", () => {
      const y10 = exactIn(balanced, 10).amountOut;
      const y50 = exactIn(balanced, 50).amountOut;
      const y100 = exactIn(balanced, 100).amountOut;
      expect(y10.toNumber()).toBeCloseTo(9.523719535293689, 12);
      expect(y50.toNumber()).toBeCloseTo(39.96666812945839, 12);
      expect(y10.lt(y50) && y50.lt(y100)).toBe(true);
      // Average output per unit falls as the input grows.
      expect(y10.div(10).gt(y50.div(50))).toBe(true);
      expect(y50.div(50).gt(y100.div(100))).toBe(true);
    });

    it("stays below the asymptote b * ln(1 + r0)", () => {
      expect(outputAsymptote(balanced).toFixed(12)).toBe("138.629436111989");
      const huge = exactIn(balanced, "10000");
      expect(huge.amountOut.lt(outputAsymptote(balanced))).toBe(true);
    });

    it("rejects negative input", () => {
      const result = evaluateExactIn(balanced, dec(-1));
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe(KernelErrorCode.INVALID_REQUEST);
    });
  });

  describe("exact-out", () => {
    it("inverts exact-in", () => {
      const y = exactIn(balanced, "100").amountOut;
      const a = exactOut(balanced, y);
      expect(a.minus(100).abs().lt("1e-30")).toBe(true);
    });

    it("is strictly increasing and convex", () => {
      const a10 = exactOut(balanced, 10);
      const a20 = exactOut(balanced, 20);
      const a30 = exactOut(balanced, 30);
      expect(a10.lt(a20) && a20.lt(a30)).toBe(true);
      expect(a30.minus(a20).gt(a20.minus(a10))).toBe(true);
    });

    it("fails at or beyond the asymptote", () => {
      expect(() => exactOut(balanced, 139)).toThrow(InfeasibleOutputError);
      const result = evaluateExactOut(balanced, dec(139));
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(KernelErrorCode.INFEASIBLE_OUTPUT);
        expect(result.error.metadata.target).toBe("139");
      }
    });
  });

  describe("swap-to-limit", () => {
    it("moves the ratio from 1 to 1.2", () => {
      const limit = swapToLimit(balanced, "1.2");
      // 200 * ln 1.2 and 200 * ln(7/6)
      expect(limit.amountIn.toFixed(18)).toBe("36.464311358790925242");
      expect(limit.amountOut.toFixed(18)).toBe("30.830135965451660859");
    });

    it("agrees with exact-in at the limit input", () => {
      const limit = swapToLimit(balanced, "1.2");
      const quote = exactIn(balanced, limit.amountIn);
      expect(quote.amountOut.minus(limit.amountOut).abs().lt("1e-30")).toBe(true);
    });

    it("grows strictly with the limit", () => {
      const lower = swapToLimit(balanced, "1.1");
      const higher = swapToLimit(balanced, "1.3");
      expect(lower.amountIn.lt(higher.amountIn)).toBe(true);
      expect(lower.amountOut.lt(higher.amountOut)).toBe(true);
    });

    it("rejects a limit at or below the current ratio", () => {
      expect(() => swapToLimit(balanced, "1")).toThrow(LimitNotAboveCurrentError);
      expect(() => swapToLimit(balanced, "0.9")).toThrow(LimitNotAboveCurrentError);
    });
  });

  describe("capacity cap", () => {
    const thin = stepFor(["1000", "50"], 0, 1);

    it("caps output at the available balance and inverts for the input", () => {
      const quote = exactIn(thin, "500");
      expect(quote.capped).toBe(true);
      expect(quote.amountOut.toFixed()).toBe("50");
      expect(quote.amountIn.toFixed(18)).toBe("0.007536220492261030");
    });

    it("agrees with the explicit cap-and-invert form", () => {
      const capped = capAndInvert(thin);
      expect(capped.amountIn.eq(exactIn(thin, "500").amountIn)).toBe(true);
    });

    it("returns zero when the output side is empty", () => {
      const empty = stepFor(["1000", "0"], 0, 1);
      const quote = exactIn(empty, "10");
      expect(quote).toMatchObject({ capped: true });
      expect(quote.amountOut.toFixed()).toBe("0");
      expect(quote.amountIn.toFixed()).toBe("0");
    });
  });
});
