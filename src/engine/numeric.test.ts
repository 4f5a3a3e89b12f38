import { describe, it, expect } from "vitest";
import { DomainError, KernelErrorCode, NonPositiveDomainError } from "./errors.js";
import {
  checkedExp,
  checkedLn,
  dec,
  guardPositive,
  inverse,
  minDec,
  ratio,
  requirePositive,
  roundDown,
  roundUp,
  safeExp,
  safeLn,
  sum,
  ZERO,
} from "./numeric.js";

describe("numeric safety layer", () => {
  describe("bounded exp", () => {
    it("accepts arguments up to the limit", () => {
      const result = checkedExp(dec(128));
      expect(result.ok).toBe(true);
      expect(safeExp(ZERO).toFixed()).toBe("1");
    });

    it("rejects arguments beyond the limit with a domain error", () => {
      const result = checkedExp(dec(-129));
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(DomainError);
        expect(result.error.code).toBe(KernelErrorCode.DOMAIN_ERROR);
        expect(result.error.metadata).toMatchObject({ operation: "exp", argument: "-129", limit: 128 });
      }
    });

    it("honours a tighter caller limit", () => {
      expect(checkedExp(dec(11), 10).ok).toBe(false);
      expect(() => safeExp(dec(11), 10)).toThrow(DomainError);
    });
  });

  describe("bounded ln", () => {
    it("returns zero for one", () => {
      expect(safeLn(dec(1)).toFixed()).toBe("0");
    });

    it("rejects zero and negative arguments", () => {
      expect(checkedLn(ZERO).ok).toBe(false);
      expect(checkedLn(dec(-1)).ok).toBe(false);
      expect(() => safeLn(ZERO)).toThrow(DomainError);
    });

    it("rejects arguments whose logarithm exceeds the limit", () => {
      expect(checkedLn(dec("1e-60"), 100).ok).toBe(false);
      expect(checkedLn(dec("1e-40"), 100).ok).toBe(true);
    });
  });

  describe("positivity guards", () => {
    it("passes strictly positive terms through", () => {
      const result = guardPositive(dec("0.5"), "term");
      expect(result.ok).toBe(true);
      if (result.ok) expect(result.value.toFixed()).toBe("0.5");
    });

    it("fails zero with a non-positive domain error", () => {
      expect(() => requirePositive(ZERO, "r0 + 1 - exp(y/b)")).toThrow(NonPositiveDomainError);
      const result = guardPositive(dec(-2), "inner");
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(KernelErrorCode.NON_POSITIVE_DOMAIN);
        expect(result.error.metadata).toEqual({ term: "inner", value: "-2" });
      }
    });

    it("refuses to invert a zero liquidity parameter", () => {
      expect(() => inverse(ZERO)).toThrow(NonPositiveDomainError);
      expect(inverse(dec(200)).toFixed()).toBe("0.005");
    });
  });

  describe("ratio", () => {
    it("is one for equal balances", () => {
      expect(ratio(dec(1000), dec(1000), inverse(dec(200))).toFixed()).toBe("1");
    });

    it("matches exp of the scaled difference", () => {
      const invB = inverse(dec(200));
      const r = ratio(dec(1100), dec(900), invB);
      expect(r.eq(safeExp(dec(1)))).toBe(true);
    });
  });

  describe("quantization", () => {
    it("rounds amounts the caller pays up", () => {
      expect(roundUp(dec("1.0000001"), 6).toFixed()).toBe("1.000001");
      expect(roundUp(dec("2.5"), 0).toFixed()).toBe("3");
    });

    it("rounds amounts the caller receives down", () => {
      expect(roundDown(dec("1.0000009"), 6).toFixed()).toBe("1");
      expect(roundDown(dec("2.5"), 0).toFixed()).toBe("2");
    });

    it("sums and takes minimums", () => {
      expect(sum([dec("1.5"), dec("2.25"), dec(3)]).toFixed()).toBe("6.75");
      expect(sum([]).toFixed()).toBe("0");
      expect(minDec(dec(2), dec(1)).toFixed()).toBe("1");
    });
  });
});
