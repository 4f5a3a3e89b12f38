/**
 * Pool service settlement against the in-memory vault and share ledger.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import Fastify from "fastify";
import { InsufficientBalanceError, PoolNotFoundError, SlippageExceededError } from "../../src/engine/errors.js";
import { dec } from "../../src/engine/numeric.js";
import { InMemoryShareLedger, InMemoryVault, poolAccount } from "../../src/services/custody.service.js";
import { PoolService, type CreatePoolInput } from "../../src/services/pool.service.js";

const LP = "lp-account";
const TRADER = "trader-account";
const TREASURY = "treasury-account";

function poolInput(overrides: Partial<CreatePoolInput> = {}): CreatePoolInput {
  return {
    account: LP,
    assets: [
      { symbol: "AAA", decimals: 18 },
      { symbol: "BBB", decimals: 18 },
    ],
    kappa: "0.1",
    fees: "0",
    approximation: false,
    seed: ["1000", "1000"],
    ...overrides,
  };
}

function spiedLogger() {
  const log = Fastify({ logger: { level: "silent" } }).log;
  const info = vi.spyOn(log, "info");
  const warn = vi.spyOn(log, "warn");
  return { log, info, warn };
}

describe("PoolService", () => {
  let vault: InMemoryVault;
  let shares: InMemoryShareLedger;
  let service: PoolService;

  beforeEach(() => {
    vault = new InMemoryVault();
    shares = new InMemoryShareLedger();
    service = new PoolService({ vault, shares });
    vault.credit(LP, "AAA", "5000");
    vault.credit(LP, "BBB", "5000");
    vault.credit(TRADER, "AAA", "500");
  });

  describe("createPool", () => {
    it("pulls the seed into the pool account and mints L shares", async () => {
      const pool = await service.createPool(poolInput());
      expect(pool.view.balances).toEqual(["1000", "1000"]);
      expect(pool.view.totalShares).toBe("2000");
      expect(vault.balanceOf(LP, "AAA")).toBe("4000");
      expect(vault.balanceOf(poolAccount(pool.id), "BBB")).toBe("1000");
      expect(shares.sharesOf(pool.id, LP)).toBe("2000");
      expect(service.listPools()).toHaveLength(1);
    });

    it("fails without funds and registers nothing", async () => {
      await expect(service.createPool(poolInput({ account: TRADER }))).rejects.toThrow(InsufficientBalanceError);
      expect(service.listPools()).toEqual([]);
      expect(vault.balanceOf(TRADER, "AAA")).toBe("500");
    });
  });

  describe("swap", () => {
    it("moves input in, output out and commits the new state", async () => {
      const pool = await service.createPool(poolInput());
      const settlement = await service.swap(pool.id, TRADER, { inputIndex: 0, outputIndex: 1, amountIn: "100" });
      expect(settlement.amountOut).toBe("66.359313150237245285");
      expect(vault.balanceOf(TRADER, "AAA")).toBe("400");
      expect(vault.balanceOf(TRADER, "BBB")).toBe("66.359313150237245285");
      expect(vault.balanceOf(poolAccount(pool.id), "AAA")).toBe("1100");
      expect(service.getPool(pool.id).view.balances).toEqual(["1100", "933.640686849762754715"]);
    });

    it("pays the protocol fee to the receiver", async () => {
      const pool = await service.createPool(
        poolInput({ fees: "0.003", protocolFeeShare: "0.2", protocolFeeReceiver: TREASURY })
      );
      await service.swap(pool.id, TRADER, { inputIndex: 0, outputIndex: 1, amountIn: "100" });
      expect(vault.balanceOf(TREASURY, "AAA")).toBe("0.11982");
      expect(vault.balanceOf(poolAccount(pool.id), "AAA")).toBe("1099.88018");
      expect(service.getPool(pool.id).view.balances[0]).toBe("1099.88018");
    });

    it("leaves balances and state untouched when the swap fails", async () => {
      const pool = await service.createPool(poolInput());
      await expect(
        service.swap(pool.id, TRADER, { inputIndex: 0, outputIndex: 1, amountIn: "100", minOut: "70" })
      ).rejects.toThrow(SlippageExceededError);
      await expect(
        service.swap(pool.id, TRADER, { inputIndex: 0, outputIndex: 1, amountIn: "600" })
      ).rejects.toThrow(InsufficientBalanceError);
      expect(vault.balanceOf(TRADER, "AAA")).toBe("500");
      expect(service.getPool(pool.id).view.balances).toEqual(["1000", "1000"]);
    });

    it("serializes concurrent swaps on one pool", async () => {
      const pool = await service.createPool(poolInput());
      const [first, second] = await Promise.all([
        service.swap(pool.id, TRADER, { inputIndex: 0, outputIndex: 1, amountIn: "100" }),
        service.swap(pool.id, TRADER, { inputIndex: 0, outputIndex: 1, amountIn: "100" }),
      ]);
      expect(first.amountOut).toBe("66.359313150237245285");
      expect(Number(second.amountOut)).toBeLessThan(Number(first.amountOut));
      expect(vault.balanceOf(TRADER, "AAA")).toBe("300");
    });
  });

  describe("liquidity", () => {
    it("mints and burns proportional shares", async () => {
      const pool = await service.createPool(poolInput());
      const minted = await service.mint(pool.id, LP, { amount: "200" });
      expect(minted).toEqual({ deposits: ["100", "100"], sharesMinted: "200" });
      expect(shares.sharesOf(pool.id, LP)).toBe("2200");

      const burned = await service.burn(pool.id, LP, { shares: "1100" });
      expect(burned.amountsOut).toEqual(["550", "550"]);
      expect(shares.sharesOf(pool.id, LP)).toBe("1100");
      expect(vault.balanceOf(LP, "AAA")).toBe("4450");
    });

    it("refuses to burn shares the account does not hold", async () => {
      const pool = await service.createPool(poolInput());
      await expect(service.burn(pool.id, TRADER, { shares: "10" })).rejects.toThrow(InsufficientBalanceError);
      expect(service.getPool(pool.id).view.totalShares).toBe("2000");
    });

    it("mints against a single asset and redeems into one", async () => {
      const pool = await service.createPool(poolInput());
      const minted = await service.swapMint(pool.id, TRADER, { inputIndex: 0, amountIn: "100" });
      expect(minted.amountIn).toBe("100");
      expect(Number(minted.sharesMinted)).toBeGreaterThan(0);
      expect(Number(minted.sharesMinted)).toBeLessThan(100);
      expect(shares.sharesOf(pool.id, TRADER)).toBe(minted.sharesMinted);
      expect(vault.balanceOf(TRADER, "AAA")).toBe("400");

      const redeemed = await service.burnSwap(pool.id, TRADER, { shares: minted.sharesMinted, targetIndex: 0 });
      expect(Number(redeemed.amountOut)).toBeLessThan(100);
      expect(shares.sharesOf(pool.id, TRADER)).toBe("0");
      expect(vault.balanceOf(TRADER, "AAA")).toBe(dec(400).plus(redeemed.amountOut).toFixed());
    });
  });

  describe("lookups and logging", () => {
    it("throws for an unknown pool", () => {
      expect(() => service.getPool("missing")).toThrow(PoolNotFoundError);
    });

    it("lists share holdings per account", async () => {
      const pool = await service.createPool(poolInput());
      const account = service.getAccount(LP);
      expect(account.shares).toEqual([{ poolId: pool.id, shares: "2000" }]);
      expect(account.balances).toEqual([
        { asset: "AAA", amount: "4000" },
        { asset: "BBB", amount: "4000" },
      ]);
    });

    it("logs settled and failed operations", async () => {
      const { log, info, warn } = spiedLogger();
      const logged = new PoolService({ vault, shares, log });
      const pool = await logged.createPool(poolInput());
      await logged.swap(pool.id, TRADER, { inputIndex: 0, outputIndex: 1, amountIn: "10" });
      await expect(
        logged.swap(pool.id, TRADER, { inputIndex: 0, outputIndex: 1, amountIn: "10", minOut: "11" })
      ).rejects.toThrow(SlippageExceededError);

      expect(info).toHaveBeenCalledWith(
        expect.objectContaining({ poolId: pool.id, operation: "swap", account: TRADER }),
        "pool swap settled"
      );
      expect(warn).toHaveBeenCalledWith(
        expect.objectContaining({ poolId: pool.id, operation: "swap", code: "slippage_exceeded" }),
        "pool swap failed"
      );
    });
  });
});
