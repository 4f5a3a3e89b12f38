/**
 * Pool registry and settlement. Kernel transitions are computed on a pool's
 * current (params, state), settled through custody and only then committed, all
 * inside the pool's FIFO queue. A failure anywhere leaves both the pool state and
 * the custody balances as they were.
 */

import { randomUUID } from "node:crypto";
import type { FastifyBaseLogger } from "fastify";
import { DEFAULT_KERNEL_POLICY } from "../config/index.js";
import {
  burn,
  burnSwap,
  createPoolParams,
  enqueuePoolTask,
  getPoolView,
  initializePool,
  isKernelError,
  mint,
  PoolNotFoundError,
  quoteBurnSwap,
  quoteSwap,
  quoteSwapMint,
  swap,
  swapMint,
} from "../engine/index.js";
import { dec } from "../engine/numeric.js";
import type {
  BurnRequest,
  BurnSettlement,
  BurnSwapRequest,
  BurnSwapSettlement,
  KernelPolicy,
  MintRequest,
  MintSettlement,
  PoolConfigInput,
  PoolParams,
  PoolState,
  PoolView,
  SwapMintRequest,
  SwapMintSettlement,
  SwapRequest,
  SwapSettlement,
} from "../types/lmsr.js";
import { poolAccount, type AssetBalance, type BalanceTransfer, type ShareLedger } from "./custody.service.js";

export type PoolOperation = "create" | "swap" | "mint" | "burn" | "swapMint" | "burnSwap";

export interface CreatePoolInput extends PoolConfigInput {
  /** Seed balances, one per asset. */
  seed: string[];
  /** Account that funds the seed and receives the initial L shares. */
  account: string;
}

export interface PoolSummary {
  id: string;
  assets: PoolParams["assets"];
  kappa: string;
  fees: readonly string[];
  protocolFeeShare: string;
  protocolFeeReceiver: string | null;
  approximation: boolean;
  view: PoolView;
}

export interface AccountSummary {
  account: string;
  balances: AssetBalance[];
  shares: { poolId: string; shares: string }[];
}

export interface PoolServiceDefaults {
  approximation: boolean;
  policy: Readonly<KernelPolicy>;
}

export interface PoolServiceOptions {
  vault: BalanceTransfer;
  shares: ShareLedger;
  log?: FastifyBaseLogger;
  defaults?: PoolServiceDefaults;
}

interface PoolRecord {
  id: string;
  params: PoolParams;
  state: PoolState;
}

function isPositive(amount: string): boolean {
  return dec(amount).gt(0);
}

export class PoolService {
  private readonly pools = new Map<string, PoolRecord>();
  private readonly vault: BalanceTransfer;
  private readonly shares: ShareLedger;
  private readonly log: FastifyBaseLogger | undefined;
  private readonly defaults: PoolServiceDefaults;

  constructor(options: PoolServiceOptions) {
    this.vault = options.vault;
    this.shares = options.shares;
    this.log = options.log;
    this.defaults = options.defaults ?? { approximation: true, policy: DEFAULT_KERNEL_POLICY };
  }

  private requirePool(poolId: string): PoolRecord {
    const record = this.pools.get(poolId);
    if (record === undefined) throw new PoolNotFoundError(poolId);
    return record;
  }

  private summarize(record: PoolRecord): PoolSummary {
    const { params } = record;
    return {
      id: record.id,
      assets: params.assets,
      kappa: params.kappa,
      fees: params.fees,
      protocolFeeShare: params.protocolFeeShare,
      protocolFeeReceiver: params.protocolFeeReceiver,
      approximation: params.approximation,
      view: getPoolView(params, record.state),
    };
  }

  private symbol(record: PoolRecord, index: number): string {
    return record.params.assets[index].symbol;
  }

  private payProtocolFee(record: PoolRecord, index: number, protocolFee: string): void {
    const receiver = record.params.protocolFeeReceiver;
    if (receiver === null || !isPositive(protocolFee)) return;
    this.vault.transfer(poolAccount(record.id), receiver, this.symbol(record, index), protocolFee);
  }

  /** Runs one operation inside the pool's queue and logs its outcome. */
  private async settle<T extends object>(
    poolId: string,
    operation: PoolOperation,
    account: string,
    work: (record: PoolRecord) => T
  ): Promise<T> {
    try {
      const result = await enqueuePoolTask(poolId, () => work(this.requirePool(poolId)));
      this.log?.info({ poolId, operation, account, settlement: result }, `pool ${operation} settled`);
      return result;
    } catch (err) {
      this.log?.warn(
        { poolId, operation, account, code: isKernelError(err) ? err.code : "internal_error", err },
        `pool ${operation} failed`
      );
      throw err;
    }
  }

  /** Validates the pool, pulls the seed from `account` and mints L shares to it. */
  async createPool(input: CreatePoolInput): Promise<PoolSummary> {
    const id = randomUUID();
    const { seed, account, ...config } = input;
    return this.settle(id, "create", account, () => {
      const params = createPoolParams(
        { ...config, approximation: config.approximation ?? this.defaults.approximation },
        this.defaults.policy
      );
      const state = initializePool(params, seed);
      const record: PoolRecord = { id, params, state };
      params.assets.forEach((asset, k) => this.vault.assertAvailable(account, asset.symbol, state.balances[k]));
      params.assets.forEach((asset, k) => this.vault.transfer(account, poolAccount(id), asset.symbol, state.balances[k]));
      this.shares.mintShares(id, account, state.totalShares);
      this.pools.set(id, record);
      return this.summarize(record);
    });
  }

  listPools(): PoolSummary[] {
    return [...this.pools.values()].map((record) => this.summarize(record));
  }

  getPool(poolId: string): PoolSummary {
    return this.summarize(this.requirePool(poolId));
  }

  quoteSwap(poolId: string, request: SwapRequest): SwapSettlement {
    const record = this.requirePool(poolId);
    return quoteSwap(record.params, record.state, request);
  }

  quoteSwapMint(poolId: string, request: SwapMintRequest): SwapMintSettlement {
    const record = this.requirePool(poolId);
    return quoteSwapMint(record.params, record.state, request);
  }

  quoteBurnSwap(poolId: string, request: BurnSwapRequest): BurnSwapSettlement {
    const record = this.requirePool(poolId);
    return quoteBurnSwap(record.params, record.state, request);
  }

  async swap(poolId: string, account: string, request: SwapRequest): Promise<SwapSettlement> {
    return this.settle(poolId, "swap", account, (record) => {
      const { state, settlement } = swap(record.params, record.state, request);
      const assetIn = this.symbol(record, request.inputIndex);
      const assetOut = this.symbol(record, request.outputIndex);
      this.vault.assertAvailable(account, assetIn, settlement.amountIn);
      this.vault.transfer(account, poolAccount(poolId), assetIn, settlement.amountIn);
      this.vault.transfer(poolAccount(poolId), account, assetOut, settlement.amountOut);
      this.payProtocolFee(record, request.inputIndex, settlement.protocolFee);
      record.state = state;
      return settlement;
    });
  }

  async mint(poolId: string, account: string, request: MintRequest): Promise<MintSettlement> {
    return this.settle(poolId, "mint", account, (record) => {
      const { state, settlement } = mint(record.params, record.state, request);
      record.params.assets.forEach((asset, k) =>
        this.vault.assertAvailable(account, asset.symbol, settlement.deposits[k])
      );
      record.params.assets.forEach((asset, k) =>
        this.vault.transfer(account, poolAccount(poolId), asset.symbol, settlement.deposits[k])
      );
      this.shares.mintShares(poolId, account, settlement.sharesMinted);
      record.state = state;
      return settlement;
    });
  }

  async burn(poolId: string, account: string, request: BurnRequest): Promise<BurnSettlement> {
    return this.settle(poolId, "burn", account, (record) => {
      const { state, settlement } = burn(record.params, record.state, request);
      this.shares.assertShares(poolId, account, settlement.sharesBurned);
      this.shares.burnShares(poolId, account, settlement.sharesBurned);
      record.params.assets.forEach((asset, k) =>
        this.vault.transfer(poolAccount(poolId), account, asset.symbol, settlement.amountsOut[k])
      );
      record.state = state;
      return settlement;
    });
  }

  async swapMint(poolId: string, account: string, request: SwapMintRequest): Promise<SwapMintSettlement> {
    return this.settle(poolId, "swapMint", account, (record) => {
      const { state, settlement } = swapMint(record.params, record.state, request);
      const assetIn = this.symbol(record, request.inputIndex);
      this.vault.assertAvailable(account, assetIn, settlement.amountIn);
      this.vault.transfer(account, poolAccount(poolId), assetIn, settlement.amountIn);
      this.payProtocolFee(record, request.inputIndex, settlement.protocolFee);
      this.shares.mintShares(poolId, account, settlement.sharesMinted);
      record.state = state;
      return settlement;
    });
  }

  async burnSwap(poolId: string, account: string, request: BurnSwapRequest): Promise<BurnSwapSettlement> {
    return this.settle(poolId, "burnSwap", account, (record) => {
      const { state, settlement } = burnSwap(record.params, record.state, request);
      this.shares.assertShares(poolId, account, settlement.sharesBurned);
      this.shares.burnShares(poolId, account, settlement.sharesBurned);
      this.vault.transfer(poolAccount(poolId), account, this.symbol(record, request.targetIndex), settlement.amountOut);
      this.payProtocolFee(record, request.targetIndex, settlement.protocolFee);
      record.state = state;
      return settlement;
    });
  }

  credit(account: string, asset: string, amount: string): AccountSummary {
    this.vault.credit(account, asset, amount);
    this.log?.info({ account, asset, amount }, "account credited");
    return this.getAccount(account);
  }

  getAccount(account: string): AccountSummary {
    const shares = [...this.pools.keys()]
      .map((poolId) => ({ poolId, shares: this.shares.sharesOf(poolId, account) }))
      .filter((entry) => isPositive(entry.shares));
    return { account, balances: this.vault.balancesOf(account), shares };
  }
}
