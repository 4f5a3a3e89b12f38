/**
 * Custody of caller balances and LP shares. The pool service settles every
 * kernel transition through these interfaces; the in-memory implementations back
 * the HTTP server and the tests.
 */

import type { Decimal } from "decimal.js";
import { InsufficientBalanceError, InvalidRequestError } from "../engine/errors.js";
import { dec, ZERO } from "../engine/numeric.js";

export interface AssetBalance {
  asset: string;
  amount: string;
}

/** Token balances per (account, asset symbol). */
export interface BalanceTransfer {
  credit(account: string, asset: string, amount: string): void;
  balanceOf(account: string, asset: string): string;
  balancesOf(account: string): AssetBalance[];
  /** Throws InsufficientBalanceError when `from` holds less than `amount`. */
  transfer(from: string, to: string, asset: string, amount: string): void;
  /** Throws InsufficientBalanceError without moving anything. */
  assertAvailable(account: string, asset: string, amount: string): void;
}

/** LP share balances per (pool, account). */
export interface ShareLedger {
  sharesOf(poolId: string, account: string): string;
  mintShares(poolId: string, account: string, shares: string): void;
  burnShares(poolId: string, account: string, shares: string): void;
  assertShares(poolId: string, account: string, shares: string): void;
}

/** Custody account that holds a pool's inventory. */
export function poolAccount(poolId: string): string {
  return `pool:${poolId}`;
}

function parseNonNegative(amount: string, field: string): Decimal {
  let value: Decimal;
  try {
    value = dec(amount);
  } catch {
    throw new InvalidRequestError(`${field} is not a decimal number`, { [field]: amount });
  }
  if (!value.isFinite() || value.isNeg()) {
    throw new InvalidRequestError(`${field} must be a non-negative amount`, { [field]: amount });
  }
  return value;
}

export class InMemoryVault implements BalanceTransfer {
  private readonly balances = new Map<string, Map<string, Decimal>>();

  private read(account: string, asset: string): Decimal {
    return this.balances.get(account)?.get(asset) ?? ZERO;
  }

  private write(account: string, asset: string, value: Decimal): void {
    let assets = this.balances.get(account);
    if (assets === undefined) {
      assets = new Map();
      this.balances.set(account, assets);
    }
    assets.set(asset, value);
  }

  credit(account: string, asset: string, amount: string): void {
    const value = parseNonNegative(amount, "amount");
    this.write(account, asset, this.read(account, asset).plus(value));
  }

  balanceOf(account: string, asset: string): string {
    return this.read(account, asset).toFixed();
  }

  balancesOf(account: string): AssetBalance[] {
    const assets = this.balances.get(account);
    if (assets === undefined) return [];
    return [...assets.entries()].map(([asset, amount]) => ({ asset, amount: amount.toFixed() }));
  }

  assertAvailable(account: string, asset: string, amount: string): void {
    const required = parseNonNegative(amount, "amount");
    const available = this.read(account, asset);
    if (available.lt(required)) {
      throw new InsufficientBalanceError(account, asset, required.toFixed(), available.toFixed());
    }
  }

  transfer(from: string, to: string, asset: string, amount: string): void {
    const value = parseNonNegative(amount, "amount");
    if (value.isZero()) return;
    this.assertAvailable(from, asset, amount);
    this.write(from, asset, this.read(from, asset).minus(value));
    this.write(to, asset, this.read(to, asset).plus(value));
  }
}

export class InMemoryShareLedger implements ShareLedger {
  private readonly shares = new Map<string, Decimal>();

  private key(poolId: string, account: string): string {
    return `${poolId}:${account}`;
  }

  sharesOf(poolId: string, account: string): string {
    return (this.shares.get(this.key(poolId, account)) ?? ZERO).toFixed();
  }

  mintShares(poolId: string, account: string, shares: string): void {
    const value = parseNonNegative(shares, "shares");
    const key = this.key(poolId, account);
    this.shares.set(key, (this.shares.get(key) ?? ZERO).plus(value));
  }

  assertShares(poolId: string, account: string, shares: string): void {
    const required = parseNonNegative(shares, "shares");
    const held = this.shares.get(this.key(poolId, account)) ?? ZERO;
    if (held.lt(required)) {
      throw new InsufficientBalanceError(account, `${poolId} shares`, required.toFixed(), held.toFixed());
    }
  }

  burnShares(poolId: string, account: string, shares: string): void {
    this.assertShares(poolId, account, shares);
    const key = this.key(poolId, account);
    this.shares.set(key, (this.shares.get(key) ?? ZERO).minus(dec(shares)));
  }
}
