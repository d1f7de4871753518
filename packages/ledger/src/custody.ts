import type { Address, AssetCustody, AssetId } from '@tessera/types';

/**
 * In-process asset custody: per-asset account balances plus the pool
 * holding locked collateral.
 */
export class InMemoryCustody implements AssetCustody {
  private readonly balances = new Map<string, bigint>();
  private readonly pools = new Map<AssetId, bigint>();

  /** Credit an account out of thin air (test setup, simulations) */
  fund(asset: AssetId, account: Address, amount: bigint): void {
    this.setBalance(asset, account, this.balanceOf(asset, account) + amount);
  }

  balanceOf(asset: AssetId, account: Address): bigint {
    return this.balances.get(key(asset, account)) ?? 0n;
  }

  poolBalance(asset: AssetId): bigint {
    return this.pools.get(asset) ?? 0n;
  }

  async transferIn(asset: AssetId, from: Address, amount: bigint): Promise<void> {
    const balance = this.balanceOf(asset, from);
    if (balance < amount) {
      throw new Error(`Insufficient ${asset} balance for ${from}: has ${balance}, needs ${amount}`);
    }
    this.setBalance(asset, from, balance - amount);
    this.pools.set(asset, this.poolBalance(asset) + amount);
  }

  async transferOut(asset: AssetId, to: Address, amount: bigint): Promise<void> {
    const pool = this.poolBalance(asset);
    if (pool < amount) {
      throw new Error(`Custody pool for ${asset} holds ${pool}, cannot pay ${amount}`);
    }
    this.pools.set(asset, pool - amount);
    this.setBalance(asset, to, this.balanceOf(asset, to) + amount);
  }

  private setBalance(asset: AssetId, account: Address, amount: bigint): void {
    this.balances.set(key(asset, account), amount);
  }
}

function key(asset: AssetId, account: Address): string {
  return `${asset}:${account.toLowerCase()}`;
}
