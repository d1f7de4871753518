/**
 * Collateral accounting per (asset, issuer)
 *
 * Backing value moves through the custody collaborator; the ledger only
 * tracks how much each issuer has locked. Balances never go negative.
 *
 * Registering an issuer returns an opaque handle. `lock` and `release` accept
 * only a handle this ledger issued, compared by identity, so knowing an
 * issuer's id is not enough to move its collateral.
 */

import {
  LedgerError,
  type Address,
  type AssetCustody,
  type AssetId,
  type IssuerId,
} from '@tessera/types';

/** Capability to move one issuer's collateral */
export interface IssuerHandle {
  readonly asset: AssetId;
  readonly issuer: IssuerId;
}

export interface CollateralMoveOptions {
  /**
   * Runs synchronously right after the balance update, in the same turn.
   * On lock, a throw reverts the balance and returns the collateral.
   */
  commit?: () => void;
}

export class CollateralLedger {
  private readonly handles = new Map<string, IssuerHandle>();
  private readonly locked = new Map<IssuerHandle, bigint>();
  /** Amounts of releases waiting on custody */
  private readonly reserved = new Map<IssuerHandle, bigint>();

  constructor(private readonly custody: AssetCustody) {}

  /**
   * Bind an issuer to an asset and hand back its capability.
   * Each (asset, issuer) pair can be registered once.
   */
  registerIssuer(asset: AssetId, issuer: IssuerId): IssuerHandle {
    const k = key(asset, issuer);
    if (this.handles.has(k)) {
      throw new LedgerError('UnauthorizedIssuer', `${issuer} is already registered for ${asset}`);
    }
    const handle: IssuerHandle = Object.freeze({ asset, issuer });
    this.handles.set(k, handle);
    return handle;
  }

  isRegistered(asset: AssetId, issuer: IssuerId): boolean {
    return this.handles.has(key(asset, issuer));
  }

  isAuthorized(asset: AssetId, handle: IssuerHandle): boolean {
    return handle.asset === asset && this.handles.get(key(asset, handle.issuer)) === handle;
  }

  getTotalLocked(asset: AssetId, handle: IssuerHandle): bigint {
    return this.isAuthorized(asset, handle) ? (this.locked.get(handle) ?? 0n) : 0n;
  }

  /**
   * Pull `amount` from `from` into custody and credit it to the issuer
   */
  async lock(
    asset: AssetId,
    handle: IssuerHandle,
    amount: bigint,
    from: Address,
    options: CollateralMoveOptions = {}
  ): Promise<void> {
    this.assertAuthorized(asset, handle);
    if (amount <= 0n) {
      throw new LedgerError('InvalidAmount', `Collateral amount must be positive, got ${amount}`);
    }

    try {
      await this.custody.transferIn(asset, from, amount);
    } catch (err) {
      throw new LedgerError('TransferFailed', `Could not take ${amount} ${asset} from ${from}`, err);
    }

    const before = this.getTotalLocked(asset, handle);
    this.locked.set(handle, before + amount);
    try {
      options.commit?.();
    } catch (err) {
      this.locked.set(handle, before);
      await this.refund(asset, from, amount, err);
      throw err;
    }
  }

  /**
   * Pay `amount` out of custody to `recipient` and debit the issuer
   */
  async release(
    asset: AssetId,
    handle: IssuerHandle,
    amount: bigint,
    recipient: Address,
    options: CollateralMoveOptions = {}
  ): Promise<true> {
    this.assertAuthorized(asset, handle);
    if (amount <= 0n) {
      throw new LedgerError('InvalidAmount', `Collateral amount must be positive, got ${amount}`);
    }
    this.assertCovered(asset, handle, amount);

    this.reserved.set(handle, (this.reserved.get(handle) ?? 0n) + amount);
    try {
      await this.custody.transferOut(asset, recipient, amount);
    } catch (err) {
      throw new LedgerError('TransferFailed', `Could not pay ${amount} ${asset} to ${recipient}`, err);
    } finally {
      this.reserved.set(handle, (this.reserved.get(handle) ?? 0n) - amount);
    }

    this.locked.set(handle, this.getTotalLocked(asset, handle) - amount);
    options.commit?.();
    return true;
  }

  private assertAuthorized(asset: AssetId, handle: IssuerHandle): void {
    if (!this.isAuthorized(asset, handle)) {
      throw new LedgerError('UnauthorizedIssuer', `${handle.issuer} is not registered for ${asset}`);
    }
  }

  private assertCovered(asset: AssetId, handle: IssuerHandle, amount: bigint): void {
    const available = this.getTotalLocked(asset, handle) - (this.reserved.get(handle) ?? 0n);
    if (amount > available) {
      throw new LedgerError('InsufficientCollateral', `Requested ${amount}, only ${available} available`);
    }
  }

  private async refund(asset: AssetId, from: Address, amount: bigint, reason: unknown): Promise<void> {
    try {
      await this.custody.transferOut(asset, from, amount);
    } catch (err) {
      throw new LedgerError('TransferFailed', `Commit failed and refund to ${from} failed`, new AggregateError([reason, err]));
    }
  }
}

function key(asset: AssetId, issuer: IssuerId): string {
  return `${asset}\u0000${issuer}`;
}
