/**
 * One ledger per asset over a shared collateral ledger
 */

import {
  DEFAULT_TREE_DEPTH,
  LedgerError,
  type AssetCustody,
  type AssetId,
  type CircuitVerifierSet,
  type Groth16Proof,
  type LedgerProtocolConfig,
} from '@tessera/types';
import type { FieldHasher } from '@tessera/crypto';
import { CommitmentTree } from '@tessera/merkle';
import { CollateralLedger } from './collateral-ledger.js';
import { createLogger, type Logger } from './logger.js';
import { NoteLedgerCore } from './note-ledger.js';
import { NullifierSet } from './nullifier-set.js';

export interface CreateLedgerOptions<P> {
  hasher: FieldHasher;
  verifiers: CircuitVerifierSet<P>;
  treeDepth?: number;
  config?: Partial<LedgerProtocolConfig>;
}

export class NoteLedgerFactory<P = Groth16Proof> {
  private readonly collateral: CollateralLedger;
  private readonly ledgers = new Map<AssetId, NoteLedgerCore<P>>();
  private readonly log: Logger;

  constructor(custody: AssetCustody, logger?: Logger) {
    this.collateral = new CollateralLedger(custody);
    this.log = logger ?? createLogger('ledger-factory');
  }

  static issuerFor(asset: AssetId): string {
    return `ledger:${asset}`;
  }

  /**
   * Build and register a fresh ledger for an asset
   */
  create(asset: AssetId, options: CreateLedgerOptions<P>): NoteLedgerCore<P> {
    if (this.ledgers.has(asset)) {
      throw new LedgerError('LedgerAlreadyExists', `A ledger for ${asset} already exists`);
    }

    const issuer = NoteLedgerFactory.issuerFor(asset);
    const ledger = new NoteLedgerCore<P>({
      tree: new CommitmentTree(options.hasher, options.treeDepth ?? DEFAULT_TREE_DEPTH),
      nullifiers: new NullifierSet(),
      collateral: this.collateral,
      verifiers: options.verifiers,
      asset,
      issuer,
      config: options.config,
      logger: this.log,
    });

    this.ledgers.set(asset, ledger);
    this.log.info({ asset, issuer, hash: options.hasher.name }, 'Ledger created');
    return ledger;
  }

  get(asset: AssetId): NoteLedgerCore<P> | undefined {
    return this.ledgers.get(asset);
  }

  /** Collateral locked behind an asset's ledger, 0 when it has none */
  getTotalLocked(asset: AssetId): bigint {
    return this.ledgers.get(asset)?.getTotalLocked() ?? 0n;
  }

  isRegistered(asset: AssetId): boolean {
    return this.collateral.isRegistered(asset, NoteLedgerFactory.issuerFor(asset));
  }

  list(): AssetId[] {
    return [...this.ledgers.keys()];
  }
}
