/**
 * NoteLedgerCore
 *
 * Proof-gated mint/transfer/redeem over an injected commitment tree,
 * nullifier set and collateral ledger.
 *
 * Every write runs inside the write lock in the same shape:
 *   checks -> verify -> custody -> one synchronous commit
 * The commit applies every mutation and emits every event without awaiting,
 * so lock-free reads see the state either before or after an operation.
 */

import {
  EMPTY_LEAF,
  FIXED_TRANSFER_ARITY,
  LedgerError,
  isLedgerError,
  type AssetId,
  type CircuitVerifierSet,
  type FieldElement,
  type Groth16Proof,
  type Hash,
  type IssuerId,
  type LedgerEvent,
  type LedgerEventHandler,
  type LedgerProtocolConfig,
  type LedgerStatus,
  type MerklePath,
  type MintRequest,
  type MintResult,
  type OperationKind,
  type RedeemRequest,
  type RedeemResult,
  type TransferRequest,
  type TransferResult,
} from '@tessera/types';
import { addressToField, isAddress, isFieldElement } from '@tessera/crypto';
import type { CommitmentTree } from '@tessera/merkle';
import type { CollateralLedger, IssuerHandle } from './collateral-ledger.js';
import { EventLog } from './event-log.js';
import { createLogger, type Logger } from './logger.js';
import type { NullifierSet } from './nullifier-set.js';
import { resolveProtocolConfig } from './protocol-config.js';
import { mintPublicInputs, mintedAmount, redeemPublicInputs, transferPublicInputs } from './public-inputs.js';
import { WriteLock } from './write-lock.js';

export interface NoteLedgerCoreOptions<P> {
  tree: CommitmentTree;
  nullifiers: NullifierSet;
  collateral: CollateralLedger;
  verifiers: CircuitVerifierSet<P>;
  asset: AssetId;
  /** Registered with `collateral` on construction; must not be registered yet */
  issuer: IssuerId;
  config?: Partial<LedgerProtocolConfig>;
  logger?: Logger;
}

export class NoteLedgerCore<P = Groth16Proof> {
  readonly asset: AssetId;
  readonly issuer: IssuerId;

  private readonly tree: CommitmentTree;
  private readonly nullifiers: NullifierSet;
  private readonly collateral: CollateralLedger;
  private readonly issuerHandle: IssuerHandle;
  private readonly verifiers: CircuitVerifierSet<P>;
  private readonly config: LedgerProtocolConfig;
  private readonly log: Logger;
  private readonly events: EventLog;
  private readonly writeLock = new WriteLock();

  constructor(options: NoteLedgerCoreOptions<P>) {
    this.tree = options.tree;
    this.nullifiers = options.nullifiers;
    this.collateral = options.collateral;
    this.verifiers = options.verifiers;
    this.asset = options.asset;
    this.issuer = options.issuer;
    this.config = resolveProtocolConfig(options.config);
    this.log = (options.logger ?? createLogger('note-ledger')).child({ asset: this.asset });
    this.events = new EventLog(this.log);
    // the handle never leaves this instance
    this.issuerHandle = options.collateral.registerIssuer(options.asset, options.issuer);
  }

  // ==========================================================================
  // Transitions
  // ==========================================================================

  /**
   * Lock collateral from the depositor and publish a fresh commitment
   */
  mint(request: MintRequest<P>): Promise<MintResult> {
    return this.serialize('mint', () => this.applyMint(request));
  }

  /**
   * Spend k notes and publish m new ones
   */
  transfer(request: TransferRequest<P>): Promise<TransferResult> {
    return this.serialize('transfer', () => this.applyTransfer(request));
  }

  /**
   * Spend a note and release its collateral to the recipient
   */
  redeem(request: RedeemRequest<P>): Promise<RedeemResult> {
    return this.serialize('redeem', () => this.applyRedeem(request));
  }

  // ==========================================================================
  // Queries (lock-free)
  // ==========================================================================

  commitmentExists(commitment: Hash): boolean {
    return this.tree.hasLeaf(commitment);
  }

  isNullifierSpent(nullifier: Hash): boolean {
    return this.nullifiers.isSpent(nullifier);
  }

  getMerkleRoot(): Hash {
    return this.tree.getRoot();
  }

  getNextIndex(): number {
    return this.tree.getNextIndex();
  }

  getMerklePath(index: number): MerklePath {
    return this.tree.getPath(index);
  }

  getTotalLocked(): bigint {
    return this.collateral.getTotalLocked(this.asset, this.issuerHandle);
  }

  getConfig(): LedgerProtocolConfig {
    return { ...this.config };
  }

  getStatus(): LedgerStatus {
    return {
      asset: this.asset,
      issuer: this.issuer,
      root: this.tree.getRoot(),
      nextIndex: this.tree.getNextIndex(),
      capacity: this.tree.getCapacity(),
      spentNullifiers: this.nullifiers.size,
      totalLocked: this.getTotalLocked(),
      eventCount: this.events.length,
    };
  }

  /**
   * Subscribe to ledger events
   * @returns Unsubscribe function
   */
  onEvent(handler: LedgerEventHandler): () => void {
    return this.events.subscribe(handler);
  }

  getEvents(): LedgerEvent[] {
    return this.events.getAll();
  }

  // ==========================================================================
  // Mint
  // ==========================================================================

  private async applyMint(request: MintRequest<P>): Promise<MintResult> {
    const { commitment, nullifierHash, depositor, encryptedPayload } = request;
    const publicMode = this.config.amountMode === 'public';

    this.assertCommitment(commitment, 'commitment');
    if (publicMode) {
      if (request.amount === undefined || request.amount <= 0n || !isFieldElement(request.amount)) {
        throw new LedgerError('InvalidAmount', `Mint amount must be positive, got ${request.amount}`);
      }
      if (nullifierHash === undefined || !isFieldElement(nullifierHash)) {
        throw new LedgerError('InvalidNullifier', 'Mint needs a deposit nullifier hash in public amount mode');
      }
    } else if (request.amount !== undefined && request.amount !== this.config.denomination) {
      throw new LedgerError(
        'InvalidAmount',
        `Mint amount ${request.amount} differs from denomination ${this.config.denomination}`
      );
    }

    if (this.tree.hasLeaf(commitment)) {
      throw new LedgerError('CommitmentAlreadyExists', `Commitment ${commitment} already exists`);
    }
    if (publicMode && nullifierHash !== undefined && this.nullifiers.isSpent(nullifierHash)) {
      throw new LedgerError('NullifierAlreadySpent', `Nullifier ${nullifierHash} already spent`);
    }
    this.assertRoom(1);

    const publicInputs = mintPublicInputs(this.config, { commitment, nullifierHash });
    await this.verify('mint', request.proof, publicInputs);
    const amount = mintedAmount(this.config, publicInputs, request.amount);

    let index = -1;
    await this.collateral.lock(this.asset, this.issuerHandle, amount, depositor, {
      commit: () => {
        index = this.tree.insert(commitment);
        this.events.append({ type: 'NoteCommitted', commitment, index, encryptedPayload: encryptedPayload.slice() });
        this.events.append({ type: 'Deposit', commitment });
        this.events.append({ type: 'CollateralLocked', commitment });
      },
    });

    return { index, root: this.tree.getRoot(), amount };
  }

  // ==========================================================================
  // Transfer
  // ==========================================================================

  private async applyTransfer(request: TransferRequest<P>): Promise<TransferResult> {
    const { inputNullifiers, outputCommitments, merkleRoot, encryptedPayloads } = request;

    this.assertTransferArity(inputNullifiers.length, outputCommitments.length);
    if (encryptedPayloads.length !== outputCommitments.length) {
      throw new LedgerError(
        'InvalidArrayLength',
        `${outputCommitments.length} outputs but ${encryptedPayloads.length} encrypted payloads`
      );
    }

    inputNullifiers.forEach((nullifier, i) => {
      if (!isFieldElement(nullifier)) {
        throw new LedgerError('InvalidNullifier', `inputNullifiers[${i}] is not a field element`);
      }
    });
    outputCommitments.forEach((commitment, i) => this.assertCommitment(commitment, `outputCommitments[${i}]`));

    const seenNullifiers = new Set<Hash>();
    for (const nullifier of inputNullifiers) {
      if (this.nullifiers.isSpent(nullifier) || seenNullifiers.has(nullifier)) {
        throw new LedgerError('NullifierAlreadySpent', `Nullifier ${nullifier} already spent`);
      }
      seenNullifiers.add(nullifier);
    }
    const seenCommitments = new Set<Hash>();
    for (const commitment of outputCommitments) {
      if (this.tree.hasLeaf(commitment) || seenCommitments.has(commitment)) {
        throw new LedgerError('CommitmentAlreadyExists', `Commitment ${commitment} already exists`);
      }
      seenCommitments.add(commitment);
    }

    this.assertCurrentRoot(merkleRoot);
    this.assertRoom(outputCommitments.length);

    await this.verify(
      'transfer',
      request.proof,
      transferPublicInputs(this.config, { merkleRoot, inputNullifiers, outputCommitments })
    );

    for (const nullifier of inputNullifiers) {
      this.nullifiers.markSpent(nullifier);
      this.events.append({ type: 'NullifierSpent', nullifier });
    }
    const indices = this.tree.insertMany(outputCommitments);
    indices.forEach((index, i) => {
      this.events.append({
        type: 'NoteCommitted',
        commitment: outputCommitments[i],
        index,
        encryptedPayload: encryptedPayloads[i].slice(),
      });
    });

    return { indices, root: this.tree.getRoot() };
  }

  // ==========================================================================
  // Redeem
  // ==========================================================================

  private async applyRedeem(request: RedeemRequest<P>): Promise<RedeemResult> {
    const { nullifier, recipient, merkleRoot, commitment } = request;
    const publicMode = this.config.amountMode === 'public';

    if (!isFieldElement(nullifier)) {
      throw new LedgerError('InvalidNullifier', 'nullifier is not a field element');
    }
    if (!isAddress(recipient)) {
      throw new LedgerError('InvalidRecipient', `Invalid recipient address: ${recipient}`);
    }
    if (publicMode) {
      if (request.amount === undefined || request.amount <= 0n || !isFieldElement(request.amount)) {
        throw new LedgerError('InvalidAmount', `Redeem amount must be positive, got ${request.amount}`);
      }
      if (commitment === undefined) {
        throw new LedgerError('InvalidCommitment', 'Redeem needs the note commitment in public amount mode');
      }
      this.assertCommitment(commitment, 'commitment');
      if (!this.tree.hasLeaf(commitment)) {
        throw new LedgerError('InvalidCommitment', `Commitment ${commitment} is not in the tree`);
      }
    } else if (request.amount !== undefined && request.amount !== this.config.denomination) {
      throw new LedgerError(
        'InvalidAmount',
        `Redeem amount ${request.amount} differs from denomination ${this.config.denomination}`
      );
    }
    const amount = publicMode ? (request.amount ?? 0n) : this.config.denomination;

    if (this.nullifiers.isSpent(nullifier)) {
      throw new LedgerError('NullifierAlreadySpent', `Nullifier ${nullifier} already spent`);
    }
    this.assertCurrentRoot(merkleRoot);
    const locked = this.getTotalLocked();
    if (amount > locked) {
      throw new LedgerError('InsufficientCollateral', `Redeem of ${amount} exceeds ${locked} locked`);
    }

    await this.verify(
      'redeem',
      request.proof,
      redeemPublicInputs(this.config, {
        merkleRoot,
        nullifier,
        recipient: addressToField(recipient),
        amount,
        commitment,
      })
    );

    await this.collateral.release(this.asset, this.issuerHandle, amount, recipient, {
      commit: () => {
        this.nullifiers.markSpent(nullifier);
        this.events.append({ type: 'NullifierSpent', nullifier });
        this.events.append({ type: 'Withdrawal', nullifier });
        this.events.append({ type: 'CollateralReleased', nullifier });
      },
    });

    return { amount, root: this.tree.getRoot() };
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private serialize<T>(operation: OperationKind, task: () => Promise<T>): Promise<T> {
    return this.writeLock.run(async () => {
      try {
        const result = await task();
        this.log.info({ operation, root: this.tree.getRoot().toString(), nextIndex: this.tree.getNextIndex() }, `${operation} committed`);
        return result;
      } catch (err) {
        if (isLedgerError(err)) {
          this.log.warn({ operation, code: err.code }, `${operation} rejected: ${err.message}`);
        } else {
          this.log.error({ operation, err }, `${operation} failed`);
        }
        throw err;
      }
    });
  }

  private async verify(kind: OperationKind, proof: P, publicInputs: FieldElement[]): Promise<void> {
    let valid: boolean;
    try {
      valid = await this.verifiers[kind].verify(proof, publicInputs);
    } catch (err) {
      throw new LedgerError('InvalidProof', 'Proof verification failed', err);
    }
    if (!valid) {
      throw new LedgerError('InvalidProof', 'Proof verification failed');
    }
  }

  private assertCommitment(commitment: Hash, label: string): void {
    if (commitment === EMPTY_LEAF || !isFieldElement(commitment)) {
      throw new LedgerError('InvalidCommitment', `${label} must be a non-zero field element`);
    }
  }

  private assertTransferArity(inputs: number, outputs: number): void {
    if (this.config.transferLayout === 'fixed') {
      if (inputs !== FIXED_TRANSFER_ARITY.inputs || outputs !== FIXED_TRANSFER_ARITY.outputs) {
        throw new LedgerError(
          'InvalidArrayLength',
          `Fixed transfer takes ${FIXED_TRANSFER_ARITY.inputs} inputs and ${FIXED_TRANSFER_ARITY.outputs} outputs, got ${inputs} and ${outputs}`
        );
      }
      return;
    }
    if (inputs < 1 || inputs > this.config.maxInputs || outputs < 1 || outputs > this.config.maxOutputs) {
      throw new LedgerError(
        'InvalidArrayLength',
        `Transfer takes 1-${this.config.maxInputs} inputs and 1-${this.config.maxOutputs} outputs, got ${inputs} and ${outputs}`
      );
    }
  }

  private assertCurrentRoot(merkleRoot: Hash): void {
    if (merkleRoot !== this.tree.getRoot()) {
      throw new LedgerError('InvalidMerkleRoot', `Root ${merkleRoot} is not the current root`);
    }
  }

  private assertRoom(leaves: number): void {
    if (leaves > this.tree.getRemainingCapacity()) {
      throw new LedgerError('TreeFull', `Tree is full (${this.tree.getCapacity()} leaves)`);
    }
  }
}
