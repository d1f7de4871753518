import { LedgerError, type FieldElement, type Hash, type Note, type NoteData } from '@tessera/types';
import { randomFieldElement } from '@tessera/crypto';
import type { CommitmentTree } from '@tessera/merkle';

// ============================================================================
// Private Witnesses
// ============================================================================

/** A note being spent, with its membership path in the commitment tree */
export interface SpentNoteWitness extends NoteData {
  /** Leaf index of the note's commitment */
  pathIndex: number;
  /** Siblings bottom-up */
  siblings: Hash[];
}

/** Knowledge of the note behind a fresh commitment */
export interface DepositWitness {
  kind: 'mint';
  note: NoteData;
}

/** k spent notes and m new notes of equal total value */
export interface TransferWitness {
  kind: 'transfer';
  inputs: SpentNoteWitness[];
  outputs: NoteData[];
}

/** A spent note paid out to the recipient */
export interface WithdrawWitness {
  kind: 'redeem';
  note: SpentNoteWitness;
  /** Recipient as a field element, bound into the proof */
  recipient: FieldElement;
}

/**
 * Stand-in "proof" carrying the full private witness. Only the constraint
 * verifier accepts it; it has no zero-knowledge property.
 */
export type WitnessProof = DepositWitness | TransferWitness | WithdrawWitness;

// ============================================================================
// Witness Builders
// ============================================================================

/**
 * Witness for spending a note whose commitment is in the tree
 */
export function spentNoteWitness(note: Note, tree: CommitmentTree): SpentNoteWitness {
  const index = tree.indexOf(note.commitment);
  if (index === undefined) {
    throw new LedgerError('InvalidCommitment', `Note commitment ${note.commitment} is not in the tree`);
  }
  const { siblings } = tree.getPath(index);
  return {
    amount: note.amount,
    secret: note.secret,
    nullifierSeed: note.nullifierSeed,
    pathIndex: index,
    siblings,
  };
}

/**
 * Zero-value input used to pad a transfer up to its fixed arity.
 * Its membership is not checked, so the path is all zeros.
 */
export function dummyNoteWitness(depth: number): SpentNoteWitness {
  return {
    amount: 0n,
    secret: randomFieldElement(),
    nullifierSeed: randomFieldElement(),
    pathIndex: 0,
    siblings: new Array<Hash>(depth).fill(0n),
  };
}
