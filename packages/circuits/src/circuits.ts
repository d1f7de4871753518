/**
 * Circuit-equivalent constraint checks
 *
 * Each function evaluates the same relation the corresponding circuit
 * enforces, over the same public-input vector the ledger builds.
 */

import {
  FIXED_TRANSFER_ARITY,
  type AmountMode,
  type FieldElement,
  type NoteData,
  type OperationKind,
  type TransferLayout,
} from '@tessera/types';
import { computeCommitment, computeNullifierHash, isFieldElement, type FieldHasher } from '@tessera/crypto';
import { CommitmentTree } from '@tessera/merkle';
import type { DepositWitness, SpentNoteWitness, TransferWitness, WithdrawWitness, WitnessProof } from './witness.js';

export type WitnessFor<K extends OperationKind> = Extract<WitnessProof, { kind: K }>;

export interface Circuit<K extends OperationKind> {
  readonly kind: K;
  check(witness: WitnessFor<K>, publicInputs: readonly FieldElement[]): boolean;
}

export interface CircuitOptions {
  amountMode: AmountMode;
  denomination: bigint;
  transferLayout: TransferLayout;
}

/**
 * Deposit: commitment = H(amount, secret, nullifierSeed).
 * public mode:       [commitment, nullifierHash]
 * denomination mode: [commitment, denomination], amount == denomination
 */
export function depositCircuit(hasher: FieldHasher, options: Pick<CircuitOptions, 'amountMode' | 'denomination'>): Circuit<'mint'> {
  return {
    kind: 'mint',
    check({ note }: DepositWitness, publicInputs) {
      if (publicInputs.length !== 2 || !validNote(note)) return false;
      const [commitment, second] = publicInputs;
      if (commitmentOf(hasher, note) !== commitment) return false;

      if (options.amountMode === 'denomination') {
        return second === options.denomination && note.amount === options.denomination;
      }
      return second === computeNullifierHash(hasher, note.nullifierSeed);
    },
  };
}

/**
 * Transfer: every input is a tree member under the root (zero-amount dummy
 * inputs are exempt), every nullifier and output commitment is derived from
 * the witness, and value is conserved.
 * fixed:    [root, n0, n1, c0, c1]
 * variable: [n..., c..., root]
 */
export function transferCircuit(hasher: FieldHasher, options: Pick<CircuitOptions, 'transferLayout'>): Circuit<'transfer'> {
  return {
    kind: 'transfer',
    check({ inputs, outputs }: TransferWitness, publicInputs) {
      const k = inputs.length;
      const m = outputs.length;
      if (k === 0 || m === 0 || publicInputs.length !== k + m + 1) return false;
      if (options.transferLayout === 'fixed' && (k !== FIXED_TRANSFER_ARITY.inputs || m !== FIXED_TRANSFER_ARITY.outputs)) {
        return false;
      }
      if (![...inputs, ...outputs].every(validNote)) return false;

      const fixed = options.transferLayout === 'fixed';
      const root = fixed ? publicInputs[0] : publicInputs[k + m];
      const nullifiers = fixed ? publicInputs.slice(1, 1 + k) : publicInputs.slice(0, k);
      const commitments = fixed ? publicInputs.slice(1 + k) : publicInputs.slice(k, k + m);

      const inputsValid = inputs.every(
        (input, i) =>
          computeNullifierHash(hasher, input.nullifierSeed) === nullifiers[i] &&
          (input.amount === 0n || isMember(hasher, input, root))
      );
      if (!inputsValid) return false;

      if (!outputs.every((output, i) => commitmentOf(hasher, output) === commitments[i])) return false;

      return sum(inputs) === sum(outputs);
    },
  };
}

/**
 * Withdraw: the note is a tree member and its nullifier is revealed.
 * denomination mode: [nullifier, recipient, root], amount == denomination
 * public mode:       [root, amount, recipient, commitment, nullifier]
 */
export function withdrawCircuit(hasher: FieldHasher, options: Pick<CircuitOptions, 'amountMode' | 'denomination'>): Circuit<'redeem'> {
  return {
    kind: 'redeem',
    check({ note, recipient }: WithdrawWitness, publicInputs) {
      if (!validNote(note)) return false;
      const commitment = commitmentOf(hasher, note);
      const nullifier = computeNullifierHash(hasher, note.nullifierSeed);

      if (options.amountMode === 'denomination') {
        if (publicInputs.length !== 3) return false;
        const [publicNullifier, publicRecipient, root] = publicInputs;
        return (
          note.amount === options.denomination &&
          publicNullifier === nullifier &&
          publicRecipient === recipient &&
          isMember(hasher, note, root)
        );
      }

      if (publicInputs.length !== 5) return false;
      const [root, amount, publicRecipient, publicCommitment, publicNullifier] = publicInputs;
      return (
        amount === note.amount &&
        publicRecipient === recipient &&
        publicCommitment === commitment &&
        publicNullifier === nullifier &&
        isMember(hasher, note, root)
      );
    },
  };
}

// ============================================================================
// Helper functions
// ============================================================================

function validNote(note: NoteData): boolean {
  return isFieldElement(note.amount) && isFieldElement(note.secret) && isFieldElement(note.nullifierSeed);
}

function commitmentOf(hasher: FieldHasher, note: NoteData): FieldElement {
  return computeCommitment(hasher, note.amount, note.secret, note.nullifierSeed);
}

function isMember(hasher: FieldHasher, note: SpentNoteWitness, root: FieldElement): boolean {
  return CommitmentTree.verifyProof(hasher, root, commitmentOf(hasher, note), note.pathIndex, note.siblings);
}

function sum(notes: readonly NoteData[]): bigint {
  return notes.reduce((total, note) => total + note.amount, 0n);
}
