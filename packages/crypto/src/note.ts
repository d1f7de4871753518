/**
 * Note construction for shielded value
 *
 * commitment    = H(amount, secret, nullifierSeed)
 * nullifierHash = H(nullifierSeed)
 */

import { LedgerError, type Commitment, type FieldElement, type Note, type NoteData, type NullifierHash } from '@tessera/types';
import type { FieldHasher } from './hasher.js';
import { isFieldElement, randomFieldElement } from './field.js';

export function computeCommitment(
  hasher: FieldHasher,
  amount: bigint,
  secret: FieldElement,
  nullifierSeed: FieldElement
): Commitment {
  return hasher.hash([amount, secret, nullifierSeed]);
}

export function computeNullifierHash(hasher: FieldHasher, nullifierSeed: FieldElement): NullifierHash {
  return hasher.hash([nullifierSeed]);
}

/**
 * Derive the public values of a note from its private fields
 */
export function restoreNote(data: NoteData, hasher: FieldHasher): Note {
  if (data.amount < 0n || !isFieldElement(data.amount)) {
    throw new LedgerError('InvalidAmount', `Note amount out of range: ${data.amount}`);
  }
  return {
    ...data,
    commitment: computeCommitment(hasher, data.amount, data.secret, data.nullifierSeed),
    nullifierHash: computeNullifierHash(hasher, data.nullifierSeed),
  };
}

/**
 * Create a new note with a random secret and nullifier seed
 * @param amount - Amount in the asset's smallest unit
 * @param fields - Fixed secret/nullifier seed (tests, recovery)
 */
export function createNote(
  amount: bigint,
  hasher: FieldHasher,
  fields: Partial<Pick<NoteData, 'secret' | 'nullifierSeed'>> = {}
): Note {
  return restoreNote(
    {
      amount,
      secret: fields.secret ?? randomFieldElement(),
      nullifierSeed: fields.nullifierSeed ?? randomFieldElement(),
    },
    hasher
  );
}
