/**
 * Field hash primitives
 *
 * The commitment tree and note derivation are generic over the hash. SHA-256
 * is always available; Poseidon matches the circomlib circuits but needs an
 * async build step, so it comes from a factory.
 */

import { sha256 } from '@noble/hashes/sha256';
import { buildPoseidon } from 'circomlibjs';
import { FIELD_MODULUS, LedgerError, type FieldElement, type HashName } from '@tessera/types';
import { assertFieldElement, bytesToField, fieldToBytes } from './field.js';

/** A hash from field elements to a field element */
export interface FieldHasher {
  readonly name: HashName;
  hash(inputs: readonly FieldElement[]): FieldElement;
}

const POSEIDON_MAX_INPUTS = 16;

/**
 * SHA-256 over the 32-byte big-endian encodings, reduced into the field
 */
export const sha256Hasher: FieldHasher = {
  name: 'sha256',
  hash(inputs: readonly FieldElement[]): FieldElement {
    if (inputs.length === 0) {
      throw new LedgerError('InvalidFieldElement', 'hash needs at least one input');
    }
    const buffer = new Uint8Array(inputs.length * 32);
    inputs.forEach((input, i) => {
      buffer.set(fieldToBytes(assertFieldElement(input, `input[${i}]`)), i * 32);
    });
    return bytesToField(sha256(buffer)) % FIELD_MODULUS;
  },
};

let poseidonPromise: Promise<FieldHasher> | null = null;

/**
 * circomlib-compatible Poseidon hasher (1 to 16 inputs).
 * The underlying constants are built once and shared.
 */
export function createPoseidonHasher(): Promise<FieldHasher> {
  if (!poseidonPromise) {
    poseidonPromise = buildPoseidon().then((poseidon) => ({
      name: 'poseidon' as const,
      hash(inputs: readonly FieldElement[]): FieldElement {
        if (inputs.length === 0 || inputs.length > POSEIDON_MAX_INPUTS) {
          throw new LedgerError(
            'InvalidFieldElement',
            `Poseidon takes 1-${POSEIDON_MAX_INPUTS} inputs, got ${inputs.length}`
          );
        }
        inputs.forEach((input, i) => assertFieldElement(input, `input[${i}]`));
        return poseidon.F.toObject(poseidon(inputs));
      },
    })).catch((err: unknown) => {
      poseidonPromise = null;
      throw err;
    });
  }
  return poseidonPromise;
}

/**
 * Resolve a hasher by name
 */
export async function getHasher(name: HashName): Promise<FieldHasher> {
  return name === 'poseidon' ? createPoseidonHasher() : sha256Hasher;
}
