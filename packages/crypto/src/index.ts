/**
 * @tessera/crypto
 * Field helpers, hash primitives and note construction
 */

export {
  isFieldElement,
  assertFieldElement,
  randomFieldElement,
  fieldToBytes,
  bytesToField,
  toHex32,
  parseBigInt,
  isAddress,
  addressToField,
} from './field.js';

export { sha256Hasher, createPoseidonHasher, getHasher, type FieldHasher } from './hasher.js';

export { computeCommitment, computeNullifierHash, restoreNote, createNote } from './note.js';

export { encryptNotePayload, decryptNotePayload, NOTE_PAYLOAD_LENGTH } from './payload.js';
