/**
 * Encrypted note payloads
 *
 * The ledger stores these next to each commitment without reading them.
 * Layout: nonce (24) | ciphertext (96) | tag (16).
 * HKDF-SHA256 splits the shared secret into an encryption key and a MAC key.
 * The keystream is SHA-256 in counter mode and the tag a truncated
 * HMAC-SHA256 over the ciphertext.
 */

import { hkdf } from '@noble/hashes/hkdf';
import { hmac } from '@noble/hashes/hmac';
import { sha256 } from '@noble/hashes/sha256';
import { randomBytes } from '@noble/hashes/utils';
import type { NoteData } from '@tessera/types';
import { bytesToField, fieldToBytes } from './field.js';

const NONCE_LENGTH = 24;
const BODY_LENGTH = 96;
const TAG_LENGTH = 16;
const KEY_LENGTH = 32;
const KDF_INFO = 'tessera-note-payload';

export const NOTE_PAYLOAD_LENGTH = NONCE_LENGTH + BODY_LENGTH + TAG_LENGTH;

export function encryptNotePayload(note: NoteData, sharedSecret: Uint8Array): Uint8Array {
  const nonce = randomBytes(NONCE_LENGTH);
  const { encKey, macKey } = deriveKeys(sharedSecret, nonce);

  const body = new Uint8Array(BODY_LENGTH);
  body.set(fieldToBytes(note.amount), 0);
  body.set(fieldToBytes(note.secret), 32);
  body.set(fieldToBytes(note.nullifierSeed), 64);

  const ciphertext = xor(body, expandKey(encKey, nonce, BODY_LENGTH));

  const payload = new Uint8Array(NOTE_PAYLOAD_LENGTH);
  payload.set(nonce, 0);
  payload.set(ciphertext, NONCE_LENGTH);
  payload.set(computeTag(macKey, ciphertext), NONCE_LENGTH + BODY_LENGTH);
  return payload;
}

/**
 * Decrypt a payload. Returns null when it was not encrypted under this secret.
 */
export function decryptNotePayload(payload: Uint8Array, sharedSecret: Uint8Array): NoteData | null {
  if (payload.length !== NOTE_PAYLOAD_LENGTH) return null;

  const nonce = payload.subarray(0, NONCE_LENGTH);
  const ciphertext = payload.subarray(NONCE_LENGTH, NONCE_LENGTH + BODY_LENGTH);
  const tag = payload.subarray(NONCE_LENGTH + BODY_LENGTH);
  const { encKey, macKey } = deriveKeys(sharedSecret, nonce);

  if (!constantTimeEqual(tag, computeTag(macKey, ciphertext))) return null;

  const body = xor(ciphertext, expandKey(encKey, nonce, BODY_LENGTH));
  return {
    amount: bytesToField(body.subarray(0, 32)),
    secret: bytesToField(body.subarray(32, 64)),
    nullifierSeed: bytesToField(body.subarray(64, 96)),
  };
}

// ============================================================================
// Helper functions
// ============================================================================

function deriveKeys(sharedSecret: Uint8Array, nonce: Uint8Array): { encKey: Uint8Array; macKey: Uint8Array } {
  const okm = hkdf(sha256, sharedSecret, nonce, KDF_INFO, 2 * KEY_LENGTH);
  return { encKey: okm.subarray(0, KEY_LENGTH), macKey: okm.subarray(KEY_LENGTH) };
}

function computeTag(macKey: Uint8Array, ciphertext: Uint8Array): Uint8Array {
  return hmac(sha256, macKey, ciphertext).subarray(0, TAG_LENGTH);
}

/**
 * SHA-256 counter-mode keystream
 */
function expandKey(key: Uint8Array, nonce: Uint8Array, length: number): Uint8Array {
  const result = new Uint8Array(length);
  let offset = 0;
  let counter = 0;

  while (offset < length) {
    const input = new Uint8Array(key.length + nonce.length + 4);
    input.set(key, 0);
    input.set(nonce, key.length);
    new DataView(input.buffer).setUint32(key.length + nonce.length, counter++, true);

    const block = sha256(input);
    const toCopy = Math.min(block.length, length - offset);
    result.set(block.subarray(0, toCopy), offset);
    offset += toCopy;
  }

  return result;
}

function xor(data: Uint8Array, keyStream: Uint8Array): Uint8Array {
  return data.map((byte, i) => byte ^ (keyStream[i] ?? 0));
}

function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  let diff = 0;
  for (let i = 0; i < a.length; i++) {
    diff |= (a[i] ?? 0) ^ (b[i] ?? 0);
  }
  return diff === 0;
}
