/**
 * Field element helpers shared by hashers, notes and the ledger
 */

import { randomBytes } from '@noble/hashes/utils';
import { FIELD_MODULUS, LedgerError, type Address, type FieldElement } from '@tessera/types';

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

export function isFieldElement(value: bigint): boolean {
  return value >= 0n && value < FIELD_MODULUS;
}

/**
 * Throw InvalidFieldElement unless value is in [0, FIELD_MODULUS).
 * @param label - What the value is, for the error message
 */
export function assertFieldElement(value: bigint, label = 'value'): FieldElement {
  if (!isFieldElement(value)) {
    throw new LedgerError('InvalidFieldElement', `${label} is not a field element: ${value}`);
  }
  return value;
}

/**
 * Random field element from 31 random bytes (248 bits), always below the modulus.
 */
export function randomFieldElement(): FieldElement {
  return bytesToField(randomBytes(31));
}

/**
 * Convert field element to 32 big-endian bytes
 */
export function fieldToBytes(field: bigint): Uint8Array {
  const bytes = new Uint8Array(32);
  let value = field;
  for (let i = 31; i >= 0; i--) {
    bytes[i] = Number(value & 0xffn);
    value = value >> 8n;
  }
  return bytes;
}

/**
 * Convert big-endian bytes (at most 32 are read) to an integer
 */
export function bytesToField(bytes: Uint8Array): bigint {
  let result = 0n;
  for (const byte of bytes.subarray(0, 32)) {
    result = (result << 8n) | BigInt(byte);
  }
  return result;
}

/** 0x-prefixed, zero-padded 64 hex digit rendering */
export function toHex32(value: bigint): `0x${string}` {
  return `0x${value.toString(16).padStart(64, '0')}`;
}

/**
 * Parse a decimal or 0x-hex string into a bigint.
 * Throws InvalidFieldElement for anything else.
 */
export function parseBigInt(text: string): bigint {
  const s = text.trim();
  if (!/^(0x[0-9a-fA-F]+|[0-9]+)$/.test(s)) {
    throw new LedgerError('InvalidFieldElement', `Not a number: ${text}`);
  }
  return BigInt(s);
}

export function isAddress(value: string): value is Address {
  return ADDRESS_PATTERN.test(value);
}

/**
 * Encode an account address as a field element (big-endian integer of its 20 bytes).
 */
export function addressToField(address: Address): FieldElement {
  if (!isAddress(address)) {
    throw new LedgerError('InvalidRecipient', `Invalid address: ${address}`);
  }
  return BigInt(address);
}
