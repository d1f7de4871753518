// ============================================================================
// Core Primitives
// ============================================================================

/** Element of the BN254 scalar field, always in [0, FIELD_MODULUS) */
export type FieldElement = bigint;

/** Opaque 256-bit public value: commitment, nullifier hash or Merkle root */
export type Hash = FieldElement;

/** Public commitment to a private note (a tree leaf) */
export type Commitment = Hash;

/** Public hash of a note's nullifier seed, revealed once at spend time */
export type NullifierHash = Hash;

/** 20-byte account identifier, 0x-prefixed hex */
export type Address = `0x${string}`;

/** Identifier of the underlying fungible asset backing a ledger */
export type AssetId = string;

/** Identifier of the ledger instance allowed to move collateral for an asset */
export type IssuerId = string;

/** BN254 scalar field modulus (must match the circuits) */
export const FIELD_MODULUS =
  21888242871839275222246405745257275088548364400416034343698204186575808495617n;

/** Default commitment tree depth: 2^20 (~1M) notes */
export const DEFAULT_TREE_DEPTH = 20;

/** Largest supported tree depth */
export const MAX_TREE_DEPTH = 32;

/** Canonical empty-leaf value; never a valid commitment */
export const EMPTY_LEAF: Hash = 0n;

/** Name of a supported field hash primitive */
export type HashName = 'sha256' | 'poseidon';

/** Log levels accepted by the ledger logger */
export type LogLevel = 'silent' | 'debug' | 'info' | 'warn' | 'error';
