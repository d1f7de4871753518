import type { Commitment, FieldElement, Hash, NullifierHash } from './common.js';

// ============================================================================
// Note Types (client side, never published)
// ============================================================================

/** Private fields of a note */
export interface NoteData {
  /** Amount in the asset's smallest unit */
  amount: bigint;
  /** Random blinding value */
  secret: FieldElement;
  /** Preimage of the nullifier hash */
  nullifierSeed: FieldElement;
}

/** A note together with its derived public values */
export interface Note extends NoteData {
  commitment: Commitment;
  nullifierHash: NullifierHash;
}

/** Merkle membership path for a leaf */
export interface MerklePath {
  root: Hash;
  leaf: Hash;
  index: number;
  /** Sibling hashes, bottom-up */
  siblings: Hash[];
}
