import type { FieldElement } from './common.js';

// ============================================================================
// Proof Types
// ============================================================================

/** Affine G1 point */
export type G1Point = [FieldElement, FieldElement];

/** Affine G2 point, each coordinate an Fq2 element */
export type G2Point = [[FieldElement, FieldElement], [FieldElement, FieldElement]];

/** Groth16 proof as consumed by the on-ledger verifier */
export interface Groth16Proof {
  a: G1Point;
  b: G2Point;
  c: G1Point;
}

/** The three proof-gated transitions; each has its own circuit */
export type OperationKind = 'mint' | 'transfer' | 'redeem';

/**
 * Proof verification capability.
 *
 * The ordering of publicInputs is part of the protocol contract. A mismatch
 * makes verification fail; it is never reported as a distinct error.
 */
export interface ProofVerifier<P = Groth16Proof> {
  verify(proof: P, publicInputs: readonly FieldElement[]): Promise<boolean>;
}

/** One verifier per transition, since each circuit has its own verification key */
export type CircuitVerifierSet<P = Groth16Proof> = Record<OperationKind, ProofVerifier<P>>;
