import type { CircuitVerifierSet, FieldElement, OperationKind, ProofVerifier } from '@tessera/types';
import type { FieldHasher } from '@tessera/crypto';
import {
  depositCircuit,
  transferCircuit,
  withdrawCircuit,
  type Circuit,
  type CircuitOptions,
  type WitnessFor,
} from './circuits.js';
import type { WitnessProof } from './witness.js';

/**
 * Verifier double that checks the private witness against the public inputs
 * with the same relation as the real circuit.
 */
export class ConstraintVerifier<K extends OperationKind> implements ProofVerifier<WitnessProof> {
  constructor(private readonly circuit: Circuit<K>) {}

  get kind(): K {
    return this.circuit.kind;
  }

  async verify(proof: WitnessProof, publicInputs: readonly FieldElement[]): Promise<boolean> {
    if (!isWitnessFor(proof, this.circuit.kind)) return false;
    try {
      return this.circuit.check(proof, publicInputs);
    } catch {
      // malformed witness (bad arity, out-of-field values) is an invalid proof
      return false;
    }
  }
}

/**
 * Constraint verifiers for all three transitions of one protocol variant
 */
export function createConstraintVerifiers(hasher: FieldHasher, options: CircuitOptions): CircuitVerifierSet<WitnessProof> {
  return {
    mint: new ConstraintVerifier(depositCircuit(hasher, options)),
    transfer: new ConstraintVerifier(transferCircuit(hasher, options)),
    redeem: new ConstraintVerifier(withdrawCircuit(hasher, options)),
  };
}

function isWitnessFor<K extends OperationKind>(proof: WitnessProof, kind: K): proof is WitnessFor<K> {
  return proof.kind === kind;
}
