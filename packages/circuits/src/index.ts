/**
 * @tessera/circuits
 * Circuit-equivalent constraints for deposit, transfer and withdraw
 */

export {
  depositCircuit,
  transferCircuit,
  withdrawCircuit,
  type Circuit,
  type CircuitOptions,
  type WitnessFor,
} from './circuits.js';

export { ConstraintVerifier, createConstraintVerifiers } from './constraint-verifier.js';

export {
  spentNoteWitness,
  dummyNoteWitness,
  type SpentNoteWitness,
  type DepositWitness,
  type TransferWitness,
  type WithdrawWitness,
  type WitnessProof,
} from './witness.js';
