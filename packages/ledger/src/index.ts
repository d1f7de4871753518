/**
 * @tessera/ledger
 * Proof-gated note ledger: nullifiers, collateral, verifiers and the core
 */

export { NoteLedgerCore, type NoteLedgerCoreOptions } from './note-ledger.js';
export { NoteLedgerFactory, type CreateLedgerOptions } from './factory.js';
export { NullifierSet } from './nullifier-set.js';
export { CollateralLedger, type CollateralMoveOptions, type IssuerHandle } from './collateral-ledger.js';
export { InMemoryCustody } from './custody.js';
export {
  StaticVerifier,
  Groth16Verifier,
  VerificationKeySchema,
  toSnarkjsProof,
  type VerificationKey,
} from './verifiers.js';
export {
  mintPublicInputs,
  transferPublicInputs,
  redeemPublicInputs,
  mintedAmount,
  type MintInputs,
  type TransferInputs,
  type RedeemInputs,
} from './public-inputs.js';
export { resolveProtocolConfig, LedgerProtocolConfigSchema } from './protocol-config.js';
export { WriteLock } from './write-lock.js';
export { EventLog } from './event-log.js';
export { logger, createLogger, silentLogger, type Logger } from './logger.js';
export { LedgerError, isLedgerError, type LedgerErrorCode } from '@tessera/types';
