import type {
  Address,
  AssetId,
  Commitment,
  Hash,
  IssuerId,
  NullifierHash,
} from './common.js';
import type { Groth16Proof } from './proofs.js';

// ============================================================================
// Protocol Configuration
// ============================================================================

/**
 * How a note's amount is disclosed to the ledger.
 * - public: the depositor/redeemer states the amount in the request
 * - denomination: every note carries the same fixed amount, bound by the proof
 */
export type AmountMode = 'public' | 'denomination';

/**
 * Public-input layout of the transfer circuit.
 * - fixed: 2-in/2-out, [root, n0, n1, c0, c1]
 * - variable: k-in/m-out, [nullifiers..., commitments..., root]
 */
export type TransferLayout = 'fixed' | 'variable';

/** Protocol variant a ledger instance speaks */
export interface LedgerProtocolConfig {
  amountMode: AmountMode;
  /** Per-note amount in denomination mode */
  denomination: bigint;
  transferLayout: TransferLayout;
  /** Upper bound on inputs for the variable layout */
  maxInputs: number;
  /** Upper bound on outputs for the variable layout */
  maxOutputs: number;
}

/** Default protocol configuration */
export const DEFAULT_PROTOCOL_CONFIG: LedgerProtocolConfig = {
  amountMode: 'public',
  denomination: 1_000_000_000_000_000_000n, // 1 token at 18 decimals
  transferLayout: 'fixed',
  maxInputs: 16,
  maxOutputs: 16,
};

/** Arity of the fixed transfer layout */
export const FIXED_TRANSFER_ARITY = { inputs: 2, outputs: 2 } as const;

// ============================================================================
// Transition Requests
// ============================================================================

/** Deposit: lock collateral and publish a fresh commitment */
export interface MintRequest<P = Groth16Proof> {
  commitment: Commitment;
  /** Revealed deposit nullifier (public amount mode only) */
  nullifierHash?: NullifierHash;
  /** Deposited amount; required in public mode, optional in denomination mode */
  amount?: bigint;
  /** Account the collateral is taken from */
  depositor: Address;
  /** Opaque note ciphertext for the owner */
  encryptedPayload: Uint8Array;
  proof: P;
}

/** Spend k notes, create m notes */
export interface TransferRequest<P = Groth16Proof> {
  inputNullifiers: NullifierHash[];
  outputCommitments: Commitment[];
  /** Must equal the current tree root */
  merkleRoot: Hash;
  /** One opaque payload per output commitment */
  encryptedPayloads: Uint8Array[];
  proof: P;
}

/** Withdraw: spend a note and release its collateral */
export interface RedeemRequest<P = Groth16Proof> {
  nullifier: NullifierHash;
  recipient: Address;
  /** Must equal the current tree root */
  merkleRoot: Hash;
  /** Redeemed amount (public amount mode only) */
  amount?: bigint;
  /** Commitment of the redeemed note (public amount mode only) */
  commitment?: Commitment;
  proof: P;
}

// ============================================================================
// Transition Results
// ============================================================================

export interface MintResult {
  index: number;
  root: Hash;
  amount: bigint;
}

export interface TransferResult {
  indices: number[];
  root: Hash;
}

export interface RedeemResult {
  amount: bigint;
  root: Hash;
}

/** Point-in-time view of a ledger */
export interface LedgerStatus {
  asset: AssetId;
  issuer: IssuerId;
  root: Hash;
  nextIndex: number;
  capacity: number;
  spentNullifiers: number;
  totalLocked: bigint;
  eventCount: number;
}

// ============================================================================
// External Collaborators
// ============================================================================

/**
 * Movement of the underlying fungible asset in and out of custody.
 * Either call rejects when the movement cannot be made.
 */
export interface AssetCustody {
  transferIn(asset: AssetId, from: Address, amount: bigint): Promise<void>;
  transferOut(asset: AssetId, to: Address, amount: bigint): Promise<void>;
}
