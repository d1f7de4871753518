import type { Commitment, NullifierHash } from './common.js';

// ============================================================================
// Ledger Events (append-only, no private data)
// ============================================================================

export type LedgerEvent =
  | { type: 'NoteCommitted'; sequence: number; commitment: Commitment; index: number; encryptedPayload: Uint8Array }
  | { type: 'NullifierSpent'; sequence: number; nullifier: NullifierHash }
  | { type: 'Deposit'; sequence: number; commitment: Commitment }
  | { type: 'Withdrawal'; sequence: number; nullifier: NullifierHash }
  | { type: 'CollateralLocked'; sequence: number; commitment: Commitment }
  | { type: 'CollateralReleased'; sequence: number; nullifier: NullifierHash };

export type LedgerEventType = LedgerEvent['type'];

type WithoutSequence<E> = E extends unknown ? Omit<E, 'sequence'> : never;

/** An event before the log assigns its sequence number */
export type LedgerEventBody = WithoutSequence<LedgerEvent>;

/** Handler for ledger events */
export type LedgerEventHandler = (event: LedgerEvent) => void;
