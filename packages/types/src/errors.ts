// ============================================================================
// Error Taxonomy
// ============================================================================

export type ErrorCategory = 'structural' | 'state-conflict' | 'cryptographic' | 'resource' | 'custody';

export const ERROR_CATEGORIES = {
  InvalidArrayLength: 'structural',
  InvalidCommitment: 'structural',
  InvalidNullifier: 'structural',
  InvalidRecipient: 'structural',
  InvalidAmount: 'structural',
  InvalidFieldElement: 'structural',
  InvalidTreeDepth: 'structural',
  InvalidTreeState: 'structural',
  InvalidConfig: 'structural',
  CommitmentAlreadyExists: 'state-conflict',
  NullifierAlreadySpent: 'state-conflict',
  InvalidMerkleRoot: 'state-conflict',
  LedgerAlreadyExists: 'state-conflict',
  InvalidProof: 'cryptographic',
  TreeFull: 'resource',
  InsufficientCollateral: 'resource',
  UnauthorizedIssuer: 'resource',
  TransferFailed: 'custody',
} as const satisfies Record<string, ErrorCategory>;

export type LedgerErrorCode = keyof typeof ERROR_CATEGORIES;

/**
 * Every rejection surfaced by the ledger. Nothing is retried internally;
 * callers branch on `code`.
 */
export class LedgerError extends Error {
  readonly code: LedgerErrorCode;
  readonly category: ErrorCategory;

  constructor(code: LedgerErrorCode, message?: string, cause?: unknown) {
    super(message ?? code, cause === undefined ? undefined : { cause });
    this.name = 'LedgerError';
    this.code = code;
    this.category = ERROR_CATEGORIES[code];
  }
}

export function isLedgerError(err: unknown, code?: LedgerErrorCode): err is LedgerError {
  return err instanceof LedgerError && (code === undefined || err.code === code);
}
