import { LedgerError, type NullifierHash } from '@tessera/types';

/**
 * Spent nullifier hashes. Write-once: there is no way to unmark.
 */
export class NullifierSet {
  private readonly spent = new Set<NullifierHash>();

  isSpent(nullifier: NullifierHash): boolean {
    return this.spent.has(nullifier);
  }

  markSpent(nullifier: NullifierHash): void {
    if (this.spent.has(nullifier)) {
      throw new LedgerError('NullifierAlreadySpent', `Nullifier ${nullifier} already spent`);
    }
    this.spent.add(nullifier);
  }

  get size(): number {
    return this.spent.size;
  }

  values(): NullifierHash[] {
    return [...this.spent];
  }
}
