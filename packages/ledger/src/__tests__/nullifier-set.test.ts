import { describe, it, expect } from 'vitest';
import { isLedgerError } from '@tessera/types';
import { NullifierSet } from '../nullifier-set.js';

describe('NullifierSet', () => {
  it('marks nullifiers spent exactly once', () => {
    const set = new NullifierSet();
    expect(set.isSpent(7n)).toBe(false);

    set.markSpent(7n);
    expect(set.isSpent(7n)).toBe(true);
    expect(set.size).toBe(1);

    try {
      set.markSpent(7n);
      expect.unreachable();
    } catch (err) {
      expect(isLedgerError(err, 'NullifierAlreadySpent')).toBe(true);
    }
    expect(set.size).toBe(1);
    expect(set.values()).toEqual([7n]);
  });
});
