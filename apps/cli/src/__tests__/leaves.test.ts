import { describe, it, expect } from 'vitest';
import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { isLedgerError } from '@tessera/types';
import { loadLeaves, parseLeaves } from '../utils/leaves.js';

describe('parseLeaves', () => {
  it('accepts integers, decimal strings and hex strings', () => {
    expect(parseLeaves([1, '2', '0x10'])).toEqual([1n, 2n, 16n]);
  });

  it('rejects anything but an array', () => {
    expect(() => parseLeaves({ leaves: [1] })).toThrow('Leaves file must be a JSON array of numbers or numeric strings');
    expect(() => parseLeaves([-1])).toThrow('Leaves file must be a JSON array of numbers or numeric strings');
  });

  it('rejects non-numeric strings', () => {
    expect(() => parseLeaves(['abc'])).toThrow('Not a number: abc');
  });
});

describe('loadLeaves', () => {
  it('reads a JSON file', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'tessera-leaves-'));
    const path = join(dir, 'leaves.json');
    await writeFile(path, JSON.stringify(['7', 8]));

    expect(await loadLeaves(path)).toEqual([7n, 8n]);
  });

  it('wraps unreadable files in InvalidConfig', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'tessera-leaves-'));
    const path = join(dir, 'broken.json');
    await writeFile(path, '[1, 2');

    const err = await loadLeaves(path).then(
      () => undefined,
      (e: unknown) => e
    );
    expect(isLedgerError(err, 'InvalidConfig')).toBe(true);
  });
});
