import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { LedgerError } from '@tessera/types';
import { parseBigInt } from '@tessera/crypto';

const LeavesSchema = z.array(z.union([z.string(), z.number().int().nonnegative()]));

/**
 * Parse a JSON array of leaves given as decimal/hex strings or integers
 */
export function parseLeaves(raw: unknown): bigint[] {
  const parsed = LeavesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new LedgerError('InvalidConfig', 'Leaves file must be a JSON array of numbers or numeric strings');
  }
  return parsed.data.map((leaf) => (typeof leaf === 'number' ? BigInt(leaf) : parseBigInt(leaf)));
}

export async function loadLeaves(path: string): Promise<bigint[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf8'));
  } catch (err) {
    throw new LedgerError('InvalidConfig', `Cannot read leaves file ${path}`, err);
  }
  return parseLeaves(raw);
}
