import { EMPTY_LEAF, LedgerError, MAX_TREE_DEPTH, type Hash } from '@tessera/types';
import type { FieldHasher } from '@tessera/crypto';

export function assertTreeDepth(depth: number): number {
  if (!Number.isInteger(depth) || depth < 1 || depth > MAX_TREE_DEPTH) {
    throw new LedgerError('InvalidTreeDepth', `Tree depth must be an integer in [1, ${MAX_TREE_DEPTH}], got ${depth}`);
  }
  return depth;
}

/**
 * Roots of empty subtrees: zeros[0] is the empty leaf, zeros[k] = H(zeros[k-1], zeros[k-1]).
 * zeros[depth] is the root of an empty tree.
 */
export function buildZeroTable(hasher: FieldHasher, depth: number): readonly Hash[] {
  assertTreeDepth(depth);
  let current = EMPTY_LEAF;
  const zeros = [current];
  for (let level = 0; level < depth; level++) {
    current = hasher.hash([current, current]);
    zeros.push(current);
  }
  return zeros;
}
