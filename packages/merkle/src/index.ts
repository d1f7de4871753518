/**
 * @tessera/merkle
 * Incremental commitment tree with path generation and verification
 */

export { CommitmentTree, type CommitmentTreeState } from './commitment-tree.js';
export { buildZeroTable, assertTreeDepth } from './zero-table.js';
