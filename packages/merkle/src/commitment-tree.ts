/**
 * Append-only incremental Merkle tree of note commitments
 *
 * Nodes live in one sparse map per level; anything unwritten is the zero
 * subtree root for that level. Inserting touches one node per level.
 */

import { DEFAULT_TREE_DEPTH, LedgerError, type Hash, type HashName, type MerklePath } from '@tessera/types';
import { assertFieldElement, type FieldHasher } from '@tessera/crypto';
import { buildZeroTable } from './zero-table.js';

/** Serialised tree: leaves in insertion order, values as decimal strings */
export interface CommitmentTreeState {
  depth: number;
  hash: HashName;
  root: string;
  leaves: string[];
}

export class CommitmentTree {
  private readonly depth: number;
  private readonly capacity: number;
  private readonly zeros: readonly Hash[];
  /** levels[0] holds leaves, levels[depth] holds the root */
  private readonly levels: Map<number, Hash>[];
  private readonly leafIndex = new Map<Hash, number>();
  private nextIndex = 0;

  constructor(
    private readonly hasher: FieldHasher,
    depth: number = DEFAULT_TREE_DEPTH
  ) {
    this.zeros = buildZeroTable(hasher, depth);
    this.depth = depth;
    this.capacity = 2 ** depth;
    this.levels = Array.from({ length: depth + 1 }, () => new Map<number, Hash>());
  }

  getRoot(): Hash {
    return this.levels[this.depth].get(0) ?? this.zeros[this.depth];
  }

  getNextIndex(): number {
    return this.nextIndex;
  }

  getCapacity(): number {
    return this.capacity;
  }

  getRemainingCapacity(): number {
    return this.capacity - this.nextIndex;
  }

  getDepth(): number {
    return this.depth;
  }

  getHashName(): HashName {
    return this.hasher.name;
  }

  getLeaf(index: number): Hash | undefined {
    return this.levels[0].get(index);
  }

  /** O(1) membership check by value */
  hasLeaf(leaf: Hash): boolean {
    return this.leafIndex.has(leaf);
  }

  /** Index of the first occurrence of a leaf */
  indexOf(leaf: Hash): number | undefined {
    return this.leafIndex.get(leaf);
  }

  /**
   * Append a leaf at the next free index
   * @returns The leaf index
   */
  insert(leaf: Hash): number {
    if (this.nextIndex >= this.capacity) {
      throw new LedgerError('TreeFull', `Tree is full (${this.capacity} leaves)`);
    }
    assertFieldElement(leaf, 'leaf');
    return this.append(leaf);
  }

  /**
   * Append several leaves. Nothing is inserted unless all of them fit and are valid.
   */
  insertMany(leaves: readonly Hash[]): number[] {
    if (leaves.length > this.getRemainingCapacity()) {
      throw new LedgerError(
        'TreeFull',
        `Cannot insert ${leaves.length} leaves, ${this.getRemainingCapacity()} slots left`
      );
    }
    leaves.forEach((leaf, i) => assertFieldElement(leaf, `leaves[${i}]`));
    return leaves.map((leaf) => this.append(leaf));
  }

  /**
   * Authentication path for an inserted leaf, siblings bottom-up
   */
  getPath(index: number): MerklePath {
    const leaf = this.getLeaf(index);
    if (leaf === undefined) {
      throw new RangeError(`No leaf at index ${index}`);
    }

    const siblings: Hash[] = [];
    let currentIndex = index;
    for (let level = 0; level < this.depth; level++) {
      siblings.push(this.nodeAt(level, siblingOf(currentIndex)));
      currentIndex = Math.floor(currentIndex / 2);
    }

    return { root: this.getRoot(), leaf, index, siblings };
  }

  /**
   * Recompute the root from a leaf and its siblings. Bit i of index set means
   * the node is a right child at level i.
   */
  static verifyProof(
    hasher: FieldHasher,
    root: Hash,
    leaf: Hash,
    index: number,
    siblings: readonly Hash[]
  ): boolean {
    if (!Number.isInteger(index) || index < 0 || index >= 2 ** siblings.length) {
      return false;
    }

    let current = leaf;
    let currentIndex = index;
    for (const sibling of siblings) {
      current = currentIndex % 2 === 0 ? hasher.hash([current, sibling]) : hasher.hash([sibling, current]);
      currentIndex = Math.floor(currentIndex / 2);
    }
    return current === root;
  }

  /**
   * Export tree state for serialization
   */
  export(): CommitmentTreeState {
    const leaves: string[] = [];
    for (let i = 0; i < this.nextIndex; i++) {
      leaves.push(this.nodeAt(0, i).toString());
    }
    return { depth: this.depth, hash: this.getHashName(), root: this.getRoot().toString(), leaves };
  }

  /**
   * Rebuild a tree from exported state. The rebuilt root must match.
   */
  static import(state: CommitmentTreeState, hasher: FieldHasher): CommitmentTree {
    if (state.hash !== hasher.name) {
      throw new LedgerError('InvalidTreeState', `State was built with ${state.hash}, got ${hasher.name}`);
    }

    const tree = new CommitmentTree(hasher, state.depth);
    try {
      tree.insertMany(state.leaves.map((leaf) => BigInt(leaf)));
    } catch (err) {
      throw new LedgerError('InvalidTreeState', 'Tree state leaves are invalid', err);
    }

    if (tree.getRoot().toString() !== state.root) {
      throw new LedgerError('InvalidTreeState', `Root mismatch: expected ${state.root}, rebuilt ${tree.getRoot()}`);
    }
    return tree;
  }

  private append(leaf: Hash): number {
    const index = this.nextIndex++;
    this.levels[0].set(index, leaf);
    if (!this.leafIndex.has(leaf)) {
      this.leafIndex.set(leaf, index);
    }

    let current = leaf;
    let currentIndex = index;
    for (let level = 0; level < this.depth; level++) {
      // a right child's left neighbour is always written
      const isLeft = currentIndex % 2 === 0;
      const sibling = this.nodeAt(level, siblingOf(currentIndex));
      current = isLeft ? this.hasher.hash([current, sibling]) : this.hasher.hash([sibling, current]);

      currentIndex = Math.floor(currentIndex / 2);
      this.levels[level + 1].set(currentIndex, current);
    }

    return index;
  }

  private nodeAt(level: number, index: number): Hash {
    return this.levels[level].get(index) ?? this.zeros[level];
  }
}

// indices reach 2^32, past the range of the bitwise operators
function siblingOf(index: number): number {
  return index % 2 === 0 ? index + 1 : index - 1;
}
