/**
 * MerkleAccumulator.ts - Append-only Poseidon Merkle tree
 *
 * Nodes live in a flat map keyed by (level, index); anything never written is
 * the empty subtree root of its level. Each insertion rewrites the leaf's D
 * ancestors, so the root always equals a left-to-right batch build over the
 * same leaves (o1js MerkleTree of height D + 1).
 */

import { Field, Poseidon } from 'o1js';
import { EMPTY_LEAF, TREE_DEPTH } from '../types/Constants.js';
import { StateMap } from '../utils/StateMap.js';
import { assertThat } from '../utils/MarketError.js';

export const MAX_TREE_DEPTH = 32;

export interface MerklePath {
  /** Sibling at each level, leaf level first */
  siblings: Field[];
  /** Whether the path node at each level is a left child */
  isLeft: boolean[];
}

/**
 * zeros[0] = EMPTY_LEAF, zeros[l + 1] = Poseidon(zeros[l], zeros[l])
 */
export function emptySubtreeRoots(depth: number): Field[] {
  const zeros = [EMPTY_LEAF];
  for (let level = 0; level < depth; level++) {
    zeros.push(Poseidon.hash([zeros[level], zeros[level]]));
  }
  return zeros;
}

export class MerkleAccumulator {
  readonly depth: number;
  readonly capacity: bigint;
  private readonly zeros: Field[];
  private nodes = new StateMap<Field>();
  private count = 0n;
  private currentRoot: Field;

  constructor(depth: number = TREE_DEPTH) {
    if (!Number.isInteger(depth) || depth < 1 || depth > MAX_TREE_DEPTH) {
      throw new RangeError(`Tree depth must be an integer in [1, ${MAX_TREE_DEPTH}], got ${depth}`);
    }
    this.depth = depth;
    this.capacity = 1n << BigInt(depth);
    this.zeros = emptySubtreeRoots(depth);
    this.currentRoot = this.zeros[depth];
  }

  get root(): Field {
    return this.currentRoot;
  }

  get size(): bigint {
    return this.count;
  }

  /**
   * Appends a leaf at index = size and returns that index.
   */
  insert(leaf: Field): bigint {
    assertThat(this.count < this.capacity, 'TREE_FULL', `${this.capacity} leaves`);

    const leafIndex = this.count;
    let index = leafIndex;
    let node = leaf;
    this.setNode(0, index, node);

    for (let level = 0; level < this.depth; level++) {
      const isLeft = index % 2n === 0n;
      const sibling = this.getNode(level, isLeft ? index + 1n : index - 1n);
      node = isLeft ? Poseidon.hash([node, sibling]) : Poseidon.hash([sibling, node]);
      index = index / 2n;
      this.setNode(level + 1, index, node);
    }

    this.currentRoot = node;
    this.count += 1n;
    return leafIndex;
  }

  /**
   * Stored leaf, or the empty leaf for positions not filled yet.
   */
  getLeaf(index: bigint): Field {
    this.assertInRange(index);
    return this.getNode(0, index);
  }

  getNode(level: number, index: bigint): Field {
    return this.nodes.get(nodeKey(level, index)) ?? this.zeros[level];
  }

  /**
   * Authentication path from a leaf to the current root.
   */
  getPath(index: bigint): MerklePath {
    this.assertInRange(index);
    const siblings: Field[] = [];
    const isLeft: boolean[] = [];

    let position = index;
    for (let level = 0; level < this.depth; level++) {
      const left = position % 2n === 0n;
      isLeft.push(left);
      siblings.push(this.getNode(level, left ? position + 1n : position - 1n));
      position = position / 2n;
    }
    return { siblings, isLeft };
  }

  checkpoint(): () => void {
    const restoreNodes = this.nodes.checkpoint();
    const count = this.count;
    const root = this.currentRoot;

    return () => {
      restoreNodes();
      this.count = count;
      this.currentRoot = root;
    };
  }

  private setNode(level: number, index: bigint, value: Field) {
    this.nodes.set(nodeKey(level, index), value);
  }

  private assertInRange(index: bigint) {
    assertThat(index >= 0n && index < this.capacity, 'LEAF_OUT_OF_RANGE', index.toString());
  }
}

/**
 * Recomputes a root from a leaf and its path
 */
export function computeRoot(leaf: Field, path: MerklePath): Field {
  let node = leaf;
  path.siblings.forEach((sibling, level) => {
    node = path.isLeft[level] ? Poseidon.hash([node, sibling]) : Poseidon.hash([sibling, node]);
  });
  return node;
}

function nodeKey(level: number, index: bigint): string {
  return `${level}:${index}`;
}
