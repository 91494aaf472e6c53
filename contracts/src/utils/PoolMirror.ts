/**
 * PoolMirror.ts - Off-chain copy of one tier's deposit tree
 *
 * Provers need Merkle witnesses for their own leaf; the mirror rebuilds the
 * tier's tree from the pool's leaves with o1js MerkleTree and serves them.
 */

import { Field, MerkleTree } from 'o1js';
import { TREE_DEPTH } from '../types/Constants.js';
import type { AnonymityPool } from '../contracts/AnonymityPool.js';

export class PoolMirror {
  readonly tree: MerkleTree;
  private nextIndex = 0n;

  constructor(depth: number = TREE_DEPTH) {
    // o1js counts the leaf level in the height
    this.tree = new MerkleTree(depth + 1);
  }

  /**
   * Mirror of every leaf currently in the pool's tier tree
   */
  static fromPool(pool: AnonymityPool, tier: Field): PoolMirror {
    const mirror = new PoolMirror(pool.depth);
    mirror.sync(pool, tier);
    return mirror;
  }

  /**
   * Appends the leaves deposited since the last sync
   */
  sync(pool: AnonymityPool, tier: Field): number {
    const count = pool.getDepositCount(tier);
    let added = 0;
    while (this.nextIndex < count) {
      this.addLeaf(pool.getLeaf(tier, this.nextIndex));
      added++;
    }
    return added;
  }

  addLeaf(commitment: Field): bigint {
    this.tree.setLeaf(this.nextIndex, commitment);
    this.nextIndex += 1n;
    return this.nextIndex - 1n;
  }

  get size(): bigint {
    return this.nextIndex;
  }

  getRoot(): Field {
    return this.tree.getRoot();
  }

  getWitness(index: bigint) {
    return this.tree.getWitness(index);
  }
}
