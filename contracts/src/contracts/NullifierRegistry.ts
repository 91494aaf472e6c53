/**
 * NullifierRegistry.ts - At-most-once set of spent nullifiers
 */

import { Field, Bool } from 'o1js';
import { StateMap } from '../utils/StateMap.js';
import { assertThat } from '../utils/MarketError.js';

export class NullifierRegistry {
  private used = new StateMap<Field>();

  isUsed(nullifier: Field): Bool {
    return Bool(this.used.has(nullifier.toString()));
  }

  /**
   * Marks a nullifier spent; fails without touching the set if it already is.
   */
  consume(nullifier: Field) {
    assertThat(this.isUsed(nullifier).not(), 'NULLIFIER_USED', nullifier.toString());
    this.used.set(nullifier.toString(), nullifier);
  }

  get size(): number {
    return this.used.size;
  }

  checkpoint(): () => void {
    return this.used.checkpoint();
  }
}
