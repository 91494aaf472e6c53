/**
 * Commitments.ts - Client-side secrets and the hashes derived from them
 *
 * A Note is what a depositor keeps after depositing: its commitment is the
 * tree leaf, and its nullifier secret derives one betting nullifier and one
 * claim nullifier per market.
 */

import { Field, Poseidon } from 'o1js';
import { CLAIM_NULLIFIER_DOMAIN } from '../types/Constants.js';

export class Note {
  constructor(
    public readonly secret: Field,
    public readonly nullifierSecret: Field
  ) {}

  static random(): Note {
    return new Note(Field.random(), Field.random());
  }

  /**
   * Deposit commitment (tree leaf)
   */
  commitment(): Field {
    return Poseidon.hash([this.secret, this.nullifierSecret]);
  }

  /**
   * Betting nullifier, unique per (note, market)
   */
  nullifier(marketId: Field): Field {
    return Poseidon.hash([this.nullifierSecret, marketId]);
  }

  /**
   * Claim nullifier, in its own domain so it never equals a betting nullifier
   */
  claimNullifier(marketId: Field): Field {
    return Poseidon.hash([this.nullifierSecret, marketId, CLAIM_NULLIFIER_DOMAIN]);
  }
}

/**
 * Sealed bet: Poseidon(outcome, nonce)
 */
export function betCommitment(outcome: Field, nonce: Field): Field {
  return Poseidon.hash([outcome, nonce]);
}
