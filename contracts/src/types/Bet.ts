/**
 * Bet.ts - A sealed bet held by a market
 *
 * The commitment is Poseidon(outcome, nonce); the outcome stays PENDING until
 * the bettor reveals the pre-image. Stored in the market's bet map keyed by
 * commitment.
 */

import { Struct, Field, Bool } from 'o1js';
import { OUTCOME } from './Constants.js';

/**
 * Bet: Lifecycle record for one anonymous stake
 *
 * @property commitment - Poseidon(outcome, nonce), distinct from the deposit commitment
 * @property revealed - Set once by revealBet
 * @property outcome - PENDING until revealed, then YES or NO
 * @property claimed - Set once by claim
 */
export class Bet extends Struct({
  commitment: Field,
  revealed: Bool,
  outcome: Field,
  claimed: Bool,
}) {
  /**
   * A freshly placed, sealed bet
   */
  static placed(commitment: Field): Bet {
    return new Bet({
      commitment,
      revealed: Bool(false),
      outcome: OUTCOME.PENDING,
      claimed: Bool(false),
    });
  }

  withReveal(outcome: Field): Bet {
    return new Bet({
      commitment: this.commitment,
      revealed: Bool(true),
      outcome,
      claimed: this.claimed,
    });
  }

  withClaim(): Bet {
    return new Bet({
      commitment: this.commitment,
      revealed: this.revealed,
      outcome: this.outcome,
      claimed: Bool(true),
    });
  }

  /**
   * Revealed and on the resolved side
   */
  isWinner(resolvedOutcome: Field): Bool {
    return this.revealed.and(this.outcome.equals(resolvedOutcome));
  }
}
