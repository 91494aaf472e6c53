/**
 * MarketConfig.ts - Immutable parameters of a market
 */

import { Struct, PublicKey, Field, UInt64 } from 'o1js';
import { RESOLUTION_SOURCE, tierIndex, resolutionSourceName } from './Constants.js';
import { assertThat } from '../utils/MarketError.js';

/**
 * MarketConfig: Fixed at construction, never mutated
 *
 * Deadlines are block timestamps in ms. The oracle parameters only matter for
 * ORACLE_FEED markets: YES wins when the feed's price for `assetIndex` is at
 * least `targetPrice`.
 */
export class MarketConfig extends Struct({
  creator: PublicKey,
  betDeadline: UInt64,
  revealDeadline: UInt64,
  disputeDeadline: UInt64,
  resolutionSource: Field,
  poolTier: Field,
  assetIndex: Field,
  targetPrice: Field,
}) {
  usesCreatorResolve(): boolean {
    return this.resolutionSource.equals(RESOLUTION_SOURCE.CREATOR_RESOLVE).toBoolean();
  }

  /**
   * Checks tier, resolution source and now < bet < reveal < dispute
   */
  validate(now: UInt64) {
    tierIndex(this.poolTier);
    resolutionSourceName(this.resolutionSource);
    assertThat(now.lessThan(this.betDeadline), 'DEADLINE_ORDER', 'bet deadline must be in the future');
    assertThat(this.betDeadline.lessThan(this.revealDeadline), 'DEADLINE_ORDER', 'reveal deadline must follow bet deadline');
    assertThat(
      this.revealDeadline.lessThan(this.disputeDeadline),
      'DEADLINE_ORDER',
      'dispute deadline must follow reveal deadline'
    );
  }
}
