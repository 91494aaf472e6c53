/**
 * MarketInfo.ts - Registry tracking data for markets
 *
 * The registry keeps only metadata; the market itself owns bets and counters.
 */

import { Struct, PublicKey, Field, UInt64 } from 'o1js';

/**
 * MarketInfo: Metadata tracked by MarketRegistry
 *
 * @property marketId - Sequential id, also bound into every proof for the market
 * @property marketAddress - Address of the Market contract
 * @property creator - Address that created the market
 * @property poolTier - Tier whose tree the market's proofs reference
 * @property createdAt - Block timestamp of creation (ms)
 */
export class MarketInfo extends Struct({
  marketId: Field,
  marketAddress: PublicKey,
  creator: PublicKey,
  poolTier: Field,
  createdAt: UInt64,
}) {}
