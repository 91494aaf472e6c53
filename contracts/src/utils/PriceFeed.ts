/**
 * PriceFeed.ts - Price oracle boundary for ORACLE_FEED markets
 *
 * Prices are Fields scaled by MULTIPLICATION_FACTOR (price * 10^10), so
 * comparisons stay integer.
 */

import { Field, Provable } from 'o1js';
import { OUTCOME } from '../types/Constants.js';

export const MULTIPLICATION_FACTOR = Field(10_000_000_000); // 10^10

/**
 * Asset indices understood by the feeds
 */
export const ASSET_INDEX = {
  MINA: Field(0),
  BITCOIN: Field(1),
  ETHEREUM: Field(2),
  SOLANA: Field(3),
} as const;

export interface PriceFeed {
  /**
   * Latest price of an asset, scaled by MULTIPLICATION_FACTOR
   */
  getPrice(assetIndex: Field): Promise<Field>;
}

/**
 * YES when the observed price reaches the target, NO otherwise
 */
export function outcomeFromPrice(price: Field, targetPrice: Field): Field {
  return Provable.if(price.greaterThanOrEqual(targetPrice), OUTCOME.YES, OUTCOME.NO);
}

export function scalePrice(price: number | bigint): Field {
  return Field(BigInt(price)).mul(MULTIPLICATION_FACTOR);
}
