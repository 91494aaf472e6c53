/**
 * MockPriceFeed.ts - Settable price feed for tests and local mode
 */

import { Field } from 'o1js';
import type { PriceFeed } from './PriceFeed.js';
import { MarketError } from './MarketError.js';

export class MockPriceFeed implements PriceFeed {
  private prices = new Map<string, Field>();

  setPrice(assetIndex: Field, price: Field) {
    this.prices.set(assetIndex.toString(), price);
  }

  async getPrice(assetIndex: Field): Promise<Field> {
    const price = this.prices.get(assetIndex.toString());
    if (price === undefined) {
      throw new MarketError('ORACLE_UNAVAILABLE', `no price for asset ${assetIndex}`);
    }
    return price;
  }
}
