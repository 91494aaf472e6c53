/**
 * Redis Client - Market metadata storage
 *
 * Upstash's serverless Redis over its REST API when credentials are set, a
 * Map otherwise and in tests. Records are written whole; Upstash serializes them as JSON.
 *
 * Data model:
 * - market:{id} → MarketData
 * - markets:all → array of market IDs
 */

import { Redis } from '@upstash/redis';
import type { OutcomeName, ResolutionSourceName, StatusName, TierName } from '@shielded-markets/contracts';
import type { BackendConfig } from '../config.js';

export interface MarketData {
  marketId: number;
  marketAddress: string;
  creator: string;
  question: string;
  poolTier: TierName;
  resolutionSource: ResolutionSourceName;
  assetIndex: number;
  targetPrice: string;
  betDeadline: number;
  revealDeadline: number;
  disputeDeadline: number;
  status: StatusName;
  outcome: OutcomeName;
  createdAt: string;
}

export interface MarketStore {
  saveMarket(data: MarketData): Promise<void>;
  getMarket(marketId: number): Promise<MarketData | null>;
  getAllMarkets(): Promise<MarketData[]>;
  updateMarketStatus(marketId: number, status: StatusName, outcome?: OutcomeName): Promise<void>;
}

/**
 * Upstash Redis Service
 */
export class UpstashMarketStore implements MarketStore {
  private client: Redis;

  constructor(url: string, token: string) {
    // Upstash Redis is serverless - no connect/disconnect needed
    this.client = new Redis({ url, token });
  }

  // ========== Market Data ==========

  async saveMarket(data: MarketData): Promise<void> {
    await this.client.set(`market:${data.marketId}`, data);
    await this.addToMarketsList(data.marketId);
  }

  async getMarket(marketId: number): Promise<MarketData | null> {
    return this.client.get<MarketData>(`market:${marketId}`);
  }

  async getAllMarkets(): Promise<MarketData[]> {
    const marketIds = await this.getAllMarketIds();
    const markets: MarketData[] = [];

    for (const id of marketIds) {
      const market = await this.getMarket(id);
      if (market) markets.push(market);
    }

    return markets;
  }

  async updateMarketStatus(marketId: number, status: StatusName, outcome?: OutcomeName): Promise<void> {
    const market = await this.getMarket(marketId);
    if (!market) {
      console.warn(`  Market ${marketId} not found, cannot update status`);
      return;
    }
    await this.saveMarket({ ...market, status, outcome: outcome ?? market.outcome });
  }

  // ========== Market List Management ==========

  private async getAllMarketIds(): Promise<number[]> {
    return (await this.client.get<number[]>('markets:all')) ?? [];
  }

  private async addToMarketsList(marketId: number): Promise<void> {
    const currentIds = await this.getAllMarketIds();

    if (!currentIds.includes(marketId)) {
      await this.client.set('markets:all', [...currentIds, marketId]);
    }
  }
}

/**
 * In-process store for local mode and tests
 */
export class MemoryMarketStore implements MarketStore {
  private markets = new Map<number, MarketData>();

  async saveMarket(data: MarketData): Promise<void> {
    this.markets.set(data.marketId, { ...data });
  }

  async getMarket(marketId: number): Promise<MarketData | null> {
    const market = this.markets.get(marketId);
    return market ? { ...market } : null;
  }

  async getAllMarkets(): Promise<MarketData[]> {
    return [...this.markets.values()]
      .sort((a, b) => a.marketId - b.marketId)
      .map((market) => ({ ...market }));
  }

  async updateMarketStatus(marketId: number, status: StatusName, outcome?: OutcomeName): Promise<void> {
    const market = this.markets.get(marketId);
    if (!market) {
      console.warn(`  Market ${marketId} not found, cannot update status`);
      return;
    }
    this.markets.set(marketId, { ...market, status, outcome: outcome ?? market.outcome });
  }
}

export function createMarketStore(cfg: BackendConfig): MarketStore {
  if (!cfg.redis.url || !cfg.redis.token) {
    console.log('  Using in-memory market store (no Upstash credentials)');
    return new MemoryMarketStore();
  }
  return new UpstashMarketStore(cfg.redis.url, cfg.redis.token);
}
