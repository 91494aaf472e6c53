/**
 * MarketRegistry.ts - Factory and index for all markets
 *
 * Key responsibilities:
 * - Validate market configs (deadline ordering, tier, resolution source)
 * - Construct Market contracts with sequential ids
 * - Track metadata and questions by id
 * - Authorize new markets on the pool when the registry owns it
 */

import { PrivateKey, PublicKey, Field } from 'o1js';
import { Contract, type Ledger } from '../utils/Ledger.js';
import { StateMap } from '../utils/StateMap.js';
import { MarketError, assertThat } from '../utils/MarketError.js';
import type { ProofVerifier } from '../utils/ProofVerifier.js';
import type { PriceFeed } from '../utils/PriceFeed.js';
import { Market } from './Market.js';
import type { AnonymityPool } from './AnonymityPool.js';
import type { TokenInterface } from './FungibleToken.js';
import type { MarketConfig } from '../types/MarketConfig.js';
import { MarketInfo } from '../types/MarketInfo.js';
import { MarketCreatedEvent } from '../types/Events.js';

const registryEvents = {
  'market-created': MarketCreatedEvent,
};

export interface CreateMarketParams {
  config: MarketConfig;
  question: string;
  pool: AnonymityPool;
  membershipVerifier: ProofVerifier;
  claimVerifier: ProofVerifier;
  token: TokenInterface;
  priceFeed?: PriceFeed;
}

export interface MarketRegistryOptions {
  address?: PublicKey;
}

export class MarketRegistry extends Contract<typeof registryEvents> {
  readonly events = registryEvents;

  private markets = new StateMap<Market>();
  private infos = new StateMap<MarketInfo>();
  private marketCount = 0n;

  constructor(ledger: Ledger, options: MarketRegistryOptions = {}) {
    super(ledger, options.address ?? PrivateKey.random().toPublicKey());
  }

  /**
   * Creates and registers a market. The sender becomes its creator and must
   * match `config.creator`.
   */
  async createMarket(params: CreateMarketParams): Promise<Market> {
    const creator = this.sender;
    const createdAt = this.timestamp;
    const { config } = params;

    assertThat(creator.equals(config.creator), 'NOT_CREATOR', 'config.creator must sign the creation');
    config.validate(createdAt);
    const question = params.question.trim();
    assertThat(question.length > 0, 'EMPTY_QUESTION');

    const marketId = Field(this.marketCount);
    const market = new Market(this.ledger, {
      marketId,
      config,
      question,
      pool: params.pool,
      membershipVerifier: params.membershipVerifier,
      claimVerifier: params.claimVerifier,
      token: params.token,
      priceFeed: params.priceFeed,
    });

    if (params.pool.owner.equals(this.address).toBoolean()) {
      await this.invoke(() => params.pool.authorizeMarket(market.address));
    }

    const key = marketId.toString();
    this.markets.set(key, market);
    this.infos.set(
      key,
      new MarketInfo({
        marketId,
        marketAddress: market.address,
        creator,
        poolTier: config.poolTier,
        createdAt,
      })
    );
    this.marketCount += 1n;

    this.emitEvent(
      'market-created',
      new MarketCreatedEvent({ marketId, creator, poolTier: config.poolTier, timestamp: createdAt })
    );
    return market;
  }

  getMarket(marketId: Field): Market {
    const market = this.markets.get(marketId.toString());
    if (market === undefined) {
      throw new MarketError('UNKNOWN_MARKET', marketId.toString());
    }
    return market;
  }

  getMarketInfo(marketId: Field): MarketInfo {
    const info = this.infos.get(marketId.toString());
    if (info === undefined) {
      throw new MarketError('UNKNOWN_MARKET', marketId.toString());
    }
    return info;
  }

  getQuestion(marketId: Field): string {
    return this.getMarket(marketId).question;
  }

  getMarketCount(): bigint {
    return this.marketCount;
  }

  getAllMarkets(): Market[] {
    const markets: Market[] = [];
    for (let id = 0n; id < this.marketCount; id++) {
      markets.push(this.getMarket(Field(id)));
    }
    return markets;
  }

  checkpoint(): () => void {
    const restoreMarkets = this.markets.checkpoint();
    const restoreInfos = this.infos.checkpoint();
    const marketCount = this.marketCount;

    return () => {
      restoreMarkets();
      restoreInfos();
      this.marketCount = marketCount;
    };
  }
}

