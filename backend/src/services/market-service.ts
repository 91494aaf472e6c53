/**
 * Market Service
 *
 * Runs pool and market operations as ledger transactions on behalf of the
 * request's sender and keeps the market metadata store in step. Reads go
 * through the ledger queue so they never see a transaction in flight.
 *
 * Callers authenticate the sender first; the service trusts it.
 */

import { Field, PublicKey, UInt64 } from 'o1js';
import {
  type LocalProtocol,
  type Market,
  type MarketTotals,
  OUTCOME,
  deployMarket,
  depositWithFaucet,
  isMarketError,
  outcomeName,
  resolutionSourceFromName,
  resolutionSourceName,
  statusName,
  tierFromName,
  tierName,
} from '@shielded-markets/contracts';
import type { MarketData, MarketStore } from './redis-client.js';
import { RequestError, parseField, parsePublicKey, parseString, parseTimestamp, type RequestBody } from '../utils/request.js';

export interface MarketCreateRequest {
  creator: PublicKey;
  question: string;
  poolTier: Field;
  resolutionSource: Field;
  betDeadline: number;
  revealDeadline: number;
  disputeDeadline: number;
  assetIndex: Field;
  targetPrice: Field;
}

export type MarketRequestValidation =
  | { valid: true; errors: []; request: MarketCreateRequest }
  | { valid: false; errors: string[] };

export interface MarketView extends MarketData {
  totals: Record<keyof MarketTotals, string>;
  settlement: {
    totalPool: string;
    winnerCount: string;
    payoutPerWinner: string;
    undistributed: string;
  };
}

export interface PoolView {
  tier: string;
  root: string;
  depositCount: string;
  amount: string;
  reserve: string;
}

export interface MarketServiceOptions {
  protocol: LocalProtocol;
  store: MarketStore;
}

export interface PathView {
  root: string;
  siblings: string[];
  isLeft: boolean[];
}

/**
 * Collects every problem with a create-market body instead of stopping at
 * the first one. Deadline ordering is left to the registry.
 */
export function validateMarketRequest(body: RequestBody): MarketRequestValidation {
  const errors: string[] = [];
  const attempt = <T>(parse: () => T): T | undefined => {
    try {
      return parse();
    } catch (error) {
      const invalid = error instanceof RequestError || (isMarketError(error) && error.kind === 'validation');
      if (!invalid || !(error instanceof Error)) throw error;
      errors.push(error.message);
      return undefined;
    }
  };

  const creator = attempt(() => parsePublicKey(body.creator, 'creator'));
  const question = attempt(() => parseString(body.question, 'question'));
  const poolTier = attempt(() => tierFromName(parseString(body.poolTier, 'poolTier')));
  const resolutionSource = attempt(() =>
    resolutionSourceFromName(body.resolutionSource === undefined ? 'CREATOR_RESOLVE' : parseString(body.resolutionSource, 'resolutionSource'))
  );
  const betDeadline = attempt(() => parseTimestamp(body.betDeadline, 'betDeadline'));
  const revealDeadline = attempt(() => parseTimestamp(body.revealDeadline, 'revealDeadline'));
  const disputeDeadline = attempt(() => parseTimestamp(body.disputeDeadline, 'disputeDeadline'));
  const assetIndex = attempt(() => parseField(body.assetIndex ?? 0, 'assetIndex'));
  const targetPrice = attempt(() => parseField(body.targetPrice ?? 0, 'targetPrice'));

  if (
    creator === undefined ||
    question === undefined ||
    poolTier === undefined ||
    resolutionSource === undefined ||
    betDeadline === undefined ||
    revealDeadline === undefined ||
    disputeDeadline === undefined ||
    assetIndex === undefined ||
    targetPrice === undefined
  ) {
    return { valid: false, errors };
  }

  return {
    valid: true,
    errors: [],
    request: {
      creator,
      question,
      poolTier,
      resolutionSource,
      betDeadline,
      revealDeadline,
      disputeDeadline,
      assetIndex,
      targetPrice,
    },
  };
}

export class MarketService {
  readonly protocol: LocalProtocol;
  private readonly store: MarketStore;

  constructor(options: MarketServiceOptions) {
    this.protocol = options.protocol;
    this.store = options.store;
  }

  // ========== Pool ==========

  getPool(tier: Field): Promise<PoolView> {
    const { ledger, pool } = this.protocol;
    return ledger.read(() => ({
      tier: tierName(tier),
      root: pool.getMerkleRoot(tier).toString(),
      depositCount: pool.getDepositCount(tier).toString(),
      amount: pool.getTierAmount(tier).toString(),
      reserve: pool.getReserve(tier).toString(),
    }));
  }

  getLeaf(tier: Field, index: bigint): Promise<string> {
    const { ledger, pool } = this.protocol;
    return ledger.read(() => pool.getLeaf(tier, index).toString());
  }

  /**
   * Authentication path of a leaf together with the root it leads to
   */
  getPath(tier: Field, index: bigint): Promise<PathView> {
    const { ledger, pool } = this.protocol;
    return ledger.read(() => {
      const path = pool.getMerklePath(tier, index);
      return {
        root: pool.getMerkleRoot(tier).toString(),
        siblings: path.siblings.map((sibling) => sibling.toString()),
        isLeft: path.isLeft,
      };
    });
  }

  /**
   * Mints the tier stake to the sender and deposits it in one transaction
   * (the local ledger's faucet)
   */
  async deposit(sender: PublicKey, commitment: Field, tier: Field): Promise<bigint> {
    const leafIndex = await depositWithFaucet(this.protocol, sender, commitment, tier);

    console.log(`  Deposit #${leafIndex} into ${tierName(tier)} pool`);
    return leafIndex;
  }

  // ========== Markets ==========

  async createMarket(request: MarketCreateRequest): Promise<MarketView> {
    const market = await deployMarket(this.protocol, {
      creator: request.creator,
      question: request.question,
      betDeadline: UInt64.from(request.betDeadline),
      revealDeadline: UInt64.from(request.revealDeadline),
      disputeDeadline: UInt64.from(request.disputeDeadline),
      resolutionSource: request.resolutionSource,
      poolTier: request.poolTier,
      assetIndex: request.assetIndex,
      targetPrice: request.targetPrice,
    });

    const record = this.describe(market);
    await this.store.saveMarket(record);
    console.log(`  Market #${record.marketId} created: "${record.question}"`);
    return this.view(market, record);
  }

  async getMarket(marketId: number): Promise<MarketView> {
    const stored = await this.store.getMarket(marketId);
    return this.protocol.ledger.read(() => {
      const market = this.market(marketId);
      return this.view(market, stored ?? this.describe(market));
    });
  }

  async listMarkets(): Promise<MarketData[]> {
    return this.store.getAllMarkets();
  }

  async placeBet(marketId: number, sender: PublicKey, proof: string, commitment: Field, nullifier: Field) {
    const market = this.market(marketId);
    await this.protocol.ledger.transaction(sender, () => market.placeBet(proof, commitment, nullifier));
  }

  async revealBet(marketId: number, sender: PublicKey, commitment: Field, outcome: Field, nonce: Field) {
    const market = this.market(marketId);
    await this.protocol.ledger.transaction(sender, () => market.revealBet(commitment, outcome, nonce));
  }

  async resolve(marketId: number, sender: PublicKey, outcome: Field = OUTCOME.PENDING): Promise<string> {
    const market = this.market(marketId);
    const resolved = await this.protocol.ledger.transaction(sender, () => market.resolve(outcome));

    const name = outcomeName(resolved);
    await this.store.updateMarketStatus(marketId, 'RESOLVED', name);
    console.log(`  Market #${marketId} resolved: ${name}`);
    return name;
  }

  async claim(marketId: number, sender: PublicKey, proof: string, commitment: Field, recipient: PublicKey): Promise<string> {
    const market = this.market(marketId);
    const payout = await this.protocol.ledger.transaction(sender, () => market.claim(proof, commitment, recipient));
    return payout.toString();
  }

  async dispute(marketId: number, sender: PublicKey) {
    const market = this.market(marketId);
    await this.protocol.ledger.transaction(sender, () => market.dispute());

    await this.store.updateMarketStatus(marketId, 'DISPUTED');
    console.log(`  Market #${marketId} disputed`);
  }

  /**
   * Writes pending time-triggered transitions for every market and mirrors
   * them into the store.
   *
   * @returns number of markets whose stored status changed
   */
  async advanceStatuses(): Promise<number> {
    const { ledger, registry, deployer } = this.protocol;
    let transitioned = 0;

    for (const market of registry.getAllMarkets()) {
      const marketId = Number(market.marketId.toBigInt());
      const status = statusName(await ledger.transaction(deployer, () => market.advanceStatus()));
      const record = await this.store.getMarket(marketId);

      if (record && record.status !== status) {
        await this.store.updateMarketStatus(marketId, status);
        console.log(`    Market #${marketId} → ${status}`);
        transitioned++;
      }
    }

    return transitioned;
  }

  private market(marketId: number): Market {
    return this.protocol.registry.getMarket(Field(marketId));
  }

  private describe(market: Market): MarketData {
    const { config } = market;
    const info = this.protocol.registry.getMarketInfo(market.marketId);
    return {
      marketId: Number(market.marketId.toBigInt()),
      marketAddress: market.address.toBase58(),
      creator: config.creator.toBase58(),
      question: market.question,
      poolTier: tierName(config.poolTier),
      resolutionSource: resolutionSourceName(config.resolutionSource),
      assetIndex: Number(config.assetIndex.toBigInt()),
      targetPrice: config.targetPrice.toString(),
      betDeadline: Number(config.betDeadline.toBigInt()),
      revealDeadline: Number(config.revealDeadline.toBigInt()),
      disputeDeadline: Number(config.disputeDeadline.toBigInt()),
      status: statusName(market.getStatus()),
      outcome: outcomeName(market.getResolvedOutcome()),
      createdAt: new Date(Number(info.createdAt.toBigInt())).toISOString(),
    };
  }

  private view(market: Market, record: MarketData): MarketView {
    const totals = market.getTotals();
    const settlement = market.getSettlement();
    return {
      ...record,
      status: statusName(market.getStatus()),
      outcome: outcomeName(market.getResolvedOutcome()),
      totals: {
        totalBets: totals.totalBets.toString(),
        totalRevealed: totals.totalRevealed.toString(),
        yesCount: totals.yesCount.toString(),
        noCount: totals.noCount.toString(),
        forfeitedCount: totals.forfeitedCount.toString(),
      },
      settlement: {
        totalPool: settlement.totalPool.toString(),
        winnerCount: settlement.winnerCount.toString(),
        payoutPerWinner: settlement.payoutPerWinner.toString(),
        undistributed: settlement.undistributed.toString(),
      },
    };
  }
}

