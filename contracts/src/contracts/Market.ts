/**
 * Market.ts - Anonymous commit-reveal prediction market
 *
 * Implements:
 * - Proof-gated betting: a bettor proves membership of a deposit in the
 *   pool's tier tree and spends a market-scoped nullifier
 * - Commit-reveal: bets are Poseidon(outcome, nonce) until the reveal phase
 * - Creator or oracle resolution, then parimutuel claims to any recipient
 * - A dispute window for creator-resolved markets
 *
 * Status is cached and advanced from the block timestamp at the start of
 * every action, so any call may move the market forward before its own
 * checks run:
 *
 *   OPEN --(now > betDeadline)--> REVEALING --(now > revealDeadline)--> RESOLVING
 *   RESOLVING --(resolve)--> RESOLVED --(dispute, creator-resolved only)--> DISPUTED
 */

import { PrivateKey, PublicKey, Field, UInt64 } from 'o1js';
import { Contract, type Ledger } from '../utils/Ledger.js';
import { StateMap } from '../utils/StateMap.js';
import { MarketError, assertThat } from '../utils/MarketError.js';
import { NullifierRegistry } from './NullifierRegistry.js';
import type { AnonymityPool } from './AnonymityPool.js';
import type { TokenInterface } from './FungibleToken.js';
import { type ProofVerifier, verifyMembershipProof, verifyClaimProof } from '../utils/ProofVerifier.js';
import { type PriceFeed, outcomeFromPrice } from '../utils/PriceFeed.js';
import { SettlementMath, type SettlementSummary } from '../utils/SettlementMath.js';
import { betCommitment } from '../utils/Commitments.js';
import { Bet } from '../types/Bet.js';
import type { MarketConfig } from '../types/MarketConfig.js';
import { EMPTY_LEAF, MARKET_STATUS, OUTCOME, statusName } from '../types/Constants.js';
import {
  BetPlacedEvent,
  BetRevealedEvent,
  MarketResolvedEvent,
  WinningsClaimedEvent,
  MarketDisputedEvent,
} from '../types/Events.js';

const marketEvents = {
  'bet-placed': BetPlacedEvent,
  'bet-revealed': BetRevealedEvent,
  'market-resolved': MarketResolvedEvent,
  'winnings-claimed': WinningsClaimedEvent,
  'market-disputed': MarketDisputedEvent,
};

export interface MarketOptions {
  marketId: Field;
  config: MarketConfig;
  question: string;
  pool: AnonymityPool;
  membershipVerifier: ProofVerifier;
  claimVerifier: ProofVerifier;
  token: TokenInterface;
  /** Required for ORACLE_FEED markets */
  priceFeed?: PriceFeed;
  address?: PublicKey;
}

export interface MarketTotals {
  totalBets: UInt64;
  totalRevealed: UInt64;
  yesCount: UInt64;
  noCount: UInt64;
  /** Unrevealed bets at resolution time; zero before */
  forfeitedCount: UInt64;
}

interface MarketState extends MarketTotals {
  status: Field;
  resolvedOutcome: Field;
}

export class Market extends Contract<typeof marketEvents> {
  readonly events = marketEvents;
  readonly marketId: Field;
  readonly config: MarketConfig;
  readonly question: string;

  private readonly pool: AnonymityPool;
  private readonly membershipVerifier: ProofVerifier;
  private readonly claimVerifier: ProofVerifier;
  private readonly token: TokenInterface;
  private readonly priceFeed: PriceFeed | undefined;

  private bets = new StateMap<Bet>();
  private claimNullifiers = new NullifierRegistry();
  private state: MarketState = {
    status: MARKET_STATUS.OPEN,
    resolvedOutcome: OUTCOME.PENDING,
    totalBets: UInt64.zero,
    totalRevealed: UInt64.zero,
    yesCount: UInt64.zero,
    noCount: UInt64.zero,
    forfeitedCount: UInt64.zero,
  };

  constructor(ledger: Ledger, options: MarketOptions) {
    super(ledger, options.address ?? PrivateKey.random().toPublicKey());
    this.marketId = options.marketId;
    this.config = options.config;
    this.question = options.question;
    this.pool = options.pool;
    this.membershipVerifier = options.membershipVerifier;
    this.claimVerifier = options.claimVerifier;
    this.token = options.token;
    this.priceFeed = options.priceFeed;
  }

  // ========== Status ==========

  /**
   * Status as of `at` (default: now), including time-triggered transitions
   * not yet written. Read-only.
   */
  getStatus(at: UInt64 = this.ledger.timestamp): Field {
    return this.deriveStatus(this.state.status, at);
  }

  /**
   * Writes any pending time-triggered transitions. Callable by anyone.
   */
  async advanceStatus(): Promise<Field> {
    return this.syncStatus();
  }

  // ========== Betting ==========

  /**
   * Places an anonymous bet.
   *
   * The membership proof's public inputs must be
   * [pool root for this tier, nullifier, betCommitment, marketId].
   */
  async placeBet(proof: string, commitment: Field, nullifier: Field) {
    const timestamp = this.timestamp;
    this.requireStatus(MARKET_STATUS.OPEN);

    assertThat(commitment.equals(EMPTY_LEAF).not(), 'ZERO_COMMITMENT');
    assertThat(!this.bets.has(commitment.toString()), 'DUPLICATE_COMMITMENT', commitment.toString());

    const inputs = await verifyMembershipProof(this.membershipVerifier, proof);
    const poolRoot = this.pool.getMerkleRoot(this.config.poolTier);
    assertThat(inputs.merkleRoot.equals(poolRoot), 'ROOT_MISMATCH');
    assertThat(inputs.nullifier.equals(nullifier), 'NULLIFIER_MISMATCH');
    assertThat(inputs.betCommitment.equals(commitment), 'COMMITMENT_MISMATCH', 'proof commits to another bet');
    assertThat(inputs.marketId.equals(this.marketId), 'MARKET_ID_MISMATCH');

    await this.invoke(() => this.pool.useNullifier(nullifier));
    await this.invoke(() => this.pool.releaseStake(this.config.poolTier));

    this.bets.set(commitment.toString(), Bet.placed(commitment));
    this.state = { ...this.state, totalBets: this.state.totalBets.add(1) };

    this.emitEvent('bet-placed', new BetPlacedEvent({ commitment, timestamp }));
  }

  /**
   * Opens a sealed bet. No proof needed: knowing (outcome, nonce) is the
   * authorization.
   */
  async revealBet(commitment: Field, outcome: Field, nonce: Field) {
    this.requireStatus(MARKET_STATUS.REVEALING);

    const bet = this.requireBet(commitment);
    assertThat(bet.revealed.not(), 'ALREADY_REVEALED');
    assertThat(isDecided(outcome), 'INVALID_OUTCOME', outcome.toString());
    assertThat(betCommitment(outcome, nonce).equals(commitment), 'COMMITMENT_MISMATCH', 'reveal does not open the bet');

    this.bets.set(commitment.toString(), bet.withReveal(outcome));
    const votedYes = outcome.equals(OUTCOME.YES).toBoolean();
    this.state = {
      ...this.state,
      totalRevealed: this.state.totalRevealed.add(1),
      yesCount: votedYes ? this.state.yesCount.add(1) : this.state.yesCount,
      noCount: votedYes ? this.state.noCount : this.state.noCount.add(1),
    };

    this.emitEvent('bet-revealed', new BetRevealedEvent({ commitment, outcome }));
  }

  // ========== Resolution ==========

  /**
   * CREATOR_RESOLVE: the creator supplies YES or NO.
   * ORACLE_FEED: anyone may call; the outcome comes from the price feed and
   * any supplied outcome is ignored.
   */
  async resolve(outcome: Field = OUTCOME.PENDING): Promise<Field> {
    const caller = this.caller;
    this.requireStatus(MARKET_STATUS.RESOLVING);

    let resolved: Field;
    if (this.config.usesCreatorResolve()) {
      assertThat(caller.equals(this.config.creator), 'NOT_CREATOR');
      resolved = outcome;
    } else {
      resolved = await this.readOracleOutcome();
    }
    assertThat(isDecided(resolved), 'INVALID_OUTCOME', resolved.toString());

    this.state = {
      ...this.state,
      status: MARKET_STATUS.RESOLVED,
      resolvedOutcome: resolved,
      forfeitedCount: this.state.totalBets.sub(this.state.totalRevealed),
    };

    this.emitEvent(
      'market-resolved',
      new MarketResolvedEvent({ outcome: resolved, source: this.config.resolutionSource })
    );
    return resolved;
  }

  async dispute() {
    const caller = this.caller;
    const timestamp = this.timestamp;
    this.syncStatus();

    assertThat(this.config.usesCreatorResolve(), 'DISPUTE_NOT_ALLOWED');
    this.requireStatus(MARKET_STATUS.RESOLVED);
    assertThat(timestamp.lessThanOrEqual(this.config.disputeDeadline), 'DISPUTE_WINDOW_CLOSED');

    this.state = { ...this.state, status: MARKET_STATUS.DISPUTED };
    this.emitEvent('market-disputed', new MarketDisputedEvent({ caller, timestamp }));
  }

  // ========== Claims ==========

  /**
   * Pays a winning bet to `recipient`, which needs no relation to the
   * depositor or the bettor.
   *
   * The claim proof's public inputs must be
   * [betCommitment, resolved outcome, marketId, claim nullifier].
   *
   * @returns the amount paid
   */
  async claim(proof: string, commitment: Field, recipient: PublicKey): Promise<UInt64> {
    this.requireStatus(MARKET_STATUS.RESOLVED);

    const bet = this.requireBet(commitment);
    assertThat(bet.revealed, 'NOT_REVEALED');
    assertThat(bet.claimed.not(), 'ALREADY_CLAIMED');
    assertThat(bet.isWinner(this.state.resolvedOutcome), 'LOSING_BET');

    const inputs = await verifyClaimProof(this.claimVerifier, proof);
    assertThat(inputs.betCommitment.equals(commitment), 'COMMITMENT_MISMATCH', 'proof claims another bet');
    assertThat(inputs.winningOutcome.equals(this.state.resolvedOutcome), 'OUTCOME_MISMATCH');
    assertThat(inputs.marketId.equals(this.marketId), 'MARKET_ID_MISMATCH');
    this.claimNullifiers.consume(inputs.nullifier);

    this.bets.set(commitment.toString(), bet.withClaim());

    const { payoutPerWinner } = this.getSettlement();
    if (payoutPerWinner.greaterThan(UInt64.zero).toBoolean()) {
      const paid = await this.invoke(() => this.token.transfer(recipient, payoutPerWinner));
      assertThat(paid, 'TOKEN_TRANSFER_FAILED', 'payout');
    }

    this.emitEvent('winnings-claimed', new WinningsClaimedEvent({ commitment, recipient }));
    return payoutPerWinner;
  }

  // ========== Reads ==========

  getBet(commitment: Field): Bet | undefined {
    return this.bets.get(commitment.toString());
  }

  getTotals(): MarketTotals {
    const { totalBets, totalRevealed, yesCount, noCount, forfeitedCount } = this.state;
    return { totalBets, totalRevealed, yesCount, noCount, forfeitedCount };
  }

  getResolvedOutcome(): Field {
    return this.state.resolvedOutcome;
  }

  isClaimNullifierUsed(nullifier: Field): boolean {
    return this.claimNullifiers.isUsed(nullifier).toBoolean();
  }

  getSettlement(): SettlementSummary {
    const { totalBets, resolvedOutcome, yesCount, noCount } = this.state;
    return SettlementMath.summarize(
      this.pool.getTierAmount(this.config.poolTier),
      totalBets,
      resolvedOutcome,
      yesCount,
      noCount
    );
  }

  checkpoint(): () => void {
    const restoreBets = this.bets.checkpoint();
    const restoreClaims = this.claimNullifiers.checkpoint();
    const state = this.state;

    return () => {
      restoreBets();
      restoreClaims();
      this.state = state;
    };
  }

  // ========== Internals ==========

  private deriveStatus(status: Field, now: UInt64): Field {
    let next = status;
    if (next.equals(MARKET_STATUS.OPEN).toBoolean() && now.greaterThan(this.config.betDeadline).toBoolean()) {
      next = MARKET_STATUS.REVEALING;
    }
    if (next.equals(MARKET_STATUS.REVEALING).toBoolean() && now.greaterThan(this.config.revealDeadline).toBoolean()) {
      next = MARKET_STATUS.RESOLVING;
    }
    return next;
  }

  private syncStatus(): Field {
    const status = this.deriveStatus(this.state.status, this.timestamp);
    this.state = { ...this.state, status };
    return status;
  }

  private requireStatus(expected: Field) {
    const status = this.syncStatus();
    assertThat(
      status.equals(expected),
      'WRONG_STATUS',
      `expected ${statusName(expected)}, market is ${statusName(status)}`
    );
  }

  private requireBet(commitment: Field): Bet {
    const bet = this.bets.get(commitment.toString());
    if (bet === undefined) {
      throw new MarketError('UNKNOWN_BET', commitment.toString());
    }
    return bet;
  }

  private async readOracleOutcome(): Promise<Field> {
    const feed = this.priceFeed;
    if (feed === undefined) {
      throw new MarketError('ORACLE_UNAVAILABLE', 'market has no price feed');
    }
    const price = await this.invoke(() => feed.getPrice(this.config.assetIndex));
    return outcomeFromPrice(price, this.config.targetPrice);
  }
}

function isDecided(outcome: Field): boolean {
  return outcome.equals(OUTCOME.YES).or(outcome.equals(OUTCOME.NO)).toBoolean();
}
