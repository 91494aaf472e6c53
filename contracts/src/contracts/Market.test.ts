/**
 * Market Contract Tests
 *
 * Full lifecycle against a local protocol: deposit, anonymous bet, reveal,
 * resolve, claim, dispute.
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { Field, PublicKey, UInt64 } from 'o1js';
import type { Market } from './Market.js';
import {
  type LocalProtocol,
  createTestAccounts,
  deployLocalProtocol,
  deployMarket,
  depositWithFaucet,
} from '../deploy/deploy-local.js';
import { MarketError, type ErrorCode } from '../utils/MarketError.js';
import { MockVerifier } from '../utils/MockVerifier.js';
import { MembershipPublicInputs, ClaimPublicInputs } from '../utils/ProofVerifier.js';
import { ASSET_INDEX, scalePrice } from '../utils/PriceFeed.js';
import { Note, betCommitment } from '../utils/Commitments.js';
import { MARKET_STATUS, OUTCOME, POOL_TIER, RESOLUTION_SOURCE } from '../types/Constants.js';

const START = 1_000_000;
const BET_DEADLINE = START + 1_000;
const REVEAL_DEADLINE = START + 2_000;
const DISPUTE_DEADLINE = START + 3_000;

function failsWith(code: ErrorCode) {
  return (error: unknown) => error instanceof MarketError && error.code === code;
}

type MembershipOverrides = Partial<Pick<MembershipPublicInputs, 'merkleRoot' | 'nullifier' | 'betCommitment' | 'marketId'>>;
type ClaimOverrides = Partial<Pick<ClaimPublicInputs, 'betCommitment' | 'winningOutcome' | 'marketId' | 'nullifier'>>;

interface Bettor {
  note: Note;
  outcome: Field;
  nonce: Field;
  commitment: Field;
}

describe('Market', () => {
  let protocol: LocalProtocol;
  let creator: PublicKey;
  let relayer: PublicKey;
  let market: Market;

  async function createMarket(resolutionSource: Field = RESOLUTION_SOURCE.CREATOR_RESOLVE): Promise<Market> {
    return deployMarket(protocol, {
      creator,
      question: 'Will the test pass?',
      betDeadline: UInt64.from(BET_DEADLINE),
      revealDeadline: UInt64.from(REVEAL_DEADLINE),
      disputeDeadline: UInt64.from(DISPUTE_DEADLINE),
      resolutionSource,
      poolTier: POOL_TIER.MEDIUM,
      assetIndex: ASSET_INDEX.MINA,
      targetPrice: scalePrice(2),
    });
  }

  /**
   * Deposits a fresh note and seals a bet on `outcome`
   */
  async function newBettor(outcome: Field): Promise<Bettor> {
    const note = Note.random();
    const [depositor] = createTestAccounts(1);
    await depositWithFaucet(protocol, depositor, note.commitment(), POOL_TIER.MEDIUM);
    const nonce = Field.random();
    return { note, outcome, nonce, commitment: betCommitment(outcome, nonce) };
  }

  function membershipProof(bettor: Bettor, overrides: MembershipOverrides = {}): string {
    return MockVerifier.membershipProof(
      new MembershipPublicInputs({
        merkleRoot: protocol.pool.getMerkleRoot(POOL_TIER.MEDIUM),
        nullifier: bettor.note.nullifier(market.marketId),
        betCommitment: bettor.commitment,
        marketId: market.marketId,
        ...overrides,
      })
    );
  }

  function claimProof(bettor: Bettor, overrides: ClaimOverrides = {}): string {
    return MockVerifier.claimProof(
      new ClaimPublicInputs({
        betCommitment: bettor.commitment,
        winningOutcome: bettor.outcome,
        marketId: market.marketId,
        nullifier: bettor.note.claimNullifier(market.marketId),
        ...overrides,
      })
    );
  }

  function placeBet(bettor: Bettor, proof = membershipProof(bettor)) {
    return protocol.ledger.transaction(relayer, () =>
      market.placeBet(proof, bettor.commitment, bettor.note.nullifier(market.marketId))
    );
  }

  function reveal(bettor: Bettor) {
    return protocol.ledger.transaction(relayer, () => market.revealBet(bettor.commitment, bettor.outcome, bettor.nonce));
  }

  function resolve(outcome: Field, sender: PublicKey = creator) {
    return protocol.ledger.transaction(sender, () => market.resolve(outcome));
  }

  function claim(bettor: Bettor, recipient: PublicKey, proof = claimProof(bettor)) {
    return protocol.ledger.transaction(relayer, () => market.claim(proof, bettor.commitment, recipient));
  }

  function moveTo(timestamp: number) {
    protocol.ledger.setTimestamp(timestamp);
  }

  beforeEach(async () => {
    protocol = deployLocalProtocol({ depth: 4, timestamp: START });
    [creator, relayer] = createTestAccounts(2);
    market = await createMarket();
  });

  describe('Betting', () => {
    it('should record a sealed bet and spend its nullifier', async () => {
      const bettor = await newBettor(OUTCOME.YES);
      await placeBet(bettor);

      const bet = market.getBet(bettor.commitment);
      assert.ok(bet !== undefined);
      assert.strictEqual(bet.revealed.toBoolean(), false);
      assert.ok(bet.outcome.equals(OUTCOME.PENDING).toBoolean());
      assert.strictEqual(market.getTotals().totalBets.toBigInt(), 1n);
      assert.strictEqual(protocol.pool.isNullifierUsed(bettor.note.nullifier(market.marketId)).toBoolean(), true);
      assert.strictEqual(protocol.token.balanceOf(market.address).toBigInt(), 100n);
    });

    it('should emit only the commitment and time of a bet', async () => {
      const bettor = await newBettor(OUTCOME.NO);
      await placeBet(bettor);

      const [event] = market.fetchEvents('bet-placed');
      assert.ok(event.commitment.equals(bettor.commitment).toBoolean());
      assert.strictEqual(event.timestamp.toBigInt(), BigInt(START));
    });

    it('should reject a replayed nullifier and leave state unchanged', async () => {
      const bettor = await newBettor(OUTCOME.YES);
      await placeBet(bettor);

      const replay: Bettor = { ...bettor, nonce: Field(123), commitment: betCommitment(OUTCOME.NO, Field(123)) };
      await assert.rejects(placeBet(replay), failsWith('NULLIFIER_USED'));
      assert.strictEqual(market.getTotals().totalBets.toBigInt(), 1n);
      assert.strictEqual(market.getBet(replay.commitment), undefined);
      assert.strictEqual(protocol.token.balanceOf(market.address).toBigInt(), 100n);
    });

    it('should reject a duplicate bet commitment', async () => {
      const bettor = await newBettor(OUTCOME.YES);
      await placeBet(bettor);
      const other = await newBettor(OUTCOME.YES);

      const copy: Bettor = { ...other, commitment: bettor.commitment };
      await assert.rejects(placeBet(copy), failsWith('DUPLICATE_COMMITMENT'));
    });

    it('should reject the zero bet commitment', async () => {
      const bettor = await newBettor(OUTCOME.YES);
      await assert.rejects(placeBet({ ...bettor, commitment: Field(0) }), failsWith('ZERO_COMMITMENT'));
    });

    it('should reject proofs against a stale root', async () => {
      const bettor = await newBettor(OUTCOME.YES);
      const proof = membershipProof(bettor);
      await newBettor(OUTCOME.NO);

      await assert.rejects(placeBet(bettor, proof), failsWith('ROOT_MISMATCH'));
    });

    it('should reject proofs whose public inputs disagree with the call', async () => {
      const bettor = await newBettor(OUTCOME.YES);

      await assert.rejects(placeBet(bettor, membershipProof(bettor, { nullifier: Field(1) })), failsWith('NULLIFIER_MISMATCH'));
      await assert.rejects(
        placeBet(bettor, membershipProof(bettor, { betCommitment: Field(1) })),
        failsWith('COMMITMENT_MISMATCH')
      );
      await assert.rejects(placeBet(bettor, membershipProof(bettor, { marketId: Field(9) })), failsWith('MARKET_ID_MISMATCH'));
      assert.strictEqual(market.getTotals().totalBets.toBigInt(), 0n);
    });

    it('should surface verifier failures as proof rejections', async () => {
      const bettor = await newBettor(OUTCOME.YES);
      protocol.membershipVerifier.setRejecting(true);
      await assert.rejects(placeBet(bettor), failsWith('PROOF_REJECTED'));

      protocol.membershipVerifier.setRejecting(false);
      await assert.rejects(placeBet(bettor, MockVerifier.encode([Field(1), Field(2), Field(3)])), failsWith('INVALID_PUBLIC_INPUTS'));
      await assert.rejects(placeBet(bettor, 'not json'), failsWith('INVALID_PROOF_FORMAT'));
    });

    it('should reject bets after the bet deadline', async () => {
      const bettor = await newBettor(OUTCOME.YES);
      moveTo(BET_DEADLINE + 1);
      await assert.rejects(placeBet(bettor), failsWith('WRONG_STATUS'));
    });

    it('should still accept bets exactly at the bet deadline', async () => {
      const bettor = await newBettor(OUTCOME.YES);
      moveTo(BET_DEADLINE);
      await placeBet(bettor);
      assert.strictEqual(market.getTotals().totalBets.toBigInt(), 1n);
    });

    it('should let one note draw on the shared reserve in several markets', async () => {
      const roaming = await newBettor(OUTCOME.YES);
      await placeBet(roaming);

      market = await createMarket();
      const honest = await newBettor(OUTCOME.NO);
      await placeBet(roaming);
      assert.strictEqual(protocol.pool.getReserve(POOL_TIER.MEDIUM).toBigInt(), 0n);

      // The honest depositor's stake already backs the roaming note's second bet
      await assert.rejects(placeBet(honest), failsWith('RESERVE_EXHAUSTED'));
      assert.strictEqual(market.getBet(honest.commitment), undefined);
      assert.strictEqual(protocol.pool.isNullifierUsed(honest.note.nullifier(market.marketId)).toBoolean(), false);
    });
  });

  describe('Revealing', () => {
    it('should open a bet with its outcome and nonce', async () => {
      const bettor = await newBettor(OUTCOME.NO);
      await placeBet(bettor);
      moveTo(BET_DEADLINE + 1);
      await reveal(bettor);

      const bet = market.getBet(bettor.commitment);
      assert.ok(bet !== undefined);
      assert.strictEqual(bet.revealed.toBoolean(), true);
      assert.ok(bet.outcome.equals(OUTCOME.NO).toBoolean());

      const totals = market.getTotals();
      assert.strictEqual(totals.totalRevealed.toBigInt(), 1n);
      assert.strictEqual(totals.yesCount.toBigInt(), 0n);
      assert.strictEqual(totals.noCount.toBigInt(), 1n);
    });

    it('should reject reveals while betting is open', async () => {
      const bettor = await newBettor(OUTCOME.YES);
      await placeBet(bettor);
      await assert.rejects(reveal(bettor), failsWith('WRONG_STATUS'));
    });

    it('should reject a second reveal', async () => {
      const bettor = await newBettor(OUTCOME.YES);
      await placeBet(bettor);
      moveTo(BET_DEADLINE + 1);
      await reveal(bettor);

      await assert.rejects(reveal(bettor), failsWith('ALREADY_REVEALED'));
      assert.strictEqual(market.getTotals().yesCount.toBigInt(), 1n);
    });

    it('should reject a wrong nonce', async () => {
      const bettor = await newBettor(OUTCOME.YES);
      await placeBet(bettor);
      moveTo(BET_DEADLINE + 1);

      await assert.rejects(reveal({ ...bettor, nonce: bettor.nonce.add(1) }), failsWith('COMMITMENT_MISMATCH'));
      await assert.rejects(reveal({ ...bettor, outcome: OUTCOME.NO }), failsWith('COMMITMENT_MISMATCH'));
    });

    it('should reject a PENDING outcome and unknown bets', async () => {
      const bettor = await newBettor(OUTCOME.YES);
      await placeBet(bettor);
      moveTo(BET_DEADLINE + 1);

      await assert.rejects(reveal({ ...bettor, outcome: OUTCOME.PENDING }), failsWith('INVALID_OUTCOME'));
      await assert.rejects(reveal({ ...bettor, commitment: Field(5) }), failsWith('UNKNOWN_BET'));
    });
  });

  describe('Status', () => {
    it('should move forward only, driven by time and resolution', async () => {
      const seen: string[] = [];
      const record = () => seen.push(market.getStatus().toString());

      record();
      moveTo(BET_DEADLINE + 1);
      record();
      moveTo(REVEAL_DEADLINE + 1);
      record();
      await resolve(OUTCOME.YES);
      record();
      moveTo(START);
      record();

      assert.deepStrictEqual(seen, ['0', '1', '2', '3', '3']);
    });

    it('should persist time-triggered transitions through advanceStatus', async () => {
      moveTo(REVEAL_DEADLINE + 1);
      const status = await protocol.ledger.transaction(relayer, () => market.advanceStatus());
      assert.ok(status.equals(MARKET_STATUS.RESOLVING).toBoolean());

      moveTo(START);
      assert.ok(market.getStatus().equals(MARKET_STATUS.RESOLVING).toBoolean());
    });
  });

  describe('Resolution', () => {
    it('should only resolve after the reveal deadline', async () => {
      moveTo(BET_DEADLINE + 1);
      await assert.rejects(resolve(OUTCOME.YES), failsWith('WRONG_STATUS'));
    });

    it('should only let the creator resolve', async () => {
      moveTo(REVEAL_DEADLINE + 1);
      await assert.rejects(resolve(OUTCOME.YES, relayer), failsWith('NOT_CREATOR'));
    });

    it('should reject PENDING as a resolution', async () => {
      moveTo(REVEAL_DEADLINE + 1);
      await assert.rejects(resolve(OUTCOME.PENDING), failsWith('INVALID_OUTCOME'));
    });

    it('should resolve only once', async () => {
      moveTo(REVEAL_DEADLINE + 1);
      await resolve(OUTCOME.NO);
      await assert.rejects(resolve(OUTCOME.YES), failsWith('WRONG_STATUS'));
      assert.ok(market.getResolvedOutcome().equals(OUTCOME.NO).toBoolean());
    });

    it('should resolve oracle markets from the price feed for any caller', async () => {
      market = await createMarket(RESOLUTION_SOURCE.ORACLE_FEED);
      moveTo(REVEAL_DEADLINE + 1);

      await assert.rejects(resolve(OUTCOME.YES, relayer), failsWith('ORACLE_UNAVAILABLE'));

      protocol.priceFeed.setPrice(ASSET_INDEX.MINA, scalePrice(1));
      const outcome = await resolve(OUTCOME.YES, relayer);
      assert.ok(outcome.equals(OUTCOME.NO).toBoolean());

      const [event] = market.fetchEvents('market-resolved');
      assert.ok(event.source.equals(RESOLUTION_SOURCE.ORACLE_FEED).toBoolean());
    });

    it('should resolve YES when the price reaches the target', async () => {
      market = await createMarket(RESOLUTION_SOURCE.ORACLE_FEED);
      protocol.priceFeed.setPrice(ASSET_INDEX.MINA, scalePrice(2));
      moveTo(REVEAL_DEADLINE + 1);

      const outcome = await resolve(OUTCOME.PENDING, relayer);
      assert.ok(outcome.equals(OUTCOME.YES).toBoolean());
    });
  });

  describe('Claims', () => {
    async function runMarket(outcomes: Field[], revealCount: number, resolved: Field): Promise<Bettor[]> {
      const bettors: Bettor[] = [];
      for (const outcome of outcomes) {
        const bettor = await newBettor(outcome);
        await placeBet(bettor);
        bettors.push(bettor);
      }
      moveTo(BET_DEADLINE + 1);
      for (const bettor of bettors.slice(0, revealCount)) {
        await reveal(bettor);
      }
      moveTo(REVEAL_DEADLINE + 1);
      await resolve(resolved);
      return bettors;
    }

    it('should split the pool between the revealed winners', async () => {
      const [yes1, yes2, no] = await runMarket([OUTCOME.YES, OUTCOME.YES, OUTCOME.NO], 3, OUTCOME.YES);
      const [recipient1, recipient2, recipient3] = createTestAccounts(3);

      const settlement = market.getSettlement();
      assert.strictEqual(settlement.totalPool.toBigInt(), 300n);
      assert.strictEqual(settlement.winnerCount.toBigInt(), 2n);
      assert.strictEqual(settlement.payoutPerWinner.toBigInt(), 150n);

      assert.strictEqual((await claim(yes1, recipient1)).toBigInt(), 150n);
      assert.strictEqual((await claim(yes2, recipient2)).toBigInt(), 150n);
      await assert.rejects(claim(no, recipient3, claimProof(no, { winningOutcome: OUTCOME.YES })), failsWith('LOSING_BET'));

      assert.strictEqual(protocol.token.balanceOf(recipient1).toBigInt(), 150n);
      assert.strictEqual(protocol.token.balanceOf(recipient2).toBigInt(), 150n);
      assert.strictEqual(protocol.token.balanceOf(recipient3).toBigInt(), 0n);
      assert.strictEqual(protocol.token.balanceOf(market.address).toBigInt(), 0n);
    });

    it('should forfeit unrevealed stakes to the revealed winners', async () => {
      const bettors = await runMarket([OUTCOME.YES, OUTCOME.YES, OUTCOME.NO, OUTCOME.YES], 2, OUTCOME.YES);
      const [recipient] = createTestAccounts(1);

      const totals = market.getTotals();
      assert.strictEqual(totals.totalBets.toBigInt(), 4n);
      assert.strictEqual(totals.totalRevealed.toBigInt(), 2n);
      assert.strictEqual(totals.forfeitedCount.toBigInt(), 2n);
      assert.strictEqual(market.getSettlement().payoutPerWinner.toBigInt(), 200n);

      await assert.rejects(claim(bettors[3], recipient), failsWith('NOT_REVEALED'));
      assert.strictEqual((await claim(bettors[0], recipient)).toBigInt(), 200n);
    });

    it('should keep the whole pool when nobody wins', async () => {
      await runMarket([OUTCOME.YES, OUTCOME.YES], 2, OUTCOME.NO);

      const settlement = market.getSettlement();
      assert.strictEqual(settlement.payoutPerWinner.toBigInt(), 0n);
      assert.strictEqual(settlement.undistributed.toBigInt(), 200n);
      assert.strictEqual(protocol.token.balanceOf(market.address).toBigInt(), 200n);
    });

    it('should pay each winning bet once', async () => {
      const [winner] = await runMarket([OUTCOME.YES], 1, OUTCOME.YES);
      const [recipient] = createTestAccounts(1);

      await claim(winner, recipient);
      await assert.rejects(claim(winner, recipient), failsWith('ALREADY_CLAIMED'));
      assert.strictEqual(protocol.token.balanceOf(recipient).toBigInt(), 100n);
      assert.strictEqual(market.isClaimNullifierUsed(winner.note.claimNullifier(market.marketId)), true);
    });

    it('should refuse a reused claim nullifier', async () => {
      const [first, second] = await runMarket([OUTCOME.YES, OUTCOME.YES], 2, OUTCOME.YES);
      const [recipient] = createTestAccounts(1);

      await claim(first, recipient);
      const reused = claimProof(second, { nullifier: first.note.claimNullifier(market.marketId) });
      await assert.rejects(claim(second, recipient, reused), failsWith('NULLIFIER_USED'));

      const bet = market.getBet(second.commitment);
      assert.strictEqual(bet?.claimed.toBoolean(), false);
    });

    it('should check the claim proof against the bet, outcome and market', async () => {
      const [winner] = await runMarket([OUTCOME.YES], 1, OUTCOME.YES);
      const [recipient] = createTestAccounts(1);

      await assert.rejects(claim(winner, recipient, claimProof(winner, { betCommitment: Field(3) })), failsWith('COMMITMENT_MISMATCH'));
      await assert.rejects(claim(winner, recipient, claimProof(winner, { winningOutcome: OUTCOME.NO })), failsWith('OUTCOME_MISMATCH'));
      await assert.rejects(claim(winner, recipient, claimProof(winner, { marketId: Field(4) })), failsWith('MARKET_ID_MISMATCH'));

      protocol.claimVerifier.setRejecting(true);
      await assert.rejects(claim(winner, recipient), failsWith('PROOF_REJECTED'));
      assert.strictEqual(protocol.token.balanceOf(recipient).toBigInt(), 0n);
    });

    it('should not allow claims before resolution', async () => {
      const bettor = await newBettor(OUTCOME.YES);
      await placeBet(bettor);
      moveTo(BET_DEADLINE + 1);
      await reveal(bettor);

      await assert.rejects(claim(bettor, relayer), failsWith('WRONG_STATUS'));
    });
  });

  describe('Disputes', () => {
    it('should let anyone dispute within the window and freeze claims', async () => {
      const bettor = await newBettor(OUTCOME.YES);
      await placeBet(bettor);
      moveTo(BET_DEADLINE + 1);
      await reveal(bettor);
      moveTo(REVEAL_DEADLINE + 1);
      await resolve(OUTCOME.YES);

      await protocol.ledger.transaction(relayer, () => market.dispute());
      assert.ok(market.getStatus().equals(MARKET_STATUS.DISPUTED).toBoolean());
      await assert.rejects(claim(bettor, relayer), failsWith('WRONG_STATUS'));

      const [event] = market.fetchEvents('market-disputed');
      assert.ok(event.caller.equals(relayer).toBoolean());
    });

    it('should accept a dispute exactly at the deadline and not after', async () => {
      moveTo(REVEAL_DEADLINE + 1);
      await resolve(OUTCOME.NO);

      moveTo(DISPUTE_DEADLINE + 1);
      await assert.rejects(
        protocol.ledger.transaction(relayer, () => market.dispute()),
        failsWith('DISPUTE_WINDOW_CLOSED')
      );

      moveTo(DISPUTE_DEADLINE);
      await protocol.ledger.transaction(relayer, () => market.dispute());
      assert.ok(market.getStatus().equals(MARKET_STATUS.DISPUTED).toBoolean());
    });

    it('should reject disputes of unresolved or oracle markets', async () => {
      const oracleMarket = await createMarket(RESOLUTION_SOURCE.ORACLE_FEED);
      moveTo(REVEAL_DEADLINE + 1);
      await assert.rejects(
        protocol.ledger.transaction(relayer, () => market.dispute()),
        failsWith('WRONG_STATUS')
      );

      await assert.rejects(
        protocol.ledger.transaction(relayer, () => oracleMarket.dispute()),
        failsWith('DISPUTE_NOT_ALLOWED')
      );
    });
  });
});
