/**
 * MarketRegistry Contract Tests
 *
 * Tests for the market factory and index
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { Field, PublicKey, UInt64 } from 'o1js';
import { MarketRegistry } from './MarketRegistry.js';
import { AnonymityPool } from './AnonymityPool.js';
import {
  type LocalProtocol,
  type MarketDeployConfig,
  buildMarketConfig,
  createTestAccounts,
  deployLocalProtocol,
  deployMarket,
} from '../deploy/deploy-local.js';
import { MarketError, type ErrorCode } from '../utils/MarketError.js';
import { POOL_TIER, RESOLUTION_SOURCE } from '../types/Constants.js';

const START = 50_000;

function failsWith(code: ErrorCode) {
  return (error: unknown) => error instanceof MarketError && error.code === code;
}

describe('MarketRegistry', () => {
  let protocol: LocalProtocol;
  let creator: PublicKey;
  let other: PublicKey;

  function marketConfig(overrides: Partial<MarketDeployConfig> = {}): MarketDeployConfig {
    return {
      creator,
      question: 'Will it rain tomorrow?',
      betDeadline: UInt64.from(START + 100),
      revealDeadline: UInt64.from(START + 200),
      disputeDeadline: UInt64.from(START + 300),
      resolutionSource: RESOLUTION_SOURCE.CREATOR_RESOLVE,
      poolTier: POOL_TIER.SMALL,
      ...overrides,
    };
  }

  beforeEach(() => {
    protocol = deployLocalProtocol({ depth: 3, timestamp: START });
    [creator, other] = createTestAccounts(2);
  });

  describe('Market creation', () => {
    it('should assign sequential ids and record metadata', async () => {
      const first = await deployMarket(protocol, marketConfig());
      const second = await deployMarket(protocol, marketConfig({ question: 'Second?', poolTier: POOL_TIER.LARGE }));

      assert.ok(first.marketId.equals(Field(0)).toBoolean());
      assert.ok(second.marketId.equals(Field(1)).toBoolean());
      assert.strictEqual(protocol.registry.getMarketCount(), 2n);

      const info = protocol.registry.getMarketInfo(Field(1));
      assert.ok(info.marketAddress.equals(second.address).toBoolean());
      assert.ok(info.creator.equals(creator).toBoolean());
      assert.ok(info.poolTier.equals(POOL_TIER.LARGE).toBoolean());
      assert.strictEqual(info.createdAt.toBigInt(), BigInt(START));
      assert.strictEqual(protocol.registry.getQuestion(Field(1)), 'Second?');
      assert.strictEqual(protocol.registry.getMarket(Field(0)), first);
    });

    it('should emit a creation event', async () => {
      await deployMarket(protocol, marketConfig());

      const [event] = protocol.registry.fetchEvents('market-created');
      assert.ok(event.marketId.equals(Field(0)).toBoolean());
      assert.ok(event.creator.equals(creator).toBoolean());
      assert.strictEqual(event.timestamp.toBigInt(), BigInt(START));
    });

    it('should authorize new markets on a pool it owns', async () => {
      const market = await deployMarket(protocol, marketConfig());
      assert.strictEqual(protocol.pool.isAuthorized(market.address), true);
    });

    it('should leave authorization to the owner of a foreign pool', async () => {
      const foreignPool = new AnonymityPool(protocol.ledger, { owner: other, token: protocol.token, depth: 3 });
      const config = marketConfig();
      const market = await protocol.ledger.transaction(creator, () =>
        protocol.registry.createMarket({
          config: buildMarketConfig(config),
          question: config.question,
          pool: foreignPool,
          membershipVerifier: protocol.membershipVerifier,
          claimVerifier: protocol.claimVerifier,
          token: protocol.token,
        })
      );
      assert.strictEqual(foreignPool.isAuthorized(market.address), false);
    });

    it('should trim the question and reject an empty one', async () => {
      const market = await deployMarket(protocol, marketConfig({ question: '  Padded?  ' }));
      assert.strictEqual(market.question, 'Padded?');

      await assert.rejects(deployMarket(protocol, marketConfig({ question: '   ' })), failsWith('EMPTY_QUESTION'));
      assert.strictEqual(protocol.registry.getMarketCount(), 1n);
    });
  });

  describe('Validation', () => {
    it('should reject deadlines out of order', async () => {
      await assert.rejects(
        deployMarket(protocol, marketConfig({ betDeadline: UInt64.from(START) })),
        failsWith('DEADLINE_ORDER')
      );
      await assert.rejects(
        deployMarket(protocol, marketConfig({ revealDeadline: UInt64.from(START + 100) })),
        failsWith('DEADLINE_ORDER')
      );
      await assert.rejects(
        deployMarket(protocol, marketConfig({ disputeDeadline: UInt64.from(START + 150) })),
        failsWith('DEADLINE_ORDER')
      );
      assert.strictEqual(protocol.registry.getMarketCount(), 0n);
    });

    it('should reject unknown tiers and resolution sources', async () => {
      await assert.rejects(deployMarket(protocol, marketConfig({ poolTier: Field(3) })), failsWith('UNKNOWN_TIER'));
      await assert.rejects(
        deployMarket(protocol, marketConfig({ resolutionSource: Field(2) })),
        failsWith('INVALID_RESOLUTION_SOURCE')
      );
    });

    it('should require the creator to sign', async () => {
      const config = marketConfig();
      await assert.rejects(
        protocol.ledger.transaction(other, () =>
          protocol.registry.createMarket({
            config: buildMarketConfig(config),
            question: config.question,
            pool: protocol.pool,
            membershipVerifier: protocol.membershipVerifier,
            claimVerifier: protocol.claimVerifier,
            token: protocol.token,
          })
        ),
        failsWith('NOT_CREATOR')
      );
    });

    it('should not keep a market from a failed creation', async () => {
      await assert.rejects(deployMarket(protocol, marketConfig({ question: '' })), failsWith('EMPTY_QUESTION'));

      assert.throws(() => protocol.registry.getMarket(Field(0)), failsWith('UNKNOWN_MARKET'));
      assert.strictEqual(protocol.registry.fetchEvents('market-created').length, 0);
      assert.deepStrictEqual(protocol.registry.getAllMarkets(), []);
    });
  });

  it('should be constructible on its own ledger address', () => {
    const registry = new MarketRegistry(protocol.ledger);
    assert.strictEqual(protocol.ledger.hasContract(registry.address), true);
    assert.strictEqual(registry.getMarketCount(), 0n);
  });
});
