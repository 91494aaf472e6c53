/**
 * Local protocol deployment
 *
 * Stands up a ledger with a token, a registry, the pool it owns, mock
 * verifiers and a mock price feed. Used by tests and by the backend in local
 * mode.
 */

import { PrivateKey, PublicKey, Field, UInt64 } from 'o1js';
import { Ledger } from '../utils/Ledger.js';
import { FungibleToken } from '../contracts/FungibleToken.js';
import { AnonymityPool } from '../contracts/AnonymityPool.js';
import { MarketRegistry } from '../contracts/MarketRegistry.js';
import type { Market } from '../contracts/Market.js';
import { MockVerifier } from '../utils/MockVerifier.js';
import { MockPriceFeed } from '../utils/MockPriceFeed.js';
import { MarketConfig } from '../types/MarketConfig.js';
import { TIER_AMOUNTS, TREE_DEPTH, tierIndex } from '../types/Constants.js';

export interface LocalDeployConfig {
  depth?: number;
  /** Manual clock start (ms); omit for the system clock */
  timestamp?: number | bigint;
}

export interface LocalProtocol {
  ledger: Ledger;
  deployer: PublicKey;
  token: FungibleToken;
  registry: MarketRegistry;
  pool: AnonymityPool;
  membershipVerifier: MockVerifier;
  claimVerifier: MockVerifier;
  priceFeed: MockPriceFeed;
}

export function deployLocalProtocol(config: LocalDeployConfig = {}): LocalProtocol {
  const ledger = new Ledger({ timestamp: config.timestamp });
  const deployer = PrivateKey.random().toPublicKey();

  const token = new FungibleToken(ledger, { owner: deployer });
  const registry = new MarketRegistry(ledger);
  const pool = new AnonymityPool(ledger, {
    owner: registry.address,
    token,
    depth: config.depth ?? TREE_DEPTH,
  });

  return {
    ledger,
    deployer,
    token,
    registry,
    pool,
    membershipVerifier: new MockVerifier(),
    claimVerifier: new MockVerifier(),
    priceFeed: new MockPriceFeed(),
  };
}

export function createTestAccounts(count: number): PublicKey[] {
  return Array.from({ length: count }, () => PrivateKey.random().toPublicKey());
}

/**
 * Mints `amount` to `account` and approves the pool to pull it
 */
export async function fundAccount(protocol: LocalProtocol, account: PublicKey, amount: UInt64) {
  const { ledger, deployer, token, pool } = protocol;
  await ledger.transaction(deployer, () => token.mint(account, amount));
  await ledger.transaction(account, () => token.approve(pool.address, amount));
}

/**
 * Mints one tier stake to the sender and deposits it, all in one transaction.
 * Local-mode faucet: a failed deposit leaves nothing minted.
 *
 * @returns leaf index of the deposit
 */
export function depositWithFaucet(
  protocol: LocalProtocol,
  sender: PublicKey,
  commitment: Field,
  tier: Field
): Promise<bigint> {
  const { ledger, deployer, token, pool } = protocol;
  const amount = TIER_AMOUNTS[tierIndex(tier)];

  return ledger.transaction(sender, async () => {
    await ledger.call(deployer, () => token.mint(sender, amount));
    await token.approve(pool.address, token.allowance(sender, pool.address).add(amount));
    return pool.deposit(commitment, tier);
  });
}

export interface MarketDeployConfig {
  creator: PublicKey;
  question: string;
  betDeadline: UInt64;
  revealDeadline: UInt64;
  disputeDeadline: UInt64;
  resolutionSource: Field;
  poolTier: Field;
  assetIndex?: Field;
  targetPrice?: Field;
}

export function buildMarketConfig(config: MarketDeployConfig): MarketConfig {
  return new MarketConfig({
    creator: config.creator,
    betDeadline: config.betDeadline,
    revealDeadline: config.revealDeadline,
    disputeDeadline: config.disputeDeadline,
    resolutionSource: config.resolutionSource,
    poolTier: config.poolTier,
    assetIndex: config.assetIndex ?? Field(0),
    targetPrice: config.targetPrice ?? Field(0),
  });
}

/**
 * Creates a market through the registry, signed by its creator
 */
export function deployMarket(protocol: LocalProtocol, config: MarketDeployConfig): Promise<Market> {
  const { ledger, registry, pool, membershipVerifier, claimVerifier, token, priceFeed } = protocol;

  return ledger.transaction(config.creator, () =>
    registry.createMarket({
      config: buildMarketConfig(config),
      question: config.question,
      pool,
      membershipVerifier,
      claimVerifier,
      token,
      priceFeed,
    })
  );
}
