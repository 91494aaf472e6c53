/**
 * AnonymityPool.ts - Shared deposit pool behind every market
 *
 * Implements:
 * - One append-only commitment tree per tier (fixed deposit size per tier)
 * - A global nullifier set consumed by authorized markets
 * - Per-tier stake reserves that fund the markets' payouts
 *
 * Deposit events expose tier, leaf index and commitment only. Which market a
 * deposit later bets in is hidden behind the membership proof.
 */

import { PrivateKey, PublicKey, Field, UInt64, Bool } from 'o1js';
import { Contract, type Ledger } from '../utils/Ledger.js';
import { StateMap } from '../utils/StateMap.js';
import { assertThat } from '../utils/MarketError.js';
import { MerkleAccumulator, type MerklePath } from './MerkleAccumulator.js';
import { NullifierRegistry } from './NullifierRegistry.js';
import type { TokenInterface } from './FungibleToken.js';
import {
  EMPTY_LEAF,
  TIER_AMOUNTS,
  TIER_NAMES,
  TREE_DEPTH,
  tierIndex,
} from '../types/Constants.js';
import { DepositedEvent, NullifierUsedEvent, MarketAuthorizationEvent } from '../types/Events.js';

const poolEvents = {
  deposited: DepositedEvent,
  'nullifier-used': NullifierUsedEvent,
  'market-authorization': MarketAuthorizationEvent,
};

export interface AnonymityPoolOptions {
  /** May authorize markets; often the MarketRegistry's address */
  owner: PublicKey;
  token: TokenInterface;
  depth?: number;
  address?: PublicKey;
}

export class AnonymityPool extends Contract<typeof poolEvents> {
  readonly events = poolEvents;
  readonly owner: PublicKey;
  readonly token: TokenInterface;
  readonly depth: number;

  private readonly trees: MerkleAccumulator[];
  private readonly nullifiers = new NullifierRegistry();
  private readonly authorized = new StateMap<PublicKey>();
  private reserves: UInt64[];

  constructor(ledger: Ledger, options: AnonymityPoolOptions) {
    super(ledger, options.address ?? PrivateKey.random().toPublicKey());
    this.owner = options.owner;
    this.token = options.token;
    this.depth = options.depth ?? TREE_DEPTH;
    this.trees = TIER_NAMES.map(() => new MerkleAccumulator(this.depth));
    this.reserves = TIER_NAMES.map(() => UInt64.zero);
  }

  // ========== Deposits ==========

  /**
   * Pulls the tier amount from the caller (who must have approved the pool)
   * and appends the commitment to the tier's tree.
   *
   * @returns leaf index of the new commitment
   */
  async deposit(commitment: Field, tier: Field): Promise<bigint> {
    const depositor = this.caller;
    const timestamp = this.timestamp;

    assertThat(commitment.equals(EMPTY_LEAF).not(), 'ZERO_COMMITMENT');
    const index = tierIndex(tier);
    const tree = this.trees[index];
    assertThat(tree.size < tree.capacity, 'TREE_FULL', TIER_NAMES[index]);

    const amount = TIER_AMOUNTS[index];
    const transferred = await this.invoke(() => this.token.transferFrom(depositor, this.address, amount));
    assertThat(transferred, 'TOKEN_TRANSFER_FAILED', 'deposit');

    const leafIndex = tree.insert(commitment);
    this.setReserve(index, this.reserves[index].add(amount));

    this.emitEvent(
      'deposited',
      new DepositedEvent({ tier, leafIndex: UInt64.from(leafIndex), commitment, timestamp })
    );
    return leafIndex;
  }

  getMerkleRoot(tier: Field): Field {
    return this.tree(tier).root;
  }

  getDepositCount(tier: Field): bigint {
    return this.tree(tier).size;
  }

  getLeaf(tier: Field, index: bigint): Field {
    return this.tree(tier).getLeaf(index);
  }

  getMerklePath(tier: Field, index: bigint): MerklePath {
    return this.tree(tier).getPath(index);
  }

  getTierAmount(tier: Field): UInt64 {
    return TIER_AMOUNTS[tierIndex(tier)];
  }

  getReserve(tier: Field): UInt64 {
    return this.reserves[tierIndex(tier)];
  }

  // ========== Nullifiers ==========

  isNullifierUsed(nullifier: Field): Bool {
    return this.nullifiers.isUsed(nullifier);
  }

  /**
   * Marks a betting nullifier spent. Authorized markets only.
   */
  async useNullifier(nullifier: Field) {
    this.requireAuthorizedCaller();
    this.nullifiers.consume(nullifier);
    this.emitEvent('nullifier-used', new NullifierUsedEvent({ nullifier }));
  }

  /**
   * Moves one tier stake from the reserve to the calling market, which holds
   * it until settlement. Authorized markets only.
   */
  async releaseStake(tier: Field): Promise<UInt64> {
    const market = this.requireAuthorizedCaller();
    const index = tierIndex(tier);
    const amount = TIER_AMOUNTS[index];
    const reserve = this.reserves[index];
    assertThat(reserve.greaterThanOrEqual(amount), 'RESERVE_EXHAUSTED', TIER_NAMES[index]);

    this.setReserve(index, reserve.sub(amount));
    const transferred = await this.invoke(() => this.token.transfer(market, amount));
    assertThat(transferred, 'TOKEN_TRANSFER_FAILED', 'stake release');
    return amount;
  }

  // ========== Authorization ==========

  isAuthorized(market: PublicKey): boolean {
    return this.authorized.has(market.toBase58());
  }

  async authorizeMarket(market: PublicKey) {
    assertThat(this.caller.equals(this.owner), 'NOT_OWNER');
    this.authorized.set(market.toBase58(), market);
    this.emitEvent('market-authorization', new MarketAuthorizationEvent({ market, authorized: Bool(true) }));
  }

  async revokeMarket(market: PublicKey) {
    assertThat(this.caller.equals(this.owner), 'NOT_OWNER');
    this.authorized.delete(market.toBase58());
    this.emitEvent('market-authorization', new MarketAuthorizationEvent({ market, authorized: Bool(false) }));
  }

  checkpoint(): () => void {
    const restores = [
      ...this.trees.map((tree) => tree.checkpoint()),
      this.nullifiers.checkpoint(),
      this.authorized.checkpoint(),
    ];
    const reserves = this.reserves;

    return () => {
      for (const restore of restores) restore();
      this.reserves = reserves;
    };
  }

  private tree(tier: Field): MerkleAccumulator {
    return this.trees[tierIndex(tier)];
  }

  private setReserve(index: number, value: UInt64) {
    this.reserves = this.reserves.map((reserve, i) => (i === index ? value : reserve));
  }

  private requireAuthorizedCaller(): PublicKey {
    const caller = this.caller;
    assertThat(this.isAuthorized(caller), 'NOT_AUTHORIZED', caller.toBase58());
    return caller;
  }
}
