/**
 * Events.ts - Append-only event payloads
 *
 * Events carry no depositor or bettor identity: deposits expose tier, index
 * and commitment; bets expose only their commitment.
 */

import { Struct, Field, PublicKey, UInt64, Bool } from 'o1js';

// ========== AnonymityPool ==========

export class DepositedEvent extends Struct({
  tier: Field,
  leafIndex: UInt64,
  commitment: Field,
  timestamp: UInt64,
}) {}

export class NullifierUsedEvent extends Struct({
  nullifier: Field,
}) {}

export class MarketAuthorizationEvent extends Struct({
  market: PublicKey,
  authorized: Bool,
}) {}

// ========== Market ==========

export class BetPlacedEvent extends Struct({
  commitment: Field,
  timestamp: UInt64,
}) {}

export class BetRevealedEvent extends Struct({
  commitment: Field,
  outcome: Field,
}) {}

export class MarketResolvedEvent extends Struct({
  outcome: Field,
  source: Field,
}) {}

export class WinningsClaimedEvent extends Struct({
  commitment: Field,
  recipient: PublicKey,
}) {}

export class MarketDisputedEvent extends Struct({
  caller: PublicKey,
  timestamp: UInt64,
}) {}

// ========== MarketRegistry ==========

export class MarketCreatedEvent extends Struct({
  marketId: Field,
  creator: PublicKey,
  poolTier: Field,
  timestamp: UInt64,
}) {}

// ========== FungibleToken ==========

export class TransferEvent extends Struct({
  from: PublicKey,
  to: PublicKey,
  amount: UInt64,
}) {}
