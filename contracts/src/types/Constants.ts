/**
 * Constants for the Shielded Markets protocol
 *
 * Enum-like values are Fields so they can be hashed into commitments and
 * compared against proof public inputs directly.
 */

import { Field, UInt64 } from 'o1js';
import { MarketError } from '../utils/MarketError.js';

/**
 * TREE_DEPTH: Depth of every tier's deposit tree (2^20 leaves per tier)
 */
export const TREE_DEPTH = 20;

/**
 * EMPTY_LEAF: Canonical value of an unfilled leaf
 * A deposit commitment equal to it is rejected.
 */
export const EMPTY_LEAF = Field(0);

/**
 * POOL_TIER: Fixed deposit denominations, each with its own tree
 */
export const POOL_TIER = {
  SMALL: Field(0),
  MEDIUM: Field(1),
  LARGE: Field(2),
} as const;

export const TIER_NAMES = ['SMALL', 'MEDIUM', 'LARGE'] as const;
export type TierName = (typeof TIER_NAMES)[number];

/**
 * TIER_AMOUNTS: Stake per deposit (and per bet) for each tier, in token units
 */
export const TIER_AMOUNTS: readonly UInt64[] = [
  UInt64.from(10), // SMALL
  UInt64.from(100), // MEDIUM
  UInt64.from(1000), // LARGE
];

/**
 * OUTCOME: Bet outcomes; PENDING marks unrevealed bets and unresolved markets
 */
export const OUTCOME = {
  PENDING: Field(0),
  YES: Field(1),
  NO: Field(2),
} as const;

export const OUTCOME_NAMES = ['PENDING', 'YES', 'NO'] as const;
export type OutcomeName = (typeof OUTCOME_NAMES)[number];

/**
 * MARKET_STATUS: Forward-only market lifecycle
 */
export const MARKET_STATUS = {
  OPEN: Field(0), // Accepting bets
  REVEALING: Field(1), // Past bet deadline, accepting reveals
  RESOLVING: Field(2), // Past reveal deadline, awaiting resolution
  RESOLVED: Field(3), // Outcome known, claims open
  DISPUTED: Field(4), // Resolution contested (terminal)
} as const;

export const STATUS_NAMES = ['OPEN', 'REVEALING', 'RESOLVING', 'RESOLVED', 'DISPUTED'] as const;
export type StatusName = (typeof STATUS_NAMES)[number];

/**
 * RESOLUTION_SOURCE: Who decides the outcome
 */
export const RESOLUTION_SOURCE = {
  CREATOR_RESOLVE: Field(0),
  ORACLE_FEED: Field(1),
} as const;

export const RESOLUTION_SOURCE_NAMES = ['CREATOR_RESOLVE', 'ORACLE_FEED'] as const;
export type ResolutionSourceName = (typeof RESOLUTION_SOURCE_NAMES)[number];

/**
 * CLAIM_NULLIFIER_DOMAIN: Separates claim nullifiers from betting nullifiers
 * ("claim" as ASCII)
 */
export const CLAIM_NULLIFIER_DOMAIN = Field(0x636c61696dn);

/**
 * PUBLIC_INPUT_COUNT: Both proof kinds expose exactly four public inputs
 */
export const PUBLIC_INPUT_COUNT = 4;

/**
 * Index of a tier Field into per-tier arrays
 */
export function tierIndex(tier: Field): number {
  const value = tier.toBigInt();
  if (value >= BigInt(TIER_NAMES.length)) {
    throw new MarketError('UNKNOWN_TIER', tier.toString());
  }
  return Number(value);
}

export function tierName(tier: Field): TierName {
  return TIER_NAMES[tierIndex(tier)];
}

export function tierFromName(name: string): Field {
  const index = TIER_NAMES.findIndex((candidate) => candidate === name.toUpperCase());
  if (index < 0) {
    throw new MarketError('UNKNOWN_TIER', name);
  }
  return Field(index);
}

export function outcomeName(outcome: Field): OutcomeName {
  const value = Number(outcome.toBigInt());
  return OUTCOME_NAMES[value] ?? 'PENDING';
}

export function outcomeFromName(name: string): Field {
  const index = OUTCOME_NAMES.findIndex((candidate) => candidate === name.toUpperCase());
  if (index < 0) {
    throw new MarketError('INVALID_OUTCOME', name);
  }
  return Field(index);
}

export function statusName(status: Field): StatusName {
  return STATUS_NAMES[Number(status.toBigInt())];
}

export function resolutionSourceName(source: Field): ResolutionSourceName {
  const value = source.toBigInt();
  if (value >= BigInt(RESOLUTION_SOURCE_NAMES.length)) {
    throw new MarketError('INVALID_RESOLUTION_SOURCE', source.toString());
  }
  return RESOLUTION_SOURCE_NAMES[Number(value)];
}

export function resolutionSourceFromName(name: string): Field {
  const index = RESOLUTION_SOURCE_NAMES.findIndex((candidate) => candidate === name.toUpperCase());
  if (index < 0) {
    throw new MarketError('INVALID_RESOLUTION_SOURCE', name);
  }
  return Field(index);
}
