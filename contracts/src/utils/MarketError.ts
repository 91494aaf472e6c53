/**
 * MarketError.ts - Failure taxonomy shared by the pool, the markets and the registry
 *
 * Every failure aborts the enclosing transaction. The code is stable and
 * machine-readable; the kind groups codes for callers that map them (the HTTP
 * layer turns kinds into status codes).
 */

import { Bool } from 'o1js';

export type ErrorKind = 'validation' | 'state' | 'authorization' | 'integrity' | 'external';

export const ERROR_CODES = {
  // Validation
  ZERO_COMMITMENT: { kind: 'validation', message: 'Commitment must not be the empty leaf' },
  UNKNOWN_TIER: { kind: 'validation', message: 'Unknown pool tier' },
  INVALID_OUTCOME: { kind: 'validation', message: 'Outcome must be YES or NO' },
  INVALID_RESOLUTION_SOURCE: { kind: 'validation', message: 'Unknown resolution source' },
  INVALID_PROOF_FORMAT: { kind: 'validation', message: 'Proof blob is malformed' },
  INVALID_PUBLIC_INPUTS: { kind: 'validation', message: 'Proof must expose exactly 4 public inputs' },
  DUPLICATE_COMMITMENT: { kind: 'validation', message: 'Bet commitment already used' },
  LEAF_OUT_OF_RANGE: { kind: 'validation', message: 'Leaf index outside the tree' },
  EMPTY_QUESTION: { kind: 'validation', message: 'Market question must not be empty' },
  INVALID_AMOUNT: { kind: 'validation', message: 'Amount must be positive' },

  // State
  WRONG_STATUS: { kind: 'state', message: 'Action not allowed in the current market status' },
  DEADLINE_ORDER: { kind: 'state', message: 'Deadlines must satisfy now < bet < reveal < dispute' },
  DISPUTE_NOT_ALLOWED: { kind: 'state', message: 'Only creator-resolved markets can be disputed' },
  DISPUTE_WINDOW_CLOSED: { kind: 'state', message: 'Dispute deadline has passed' },
  UNKNOWN_BET: { kind: 'state', message: 'No bet with this commitment' },
  ALREADY_REVEALED: { kind: 'state', message: 'Bet already revealed' },
  NOT_REVEALED: { kind: 'state', message: 'Bet was never revealed' },
  ALREADY_CLAIMED: { kind: 'state', message: 'Winnings already claimed' },
  UNKNOWN_MARKET: { kind: 'state', message: 'No market with this id' },

  // Authorization
  NOT_CREATOR: { kind: 'authorization', message: 'Caller is not the market creator' },
  NOT_OWNER: { kind: 'authorization', message: 'Caller is not the owner' },
  NOT_AUTHORIZED: { kind: 'authorization', message: 'Caller is not an authorized market' },
  INVALID_SIGNATURE: { kind: 'authorization', message: 'Request is not signed by its sender' },

  // Integrity
  LOSING_BET: { kind: 'integrity', message: 'Bet outcome does not match the resolved outcome' },
  COMMITMENT_MISMATCH: { kind: 'integrity', message: 'Commitment does not match' },
  ROOT_MISMATCH: { kind: 'integrity', message: 'Merkle root does not match the pool root' },
  NULLIFIER_MISMATCH: { kind: 'integrity', message: 'Nullifier does not match the proof' },
  MARKET_ID_MISMATCH: { kind: 'integrity', message: 'Market id does not match the proof' },
  OUTCOME_MISMATCH: { kind: 'integrity', message: 'Outcome does not match the proof' },
  NULLIFIER_USED: { kind: 'integrity', message: 'Nullifier has already been used' },
  TREE_FULL: { kind: 'integrity', message: 'Merkle tree is at capacity' },
  RESERVE_EXHAUSTED: { kind: 'integrity', message: 'Tier reserve cannot cover the stake' },

  // External dependencies
  TOKEN_TRANSFER_FAILED: { kind: 'external', message: 'Token transfer failed' },
  INSUFFICIENT_BALANCE: { kind: 'external', message: 'Insufficient token balance' },
  INSUFFICIENT_ALLOWANCE: { kind: 'external', message: 'Insufficient token allowance' },
  PROOF_REJECTED: { kind: 'external', message: 'Proof verification failed' },
  ORACLE_UNAVAILABLE: { kind: 'external', message: 'Price feed unavailable' },
} as const satisfies Record<string, { kind: ErrorKind; message: string }>;

export type ErrorCode = keyof typeof ERROR_CODES;

export class MarketError extends Error {
  readonly code: ErrorCode;
  readonly kind: ErrorKind;

  constructor(code: ErrorCode, detail?: string) {
    const base = ERROR_CODES[code].message;
    super(detail ? `${base}: ${detail}` : base);
    this.name = 'MarketError';
    this.code = code;
    this.kind = ERROR_CODES[code].kind;
  }
}

export function isMarketError(error: unknown): error is MarketError {
  return error instanceof MarketError;
}

/**
 * Throws a MarketError unless the condition holds.
 * Accepts o1js Bools so checks read like in-circuit assertions.
 */
export function assertThat(condition: Bool | boolean, code: ErrorCode, detail?: string): void {
  const holds = typeof condition === 'boolean' ? condition : condition.toBoolean();
  if (!holds) {
    throw new MarketError(code, detail);
  }
}
