/**
 * Signed requests
 *
 * Every write carries an o1js `Signature` by its `sender` over the action tag
 * followed by the request's fields, so a body cannot name a signer whose key
 * it does not hold. Clients build the same message with `signRequest`.
 */

import { Encoding, Field, Poseidon, PrivateKey, PublicKey, Signature } from 'o1js';
import type { MarketCreateRequest } from '../services/market-service.js';
import { assertThat } from '@shielded-markets/contracts';
import { RequestError, parseString } from './request.js';

/**
 * REQUEST_ACTION: Domain tag heading each signed message
 */
export const REQUEST_ACTION = {
  DEPOSIT: Field(1),
  CREATE_MARKET: Field(2),
  PLACE_BET: Field(3),
  REVEAL_BET: Field(4),
  RESOLVE: Field(5),
  CLAIM: Field(6),
  DISPUTE: Field(7),
} as const;

export type RequestAction = keyof typeof REQUEST_ACTION;

/**
 * Single field standing for free text (questions, proof blobs)
 */
export function textDigest(text: string): Field {
  return Poseidon.hash([Field(text.length), ...Encoding.stringToFields(text)]);
}

export function requestMessage(action: RequestAction, fields: Field[]): Field[] {
  return [REQUEST_ACTION[action], ...fields];
}

/**
 * Base58 signature a client attaches to a request
 */
export function signRequest(key: PrivateKey, action: RequestAction, fields: Field[]): string {
  return Signature.create(key, requestMessage(action, fields)).toBase58();
}

export function parseSignature(value: unknown): Signature {
  const text = parseString(value, 'signature');
  try {
    return Signature.fromBase58(text);
  } catch {
    throw new RequestError('signature is not a valid signature');
  }
}

/**
 * Throws INVALID_SIGNATURE unless `signature` is `signer`'s over the request
 */
export function requireSignature(signature: unknown, signer: PublicKey, action: RequestAction, fields: Field[]) {
  const parsed = parseSignature(signature);
  assertThat(parsed.verify(signer, requestMessage(action, fields)), 'INVALID_SIGNATURE', action);
}

// ========== Messages ==========

export function depositFields(commitment: Field, tier: Field): Field[] {
  return [commitment, tier];
}

export function createMarketFields(request: MarketCreateRequest): Field[] {
  return [
    textDigest(request.question),
    request.poolTier,
    request.resolutionSource,
    Field(request.betDeadline),
    Field(request.revealDeadline),
    Field(request.disputeDeadline),
    request.assetIndex,
    request.targetPrice,
  ];
}

export function betFields(marketId: number, proof: string, commitment: Field, nullifier: Field): Field[] {
  return [Field(marketId), textDigest(proof), commitment, nullifier];
}

export function revealFields(marketId: number, commitment: Field, outcome: Field, nonce: Field): Field[] {
  return [Field(marketId), commitment, outcome, nonce];
}

/**
 * `outcome` is PENDING (0) when the request leaves it out
 */
export function resolveFields(marketId: number, outcome: Field): Field[] {
  return [Field(marketId), outcome];
}

export function claimFields(marketId: number, proof: string, commitment: Field, recipient: PublicKey): Field[] {
  return [Field(marketId), textDigest(proof), commitment, ...recipient.toFields()];
}

export function disputeFields(marketId: number): Field[] {
  return [Field(marketId)];
}
