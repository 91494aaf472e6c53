/**
 * Request parsing and error responses shared by the routes
 */

import type { Response } from 'express';
import { Field, PublicKey } from 'o1js';
import { isMarketError, type ErrorKind } from '@shielded-markets/contracts';

/**
 * Malformed request input (always a 400)
 */
export class RequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestError';
  }
}

const KIND_STATUS: Record<ErrorKind, number> = {
  validation: 400,
  state: 409,
  integrity: 409,
  authorization: 403,
  external: 502,
};

export function errorStatus(error: unknown): number {
  if (error instanceof RequestError) return 400;
  if (isMarketError(error)) {
    return error.code === 'UNKNOWN_MARKET' ? 404 : KIND_STATUS[error.kind];
  }
  return 500;
}

export function sendError(res: Response, error: unknown) {
  const status = errorStatus(error);
  const message = error instanceof Error ? error.message : String(error);
  if (status === 500) {
    console.error(' Request failed:', message);
  }
  res.status(status).json({
    success: false,
    error: message,
    ...(isMarketError(error) ? { code: error.code } : {}),
  });
}

// ========== Body fields ==========

export type RequestBody = Record<string, unknown>;

export function requireBody(body: unknown): RequestBody {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new RequestError('Request body must be a JSON object');
  }
  return Object.fromEntries(Object.entries(body));
}

export function parseString(value: unknown, name: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new RequestError(`${name} must be a non-empty string`);
  }
  return value;
}

/**
 * Decimal string or safe non-negative integer below the field modulus
 */
export function parseField(value: unknown, name: string): Field {
  const text = typeof value === 'number' && Number.isSafeInteger(value) ? value.toString() : value;
  if (typeof text !== 'string' || !/^\d+$/.test(text) || BigInt(text) >= Field.ORDER) {
    throw new RequestError(`${name} must be a field element in decimal`);
  }
  return Field(BigInt(text));
}

export function parsePublicKey(value: unknown, name: string): PublicKey {
  const text = parseString(value, name);
  try {
    return PublicKey.fromBase58(text);
  } catch {
    throw new RequestError(`${name} is not a valid public key`);
  }
}

export function parseTimestamp(value: unknown, name: string): number {
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
    throw new RequestError(`${name} must be a Unix timestamp in milliseconds`);
  }
  return value;
}

export function parseIndex(value: string, name: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new RequestError(`${name} must be a non-negative integer`);
  }
  return BigInt(value);
}

export function parseMarketId(value: string): number {
  const marketId = parseInt(value);
  if (isNaN(marketId) || marketId < 0 || marketId.toString() !== value) {
    throw new RequestError('Invalid market ID');
  }
  return marketId;
}
