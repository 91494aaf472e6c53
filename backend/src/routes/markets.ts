/**
 * Markets API Routes
 *
 * Every write names its signer in `sender` and carries that signer's
 * `signature` over the request (see utils/signing.ts); the service runs it as
 * one ledger transaction.
 */

import express from 'express';
import { OUTCOME, outcomeFromName } from '@shielded-markets/contracts';
import { type MarketService, validateMarketRequest } from '../services/market-service.js';
import { parseField, parseMarketId, parsePublicKey, parseString, requireBody, sendError } from '../utils/request.js';
import {
  betFields,
  claimFields,
  createMarketFields,
  disputeFields,
  requireSignature,
  resolveFields,
  revealFields,
} from '../utils/signing.js';

export function createMarketsRouter(service: MarketService) {
  const router = express.Router();

  /**
   * GET /api/markets
   * Get all markets
   */
  router.get('/', async (req, res) => {
    try {
      const markets = await service.listMarkets();
      res.json({
        success: true,
        count: markets.length,
        markets,
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /api/markets/:id
   * Get specific market with live totals and settlement
   */
  router.get('/:id', async (req, res) => {
    try {
      const market = await service.getMarket(parseMarketId(req.params.id));
      res.json({
        success: true,
        market,
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/markets
   * Create a market, signed by its creator
   *
   * Request body:
   * {
   *   creator: string,            // base58 public key, also the signer
   *   question: string,
   *   poolTier: 'SMALL' | 'MEDIUM' | 'LARGE',
   *   resolutionSource?: 'CREATOR_RESOLVE' | 'ORACLE_FEED',
   *   betDeadline: number,        // Unix milliseconds
   *   revealDeadline: number,
   *   disputeDeadline: number,
   *   assetIndex?: number,        // ORACLE_FEED only
   *   targetPrice?: string,       // price * 10^10
   *   signature: string           // by creator
   * }
   */
  router.post('/', async (req, res) => {
    try {
      const body = requireBody(req.body);
      const validation = validateMarketRequest(body);
      if (!validation.valid) {
        res.status(400).json({
          success: false,
          errors: validation.errors,
        });
        return;
      }
      requireSignature(body.signature, validation.request.creator, 'CREATE_MARKET', createMarketFields(validation.request));

      const market = await service.createMarket(validation.request);
      res.status(201).json({
        success: true,
        market,
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/markets/:id/bets
   * { sender, proof, commitment, nullifier, signature }
   */
  router.post('/:id/bets', async (req, res) => {
    try {
      const marketId = parseMarketId(req.params.id);
      const body = requireBody(req.body);
      const sender = parsePublicKey(body.sender, 'sender');
      const proof = parseString(body.proof, 'proof');
      const commitment = parseField(body.commitment, 'commitment');
      const nullifier = parseField(body.nullifier, 'nullifier');
      requireSignature(body.signature, sender, 'PLACE_BET', betFields(marketId, proof, commitment, nullifier));

      await service.placeBet(marketId, sender, proof, commitment, nullifier);
      res.status(201).json({ success: true });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/markets/:id/reveals
   * { sender, commitment, outcome: 'YES' | 'NO', nonce, signature }
   */
  router.post('/:id/reveals', async (req, res) => {
    try {
      const marketId = parseMarketId(req.params.id);
      const body = requireBody(req.body);
      const sender = parsePublicKey(body.sender, 'sender');
      const commitment = parseField(body.commitment, 'commitment');
      const outcome = outcomeFromName(parseString(body.outcome, 'outcome'));
      const nonce = parseField(body.nonce, 'nonce');
      requireSignature(body.signature, sender, 'REVEAL_BET', revealFields(marketId, commitment, outcome, nonce));

      await service.revealBet(marketId, sender, commitment, outcome, nonce);
      res.json({ success: true });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/markets/:id/resolution
   * { sender, outcome?, signature }  (outcome is ignored for ORACLE_FEED markets)
   */
  router.post('/:id/resolution', async (req, res) => {
    try {
      const marketId = parseMarketId(req.params.id);
      const body = requireBody(req.body);
      const sender = parsePublicKey(body.sender, 'sender');
      const outcome = body.outcome === undefined ? OUTCOME.PENDING : outcomeFromName(parseString(body.outcome, 'outcome'));
      requireSignature(body.signature, sender, 'RESOLVE', resolveFields(marketId, outcome));

      const resolved = await service.resolve(marketId, sender, outcome);
      res.json({ success: true, outcome: resolved });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/markets/:id/claims
   * { sender, proof, commitment, recipient, signature }
   */
  router.post('/:id/claims', async (req, res) => {
    try {
      const marketId = parseMarketId(req.params.id);
      const body = requireBody(req.body);
      const sender = parsePublicKey(body.sender, 'sender');
      const proof = parseString(body.proof, 'proof');
      const commitment = parseField(body.commitment, 'commitment');
      const recipient = parsePublicKey(body.recipient, 'recipient');
      requireSignature(body.signature, sender, 'CLAIM', claimFields(marketId, proof, commitment, recipient));

      const payout = await service.claim(marketId, sender, proof, commitment, recipient);
      res.json({ success: true, payout });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/markets/:id/disputes
   * { sender, signature }
   */
  router.post('/:id/disputes', async (req, res) => {
    try {
      const marketId = parseMarketId(req.params.id);
      const body = requireBody(req.body);
      const sender = parsePublicKey(body.sender, 'sender');
      requireSignature(body.signature, sender, 'DISPUTE', disputeFields(marketId));

      await service.dispute(marketId, sender);
      res.json({ success: true });
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}

