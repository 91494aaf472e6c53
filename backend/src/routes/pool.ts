/**
 * Pool API Routes
 */

import express from 'express';
import { tierFromName } from '@shielded-markets/contracts';
import type { MarketService } from '../services/market-service.js';
import { parseField, parseIndex, parsePublicKey, parseString, requireBody, sendError } from '../utils/request.js';
import { depositFields, requireSignature } from '../utils/signing.js';

export function createPoolRouter(service: MarketService) {
  const router = express.Router();

  /**
   * GET /api/pool/:tier
   * Root, deposit count, stake amount and reserve of one tier
   */
  router.get('/:tier', async (req, res) => {
    try {
      res.json({
        success: true,
        pool: await service.getPool(tierFromName(req.params.tier)),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /api/pool/:tier/leaves/:index
   */
  router.get('/:tier/leaves/:index', async (req, res) => {
    try {
      const tier = tierFromName(req.params.tier);
      const index = parseIndex(req.params.index, 'index');
      res.json({
        success: true,
        index: index.toString(),
        leaf: await service.getLeaf(tier, index),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /api/pool/:tier/paths/:index
   * Authentication path of a leaf against the current root
   */
  router.get('/:tier/paths/:index', async (req, res) => {
    try {
      const tier = tierFromName(req.params.tier);
      const index = parseIndex(req.params.index, 'index');
      const { root, siblings, isLeft } = await service.getPath(tier, index);
      res.json({
        success: true,
        index: index.toString(),
        root,
        path: { siblings, isLeft },
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/pool/deposits
   * { sender, commitment, tier, signature }
   * The stake is minted to the sender in the same transaction.
   */
  router.post('/deposits', async (req, res) => {
    try {
      const body = requireBody(req.body);
      const sender = parsePublicKey(body.sender, 'sender');
      const commitment = parseField(body.commitment, 'commitment');
      const tier = tierFromName(parseString(body.tier, 'tier'));
      requireSignature(body.signature, sender, 'DEPOSIT', depositFields(commitment, tier));

      const leafIndex = await service.deposit(sender, commitment, tier);
      res.status(201).json({ success: true, leafIndex: leafIndex.toString() });
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
