/**
 * HTTP application
 */

import express from 'express';
import type { MarketService } from './services/market-service.js';
import { createMarketsRouter } from './routes/markets.js';
import { createPoolRouter } from './routes/pool.js';

export function createApp(service: MarketService) {
  const app = express();
  app.use(express.json());

  app.get('/health', (req, res) => {
    res.json({ success: true, status: 'ok' });
  });

  app.use('/api/pool', createPoolRouter(service));
  app.use('/api/markets', createMarketsRouter(service));

  app.use((req, res) => {
    res.status(404).json({ success: false, error: `No route for ${req.method} ${req.path}` });
  });

  return app;
}
