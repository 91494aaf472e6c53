/**
 * Configuration module - Centralized configuration management
 */

import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

export interface BackendConfig {
  // Local mode: in-process ledger with mock verifiers and a deposit faucet.
  // The only mode the backend runs in; there is no chain client.
  localMode: boolean;
  // Server
  port: number;
  nodeEnv: string;
  // Depth of every pool tier tree
  treeDepth: number;
  // Upstash Redis (optional; in-memory store without it)
  redis: {
    url: string;
    token: string;
  };
  // Status monitor
  statusCheckInterval: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BackendConfig {
  return {
    localMode: (env.LOCAL_MODE ?? 'true') === 'true',
    port: parseInt(env.PORT || '3001'),
    nodeEnv: env.NODE_ENV || 'development',
    treeDepth: parseInt(env.TREE_DEPTH || '20'),
    redis: {
      url: env.UPSTASH_REDIS_REST_URL || '',
      token: env.UPSTASH_REDIS_REST_TOKEN || '',
    },
    statusCheckInterval: parseInt(env.STATUS_CHECK_INTERVAL || '30000'),
  };
}

export const config = loadConfig();

/**
 * Validate configuration
 */
export function validateConfig(cfg: BackendConfig = config): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!Number.isInteger(cfg.port) || cfg.port < 0 || cfg.port > 65535) {
    errors.push('PORT must be a valid port number');
  }

  if (!Number.isInteger(cfg.treeDepth) || cfg.treeDepth < 1 || cfg.treeDepth > 32) {
    errors.push('TREE_DEPTH must be an integer between 1 and 32');
  }

  if (!Number.isInteger(cfg.statusCheckInterval) || cfg.statusCheckInterval <= 0) {
    errors.push('STATUS_CHECK_INTERVAL must be a positive number of milliseconds');
  }

  if (!cfg.localMode) {
    errors.push('LOCAL_MODE must be true: the backend only runs its in-process ledger');
  }

  // Upstash Redis credentials come as a pair
  if (!cfg.redis.url !== !cfg.redis.token) {
    errors.push('UPSTASH_REDIS_REST_URL and UPSTASH_REDIS_REST_TOKEN must be set together');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
