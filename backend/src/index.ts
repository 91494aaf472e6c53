/**
 * Backend entry point
 */

import { deployLocalProtocol } from '@shielded-markets/contracts';
import { config, validateConfig } from './config.js';
import { createMarketStore } from './services/redis-client.js';
import { MarketService } from './services/market-service.js';
import { startStatusMonitor } from './services/status-monitor.js';
import { createApp } from './app.js';

async function main() {
  const validation = validateConfig();
  if (!validation.valid) {
    console.error(' Invalid configuration:');
    validation.errors.forEach((error) => console.error(`   - ${error}`));
    process.exit(1);
  }

  const protocol = deployLocalProtocol({ depth: config.treeDepth });
  const service = new MarketService({
    protocol,
    store: createMarketStore(config),
  });

  const app = createApp(service);
  const server = app.listen(config.port, () => {
    console.log(`\n Shielded Markets backend listening on port ${config.port} (${config.nodeEnv})`);
    console.log(`   Pool owner (registry): ${protocol.registry.address.toBase58()}`);
    console.log('   Local ledger: mock proof verifiers, deposits minted by the faucet');
  });

  const stopMonitor = await startStatusMonitor(service, config.statusCheckInterval);

  const shutdown = () => {
    console.log('\n Shutting down...');
    stopMonitor();
    server.close(() => process.exit(0));
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error(' Backend failed to start:', error instanceof Error ? error.message : error);
  process.exit(1);
});
