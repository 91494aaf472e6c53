/**
 * Market Status Monitor Service
 *
 * Writes time-triggered transitions on schedule:
 * - OPEN → REVEALING (after the bet deadline)
 * - REVEALING → RESOLVING (after the reveal deadline)
 *
 * Markets move forward on their own at their next action; the monitor keeps
 * stored statuses current for listings.
 */

import type { MarketService } from './market-service.js';

/**
 * Check and update market statuses based on current time
 */
export async function updateMarketStatuses(service: MarketService): Promise<number> {
  try {
    const transitioned = await service.advanceStatuses();
    if (transitioned > 0) {
      console.log(`    Transitioned ${transitioned} market(s)\n`);
    }
    return transitioned;
  } catch (error) {
    console.error(' Status monitor error:', error instanceof Error ? error.message : error);
    return 0;
  }
}

/**
 * Status Monitor Service
 *
 * Runs every check interval; returns a function that stops it
 */
export async function startStatusMonitor(service: MarketService, checkInterval: number) {
  console.log('\n STATUS MONITOR STARTED');
  console.log(`   Check interval: ${checkInterval / 1000}s`);
  console.log('   Monitors: OPEN → REVEALING (post-bet), REVEALING → RESOLVING (post-reveal)\n');

  // Run immediately on startup
  await updateMarketStatuses(service);

  const intervalId = setInterval(() => {
    void updateMarketStatuses(service);
  }, checkInterval);

  return () => clearInterval(intervalId);
}
