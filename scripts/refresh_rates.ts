/**
 * One-shot refresh of every tracked currency pair
 *
 * Usage: npx tsx scripts/refresh_rates.ts
 */

import './load_env';
import { createMarketDataServices } from '../src/services/market_data';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('refresh_rates');

async function main(): Promise<void> {
  const services = createMarketDataServices();
  try {
    const summary = await services.refreshTrackedRates();
    for (const entry of summary.updated) {
      logger.info(entry, 'Updated');
    }
    for (const entry of summary.failed) {
      logger.warn(entry, 'Failed');
    }
  } finally {
    await services.close();
  }
}

main().catch((error: unknown) => {
  logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Rate refresh failed');
  process.exit(1);
});
