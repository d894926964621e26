/**
 * Long-running exchange rate refresher
 * Stops on SIGINT/SIGTERM; a refresh in flight is allowed to finish.
 *
 * Usage: npx tsx scripts/rate_refresher.ts
 */

import './load_env';
import { createMarketDataServices } from '../src/services/market_data';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('rate_refresher_cli');

async function main(): Promise<void> {
  const services = createMarketDataServices();
  const controller = new AbortController();

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutdown requested');
    controller.abort();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  logger.info({ pairs: services.config.rates.trackedPairs.length }, 'Starting rate refresher');
  try {
    await services.refresher.start(controller.signal);
  } finally {
    await services.close();
  }
}

main().catch((error: unknown) => {
  logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Rate refresher crashed');
  process.exit(1);
});
