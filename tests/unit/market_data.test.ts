import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadEnvConfig } from '@/core/env';
import { closeDatabase, type SqliteDatabase } from '@/data/db';
import { createMarketDataServices, type MarketDataServices } from '@/services/market_data';
import { fakeQuoteChart, fakeRateTable, makeClock, openTestDb, rate } from '../helpers/fixtures';

const T0 = Date.UTC(2026, 0, 15, 12, 0, 0);

describe('createMarketDataServices', () => {
  let db: SqliteDatabase;
  let rateTable: ReturnType<typeof fakeRateTable>;
  let services: MarketDataServices;

  beforeEach(() => {
    db = openTestDb();
    rateTable = fakeRateTable();
    rateTable.fetchRate.mockImplementation(async (from, to) => rate(from, to, 2));
    services = createMarketDataServices({
      env: loadEnvConfig({}),
      db,
      rateTable,
      quoteChart: fakeQuoteChart(),
      clock: makeClock(T0).now,
    });
  });

  afterEach(async () => {
    await services.close();
    closeDatabase(db);
  });

  it('refreshes every tracked pair from the primary provider', async () => {
    const summary = await services.refreshTrackedRates();

    expect(rateTable.fetchRate).toHaveBeenCalledTimes(6);
    expect(summary.updated).toHaveLength(6);
    expect(summary.failed).toEqual([]);
    expect(services.rates.getAllCurrentRates()).toMatchObject({ CADUSD: 2, BRLCAD: 2 });
  });

  it('leaves a refresher that was never started in the stopped state after close', async () => {
    await services.close();

    expect(services.refresher.getState()).toBe('stopped');
  });
});
