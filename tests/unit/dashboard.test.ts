import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadEnvConfig } from '@/core/env';
import type { SqliteDatabase } from '@/data/db';
import { closeDatabase } from '@/data/db';
import { dashboardCacheKey } from '@/dashboard/dashboard_service';
import type { ChartResult } from '@/providers/types';
import { createMarketDataServices, type MarketDataServices } from '@/services/market_data';
import { bar, chart, fakeQuoteChart, fakeRateTable, makeClock, openTestDb, rate } from '../helpers/fixtures';

const T0 = Date.UTC(2026, 0, 15, 12, 0, 0);
const TODAY = '2026-01-15';

describe('DashboardService', () => {
  let db: SqliteDatabase;
  let services: MarketDataServices;
  let quoteChart: ReturnType<typeof fakeQuoteChart>;
  let rateTable: ReturnType<typeof fakeRateTable>;
  let accountId: number;

  beforeEach(() => {
    db = openTestDb();
    quoteChart = fakeQuoteChart();
    rateTable = fakeRateTable();
    quoteChart.fetchChart.mockResolvedValue(chart('VFV.TO', [bar('VFV.TO', TODAY, 120)]));
    rateTable.fetchRate.mockImplementation(async (from, to) => rate(from, to, from === 'CAD' ? 0.75 : 0.25));

    services = createMarketDataServices({
      env: loadEnvConfig({}),
      db,
      rateTable,
      quoteChart,
      clock: makeClock(T0).now,
    });

    accountId = services.portfolio.addAccount('user-1', { name: 'TFSA' });
    services.portfolio.addHolding('user-1', {
      accountId,
      name: 'VFV',
      purchaseValue: 100,
      quantity: 10,
      currency: 'CAD',
      category: 'ETF',
      purchaseDate: '2025-03-01',
    });
    services.portfolio.addHolding('user-1', {
      accountId,
      name: 'VFV',
      purchaseValue: 110,
      quantity: 5,
      currency: 'CAD',
      category: 'ETF',
      purchaseDate: '2025-09-01',
    });
    services.portfolio.addHolding('user-1', {
      accountId,
      name: 'Tesouro Selic',
      purchaseValue: 450,
      quantity: 1,
      currency: 'BRL',
      category: 'RendaFixa',
      purchaseDate: '2025-04-01',
    });
  });

  afterEach(async () => {
    await services.close();
    closeDatabase(db);
  });

  it('groups holdings by category, account and name', async () => {
    const view = await services.dashboard.getDashboard('user-1');

    expect(view.groupedInvestments).toEqual([
      {
        category: 'ETF',
        account: 'TFSA',
        name: 'VFV',
        totalQuantity: 15,
        averageValue: 105,
        total: 1550,
        currency: 'CAD',
        country: 'Canada',
      },
      {
        category: 'RendaFixa',
        account: 'TFSA',
        name: 'Tesouro Selic',
        totalQuantity: 1,
        averageValue: 450,
        total: 450,
        currency: 'BRL',
        country: 'Brazil',
      },
    ]);
    expect(view.generatedAt).toBe('2026-01-15T12:00:00.000Z');
  });

  it('totals by account, country and category', async () => {
    const view = await services.dashboard.getDashboard('user-1');

    expect(view.assetsByAccount).toEqual([{ account: 'TFSA', total: 2000 }]);
    expect(view.assetsByCountry).toEqual([
      { country: 'Canada', total: 1550 },
      { country: 'Brazil', total: 450 },
    ]);
    expect(view.assetsByCategory).toEqual([
      { category: 'ETF', total: 1550, count: 2, percentage: 77.5 },
      { category: 'RendaFixa', total: 450, count: 1, percentage: 22.5 },
    ]);
  });

  it('includes account performance at current prices', async () => {
    const view = await services.dashboard.getDashboard('user-1');

    expect(view.accountPerformance).toEqual([
      {
        accountId,
        accountName: 'TFSA',
        totalInvested: 2000,
        currentValue: 2250,
        totalGainLoss: 250,
        totalGainLossPercentage: 12.5,
      },
    ]);
    expect(quoteChart.fetchChart).toHaveBeenCalledTimes(1);
    expect(quoteChart.fetchChart.mock.calls[0]?.[0]).toBe('VFV.TO');
  });

  it('serves repeated reads from the cache until the portfolio changes', async () => {
    const spy = vi.spyOn(services.performance, 'calculateAllAccountsPerformance');

    const first = await services.dashboard.getDashboard('user-1');
    const second = await services.dashboard.getDashboard('user-1');

    expect(second).toEqual(first);
    expect(spy).toHaveBeenCalledTimes(1);

    services.portfolio.addHolding('user-1', {
      accountId,
      name: 'Cash',
      purchaseValue: 1,
      quantity: 100,
      currency: 'CAD',
      category: 'Cash',
      purchaseDate: '2025-10-01',
    });

    const third = await services.dashboard.getDashboard('user-1');
    expect(spy).toHaveBeenCalledTimes(2);
    expect(third.assetsByAccount).toEqual([{ account: 'TFSA', total: 2100 }]);
  });

  it('does not cache a view built across a portfolio change', async () => {
    let release: (value: ChartResult) => void = () => undefined;
    quoteChart.fetchChart.mockReturnValueOnce(
      new Promise<ChartResult>((resolve) => {
        release = resolve;
      })
    );

    const building = services.dashboard.getDashboard('user-1');
    services.portfolio.addHolding('user-1', {
      accountId,
      name: 'Cash',
      purchaseValue: 1,
      quantity: 100,
      currency: 'CAD',
      category: 'Cash',
      purchaseDate: '2025-10-01',
    });
    release(chart('VFV.TO', [bar('VFV.TO', TODAY, 120)]));

    expect((await building).groupedInvestments).toHaveLength(2);
    expect(services.resultCache.get(dashboardCacheKey('user-1'))).toBeNull();

    const fresh = await services.dashboard.getDashboard('user-1');
    expect(fresh.groupedInvestments.map((g) => g.name)).toEqual(['VFV', 'Tesouro Selic', 'Cash']);
    expect(services.resultCache.get(dashboardCacheKey('user-1'))).not.toBeNull();
  });

  it('rebuilds when the cached payload is not a valid view', async () => {
    services.resultCache.set(dashboardCacheKey('user-1'), JSON.stringify({ userId: 'user-1' }));

    const view = await services.dashboard.getDashboard('user-1');

    expect(view.groupedInvestments).toHaveLength(2);
  });

  it('converts portfolio performance into the reporting currency', async () => {
    const report = await services.performance.calculatePortfolioPerformance('user-1', 'usd');

    expect(report.reportingCurrency).toBe('USD');
    expect(report.totalInvested).toBeCloseTo(1275, 9);
    expect(report.currentValue).toBeCloseTo(1462.5, 9);
    expect(report.totalGainLoss).toBeCloseTo(187.5, 9);
    expect(rateTable.fetchRate).toHaveBeenCalledWith('CAD', 'USD');
    expect(rateTable.fetchRate).toHaveBeenCalledWith('BRL', 'USD');
  });
});
