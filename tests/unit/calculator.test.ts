import { describe, expect, it } from 'vitest';
import {
  calculateAccountPerformance,
  calculateHoldingPerformance,
  gainLossPercentage,
  sortAccounts,
  sumTotals,
} from '@/performance/calculator';
import type { Account, Holding } from '@/types/portfolio';

function holding(overrides: Partial<Holding> = {}): Holding {
  return {
    id: 1,
    accountId: 1,
    userId: 'user-1',
    name: 'AAPL',
    purchaseValue: 5,
    quantity: 10,
    currency: 'USD',
    category: 'Stocks',
    purchaseDate: '2025-01-02',
    description: '',
    ...overrides,
  };
}

function account(overrides: Partial<Account> = {}): Account {
  return { id: 1, userId: 'user-1', name: 'Main', sortOrder: 0, goals: [], ...overrides };
}

describe('calculateHoldingPerformance', () => {
  it('values a priced holding at the current price', () => {
    const result = calculateHoldingPerformance(holding(), {
      status: 'priced',
      symbol: 'AAPL',
      price: 7,
      priceDate: '2026-01-15',
      source: 'provider',
      stale: false,
    });

    expect(result).toMatchObject({
      totalInvested: 50,
      currentValue: 70,
      gainLoss: 20,
      gainLossPercentage: 40,
      currentPrice: 7,
      symbol: 'AAPL',
      priceSource: 'provider',
      stale: false,
    });
  });

  it('keeps unpriced holdings at their invested value', () => {
    const result = calculateHoldingPerformance(holding({ category: 'RendaFixa' }), { status: 'not_tradable' });

    expect(result).toMatchObject({
      totalInvested: 50,
      currentValue: 50,
      gainLoss: 0,
      gainLossPercentage: 0,
      currentPrice: null,
      symbol: null,
      priceStatus: 'not_tradable',
    });
  });

  it('flags last-known prices as stale', () => {
    const result = calculateHoldingPerformance(holding(), {
      status: 'priced',
      symbol: 'AAPL',
      price: 4,
      priceDate: '2026-01-12',
      source: 'last_known',
      stale: true,
    });

    expect(result).toMatchObject({ currentValue: 40, gainLoss: -10, gainLossPercentage: -20, stale: true });
  });

  it('reports 0% when nothing was invested', () => {
    const result = calculateHoldingPerformance(holding({ purchaseValue: 0 }), {
      status: 'priced',
      symbol: 'AAPL',
      price: 7,
      priceDate: '2026-01-15',
      source: 'cache',
      stale: false,
    });

    expect(result.totalInvested).toBe(0);
    expect(result.gainLossPercentage).toBe(0);
  });
});

describe('account totals', () => {
  it('sums holdings and derives the percentage from the sums', () => {
    const a = calculateHoldingPerformance(holding({ id: 1 }), {
      status: 'priced',
      symbol: 'AAPL',
      price: 7,
      priceDate: '2026-01-15',
      source: 'provider',
      stale: false,
    });
    const b = calculateHoldingPerformance(holding({ id: 2, quantity: 1, purchaseValue: 150 }), {
      status: 'no_price',
      symbol: 'XYZ',
    });

    const result = calculateAccountPerformance(account(), [a, b]);

    expect(result).toMatchObject({
      accountId: 1,
      accountName: 'Main',
      totalInvested: 200,
      currentValue: 220,
      totalGainLoss: 20,
      totalGainLossPercentage: 10,
    });
    expect(result.holdings).toHaveLength(2);
  });

  it('guards the percentage against empty accounts', () => {
    expect(sumTotals([])).toEqual({
      totalInvested: 0,
      currentValue: 0,
      totalGainLoss: 0,
      totalGainLossPercentage: 0,
    });
    expect(gainLossPercentage(5, 0)).toBe(0);
  });
});

describe('sortAccounts', () => {
  it('orders by sort order, then name by code unit, then id', () => {
    const sorted = sortAccounts([
      account({ id: 4, name: 'b', sortOrder: 1 }),
      account({ id: 3, name: 'B', sortOrder: 1 }),
      account({ id: 2, name: 'Z', sortOrder: 0 }),
      account({ id: 1, name: 'B', sortOrder: 1 }),
    ]);

    expect(sorted.map((a) => a.id)).toEqual([2, 1, 3, 4]);
  });
});
