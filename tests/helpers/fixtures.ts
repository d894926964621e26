import { vi } from 'vitest';
import { openDatabase, type SqliteDatabase } from '@/data/db';
import type {
  ChartResult,
  ProviderRate,
  QuoteChartProvider,
  RateTableProvider,
} from '@/providers/types';
import type { PriceBar } from '@/types/market';

export const HOUR_MS = 60 * 60 * 1000;
export const MINUTE_MS = 60 * 1000;

export function openTestDb(): SqliteDatabase {
  return openDatabase({ path: ':memory:' });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export interface TestClock {
  now: () => number;
  set: (ms: number) => void;
  advance: (ms: number) => void;
}

export function makeClock(start: number): TestClock {
  let current = start;
  return {
    now: () => current,
    set: (ms) => {
      current = ms;
    },
    advance: (ms) => {
      current += ms;
    },
  };
}

export function rate(from: string, to: string, value: number): ProviderRate {
  return { from, to, rate: value, asOf: null };
}

export function fakeRateTable() {
  return {
    name: 'rate_table' as const,
    fetchRate: vi.fn<RateTableProvider['fetchRate']>(),
  };
}

export function fakeQuoteChart() {
  return {
    name: 'quote_chart' as const,
    fetchRate: vi.fn<QuoteChartProvider['fetchRate']>(),
    fetchChart: vi.fn<QuoteChartProvider['fetchChart']>(),
  };
}

export function bar(symbol: string, priceDate: string, close: number): PriceBar {
  return {
    symbol,
    priceDate,
    open: close,
    high: close,
    low: close,
    close,
    volume: 1000,
    currency: 'USD',
    exchangeName: 'NMS',
  };
}

export function chart(
  symbol: string,
  bars: PriceBar[],
  regularMarketPrice: number | null = null,
  regularMarketDate: string | null = null
): ChartResult {
  return {
    symbol,
    currency: 'USD',
    exchangeName: 'NMS',
    regularMarketPrice,
    regularMarketDate,
    bars,
  };
}
