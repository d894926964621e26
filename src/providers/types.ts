/**
 * Shared types and interfaces for market data providers.
 *
 * Two kinds of upstream source exist: a rate table keyed by base currency,
 * and a quote/chart API that serves both securities and synthetic FX pairs.
 * Resolvers only see these interfaces, so tests substitute in-process fakes.
 */
import type { CurrencyCode } from '@/types/portfolio';
import type { PriceBar } from '@/types/market';

export type ProviderName = 'rate_table' | 'quote_chart';

export interface ProviderRate {
  from: CurrencyCode;
  to: CurrencyCode;
  rate: number;
  /** Provider's own as-of date (YYYY-MM-DD) when it reports one. */
  asOf: string | null;
}

export interface RateTableProvider {
  readonly name: ProviderName;
  fetchRate(from: CurrencyCode, to: CurrencyCode): Promise<ProviderRate>;
}

export interface ChartRange {
  startDate: string;
  endDate: string;
}

export interface ChartResult {
  symbol: string;
  currency: string | null;
  exchangeName: string | null;
  regularMarketPrice: number | null;
  /** Most recent trading date reported by meta.regularMarketTime, if any. */
  regularMarketDate: string | null;
  bars: PriceBar[];
}

export interface QuoteChartProvider {
  readonly name: ProviderName;
  fetchChart(symbol: string, range: ChartRange): Promise<ChartResult>;
  fetchRate(from: CurrencyCode, to: CurrencyCode): Promise<ProviderRate>;
}

export class ProviderError extends Error {
  constructor(
    message: string,
    public provider: ProviderName,
    public symbol: string,
    public method: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

/**
 * Network error, timeout or non-success HTTP status.
 */
export class ProviderUnavailableError extends ProviderError {
  constructor(
    message: string,
    provider: ProviderName,
    symbol: string,
    method: string,
    public status: number | null = null,
    cause?: Error
  ) {
    super(message, provider, symbol, method, cause);
    this.name = 'ProviderUnavailableError';
  }
}

/**
 * Payload failed schema validation or lacked the requested value.
 */
export class ProviderParseError extends ProviderError {
  constructor(
    message: string,
    provider: ProviderName,
    symbol: string,
    method: string,
    public details: string[] = []
  ) {
    super(message, provider, symbol, method);
    this.name = 'ProviderParseError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
