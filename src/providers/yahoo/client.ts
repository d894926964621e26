/**
 * Quote chart client (Yahoo-compatible v8 chart API)
 *
 * Serves daily bars for securities and the spot rate of synthetic FX pair
 * symbols of the form FROMTO=X.
 */

import { createChildLogger } from '@/utils/logger';
import { toUtcDateString, utcDayEndSeconds, utcDayStartSeconds } from '@/core/time';
import { validateQuoteChart } from '@/validation/ajv_instance';
import type { PriceBar } from '@/types/market';
import type { CurrencyCode } from '@/types/portfolio';
import { HttpClient, type FetchLike } from '../http';
import {
  ProviderParseError,
  type ChartRange,
  type ChartResult,
  type ProviderRate,
  type QuoteChartProvider,
} from '../types';
import type { ChartResultPayload, NullableSeries } from './types';

const logger = createChildLogger('quote_chart');

export interface QuoteChartClientOptions {
  baseUrl: string;
  timeoutMs: number;
  userAgent: string;
  fetch?: FetchLike;
}

export function fxPairSymbol(from: CurrencyCode, to: CurrencyCode): string {
  return `${from}${to}=X`;
}

function pick(series: NullableSeries | undefined, index: number): number | null {
  const value = series?.[index];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function toBars(symbol: string, payload: ChartResultPayload): PriceBar[] {
  const timestamps = payload.timestamp ?? [];
  const quote = payload.indicators?.quote?.[0];
  if (timestamps.length === 0 || !quote) {
    return [];
  }

  const byDate = new Map<string, PriceBar>();
  timestamps.forEach((ts, i) => {
    const close = pick(quote.close, i);
    if (close === null) return;

    const priceDate = toUtcDateString(ts * 1000);
    byDate.set(priceDate, {
      symbol,
      priceDate,
      open: pick(quote.open, i),
      high: pick(quote.high, i),
      low: pick(quote.low, i),
      close,
      volume: pick(quote.volume, i),
      currency: payload.meta.currency ?? null,
      exchangeName: payload.meta.exchangeName ?? null,
    });
  });

  return [...byDate.values()].sort((a, b) => a.priceDate.localeCompare(b.priceDate));
}

export class QuoteChartClient implements QuoteChartProvider {
  readonly name = 'quote_chart' as const;
  private readonly http: HttpClient;
  private readonly baseUrl: string;

  constructor(options: QuoteChartClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.http = new HttpClient({
      provider: this.name,
      timeoutMs: options.timeoutMs,
      userAgent: options.userAgent,
      fetch: options.fetch,
    });
  }

  private async fetchResult(
    symbol: string,
    params: Record<string, string | number>,
    method: string
  ): Promise<ChartResultPayload> {
    const url = new URL(`${this.baseUrl}/${encodeURIComponent(symbol)}`);
    url.searchParams.set('interval', '1d');
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, String(value));
    }

    const body = await this.http.getJson(url.toString(), symbol, method);
    const validation = validateQuoteChart(body);
    if (!validation.valid) {
      throw new ProviderParseError(
        `quote chart payload failed validation for ${symbol}`,
        this.name,
        symbol,
        method,
        validation.errors
      );
    }

    const { chart } = validation.data;
    if (chart.error) {
      throw new ProviderParseError(
        `quote chart error for ${symbol}: ${chart.error.description ?? chart.error.code ?? 'unknown'}`,
        this.name,
        symbol,
        method
      );
    }

    const result = chart.result?.[0];
    if (!result) {
      throw new ProviderParseError(`quote chart returned no result for ${symbol}`, this.name, symbol, method);
    }

    return result;
  }

  async fetchChart(symbol: string, range: ChartRange): Promise<ChartResult> {
    const result = await this.fetchResult(
      symbol,
      {
        period1: utcDayStartSeconds(range.startDate),
        period2: utcDayEndSeconds(range.endDate),
      },
      'fetchChart'
    );

    const bars = toBars(symbol, result);
    const { meta } = result;
    logger.debug({ symbol, bars: bars.length, ...range }, 'Fetched chart');

    return {
      symbol,
      currency: meta.currency ?? null,
      exchangeName: meta.exchangeName ?? null,
      regularMarketPrice:
        typeof meta.regularMarketPrice === 'number' && meta.regularMarketPrice > 0
          ? meta.regularMarketPrice
          : null,
      regularMarketDate:
        typeof meta.regularMarketTime === 'number'
          ? toUtcDateString(meta.regularMarketTime * 1000)
          : null,
      bars,
    };
  }

  async fetchRate(from: CurrencyCode, to: CurrencyCode): Promise<ProviderRate> {
    const symbol = fxPairSymbol(from, to);
    const result = await this.fetchResult(symbol, { range: '1d' }, 'fetchRate');

    const rate = result.meta.regularMarketPrice;
    if (typeof rate !== 'number' || !(rate > 0)) {
      throw new ProviderParseError(`quote chart has no market price for ${symbol}`, this.name, symbol, 'fetchRate');
    }

    logger.debug({ from, to, rate }, 'Fetched rate from quote chart');
    return {
      from,
      to,
      rate,
      asOf:
        typeof result.meta.regularMarketTime === 'number'
          ? toUtcDateString(result.meta.regularMarketTime * 1000)
          : null,
    };
  }
}
