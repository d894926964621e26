/**
 * Exchange rate resolution: store -> rate table -> quote chart.
 *
 * Rates are directional: A->B and B->A are fetched and stored independently.
 * Provider failures never escape getRate; callers get an explicit
 * 'unavailable' result instead.
 */

import { createChildLogger } from '@/utils/logger';
import { hoursToMs, isWithinWindow } from '@/core/time';
import type { RateStore } from '@/data/repositories/rate_repo';
import {
  ProviderUnavailableError,
  describeError,
  type ProviderRate,
  type QuoteChartProvider,
  type RateTableProvider,
} from '@/providers/types';
import type {
  CurrencyPair,
  RateRefreshSummary,
  RateResult,
  RateSource,
} from '@/types/market';
import type { CurrencyCode } from '@/types/portfolio';
import { NoRateAvailableError, RateRefreshError } from './errors';

const logger = createChildLogger('exchange_rates');

export interface ExchangeRateResolverOptions {
  store: RateStore;
  primary: RateTableProvider;
  secondary: QuoteChartProvider;
  freshnessHours: number;
  clock?: () => number;
}

type RateFetcher = {
  source: Exclude<RateSource, 'identity' | 'cache'>;
  fetch: (from: CurrencyCode, to: CurrencyCode) => Promise<ProviderRate>;
};

function normalizeCode(code: CurrencyCode): CurrencyCode {
  return code.trim().toUpperCase();
}

export class ExchangeRateResolver {
  private readonly store: RateStore;
  private readonly fetchers: RateFetcher[];
  private readonly freshnessMs: number;
  private readonly clock: () => number;

  constructor(options: ExchangeRateResolverOptions) {
    this.store = options.store;
    this.freshnessMs = hoursToMs(options.freshnessHours);
    this.clock = options.clock ?? Date.now;

    const { primary, secondary } = options;
    this.fetchers = [
      { source: 'rate_table', fetch: (from, to) => primary.fetchRate(from, to) },
      { source: 'quote_chart', fetch: (from, to) => secondary.fetchRate(from, to) },
    ];
  }

  async getRate(fromCurrency: CurrencyCode, toCurrency: CurrencyCode): Promise<RateResult> {
    const from = normalizeCode(fromCurrency);
    const to = normalizeCode(toCurrency);

    if (from === to) {
      return { status: 'ok', from, to, rate: 1, source: 'identity', lastUpdated: this.clock() };
    }

    const cached = this.store.getRate(from, to);
    if (cached && isWithinWindow(cached.lastUpdated, this.freshnessMs, this.clock())) {
      return {
        status: 'ok',
        from,
        to,
        rate: cached.rate,
        source: 'cache',
        lastUpdated: cached.lastUpdated,
      };
    }

    return this.refreshRate(from, to);
  }

  /**
   * Runs the provider chain for one pair, skipping the store read.
   */
  async refreshRate(fromCurrency: CurrencyCode, toCurrency: CurrencyCode): Promise<RateResult> {
    const from = normalizeCode(fromCurrency);
    const to = normalizeCode(toCurrency);

    if (from === to) {
      return { status: 'ok', from, to, rate: 1, source: 'identity', lastUpdated: this.clock() };
    }

    const failures: string[] = [];

    for (const fetcher of this.fetchers) {
      let fetched: ProviderRate;
      try {
        fetched = await fetcher.fetch(from, to);
      } catch (error) {
        const status = error instanceof ProviderUnavailableError ? error.status : null;
        logger.warn(
          { from, to, provider: fetcher.source, status, error: describeError(error) },
          'Exchange rate provider failed'
        );
        failures.push(`${fetcher.source}: ${describeError(error)}`);
        continue;
      }

      const saved = this.store.upsertRate(from, to, fetched.rate, this.clock());
      logger.info({ from, to, rate: saved.rate, provider: fetcher.source }, 'Exchange rate refreshed');
      return {
        status: 'ok',
        from,
        to,
        rate: saved.rate,
        source: fetcher.source,
        lastUpdated: saved.lastUpdated,
      };
    }

    logger.error({ from, to }, 'Exchange rate unavailable from all providers');
    return { status: 'unavailable', from, to, reason: failures.join('; ') };
  }

  /**
   * Refreshes every pair in order. Individual failures are collected; the
   * batch only throws when nothing could be refreshed.
   */
  async updateAll(pairs: readonly CurrencyPair[]): Promise<RateRefreshSummary> {
    const summary: RateRefreshSummary = { updated: [], failed: [] };

    for (const [from, to] of pairs) {
      let result: RateResult;
      try {
        result = await this.refreshRate(from, to);
      } catch (error) {
        logger.error({ from, to, error: describeError(error) }, 'Unexpected error refreshing rate');
        summary.failed.push({ from, to, reason: describeError(error) });
        continue;
      }

      if (result.status === 'ok') {
        summary.updated.push({ from: result.from, to: result.to, rate: result.rate, source: result.source });
      } else {
        summary.failed.push({ from: result.from, to: result.to, reason: result.reason });
      }
    }

    logger.info(
      { updated: summary.updated.length, failed: summary.failed.length },
      'Exchange rate update finished'
    );

    if (pairs.length > 0 && summary.updated.length === 0) {
      throw new RateRefreshError(summary);
    }

    return summary;
  }

  async convert(amount: number, fromCurrency: CurrencyCode, toCurrency: CurrencyCode): Promise<number> {
    const from = normalizeCode(fromCurrency);
    const to = normalizeCode(toCurrency);
    if (from === to) {
      return amount;
    }

    const result = await this.getRate(from, to);
    if (result.status !== 'ok') {
      throw new NoRateAvailableError(from, to, result.reason);
    }
    return amount * result.rate;
  }

  /**
   * Stored rates still inside the freshness window, keyed FROMTO.
   */
  getAllCurrentRates(): Record<string, number> {
    const now = this.clock();
    const rates: Record<string, number> = {};
    for (const row of this.store.listRates({ updatedSince: now - this.freshnessMs })) {
      rates[`${row.fromCurrency}${row.toCurrency}`] = row.rate;
    }
    return rates;
  }
}
