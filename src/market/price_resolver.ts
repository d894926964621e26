/**
 * Security price resolution: store (4h window) -> quote chart -> last known.
 */

import { createChildLogger } from '@/utils/logger';
import { hoursToMs, isIsoDate, isWithinWindow, shiftIsoDate, toUtcDateString } from '@/core/time';
import type { PriceStore } from '@/data/repositories/price_repo';
import { describeError, type ChartResult, type QuoteChartProvider } from '@/providers/types';
import type { PriceBar, PriceLookup, PriceSeries } from '@/types/market';
import type { Holding, HoldingCategory } from '@/types/portfolio';
import { InvalidPriceRangeError } from './errors';
import type { SymbolMapper } from './symbol_mapper';

const logger = createChildLogger('prices');

export interface PriceResolverOptions {
  store: PriceStore;
  provider: Pick<QuoteChartProvider, 'fetchChart'>;
  mapper: SymbolMapper;
  freshnessHours: number;
  tradableCategories: readonly HoldingCategory[];
  defaultSeriesDays: number;
  clock?: () => number;
}

export interface PriceSeriesOptions {
  startDate?: string;
  endDate?: string;
  forceRefresh?: boolean;
}

export type PricedHolding = Pick<Holding, 'name' | 'currency' | 'category'>;

/**
 * Today's bar when the chart has one, else a close-only row from the
 * regular market price if that price belongs to today's session. On
 * weekends and holidays there is no row for today.
 */
function todaysBar(chart: ChartResult, today: string): PriceBar | null {
  const bar = chart.bars.find((b) => b.priceDate === today);
  if (bar) return bar;
  if (chart.regularMarketPrice === null || chart.regularMarketDate !== today) return null;

  return {
    symbol: chart.symbol,
    priceDate: today,
    open: null,
    high: null,
    low: null,
    close: chart.regularMarketPrice,
    volume: null,
    currency: chart.currency,
    exchangeName: chart.exchangeName,
  };
}

export class PriceResolver {
  private readonly store: PriceStore;
  private readonly provider: Pick<QuoteChartProvider, 'fetchChart'>;
  private readonly mapper: SymbolMapper;
  private readonly freshnessMs: number;
  private readonly tradable: ReadonlySet<HoldingCategory>;
  private readonly defaultSeriesDays: number;
  private readonly clock: () => number;

  constructor(options: PriceResolverOptions) {
    this.store = options.store;
    this.provider = options.provider;
    this.mapper = options.mapper;
    this.freshnessMs = hoursToMs(options.freshnessHours);
    this.tradable = new Set(options.tradableCategories);
    this.defaultSeriesDays = options.defaultSeriesDays;
    this.clock = options.clock ?? Date.now;
  }

  isTradable(category: HoldingCategory): boolean {
    return this.tradable.has(category);
  }

  async getCurrentPrice(holding: PricedHolding): Promise<PriceLookup> {
    if (!this.isTradable(holding.category)) {
      return { status: 'not_tradable' };
    }

    const mapping = this.mapper.mapToSymbol(holding.name, holding.currency);
    if (mapping.status === 'unmappable') {
      logger.debug({ name: holding.name, currency: holding.currency, reason: mapping.reason }, 'Unmappable holding');
      return { status: 'unmappable', reason: mapping.reason };
    }

    const { symbol } = mapping;
    const now = this.clock();
    const today = toUtcDateString(now);

    const cached = this.store.getPrice(symbol, today);
    if (cached && isWithinWindow(cached.updatedAt, this.freshnessMs, now)) {
      return {
        status: 'priced',
        symbol,
        price: cached.close,
        priceDate: cached.priceDate,
        source: 'cache',
        stale: false,
      };
    }

    try {
      const chart = await this.provider.fetchChart(symbol, { startDate: today, endDate: today });
      const bar = todaysBar(chart, today);
      if (bar) {
        this.store.savePrices([bar], now);
        return {
          status: 'priced',
          symbol,
          price: bar.close,
          priceDate: bar.priceDate,
          source: 'provider',
          stale: false,
        };
      }
      logger.warn({ symbol }, 'Quote chart returned no price for today');
    } catch (error) {
      logger.warn({ symbol, error: describeError(error) }, 'Price fetch failed');
    }

    const lastKnown = this.store.getLatestPrice(symbol);
    if (!lastKnown) {
      return { status: 'no_price', symbol };
    }

    logger.warn({ symbol, priceDate: lastKnown.priceDate }, 'Serving last known price');
    return {
      status: 'priced',
      symbol,
      price: lastKnown.close,
      priceDate: lastKnown.priceDate,
      source: 'last_known',
      stale: true,
    };
  }

  async getPriceSeries(rawSymbol: string, options: PriceSeriesOptions = {}): Promise<PriceSeries> {
    const symbol = rawSymbol.trim().toUpperCase();
    const now = this.clock();
    const today = toUtcDateString(now);
    const endDate = options.endDate ?? today;
    const startDate = options.startDate ?? (isIsoDate(endDate) ? shiftIsoDate(endDate, -this.defaultSeriesDays) : endDate);

    if (!isIsoDate(startDate) || !isIsoDate(endDate)) {
      throw new InvalidPriceRangeError(startDate, endDate, 'dates must be YYYY-MM-DD');
    }
    if (startDate > endDate) {
      throw new InvalidPriceRangeError(startDate, endDate);
    }

    const stored = this.store.getPrices(symbol, startDate, endDate);
    if (!options.forceRefresh && !this.seriesNeedsRefresh(stored, endDate, today, now)) {
      return { symbol, startDate, endDate, prices: stored, refreshed: false, stale: false };
    }

    try {
      const chart = await this.provider.fetchChart(symbol, { startDate, endDate });
      const bars = chart.bars.filter((b) => b.priceDate >= startDate && b.priceDate <= endDate);
      this.store.savePrices(bars, now);
      logger.info({ symbol, startDate, endDate, count: bars.length }, 'Price series refreshed');
      return {
        symbol,
        startDate,
        endDate,
        prices: this.store.getPrices(symbol, startDate, endDate),
        refreshed: true,
        stale: false,
      };
    } catch (error) {
      logger.warn({ symbol, startDate, endDate, error: describeError(error) }, 'Price series refresh failed');
      return { symbol, startDate, endDate, prices: stored, refreshed: false, stale: true };
    }
  }

  private seriesNeedsRefresh(
    stored: PriceSeries['prices'],
    endDate: string,
    today: string,
    now: number
  ): boolean {
    const latest = stored.at(-1);
    if (!latest) return true;
    if (latest.priceDate < endDate && endDate <= today) return true;
    return latest.priceDate === today && !isWithinWindow(latest.updatedAt, this.freshnessMs, now);
  }

  listSymbols(): string[] {
    return this.store.listSymbols();
  }

  deletePrices(symbol: string, priceDate?: string): number {
    return this.store.deletePrices(symbol.trim().toUpperCase(), priceDate);
  }
}
