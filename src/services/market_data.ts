/**
 * Wires stores, providers and services into one object for callers
 * (HTTP handlers, scripts).
 */

import { loadConfig, type AppConfig } from '@/core/config';
import { loadEnvConfig, type EnvConfig } from '@/core/env';
import { hoursToMs, minutesToMs, minutesToSeconds } from '@/core/time';
import { closeDatabase, openDatabase, type SqliteDatabase } from '@/data/db';
import { PortfolioRepository } from '@/data/portfolio';
import { ResultCache } from '@/data/repositories/cache_repo';
import { PriceStore } from '@/data/repositories/price_repo';
import { RateStore } from '@/data/repositories/rate_repo';
import { DashboardService } from '@/dashboard/dashboard_service';
import { ExchangeRateResolver } from '@/market/exchange_rate_resolver';
import { PriceResolver } from '@/market/price_resolver';
import { SymbolMapper } from '@/market/symbol_mapper';
import { PerformanceService } from '@/performance/performance_service';
import { RateTableClient } from '@/providers/frankfurter/client';
import type { FetchLike } from '@/providers/http';
import type { QuoteChartProvider, RateTableProvider } from '@/providers/types';
import { QuoteChartClient } from '@/providers/yahoo/client';
import { RateRefresher } from '@/scheduler/rate_refresher';
import type { Delay } from '@/utils/delay';
import { PortfolioService } from './portfolio_service';

export interface MarketDataServicesOptions {
  projectRoot?: string;
  env?: EnvConfig;
  config?: AppConfig;
  /** Opened from env.databasePath when omitted. */
  db?: SqliteDatabase;
  fetch?: FetchLike;
  rateTable?: RateTableProvider;
  quoteChart?: QuoteChartProvider;
  clock?: () => number;
  delay?: Delay;
}

export interface MarketDataServices {
  config: AppConfig;
  db: SqliteDatabase;
  rates: ExchangeRateResolver;
  prices: PriceResolver;
  symbols: SymbolMapper;
  performance: PerformanceService;
  dashboard: DashboardService;
  portfolio: PortfolioService;
  resultCache: ResultCache;
  refresher: RateRefresher;
  /** One-shot refresh of every tracked pair. */
  refreshTrackedRates: () => ReturnType<ExchangeRateResolver['updateAll']>;
  close: () => Promise<void>;
}

export function createMarketDataServices(options: MarketDataServicesOptions = {}): MarketDataServices {
  const projectRoot = options.projectRoot ?? process.cwd();
  const env = options.env ?? loadEnvConfig();
  const config = options.config ?? loadConfig(projectRoot, env);
  const ownsDb = options.db === undefined;
  const db = options.db ?? openDatabase({ path: env.databasePath, projectRoot });
  const clock = options.clock ?? Date.now;

  const { providers } = config;
  const rateTable =
    options.rateTable ??
    new RateTableClient({
      baseUrl: providers.rateTableBaseUrl,
      timeoutMs: providers.httpTimeoutMs,
      userAgent: providers.userAgent,
      fetch: options.fetch,
    });
  const quoteChart =
    options.quoteChart ??
    new QuoteChartClient({
      baseUrl: providers.quoteChartBaseUrl,
      timeoutMs: providers.httpTimeoutMs,
      userAgent: providers.userAgent,
      fetch: options.fetch,
    });

  const rates = new ExchangeRateResolver({
    store: new RateStore(db),
    primary: rateTable,
    secondary: quoteChart,
    freshnessHours: config.rates.freshnessHours,
    clock,
  });

  const symbols = new SymbolMapper(config.symbols);
  const prices = new PriceResolver({
    store: new PriceStore(db),
    provider: quoteChart,
    mapper: symbols,
    freshnessHours: config.prices.freshnessHours,
    tradableCategories: config.prices.tradableCategories,
    defaultSeriesDays: config.prices.defaultSeriesDays,
    clock,
  });

  const resultCache = new ResultCache(db, {
    defaultTtlSeconds: minutesToSeconds(config.resultCacheTtlMinutes),
    clock,
  });
  const repo = new PortfolioRepository(db);
  const performance = new PerformanceService({ portfolio: repo, prices, rates });
  const dashboard = new DashboardService({
    portfolio: repo,
    performance,
    cache: resultCache,
    currencyCountries: config.currencyCountries,
    clock,
  });

  const { scheduler } = config;
  const refresher = new RateRefresher({
    resolver: rates,
    pairs: config.rates.trackedPairs,
    startupDelayMs: minutesToMs(scheduler.startupDelayMinutes),
    intervalMs: hoursToMs(scheduler.intervalHours),
    maxRetries: scheduler.maxRetries,
    initialBackoffMs: minutesToMs(scheduler.initialBackoffMinutes),
    delay: options.delay,
    clock,
  });

  return {
    config,
    db,
    rates,
    prices,
    symbols,
    performance,
    dashboard,
    portfolio: new PortfolioService(repo, resultCache),
    resultCache,
    refresher,
    refreshTrackedRates: () => rates.updateAll(config.rates.trackedPairs),
    close: async () => {
      await refresher.stop();
      if (ownsDb) {
        closeDatabase(db);
      }
    },
  };
}
