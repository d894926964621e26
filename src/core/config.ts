/**
 * Application configuration loaded from JSON files
 *
 * config/market_data.json   freshness windows, tracked pairs, scheduler, providers
 * config/symbol_aliases.json exchange suffixes and alias tables per currency
 *
 * Environment values (see env.ts) override provider settings.
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import type { EnvConfig } from './env';
import type { CurrencyPair } from '@/types/market';
import { isHoldingCategory, type CurrencyCode, type HoldingCategory } from '@/types/portfolio';

export interface RatesConfig {
  freshnessHours: number;
  trackedPairs: CurrencyPair[];
}

export interface PricesConfig {
  freshnessHours: number;
  tradableCategories: HoldingCategory[];
  defaultSeriesDays: number;
}

export interface SchedulerConfig {
  startupDelayMinutes: number;
  intervalHours: number;
  maxRetries: number;
  initialBackoffMinutes: number;
}

export interface ProvidersConfig {
  rateTableBaseUrl: string;
  quoteChartBaseUrl: string;
  httpTimeoutMs: number;
  userAgent: string;
}

export interface SymbolAlias {
  alias: string;
  symbol: string;
}

export interface SymbolConfig {
  /** Currency -> exchange suffix ('' for markets quoted without one). */
  exchangeSuffixes: Record<CurrencyCode, string>;
  aliases: Record<CurrencyCode, SymbolAlias[]>;
}

export interface AppConfig {
  rates: RatesConfig;
  prices: PricesConfig;
  scheduler: SchedulerConfig;
  resultCacheTtlMinutes: number;
  providers: ProvidersConfig;
  currencyCountries: Record<CurrencyCode, string>;
  symbols: SymbolConfig;
  projectRoot: string;
}

type RawObject = Record<string, unknown>;

function isObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: RawObject, key: string): RawObject {
  const value = raw[key];
  return isObject(value) ? value : {};
}

function positiveNumber(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : fallback;
}

function nonNegativeInt(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : fallback;
}

function nonEmptyString(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.trim() ? value.trim() : fallback;
}

function normalizeCurrency(value: unknown): CurrencyCode | null {
  if (typeof value !== 'string') return null;
  const upper = value.trim().toUpperCase();
  return /^[A-Z]{3}$/.test(upper) ? upper : null;
}

function normalizePairs(value: unknown): CurrencyPair[] {
  if (!Array.isArray(value)) return [];
  const pairs: CurrencyPair[] = [];
  const seen = new Set<string>();
  for (const entry of value) {
    if (!Array.isArray(entry) || entry.length !== 2) continue;
    const from = normalizeCurrency(entry[0]);
    const to = normalizeCurrency(entry[1]);
    if (!from || !to || from === to) continue;
    const key = `${from}${to}`;
    if (seen.has(key)) continue;
    seen.add(key);
    pairs.push([from, to]);
  }
  return pairs;
}

function normalizeCategories(value: unknown): HoldingCategory[] {
  if (!Array.isArray(value)) return ['Stocks', 'ETF', 'FIIs'];
  return value.filter(isHoldingCategory);
}

function normalizeStringMap(value: unknown): Record<CurrencyCode, string> {
  const result: Record<CurrencyCode, string> = {};
  if (!isObject(value)) return result;
  for (const [key, entry] of Object.entries(value)) {
    const currency = normalizeCurrency(key);
    if (currency && typeof entry === 'string') {
      result[currency] = entry.trim().toUpperCase();
    }
  }
  return result;
}

function normalizeAliases(value: unknown): Record<CurrencyCode, SymbolAlias[]> {
  const result: Record<CurrencyCode, SymbolAlias[]> = {};
  if (!isObject(value)) return result;
  for (const [key, entries] of Object.entries(value)) {
    const currency = normalizeCurrency(key);
    if (!currency || !Array.isArray(entries)) continue;
    const aliases: SymbolAlias[] = [];
    for (const entry of entries) {
      if (!isObject(entry)) continue;
      const alias = typeof entry.alias === 'string' ? entry.alias.trim().toUpperCase() : '';
      const symbol = typeof entry.symbol === 'string' ? entry.symbol.trim().toUpperCase() : '';
      if (alias && symbol) aliases.push({ alias, symbol });
    }
    result[currency] = aliases;
  }
  return result;
}

function normalizeCountries(value: unknown): Record<CurrencyCode, string> {
  const result: Record<CurrencyCode, string> = {};
  if (!isObject(value)) return result;
  for (const [key, entry] of Object.entries(value)) {
    const currency = normalizeCurrency(key);
    if (currency && typeof entry === 'string' && entry.trim()) {
      result[currency] = entry.trim();
    }
  }
  return result;
}

export function buildConfig(
  marketData: unknown,
  symbolAliases: unknown,
  projectRoot: string,
  env?: Pick<EnvConfig, 'rateTableBaseUrl' | 'quoteChartBaseUrl' | 'httpTimeoutMs'>
): AppConfig {
  const raw = isObject(marketData) ? marketData : {};
  const rates = section(raw, 'rates');
  const prices = section(raw, 'prices');
  const scheduler = section(raw, 'scheduler');
  const resultCache = section(raw, 'result_cache');
  const providers = section(raw, 'providers');
  const symbols = isObject(symbolAliases) ? symbolAliases : {};

  return {
    rates: {
      freshnessHours: positiveNumber(rates.freshness_hours, 24),
      trackedPairs: normalizePairs(rates.tracked_pairs),
    },
    prices: {
      freshnessHours: positiveNumber(prices.freshness_hours, 4),
      tradableCategories: normalizeCategories(prices.tradable_categories),
      defaultSeriesDays: positiveNumber(prices.default_series_days, 30),
    },
    scheduler: {
      startupDelayMinutes: positiveNumber(scheduler.startup_delay_minutes, 2),
      intervalHours: positiveNumber(scheduler.interval_hours, 24),
      maxRetries: nonNegativeInt(scheduler.max_retries, 3),
      initialBackoffMinutes: positiveNumber(scheduler.initial_backoff_minutes, 5),
    },
    resultCacheTtlMinutes: positiveNumber(resultCache.ttl_minutes, 60),
    providers: {
      rateTableBaseUrl:
        env?.rateTableBaseUrl ??
        nonEmptyString(providers.rate_table_base_url, 'https://api.frankfurter.app'),
      quoteChartBaseUrl:
        env?.quoteChartBaseUrl ??
        nonEmptyString(
          providers.quote_chart_base_url,
          'https://query1.finance.yahoo.com/v8/finance/chart'
        ),
      httpTimeoutMs: env?.httpTimeoutMs ?? positiveNumber(providers.http_timeout_ms, 8000),
      userAgent: nonEmptyString(providers.user_agent, 'holdings-market-data/0.1'),
    },
    currencyCountries: normalizeCountries(raw.currency_countries),
    symbols: {
      exchangeSuffixes: normalizeStringMap(symbols.exchange_suffixes),
      aliases: normalizeAliases(symbols.aliases),
    },
    projectRoot,
  };
}

function readJson(path: string): unknown {
  return JSON.parse(readFileSync(path, 'utf-8'));
}

export function loadConfig(projectRoot: string = process.cwd(), env?: EnvConfig): AppConfig {
  const configDir = join(projectRoot, 'config');
  return buildConfig(
    readJson(join(configDir, 'market_data.json')),
    readJson(join(configDir, 'symbol_aliases.json')),
    projectRoot,
    env
  );
}
