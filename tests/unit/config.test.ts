import { describe, expect, it } from 'vitest';
import { buildConfig, loadConfig } from '@/core/config';
import { loadEnvConfig, loadLoggingEnv } from '@/core/env';

describe('loadEnvConfig', () => {
  it('applies defaults for unset variables', () => {
    expect(loadEnvConfig({})).toEqual({
      databasePath: 'data/portfolio.db',
      rateTableBaseUrl: null,
      quoteChartBaseUrl: null,
      httpTimeoutMs: null,
      logLevel: 'info',
      nodeEnv: 'development',
    });
  });

  it('rejects a non-numeric timeout', () => {
    expect(() => loadEnvConfig({ HTTP_TIMEOUT_MS: 'abc' })).toThrow(
      'HTTP_TIMEOUT_MS must be a positive integer, got "abc"'
    );
  });

  it('falls back to info for unknown log levels', () => {
    expect(loadEnvConfig({ LOG_LEVEL: 'verbose' }).logLevel).toBe('info');
  });
});

describe('loadLoggingEnv', () => {
  it('is silent under test unless a level is set', () => {
    expect(loadLoggingEnv({ NODE_ENV: 'test' })).toEqual({ level: 'silent', pretty: false });
    expect(loadLoggingEnv({ NODE_ENV: 'test', LOG_LEVEL: 'debug' })).toEqual({ level: 'debug', pretty: false });
  });

  it('pretty-prints only in development', () => {
    expect(loadLoggingEnv({})).toEqual({ level: 'info', pretty: true });
    expect(loadLoggingEnv({ NODE_ENV: 'production' }).pretty).toBe(false);
  });
});

describe('buildConfig', () => {
  it('normalizes and deduplicates tracked pairs', () => {
    const config = buildConfig(
      { rates: { tracked_pairs: [['cad', 'usd'], ['CAD', 'USD'], ['USD', 'USD'], ['BRL']] } },
      {},
      '/tmp/project'
    );

    expect(config.rates.trackedPairs).toEqual([['CAD', 'USD']]);
  });

  it('uses defaults for missing or invalid values', () => {
    const config = buildConfig({ scheduler: { max_retries: -1 } }, null, '/tmp/project');

    expect(config.rates.freshnessHours).toBe(24);
    expect(config.prices.freshnessHours).toBe(4);
    expect(config.scheduler).toEqual({
      startupDelayMinutes: 2,
      intervalHours: 24,
      maxRetries: 3,
      initialBackoffMinutes: 5,
    });
    expect(config.resultCacheTtlMinutes).toBe(60);
  });

  it('lets environment values override provider settings', () => {
    const config = buildConfig(
      { providers: { rate_table_base_url: 'https://rates.example', http_timeout_ms: 8000 } },
      {},
      '/tmp/project',
      { rateTableBaseUrl: 'https://rates.test', quoteChartBaseUrl: null, httpTimeoutMs: 2500 }
    );

    expect(config.providers.rateTableBaseUrl).toBe('https://rates.test');
    expect(config.providers.httpTimeoutMs).toBe(2500);
  });
});

describe('loadConfig', () => {
  it('reads the bundled configuration files', () => {
    const config = loadConfig(process.cwd());

    expect(config.rates.trackedPairs).toHaveLength(6);
    expect(config.prices.tradableCategories).toEqual(['Stocks', 'ETF', 'FIIs']);
    expect(config.symbols.exchangeSuffixes).toEqual({ CAD: '.TO', BRL: '.SA', USD: '' });
    expect(config.currencyCountries.CAD).toBe('Canada');
  });
});
