import { describe, expect, it, vi } from 'vitest';
import { RateTableClient } from '@/providers/frankfurter/client';
import type { FetchLike } from '@/providers/http';
import { ProviderParseError, ProviderUnavailableError } from '@/providers/types';
import { QuoteChartClient, fxPairSymbol } from '@/providers/yahoo/client';
import { jsonResponse } from '../helpers/fixtures';

const TS_JAN_13 = Date.UTC(2026, 0, 13, 14, 30) / 1000;
const TS_JAN_14 = Date.UTC(2026, 0, 14, 14, 30) / 1000;

function rateTable(fetchImpl: FetchLike, timeoutMs = 1000): RateTableClient {
  return new RateTableClient({
    baseUrl: 'https://rates.test/',
    timeoutMs,
    userAgent: 'test-agent',
    fetch: fetchImpl,
  });
}

function quoteChart(fetchImpl: FetchLike): QuoteChartClient {
  return new QuoteChartClient({
    baseUrl: 'https://chart.test',
    timeoutMs: 1000,
    userAgent: 'test-agent',
    fetch: fetchImpl,
  });
}

describe('RateTableClient', () => {
  it('requests the table for the base currency and picks the target rate', async () => {
    const fetchMock = vi.fn<FetchLike>(async () =>
      jsonResponse({ amount: 1, base: 'CAD', date: '2026-01-15', rates: { USD: 0.73, BRL: 3.9 } })
    );

    const result = await rateTable(fetchMock).fetchRate('CAD', 'USD');

    expect(result).toEqual({ from: 'CAD', to: 'USD', rate: 0.73, asOf: '2026-01-15' });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://rates.test/latest?from=CAD');
  });

  it('sends the configured user agent', async () => {
    const fetchMock = vi.fn<FetchLike>(async () =>
      jsonResponse({ base: 'CAD', rates: { USD: 0.73 } })
    );

    await rateTable(fetchMock).fetchRate('CAD', 'USD');

    const init = fetchMock.mock.calls[0]?.[1];
    expect(init?.headers).toMatchObject({ 'user-agent': 'test-agent' });
  });

  it('fails with a parse error when the requested currency is missing', async () => {
    const fetchMock = vi.fn<FetchLike>(async () => jsonResponse({ base: 'CAD', rates: { USD: 0.73 } }));

    await expect(rateTable(fetchMock).fetchRate('CAD', 'BRL')).rejects.toBeInstanceOf(ProviderParseError);
  });

  it('fails with a parse error when the payload does not match the schema', async () => {
    const fetchMock = vi.fn<FetchLike>(async () => jsonResponse({ base: 'CAD', rates: 'none' }));

    await expect(rateTable(fetchMock).fetchRate('CAD', 'USD')).rejects.toBeInstanceOf(ProviderParseError);
  });

  it('reports non-success status as unavailable with the status code', async () => {
    const fetchMock = vi.fn<FetchLike>(async () => jsonResponse({ message: 'down' }, 503));

    await expect(rateTable(fetchMock).fetchRate('CAD', 'USD')).rejects.toMatchObject({
      name: 'ProviderUnavailableError',
      status: 503,
      provider: 'rate_table',
    });
  });

  it('reports network errors as unavailable', async () => {
    const fetchMock = vi.fn<FetchLike>(async () => {
      throw new TypeError('fetch failed');
    });

    await expect(rateTable(fetchMock).fetchRate('CAD', 'USD')).rejects.toBeInstanceOf(ProviderUnavailableError);
  });

  it('aborts requests that exceed the timeout', async () => {
    const fetchMock = vi.fn<FetchLike>(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            const error = new Error('This operation was aborted');
            error.name = 'AbortError';
            reject(error);
          });
        })
    );

    await expect(rateTable(fetchMock, 10).fetchRate('CAD', 'USD')).rejects.toMatchObject({
      name: 'ProviderUnavailableError',
      message: 'rate_table request timed out after 10ms',
    });
  });

  it('times out when the response body never finishes', async () => {
    const fetchMock = vi.fn<FetchLike>(async () =>
      new Response(new ReadableStream<Uint8Array>({ start() {} }), {
        status: 200,
        headers: { 'content-type': 'application/json' },
      })
    );

    await expect(rateTable(fetchMock, 20).fetchRate('CAD', 'USD')).rejects.toMatchObject({
      name: 'ProviderUnavailableError',
      message: 'rate_table request timed out after 20ms',
    });
  });
});

describe('QuoteChartClient', () => {
  it('builds synthetic FX pair symbols', () => {
    expect(fxPairSymbol('CAD', 'USD')).toBe('CADUSD=X');
  });

  it('reads the spot rate from the chart meta', async () => {
    const fetchMock = vi.fn<FetchLike>(async () =>
      jsonResponse({
        chart: {
          result: [{ meta: { symbol: 'CADUSD=X', currency: 'USD', regularMarketPrice: 0.731 } }],
          error: null,
        },
      })
    );

    const result = await quoteChart(fetchMock).fetchRate('CAD', 'USD');

    expect(result).toEqual({ from: 'CAD', to: 'USD', rate: 0.731, asOf: null });
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://chart.test/CADUSD%3DX?interval=1d&range=1d');
  });

  it('fails with a parse error when the pair has no market price', async () => {
    const fetchMock = vi.fn<FetchLike>(async () =>
      jsonResponse({ chart: { result: [{ meta: { symbol: 'CADUSD=X' } }], error: null } })
    );

    await expect(quoteChart(fetchMock).fetchRate('CAD', 'USD')).rejects.toBeInstanceOf(ProviderParseError);
  });

  it('parses daily bars and skips entries without a close', async () => {
    const fetchMock = vi.fn<FetchLike>(async () =>
      jsonResponse({
        chart: {
          result: [
            {
              meta: {
                symbol: 'AAPL',
                currency: 'USD',
                exchangeName: 'NMS',
                regularMarketPrice: 191.2,
                regularMarketTime: TS_JAN_14,
              },
              timestamp: [TS_JAN_13, TS_JAN_14],
              indicators: {
                quote: [
                  {
                    open: [187, 189],
                    high: [190, 192],
                    low: [186, null],
                    close: [189.5, null],
                    volume: [5000, 6000],
                  },
                ],
              },
            },
          ],
          error: null,
        },
      })
    );

    const result = await quoteChart(fetchMock).fetchChart('AAPL', {
      startDate: '2026-01-13',
      endDate: '2026-01-14',
    });

    expect(result.bars).toEqual([
      {
        symbol: 'AAPL',
        priceDate: '2026-01-13',
        open: 187,
        high: 190,
        low: 186,
        close: 189.5,
        volume: 5000,
        currency: 'USD',
        exchangeName: 'NMS',
      },
    ]);
    expect(result.regularMarketPrice).toBe(191.2);
    expect(result.regularMarketDate).toBe('2026-01-14');

    const url = new URL(fetchMock.mock.calls[0]?.[0] ?? '');
    expect(url.searchParams.get('period1')).toBe(String(Date.UTC(2026, 0, 13) / 1000));
    expect(url.searchParams.get('period2')).toBe(String(Date.UTC(2026, 0, 15) / 1000 - 1));
  });

  it('surfaces chart errors as parse errors', async () => {
    const fetchMock = vi.fn<FetchLike>(async () =>
      jsonResponse({
        chart: { result: null, error: { code: 'Not Found', description: 'No data found, symbol may be delisted' } },
      })
    );

    await expect(
      quoteChart(fetchMock).fetchChart('ZZZZ', { startDate: '2026-01-13', endDate: '2026-01-14' })
    ).rejects.toMatchObject({
      name: 'ProviderParseError',
      message: 'quote chart error for ZZZZ: No data found, symbol may be delisted',
    });
  });
});
