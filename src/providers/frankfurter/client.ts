/**
 * Rate table client (Frankfurter-compatible API)
 * GET {base}/latest?from=CCY -> { date, base, rates: { CCY: rate } }
 */

import { createChildLogger } from '@/utils/logger';
import { validateRateTable } from '@/validation/ajv_instance';
import type { CurrencyCode } from '@/types/portfolio';
import { HttpClient, type FetchLike } from '../http';
import { ProviderParseError, type ProviderRate, type RateTableProvider } from '../types';

const logger = createChildLogger('rate_table');

export interface RateTableClientOptions {
  baseUrl: string;
  timeoutMs: number;
  userAgent: string;
  fetch?: FetchLike;
}

export class RateTableClient implements RateTableProvider {
  readonly name = 'rate_table' as const;
  private readonly http: HttpClient;
  private readonly baseUrl: string;

  constructor(options: RateTableClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.http = new HttpClient({
      provider: this.name,
      timeoutMs: options.timeoutMs,
      userAgent: options.userAgent,
      fetch: options.fetch,
    });
  }

  async fetchRate(from: CurrencyCode, to: CurrencyCode): Promise<ProviderRate> {
    const pair = `${from}${to}`;
    const url = new URL(`${this.baseUrl}/latest`);
    url.searchParams.set('from', from);

    const body = await this.http.getJson(url.toString(), pair, 'fetchRate');
    const result = validateRateTable(body);
    if (!result.valid) {
      throw new ProviderParseError(
        `rate table payload failed validation for ${from}`,
        this.name,
        pair,
        'fetchRate',
        result.errors
      );
    }

    const table = result.data;
    if (table.base !== from) {
      throw new ProviderParseError(
        `rate table answered for base ${table.base}, expected ${from}`,
        this.name,
        pair,
        'fetchRate'
      );
    }

    const rate = table.rates[to];
    if (rate === undefined) {
      throw new ProviderParseError(
        `rate table has no ${to} rate for base ${from}`,
        this.name,
        pair,
        'fetchRate'
      );
    }

    logger.debug({ from, to, rate, asOf: table.date }, 'Fetched rate from rate table');
    return { from, to, rate, asOf: table.date ?? null };
  }
}
