/**
 * Exchange rate repository
 *
 * One row per ordered pair; CAD->USD and USD->CAD are stored and
 * refreshed independently.
 */

import type { SqliteDatabase } from '../db';
import type { ExchangeRateRecord } from '@/types/market';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('rate_repo');

const SELECT_COLUMNS = `
  from_currency as fromCurrency,
  to_currency as toCurrency,
  rate,
  last_updated as lastUpdated,
  created_at as createdAt
`;

export class RateStore {
  constructor(private readonly db: SqliteDatabase) {}

  getRate(fromCurrency: string, toCurrency: string): ExchangeRateRecord | null {
    const stmt = this.db.prepare<[string, string], ExchangeRateRecord>(`
      SELECT ${SELECT_COLUMNS}
      FROM exchange_rates
      WHERE from_currency = ? AND to_currency = ?
    `);

    return stmt.get(fromCurrency, toCurrency) ?? null;
  }

  upsertRate(
    fromCurrency: string,
    toCurrency: string,
    rate: number,
    now: number = Date.now()
  ): ExchangeRateRecord {
    if (!Number.isFinite(rate) || rate <= 0) {
      throw new Error(`Exchange rate must be a positive number, got ${rate}`);
    }

    const stmt = this.db.prepare<[string, string, number, number, number]>(`
      INSERT INTO exchange_rates (from_currency, to_currency, rate, last_updated, created_at)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(from_currency, to_currency) DO UPDATE SET
        rate = excluded.rate,
        last_updated = excluded.last_updated
    `);

    stmt.run(fromCurrency, toCurrency, rate, now, now);
    logger.debug({ fromCurrency, toCurrency, rate }, 'Saved exchange rate');

    const saved = this.getRate(fromCurrency, toCurrency);
    if (!saved) {
      throw new Error(`Exchange rate ${fromCurrency}->${toCurrency} missing after upsert`);
    }
    return saved;
  }

  listRates(options: { updatedSince?: number } = {}): ExchangeRateRecord[] {
    if (options.updatedSince !== undefined) {
      const stmt = this.db.prepare<[number], ExchangeRateRecord>(`
        SELECT ${SELECT_COLUMNS}
        FROM exchange_rates
        WHERE last_updated >= ?
        ORDER BY from_currency, to_currency
      `);
      return stmt.all(options.updatedSince);
    }

    const stmt = this.db.prepare<[], ExchangeRateRecord>(`
      SELECT ${SELECT_COLUMNS}
      FROM exchange_rates
      ORDER BY from_currency, to_currency
    `);
    return stmt.all();
  }
}
