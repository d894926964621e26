/**
 * Security price repository for daily OHLC rows
 */

import type { SqliteDatabase } from '../db';
import type { PriceBar, SecurityPriceRecord } from '@/types/market';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('price_repo');

const SELECT_COLUMNS = `
  symbol,
  price_date as priceDate,
  open,
  high,
  low,
  close,
  volume,
  currency,
  exchange_name as exchangeName,
  created_at as createdAt,
  updated_at as updatedAt
`;

type PriceInsertParams = [
  string,
  string,
  number | null,
  number | null,
  number | null,
  number,
  number | null,
  string | null,
  string | null,
  number,
  number,
];

export class PriceStore {
  constructor(private readonly db: SqliteDatabase) {}

  /**
   * Upserts rows keyed by (symbol, price_date). created_at is kept on update.
   */
  savePrices(prices: PriceBar[], now: number = Date.now()): number {
    if (prices.length === 0) return 0;

    const stmt = this.db.prepare<PriceInsertParams>(`
      INSERT INTO security_prices (
        symbol, price_date, open, high, low, close, volume,
        currency, exchange_name, created_at, updated_at
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(symbol, price_date) DO UPDATE SET
        open = excluded.open,
        high = excluded.high,
        low = excluded.low,
        close = excluded.close,
        volume = excluded.volume,
        currency = excluded.currency,
        exchange_name = excluded.exchange_name,
        updated_at = excluded.updated_at
    `);

    const insertMany = this.db.transaction((records: PriceBar[]) => {
      for (const p of records) {
        stmt.run(
          p.symbol,
          p.priceDate,
          p.open,
          p.high,
          p.low,
          p.close,
          p.volume,
          p.currency,
          p.exchangeName,
          now,
          now
        );
      }
    });

    insertMany(prices);
    logger.debug({ count: prices.length, symbol: prices[0]?.symbol }, 'Saved prices');

    return prices.length;
  }

  getPrice(symbol: string, priceDate: string): SecurityPriceRecord | null {
    const stmt = this.db.prepare<[string, string], SecurityPriceRecord>(`
      SELECT ${SELECT_COLUMNS}
      FROM security_prices
      WHERE symbol = ? AND price_date = ?
    `);

    return stmt.get(symbol, priceDate) ?? null;
  }

  getLatestPrice(symbol: string): SecurityPriceRecord | null {
    const stmt = this.db.prepare<[string], SecurityPriceRecord>(`
      SELECT ${SELECT_COLUMNS}
      FROM security_prices
      WHERE symbol = ?
      ORDER BY price_date DESC
      LIMIT 1
    `);

    return stmt.get(symbol) ?? null;
  }

  getPrices(symbol: string, fromDate: string, toDate: string): SecurityPriceRecord[] {
    const stmt = this.db.prepare<[string, string, string], SecurityPriceRecord>(`
      SELECT ${SELECT_COLUMNS}
      FROM security_prices
      WHERE symbol = ? AND price_date >= ? AND price_date <= ?
      ORDER BY price_date ASC
    `);

    return stmt.all(symbol, fromDate, toDate);
  }

  listSymbols(): string[] {
    const stmt = this.db.prepare<[], { symbol: string }>(
      'SELECT DISTINCT symbol FROM security_prices ORDER BY symbol'
    );
    return stmt.all().map((r) => r.symbol);
  }

  deletePrices(symbol: string, priceDate?: string): number {
    if (priceDate !== undefined) {
      const stmt = this.db.prepare<[string, string]>(
        'DELETE FROM security_prices WHERE symbol = ? AND price_date = ?'
      );
      return stmt.run(symbol, priceDate).changes;
    }

    const stmt = this.db.prepare<[string]>('DELETE FROM security_prices WHERE symbol = ?');
    return stmt.run(symbol).changes;
  }
}
