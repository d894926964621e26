import type { CurrencyCode } from './portfolio';

export interface ExchangeRateRecord {
  fromCurrency: CurrencyCode;
  toCurrency: CurrencyCode;
  rate: number;
  lastUpdated: number;
  createdAt: number;
}

export interface SecurityPriceRecord {
  symbol: string;
  /** YYYY-MM-DD (UTC trading day) */
  priceDate: string;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number;
  volume: number | null;
  currency: string | null;
  exchangeName: string | null;
  createdAt: number;
  updatedAt: number;
}

/** A price row as produced by a provider, before persistence stamps it. */
export type PriceBar = Omit<SecurityPriceRecord, 'createdAt' | 'updatedAt'>;

export type RateSource = 'identity' | 'cache' | 'rate_table' | 'quote_chart';

export type RateResult =
  | {
      status: 'ok';
      from: CurrencyCode;
      to: CurrencyCode;
      rate: number;
      source: RateSource;
      lastUpdated: number;
    }
  | {
      status: 'unavailable';
      from: CurrencyCode;
      to: CurrencyCode;
      reason: string;
    };

export type CurrencyPair = readonly [from: CurrencyCode, to: CurrencyCode];

export interface RateRefreshSummary {
  updated: Array<{ from: CurrencyCode; to: CurrencyCode; rate: number; source: RateSource }>;
  failed: Array<{ from: CurrencyCode; to: CurrencyCode; reason: string }>;
}

export type SymbolRule = 'already_suffixed' | 'alias' | 'first_token';

export type SymbolMapping =
  | { status: 'mapped'; symbol: string; rule: SymbolRule }
  | { status: 'unmappable'; reason: string };

export type PriceSource = 'cache' | 'provider' | 'last_known';

export type PriceLookup =
  | {
      status: 'priced';
      symbol: string;
      price: number;
      priceDate: string;
      source: PriceSource;
      /** True when a live refresh failed and the last known value was served. */
      stale: boolean;
    }
  | { status: 'not_tradable' }
  | { status: 'unmappable'; reason: string }
  | { status: 'no_price'; symbol: string };

export interface PriceSeries {
  symbol: string;
  startDate: string;
  endDate: string;
  prices: SecurityPriceRecord[];
  refreshed: boolean;
  stale: boolean;
}
