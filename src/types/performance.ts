import type { CurrencyCode, HoldingCategory } from './portfolio';
import type { PriceLookup, PriceSource } from './market';

export interface HoldingPerformance {
  holdingId: number;
  accountId: number;
  name: string;
  category: HoldingCategory;
  currency: CurrencyCode;
  quantity: number;
  purchaseValue: number;
  symbol: string | null;
  priceStatus: PriceLookup['status'];
  priceSource: PriceSource | null;
  stale: boolean;
  currentPrice: number | null;
  totalInvested: number;
  currentValue: number;
  gainLoss: number;
  gainLossPercentage: number;
}

export interface PerformanceTotals {
  totalInvested: number;
  currentValue: number;
  totalGainLoss: number;
  totalGainLossPercentage: number;
}

export interface AccountPerformance extends PerformanceTotals {
  accountId: number;
  accountName: string;
  sortOrder: number;
  holdings: HoldingPerformance[];
}

export interface PortfolioAccountTotals extends PerformanceTotals {
  accountId: number;
  accountName: string;
}

/** Portfolio totals with every amount converted to reportingCurrency. */
export interface PortfolioPerformance extends PerformanceTotals {
  userId: string;
  reportingCurrency: CurrencyCode;
  accounts: PortfolioAccountTotals[];
}
