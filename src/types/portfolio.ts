export const HOLDING_CATEGORIES = [
  'RendaFixa',
  'Stocks',
  'FIIs',
  'ETF',
  'Bonds',
  'ManagedPortfolio',
  'Cash',
  'ManagedPortfolioBlock',
] as const;

export type HoldingCategory = (typeof HOLDING_CATEGORIES)[number];

/** ISO 4217 code, upper case (e.g. CAD, BRL, USD). */
export type CurrencyCode = string;

export interface Account {
  id: number;
  userId: string;
  name: string;
  sortOrder: number;
  goals: Array<number | null>;
}

export interface AccountInput {
  name: string;
  sortOrder?: number;
  goals?: Array<number | null>;
}

export interface Holding {
  id: number;
  accountId: number;
  userId: string;
  name: string;
  /** Unit purchase price in `currency`. */
  purchaseValue: number;
  quantity: number;
  currency: CurrencyCode;
  category: HoldingCategory;
  purchaseDate: string;
  description: string;
}

export interface HoldingInput {
  accountId: number;
  name: string;
  purchaseValue: number;
  quantity: number;
  currency: CurrencyCode;
  category: HoldingCategory;
  purchaseDate: string;
  description?: string;
}

export function isHoldingCategory(value: unknown): value is HoldingCategory {
  return HOLDING_CATEGORIES.some((category) => category === value);
}
