/**
 * Gain/loss arithmetic for holdings and accounts. Pure; prices come in
 * already resolved.
 */

import type { PriceLookup } from '@/types/market';
import type { Account, Holding } from '@/types/portfolio';
import type {
  AccountPerformance,
  HoldingPerformance,
  PerformanceTotals,
} from '@/types/performance';

export function gainLossPercentage(gainLoss: number, totalInvested: number): number {
  return totalInvested > 0 ? (gainLoss * 100) / totalInvested : 0;
}

export function calculateHoldingPerformance(holding: Holding, lookup: PriceLookup): HoldingPerformance {
  const totalInvested = holding.quantity * holding.purchaseValue;
  const currentPrice = lookup.status === 'priced' ? lookup.price : null;
  const currentValue = currentPrice !== null ? holding.quantity * currentPrice : totalInvested;
  const gainLoss = currentValue - totalInvested;

  return {
    holdingId: holding.id,
    accountId: holding.accountId,
    name: holding.name,
    category: holding.category,
    currency: holding.currency,
    quantity: holding.quantity,
    purchaseValue: holding.purchaseValue,
    symbol: lookup.status === 'priced' || lookup.status === 'no_price' ? lookup.symbol : null,
    priceStatus: lookup.status,
    priceSource: lookup.status === 'priced' ? lookup.source : null,
    stale: lookup.status === 'priced' && lookup.stale,
    currentPrice,
    totalInvested,
    currentValue,
    gainLoss,
    gainLossPercentage: gainLossPercentage(gainLoss, totalInvested),
  };
}

export function sumTotals(
  items: ReadonlyArray<{ totalInvested: number; currentValue: number }>
): PerformanceTotals {
  let totalInvested = 0;
  let currentValue = 0;
  for (const item of items) {
    totalInvested += item.totalInvested;
    currentValue += item.currentValue;
  }
  const totalGainLoss = currentValue - totalInvested;

  return {
    totalInvested,
    currentValue,
    totalGainLoss,
    totalGainLossPercentage: gainLossPercentage(totalGainLoss, totalInvested),
  };
}

export function calculateAccountPerformance(
  account: Account,
  holdings: HoldingPerformance[]
): AccountPerformance {
  return {
    accountId: account.id,
    accountName: account.name,
    sortOrder: account.sortOrder,
    ...sumTotals(holdings),
    holdings,
  };
}

/**
 * sortOrder, then name by UTF-16 code units, then id.
 */
export function compareAccounts(
  a: Pick<Account, 'id' | 'name' | 'sortOrder'>,
  b: Pick<Account, 'id' | 'name' | 'sortOrder'>
): number {
  if (a.sortOrder !== b.sortOrder) return a.sortOrder - b.sortOrder;
  if (a.name !== b.name) return a.name < b.name ? -1 : 1;
  return a.id - b.id;
}

export function sortAccounts<T extends Pick<Account, 'id' | 'name' | 'sortOrder'>>(accounts: T[]): T[] {
  return [...accounts].sort(compareAccounts);
}
