/**
 * Performance reports over stored holdings with live prices and rates.
 */

import { createChildLogger } from '@/utils/logger';
import type { PortfolioRepository } from '@/data/portfolio';
import type { ExchangeRateResolver } from '@/market/exchange_rate_resolver';
import type { PriceResolver } from '@/market/price_resolver';
import type { CurrencyCode, Holding } from '@/types/portfolio';
import type {
  AccountPerformance,
  HoldingPerformance,
  PortfolioAccountTotals,
  PortfolioPerformance,
} from '@/types/performance';
import {
  calculateAccountPerformance,
  calculateHoldingPerformance,
  sortAccounts,
  sumTotals,
} from './calculator';

const logger = createChildLogger('performance');

export interface PerformanceServiceDeps {
  portfolio: PortfolioRepository;
  prices: PriceResolver;
  rates: ExchangeRateResolver;
}

export class PerformanceService {
  constructor(private readonly deps: PerformanceServiceDeps) {}

  /**
   * Prices holdings one at a time so provider calls stay sequential.
   */
  async calculatePerformance(holdings: Holding[]): Promise<HoldingPerformance[]> {
    const results: HoldingPerformance[] = [];
    for (const holding of holdings) {
      const lookup = await this.deps.prices.getCurrentPrice(holding);
      results.push(calculateHoldingPerformance(holding, lookup));
    }
    return results;
  }

  async calculateAccountPerformance(userId: string, accountId: number): Promise<AccountPerformance | null> {
    const account = this.deps.portfolio.getAccount(userId, accountId);
    if (!account) {
      return null;
    }

    const holdings = this.deps.portfolio.listHoldings(userId, accountId);
    return calculateAccountPerformance(account, await this.calculatePerformance(holdings));
  }

  async calculateAllAccountsPerformance(userId: string): Promise<AccountPerformance[]> {
    const accounts = sortAccounts(this.deps.portfolio.listAccounts(userId));
    const results: AccountPerformance[] = [];

    for (const account of accounts) {
      const holdings = this.deps.portfolio.listHoldings(userId, account.id);
      results.push(calculateAccountPerformance(account, await this.calculatePerformance(holdings)));
    }

    logger.debug({ userId, accounts: results.length }, 'Calculated account performance');
    return results;
  }

  /**
   * Converts every holding's invested and current value into
   * reportingCurrency before summing. A missing rate fails the whole report.
   */
  async calculatePortfolioPerformance(
    userId: string,
    reportingCurrency: CurrencyCode
  ): Promise<PortfolioPerformance> {
    const target = reportingCurrency.trim().toUpperCase();
    const accounts = await this.calculateAllAccountsPerformance(userId);
    const { rates } = this.deps;

    const accountTotals: PortfolioAccountTotals[] = [];
    for (const account of accounts) {
      const converted: Array<{ totalInvested: number; currentValue: number }> = [];
      for (const holding of account.holdings) {
        converted.push({
          totalInvested: await rates.convert(holding.totalInvested, holding.currency, target),
          currentValue: await rates.convert(holding.currentValue, holding.currency, target),
        });
      }
      accountTotals.push({
        accountId: account.accountId,
        accountName: account.accountName,
        ...sumTotals(converted),
      });
    }

    return {
      userId,
      reportingCurrency: target,
      ...sumTotals(accountTotals),
      accounts: accountTotals,
    };
  }
}
