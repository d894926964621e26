/**
 * Dashboard aggregates, cached per user under 'dashboard:<userId>'.
 */

import { createChildLogger } from '@/utils/logger';
import type { PortfolioRepository } from '@/data/portfolio';
import type { ResultCache } from '@/data/repositories/cache_repo';
import type { PerformanceService } from '@/performance/performance_service';
import { userCacheSuffix } from '@/services/portfolio_service';
import { validateDashboardView } from '@/validation/ajv_instance';
import type {
  AccountAssets,
  CategoryAssets,
  CountryAssets,
  DashboardView,
  GroupedInvestment,
} from '@/types/dashboard';
import type { CurrencyCode, Holding } from '@/types/portfolio';

const logger = createChildLogger('dashboard');

const UNKNOWN_COUNTRY = 'Unknown';

export interface DashboardServiceDeps {
  portfolio: PortfolioRepository;
  performance: PerformanceService;
  cache: ResultCache;
  currencyCountries: Record<CurrencyCode, string>;
  clock?: () => number;
}

export function dashboardCacheKey(userId: string): string {
  return `dashboard:${userId}`;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function holdingTotal(holding: Holding): number {
  return holding.quantity * holding.purchaseValue;
}

function totalsBy(items: GroupedInvestment[], keyOf: (item: GroupedInvestment) => string): Array<[string, number]> {
  const totals = new Map<string, number>();
  for (const item of items) {
    const key = keyOf(item);
    totals.set(key, (totals.get(key) ?? 0) + item.total);
  }
  return [...totals.entries()];
}

export class DashboardService {
  private readonly clock: () => number;

  constructor(private readonly deps: DashboardServiceDeps) {
    this.clock = deps.clock ?? Date.now;
  }

  async getDashboard(userId: string): Promise<DashboardView> {
    const key = dashboardCacheKey(userId);
    const cached = this.readCached(key);
    if (cached) {
      return cached;
    }

    const scope = userCacheSuffix(userId);
    const generation = this.deps.cache.getGeneration(scope);
    const view = await this.buildView(userId);
    if (this.deps.cache.getGeneration(scope) === generation) {
      this.deps.cache.set(key, JSON.stringify(view));
    } else {
      logger.debug({ userId }, 'Portfolio changed during build, view not cached');
    }
    return view;
  }

  private readCached(key: string): DashboardView | null {
    const payload = this.deps.cache.get(key);
    if (payload === null) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(payload);
    } catch (error) {
      logger.warn({ key, error: String(error) }, 'Cached dashboard is not JSON, rebuilding');
      this.deps.cache.invalidate(key);
      return null;
    }

    const result = validateDashboardView(parsed);
    if (!result.valid) {
      logger.warn({ key, errors: result.errors }, 'Cached dashboard failed validation, rebuilding');
      this.deps.cache.invalidate(key);
      return null;
    }
    return result.data;
  }

  private async buildView(userId: string): Promise<DashboardView> {
    const { portfolio, performance, currencyCountries } = this.deps;
    const accountNames = new Map(portfolio.listAccounts(userId).map((a): [number, string] => [a.id, a.name]));
    const holdings = portfolio.listHoldings(userId);

    const groups = new Map<string, Holding[]>();
    for (const holding of holdings) {
      const account = accountNames.get(holding.accountId) ?? '';
      const groupKey = JSON.stringify([holding.category, account, holding.name]);
      const members = groups.get(groupKey);
      if (members) {
        members.push(holding);
      } else {
        groups.set(groupKey, [holding]);
      }
    }

    const groupedInvestments: GroupedInvestment[] = [...groups.values()].map((members) => {
      const [first] = members;
      const totalQuantity = members.reduce((sum, h) => sum + h.quantity, 0);
      const purchaseSum = members.reduce((sum, h) => sum + h.purchaseValue, 0);
      return {
        category: first.category,
        account: accountNames.get(first.accountId) ?? '',
        name: first.name,
        totalQuantity,
        averageValue: purchaseSum / members.length,
        total: members.reduce((sum, h) => sum + holdingTotal(h), 0),
        currency: first.currency,
        country: currencyCountries[first.currency] ?? UNKNOWN_COUNTRY,
      };
    });

    const assetsByAccount: AccountAssets[] = totalsBy(groupedInvestments, (g) => g.account).map(
      ([account, total]) => ({ account, total })
    );
    const assetsByCountry: CountryAssets[] = totalsBy(groupedInvestments, (g) => g.country).map(
      ([country, total]) => ({ country, total })
    );

    const grandTotal = holdings.reduce((sum, h) => sum + holdingTotal(h), 0);
    const byCategory = new Map<string, { total: number; count: number }>();
    for (const holding of holdings) {
      const entry = byCategory.get(holding.category) ?? { total: 0, count: 0 };
      entry.total += holdingTotal(holding);
      entry.count += 1;
      byCategory.set(holding.category, entry);
    }
    const assetsByCategory: CategoryAssets[] = [...byCategory.entries()]
      .map(([category, { total, count }]) => ({
        category,
        total,
        count,
        percentage: grandTotal > 0 ? round2((total * 100) / grandTotal) : 0,
      }))
      .sort((a, b) => b.total - a.total);

    const accountPerformance = (await performance.calculateAllAccountsPerformance(userId)).map(
      (a) => ({
        accountId: a.accountId,
        accountName: a.accountName,
        totalInvested: a.totalInvested,
        currentValue: a.currentValue,
        totalGainLoss: a.totalGainLoss,
        totalGainLossPercentage: a.totalGainLossPercentage,
      })
    );

    logger.debug({ userId, holdings: holdings.length }, 'Built dashboard view');

    return {
      userId,
      generatedAt: new Date(this.clock()).toISOString(),
      groupedInvestments,
      assetsByAccount,
      assetsByCountry,
      assetsByCategory,
      accountPerformance,
    };
  }
}
