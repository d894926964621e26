import type { PortfolioAccountTotals } from './performance';

export interface GroupedInvestment {
  category: string;
  account: string;
  name: string;
  totalQuantity: number;
  averageValue: number;
  total: number;
  currency: string;
  country: string;
}

export interface AccountAssets {
  account: string;
  total: number;
}

export interface CountryAssets {
  country: string;
  total: number;
}

export interface CategoryAssets {
  category: string;
  total: number;
  count: number;
  percentage: number;
}

/**
 * Serialized as `dashboard_view.v1`. Amounts are in each holding's own
 * currency; accountPerformance sums native amounts per account.
 */
export interface DashboardView {
  userId: string;
  generatedAt: string;
  groupedInvestments: GroupedInvestment[];
  assetsByAccount: AccountAssets[];
  assetsByCountry: CountryAssets[];
  assetsByCategory: CategoryAssets[];
  accountPerformance: PortfolioAccountTotals[];
}
