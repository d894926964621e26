/**
 * Portfolio mutations. Every successful write drops the user's cached views
 * (keys ending in ':<userId>') before returning.
 */

import { createChildLogger } from '@/utils/logger';
import type { PortfolioRepository } from '@/data/portfolio';
import type { ResultCache } from '@/data/repositories/cache_repo';
import type { Account, AccountInput, Holding, HoldingInput } from '@/types/portfolio';

const logger = createChildLogger('portfolio_service');

export function userCacheSuffix(userId: string): string {
  return `:${userId}`;
}

export class PortfolioService {
  constructor(
    private readonly repo: PortfolioRepository,
    private readonly cache: ResultCache
  ) {}

  private invalidateUser(userId: string): void {
    const removed = this.cache.invalidateBySuffix(userCacheSuffix(userId));
    logger.debug({ userId, removed }, 'Invalidated cached views');
  }

  listAccounts(userId: string): Account[] {
    return this.repo.listAccounts(userId);
  }

  listHoldings(userId: string, accountId?: number): Holding[] {
    return this.repo.listHoldings(userId, accountId);
  }

  addAccount(userId: string, input: AccountInput): number {
    const id = this.repo.addAccount(userId, input);
    this.invalidateUser(userId);
    return id;
  }

  updateAccount(userId: string, accountId: number, updates: Partial<AccountInput>): boolean {
    const changed = this.repo.updateAccount(userId, accountId, updates);
    if (changed) this.invalidateUser(userId);
    return changed;
  }

  deleteAccount(userId: string, accountId: number): boolean {
    const deleted = this.repo.deleteAccount(userId, accountId);
    if (deleted) this.invalidateUser(userId);
    return deleted;
  }

  addHolding(userId: string, input: HoldingInput): number {
    const id = this.repo.addHolding(userId, input);
    this.invalidateUser(userId);
    return id;
  }

  updateHolding(userId: string, holdingId: number, updates: Partial<HoldingInput>): boolean {
    const changed = this.repo.updateHolding(userId, holdingId, updates);
    if (changed) this.invalidateUser(userId);
    return changed;
  }

  deleteHolding(userId: string, holdingId: number): boolean {
    const deleted = this.repo.deleteHolding(userId, holdingId);
    if (deleted) this.invalidateUser(userId);
    return deleted;
  }
}
