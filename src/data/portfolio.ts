import type { SqliteDatabase } from './db';
import {
  HOLDING_CATEGORIES,
  isHoldingCategory,
  type Account,
  type AccountInput,
  type Holding,
  type HoldingInput,
} from '@/types/portfolio';

export class PortfolioValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PortfolioValidationError';
  }
}

interface AccountRow {
  id: number;
  userId: string;
  name: string;
  sortOrder: number;
  goal1: number | null;
  goal2: number | null;
  goal3: number | null;
  goal4: number | null;
  goal5: number | null;
}

interface HoldingRow {
  id: number;
  accountId: number;
  userId: string;
  name: string;
  purchaseValue: number;
  quantity: number;
  currency: string;
  category: string;
  purchaseDate: string;
  description: string;
}

const ACCOUNT_COLUMNS = `
  id,
  user_id as userId,
  name,
  sort_order as sortOrder,
  goal1, goal2, goal3, goal4, goal5
`;

const HOLDING_COLUMNS = `
  id,
  account_id as accountId,
  user_id as userId,
  name,
  purchase_value as purchaseValue,
  quantity,
  currency,
  category,
  purchase_date as purchaseDate,
  description
`;

const GOAL_COUNT = 5;

function validateName(name: string, maxLength: number): void {
  if (!name || name.trim() === '') {
    throw new PortfolioValidationError('name is required and cannot be empty');
  }
  if (name.trim().length > maxLength) {
    throw new PortfolioValidationError(`name must be at most ${maxLength} characters`);
  }
}

function validateQuantity(quantity: number): void {
  if (!Number.isFinite(quantity) || quantity < 0) {
    throw new PortfolioValidationError('quantity must be a non-negative number');
  }
}

function validatePurchaseValue(value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new PortfolioValidationError('purchaseValue must be a non-negative number');
  }
}

function validateCurrency(currency: string): void {
  if (!/^[A-Z]{3}$/.test(currency)) {
    throw new PortfolioValidationError('currency must be a 3-letter ISO code');
  }
}

function validateCategory(category: string): void {
  if (!isHoldingCategory(category)) {
    throw new PortfolioValidationError(`category must be one of: ${HOLDING_CATEGORIES.join(', ')}`);
  }
}

function validatePurchaseDate(purchaseDate: string): void {
  if (!/^\d{4}-\d{2}-\d{2}/.test(purchaseDate) || Number.isNaN(Date.parse(purchaseDate))) {
    throw new PortfolioValidationError('purchaseDate must be an ISO date (YYYY-MM-DD)');
  }
}

function validateGoals(goals: Array<number | null>): void {
  if (goals.length > GOAL_COUNT) {
    throw new PortfolioValidationError(`at most ${GOAL_COUNT} goals are supported`);
  }
  for (const goal of goals) {
    if (goal !== null && !Number.isFinite(goal)) {
      throw new PortfolioValidationError('goals must be numbers or null');
    }
  }
}

function padGoals(goals: Array<number | null> = []): Array<number | null> {
  return Array.from({ length: GOAL_COUNT }, (_, i) => goals[i] ?? null);
}

function toAccount(row: AccountRow): Account {
  return {
    id: row.id,
    userId: row.userId,
    name: row.name,
    sortOrder: row.sortOrder,
    goals: [row.goal1, row.goal2, row.goal3, row.goal4, row.goal5],
  };
}

function toHolding(row: HoldingRow): Holding {
  const { category } = row;
  if (!isHoldingCategory(category)) {
    throw new PortfolioValidationError(`holding ${row.id} has unknown category "${category}"`);
  }
  return { ...row, category };
}

/**
 * Accounts and holdings, always scoped to a user.
 */
export class PortfolioRepository {
  constructor(private readonly db: SqliteDatabase) {}

  listAccounts(userId: string): Account[] {
    const stmt = this.db.prepare<[string], AccountRow>(`
      SELECT ${ACCOUNT_COLUMNS}
      FROM accounts
      WHERE user_id = ?
      ORDER BY sort_order, name, id
    `);
    return stmt.all(userId).map(toAccount);
  }

  getAccount(userId: string, accountId: number): Account | null {
    const stmt = this.db.prepare<[number, string], AccountRow>(`
      SELECT ${ACCOUNT_COLUMNS}
      FROM accounts
      WHERE id = ? AND user_id = ?
    `);
    const row = stmt.get(accountId, userId);
    return row ? toAccount(row) : null;
  }

  addAccount(userId: string, input: AccountInput): number {
    validateName(input.name, 100);
    const goals = padGoals(input.goals);
    validateGoals(goals);

    const now = new Date().toISOString();
    const stmt = this.db.prepare<
      [string, string, number, ...Array<number | null>, string, string]
    >(`
      INSERT INTO accounts (
        user_id, name, sort_order, goal1, goal2, goal3, goal4, goal5, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const result = stmt.run(userId, input.name.trim(), input.sortOrder ?? 0, ...goals, now, now);
    return Number(result.lastInsertRowid);
  }

  updateAccount(userId: string, accountId: number, updates: Partial<AccountInput>): boolean {
    const fields: string[] = [];
    const values: Array<string | number | null> = [];

    if (updates.name !== undefined) {
      validateName(updates.name, 100);
      fields.push('name = ?');
      values.push(updates.name.trim());
    }
    if (updates.sortOrder !== undefined) {
      fields.push('sort_order = ?');
      values.push(updates.sortOrder);
    }
    if (updates.goals !== undefined) {
      const goals = padGoals(updates.goals);
      validateGoals(goals);
      goals.forEach((goal, i) => {
        fields.push(`goal${i + 1} = ?`);
        values.push(goal);
      });
    }

    if (fields.length === 0) {
      return false;
    }

    fields.push('updated_at = ?');
    values.push(new Date().toISOString());
    values.push(accountId, userId);

    const stmt = this.db.prepare<Array<string | number | null>>(`
      UPDATE accounts
      SET ${fields.join(', ')}
      WHERE id = ? AND user_id = ?
    `);
    return stmt.run(...values).changes > 0;
  }

  deleteAccount(userId: string, accountId: number): boolean {
    const stmt = this.db.prepare<[number, string]>(
      'DELETE FROM accounts WHERE id = ? AND user_id = ?'
    );
    return stmt.run(accountId, userId).changes > 0;
  }

  listHoldings(userId: string, accountId?: number): Holding[] {
    if (accountId !== undefined) {
      const stmt = this.db.prepare<[string, number], HoldingRow>(`
        SELECT ${HOLDING_COLUMNS}
        FROM holdings
        WHERE user_id = ? AND account_id = ?
        ORDER BY id
      `);
      return stmt.all(userId, accountId).map(toHolding);
    }

    const stmt = this.db.prepare<[string], HoldingRow>(`
      SELECT ${HOLDING_COLUMNS}
      FROM holdings
      WHERE user_id = ?
      ORDER BY id
    `);
    return stmt.all(userId).map(toHolding);
  }

  getHolding(userId: string, holdingId: number): Holding | null {
    const stmt = this.db.prepare<[number, string], HoldingRow>(`
      SELECT ${HOLDING_COLUMNS}
      FROM holdings
      WHERE id = ? AND user_id = ?
    `);
    const row = stmt.get(holdingId, userId);
    return row ? toHolding(row) : null;
  }

  addHolding(userId: string, input: HoldingInput): number {
    validateName(input.name, 200);
    validateQuantity(input.quantity);
    validatePurchaseValue(input.purchaseValue);
    validateCurrency(input.currency);
    validateCategory(input.category);
    validatePurchaseDate(input.purchaseDate);

    if (!this.getAccount(userId, input.accountId)) {
      throw new PortfolioValidationError(`account ${input.accountId} not found`);
    }

    const now = new Date().toISOString();
    const stmt = this.db.prepare<
      [number, string, string, number, number, string, string, string, string, string, string]
    >(`
      INSERT INTO holdings (
        account_id, user_id, name, purchase_value, quantity, currency,
        category, purchase_date, description, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const result = stmt.run(
      input.accountId,
      userId,
      input.name.trim(),
      input.purchaseValue,
      input.quantity,
      input.currency,
      input.category,
      input.purchaseDate,
      input.description ?? '',
      now,
      now
    );
    return Number(result.lastInsertRowid);
  }

  updateHolding(userId: string, holdingId: number, updates: Partial<HoldingInput>): boolean {
    const fields: string[] = [];
    const values: Array<string | number | null> = [];

    if (updates.name !== undefined) {
      validateName(updates.name, 200);
      fields.push('name = ?');
      values.push(updates.name.trim());
    }
    if (updates.quantity !== undefined) {
      validateQuantity(updates.quantity);
      fields.push('quantity = ?');
      values.push(updates.quantity);
    }
    if (updates.purchaseValue !== undefined) {
      validatePurchaseValue(updates.purchaseValue);
      fields.push('purchase_value = ?');
      values.push(updates.purchaseValue);
    }
    if (updates.currency !== undefined) {
      validateCurrency(updates.currency);
      fields.push('currency = ?');
      values.push(updates.currency);
    }
    if (updates.category !== undefined) {
      validateCategory(updates.category);
      fields.push('category = ?');
      values.push(updates.category);
    }
    if (updates.purchaseDate !== undefined) {
      validatePurchaseDate(updates.purchaseDate);
      fields.push('purchase_date = ?');
      values.push(updates.purchaseDate);
    }
    if (updates.description !== undefined) {
      fields.push('description = ?');
      values.push(updates.description);
    }
    if (updates.accountId !== undefined) {
      if (!this.getAccount(userId, updates.accountId)) {
        throw new PortfolioValidationError(`account ${updates.accountId} not found`);
      }
      fields.push('account_id = ?');
      values.push(updates.accountId);
    }

    if (fields.length === 0) {
      return false;
    }

    fields.push('updated_at = ?');
    values.push(new Date().toISOString());
    values.push(holdingId, userId);

    const stmt = this.db.prepare<Array<string | number | null>>(`
      UPDATE holdings
      SET ${fields.join(', ')}
      WHERE id = ? AND user_id = ?
    `);
    return stmt.run(...values).changes > 0;
  }

  deleteHolding(userId: string, holdingId: number): boolean {
    const stmt = this.db.prepare<[number, string]>(
      'DELETE FROM holdings WHERE id = ? AND user_id = ?'
    );
    return stmt.run(holdingId, userId).changes > 0;
  }
}
