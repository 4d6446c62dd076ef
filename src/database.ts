import { ConnectionFactory, SQLiteDriver, withConnection } from './driver';
import { classifyStoreError } from './errors';
import {
  CategoryBreakdown,
  CategorySummary,
  CreateExpenseInput,
  Expense,
  ExpenseStatistics,
  UpdatableField,
  UpdateExpenseInput
} from './types';

const CREATE_EXPENSES_TABLE = `
  CREATE TABLE IF NOT EXISTS expenses(
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    date TEXT NOT NULL,
    amount REAL NOT NULL,
    category TEXT NOT NULL,
    subcategory TEXT DEFAULT '',
    note TEXT DEFAULT ''
  )
`;

const CANARY_CATEGORY = '__canary__';

// Order matters: it fixes the SET clause column order
export const UPDATABLE_FIELDS: readonly UpdatableField[] = ['date', 'amount', 'category', 'subcategory', 'note'];

/**
 * Creates the expenses table, switches the file to WAL and proves the path is
 * writable with a throwaway insert + delete. Failures are thrown as StoreError.
 */
export function initializeSchema(connect: ConnectionFactory): void {
  try {
    withConnection(connect, driver => {
      driver.exec('PRAGMA journal_mode = WAL');
      driver.exec(CREATE_EXPENSES_TABLE);

      const canary = driver.run(
        'INSERT INTO expenses(date, amount, category) VALUES (?, ?, ?)',
        ['2000-01-01', 0, CANARY_CATEGORY]
      );
      driver.run('DELETE FROM expenses WHERE id = ?', [canary.lastInsertRowid]);
    });
  } catch (error) {
    throw classifyStoreError(error);
  }
}

interface SqlUpdate {
  sql: string;
  params: unknown[];
}

// Presence, not truthiness: amount = 0 and note = '' are real updates
export function buildUpdateStatement(expenseId: number, fields: UpdateExpenseInput): SqlUpdate | null {
  const assignments: string[] = [];
  const params: unknown[] = [];

  for (const field of UPDATABLE_FIELDS) {
    const value = fields[field];
    if (value !== undefined) {
      assignments.push(`${field} = ?`);
      params.push(value);
    }
  }

  if (assignments.length === 0) return null;

  params.push(expenseId);
  return { sql: `UPDATE expenses SET ${assignments.join(', ')} WHERE id = ?`, params };
}

export type ExpenseDatabase = ReturnType<typeof createExpenseDatabase>;

/**
 * Data access for the expenses table. Each call opens its own connection and
 * runs one statement (statistics runs three reads); every failure surfaces as
 * a classified StoreError.
 */
export function createExpenseDatabase(connect: ConnectionFactory) {
  function use<T>(fn: (driver: SQLiteDriver) => T): T {
    try {
      return withConnection(connect, fn);
    } catch (error) {
      throw classifyStoreError(error);
    }
  }

  return {
    async createExpense(input: CreateExpenseInput): Promise<number> {
      return use(driver => {
        const result = driver.run(
          'INSERT INTO expenses(date, amount, category, subcategory, note) VALUES (?, ?, ?, ?, ?)',
          [input.date, input.amount, input.category, input.subcategory ?? '', input.note ?? '']
        );
        return result.lastInsertRowid;
      });
    },

    async getExpenses(startDate: string, endDate: string): Promise<Expense[]> {
      return use(driver =>
        driver.all<Expense>(
          `SELECT id, date, amount, category, subcategory, note
           FROM expenses
           WHERE date BETWEEN ? AND ?
           ORDER BY date DESC, id DESC`,
          [startDate, endDate]
        )
      );
    },

    async getCategorySummary(startDate: string, endDate: string, category?: string): Promise<CategorySummary[]> {
      let sql = `
        SELECT category, SUM(amount) AS total_amount, COUNT(*) AS count
        FROM expenses
        WHERE date BETWEEN ? AND ?`;
      const params: unknown[] = [startDate, endDate];

      if (category) {
        sql += ' AND category = ?';
        params.push(category);
      }

      sql += ' GROUP BY category ORDER BY total_amount DESC';

      return use(driver => driver.all<CategorySummary>(sql, params));
    },

    async deleteExpense(id: number): Promise<boolean> {
      return use(driver => driver.run('DELETE FROM expenses WHERE id = ?', [id]).changes > 0);
    },

    /** Returns false when no row has that id. Callers must pass at least one field. */
    async updateExpense(id: number, fields: UpdateExpenseInput): Promise<boolean> {
      const statement = buildUpdateStatement(id, fields);
      if (!statement) {
        throw new Error('updateExpense called without fields');
      }
      return use(driver => driver.run(statement.sql, statement.params).changes > 0);
    },

    async getStatistics(): Promise<ExpenseStatistics> {
      return use(driver => {
        const totals = driver.get<{ count: number; total: number | null }>(
          'SELECT COUNT(*) AS count, SUM(amount) AS total FROM expenses'
        );
        const range = driver.get<{ first: string | null; last: string | null }>(
          'SELECT MIN(date) AS first, MAX(date) AS last FROM expenses'
        );
        const byCategory = driver.all<CategoryBreakdown>(
          `SELECT category, COUNT(*) AS count, SUM(amount) AS total
           FROM expenses
           GROUP BY category
           ORDER BY SUM(amount) DESC`
        );

        return {
          total_expenses: totals?.count ?? 0,
          total_amount: totals?.total ?? 0,
          date_range: {
            first_expense: range?.first ?? null,
            last_expense: range?.last ?? null
          },
          by_category: byCategory
        };
      });
    }
  };
}
