import { ExpenseDatabase } from './database';
import { notFound, toErrorResult } from './errors';
import { logger } from './logger';
import { validateUpdateInput } from './validation';
import {
  CategorySummary,
  CreateExpenseInput,
  Expense,
  ExpenseStatistics,
  OperationResult,
  QueryResult,
  UpdateExpenseInput
} from './types';

export type ExpenseOperations = ReturnType<typeof createExpenseOperations>;

/**
 * The tool-facing operations. Nothing here throws: every failure comes back
 * as `{ status: 'error', ... }` so the agent can tell an empty list from a
 * broken store.
 */
export function createExpenseOperations(database: ExpenseDatabase) {
  return {
    async addExpense(input: CreateExpenseInput): Promise<OperationResult> {
      try {
        const id = await database.createExpense(input);
        logger.info(`Created expense: ${id}`);
        return { status: 'success', id, message: 'Expense added successfully' };
      } catch (error) {
        logger.error('Error creating expense:', error);
        return toErrorResult(error, 'Database error');
      }
    },

    async listExpenses(startDate: string, endDate: string): Promise<QueryResult<Expense>> {
      try {
        return await database.getExpenses(startDate, endDate);
      } catch (error) {
        logger.error('Error listing expenses:', error);
        return toErrorResult(error, 'Error listing expenses');
      }
    },

    async summarizeExpenses(startDate: string, endDate: string, category?: string): Promise<QueryResult<CategorySummary>> {
      try {
        return await database.getCategorySummary(startDate, endDate, category);
      } catch (error) {
        logger.error('Error summarizing expenses:', error);
        return toErrorResult(error, 'Error summarizing expenses');
      }
    },

    async deleteExpense(expenseId: number): Promise<OperationResult> {
      try {
        const deleted = await database.deleteExpense(expenseId);
        if (!deleted) return notFound(expenseId);

        logger.info(`Deleted expense: ${expenseId}`);
        return { status: 'success', message: `Expense ${expenseId} deleted` };
      } catch (error) {
        logger.error('Error deleting expense:', error);
        return toErrorResult(error, 'Error deleting expense');
      }
    },

    async updateExpense(expenseId: number, fields: UpdateExpenseInput): Promise<OperationResult> {
      const validation = validateUpdateInput(fields);
      if (!validation.valid) {
        return { status: 'error', kind: 'validation', message: validation.errors.join('; ') };
      }

      try {
        const updated = await database.updateExpense(expenseId, fields);
        if (!updated) return notFound(expenseId);

        logger.info(`Updated expense: ${expenseId}`);
        return { status: 'success', message: `Expense ${expenseId} updated` };
      } catch (error) {
        logger.error('Error updating expense:', error);
        return toErrorResult(error, 'Error updating expense');
      }
    },

    // Statistics failures are rendered by the resource, so this one rejects
    async getStatistics(): Promise<ExpenseStatistics> {
      return database.getStatistics();
    }
  };
}
