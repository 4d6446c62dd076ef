import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CallToolResult, ErrorCode, GetPromptResult, McpError } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { errorMessage } from './errors';
import { ExpenseOperations } from './expenses';
import { logger } from './logger';
import { budgetAnalysis, DEFAULT_TREND_MONTHS, monthlyReport, quickAdd, spendingTrends } from './reports';
import { HELP_TEXT, loadCategoryTaxonomy } from './resources';
import { UpdateExpenseInput, ValidationResult } from './types';
import { validateBudget, validateMonthCount, validateMonthlyReportArgs } from './validation';

export const SERVER_NAME = 'ExpenseTracker';
export const SERVER_VERSION = '1.0.0';

export interface ExpenseServerDeps {
  operations: ExpenseOperations;
  categoriesPath: string;
  now?: () => Date;
}

function jsonResult(value: unknown, isError = false): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(value, null, 2) }],
    isError
  };
}

function promptResult(text: string): GetPromptResult {
  return { messages: [{ role: 'user', content: { type: 'text', text } }] };
}

function assertValid(validation: ValidationResult): void {
  if (!validation.valid) {
    throw new McpError(ErrorCode.InvalidParams, validation.errors.join('; '));
  }
}

const dateArg = (label: string) => z.string().describe(`${label} in YYYY-MM-DD format`);

export function createExpenseServer(deps: ExpenseServerDeps): McpServer {
  const { operations, categoriesPath } = deps;
  const now = deps.now ?? (() => new Date());

  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  // ==========================================================================
  // Tools
  // ==========================================================================

  server.registerTool(
    'add_expense',
    {
      description: 'Add a new expense entry to the database.',
      inputSchema: {
        date: dateArg('Date'),
        amount: z.number().describe('Amount spent (positive number)'),
        category: z.string().describe('Expense category (e.g., "Food & Dining", "Transportation")'),
        subcategory: z.string().optional().describe('Optional subcategory for more detail'),
        note: z.string().optional().describe('Optional note or description')
      }
    },
    async ({ date, amount, category, subcategory, note }) => {
      const result = await operations.addExpense({ date, amount, category, subcategory, note });
      return jsonResult(result, result.status === 'error');
    }
  );

  server.registerTool(
    'list_expenses',
    {
      description: 'List expense entries within an inclusive date range, newest first.',
      inputSchema: {
        start_date: dateArg('Start date'),
        end_date: dateArg('End date')
      }
    },
    async ({ start_date, end_date }) => {
      const result = await operations.listExpenses(start_date, end_date);
      return jsonResult(result, !Array.isArray(result));
    }
  );

  server.registerTool(
    'summarize_expenses',
    {
      description: 'Summarize expenses by category within an inclusive date range.',
      inputSchema: {
        start_date: dateArg('Start date'),
        end_date: dateArg('End date'),
        category: z.string().optional().describe('Optional category to filter by')
      }
    },
    async ({ start_date, end_date, category }) => {
      const result = await operations.summarizeExpenses(start_date, end_date, category);
      return jsonResult(result, !Array.isArray(result));
    }
  );

  server.registerTool(
    'delete_expense',
    {
      description: 'Delete an expense entry by ID.',
      inputSchema: {
        expense_id: z.number().int().describe('The ID of the expense to delete')
      }
    },
    async ({ expense_id }) => {
      const result = await operations.deleteExpense(expense_id);
      return jsonResult(result, result.status === 'error');
    }
  );

  // null is treated like an omitted field: both mean "leave unchanged"
  server.registerTool(
    'update_expense',
    {
      description: 'Update an existing expense entry. Only provided fields will be updated.',
      inputSchema: {
        expense_id: z.number().int().describe('The ID of the expense to update'),
        date: dateArg('New date').nullish(),
        amount: z.number().nullish().describe('New amount'),
        category: z.string().nullish().describe('New category'),
        subcategory: z.string().nullish().describe('New subcategory'),
        note: z.string().nullish().describe('New note')
      }
    },
    async ({ expense_id, date, amount, category, subcategory, note }) => {
      const fields: UpdateExpenseInput = {
        date: date ?? undefined,
        amount: amount ?? undefined,
        category: category ?? undefined,
        subcategory: subcategory ?? undefined,
        note: note ?? undefined
      };
      const result = await operations.updateExpense(expense_id, fields);
      return jsonResult(result, result.status === 'error');
    }
  );

  // ==========================================================================
  // Prompts (arguments arrive as strings)
  // ==========================================================================

  server.registerPrompt(
    'monthly_report',
    {
      description: 'Generate a comprehensive monthly expense report.',
      argsSchema: {
        month: z.string().optional().describe('Month number (1-12), defaults to current month'),
        year: z.string().optional().describe('Year (YYYY), defaults to current year')
      }
    },
    ({ month, year }) => {
      assertValid(validateMonthlyReportArgs({ month, year }));
      return promptResult(
        monthlyReport({ month: month ? Number(month) : undefined, year: year ? Number(year) : undefined }, now())
      );
    }
  );

  server.registerPrompt(
    'budget_analysis',
    {
      description: 'Analyze spending against a budget.',
      argsSchema: {
        budget: z.string().describe('Total budget amount'),
        start_date: z.string().optional().describe('Start date (YYYY-MM-DD), defaults to current month start'),
        end_date: z.string().optional().describe('End date (YYYY-MM-DD), defaults to today')
      }
    },
    ({ budget, start_date, end_date }) => {
      assertValid(validateBudget(budget));
      return promptResult(budgetAnalysis({ budget: Number(budget), startDate: start_date, endDate: end_date }, now()));
    }
  );

  server.registerPrompt(
    'spending_trends',
    {
      description: 'Analyze spending trends over time.',
      argsSchema: {
        category: z.string().optional().describe('Optional category to analyze (analyzes all if not specified)'),
        months: z.string().optional().describe(`Number of months to analyze (default ${DEFAULT_TREND_MONTHS})`)
      }
    },
    ({ category, months }) => {
      assertValid(validateMonthCount(months));
      return promptResult(spendingTrends({ category, months: months ? Number(months) : undefined }, now()));
    }
  );

  server.registerPrompt(
    'quick_add',
    {
      description: 'Quick add an expense from natural language description.',
      argsSchema: {
        description: z.string().describe('Natural language description (e.g., "coffee $5.50 this morning")')
      }
    },
    ({ description }) => promptResult(quickAdd({ description }))
  );

  // ==========================================================================
  // Resources
  // ==========================================================================

  server.registerResource(
    'categories',
    'expense:///categories',
    {
      description: 'Available expense categories and their subcategories.',
      mimeType: 'application/json'
    },
    async uri => {
      const result = await loadCategoryTaxonomy(categoriesPath);
      if (!result.ok) {
        logger.error('Error reading categories:', result.error);
        throw new McpError(ErrorCode.InternalError, `Failed to read categories: ${result.error.message}`);
      }
      return { contents: [{ uri: uri.href, mimeType: 'application/json', text: result.text }] };
    }
  );

  server.registerResource(
    'stats',
    'expense:///stats',
    {
      description: 'Overall expense statistics: totals, date range and per-category breakdown.',
      mimeType: 'application/json'
    },
    async uri => {
      let text: string;
      try {
        text = JSON.stringify(await operations.getStatistics(), null, 2);
      } catch (error) {
        logger.error('Error fetching stats:', error);
        text = JSON.stringify({ error: errorMessage(error) });
      }
      return { contents: [{ uri: uri.href, mimeType: 'application/json', text }] };
    }
  );

  server.registerResource(
    'help',
    'expense:///help',
    {
      description: 'Help documentation for the expense tracker.',
      mimeType: 'text/markdown'
    },
    async uri => ({ contents: [{ uri: uri.href, mimeType: 'text/markdown', text: HELP_TEXT }] })
  );

  return server;
}
