import { readFile } from 'fs/promises';
import { errorCode, errorMessage } from './errors';
import { CategoryTaxonomy } from './types';

export const DEFAULT_CATEGORIES: CategoryTaxonomy = {
  categories: [
    { name: 'Food & Dining', subcategories: ['Groceries', 'Restaurants', 'Coffee & Snacks', 'Delivery'] },
    { name: 'Transportation', subcategories: ['Gas', 'Public Transit', 'Parking', 'Car Maintenance', 'Rideshare'] },
    { name: 'Shopping', subcategories: ['Clothing', 'Electronics', 'Home Goods', 'Personal Care'] },
    { name: 'Entertainment', subcategories: ['Movies', 'Games', 'Sports', 'Hobbies', 'Subscriptions'] },
    { name: 'Bills & Utilities', subcategories: ['Rent/Mortgage', 'Electric', 'Water', 'Internet', 'Phone', 'Insurance'] },
    { name: 'Healthcare', subcategories: ['Doctor', 'Dentist', 'Pharmacy', 'Gym', 'Therapy'] },
    { name: 'Travel', subcategories: ['Flights', 'Hotels', 'Activities', 'Souvenirs'] },
    { name: 'Education', subcategories: ['Tuition', 'Books', 'Courses', 'Supplies'] },
    { name: 'Business', subcategories: ['Office Supplies', 'Software', 'Equipment', 'Services'] },
    { name: 'Other', subcategories: ['Gifts', 'Donations', 'Miscellaneous'] }
  ]
};

export type TaxonomyResult =
  | { ok: true; source: 'file' | 'default'; text: string }
  | { ok: false; error: Error };

/**
 * Reads the category file verbatim. A missing file is not an error: it yields
 * the built-in taxonomy instead.
 */
export async function loadCategoryTaxonomy(filePath: string): Promise<TaxonomyResult> {
  try {
    const text = await readFile(filePath, 'utf-8');
    return { ok: true, source: 'file', text };
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return { ok: true, source: 'default', text: JSON.stringify(DEFAULT_CATEGORIES, null, 2) };
    }
    return { ok: false, error: new Error(errorMessage(error), { cause: error }) };
  }
}

export const HELP_TEXT = `# Expense Tracker Help

## Available Tools

### add_expense
Add a new expense to the tracker.
- **date**: Date in YYYY-MM-DD format
- **amount**: Amount spent (positive number)
- **category**: One of the available categories
- **subcategory** (optional): Subcategory for more detail
- **note** (optional): Additional notes

### list_expenses
List expenses within a date range (both ends included), newest first.
- **start_date**: Start date (YYYY-MM-DD)
- **end_date**: End date (YYYY-MM-DD)

### summarize_expenses
Get spending summary by category.
- **start_date**: Start date (YYYY-MM-DD)
- **end_date**: End date (YYYY-MM-DD)
- **category** (optional): Filter by specific category

### delete_expense
Delete an expense by ID.
- **expense_id**: The ID of the expense to delete

### update_expense
Update an existing expense. Only the fields you pass are changed.
- **expense_id**: The ID to update
- **date**, **amount**, **category**, **subcategory**, **note** (all optional)

## Available Prompts

### monthly_report
Generate a comprehensive monthly expense report.

### budget_analysis
Analyze spending against a budget.

### spending_trends
Analyze spending patterns over time.

### quick_add
Add expense from natural language.

## Available Resources

- **expense:///categories**: Category and subcategory list (JSON)
- **expense:///stats**: Overall totals, date range and per-category breakdown (JSON)
- **expense:///help**: This document

## Example Queries

- "Add a $45.50 expense for groceries today"
- "Show me all my expenses from January"
- "What did I spend on food last month?"
- "Generate a monthly report for December 2024"
- "Am I within my $2000 budget this month?"
- "Show spending trends for the past 3 months"
`;
