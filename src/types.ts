// Expense types
export interface Expense {
  id: number; // Assigned by SQLite on insert, never reused
  date: string; // YYYY-MM-DD, compared as text
  amount: number;
  category: string;
  subcategory: string;
  note: string;
}

export interface CreateExpenseInput {
  date: string;
  amount: number;
  category: string;
  subcategory?: string;
  note?: string;
}

// A field is applied when present, whatever its value (0 and '' included)
export type UpdateExpenseInput = Partial<Omit<Expense, 'id'>>;

export type UpdatableField = keyof UpdateExpenseInput;

export interface CategorySummary {
  category: string;
  total_amount: number;
  count: number;
}

export interface CategoryBreakdown {
  category: string;
  count: number;
  total: number;
}

export interface ExpenseStatistics {
  total_expenses: number;
  total_amount: number;
  date_range: {
    first_expense: string | null;
    last_expense: string | null;
  };
  by_category: CategoryBreakdown[];
}

export type StoreErrorKind =
  | 'permission_denied'
  | 'not_found'
  | 'constraint_violation'
  | 'other';

export type ErrorKind = StoreErrorKind | 'validation';

export interface SuccessResult {
  status: 'success';
  message: string;
  id?: number;
}

export interface ErrorResult {
  status: 'error';
  message: string;
  kind: ErrorKind;
}

export type OperationResult = SuccessResult | ErrorResult;

export type QueryResult<T> = T[] | ErrorResult;

export interface Category {
  name: string;
  subcategories: string[];
}

export interface CategoryTaxonomy {
  categories: Category[];
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}
