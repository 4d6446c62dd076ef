import { UPDATABLE_FIELDS } from './database';
import { MAX_TREND_MONTHS } from './reports';
import { UpdateExpenseInput, ValidationResult } from './types';

// Stored expenses are deliberately not validated (date format, amount sign);
// only the shape of an update and the prompt arguments are checked here.

export function validateUpdateInput(fields: UpdateExpenseInput): ValidationResult {
  const supplied = UPDATABLE_FIELDS.filter(field => fields[field] !== undefined);
  if (supplied.length === 0) {
    return { valid: false, errors: ['No fields to update'] };
  }
  return { valid: true, errors: [] };
}

export interface MonthlyReportArgs {
  month?: string;
  year?: string;
}

export function validateMonthlyReportArgs(args: MonthlyReportArgs): ValidationResult {
  const errors: string[] = [];

  if (args.month) {
    const month = Number(args.month);
    if (!/^\d{1,2}$/.test(args.month.trim()) || month < 1 || month > 12) {
      errors.push('Month must be a number between 1 and 12');
    }
  }

  // Four digits from 1000: shorter years break the YYYY-MM-DD text ordering
  if (args.year && !/^[1-9]\d{3}$/.test(args.year.trim())) {
    errors.push('Year must be in YYYY format between 1000 and 9999');
  }

  return { valid: errors.length === 0, errors };
}

export function validateBudget(budget: string): ValidationResult {
  if (!budget.trim()) {
    return { valid: false, errors: ['Budget is required'] };
  }
  if (!Number.isFinite(Number(budget))) {
    return { valid: false, errors: ['Budget must be a valid number'] };
  }
  return { valid: true, errors: [] };
}

export function validateMonthCount(months?: string): ValidationResult {
  if (months === undefined || months === '') {
    return { valid: true, errors: [] };
  }
  const count = Number(months);
  if (!/^\d+$/.test(months.trim()) || count < 1 || count > MAX_TREND_MONTHS) {
    return { valid: false, errors: [`Months must be a whole number between 1 and ${MAX_TREND_MONTHS}`] };
  }
  return { valid: true, errors: [] };
}
