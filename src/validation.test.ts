import {
  validateBudget,
  validateMonthCount,
  validateMonthlyReportArgs,
  validateUpdateInput
} from './validation';

describe('validateUpdateInput', () => {
  it('should reject an update without fields', () => {
    const result = validateUpdateInput({});
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['No fields to update']);
  });

  it('should reject fields that are all undefined', () => {
    const result = validateUpdateInput({ date: undefined, amount: undefined });
    expect(result.valid).toBe(false);
  });

  it('should accept a zero amount', () => {
    const result = validateUpdateInput({ amount: 0 });
    expect(result.valid).toBe(true);
    expect(result.errors).toHaveLength(0);
  });

  it('should accept an empty note', () => {
    expect(validateUpdateInput({ note: '' }).valid).toBe(true);
  });
});

describe('validateMonthlyReportArgs', () => {
  it('should accept a month and year', () => {
    expect(validateMonthlyReportArgs({ month: '12', year: '2024' })).toEqual({ valid: true, errors: [] });
  });

  it('should accept missing arguments', () => {
    expect(validateMonthlyReportArgs({}).valid).toBe(true);
  });

  it('should accept a zero-padded month', () => {
    expect(validateMonthlyReportArgs({ month: '04' }).valid).toBe(true);
  });

  it('should reject months outside 1-12', () => {
    expect(validateMonthlyReportArgs({ month: '13' }).errors).toEqual(['Month must be a number between 1 and 12']);
    expect(validateMonthlyReportArgs({ month: '0' }).errors).toEqual(['Month must be a number between 1 and 12']);
    expect(validateMonthlyReportArgs({ month: 'May' }).valid).toBe(false);
  });

  it('should reject a two-digit year', () => {
    expect(validateMonthlyReportArgs({ year: '24' }).errors).toEqual(['Year must be in YYYY format between 1000 and 9999']);
  });

  it('should reject years before 1000', () => {
    expect(validateMonthlyReportArgs({ month: '2', year: '0099' }).errors).toEqual([
      'Year must be in YYYY format between 1000 and 9999'
    ]);
    expect(validateMonthlyReportArgs({ year: '1000' }).valid).toBe(true);
  });

  it('should report every problem at once', () => {
    expect(validateMonthlyReportArgs({ month: '20', year: 'abcd' }).errors).toHaveLength(2);
  });
});

describe('validateBudget', () => {
  it('should accept a decimal budget', () => {
    expect(validateBudget('1500.50').valid).toBe(true);
  });

  it('should reject a missing budget', () => {
    expect(validateBudget('  ').errors).toEqual(['Budget is required']);
  });

  it('should reject a non-numeric budget', () => {
    expect(validateBudget('lots').errors).toEqual(['Budget must be a valid number']);
  });
});

describe('validateMonthCount', () => {
  it('should accept a missing value', () => {
    expect(validateMonthCount(undefined).valid).toBe(true);
    expect(validateMonthCount('').valid).toBe(true);
  });

  it('should accept a positive whole number', () => {
    expect(validateMonthCount('6').valid).toBe(true);
  });

  it('should reject zero and fractions', () => {
    expect(validateMonthCount('0').errors).toEqual(['Months must be a whole number between 1 and 120']);
    expect(validateMonthCount('2.5').valid).toBe(false);
  });

  it('should cap the window at ten years', () => {
    expect(validateMonthCount('120').valid).toBe(true);
    expect(validateMonthCount('121').valid).toBe(false);
    expect(validateMonthCount('99999999999').errors).toEqual(['Months must be a whole number between 1 and 120']);
  });
});
