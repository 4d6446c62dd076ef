// Prompt templates. These never read the store: they hand the agent a date
// range and a checklist, and the agent calls the tools itself.

export const DEFAULT_TREND_MONTHS = 3;
export const MAX_TREND_MONTHS = 120;

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

// Day 0 of the following month is the last day of this one
export function lastDayOfMonth(year: number, month: number): number {
  return new Date(year, month, 0).getDate();
}

export function monthRange(year: number, month: number): { startDate: string; endDate: string } {
  return {
    startDate: `${year}-${pad2(month)}-01`,
    endDate: `${year}-${pad2(month)}-${pad2(lastDayOfMonth(year, month))}`
  };
}

export function monthlyReport(options: { month?: number; year?: number }, now: Date = new Date()): string {
  const month = options.month ?? now.getMonth() + 1;
  const year = options.year ?? now.getFullYear();
  const { startDate, endDate } = monthRange(year, month);

  return `Please generate a comprehensive expense report for ${month}/${year}.

1. First, list all expenses from ${startDate} to ${endDate}
2. Then, summarize the expenses by category
3. Calculate the total spending for the month
4. Identify the top 3 spending categories
5. Provide insights on spending patterns and recommendations for the next month

Make the report clear, formatted, and easy to understand.`;
}

export function budgetAnalysis(
  options: { budget: number; startDate?: string; endDate?: string },
  now: Date = new Date()
): string {
  const { budget } = options;
  const startDate = options.startDate || `${now.getFullYear()}-${pad2(now.getMonth() + 1)}-01`;
  const endDate = options.endDate || formatDate(now);

  return `Analyze my spending against my budget of $${budget} for the period ${startDate} to ${endDate}.

1. Get all expenses for this period
2. Calculate total spending
3. Compare against the budget of $${budget}
4. Show spending by category
5. Calculate percentage of budget used
6. Identify if I'm on track or over budget
7. Provide specific recommendations to stay within or get back to budget

Present the analysis with clear numbers and actionable advice.`;
}

export function spendingTrends(options: { category?: string; months?: number }, now: Date = new Date()): string {
  const months = options.months ?? DEFAULT_TREND_MONTHS;
  if (!Number.isInteger(months) || months < 1 || months > MAX_TREND_MONTHS) {
    throw new RangeError(`Months must be a whole number between 1 and ${MAX_TREND_MONTHS}`);
  }
  const start = new Date(now);
  start.setDate(start.getDate() - months * 30);

  const categoryText = options.category ? ` for the '${options.category}' category` : ' across all categories';

  return `Analyze my spending trends${categoryText} over the past ${months} months.

1. Get expenses from ${formatDate(start)} to ${formatDate(now)}
2. Break down spending by month
3. Calculate month-over-month changes
4. Identify spending patterns (increasing, decreasing, stable)
5. Highlight any unusual spikes or drops
6. Provide insights on trends and recommendations

Present with clear month-by-month comparison.`;
}

export function quickAdd(options: { description: string }): string {
  return `Add an expense based on this description: "${options.description}"

Please:
1. Extract the amount, category, and any other relevant details
2. Use today's date unless a different date is mentioned
3. Choose the most appropriate category from available categories
4. Add the expense
5. Confirm what was added with a summary

If anything is unclear, ask for clarification before adding.`;
}
