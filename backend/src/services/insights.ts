import { Decimal } from '../money.js';
import type {
  BudgetRecord,
  CategoryName,
  CategoryShare,
  Delta,
  Insight,
  InsightThresholds,
  Ledger,
  MonthKey,
  MonthMetrics,
  MonthTrend,
  SeriesPoint,
  TrendMetric,
  TrendReport,
} from '../types.js';
import { expenseAmount, sortedMonthKeys } from './ledgerDocument.js';

const currency = new Intl.NumberFormat('en-US', { style: 'currency', currency: 'USD' });

function formatMoney(value: number): string {
  return currency.format(value);
}

function formatRatio(ratio: number): string {
  return new Decimal(ratio).times(100).toFixed(1);
}

function formatThreshold(ratio: number): string {
  return new Decimal(ratio).times(100).toString();
}

function sumAmounts(values: number[]): Decimal {
  return values.reduce((acc, value) => acc.plus(value), new Decimal(0));
}

export function totalExpenses(record: BudgetRecord): number {
  return sumAmounts(Object.values(record.expenses)).toNumber();
}

/** Savings rate is defined as 0 when there is no income. */
export function monthMetrics(month: MonthKey, record: BudgetRecord): MonthMetrics {
  const total = sumAmounts(Object.values(record.expenses));
  const savings = new Decimal(record.income).minus(total);
  const savingsRate = record.income > 0 ? savings.div(record.income).toNumber() : 0;

  return {
    month,
    income: record.income,
    totalExpenses: total.toNumber(),
    savings: savings.toNumber(),
    savingsRate,
    debt: record.debt,
  };
}

export function ledgerMetrics(ledger: Ledger): MonthMetrics[] {
  return sortedMonthKeys(ledger).map((month) => monthMetrics(month, ledger[month]));
}

export function delta(previous: number, current: number): Delta {
  const absolute = new Decimal(current).minus(previous);
  const percent = previous === 0 ? null : absolute.div(Math.abs(previous)).times(100).toDecimalPlaces(2).toNumber();
  return { absolute: absolute.toNumber(), percent };
}

export function compareMonths(previous: MonthMetrics, current: MonthMetrics): MonthTrend {
  return {
    month: current.month,
    previousMonth: previous.month,
    savings: delta(previous.savings, current.savings),
    totalExpenses: delta(previous.totalExpenses, current.totalExpenses),
    debt: delta(previous.debt, current.debt),
  };
}

/** Month-over-month deltas between each stored month and the one before it. */
export function computeTrends(ledger: Ledger): TrendReport {
  const metrics = ledgerMetrics(ledger);
  if (metrics.length < 2) {
    return { available: false, reason: 'At least two months of data are needed to compute trends' };
  }

  const trends: MonthTrend[] = [];
  for (let i = 1; i < metrics.length; i++) {
    trends.push(compareMonths(metrics[i - 1], metrics[i]));
  }
  return { available: true, trends };
}

/** Mean savings over the `window` stored months ending at `upTo`. */
export function averageSavings(ledger: Ledger, upTo: MonthKey, window: number): number {
  const months = sortedMonthKeys(ledger)
    .filter((month) => month <= upTo)
    .slice(-window);
  if (months.length === 0) {
    return 0;
  }

  const total = months.reduce((acc, month) => acc.plus(monthMetrics(month, ledger[month]).savings), new Decimal(0));
  return total.div(months.length).toNumber();
}

export function monthsToPayoff(debt: number, averageMonthlySavings: number): number | null {
  if (debt <= 0 || averageMonthlySavings <= 0) {
    return null;
  }
  return new Decimal(debt).div(averageMonthlySavings).ceil().toNumber();
}

/** Category whose amount grew the most between two records, if any grew. */
export function largestIncrease(
  previous: BudgetRecord,
  current: BudgetRecord
): { category: CategoryName; increase: number } | null {
  const categories = new Set([...Object.keys(current.expenses), ...Object.keys(previous.expenses)]);
  let best: { category: CategoryName; increase: number } | null = null;

  for (const category of categories) {
    const increase = new Decimal(expenseAmount(current.expenses, category))
      .minus(expenseAmount(previous.expenses, category))
      .toNumber();
    if (increase > 0 && (best === null || increase > best.increase)) {
      best = { category, increase };
    }
  }
  return best;
}

export function categoryBreakdown(record: BudgetRecord): CategoryShare[] {
  const total = sumAmounts(Object.values(record.expenses));
  if (total.isZero()) {
    return [];
  }

  return Object.entries(record.expenses)
    .filter(([, amount]) => amount > 0)
    .map(([category, amount]) => ({
      category,
      amount,
      share: new Decimal(amount).div(total).toDecimalPlaces(4).toNumber(),
    }))
    .sort((a, b) => b.amount - a.amount);
}

export function trendSeries(ledger: Ledger, metric: TrendMetric): SeriesPoint[] {
  return ledgerMetrics(ledger).map((m) => ({
    month: m.month,
    value: metric === 'savings' ? m.savings : metric === 'expenses' ? m.totalExpenses : m.debt,
  }));
}

/** One row per stored month, newest first. */
export function monthlyComparison(ledger: Ledger): MonthMetrics[] {
  return ledgerMetrics(ledger).reverse();
}

function savingsRateInsight(metrics: MonthMetrics, thresholds: InsightThresholds): Insight | null {
  if (metrics.income <= 0) {
    return null;
  }

  const rate = formatRatio(metrics.savingsRate);
  const params = { savingsRate: metrics.savingsRate };
  if (metrics.savingsRate >= thresholds.highSavingsRate) {
    return {
      code: 'HIGH_SAVINGS_RATE',
      severity: 'positive',
      message: `Great job! You're saving ${rate}% of your income.`,
      params,
    };
  }
  if (metrics.savingsRate < thresholds.lowSavingsRate) {
    return {
      code: 'LOW_SAVINGS_RATE',
      severity: 'warning',
      message: `You're only saving ${rate}% of your income. Try to increase your savings rate to at least ${formatThreshold(thresholds.lowSavingsRate)}%.`,
      params,
    };
  }
  return {
    code: 'MODERATE_SAVINGS_RATE',
    severity: 'info',
    message: `Good! You're saving ${rate}%. Try to reach ${formatThreshold(thresholds.highSavingsRate)}%.`,
    params,
  };
}

function topExpenseInsight(record: BudgetRecord, total: number): Insight | null {
  if (total <= 0) {
    return null;
  }

  let top: [CategoryName, number] | null = null;
  for (const entry of Object.entries(record.expenses)) {
    if (top === null || entry[1] > top[1]) {
      top = entry;
    }
  }
  if (top === null) {
    return null;
  }

  const [category, amount] = top;
  return {
    code: 'TOP_EXPENSE',
    severity: 'info',
    message: `Your highest expense is ${category} at ${formatMoney(amount)}.`,
    params: { category, amount },
  };
}

function expenseTrendInsight(
  previousMonth: MonthKey,
  previous: BudgetRecord,
  current: BudgetRecord,
  thresholds: InsightThresholds
): Insight | null {
  const previousTotal = totalExpenses(previous);
  const currentTotal = totalExpenses(current);
  if (previousTotal <= 0) {
    return null;
  }

  const change = new Decimal(currentTotal).minus(previousTotal).div(previousTotal).toNumber();
  if (change > thresholds.expenseRiseThreshold) {
    const contributor = largestIncrease(previous, current);
    const detail = contributor
      ? ` The largest increase was ${contributor.category} (+${formatMoney(contributor.increase)}).`
      : '';
    return {
      code: 'EXPENSES_RISING',
      severity: 'warning',
      message: `Expenses increased by ${formatRatio(change)}% from ${previousMonth}.${detail}`,
      params: {
        previousMonth,
        change,
        ...(contributor ? { category: contributor.category, increase: contributor.increase } : {}),
      },
    };
  }
  if (change < 0) {
    return {
      code: 'EXPENSES_FALLING',
      severity: 'positive',
      message: `Great! Expenses decreased by ${formatRatio(-change)}% from ${previousMonth}.`,
      params: { previousMonth, change },
    };
  }
  return null;
}

function debtPayoffInsight(ledger: Ledger, month: MonthKey, debt: number, thresholds: InsightThresholds): Insight | null {
  const average = averageSavings(ledger, month, thresholds.savingsWindow);
  const months = monthsToPayoff(debt, average);
  if (months === null) {
    return null;
  }

  return {
    code: 'DEBT_PAYOFF',
    severity: 'info',
    message: `At your average savings of ${formatMoney(average)} per month, you can clear your debt of ${formatMoney(debt)} in about ${months} ${months === 1 ? 'month' : 'months'}.`,
    params: { debt, averageSavings: average, months },
  };
}

function concentrationInsights(record: BudgetRecord, thresholds: InsightThresholds): Insight[] {
  return categoryBreakdown(record)
    .filter((entry) => entry.share > thresholds.categoryConcentration)
    .map((entry) => ({
      code: 'CATEGORY_CONCENTRATION' as const,
      severity: 'info' as const,
      message: `${entry.category} makes up ${formatRatio(entry.share)}% of your expenses.`,
      params: { category: entry.category, share: entry.share },
    }));
}

function spendingTargetInsight(metrics: MonthMetrics, thresholds: InsightThresholds): Insight | null {
  if (metrics.income <= 0) {
    return null;
  }

  const target = new Decimal(metrics.income).times(thresholds.expenseTargetRatio).toNumber();
  if (metrics.totalExpenses <= target) {
    return null;
  }
  return {
    code: 'SPENDING_ABOVE_TARGET',
    severity: 'warning',
    message: `Try to reduce expenses to ${formatMoney(target)} (${formatThreshold(thresholds.expenseTargetRatio)}% of income).`,
    params: { target, totalExpenses: metrics.totalExpenses },
  };
}

/**
 * Every rule that applies to `month`. Rules that compare against the
 * previous month use the closest earlier stored month.
 */
export function generateInsights(ledger: Ledger, month: MonthKey, thresholds: InsightThresholds): Insight[] {
  const record = ledger[month];
  if (!record) {
    return [];
  }

  const metrics = monthMetrics(month, record);
  const previousMonth = sortedMonthKeys(ledger)
    .filter((key) => key < month)
    .pop();

  const candidates: (Insight | null)[] = [
    savingsRateInsight(metrics, thresholds),
    topExpenseInsight(record, metrics.totalExpenses),
    previousMonth ? expenseTrendInsight(previousMonth, ledger[previousMonth], record, thresholds) : null,
    debtPayoffInsight(ledger, month, record.debt, thresholds),
    ...concentrationInsights(record, thresholds),
    spendingTargetInsight(metrics, thresholds),
  ];
  return candidates.filter((insight): insight is Insight => insight !== null);
}

export interface InsightReport {
  month: MonthKey | null;
  metrics: MonthMetrics | null;
  trends: TrendReport;
  insights: Insight[];
}

export function buildInsightReport(ledger: Ledger, month: MonthKey | null, thresholds: InsightThresholds): InsightReport {
  const target = month ?? sortedMonthKeys(ledger).pop() ?? null;
  const record = target === null ? undefined : ledger[target];

  return {
    month: target,
    metrics: target !== null && record ? monthMetrics(target, record) : null,
    trends: computeTrends(ledger),
    insights: target === null ? [] : generateInsights(ledger, target, thresholds),
  };
}
