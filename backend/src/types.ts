// Ledger Types

export const DEFAULT_CATEGORIES = [
  'Rent/Mortgage',
  'Utilities',
  'Groceries',
  'Transport',
  'Entertainment',
  'Healthcare',
  'Insurance',
  'Savings',
  'Debt Repayment',
  'Dining Out',
  'Shopping',
  'Other',
] as const;

export type DefaultCategory = (typeof DEFAULT_CATEGORIES)[number];

// Reserved defaults plus any user-added name
export type CategoryName = DefaultCategory | (string & {});

export type ExpenseMap = Record<string, number>;

/** Year-month key (`YYYY-MM`); sorts chronologically as a string. */
export type MonthKey = string;

export interface BudgetRecord {
  income: number;
  expenses: ExpenseMap;
  debt: number;
}

export type Ledger = Record<MonthKey, BudgetRecord>;

export interface LedgerDocument {
  categories: CategoryName[];
  months: Ledger;
}

/**
 * Which document a request reads and writes. Built per request by the
 * ledger middleware and passed explicitly to every store call.
 */
export interface LedgerSession {
  username: string | null;
  dataFile: string;
}

// Insights

export type TrendMetric = 'savings' | 'expenses' | 'debt';

export interface MonthMetrics {
  month: MonthKey;
  income: number;
  totalExpenses: number;
  savings: number;
  savingsRate: number;
  debt: number;
}

export interface Delta {
  absolute: number;
  percent: number | null;
}

export interface MonthTrend {
  month: MonthKey;
  previousMonth: MonthKey;
  savings: Delta;
  totalExpenses: Delta;
  debt: Delta;
}

export type TrendReport =
  | { available: false; reason: string }
  | { available: true; trends: MonthTrend[] };

export type InsightSeverity = 'positive' | 'info' | 'warning';

export type InsightCode =
  | 'LOW_SAVINGS_RATE'
  | 'MODERATE_SAVINGS_RATE'
  | 'HIGH_SAVINGS_RATE'
  | 'TOP_EXPENSE'
  | 'DEBT_PAYOFF'
  | 'EXPENSES_RISING'
  | 'EXPENSES_FALLING'
  | 'CATEGORY_CONCENTRATION'
  | 'SPENDING_ABOVE_TARGET';

export interface Insight {
  code: InsightCode;
  severity: InsightSeverity;
  message: string;
  params: Record<string, string | number>;
}

export interface InsightThresholds {
  lowSavingsRate: number;
  highSavingsRate: number;
  expenseRiseThreshold: number;
  categoryConcentration: number;
  expenseTargetRatio: number;
  savingsWindow: number;
}

export interface CategoryShare {
  category: CategoryName;
  amount: number;
  share: number;
}

export interface SeriesPoint {
  month: MonthKey;
  value: number;
}

// Accounts

export interface StoredUser {
  passwordHash: string;
  email: string | null;
  createdAt: string;
}

export type UserDirectory = Record<string, StoredUser>;

export interface PublicUser {
  username: string;
  email: string | null;
  createdAt: string;
}
