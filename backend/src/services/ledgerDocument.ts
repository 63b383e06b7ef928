import {
  DEFAULT_CATEGORIES,
  type BudgetRecord,
  type CategoryName,
  type ExpenseMap,
  type Ledger,
  type LedgerDocument,
  type MonthKey,
} from '../types.js';
import { serializeJson } from '../storage/jsonFile.js';

const MONTH_KEY_PATTERN = /^\d{4}-(0[1-9]|1[0-2])$/;
const MAX_CATEGORY_LENGTH = 64;

export type ParseResult<T> = { ok: true; value: T } | { ok: false; errors: string[] };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAmount(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

export function isMonthKey(value: unknown): value is MonthKey {
  return typeof value === 'string' && MONTH_KEY_PATTERN.test(value);
}

export function currentMonthKey(now: Date = new Date()): MonthKey {
  const month = String(now.getMonth() + 1).padStart(2, '0');
  return `${now.getFullYear()}-${month}`;
}

/** Trimmed category name, or `null` when empty or too long. */
export function normalizeCategoryName(value: unknown): CategoryName | null {
  if (typeof value !== 'string') {
    return null;
  }
  const name = value.trim();
  if (name.length === 0 || name.length > MAX_CATEGORY_LENGTH || name === '__proto__') {
    return null;
  }
  return name;
}

export function emptyDocument(): LedgerDocument {
  return { categories: [...DEFAULT_CATEGORIES], months: {} };
}

export function defaultRecord(categories: readonly CategoryName[]): BudgetRecord {
  const expenses: ExpenseMap = {};
  for (const category of categories) {
    expenses[category] = 0;
  }
  return { income: 0, expenses, debt: 0 };
}

/** Amount stored under `name`, or 0. Inherited object members never count. */
export function expenseAmount(expenses: ExpenseMap, name: CategoryName): number {
  return Object.hasOwn(expenses, name) ? expenses[name] : 0;
}

/**
 * Copy of `record` in which every permanent category has an entry.
 * One-time expense keys that are not permanent categories are kept.
 */
export function withCategories(record: BudgetRecord, categories: readonly CategoryName[]): BudgetRecord {
  const expenses: ExpenseMap = { ...record.expenses };
  for (const category of categories) {
    if (!Object.hasOwn(expenses, category)) {
      expenses[category] = 0;
    }
  }
  return { income: record.income, expenses, debt: record.debt };
}

export function parseBudgetRecord(input: unknown, path = 'record'): ParseResult<BudgetRecord> {
  if (!isPlainObject(input)) {
    return { ok: false, errors: [`${path} must be an object`] };
  }

  const errors: string[] = [];
  const income = input.income ?? 0;
  const debt = input.debt ?? 0;
  const rawExpenses = input.expenses ?? {};

  if (!isAmount(income)) {
    errors.push(`${path}.income must be a non-negative number`);
  }
  if (!isAmount(debt)) {
    errors.push(`${path}.debt must be a non-negative number`);
  }

  const expenses: ExpenseMap = {};
  if (!isPlainObject(rawExpenses)) {
    errors.push(`${path}.expenses must be an object`);
  } else {
    for (const [rawName, amount] of Object.entries(rawExpenses)) {
      const name = normalizeCategoryName(rawName);
      if (name === null) {
        errors.push(`${path}.expenses has an invalid category name "${rawName}"`);
      } else if (!isAmount(amount)) {
        errors.push(`${path}.expenses["${rawName}"] must be a non-negative number`);
      } else {
        expenses[name] = amount;
      }
    }
  }

  if (errors.length > 0 || !isAmount(income) || !isAmount(debt)) {
    return { ok: false, errors };
  }
  return { ok: true, value: { income, expenses, debt } };
}

function parseCategories(input: unknown, errors: string[]): CategoryName[] {
  if (input === undefined) {
    return [...DEFAULT_CATEGORIES];
  }
  if (!Array.isArray(input)) {
    errors.push('categories must be an array of strings');
    return [];
  }

  const categories: CategoryName[] = [];
  for (const entry of input) {
    const name = normalizeCategoryName(entry);
    if (name === null) {
      errors.push(`categories contains an invalid name ${JSON.stringify(entry)}`);
    } else if (!categories.includes(name)) {
      categories.push(name);
    }
  }
  return categories;
}

function parseMonths(entries: [string, unknown][], errors: string[]): Ledger {
  const months: Ledger = {};
  for (const [key, value] of entries) {
    if (!isMonthKey(key)) {
      errors.push(`"${key}" is not a YYYY-MM month key`);
      continue;
    }
    const record = parseBudgetRecord(value, `months["${key}"]`);
    if (record.ok) {
      months[key] = record.value;
    } else {
      errors.push(...record.errors);
    }
  }
  return months;
}

/**
 * Validate a ledger document. Besides the current `{ categories, months }`
 * shape this accepts the older flat layout where month keys sit at the top
 * level next to an optional `categories` list.
 */
export function parseLedgerDocument(input: unknown): ParseResult<LedgerDocument> {
  if (!isPlainObject(input)) {
    return { ok: false, errors: ['ledger document must be a JSON object'] };
  }

  const errors: string[] = [];
  const categories = parseCategories(input.categories, errors);

  let months: Ledger;
  if ('months' in input) {
    if (!isPlainObject(input.months)) {
      errors.push('months must be an object keyed by YYYY-MM');
      months = {};
    } else {
      months = parseMonths(Object.entries(input.months), errors);
    }
  } else {
    const legacyEntries = Object.entries(input).filter(([key]) => key !== 'categories');
    months = parseMonths(legacyEntries, errors);
  }

  if (errors.length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, value: { categories, months } };
}

export function sortedMonthKeys(ledger: Ledger): MonthKey[] {
  return Object.keys(ledger).sort();
}

export function serializeDocument(document: LedgerDocument): string {
  const months: Ledger = {};
  for (const key of sortedMonthKeys(document.months)) {
    const record = document.months[key];
    months[key] = { income: record.income, expenses: record.expenses, debt: record.debt };
  }
  return serializeJson({ categories: document.categories, months });
}
