import logger from '../logger.js';
import { Decimal } from '../money.js';
import { AppError } from '../middleware/errorHandler.js';
import { readTextFile, writeFileAtomic } from '../storage/jsonFile.js';
import type { BudgetRecord, CategoryName, LedgerDocument, LedgerSession, MonthKey } from '../types.js';
import {
  currentMonthKey,
  defaultRecord,
  emptyDocument,
  expenseAmount,
  isMonthKey,
  normalizeCategoryName,
  parseBudgetRecord,
  parseLedgerDocument,
  serializeDocument,
  withCategories,
} from './ledgerDocument.js';

export interface MonthView {
  month: MonthKey;
  record: BudgetRecord;
  exists: boolean;
}

export function assertMonthKey(month: string): MonthKey {
  if (!isMonthKey(month)) {
    throw new AppError(400, 'Month must use the YYYY-MM format', {
      code: 'INVALID_MONTH',
      params: { month },
    });
  }
  return month;
}

/**
 * Read the session's document. A missing file, invalid JSON or a document
 * of the wrong shape all mean "no data yet".
 */
export async function load(session: LedgerSession): Promise<LedgerDocument> {
  const raw = await readTextFile(session.dataFile);
  if (raw === null) {
    return emptyDocument();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    logger.warn({ err: error, dataFile: session.dataFile }, 'Ledger file is not valid JSON, starting empty');
    return emptyDocument();
  }

  const result = parseLedgerDocument(parsed);
  if (!result.ok) {
    logger.warn({ dataFile: session.dataFile, errors: result.errors }, 'Ledger file has an unexpected shape, starting empty');
    return emptyDocument();
  }
  return result.value;
}

export async function save(session: LedgerSession, document: LedgerDocument): Promise<void> {
  try {
    await writeFileAtomic(session.dataFile, serializeDocument(document));
  } catch (error) {
    logger.error({ err: error, dataFile: session.dataFile, username: session.username }, 'Failed to write ledger');
    throw new AppError(500, 'Failed to save ledger', { code: 'LEDGER_WRITE_FAILED' });
  }
  logger.debug({ username: session.username, months: Object.keys(document.months).length }, 'Ledger saved');
}

/** The document exactly as stored, for download. */
export async function exportDocument(session: LedgerSession): Promise<string> {
  const raw = await readTextFile(session.dataFile);
  return raw ?? serializeDocument(emptyDocument());
}

export async function importDocument(
  session: LedgerSession,
  payload: unknown
): Promise<{ months: number; categories: number }> {
  const result = parseLedgerDocument(payload);
  if (!result.ok) {
    throw new AppError(400, 'Invalid ledger document', {
      code: 'INVALID_LEDGER_DOCUMENT',
      params: { errors: result.errors },
    });
  }

  await save(session, result.value);
  logger.info({ username: session.username, months: Object.keys(result.value.months).length }, 'Ledger imported');
  return {
    months: Object.keys(result.value.months).length,
    categories: result.value.categories.length,
  };
}

/** Stored months plus the current month, newest first. */
export async function listMonths(session: LedgerSession, now: Date = new Date()): Promise<MonthKey[]> {
  const document = await load(session);
  const months = new Set([...Object.keys(document.months), currentMonthKey(now)]);
  return [...months].sort().reverse();
}

export async function getMonth(session: LedgerSession, month: string): Promise<MonthView> {
  const key = assertMonthKey(month);
  const document = await load(session);
  const stored = document.months[key];

  if (!stored) {
    return { month: key, record: defaultRecord(document.categories), exists: false };
  }
  return { month: key, record: withCategories(stored, document.categories), exists: true };
}

export async function saveMonth(session: LedgerSession, month: string, input: unknown): Promise<BudgetRecord> {
  const key = assertMonthKey(month);
  const parsed = parseBudgetRecord(input);
  if (!parsed.ok) {
    throw new AppError(400, 'Invalid budget record', {
      code: 'INVALID_BUDGET_RECORD',
      params: { errors: parsed.errors },
    });
  }

  const document = await load(session);
  document.months[key] = parsed.value;
  await save(session, document);
  return parsed.value;
}

/**
 * Add `amount` to one expense of a month. Works for permanent categories and
 * for one-time expense names, which only exist in this month's record.
 */
export async function addExpense(
  session: LedgerSession,
  month: string,
  category: unknown,
  amount: unknown
): Promise<BudgetRecord> {
  const key = assertMonthKey(month);
  const name = normalizeCategoryName(category);
  if (name === null) {
    throw new AppError(400, 'Expense name is required', { code: 'INVALID_CATEGORY' });
  }
  if (typeof amount !== 'number' || !Number.isFinite(amount) || amount <= 0) {
    throw new AppError(400, 'Amount must be a positive number', { code: 'INVALID_AMOUNT' });
  }

  const document = await load(session);
  const record = withCategories(document.months[key] ?? defaultRecord(document.categories), document.categories);
  record.expenses[name] = new Decimal(expenseAmount(record.expenses, name)).plus(amount).toNumber();

  document.months[key] = record;
  await save(session, document);
  return record;
}

export async function listCategories(session: LedgerSession): Promise<CategoryName[]> {
  const document = await load(session);
  return document.categories;
}

export async function addCategory(session: LedgerSession, rawName: unknown): Promise<CategoryName[]> {
  const name = normalizeCategoryName(rawName);
  if (name === null) {
    throw new AppError(400, 'Category name is required', { code: 'INVALID_CATEGORY' });
  }

  const document = await load(session);
  if (document.categories.includes(name)) {
    throw new AppError(409, 'Category already exists', { code: 'CATEGORY_EXISTS', params: { name } });
  }

  document.categories.push(name);
  await save(session, document);
  logger.info({ username: session.username, category: name }, 'Category added');
  return document.categories;
}

/** Remove a permanent category from the list and from every month. */
export async function removeCategory(session: LedgerSession, name: string): Promise<CategoryName[]> {
  const document = await load(session);
  if (!document.categories.includes(name)) {
    throw new AppError(404, 'Category not found', { code: 'CATEGORY_NOT_FOUND', params: { name } });
  }

  document.categories = document.categories.filter((category) => category !== name);
  for (const record of Object.values(document.months)) {
    delete record.expenses[name];
  }

  await save(session, document);
  logger.info({ username: session.username, category: name }, 'Category removed');
  return document.categories;
}
