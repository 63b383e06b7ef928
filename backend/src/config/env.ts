import { resolve } from 'node:path';
import type { InsightThresholds } from '../types.js';
import type { RuntimeEnv } from './security.js';

export type LedgerMode = 'multi' | 'single';

export interface AppConfig {
  port: number;
  corsOrigin: string;
  mode: LedgerMode;
  dataDir: string;
  bcryptRounds: number;
  thresholds: InsightThresholds;
}

export const DEFAULT_THRESHOLDS: InsightThresholds = {
  lowSavingsRate: 0.1,
  highSavingsRate: 0.2,
  expenseRiseThreshold: 0.1,
  categoryConcentration: 0.4,
  expenseTargetRatio: 0.8,
  savingsWindow: 3,
};

function readNumber(env: RuntimeEnv, key: string, fallback: number, { integer = false, min = 0 } = {}): number {
  const raw = env[key]?.trim();
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < min || (integer && !Number.isInteger(value))) {
    throw new Error(`${key} must be ${integer ? 'an integer' : 'a number'} >= ${min}, got "${raw}"`);
  }
  return value;
}

function readMode(env: RuntimeEnv): LedgerMode {
  const raw = env.LEDGER_MODE?.trim() || 'multi';
  if (raw !== 'multi' && raw !== 'single') {
    throw new Error(`LEDGER_MODE must be "multi" or "single", got "${raw}"`);
  }
  return raw;
}

export function loadConfig(env: RuntimeEnv = process.env): AppConfig {
  const thresholds: InsightThresholds = {
    lowSavingsRate: readNumber(env, 'INSIGHT_LOW_SAVINGS_RATE', DEFAULT_THRESHOLDS.lowSavingsRate),
    highSavingsRate: readNumber(env, 'INSIGHT_HIGH_SAVINGS_RATE', DEFAULT_THRESHOLDS.highSavingsRate),
    expenseRiseThreshold: readNumber(env, 'INSIGHT_EXPENSE_RISE_THRESHOLD', DEFAULT_THRESHOLDS.expenseRiseThreshold),
    categoryConcentration: readNumber(env, 'INSIGHT_CATEGORY_CONCENTRATION', DEFAULT_THRESHOLDS.categoryConcentration),
    expenseTargetRatio: readNumber(env, 'INSIGHT_EXPENSE_TARGET_RATIO', DEFAULT_THRESHOLDS.expenseTargetRatio),
    savingsWindow: readNumber(env, 'INSIGHT_SAVINGS_WINDOW', DEFAULT_THRESHOLDS.savingsWindow, { integer: true, min: 1 }),
  };

  if (thresholds.lowSavingsRate > thresholds.highSavingsRate) {
    throw new Error('INSIGHT_LOW_SAVINGS_RATE cannot exceed INSIGHT_HIGH_SAVINGS_RATE');
  }

  return {
    port: readNumber(env, 'PORT', 3001, { integer: true }),
    corsOrigin: env.CORS_ORIGIN || 'http://localhost:5173',
    mode: readMode(env),
    dataDir: resolve(env.DATA_DIR || './data'),
    bcryptRounds: readNumber(env, 'BCRYPT_ROUNDS', 10, { integer: true, min: 4 }),
    thresholds,
  };
}
