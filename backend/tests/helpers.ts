import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach } from 'vitest';
import { DEFAULT_THRESHOLDS, type AppConfig } from '../src/config/env.js';
import type { BudgetRecord } from '../src/types.js';

const tempDirs: string[] = [];

afterEach(async () => {
  await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
});

export async function makeTempDir(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'budget-ledger-'));
  tempDirs.push(dir);
  return dir;
}

export function testConfig(dataDir: string, overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 0,
    corsOrigin: 'http://localhost:5173',
    mode: 'multi',
    dataDir,
    bcryptRounds: 4,
    thresholds: { ...DEFAULT_THRESHOLDS },
    ...overrides,
  };
}

export function record(income: number, expenses: Record<string, number>, debt = 0): BudgetRecord {
  return { income, expenses, debt };
}
