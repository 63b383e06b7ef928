import { readFile } from 'node:fs/promises';
import type { Server } from 'node:http';
import { afterEach, describe, expect, test } from 'vitest';
import { createApp } from '../src/app.js';
import type { AppConfig } from '../src/config/env.js';
import { ledgerFileFor } from '../src/services/auth.js';
import { makeTempDir, testConfig } from './helpers.js';

const servers: Server[] = [];

afterEach(async () => {
  await Promise.all(
    servers.splice(0).map(
      (server) =>
        new Promise<void>((resolve) => {
          server.closeAllConnections();
          server.close(() => resolve());
        })
    )
  );
});

async function start(config: AppConfig): Promise<string> {
  const server = createApp(config).listen(0);
  servers.push(server);
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('server is not listening on a TCP port');
  }
  return `http://127.0.0.1:${address.port}`;
}

function request(base: string, path: string, init: { method?: string; token?: string; body?: unknown } = {}) {
  const headers: Record<string, string> = {};
  if (init.token) {
    headers.Authorization = `Bearer ${init.token}`;
  }
  if (init.body !== undefined) {
    headers['Content-Type'] = 'application/json';
  }
  return fetch(`${base}${path}`, {
    method: init.method ?? 'GET',
    headers,
    body: init.body === undefined ? undefined : JSON.stringify(init.body),
  });
}

async function signupToken(base: string, username: string): Promise<string> {
  const res = await request(base, '/api/auth/signup', { method: 'POST', body: { username, password: 'secret1' } });
  expect(res.status).toBe(201);
  const payload: unknown = await res.json();
  if (typeof payload !== 'object' || payload === null || !('token' in payload) || typeof payload.token !== 'string') {
    throw new Error('signup response has no token');
  }
  return payload.token;
}

describe('multi-user API', () => {
  test('ledger routes require a token', async () => {
    const base = await start(testConfig(await makeTempDir()));
    const res = await request(base, '/api/ledger');
    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: 'Authentication required', code: 'AUTH_REQUIRED' });
  });

  test('login failures do not reveal whether the user exists', async () => {
    const base = await start(testConfig(await makeTempDir()));
    await signupToken(base, 'alice');

    const wrong = await request(base, '/api/auth/login', { method: 'POST', body: { username: 'alice', password: 'nope00' } });
    const unknown = await request(base, '/api/auth/login', { method: 'POST', body: { username: 'zed', password: 'nope00' } });

    expect(wrong.status).toBe(401);
    expect(unknown.status).toBe(401);
    expect(await wrong.json()).toEqual(await unknown.json());
  });

  test('records a month, adds an expense and reports insights', async () => {
    const base = await start(testConfig(await makeTempDir()));
    const token = await signupToken(base, 'alice');

    const put = await request(base, '/api/ledger/months/2024-10', {
      method: 'PUT',
      token,
      body: { income: 5000, expenses: { 'Rent/Mortgage': 2000, Groceries: 1200, Transport: 800 }, debt: 2000 },
    });
    expect(put.status).toBe(200);

    await request(base, '/api/ledger/months/2024-11', {
      method: 'PUT',
      token,
      body: { income: 5000, expenses: { 'Rent/Mortgage': 2000, Groceries: 1200, Transport: 900 }, debt: 1800 },
    });
    const added = await request(base, '/api/ledger/months/2024-11/expenses', {
      method: 'POST',
      token,
      body: { category: 'Groceries', amount: 400 },
    });
    expect(added.status).toBe(201);

    const summary = await request(base, '/api/ledger/months/2024-11/summary', { token });
    expect(await summary.json()).toMatchObject({
      month: '2024-11',
      exists: true,
      metrics: { income: 5000, totalExpenses: 4500, savings: 500, savingsRate: 0.1, debt: 1800 },
      breakdown: [
        { category: 'Rent/Mortgage', amount: 2000 },
        { category: 'Groceries', amount: 1600 },
        { category: 'Transport', amount: 900 },
      ],
    });

    const insights = await request(base, '/api/insights?month=2024-11', { token });
    expect(await insights.json()).toMatchObject({
      month: '2024-11',
      trends: {
        available: true,
        trends: [{ totalExpenses: { absolute: 500, percent: 12.5 }, debt: { absolute: -200, percent: -10 } }],
      },
    });

    const series = await request(base, '/api/insights/trends/savings', { token });
    expect(await series.json()).toEqual({
      metric: 'savings',
      series: [
        { month: '2024-10', value: 1000 },
        { month: '2024-11', value: 500 },
      ],
    });
  });

  test('insights for a month without data is a 404', async () => {
    const base = await start(testConfig(await makeTempDir()));
    const token = await signupToken(base, 'alice');
    const res = await request(base, '/api/insights?month=2024-01', { token });
    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({ code: 'MONTH_NOT_FOUND' });
  });

  test('unknown trend metrics are rejected', async () => {
    const base = await start(testConfig(await makeTempDir()));
    const token = await signupToken(base, 'alice');
    const res = await request(base, '/api/insights/trends/income', { token });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ code: 'INVALID_METRIC' });
  });

  test('each user only sees their own ledger', async () => {
    const config = testConfig(await makeTempDir());
    const base = await start(config);
    const alice = await signupToken(base, 'alice');
    const bob = await signupToken(base, 'bob');

    await request(base, '/api/ledger/months/2024-10', { method: 'PUT', token: alice, body: { income: 10 } });

    const bobLedger = await request(base, '/api/ledger', { token: bob });
    expect(await bobLedger.json()).toMatchObject({ months: {} });
    const aliceFile = JSON.parse(await readFile(ledgerFileFor(config, 'alice'), 'utf8'));
    expect(aliceFile.months['2024-10'].income).toBe(10);
  });

  test('export downloads the stored document byte for byte', async () => {
    const config = testConfig(await makeTempDir());
    const base = await start(config);
    const token = await signupToken(base, 'alice');
    await request(base, '/api/ledger/months/2024-10', { method: 'PUT', token, body: { income: 10 } });

    const res = await request(base, '/api/backup/export', { token });
    expect(res.status).toBe(200);
    expect(res.headers.get('content-disposition')).toMatch(/^attachment; filename="budget_data_alice_\d{8}\.json"$/);
    expect(await res.text()).toBe(await readFile(ledgerFileFor(config, 'alice'), 'utf8'));
  });

  test('import replaces the ledger from an uploaded file', async () => {
    const base = await start(testConfig(await makeTempDir()));
    const token = await signupToken(base, 'alice');

    const document = { categories: ['Groceries'], months: { '2024-03': { income: 3, expenses: { Groceries: 1 }, debt: 0 } } };
    const form = new FormData();
    form.append('file', new Blob([JSON.stringify(document)], { type: 'application/json' }), 'backup.json');

    const res = await fetch(`${base}/api/backup/import`, {
      method: 'POST',
      headers: { Authorization: `Bearer ${token}` },
      body: form,
    });
    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({ months: 1, categories: 1 });

    const ledgerRes = await request(base, '/api/ledger', { token });
    expect(await ledgerRes.json()).toEqual(document);
  });

  test('import rejects files that are not JSON', async () => {
    const base = await start(testConfig(await makeTempDir()));
    const token = await signupToken(base, 'alice');

    const form = new FormData();
    form.append('file', new Blob(['hello'], { type: 'text/plain' }), 'notes.txt');
    const res = await fetch(`${base}/api/backup/import`, {
      method: 'POST',
      headers: { Authorization: `Bearer ${token}` },
      body: form,
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ code: 'INVALID_FILE_TYPE' });
  });

  test('category management', async () => {
    const base = await start(testConfig(await makeTempDir()));
    const token = await signupToken(base, 'alice');

    const added = await request(base, '/api/categories', { method: 'POST', token, body: { name: 'Mutual Funds' } });
    expect(added.status).toBe(201);

    const duplicate = await request(base, '/api/categories', { method: 'POST', token, body: { name: 'Mutual Funds' } });
    expect(duplicate.status).toBe(409);

    const removed = await request(base, `/api/categories/${encodeURIComponent('Rent/Mortgage')}`, { method: 'DELETE', token });
    expect(removed.status).toBe(200);
    const list = await request(base, '/api/categories', { token });
    expect(await list.json()).toEqual({
      categories: [
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
        'Mutual Funds',
      ],
    });
  });
});

describe('single-user API', () => {
  test('serves the shared ledger without authentication', async () => {
    const config = testConfig(await makeTempDir(), { mode: 'single' });
    const base = await start(config);

    const put = await request(base, '/api/ledger/months/2024-10', { method: 'PUT', body: { income: 42 } });
    expect(put.status).toBe(200);

    const saved = JSON.parse(await readFile(ledgerFileFor(config, null), 'utf8'));
    expect(saved.months['2024-10'].income).toBe(42);
  });

  test('account routes are disabled', async () => {
    const base = await start(testConfig(await makeTempDir(), { mode: 'single' }));
    const res = await request(base, '/api/auth/signup', { method: 'POST', body: { username: 'a', password: 'secret1' } });
    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({ code: 'MULTI_USER_DISABLED' });

    const mode = await request(base, '/api/auth/mode');
    expect(await mode.json()).toEqual({ mode: 'single' });
  });
});

describe('errors', () => {
  test('unknown routes are 404', async () => {
    const base = await start(testConfig(await makeTempDir(), { mode: 'single' }));
    const res = await request(base, '/api/nothing');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found', code: 'ROUTE_NOT_FOUND' });
  });

  test('malformed JSON bodies are 400', async () => {
    const base = await start(testConfig(await makeTempDir(), { mode: 'single' }));
    const res = await fetch(`${base}/api/ledger/months/2024-10`, {
      method: 'PUT',
      headers: { 'Content-Type': 'application/json' },
      body: '{"income":',
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ code: 'INVALID_JSON' });
  });

  test('invalid month keys are 400', async () => {
    const base = await start(testConfig(await makeTempDir(), { mode: 'single' }));
    const res = await request(base, '/api/ledger/months/October');
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ code: 'INVALID_MONTH' });
  });
});
