import assert from 'node:assert';
import type http from 'node:http';
import { after, before, describe, it } from 'node:test';

import { MemoryDatastore } from './repositories/memoryDatastore';
import { initServices } from './services';
import { createApp } from './server';
import { DEFAULT_NOW, type Harness, mkClock, mkOpenDrawing, seedBalance } from './testing/harness';
import { configureAuth, generateToken } from './utils/auth';
import { createSilentLogger, type LogEntry } from './utils/logger';

interface ApiResponse {
  status: number;
  body: Record<string, unknown>;
}

async function getServerBaseUrl(server: http.Server): Promise<string> {
  const existing = server.address();
  if (existing && typeof existing !== 'string') {
    return `http://127.0.0.1:${existing.port}`;
  }
  await new Promise<void>((resolve) => {
    server.once('listening', () => resolve());
  });
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Server address is not available.');
  }
  return `http://127.0.0.1:${address.port}`;
}

function asRecord(value: unknown): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`Expected a JSON object, got ${JSON.stringify(value)}`);
  }
  return Object.fromEntries(Object.entries(value));
}

describe('http api', () => {
  configureAuth({ secret: 'test-secret-value', expiresIn: '1h' });

  const store = new MemoryDatastore();
  const logs: LogEntry[] = [];
  const time = mkClock(DEFAULT_NOW);
  const services = initServices({
    store,
    logger: createSilentLogger((entry) => logs.push(entry)),
    clock: time.clock,
  });
  const harness: Harness = { store, services, time, logs };
  const server = createApp().listen(0, '127.0.0.1');

  const memberToken = generateToken({ id: 7, role: 'user' });
  const adminToken = generateToken({ id: 1, role: 'admin' });
  let baseUrl = '';

  async function call(
    path: string,
    options: { method?: string; token?: string; body?: unknown } = {}
  ): Promise<ApiResponse> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (options.token) {
      headers.Authorization = `Bearer ${options.token}`;
    }
    const response = await fetch(`${baseUrl}${path}`, {
      method: options.method ?? 'GET',
      headers,
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
    });
    return { status: response.status, body: asRecord(await response.json()) };
  }

  before(async () => {
    baseUrl = await getServerBaseUrl(server);
  });

  after(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  });

  it('reports health against the datastore', async () => {
    const { status, body } = await call('/health');
    assert.strictEqual(status, 200);
    assert.strictEqual(body.status, 'OK');
    assert.strictEqual(body.database, 'Connected');
  });

  it('rejects requests without a bearer token', async () => {
    const { status, body } = await call('/api/points/balance');
    assert.strictEqual(status, 401);
    assert.deepStrictEqual(body, { error: 'UNAUTHORIZED', message: 'No token provided', retryable: false });
  });

  it('rejects tampered tokens', async () => {
    const { status, body } = await call('/api/points/balance', { token: `${memberToken}x` });
    assert.strictEqual(status, 401);
    assert.strictEqual(body.message, 'Invalid or expired token');
  });

  it('keeps admin routes away from members', async () => {
    const { status, body } = await call('/api/admin/reviews', { token: memberToken });
    assert.strictEqual(status, 403);
    assert.strictEqual(body.error, 'FORBIDDEN');
  });

  it('buys tickets with points and reports the new balance', async () => {
    await seedBalance(services, 7, 1_000);
    const drawing = await mkOpenDrawing(harness);

    const purchase = await call(`/api/drawings/${drawing.id}/tickets`, {
      method: 'POST',
      token: memberToken,
      body: { quantity: 3 },
    });
    assert.strictEqual(purchase.status, 201);
    assert.strictEqual(purchase.body.message, 'Purchased 3 ticket(s)');
    const data = asRecord(purchase.body.data);
    assert.strictEqual(data.total_cost, 300);
    assert.strictEqual(data.balance_after, 700);

    const balance = await call('/api/points/balance', { token: memberToken });
    assert.strictEqual(balance.status, 200);
    assert.deepStrictEqual(balance.body, {
      success: true,
      data: { points_earned: 1_000, points_balance: 700 },
    });

    const tickets = await call(`/api/drawings/${drawing.id}/tickets`, { token: memberToken });
    assert.strictEqual(tickets.body.count, 3);
  });

  it('returns reason-coded validation failures', async () => {
    const drawing = await mkOpenDrawing(harness, { name: 'Validation Draw' });
    const { status, body } = await call(`/api/drawings/${drawing.id}/tickets`, {
      method: 'POST',
      token: memberToken,
      body: { quantity: 0 },
    });
    assert.strictEqual(status, 400);
    assert.strictEqual(body.error, 'VALIDATION_ERROR');
    assert.strictEqual(body.retryable, false);
  });

  it('refuses purchases beyond the balance without touching it', async () => {
    const drawing = await mkOpenDrawing(harness, { name: 'Expensive Draw', ticket_cost: 10_000 });
    const { status, body } = await call(`/api/drawings/${drawing.id}/tickets`, {
      method: 'POST',
      token: memberToken,
      body: { quantity: 1 },
    });
    assert.strictEqual(status, 409);
    assert.strictEqual(body.error, 'INSUFFICIENT_BALANCE');

    const balance = await services.ledger.getBalance(7);
    assert.strictEqual(balance.points_balance, 700);
  });

  it('lets admins add prizes that members can list', async () => {
    const drawing = await mkOpenDrawing(harness, { drawing_type: 'weekly', name: 'Weekly API Draw' });

    const added = await call(`/api/admin/drawings/${drawing.id}/prizes`, {
      method: 'POST',
      token: adminToken,
      body: { rank: 1, name: 'Smart watch', quantity: 2 },
    });
    assert.strictEqual(added.status, 201);
    assert.strictEqual(asRecord(added.body.data).name, 'Smart watch');

    const prizes = await call(`/api/drawings/${drawing.id}/prizes`, { token: memberToken });
    assert.strictEqual(prizes.status, 200);
    assert.strictEqual(prizes.body.count, 1);

    const weekly = await call('/api/drawings?drawing_type=weekly&status=open', { token: memberToken });
    assert.strictEqual(weekly.status, 200);
    const data: unknown = weekly.body.data;
    const listed = Array.isArray(data) ? data.map((item: unknown) => asRecord(item)) : [];
    assert.deepStrictEqual(
      listed.map((item) => [item.name, item.winner_count]),
      [['Weekly API Draw', 2]]
    );
  });

  it('lets admins verify a ledger', async () => {
    const { status, body } = await call('/api/admin/points/7/verify', { token: adminToken });
    assert.strictEqual(status, 200);
    assert.strictEqual(asRecord(body.data).consistent, true);
  });

  it('answers unknown routes with a 404 body', async () => {
    const { status, body } = await call('/api/unknown');
    assert.strictEqual(status, 404);
    assert.deepStrictEqual(body, { error: 'NOT_FOUND', message: 'Route GET /api/unknown not found', retryable: false });
  });
});
