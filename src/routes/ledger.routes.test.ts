import { once } from 'node:events';
import type { Server } from 'node:http';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createApp } from '../app';
import { MemoryLedgerStore } from '../domains/ledger';
import { LedgerService } from '../services/ledger.service';

const NOW = '2026-06-01T12:00:00.000Z';

let server: Server;
let baseUrl: string;

async function call(method: string, path: string, body?: unknown) {
  const res = await fetch(`${baseUrl}${path}`, {
    method,
    headers: body === undefined ? undefined : { 'content-type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body)
  });
  return { status: res.status, headers: res.headers, body: await res.json() };
}

async function seedWidget() {
  await call('POST', '/products', { sku: 'A1', name: 'Widget', minLevel: 5, maxLevel: 100, cost: 2 });
}

describe('ledger routes', () => {
  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const store = new MemoryLedgerStore();
    const ledger = new LedgerService(store, { clock: () => new Date(NOW) });
    server = createApp({ store, ledger }).listen(0, '127.0.0.1');
    await once(server, 'listening');
    const address = server.address();
    baseUrl = `http://127.0.0.1:${typeof address === 'object' && address ? address.port : 0}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  it('registers a product and answers 201 with its SKU', async () => {
    const res = await call('POST', '/products', { sku: 'A1', name: 'Widget', minLevel: 5, maxLevel: 100, cost: 2 });

    expect(res.status).toBe(201);
    expect(res.body).toEqual({ sku: 'A1' });
  });

  it('answers 400 with the ledger error for a duplicate SKU', async () => {
    await seedWidget();

    const res = await call('POST', '/products', { sku: 'A1', name: 'Again', minLevel: 0, maxLevel: 1, cost: 1 });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'SKU A1 is already registered.', code: 'CONFLICT', details: { sku: 'A1' } });
  });

  it('rejects a product body that fails validation', async () => {
    const res = await call('POST', '/products', { sku: 'A1', name: 'Widget', minLevel: 9, maxLevel: 3, cost: 1 });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      error: { formErrors: [], fieldErrors: { maxLevel: ['maxLevel must be greater than or equal to minLevel'] } }
    });
  });

  it('posts movements and reports the minimum-level alert', async () => {
    await seedWidget();

    const inbound = await call('POST', '/movements', { sku: 'A1', direction: 'E', quantity: 10 });
    const outbound = await call('POST', '/movements', { sku: 'A1', direction: 'S', quantity: 7 });

    expect(inbound).toMatchObject({ status: 201, body: { sku: 'A1', newBalance: 10, belowMinimum: false } });
    expect(outbound).toMatchObject({ status: 201, body: { sku: 'A1', newBalance: 3, belowMinimum: true } });
  });

  it('refuses a withdrawal beyond the balance', async () => {
    await seedWidget();
    await call('POST', '/movements', { sku: 'A1', direction: 'E', quantity: 3 });

    const res = await call('POST', '/movements', { sku: 'A1', direction: 'S', quantity: 50 });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      error: 'Insufficient stock. Current balance: 3',
      code: 'INSUFFICIENT_STOCK',
      details: { sku: 'A1', currentBalance: 3, requested: 50 }
    });
  });

  it('rejects an unknown direction code', async () => {
    await seedWidget();

    const res = await call('POST', '/movements', { sku: 'A1', direction: 'X', quantity: 1 });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      error: {
        formErrors: [],
        fieldErrors: { direction: ["Invalid movement direction. Use 'E' for inbound or 'S' for outbound."] }
      }
    });
  });

  it('answers 404 for movements on an unknown SKU', async () => {
    const res = await call('POST', '/movements', { sku: 'ZZ', direction: 'E', quantity: 1 });

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'SKU ZZ not found.', code: 'NOT_FOUND', details: { sku: 'ZZ' } });
  });

  it('returns the balance with its last update time', async () => {
    await seedWidget();
    await call('POST', '/movements', { sku: 'A1', direction: 'E', quantity: 4 });

    const res = await call('GET', '/balance/A1');

    expect(res).toMatchObject({ status: 200, body: { sku: 'A1', quantity: 4, lastUpdated: NOW } });
  });

  it('lists products with balances', async () => {
    await seedWidget();

    const res = await call('GET', '/products');

    expect(res.body).toEqual([{ sku: 'A1', name: 'Widget', balance: 0, minLevel: 5, cost: 2, lastUpdated: NOW }]);
  });

  it('pages movement history with direction codes', async () => {
    await seedWidget();
    await call('POST', '/movements', { sku: 'A1', direction: 'E', quantity: 10 });
    await call('POST', '/movements', { sku: 'A1', direction: 'S', quantity: 2 });

    const res = await call('GET', '/products/A1/movements?limit=1');

    expect(res.body).toEqual({
      data: [{ id: 2, sku: 'A1', direction: 'S', quantity: 2, occurredAt: NOW }],
      paging: { limit: 1, offset: 0 }
    });
  });

  it('reports a clean reconciliation', async () => {
    await seedWidget();
    await call('POST', '/movements', { sku: 'A1', direction: 'E', quantity: 10 });

    const res = await call('GET', '/ledger/reconcile');

    expect(res.body).toEqual({ checkedSkus: 1, discrepancies: [], checkedAt: NOW });
  });

  it('reports readiness of the store', async () => {
    const res = await call('GET', '/health/ready');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'ok', details: { store: { ok: true, kind: 'memory' } } });
  });

  it('answers 404 for an analytics refresh when no job is registered', async () => {
    const res = await call('POST', '/analytics/refresh');

    expect(res).toMatchObject({
      status: 404,
      body: { error: 'Analytics refresh is not enabled on this instance.' }
    });
  });

  it('echoes the caller request id', async () => {
    const res = await fetch(`${baseUrl}/health/live`, { headers: { 'x-request-id': 'req-123' } });
    await res.text();

    expect(res.headers.get('x-request-id')).toBe('req-123');
  });

  it('answers unknown paths with a JSON 404', async () => {
    const res = await call('GET', '/nowhere');

    expect(res).toMatchObject({ status: 404, body: { error: 'Not found' } });
  });
});
