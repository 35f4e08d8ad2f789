import type { Server } from 'http';
import type { AddressInfo } from 'net';
import { createHttpTransport } from '../transports/http';
import { RpcDispatcher } from '../transports/rpc';
import { createTestEngine } from './helpers/test_engine';

describe('HTTP transport', () => {
  let server: Server;
  let baseUrl: string;
  let fixture: ReturnType<typeof createTestEngine>;

  beforeEach(async () => {
    fixture = createTestEngine();
    const app = createHttpTransport(fixture.engine, new RpcDispatcher(fixture.engine));
    server = await new Promise<Server>(resolve => {
      const s = app.listen(0, '127.0.0.1', () => resolve(s));
    });
    const address: AddressInfo | string | null = server.address();
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close(e => (e ? reject(e) : resolve())));
  });

  function post(route: string, body: unknown) {
    return fetch(`${baseUrl}${route}`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(body)
    });
  }

  it('reports health', async () => {
    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', tweaks: 2 });
  });

  it('applies and restores through REST routes', async () => {
    const applied = await post('/tweaks/apply', { ids: ['user_tweak'] });
    expect(applied.status).toBe(200);
    expect(await applied.json()).toMatchObject({ results: [{ id: 'user_tweak', outcome: 'applied' }] });

    const state = await (await fetch(`${baseUrl}/state`)).json();
    expect(state).toEqual({ elevated: false, appliedCount: 1, foreignKeys: [], catalogSize: 2 });

    const restored = await post('/tweaks/restore', {});
    expect(await restored.json()).toMatchObject({ results: [{ id: 'user_tweak', outcome: 'restored' }] });
    expect(fixture.executor.setting('HKCU:\\Test', 'Mode')).toEqual({ type: 'DWord', data: 0 });
  });

  it('rejects an apply without a selection', async () => {
    const res = await post('/tweaks/apply', { ids: [] });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { code: 'INVALID_REQUEST' } });
  });

  it('lists tweaks and the restore plan', async () => {
    const tweaks = await (await fetch(`${baseUrl}/tweaks`)).json();
    expect(tweaks).toMatchObject({ tweaks: [{ id: 'user_tweak', applied: false }, { id: 'admin_tweak', blocked: true }] });

    const plan = await (await fetch(`${baseUrl}/tweaks/plan`)).json();
    expect(plan).toEqual({ restorable: [], unknown: [], oneWay: [] });
  });

  it('serves JSON-RPC on /rpc', async () => {
    const res = await post('/rpc', { jsonrpc: '2.0', id: 7, method: 'ping' });

    expect(await res.json()).toEqual({ jsonrpc: '2.0', id: 7, result: { pong: true, tweaks: 2 } });
  });

  it('answers a malformed JSON body with 400', async () => {
    const res = await fetch(`${baseUrl}/rpc`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{"jsonrpc":'
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { code: 'INVALID_REQUEST' } });
  });
});
