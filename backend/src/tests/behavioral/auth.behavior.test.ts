/** Behavioral tests for authentication.
 *
 * Covers:
 * - REST API requests without Authorization header return 401
 * - REST API requests with wrong token return 401
 * - REST API requests with correct token pass through
 * - OPTIONS requests pass through (CORS preflight)
 * - Health endpoint works without auth
 * - WebSocket upgrade without or with a wrong token is rejected
 * - WebSocket upgrade with correct token succeeds
 * - the token admits a composition request; the body's actor is judged by the policy
 */

import { describe, it, expect, afterEach, beforeEach, vi } from 'vitest';
import http from 'node:http';
import { WebSocket } from 'ws';
import { startServer } from '../../server.js';
import { ALICE, BOB, KITTIES } from '../helpers.js';

const TOKEN = 'test-secret-token';

let server: http.Server | null = null;

function getPort(srv: http.Server): number {
  const addr = srv.address();
  return typeof addr === 'object' && addr ? addr.port : 0;
}

async function startTestServer(): Promise<number> {
  const result = await startServer({
    port: 0,
    host: '127.0.0.1',
    authToken: TOKEN,
    dataDir: undefined,
    logDir: undefined,
    authorization: 'root-owner',
  });
  server = result.server;
  return getPort(result.server);
}

function request(port: number, urlPath: string, method = 'GET', headers?: Record<string, string>) {
  return fetch(`http://127.0.0.1:${port}${urlPath}`, { method, headers });
}

function expectRejected(url: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const ws = new WebSocket(url);
    ws.on('open', () => {
      ws.close();
      reject(new Error('Connection should have been rejected'));
    });
    ws.on('error', () => resolve());
    ws.on('close', () => resolve());
  });
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  if (server) {
    const srv = server;
    await new Promise<void>((r) => srv.close(() => r()));
    server = null;
  }
});

describe('REST API authentication', () => {
  const rootPath = `/api/nodes/${KITTIES}/1/root`;

  it('returns 401 for requests without Authorization header', async () => {
    const port = await startTestServer();
    const res = await request(port, rootPath);
    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ detail: 'Unauthorized' });
  });

  it('returns 401 for requests with wrong token', async () => {
    const port = await startTestServer();
    const res = await request(port, rootPath, 'GET', { Authorization: 'Bearer wrong-token' });
    expect(res.status).toBe(401);
  });

  it('passes through requests with correct token', async () => {
    const port = await startTestServer();
    const res = await request(port, rootPath, 'GET', { Authorization: `Bearer ${TOKEN}` });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ root: { collection: KITTIES, token_id: '1' } });
  });

  it('passes through OPTIONS requests without auth', async () => {
    const port = await startTestServer();
    const res = await request(port, rootPath, 'OPTIONS');
    expect(res.status).not.toBe(401);
  });

  it('health endpoint works without auth', async () => {
    const port = await startTestServer();
    const res = await request(port, '/api/health');
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ready', custody_policy: 'escrow', edges: 0, quarantined: 0 });
  });
});

describe('composition actor', () => {
  const json = (body: unknown, token?: string) => ({
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      ...(token ? { Authorization: `Bearer ${token}` } : {}),
    },
    body: JSON.stringify(body),
  });
  const nodeJson = (id: number) => ({ collection: KITTIES, token_id: String(id) });

  it('admits any named actor with the token and leaves the decision to the policy', async () => {
    const port = await startTestServer();
    const base = `http://127.0.0.1:${port}`;
    for (const id of [1, 2]) {
      await fetch(`${base}/api/assets/nodes`, json({ node: nodeJson(id), owner: ALICE }, TOKEN));
    }
    const link = (actor: string, token?: string) =>
      fetch(`${base}/api/compose/non-fungible/link`, json({ actor, payload: nodeJson(1), target: nodeJson(2) }, token));

    expect((await link(ALICE)).status).toBe(401);

    const asBob = await link(BOB, TOKEN);
    expect(asBob.status).toBe(403);
    expect(await asBob.json()).toMatchObject({ kind: 'Unauthorized' });

    expect((await link(ALICE, TOKEN)).status).toBe(200);
  });
});

describe('WebSocket authentication', () => {
  it('rejects WebSocket upgrade without token', async () => {
    const port = await startTestServer();
    await expect(expectRejected(`ws://127.0.0.1:${port}/ws/events`)).resolves.toBeUndefined();
  });

  it('rejects WebSocket upgrade with wrong token', async () => {
    const port = await startTestServer();
    await expect(expectRejected(`ws://127.0.0.1:${port}/ws/events?token=wrong-token`)).resolves.toBeUndefined();
  });

  it('rejects upgrades on other paths', async () => {
    const port = await startTestServer();
    await expect(expectRejected(`ws://127.0.0.1:${port}/ws/other?token=${TOKEN}`)).resolves.toBeUndefined();
  });

  it('accepts WebSocket upgrade with correct token', async () => {
    const port = await startTestServer();

    const ws = await new Promise<WebSocket>((resolve, reject) => {
      const socket = new WebSocket(`ws://127.0.0.1:${port}/ws/events?token=${TOKEN}`);
      socket.on('open', () => resolve(socket));
      socket.on('error', reject);
    });

    expect(ws.readyState).toBe(WebSocket.OPEN);
    await new Promise<void>((resolve) => {
      ws.on('close', () => resolve());
      ws.close();
    });
  });
});
