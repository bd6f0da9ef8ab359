/** Behavioral tests for server startup, the notification stream and persisted state.
 *
 * Covers:
 * - startServer() returns a listening HTTP server + auth token
 * - a committed composition is pushed to WebSocket listeners as JSON
 * - rejected operations push nothing
 * - malformed JSON bodies answer 400
 * - a restarted server resumes the persisted forest
 * - custody held by the development registry survives a restart
 * - a state file with a malformed attachment key is ignored, not fatal
 * - a persisted cycle is quarantined on load
 */

import { describe, it, expect, afterEach, beforeEach, vi } from 'vitest';
import http from 'node:http';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { WebSocket } from 'ws';
import { startServer } from '../../server.js';
import type { GraphConfig } from '../../utils/config.js';
import { GRAPH_STATE_FILENAME } from '../../utils/constants.js';
import { ALICE, GOLD, KITTIES } from '../helpers.js';

const TOKEN = 'test-secret-token';

let server: http.Server | null = null;
let tmpDir: string | null = null;

function getPort(srv: http.Server): number {
  const addr = srv.address();
  return typeof addr === 'object' && addr ? addr.port : 0;
}

async function startTestServer(overrides: Partial<GraphConfig> = {}): Promise<number> {
  const result = await startServer({
    port: 0,
    host: '127.0.0.1',
    authToken: TOKEN,
    dataDir: undefined,
    logDir: undefined,
    authorization: 'allow-all',
    ...overrides,
  });
  server = result.server;
  return getPort(result.server);
}

async function stopTestServer(): Promise<void> {
  if (server) {
    const srv = server;
    await new Promise<void>((r) => srv.close(() => r()));
    server = null;
  }
}

async function api(port: number, urlPath: string, body?: unknown): Promise<{ status: number; body: unknown }> {
  const res = await fetch(`http://127.0.0.1:${port}${urlPath}`, {
    method: body === undefined ? 'GET' : 'POST',
    headers: { Authorization: `Bearer ${TOKEN}`, 'Content-Type': 'application/json' },
    ...(body === undefined ? {} : { body: JSON.stringify(body) }),
  });
  return { status: res.status, body: await res.json() };
}

const nodeJson = (id: number) => ({ collection: KITTIES, token_id: String(id) });

async function mint(port: number, ...ids: number[]): Promise<void> {
  for (const id of ids) {
    await api(port, '/api/assets/nodes', { node: nodeJson(id), owner: ALICE });
  }
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await stopTestServer();
  if (tmpDir) {
    fs.rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = null;
  }
});

describe('startServer', () => {
  it('returns a listening server and the configured token', async () => {
    const result = await startServer({ port: 0, host: '127.0.0.1', authToken: TOKEN, dataDir: undefined, logDir: undefined });
    server = result.server;

    expect(result.authToken).toBe(TOKEN);
    expect(result.server.listening).toBe(true);
    expect(result.runtime.service.custodyPolicy).toBe('escrow');
  });

  it('answers 400 for malformed JSON', async () => {
    const port = await startTestServer();
    const res = await fetch(`http://127.0.0.1:${port}/api/compose/non-fungible/link`, {
      method: 'POST',
      headers: { Authorization: `Bearer ${TOKEN}`, 'Content-Type': 'application/json' },
      body: '{"actor":',
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ detail: 'Malformed JSON body' });
  });
});

describe('notification stream', () => {
  it('pushes each committed operation to listeners', async () => {
    const port = await startTestServer();
    await mint(port, 1, 2);

    const ws = await new Promise<WebSocket>((resolve, reject) => {
      const socket = new WebSocket(`ws://127.0.0.1:${port}/ws/events?token=${TOKEN}`);
      socket.on('open', () => resolve(socket));
      socket.on('error', reject);
    });
    const received = new Promise<unknown>((resolve) => {
      ws.once('message', (data) => resolve(JSON.parse(String(data))));
    });

    const rejected = await api(port, '/api/compose/non-fungible/link', {
      actor: ALICE,
      payload: nodeJson(1),
      target: nodeJson(1),
    });
    expect(rejected.status).toBe(409);
    const linked = await api(port, '/api/compose/non-fungible/link', {
      actor: ALICE,
      payload: nodeJson(1),
      target: nodeJson(2),
    });
    expect(linked.status).toBe(200);

    expect(await received).toMatchObject({
      action: 'link',
      actor: ALICE,
      resource: { kind: 'non_fungible', node: nodeJson(1) },
      target: nodeJson(2),
    });

    await new Promise<void>((resolve) => {
      ws.on('close', () => resolve());
      ws.close();
    });
  });
});

describe('persistence', () => {
  it('resumes the persisted forest after a restart', async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cgraph-server-test-'));
    let port = await startTestServer({ dataDir: tmpDir });
    await mint(port, 1, 2);
    await api(port, '/api/compose/non-fungible/link', { actor: ALICE, payload: nodeJson(1), target: nodeJson(2) });
    await stopTestServer();

    port = await startTestServer({ dataDir: tmpDir });

    expect((await api(port, `/api/nodes/${KITTIES}/1/root`)).body).toEqual({ root: nodeJson(2) });
    expect((await api(port, `/api/nodes/${KITTIES}/2/children`)).body).toEqual({ children: [nodeJson(1)] });
  });

  it('quarantines nodes caught in a persisted cycle', async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cgraph-server-test-'));
    const edge = (source: number, target: number) => ({
      source: { collection: KITTIES, tokenId: String(source) },
      target: { collection: KITTIES, tokenId: String(target) },
    });
    fs.writeFileSync(
      path.join(tmpDir, GRAPH_STATE_FILENAME),
      JSON.stringify({
        version: 1,
        savedAt: '2026-01-01T00:00:00.000Z',
        edges: [edge(1, 2), edge(2, 1), edge(3, 2)],
        attachments: [],
        quarantined: [],
      }),
    );

    const port = await startTestServer({ dataDir: tmpDir });

    expect((await api(port, '/api/quarantine')).body).toEqual({
      quarantined: [`${KITTIES}#1`, `${KITTIES}#2`, `${KITTIES}#3`],
    });
    const res = await api(port, '/api/compose/non-fungible/unlink', { actor: ALICE, payload: nodeJson(3), recipient: ALICE });
    expect(res.status).toBe(500);
    expect(res.body).toMatchObject({ kind: 'GraphCorrupted' });
  });

  it('keeps the ledger and custody in balance across a restart', async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cgraph-server-test-'));
    let port = await startTestServer({ dataDir: tmpDir });
    await mint(port, 1);
    await api(port, '/api/assets/currencies', { currency: GOLD, holder: ALICE, amount: '100' });
    const linked = await api(port, '/api/compose/fungible/link', {
      actor: ALICE,
      payload: { currency: GOLD, amount: '100' },
      target: nodeJson(1),
    });
    expect(linked.status).toBe(200);
    await stopTestServer();

    port = await startTestServer({ dataDir: tmpDir });

    expect((await api(port, '/api/conservation')).body).toEqual({
      ok: true,
      resources: [{ key: `currency:${GOLD}`, recorded: '100', custody: '100', ok: true }],
    });
    expect((await api(port, `/api/nodes/${KITTIES}/1/owner`)).body).toEqual({ root: nodeJson(1), owner: ALICE });
    const unlinked = await api(port, '/api/compose/fungible/unlink', {
      actor: ALICE,
      payload: { currency: GOLD, from: nodeJson(1) },
      recipient: ALICE,
    });
    expect(unlinked.status).toBe(200);
  });

  it('starts empty when a persisted attachment key is malformed', async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cgraph-server-test-'));
    fs.writeFileSync(
      path.join(tmpDir, GRAPH_STATE_FILENAME),
      JSON.stringify({
        version: 1,
        savedAt: '2026-01-01T00:00:00.000Z',
        edges: [],
        attachments: [{ kind: 'currency', key: 'garbage', node: { collection: KITTIES, tokenId: '1' }, amount: '5' }],
        quarantined: [],
      }),
    );

    const port = await startTestServer({ dataDir: tmpDir });

    expect((await api(port, '/api/conservation')).body).toEqual({ ok: true, resources: [] });
  });
});
