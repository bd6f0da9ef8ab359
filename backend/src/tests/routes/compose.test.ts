/** Tests for the composition routes. Uses a lightweight Express app with real HTTP. */

import { describe, it, expect, afterEach } from 'vitest';
import { ALICE, BOB, GOLD, KITTIES, createHarness, gem, node, type Harness } from '../helpers.js';
import { fetchJSON, startTestApp, type TestApp } from './testApp.js';

let app: TestApp | null = null;

async function start(harness: Harness): Promise<string> {
  app = await startTestApp(harness);
  return app.baseUrl;
}

afterEach(async () => {
  if (app) {
    await app.close();
    app = null;
  }
});

const nodeJson = (id: number) => ({ collection: KITTIES, token_id: String(id) });

describe('POST /api/compose/non-fungible/*', () => {
  it('links, retargets and unlinks a node', async () => {
    const harness = createHarness({ mint: [1, 2, 3] });
    const url = await start(harness);

    const linked = await fetchJSON(url, '/api/compose/non-fungible/link', {
      actor: ALICE,
      payload: nodeJson(1),
      target: nodeJson(2),
      annotation: '0x01',
    });
    expect(linked.status).toBe(200);
    expect(linked.body).toMatchObject({ event: { action: 'link', annotation: '0x01', target: nodeJson(2) } });

    const moved = await fetchJSON(url, '/api/compose/non-fungible/update-target', {
      actor: ALICE,
      payload: nodeJson(1),
      new_target: nodeJson(3),
    });
    expect(moved.body).toMatchObject({ event: { previous_target: nodeJson(2), target: nodeJson(3) } });

    const unlinked = await fetchJSON(url, '/api/compose/non-fungible/unlink', {
      actor: ALICE,
      payload: nodeJson(1),
      recipient: BOB,
    });
    expect(unlinked.body).toMatchObject({ event: { action: 'unlink', previous_target: nodeJson(3), recipient: BOB } });
    expect(await harness.assets.ownerOf(node(1))).toBe(BOB);
  });

  it('maps protocol errors onto status codes with their kind', async () => {
    const url = await start(createHarness({ mint: [1, 2] }));
    await fetchJSON(url, '/api/compose/non-fungible/link', { actor: ALICE, payload: nodeJson(1), target: nodeJson(2) });

    const cycle = await fetchJSON(url, '/api/compose/non-fungible/link', {
      actor: ALICE,
      payload: nodeJson(2),
      target: nodeJson(1),
    });
    expect(cycle.status).toBe(409);
    expect(cycle.body).toMatchObject({ kind: 'CycleDetected' });

    const missing = await fetchJSON(url, '/api/compose/non-fungible/link', {
      actor: ALICE,
      payload: nodeJson(7),
      target: nodeJson(1),
    });
    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ detail: `Node ${KITTIES}#7 does not exist`, kind: 'NotFound' });
  });

  it('answers 403 when the actor does not hold the root', async () => {
    const url = await start(createHarness({ mint: [1, 2], rootOwner: true }));

    const res = await fetchJSON(url, '/api/compose/non-fungible/link', {
      actor: BOB,
      payload: nodeJson(1),
      target: nodeJson(2),
    });

    expect(res.status).toBe(403);
    expect(res.body).toMatchObject({ kind: 'Unauthorized' });
  });

  it('rejects malformed bodies with the offending fields', async () => {
    const url = await start(createHarness());

    const res = await fetchJSON(url, '/api/compose/non-fungible/link', { actor: ALICE, payload: nodeJson(1) });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ detail: 'Invalid request', errors: ['target: Required'] });
  });
});

describe('POST /api/compose/fungible/*', () => {
  it('deposits and withdraws currency', async () => {
    const harness = createHarness({ mint: [1] });
    harness.assets.mintCurrency(GOLD, ALICE, 100n);
    const url = await start(harness);

    const linked = await fetchJSON(url, '/api/compose/fungible/link', {
      actor: ALICE,
      payload: { currency: GOLD, amount: '100' },
      target: nodeJson(1),
    });
    expect(linked.body).toMatchObject({ event: { resource: { kind: 'fungible', currency: GOLD, amount: '100' } } });

    const unlinked = await fetchJSON(url, '/api/compose/fungible/unlink', {
      actor: ALICE,
      payload: { currency: GOLD, from: nodeJson(1), amount: '25' },
      recipient: BOB,
    });
    expect(unlinked.status).toBe(200);
    expect(harness.service.balanceOfFungible(node(1), GOLD)).toBe(75n);
    expect(await harness.assets.currencyBalanceOf(GOLD, BOB)).toBe(25n);
  });

  it('passes a zero amount through to the protocol', async () => {
    const url = await start(createHarness({ mint: [1] }));

    const res = await fetchJSON(url, '/api/compose/fungible/link', {
      actor: ALICE,
      payload: { currency: GOLD, amount: '0' },
      target: nodeJson(1),
    });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ detail: 'Amount must be positive, got 0', kind: 'InvalidAmount' });
  });

  it('answers 502 when custody cannot be taken', async () => {
    const url = await start(createHarness({ mint: [1] }));

    const res = await fetchJSON(url, '/api/compose/fungible/link', {
      actor: ALICE,
      payload: { currency: GOLD, amount: '5' },
      target: nodeJson(1),
    });

    expect(res.status).toBe(502);
    expect(res.body).toMatchObject({ kind: 'CustodyTransferFailed' });
  });

  it('moves a balance between nodes', async () => {
    const harness = createHarness({ mint: [1, 2] });
    harness.assets.mintCurrency(GOLD, ALICE, 9n);
    const url = await start(harness);
    await fetchJSON(url, '/api/compose/fungible/link', {
      actor: ALICE,
      payload: { currency: GOLD, amount: 9 },
      target: nodeJson(1),
    });

    const res = await fetchJSON(url, '/api/compose/fungible/update-target', {
      actor: ALICE,
      payload: { currency: GOLD, from: nodeJson(1) },
      new_target: nodeJson(2),
    });

    expect(res.body).toMatchObject({ event: { previous_target: nodeJson(1), target: nodeJson(2) } });
    expect(harness.service.balanceOfFungible(node(2), GOLD)).toBe(9n);
  });
});

describe('POST /api/compose/counted/*', () => {
  it('links, moves and unlinks counted assets', async () => {
    const harness = createHarness({ mint: [1, 2] });
    harness.assets.mintCounted(gem(4), ALICE, 6n);
    const url = await start(harness);
    const asset = { collection: gem(4).collection, asset_id: '4' };

    await fetchJSON(url, '/api/compose/counted/link', { actor: ALICE, payload: { asset, amount: '6' }, target: nodeJson(1) });
    await fetchJSON(url, '/api/compose/counted/update-target', {
      actor: ALICE,
      payload: { asset, from: nodeJson(1) },
      new_target: nodeJson(2),
    });
    const res = await fetchJSON(url, '/api/compose/counted/unlink', {
      actor: ALICE,
      payload: { asset, from: nodeJson(2) },
      recipient: BOB,
    });

    expect(res.body).toMatchObject({ event: { resource: { kind: 'counted', asset, amount: '6', from: nodeJson(2) } } });
    expect(harness.service.balanceOfCountedAsset(node(2), gem(4))).toBe(0n);
    expect(await harness.assets.countedBalanceOf(gem(4), BOB)).toBe(6n);
  });
});
