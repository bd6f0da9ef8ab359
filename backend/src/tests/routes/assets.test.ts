/** Tests for the development asset routes. Uses a lightweight Express app with real HTTP. */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { ALICE, BOB, GOLD, KITTIES, createHarness, gem, node, type Harness } from '../helpers.js';
import { fetchJSON, startTestApp, type TestApp } from './testApp.js';

let app: TestApp | null = null;

async function start(harness: Harness, onChange?: () => void): Promise<string> {
  app = await startTestApp(harness, onChange);
  return app.baseUrl;
}

afterEach(async () => {
  if (app) {
    await app.close();
    app = null;
  }
});

describe('POST /api/assets/*', () => {
  it('mints a node once', async () => {
    const harness = createHarness();
    const url = await start(harness);
    const body = { node: { collection: KITTIES, token_id: '1' }, owner: ALICE };

    const created = await fetchJSON(url, '/api/assets/nodes', body);
    expect(created.status).toBe(201);
    expect(created.body).toEqual(body);
    expect(await harness.assets.ownerOf(node(1))).toBe(ALICE);

    const duplicate = await fetchJSON(url, '/api/assets/nodes', body);
    expect(duplicate.status).toBe(409);
    expect(duplicate.body).toEqual({ detail: `Node already minted: ${KITTIES}#1` });
  });

  it('reports each successful mint to the change hook', async () => {
    const onChange = vi.fn();
    const url = await start(createHarness(), onChange);
    const body = { node: { collection: KITTIES, token_id: '1' }, owner: ALICE };

    await fetchJSON(url, '/api/assets/nodes', body);
    await fetchJSON(url, '/api/assets/nodes', body);
    await fetchJSON(url, '/api/assets/currencies', { currency: GOLD, holder: BOB, amount: '50' });
    await fetchJSON(url, '/api/assets/currencies', { currency: GOLD, holder: BOB, amount: '-1' });

    expect(onChange).toHaveBeenCalledTimes(2);
  });

  it('mints currency and counted assets', async () => {
    const harness = createHarness();
    const url = await start(harness);

    const currency = await fetchJSON(url, '/api/assets/currencies', { currency: GOLD, holder: BOB, amount: '50' });
    expect(currency.body).toEqual({ currency: GOLD, holder: BOB, amount: '50' });

    const counted = await fetchJSON(url, '/api/assets/counted', {
      asset: { collection: gem(1).collection, asset_id: '1' },
      holder: BOB,
      amount: 2,
    });
    expect(counted.status).toBe(201);
    expect(await harness.assets.countedBalanceOf(gem(1), BOB)).toBe(2n);
    expect(await harness.assets.currencyBalanceOf(GOLD, BOB)).toBe(50n);
  });

  it('rejects a zero mint', async () => {
    const url = await start(createHarness());
    const res = await fetchJSON(url, '/api/assets/currencies', { currency: GOLD, holder: BOB, amount: '0' });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ detail: 'Invalid request', errors: ['amount: must be positive'] });
  });
});

describe('GET /api/assets/transfers', () => {
  it('lists custody transfers with string amounts', async () => {
    const harness = createHarness({ mint: [1] });
    harness.assets.mintCurrency(GOLD, ALICE, 8n);
    await harness.service.linkFungible(ALICE, { currency: GOLD, amount: 8n }, node(1));
    const url = await start(harness);

    expect((await fetchJSON(url, '/api/assets/transfers')).body).toEqual({
      transfers: [{ kind: 'currency', resource: `currency:${GOLD}`, from: ALICE, to: harness.service.address, amount: '8' }],
    });
  });
});
