import { describe, it, expect } from 'vitest';
import { RootOwnerPolicy, allowAllPolicy } from './authorizationPolicy.js';
import { LinkGraph } from './linkGraph.js';
import { NodeRegistry } from './nodeRegistry.js';
import { InMemoryAssetRegistry } from './inMemoryAssets.js';
import { ALICE, BOB, node } from '../tests/helpers.js';

function setup() {
  const graph = new LinkGraph();
  const assets = new InMemoryAssetRegistry();
  assets.mintNode(node(1), BOB);
  assets.mintNode(node(2), ALICE);
  graph.link(node(1), node(2));
  return { graph, policy: new RootOwnerPolicy(graph, new NodeRegistry(assets)) };
}

describe('allowAllPolicy', () => {
  it('permits everything', async () => {
    expect(await allowAllPolicy.authorize({ actor: BOB, family: 'non_fungible', action: 'unlink', subject: node(1) })).toBe(
      true,
    );
  });
});

describe('RootOwnerPolicy', () => {
  it('defers to the holder of the root, not of the node itself', async () => {
    const { policy } = setup();

    expect(await policy.authorize({ actor: ALICE, family: 'non_fungible', action: 'unlink', subject: node(1) })).toBe(true);
    expect(await policy.authorize({ actor: BOB, family: 'non_fungible', action: 'unlink', subject: node(1) })).toBe(false);
  });

  it('compares actors case-insensitively', async () => {
    const { policy } = setup();
    const shouted = ALICE.toUpperCase().replace('0X', '0x');
    expect(await policy.authorize({ actor: shouted, family: 'fungible', action: 'update_target', subject: node(1) })).toBe(
      true,
    );
  });

  it('permits requests without a subject', async () => {
    const { policy } = setup();
    expect(await policy.authorize({ actor: BOB, family: 'fungible', action: 'link', target: node(2) })).toBe(true);
  });

  it('denies when the root has no owner', async () => {
    const { policy } = setup();
    expect(await policy.authorize({ actor: ALICE, family: 'non_fungible', action: 'link', subject: node(9) })).toBe(false);
  });
});
