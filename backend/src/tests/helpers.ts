/** Shared fixtures for composition tests: placeholder addresses and an in-process service harness. */

import type { NodeRef } from '../models/node.js';
import type { CountedAssetRef } from '../models/attachment.js';
import type { CompositionEvent } from '../models/events.js';
import { CompositionService, type CompositionServiceOptions } from '../services/compositionService.js';
import { LinkGraph } from '../services/linkGraph.js';
import { AttachmentLedger } from '../services/attachmentLedger.js';
import { InMemoryAssetRegistry } from '../services/inMemoryAssets.js';
import { RootOwnerPolicy, type AuthorizationPolicy } from '../services/authorizationPolicy.js';
import { NodeRegistry } from '../services/nodeRegistry.js';
import type { GraphPersistence } from '../utils/graphPersistence.js';
import { OperationLogger } from '../utils/operationLogger.js';
import { DEFAULT_CUSTODIAN_ADDRESS } from '../utils/constants.js';

export const ALICE = '0x' + 'a'.repeat(40);
export const BOB = '0x' + 'b'.repeat(40);
export const CAROL = '0x' + 'c'.repeat(40);
export const CUSTODIAN = DEFAULT_CUSTODIAN_ADDRESS;

export const KITTIES = '0x' + '1'.repeat(40);
export const ITEMS = '0x' + '2'.repeat(40);
export const GOLD = '0x' + '3'.repeat(40);
export const GEMS = '0x' + '4'.repeat(40);

export function node(tokenId: number | bigint, collection = KITTIES): NodeRef {
  return { collection, tokenId: BigInt(tokenId) };
}

export function gem(assetId: number | bigint): CountedAssetRef {
  return { collection: GEMS, assetId: BigInt(assetId) };
}

export interface Harness {
  service: CompositionService;
  assets: InMemoryAssetRegistry;
  graph: LinkGraph;
  ledger: AttachmentLedger;
  logger: OperationLogger;
  events: CompositionEvent[];
}

export interface HarnessOptions extends CompositionServiceOptions {
  graph?: LinkGraph;
  ledger?: AttachmentLedger;
  authorization?: AuthorizationPolicy;
  /** Use the root-owner policy over the harness's own graph and assets. */
  rootOwner?: boolean;
  persistence?: GraphPersistence;
  /** Include the harness registry's holdings in every checkpoint. */
  persistAssets?: boolean;
  /** Node token ids (in KITTIES) to mint to ALICE up front. */
  mint?: number[];
}

export function createHarness(options: HarnessOptions = {}): Harness {
  const {
    graph = new LinkGraph(),
    ledger = new AttachmentLedger(),
    rootOwner = false,
    authorization: explicitAuthorization,
    persistence,
    persistAssets = false,
    mint = [],
    ...rest
  } = options;
  const assets = new InMemoryAssetRegistry();
  const authorization = rootOwner ? new RootOwnerPolicy(graph, new NodeRegistry(assets)) : explicitAuthorization;
  const logger = new OperationLogger({ silent: true });
  const events: CompositionEvent[] = [];
  const service = new CompositionService(
    {
      graph,
      ledger,
      nonFungible: assets,
      fungible: assets,
      counted: assets,
      send: (event) => events.push(event),
      logger,
      persistence,
      authorization,
      assetState: persistAssets ? () => assets.snapshot() : undefined,
    },
    rest,
  );
  assets.registerReceiver(service);
  for (const id of mint) {
    assets.mintNode(node(id), ALICE);
  }
  return { service, assets, graph, ledger, logger, events };
}
