/** Attachment data model: fungible and counted-asset quantities recorded against nodes. */

import type { NodeRef } from './node.js';

export type ResourceKind = 'currency' | 'counted';

/** A counted (semi-fungible) asset: one asset id within a multi-asset collection. */
export interface CountedAssetRef {
  collection: string;
  assetId: bigint;
}

export type ResourceRef =
  | { kind: 'currency'; currency: string }
  | { kind: 'counted'; asset: CountedAssetRef };

/** `currency:<address>` or `counted:<collection>#<assetId>`. */
export type ResourceKey = string;

export interface AttachmentRecord {
  kind: ResourceKind;
  key: ResourceKey;
  node: NodeRef;
  amount: bigint;
}

export interface ConservationReport {
  resource: ResourceRef;
  key: ResourceKey;
  /** Sum of all ledger balances for the resource. */
  recorded: bigint;
  /** What the collaborator reports as held by the custodian. */
  custody: bigint;
  ok: boolean;
}
