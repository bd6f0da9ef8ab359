/** Notification types emitted by the composition protocol, one per committed operation. */

import type { NodeJson } from './node.js';

export type ResourceFamily = 'non_fungible' | 'fungible' | 'counted';

export interface CountedAssetJson {
  collection: string;
  asset_id: string;
}

export type ResourceDescriptor =
  | { kind: 'non_fungible'; node: NodeJson }
  | { kind: 'fungible'; currency: string; amount: string; from?: NodeJson }
  | { kind: 'counted'; asset: CountedAssetJson; amount: string; from?: NodeJson };

export interface EventBase {
  id: string;
  actor: string;
  resource: ResourceDescriptor;
  /** Opaque caller-supplied bytes, 0x-prefixed hex. */
  annotation: string;
  timestamp: string;
}

export interface LinkEvent extends EventBase {
  action: 'link';
  target: NodeJson;
}

export interface UpdateTargetEvent extends EventBase {
  action: 'update_target';
  previous_target: NodeJson;
  target: NodeJson;
}

export interface UnlinkEvent extends EventBase {
  action: 'unlink';
  previous_target: NodeJson | null;
  recipient: string;
}

export type CompositionEvent = LinkEvent | UpdateTargetEvent | UnlinkEvent;

export type CompositionEventAction = CompositionEvent['action'];

export type SendEvent = (event: CompositionEvent) => void;
