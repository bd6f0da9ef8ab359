/** Public surface of the composability graph backend. */

export type { NodeRef, NodeKey, NodeJson, EdgeRecord } from './models/node.js';
export type {
  AttachmentRecord,
  ConservationReport,
  CountedAssetRef,
  ResourceKey,
  ResourceKind,
  ResourceRef,
} from './models/attachment.js';
export type {
  CompositionEvent,
  CompositionEventAction,
  CountedAssetJson,
  LinkEvent,
  ResourceDescriptor,
  ResourceFamily,
  SendEvent,
  UnlinkEvent,
  UpdateTargetEvent,
} from './models/events.js';
export type {
  AssetReceiver,
  CountedAssetCollaborator,
  FungibleCollaborator,
  NonFungibleCollaborator,
} from './models/collaborators.js';

export { CompositionService } from './services/compositionService.js';
export type {
  CompositionServiceDeps,
  CompositionServiceOptions,
  CustodyPolicy,
} from './services/compositionService.js';
export { LinkGraph } from './services/linkGraph.js';
export { AttachmentLedger, countedKey, currencyKey, parseResourceKey } from './services/attachmentLedger.js';
export { NodeRegistry, canonicalNode, formatNode, nodeKey, parseNodeKey } from './services/nodeRegistry.js';
export { InMemoryAssetRegistry } from './services/inMemoryAssets.js';
export type { TransferRecord } from './services/inMemoryAssets.js';
export { RootOwnerPolicy, allowAllPolicy } from './services/authorizationPolicy.js';
export type { AuthorizationPolicy, AuthorizationRequest, ComposeAction } from './services/authorizationPolicy.js';

export { CompositionError, COMPOSITION_ERROR_KINDS, isCompositionError } from './utils/errors.js';
export type { CompositionErrorKind } from './utils/errors.js';
export { loadConfig } from './utils/config.js';
export type { GraphConfig } from './utils/config.js';
export { OperationLogger } from './utils/operationLogger.js';
export { GraphPersistence } from './utils/graphPersistence.js';
export { findFreePort } from './utils/findFreePort.js';
export { stringify } from './utils/encoding.js';
export { startServer, createApp, createRuntime } from './server.js';
export type { GraphRuntime, RunningServer } from './server.js';
