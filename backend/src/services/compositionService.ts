/**
 * CompositionService: the composition protocol.
 *
 * Owns the link graph and the attachment ledger and is the only writer of either.
 * Every mutating call runs through one exclusive queue and follows the same
 * sequence: quarantine check, precondition validation, authorization, custody
 * transfer through the asset collaborator, journaled in-memory commit, persistence
 * checkpoint, and exactly one notification. A failure before the commit leaves all
 * state untouched; a failure inside the commit is rolled back from the journal.
 */

import crypto from 'node:crypto';
import type { NodeKey, NodeRef } from '../models/node.js';
import type {
  ConservationReport,
  CountedAssetRef,
  ResourceKind,
  ResourceRef,
  AttachmentRecord,
} from '../models/attachment.js';
import type {
  AssetReceiver,
  CountedAssetCollaborator,
  FungibleCollaborator,
  NonFungibleCollaborator,
} from '../models/collaborators.js';
import type {
  CompositionEvent,
  EventBase,
  LinkEvent,
  ResourceDescriptor,
  ResourceFamily,
  SendEvent,
  UnlinkEvent,
  UpdateTargetEvent,
} from '../models/events.js';
import { CompositionError, errorMessage, isCompositionError } from '../utils/errors.js';
import {
  COUNTED_ASSET_RECEIVED,
  DEFAULT_CUSTODIAN_ADDRESS,
  NON_FUNGIBLE_RECEIVED,
  TRANSFER_REJECTED,
} from '../utils/constants.js';
import { assetToJson, nodeToJson, toHex } from '../utils/encoding.js';
import { ExclusiveQueue } from '../utils/exclusiveQueue.js';
import { Journal } from '../utils/journal.js';
import { OperationLogger } from '../utils/operationLogger.js';
import type { AssetSnapshot, GraphPersistence, GraphSnapshot } from '../utils/graphPersistence.js';
import { countedKey, currencyKey, parseResourceKey, resourceKey } from './attachmentLedger.js';
import type { AttachmentLedger } from './attachmentLedger.js';
import type { LinkGraph } from './linkGraph.js';
import { NodeRegistry, canonicalNode, formatNode, nodeKey, sameNode } from './nodeRegistry.js';
import { allowAllPolicy } from './authorizationPolicy.js';
import type { AuthorizationPolicy, ComposeAction } from './authorizationPolicy.js';

export type CustodyPolicy = 'escrow' | 'none';

export interface CompositionServiceDeps {
  graph: LinkGraph;
  ledger: AttachmentLedger;
  nonFungible: NonFungibleCollaborator;
  fungible: FungibleCollaborator;
  counted: CountedAssetCollaborator;
  send?: SendEvent;
  logger?: OperationLogger;
  persistence?: GraphPersistence;
  authorization?: AuthorizationPolicy;
  /** Holdings of an in-process asset registry, saved beside the graph on every checkpoint. */
  assetState?: () => AssetSnapshot;
}

export interface CompositionServiceOptions {
  /** Address under which the service holds custody. */
  custodian?: string;
  /** Whether non-fungible links move the payload node into the custodian's custody. */
  custodyPolicy?: CustodyPolicy;
  /** Acknowledge incoming transfers the service did not initiate. */
  acceptUnsolicited?: boolean;
  /** Node keys that start out quarantined, e.g. restored from disk. */
  quarantined?: NodeKey[];
}

export interface FungibleLinkPayload {
  currency: string;
  amount: bigint;
}

export interface FungibleMovePayload {
  currency: string;
  from: NodeRef;
}

export interface FungibleUnlinkPayload extends FungibleMovePayload {
  /** Withdraw only part of the balance. Defaults to the whole balance. */
  amount?: bigint;
}

export interface CountedLinkPayload {
  asset: CountedAssetRef;
  amount: bigint;
}

export interface CountedMovePayload {
  asset: CountedAssetRef;
  from: NodeRef;
}

export interface CountedUnlinkPayload extends CountedMovePayload {
  amount?: bigint;
}

const EMPTY_ANNOTATION = new Uint8Array();

export class CompositionService implements AssetReceiver {
  readonly address: string;
  readonly custodyPolicy: CustodyPolicy;
  readonly registry: NodeRegistry;

  private graph: LinkGraph;
  private ledger: AttachmentLedger;
  private nonFungible: NonFungibleCollaborator;
  private fungible: FungibleCollaborator;
  private counted: CountedAssetCollaborator;
  private send: SendEvent;
  private logger: OperationLogger;
  private persistence: GraphPersistence | null;
  private assetState: (() => AssetSnapshot) | null;
  private authorization: AuthorizationPolicy;
  private acceptUnsolicited: boolean;
  private queue = new ExclusiveQueue();
  private quarantined: Set<NodeKey>;
  private expectedInbound = new Set<string>();

  constructor(deps: CompositionServiceDeps, options: CompositionServiceOptions = {}) {
    this.graph = deps.graph;
    this.ledger = deps.ledger;
    this.nonFungible = deps.nonFungible;
    this.fungible = deps.fungible;
    this.counted = deps.counted;
    this.registry = new NodeRegistry(deps.nonFungible);
    this.send = deps.send ?? (() => {});
    this.logger = deps.logger ?? new OperationLogger({ silent: true });
    this.persistence = deps.persistence ?? null;
    this.assetState = deps.assetState ?? null;
    this.authorization = deps.authorization ?? allowAllPolicy;
    this.address = (options.custodian ?? DEFAULT_CUSTODIAN_ADDRESS).trim().toLowerCase();
    this.custodyPolicy = options.custodyPolicy ?? 'escrow';
    this.acceptUnsolicited = options.acceptUnsolicited ?? true;
    this.quarantined = new Set(options.quarantined ?? []);
  }

  // ── Queries ──────────────────────────────────────────────────────────

  findRootToken(node: NodeRef): NodeRef {
    return this.guardCorruption(node, () => this.graph.findRoot(node));
  }

  getTarget(node: NodeRef): NodeRef | null {
    return this.graph.getTarget(node);
  }

  getChildren(node: NodeRef): NodeRef[] {
    return this.graph.childrenOf(node);
  }

  balanceOfFungible(node: NodeRef, currency: string): bigint {
    return this.ledger.balanceOf('currency', currencyKey(currency), node);
  }

  balanceOfCountedAsset(node: NodeRef, asset: CountedAssetRef): bigint {
    return this.ledger.balanceOf('counted', countedKey(asset), node);
  }

  holdingsOf(node: NodeRef): AttachmentRecord[] {
    return this.ledger.holdingsOf(node);
  }

  /** Holder of the root of the node's tree, i.e. whoever ultimately controls the node. */
  async rootOwnerOf(node: NodeRef): Promise<string | null> {
    return this.registry.ownerOf(this.findRootToken(node));
  }

  /** Compare every recorded resource total with what the custodian actually holds. */
  verifyConservation(): Promise<ConservationReport[]> {
    return this.queue.run(async () => {
      const reports: ConservationReport[] = [];
      for (const key of this.ledger.resourceKeys().sort()) {
        const resource = parseResourceKey(key);
        const kind: ResourceKind = resource.kind;
        const recorded = this.ledger.totalOf(kind, key);
        const custody = await this.custodyBalance(resource);
        const ok = recorded <= custody;
        if (!ok) {
          this.logger.error('Conservation violated', { key, recorded, custody });
        }
        reports.push({ resource, key, recorded, custody, ok });
      }
      return reports;
    });
  }

  snapshot(): GraphSnapshot {
    const snapshot: GraphSnapshot = {
      edges: this.graph.edges(),
      attachments: this.ledger.entries(),
      quarantined: this.quarantinedNodes(),
    };
    if (this.assetState) snapshot.assets = this.assetState();
    return snapshot;
  }

  /** Save the current snapshot. Failures are logged, never thrown. */
  checkpoint(): void {
    if (!this.persistence) return;
    try {
      this.persistence.save(this.snapshot());
    } catch (err) {
      this.logger.warn('Graph checkpoint failed', { error: errorMessage(err) });
    }
  }

  // ── Quarantine ───────────────────────────────────────────────────────

  isQuarantined(node: NodeRef): boolean {
    return this.quarantined.has(nodeKey(node));
  }

  quarantinedNodes(): NodeKey[] {
    return [...this.quarantined].sort();
  }

  /** Lift the mutation halt on a node after the corruption has been investigated. */
  releaseQuarantine(node: NodeRef): boolean {
    const released = this.quarantined.delete(nodeKey(node));
    if (released) {
      this.logger.warn('Quarantine released', { node: formatNode(node) });
      this.checkpoint();
    }
    return released;
  }

  // ── Non-fungible family ──────────────────────────────────────────────

  linkNode(actor: string, payload: NodeRef, target: NodeRef, annotation = EMPTY_ANNOTATION): Promise<LinkEvent> {
    const source = canonicalNode(payload);
    const to = canonicalNode(target);
    return this.execute<LinkEvent>('non_fungible.link', { source: formatNode(source), target: formatNode(to) }, async (journal) => {
      this.assertNotQuarantined(source, to);
      await this.requireExists(source);
      await this.requireExists(to);
      this.guardCorruption(to, () => this.graph.validateLink(source, to));
      await this.authorize(actor, 'non_fungible', 'link', source, to);

      if (this.custodyPolicy === 'escrow') {
        const owner = await this.registry.ownerOf(source);
        if (owner && owner !== this.address) {
          await this.custody(nodeKey(source), () =>
            this.nonFungible.transferNode(source, owner, this.address, annotation),
          );
        }
      }

      this.commit(journal, () => {
        journal.apply(() => this.graph.link(source, to), () => { this.graph.unlink(source); });
      });

      return {
        ...this.eventBase(actor, { kind: 'non_fungible', node: nodeToJson(source) }, annotation),
        action: 'link',
        target: nodeToJson(to),
      };
    });
  }

  updateNodeTarget(
    actor: string,
    payload: NodeRef,
    newTarget: NodeRef,
    annotation = EMPTY_ANNOTATION,
  ): Promise<UpdateTargetEvent> {
    const source = canonicalNode(payload);
    const to = canonicalNode(newTarget);
    return this.execute<UpdateTargetEvent>('non_fungible.update_target', { source: formatNode(source), target: formatNode(to) }, async (journal) => {
      this.assertNotQuarantined(source, to);
      if (!this.graph.isLinked(source)) {
        throw new CompositionError('NotLinked', `${formatNode(source)} has no target; use link instead`);
      }
      await this.requireExists(to);
      this.guardCorruption(to, () => this.graph.validateUpdateTarget(source, to));
      await this.authorize(actor, 'non_fungible', 'update_target', source, to);

      const previous = this.commit(journal, () =>
        journal.apply(
          () => this.graph.updateTarget(source, to),
          (prev) => { this.graph.updateTarget(source, prev); },
        ),
      );

      return {
        ...this.eventBase(actor, { kind: 'non_fungible', node: nodeToJson(source) }, annotation),
        action: 'update_target',
        previous_target: nodeToJson(previous),
        target: nodeToJson(to),
      };
    });
  }

  unlinkNode(actor: string, recipient: string, payload: NodeRef, annotation = EMPTY_ANNOTATION): Promise<UnlinkEvent> {
    const source = canonicalNode(payload);
    const to = recipient.trim().toLowerCase();
    return this.execute<UnlinkEvent>('non_fungible.unlink', { source: formatNode(source), recipient: to }, async (journal) => {
      this.assertNotQuarantined(source);
      const previous = this.graph.getTarget(source);
      if (!previous) {
        throw new CompositionError('NotLinked', `${formatNode(source)} has no target`);
      }
      await this.authorize(actor, 'non_fungible', 'unlink', source);

      if (this.custodyPolicy === 'escrow' && to !== this.address) {
        const owner = await this.registry.ownerOf(source);
        if (owner === this.address) {
          await this.custody(null, () => this.nonFungible.transferNode(source, this.address, to, annotation));
        }
      }

      this.commit(journal, () => {
        journal.apply(() => this.graph.unlink(source), (prev) => { this.graph.link(source, prev); });
      });

      return {
        ...this.eventBase(actor, { kind: 'non_fungible', node: nodeToJson(source) }, annotation),
        action: 'unlink',
        previous_target: nodeToJson(previous),
        recipient: to,
      };
    });
  }

  // ── Fungible family ──────────────────────────────────────────────────

  linkFungible(
    actor: string,
    payload: FungibleLinkPayload,
    target: NodeRef,
    annotation = EMPTY_ANNOTATION,
  ): Promise<LinkEvent> {
    const resource: ResourceRef = { kind: 'currency', currency: payload.currency.trim().toLowerCase() };
    return this.linkAttachment(actor, resource, payload.amount, target, annotation);
  }

  updateFungibleTarget(
    actor: string,
    payload: FungibleMovePayload,
    newTarget: NodeRef,
    annotation = EMPTY_ANNOTATION,
  ): Promise<UpdateTargetEvent> {
    const resource: ResourceRef = { kind: 'currency', currency: payload.currency.trim().toLowerCase() };
    return this.moveAttachment(actor, resource, payload.from, newTarget, annotation);
  }

  unlinkFungible(
    actor: string,
    recipient: string,
    payload: FungibleUnlinkPayload,
    annotation = EMPTY_ANNOTATION,
  ): Promise<UnlinkEvent> {
    const resource: ResourceRef = { kind: 'currency', currency: payload.currency.trim().toLowerCase() };
    return this.unlinkAttachment(actor, recipient, resource, payload.from, payload.amount, annotation);
  }

  // ── Counted-asset family ─────────────────────────────────────────────

  linkCounted(
    actor: string,
    payload: CountedLinkPayload,
    target: NodeRef,
    annotation = EMPTY_ANNOTATION,
  ): Promise<LinkEvent> {
    return this.linkAttachment(actor, countedResource(payload.asset), payload.amount, target, annotation);
  }

  updateCountedTarget(
    actor: string,
    payload: CountedMovePayload,
    newTarget: NodeRef,
    annotation = EMPTY_ANNOTATION,
  ): Promise<UpdateTargetEvent> {
    return this.moveAttachment(actor, countedResource(payload.asset), payload.from, newTarget, annotation);
  }

  unlinkCounted(
    actor: string,
    recipient: string,
    payload: CountedUnlinkPayload,
    annotation = EMPTY_ANNOTATION,
  ): Promise<UnlinkEvent> {
    return this.unlinkAttachment(actor, recipient, countedResource(payload.asset), payload.from, payload.amount, annotation);
  }

  // ── Receiver callbacks ───────────────────────────────────────────────

  onNonFungibleReceived(operator: string, from: string, node: NodeRef, _data: Uint8Array): string {
    return this.acknowledge(nodeKey(node), { operator, from, node: formatNode(node) }, NON_FUNGIBLE_RECEIVED);
  }

  onCountedAssetReceived(
    operator: string,
    from: string,
    asset: CountedAssetRef,
    amount: bigint,
    _data: Uint8Array,
  ): string {
    return this.acknowledge(countedKey(asset), { operator, from, asset: countedKey(asset), amount }, COUNTED_ASSET_RECEIVED);
  }

  // ── Attachment operations shared by both leaf families ───────────────

  private linkAttachment(
    actor: string,
    resource: ResourceRef,
    amount: bigint,
    target: NodeRef,
    annotation: Uint8Array,
  ): Promise<LinkEvent> {
    const to = canonicalNode(target);
    const key = resourceKey(resource);
    const family = familyOf(resource);
    return this.execute<LinkEvent>(`${family}.link`, { resource: key, amount, target: formatNode(to) }, async (journal) => {
      if (amount <= 0n) {
        throw new CompositionError('InvalidAmount', `Amount must be positive, got ${amount}`);
      }
      this.assertNotQuarantined(to);
      await this.requireExists(to);
      await this.authorize(actor, family, 'link', undefined, to);

      await this.custody(resource.kind === 'counted' ? key : null, () =>
        this.transferLeaf(resource, actor.trim().toLowerCase(), this.address, amount, annotation),
      );

      const before = this.ledger.balanceOf(resource.kind, key, to);
      this.commit(journal, () => {
        journal.apply(
          () => this.ledger.deposit(resource.kind, key, to, amount),
          () => this.ledger.restore(resource.kind, key, to, before),
        );
      });

      return {
        ...this.eventBase(actor, leafDescriptor(resource, amount), annotation),
        action: 'link',
        target: nodeToJson(to),
      };
    });
  }

  private moveAttachment(
    actor: string,
    resource: ResourceRef,
    fromNode: NodeRef,
    newTarget: NodeRef,
    annotation: Uint8Array,
  ): Promise<UpdateTargetEvent> {
    const from = canonicalNode(fromNode);
    const to = canonicalNode(newTarget);
    const key = resourceKey(resource);
    const family = familyOf(resource);
    return this.execute<UpdateTargetEvent>(`${family}.update_target`, { resource: key, from: formatNode(from), target: formatNode(to) }, async (journal) => {
      this.assertNotQuarantined(from, to);
      if (sameNode(from, to)) {
        throw new CompositionError('SelfLink', `${key} is already attached to ${formatNode(to)}`);
      }
      const balance = this.ledger.balanceOf(resource.kind, key, from);
      if (balance === 0n) {
        throw new CompositionError('NotFound', `No ${key} attached to ${formatNode(from)}`);
      }
      await this.requireExists(to);
      await this.authorize(actor, family, 'update_target', from, to);

      const toBefore = this.ledger.balanceOf(resource.kind, key, to);
      const moved = this.commit(journal, () =>
        journal.apply(
          () => this.ledger.move(resource.kind, key, from, to),
          (amount) => {
            this.ledger.restore(resource.kind, key, to, toBefore);
            this.ledger.restore(resource.kind, key, from, amount);
          },
        ),
      );

      return {
        ...this.eventBase(actor, leafDescriptor(resource, moved, from), annotation),
        action: 'update_target',
        previous_target: nodeToJson(from),
        target: nodeToJson(to),
      };
    });
  }

  private unlinkAttachment(
    actor: string,
    recipient: string,
    resource: ResourceRef,
    fromNode: NodeRef,
    requested: bigint | undefined,
    annotation: Uint8Array,
  ): Promise<UnlinkEvent> {
    const from = canonicalNode(fromNode);
    const to = recipient.trim().toLowerCase();
    const key = resourceKey(resource);
    const family = familyOf(resource);
    return this.execute<UnlinkEvent>(`${family}.unlink`, { resource: key, from: formatNode(from), recipient: to }, async (journal) => {
      this.assertNotQuarantined(from);
      const balance = this.ledger.balanceOf(resource.kind, key, from);
      if (balance === 0n) {
        throw new CompositionError('NotFound', `No ${key} attached to ${formatNode(from)}`);
      }
      const amount = requested ?? balance;
      if (amount <= 0n || amount > balance) {
        throw new CompositionError(
          'InvalidAmount',
          `Cannot unlink ${amount} of ${key} from ${formatNode(from)}: balance is ${balance}`,
        );
      }
      await this.authorize(actor, family, 'unlink', from);

      if (to !== this.address) {
        await this.custody(null, () => this.transferLeaf(resource, this.address, to, amount, annotation));
      }

      this.commit(journal, () => {
        journal.apply(
          () => this.ledger.withdraw(resource.kind, key, from, amount),
          () => this.ledger.restore(resource.kind, key, from, balance),
        );
      });

      return {
        ...this.eventBase(actor, leafDescriptor(resource, amount, from), annotation),
        action: 'unlink',
        previous_target: nodeToJson(from),
        recipient: to,
      };
    });
  }

  // ── Protocol plumbing ────────────────────────────────────────────────

  private execute<E extends CompositionEvent>(
    operation: string,
    context: Record<string, unknown>,
    run: (journal: Journal) => Promise<E>,
  ): Promise<E> {
    return this.queue.run(async () => {
      const done = this.logger.operationStart(operation, context);
      let event: E;
      try {
        event = await run(new Journal());
      } catch (err) {
        if (isCompositionError(err)) {
          this.logger.operationRejected(operation, err.kind, err.message);
        } else {
          this.logger.error(`Operation failed: ${operation}`, { error: errorMessage(err) });
        }
        throw err;
      }
      done();
      this.checkpoint();
      this.send(event);
      return event;
    });
  }

  /** Apply the in-memory mutations; roll every applied step back if one throws. */
  private commit<T>(journal: Journal, steps: () => T): T {
    try {
      return steps();
    } catch (err) {
      const failures = journal.rollback();
      this.logger.error('Commit rolled back', {
        error: errorMessage(err),
        rollbackFailures: failures.map((f) => f.message),
      });
      throw err;
    }
  }

  private async custody(inboundKey: string | null, transfer: () => Promise<void>): Promise<void> {
    if (inboundKey) this.expectedInbound.add(inboundKey);
    try {
      await transfer();
    } catch (err) {
      this.logger.error('Custody transfer failed', { error: errorMessage(err) });
      throw new CompositionError('CustodyTransferFailed', `Custody transfer failed: ${errorMessage(err)}`, {
        cause: err,
      });
    } finally {
      if (inboundKey) this.expectedInbound.delete(inboundKey);
    }
  }

  private transferLeaf(
    resource: ResourceRef,
    from: string,
    to: string,
    amount: bigint,
    annotation: Uint8Array,
  ): Promise<void> {
    return resource.kind === 'currency'
      ? this.fungible.transferCurrency(resource.currency, from, to, amount)
      : this.counted.transferCounted(resource.asset, from, to, amount, annotation);
  }

  private custodyBalance(resource: ResourceRef): Promise<bigint> {
    return resource.kind === 'currency'
      ? this.fungible.currencyBalanceOf(resource.currency, this.address)
      : this.counted.countedBalanceOf(resource.asset, this.address);
  }

  private async authorize(
    actor: string,
    family: ResourceFamily,
    action: ComposeAction,
    subject?: NodeRef,
    target?: NodeRef,
  ): Promise<void> {
    const request = { actor, family, action, subject, target };
    const allowed = subject
      ? await this.guardCorruptionAsync(subject, () => this.authorization.authorize(request))
      : await this.authorization.authorize(request);
    if (!allowed) {
      throw new CompositionError('Unauthorized', `${actor} may not ${action} ${family} resources here`);
    }
  }

  private async requireExists(node: NodeRef): Promise<void> {
    if (!(await this.registry.exists(node))) {
      throw new CompositionError('NotFound', `Node ${formatNode(node)} does not exist`);
    }
  }

  private assertNotQuarantined(...nodes: NodeRef[]): void {
    for (const node of nodes) {
      if (this.quarantined.has(nodeKey(node))) {
        throw new CompositionError(
          'GraphCorrupted',
          `Node ${formatNode(node)} is quarantined after a corrupted root walk; release it once investigated`,
        );
      }
    }
  }

  private guardCorruption<T>(node: NodeRef, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      this.noteCorruption(node, err);
      throw err;
    }
  }

  private async guardCorruptionAsync<T>(node: NodeRef, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      this.noteCorruption(node, err);
      throw err;
    }
  }

  private noteCorruption(node: NodeRef, err: unknown): void {
    if (!isCompositionError(err, 'GraphCorrupted')) return;
    const key = nodeKey(node);
    if (this.quarantined.has(key)) return;
    this.quarantined.add(key);
    this.logger.error('Node quarantined', { node: key, reason: err.message });
    this.checkpoint();
  }

  private acknowledge(key: string, data: Record<string, unknown>, magic: string): string {
    if (this.expectedInbound.has(key)) return magic;
    if (this.acceptUnsolicited) {
      this.logger.info('Unsolicited transfer accepted', data);
      return magic;
    }
    this.logger.warn('Unsolicited transfer rejected', data);
    return TRANSFER_REJECTED;
  }

  private eventBase(actor: string, resource: ResourceDescriptor, annotation: Uint8Array): EventBase {
    return {
      id: crypto.randomUUID(),
      actor: actor.trim().toLowerCase(),
      resource,
      annotation: toHex(annotation),
      timestamp: new Date().toISOString(),
    };
  }
}

function countedResource(asset: CountedAssetRef): ResourceRef {
  return { kind: 'counted', asset: { collection: asset.collection.trim().toLowerCase(), assetId: asset.assetId } };
}

function familyOf(resource: ResourceRef): ResourceFamily {
  return resource.kind === 'currency' ? 'fungible' : 'counted';
}

function leafDescriptor(resource: ResourceRef, amount: bigint, from?: NodeRef): ResourceDescriptor {
  const fromJson = from ? { from: nodeToJson(from) } : {};
  return resource.kind === 'currency'
    ? { kind: 'fungible', currency: resource.currency, amount: amount.toString(), ...fromJson }
    : { kind: 'counted', asset: assetToJson(resource.asset), amount: amount.toString(), ...fromJson };
}
