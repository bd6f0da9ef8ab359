/** AttachmentLedger: per-node balances of fungible and counted-asset resources. Never touches custody. */

import type { NodeKey, NodeRef } from '../models/node.js';
import type {
  AttachmentRecord,
  CountedAssetRef,
  ResourceKey,
  ResourceKind,
  ResourceRef,
} from '../models/attachment.js';
import { CompositionError } from '../utils/errors.js';
import { canonicalNode, formatNode, nodeKey, parseNodeKey } from './nodeRegistry.js';

export function currencyKey(currency: string): ResourceKey {
  return `currency:${currency.trim().toLowerCase()}`;
}

export function countedKey(asset: CountedAssetRef): ResourceKey {
  return `counted:${asset.collection.trim().toLowerCase()}#${asset.assetId.toString()}`;
}

export function resourceKey(resource: ResourceRef): ResourceKey {
  return resource.kind === 'currency' ? currencyKey(resource.currency) : countedKey(resource.asset);
}

/** Inverse of `resourceKey`. */
export function parseResourceKey(key: ResourceKey): ResourceRef {
  if (key.startsWith('currency:')) {
    return { kind: 'currency', currency: key.slice('currency:'.length) };
  }
  if (key.startsWith('counted:')) {
    const { collection, tokenId } = parseNodeKey(key.slice('counted:'.length));
    return { kind: 'counted', asset: { collection, assetId: tokenId } };
  }
  throw new Error(`Invalid resource key: ${key}`);
}

function kindOfKey(key: ResourceKey): ResourceKind {
  return parseResourceKey(key).kind;
}

export class AttachmentLedger {
  // resource key -> node key -> amount (only non-zero entries are stored)
  private balances = new Map<ResourceKey, Map<NodeKey, bigint>>();
  private totals = new Map<ResourceKey, bigint>();

  deposit(kind: ResourceKind, key: ResourceKey, node: NodeRef, amount: bigint): void {
    this.assertKind(kind, key);
    if (amount <= 0n) {
      throw new CompositionError('InvalidAmount', `Deposit amount must be positive, got ${amount}`);
    }
    this.set(key, nodeKey(node), this.balanceOf(kind, key, node) + amount);
  }

  /** Partial withdraw. Fails when nothing is held or more is requested than is held. */
  withdraw(kind: ResourceKind, key: ResourceKey, node: NodeRef, amount: bigint): void {
    this.assertKind(kind, key);
    if (amount <= 0n) {
      throw new CompositionError('InvalidAmount', `Withdraw amount must be positive, got ${amount}`);
    }
    const balance = this.requireBalance(kind, key, node);
    if (amount > balance) {
      throw new CompositionError(
        'InvalidAmount',
        `Cannot withdraw ${amount} of ${key} from ${formatNode(node)}: balance is ${balance}`,
      );
    }
    this.set(key, nodeKey(node), balance - amount);
  }

  /** Zero the balance and return what it was. */
  withdrawAll(kind: ResourceKind, key: ResourceKey, node: NodeRef): bigint {
    this.assertKind(kind, key);
    const balance = this.requireBalance(kind, key, node);
    this.set(key, nodeKey(node), 0n);
    return balance;
  }

  /** Move the whole balance of `from` onto `to`. Returns the amount moved. */
  move(kind: ResourceKind, key: ResourceKey, from: NodeRef, to: NodeRef): bigint {
    const amount = this.withdrawAll(kind, key, from);
    this.deposit(kind, key, to, amount);
    return amount;
  }

  balanceOf(kind: ResourceKind, key: ResourceKey, node: NodeRef): bigint {
    if (kindOfKey(key) !== kind) return 0n;
    return this.balances.get(key)?.get(nodeKey(node)) ?? 0n;
  }

  /** Sum of all balances recorded for a resource. */
  totalOf(kind: ResourceKind, key: ResourceKey): bigint {
    if (kindOfKey(key) !== kind) return 0n;
    return this.totals.get(key) ?? 0n;
  }

  /** Every resource key that currently has a non-zero total. */
  resourceKeys(): ResourceKey[] {
    return [...this.totals.keys()];
  }

  /** All attachments held by a node. */
  holdingsOf(node: NodeRef): AttachmentRecord[] {
    const target = nodeKey(node);
    return this.entries().filter((entry) => nodeKey(entry.node) === target);
  }

  entries(): AttachmentRecord[] {
    const records: AttachmentRecord[] = [];
    for (const [key, perNode] of this.balances) {
      const kind = kindOfKey(key);
      for (const [nk, amount] of perNode) {
        records.push({ kind, key, node: parseNodeKey(nk), amount });
      }
    }
    return records;
  }

  /**
   * Reset a balance to an earlier value. Only for rolling back a journaled commit;
   * bypasses the amount checks of the public operations.
   */
  restore(kind: ResourceKind, key: ResourceKey, node: NodeRef, amount: bigint): void {
    this.assertKind(kind, key);
    if (amount < 0n) {
      throw new CompositionError('InvalidAmount', `Cannot restore a negative balance: ${amount}`);
    }
    this.set(key, nodeKey(node), amount);
  }

  static fromEntries(entries: AttachmentRecord[]): AttachmentLedger {
    const ledger = new AttachmentLedger();
    for (const entry of entries) {
      if (entry.amount > 0n) {
        ledger.deposit(entry.kind, entry.key, canonicalNode(entry.node), entry.amount);
      }
    }
    return ledger;
  }

  private requireBalance(kind: ResourceKind, key: ResourceKey, node: NodeRef): bigint {
    const balance = this.balanceOf(kind, key, node);
    if (balance === 0n) {
      throw new CompositionError('NotFound', `No ${key} attached to ${formatNode(node)}`);
    }
    return balance;
  }

  private set(key: ResourceKey, nk: NodeKey, amount: bigint): void {
    let perNode = this.balances.get(key);
    const previous = perNode?.get(nk) ?? 0n;
    if (amount === 0n) {
      perNode?.delete(nk);
      if (perNode && perNode.size === 0) this.balances.delete(key);
    } else {
      if (!perNode) {
        perNode = new Map();
        this.balances.set(key, perNode);
      }
      perNode.set(nk, amount);
    }

    const total = (this.totals.get(key) ?? 0n) - previous + amount;
    if (total === 0n) {
      this.totals.delete(key);
    } else {
      this.totals.set(key, total);
    }
  }

  private assertKind(kind: ResourceKind, key: ResourceKey): void {
    if (kindOfKey(key) !== kind) {
      throw new Error(`Resource key ${key} is not a ${kind} key`);
    }
  }
}
