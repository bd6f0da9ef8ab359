/**
 * InMemoryAssetRegistry: a self-contained asset collaborator for the development
 * server and tests. Holds non-fungible owners, currency balances and counted-asset
 * balances in Maps, and enforces the receiver acknowledgement on transfers into
 * registered receivers.
 */

import type {
  AssetReceiver,
  CountedAssetCollaborator,
  FungibleCollaborator,
  NonFungibleCollaborator,
} from '../models/collaborators.js';
import type { NodeKey, NodeRef } from '../models/node.js';
import type { CountedAssetRef, ResourceKey } from '../models/attachment.js';
import { COUNTED_ASSET_RECEIVED, NON_FUNGIBLE_RECEIVED } from '../utils/constants.js';
import type { AssetSnapshot } from '../utils/graphPersistence.js';
import { canonicalNode, formatNode, nodeKey, parseNodeKey } from './nodeRegistry.js';
import { countedKey, currencyKey } from './attachmentLedger.js';

export interface TransferRecord {
  kind: 'node' | 'currency' | 'counted';
  resource: string;
  from: string;
  to: string;
  amount: bigint;
}

function normalize(address: string): string {
  return address.trim().toLowerCase();
}

export class InMemoryAssetRegistry
  implements NonFungibleCollaborator, FungibleCollaborator, CountedAssetCollaborator
{
  private owners = new Map<NodeKey, string>();
  private balances = new Map<ResourceKey, Map<string, bigint>>();
  private receivers = new Map<string, AssetReceiver>();
  private log: TransferRecord[] = [];

  // -- Setup --

  /** Register a contract-like holder whose acknowledgement is required for incoming transfers. */
  registerReceiver(receiver: AssetReceiver): void {
    this.receivers.set(normalize(receiver.address), receiver);
  }

  mintNode(node: NodeRef, owner: string): void {
    const key = nodeKey(node);
    if (this.owners.has(key)) {
      throw new Error(`Node already minted: ${formatNode(node)}`);
    }
    this.owners.set(key, normalize(owner));
  }

  burnNode(node: NodeRef): void {
    if (!this.owners.delete(nodeKey(node))) {
      throw new Error(`Node not minted: ${formatNode(node)}`);
    }
  }

  mintCurrency(currency: string, holder: string, amount: bigint): void {
    this.credit(currencyKey(currency), normalize(holder), amount);
  }

  mintCounted(asset: CountedAssetRef, holder: string, amount: bigint): void {
    this.credit(countedKey(asset), normalize(holder), amount);
  }

  /** Owners and non-zero balances, in key order. The transfer log is not included. */
  snapshot(): AssetSnapshot {
    const owners = [...this.owners]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, owner]) => ({ node: parseNodeKey(key), owner }));
    const balances: AssetSnapshot['balances'] = [];
    for (const key of [...this.balances.keys()].sort()) {
      const perHolder = this.balances.get(key) ?? new Map<string, bigint>();
      for (const holder of [...perHolder.keys()].sort()) {
        const amount = perHolder.get(holder) ?? 0n;
        if (amount > 0n) balances.push({ key, holder, amount });
      }
    }
    return { owners, balances };
  }

  static fromSnapshot(snapshot: AssetSnapshot): InMemoryAssetRegistry {
    const registry = new InMemoryAssetRegistry();
    for (const { node, owner } of snapshot.owners) {
      registry.mintNode(node, owner);
    }
    for (const { key, holder, amount } of snapshot.balances) {
      if (amount > 0n) registry.credit(key, normalize(holder), amount);
    }
    return registry;
  }

  /** Transfers performed so far, oldest first. */
  transfers(): TransferRecord[] {
    return [...this.log];
  }

  // -- NonFungibleCollaborator --

  async ownerOf(node: NodeRef): Promise<string | null> {
    return this.owners.get(nodeKey(node)) ?? null;
  }

  async transferNode(node: NodeRef, from: string, to: string, data: Uint8Array): Promise<void> {
    const key = nodeKey(node);
    const owner = this.owners.get(key);
    if (!owner) throw new Error(`Node not minted: ${formatNode(node)}`);
    if (owner !== normalize(from)) {
      throw new Error(`${from} does not own ${formatNode(node)}`);
    }
    const receiver = this.receivers.get(normalize(to));
    if (receiver) {
      const ack = receiver.onNonFungibleReceived(normalize(from), normalize(from), canonicalNode(node), data);
      if (ack !== NON_FUNGIBLE_RECEIVED) {
        throw new Error(`Receiver ${to} rejected ${formatNode(node)}`);
      }
    }
    this.owners.set(key, normalize(to));
    this.log.push({ kind: 'node', resource: key, from: normalize(from), to: normalize(to), amount: 1n });
  }

  // -- FungibleCollaborator --

  async currencyBalanceOf(currency: string, holder: string): Promise<bigint> {
    return this.balanceOf(currencyKey(currency), normalize(holder));
  }

  async transferCurrency(currency: string, from: string, to: string, amount: bigint): Promise<void> {
    const key = currencyKey(currency);
    this.debit(key, normalize(from), amount);
    this.credit(key, normalize(to), amount);
    this.log.push({ kind: 'currency', resource: key, from: normalize(from), to: normalize(to), amount });
  }

  // -- CountedAssetCollaborator --

  async countedBalanceOf(asset: CountedAssetRef, holder: string): Promise<bigint> {
    return this.balanceOf(countedKey(asset), normalize(holder));
  }

  async transferCounted(
    asset: CountedAssetRef,
    from: string,
    to: string,
    amount: bigint,
    data: Uint8Array,
  ): Promise<void> {
    const key = countedKey(asset);
    if (this.balanceOf(key, normalize(from)) < amount) {
      throw new Error(`Insufficient ${key} balance for ${from}`);
    }
    const receiver = this.receivers.get(normalize(to));
    if (receiver) {
      const ack = receiver.onCountedAssetReceived(normalize(from), normalize(from), asset, amount, data);
      if (ack !== COUNTED_ASSET_RECEIVED) {
        throw new Error(`Receiver ${to} rejected ${amount} of ${key}`);
      }
    }
    this.debit(key, normalize(from), amount);
    this.credit(key, normalize(to), amount);
    this.log.push({ kind: 'counted', resource: key, from: normalize(from), to: normalize(to), amount });
  }

  // -- Internals --

  private balanceOf(key: ResourceKey, holder: string): bigint {
    return this.balances.get(key)?.get(holder) ?? 0n;
  }

  private credit(key: ResourceKey, holder: string, amount: bigint): void {
    if (amount <= 0n) throw new Error(`Amount must be positive, got ${amount}`);
    let perHolder = this.balances.get(key);
    if (!perHolder) {
      perHolder = new Map();
      this.balances.set(key, perHolder);
    }
    perHolder.set(holder, (perHolder.get(holder) ?? 0n) + amount);
  }

  private debit(key: ResourceKey, holder: string, amount: bigint): void {
    if (amount <= 0n) throw new Error(`Amount must be positive, got ${amount}`);
    const balance = this.balanceOf(key, holder);
    if (balance < amount) {
      throw new Error(`Insufficient ${key} balance for ${holder}: has ${balance}, needs ${amount}`);
    }
    const perHolder = this.balances.get(key);
    if (perHolder) perHolder.set(holder, balance - amount);
  }
}
