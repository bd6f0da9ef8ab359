/** NodeRegistry: canonical node identity, with existence delegated to the non-fungible collaborator. */

import type { NodeKey, NodeRef } from '../models/node.js';
import type { NonFungibleCollaborator } from '../models/collaborators.js';

export function canonicalNode(node: NodeRef): NodeRef {
  return { collection: node.collection.trim().toLowerCase(), tokenId: node.tokenId };
}

export function nodeKey(node: NodeRef): NodeKey {
  const { collection, tokenId } = canonicalNode(node);
  return `${collection}#${tokenId.toString()}`;
}

export function parseNodeKey(key: NodeKey): NodeRef {
  const idx = key.lastIndexOf('#');
  if (idx <= 0 || idx === key.length - 1) {
    throw new Error(`Invalid node key: ${key}`);
  }
  const digits = key.slice(idx + 1);
  if (!/^\d+$/.test(digits)) {
    throw new Error(`Invalid node key: ${key}`);
  }
  return { collection: key.slice(0, idx), tokenId: BigInt(digits) };
}

export function sameNode(a: NodeRef, b: NodeRef): boolean {
  return nodeKey(a) === nodeKey(b);
}

/** Order by collection, then numerically by token id. */
export function compareNodes(a: NodeRef, b: NodeRef): number {
  const ca = canonicalNode(a).collection;
  const cb = canonicalNode(b).collection;
  if (ca !== cb) return ca < cb ? -1 : 1;
  if (a.tokenId === b.tokenId) return 0;
  return a.tokenId < b.tokenId ? -1 : 1;
}

export function formatNode(node: NodeRef): string {
  return nodeKey(node);
}

export class NodeRegistry {
  constructor(private collaborator: NonFungibleCollaborator) {}

  /** Current holder, or null when the collaborator reports none. Lookup failures propagate. */
  async ownerOf(node: NodeRef): Promise<string | null> {
    const owner = await this.collaborator.ownerOf(canonicalNode(node));
    return owner ? owner.toLowerCase() : null;
  }

  /**
   * A node exists iff the collaborator names an owner for it. A failing lookup counts
   * as non-existence. Never cached: the asset can be burned at any time.
   */
  async exists(node: NodeRef): Promise<boolean> {
    try {
      return (await this.ownerOf(node)) !== null;
    } catch {
      return false;
    }
  }
}
