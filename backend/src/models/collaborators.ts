/**
 * Narrow contracts of the external asset collaborators.
 *
 * The composability core never moves assets itself. It asks these collaborators to
 * move custody and to report ownership and balances. Any method may reject; the
 * protocol treats a rejection as `CustodyTransferFailed` (for transfers) or as
 * "does not exist" (for `ownerOf`).
 */

import type { NodeRef } from './node.js';
import type { CountedAssetRef } from './attachment.js';

export interface NonFungibleCollaborator {
  /** Current holder of the node, or null when the node does not exist. */
  ownerOf(node: NodeRef): Promise<string | null>;
  transferNode(node: NodeRef, from: string, to: string, data: Uint8Array): Promise<void>;
}

export interface FungibleCollaborator {
  currencyBalanceOf(currency: string, holder: string): Promise<bigint>;
  transferCurrency(currency: string, from: string, to: string, amount: bigint): Promise<void>;
}

export interface CountedAssetCollaborator {
  countedBalanceOf(asset: CountedAssetRef, holder: string): Promise<bigint>;
  transferCounted(
    asset: CountedAssetRef,
    from: string,
    to: string,
    amount: bigint,
    data: Uint8Array,
  ): Promise<void>;
}

/** Callbacks a custody recipient exposes so collaborators can confirm it accepts incoming assets. */
export interface AssetReceiver {
  readonly address: string;
  onNonFungibleReceived(operator: string, from: string, node: NodeRef, data: Uint8Array): string;
  onCountedAssetReceived(
    operator: string,
    from: string,
    asset: CountedAssetRef,
    amount: bigint,
    data: Uint8Array,
  ): string;
}
