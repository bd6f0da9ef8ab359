/** Node identity types for the composability graph. */

/** A non-fungible node: one token id within one collection. */
export interface NodeRef {
  collection: string;
  tokenId: bigint;
}

/** Stable string key for a node, `"<collection>#<tokenId>"` with the collection lower-cased. */
export type NodeKey = string;

/** Wire shape of a node (token ids travel as decimal strings). */
export interface NodeJson {
  collection: string;
  token_id: string;
}

export interface EdgeRecord {
  source: NodeRef;
  target: NodeRef;
}
