/** Conversions between in-memory values (bigint, bytes) and their JSON wire forms. */

import type { NodeJson, NodeRef } from '../models/node.js';
import type { CountedAssetRef } from '../models/attachment.js';
import type { CountedAssetJson } from '../models/events.js';

export function toHex(bytes: Uint8Array): string {
  return '0x' + Buffer.from(bytes).toString('hex');
}

export function fromHex(hex: string): Uint8Array {
  const body = hex.startsWith('0x') ? hex.slice(2) : hex;
  if (body.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(body)) {
    throw new Error(`Invalid hex string: ${hex}`);
  }
  return new Uint8Array(Buffer.from(body, 'hex'));
}

export function nodeToJson(node: NodeRef): NodeJson {
  return { collection: node.collection, token_id: node.tokenId.toString() };
}

export function assetToJson(asset: CountedAssetRef): CountedAssetJson {
  return { collection: asset.collection, asset_id: asset.assetId.toString() };
}

/** JSON.stringify replacer: bigint as decimal string, bytes as hex. */
export function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Uint8Array) return toHex(value);
  return value;
}

export function stringify(value: unknown, space?: number): string {
  return JSON.stringify(value, jsonReplacer, space);
}
