/** Argument parsers and connection settings shared by the commands. */

import { InvalidArgumentError } from 'commander';
import { GraphClient } from './client.js';
import type { AssetJson, NodeJson } from './wire.js';

export const DEFAULT_URL = 'http://127.0.0.1:8000';

const REF_PATTERN = /^(0x[0-9a-fA-F]{40})#(\d+)$/;

export type GlobalOptions = {
  url?: string;
  token?: string;
  json?: boolean;
};

/** `<collection>#<tokenId>` */
export function parseNodeArg(value: string): NodeJson {
  const match = REF_PATTERN.exec(value.trim());
  if (!match) {
    throw new InvalidArgumentError('Expected <collection>#<tokenId>, e.g. 0x1234…abcd#7.');
  }
  return { collection: match[1].toLowerCase(), token_id: match[2] };
}

/** `<collection>#<assetId>` */
export function parseAssetArg(value: string): AssetJson {
  const match = REF_PATTERN.exec(value.trim());
  if (!match) {
    throw new InvalidArgumentError('Expected <collection>#<assetId>.');
  }
  return { collection: match[1].toLowerCase(), asset_id: match[2] };
}

export function parseAddressArg(value: string): string {
  if (!/^0x[0-9a-fA-F]{40}$/.test(value)) {
    throw new InvalidArgumentError('Expected a 0x-prefixed 20-byte address.');
  }
  return value.toLowerCase();
}

export function parseCountArg(value: string): number {
  const n = Number(value);
  if (!Number.isSafeInteger(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

export function parseAmountArg(value: string): string {
  if (!/^\d+$/.test(value) || /^0+$/.test(value)) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return value;
}

export function parseHexArg(value: string): string {
  if (!/^0x(?:[0-9a-fA-F]{2})*$/.test(value)) {
    throw new InvalidArgumentError('Expected 0x-prefixed hex bytes.');
  }
  return value;
}

/** Resolve the server URL and token from flags, then environment. */
export function connect(options: GlobalOptions, env: NodeJS.ProcessEnv = process.env): GraphClient {
  const url = options.url ?? env.CGRAPH_URL ?? DEFAULT_URL;
  const token = options.token ?? env.CGRAPH_TOKEN;
  if (!token) {
    throw new Error('Missing auth token: pass --token or set CGRAPH_TOKEN');
  }
  return new GraphClient(url, token);
}
