/**
 * Persists the edge and attachment tables, plus the in-memory asset registry's holdings
 * when one is in use, so a restarted server resumes the same forest with custody intact.
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { EdgeRecord, NodeKey, NodeRef } from '../models/node.js';
import type { AttachmentRecord, ResourceKey } from '../models/attachment.js';
import { parseResourceKey, resourceKey } from '../services/attachmentLedger.js';
import { GRAPH_STATE_FILENAME, PERSISTENCE_VERSION } from './constants.js';
import { stringify } from './encoding.js';
import { errorMessage } from './errors.js';

/** Holdings of an in-memory asset registry. Only non-zero balances are listed. */
export interface AssetSnapshot {
  owners: { node: NodeRef; owner: string }[];
  balances: { key: ResourceKey; holder: string; amount: bigint }[];
}

export interface GraphSnapshot {
  edges: EdgeRecord[];
  attachments: AttachmentRecord[];
  quarantined: NodeKey[];
  assets?: AssetSnapshot;
}

export interface PersistedGraph extends GraphSnapshot {
  version: number;
  savedAt: string;
}

const decimal = z.string().regex(/^\d+$/, 'must be a non-negative decimal integer').transform((s) => BigInt(s));

const PersistedNodeSchema = z.object({
  collection: z.string().min(1),
  tokenId: decimal,
});

/** Kind of a canonical resource key, or null when the key does not round-trip. */
function resourceKindOf(key: string): 'currency' | 'counted' | null {
  try {
    const resource = parseResourceKey(key);
    if (resource.kind === 'currency' && resource.currency === '') return null;
    return resourceKey(resource) === key ? resource.kind : null;
  } catch {
    return null;
  }
}

const PersistedResourceKeySchema = z
  .string()
  .refine((key) => resourceKindOf(key) !== null, { message: 'must be a canonical currency: or counted: resource key' });

const PersistedGraphSchema = z.object({
  version: z.literal(PERSISTENCE_VERSION),
  savedAt: z.string(),
  edges: z.array(z.object({ source: PersistedNodeSchema, target: PersistedNodeSchema })),
  attachments: z.array(
    z
      .object({
        kind: z.enum(['currency', 'counted']),
        key: PersistedResourceKeySchema,
        node: PersistedNodeSchema,
        amount: decimal,
      })
      .refine((entry) => resourceKindOf(entry.key) === entry.kind, {
        message: 'does not match the attachment kind',
        path: ['key'],
      }),
  ),
  quarantined: z.array(z.string()).default([]),
  assets: z
    .object({
      owners: z.array(z.object({ node: PersistedNodeSchema, owner: z.string().min(1) })),
      balances: z.array(z.object({ key: PersistedResourceKeySchema, holder: z.string().min(1), amount: decimal })),
    })
    .optional(),
});

export class GraphPersistence {
  readonly filePath: string;

  constructor(dataDir: string) {
    this.filePath = path.join(dataDir, GRAPH_STATE_FILENAME);
  }

  /** Write the snapshot atomically (temp file + rename). */
  save(snapshot: GraphSnapshot): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const data: PersistedGraph = {
      version: PERSISTENCE_VERSION,
      savedAt: new Date().toISOString(),
      ...snapshot,
    };
    const tmp = this.filePath + '.tmp';
    fs.writeFileSync(tmp, stringify(data, 2));
    fs.renameSync(tmp, this.filePath);
  }

  /** Load the snapshot. Returns null if the file is missing or invalid. */
  load(): PersistedGraph | null {
    if (!fs.existsSync(this.filePath)) return null;
    try {
      const raw: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
      const parsed = PersistedGraphSchema.safeParse(raw);
      if (!parsed.success) {
        console.warn('GraphPersistence: invalid persistence format in', this.filePath, parsed.error.message);
        return null;
      }
      return parsed.data;
    } catch (err) {
      console.warn('GraphPersistence: failed to load from', this.filePath, errorMessage(err));
      return null;
    }
  }
}
