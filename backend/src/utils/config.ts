/** Server configuration read from the environment (after dotenv has loaded `.env`). */

import crypto from 'node:crypto';
import { z } from 'zod';
import { DEFAULT_CUSTODIAN_ADDRESS, DEFAULT_PORT, MAX_ROOT_DEPTH } from './constants.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
  HOST: z.string().min(1).default('127.0.0.1'),
  GRAPH_DATA_DIR: z.string().min(1).optional(),
  GRAPH_LOG_DIR: z.string().min(1).optional(),
  GRAPH_AUTH_TOKEN: z.string().min(8).optional(),
  CUSTODIAN_ADDRESS: z
    .string()
    .regex(/^0x[0-9a-fA-F]{40}$/, 'must be a 0x-prefixed 20-byte hex address')
    .default(DEFAULT_CUSTODIAN_ADDRESS),
  CUSTODY_POLICY: z.enum(['escrow', 'none']).default('escrow'),
  MAX_ROOT_DEPTH: z.coerce.number().int().positive().default(MAX_ROOT_DEPTH),
  ACCEPT_UNSOLICITED: booleanFlag.default('true'),
  GRAPH_AUTHORIZATION: z.enum(['root-owner', 'allow-all']).default('root-owner'),
  GRAPH_VERBOSE_LOGS: booleanFlag.default('false'),
});

export interface GraphConfig {
  port: number;
  host: string;
  dataDir?: string;
  logDir?: string;
  authToken: string;
  custodian: string;
  custodyPolicy: 'escrow' | 'none';
  maxRootDepth: number;
  acceptUnsolicited: boolean;
  authorization: 'root-owner' | 'allow-all';
  verboseLogs: boolean;
}

/** Validate the environment. Throws with every offending variable listed. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GraphConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }
  const c = parsed.data;
  return {
    port: c.PORT,
    host: c.HOST,
    dataDir: c.GRAPH_DATA_DIR,
    logDir: c.GRAPH_LOG_DIR,
    authToken: c.GRAPH_AUTH_TOKEN ?? crypto.randomUUID(),
    custodian: c.CUSTODIAN_ADDRESS.toLowerCase(),
    custodyPolicy: c.CUSTODY_POLICY,
    maxRootDepth: c.MAX_ROOT_DEPTH,
    acceptUnsolicited: c.ACCEPT_UNSOLICITED,
    authorization: c.GRAPH_AUTHORIZATION,
    verboseLogs: c.GRAPH_VERBOSE_LOGS,
  };
}
