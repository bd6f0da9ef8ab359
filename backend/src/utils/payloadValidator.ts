/** Zod schemas for request bodies and path parameters. Caps string lengths and normalizes numbers to bigint. */

import { z } from 'zod';
import { fromHex } from './encoding.js';

export const AddressSchema = z
  .string()
  .regex(/^0x[0-9a-fA-F]{40}$/, 'must be a 0x-prefixed 20-byte hex address')
  .transform((s) => s.toLowerCase());

/** Non-negative integer given as a decimal string (or a safe JS integer). */
export const UintSchema = z
  .union([z.string().max(78).regex(/^\d+$/, 'must be a non-negative decimal integer'), z.number().int().nonnegative().safe()])
  .transform((v) => BigInt(v));

export const AmountSchema = UintSchema.refine((v) => v > 0n, { message: 'must be positive' });

export const AnnotationSchema = z
  .string()
  .max(2 + 2 * 4096)
  .regex(/^0x(?:[0-9a-fA-F]{2})*$/, 'must be 0x-prefixed hex bytes')
  .transform((s) => fromHex(s))
  .optional();

export const NodeSchema = z
  .object({
    collection: AddressSchema,
    token_id: UintSchema,
  })
  .strict()
  .transform((n) => ({ collection: n.collection, tokenId: n.token_id }));

export const CountedAssetSchema = z
  .object({
    collection: AddressSchema,
    asset_id: UintSchema,
  })
  .strict()
  .transform((a) => ({ collection: a.collection, assetId: a.asset_id }));

const base = {
  actor: AddressSchema,
  annotation: AnnotationSchema,
};

// -- Non-fungible --

export const NodeLinkSchema = z.object({ ...base, payload: NodeSchema, target: NodeSchema }).strict();
export const NodeUpdateTargetSchema = z.object({ ...base, payload: NodeSchema, new_target: NodeSchema }).strict();
export const NodeUnlinkSchema = z.object({ ...base, payload: NodeSchema, recipient: AddressSchema }).strict();

// -- Fungible --

export const FungibleLinkSchema = z
  .object({ ...base, payload: z.object({ currency: AddressSchema, amount: UintSchema }).strict(), target: NodeSchema })
  .strict();
export const FungibleUpdateTargetSchema = z
  .object({ ...base, payload: z.object({ currency: AddressSchema, from: NodeSchema }).strict(), new_target: NodeSchema })
  .strict();
export const FungibleUnlinkSchema = z
  .object({
    ...base,
    payload: z.object({ currency: AddressSchema, from: NodeSchema, amount: UintSchema.optional() }).strict(),
    recipient: AddressSchema,
  })
  .strict();

// -- Counted asset --

export const CountedLinkSchema = z
  .object({ ...base, payload: z.object({ asset: CountedAssetSchema, amount: UintSchema }).strict(), target: NodeSchema })
  .strict();
export const CountedUpdateTargetSchema = z
  .object({ ...base, payload: z.object({ asset: CountedAssetSchema, from: NodeSchema }).strict(), new_target: NodeSchema })
  .strict();
export const CountedUnlinkSchema = z
  .object({
    ...base,
    payload: z.object({ asset: CountedAssetSchema, from: NodeSchema, amount: UintSchema.optional() }).strict(),
    recipient: AddressSchema,
  })
  .strict();

// -- Path parameters --

export const NodeParamsSchema = z.object({
  collection: AddressSchema,
  tokenId: UintSchema,
});

// -- In-memory asset minting --

export const MintNodeSchema = z.object({ node: NodeSchema, owner: AddressSchema }).strict();
export const MintCurrencySchema = z.object({ currency: AddressSchema, holder: AddressSchema, amount: AmountSchema }).strict();
export const MintCountedSchema = z.object({ asset: CountedAssetSchema, holder: AddressSchema, amount: AmountSchema }).strict();

export type ValidationResult<T> = { success: true; data: T } | { success: false; errors: string[] };

/** Parse with a schema and flatten the issues into `path: message` strings. */
export function validate<S extends z.ZodTypeAny>(schema: S, input: unknown): ValidationResult<z.output<S>> {
  const result = schema.safeParse(input);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    errors: result.error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message)),
  };
}
