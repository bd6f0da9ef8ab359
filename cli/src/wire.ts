/** Response shapes of the graph server, validated on arrival. */

import { z } from 'zod';

export const NodeJsonSchema = z.object({
  collection: z.string(),
  token_id: z.string(),
});

export const AssetJsonSchema = z.object({
  collection: z.string(),
  asset_id: z.string(),
});

export type NodeJson = z.infer<typeof NodeJsonSchema>;
export type AssetJson = z.infer<typeof AssetJsonSchema>;

const ResourceSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('non_fungible'), node: NodeJsonSchema }),
  z.object({ kind: z.literal('fungible'), currency: z.string(), amount: z.string(), from: NodeJsonSchema.optional() }),
  z.object({ kind: z.literal('counted'), asset: AssetJsonSchema, amount: z.string(), from: NodeJsonSchema.optional() }),
]);

const eventBase = {
  id: z.string(),
  actor: z.string(),
  resource: ResourceSchema,
  annotation: z.string(),
  timestamp: z.string(),
};

export const EventSchema = z.discriminatedUnion('action', [
  z.object({ ...eventBase, action: z.literal('link'), target: NodeJsonSchema }),
  z.object({ ...eventBase, action: z.literal('update_target'), previous_target: NodeJsonSchema, target: NodeJsonSchema }),
  z.object({ ...eventBase, action: z.literal('unlink'), previous_target: NodeJsonSchema.nullable(), recipient: z.string() }),
]);

export type WireEvent = z.infer<typeof EventSchema>;
export type WireResource = WireEvent['resource'];

export const EventResponseSchema = z.object({ event: EventSchema });
export const RootResponseSchema = z.object({ root: NodeJsonSchema });
export const TargetResponseSchema = z.object({ target: NodeJsonSchema.nullable() });
export const ChildrenResponseSchema = z.object({ children: z.array(NodeJsonSchema) });
export const OwnerResponseSchema = z.object({ root: NodeJsonSchema, owner: z.string().nullable() });
export const FungibleBalanceSchema = z.object({ currency: z.string(), amount: z.string() });
export const CountedBalanceSchema = z.object({ asset: AssetJsonSchema, amount: z.string() });
export const HealthSchema = z
  .object({ status: z.string(), custodian: z.string(), custody_policy: z.string(), edges: z.number() })
  .passthrough();

export const ErrorBodySchema = z.object({
  detail: z.string(),
  kind: z.string().optional(),
  errors: z.array(z.string()).optional(),
});
