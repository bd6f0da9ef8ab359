/**
 * Composition routes — the mutating surface, one family per resource kind.
 *
 * Endpoints (each returns the emitted notification):
 *   POST /non-fungible/link            { actor, payload: node, target, annotation? }
 *   POST /non-fungible/update-target   { actor, payload: node, new_target, annotation? }
 *   POST /non-fungible/unlink          { actor, payload: node, recipient, annotation? }
 *   POST /fungible/link                { actor, payload: { currency, amount }, target }
 *   POST /fungible/update-target       { actor, payload: { currency, from }, new_target }
 *   POST /fungible/unlink              { actor, payload: { currency, from, amount? }, recipient }
 *   POST /counted/link                 { actor, payload: { asset, amount }, target }
 *   POST /counted/update-target        { actor, payload: { asset, from }, new_target }
 *   POST /counted/unlink               { actor, payload: { asset, from, amount? }, recipient }
 *
 * Trust model: single operator. The bearer token checked in server.ts is the only
 * credential, and whoever holds it may name any `actor`. The authorization policy then
 * judges that named actor (e.g. root ownership); it does not authenticate it.
 */

import { Router, type Request, type Response } from 'express';
import type { z } from 'zod';
import type { CompositionService } from '../services/compositionService.js';
import type { CompositionEvent } from '../models/events.js';
import {
  CountedLinkSchema,
  CountedUnlinkSchema,
  CountedUpdateTargetSchema,
  FungibleLinkSchema,
  FungibleUnlinkSchema,
  FungibleUpdateTargetSchema,
  NodeLinkSchema,
  NodeUnlinkSchema,
  NodeUpdateTargetSchema,
  validate,
} from '../utils/payloadValidator.js';
import { sendError, sendValidationError } from './respond.js';

export interface ComposeRouterDeps {
  compositionService: CompositionService;
}

export function createComposeRouter(deps: ComposeRouterDeps): Router {
  const { compositionService: svc } = deps;
  const router = Router();

  /** Validate the body, run the operation, answer 200 with the notification. */
  function handle<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    run: (body: z.output<S>) => Promise<CompositionEvent>,
  ): void {
    router.post(path, async (req: Request, res: Response) => {
      const parsed = validate(schema, req.body);
      if (!parsed.success) {
        sendValidationError(res, parsed.errors);
        return;
      }
      try {
        res.json({ event: await run(parsed.data) });
      } catch (err) {
        sendError(res, err);
      }
    });
  }

  handle('/non-fungible/link', NodeLinkSchema, (b) =>
    svc.linkNode(b.actor, b.payload, b.target, b.annotation));
  handle('/non-fungible/update-target', NodeUpdateTargetSchema, (b) =>
    svc.updateNodeTarget(b.actor, b.payload, b.new_target, b.annotation));
  handle('/non-fungible/unlink', NodeUnlinkSchema, (b) =>
    svc.unlinkNode(b.actor, b.recipient, b.payload, b.annotation));

  handle('/fungible/link', FungibleLinkSchema, (b) =>
    svc.linkFungible(b.actor, b.payload, b.target, b.annotation));
  handle('/fungible/update-target', FungibleUpdateTargetSchema, (b) =>
    svc.updateFungibleTarget(b.actor, b.payload, b.new_target, b.annotation));
  handle('/fungible/unlink', FungibleUnlinkSchema, (b) =>
    svc.unlinkFungible(b.actor, b.recipient, b.payload, b.annotation));

  handle('/counted/link', CountedLinkSchema, (b) =>
    svc.linkCounted(b.actor, b.payload, b.target, b.annotation));
  handle('/counted/update-target', CountedUpdateTargetSchema, (b) =>
    svc.updateCountedTarget(b.actor, b.payload, b.new_target, b.annotation));
  handle('/counted/unlink', CountedUnlinkSchema, (b) =>
    svc.unlinkCounted(b.actor, b.recipient, b.payload, b.annotation));

  return router;
}
