/**
 * Development asset routes backed by the in-memory collaborator.
 *
 * Endpoints:
 *   POST /nodes        — Mint a non-fungible node { node, owner }
 *   POST /currencies   — Mint currency { currency, holder, amount }
 *   POST /counted      — Mint counted assets { asset, holder, amount }
 *   GET  /transfers    — Custody transfers performed so far
 */

import { Router, type Request, type Response } from 'express';
import type { InMemoryAssetRegistry } from '../services/inMemoryAssets.js';
import { nodeToJson } from '../utils/encoding.js';
import { errorMessage } from '../utils/errors.js';
import { MintCountedSchema, MintCurrencySchema, MintNodeSchema, validate } from '../utils/payloadValidator.js';
import { sendValidationError } from './respond.js';

export interface AssetsRouterDeps {
  assets: InMemoryAssetRegistry;
  /** Called after every successful mint. */
  onChange?: () => void;
}

export function createAssetsRouter(deps: AssetsRouterDeps): Router {
  const { assets } = deps;
  const onChange = deps.onChange ?? (() => {});
  const router = Router();

  router.post('/nodes', (req: Request, res: Response) => {
    const parsed = validate(MintNodeSchema, req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.errors);
      return;
    }
    try {
      assets.mintNode(parsed.data.node, parsed.data.owner);
      onChange();
      res.status(201).json({ node: nodeToJson(parsed.data.node), owner: parsed.data.owner });
    } catch (err) {
      res.status(409).json({ detail: errorMessage(err) });
    }
  });

  router.post('/currencies', (req: Request, res: Response) => {
    const parsed = validate(MintCurrencySchema, req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.errors);
      return;
    }
    const { currency, holder, amount } = parsed.data;
    assets.mintCurrency(currency, holder, amount);
    onChange();
    res.status(201).json({ currency, holder, amount: amount.toString() });
  });

  router.post('/counted', (req: Request, res: Response) => {
    const parsed = validate(MintCountedSchema, req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.errors);
      return;
    }
    const { asset, holder, amount } = parsed.data;
    assets.mintCounted(asset, holder, amount);
    onChange();
    res.status(201).json({ holder, amount: amount.toString() });
  });

  router.get('/transfers', (_req: Request, res: Response) => {
    res.json({
      transfers: assets.transfers().map((t) => ({ ...t, amount: t.amount.toString() })),
    });
  });

  return router;
}
