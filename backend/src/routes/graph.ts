/**
 * Graph query routes — read-only views of the forest and the attachment ledger.
 *
 * Endpoints:
 *   GET  /nodes/:collection/:tokenId/root        — Resolve the root node
 *   GET  /nodes/:collection/:tokenId/target      — Single-hop target (or null)
 *   GET  /nodes/:collection/:tokenId/children    — Direct children
 *   GET  /nodes/:collection/:tokenId/owner       — Holder of the node's root
 *   GET  /nodes/:collection/:tokenId/holdings    — All attachments on the node
 *   GET  /nodes/:collection/:tokenId/balances/fungible/:currency
 *   GET  /nodes/:collection/:tokenId/balances/counted/:assetCollection/:assetId
 *   POST /nodes/:collection/:tokenId/release     — Lift a corruption quarantine
 *   GET  /conservation                           — Ledger totals against custody
 *   GET  /quarantine                             — Quarantined node keys
 */

import { Router, type Request, type Response } from 'express';
import type { CompositionService } from '../services/compositionService.js';
import type { NodeRef } from '../models/node.js';
import { assetToJson, nodeToJson } from '../utils/encoding.js';
import { AddressSchema, CountedAssetSchema, NodeParamsSchema, validate } from '../utils/payloadValidator.js';
import { sendError, sendValidationError } from './respond.js';

export interface GraphRouterDeps {
  compositionService: CompositionService;
}

function parseNode(req: Request, res: Response): NodeRef | null {
  const result = validate(NodeParamsSchema, req.params);
  if (!result.success) {
    sendValidationError(res, result.errors);
    return null;
  }
  return { collection: result.data.collection, tokenId: result.data.tokenId };
}

export function createGraphRouter(deps: GraphRouterDeps): Router {
  const { compositionService } = deps;
  const router = Router();

  router.get('/nodes/:collection/:tokenId/root', (req: Request, res: Response) => {
    const node = parseNode(req, res);
    if (!node) return;
    try {
      res.json({ root: nodeToJson(compositionService.findRootToken(node)) });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/nodes/:collection/:tokenId/target', (req: Request, res: Response) => {
    const node = parseNode(req, res);
    if (!node) return;
    const target = compositionService.getTarget(node);
    res.json({ target: target ? nodeToJson(target) : null });
  });

  router.get('/nodes/:collection/:tokenId/children', (req: Request, res: Response) => {
    const node = parseNode(req, res);
    if (!node) return;
    res.json({ children: compositionService.getChildren(node).map(nodeToJson) });
  });

  router.get('/nodes/:collection/:tokenId/owner', async (req: Request, res: Response) => {
    const node = parseNode(req, res);
    if (!node) return;
    try {
      const root = compositionService.findRootToken(node);
      const owner = await compositionService.rootOwnerOf(node);
      res.json({ root: nodeToJson(root), owner });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/nodes/:collection/:tokenId/holdings', (req: Request, res: Response) => {
    const node = parseNode(req, res);
    if (!node) return;
    const holdings = compositionService.holdingsOf(node).map((h) => ({
      kind: h.kind,
      key: h.key,
      amount: h.amount.toString(),
    }));
    res.json({ holdings });
  });

  router.get('/nodes/:collection/:tokenId/balances/fungible/:currency', (req: Request, res: Response) => {
    const node = parseNode(req, res);
    if (!node) return;
    const currency = validate(AddressSchema, req.params.currency);
    if (!currency.success) {
      sendValidationError(res, currency.errors);
      return;
    }
    const amount = compositionService.balanceOfFungible(node, currency.data);
    res.json({ currency: currency.data, amount: amount.toString() });
  });

  router.get(
    '/nodes/:collection/:tokenId/balances/counted/:assetCollection/:assetId',
    (req: Request, res: Response) => {
      const node = parseNode(req, res);
      if (!node) return;
      const asset = validate(CountedAssetSchema, {
        collection: req.params.assetCollection,
        asset_id: req.params.assetId,
      });
      if (!asset.success) {
        sendValidationError(res, asset.errors);
        return;
      }
      const amount = compositionService.balanceOfCountedAsset(node, asset.data);
      res.json({ asset: assetToJson(asset.data), amount: amount.toString() });
    },
  );

  router.post('/nodes/:collection/:tokenId/release', (req: Request, res: Response) => {
    const node = parseNode(req, res);
    if (!node) return;
    const released = compositionService.releaseQuarantine(node);
    if (!released) {
      res.status(404).json({ detail: 'Node is not quarantined', kind: 'NotFound' });
      return;
    }
    res.json({ status: 'released' });
  });

  router.get('/quarantine', (_req: Request, res: Response) => {
    res.json({ quarantined: compositionService.quarantinedNodes() });
  });

  router.get('/conservation', async (_req: Request, res: Response) => {
    try {
      const reports = await compositionService.verifyConservation();
      res.json({
        ok: reports.every((r) => r.ok),
        resources: reports.map((r) => ({
          key: r.key,
          recorded: r.recorded.toString(),
          custody: r.custody.toString(),
          ok: r.ok,
        })),
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
