/** Shared response helpers for the graph routers. */

import type { Response } from 'express';
import { HTTP_STATUS_BY_KIND, errorMessage, isCompositionError } from '../utils/errors.js';

/** Map a thrown error onto `{ detail, kind }` with the matching status code. */
export function sendError(res: Response, err: unknown): void {
  if (isCompositionError(err)) {
    res.status(HTTP_STATUS_BY_KIND[err.kind]).json({ detail: err.message, kind: err.kind });
    return;
  }
  res.status(500).json({ detail: errorMessage(err) });
}

export function sendValidationError(res: Response, errors: string[]): void {
  res.status(400).json({ detail: 'Invalid request', errors });
}
