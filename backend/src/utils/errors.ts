/** Typed failures of the composability core. Callers branch on `kind`, never on message text. */

export const COMPOSITION_ERROR_KINDS = [
  'NotFound',
  'AlreadyLinked',
  'NotLinked',
  'SelfLink',
  'CycleDetected',
  'InvalidAmount',
  'Unauthorized',
  'CustodyTransferFailed',
  'GraphCorrupted',
] as const;

export type CompositionErrorKind = (typeof COMPOSITION_ERROR_KINDS)[number];

/** Custom error class for detection via instanceof. */
export class CompositionError extends Error {
  readonly kind: CompositionErrorKind;

  constructor(kind: CompositionErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CompositionError';
    this.kind = kind;
  }
}

export function isCompositionError(err: unknown, kind?: CompositionErrorKind): err is CompositionError {
  return err instanceof CompositionError && (kind === undefined || err.kind === kind);
}

/** HTTP status for each error kind. */
export const HTTP_STATUS_BY_KIND: Record<CompositionErrorKind, number> = {
  NotFound: 404,
  AlreadyLinked: 409,
  NotLinked: 409,
  SelfLink: 409,
  CycleDetected: 409,
  InvalidAmount: 400,
  Unauthorized: 403,
  CustodyTransferFailed: 502,
  GraphCorrupted: 500,
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
