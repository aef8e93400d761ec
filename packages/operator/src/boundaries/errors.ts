/**
 * Marketplace Error Taxonomy
 *
 * Every failure aborts the enclosing operation entirely. There is no local
 * recovery: the unit of work rolls back and the caller receives one of the
 * coded errors below.
 */

// =============================================================================
// ERROR KINDS
// =============================================================================

export type MarketplaceErrorKind =
  | 'AUTHORIZATION'   // Caller identity does not match the expected principal
  | 'VALIDATION'      // Out-of-range input or violated arithmetic precondition
  | 'NOT_FOUND'       // Unknown product or request id
  | 'STATE_CONFLICT'  // Duplicate active request, or wrong request status
  | 'TRANSFER';       // Ledger refused a fund or asset transfer

/**
 * Stable numeric codes, exposed to API clients.
 */
export const ERROR_CODES: Record<MarketplaceErrorKind, number> = {
  AUTHORIZATION: 100,
  VALIDATION: 101,
  NOT_FOUND: 102,
  STATE_CONFLICT: 103,
  TRANSFER: 104,
};

// =============================================================================
// ERROR CLASSES
// =============================================================================

export class MarketplaceError extends Error {
  public readonly code: number;

  constructor(
    public readonly kind: MarketplaceErrorKind,
    message: string
  ) {
    super(message);
    this.name = 'MarketplaceError';
    this.code = ERROR_CODES[kind];
  }
}

export class AuthorizationError extends MarketplaceError {
  constructor(message: string) {
    super('AUTHORIZATION', message);
    this.name = 'AuthorizationError';
  }
}

export class ValidationError extends MarketplaceError {
  constructor(message: string) {
    super('VALIDATION', message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends MarketplaceError {
  constructor(
    public readonly entity: 'product' | 'request',
    public readonly id: number
  ) {
    super('NOT_FOUND', `Unknown ${entity}: ${id}`);
    this.name = 'NotFoundError';
  }
}

export class StateConflict extends MarketplaceError {
  constructor(message: string) {
    super('STATE_CONFLICT', message);
    this.name = 'StateConflict';
  }
}

export class TransferError extends MarketplaceError {
  constructor(message: string) {
    super('TRANSFER', message);
    this.name = 'TransferError';
  }
}

export function isMarketplaceError(error: unknown): error is MarketplaceError {
  return error instanceof MarketplaceError;
}
