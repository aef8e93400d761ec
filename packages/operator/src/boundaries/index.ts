/**
 * Boundaries Module
 *
 * Identity branding and the error taxonomy shared by every component.
 */

export type { MarketplaceErrorKind } from './errors.js';
export {
  ERROR_CODES,
  MarketplaceError,
  AuthorizationError,
  ValidationError,
  NotFoundError,
  StateConflict,
  TransferError,
  isMarketplaceError,
} from './errors.js';

export type { Principal, InvocationContext } from './principal.js';
export { principal, invocation, assertCaller } from './principal.js';
