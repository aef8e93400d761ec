/**
 * Account Identities
 *
 * Every producer, publisher, purchaser and payout destination is an account
 * address. Branding keeps raw strings from reaching the authorization checks
 * without passing through validation first.
 */

import { getAddress, isAddress } from 'ethers';
import { AuthorizationError, ValidationError } from './errors.js';

// =============================================================================
// BRANDED TYPES
// =============================================================================

declare const __brand: unique symbol;
type Brand<T, B> = T & { readonly [__brand]: B };

/**
 * Validated, 0x-prefixed, lowercase account address.
 */
export type Principal = Brand<string, 'Principal'>;

/**
 * The only way to create a Principal.
 */
export function principal(raw: string): Principal {
  if (raw.trim() === '') {
    throw new ValidationError('Account address must not be empty');
  }
  if (!isAddress(raw)) {
    throw new ValidationError(`Invalid account address: ${raw}`);
  }
  return getAddress(raw).toLowerCase() as Principal;
}

// =============================================================================
// INVOCATION CONTEXT
// =============================================================================

/**
 * Identity of whoever invoked a public operation.
 * Threaded explicitly through every call instead of read from ambient state.
 */
export interface InvocationContext {
  caller: Principal;
}

export function invocation(caller: string): InvocationContext {
  return { caller: principal(caller) };
}

/**
 * Assert the invoking identity is the expected principal.
 */
export function assertCaller(
  ctx: InvocationContext,
  expected: Principal,
  action: string
): void {
  if (ctx.caller !== expected) {
    throw new AuthorizationError(`${ctx.caller} is not authorized to ${action}`);
  }
}
