/**
 * Request Body Validation
 *
 * Turns untyped JSON into domain values or throws ValidationError.
 * Amounts arrive as decimal strings (or safe integers) and become bigint.
 */

import { ValidationError } from '../boundaries/errors.js';
import { principal, type Principal } from '../boundaries/principal.js';
import type { CartItem } from '../operator/types.js';
import type { ProductMetadata } from '../operator/product-registry.js';

export function validateObject(value: unknown, fieldName: string): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ValidationError(`${fieldName} must be an object`);
  }
  return Object.fromEntries(Object.entries(value));
}

export function validateString(value: unknown, fieldName: string): string {
  if (typeof value !== 'string') {
    throw new ValidationError(`${fieldName} must be a string`);
  }
  return value;
}

export function validatePrincipal(value: unknown, fieldName: string): Principal {
  return principal(validateString(value, fieldName));
}

export function validateId(value: unknown, fieldName: string): number {
  const parsed = typeof value === 'string' && /^\d+$/.test(value) ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isSafeInteger(parsed) || parsed < 0) {
    throw new ValidationError(`${fieldName} must be a non-negative integer`);
  }
  return parsed;
}

export function validateInteger(value: unknown, fieldName: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ValidationError(`${fieldName} must be an integer`);
  }
  return value;
}

export function validateAmount(value: unknown, fieldName: string): bigint {
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return BigInt(value);
  }
  if (typeof value === 'string' && /^-?\d+$/.test(value)) {
    return BigInt(value);
  }
  throw new ValidationError(`${fieldName} must be an integer or a decimal string`);
}

export function validateBoolean(value: unknown, fieldName: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ValidationError(`${fieldName} must be a boolean`);
  }
  return value;
}

export function validateMetadata(value: unknown): ProductMetadata {
  const body = validateObject(value, 'metadata');
  return {
    uri: validateString(body.uri, 'metadata.uri'),
    price: validateAmount(body.price, 'metadata.price'),
    amount: validateAmount(body.amount, 'metadata.amount'),
    commission: validateInteger(body.commission, 'metadata.commission'),
    type: validateInteger(body.type, 'metadata.type'),
    recipient: validatePrincipal(body.recipient, 'metadata.recipient'),
    destination: validatePrincipal(body.destination, 'metadata.destination'),
  };
}

export function validateCart(value: unknown): CartItem[] {
  if (!Array.isArray(value)) {
    throw new ValidationError('cart must be an array');
  }
  return value.map((entry: unknown, i) => {
    const item = validateObject(entry, `cart[${i}]`);
    return {
      referenceId: validateId(item.referenceId, `cart[${i}].referenceId`),
      affiliate: validateBoolean(item.affiliate, `cart[${i}].affiliate`),
      amount: validateAmount(item.amount, `cart[${i}].amount`),
    };
  });
}
