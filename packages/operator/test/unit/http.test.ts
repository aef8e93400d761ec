/**
 * HTTP Boundary Tests
 *
 * Proves:
 * - Request bodies become domain values or ValidationError
 * - Error kinds map to fixed HTTP statuses
 */

import { describe, it, expect } from 'vitest';
import {
  validateAmount,
  validateCart,
  validateId,
  validateMetadata,
} from '../../src/http/validation.js';
import { statusForError } from '../../src/http/routes.js';
import {
  AuthorizationError,
  NotFoundError,
  StateConflict,
  TransferError,
  ValidationError,
} from '../../src/boundaries/errors.js';
import { PRODUCER } from './fixtures.js';

describe('validateAmount', () => {
  it('should accept safe integers and decimal strings', () => {
    expect(validateAmount(25, 'price')).toBe(25n);
    expect(validateAmount('12345678901234567890', 'price')).toBe(12345678901234567890n);
  });

  it.each([1.5, '1.5', '0x10', null, Number.MAX_SAFE_INTEGER + 2])('should reject %j', (value) => {
    expect(() => validateAmount(value, 'price')).toThrow(ValidationError);
  });
});

describe('validateId', () => {
  it('should accept numbers and digit strings', () => {
    expect(validateId(0, 'id')).toBe(0);
    expect(validateId('42', 'id')).toBe(42);
  });

  it.each([-1, '-1', 'abc', 2.5])('should reject %j', (value) => {
    expect(() => validateId(value, 'id')).toThrow('id must be a non-negative integer');
  });
});

describe('validateMetadata', () => {
  it('should build product metadata from JSON', () => {
    const metadata = validateMetadata({
      uri: 'ipfs://test-product',
      price: '1000',
      amount: 10,
      commission: 10,
      type: 2,
      recipient: PRODUCER,
      destination: PRODUCER,
    });

    expect(metadata).toEqual({
      uri: 'ipfs://test-product',
      price: 1000n,
      amount: 10n,
      commission: 10,
      type: 2,
      recipient: PRODUCER,
      destination: PRODUCER,
    });
  });

  it('should name the offending field', () => {
    expect(() => validateMetadata({ uri: 7 })).toThrow('metadata.uri must be a string');
  });
});

describe('validateCart', () => {
  it('should build cart items', () => {
    expect(validateCart([{ referenceId: '3', affiliate: true, amount: '2' }])).toEqual([
      { referenceId: 3, affiliate: true, amount: 2n },
    ]);
  });

  it('should reject a non-array cart', () => {
    expect(() => validateCart({})).toThrow('cart must be an array');
  });

  it('should name the offending item', () => {
    expect(() => validateCart([{ referenceId: 1, affiliate: 'yes', amount: 1 }])).toThrow(
      'cart[0].affiliate must be a boolean'
    );
  });
});

describe('statusForError', () => {
  it('should map each error kind to its status', () => {
    expect(statusForError(new AuthorizationError('no'))).toBe(403);
    expect(statusForError(new ValidationError('bad'))).toBe(400);
    expect(statusForError(new NotFoundError('product', 1))).toBe(404);
    expect(statusForError(new StateConflict('conflict'))).toBe(409);
    expect(statusForError(new TransferError('insufficient'))).toBe(402);
    expect(statusForError(new Error('unexpected'))).toBe(500);
  });
});
