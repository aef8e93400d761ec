/**
 * Access Control Tests
 *
 * Proves:
 * - Both singletons start at the bootstrap identity
 * - Only the current admin can replace the admin or the fee destination
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { AuthorizationError, ERROR_CODES } from '../../src/boundaries/errors.js';
import { createMarketplace, ADMIN, FEE_DESTINATION, OTHER } from './fixtures.js';

describe('AccessControlGuard', () => {
  let market: ReturnType<typeof createMarketplace>;

  beforeEach(() => {
    market = createMarketplace();
  });

  it('should start with the bootstrap identity for both values', async () => {
    expect(await market.operator.getAdmin()).toBe(ADMIN);
    expect(await market.operator.getFeeDestination()).toBe(ADMIN);
  });

  describe('setAdmin', () => {
    it('should reject a caller who is not the admin', async () => {
      const attempt = market.operator.setAdmin({ caller: OTHER }, OTHER);

      await expect(attempt).rejects.toThrow(AuthorizationError);
      await expect(attempt).rejects.toMatchObject({ code: ERROR_CODES.AUTHORIZATION });
      expect(await market.operator.getAdmin()).toBe(ADMIN);
    });

    it('should let the current admin hand over', async () => {
      await market.operator.setAdmin({ caller: ADMIN }, OTHER);

      expect(await market.operator.getAdmin()).toBe(OTHER);
      expect(market.events[market.events.length - 1]).toEqual({ type: 'ADMIN_CHANGED', admin: OTHER });
    });

    it('should revoke the previous admin', async () => {
      await market.operator.setAdmin({ caller: ADMIN }, OTHER);

      await expect(
        market.operator.setFeeDestination({ caller: ADMIN }, FEE_DESTINATION)
      ).rejects.toThrow(AuthorizationError);
      await expect(
        market.operator.setFeeDestination({ caller: OTHER }, FEE_DESTINATION)
      ).resolves.toBeUndefined();
    });
  });

  describe('setFeeDestination', () => {
    it('should update the fee destination', async () => {
      await market.operator.setFeeDestination({ caller: ADMIN }, FEE_DESTINATION);

      expect(await market.operator.getFeeDestination()).toBe(FEE_DESTINATION);
      expect(await market.operator.getAdmin()).toBe(ADMIN);
    });

    it('should reject a caller who is not the admin', async () => {
      await expect(
        market.operator.setFeeDestination({ caller: FEE_DESTINATION }, FEE_DESTINATION)
      ).rejects.toThrow(AuthorizationError);
      expect(await market.operator.getFeeDestination()).toBe(ADMIN);
    });
  });
});
