/**
 * Purchase Settlement Tests
 *
 * Proves:
 * - fee + publisher share + producer share always equals the price
 * - Affiliate items need an ACCEPTED request owned by the shop
 * - A withdrawn request never earns commission
 * - A failing item aborts the whole cart with no transfers applied
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  AuthorizationError,
  NotFoundError,
  StateConflict,
  TransferError,
  ValidationError,
} from '../../src/boundaries/errors.js';
import { computeSplit } from '../../src/operator/settlement.js';
import {
  createMarketplace,
  metadata,
  ADMIN,
  FEE_DESTINATION,
  OPERATOR,
  OTHER,
  PRODUCER,
  PUBLISHER,
  PURCHASER,
} from './fixtures.js';

describe('computeSplit', () => {
  it('should split an affiliate sale of price 1000 at commission 10', () => {
    expect(computeSplit(1000n, 10, true)).toEqual({
      feeShare: 10n,
      publisherShare: 1n,
      producerShare: 989n,
    });
  });

  it('should give the publisher nothing on a direct sale', () => {
    expect(computeSplit(1000n, 10, false)).toEqual({
      feeShare: 10n,
      publisherShare: 0n,
      producerShare: 990n,
    });
  });

  it('should truncate both shares', () => {
    const split = computeSplit(12345n, 37, true);

    expect(split.feeShare).toBe(123n);
    expect(split.publisherShare).toBe(45n);
    expect(split.producerShare).toBe(12177n);
    expect(split.feeShare + split.publisherShare + split.producerShare).toBe(12345n);
  });

  it('should leave the whole price to the producer when shares round to zero', () => {
    expect(computeSplit(99n, 100, true)).toEqual({
      feeShare: 0n,
      publisherShare: 0n,
      producerShare: 99n,
    });
  });

  it('should conserve value across prices and commissions', () => {
    for (const price of [1n, 7n, 100n, 999n, 10_000n, 1_234_567n]) {
      for (const commission of [0, 1, 50, 100]) {
        const split = computeSplit(price, commission, true);
        expect(split.feeShare + split.publisherShare + split.producerShare).toBe(price);
        expect(split.producerShare >= 0n).toBe(true);
      }
    }
  });

  it('should reject a split that would make the producer share negative', () => {
    expect(() => computeSplit(100n, 20_000, true)).toThrow(ValidationError);
  });

  it('should reject a price below 1', () => {
    expect(() => computeSplit(0n, 10, false)).toThrow(ValidationError);
  });

  it('should reject a negative commission', () => {
    expect(() => computeSplit(1000n, -1, true)).toThrow(ValidationError);
  });
});

describe('PurchaseSettlementEngine', () => {
  let market: ReturnType<typeof createMarketplace>;
  let productId: number;
  let requestId: number;

  beforeEach(async () => {
    market = createMarketplace();
    const { operator, ledger } = market;

    await operator.setFeeDestination({ caller: ADMIN }, FEE_DESTINATION);
    productId = await operator.createProduct({ caller: PRODUCER }, PRODUCER, metadata());
    requestId = await operator.createRequest({ caller: PUBLISHER }, productId, PUBLISHER);
    await operator.acceptRequest({ caller: PRODUCER }, requestId, PRODUCER);

    ledger.credit(PURCHASER, 5000n);
  });

  async function balances() {
    const { ledger } = market;
    return {
      purchaser: await ledger.balanceOf(PURCHASER),
      fee: await ledger.balanceOf(FEE_DESTINATION),
      publisher: await ledger.balanceOf(PUBLISHER),
      producer: await ledger.balanceOf(PRODUCER),
      purchaserUnits: await ledger.assetBalanceOf(productId, PURCHASER),
      producerUnits: await ledger.assetBalanceOf(productId, PRODUCER),
    };
  }

  describe('Affiliate purchase', () => {
    it('should pay fee, publisher and producer and deliver the units', async () => {
      const receipt = await market.operator.purchase(
        { caller: PURCHASER },
        PURCHASER,
        PUBLISHER,
        [{ referenceId: requestId, affiliate: true, amount: 2n }]
      );

      expect(await balances()).toEqual({
        purchaser: 4000n,
        fee: 10n,
        publisher: 1n,
        producer: 989n,
        purchaserUnits: 2n,
        producerUnits: 8n,
      });
      expect(receipt.shop).toBe(PUBLISHER);
      expect(receipt.total).toBe(1000n);
      expect(receipt.items).toHaveLength(1);
      expect(receipt.items[0]).toMatchObject({
        referenceId: requestId,
        productId,
        affiliate: true,
        publisher: PUBLISHER,
        feeDestination: FEE_DESTINATION,
        feeShare: 10n,
        publisherShare: 1n,
        producerShare: 989n,
      });
    });

    it('should reject a request that is still pending', async () => {
      const other = await market.operator.createRequest({ caller: OTHER }, productId, OTHER);

      await expect(
        market.operator.purchase({ caller: PURCHASER }, PURCHASER, OTHER, [
          { referenceId: other, affiliate: true, amount: 1n },
        ])
      ).rejects.toThrow(StateConflict);
    });

    it('should reject when the shop is not the request publisher', async () => {
      await expect(
        market.operator.purchase({ caller: PURCHASER }, PURCHASER, OTHER, [
          { referenceId: requestId, affiliate: true, amount: 1n },
        ])
      ).rejects.toThrow(AuthorizationError);

      expect((await balances()).purchaser).toBe(5000n);
    });

    it('should pay commission only through the request that replaced a cancelled one', async () => {
      const secondProduct = await market.operator.createProduct({ caller: PRODUCER }, PRODUCER, metadata());
      const cancelled = await market.operator.createRequest({ caller: PUBLISHER }, secondProduct, PUBLISHER);
      await market.operator.cancelRequest({ caller: PUBLISHER }, cancelled, PUBLISHER);
      const replacement = await market.operator.createRequest({ caller: PUBLISHER }, secondProduct, PUBLISHER);

      await expect(
        market.operator.acceptRequest({ caller: PRODUCER }, cancelled, PRODUCER)
      ).rejects.toThrow(StateConflict);
      await market.operator.acceptRequest({ caller: PRODUCER }, replacement, PRODUCER);

      await expect(
        market.operator.purchase({ caller: PURCHASER }, PURCHASER, PUBLISHER, [
          { referenceId: cancelled, affiliate: true, amount: 1n },
        ])
      ).rejects.toThrow(StateConflict);
      expect((await balances()).publisher).toBe(0n);

      await market.operator.purchase({ caller: PURCHASER }, PURCHASER, PUBLISHER, [
        { referenceId: replacement, affiliate: true, amount: 1n },
      ]);
      expect((await balances()).publisher).toBe(1n);
    });

    it('should reject an accepted request that no longer holds its membership', async () => {
      await market.catalog.writer(OPERATOR).removeMembership(productId, PUBLISHER);

      await expect(
        market.operator.purchase({ caller: PURCHASER }, PURCHASER, PUBLISHER, [
          { referenceId: requestId, affiliate: true, amount: 1n },
        ])
      ).rejects.toThrow(`Request ${requestId} was withdrawn`);
      expect((await balances()).purchaser).toBe(5000n);
    });

    it('should reject an unknown request id', async () => {
      await expect(
        market.operator.purchase({ caller: PURCHASER }, PURCHASER, PUBLISHER, [
          { referenceId: 99, affiliate: true, amount: 1n },
        ])
      ).rejects.toThrow(NotFoundError);
    });
  });

  describe('Direct purchase', () => {
    it('should split between fee destination and producer only', async () => {
      const receipt = await market.operator.purchase(
        { caller: PURCHASER },
        PURCHASER,
        OTHER,
        [{ referenceId: productId, affiliate: false, amount: 1n }]
      );

      expect(await balances()).toEqual({
        purchaser: 4000n,
        fee: 10n,
        publisher: 0n,
        producer: 990n,
        purchaserUnits: 1n,
        producerUnits: 9n,
      });
      expect(receipt.shop).toBe(OTHER);
      expect(receipt.items[0].publisher).toBeNull();
      expect(receipt.items[0].publisherShare).toBe(0n);
    });

    it('should reject an unknown product id', async () => {
      await expect(
        market.operator.purchase({ caller: PURCHASER }, PURCHASER, OTHER, [
          { referenceId: 42, affiliate: false, amount: 1n },
        ])
      ).rejects.toThrow(NotFoundError);
    });
  });

  describe('Atomicity', () => {
    it('should apply no transfers when a later item fails', async () => {
      const second = await market.operator.createProduct(
        { caller: PRODUCER },
        PRODUCER,
        metadata({ uri: 'ipfs://second' })
      );
      const pending = await market.operator.createRequest({ caller: PUBLISHER }, second, PUBLISHER);

      await expect(
        market.operator.purchase({ caller: PURCHASER }, PURCHASER, PUBLISHER, [
          { referenceId: productId, affiliate: false, amount: 1n },
          { referenceId: pending, affiliate: true, amount: 1n },
        ])
      ).rejects.toThrow(StateConflict);

      expect(await balances()).toEqual({
        purchaser: 5000n,
        fee: 0n,
        publisher: 0n,
        producer: 0n,
        purchaserUnits: 0n,
        producerUnits: 10n,
      });
    });

    it('should roll back earlier legs when the purchaser runs out of funds', async () => {
      market.ledger.credit(OTHER, 500n);

      await expect(
        market.operator.purchase({ caller: OTHER }, OTHER, PUBLISHER, [
          { referenceId: requestId, affiliate: true, amount: 1n },
        ])
      ).rejects.toThrow(TransferError);

      expect(await market.ledger.balanceOf(OTHER)).toBe(500n);
      expect(await market.ledger.balanceOf(FEE_DESTINATION)).toBe(0n);
      expect(await market.ledger.balanceOf(PUBLISHER)).toBe(0n);
    });

    it('should roll back payments when the producer lacks the units', async () => {
      await expect(
        market.operator.purchase({ caller: PURCHASER }, PURCHASER, PUBLISHER, [
          { referenceId: requestId, affiliate: true, amount: 11n },
        ])
      ).rejects.toThrow(TransferError);

      expect(await balances()).toEqual({
        purchaser: 5000n,
        fee: 0n,
        publisher: 0n,
        producer: 0n,
        purchaserUnits: 0n,
        producerUnits: 10n,
      });
    });

    it('should settle every item of a multi-item cart', async () => {
      const receipt = await market.operator.purchase(
        { caller: PURCHASER },
        PURCHASER,
        PUBLISHER,
        [
          { referenceId: productId, affiliate: false, amount: 1n },
          { referenceId: requestId, affiliate: true, amount: 3n },
        ]
      );

      expect(receipt.total).toBe(2000n);
      expect(await balances()).toEqual({
        purchaser: 3000n,
        fee: 20n,
        publisher: 1n,
        producer: 1979n,
        purchaserUnits: 4n,
        producerUnits: 6n,
      });
    });
  });

  describe('Preconditions', () => {
    it('should reject a caller other than the purchaser', async () => {
      await expect(
        market.operator.purchase({ caller: OTHER }, PURCHASER, PUBLISHER, [
          { referenceId: requestId, affiliate: true, amount: 1n },
        ])
      ).rejects.toThrow(AuthorizationError);
    });

    it('should reject an empty cart', async () => {
      await expect(
        market.operator.purchase({ caller: PURCHASER }, PURCHASER, PUBLISHER, [])
      ).rejects.toThrow(ValidationError);
    });

    it('should reject a zero amount', async () => {
      await expect(
        market.operator.purchase({ caller: PURCHASER }, PURCHASER, PUBLISHER, [
          { referenceId: requestId, affiliate: true, amount: 0n },
        ])
      ).rejects.toThrow(ValidationError);
    });
  });

  describe('Events', () => {
    it('should emit PURCHASE_SETTLED with the receipt', async () => {
      const receipt = await market.operator.purchase(
        { caller: PURCHASER },
        PURCHASER,
        PUBLISHER,
        [{ referenceId: requestId, affiliate: true, amount: 1n }]
      );

      expect(market.events[market.events.length - 1]).toEqual({
        type: 'PURCHASE_SETTLED',
        receipt,
      });
    });

    it('should emit OPERATION_FAILED when the purchase is rejected', async () => {
      await expect(
        market.operator.purchase({ caller: OTHER }, PURCHASER, PUBLISHER, [
          { referenceId: requestId, affiliate: true, amount: 1n },
        ])
      ).rejects.toThrow(AuthorizationError);

      const last = market.events[market.events.length - 1];
      expect(last.type).toBe('OPERATION_FAILED');
      expect(last.type === 'OPERATION_FAILED' && last.operation).toBe('purchase');
    });
  });
});
