/**
 * Purchase Settlement Engine
 *
 * Splits each cart item's price between the platform fee destination, the
 * affiliate publisher (affiliate sales only) and the producer, then moves
 * the purchased units from producer to purchaser.
 *
 * Cart items are processed strictly left to right. The first failing item
 * aborts the purchase; the enclosing unit of work discards every transfer
 * already made for earlier items.
 */

import { v4 as uuidv4 } from 'uuid';
import { assertCaller, type InvocationContext, type Principal } from '../boundaries/principal.js';
import { AuthorizationError, NotFoundError, StateConflict, ValidationError } from '../boundaries/errors.js';
import { RequestStatus, type Product } from '../catalog/types.js';
import type { TransactionScope } from '../persistence/transactor.js';
import type { RequestLifecycleManager } from './request-lifecycle.js';
import type { CartItem, ItemSettlement, PurchaseReceipt, SettlementSplit } from './types.js';

// =============================================================================
// FEE SCHEDULE
// =============================================================================

/** Platform cut in basis points (1%). */
export const PLATFORM_FEE_BP = 100n;

export const BASIS_POINTS = 10_000n;

/**
 * Three-way split of a price. Integer division truncates.
 *
 * The commission is applied with the same basis-point divisor as the fee,
 * so a commission of 100 yields a publisher share of 1% of the price.
 *
 * Throws ValidationError if the fee and publisher share together exceed
 * the price (the producer share would go negative).
 */
export function computeSplit(
  price: bigint,
  commission: number,
  affiliate: boolean
): SettlementSplit {
  if (price < 1n) {
    throw new ValidationError(`Price must be at least 1, got ${price}`);
  }
  if (!Number.isInteger(commission) || commission < 0) {
    throw new ValidationError(`Commission must be a non-negative integer, got ${commission}`);
  }

  const feeShare = (price * PLATFORM_FEE_BP) / BASIS_POINTS;
  const publisherShare = affiliate ? (price * BigInt(commission)) / BASIS_POINTS : 0n;

  if (feeShare + publisherShare > price) {
    throw new ValidationError(
      `Fee ${feeShare} and publisher share ${publisherShare} exceed price ${price}`
    );
  }

  return {
    feeShare,
    publisherShare,
    producerShare: price - publisherShare - feeShare,
  };
}

// =============================================================================
// ENGINE
// =============================================================================

interface ResolvedItem {
  productId: number;
  product: Product;
  publisher: Principal | null;   // Confirmed publisher, affiliate items only
}

export class PurchaseSettlementEngine {
  constructor(private readonly requests: RequestLifecycleManager) {}

  /**
   * Settle a whole cart. Returns a receipt whose `shop` echoes the
   * validated shop context.
   */
  async purchase(
    scope: TransactionScope,
    ctx: InvocationContext,
    purchaser: Principal,
    shop: Principal,
    cart: CartItem[]
  ): Promise<PurchaseReceipt> {
    assertCaller(ctx, purchaser, 'purchase as this purchaser');

    if (cart.length === 0) {
      throw new ValidationError('Cart must contain at least one item');
    }

    const feeDestination = await scope.catalog.getFeeDestination();
    const items: ItemSettlement[] = [];
    let context = shop;
    let total = 0n;

    for (const item of cart) {
      if (item.amount < 1n) {
        throw new ValidationError(
          `Amount for item ${item.referenceId} must be at least 1, got ${item.amount}`
        );
      }

      const resolved = item.affiliate
        ? await this.resolveAffiliateItem(scope, item, context)
        : await this.resolveDirectItem(scope, item);

      // An affiliate item confirms the running context; a direct item passes it through
      context = resolved.publisher ?? context;

      const settlement = await this.settleItem(scope, purchaser, feeDestination, item, resolved);
      items.push(settlement);
      total += settlement.price;
    }

    return {
      id: uuidv4(),
      purchaser,
      shop: context,
      items,
      total,
      settledAt: Date.now(),
    };
  }

  // ===========================================================================
  // PRIVATE: Item resolution
  // ===========================================================================

  private async resolveAffiliateItem(
    scope: TransactionScope,
    item: CartItem,
    shop: Principal
  ): Promise<ResolvedItem> {
    const request = await this.requests.loadRequest(scope, item.referenceId);

    if (request.status !== RequestStatus.ACCEPTED) {
      throw new StateConflict(`Request ${item.referenceId} has not been accepted`);
    }
    await this.requests.assertActive(scope, item.referenceId, request);
    if (request.publisher !== shop) {
      throw new AuthorizationError(
        `Request ${item.referenceId} belongs to ${request.publisher}, not shop ${shop}`
      );
    }

    return {
      productId: request.productId,
      product: await this.loadProduct(scope, request.productId),
      publisher: request.publisher,
    };
  }

  private async resolveDirectItem(
    scope: TransactionScope,
    item: CartItem
  ): Promise<ResolvedItem> {
    return {
      productId: item.referenceId,
      product: await this.loadProduct(scope, item.referenceId),
      publisher: null,
    };
  }

  private async loadProduct(scope: TransactionScope, productId: number): Promise<Product> {
    const product = await scope.catalog.getProduct(productId);
    if (!product) {
      throw new NotFoundError('product', productId);
    }
    return product;
  }

  // ===========================================================================
  // PRIVATE: Transfers
  // ===========================================================================

  /**
   * Fee, publisher share, producer share, then the asset itself.
   */
  private async settleItem(
    scope: TransactionScope,
    purchaser: Principal,
    feeDestination: Principal,
    item: CartItem,
    resolved: ResolvedItem
  ): Promise<ItemSettlement> {
    const { product, publisher } = resolved;
    const split = computeSplit(product.price, product.commission, publisher !== null);

    await scope.ledger.transferFunds(purchaser, feeDestination, split.feeShare);
    if (publisher !== null && split.publisherShare > 0n) {
      await scope.ledger.transferFunds(purchaser, publisher, split.publisherShare);
    }
    await scope.ledger.transferFunds(purchaser, product.producer, split.producerShare);
    await scope.ledger.transferAsset(resolved.productId, product.producer, purchaser, item.amount);

    return {
      referenceId: item.referenceId,
      productId: resolved.productId,
      affiliate: item.affiliate,
      amount: item.amount,
      price: product.price,
      producer: product.producer,
      publisher,
      feeDestination,
      ...split,
    };
  }
}
