/**
 * Product Registry
 *
 * Listing creation and per-attribute lookups. Minting is delegated to the
 * ledger; the minted asset id becomes the product id.
 */

import { assertCaller, type InvocationContext, type Principal } from '../boundaries/principal.js';
import { ValidationError } from '../boundaries/errors.js';
import {
  MAX_COMMISSION,
  MIN_PRICE,
  toProductType,
  type Product,
  type ProductType,
} from '../catalog/types.js';
import type { TransactionScope } from '../persistence/transactor.js';

export interface ProductMetadata {
  uri: string;
  price: bigint;
  amount: bigint;           // Units minted to `recipient`
  commission: number;
  type: number;             // Validated into ProductType
  recipient: Principal;
  destination: Principal;
}

export class ProductRegistry {
  constructor(private readonly operator: Principal) {}

  /**
   * Validate, mint and store a new product. Returns the product id.
   */
  async createProduct(
    scope: TransactionScope,
    ctx: InvocationContext,
    producer: Principal,
    metadata: ProductMetadata
  ): Promise<number> {
    assertCaller(ctx, producer, 'list products for this producer');

    if (metadata.price < MIN_PRICE) {
      throw new ValidationError(`Price must be at least ${MIN_PRICE}, got ${metadata.price}`);
    }
    if (
      !Number.isInteger(metadata.commission) ||
      metadata.commission < 0 ||
      metadata.commission > MAX_COMMISSION
    ) {
      throw new ValidationError(
        `Commission must be an integer between 0 and ${MAX_COMMISSION}, got ${metadata.commission}`
      );
    }
    const type = toProductType(metadata.type);
    if (metadata.amount < 1n) {
      throw new ValidationError(`Amount must be at least 1, got ${metadata.amount}`);
    }

    const productId = await scope.ledger.mint({
      uri: metadata.uri,
      amount: metadata.amount,
      recipient: metadata.recipient,
    });

    const product: Product = {
      producer,
      price: metadata.price,
      commission: metadata.commission,
      type,
      destination: metadata.destination,
    };
    await scope.catalog.writer(this.operator).insertProduct(productId, product);

    return productId;
  }

  // ===========================================================================
  // Read-only lookups (null when the product is unknown)
  // ===========================================================================

  async getProduct(scope: TransactionScope, productId: number): Promise<Product | null> {
    return scope.catalog.getProduct(productId);
  }

  async getProducer(scope: TransactionScope, productId: number): Promise<Principal | null> {
    return (await scope.catalog.getProduct(productId))?.producer ?? null;
  }

  async getPrice(scope: TransactionScope, productId: number): Promise<bigint | null> {
    return (await scope.catalog.getProduct(productId))?.price ?? null;
  }

  async getCommission(scope: TransactionScope, productId: number): Promise<number | null> {
    return (await scope.catalog.getProduct(productId))?.commission ?? null;
  }

  async getType(scope: TransactionScope, productId: number): Promise<ProductType | null> {
    return (await scope.catalog.getProduct(productId))?.type ?? null;
  }

  async getDestination(scope: TransactionScope, productId: number): Promise<Principal | null> {
    return (await scope.catalog.getProduct(productId))?.destination ?? null;
  }
}
