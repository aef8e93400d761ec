/**
 * Marketplace Operator
 *
 * Public surface of the marketplace. Each operation:
 * 1. Runs inside one serialized, all-or-nothing unit of work
 * 2. Records a metric
 * 3. Emits an event once the outcome is final
 *
 * Components never see the transactor; they receive the scope of the
 * current unit of work.
 */

import type { InvocationContext, Principal } from '../boundaries/principal.js';
import { isMarketplaceError } from '../boundaries/errors.js';
import type { AffiliateRequest, Product, ProductType } from '../catalog/types.js';
import type { Transactor, TransactionScope } from '../persistence/transactor.js';
import type { MarketplaceMetrics } from '../observability/metrics.js';
import { NoOpMetrics } from '../observability/metrics.js';
import type { Logger } from '../utils/logger.js';
import { createLogger } from '../utils/logger.js';
import { AccessControlGuard } from './access-control.js';
import { ProductRegistry, type ProductMetadata } from './product-registry.js';
import { RequestLifecycleManager } from './request-lifecycle.js';
import { PurchaseSettlementEngine } from './settlement.js';
import type { MarketplaceEvent, MarketplaceEventHandler } from './events.js';
import type { CartItem, OperationName, PurchaseReceipt } from './types.js';

export interface MarketplaceOperatorOptions {
  /** Identity the operator writes to the catalog as. */
  operator: Principal;
  metrics?: MarketplaceMetrics;
  logger?: Logger;
}

export class MarketplaceOperator {
  private readonly access: AccessControlGuard;
  private readonly products: ProductRegistry;
  private readonly requests: RequestLifecycleManager;
  private readonly settlement: PurchaseSettlementEngine;
  private readonly metrics: MarketplaceMetrics;
  private readonly logger: Logger;
  private eventHandlers: MarketplaceEventHandler[] = [];

  constructor(
    private readonly transactor: Transactor,
    options: MarketplaceOperatorOptions
  ) {
    this.access = new AccessControlGuard(options.operator);
    this.products = new ProductRegistry(options.operator);
    this.requests = new RequestLifecycleManager(options.operator);
    this.settlement = new PurchaseSettlementEngine(this.requests);
    this.metrics = options.metrics ?? new NoOpMetrics();
    this.logger = options.logger ?? createLogger();
  }

  /**
   * Subscribe to marketplace events.
   */
  onEvent(handler: MarketplaceEventHandler): void {
    this.eventHandlers.push(handler);
  }

  // ===========================================================================
  // Access control
  // ===========================================================================

  async setAdmin(ctx: InvocationContext, newAdmin: Principal): Promise<void> {
    await this.execute('setAdmin', ctx, (scope) => this.access.setAdmin(scope, ctx, newAdmin));
    this.emit({ type: 'ADMIN_CHANGED', admin: newAdmin });
  }

  async setFeeDestination(ctx: InvocationContext, newDestination: Principal): Promise<void> {
    await this.execute('setFeeDestination', ctx, (scope) =>
      this.access.setFeeDestination(scope, ctx, newDestination)
    );
    this.emit({ type: 'FEE_DESTINATION_CHANGED', destination: newDestination });
  }

  async getAdmin(): Promise<Principal> {
    return this.read((scope) => this.access.getAdmin(scope));
  }

  async getFeeDestination(): Promise<Principal> {
    return this.read((scope) => this.access.getFeeDestination(scope));
  }

  // ===========================================================================
  // Products
  // ===========================================================================

  async createProduct(
    ctx: InvocationContext,
    producer: Principal,
    metadata: ProductMetadata
  ): Promise<number> {
    const productId = await this.execute('createProduct', ctx, (scope) =>
      this.products.createProduct(scope, ctx, producer, metadata)
    );
    this.emit({ type: 'PRODUCT_CREATED', productId, producer });
    return productId;
  }

  async getProduct(productId: number): Promise<Product | null> {
    return this.read((scope) => this.products.getProduct(scope, productId));
  }

  async getProducer(productId: number): Promise<Principal | null> {
    return this.read((scope) => this.products.getProducer(scope, productId));
  }

  async getPrice(productId: number): Promise<bigint | null> {
    return this.read((scope) => this.products.getPrice(scope, productId));
  }

  async getCommission(productId: number): Promise<number | null> {
    return this.read((scope) => this.products.getCommission(scope, productId));
  }

  async getType(productId: number): Promise<ProductType | null> {
    return this.read((scope) => this.products.getType(scope, productId));
  }

  async getDestination(productId: number): Promise<Principal | null> {
    return this.read((scope) => this.products.getDestination(scope, productId));
  }

  // ===========================================================================
  // Affiliate requests
  // ===========================================================================

  async createRequest(
    ctx: InvocationContext,
    productId: number,
    publisher: Principal
  ): Promise<number> {
    const requestId = await this.execute('createRequest', ctx, (scope) =>
      this.requests.createRequest(scope, ctx, productId, publisher)
    );
    this.emit({ type: 'REQUEST_CREATED', requestId, productId, publisher });
    return requestId;
  }

  async cancelRequest(
    ctx: InvocationContext,
    requestId: number,
    publisher: Principal
  ): Promise<number> {
    await this.execute('cancelRequest', ctx, (scope) =>
      this.requests.cancelRequest(scope, ctx, requestId, publisher)
    );
    this.emit({ type: 'REQUEST_CANCELLED', requestId, publisher });
    return requestId;
  }

  async acceptRequest(
    ctx: InvocationContext,
    requestId: number,
    producer: Principal
  ): Promise<number> {
    await this.execute('acceptRequest', ctx, (scope) =>
      this.requests.acceptRequest(scope, ctx, requestId, producer)
    );
    this.emit({ type: 'REQUEST_ACCEPTED', requestId, producer });
    return requestId;
  }

  async rejectRequest(
    ctx: InvocationContext,
    requestId: number,
    producer: Principal
  ): Promise<number> {
    await this.execute('rejectRequest', ctx, (scope) =>
      this.requests.rejectRequest(scope, ctx, requestId, producer)
    );
    this.emit({ type: 'REQUEST_REJECTED', requestId, producer });
    return requestId;
  }

  async getRequest(requestId: number): Promise<AffiliateRequest | null> {
    return this.read((scope) => this.requests.getRequest(scope, requestId));
  }

  // ===========================================================================
  // Purchases
  // ===========================================================================

  async purchase(
    ctx: InvocationContext,
    purchaser: Principal,
    shop: Principal,
    cart: CartItem[]
  ): Promise<PurchaseReceipt> {
    const receipt = await this.execute('purchase', ctx, (scope) =>
      this.settlement.purchase(scope, ctx, purchaser, shop, cart)
    );
    this.metrics.purchaseSettled(receipt.items.length, receipt.total);
    this.emit({ type: 'PURCHASE_SETTLED', receipt });
    return receipt;
  }

  // ===========================================================================
  // PRIVATE: Execution
  // ===========================================================================

  private async execute<T>(
    operation: OperationName,
    ctx: InvocationContext,
    work: (scope: TransactionScope) => Promise<T>
  ): Promise<T> {
    const startedAt = Date.now();
    try {
      const result = await this.transactor.run(operation, work);
      this.metrics.operationCompleted(operation, Date.now() - startedAt);
      return result;
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      const kind = isMarketplaceError(error) ? error.kind : 'INTERNAL';
      this.metrics.operationFailed(operation, kind);
      this.logger.debug({ operation, caller: ctx.caller, kind }, 'Operation rolled back');
      this.emit({ type: 'OPERATION_FAILED', operation, error });
      throw error;
    }
  }

  private async read<T>(work: (scope: TransactionScope) => Promise<T>): Promise<T> {
    return this.transactor.run('read', work);
  }

  private emit(event: MarketplaceEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (e) {
        this.logger.error({ event: event.type, error: e }, 'Event handler error');
      }
    }
  }
}
