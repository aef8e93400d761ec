/**
 * Request Lifecycle Manager
 *
 * Affiliate request state machine:
 *
 *   (none) --create--> PENDING --accept--> ACCEPTED (terminal)
 *                         |
 *                         +--cancel--> membership cleared, record kept
 *                         +--reject--> record and membership removed
 *
 * At most one active membership exists per (product, publisher) pair, and it
 * names the request holding it. A request whose pair membership names another
 * request (or none) was withdrawn: its record stays readable but every
 * transition and every purchase through it fails with StateConflict.
 */

import { assertCaller, type InvocationContext, type Principal } from '../boundaries/principal.js';
import { NotFoundError, StateConflict } from '../boundaries/errors.js';
import { RequestStatus, type AffiliateRequest } from '../catalog/types.js';
import type { TransactionScope } from '../persistence/transactor.js';

export class RequestLifecycleManager {
  constructor(private readonly operator: Principal) {}

  /**
   * Open a PENDING request. Returns the new request id.
   */
  async createRequest(
    scope: TransactionScope,
    ctx: InvocationContext,
    productId: number,
    publisher: Principal
  ): Promise<number> {
    assertCaller(ctx, publisher, 'request as this publisher');

    if (!(await scope.catalog.getProduct(productId))) {
      throw new NotFoundError('product', productId);
    }
    if (await scope.catalog.isRequested(productId, publisher)) {
      throw new StateConflict(
        `Publisher ${publisher} already has an active request for product ${productId}`
      );
    }

    const writer = scope.catalog.writer(this.operator);
    const requestId = await writer.nextRequestId();
    await writer.insertRequest(requestId, {
      productId,
      publisher,
      status: RequestStatus.PENDING,
    });
    await writer.addMembership(productId, publisher, requestId);

    return requestId;
  }

  /**
   * Withdraw a PENDING request. Only the duplicate-prevention membership is
   * cleared; the record itself stays in the table.
   */
  async cancelRequest(
    scope: TransactionScope,
    ctx: InvocationContext,
    requestId: number,
    publisher: Principal
  ): Promise<number> {
    const request = await this.loadRequest(scope, requestId);

    assertCaller(ctx, publisher, 'cancel as this publisher');
    assertCaller(ctx, request.publisher, `cancel request ${requestId}`);

    if (request.status !== RequestStatus.PENDING) {
      throw new StateConflict(`Request ${requestId} is not pending`);
    }
    await this.assertActive(scope, requestId, request);

    await scope.catalog.writer(this.operator).removeMembership(request.productId, request.publisher);
    return requestId;
  }

  /**
   * Approve a request. Accepting an already ACCEPTED request succeeds
   * without changing anything.
   */
  async acceptRequest(
    scope: TransactionScope,
    ctx: InvocationContext,
    requestId: number,
    producer: Principal
  ): Promise<number> {
    const request = await this.loadRequest(scope, requestId);
    await this.assertProducer(scope, ctx, request, producer, `accept request ${requestId}`);
    await this.assertActive(scope, requestId, request);

    if (request.status === RequestStatus.ACCEPTED) {
      return requestId;
    }

    await scope.catalog.writer(this.operator).updateRequest(requestId, {
      ...request,
      status: RequestStatus.ACCEPTED,
    });
    return requestId;
  }

  /**
   * Decline a request: the record is deleted and the membership cleared,
   * so the publisher may request the product again.
   */
  async rejectRequest(
    scope: TransactionScope,
    ctx: InvocationContext,
    requestId: number,
    producer: Principal
  ): Promise<number> {
    const request = await this.loadRequest(scope, requestId);
    await this.assertProducer(scope, ctx, request, producer, `reject request ${requestId}`);
    await this.assertActive(scope, requestId, request);

    const writer = scope.catalog.writer(this.operator);
    await writer.deleteRequest(requestId);
    await writer.removeMembership(request.productId, request.publisher);
    return requestId;
  }

  async getRequest(scope: TransactionScope, requestId: number): Promise<AffiliateRequest | null> {
    return scope.catalog.getRequest(requestId);
  }

  /**
   * Load a request or fail with NotFoundError.
   */
  async loadRequest(scope: TransactionScope, requestId: number): Promise<AffiliateRequest> {
    const request = await scope.catalog.getRequest(requestId);
    if (!request) {
      throw new NotFoundError('request', requestId);
    }
    return request;
  }

  /**
   * Fail with StateConflict unless `requestId` holds its pair's membership.
   */
  async assertActive(
    scope: TransactionScope,
    requestId: number,
    request: AffiliateRequest
  ): Promise<void> {
    const activeId = await scope.catalog.getActiveRequestId(request.productId, request.publisher);
    if (activeId !== requestId) {
      throw new StateConflict(`Request ${requestId} was withdrawn`);
    }
  }

  private async assertProducer(
    scope: TransactionScope,
    ctx: InvocationContext,
    request: AffiliateRequest,
    producer: Principal,
    action: string
  ): Promise<void> {
    const product = await scope.catalog.getProduct(request.productId);
    if (!product) {
      throw new NotFoundError('product', request.productId);
    }

    assertCaller(ctx, producer, `${action} as this producer`);
    assertCaller(ctx, product.producer, action);
  }
}
