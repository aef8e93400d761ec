/**
 * Access Control Guard
 *
 * Two singletons: the protocol administrator and the platform fee
 * destination. Only the current administrator can replace either.
 */

import { assertCaller, type InvocationContext, type Principal } from '../boundaries/principal.js';
import type { TransactionScope } from '../persistence/transactor.js';

export class AccessControlGuard {
  /**
   * @param operator - identity this component writes to the catalog as
   */
  constructor(private readonly operator: Principal) {}

  async setAdmin(
    scope: TransactionScope,
    ctx: InvocationContext,
    newAdmin: Principal
  ): Promise<void> {
    await this.assertAdmin(scope, ctx, 'set the admin');
    await scope.catalog.writer(this.operator).setAdmin(newAdmin);
  }

  async setFeeDestination(
    scope: TransactionScope,
    ctx: InvocationContext,
    newDestination: Principal
  ): Promise<void> {
    await this.assertAdmin(scope, ctx, 'set the fee destination');
    await scope.catalog.writer(this.operator).setFeeDestination(newDestination);
  }

  async getAdmin(scope: TransactionScope): Promise<Principal> {
    return scope.catalog.getAdmin();
  }

  async getFeeDestination(scope: TransactionScope): Promise<Principal> {
    return scope.catalog.getFeeDestination();
  }

  private async assertAdmin(
    scope: TransactionScope,
    ctx: InvocationContext,
    action: string
  ): Promise<void> {
    assertCaller(ctx, await scope.catalog.getAdmin(), action);
  }
}
