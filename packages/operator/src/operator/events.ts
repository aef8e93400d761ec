/**
 * Marketplace Events
 *
 * Emitted by MarketplaceOperator after an operation commits, or after it
 * fails. Handlers observe; they cannot affect the outcome.
 */

import type { Principal } from '../boundaries/principal.js';
import type { OperationName, PurchaseReceipt } from './types.js';

export type MarketplaceEvent =
  | { type: 'ADMIN_CHANGED'; admin: Principal }
  | { type: 'FEE_DESTINATION_CHANGED'; destination: Principal }
  | { type: 'PRODUCT_CREATED'; productId: number; producer: Principal }
  | { type: 'REQUEST_CREATED'; requestId: number; productId: number; publisher: Principal }
  | { type: 'REQUEST_CANCELLED'; requestId: number; publisher: Principal }
  | { type: 'REQUEST_ACCEPTED'; requestId: number; producer: Principal }
  | { type: 'REQUEST_REJECTED'; requestId: number; producer: Principal }
  | { type: 'PURCHASE_SETTLED'; receipt: PurchaseReceipt }
  | { type: 'OPERATION_FAILED'; operation: OperationName; error: Error };

export type MarketplaceEventHandler = (event: MarketplaceEvent) => void;
