/**
 * Operator Types
 */

import type { Principal } from '../boundaries/principal.js';

/**
 * One line of a purchase. Not persisted.
 */
export interface CartItem {
  /** Request id when `affiliate`, product id otherwise. */
  referenceId: number;
  affiliate: boolean;
  /** Units of the product asset to receive. */
  amount: bigint;
}

export interface SettlementSplit {
  feeShare: bigint;
  publisherShare: bigint;
  producerShare: bigint;
}

export interface ItemSettlement extends SettlementSplit {
  referenceId: number;
  productId: number;
  affiliate: boolean;
  amount: bigint;
  price: bigint;
  producer: Principal;
  publisher: Principal | null;
  feeDestination: Principal;
}

export interface PurchaseReceipt {
  id: string;              // UUID
  purchaser: Principal;
  shop: Principal;         // Validated shop context
  items: ItemSettlement[];
  total: bigint;           // Sum of item prices paid by the purchaser
  settledAt: number;       // Unix timestamp ms
}

export type OperationName =
  | 'setAdmin'
  | 'setFeeDestination'
  | 'createProduct'
  | 'createRequest'
  | 'cancelRequest'
  | 'acceptRequest'
  | 'rejectRequest'
  | 'purchase';
