/**
 * Catalog Types
 *
 * Products and affiliate requests as stored by the catalog.
 */

import type { Principal } from '../boundaries/principal.js';
import { ValidationError } from '../boundaries/errors.js';

// =============================================================================
// PRODUCT
// =============================================================================

export enum ProductType {
  DIGITAL = 0,
  PRINT_ON_DEMAND = 1,
  PHYSICAL = 2,
}

export const MIN_PRICE = 1n;
export const MAX_COMMISSION = 100;

/**
 * Product attributes. Immutable once stored.
 * The id is assigned by the asset minter and is not part of the record.
 */
export interface Product {
  producer: Principal;
  price: bigint;            // Unit currency, >= 1
  commission: number;       // Integer percentage, 0..100
  type: ProductType;
  destination: Principal;   // Informational only; settlement pays the global fee destination
}

export function toProductType(value: number): ProductType {
  switch (value) {
    case ProductType.DIGITAL:
      return ProductType.DIGITAL;
    case ProductType.PRINT_ON_DEMAND:
      return ProductType.PRINT_ON_DEMAND;
    case ProductType.PHYSICAL:
      return ProductType.PHYSICAL;
    default:
      throw new ValidationError(`Invalid product type: ${value}`);
  }
}

// =============================================================================
// AFFILIATE REQUEST
// =============================================================================

/**
 * PENDING -> ACCEPTED is the only transition. Cancellation and rejection
 * remove the membership (and for rejection the record) instead of adding
 * a third status.
 */
export enum RequestStatus {
  PENDING = 0,
  ACCEPTED = 1,
}

export interface AffiliateRequest {
  productId: number;
  publisher: Principal;
  status: RequestStatus;
}

export function toRequestStatus(value: number): RequestStatus {
  if (value === RequestStatus.PENDING) return RequestStatus.PENDING;
  if (value === RequestStatus.ACCEPTED) return RequestStatus.ACCEPTED;
  throw new ValidationError(`Invalid request status: ${value}`);
}
