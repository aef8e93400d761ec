/**
 * Operator Module
 *
 * Access control, product listings, affiliate request lifecycle and
 * purchase settlement behind one facade.
 */

export type {
  CartItem,
  SettlementSplit,
  ItemSettlement,
  PurchaseReceipt,
  OperationName,
} from './types.js';
export type { MarketplaceEvent, MarketplaceEventHandler } from './events.js';
export type { ProductMetadata } from './product-registry.js';
export type { MarketplaceOperatorOptions } from './operator.js';

export { AccessControlGuard } from './access-control.js';
export { ProductRegistry } from './product-registry.js';
export { RequestLifecycleManager } from './request-lifecycle.js';
export {
  PurchaseSettlementEngine,
  computeSplit,
  PLATFORM_FEE_BP,
  BASIS_POINTS,
} from './settlement.js';
export { MarketplaceOperator } from './operator.js';
