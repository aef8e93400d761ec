/**
 * Affiliate Marketplace Operator
 *
 * Producers list products, publishers request to sell them, purchasers buy
 * carts whose value is split between the platform, the publisher and the
 * producer in one atomic settlement.
 */

export * from './boundaries/index.js';
export * from './catalog/index.js';
export * from './ledger/index.js';
export * from './persistence/index.js';
export * from './operator/index.js';
export * from './observability/index.js';
export * from './http/index.js';
export * from './utils/index.js';
export { MarketplaceApp, loadConfigFromEnv, main } from './app.js';
export type { MarketplaceConfig } from './app.js';
