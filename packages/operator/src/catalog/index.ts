/**
 * Catalog Module
 */

export type { Product, AffiliateRequest } from './types.js';
export {
  ProductType,
  RequestStatus,
  MIN_PRICE,
  MAX_COMMISSION,
  toProductType,
  toRequestStatus,
} from './types.js';

export type {
  CatalogReader,
  CatalogWriter,
  ProductCatalogStore,
  Snapshottable,
  CatalogState,
} from './store.js';
export { InMemoryCatalogStore, membershipKey } from './store.js';

export { PostgresCatalogStore, migrateCatalog, CATALOG_SCHEMA_SQL } from './postgres-store.js';
