/**
 * Shared test fixtures: identities and an in-memory marketplace.
 */

import { principal, type Principal } from '../../src/boundaries/principal.js';
import { InMemoryCatalogStore } from '../../src/catalog/store.js';
import { ProductType } from '../../src/catalog/types.js';
import { InMemoryAssetLedger } from '../../src/ledger/in-memory-ledger.js';
import { InMemoryTransactor } from '../../src/persistence/transactor.js';
import { MarketplaceOperator } from '../../src/operator/operator.js';
import type { ProductMetadata } from '../../src/operator/product-registry.js';
import type { MarketplaceEvent } from '../../src/operator/events.js';
import { createLogger } from '../../src/utils/logger.js';

export function address(suffix: string): Principal {
  return principal(`0x${suffix.padStart(40, '0')}`);
}

export const OPERATOR = address('0f');
export const ADMIN = address('a1');
export const PRODUCER = address('b1');
export const PUBLISHER = address('c1');
export const PURCHASER = address('d1');
export const FEE_DESTINATION = address('e1');
export const OTHER = address('f1');

export function createMarketplace() {
  const catalog = new InMemoryCatalogStore(OPERATOR, ADMIN);
  const ledger = new InMemoryAssetLedger();
  const transactor = new InMemoryTransactor(catalog, ledger);
  const operator = new MarketplaceOperator(transactor, {
    operator: OPERATOR,
    logger: createLogger({ level: 'error', sink: () => {} }),
  });
  const events: MarketplaceEvent[] = [];
  operator.onEvent((event) => events.push(event));

  return { catalog, ledger, transactor, operator, events };
}

export function metadata(overrides: Partial<ProductMetadata> = {}): ProductMetadata {
  return {
    uri: 'ipfs://test-product',
    price: 1000n,
    amount: 10n,
    commission: 10,
    type: ProductType.DIGITAL,
    recipient: PRODUCER,
    destination: PRODUCER,
    ...overrides,
  };
}
