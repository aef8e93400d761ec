/**
 * Unit of Work
 *
 * Every public operation runs inside `Transactor.run`:
 * - Serialized: one operation at a time, in arrival order
 * - Atomic: catalog writes and ledger transfers commit together or not at all
 */

import type { PoolClient } from 'pg';
import type { Principal } from '../boundaries/principal.js';
import type { ProductCatalogStore } from '../catalog/store.js';
import { InMemoryCatalogStore } from '../catalog/store.js';
import { PostgresCatalogStore } from '../catalog/postgres-store.js';
import type { AssetLedger, AssetMinter } from '../ledger/types.js';
import { InMemoryAssetLedger } from '../ledger/in-memory-ledger.js';
import { PostgresAssetLedger } from '../ledger/postgres-ledger.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { OperationLock } from './lock.js';

// =============================================================================
// INTERFACE
// =============================================================================

export interface TransactionScope {
  catalog: ProductCatalogStore;
  ledger: AssetLedger & AssetMinter;
}

export interface Transactor {
  /**
   * Execute `work` as one serialized, all-or-nothing unit.
   * Any error thrown by `work` discards all of its effects and is rethrown.
   */
  run<T>(label: string, work: (scope: TransactionScope) => Promise<T>): Promise<T>;
}

// =============================================================================
// IN-MEMORY IMPLEMENTATION
// =============================================================================

/**
 * Snapshot-and-restore transactor over the in-memory backends.
 */
export class InMemoryTransactor implements Transactor {
  private readonly lock = new OperationLock();

  constructor(
    private readonly catalog: InMemoryCatalogStore,
    private readonly ledger: InMemoryAssetLedger
  ) {}

  async run<T>(label: string, work: (scope: TransactionScope) => Promise<T>): Promise<T> {
    return this.lock.runExclusive(label, async () => {
      const catalogSnapshot = this.catalog.snapshot();
      const ledgerSnapshot = this.ledger.snapshot();

      try {
        return await work({ catalog: this.catalog, ledger: this.ledger });
      } catch (error) {
        this.catalog.restore(catalogSnapshot);
        this.ledger.restore(ledgerSnapshot);
        throw error;
      }
    });
  }
}

// =============================================================================
// POSTGRES IMPLEMENTATION
// =============================================================================

/**
 * Where PostgresTransactor checks out connections. `pg.Pool` satisfies it.
 */
export interface ClientSource {
  connect(): Promise<PoolClient>;
}

/**
 * Arbitrary constant identifying the marketplace's advisory lock.
 */
export const MARKETPLACE_LOCK_KEY = 7_340_021;

/**
 * One pooled client per operation, wrapped in BEGIN/COMMIT.
 *
 * The transaction-scoped advisory lock orders operations across processes
 * sharing the database; the in-process lock avoids holding idle pool
 * clients while waiting for it.
 */
export class PostgresTransactor implements Transactor {
  private readonly lock = new OperationLock();

  constructor(
    private readonly pool: ClientSource,
    private readonly operator: Principal,
    private readonly logger: Logger = createLogger()
  ) {}

  async run<T>(label: string, work: (scope: TransactionScope) => Promise<T>): Promise<T> {
    return this.lock.runExclusive(label, async () => {
      const client = await this.pool.connect();
      let broken: Error | undefined;
      try {
        await client.query('BEGIN');
        await client.query('SELECT pg_advisory_xact_lock($1)', [MARKETPLACE_LOCK_KEY]);

        const result = await work({
          catalog: new PostgresCatalogStore(client, this.operator),
          ledger: new PostgresAssetLedger(client),
        });

        await client.query('COMMIT');
        return result;
      } catch (error) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackError) {
          // The connection is unusable; it must not go back to the pool
          broken = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
          this.logger.error({ operation: label, error: broken }, 'Rollback failed');
        }
        throw error;
      } finally {
        client.release(broken);
      }
    });
  }
}
