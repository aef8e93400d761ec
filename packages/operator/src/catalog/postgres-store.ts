/**
 * PostgreSQL Catalog Store
 *
 * Runs on the client that owns the current transaction; the transactor
 * decides when to commit or roll back.
 *
 * Required schema: see CATALOG_SCHEMA_SQL.
 */

import type { PoolClient } from 'pg';
import { principal, type Principal } from '../boundaries/principal.js';
import { AuthorizationError, NotFoundError, StateConflict } from '../boundaries/errors.js';
import {
  toProductType,
  toRequestStatus,
  type AffiliateRequest,
  type Product,
} from './types.js';
import type { CatalogWriter, ProductCatalogStore } from './store.js';

export const CATALOG_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS products (
  id INTEGER PRIMARY KEY,
  producer TEXT NOT NULL,
  price NUMERIC NOT NULL CHECK (price >= 1),
  commission INTEGER NOT NULL CHECK (commission BETWEEN 0 AND 100),
  type SMALLINT NOT NULL CHECK (type IN (0, 1, 2)),
  destination TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS requests (
  id INTEGER PRIMARY KEY,
  product_id INTEGER NOT NULL REFERENCES products(id),
  publisher TEXT NOT NULL,
  status SMALLINT NOT NULL
);

CREATE TABLE IF NOT EXISTS request_memberships (
  product_id INTEGER NOT NULL,
  publisher TEXT NOT NULL,
  request_id INTEGER NOT NULL,
  PRIMARY KEY (product_id, publisher)
);

CREATE TABLE IF NOT EXISTS marketplace_settings (
  id SMALLINT PRIMARY KEY CHECK (id = 1),
  admin TEXT NOT NULL,
  fee_destination TEXT NOT NULL,
  last_request_id INTEGER NOT NULL DEFAULT 0
);
`;

// =============================================================================
// ROW TYPES
// =============================================================================

type ProductRow = {
  producer: string;
  price: string;
  commission: number;
  type: number;
  destination: string;
};

type RequestRow = {
  product_id: number;
  publisher: string;
  status: number;
};

type SettingsRow = {
  admin: string;
  fee_destination: string;
  last_request_id: number;
};

// =============================================================================
// SCHEMA BOOTSTRAP
// =============================================================================

/**
 * Create tables and seed the settings row with the bootstrap identity.
 * Existing settings are left untouched.
 */
export async function migrateCatalog(client: PoolClient, bootstrap: Principal): Promise<void> {
  await client.query(CATALOG_SCHEMA_SQL);
  await client.query(
    `INSERT INTO marketplace_settings (id, admin, fee_destination, last_request_id)
     VALUES (1, $1, $1, 0)
     ON CONFLICT (id) DO NOTHING`,
    [bootstrap]
  );
}

// =============================================================================
// STORE
// =============================================================================

export class PostgresCatalogStore implements ProductCatalogStore {
  constructor(
    private readonly client: PoolClient,
    private readonly operator: Principal
  ) {}

  async getProduct(productId: number): Promise<Product | null> {
    const result = await this.client.query<ProductRow>(
      'SELECT producer, price, commission, type, destination FROM products WHERE id = $1',
      [productId]
    );
    const row = result.rows[0];
    if (!row) return null;
    return {
      producer: principal(row.producer),
      price: BigInt(row.price),
      commission: row.commission,
      type: toProductType(row.type),
      destination: principal(row.destination),
    };
  }

  async getRequest(requestId: number): Promise<AffiliateRequest | null> {
    const result = await this.client.query<RequestRow>(
      'SELECT product_id, publisher, status FROM requests WHERE id = $1',
      [requestId]
    );
    const row = result.rows[0];
    if (!row) return null;
    return {
      productId: row.product_id,
      publisher: principal(row.publisher),
      status: toRequestStatus(row.status),
    };
  }

  async isRequested(productId: number, publisher: Principal): Promise<boolean> {
    const result = await this.client.query(
      'SELECT 1 FROM request_memberships WHERE product_id = $1 AND publisher = $2',
      [productId, publisher]
    );
    return result.rows.length > 0;
  }

  async getActiveRequestId(productId: number, publisher: Principal): Promise<number | null> {
    const result = await this.client.query<{ request_id: number }>(
      'SELECT request_id FROM request_memberships WHERE product_id = $1 AND publisher = $2',
      [productId, publisher]
    );
    return result.rows[0]?.request_id ?? null;
  }

  async getAdmin(): Promise<Principal> {
    return principal((await this.loadSettings()).admin);
  }

  async getFeeDestination(): Promise<Principal> {
    return principal((await this.loadSettings()).fee_destination);
  }

  async getLastRequestId(): Promise<number> {
    return (await this.loadSettings()).last_request_id;
  }

  writer(caller: Principal): CatalogWriter {
    if (caller !== this.operator) {
      throw new AuthorizationError(`${caller} may not write to the catalog`);
    }
    return new PostgresCatalogWriter(this.client);
  }

  private async loadSettings(): Promise<SettingsRow> {
    const result = await this.client.query<SettingsRow>(
      'SELECT admin, fee_destination, last_request_id FROM marketplace_settings WHERE id = 1'
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error('marketplace_settings is not initialized - run migrateCatalog first');
    }
    return row;
  }
}

class PostgresCatalogWriter implements CatalogWriter {
  constructor(private readonly client: PoolClient) {}

  async insertProduct(productId: number, product: Product): Promise<void> {
    const result = await this.client.query(
      `INSERT INTO products (id, producer, price, commission, type, destination)
       VALUES ($1, $2, $3, $4, $5, $6)
       ON CONFLICT (id) DO NOTHING`,
      [
        productId,
        product.producer,
        product.price.toString(),
        product.commission,
        product.type,
        product.destination,
      ]
    );
    if (result.rowCount === 0) {
      throw new StateConflict(`Product ${productId} already exists`);
    }
  }

  async insertRequest(requestId: number, request: AffiliateRequest): Promise<void> {
    const result = await this.client.query(
      `INSERT INTO requests (id, product_id, publisher, status)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (id) DO NOTHING`,
      [requestId, request.productId, request.publisher, request.status]
    );
    if (result.rowCount === 0) {
      throw new StateConflict(`Request ${requestId} already exists`);
    }
  }

  async updateRequest(requestId: number, request: AffiliateRequest): Promise<void> {
    const result = await this.client.query(
      'UPDATE requests SET product_id = $2, publisher = $3, status = $4 WHERE id = $1',
      [requestId, request.productId, request.publisher, request.status]
    );
    if (result.rowCount === 0) {
      throw new NotFoundError('request', requestId);
    }
  }

  async deleteRequest(requestId: number): Promise<void> {
    await this.client.query('DELETE FROM requests WHERE id = $1', [requestId]);
  }

  async addMembership(productId: number, publisher: Principal, requestId: number): Promise<void> {
    await this.client.query(
      `INSERT INTO request_memberships (product_id, publisher, request_id)
       VALUES ($1, $2, $3)
       ON CONFLICT (product_id, publisher) DO UPDATE SET request_id = EXCLUDED.request_id`,
      [productId, publisher, requestId]
    );
  }

  async removeMembership(productId: number, publisher: Principal): Promise<void> {
    await this.client.query(
      'DELETE FROM request_memberships WHERE product_id = $1 AND publisher = $2',
      [productId, publisher]
    );
  }

  async setAdmin(admin: Principal): Promise<void> {
    await this.client.query('UPDATE marketplace_settings SET admin = $1 WHERE id = 1', [admin]);
  }

  async setFeeDestination(destination: Principal): Promise<void> {
    await this.client.query(
      'UPDATE marketplace_settings SET fee_destination = $1 WHERE id = 1',
      [destination]
    );
  }

  async nextRequestId(): Promise<number> {
    const result = await this.client.query<{ last_request_id: number }>(
      `UPDATE marketplace_settings
       SET last_request_id = last_request_id + 1
       WHERE id = 1
       RETURNING last_request_id`
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error('marketplace_settings is not initialized - run migrateCatalog first');
    }
    return row.last_request_id;
  }
}
