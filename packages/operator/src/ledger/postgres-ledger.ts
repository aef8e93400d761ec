/**
 * PostgreSQL Asset Ledger
 *
 * Conditional UPDATEs keep balances non-negative; the surrounding
 * transaction makes a sequence of transfers all-or-nothing.
 */

import type { PoolClient } from 'pg';
import type { Principal } from '../boundaries/principal.js';
import { TransferError, ValidationError } from '../boundaries/errors.js';
import type { AssetLedger, AssetMinter, MintRequest } from './types.js';

export const LEDGER_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS fund_balances (
  account TEXT PRIMARY KEY,
  balance NUMERIC NOT NULL CHECK (balance >= 0)
);

CREATE TABLE IF NOT EXISTS assets (
  id SERIAL PRIMARY KEY,
  uri TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS asset_balances (
  asset_id INTEGER NOT NULL REFERENCES assets(id),
  account TEXT NOT NULL,
  balance NUMERIC NOT NULL CHECK (balance >= 0),
  PRIMARY KEY (asset_id, account)
);
`;

export async function migrateLedger(client: PoolClient): Promise<void> {
  await client.query(LEDGER_SCHEMA_SQL);
}

export class PostgresAssetLedger implements AssetLedger, AssetMinter {
  constructor(private readonly client: PoolClient) {}

  async transferFunds(from: Principal, to: Principal, amount: bigint): Promise<void> {
    if (amount < 0n) {
      throw new TransferError('Cannot transfer a negative amount of funds');
    }
    if (amount === 0n) return;

    const debit = await this.client.query(
      `UPDATE fund_balances SET balance = balance - $2
       WHERE account = $1 AND balance >= $2`,
      [from, amount.toString()]
    );
    if (debit.rowCount === 0) {
      throw new TransferError(`Insufficient funds for ${from}: needs ${amount}`);
    }
    await this.client.query(
      `INSERT INTO fund_balances (account, balance) VALUES ($1, $2)
       ON CONFLICT (account) DO UPDATE SET balance = fund_balances.balance + EXCLUDED.balance`,
      [to, amount.toString()]
    );
  }

  async transferAsset(
    assetId: number,
    from: Principal,
    to: Principal,
    amount: bigint
  ): Promise<void> {
    if (amount < 0n) {
      throw new TransferError(`Cannot transfer a negative amount of asset ${assetId}`);
    }
    if (amount === 0n) return;

    const debit = await this.client.query(
      `UPDATE asset_balances SET balance = balance - $3
       WHERE asset_id = $1 AND account = $2 AND balance >= $3`,
      [assetId, from, amount.toString()]
    );
    if (debit.rowCount === 0) {
      throw new TransferError(`Insufficient asset ${assetId} for ${from}: needs ${amount}`);
    }
    await this.client.query(
      `INSERT INTO asset_balances (asset_id, account, balance) VALUES ($1, $2, $3)
       ON CONFLICT (asset_id, account) DO UPDATE SET balance = asset_balances.balance + EXCLUDED.balance`,
      [assetId, to, amount.toString()]
    );
  }

  async balanceOf(account: Principal): Promise<bigint> {
    const result = await this.client.query<{ balance: string }>(
      'SELECT balance FROM fund_balances WHERE account = $1',
      [account]
    );
    const row = result.rows[0];
    return row ? BigInt(row.balance) : 0n;
  }

  async assetBalanceOf(assetId: number, account: Principal): Promise<bigint> {
    const result = await this.client.query<{ balance: string }>(
      'SELECT balance FROM asset_balances WHERE asset_id = $1 AND account = $2',
      [assetId, account]
    );
    const row = result.rows[0];
    return row ? BigInt(row.balance) : 0n;
  }

  async mint(request: MintRequest): Promise<number> {
    if (request.amount < 1n) {
      throw new ValidationError('Mint amount must be at least 1');
    }
    const inserted = await this.client.query<{ id: number }>(
      'INSERT INTO assets (uri) VALUES ($1) RETURNING id',
      [request.uri]
    );
    const row = inserted.rows[0];
    if (!row) {
      throw new Error('Asset insert returned no id');
    }
    await this.client.query(
      'INSERT INTO asset_balances (asset_id, account, balance) VALUES ($1, $2, $3)',
      [row.id, request.recipient, request.amount.toString()]
    );
    return row.id;
  }

  async assetUri(assetId: number): Promise<string | null> {
    const result = await this.client.query<{ uri: string }>(
      'SELECT uri FROM assets WHERE id = $1',
      [assetId]
    );
    return result.rows[0]?.uri ?? null;
  }
}
