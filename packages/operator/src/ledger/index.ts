/**
 * Ledger Module
 */

export type { AssetLedger, AssetMinter, MintRequest } from './types.js';
export { InMemoryAssetLedger } from './in-memory-ledger.js';
export type { LedgerState } from './in-memory-ledger.js';
export { PostgresAssetLedger, migrateLedger, LEDGER_SCHEMA_SQL } from './postgres-ledger.js';
