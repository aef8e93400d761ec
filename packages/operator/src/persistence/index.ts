/**
 * Persistence Module
 */

export type { ClientSource, Transactor, TransactionScope } from './transactor.js';
export { InMemoryTransactor, PostgresTransactor, MARKETPLACE_LOCK_KEY } from './transactor.js';
export { OperationLock } from './lock.js';
