/**
 * Marketplace Application
 *
 * Bootstrap + lifecycle management.
 *
 * Lifecycle:
 * - On startup: migrate schema (PostgreSQL) or seed in-memory backends
 * - On shutdown: stop accepting requests, close database connections
 */

// Load environment variables from .env file
import 'dotenv/config';

import express, { type Express } from 'express';
import cors from 'cors';
import { Pool } from 'pg';

import { principal, type Principal } from './boundaries/principal.js';
import { InMemoryCatalogStore } from './catalog/store.js';
import { migrateCatalog } from './catalog/postgres-store.js';
import { InMemoryAssetLedger } from './ledger/in-memory-ledger.js';
import { migrateLedger } from './ledger/postgres-ledger.js';
import { InMemoryTransactor, PostgresTransactor, type Transactor } from './persistence/transactor.js';
import { MarketplaceOperator } from './operator/operator.js';
import type { MarketplaceEvent } from './operator/events.js';
import { ConsoleMetrics, NoOpMetrics } from './observability/metrics.js';
import { createRoutes, errorHandler } from './http/routes.js';
import { bigintReplacer, createLogger, isLogLevel, type Logger, type LogLevel } from './utils/logger.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface MarketplaceConfig {
  // Server
  port: number;
  host: string;

  // Storage
  databaseUrl: string;
  useInMemoryStore: boolean;

  // Identities
  bootstrapAdmin: Principal;   // Initial admin and fee destination
  operatorAddress: Principal;  // Only identity allowed to write the catalog

  // Observability
  logLevel: LogLevel;
  consoleMetrics: boolean;
}

const DEFAULT_BOOTSTRAP = '0x0000000000000000000000000000000000000001';
const DEFAULT_OPERATOR = '0x0000000000000000000000000000000000000002';

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): MarketplaceConfig {
  const logLevel = env.LOG_LEVEL ?? 'info';
  return {
    port: parseInt(env.PORT ?? '3000', 10),
    host: env.HOST ?? '0.0.0.0',
    databaseUrl: env.DATABASE_URL ?? 'postgresql://localhost:5432/marketplace',
    useInMemoryStore: env.USE_IN_MEMORY_STORE === 'true',
    bootstrapAdmin: principal(env.BOOTSTRAP_ADMIN ?? DEFAULT_BOOTSTRAP),
    operatorAddress: principal(env.OPERATOR_ADDRESS ?? DEFAULT_OPERATOR),
    logLevel: isLogLevel(logLevel) ? logLevel : 'info',
    consoleMetrics: env.CONSOLE_METRICS === 'true',
  };
}

// =============================================================================
// MARKETPLACE APPLICATION
// =============================================================================

export class MarketplaceApp {
  private config: MarketplaceConfig;
  private logger: Logger;
  private app: Express;
  private pool?: Pool;
  private server?: ReturnType<Express['listen']>;
  private shutdownPromise?: Promise<void>;

  constructor(config: MarketplaceConfig) {
    this.config = config;
    this.logger = createLogger({ level: config.logLevel, service: 'marketplace-operator' });
    this.app = express();
  }

  /**
   * Start the marketplace.
   *
   * 1. Initialize storage backends
   * 2. Build the operator and subscribe to its events
   * 3. Start HTTP server
   */
  async start(): Promise<void> {
    this.logger.info({}, 'Starting marketplace operator...');

    const transactor = await this.createTransactor();
    const operator = new MarketplaceOperator(transactor, {
      operator: this.config.operatorAddress,
      metrics: this.config.consoleMetrics ? new ConsoleMetrics() : new NoOpMetrics(),
      logger: this.logger,
    });
    operator.onEvent((event) => this.logEvent(event));

    // Setup HTTP server
    this.app.set('json replacer', bigintReplacer);
    this.app.use(cors());
    this.app.use(express.json({ limit: '1mb' }));
    this.app.use(createRoutes(operator, this.logger));
    this.app.use(errorHandler(this.logger));

    await new Promise<void>((resolve) => {
      this.server = this.app.listen(this.config.port, this.config.host, () => {
        this.logger.info(
          { port: this.config.port, host: this.config.host },
          'Marketplace HTTP server started'
        );
        resolve();
      });
    });

    this.setupShutdownHandlers();
    this.logger.info({}, 'Marketplace operator started successfully');
  }

  /**
   * Stop gracefully. Idempotent.
   */
  async stop(): Promise<void> {
    if (this.shutdownPromise) {
      return this.shutdownPromise;
    }

    this.shutdownPromise = this.doStop();
    return this.shutdownPromise;
  }

  private async doStop(): Promise<void> {
    this.logger.info({}, 'Stopping marketplace operator...');

    const server = this.server;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
      this.logger.info({}, 'HTTP server stopped');
    }

    if (this.pool) {
      await this.pool.end();
      this.logger.info({}, 'Database connections closed');
    }

    this.logger.info({}, 'Marketplace operator stopped');
  }

  private async createTransactor(): Promise<Transactor> {
    if (this.config.useInMemoryStore) {
      this.logger.warn({}, 'Using in-memory store - data is lost on restart');
      return new InMemoryTransactor(
        new InMemoryCatalogStore(this.config.operatorAddress, this.config.bootstrapAdmin),
        new InMemoryAssetLedger()
      );
    }

    const pool = new Pool({ connectionString: this.config.databaseUrl });
    this.pool = pool;

    const client = await pool.connect();
    try {
      await migrateCatalog(client, this.config.bootstrapAdmin);
      await migrateLedger(client);
    } finally {
      client.release();
    }
    this.logger.info({}, 'Database schema ready');

    return new PostgresTransactor(pool, this.config.operatorAddress, this.logger);
  }

  private logEvent(event: MarketplaceEvent): void {
    switch (event.type) {
      case 'ADMIN_CHANGED':
        this.logger.info({ admin: event.admin }, 'Admin changed');
        break;
      case 'FEE_DESTINATION_CHANGED':
        this.logger.info({ destination: event.destination }, 'Fee destination changed');
        break;
      case 'PRODUCT_CREATED':
        this.logger.info({ productId: event.productId, producer: event.producer }, 'Product created');
        break;
      case 'REQUEST_CREATED':
        this.logger.info(
          { requestId: event.requestId, productId: event.productId, publisher: event.publisher },
          'Request created'
        );
        break;
      case 'REQUEST_CANCELLED':
        this.logger.info({ requestId: event.requestId, publisher: event.publisher }, 'Request cancelled');
        break;
      case 'REQUEST_ACCEPTED':
        this.logger.info({ requestId: event.requestId, producer: event.producer }, 'Request accepted');
        break;
      case 'REQUEST_REJECTED':
        this.logger.info({ requestId: event.requestId, producer: event.producer }, 'Request rejected');
        break;
      case 'PURCHASE_SETTLED':
        this.logger.info(
          {
            receiptId: event.receipt.id,
            purchaser: event.receipt.purchaser,
            shop: event.receipt.shop,
            items: event.receipt.items.length,
            total: event.receipt.total,
          },
          'Purchase settled'
        );
        break;
      case 'OPERATION_FAILED':
        this.logger.warn({ operation: event.operation, error: event.error }, 'Operation failed');
        break;
    }
  }

  private setupShutdownHandlers(): void {
    const shutdown = async (signal: string) => {
      this.logger.info({ signal }, 'Received shutdown signal');
      await this.stop();
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));
  }
}

// =============================================================================
// ENTRY POINT
// =============================================================================

export async function main(): Promise<void> {
  const config = loadConfigFromEnv();
  const app = new MarketplaceApp(config);
  await app.start();
}

// Run if this is the main module
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((err) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
}
