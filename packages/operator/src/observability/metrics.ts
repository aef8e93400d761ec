/**
 * Metrics Interface
 *
 * Write-only signals for observability.
 *
 * The operator must never read metrics or act on them.
 * Default implementation is no-op.
 */

import type { MarketplaceErrorKind } from '../boundaries/errors.js';
import type { OperationName } from '../operator/types.js';

// =============================================================================
// METRICS INTERFACE
// =============================================================================

/**
 * Write-only metrics sink.
 * Implementations must never throw.
 */
export interface MarketplaceMetrics {
  /**
   * Operation committed.
   */
  operationCompleted(operation: OperationName, durationMs: number): void;

  /**
   * Operation rolled back. `kind` is INTERNAL for errors outside the taxonomy.
   */
  operationFailed(operation: OperationName, kind: MarketplaceErrorKind | 'INTERNAL'): void;

  /**
   * Purchase settled.
   */
  purchaseSettled(itemCount: number, total: bigint): void;
}

// =============================================================================
// NO-OP IMPLEMENTATION (Default)
// =============================================================================

export class NoOpMetrics implements MarketplaceMetrics {
  operationCompleted(_operation: OperationName, _durationMs: number): void {}
  operationFailed(_operation: OperationName, _kind: MarketplaceErrorKind | 'INTERNAL'): void {}
  purchaseSettled(_itemCount: number, _total: bigint): void {}
}

// =============================================================================
// CONSOLE METRICS (for development)
// =============================================================================

/**
 * One JSON line per signal on stdout.
 */
export class ConsoleMetrics implements MarketplaceMetrics {
  private log(category: string, event: string, data: Record<string, unknown>): void {
    console.log(JSON.stringify({
      timestamp: new Date().toISOString(),
      category,
      event,
      ...data,
    }));
  }

  operationCompleted(operation: OperationName, durationMs: number): void {
    this.log('operation', 'completed', { operation, durationMs });
  }

  operationFailed(operation: OperationName, kind: MarketplaceErrorKind | 'INTERNAL'): void {
    this.log('operation', 'failed', { operation, kind });
  }

  purchaseSettled(itemCount: number, total: bigint): void {
    this.log('purchase', 'settled', { itemCount, total: total.toString() });
  }
}
