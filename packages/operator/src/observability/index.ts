/**
 * Observability Module
 */

// Type-only exports
export type { MarketplaceMetrics } from './metrics.js';

// Value exports
export { NoOpMetrics, ConsoleMetrics } from './metrics.js';
