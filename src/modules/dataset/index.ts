/**
 * Dataset module exports
 */

// Core
export {
  CATEGORIES,
  REGIONS,
  SEGMENTS,
  PAYMENT_METHODS,
  isMember,
  type Category,
  type Region,
  type Segment,
  type PaymentMethod,
  type Transaction,
  type Customer,
  type MergedTransaction,
  type DatasetTables,
  type TableName,
} from './core/types.js';
export {
  parseIsoDate,
  monthKey,
  isWithin,
  compareIsoDates,
  type IsoDate,
  type DateWindow,
} from './core/dates.js';
export type { DatasetLoadError } from './core/errors.js';
export { createSnapshot, type DatasetSnapshot } from './core/snapshot.js';
export { computeDateAnchor, type DateAnchor } from './core/date-anchor.js';
export { createInsightsContext, type InsightsContext } from './core/context.js';
export type { ContextLoader, ContextProvider } from './core/ports.js';

// Shell
export {
  loadDataset,
  readDatasetTables,
  TRANSACTIONS_FILE,
  CUSTOMERS_FILE,
} from './shell/repo/csv-loader.js';
export { createContextProvider, type ContextProviderDeps } from './shell/context-provider.js';
