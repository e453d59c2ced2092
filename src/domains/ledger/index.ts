export * from './types';
export {
  LedgerError,
  insufficientStock,
  invalidArgument,
  isLedgerError,
  skuConflict,
  skuNotFound,
  toStorageError,
  type LedgerErrorCode
} from './errors';
export type { LedgerStore, LedgerTransaction, MovementPage } from './store';
export { MemoryLedgerStore, type MemoryLedgerStoreOptions } from './internal/memoryStore';
export { PgLedgerStore, type PgLedgerStoreOptions } from './internal/pgStore';
export { KeyedMutex } from './internal/keyedMutex';
export { createLedgerStore, type LedgerStoreHandle } from './createStore';
