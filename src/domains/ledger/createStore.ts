import type { Pool } from 'pg';
import type { AppConfig } from '../../config/appConfig';
import { createPool } from '../../db';
import { MemoryLedgerStore } from './internal/memoryStore';
import { PgLedgerStore } from './internal/pgStore';
import type { LedgerStore } from './store';

export type LedgerStoreHandle = {
  store: LedgerStore;
  /** Set only for the postgres store; shared with the analytics refresh. */
  pool: Pool | null;
};

export function createLedgerStore(
  config: Pick<AppConfig, 'ledgerStore' | 'databaseUrl' | 'lockTimeoutMs'>
): LedgerStoreHandle {
  if (config.ledgerStore === 'memory') {
    return { store: new MemoryLedgerStore({ lockTimeoutMs: config.lockTimeoutMs }), pool: null };
  }
  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL must be set before starting the API');
  }
  const pool = createPool(config.databaseUrl);
  return { store: new PgLedgerStore(pool, { lockTimeoutMs: config.lockTimeoutMs }), pool };
}
