import type { Pool, PoolClient } from 'pg';
import { query, withTransaction } from '../../../db';
import { toNumber } from '../../../lib/numbers';
import { mapPgError } from '../../../lib/pgErrors';
import { LedgerError, skuConflict, toStorageError } from '../errors';
import type { LedgerStore, LedgerTransaction, MovementPage } from '../store';
import {
  DIRECTION_CODES,
  type Balance,
  type LedgerTotals,
  type Movement,
  type MovementDirection,
  type NewMovement,
  type Product,
  type ProductBalance
} from '../types';

type ProductRow = {
  sku: string;
  name: string;
  min_level: number;
  max_level: number;
  cost: string | number;
};

type BalanceRow = {
  sku: string;
  quantity: number;
  updated_at: Date;
};

type MovementRow = {
  id: string | number;
  sku: string;
  direction: string;
  quantity: number;
  occurred_at: Date;
};

type ProductBalanceRow = {
  sku: string;
  name: string;
  cost: string | number;
  min_level: number;
  quantity: number;
  updated_at: Date;
};

type LedgerTotalsRow = {
  sku: string;
  quantity: number;
  movement_total: string | number;
  movement_count: string | number;
};

export type PgLedgerStoreOptions = {
  lockTimeoutMs?: number;
};

function mapProduct(row: ProductRow): Product {
  return {
    sku: row.sku,
    name: row.name,
    minLevel: row.min_level,
    maxLevel: row.max_level,
    cost: toNumber(row.cost)
  };
}

function mapBalance(row: BalanceRow): Balance {
  return {
    sku: row.sku,
    quantity: row.quantity,
    lastUpdated: row.updated_at
  };
}

function mapDirection(code: string): MovementDirection {
  if (code === DIRECTION_CODES.inbound) return 'inbound';
  if (code === DIRECTION_CODES.outbound) return 'outbound';
  throw new LedgerError('STORAGE_ERROR', `Unknown movement direction "${code}" in stock_movements.`);
}

function mapMovement(row: MovementRow): Movement {
  return {
    id: toNumber(row.id),
    sku: row.sku,
    direction: mapDirection(row.direction),
    quantity: row.quantity,
    occurredAt: row.occurred_at
  };
}

const PRODUCT_COLUMNS = 'sku, name, min_level, max_level, cost';
const BALANCE_COLUMNS = 'sku, quantity, updated_at';
const MOVEMENT_COLUMNS = 'id, sku, direction, quantity, occurred_at';

class PgLedgerTransaction implements LedgerTransaction {
  constructor(private readonly client: PoolClient) {}

  async findProduct(sku: string): Promise<Product | null> {
    const res = await this.client.query<ProductRow>(
      `SELECT ${PRODUCT_COLUMNS} FROM products WHERE sku = $1`,
      [sku]
    );
    if (res.rowCount === 0) return null;
    return mapProduct(res.rows[0]);
  }

  async insertProduct(product: Product): Promise<void> {
    try {
      await this.client.query(
        `INSERT INTO products (sku, name, min_level, max_level, cost, created_at)
         VALUES ($1, $2, $3, $4, $5, now())`,
        [product.sku, product.name, product.minLevel, product.maxLevel, product.cost]
      );
    } catch (error) {
      const mapped = mapPgError(error, { unique: () => skuConflict(product.sku) });
      throw mapped ?? error;
    }
  }

  async insertBalance(sku: string, at: Date): Promise<Balance> {
    const res = await this.client.query<BalanceRow>(
      `INSERT INTO stock_balances (sku, quantity, updated_at)
       VALUES ($1, 0, $2)
       RETURNING ${BALANCE_COLUMNS}`,
      [sku, at]
    );
    return mapBalance(res.rows[0]);
  }

  async lockBalance(sku: string): Promise<Balance | null> {
    const res = await this.client.query<BalanceRow>(
      `SELECT ${BALANCE_COLUMNS} FROM stock_balances WHERE sku = $1 FOR UPDATE`,
      [sku]
    );
    if (res.rowCount === 0) return null;
    return mapBalance(res.rows[0]);
  }

  async appendMovement(movement: NewMovement): Promise<Movement> {
    const res = await this.client.query<MovementRow>(
      `INSERT INTO stock_movements (sku, direction, quantity, occurred_at)
       VALUES ($1, $2, $3, $4)
       RETURNING ${MOVEMENT_COLUMNS}`,
      [movement.sku, DIRECTION_CODES[movement.direction], movement.quantity, movement.occurredAt]
    );
    return mapMovement(res.rows[0]);
  }

  async updateBalance(sku: string, quantity: number, at: Date): Promise<Balance> {
    const res = await this.client.query<BalanceRow>(
      `UPDATE stock_balances
          SET quantity = $2,
              updated_at = $3
        WHERE sku = $1
      RETURNING ${BALANCE_COLUMNS}`,
      [sku, quantity, at]
    );
    if (res.rowCount === 0) {
      throw new LedgerError('STORAGE_ERROR', `No balance row for ${sku}.`, { sku });
    }
    return mapBalance(res.rows[0]);
  }
}

/**
 * Ledger storage on PostgreSQL. The per-SKU lock is the balance row lock
 * taken by `SELECT ... FOR UPDATE`, released by COMMIT or ROLLBACK.
 */
export class PgLedgerStore implements LedgerStore {
  readonly kind = 'postgres';
  private readonly lockTimeoutMs: number;

  constructor(
    private readonly pool: Pool,
    options: PgLedgerStoreOptions = {}
  ) {
    this.lockTimeoutMs = options.lockTimeoutMs ?? 0;
  }

  async transaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
    try {
      return await withTransaction(this.pool, async (client) => {
        if (this.lockTimeoutMs > 0) {
          await client.query("SELECT set_config('lock_timeout', $1, true)", [`${Math.floor(this.lockTimeoutMs)}ms`]);
        }
        return work(new PgLedgerTransaction(client));
      });
    } catch (error) {
      const mapped = mapPgError(error, {
        lockNotAvailable: () =>
          new LedgerError('STORAGE_ERROR', 'Timed out waiting for a balance lock.', undefined, error)
      });
      throw toStorageError(mapped ?? error, 'transaction');
    }
  }

  async findProduct(sku: string): Promise<Product | null> {
    const res = await query<ProductRow>(this.pool, `SELECT ${PRODUCT_COLUMNS} FROM products WHERE sku = $1`, [sku]);
    if (res.rowCount === 0) return null;
    return mapProduct(res.rows[0]);
  }

  async findBalance(sku: string): Promise<Balance | null> {
    const res = await query<BalanceRow>(
      this.pool,
      `SELECT ${BALANCE_COLUMNS} FROM stock_balances WHERE sku = $1`,
      [sku]
    );
    if (res.rowCount === 0) return null;
    return mapBalance(res.rows[0]);
  }

  async listProductBalances(): Promise<ProductBalance[]> {
    const res = await query<ProductBalanceRow>(
      this.pool,
      `SELECT p.sku, p.name, p.cost, p.min_level, b.quantity, b.updated_at
         FROM products p
         JOIN stock_balances b ON b.sku = p.sku
        ORDER BY p.sku`
    );
    return res.rows.map((row) => ({
      sku: row.sku,
      name: row.name,
      cost: toNumber(row.cost),
      minLevel: row.min_level,
      balance: row.quantity,
      lastUpdated: row.updated_at
    }));
  }

  async listMovements(sku: string, page: MovementPage): Promise<Movement[]> {
    const res = await query<MovementRow>(
      this.pool,
      `SELECT ${MOVEMENT_COLUMNS}
         FROM stock_movements
        WHERE sku = $1
        ORDER BY id DESC
        LIMIT $2 OFFSET $3`,
      [sku, page.limit, page.offset]
    );
    return res.rows.map(mapMovement);
  }

  async ledgerTotals(): Promise<LedgerTotals[]> {
    const res = await query<LedgerTotalsRow>(
      this.pool,
      `SELECT b.sku,
              b.quantity,
              COALESCE(SUM(CASE WHEN m.direction = 'E' THEN m.quantity ELSE -m.quantity END), 0) AS movement_total,
              COUNT(m.id) AS movement_count
         FROM stock_balances b
         LEFT JOIN stock_movements m ON m.sku = b.sku
        GROUP BY b.sku, b.quantity
        ORDER BY b.sku`
    );
    return res.rows.map((row) => ({
      sku: row.sku,
      balance: row.quantity,
      movementTotal: toNumber(row.movement_total),
      movementCount: toNumber(row.movement_count)
    }));
  }

  async ping(): Promise<void> {
    await query(this.pool, 'SELECT 1');
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
