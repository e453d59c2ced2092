import { LedgerError, skuConflict, toStorageError } from '../errors';
import type { LedgerStore, LedgerTransaction, MovementPage } from '../store';
import {
  signedQuantity,
  type Balance,
  type LedgerTotals,
  type Movement,
  type NewMovement,
  type Product,
  type ProductBalance
} from '../types';
import { TimeoutError } from '../../../lib/timeouts';
import { KeyedMutex, type Release } from './keyedMutex';

type MemoryState = {
  products: Map<string, Product>;
  balances: Map<string, Balance>;
  movements: Movement[];
  nextMovementId: number;
};

export type MemoryLedgerStoreOptions = {
  lockTimeoutMs?: number;
};

function copyBalance(balance: Balance): Balance {
  return { ...balance, lastUpdated: new Date(balance.lastUpdated) };
}

class MemoryLedgerTransaction implements LedgerTransaction {
  private readonly stagedProducts = new Map<string, Product>();
  private readonly stagedBalances = new Map<string, Balance>();
  private readonly stagedMovements: Movement[] = [];
  private readonly releases: Release[] = [];

  constructor(
    private readonly state: MemoryState,
    private readonly locks: KeyedMutex,
    private readonly lockTimeoutMs: number
  ) {}

  async findProduct(sku: string): Promise<Product | null> {
    const product = this.stagedProducts.get(sku) ?? this.state.products.get(sku);
    return product ? { ...product } : null;
  }

  async insertProduct(product: Product): Promise<void> {
    if (this.stagedProducts.has(product.sku) || this.state.products.has(product.sku)) {
      throw skuConflict(product.sku);
    }
    this.stagedProducts.set(product.sku, { ...product });
  }

  async insertBalance(sku: string, at: Date): Promise<Balance> {
    if (!this.stagedProducts.has(sku) && !this.state.products.has(sku)) {
      throw new LedgerError('STORAGE_ERROR', `Balance references unknown product ${sku}.`, { sku });
    }
    const balance: Balance = { sku, quantity: 0, lastUpdated: at };
    this.stagedBalances.set(sku, balance);
    return copyBalance(balance);
  }

  async lockBalance(sku: string): Promise<Balance | null> {
    try {
      this.releases.push(await this.locks.acquire(sku, this.lockTimeoutMs));
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw new LedgerError('STORAGE_ERROR', `Timed out waiting for the balance lock on ${sku}.`, { sku }, error);
      }
      throw error;
    }
    const balance = this.stagedBalances.get(sku) ?? this.state.balances.get(sku);
    return balance ? copyBalance(balance) : null;
  }

  async appendMovement(movement: NewMovement): Promise<Movement> {
    const id = this.state.nextMovementId;
    this.state.nextMovementId += 1;
    const recorded: Movement = { ...movement, id };
    this.stagedMovements.push(recorded);
    return { ...recorded };
  }

  async updateBalance(sku: string, quantity: number, at: Date): Promise<Balance> {
    const existing = this.stagedBalances.get(sku) ?? this.state.balances.get(sku);
    if (!existing) {
      throw new LedgerError('STORAGE_ERROR', `No balance row for ${sku}.`, { sku });
    }
    if (quantity < 0) {
      throw new LedgerError('STORAGE_ERROR', `Balance for ${sku} would become negative.`, { sku, quantity });
    }
    const next: Balance = { sku, quantity, lastUpdated: at };
    this.stagedBalances.set(sku, next);
    return copyBalance(next);
  }

  /** Applies staged writes in one synchronous step. */
  commit(): void {
    for (const sku of this.stagedProducts.keys()) {
      if (this.state.products.has(sku)) {
        throw skuConflict(sku);
      }
    }
    for (const [sku, product] of this.stagedProducts) {
      this.state.products.set(sku, product);
    }
    for (const [sku, balance] of this.stagedBalances) {
      this.state.balances.set(sku, balance);
    }
    this.state.movements.push(...this.stagedMovements);
  }

  releaseLocks(): void {
    while (this.releases.length > 0) {
      const release = this.releases.pop();
      if (release) release();
    }
  }
}

/**
 * In-process ledger storage. Balance locks come from a keyed mutex instead of
 * row locks; writes are staged per transaction and applied at commit.
 */
export class MemoryLedgerStore implements LedgerStore {
  readonly kind = 'memory';
  private readonly state: MemoryState = {
    products: new Map(),
    balances: new Map(),
    movements: [],
    nextMovementId: 1
  };
  private readonly locks = new KeyedMutex();
  private readonly lockTimeoutMs: number;

  constructor(options: MemoryLedgerStoreOptions = {}) {
    this.lockTimeoutMs = options.lockTimeoutMs ?? 0;
  }

  async transaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
    const tx = new MemoryLedgerTransaction(this.state, this.locks, this.lockTimeoutMs);
    try {
      const result = await work(tx);
      tx.commit();
      return result;
    } catch (error) {
      throw toStorageError(error, 'transaction');
    } finally {
      tx.releaseLocks();
    }
  }

  async findProduct(sku: string): Promise<Product | null> {
    const product = this.state.products.get(sku);
    return product ? { ...product } : null;
  }

  async findBalance(sku: string): Promise<Balance | null> {
    const balance = this.state.balances.get(sku);
    return balance ? copyBalance(balance) : null;
  }

  async listProductBalances(): Promise<ProductBalance[]> {
    const rows: ProductBalance[] = [];
    for (const product of this.state.products.values()) {
      const balance = this.state.balances.get(product.sku);
      if (!balance) continue;
      rows.push({
        sku: product.sku,
        name: product.name,
        cost: product.cost,
        minLevel: product.minLevel,
        balance: balance.quantity,
        lastUpdated: new Date(balance.lastUpdated)
      });
    }
    return rows;
  }

  async listMovements(sku: string, page: MovementPage): Promise<Movement[]> {
    return this.state.movements
      .filter((movement) => movement.sku === sku)
      .sort((a, b) => b.id - a.id)
      .slice(page.offset, page.offset + page.limit)
      .map((movement) => ({ ...movement, occurredAt: new Date(movement.occurredAt) }));
  }

  async ledgerTotals(): Promise<LedgerTotals[]> {
    const totals = new Map<string, LedgerTotals>();
    for (const balance of this.state.balances.values()) {
      totals.set(balance.sku, { sku: balance.sku, balance: balance.quantity, movementTotal: 0, movementCount: 0 });
    }
    for (const movement of this.state.movements) {
      const entry = totals.get(movement.sku);
      if (!entry) continue;
      entry.movementTotal += signedQuantity(movement);
      entry.movementCount += 1;
    }
    return [...totals.values()];
  }

  async ping(): Promise<void> {
    // always reachable
  }

  async close(): Promise<void> {
    this.state.products.clear();
    this.state.balances.clear();
    this.state.movements = [];
  }
}
