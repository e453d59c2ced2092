import type { Balance, LedgerTotals, Movement, NewMovement, Product, ProductBalance } from './types';

/**
 * Unit of work handed to `LedgerStore.transaction`. Everything written through
 * it becomes visible at commit, or not at all when the work throws.
 */
export interface LedgerTransaction {
  findProduct(sku: string): Promise<Product | null>;
  /** Throws a CONFLICT ledger error when the SKU already exists. */
  insertProduct(product: Product): Promise<void>;
  insertBalance(sku: string, at: Date): Promise<Balance>;
  /**
   * Takes the exclusive per-SKU lock and returns the committed balance.
   * The lock is held until the enclosing transaction commits or aborts.
   */
  lockBalance(sku: string): Promise<Balance | null>;
  appendMovement(movement: NewMovement): Promise<Movement>;
  updateBalance(sku: string, quantity: number, at: Date): Promise<Balance>;
}

export type MovementPage = {
  limit: number;
  offset: number;
};

export interface LedgerStore {
  readonly kind: 'postgres' | 'memory';
  transaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T>;
  findProduct(sku: string): Promise<Product | null>;
  findBalance(sku: string): Promise<Balance | null>;
  listProductBalances(): Promise<ProductBalance[]>;
  listMovements(sku: string, page: MovementPage): Promise<Movement[]>;
  ledgerTotals(): Promise<LedgerTotals[]>;
  /** Resolves when the backing storage answers. */
  ping(): Promise<void>;
  close(): Promise<void>;
}
