import {
  insufficientStock,
  invalidArgument,
  skuConflict,
  skuNotFound,
  toStorageError,
  MAX_QUANTITY,
  type Balance,
  type LedgerDiscrepancy,
  type LedgerStore,
  type Movement,
  type MovementDirection,
  type MovementPage,
  type PostMovementResult,
  type Product,
  type ProductBalance,
  type ReconcileReport
} from '../domains/ledger';

export type LedgerServiceOptions = {
  clock?: () => Date;
};

export type RegisterProductInput = Product;

export type PostMovementInput = {
  sku: string;
  direction: MovementDirection;
  quantity: number;
};

function assertSku(sku: string) {
  if (typeof sku !== 'string' || sku.trim() === '') {
    throw invalidArgument('SKU is required.', { sku });
  }
}

function assertNonNegativeInteger(value: number, field: string) {
  if (!Number.isSafeInteger(value) || value < 0 || value > MAX_QUANTITY) {
    throw invalidArgument(`${field} must be an integer between 0 and ${MAX_QUANTITY}.`, { [field]: value });
  }
}

function assertProductInput(input: RegisterProductInput) {
  assertSku(input.sku);
  if (typeof input.name !== 'string' || input.name.trim() === '') {
    throw invalidArgument('Product name is required.', { name: input.name });
  }
  assertNonNegativeInteger(input.minLevel, 'minLevel');
  assertNonNegativeInteger(input.maxLevel, 'maxLevel');
  if (input.maxLevel < input.minLevel) {
    throw invalidArgument('maxLevel must be greater than or equal to minLevel.', {
      minLevel: input.minLevel,
      maxLevel: input.maxLevel
    });
  }
  if (!Number.isFinite(input.cost) || input.cost < 0) {
    throw invalidArgument('cost must be a non-negative number.', { cost: input.cost });
  }
}

function assertMovementInput(input: PostMovementInput) {
  assertSku(input.sku);
  if (input.direction !== 'inbound' && input.direction !== 'outbound') {
    throw invalidArgument("Invalid movement direction. Use 'E' for inbound or 'S' for outbound.", {
      direction: input.direction
    });
  }
  if (!Number.isSafeInteger(input.quantity) || input.quantity <= 0 || input.quantity > MAX_QUANTITY) {
    throw invalidArgument(`Quantity must be an integer between 1 and ${MAX_QUANTITY}.`, {
      quantity: input.quantity
    });
  }
}

/**
 * Stock ledger operations over a `LedgerStore`.
 *
 * Movement posting runs lock → check → append → update inside one store
 * transaction, so concurrent postings on a SKU are serialized and the cached
 * balance always equals the signed sum of the movement log. The minimum-level
 * alert is read after commit and is advisory only.
 */
export class LedgerService {
  private readonly clock: () => Date;

  constructor(
    private readonly store: LedgerStore,
    options: LedgerServiceOptions = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  async registerProduct(input: RegisterProductInput): Promise<Product> {
    assertProductInput(input);
    const product: Product = {
      sku: input.sku,
      name: input.name,
      minLevel: input.minLevel,
      maxLevel: input.maxLevel,
      cost: input.cost
    };

    await this.store.transaction(async (tx) => {
      if (await tx.findProduct(product.sku)) {
        throw skuConflict(product.sku);
      }
      // The SKU key still rejects a duplicate committed between this check and the insert.
      await tx.insertProduct(product);
      await tx.insertBalance(product.sku, this.clock());
    });

    return product;
  }

  async postMovement(input: PostMovementInput): Promise<PostMovementResult> {
    assertMovementInput(input);
    const { sku, direction, quantity } = input;

    const newBalance = await this.store.transaction(async (tx) => {
      const current = await tx.lockBalance(sku);
      if (!current) {
        throw skuNotFound(sku);
      }

      if (direction === 'outbound' && quantity > current.quantity) {
        throw insufficientStock(sku, current.quantity, quantity);
      }
      const next = direction === 'inbound' ? current.quantity + quantity : current.quantity - quantity;
      if (next > MAX_QUANTITY) {
        throw invalidArgument(
          `Balance of ${sku} cannot exceed ${MAX_QUANTITY}. Current balance: ${current.quantity}`,
          { sku, currentBalance: current.quantity, requested: quantity }
        );
      }

      const occurredAt = this.clock();
      await tx.appendMovement({ sku, direction, quantity, occurredAt });
      await tx.updateBalance(sku, next, occurredAt);
      return next;
    });

    let belowMinimum = false;
    if (direction === 'outbound') {
      belowMinimum = await this.isBelowMinimum(sku, newBalance);
    }

    return { sku, newBalance, belowMinimum };
  }

  async getBalance(sku: string): Promise<Balance> {
    assertSku(sku);
    const balance = await this.read('getBalance', () => this.store.findBalance(sku));
    if (!balance) {
      throw skuNotFound(sku);
    }
    return balance;
  }

  async listProducts(): Promise<ProductBalance[]> {
    return this.read('listProducts', () => this.store.listProductBalances());
  }

  async listMovements(sku: string, page: MovementPage): Promise<Movement[]> {
    assertSku(sku);
    const product = await this.read('listMovements', () => this.store.findProduct(sku));
    if (!product) {
      throw skuNotFound(sku);
    }
    return this.read('listMovements', () => this.store.listMovements(sku, page));
  }

  /** Compares every cached balance with the signed sum of its movement log. */
  async reconcile(): Promise<ReconcileReport> {
    const totals = await this.read('reconcile', () => this.store.ledgerTotals());
    const discrepancies: LedgerDiscrepancy[] = totals
      .filter((row) => row.balance !== row.movementTotal || row.balance < 0)
      .map((row) => ({
        sku: row.sku,
        balance: row.balance,
        movementTotal: row.movementTotal,
        drift: row.balance - row.movementTotal
      }));
    return { checkedSkus: totals.length, discrepancies, checkedAt: this.clock() };
  }

  private async isBelowMinimum(sku: string, balance: number): Promise<boolean> {
    // Advisory only: the movement is already committed.
    try {
      const product = await this.store.findProduct(sku);
      return product ? balance < product.minLevel : false;
    } catch (error) {
      console.error(`Minimum-level check failed for ${sku}`, error);
      return false;
    }
  }

  private async read<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw toStorageError(error, operation);
    }
  }
}
