export type MovementDirection = 'inbound' | 'outbound';

/** Single-letter code stored in `stock_movements.direction` and used on the wire. */
export type MovementDirectionCode = 'E' | 'S';

export const DIRECTION_CODES: Record<MovementDirection, MovementDirectionCode> = {
  inbound: 'E',
  outbound: 'S'
};

export function directionFromCode(code: MovementDirectionCode): MovementDirection {
  return code === 'E' ? 'inbound' : 'outbound';
}

/** Upper bound of quantities, levels and balances: the range of a Postgres `integer`. */
export const MAX_QUANTITY = 2_147_483_647;

export type Product = {
  sku: string;
  name: string;
  minLevel: number;
  maxLevel: number;
  cost: number;
};

export type Balance = {
  sku: string;
  quantity: number;
  lastUpdated: Date;
};

export type Movement = {
  id: number;
  sku: string;
  direction: MovementDirection;
  quantity: number;
  occurredAt: Date;
};

export type NewMovement = Omit<Movement, 'id'>;

export type ProductBalance = {
  sku: string;
  name: string;
  cost: number;
  minLevel: number;
  balance: number;
  lastUpdated: Date;
};

export type PostMovementResult = {
  sku: string;
  newBalance: number;
  belowMinimum: boolean;
};

/** Cached balance next to the signed sum of the SKU's movement log. */
export type LedgerTotals = {
  sku: string;
  balance: number;
  movementTotal: number;
  movementCount: number;
};

export type LedgerDiscrepancy = {
  sku: string;
  balance: number;
  movementTotal: number;
  drift: number;
};

export type ReconcileReport = {
  checkedSkus: number;
  discrepancies: LedgerDiscrepancy[];
  checkedAt: Date;
};

export function signedQuantity(movement: Pick<Movement, 'direction' | 'quantity'>): number {
  return movement.direction === 'inbound' ? movement.quantity : -movement.quantity;
}
