export type LedgerErrorCode =
  | 'CONFLICT'
  | 'NOT_FOUND'
  | 'INSUFFICIENT_STOCK'
  | 'INVALID_ARGUMENT'
  | 'STORAGE_ERROR';

export class LedgerError extends Error {
  code: LedgerErrorCode;
  details?: Record<string, unknown>;

  constructor(code: LedgerErrorCode, message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'LedgerError';
    this.code = code;
    this.details = details;
  }
}

export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError;
}

export function skuConflict(sku: string): LedgerError {
  return new LedgerError('CONFLICT', `SKU ${sku} is already registered.`, { sku });
}

export function skuNotFound(sku: string): LedgerError {
  return new LedgerError('NOT_FOUND', `SKU ${sku} not found.`, { sku });
}

export function insufficientStock(sku: string, currentBalance: number, requested: number): LedgerError {
  return new LedgerError(
    'INSUFFICIENT_STOCK',
    `Insufficient stock. Current balance: ${currentBalance}`,
    { sku, currentBalance, requested }
  );
}

export function invalidArgument(message: string, details?: Record<string, unknown>): LedgerError {
  return new LedgerError('INVALID_ARGUMENT', message, details);
}

/**
 * Wraps anything thrown by the persistence layer. Errors already classified
 * as ledger errors pass through untouched.
 */
export function toStorageError(error: unknown, operation: string): LedgerError {
  if (isLedgerError(error)) return error;
  const reason = error instanceof Error ? error.message : String(error);
  return new LedgerError('STORAGE_ERROR', `Database error during ${operation}: ${reason}`, { operation }, error);
}
