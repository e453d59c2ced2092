import type { Request, Response, NextFunction } from 'express';
import { isLedgerError, type LedgerError, type LedgerErrorCode } from '../../domains/ledger';
import { getRequestContext } from '../../lib/requestContext';

export type ErrorBody = {
  error: string;
  code?: string;
  details?: Record<string, unknown>;
};

export type ErrorResponse = { status: number; body: ErrorBody };

export type ErrorHandlerMap = Partial<Record<LedgerErrorCode, (error: LedgerError) => ErrorResponse>>;

export function createErrorResponse(
  status: number,
  message: string,
  code?: string,
  details?: Record<string, unknown>
): ErrorResponse {
  return { status, body: { error: message, ...(code && { code }), ...(details && { details }) } };
}

/**
 * Ledger error kinds to HTTP. Duplicate SKUs answer 400, not 409, to keep
 * the status codes existing dashboard clients check for.
 */
export const ledgerErrorMap: ErrorHandlerMap = {
  CONFLICT: (error) => createErrorResponse(400, error.message, error.code, error.details),
  NOT_FOUND: (error) => createErrorResponse(404, error.message, error.code, error.details),
  INSUFFICIENT_STOCK: (error) => createErrorResponse(400, error.message, error.code, error.details),
  INVALID_ARGUMENT: (error) => createErrorResponse(400, error.message, error.code, error.details),
  STORAGE_ERROR: (error) => createErrorResponse(500, error.message, error.code)
};

export function mapErrorToResponse(error: unknown, errorMap: ErrorHandlerMap = ledgerErrorMap): ErrorResponse {
  if (isLedgerError(error)) {
    const mapper = errorMap[error.code];
    if (mapper) {
      const mapped = mapper(error);
      if (mapped.status >= 500) {
        console.error(error);
      }
      return mapped;
    }
  }

  console.error(error);
  const details =
    process.env.NODE_ENV === 'development' && error instanceof Error ? { message: error.message } : undefined;
  return createErrorResponse(500, 'An internal server error occurred.', undefined, details);
}

/**
 * Wraps an async route handler; anything it throws is mapped to a response
 * through the error map.
 */
export function asyncErrorHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<unknown>,
  errorMap: ErrorHandlerMap = ledgerErrorMap
) {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      await handler(req, res, next);
    } catch (error) {
      const mapped = mapErrorToResponse(error, errorMap);
      const requestId = getRequestContext()?.requestId;
      if (requestId && mapped.status >= 500) {
        console.error(`Request ${requestId} failed with ${mapped.status}`);
      }
      return res.status(mapped.status).json(mapped.body);
    }
  };
}
