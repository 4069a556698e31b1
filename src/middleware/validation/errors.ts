import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { ALLOCATION_ERROR, isAllocationError } from '../../domains/allocation/errors';
import { mapPgErrorToHttp, type HttpErrorResponse, type PgErrorMapping } from '../../lib/pgErrors';

/**
 * Service error mappings, keyed on `error.message`
 */
export type ErrorHandlerMap = Record<string, (error: Error) => HttpErrorResponse>;

/**
 * Wraps an async route handler; errors are mapped through `errorMap` first,
 * then `pgMapping`, and anything left over becomes a 500.
 */
export function asyncErrorHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<unknown>,
  errorMap?: ErrorHandlerMap,
  pgMapping?: PgErrorMapping
): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      await handler(req, res, next);
    } catch (error) {
      const mapper = error instanceof Error ? errorMap?.[error.message] : undefined;
      if (error instanceof Error && mapper) {
        const mapped = mapper(error);
        res.status(mapped.status).json(mapped.body);
        return;
      }

      const pgMapped = pgMapping ? mapPgErrorToHttp(error, pgMapping) : null;
      if (pgMapped) {
        res.status(pgMapped.status).json(pgMapped.body);
        return;
      }

      console.error(error);
      res.status(500).json({
        error: 'An internal server error occurred.',
        ...(process.env.NODE_ENV === 'development' && error instanceof Error && { details: error.message })
      });
    }
  };
}

export function createErrorResponse(status: number, message: string, details?: unknown): HttpErrorResponse {
  return { status, body: { error: message, ...(details !== undefined && { details }) } };
}

function allocationErrorResponse(error: Error): HttpErrorResponse {
  if (!isAllocationError(error)) {
    return createErrorResponse(500, 'An internal server error occurred.');
  }
  return { status: error.status, body: { error: error.userMessage, code: error.code, details: error.details } };
}

/**
 * Every allocation service error carries its own status and user message
 */
export const allocationErrorMap: ErrorHandlerMap = {
  ...Object.fromEntries(Object.values(ALLOCATION_ERROR).map((code) => [code, allocationErrorResponse])),
  AUDIT_ACTOR_REQUIRED: () => createErrorResponse(401, 'The access token carries no user name.')
};

export const allocationPgErrorMapping: PgErrorMapping = {
  check: (err) => ({
    status: 400,
    body: { error: 'The change violates a data constraint.', code: 'CONSTRAINT_VIOLATION', details: err.constraint ?? null }
  }),
  foreignKey: (err) => ({
    status: 400,
    body: { error: 'Referenced item, batch or warehouse not found.', code: 'CONSTRAINT_VIOLATION', details: err.constraint ?? null }
  }),
  unique: () => ({
    status: 409,
    body: {
      error: 'This package was changed by another user. Reload the package and retry.',
      code: ALLOCATION_ERROR.VERSION_CONFLICT
    }
  }),
  serialization: () => ({
    status: 409,
    body: {
      error: 'This package was changed by another user. Reload the package and retry.',
      code: ALLOCATION_ERROR.VERSION_CONFLICT
    }
  })
};
