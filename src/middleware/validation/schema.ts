import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';

const idSchema = z.coerce.number().int().positive();

/**
 * Middleware factory to validate integer id path parameters
 */
export function validateIdParam(paramName: string = 'id') {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = idSchema.safeParse(req.params[paramName]);

    if (!result.success) {
      return res.status(400).json({
        error: `Invalid ${paramName}.`,
        details: result.error.flatten()
      });
    }

    next();
  };
}

/** Reads a path parameter already checked by `validateIdParam`. */
export function idParam(req: Request, paramName: string): number {
  return Number(req.params[paramName]);
}
