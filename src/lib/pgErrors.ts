export type PgError = {
  code?: string;
  constraint?: string;
  detail?: string;
  table?: string;
};

export type HttpErrorBody = {
  error: string;
  code?: string;
  details?: unknown;
};

export type HttpErrorResponse = { status: number; body: HttpErrorBody };

export type PgErrorMapping = {
  unique?: (err: PgError) => HttpErrorResponse | null;
  foreignKey?: (err: PgError) => HttpErrorResponse | null;
  check?: (err: PgError) => HttpErrorResponse | null;
  notNull?: (err: PgError) => HttpErrorResponse | null;
  serialization?: (err: PgError) => HttpErrorResponse | null;
};

export function isPgError(err: unknown): err is PgError {
  if (!err || typeof err !== 'object' || !('code' in err)) return false;
  const { code } = err;
  return typeof code === 'string' && /^[0-9A-Z]{5}$/.test(code);
}

/**
 * Maps Postgres errors to HTTP responses while preserving per-route semantics.
 *
 * This helper intentionally does NOT provide default messages. Callers supply
 * message bodies via the optional mapping callbacks.
 */
export function mapPgErrorToHttp(err: unknown, mapping: PgErrorMapping): HttpErrorResponse | null {
  if (!isPgError(err)) {
    return null;
  }
  switch (err.code) {
    case '23505':
      return mapping.unique?.(err) ?? null;
    case '23503':
      return mapping.foreignKey?.(err) ?? null;
    case '23514':
      return mapping.check?.(err) ?? null;
    case '23502':
      return mapping.notNull?.(err) ?? null;
    case '40001':
    case '40P01':
      return mapping.serialization?.(err) ?? null;
    default:
      return null;
  }
}
