export const ALLOCATION_ERROR = {
  ITEM_NOT_FOUND: 'ITEM_NOT_FOUND',
  PACKAGE_NOT_FOUND: 'PACKAGE_NOT_FOUND',
  PACKAGE_LOCKED: 'PACKAGE_LOCKED',
  LINE_ITEM_NOT_FOUND: 'LINE_ITEM_NOT_FOUND',
  LINE_ITEM_DUPLICATE: 'LINE_ITEM_DUPLICATE',
  LINE_ITEM_DENIED: 'LINE_ITEM_DENIED',
  BATCH_NOT_FOUND: 'BATCH_NOT_FOUND',
  BATCH_ITEM_MISMATCH: 'BATCH_ITEM_MISMATCH',
  BATCH_EXPIRED: 'BATCH_EXPIRED',
  OVER_ALLOCATION: 'OVER_ALLOCATION',
  PICK_ORDER_VIOLATION: 'PICK_ORDER_VIOLATION',
  INSUFFICIENT_STOCK: 'INSUFFICIENT_STOCK',
  RESERVATION_INCONSISTENT: 'RESERVATION_INCONSISTENT',
  VERSION_CONFLICT: 'ALLOCATION_VERSION_CONFLICT'
} as const;

export type AllocationErrorCode = (typeof ALLOCATION_ERROR)[keyof typeof ALLOCATION_ERROR];

/**
 * Service-level failure. `message` carries the code so route error maps can key on it;
 * the human-readable text lives in `details.message`.
 */
export class AllocationError extends Error {
  code: AllocationErrorCode;
  status: number;
  details: Record<string, unknown>;

  constructor(code: AllocationErrorCode, message: string, status: number, details?: Record<string, unknown>) {
    super(code);
    this.name = 'AllocationError';
    this.code = code;
    this.status = status;
    this.details = { message, ...details };
  }

  get userMessage(): string {
    const message = this.details.message;
    return typeof message === 'string' ? message : this.code;
  }
}

export function isAllocationError(error: unknown): error is AllocationError {
  return error instanceof AllocationError;
}

/** `entity` is the table whose version check failed. */
export function versionConflict(entity: string, key: Record<string, unknown>): AllocationError {
  return new AllocationError(
    ALLOCATION_ERROR.VERSION_CONFLICT,
    'This package was changed by another user. Reload the package and retry.',
    409,
    { entity, key }
  );
}
