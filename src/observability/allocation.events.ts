import { currentRequestId } from '../lib/requestContext';

export const ALLOCATION_EVENT = {
  COMMITTED: 'ALLOCATION_COMMITTED',
  CONFLICT: 'ALLOCATION_CONFLICT',
  REJECTED: 'ALLOCATION_REJECTED'
} as const;

export type AllocationEventName = (typeof ALLOCATION_EVENT)[keyof typeof ALLOCATION_EVENT];

export type AllocationCommittedPayload = {
  packageId: number;
  versionNbr: number;
  actorId: string;
  lineCount: number;
  inserted: number;
  updated: number;
  removed: number;
  reservationDelta: number;
  warningCount: number;
};

export type AllocationConflictPayload = {
  packageId: number;
  actorId: string | null;
  entity: string;
};

export type AllocationRejectedPayload = {
  packageId: number;
  actorId: string | null;
  code: string;
  message: string;
};

export type AllocationEventPayloadMap = {
  [ALLOCATION_EVENT.COMMITTED]: AllocationCommittedPayload;
  [ALLOCATION_EVENT.CONFLICT]: AllocationConflictPayload;
  [ALLOCATION_EVENT.REJECTED]: AllocationRejectedPayload;
};

export type AllocationEventLogger = (eventName: string, payload: unknown) => void;

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object';
}

function hasString(value: Record<string, unknown>, key: string): boolean {
  return typeof value[key] === 'string' && value[key] !== '';
}

function hasNullableString(value: Record<string, unknown>, key: string): boolean {
  return value[key] === null || hasString(value, key);
}

function hasCount(value: Record<string, unknown>, key: string): boolean {
  const candidate = value[key];
  return typeof candidate === 'number' && Number.isInteger(candidate) && candidate >= 0;
}

function hasNumber(value: Record<string, unknown>, key: string): boolean {
  const candidate = value[key];
  return typeof candidate === 'number' && Number.isFinite(candidate);
}

export function isAllocationCommittedPayload(payload: unknown): payload is AllocationCommittedPayload {
  if (!isObject(payload)) return false;
  return (
    hasCount(payload, 'packageId')
    && hasCount(payload, 'versionNbr')
    && hasString(payload, 'actorId')
    && hasCount(payload, 'lineCount')
    && hasCount(payload, 'inserted')
    && hasCount(payload, 'updated')
    && hasCount(payload, 'removed')
    && hasNumber(payload, 'reservationDelta')
    && hasCount(payload, 'warningCount')
  );
}

export function isAllocationConflictPayload(payload: unknown): payload is AllocationConflictPayload {
  if (!isObject(payload)) return false;
  return hasCount(payload, 'packageId') && hasNullableString(payload, 'actorId') && hasString(payload, 'entity');
}

export function isAllocationRejectedPayload(payload: unknown): payload is AllocationRejectedPayload {
  if (!isObject(payload)) return false;
  return (
    hasCount(payload, 'packageId')
    && hasNullableString(payload, 'actorId')
    && hasString(payload, 'code')
    && hasString(payload, 'message')
  );
}

export function isAllocationEventPayload<T extends AllocationEventName>(
  event: T,
  payload: unknown
): payload is AllocationEventPayloadMap[T] {
  if (event === ALLOCATION_EVENT.COMMITTED) return isAllocationCommittedPayload(payload);
  if (event === ALLOCATION_EVENT.CONFLICT) return isAllocationConflictPayload(payload);
  return isAllocationRejectedPayload(payload);
}

export const logAllocationEvent: AllocationEventLogger = (eventName, payload) => {
  console.log(
    JSON.stringify({
      event: eventName,
      requestId: currentRequestId(),
      timestamp: new Date().toISOString(),
      payload
    })
  );
};

export function emitAllocationEvent<T extends AllocationEventName>(
  event: T,
  payload: AllocationEventPayloadMap[T],
  logger: AllocationEventLogger = logAllocationEvent
): void {
  if (!isAllocationEventPayload(event, payload)) {
    logger('ALLOCATION_EVENT_PAYLOAD_INVALID', { event });
  }
  logger(event, payload);
}
