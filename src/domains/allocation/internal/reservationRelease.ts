import { roundQuantity } from '../../../lib/numbers';
import type { BatchQuantities, BatchRecord } from '../types';

export type ReleasedBatch = BatchRecord & {
  releasedQty: number;
  /** usable - reserved + released; may be negative when the stored reservation is inconsistent */
  netAvailableQty: number;
};

/**
 * Hands the caller's own reservations back to it for the duration of a query:
 * the quantity it already holds on a batch counts as available to it again.
 * Nothing is written; other sessions keep seeing the stored reservation.
 */
export function releaseOwnReservations(batches: BatchRecord[], released: BatchQuantities): ReleasedBatch[] {
  return batches.map((batch) => {
    const releasedQty = Math.max(0, released.get(batch.batchId) ?? 0);
    return {
      ...batch,
      releasedQty,
      netAvailableQty: roundQuantity(batch.usableQty - batch.reservedQty + releasedQty)
    };
  });
}

export function quantitiesFromRecord(record: Record<string, number> | undefined): Map<number, number> {
  const quantities = new Map<number, number>();
  if (!record) return quantities;
  for (const [key, value] of Object.entries(record)) {
    const batchId = Number(key);
    if (!Number.isInteger(batchId) || batchId <= 0) continue;
    if (!Number.isFinite(value) || value <= 0) continue;
    quantities.set(batchId, roundQuantity((quantities.get(batchId) ?? 0) + value));
  }
  return quantities;
}

export function quantitiesToRecord(quantities: BatchQuantities): Record<string, number> {
  const record: Record<string, number> = {};
  for (const [batchId, qty] of quantities) {
    record[String(batchId)] = qty;
  }
  return record;
}
