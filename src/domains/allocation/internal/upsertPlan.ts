import type { DeallocationMode } from '../../../config/allocationPolicy';
import { QUANTITY_EPSILON, roundQuantity } from '../../../lib/numbers';
import type { PackageItemRecord } from '../types';

export type DesiredAllocation = {
  inventoryId: number;
  batchId: number;
  itemId: number;
  qty: number;
  uomCode: string;
};

export type PlannedUpdate = DesiredAllocation & {
  expectedVersion: number;
  previousQty: number;
};

export type BatchReservationDelta = {
  batchId: number;
  inventoryId: number;
  itemId: number;
  delta: number;
};

export type InventoryReservationDelta = {
  inventoryId: number;
  itemId: number;
  delta: number;
};

export type UpsertPlan = {
  inserts: DesiredAllocation[];
  /** Existing keys still allocated; every one is touched, so its version moves even if the quantity did not. */
  updates: PlannedUpdate[];
  /** Rows absent from the new plan, deleted under the `delete` mode. */
  removals: PackageItemRecord[];
  /** Rows absent from the new plan, kept at zero under the `zero` mode. */
  zeroed: PlannedUpdate[];
  batchDeltas: BatchReservationDelta[];
  inventoryDeltas: InventoryReservationDelta[];
};

export function packageItemKey(row: { inventoryId: number; batchId: number; itemId: number }): string {
  return `${row.inventoryId}:${row.batchId}:${row.itemId}`;
}

function addTo<K>(totals: Map<K, number>, key: K, qty: number) {
  totals.set(key, roundQuantity((totals.get(key) ?? 0) + qty));
}

/**
 * Reconciles a package's persisted rows with its new allocation, keyed by
 * (inventory, batch, item) within the package, and derives the reservation
 * deltas the batch and inventory aggregates need to stay equal to the rows.
 */
export function planPackageItemUpsert(
  existing: PackageItemRecord[],
  desired: DesiredAllocation[],
  mode: DeallocationMode
): UpsertPlan {
  const existingByKey = new Map(existing.map((row) => [packageItemKey(row), row]));
  const desiredByKey = new Map<string, DesiredAllocation>();
  for (const allocation of desired) {
    if (allocation.qty <= QUANTITY_EPSILON) continue;
    const key = packageItemKey(allocation);
    const previous = desiredByKey.get(key);
    desiredByKey.set(key, previous ? { ...previous, qty: roundQuantity(previous.qty + allocation.qty) } : allocation);
  }

  const plan: UpsertPlan = { inserts: [], updates: [], removals: [], zeroed: [], batchDeltas: [], inventoryDeltas: [] };

  for (const [key, allocation] of desiredByKey) {
    const row = existingByKey.get(key);
    if (row) {
      plan.updates.push({ ...allocation, expectedVersion: row.versionNbr, previousQty: row.itemQty });
    } else {
      plan.inserts.push(allocation);
    }
  }

  for (const [key, row] of existingByKey) {
    if (desiredByKey.has(key)) continue;
    if (mode === 'delete') {
      plan.removals.push(row);
    } else if (row.itemQty > QUANTITY_EPSILON) {
      plan.zeroed.push({
        inventoryId: row.inventoryId,
        batchId: row.batchId,
        itemId: row.itemId,
        qty: 0,
        uomCode: row.uomCode,
        expectedVersion: row.versionNbr,
        previousQty: row.itemQty
      });
    }
  }

  const batchTotals = new Map<number, { inventoryId: number; itemId: number; before: number; after: number }>();
  const track = (row: { batchId: number; inventoryId: number; itemId: number }) => {
    const entry = batchTotals.get(row.batchId) ?? { inventoryId: row.inventoryId, itemId: row.itemId, before: 0, after: 0 };
    batchTotals.set(row.batchId, entry);
    return entry;
  };
  for (const row of existing) {
    const entry = track(row);
    entry.before = roundQuantity(entry.before + row.itemQty);
  }
  for (const allocation of desiredByKey.values()) {
    const entry = track(allocation);
    entry.after = roundQuantity(entry.after + allocation.qty);
  }

  const inventoryTotals = new Map<string, number>();
  for (const [batchId, entry] of Array.from(batchTotals.entries()).sort((a, b) => a[0] - b[0])) {
    const delta = roundQuantity(entry.after - entry.before);
    if (Math.abs(delta) <= QUANTITY_EPSILON) continue;
    plan.batchDeltas.push({ batchId, inventoryId: entry.inventoryId, itemId: entry.itemId, delta });
    addTo(inventoryTotals, `${entry.inventoryId}:${entry.itemId}`, delta);
  }

  for (const [key, delta] of Array.from(inventoryTotals.entries()).sort(([a], [b]) => a.localeCompare(b))) {
    if (Math.abs(delta) <= QUANTITY_EPSILON) continue;
    const [inventoryId, itemId] = key.split(':').map(Number);
    plan.inventoryDeltas.push({ inventoryId, itemId, delta });
  }

  return plan;
}
