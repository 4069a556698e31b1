import { getAllocationPolicy, type AllocationPolicy } from '../config/allocationPolicy';
import { buildBatchListing } from '../domains/allocation/batchListing';
import { ALLOCATION_ERROR, AllocationError } from '../domains/allocation/errors';
import { quantitiesFromRecord } from '../domains/allocation/internal/reservationRelease';
import type { AllocationStore } from '../domains/allocation/store';
import type { BatchListing } from '../domains/allocation/types';
import { businessDate } from '../lib/dates';
import { QUANTITY_EPSILON, roundQuantity } from '../lib/numbers';

export type BatchQueryParams = {
  itemId: number;
  remainingQty: number;
  requiredUom?: string | null;
  allocatedBatchIds?: number[];
  currentAllocations?: Record<string, number>;
  packageId?: number | null;
};

export type BatchQueryOptions = {
  policy?: AllocationPolicy;
  now?: Date;
};

/**
 * Eligible batches for one request line. With a package id the package's persisted
 * rows are released back and kept visible; otherwise the caller's staged map is.
 */
export async function queryItemBatches(
  store: AllocationStore,
  params: BatchQueryParams,
  options: BatchQueryOptions = {}
): Promise<BatchListing> {
  const policy = options.policy ?? getAllocationPolicy();
  const item = await store.findItem(params.itemId);
  if (!item) {
    throw new AllocationError(ALLOCATION_ERROR.ITEM_NOT_FOUND, `Item ${params.itemId} not found.`, 404, {
      itemId: params.itemId
    });
  }

  const batches = await store.listItemBatches(item.itemId, { uomCode: params.requiredUom ?? null });

  const staged = quantitiesFromRecord(params.currentAllocations);
  const forceInclude = new Set<number>([...(params.allocatedBatchIds ?? []), ...staged.keys()]);
  let released: Map<number, number> = staged;

  if (params.packageId) {
    const persisted = await store.listPackageItems(params.packageId, { itemId: item.itemId });
    released = new Map();
    for (const row of persisted) {
      forceInclude.add(row.batchId);
      if (row.itemQty <= QUANTITY_EPSILON) continue;
      released.set(row.batchId, roundQuantity((released.get(row.batchId) ?? 0) + row.itemQty));
    }
  }

  return buildBatchListing(item, batches, {
    remainingQty: params.remainingQty,
    released,
    forceInclude,
    today: businessDate(options.now ?? new Date(), policy.timeZone),
    excludeExpired: policy.excludeExpiredBatches,
    expiringSoonDays: policy.expiringSoonDays
  });
}
