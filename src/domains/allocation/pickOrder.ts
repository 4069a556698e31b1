import { QUANTITY_EPSILON, formatQuantity, roundQuantity } from '../../lib/numbers';
import { isAllocatable } from './batchListing';
import type { AllocatableBatch, BatchQuantities } from './types';

export type PickOrderBatch = Pick<AllocatableBatch, 'batchId' | 'priorityGroup' | 'availableQty' | 'expiryStatus'>;

export type PickOrderResult = {
  isValid: boolean;
  errorMessage: string;
  /** Allocated batches sitting in groups after the first group that still has stock. */
  offendingBatchIds: number[];
  /** Unallocated quantity across every group ahead of the latest allocated group. */
  remainingUpstreamQty: number;
  /** Unallocated quantity in the first group that still has stock. */
  firstOpenGroupQty: number;
  firstOpenGroup: number | null;
};

type GroupTotals = {
  group: number;
  available: number;
  allocated: number;
  batchIds: number[];
};

const VALID: PickOrderResult = {
  isValid: true,
  errorMessage: '',
  offendingBatchIds: [],
  remainingUpstreamQty: 0,
  firstOpenGroupQty: 0,
  firstOpenGroup: null
};

function totalsByGroup(batches: PickOrderBatch[], allocations: BatchQuantities): GroupTotals[] {
  const groups = new Map<number, GroupTotals>();
  for (const batch of batches) {
    if (!isAllocatable(batch)) continue;
    const totals = groups.get(batch.priorityGroup) ?? {
      group: batch.priorityGroup,
      available: 0,
      allocated: 0,
      batchIds: []
    };
    totals.available = roundQuantity(totals.available + batch.availableQty);
    totals.allocated = roundQuantity(totals.allocated + (allocations.get(batch.batchId) ?? 0));
    totals.batchIds.push(batch.batchId);
    groups.set(batch.priorityGroup, totals);
  }
  return Array.from(groups.values()).sort((a, b) => a.group - b.group);
}

/**
 * Enforces FEFO/FIFO pick order across the whole allocation set: no allocation may
 * sit in a later priority group while an earlier group still has unallocated stock.
 */
export function validatePickOrder(batches: PickOrderBatch[], allocations: BatchQuantities): PickOrderResult {
  const groups = totalsByGroup(batches, allocations);

  let latestAllocated = -1;
  groups.forEach((totals, index) => {
    if (totals.allocated > QUANTITY_EPSILON) latestAllocated = index;
  });
  if (latestAllocated <= 0) return VALID;

  const upstream = groups.slice(0, latestAllocated);
  const firstOpen = upstream.findIndex((totals) => totals.available - totals.allocated > QUANTITY_EPSILON);
  if (firstOpen === -1) return VALID;

  const remainingUpstreamQty = roundQuantity(
    upstream.reduce((sum, totals) => sum + Math.max(0, totals.available - totals.allocated), 0)
  );
  const offendingBatchIds = groups
    .slice(firstOpen + 1)
    .flatMap((totals) => totals.batchIds)
    .filter((batchId) => (allocations.get(batchId) ?? 0) > QUANTITY_EPSILON);

  return {
    isValid: false,
    errorMessage:
      `Pick order violation: ${formatQuantity(remainingUpstreamQty)} units still available in higher-priority batches. ` +
      'Allocate from earlier batches before picking from later ones.',
    offendingBatchIds,
    remainingUpstreamQty,
    firstOpenGroupQty: roundQuantity(groups[firstOpen].available - groups[firstOpen].allocated),
    firstOpenGroup: groups[firstOpen].group
  };
}
