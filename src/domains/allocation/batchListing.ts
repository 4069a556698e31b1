import { QUANTITY_EPSILON, roundQuantity, sumQuantities } from '../../lib/numbers';
import { assignPriorityGroups, groupByWarehouse, resolveIssuanceOrder } from './internal/batchOrdering';
import { releaseOwnReservations, type ReleasedBatch } from './internal/reservationRelease';
import type {
  AllocatableBatch,
  BatchListing,
  BatchQuantities,
  BatchRecord,
  ExpiryStatus,
  ItemRecord,
  WarehouseSummary
} from './types';

const DAY_MS = 24 * 60 * 60 * 1000;

export type BatchListingOptions = {
  remainingQty: number;
  /** Quantities the caller already holds per batch; handed back before availability is computed. */
  released: BatchQuantities;
  /** Batches that stay visible even when fully reserved or expired. */
  forceInclude: ReadonlySet<number>;
  /** YYYY-MM-DD */
  today: string;
  excludeExpired: boolean;
  expiringSoonDays: number;
};

function parseDay(value: string): number {
  const [year, month, day] = value.slice(0, 10).split('-').map(Number);
  return Date.UTC(year, month - 1, day);
}

export function describeExpiry(
  expiryDate: string | null,
  today: string,
  expiringSoonDays: number
): { daysToExpiry: number | null; expiryStatus: ExpiryStatus | null } {
  if (!expiryDate) {
    return { daysToExpiry: null, expiryStatus: null };
  }
  const daysToExpiry = Math.round((parseDay(expiryDate) - parseDay(today)) / DAY_MS);
  if (daysToExpiry < 0) return { daysToExpiry, expiryStatus: 'expired' };
  if (daysToExpiry <= expiringSoonDays) return { daysToExpiry, expiryStatus: 'expiring_soon' };
  return { daysToExpiry, expiryStatus: 'ok' };
}

/** Expired stock is listed for visibility only; it never counts toward what can be allocated. */
export function isAllocatable(batch: Pick<AllocatableBatch, 'expiryStatus'>): boolean {
  return batch.expiryStatus !== 'expired';
}

function toAllocatableBatch(
  batch: ReleasedBatch & { daysToExpiry: number | null; expiryStatus: ExpiryStatus | null },
  priorityGroup: number
): AllocatableBatch {
  const { versionNbr: _versionNbr, netAvailableQty, ...rest } = batch;
  return {
    ...rest,
    availableQty: Math.max(0, netAvailableQty),
    priorityGroup
  };
}

function summarizeWarehouses(batches: AllocatableBatch[]): WarehouseSummary[] {
  const summaries = new Map<number, WarehouseSummary>();
  for (const batch of batches) {
    const summary = summaries.get(batch.warehouseId) ?? {
      warehouseId: batch.warehouseId,
      warehouseName: batch.warehouseName,
      batchCount: 0,
      totalAvailable: 0
    };
    summary.batchCount += 1;
    if (isAllocatable(batch)) {
      summary.totalAvailable = roundQuantity(summary.totalAvailable + batch.availableQty);
    }
    summaries.set(batch.warehouseId, summary);
  }
  return Array.from(summaries.values());
}

/**
 * Builds the drawer listing for one item: eligible batches grouped by warehouse,
 * FEFO/FIFO ordered inside each warehouse, tagged with a priority group ranked
 * across all warehouses, plus the shortfall against `remainingQty`.
 */
export function buildBatchListing(item: ItemRecord, batches: BatchRecord[], options: BatchListingOptions): BatchListing {
  const order = resolveIssuanceOrder(item);
  const { forceInclude } = options;

  const candidates = releaseOwnReservations(
    batches.filter((batch) => batch.itemId === item.itemId),
    options.released
  )
    .map((batch) => ({ ...batch, ...describeExpiry(batch.expiryDate, options.today, options.expiringSoonDays) }))
    .filter(
      (batch) =>
        !options.excludeExpired || batch.expiryStatus !== 'expired' || forceInclude.has(batch.batchId)
    );

  const included: typeof candidates = [];
  for (const group of groupByWarehouse(order, candidates)) {
    const warehouseAvailable = sumQuantities(group.batches.map((batch) => batch.netAvailableQty));
    const hasForced = group.batches.some((batch) => forceInclude.has(batch.batchId));
    if (warehouseAvailable <= QUANTITY_EPSILON && !hasForced) continue;
    included.push(
      ...group.batches.filter(
        (batch) => batch.netAvailableQty > QUANTITY_EPSILON || forceInclude.has(batch.batchId)
      )
    );
  }

  const priorityGroups = assignPriorityGroups(order, included);
  const listed = included.map((batch) => toAllocatableBatch(batch, priorityGroups.get(batch.batchId) ?? 0));

  const totalAvailable = sumQuantities(listed.filter(isAllocatable).map((batch) => batch.availableQty));
  const remainingQty = roundQuantity(Math.max(0, options.remainingQty));
  const shortfall = roundQuantity(Math.max(0, remainingQty - totalAvailable));

  return {
    itemId: item.itemId,
    itemCode: item.itemCode,
    itemName: item.itemName,
    issuanceOrder: order,
    canExpire: item.canExpire,
    isBatched: item.isBatched,
    remainingQty,
    totalAvailable,
    shortfall,
    canFulfill: shortfall <= QUANTITY_EPSILON,
    batches: listed,
    warehouses: summarizeWarehouses(listed)
  };
}
