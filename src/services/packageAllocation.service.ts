import { getAllocationPolicy, type AllocationPolicy } from '../config/allocationPolicy';
import { buildBatchListing } from '../domains/allocation/batchListing';
import { ALLOCATION_ERROR, AllocationError, isAllocationError, versionConflict } from '../domains/allocation/errors';
import { quantitiesFromRecord } from '../domains/allocation/internal/reservationRelease';
import {
  planPackageItemUpsert,
  type BatchReservationDelta,
  type DesiredAllocation,
  type UpsertPlan
} from '../domains/allocation/internal/upsertPlan';
import { deriveLineStatus } from '../domains/allocation/lineStatus';
import { validatePickOrder, type PickOrderResult } from '../domains/allocation/pickOrder';
import type { AllocationDataSource, AllocationStore } from '../domains/allocation/store';
import type {
  LineStatusCode,
  PackageItemRecord,
  PackageStatusCode,
  ReliefPackageRecord,
  RequestLineRecord
} from '../domains/allocation/types';
import { buildAuditStamp, type AuditStamp } from '../lib/audit';
import { businessDate } from '../lib/dates';
import { isPgError } from '../lib/pgErrors';
import { QUANTITY_EPSILON, formatQuantity, roundQuantity, sumQuantities } from '../lib/numbers';
import {
  ALLOCATION_EVENT,
  emitAllocationEvent,
  logAllocationEvent,
  type AllocationEventLogger
} from '../observability/allocation.events';

export type AllocationLineInput = {
  itemId: number;
  /** batchId -> quantity */
  allocations: Record<string, number>;
};

export type PackageAllocationInput = {
  versionNbr: number;
  /** The whole package: rows for items or batches left out are deallocated. */
  lines: AllocationLineInput[];
};

export type AllocationActor = {
  userId: string;
  userName: string;
};

export type AllocationServiceOptions = {
  policy?: AllocationPolicy;
  now?: Date;
  logger?: AllocationEventLogger;
};

export type AllocationWarning = {
  code: 'PICK_ORDER_VIOLATION';
  itemId: number;
  message: string;
  offendingBatchIds: number[];
  remainingUpstreamQty: number;
};

export type LineAllocationSummary = {
  itemId: number;
  requestedQty: number;
  allocatedQty: number;
  statusCode: LineStatusCode;
  pickOrder: PickOrderResult | null;
};

export type AllocationOutcome = {
  packageId: number;
  versionNbr: number;
  lines: LineAllocationSummary[];
  inserted: number;
  updated: number;
  removed: number;
  reservationChanges: BatchReservationDelta[];
  warnings: AllocationWarning[];
};

export type AllocationPreview = AllocationOutcome & {
  /** False when a commit of the same payload would be refused under the current policy. */
  committable: boolean;
};

export type PersistedAllocation = {
  batchId: number;
  inventoryId: number;
  itemQty: number;
  uomCode: string;
  versionNbr: number;
};

export type PackageAllocationLine = {
  itemId: number;
  requestedQty: number;
  allocatedQty: number;
  statusCode: LineStatusCode;
  allocations: PersistedAllocation[];
};

export type PackageAllocations = {
  packageId: number;
  reliefRequestId: number;
  statusCode: PackageStatusCode;
  versionNbr: number;
  lines: PackageAllocationLine[];
};

type PreparedAllocation = {
  requestLines: RequestLineRecord[];
  allocatedByItem: Map<number, number>;
  pickOrders: Map<number, PickOrderResult>;
  warnings: AllocationWarning[];
  /** Pick-order violations on lines that differ from what the package already holds. */
  blockingViolations: number;
  plan: UpsertPlan;
};

const EDITABLE_PACKAGE_STATUSES: ReadonlySet<PackageStatusCode> = new Set<PackageStatusCode>(['A', 'P']);

function packageNotFound(packageId: number) {
  return new AllocationError(ALLOCATION_ERROR.PACKAGE_NOT_FOUND, `Relief package ${packageId} not found.`, 404, {
    packageId
  });
}

function assertPackageWritable(pkg: ReliefPackageRecord, expectedVersion: number) {
  if (pkg.versionNbr !== expectedVersion) {
    throw versionConflict('reliefpkg', {
      packageId: pkg.packageId,
      expectedVersion,
      currentVersion: pkg.versionNbr
    });
  }
  if (!EDITABLE_PACKAGE_STATUSES.has(pkg.statusCode)) {
    throw new AllocationError(
      ALLOCATION_ERROR.PACKAGE_LOCKED,
      `Relief package ${pkg.packageId} has status ${pkg.statusCode} and can no longer be changed.`,
      409,
      { packageId: pkg.packageId, statusCode: pkg.statusCode }
    );
  }
}

function sameQuantities(a: ReadonlyMap<number, number>, b: ReadonlyMap<number, number>): boolean {
  if (a.size !== b.size) return false;
  for (const [batchId, qty] of a) {
    if (Math.abs(qty - (b.get(batchId) ?? 0)) > QUANTITY_EPSILON) return false;
  }
  return true;
}

function heldByItem(rows: PackageItemRecord[], itemId: number): Map<number, number> {
  const held = new Map<number, number>();
  for (const row of rows) {
    if (row.itemId !== itemId || row.itemQty <= QUANTITY_EPSILON) continue;
    held.set(row.batchId, roundQuantity((held.get(row.batchId) ?? 0) + row.itemQty));
  }
  return held;
}

async function unknownBatchError(store: AllocationStore, itemId: number, batchId: number): Promise<AllocationError> {
  const [batch] = await store.listBatchesByIds([batchId]);
  if (batch && batch.itemId !== itemId) {
    return new AllocationError(
      ALLOCATION_ERROR.BATCH_ITEM_MISMATCH,
      `Batch ${batch.batchNo} belongs to item ${batch.itemId}, not item ${itemId}.`,
      400,
      { itemId, batchId }
    );
  }
  return new AllocationError(
    ALLOCATION_ERROR.BATCH_NOT_FOUND,
    `Batch ${batchId} is not an active batch of item ${itemId}.`,
    400,
    { itemId, batchId }
  );
}

/**
 * Validates a package allocation against the current batch view (with this
 * package's own reservations released) and plans the row changes. Writes nothing.
 */
async function prepareAllocation(
  store: AllocationStore,
  pkg: ReliefPackageRecord,
  input: PackageAllocationInput,
  settings: { policy: AllocationPolicy; today: string; lock: boolean; enforcePickOrder: boolean }
): Promise<PreparedAllocation> {
  const { policy, today, lock } = settings;
  assertPackageWritable(pkg, input.versionNbr);

  const requestLines = await store.listRequestLines(pkg.reliefRequestId, { forUpdate: lock });
  const requestLinesByItem = new Map(requestLines.map((line) => [line.itemId, line]));
  const existing = await store.listPackageItems(pkg.packageId, { forUpdate: lock });

  const desired: DesiredAllocation[] = [];
  const allocatedByItem = new Map<number, number>();
  const pickOrders = new Map<number, PickOrderResult>();
  const warnings: AllocationWarning[] = [];
  let blockingViolations = 0;

  for (const line of input.lines) {
    if (allocatedByItem.has(line.itemId)) {
      throw new AllocationError(
        ALLOCATION_ERROR.LINE_ITEM_DUPLICATE,
        `Item ${line.itemId} appears more than once in the allocation.`,
        400,
        { itemId: line.itemId }
      );
    }
    const requestLine = requestLinesByItem.get(line.itemId);
    if (!requestLine) {
      throw new AllocationError(
        ALLOCATION_ERROR.LINE_ITEM_NOT_FOUND,
        `Item ${line.itemId} is not on relief request ${pkg.reliefRequestId}.`,
        400,
        { itemId: line.itemId, reliefRequestId: pkg.reliefRequestId }
      );
    }

    const allocations = quantitiesFromRecord(line.allocations);
    const allocatedQty = sumQuantities(allocations.values());
    allocatedByItem.set(line.itemId, allocatedQty);

    if (requestLine.statusCode === 'D' && allocatedQty > QUANTITY_EPSILON) {
      throw new AllocationError(
        ALLOCATION_ERROR.LINE_ITEM_DENIED,
        `Item ${line.itemId} was denied on this request and cannot be allocated.`,
        409,
        { itemId: line.itemId }
      );
    }
    if (allocatedQty > requestLine.requestQty + QUANTITY_EPSILON) {
      throw new AllocationError(
        ALLOCATION_ERROR.OVER_ALLOCATION,
        `Total allocated (${formatQuantity(allocatedQty)}) exceeds requested quantity (${formatQuantity(requestLine.requestQty)}) for item ${line.itemId}.`,
        422,
        { itemId: line.itemId, allocatedQty, requestedQty: requestLine.requestQty }
      );
    }
    if (allocations.size === 0) continue;

    const item = await store.findItem(line.itemId);
    if (!item) {
      throw new AllocationError(ALLOCATION_ERROR.ITEM_NOT_FOUND, `Item ${line.itemId} not found.`, 404, {
        itemId: line.itemId
      });
    }

    const held = heldByItem(existing, item.itemId);
    const listing = buildBatchListing(item, await store.listItemBatches(item.itemId, { forUpdate: lock }), {
      remainingQty: requestLine.requestQty,
      released: held,
      forceInclude: new Set([...held.keys(), ...allocations.keys()]),
      today,
      excludeExpired: false,
      expiringSoonDays: policy.expiringSoonDays
    });
    const listed = new Map(listing.batches.map((batch) => [batch.batchId, batch]));

    for (const [batchId, qty] of allocations) {
      const batch = listed.get(batchId);
      if (!batch) throw await unknownBatchError(store, item.itemId, batchId);

      if (batch.expiryStatus === 'expired' && qty > (held.get(batchId) ?? 0) + QUANTITY_EPSILON) {
        throw new AllocationError(
          ALLOCATION_ERROR.BATCH_EXPIRED,
          `Batch ${batch.batchNo} expired on ${batch.expiryDate} and cannot take new allocations.`,
          422,
          { itemId: item.itemId, batchId }
        );
      }
      if (qty > batch.availableQty + QUANTITY_EPSILON) {
        throw new AllocationError(
          ALLOCATION_ERROR.INSUFFICIENT_STOCK,
          `Batch ${batch.batchNo} has only ${formatQuantity(batch.availableQty)} available.`,
          409,
          { itemId: item.itemId, batchId, requestedQty: qty, availableQty: batch.availableQty }
        );
      }
      desired.push({
        inventoryId: batch.inventoryId,
        batchId,
        itemId: item.itemId,
        qty,
        uomCode: batch.uomCode
      });
    }

    const pickOrder = validatePickOrder(listing.batches, allocations);
    pickOrders.set(item.itemId, pickOrder);
    if (pickOrder.isValid) continue;
    // A line committed earlier stays as it is when fresher stock arrives; only edited lines are held to pick order.
    const edited = !sameQuantities(allocations, held);
    if (edited) blockingViolations += 1;
    if (edited && settings.enforcePickOrder && policy.pickOrderEnforcement === 'strict') {
      throw new AllocationError(ALLOCATION_ERROR.PICK_ORDER_VIOLATION, pickOrder.errorMessage, 422, {
        itemId: item.itemId,
        offendingBatchIds: pickOrder.offendingBatchIds,
        remainingUpstreamQty: pickOrder.remainingUpstreamQty
      });
    }
    warnings.push({
      code: 'PICK_ORDER_VIOLATION',
      itemId: item.itemId,
      message: pickOrder.errorMessage,
      offendingBatchIds: pickOrder.offendingBatchIds,
      remainingUpstreamQty: pickOrder.remainingUpstreamQty
    });
  }

  return {
    requestLines,
    allocatedByItem,
    pickOrders,
    warnings,
    blockingViolations,
    plan: planPackageItemUpsert(existing, desired, policy.deallocationMode)
  };
}

function nextLineStatus(line: RequestLineRecord, allocatedQty: number): LineStatusCode {
  if (line.statusCode === 'D') return 'D';
  return deriveLineStatus(allocatedQty, line.requestQty);
}

function toOutcome(packageId: number, versionNbr: number, prepared: PreparedAllocation): AllocationOutcome {
  const { plan } = prepared;
  return {
    packageId,
    versionNbr,
    lines: prepared.requestLines.map((line) => {
      const allocatedQty = prepared.allocatedByItem.get(line.itemId) ?? 0;
      return {
        itemId: line.itemId,
        requestedQty: line.requestQty,
        allocatedQty,
        statusCode: nextLineStatus(line, allocatedQty),
        pickOrder: prepared.pickOrders.get(line.itemId) ?? null
      };
    }),
    inserted: plan.inserts.length,
    updated: plan.updates.length,
    removed: plan.removals.length + plan.zeroed.length,
    reservationChanges: plan.batchDeltas,
    warnings: prepared.warnings
  };
}

async function reconcilePackageItems(store: AllocationStore, packageId: number, plan: UpsertPlan, stamp: AuditStamp) {
  for (const update of [...plan.updates, ...plan.zeroed]) {
    const key = { packageId, inventoryId: update.inventoryId, batchId: update.batchId, itemId: update.itemId };
    const updated = await store.updatePackageItem(
      key,
      { itemQty: update.qty, uomCode: update.uomCode },
      update.expectedVersion,
      stamp
    );
    if (!updated) throw versionConflict('reliefpkg_item', key);
  }
  for (const insert of plan.inserts) {
    await store.insertPackageItem(
      {
        packageId,
        inventoryId: insert.inventoryId,
        batchId: insert.batchId,
        itemId: insert.itemId,
        itemQty: insert.qty,
        uomCode: insert.uomCode
      },
      stamp
    );
  }
  for (const removal of plan.removals) {
    const deleted = await store.deletePackageItem(removal, removal.versionNbr);
    if (!deleted) {
      throw versionConflict('reliefpkg_item', {
        packageId,
        inventoryId: removal.inventoryId,
        batchId: removal.batchId,
        itemId: removal.itemId
      });
    }
  }
}

async function applyBatchReservations(store: AllocationStore, plan: UpsertPlan, stamp: AuditStamp) {
  if (plan.batchDeltas.length === 0) return;
  const batches = new Map(
    (await store.listBatchesByIds(plan.batchDeltas.map((delta) => delta.batchId), { forUpdate: true })).map(
      (batch) => [batch.batchId, batch]
    )
  );
  for (const delta of plan.batchDeltas) {
    const batch = batches.get(delta.batchId);
    if (!batch) {
      throw new AllocationError(ALLOCATION_ERROR.BATCH_NOT_FOUND, `Batch ${delta.batchId} not found.`, 400, {
        batchId: delta.batchId
      });
    }
    const reservedQty = roundQuantity(batch.reservedQty + delta.delta);
    if (reservedQty < -QUANTITY_EPSILON) {
      throw new AllocationError(
        ALLOCATION_ERROR.RESERVATION_INCONSISTENT,
        `Batch ${batch.batchNo} would be left with a negative reservation (${formatQuantity(reservedQty)}).`,
        409,
        { batchId: batch.batchId, reservedQty: batch.reservedQty, delta: delta.delta }
      );
    }
    if (reservedQty > batch.usableQty + QUANTITY_EPSILON) {
      throw new AllocationError(
        ALLOCATION_ERROR.INSUFFICIENT_STOCK,
        `Batch ${batch.batchNo} has only ${formatQuantity(Math.max(0, batch.usableQty - batch.reservedQty))} available.`,
        409,
        { batchId: batch.batchId, usableQty: batch.usableQty, reservedQty: batch.reservedQty, delta: delta.delta }
      );
    }
    const updated = await store.updateBatchReservation(batch.batchId, Math.max(0, reservedQty), batch.versionNbr, stamp);
    if (!updated) throw versionConflict('itembatch', { batchId: batch.batchId });
  }
}

async function applyInventoryReservations(store: AllocationStore, plan: UpsertPlan, stamp: AuditStamp) {
  if (plan.inventoryDeltas.length === 0) return;
  const rows = await store.listInventory(
    plan.inventoryDeltas.map(({ inventoryId, itemId }) => ({ inventoryId, itemId })),
    { forUpdate: true }
  );
  for (const delta of plan.inventoryDeltas) {
    const row = rows.find((candidate) => candidate.inventoryId === delta.inventoryId && candidate.itemId === delta.itemId);
    const key = { inventoryId: delta.inventoryId, itemId: delta.itemId };
    if (!row) {
      throw new AllocationError(
        ALLOCATION_ERROR.RESERVATION_INCONSISTENT,
        `No inventory record for item ${delta.itemId} in warehouse ${delta.inventoryId}.`,
        409,
        key
      );
    }
    const reservedQty = roundQuantity(row.reservedQty + delta.delta);
    if (reservedQty < -QUANTITY_EPSILON) {
      throw new AllocationError(
        ALLOCATION_ERROR.RESERVATION_INCONSISTENT,
        `Inventory for item ${delta.itemId} in warehouse ${delta.inventoryId} would be left with a negative reservation.`,
        409,
        { ...key, reservedQty: row.reservedQty, delta: delta.delta }
      );
    }
    if (reservedQty > row.usableQty + QUANTITY_EPSILON) {
      throw new AllocationError(
        ALLOCATION_ERROR.INSUFFICIENT_STOCK,
        `Warehouse ${delta.inventoryId} does not hold enough usable stock of item ${delta.itemId}.`,
        409,
        { ...key, usableQty: row.usableQty, reservedQty: row.reservedQty, delta: delta.delta }
      );
    }
    const updated = await store.updateInventoryReservation(key, Math.max(0, reservedQty), row.versionNbr, stamp);
    if (!updated) throw versionConflict('inventory', key);
  }
}

async function updateLineStatuses(store: AllocationStore, prepared: PreparedAllocation, stamp: AuditStamp) {
  for (const line of prepared.requestLines) {
    const statusCode = nextLineStatus(line, prepared.allocatedByItem.get(line.itemId) ?? 0);
    if (statusCode === line.statusCode) continue;
    const key = { reliefRequestId: line.reliefRequestId, itemId: line.itemId };
    const updated = await store.updateRequestLineStatus(key, statusCode, line.versionNbr, stamp);
    if (!updated) throw versionConflict('reliefrqst_item', key);
  }
}

export async function getPackageAllocations(store: AllocationStore, packageId: number): Promise<PackageAllocations> {
  const pkg = await store.findPackage(packageId);
  if (!pkg) throw packageNotFound(packageId);

  const requestLines = await store.listRequestLines(pkg.reliefRequestId);
  const rows = await store.listPackageItems(packageId);

  return {
    packageId: pkg.packageId,
    reliefRequestId: pkg.reliefRequestId,
    statusCode: pkg.statusCode,
    versionNbr: pkg.versionNbr,
    lines: requestLines.map((line) => {
      const allocations = rows
        .filter((row) => row.itemId === line.itemId && row.itemQty > QUANTITY_EPSILON)
        .map((row) => ({
          batchId: row.batchId,
          inventoryId: row.inventoryId,
          itemQty: row.itemQty,
          uomCode: row.uomCode,
          versionNbr: row.versionNbr
        }));
      return {
        itemId: line.itemId,
        requestedQty: line.requestQty,
        allocatedQty: sumQuantities(allocations.map((allocation) => allocation.itemQty)),
        statusCode: line.statusCode,
        allocations
      };
    })
  };
}

/** Dry run of a commit: same validation and plan, pick-order violations reported rather than thrown. */
export async function previewPackageAllocations(
  store: AllocationStore,
  packageId: number,
  input: PackageAllocationInput,
  options: AllocationServiceOptions = {}
): Promise<AllocationPreview> {
  const policy = options.policy ?? getAllocationPolicy();
  const pkg = await store.findPackage(packageId);
  if (!pkg) throw packageNotFound(packageId);

  const prepared = await prepareAllocation(store, pkg, input, {
    policy,
    today: businessDate(options.now ?? new Date(), policy.timeZone),
    lock: false,
    enforcePickOrder: false
  });
  return {
    ...toOutcome(packageId, pkg.versionNbr, prepared),
    committable: policy.pickOrderEnforcement === 'advisory' || prepared.blockingViolations === 0
  };
}

/**
 * Commits the full allocation of a package in one transaction: reconciles
 * `reliefpkg_item` rows, moves batch and inventory reservations by the delta,
 * refreshes line statuses and bumps the package version. Any failure rolls all of it back.
 */
export async function savePackageAllocations(
  source: AllocationDataSource,
  packageId: number,
  input: PackageAllocationInput,
  actor: AllocationActor,
  options: AllocationServiceOptions = {}
): Promise<AllocationOutcome> {
  const policy = options.policy ?? getAllocationPolicy();
  const logger = options.logger ?? logAllocationEvent;
  const now = options.now ?? new Date();
  const stamp = buildAuditStamp(actor.userName, now);

  try {
    const outcome = await source.transaction(async (store) => {
      const pkg = await store.findPackage(packageId, { forUpdate: true });
      if (!pkg) throw packageNotFound(packageId);

      const prepared = await prepareAllocation(store, pkg, input, {
        policy,
        today: businessDate(now, policy.timeZone),
        lock: true,
        enforcePickOrder: true
      });
      await reconcilePackageItems(store, packageId, prepared.plan, stamp);
      await applyBatchReservations(store, prepared.plan, stamp);
      await applyInventoryReservations(store, prepared.plan, stamp);
      await updateLineStatuses(store, prepared, stamp);

      const versionNbr = await store.touchPackage(packageId, 'P', pkg.versionNbr, stamp);
      if (versionNbr === null) throw versionConflict('reliefpkg', { packageId });
      return toOutcome(packageId, versionNbr, prepared);
    });

    emitAllocationEvent(
      ALLOCATION_EVENT.COMMITTED,
      {
        packageId,
        versionNbr: outcome.versionNbr,
        actorId: stamp.actorId,
        lineCount: input.lines.length,
        inserted: outcome.inserted,
        updated: outcome.updated,
        removed: outcome.removed,
        reservationDelta: sumQuantities(outcome.reservationChanges.map((change) => change.delta)),
        warningCount: outcome.warnings.length
      },
      logger
    );
    return outcome;
  } catch (error) {
    if (isAllocationError(error)) {
      if (error.code === ALLOCATION_ERROR.VERSION_CONFLICT) {
        const entity = error.details.entity;
        emitAllocationEvent(
          ALLOCATION_EVENT.CONFLICT,
          { packageId, actorId: stamp.actorId, entity: typeof entity === 'string' ? entity : 'reliefpkg' },
          logger
        );
      } else {
        emitAllocationEvent(
          ALLOCATION_EVENT.REJECTED,
          { packageId, actorId: stamp.actorId, code: error.code, message: error.userMessage },
          logger
        );
      }
    } else if (isPgError(error)) {
      emitAllocationEvent(
        ALLOCATION_EVENT.REJECTED,
        {
          packageId,
          actorId: stamp.actorId,
          code: error.code ?? 'DATABASE_ERROR',
          message: error.constraint
            ? `Constraint ${error.constraint} rejected the allocation.`
            : 'The database rejected the allocation.'
        },
        logger
      );
    }
    throw error;
  }
}
