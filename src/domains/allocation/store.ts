import type { AuditStamp } from '../../lib/audit';
import type {
  BatchRecord,
  InventoryRecord,
  ItemRecord,
  LineStatusCode,
  PackageItemKey,
  PackageItemRecord,
  PackageStatusCode,
  ReliefPackageRecord,
  RequestLineRecord
} from './types';

export type LockOptions = {
  /** Take row locks (SELECT ... FOR UPDATE); only meaningful inside a transaction. */
  forUpdate?: boolean;
};

export type InventoryKey = { inventoryId: number; itemId: number };

/**
 * Data access for batch allocation. Every write that takes an `expectedVersion`
 * is a compare-and-swap on `version_nbr` and resolves `false` when no row matched.
 */
export interface AllocationStore {
  findItem(itemId: number): Promise<ItemRecord | null>;
  /** Active batches of the item in active warehouses. */
  listItemBatches(itemId: number, options?: LockOptions & { uomCode?: string | null }): Promise<BatchRecord[]>;
  listBatchesByIds(batchIds: number[], options?: LockOptions): Promise<BatchRecord[]>;
  listInventory(keys: InventoryKey[], options?: LockOptions): Promise<InventoryRecord[]>;

  findPackage(packageId: number, options?: LockOptions): Promise<ReliefPackageRecord | null>;
  listRequestLines(reliefRequestId: number, options?: LockOptions): Promise<RequestLineRecord[]>;
  listPackageItems(packageId: number, options?: LockOptions & { itemId?: number }): Promise<PackageItemRecord[]>;

  insertPackageItem(row: PackageItemKey & { itemQty: number; uomCode: string }, stamp: AuditStamp): Promise<void>;
  updatePackageItem(
    key: PackageItemKey,
    change: { itemQty: number; uomCode: string },
    expectedVersion: number,
    stamp: AuditStamp
  ): Promise<boolean>;
  deletePackageItem(key: PackageItemKey, expectedVersion: number): Promise<boolean>;

  updateBatchReservation(batchId: number, reservedQty: number, expectedVersion: number, stamp: AuditStamp): Promise<boolean>;
  updateInventoryReservation(
    key: InventoryKey,
    reservedQty: number,
    expectedVersion: number,
    stamp: AuditStamp
  ): Promise<boolean>;
  updateRequestLineStatus(
    key: { reliefRequestId: number; itemId: number },
    statusCode: LineStatusCode,
    expectedVersion: number,
    stamp: AuditStamp
  ): Promise<boolean>;
  /** Bumps the package version and sets its status; resolves the new version, or null on a version mismatch. */
  touchPackage(
    packageId: number,
    statusCode: PackageStatusCode,
    expectedVersion: number,
    stamp: AuditStamp
  ): Promise<number | null>;
}

/** Pool-backed reads plus a way to run work against one transaction-scoped store. */
export type AllocationDataSource = {
  store: AllocationStore;
  transaction<T>(work: (store: AllocationStore) => Promise<T>): Promise<T>;
};
