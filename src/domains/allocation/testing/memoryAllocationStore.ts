import { roundQuantity } from '../../../lib/numbers';
import type { AllocationDataSource, AllocationStore } from '../store';
import type {
  BatchRecord,
  InventoryRecord,
  ItemRecord,
  PackageItemKey,
  PackageItemRecord,
  ReliefPackageRecord,
  RequestLineRecord
} from '../types';

export type MemoryBatch = BatchRecord & { statusCode: 'A' | 'I' };

export type MemoryState = {
  items: ItemRecord[];
  batches: MemoryBatch[];
  inventory: InventoryRecord[];
  packages: ReliefPackageRecord[];
  requestLines: RequestLineRecord[];
  packageItems: PackageItemRecord[];
};

export type WriteOperation =
  | 'insertPackageItem'
  | 'updatePackageItem'
  | 'deletePackageItem'
  | 'updateBatchReservation'
  | 'updateInventoryReservation'
  | 'updateRequestLineStatus'
  | 'touchPackage';

function samePackageItem(row: PackageItemKey, key: PackageItemKey) {
  return (
    row.packageId === key.packageId
    && row.inventoryId === key.inventoryId
    && row.batchId === key.batchId
    && row.itemId === key.itemId
  );
}

/**
 * In-process stand-in for the pg store. `transaction` restores the state it
 * started from when the work throws, matching a ROLLBACK.
 */
export class MemoryAllocationDataSource implements AllocationDataSource {
  state: MemoryState;
  readonly store: AllocationStore;
  readonly writes: WriteOperation[] = [];
  /** Runs before every write; lets a test act as a concurrent writer. */
  beforeWrite: ((operation: WriteOperation, source: MemoryAllocationDataSource) => void) | null = null;

  constructor(seed: Partial<MemoryState> = {}) {
    this.state = {
      items: seed.items ?? [],
      batches: seed.batches ?? [],
      inventory: seed.inventory ?? [],
      packages: seed.packages ?? [],
      requestLines: seed.requestLines ?? [],
      packageItems: seed.packageItems ?? []
    };
    this.store = this.createStore();
  }

  async transaction<T>(work: (store: AllocationStore) => Promise<T>): Promise<T> {
    const snapshot = structuredClone(this.state);
    try {
      return await work(this.store);
    } catch (error) {
      this.state = snapshot;
      throw error;
    }
  }

  private write(operation: WriteOperation) {
    this.beforeWrite?.(operation, this);
    this.writes.push(operation);
  }

  private createStore(): AllocationStore {
    const toBatch = ({ statusCode: _statusCode, ...batch }: MemoryBatch): BatchRecord => ({ ...batch });

    return {
      findItem: async (itemId) => {
        const item = this.state.items.find((row) => row.itemId === itemId);
        return item ? { ...item } : null;
      },

      listItemBatches: async (itemId, options) =>
        this.state.batches
          .filter((batch) => batch.itemId === itemId && batch.statusCode === 'A')
          .filter((batch) => !options?.uomCode || batch.uomCode === options.uomCode)
          .sort((a, b) => a.batchId - b.batchId)
          .map(toBatch),

      listBatchesByIds: async (batchIds) =>
        this.state.batches
          .filter((batch) => batchIds.includes(batch.batchId))
          .sort((a, b) => a.batchId - b.batchId)
          .map(toBatch),

      listInventory: async (keys) =>
        this.state.inventory
          .filter((row) => keys.some((key) => key.inventoryId === row.inventoryId && key.itemId === row.itemId))
          .map((row) => ({ ...row })),

      findPackage: async (packageId) => {
        const pkg = this.state.packages.find((row) => row.packageId === packageId);
        return pkg ? { ...pkg } : null;
      },

      listRequestLines: async (reliefRequestId) =>
        this.state.requestLines
          .filter((row) => row.reliefRequestId === reliefRequestId)
          .sort((a, b) => a.itemId - b.itemId)
          .map((row) => ({ ...row })),

      listPackageItems: async (packageId, options) =>
        this.state.packageItems
          .filter((row) => row.packageId === packageId)
          .filter((row) => options?.itemId === undefined || row.itemId === options.itemId)
          .sort((a, b) => a.itemId - b.itemId || a.batchId - b.batchId)
          .map((row) => ({ ...row })),

      insertPackageItem: async (row, stamp) => {
        this.write('insertPackageItem');
        if (this.state.packageItems.some((existing) => samePackageItem(existing, row))) {
          throw Object.assign(new Error('duplicate key value violates unique constraint "reliefpkg_item_pkey"'), {
            code: '23505'
          });
        }
        this.state.packageItems.push({
          ...row,
          itemQty: roundQuantity(row.itemQty),
          versionNbr: 1,
          updateById: stamp.actorId,
          updateDtime: stamp.at
        });
      },

      updatePackageItem: async (key, change, expectedVersion, stamp) => {
        this.write('updatePackageItem');
        const row = this.state.packageItems.find((existing) => samePackageItem(existing, key));
        if (!row || row.versionNbr !== expectedVersion) return false;
        row.itemQty = roundQuantity(change.itemQty);
        row.uomCode = change.uomCode;
        row.updateById = stamp.actorId;
        row.updateDtime = stamp.at;
        row.versionNbr += 1;
        return true;
      },

      deletePackageItem: async (key, expectedVersion) => {
        this.write('deletePackageItem');
        const index = this.state.packageItems.findIndex(
          (existing) => samePackageItem(existing, key) && existing.versionNbr === expectedVersion
        );
        if (index === -1) return false;
        this.state.packageItems.splice(index, 1);
        return true;
      },

      updateBatchReservation: async (batchId, reservedQty, expectedVersion) => {
        this.write('updateBatchReservation');
        const batch = this.state.batches.find((row) => row.batchId === batchId);
        if (!batch || batch.versionNbr !== expectedVersion) return false;
        if (reservedQty < 0 || reservedQty > batch.usableQty) {
          throw Object.assign(new Error('new row for relation "itembatch" violates check constraint'), {
            code: '23514'
          });
        }
        batch.reservedQty = roundQuantity(reservedQty);
        batch.versionNbr += 1;
        return true;
      },

      updateInventoryReservation: async (key, reservedQty, expectedVersion) => {
        this.write('updateInventoryReservation');
        const row = this.state.inventory.find(
          (existing) => existing.inventoryId === key.inventoryId && existing.itemId === key.itemId
        );
        if (!row || row.versionNbr !== expectedVersion) return false;
        row.reservedQty = roundQuantity(reservedQty);
        row.versionNbr += 1;
        return true;
      },

      updateRequestLineStatus: async (key, statusCode, expectedVersion) => {
        this.write('updateRequestLineStatus');
        const row = this.state.requestLines.find(
          (existing) => existing.reliefRequestId === key.reliefRequestId && existing.itemId === key.itemId
        );
        if (!row || row.versionNbr !== expectedVersion) return false;
        row.statusCode = statusCode;
        row.versionNbr += 1;
        return true;
      },

      touchPackage: async (packageId, statusCode, expectedVersion) => {
        this.write('touchPackage');
        const pkg = this.state.packages.find((row) => row.packageId === packageId);
        if (!pkg || pkg.versionNbr !== expectedVersion) return null;
        pkg.statusCode = statusCode;
        pkg.versionNbr += 1;
        return pkg.versionNbr;
      }
    };
  }
}
