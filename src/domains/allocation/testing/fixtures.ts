import { DEFAULT_ALLOCATION_POLICY, type AllocationPolicy } from '../../../config/allocationPolicy';
import type { BatchListingOptions } from '../batchListing';
import type { BatchRecord, ItemRecord } from '../types';
import type { MemoryBatch, MemoryState } from './memoryAllocationStore';

export function makeItem(overrides: Partial<ItemRecord> = {}): ItemRecord {
  return {
    itemId: 1,
    itemCode: 'ITEM-1',
    itemName: 'Test item',
    defaultUomCode: 'EA',
    canExpire: true,
    isBatched: true,
    ...overrides
  };
}

/** Warehouse id doubles as inventory id unless overridden. */
export function makeBatch(overrides: Partial<BatchRecord> & { batchId: number }): BatchRecord {
  const warehouseId = overrides.warehouseId ?? 1;
  return {
    inventoryId: warehouseId,
    warehouseId,
    warehouseName: `Warehouse ${warehouseId}`,
    itemId: 1,
    batchNo: `B-${overrides.batchId}`,
    batchDate: '2024-01-01',
    expiryDate: null,
    usableQty: 10,
    reservedQty: 0,
    uomCode: 'EA',
    sizeSpec: null,
    versionNbr: 1,
    ...overrides
  };
}

export function listingOptions(overrides: Partial<BatchListingOptions> = {}): BatchListingOptions {
  return {
    remainingQty: 0,
    released: new Map(),
    forceInclude: new Set(),
    today: '2024-06-01',
    excludeExpired: true,
    expiringSoonDays: 30,
    ...overrides
  };
}

export function testPolicy(overrides: Partial<AllocationPolicy> = {}): AllocationPolicy {
  return { ...DEFAULT_ALLOCATION_POLICY, timeZone: 'UTC', ...overrides };
}

function activeBatch(batch: BatchRecord): MemoryBatch {
  return { ...batch, statusCode: 'A' };
}

/**
 * Relief request 10 with package 100 (draft, version 1):
 * - item 1 (can expire) requested 15; warehouse 1 holds batch 1 (expires 2025-01-01) and batch 2 (expires 2025-06-01), 10 each
 * - item 2 (no expiry) requested 5; warehouse 2 holds batch 3 with 20
 */
export function reliefScenario(): Partial<MemoryState> {
  return {
    items: [makeItem(), makeItem({ itemId: 2, itemCode: 'ITEM-2', itemName: 'Tarpaulin', canExpire: false })],
    batches: [
      activeBatch(makeBatch({ batchId: 1, expiryDate: '2025-01-01' })),
      activeBatch(makeBatch({ batchId: 2, expiryDate: '2025-06-01' })),
      activeBatch(makeBatch({ batchId: 3, itemId: 2, warehouseId: 2, usableQty: 20 }))
    ],
    inventory: [
      { inventoryId: 1, itemId: 1, usableQty: 20, reservedQty: 0, versionNbr: 1 },
      { inventoryId: 2, itemId: 2, usableQty: 20, reservedQty: 0, versionNbr: 1 }
    ],
    packages: [{ packageId: 100, reliefRequestId: 10, statusCode: 'A', versionNbr: 1 }],
    requestLines: [
      { reliefRequestId: 10, itemId: 1, requestQty: 15, issueQty: 0, statusCode: 'R', versionNbr: 1 },
      { reliefRequestId: 10, itemId: 2, requestQty: 5, issueQty: 0, statusCode: 'R', versionNbr: 1 }
    ],
    packageItems: []
  };
}
