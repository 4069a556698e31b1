import { QUANTITY_EPSILON, clampQuantity, formatQuantity, roundQuantity, sumQuantities } from '../../lib/numbers';
import { isAllocatable } from './batchListing';
import { quantitiesFromRecord, quantitiesToRecord } from './internal/reservationRelease';
import { deriveLineStatus } from './lineStatus';
import { validatePickOrder, type PickOrderResult } from './pickOrder';
import type { AllocatableBatch, BatchQuantities, LineStatusCode } from './types';

export type SessionBatch = Pick<
  AllocatableBatch,
  'batchId' | 'batchNo' | 'warehouseId' | 'warehouseName' | 'availableQty' | 'priorityGroup' | 'expiryStatus'
>;

export type AppliedAllocation = {
  itemId: number;
  allocations: Record<string, number>;
  allocatedQty: number;
  remainingQty: number;
  statusCode: Exclude<LineStatusCode, 'D'>;
  batchCount: number;
  warehouseCount: number;
};

export type ApplyResult =
  | { isValid: true; errorMessage: ''; applied: AppliedAllocation; pickOrder: PickOrderResult }
  | { isValid: false; errorMessage: string; code: 'OVER_ALLOCATION'; pickOrder: PickOrderResult };

export type CommitLine = {
  itemId: number;
  allocations: Record<string, number>;
};

export type WarehouseAllocation = {
  warehouseId: number;
  warehouseName: string;
  allocatedQty: number;
};

type ApplyListener = (applied: AppliedAllocation) => void;

/**
 * Staged batch quantities for one relief request line inside one editing session
 * (one drawer). Holds no globals and touches no DOM; the host UI subscribes with
 * `onApply` to refresh its allocated/remaining totals.
 */
export class AllocationSession {
  private readonly batches = new Map<number, SessionBatch>();
  private readonly staged = new Map<number, number>();
  private readonly listeners = new Set<ApplyListener>();
  private appliedAllocation: AppliedAllocation | null = null;

  constructor(
    readonly itemId: number,
    readonly requestedQty: number
  ) {}

  /** Caches batch metadata from the latest batch listing. */
  load(listing: { batches: SessionBatch[] }): void {
    this.batches.clear();
    for (const batch of listing.batches) {
      this.batches.set(batch.batchId, batch);
    }
  }

  /** Replaces staged quantities with previously applied ones; zero or invalid entries are dropped. */
  seed(existing: Record<string, number>): void {
    this.staged.clear();
    for (const [batchId, qty] of quantitiesFromRecord(existing)) {
      this.staged.set(batchId, roundQuantity(qty));
    }
  }

  batch(batchId: number): SessionBatch | undefined {
    return this.batches.get(batchId);
  }

  capFor(batchId: number): number {
    const batch = this.batches.get(batchId);
    if (!batch || !isAllocatable(batch)) return 0;
    return batch.availableQty;
  }

  /**
   * Clamps to [0, available]; out-of-range input is corrected rather than rejected.
   * Returns the stored quantity (0 when the entry was removed).
   */
  setQuantity(batchId: number, qty: number): number {
    if (!this.batches.has(batchId)) return this.staged.get(batchId) ?? 0;
    const clamped = clampQuantity(qty, 0, this.capFor(batchId));
    if (clamped > QUANTITY_EPSILON) {
      this.staged.set(batchId, clamped);
      return clamped;
    }
    this.staged.delete(batchId);
    return 0;
  }

  /** Fills the batch up to its cap or to what the line still needs, whichever is smaller. */
  useMax(batchId: number): number {
    const current = this.staged.get(batchId) ?? 0;
    const remaining = this.requestedQty - this.totalAllocated();
    return this.setQuantity(batchId, Math.min(this.capFor(batchId), remaining + current));
  }

  clear(batchId: number): void {
    this.staged.delete(batchId);
  }

  hasAllocation(batchId: number): boolean {
    return (this.staged.get(batchId) ?? 0) > QUANTITY_EPSILON;
  }

  quantityOf(batchId: number): number {
    return this.staged.get(batchId) ?? 0;
  }

  allocations(): BatchQuantities {
    return new Map(this.staged);
  }

  totalAllocated(): number {
    return sumQuantities(this.staged.values());
  }

  remainingQty(): number {
    return roundQuantity(Math.max(0, this.requestedQty - this.totalAllocated()));
  }

  allocatedByWarehouse(): WarehouseAllocation[] {
    const byWarehouse = new Map<number, WarehouseAllocation>();
    for (const [batchId, qty] of this.staged) {
      const batch = this.batches.get(batchId);
      if (!batch) continue;
      const entry = byWarehouse.get(batch.warehouseId) ?? {
        warehouseId: batch.warehouseId,
        warehouseName: batch.warehouseName,
        allocatedQty: 0
      };
      entry.allocatedQty = roundQuantity(entry.allocatedQty + qty);
      byWarehouse.set(batch.warehouseId, entry);
    }
    return Array.from(byWarehouse.values());
  }

  validatePickOrder(): PickOrderResult {
    return validatePickOrder(Array.from(this.batches.values()), this.staged);
  }

  /**
   * Finalizes the staged map for this line. Refused when the total exceeds the requested
   * quantity; a pick-order violation is reported but left to the server to enforce.
   */
  apply(): ApplyResult {
    const pickOrder = this.validatePickOrder();
    const allocatedQty = this.totalAllocated();
    if (allocatedQty > this.requestedQty + QUANTITY_EPSILON) {
      return {
        isValid: false,
        code: 'OVER_ALLOCATION',
        errorMessage: `Total allocated (${formatQuantity(allocatedQty)}) exceeds requested quantity (${formatQuantity(this.requestedQty)})`,
        pickOrder
      };
    }

    const applied: AppliedAllocation = {
      itemId: this.itemId,
      allocations: quantitiesToRecord(this.staged),
      allocatedQty,
      remainingQty: this.remainingQty(),
      statusCode: deriveLineStatus(allocatedQty, this.requestedQty),
      batchCount: this.staged.size,
      warehouseCount: this.allocatedByWarehouse().length
    };
    this.appliedAllocation = applied;
    for (const listener of this.listeners) {
      listener(applied);
    }
    return { isValid: true, errorMessage: '', applied, pickOrder };
  }

  get applied(): AppliedAllocation | null {
    return this.appliedAllocation;
  }

  onApply(listener: ApplyListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** The commit payload line for the last applied allocation, or the staged one if none was applied. */
  toCommitLine(): CommitLine {
    return {
      itemId: this.itemId,
      allocations: this.appliedAllocation?.allocations ?? quantitiesToRecord(this.staged)
    };
  }
}
