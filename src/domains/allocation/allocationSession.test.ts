import { describe, expect, it, vi } from 'vitest';
import { AllocationSession, type SessionBatch } from './allocationSession';

function sessionBatch(
  batchId: number,
  priorityGroup: number,
  availableQty: number,
  overrides: Partial<SessionBatch> = {}
): SessionBatch {
  return {
    batchId,
    batchNo: `B-${batchId}`,
    warehouseId: 1,
    warehouseName: 'Warehouse 1',
    availableQty,
    priorityGroup,
    expiryStatus: 'ok',
    ...overrides
  };
}

function scenarioSession() {
  const session = new AllocationSession(7, 15);
  session.load({ batches: [sessionBatch(1, 1, 10), sessionBatch(2, 2, 10)] });
  return session;
}

describe('AllocationSession.setQuantity', () => {
  it('clamps every input into [0, available]', () => {
    const session = new AllocationSession(7, 100);
    session.load({ batches: [sessionBatch(1, 1, 10)] });

    for (const input of [-1e9, -1, 0, 0.004, 3.3333333, 10, 10.0001, 1e12, Infinity, -Infinity, NaN]) {
      const stored = session.setQuantity(1, input);
      expect(stored).toBeGreaterThanOrEqual(0);
      expect(stored).toBeLessThanOrEqual(10);
      expect(session.quantityOf(1)).toBe(stored);
    }
  });

  it('stores positive values and removes the entry otherwise', () => {
    const session = new AllocationSession(7, 100);
    session.load({ batches: [sessionBatch(1, 1, 10)] });

    expect(session.setQuantity(1, 1e9)).toBe(10);
    expect(session.hasAllocation(1)).toBe(true);
    expect(session.setQuantity(1, -5)).toBe(0);
    expect(session.hasAllocation(1)).toBe(false);
    expect(session.allocations().size).toBe(0);
    expect(session.setQuantity(1, 4.5)).toBe(4.5);
    expect(session.setQuantity(1, NaN)).toBe(0);
  });

  it('ignores unknown batches and caps expired ones at zero', () => {
    const session = new AllocationSession(7, 100);
    session.load({ batches: [sessionBatch(2, 1, 5, { expiryStatus: 'expired' })] });

    expect(session.setQuantity(99, 5)).toBe(0);
    expect(session.setQuantity(2, 3)).toBe(0);
    expect(session.capFor(2)).toBe(0);
    expect(session.allocations().size).toBe(0);
  });
});

describe('AllocationSession.useMax', () => {
  it('fills each batch up to what the line still needs', () => {
    const session = scenarioSession();
    expect(session.useMax(1)).toBe(10);
    expect(session.useMax(2)).toBe(5);
    expect(session.useMax(2)).toBe(5);
    expect(session.remainingQty()).toBe(0);
  });
});

describe('AllocationSession.apply', () => {
  it('refuses a total above the requested quantity', () => {
    const session = scenarioSession();
    session.setQuantity(1, 10);
    session.setQuantity(2, 6);

    const result = session.apply();
    expect(result.isValid).toBe(false);
    if (result.isValid) return;
    expect(result.code).toBe('OVER_ALLOCATION');
    expect(result.errorMessage).toBe('Total allocated (16) exceeds requested quantity (15)');
    expect(session.applied).toBeNull();
  });

  it('succeeds exactly when the total fits', () => {
    const cases: Array<[number, number]> = [
      [0, 0],
      [10, 5],
      [10, 5.01],
      [3, 3],
      [10, 10]
    ];
    for (const [first, second] of cases) {
      const session = scenarioSession();
      session.setQuantity(1, first);
      session.setQuantity(2, second);
      expect(session.apply().isValid).toBe(session.totalAllocated() <= 15);
    }
  });

  it('snapshots the allocation and notifies listeners', () => {
    const session = scenarioSession();
    const listener = vi.fn();
    session.onApply(listener);
    session.setQuantity(1, 10);
    session.setQuantity(2, 5);

    const result = session.apply();
    expect(result.isValid).toBe(true);
    if (!result.isValid) return;
    expect(result.applied).toEqual({
      itemId: 7,
      allocations: { '1': 10, '2': 5 },
      allocatedQty: 15,
      remainingQty: 0,
      statusCode: 'F',
      batchCount: 2,
      warehouseCount: 1
    });
    expect(result.pickOrder.isValid).toBe(true);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(result.applied);
    expect(session.toCommitLine()).toEqual({ itemId: 7, allocations: { '1': 10, '2': 5 } });
  });

  it('stops notifying after unsubscribe', () => {
    const session = scenarioSession();
    const listener = vi.fn();
    const unsubscribe = session.onApply(listener);
    unsubscribe();
    session.setQuantity(1, 2);
    session.apply();
    expect(listener).not.toHaveBeenCalled();
  });

  it('reports a skipped earlier batch without blocking apply', () => {
    const session = scenarioSession();
    session.setQuantity(1, 0);
    session.setQuantity(2, 10);

    const result = session.apply();
    expect(result.isValid).toBe(true);
    expect(result.pickOrder.isValid).toBe(false);
    expect(result.pickOrder.remainingUpstreamQty).toBe(10);
    expect(result.pickOrder.offendingBatchIds).toEqual([2]);
  });
});

describe('AllocationSession totals', () => {
  it('seeds from a previous allocation and drops unusable entries', () => {
    const session = scenarioSession();
    session.seed({ '1': 4, '2': 0, x: 3, '3': -1 });
    expect(session.quantityOf(1)).toBe(4);
    expect(session.allocations().size).toBe(1);
    expect(session.remainingQty()).toBe(11);
  });

  it('sums allocations per warehouse', () => {
    const session = new AllocationSession(7, 20);
    session.load({
      batches: [sessionBatch(1, 1, 10), sessionBatch(2, 1, 10, { warehouseId: 2, warehouseName: 'Warehouse 2' })]
    });
    session.setQuantity(1, 3);
    session.setQuantity(2, 4);
    expect(session.allocatedByWarehouse()).toEqual([
      { warehouseId: 1, warehouseName: 'Warehouse 1', allocatedQty: 3 },
      { warehouseId: 2, warehouseName: 'Warehouse 2', allocatedQty: 4 }
    ]);
    expect(session.totalAllocated()).toBe(7);
  });
});
