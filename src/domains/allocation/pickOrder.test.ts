import { describe, expect, it } from 'vitest';
import { validatePickOrder, type PickOrderBatch } from './pickOrder';

function batch(batchId: number, priorityGroup: number, availableQty: number, overrides: Partial<PickOrderBatch> = {}) {
  return { batchId, priorityGroup, availableQty, expiryStatus: 'ok' as const, ...overrides };
}

const threeGroups = [batch(1, 1, 10), batch(2, 2, 10), batch(3, 3, 10)];

describe('validatePickOrder', () => {
  it('rejects skipping two open groups and reports everything left upstream', () => {
    const result = validatePickOrder(threeGroups, new Map([[3, 5]]));
    expect(result.isValid).toBe(false);
    expect(result.remainingUpstreamQty).toBe(20);
    expect(result.firstOpenGroup).toBe(1);
    expect(result.firstOpenGroupQty).toBe(10);
    expect(result.offendingBatchIds).toEqual([3]);
    expect(result.errorMessage).toBe(
      'Pick order violation: 20 units still available in higher-priority batches. ' +
        'Allocate from earlier batches before picking from later ones.'
    );
  });

  it('accepts later groups once earlier groups are exhausted', () => {
    const result = validatePickOrder(threeGroups, new Map([[1, 10], [2, 10], [3, 5]]));
    expect(result.isValid).toBe(true);
    expect(result.errorMessage).toBe('');
  });

  it('points at the first partly used group', () => {
    const result = validatePickOrder(threeGroups, new Map([[1, 10], [2, 4], [3, 1]]));
    expect(result.isValid).toBe(false);
    expect(result.remainingUpstreamQty).toBe(6);
    expect(result.firstOpenGroup).toBe(2);
    expect(result.offendingBatchIds).toEqual([3]);
  });

  it('accepts allocations confined to the first group or nothing at all', () => {
    expect(validatePickOrder(threeGroups, new Map([[1, 3]])).isValid).toBe(true);
    expect(validatePickOrder(threeGroups, new Map()).isValid).toBe(true);
  });

  it('leaves the order inside one group free', () => {
    const result = validatePickOrder([batch(1, 1, 10), batch(2, 1, 10)], new Map([[2, 5]]));
    expect(result.isValid).toBe(true);
  });

  it('ignores expired stock in earlier groups', () => {
    const result = validatePickOrder(
      [batch(1, 1, 10, { expiryStatus: 'expired' }), batch(2, 2, 10)],
      new Map([[2, 5]])
    );
    expect(result.isValid).toBe(true);
  });
});
