import { describe, expect, it } from 'vitest';
import { batchQuerySchema, packageAllocationSchema } from './batchAllocation.schema';

describe('batchQuerySchema', () => {
  it('fills defaults for an empty query', () => {
    expect(batchQuerySchema.parse({})).toEqual({
      remaining_qty: 0,
      allocated_batch_ids: [],
      current_allocations: {}
    });
  });

  it('parses query-string values', () => {
    const parsed = batchQuerySchema.parse({
      remaining_qty: '12.5',
      required_uom: ' EA ',
      allocated_batch_ids: ['4,5', '9'],
      current_allocations: '{"4":2,"9":0}',
      package_id: '100'
    });
    expect(parsed).toEqual({
      remaining_qty: 12.5,
      required_uom: 'EA',
      allocated_batch_ids: [4, 5, 9],
      current_allocations: { '4': 2, '9': 0 },
      package_id: 100
    });
  });

  it('rejects malformed values', () => {
    expect(batchQuerySchema.safeParse({ remaining_qty: '-1' }).success).toBe(false);
    expect(batchQuerySchema.safeParse({ allocated_batch_ids: 'abc' }).success).toBe(false);
    expect(batchQuerySchema.safeParse({ current_allocations: '{"x":1}' }).success).toBe(false);
    expect(batchQuerySchema.safeParse({ current_allocations: 'not json' }).success).toBe(false);
  });
});

describe('packageAllocationSchema', () => {
  it('accepts a full package allocation', () => {
    const body = { versionNbr: 3, lines: [{ itemId: 1, allocations: { '1': 10, '2': 0 } }] };
    expect(packageAllocationSchema.parse(body)).toEqual(body);
  });

  it('rejects negative quantities and non-numeric batch keys', () => {
    expect(
      packageAllocationSchema.safeParse({ versionNbr: 1, lines: [{ itemId: 1, allocations: { '1': -2 } }] }).success
    ).toBe(false);
    expect(
      packageAllocationSchema.safeParse({ versionNbr: 1, lines: [{ itemId: 1, allocations: { b1: 2 } }] }).success
    ).toBe(false);
    expect(packageAllocationSchema.safeParse({ lines: [] }).success).toBe(false);
  });
});
