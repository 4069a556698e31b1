import { describe, expect, it } from 'vitest';
import { DEFAULT_ALLOCATION_POLICY, getAllocationPolicy } from './allocationPolicy';

describe('getAllocationPolicy', () => {
  it('falls back to the defaults', () => {
    expect(getAllocationPolicy({})).toEqual(DEFAULT_ALLOCATION_POLICY);
    expect(DEFAULT_ALLOCATION_POLICY).toEqual({
      pickOrderEnforcement: 'strict',
      deallocationMode: 'delete',
      excludeExpiredBatches: true,
      expiringSoonDays: 30,
      timeZone: 'America/Jamaica'
    });
  });

  it('reads each setting case-insensitively', () => {
    expect(
      getAllocationPolicy({
        PICK_ORDER_ENFORCEMENT: ' Advisory ',
        DEALLOCATION_MODE: 'ZERO',
        EXCLUDE_EXPIRED_BATCHES: 'False',
        EXPIRING_SOON_DAYS: '14',
        APP_TIME_ZONE: ' UTC '
      })
    ).toEqual({
      pickOrderEnforcement: 'advisory',
      deallocationMode: 'zero',
      excludeExpiredBatches: false,
      expiringSoonDays: 14,
      timeZone: 'UTC'
    });
  });

  it('ignores values it does not recognise', () => {
    expect(
      getAllocationPolicy({
        PICK_ORDER_ENFORCEMENT: 'loose',
        DEALLOCATION_MODE: 'archive',
        EXCLUDE_EXPIRED_BATCHES: 'maybe',
        EXPIRING_SOON_DAYS: '-3',
        APP_TIME_ZONE: '   '
      })
    ).toEqual(DEFAULT_ALLOCATION_POLICY);
  });
});
