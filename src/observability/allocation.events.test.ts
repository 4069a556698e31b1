import { afterEach, describe, expect, it, vi } from 'vitest';
import { runWithRequestContext } from '../lib/requestContext';
import {
  ALLOCATION_EVENT,
  emitAllocationEvent,
  isAllocationCommittedPayload,
  isAllocationConflictPayload,
  logAllocationEvent
} from './allocation.events';

const committed = {
  packageId: 100,
  versionNbr: 2,
  actorId: 'OFFICER.ONE',
  lineCount: 2,
  inserted: 3,
  updated: 0,
  removed: 0,
  reservationDelta: -2.5,
  warningCount: 0
};

describe('allocation event payload guards', () => {
  it('accepts well-formed payloads', () => {
    expect(isAllocationCommittedPayload(committed)).toBe(true);
    expect(isAllocationConflictPayload({ packageId: 100, actorId: null, entity: 'itembatch' })).toBe(true);
  });

  it('rejects fractional counts and blank strings', () => {
    expect(isAllocationCommittedPayload({ ...committed, inserted: 1.5 })).toBe(false);
    expect(isAllocationCommittedPayload({ ...committed, actorId: '' })).toBe(false);
    expect(isAllocationConflictPayload({ packageId: 100, actorId: null, entity: '' })).toBe(false);
    expect(isAllocationCommittedPayload(null)).toBe(false);
  });
});

describe('emitAllocationEvent', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('hands a valid payload to the logger once', () => {
    const logger = vi.fn();
    emitAllocationEvent(ALLOCATION_EVENT.COMMITTED, committed, logger);
    expect(logger).toHaveBeenCalledTimes(1);
    expect(logger).toHaveBeenCalledWith('ALLOCATION_COMMITTED', committed);
  });

  it('flags an invalid payload and still logs it', () => {
    const logger = vi.fn();
    const payload = { packageId: 100, actorId: null, code: 'OVER_ALLOCATION', message: '' };
    emitAllocationEvent(ALLOCATION_EVENT.REJECTED, payload, logger);
    expect(logger.mock.calls).toEqual([
      ['ALLOCATION_EVENT_PAYLOAD_INVALID', { event: 'ALLOCATION_REJECTED' }],
      ['ALLOCATION_REJECTED', payload]
    ]);
  });

  it('writes one JSON line tagged with the current request id', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    runWithRequestContext({ requestId: 'req-1' }, () => {
      logAllocationEvent('ALLOCATION_CONFLICT', { packageId: 100 });
    });

    expect(log).toHaveBeenCalledTimes(1);
    const line: unknown = JSON.parse(String(log.mock.calls[0][0]));
    expect(line).toMatchObject({
      event: 'ALLOCATION_CONFLICT',
      requestId: 'req-1',
      payload: { packageId: 100 }
    });
  });
});
