import { describe, expect, it } from 'vitest';
import { AuditActorError, buildAuditStamp, normalizeAuditActor } from './audit';

describe('normalizeAuditActor', () => {
  it('trims and upper-cases the user name', () => {
    expect(normalizeAuditActor('  jane.doe ')).toBe('JANE.DOE');
  });

  it('refuses a missing or blank name', () => {
    expect(() => normalizeAuditActor('   ')).toThrow(AuditActorError);
    expect(() => normalizeAuditActor(null)).toThrow('AUDIT_ACTOR_REQUIRED');
    expect(() => normalizeAuditActor(undefined)).toThrow('AUDIT_ACTOR_REQUIRED');
  });
});

describe('buildAuditStamp', () => {
  it('pairs the actor with the given time', () => {
    const at = new Date('2024-06-01T12:00:00Z');
    expect(buildAuditStamp('officer', at)).toEqual({ actorId: 'OFFICER', at });
  });
});
