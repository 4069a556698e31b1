export type AuditStamp = {
  actorId: string;
  at: Date;
};

export class AuditActorError extends Error {
  constructor() {
    super('AUDIT_ACTOR_REQUIRED');
    this.name = 'AuditActorError';
  }
}

/**
 * `*_by_id` audit columns hold the acting user name, upper-cased and trimmed.
 * There is no fallback to email or user id.
 */
export function normalizeAuditActor(userName: string | null | undefined): string {
  const trimmed = userName?.trim() ?? '';
  if (!trimmed) {
    throw new AuditActorError();
  }
  return trimmed.toUpperCase();
}

export function buildAuditStamp(userName: string | null | undefined, at: Date = new Date()): AuditStamp {
  return { actorId: normalizeAuditActor(userName), at };
}
