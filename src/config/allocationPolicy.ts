export type PickOrderEnforcement = 'strict' | 'advisory';

export type DeallocationMode = 'delete' | 'zero';

export type AllocationPolicy = {
  pickOrderEnforcement: PickOrderEnforcement;
  deallocationMode: DeallocationMode;
  excludeExpiredBatches: boolean;
  expiringSoonDays: number;
  /** IANA zone whose calendar date counts as "today" for expiry checks. */
  timeZone: string;
};

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;
  return fallback;
}

function parseChoice<T extends string>(value: string | undefined, choices: readonly T[], fallback: T): T {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  return choices.find((choice) => choice === normalized) ?? fallback;
}

function parseNonNegativeInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : fallback;
}

export const DEFAULT_ALLOCATION_POLICY: AllocationPolicy = {
  pickOrderEnforcement: 'strict',
  deallocationMode: 'delete',
  excludeExpiredBatches: true,
  expiringSoonDays: 30,
  timeZone: 'America/Jamaica'
};

export function getAllocationPolicy(env: NodeJS.ProcessEnv = process.env): AllocationPolicy {
  return {
    pickOrderEnforcement: parseChoice(
      env.PICK_ORDER_ENFORCEMENT,
      ['strict', 'advisory'] as const,
      DEFAULT_ALLOCATION_POLICY.pickOrderEnforcement
    ),
    deallocationMode: parseChoice(
      env.DEALLOCATION_MODE,
      ['delete', 'zero'] as const,
      DEFAULT_ALLOCATION_POLICY.deallocationMode
    ),
    excludeExpiredBatches: parseBoolean(env.EXCLUDE_EXPIRED_BATCHES, DEFAULT_ALLOCATION_POLICY.excludeExpiredBatches),
    expiringSoonDays: parseNonNegativeInt(env.EXPIRING_SOON_DAYS, DEFAULT_ALLOCATION_POLICY.expiringSoonDays),
    timeZone: env.APP_TIME_ZONE?.trim() || DEFAULT_ALLOCATION_POLICY.timeZone
  };
}
