import { z } from 'zod';

const positiveId = z.coerce.number().int().positive();

/** `1,2,3`, a repeated parameter, or both. */
function splitList(value: unknown): unknown {
  if (value === undefined || value === '') return [];
  const parts: unknown[] = Array.isArray(value) ? value : [value];
  return parts
    .flatMap((part) => (typeof part === 'string' ? part.split(',') : [part]))
    .map((part) => (typeof part === 'string' ? part.trim() : part))
    .filter((part) => part !== '');
}

function parseJsonObject(value: unknown): unknown {
  if (value === undefined || value === '') return {};
  if (typeof value !== 'string') return value;
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

export const allocationMapSchema = z.record(
  z.string().regex(/^[1-9]\d*$/, 'Batch ids must be positive integers.'),
  z.number().finite().nonnegative()
);

export const batchQuerySchema = z.object({
  remaining_qty: z.coerce.number().finite().nonnegative().default(0),
  required_uom: z.string().trim().min(1).max(25).optional(),
  allocated_batch_ids: z.preprocess(splitList, z.array(positiveId).max(500)),
  current_allocations: z.preprocess(parseJsonObject, allocationMapSchema),
  package_id: positiveId.optional()
});

export const allocationLineSchema = z.object({
  itemId: z.number().int().positive(),
  allocations: allocationMapSchema
});

export const packageAllocationSchema = z.object({
  versionNbr: z.number().int().nonnegative(),
  lines: z.array(allocationLineSchema).max(500)
});

export type BatchQueryInput = z.infer<typeof batchQuerySchema>;
export type PackageAllocationBody = z.infer<typeof packageAllocationSchema>;
