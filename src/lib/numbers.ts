export const QUANTITY_EPSILON = 1e-6;

/**
 * Converts numeric-like inputs (pg returns `numeric` columns as strings) into a number.
 *
 * - number => itself (NaN/Infinity => 0)
 * - string => parseFloat (NaN => 0)
 * - null/undefined => 0
 */
export function toNumber(value: unknown): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value === 'string') {
    const parsed = parseFloat(value);
    return Number.isNaN(parsed) ? 0 : parsed;
  }
  if (value === null || value === undefined) {
    return 0;
  }
  const num = Number(value);
  return Number.isFinite(num) ? num : 0;
}

/**
 * Rounds to 6 decimal places so float sums of 2dp quantities compare cleanly.
 */
export function roundQuantity(value: number): number {
  return parseFloat(value.toFixed(6));
}

export function sumQuantities(values: Iterable<number>): number {
  let total = 0;
  for (const value of values) {
    total += value;
  }
  return roundQuantity(total);
}

export function clampQuantity(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return roundQuantity(Math.min(max, Math.max(min, value)));
}

export function formatQuantity(value: number): string {
  return value.toLocaleString('en-US', {
    minimumFractionDigits: 0,
    maximumFractionDigits: 4
  });
}
