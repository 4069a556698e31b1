import { QUANTITY_EPSILON } from '../../lib/numbers';
import type { LineStatusCode } from './types';

export function deriveLineStatus(allocatedQty: number, requestedQty: number): Exclude<LineStatusCode, 'D'> {
  if (allocatedQty <= QUANTITY_EPSILON) return 'R';
  if (allocatedQty + QUANTITY_EPSILON < requestedQty) return 'P';
  return 'F';
}
