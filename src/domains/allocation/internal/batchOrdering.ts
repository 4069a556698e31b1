import type { IssuanceOrder, ItemRecord } from '../types';

type OrderableBatch = {
  batchId: number;
  warehouseId: number;
  batchDate: string;
  expiryDate: string | null;
};

// Sorts after any YYYY-MM-DD string, so batches without expiry go last.
const NO_EXPIRY_KEY = '\uffff';

export function resolveIssuanceOrder(item: Pick<ItemRecord, 'canExpire'>): IssuanceOrder {
  return item.canExpire ? 'FEFO' : 'FIFO';
}

function priorityKey(order: IssuanceOrder, batch: OrderableBatch): string {
  if (order === 'FEFO') {
    return `${batch.expiryDate ?? NO_EXPIRY_KEY}|${batch.batchDate}`;
  }
  return batch.batchDate;
}

export function compareByIssuanceOrder(order: IssuanceOrder) {
  return (a: OrderableBatch, b: OrderableBatch): number => {
    const keyA = priorityKey(order, a);
    const keyB = priorityKey(order, b);
    if (keyA !== keyB) return keyA < keyB ? -1 : 1;
    return a.batchId - b.batchId;
  };
}

/**
 * Dense rank (1-based) of each batch's FEFO/FIFO key across every batch passed in,
 * regardless of warehouse. Batches with identical keys share a group.
 */
export function assignPriorityGroups(order: IssuanceOrder, batches: OrderableBatch[]): Map<number, number> {
  const sorted = [...batches].sort(compareByIssuanceOrder(order));
  const groups = new Map<number, number>();
  let group = 0;
  let previousKey: string | null = null;
  for (const batch of sorted) {
    const key = priorityKey(order, batch);
    if (key !== previousKey) {
      group += 1;
      previousKey = key;
    }
    groups.set(batch.batchId, group);
  }
  return groups;
}

/**
 * Groups batches by warehouse in order of first appearance and sorts each group
 * by the issuance order. Warehouse order carries no meaning.
 */
export function groupByWarehouse<T extends OrderableBatch>(
  order: IssuanceOrder,
  batches: T[]
): Array<{ warehouseId: number; batches: T[] }> {
  const groups = new Map<number, T[]>();
  for (const batch of batches) {
    const group = groups.get(batch.warehouseId);
    if (group) {
      group.push(batch);
    } else {
      groups.set(batch.warehouseId, [batch]);
    }
  }
  const compare = compareByIssuanceOrder(order);
  return Array.from(groups.entries()).map(([warehouseId, group]) => ({
    warehouseId,
    batches: group.sort(compare)
  }));
}
