import { clientRunner, query, withTransaction } from '../db';
import { createPgAllocationStore, type AllocationDataSource, type AllocationStore } from '../domains/allocation';

export const pgAllocationDataSource: AllocationDataSource = {
  store: createPgAllocationStore(query),
  transaction<T>(work: (store: AllocationStore) => Promise<T>): Promise<T> {
    return withTransaction((client) => work(createPgAllocationStore(clientRunner(client))));
  }
};
