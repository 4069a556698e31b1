import type { QueryResult, QueryResultRow } from 'pg';

/** A pool or a transaction client, reduced to the one call the stores need. */
export type QueryRunner = <T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
) => Promise<QueryResult<T>>;
