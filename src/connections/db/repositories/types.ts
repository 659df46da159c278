import { QueryResult, QueryResultRow } from 'pg';

/**
 * Anything repositories can run SQL on: the shared pool or a client
 * holding an open transaction
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

/**
 * A parsed autocomplete query. `digits` marks an all-digit query, and `id` is
 * set when those digits also fit an id column.
 */
export interface SearchTerm {
  text: string;
  digits: boolean;
  id: number | null;
}

/** ILIKE pattern matching `text` anywhere, with LIKE wildcards escaped */
export const containsPattern = (text: string): string => `%${text.replace(/[\\%_]/g, '\\$&')}%`;
