export { pool, connectDatabase, withTransaction } from './connection';
export { migrate, rollback } from './migrate';
export { createPgDatabase, createDataStore } from './store';
export type { Database, DataStore } from './store';
