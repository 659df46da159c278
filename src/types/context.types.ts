import { Database } from '../connections/db/store';
import { ProjectionCache } from '../utils/cache';

/**
 * Dependencies every router and service is built from
 */
export interface AppContext {
  db: Database;
  cache: ProjectionCache;
}
