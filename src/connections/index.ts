// Database
export { pool, migrate, connectDatabase, createPgDatabase } from './db';
export type { Database, DataStore } from './db';

// Redis
export { redisClient, connectRedis, disconnectRedis } from './redis';

// Config - All configurations in one place
export { appConfig, dbConfig, redisConfig } from './config';
