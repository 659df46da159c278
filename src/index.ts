import { createApp } from './app';
import { appConfig, redisConfig } from './connections/config';
import { connectDatabase, connectRedis, createPgDatabase, pool, redisClient } from './connections';
import { MemoryProjectionCache, ProjectionCache, RedisProjectionCache } from './utils/cache';
import { logger } from './utils/logging';

const PORT = appConfig.port;

const createCache = async (): Promise<ProjectionCache> => {
  if (!redisConfig.enabled) {
    logger.info('Redis disabled, using in-memory projection cache');
    return new MemoryProjectionCache(redisConfig.ttlSeconds);
  }

  logger.info('Connecting to Redis...');
  await connectRedis();
  return new RedisProjectionCache(redisClient, redisConfig.ttlSeconds);
};

/**
 * Initialize connections and start server
 */
const startServer = async () => {
  logger.info('Initializing connections...');

  logger.info('Connecting to database...');
  await connectDatabase();

  const cache = await createCache();
  const app = createApp({ db: createPgDatabase(pool), cache });

  app.listen(PORT, () => {
    logger.info(`Server is running on port ${PORT}`);
    logger.info(`Environment: ${appConfig.nodeEnv}`);
    logger.info('All services are ready!');
  });
};

startServer().catch((error: unknown) => {
  logger.error('Failed to start server', {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  logger.error('Exiting application...');
  process.exit(1);
});
