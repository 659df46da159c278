export { redisClient, connectRedis, disconnectRedis } from './redis.connection';
export type { RedisClient } from './redis.connection';
