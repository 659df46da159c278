import dotenv from 'dotenv';

dotenv.config();

export const redisConfig = {
  enabled: process.env.REDIS_ENABLED !== 'false',
  host: process.env.REDIS_HOST || 'localhost',
  port: parseInt(process.env.REDIS_PORT || '6379'),
  password: process.env.REDIS_PASSWORD || '',
  db: parseInt(process.env.REDIS_DB || '0'),
  // Seconds a cached read projection stays valid
  ttlSeconds: parseInt(process.env.REDIS_CACHE_TTL || '60'),
};
