export { REDIS_CLIENT, createRedisClient, redisProviders } from './redis.providers';
