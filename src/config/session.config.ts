import { registerAs } from '@nestjs/config';
import { loadEnv } from './env.schema';

export default registerAs('session', () => {
  const env = loadEnv();
  return {
    store: env.SESSION_STORE,
    redisUrl: env.REDIS_URL,
    ttlSeconds: env.SESSION_TTL_SECONDS,
  };
});
