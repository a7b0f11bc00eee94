import { registerAs } from '@nestjs/config';
import { loadEnv } from './env.schema';

export default registerAs('app', () => {
  const env = loadEnv();
  return {
    env: env.NODE_ENV,
    port: env.PORT,
    host: env.HOST,
    corsOrigin: env.CORS_ORIGIN,
    logLevel: env.LOG_LEVEL,
  };
});
