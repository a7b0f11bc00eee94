import { registerAs } from '@nestjs/config';
import { loadEnv } from './env.schema';

export default registerAs('vectorStore', () => {
  const env = loadEnv();
  return {
    driver: env.VECTOR_STORE_DRIVER,
    milvusEndpoint: env.MILVUS_ENDPOINT,
    milvusToken: env.MILVUS_TOKEN,
    milvusTimeout: env.MILVUS_TIMEOUT,
  };
});
