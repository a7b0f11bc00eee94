import { describe, expect, it } from '@jest/globals';
import { loadEnv, validateEnv } from './env.schema';

describe('env schema', () => {
  it('applies defaults', () => {
    const env = loadEnv({ OPENAI_API_KEY: 'test-key' });

    expect(env).toMatchObject({
      PORT: 8000,
      RAG_CHUNK_SIZE: 800,
      RAG_CHUNK_OVERLAP: 100,
      RAG_MAX_RESULTS: 5,
      RAG_MAX_HISTORY: 2,
      RAG_LOAD_ON_STARTUP: true,
      EMBEDDING_PROVIDER: 'openai',
      VECTOR_STORE_DRIVER: 'milvus',
      SESSION_STORE: 'memory',
    });
  });

  it('coerces numbers and boolean flags from strings', () => {
    const env = loadEnv({
      OPENAI_API_KEY: 'test-key',
      PORT: '9000',
      RAG_MAX_RESULTS: '3',
      RAG_LOAD_ON_STARTUP: 'false',
    });

    expect(env.PORT).toBe(9000);
    expect(env.RAG_MAX_RESULTS).toBe(3);
    expect(env.RAG_LOAD_ON_STARTUP).toBe(false);
  });

  it('requires an API key', () => {
    expect(() => validateEnv({})).toThrow('Environment validation failed');
  });

  it('requires the chunk overlap to be smaller than the chunk size', () => {
    expect(() =>
      validateEnv({ OPENAI_API_KEY: 'test-key', RAG_CHUNK_SIZE: '100', RAG_CHUNK_OVERLAP: '100' }),
    ).toThrow('RAG_CHUNK_OVERLAP must be smaller than RAG_CHUNK_SIZE');
  });
});
