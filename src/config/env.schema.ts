import { z } from 'zod';

const booleanFlag = z
  .union([z.boolean(), z.string()])
  .transform((val) => (typeof val === 'boolean' ? val : !['false', '0', 'no', ''].includes(val.toLowerCase())));

export const envSchema = z
  .object({
    // Application
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(8000),
    HOST: z.string().default('0.0.0.0'),
    CORS_ORIGIN: z.string().default('*'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

    // OpenAI Configuration
    OPENAI_API_KEY: z.string().min(1),
    OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
    OPENAI_MODEL: z.string().default('gpt-4o-mini'),
    OPENAI_EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),

    // RAG Pipeline Configuration
    RAG_CHUNK_SIZE: z.coerce.number().int().positive().default(800),
    RAG_CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(100),
    RAG_MAX_RESULTS: z.coerce.number().int().positive().default(5),
    RAG_MAX_HISTORY: z.coerce.number().int().nonnegative().default(2),
    DOCS_PATH: z.string().default('./docs'),
    RAG_LOAD_ON_STARTUP: booleanFlag.default(true),
    EMBEDDING_PROVIDER: z.enum(['openai', 'local']).default('openai'),
    EMBEDDING_DIM: z.coerce.number().int().positive().default(1536),

    // Milvus / Zilliz Cloud
    VECTOR_STORE_DRIVER: z.enum(['milvus', 'memory']).default('milvus'),
    MILVUS_ENDPOINT: z.string().url().default('http://localhost:19530'),
    MILVUS_TOKEN: z.string().default(''),
    MILVUS_TIMEOUT: z.coerce.number().int().positive().default(60000),

    // Sessions
    SESSION_STORE: z.enum(['memory', 'redis']).default('memory'),
    REDIS_URL: z.string().default('redis://localhost:6379'),
    SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(24 * 60 * 60),
  })
  .superRefine((env, ctx) => {
    if (env.RAG_CHUNK_OVERLAP >= env.RAG_CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['RAG_CHUNK_OVERLAP'],
        message: 'RAG_CHUNK_OVERLAP must be smaller than RAG_CHUNK_SIZE',
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: Record<string, unknown> = process.env): Env {
  return envSchema.parse(source);
}

export function validateEnv(config: Record<string, unknown>): Env {
  const result = envSchema.safeParse(config);
  if (!result.success) {
    throw new Error(`Environment validation failed: ${result.error.message}`);
  }
  return result.data;
}
