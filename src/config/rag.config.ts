import { registerAs } from '@nestjs/config';
import { loadEnv } from './env.schema';

export default registerAs('rag', () => {
  const env = loadEnv();
  return {
    chunkSize: env.RAG_CHUNK_SIZE,
    chunkOverlap: env.RAG_CHUNK_OVERLAP,
    maxResults: env.RAG_MAX_RESULTS,
    maxHistory: env.RAG_MAX_HISTORY,
    docsPath: env.DOCS_PATH,
    loadOnStartup: env.RAG_LOAD_ON_STARTUP,
    embeddingProvider: env.EMBEDDING_PROVIDER,
    embeddingDim: env.EMBEDDING_DIM,
  };
});
