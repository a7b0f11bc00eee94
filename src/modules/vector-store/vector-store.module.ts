import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OpenAIModule } from '../openai/openai.module';
import { InMemoryVectorDatabase } from './drivers/in-memory-vector.database';
import { MilvusVectorDatabase } from './drivers/milvus-vector.database';
import { VECTOR_DATABASE, VectorDatabase } from './types/vector-store.types';
import { VectorStoreService } from './vector-store.service';

/**
 * Vector Store Module - course catalog and content collections
 * VECTOR_STORE_DRIVER selects Milvus/Zilliz Cloud or the in-memory driver
 */
@Module({
    imports: [OpenAIModule],
    providers: [
        {
            provide: VECTOR_DATABASE,
            inject: [ConfigService],
            useFactory: (configService: ConfigService): VectorDatabase => {
                if (configService.get<string>('vectorStore.driver') === 'memory') {
                    return new InMemoryVectorDatabase();
                }
                return new MilvusVectorDatabase({
                    address: configService.get<string>('vectorStore.milvusEndpoint') ?? 'http://localhost:19530',
                    token: configService.get<string>('vectorStore.milvusToken'),
                    timeout: configService.get<number>('vectorStore.milvusTimeout') ?? 60000,
                    dimension: configService.get<number>('rag.embeddingDim') ?? 1536,
                });
            },
        },
        VectorStoreService,
    ],
    exports: [VECTOR_DATABASE, VectorStoreService],
})
export class VectorStoreModule { }
