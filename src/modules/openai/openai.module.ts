import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EMBEDDING_SERVICE, EmbeddingService } from '../vector-store/types/vector-store.types';
import { LocalEmbeddingService } from './local-embedding.service';
import { OpenAIService } from './openai.service';

/**
 * OpenAI Module - chat completions and the embedding provider
 */
@Module({
    providers: [
        OpenAIService,
        LocalEmbeddingService,
        {
            provide: EMBEDDING_SERVICE,
            inject: [ConfigService, OpenAIService, LocalEmbeddingService],
            useFactory: (
                configService: ConfigService,
                openai: OpenAIService,
                local: LocalEmbeddingService,
            ): EmbeddingService =>
                configService.get<string>('rag.embeddingProvider') === 'local' ? local : openai,
        },
    ],
    exports: [OpenAIService, EMBEDDING_SERVICE],
})
export class OpenAIModule { }
