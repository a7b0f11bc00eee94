import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EmbeddingService } from '../vector-store/types/vector-store.types';
import { generateSimpleEmbedding } from '../vector-store/vector.utils';

/**
 * Offline embeddings from character and word hashing.
 * Selected with EMBEDDING_PROVIDER=local; retrieval quality is lexical only.
 */
@Injectable()
export class LocalEmbeddingService implements EmbeddingService {
    private readonly logger = new Logger(LocalEmbeddingService.name);
    readonly dimensions: number;

    constructor(private readonly configService: ConfigService) {
        this.dimensions = this.configService.get<number>('rag.embeddingDim') ?? 384;
    }

    async embed(texts: string[]): Promise<number[][]> {
        this.logger.debug(`🔄 Generating ${texts.length} local embeddings (${this.dimensions} dimensions)`);
        return texts.map((text) => generateSimpleEmbedding(text, this.dimensions));
    }
}
