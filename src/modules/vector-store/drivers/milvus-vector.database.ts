import { Logger, OnModuleDestroy } from '@nestjs/common';
import { DataType, IndexType, MetricType, MilvusClient } from '@zilliz/milvus2-sdk-node';
import { z } from 'zod';
import { errorMessage } from '../../../common/utils/error.util';
import {
    QueryOptions,
    RecordMetadata,
    ScoredRecord,
    StoredRecord,
    VectorCollection,
    VectorDatabase,
    VectorRecord,
} from '../types/vector-store.types';
import { buildFilterExpression, validateEmbeddingDim, withRetryAndTimeout } from '../vector.utils';

export interface MilvusConnectionOptions {
    address: string;
    token?: string;
    timeout: number;
    dimension: number;
}

/** Stored in the Int64 column when a chunk has no lesson */
const NO_LESSON = -1;
const MAX_QUERY_ROWS = 16384;
const OUTPUT_FIELDS = ['id', 'document', 'metadata'];

const metadataSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));

const rowSchema = z.object({
    id: z.union([z.string(), z.number()]).transform(String),
    document: z.string(),
    metadata: z.string(),
    score: z.number().optional(),
});

function parseMetadata(raw: string): RecordMetadata {
    try {
        return metadataSchema.parse(JSON.parse(raw));
    } catch {
        return { raw };
    }
}

function toStoredRecord(row: unknown): StoredRecord & { score: number } {
    const parsed = rowSchema.parse(row);
    return {
        id: parsed.id,
        document: parsed.document,
        metadata: parseMetadata(parsed.metadata),
        score: parsed.score ?? 0,
    };
}

/**
 * Collection backed by a Milvus/Zilliz collection.
 * Filterable fields are stored as scalar columns; the full metadata as JSON text.
 */
export class MilvusVectorCollection implements VectorCollection {
    private readonly logger = new Logger(MilvusVectorCollection.name);

    constructor(
        private readonly client: MilvusClient,
        readonly name: string,
        private readonly dimension: number,
    ) { }

    async add(records: VectorRecord[]): Promise<void> {
        if (records.length === 0) {
            return;
        }

        const rows = records.map((record) => {
            validateEmbeddingDim(record.embedding, this.dimension);
            const courseTitle = record.metadata.course_title ?? record.metadata.title;
            const lessonNumber = record.metadata.lesson_number;
            return {
                id: record.id,
                embedding: record.embedding,
                document: record.document,
                course_title: typeof courseTitle === 'string' ? courseTitle : '',
                lesson_number: typeof lessonNumber === 'number' ? lessonNumber : NO_LESSON,
                metadata: JSON.stringify(record.metadata),
            };
        });

        await this.client.upsert({
            collection_name: this.name,
            data: rows,
        });

        this.logger.log(`✅ Upserted ${rows.length} records into ${this.name}`);
    }

    async query(embedding: number[], options: QueryOptions): Promise<ScoredRecord[]> {
        const response = await this.client.search({
            collection_name: this.name,
            data: embedding,
            limit: options.limit,
            output_fields: OUTPUT_FIELDS,
            filter: options.filter ? buildFilterExpression(options.filter) : undefined,
            metric_type: MetricType.COSINE,
            params: { nprobe: 16 },
        });

        // Single-vector searches may come back nested one level
        const rows = z.array(z.unknown()).parse(response.results).flat();
        const results = rows.map((row) => {
            const { score, ...record } = toStoredRecord(row);
            return { ...record, distance: 1 - score };
        });

        this.logger.debug(`🔍 Search completed: found ${results.length} results in ${this.name}`);
        return results;
    }

    async get(options: { ids?: string[] } = {}): Promise<StoredRecord[]> {
        if (options.ids && options.ids.length === 0) {
            return [];
        }

        const response = await this.client.query({
            collection_name: this.name,
            filter: options.ids ? `id in ${JSON.stringify(options.ids)}` : 'id != ""',
            output_fields: OUTPUT_FIELDS,
            limit: MAX_QUERY_ROWS,
        });

        return z
            .array(z.unknown())
            .parse(response.data)
            .map((row) => {
                const { score: _score, ...record } = toStoredRecord(row);
                return record;
            });
    }

    async count(): Promise<number> {
        const response = await this.client.count({ collection_name: this.name });
        return z.coerce.number().parse(response.data);
    }
}

/**
 * Milvus/Zilliz Cloud driver. Connects on first use.
 */
export class MilvusVectorDatabase implements VectorDatabase, OnModuleDestroy {
    private readonly logger = new Logger(MilvusVectorDatabase.name);
    private client?: MilvusClient;
    private readonly collections = new Map<string, MilvusVectorCollection>();

    constructor(private readonly options: MilvusConnectionOptions) { }

    async onModuleDestroy(): Promise<void> {
        try {
            if (this.client) {
                await this.client.closeConnection();
                this.logger.log('✅ Milvus connection closed');
            }
        } catch (error) {
            this.logger.error(`Error disconnecting from Milvus: ${errorMessage(error)}`);
        }
    }

    private getClient(): MilvusClient {
        if (!this.client) {
            this.logger.log(`🔗 Connecting to Milvus at ${this.options.address}...`);
            this.client = new MilvusClient({
                address: this.options.address,
                token: this.options.token || undefined,
                timeout: this.options.timeout,
            });
        }
        return this.client;
    }

    async getOrCreateCollection(name: string): Promise<VectorCollection> {
        const cached = this.collections.get(name);
        if (cached) {
            return cached;
        }

        const client = this.getClient();
        try {
            const response = await withRetryAndTimeout(
                () => client.hasCollection({ collection_name: name }),
                {
                    maxRetries: 3,
                    timeoutMs: 15000,
                    initialDelayMs: 500,
                    operationName: `Check collection ${name}`,
                },
            );

            if (!response.value) {
                this.logger.log(`📦 Creating collection: ${name}`);
                await this.createCollection(client, name);
            }

            await client.loadCollectionSync({ collection_name: name });

            const collection = new MilvusVectorCollection(client, name, this.options.dimension);
            this.collections.set(name, collection);
            return collection;
        } catch (error) {
            this.logger.error(`Failed to ensure collection ${name}: ${errorMessage(error)}`);
            throw error;
        }
    }

    private async createCollection(client: MilvusClient, name: string): Promise<void> {
        await client.createCollection({
            collection_name: name,
            description: `Collection: ${name}`,
            fields: [
                { name: 'id', data_type: DataType.VarChar, is_primary_key: true, autoID: false, max_length: 512 },
                { name: 'embedding', data_type: DataType.FloatVector, dim: this.options.dimension },
                { name: 'document', data_type: DataType.VarChar, max_length: 65535 },
                { name: 'course_title', data_type: DataType.VarChar, max_length: 1024 },
                { name: 'lesson_number', data_type: DataType.Int64 },
                { name: 'metadata', data_type: DataType.VarChar, max_length: 65535 },
            ],
        });

        await client.createIndex({
            collection_name: name,
            field_name: 'embedding',
            index_type: IndexType.IVF_FLAT,
            metric_type: MetricType.COSINE,
            params: { nlist: 128 },
        });

        this.logger.log(`✅ Collection ${name} created with index`);
    }

    async deleteCollection(name: string): Promise<void> {
        this.collections.delete(name);
        const client = this.getClient();
        const response = await client.hasCollection({ collection_name: name });
        if (response.value) {
            await client.dropCollection({ collection_name: name });
            this.logger.log(`✅ Collection ${name} deleted`);
        }
    }

    async checkHealth(): Promise<boolean> {
        const response = await this.getClient().checkHealth();
        return response.isHealthy;
    }
}
