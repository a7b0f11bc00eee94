import { Logger } from '@nestjs/common';
import {
    QueryOptions,
    ScoredRecord,
    StoredRecord,
    VectorCollection,
    VectorDatabase,
    VectorRecord,
} from '../types/vector-store.types';
import { cosineSimilarity, matchesFilter } from '../vector.utils';

/**
 * Process-local collection with exact cosine search
 */
export class InMemoryVectorCollection implements VectorCollection {
    private readonly records = new Map<string, VectorRecord>();

    constructor(readonly name: string) { }

    async add(records: VectorRecord[]): Promise<void> {
        for (const record of records) {
            this.records.set(record.id, {
                ...record,
                embedding: [...record.embedding],
                metadata: { ...record.metadata },
            });
        }
    }

    async query(embedding: number[], options: QueryOptions): Promise<ScoredRecord[]> {
        const { filter } = options;
        const candidates = [...this.records.values()].filter(
            (record) => !filter || matchesFilter(record.metadata, filter),
        );

        return candidates
            .map((record) => ({
                id: record.id,
                document: record.document,
                metadata: { ...record.metadata },
                distance: 1 - cosineSimilarity(embedding, record.embedding),
            }))
            .sort((a, b) => a.distance - b.distance)
            .slice(0, options.limit);
    }

    async get(options: { ids?: string[] } = {}): Promise<StoredRecord[]> {
        const selected = options.ids
            ? options.ids.flatMap((id) => {
                const record = this.records.get(id);
                return record ? [record] : [];
            })
            : [...this.records.values()];

        return selected.map((record) => ({
            id: record.id,
            document: record.document,
            metadata: { ...record.metadata },
        }));
    }

    async count(): Promise<number> {
        return this.records.size;
    }
}

/**
 * In-memory vector database, used for local runs and tests
 */
export class InMemoryVectorDatabase implements VectorDatabase {
    private readonly logger = new Logger(InMemoryVectorDatabase.name);
    private readonly collections = new Map<string, InMemoryVectorCollection>();

    async getOrCreateCollection(name: string): Promise<VectorCollection> {
        let collection = this.collections.get(name);
        if (!collection) {
            collection = new InMemoryVectorCollection(name);
            this.collections.set(name, collection);
            this.logger.debug(`📦 Created in-memory collection: ${name}`);
        }
        return collection;
    }

    async deleteCollection(name: string): Promise<void> {
        this.collections.delete(name);
        this.logger.debug(`🗑️ Deleted in-memory collection: ${name}`);
    }

    async checkHealth(): Promise<boolean> {
        return true;
    }
}
