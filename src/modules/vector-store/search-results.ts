import { RecordMetadata, ScoredRecord } from './types/vector-store.types';

/**
 * Parallel lists of documents, metadata and distances returned by a search
 */
export class SearchResults {
    readonly documents: string[];
    readonly metadata: RecordMetadata[];
    readonly distances: number[];
    readonly error?: string;

    constructor(init: { documents: string[]; metadata: RecordMetadata[]; distances: number[]; error?: string }) {
        this.documents = init.documents;
        this.metadata = init.metadata;
        this.distances = init.distances;
        this.error = init.error;
    }

    static fromRecords(records: ScoredRecord[]): SearchResults {
        return new SearchResults({
            documents: records.map((r) => r.document),
            metadata: records.map((r) => r.metadata),
            distances: records.map((r) => r.distance),
        });
    }

    static empty(error?: string): SearchResults {
        return new SearchResults({ documents: [], metadata: [], distances: [], error });
    }

    isEmpty(): boolean {
        return this.documents.length === 0;
    }
}
