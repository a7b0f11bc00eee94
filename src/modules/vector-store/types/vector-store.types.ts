/**
 * Vector database types shared by every driver
 */

export type MetadataValue = string | number | boolean | null;

export type RecordMetadata = Record<string, MetadataValue>;

export interface VectorRecord {
    id: string;
    document: string;
    embedding: number[];
    metadata: RecordMetadata;
}

export interface StoredRecord {
    id: string;
    document: string;
    metadata: RecordMetadata;
}

export interface ScoredRecord extends StoredRecord {
    /** Cosine distance, lower is closer */
    distance: number;
}

export type FilterField = 'course_title' | 'lesson_number';

export type SearchFilter =
    | { operator: 'eq'; field: FilterField; value: string | number }
    | { operator: 'and'; filters: SearchFilter[] };

export interface QueryOptions {
    limit: number;
    filter?: SearchFilter;
}

export interface VectorCollection {
    readonly name: string;
    add(records: VectorRecord[]): Promise<void>;
    query(embedding: number[], options: QueryOptions): Promise<ScoredRecord[]>;
    get(options?: { ids?: string[] }): Promise<StoredRecord[]>;
    count(): Promise<number>;
}

export interface VectorDatabase {
    getOrCreateCollection(name: string): Promise<VectorCollection>;
    deleteCollection(name: string): Promise<void>;
    checkHealth(): Promise<boolean>;
}

export interface EmbeddingService {
    readonly dimensions: number;
    embed(texts: string[]): Promise<number[][]>;
}

export const VECTOR_DATABASE = Symbol('VECTOR_DATABASE');
export const EMBEDDING_SERVICE = Symbol('EMBEDDING_SERVICE');

export interface LessonSummary {
    lesson_number: number;
    lesson_title: string;
    lesson_link: string | null;
}

export interface CourseCatalogEntry {
    title: string;
    instructor: string | null;
    course_link: string | null;
    lesson_count: number;
    lessons: LessonSummary[];
}

export interface CourseSearchRequest {
    query: string;
    courseName?: string;
    lessonNumber?: number;
    limit?: number;
}
