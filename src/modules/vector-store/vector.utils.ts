import { RecordMetadata, SearchFilter } from './types/vector-store.types';

/**
 * Utility functions for vector operations
 */

/**
 * Generate a deterministic embedding from character codes.
 * Works offline; only lexical overlap is captured.
 */
export function generateSimpleEmbedding(text: string, dim: number = 384): number[] {
    const embedding = new Array<number>(dim).fill(0);
    const normalized = text.toLowerCase();

    for (let i = 0; i < normalized.length; i++) {
        embedding[i % dim] += normalized.charCodeAt(i) / 1000;
    }

    // Word buckets, so that shared words move vectors closer
    for (const word of normalized.split(/[^a-z0-9]+/).filter((w) => w.length > 2)) {
        embedding[hashString(word) % dim] += 1;
    }

    return normalizeEmbedding(embedding);
}

function hashString(value: string): number {
    let hash = 0;
    for (let i = 0; i < value.length; i++) {
        hash = (hash << 5) - hash + value.charCodeAt(i);
        hash = hash & hash; // Convert to 32bit integer
    }
    return Math.abs(hash);
}

/**
 * Validate embedding dimension
 */
export function validateEmbeddingDim(embedding: number[], expectedDim: number): boolean {
    if (embedding.length !== expectedDim) {
        throw new Error(
            `Embedding dimension mismatch: expected ${expectedDim}, got ${embedding.length}`,
        );
    }

    return true;
}

/**
 * Normalize embedding vector
 */
export function normalizeEmbedding(embedding: number[]): number[] {
    const norm = Math.sqrt(embedding.reduce((sum, val) => sum + val * val, 0));

    if (norm === 0) {
        return embedding;
    }

    return embedding.map((val) => val / norm);
}

/**
 * Calculate cosine similarity between two embeddings
 */
export function cosineSimilarity(a: number[], b: number[]): number {
    if (a.length !== b.length) {
        throw new Error('Embeddings must have the same dimension');
    }

    let dotProduct = 0;
    let normA = 0;
    let normB = 0;

    for (let i = 0; i < a.length; i++) {
        dotProduct += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }

    const denominator = Math.sqrt(normA) * Math.sqrt(normB);

    if (denominator === 0) {
        return 0;
    }

    return dotProduct / denominator;
}

/**
 * Build Milvus boolean expression from a SearchFilter
 */
export function buildFilterExpression(filter: SearchFilter): string {
    switch (filter.operator) {
        case 'eq':
            // JSON string literals carry the escaping Milvus expects
            return typeof filter.value === 'string'
                ? `${filter.field} == ${JSON.stringify(filter.value)}`
                : `${filter.field} == ${filter.value}`;
        case 'and':
            return filter.filters.map((f) => `(${buildFilterExpression(f)})`).join(' && ');
    }
}

/**
 * Evaluate a SearchFilter against record metadata
 */
export function matchesFilter(metadata: RecordMetadata, filter: SearchFilter): boolean {
    switch (filter.operator) {
        case 'eq':
            return metadata[filter.field] === filter.value;
        case 'and':
            return filter.filters.every((f) => matchesFilter(metadata, f));
    }
}

/**
 * Execute function with timeout
 */
export async function withTimeout<T>(
    fn: () => Promise<T>,
    timeoutMs: number = 30000,
    operationName: string = 'Operation',
): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    try {
        return await Promise.race([
            fn(),
            new Promise<T>((_, reject) => {
                timer = setTimeout(
                    () => reject(new Error(`${operationName} timed out after ${timeoutMs}ms`)),
                    timeoutMs,
                );
            }),
        ]);
    } finally {
        clearTimeout(timer);
    }
}

/**
 * Execute with retry and timeout
 */
export async function withRetryAndTimeout<T>(
    fn: () => Promise<T>,
    options: {
        maxRetries?: number;
        timeoutMs?: number;
        initialDelayMs?: number;
        operationName?: string;
    } = {},
): Promise<T> {
    const {
        maxRetries = 2,
        timeoutMs = 30000,
        initialDelayMs = 500,
        operationName = 'Operation',
    } = options;

    let lastError: Error = new Error('Unknown error');

    for (let attempt = 0; attempt < maxRetries; attempt++) {
        try {
            return await withTimeout(fn, timeoutMs, operationName);
        } catch (error) {
            lastError = error instanceof Error ? error : new Error(String(error));

            if (attempt < maxRetries - 1) {
                const delayMs = initialDelayMs * Math.pow(2, attempt);
                await new Promise((resolve) => setTimeout(resolve, delayMs));
            }
        }
    }

    throw lastError;
}
