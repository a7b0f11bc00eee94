import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { errorMessage } from '../../common/utils/error.util';
import { Course, CourseChunk } from '../rag/types';
import { SearchResults } from './search-results';
import {
    CourseCatalogEntry,
    CourseSearchRequest,
    EMBEDDING_SERVICE,
    EmbeddingService,
    LessonSummary,
    RecordMetadata,
    SearchFilter,
    VECTOR_DATABASE,
    VectorCollection,
    VectorDatabase,
} from './types/vector-store.types';

export const CATALOG_COLLECTION = 'course_catalog';
export const CONTENT_COLLECTION = 'course_content';

const lessonSchema = z.object({
    lesson_number: z.number(),
    lesson_title: z.string(),
    lesson_link: z.string().nullable().default(null),
});

const catalogMetadataSchema = z.object({
    title: z.string(),
    instructor: z.string().nullable().default(null),
    course_link: z.string().nullable().default(null),
    lesson_count: z.number().optional(),
    lessons_json: z.string().default('[]'),
});

/**
 * Course-aware vector store: a catalog of course records (used to resolve
 * fuzzy course names) and the chunked course content.
 */
@Injectable()
export class VectorStoreService {
    private readonly logger = new Logger(VectorStoreService.name);
    readonly maxResults: number;

    constructor(
        private readonly configService: ConfigService,
        @Inject(VECTOR_DATABASE) private readonly database: VectorDatabase,
        @Inject(EMBEDDING_SERVICE) private readonly embeddings: EmbeddingService,
    ) {
        this.maxResults = this.configService.get<number>('rag.maxResults') ?? 5;
    }

    private catalog(): Promise<VectorCollection> {
        return this.database.getOrCreateCollection(CATALOG_COLLECTION);
    }

    private content(): Promise<VectorCollection> {
        return this.database.getOrCreateCollection(CONTENT_COLLECTION);
    }

    private async embedOne(text: string): Promise<number[]> {
        const [embedding] = await this.embeddings.embed([text]);
        return embedding;
    }

    /**
     * Search course content, optionally scoped to a course and/or lesson
     */
    async search(request: CourseSearchRequest): Promise<SearchResults> {
        const { query, courseName, lessonNumber } = request;

        let courseTitle: string | undefined;
        if (courseName) {
            const resolved = await this.resolveCourseName(courseName);
            if (!resolved) {
                return SearchResults.empty(`No course found matching '${courseName}'`);
            }
            courseTitle = resolved;
        }

        const filter = this.buildFilter(courseTitle, lessonNumber);
        const limit = request.limit ?? this.maxResults;

        try {
            const embedding = await this.embedOne(query);
            const collection = await this.content();
            const records = await collection.query(embedding, { limit, filter });
            this.logger.debug(`🔍 Found ${records.length} chunks for "${query}"`);
            return SearchResults.fromRecords(records);
        } catch (error) {
            this.logger.error(`❌ Search failed: ${errorMessage(error)}`);
            return SearchResults.empty(`Search error: ${errorMessage(error)}`);
        }
    }

    /**
     * Resolve a partial course name to the closest catalog title
     */
    async resolveCourseName(courseName: string): Promise<string | null> {
        try {
            const embedding = await this.embedOne(courseName);
            const catalog = await this.catalog();
            const [best] = await catalog.query(embedding, { limit: 1 });
            const title = best?.metadata.title;
            return typeof title === 'string' ? title : null;
        } catch (error) {
            this.logger.warn(`⚠️ Course name resolution failed for '${courseName}': ${errorMessage(error)}`);
            return null;
        }
    }

    buildFilter(courseTitle?: string, lessonNumber?: number): SearchFilter | undefined {
        const filters: SearchFilter[] = [];
        if (courseTitle) {
            filters.push({ operator: 'eq', field: 'course_title', value: courseTitle });
        }
        if (lessonNumber !== undefined) {
            filters.push({ operator: 'eq', field: 'lesson_number', value: lessonNumber });
        }

        if (filters.length === 0) {
            return undefined;
        }
        return filters.length === 1 ? filters[0] : { operator: 'and', filters };
    }

    /**
     * Store a course record in the catalog
     */
    async addCourseMetadata(course: Course): Promise<void> {
        const lessons: LessonSummary[] = course.lessons.map((lesson) => ({
            lesson_number: lesson.lessonNumber,
            lesson_title: lesson.title,
            lesson_link: lesson.lessonLink ?? null,
        }));

        const metadata: RecordMetadata = {
            title: course.title,
            instructor: course.instructor ?? null,
            course_link: course.courseLink ?? null,
            lesson_count: course.lessons.length,
            lessons_json: JSON.stringify(lessons),
        };

        const catalog = await this.catalog();
        await catalog.add([
            {
                id: course.title,
                document: course.title,
                embedding: await this.embedOne(course.title),
                metadata,
            },
        ]);

        this.logger.log(`📚 Added course to catalog: ${course.title}`);
    }

    /**
     * Store course chunks
     */
    async addCourseContent(chunks: CourseChunk[]): Promise<void> {
        if (chunks.length === 0) {
            return;
        }

        const embeddings = await this.embeddings.embed(chunks.map((chunk) => chunk.content));
        const content = await this.content();
        await content.add(
            chunks.map((chunk, index) => ({
                id: `${chunk.courseTitle.replace(/ /g, '_')}_${chunk.chunkIndex}`,
                document: chunk.content,
                embedding: embeddings[index],
                metadata: {
                    course_title: chunk.courseTitle,
                    lesson_number: chunk.lessonNumber ?? null,
                    chunk_index: chunk.chunkIndex,
                },
            })),
        );

        this.logger.log(`📄 Added ${chunks.length} chunks to ${CONTENT_COLLECTION}`);
    }

    /**
     * Drop and recreate both collections
     */
    async clearAllData(): Promise<void> {
        try {
            await this.database.deleteCollection(CATALOG_COLLECTION);
            await this.database.deleteCollection(CONTENT_COLLECTION);
            await this.catalog();
            await this.content();
            this.logger.log('🗑️ Cleared all course data');
        } catch (error) {
            this.logger.error(`Failed to clear data: ${errorMessage(error)}`);
        }
    }

    async getExistingCourseTitles(): Promise<string[]> {
        try {
            const catalog = await this.catalog();
            return (await catalog.get()).map((record) => record.id);
        } catch (error) {
            this.logger.error(`Failed to list course titles: ${errorMessage(error)}`);
            return [];
        }
    }

    async getCourseCount(): Promise<number> {
        try {
            const catalog = await this.catalog();
            return await catalog.count();
        } catch (error) {
            this.logger.error(`Failed to count courses: ${errorMessage(error)}`);
            return 0;
        }
    }

    /**
     * All catalog entries with their lessons decoded
     */
    async getAllCoursesMetadata(): Promise<CourseCatalogEntry[]> {
        try {
            const catalog = await this.catalog();
            const records = await catalog.get();
            return records.flatMap((record) => {
                const entry = this.toCatalogEntry(record.metadata);
                return entry ? [entry] : [];
            });
        } catch (error) {
            this.logger.error(`Failed to read course metadata: ${errorMessage(error)}`);
            return [];
        }
    }

    async getCourseLink(courseTitle: string): Promise<string | null> {
        const entry = await this.getCatalogEntry(courseTitle);
        return entry?.course_link ?? null;
    }

    async getLessonLink(courseTitle: string, lessonNumber: number): Promise<string | null> {
        const entry = await this.getCatalogEntry(courseTitle);
        const lesson = entry?.lessons.find((l) => l.lesson_number === lessonNumber);
        return lesson?.lesson_link ?? null;
    }

    /**
     * Catalog entry for a (possibly partial) course name
     */
    async getCourseOutline(courseName: string): Promise<CourseCatalogEntry | null> {
        const title = await this.resolveCourseName(courseName);
        if (!title) {
            return null;
        }
        return this.getCatalogEntry(title);
    }

    private async getCatalogEntry(courseTitle: string): Promise<CourseCatalogEntry | null> {
        try {
            const catalog = await this.catalog();
            const [record] = await catalog.get({ ids: [courseTitle] });
            return record ? this.toCatalogEntry(record.metadata) : null;
        } catch (error) {
            this.logger.error(`Failed to read catalog entry '${courseTitle}': ${errorMessage(error)}`);
            return null;
        }
    }

    private toCatalogEntry(metadata: RecordMetadata): CourseCatalogEntry | null {
        const parsed = catalogMetadataSchema.safeParse(metadata);
        if (!parsed.success) {
            this.logger.warn(`⚠️ Skipping malformed catalog entry: ${parsed.error.message}`);
            return null;
        }

        let lessons: LessonSummary[] = [];
        try {
            lessons = z.array(lessonSchema).parse(JSON.parse(parsed.data.lessons_json));
        } catch (error) {
            this.logger.warn(`⚠️ Invalid lessons for '${parsed.data.title}': ${errorMessage(error)}`);
        }

        return {
            title: parsed.data.title,
            instructor: parsed.data.instructor,
            course_link: parsed.data.course_link,
            lesson_count: parsed.data.lesson_count ?? lessons.length,
            lessons,
        };
    }
}
