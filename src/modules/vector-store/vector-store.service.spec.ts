import { beforeEach, describe, expect, it } from '@jest/globals';
import { ConfigService } from '@nestjs/config';
import { LocalEmbeddingService } from '../openai/local-embedding.service';
import { Course, CourseChunk } from '../rag/types';
import { InMemoryVectorDatabase } from './drivers/in-memory-vector.database';
import { EmbeddingService } from './types/vector-store.types';
import { CATALOG_COLLECTION, CONTENT_COLLECTION, VectorStoreService } from './vector-store.service';

const course: Course = {
    title: 'Python Basics',
    courseLink: 'https://example.com/py',
    instructor: 'Test Instructor',
    lessons: [
        { lessonNumber: 1, title: 'Intro', lessonLink: 'https://example.com/py/1' },
        { lessonNumber: 2, title: 'Variables' },
    ],
};

const chunks: CourseChunk[] = [
    { content: 'Lesson 1 content: Python is a programming language.', courseTitle: 'Python Basics', lessonNumber: 1, chunkIndex: 0 },
    { content: 'Lesson 2 content: Variables store values in Python.', courseTitle: 'Python Basics', lessonNumber: 2, chunkIndex: 1 },
    { content: 'Lesson 1 content: JavaScript runs in the browser.', courseTitle: 'Web Basics', lessonNumber: 1, chunkIndex: 0 },
];

describe('VectorStoreService', () => {
    let database: InMemoryVectorDatabase;
    let embeddings: EmbeddingService;
    let store: VectorStoreService;

    const createStore = (embeddingService: EmbeddingService = embeddings): VectorStoreService =>
        new VectorStoreService(new ConfigService({ rag: { maxResults: 5 } }), database, embeddingService);

    beforeEach(() => {
        database = new InMemoryVectorDatabase();
        embeddings = new LocalEmbeddingService(new ConfigService({ rag: { embeddingDim: 64 } }));
        store = createStore();
    });

    describe('catalog', () => {
        beforeEach(async () => {
            await store.addCourseMetadata(course);
        });

        it('lists and counts stored courses', async () => {
            expect(await store.getExistingCourseTitles()).toEqual(['Python Basics']);
            expect(await store.getCourseCount()).toBe(1);
        });

        it('decodes lessons from the stored metadata', async () => {
            expect(await store.getAllCoursesMetadata()).toEqual([
                {
                    title: 'Python Basics',
                    instructor: 'Test Instructor',
                    course_link: 'https://example.com/py',
                    lesson_count: 2,
                    lessons: [
                        { lesson_number: 1, lesson_title: 'Intro', lesson_link: 'https://example.com/py/1' },
                        { lesson_number: 2, lesson_title: 'Variables', lesson_link: null },
                    ],
                },
            ]);
        });

        it('keeps a catalog entry whose lessons cannot be decoded', async () => {
            const catalog = await database.getOrCreateCollection(CATALOG_COLLECTION);
            const [embedding] = await embeddings.embed(['Broken']);
            await catalog.add([
                { id: 'Broken', document: 'Broken', embedding, metadata: { title: 'Broken', lessons_json: 'not json' } },
            ]);

            const entries = await store.getAllCoursesMetadata();

            expect(entries.find((entry) => entry.title === 'Broken')).toEqual({
                title: 'Broken',
                instructor: null,
                course_link: null,
                lesson_count: 0,
                lessons: [],
            });
        });

        it('returns course and lesson links, or null when missing', async () => {
            expect(await store.getCourseLink('Python Basics')).toBe('https://example.com/py');
            expect(await store.getCourseLink('Unknown Course')).toBeNull();
            expect(await store.getLessonLink('Python Basics', 1)).toBe('https://example.com/py/1');
            expect(await store.getLessonLink('Python Basics', 2)).toBeNull();
            expect(await store.getLessonLink('Python Basics', 9)).toBeNull();
        });

        it('resolves a partial course name to the catalog title', async () => {
            expect(await store.resolveCourseName('Python')).toBe('Python Basics');

            const outline = await store.getCourseOutline('python');
            expect(outline?.title).toBe('Python Basics');
            expect(outline?.lessons.map((lesson) => lesson.lesson_title)).toEqual(['Intro', 'Variables']);
        });
    });

    describe('content', () => {
        it('stores chunks under course-derived ids', async () => {
            await store.addCourseContent(chunks);

            const content = await database.getOrCreateCollection(CONTENT_COLLECTION);
            const records = await content.get({ ids: ['Python_Basics_0', 'Python_Basics_1', 'Web_Basics_0'] });

            expect(records.map((record) => record.id)).toEqual(['Python_Basics_0', 'Python_Basics_1', 'Web_Basics_0']);
            expect(records[0].metadata).toEqual({ course_title: 'Python Basics', lesson_number: 1, chunk_index: 0 });
        });

        it('ignores an empty chunk list', async () => {
            await store.addCourseContent([]);

            const content = await database.getOrCreateCollection(CONTENT_COLLECTION);
            expect(await content.count()).toBe(0);
        });
    });

    describe('search', () => {
        beforeEach(async () => {
            await store.addCourseMetadata(course);
            await store.addCourseContent(chunks);
        });

        it('searches all content without filters', async () => {
            const results = await store.search({ query: 'programming' });

            expect(results.error).toBeUndefined();
            expect(results.documents).toHaveLength(3);
            expect(results.distances).toHaveLength(3);
        });

        it('restricts results to the resolved course', async () => {
            const results = await store.search({ query: 'variables', courseName: 'Python' });

            expect(results.documents).toHaveLength(2);
            expect(results.metadata.map((metadata) => metadata.course_title)).toEqual(['Python Basics', 'Python Basics']);
        });

        it('restricts results to a lesson', async () => {
            const results = await store.search({ query: 'anything', lessonNumber: 2 });

            expect(results.documents).toEqual(['Lesson 2 content: Variables store values in Python.']);
        });

        it('combines course and lesson filters', async () => {
            const results = await store.search({ query: 'language', courseName: 'Python', lessonNumber: 1 });

            expect(results.documents).toEqual(['Lesson 1 content: Python is a programming language.']);
        });

        it('honours an explicit limit', async () => {
            const results = await store.search({ query: 'content', limit: 1 });

            expect(results.documents).toHaveLength(1);
        });

        it('reports an unknown course when the catalog is empty', async () => {
            database = new InMemoryVectorDatabase();
            const results = await createStore().search({ query: 'anything', courseName: 'Nope' });

            expect(results.isEmpty()).toBe(true);
            expect(results.error).toBe("No course found matching 'Nope'");
        });

        it('turns embedding failures into a search error', async () => {
            const failing: EmbeddingService = {
                dimensions: 64,
                embed: async () => {
                    throw new Error('boom');
                },
            };

            const results = await createStore(failing).search({ query: 'anything' });

            expect(results.isEmpty()).toBe(true);
            expect(results.error).toBe('Search error: boom');
        });
    });

    describe('buildFilter', () => {
        it('builds no filter, single filters and a conjunction', () => {
            expect(store.buildFilter()).toBeUndefined();
            expect(store.buildFilter('Python Basics')).toEqual({
                operator: 'eq',
                field: 'course_title',
                value: 'Python Basics',
            });
            expect(store.buildFilter(undefined, 0)).toEqual({ operator: 'eq', field: 'lesson_number', value: 0 });
            expect(store.buildFilter('Python Basics', 2)).toEqual({
                operator: 'and',
                filters: [
                    { operator: 'eq', field: 'course_title', value: 'Python Basics' },
                    { operator: 'eq', field: 'lesson_number', value: 2 },
                ],
            });
        });
    });

    it('clears both collections', async () => {
        await store.addCourseMetadata(course);
        await store.addCourseContent(chunks);

        await store.clearAllData();

        expect(await store.getCourseCount()).toBe(0);
        const content = await database.getOrCreateCollection(CONTENT_COLLECTION);
        expect(await content.count()).toBe(0);
    });
});
