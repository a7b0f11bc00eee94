import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';
import { ConfigService } from '@nestjs/config';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { searchCall, textCompletion, toolCallCompletion } from '../../../../test/fixtures/chat-completions';
import { LocalEmbeddingService } from '../../openai/local-embedding.service';
import { OpenAIService } from '../../openai/openai.service';
import { SessionService } from '../../session/session.service';
import { InMemorySessionStore } from '../../session/stores/in-memory-session.store';
import { InMemoryVectorDatabase } from '../../vector-store/drivers/in-memory-vector.database';
import { VectorStoreService } from '../../vector-store/vector-store.service';
import { CourseOutlineTool } from '../tools/course-outline.tool';
import { CourseSearchTool } from '../tools/course-search.tool';
import { ToolManager } from '../tools/tool-manager';
import { AiGeneratorService } from './ai-generator.service';
import { DocumentProcessorService } from './document-processor.service';
import { RagService } from './rag.service';

const PYTHON_COURSE = [
    'Course Title: Python Basics',
    'Course Instructor: Test Instructor',
    'Lesson 1: Intro',
    'Python is a programming language.',
    'Lesson 2: Variables',
    'Variables hold values.',
].join('\n');

const ALPHA_COURSE = [
    'Course Title: Alpha Course',
    'Lesson 1: One',
    'Alpha text here.',
    'Lesson 2: Two',
    'More alpha text.',
].join('\n');

const BETA_COURSE = ['Course Title: Beta Course', 'Lesson 1: Start', 'Beta text.'].join('\n');

describe('RagService', () => {
    let dir: string;
    let openaiService: OpenAIService;
    let aiGenerator: AiGeneratorService;
    let sessionService: SessionService;
    let toolManager: ToolManager;
    let rag: RagService;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'rag-service-'));

        const config = new ConfigService({
            rag: { chunkSize: 800, chunkOverlap: 100, maxResults: 5, maxHistory: 2, embeddingDim: 64 },
            openai: { apiKey: 'test-key' },
        });
        const vectorStore = new VectorStoreService(config, new InMemoryVectorDatabase(), new LocalEmbeddingService(config));

        openaiService = new OpenAIService(config);
        aiGenerator = new AiGeneratorService(openaiService);
        sessionService = new SessionService(config, new InMemorySessionStore());
        toolManager = new ToolManager();
        rag = new RagService(
            new DocumentProcessorService(config),
            vectorStore,
            aiGenerator,
            sessionService,
            toolManager,
            new CourseSearchTool(vectorStore),
            new CourseOutlineTool(vectorStore),
        );
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    const writeCourse = async (name: string, content: string, folder = dir): Promise<string> => {
        const filePath = join(folder, name);
        await writeFile(filePath, content, 'utf-8');
        return filePath;
    };

    it('registers the search and outline tools', () => {
        expect(toolManager.getToolDefinitions().map((definition) => definition.name)).toEqual([
            'search_course_content',
            'get_course_outline',
        ]);
    });

    describe('query', () => {
        it('wraps the question in a prompt and offers the tools', async () => {
            const generate = jest.spyOn(aiGenerator, 'generateResponse').mockResolvedValue({ answer: 'AI response', sources: [] });

            const result = await rag.query('What is Python?');

            expect(result).toEqual({ answer: 'AI response', sources: [] });
            expect(generate).toHaveBeenCalledWith({
                query: 'Answer this question about course materials: What is Python?',
                conversationHistory: null,
                tools: toolManager.getToolDefinitions(),
                toolManager,
            });
        });

        it('uses and extends the session history', async () => {
            const generate = jest.spyOn(aiGenerator, 'generateResponse').mockResolvedValue({
                answer: 'Lesson 2 covers variables.',
                sources: [],
            });
            await sessionService.addExchange('session_test', 'Hi', 'Hello');

            await rag.query('What does lesson 2 cover?', 'session_test');

            expect(generate.mock.calls[0][0].conversationHistory).toBe('User: Hi\nAssistant: Hello');
            expect(await sessionService.getConversationHistory('session_test')).toBe(
                'User: Hi\nAssistant: Hello\nUser: What does lesson 2 cover?\nAssistant: Lesson 2 covers variables.',
            );
        });

        it('returns the sources found by the search tool', async () => {
            await rag.addCourseDocument(await writeCourse('python.txt', PYTHON_COURSE));
            jest.spyOn(openaiService, 'createChatCompletion')
                .mockResolvedValueOnce(
                    toolCallCompletion([searchCall('call_1', { query: 'python', course_name: 'Python', lesson_number: 1 })]),
                )
                .mockResolvedValueOnce(textCompletion('Python is a programming language.'));

            const result = await rag.query('What is Python?');

            expect(result).toEqual({
                answer: 'Python is a programming language.',
                sources: ['Python Basics - Lesson 1'],
            });
        });

        it('pairs each answer with its own sources when queries overlap', async () => {
            await rag.addCourseDocument(await writeCourse('python.txt', PYTHON_COURSE));
            let releaseSlow: () => void = () => undefined;
            const slowGate = new Promise<void>((resolve) => {
                releaseSlow = resolve;
            });

            jest.spyOn(openaiService, 'createChatCompletion').mockImplementation(async ({ messages }) => {
                const isSlow = JSON.stringify(messages).includes('lesson one');
                if (!messages.some((message) => message.role === 'tool')) {
                    return toolCallCompletion([
                        searchCall('call_1', { query: 'python', course_name: 'Python', lesson_number: isSlow ? 1 : 2 }),
                    ]);
                }
                if (isSlow) {
                    await slowGate;
                }
                return textCompletion(isSlow ? 'Lesson one answer.' : 'Lesson two answer.');
            });

            const slow = rag.query('What is in lesson one?');
            const fast = await rag.query('What is in lesson two?');
            releaseSlow();

            expect(fast).toEqual({ answer: 'Lesson two answer.', sources: ['Python Basics - Lesson 2'] });
            expect(await slow).toEqual({ answer: 'Lesson one answer.', sources: ['Python Basics - Lesson 1'] });
        });

        it('does not carry sources over from a failed query', async () => {
            await rag.addCourseDocument(await writeCourse('python.txt', PYTHON_COURSE));
            jest.spyOn(openaiService, 'createChatCompletion')
                .mockResolvedValueOnce(
                    toolCallCompletion([searchCall('call_1', { query: 'python', course_name: 'Python', lesson_number: 1 })]),
                )
                .mockRejectedValueOnce(new Error('chat API down'))
                .mockResolvedValueOnce(textCompletion('Hello!'));

            await expect(rag.query('What is Python?')).rejects.toThrow('chat API down');

            expect(await rag.query('Hi there')).toEqual({ answer: 'Hello!', sources: [] });
        });

        it('propagates generation failures without storing the exchange', async () => {
            jest.spyOn(aiGenerator, 'generateResponse').mockRejectedValue(new Error('AI API Error'));

            await expect(rag.query('Test query', 'session_test')).rejects.toThrow('AI API Error');
            expect(await sessionService.getConversationHistory('session_test')).toBeNull();
        });
    });

    describe('ingestion', () => {
        it('adds a course document', async () => {
            const { course, chunkCount } = await rag.addCourseDocument(await writeCourse('python.txt', PYTHON_COURSE));

            expect(course?.title).toBe('Python Basics');
            expect(course?.instructor).toBe('Test Instructor');
            expect(chunkCount).toBe(2);
            expect(await rag.getCourseAnalytics()).toEqual({ totalCourses: 1, courseTitles: ['Python Basics'] });
        });

        it('reports a document that cannot be processed', async () => {
            expect(await rag.addCourseDocument(join(dir, 'missing.txt'))).toEqual({ course: null, chunkCount: 0 });
            expect(await rag.getCourseAnalytics()).toEqual({ totalCourses: 0, courseTitles: [] });
        });

        it('adds supported files from a folder once per course title', async () => {
            const folder = join(dir, 'docs');
            await mkdir(folder);
            await writeCourse('course1.txt', ALPHA_COURSE, folder);
            await writeCourse('course2.txt', BETA_COURSE, folder);
            await writeCourse('duplicate.txt', ALPHA_COURSE, folder);
            await writeCourse('notes.jpg', 'Course Title: Not A Course', folder);

            expect(await rag.addCourseFolder(folder)).toEqual({ courses: 2, chunks: 3 });
            expect(await rag.getCourseAnalytics()).toEqual({
                totalCourses: 2,
                courseTitles: ['Alpha Course', 'Beta Course'],
            });

            expect(await rag.addCourseFolder(folder)).toEqual({ courses: 0, chunks: 0 });
            expect(await rag.addCourseFolder(folder, true)).toEqual({ courses: 2, chunks: 3 });
        });

        it('returns zero counts for a missing folder', async () => {
            expect(await rag.addCourseFolder(join(dir, 'nonexistent'))).toEqual({ courses: 0, chunks: 0 });
        });
    });
});
