import { Injectable, Logger } from '@nestjs/common';
import { readdir, stat } from 'fs/promises';
import { extname, join } from 'path';
import { errorMessage } from '../../../common/utils/error.util';
import { SessionService } from '../../session/session.service';
import { VectorStoreService } from '../../vector-store/vector-store.service';
import { CourseOutlineTool } from '../tools/course-outline.tool';
import { CourseSearchTool } from '../tools/course-search.tool';
import { ToolManager } from '../tools/tool-manager';
import { CourseAnalytics, FolderIngestResult, IngestResult, QueryResult } from '../types';
import { AiGeneratorService } from './ai-generator.service';
import { DocumentProcessorService } from './document-processor.service';

export const COURSE_FILE_EXTENSIONS = ['.pdf', '.docx', '.txt'];

/**
 * RAG Service - ties document ingestion, tool-based retrieval, generation and sessions together
 */
@Injectable()
export class RagService {
    private readonly logger = new Logger(RagService.name);

    constructor(
        private readonly documentProcessor: DocumentProcessorService,
        private readonly vectorStore: VectorStoreService,
        private readonly aiGenerator: AiGeneratorService,
        private readonly sessionService: SessionService,
        readonly toolManager: ToolManager,
        searchTool: CourseSearchTool,
        outlineTool: CourseOutlineTool,
    ) {
        this.toolManager.registerTool(searchTool);
        this.toolManager.registerTool(outlineTool);
    }

    /**
     * Answer a user query, using the session's history when a session id is given
     */
    async query(query: string, sessionId?: string): Promise<QueryResult> {
        const startTime = Date.now();
        const prompt = `Answer this question about course materials: ${query}`;

        const conversationHistory = sessionId
            ? await this.sessionService.getConversationHistory(sessionId)
            : null;

        const { answer, sources } = await this.aiGenerator.generateResponse({
            query: prompt,
            conversationHistory,
            tools: this.toolManager.getToolDefinitions(),
            toolManager: this.toolManager,
        });

        if (sessionId) {
            await this.sessionService.addExchange(sessionId, query, answer);
        }

        this.logger.log(`✅ Query answered in ${Date.now() - startTime}ms with ${sources.length} sources`);
        return { answer, sources };
    }

    /**
     * Ingest one course file; processing failures yield { course: null, chunkCount: 0 }
     */
    async addCourseDocument(filePath: string): Promise<IngestResult> {
        try {
            const { course, chunks } = await this.documentProcessor.processCourseDocument(filePath);
            await this.vectorStore.addCourseMetadata(course);
            await this.vectorStore.addCourseContent(chunks);
            return { course, chunkCount: chunks.length };
        } catch (error) {
            this.logger.error(`❌ Error processing course document ${filePath}: ${errorMessage(error)}`);
            return { course: null, chunkCount: 0 };
        }
    }

    /**
     * Ingest every course file in a folder, skipping courses already stored
     */
    async addCourseFolder(folderPath: string, clearExisting = false): Promise<FolderIngestResult> {
        const result: FolderIngestResult = { courses: 0, chunks: 0 };

        if (clearExisting) {
            this.logger.log('🗑️ Clearing existing data for fresh rebuild...');
            await this.vectorStore.clearAllData();
        }

        let entries: string[];
        try {
            entries = await readdir(folderPath);
        } catch (error) {
            this.logger.warn(`⚠️ Folder ${folderPath} could not be read: ${errorMessage(error)}`);
            return result;
        }

        const existingTitles = new Set(await this.vectorStore.getExistingCourseTitles());

        for (const entry of entries.sort()) {
            const filePath = join(folderPath, entry);
            if (!COURSE_FILE_EXTENSIONS.includes(extname(entry).toLowerCase())) {
                continue;
            }

            try {
                if (!(await stat(filePath)).isFile()) {
                    continue;
                }

                const { course, chunks } = await this.documentProcessor.processCourseDocument(filePath);
                if (existingTitles.has(course.title)) {
                    this.logger.log(`⏭️ Course already exists: ${course.title} - skipping`);
                    continue;
                }

                await this.vectorStore.addCourseMetadata(course);
                await this.vectorStore.addCourseContent(chunks);
                existingTitles.add(course.title);

                result.courses++;
                result.chunks += chunks.length;
                this.logger.log(`📚 Added new course: ${course.title} (${chunks.length} chunks)`);
            } catch (error) {
                this.logger.error(`❌ Error processing ${entry}: ${errorMessage(error)}`);
            }
        }

        return result;
    }

    async getCourseAnalytics(): Promise<CourseAnalytics> {
        return {
            totalCourses: await this.vectorStore.getCourseCount(),
            courseTitles: await this.vectorStore.getExistingCourseTitles(),
        };
    }
}
