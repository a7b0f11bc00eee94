import { Module } from '@nestjs/common';
import { OpenAIModule } from '../openai/openai.module';
import { SessionModule } from '../session/session.module';
import { VectorStoreModule } from '../vector-store/vector-store.module';
import { AiGeneratorService } from './services/ai-generator.service';
import { CourseLoaderService } from './services/course-loader.service';
import { DocumentProcessorService } from './services/document-processor.service';
import { RagService } from './services/rag.service';
import { CourseOutlineTool } from './tools/course-outline.tool';
import { CourseSearchTool } from './tools/course-search.tool';
import { ToolManager } from './tools/tool-manager';

/**
 * RAG Module - course ingestion, tool-calling generation and sessions
 */
@Module({
    imports: [OpenAIModule, VectorStoreModule, SessionModule],
    providers: [
        RagService,
        AiGeneratorService,
        DocumentProcessorService,
        CourseLoaderService,
        ToolManager,
        CourseSearchTool,
        CourseOutlineTool,
    ],
    exports: [RagService, SessionModule],
})
export class RagModule { }
