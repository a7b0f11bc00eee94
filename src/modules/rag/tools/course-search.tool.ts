import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { errorMessage } from '../../../common/utils/error.util';
import { SearchResults } from '../../vector-store/search-results';
import { VectorStoreService } from '../../vector-store/vector-store.service';
import { formatIssues } from './tool-arguments';
import { Tool, ToolArguments, ToolDefinition, ToolResult } from './tool.interface';

const argsSchema = z.object({
    query: z.string(),
    course_name: z.string().nullish(),
    lesson_number: z.number().int().nullish(),
});

type SearchArgs = z.infer<typeof argsSchema>;

/**
 * Semantic search over course content, with optional course and lesson filters
 */
@Injectable()
export class CourseSearchTool implements Tool {
    static readonly toolName = 'search_course_content';

    private readonly logger = new Logger(CourseSearchTool.name);

    constructor(private readonly vectorStore: VectorStoreService) { }

    getToolDefinition(): ToolDefinition {
        return {
            name: CourseSearchTool.toolName,
            description: 'Search course materials with smart course name matching and lesson filtering',
            parameters: {
                type: 'object',
                properties: {
                    query: {
                        type: 'string',
                        description: 'What to search for in the course content',
                    },
                    course_name: {
                        type: 'string',
                        description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
                    },
                    lesson_number: {
                        type: 'integer',
                        description: 'Specific lesson number to search within (e.g. 1, 2, 3)',
                    },
                },
                required: ['query'],
            },
        };
    }

    /**
     * Every outcome carries a sources list, empty unless hits were formatted
     */
    async execute(args: ToolArguments): Promise<ToolResult> {
        const parsed = argsSchema.safeParse(args);
        if (!parsed.success) {
            return {
                content: `Invalid arguments for ${CourseSearchTool.toolName}: ${formatIssues(parsed.error)}`,
                sources: [],
            };
        }
        const { query, course_name: courseName, lesson_number: lessonNumber } = parsed.data;

        let results: SearchResults;
        try {
            results = await this.vectorStore.search({
                query,
                courseName: courseName ?? undefined,
                lessonNumber: lessonNumber ?? undefined,
            });
        } catch (error) {
            this.logger.error(`❌ Course search failed: ${errorMessage(error)}`);
            return { content: `Search error: ${errorMessage(error)}`, sources: [] };
        }

        if (results.error) {
            return { content: results.error, sources: [] };
        }

        if (results.isEmpty()) {
            return { content: this.emptyMessage(parsed.data), sources: [] };
        }

        return this.formatResults(results);
    }

    private emptyMessage({ course_name: courseName, lesson_number: lessonNumber }: SearchArgs): string {
        let message = 'No relevant content found';
        if (courseName) {
            message += ` in course '${courseName}'`;
        }
        if (lessonNumber !== null && lessonNumber !== undefined) {
            message += ` in lesson ${lessonNumber}`;
        }
        return `${message}.`;
    }

    formatResults(results: SearchResults): ToolResult {
        const sources: string[] = [];

        const blocks = results.documents.map((document, index) => {
            const metadata = results.metadata[index] ?? {};
            const courseTitle = typeof metadata.course_title === 'string' ? metadata.course_title : 'unknown';
            const lessonNumber = typeof metadata.lesson_number === 'number' ? metadata.lesson_number : undefined;

            const header = lessonNumber !== undefined ? `${courseTitle} - Lesson ${lessonNumber}` : courseTitle;
            sources.push(header);
            return `[${header}]\n${document}`;
        });

        return { content: blocks.join('\n\n'), sources };
    }
}
