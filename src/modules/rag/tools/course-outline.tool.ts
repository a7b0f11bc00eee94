import { Injectable } from '@nestjs/common';
import { z } from 'zod';
import { VectorStoreService } from '../../vector-store/vector-store.service';
import { formatIssues } from './tool-arguments';
import { Tool, ToolArguments, ToolDefinition, ToolResult } from './tool.interface';

const argsSchema = z.object({
    course_name: z.string(),
});

/**
 * Course title, link, instructor and lesson list for a (partial) course name
 */
@Injectable()
export class CourseOutlineTool implements Tool {
    static readonly toolName = 'get_course_outline';

    constructor(private readonly vectorStore: VectorStoreService) { }

    getToolDefinition(): ToolDefinition {
        return {
            name: CourseOutlineTool.toolName,
            description: 'Get the outline of a course: its title, link, instructor and complete lesson list',
            parameters: {
                type: 'object',
                properties: {
                    course_name: {
                        type: 'string',
                        description: 'Course title (partial matches work)',
                    },
                },
                required: ['course_name'],
            },
        };
    }

    async execute(args: ToolArguments): Promise<ToolResult> {
        const parsed = argsSchema.safeParse(args);
        if (!parsed.success) {
            return { content: `Invalid arguments for ${CourseOutlineTool.toolName}: ${formatIssues(parsed.error)}` };
        }

        const courseName = parsed.data.course_name;
        const outline = await this.vectorStore.getCourseOutline(courseName);
        if (!outline) {
            return { content: `No course found matching '${courseName}'` };
        }

        const lines = [`Course: ${outline.title}`];
        if (outline.course_link) {
            lines.push(`Course Link: ${outline.course_link}`);
        }
        if (outline.instructor) {
            lines.push(`Instructor: ${outline.instructor}`);
        }
        lines.push(`Lessons (${outline.lessons.length}):`);
        for (const lesson of outline.lessons) {
            lines.push(`Lesson ${lesson.lesson_number}: ${lesson.lesson_title}`);
        }
        return { content: lines.join('\n') };
    }
}
