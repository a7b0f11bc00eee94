import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFile } from 'fs/promises';
import { Course, CourseChunk, Lesson, ProcessedCourse } from '../types';

const COURSE_TITLE = /^Course Title:\s*(.*)$/i;
const COURSE_LINK = /^Course Link:\s*(.*)$/i;
const COURSE_INSTRUCTOR = /^Course Instructor:\s*(.*)$/i;
const LESSON_MARKER = /^Lesson\s+(\d+):\s*(.*)$/i;
const LESSON_LINK = /^Lesson Link:\s*(.*)$/i;

/** Sentence boundary: terminal punctuation, whitespace, then a capital letter */
const SENTENCE_BOUNDARY = /(?<=[.!?])\s+(?=[A-Z])/;

interface LessonDraft {
    lesson: Lesson;
    body: string[];
}

/**
 * Document Processor Service - parses course files into a course record and chunks
 */
@Injectable()
export class DocumentProcessorService {
    private readonly logger = new Logger(DocumentProcessorService.name);
    private readonly chunkSize: number;
    private readonly chunkOverlap: number;

    constructor(private readonly configService: ConfigService) {
        this.chunkSize = this.configService.get<number>('rag.chunkSize') ?? 800;
        this.chunkOverlap = this.configService.get<number>('rag.chunkOverlap') ?? 100;
    }

    async readFile(filePath: string): Promise<string> {
        return readFile(filePath, 'utf-8');
    }

    /**
     * Split text into sentence-aligned chunks with sentence overlap
     */
    chunkText(text: string): string[] {
        const normalized = text.replace(/\s+/g, ' ').trim();
        if (!normalized) {
            return [];
        }

        const sentences = normalized
            .split(SENTENCE_BOUNDARY)
            .map((sentence) => sentence.trim())
            .filter((sentence) => sentence.length > 0);

        const chunks: string[] = [];
        let start = 0;

        while (start < sentences.length) {
            const current: string[] = [];
            let size = 0;

            for (let i = start; i < sentences.length; i++) {
                const sentence = sentences[i];
                const nextSize = current.length === 0 ? sentence.length : size + 1 + sentence.length;
                if (current.length > 0 && nextSize > this.chunkSize) {
                    break;
                }
                current.push(sentence);
                size = nextSize;
            }

            chunks.push(current.join(' '));

            if (start + current.length >= sentences.length) {
                break;
            }

            // Trailing sentences that fit in the overlap budget are repeated
            let overlapCount = 0;
            let overlapSize = 0;
            for (let i = current.length - 1; i >= 0; i--) {
                const length = current[i].length + (overlapCount > 0 ? 1 : 0);
                if (overlapSize + length > this.chunkOverlap) {
                    break;
                }
                overlapSize += length;
                overlapCount++;
            }

            start += Math.max(current.length - overlapCount, 1);
        }

        return chunks;
    }

    /**
     * Parse a course file into its course record and content chunks
     */
    async processCourseDocument(filePath: string): Promise<ProcessedCourse> {
        const content = await this.readFile(filePath);
        const lines = content.split(/\r?\n/).map((line) => line.trim());

        const course: Course = { title: '', lessons: [] };
        const preamble: string[] = [];
        const drafts: LessonDraft[] = [];
        let currentDraft: LessonDraft | undefined;

        for (let i = 0; i < lines.length; i++) {
            const line = lines[i];

            const lessonMatch = LESSON_MARKER.exec(line);
            if (lessonMatch) {
                currentDraft = {
                    lesson: { lessonNumber: parseInt(lessonMatch[1], 10), title: lessonMatch[2].trim() },
                    body: [],
                };
                drafts.push(currentDraft);

                const linkMatch = LESSON_LINK.exec(lines[i + 1] ?? '');
                if (linkMatch) {
                    currentDraft.lesson.lessonLink = linkMatch[1].trim();
                    i++;
                }
                continue;
            }

            if (currentDraft) {
                currentDraft.body.push(line);
                continue;
            }

            const titleMatch = COURSE_TITLE.exec(line);
            const linkMatch = COURSE_LINK.exec(line);
            const instructorMatch = COURSE_INSTRUCTOR.exec(line);
            if (titleMatch) {
                course.title = titleMatch[1].trim();
            } else if (linkMatch) {
                course.courseLink = linkMatch[1].trim();
            } else if (instructorMatch) {
                course.instructor = instructorMatch[1].trim();
            } else if (line) {
                preamble.push(line);
            }
        }

        if (!course.title) {
            const fallback = preamble.shift();
            if (!fallback) {
                throw new Error(`No course title found in ${filePath}`);
            }
            course.title = fallback;
        }

        const chunks: CourseChunk[] = [];
        const pushChunk = (text: string, lessonNumber?: number): void => {
            chunks.push({ content: text, courseTitle: course.title, lessonNumber, chunkIndex: chunks.length });
        };

        if (drafts.length === 0) {
            for (const text of this.chunkText(preamble.join('\n'))) {
                pushChunk(text);
            }
        }

        for (const draft of drafts) {
            course.lessons.push(draft.lesson);
            const { lessonNumber } = draft.lesson;
            this.chunkText(draft.body.join('\n')).forEach((text, index) => {
                pushChunk(index === 0 ? `Lesson ${lessonNumber} content: ${text}` : text, lessonNumber);
            });
        }

        this.logger.log(
            `📄 Processed "${course.title}": ${course.lessons.length} lessons, ${chunks.length} chunks`,
        );
        return { course, chunks };
    }
}
