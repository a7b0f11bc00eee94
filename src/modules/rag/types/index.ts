/**
 * Core course and conversation types
 */

/**
 * A lesson inside a course
 */
export interface Lesson {
    lessonNumber: number;
    title: string;
    lessonLink?: string;
}

/**
 * A course; the title is its unique identifier
 */
export interface Course {
    title: string;
    courseLink?: string;
    instructor?: string;
    lessons: Lesson[];
}

/**
 * A piece of course text stored for retrieval
 */
export interface CourseChunk {
    content: string;
    courseTitle: string;
    lessonNumber?: number;
    chunkIndex: number;
}

export interface ProcessedCourse {
    course: Course;
    chunks: CourseChunk[];
}

/**
 * Chat message
 */
export interface ChatMessage {
    role: 'user' | 'assistant';
    content: string;
    timestamp?: number;
}

export interface QueryResult {
    answer: string;
    sources: string[];
}

export interface CourseAnalytics {
    totalCourses: number;
    courseTitles: string[];
}

export interface IngestResult {
    course: Course | null;
    chunkCount: number;
}

export interface FolderIngestResult {
    courses: number;
    chunks: number;
}
