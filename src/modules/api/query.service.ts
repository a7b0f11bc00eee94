import { Injectable, Logger } from '@nestjs/common';
import { RagService } from '../rag/services/rag.service';
import { SessionService } from '../session/session.service';
import { QueryDto } from './dto/query.dto';
import { CourseStatsDto, QueryResponseDto } from './dto/response.dto';

/**
 * Query Service - maps HTTP requests onto the RAG service
 */
@Injectable()
export class QueryService {
  private readonly logger = new Logger(QueryService.name);

  constructor(
    private readonly ragService: RagService,
    private readonly sessionService: SessionService,
  ) { }

  async query(queryDto: QueryDto): Promise<QueryResponseDto> {
    const sessionId = queryDto.session_id || this.sessionService.createSession();
    this.logger.log(`❓ QUESTION (${sessionId}): "${queryDto.query}"`);

    const { answer, sources } = await this.ragService.query(queryDto.query, sessionId);
    return { answer, sources, session_id: sessionId };
  }

  async getCourseStats(): Promise<CourseStatsDto> {
    const analytics = await this.ragService.getCourseAnalytics();
    return {
      total_courses: analytics.totalCourses,
      course_titles: analytics.courseTitles,
    };
  }

  async clearSession(sessionId: string): Promise<void> {
    await this.sessionService.clearSession(sessionId);
  }
}
