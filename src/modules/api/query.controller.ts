import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpException,
  HttpStatus,
  Logger,
  Param,
  Post,
  UsePipes,
  ValidationPipe,
} from '@nestjs/common';
import { ApiOperation, ApiResponse } from '@nestjs/swagger';
import { errorMessage } from '../../common/utils/error.util';
import { QueryDto } from './dto/query.dto';
import { CourseStatsDto, QueryResponseDto } from './dto/response.dto';
import { QueryService } from './query.service';

function internalError(error: unknown): HttpException {
  return new HttpException(
    { statusCode: HttpStatus.INTERNAL_SERVER_ERROR, detail: errorMessage(error) },
    HttpStatus.INTERNAL_SERVER_ERROR,
  );
}

@Controller()
export class QueryController {
  private readonly logger = new Logger(QueryController.name);

  constructor(private readonly queryService: QueryService) { }

  @Post('query')
  @HttpCode(200)
  @ApiOperation({ summary: 'Query the course materials', description: 'Answers a question using the course materials and returns the sources used.' })
  @ApiResponse({ status: 200, description: 'The assistant answer.', type: QueryResponseDto })
  @ApiResponse({ status: 422, description: 'Invalid request body.' })
  @UsePipes(new ValidationPipe({ transform: true, whitelist: true, errorHttpStatusCode: HttpStatus.UNPROCESSABLE_ENTITY }))
  async query(@Body() queryDto: QueryDto): Promise<QueryResponseDto> {
    const requestStart = Date.now();
    this.logger.log('🌐 HTTP REQUEST: Query received');

    try {
      const response = await this.queryService.query(queryDto);
      this.logger.log(`🌐 HTTP RESPONSE: Query completed in ${Date.now() - requestStart}ms`);
      return response;
    } catch (error) {
      this.logger.error(`❌ HTTP ERROR: Query failed after ${Date.now() - requestStart}ms - ${errorMessage(error)}`);
      throw internalError(error);
    }
  }

  @Get('courses')
  @ApiOperation({ summary: 'Course statistics', description: 'Returns the number of courses and their titles.' })
  @ApiResponse({ status: 200, description: 'Course statistics.', type: CourseStatsDto })
  async getCourseStats(): Promise<CourseStatsDto> {
    try {
      return await this.queryService.getCourseStats();
    } catch (error) {
      this.logger.error(`❌ HTTP ERROR: Course stats failed - ${errorMessage(error)}`);
      throw internalError(error);
    }
  }

  @Delete('sessions/:sessionId')
  @HttpCode(204)
  @ApiOperation({ summary: 'Clear a session', description: 'Deletes the conversation history of a session.' })
  @ApiResponse({ status: 204, description: 'Session cleared.' })
  async clearSession(@Param('sessionId') sessionId: string): Promise<void> {
    await this.queryService.clearSession(sessionId);
  }
}
