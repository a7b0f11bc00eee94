import { ApiProperty } from '@nestjs/swagger';

export class QueryResponseDto {
  @ApiProperty({ description: 'The assistant answer.' })
  answer!: string;

  @ApiProperty({ description: 'Course and lesson labels of the content used.', type: [String] })
  sources!: string[];

  @ApiProperty({ description: 'Session the exchange was stored in.' })
  session_id!: string;
}

export class CourseStatsDto {
  @ApiProperty({ description: 'Number of courses in the catalog.' })
  total_courses!: number;

  @ApiProperty({ description: 'Titles of the courses in the catalog.', type: [String] })
  course_titles!: string[];
}
