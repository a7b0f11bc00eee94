import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, IsString } from 'class-validator';

export class QueryDto {
  @ApiProperty({ description: 'The question to ask about the course materials.', example: 'What is covered in lesson 1?' })
  @IsString()
  query!: string;

  @ApiPropertyOptional({
    description: 'Session to continue; a new one is created when omitted.',
    type: String,
    nullable: true,
    example: 'session_6f1c2f5e-0d5b-4c43-9a55-2b8f3f6f9f0e',
  })
  @IsOptional()
  @IsString()
  session_id?: string | null;
}
