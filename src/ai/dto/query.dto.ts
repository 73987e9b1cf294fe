import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class QueryRequestDto {
  @ApiProperty({ example: 'What is covered in lesson 2 of the MCP course?' })
  @IsString()
  @IsNotEmpty()
  query!: string;

  @ApiPropertyOptional({
    description: 'Pass the sessionId of a previous answer to continue that conversation',
  })
  @IsString()
  @IsOptional()
  sessionId?: string;
}

export class SourceCitationDto {
  @ApiProperty({ example: 'Introduction to MCP — Lesson 2' })
  label!: string;

  @ApiPropertyOptional({ example: 'https://example.com/mcp/lesson-2' })
  link?: string;
}

export class QueryResponseDto {
  @ApiProperty()
  answer!: string;

  @ApiProperty({ type: [SourceCitationDto] })
  sources!: SourceCitationDto[];

  @ApiProperty()
  sessionId!: string;
}

export class CourseStatsDto {
  @ApiProperty()
  totalCourses!: number;

  @ApiProperty({ type: [String] })
  courseTitles!: string[];
}
