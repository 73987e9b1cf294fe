import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  Post,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { RagService } from './rag/rag.service';
import {
  CourseStatsDto,
  QueryRequestDto,
  QueryResponseDto,
} from './dto/query.dto';
import { GenerationError } from './errors';

@ApiTags('Course Assistant')
@Controller('api')
export class AiController {
  private readonly logger = new Logger(AiController.name);

  constructor(private readonly ragService: RagService) {}

  @Post('query')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Ask a question about the course materials',
    description: `Answers general questions directly and course questions from the indexed materials.

    Examples:
    - "What does lesson 1 of the MCP course cover?"
    - "Who teaches the retrieval course?"
    - "Give me the outline of Introduction to MCP"

    Omit sessionId to start a new conversation; the response carries the id to reuse.`,
  })
  async query(@Body() request: QueryRequestDto): Promise<QueryResponseDto> {
    try {
      return await this.ragService.answer(request.query, request.sessionId);
    } catch (error) {
      if (error instanceof GenerationError) {
        this.logger.error(`Query failed: ${error.message}`);
        throw new ServiceUnavailableException(error.message);
      }
      throw error;
    }
  }

  @Get('courses')
  @ApiOperation({ summary: 'Number and titles of the indexed courses' })
  courses(): Promise<CourseStatsDto> {
    return this.ragService.getCourseAnalytics();
  }

  @Delete('sessions/:sessionId')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Forget the history of one conversation' })
  clearSession(@Param('sessionId') sessionId: string): void {
    this.ragService.clearSession(sessionId);
  }
}
