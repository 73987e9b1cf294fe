import { ToolDefinition } from '../../llm/llm.types';
import { RetrievedChunk, SourceCitation } from '../../models/course.model';
import { CourseSearchService } from '../services/course-search.service';
import { CourseSearchArgs } from './dto/course-search.args';
import { Tool, ToolResult } from './tool.interface';
import { validateToolArgs } from './validate-args';

export const NO_RESULTS_MESSAGE = 'No relevant content found';

/**
 * Semantic search over course content, with optional course and lesson
 * filters. A fresh instance is built for every query.
 */
export class CourseSearchTool implements Tool {
  readonly definition: ToolDefinition = {
    name: 'search_course_content',
    description:
      'Search course materials with smart course name matching and lesson filtering',
    parameters: {
      type: 'object',
      properties: {
        query: {
          type: 'string',
          description: 'What to search for in the course content',
        },
        course_name: {
          type: 'string',
          description:
            "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
        },
        lesson_number: {
          type: 'integer',
          description: 'Specific lesson number to search within (e.g. 1, 2, 3)',
        },
      },
      required: ['query'],
    },
  };

  constructor(private readonly courseSearch: CourseSearchService) {}

  async execute(args: Record<string, unknown>): Promise<ToolResult> {
    const parsed = validateToolArgs(CourseSearchArgs, args);
    if (!parsed.ok) {
      return { content: parsed.error, sources: [], isError: true };
    }

    const courseName = parsed.value.course_name ?? undefined;
    const lessonNumber = parsed.value.lesson_number ?? undefined;

    const results = await this.courseSearch.search({
      query: parsed.value.query,
      courseName,
      lessonNumber,
    });

    if (!results.ok) {
      return { content: results.error, sources: [], isError: true };
    }

    if (results.hits.length === 0) {
      let message = NO_RESULTS_MESSAGE;
      if (courseName !== undefined) message += ` in course '${courseName}'`;
      if (lessonNumber !== undefined) message += ` in lesson ${lessonNumber}`;
      return { content: message, sources: [], isError: false };
    }

    return {
      content: results.hits.map((hit) => this.formatHit(hit)).join('\n\n'),
      sources: results.hits.map((hit) => toCitation(hit)),
      isError: false,
    };
  }

  private formatHit(hit: RetrievedChunk): string {
    const { courseTitle, lessonNumber } = hit.metadata;
    const header =
      lessonNumber !== undefined
        ? `[${courseTitle} - Lesson ${lessonNumber}]`
        : `[${courseTitle}]`;
    return `${header}\n${hit.text}`;
  }
}

export function toCitation(hit: RetrievedChunk): SourceCitation {
  const { courseTitle, lessonNumber, lessonLink, courseLink } = hit.metadata;

  const label =
    lessonNumber !== undefined
      ? `${courseTitle} — Lesson ${lessonNumber}`
      : courseTitle;
  const link = lessonNumber !== undefined ? lessonLink : courseLink;

  return link ? { label, link } : { label };
}
