import { ToolDefinition } from '../../llm/llm.types';
import { Course } from '../../models/course.model';
import { errorMessage } from '../../../common/utils/guards';
import { CourseSearchService } from '../services/course-search.service';
import { CourseOutlineArgs } from './dto/course-search.args';
import { Tool, ToolResult } from './tool.interface';
import { validateToolArgs } from './validate-args';

/**
 * Course title, link, instructor and lesson list from the catalog.
 */
export class CourseOutlineTool implements Tool {
  readonly definition: ToolDefinition = {
    name: 'get_course_outline',
    description:
      'Get the outline of a course: title, link, instructor and the numbered list of lessons',
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

  constructor(private readonly courseSearch: CourseSearchService) {}

  async execute(args: Record<string, unknown>): Promise<ToolResult> {
    const parsed = validateToolArgs(CourseOutlineArgs, args);
    if (!parsed.ok) {
      return { content: parsed.error, sources: [], isError: true };
    }

    const courseName = parsed.value.course_name;
    let course: Course | null;
    try {
      course = await this.courseSearch.getCourseOutline(courseName);
    } catch (error) {
      return {
        content: `Search error: ${errorMessage(error)}`,
        sources: [],
        isError: true,
      };
    }

    if (!course) {
      return {
        content: `No course found matching '${courseName}'`,
        sources: [],
        isError: true,
      };
    }

    return {
      content: formatOutline(course),
      sources: [
        course.courseLink
          ? { label: course.title, link: course.courseLink }
          : { label: course.title },
      ],
      isError: false,
    };
  }
}

function formatOutline(course: Course): string {
  const lines = [`Course: ${course.title}`];
  if (course.courseLink) lines.push(`Link: ${course.courseLink}`);
  if (course.instructor) lines.push(`Instructor: ${course.instructor}`);

  if (course.lessons.length === 0) {
    lines.push('Lessons: none listed');
  } else {
    lines.push(`Lessons (${course.lessons.length}):`);
    for (const lesson of course.lessons) {
      lines.push(`  ${lesson.lessonNumber}. ${lesson.title}`);
    }
  }

  return lines.join('\n');
}
