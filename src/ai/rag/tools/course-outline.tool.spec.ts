import { CourseOutlineTool } from './course-outline.tool';
import {
  ADVANCED_Y,
  CourseFixture,
  INTRO_TO_X,
  createCourseFixture,
} from '../../../testing/course-fixture';

describe('CourseOutlineTool', () => {
  let fixture: CourseFixture;
  let tool: CourseOutlineTool;

  beforeEach(async () => {
    fixture = await createCourseFixture();
    tool = new CourseOutlineTool(fixture.courseSearch);
  });

  it('should list title, link, instructor and lessons', async () => {
    await fixture.indexing.loadCourses([INTRO_TO_X, ADVANCED_Y]);

    const result = await tool.execute({ course_name: 'intro' });

    expect(result).toEqual({
      content: [
        'Course: Intro to X',
        'Link: https://example.com/x',
        'Instructor: Ada Example',
        'Lessons (1):',
        '  1. Foo Basics',
      ].join('\n'),
      sources: [{ label: 'Intro to X', link: 'https://example.com/x' }],
      isError: false,
    });
  });

  it('should cite a course without a link by title only', async () => {
    await fixture.indexing.loadCourses([INTRO_TO_X, ADVANCED_Y]);

    const result = await tool.execute({ course_name: 'advanced' });

    expect(result.content).toBe(
      [
        'Course: Advanced Y',
        'Instructor: Grace Example',
        'Lessons (2):',
        '  0. Welcome',
        '  2. Deep Dive',
      ].join('\n'),
    );
    expect(result.sources).toStrictEqual([{ label: 'Advanced Y' }]);
  });

  it('should report a course that cannot be resolved', async () => {
    await fixture.indexing.ensureCollections();

    await expect(tool.execute({ course_name: 'Nope' })).resolves.toEqual({
      content: "No course found matching 'Nope'",
      sources: [],
      isError: true,
    });
  });

  it('should reject a missing course name', async () => {
    const result = await tool.execute({});

    expect(result.isError).toBe(true);
    expect(result.content).toMatch(/^Invalid tool arguments: /);
  });
});
