import {
  ADVANCED_Y,
  CourseFixture,
  INTRO_TO_X,
  createCourseFixture,
} from '../../../testing/course-fixture';

describe('CourseSearchService', () => {
  let fixture: CourseFixture;

  beforeEach(async () => {
    fixture = await createCourseFixture();
  });

  it('should be defined', () => {
    expect(fixture.courseSearch).toBeDefined();
  });

  describe('resolveCourseName', () => {
    beforeEach(async () => {
      await fixture.indexing.loadCourses([INTRO_TO_X, ADVANCED_Y]);
    });

    it('should map a misspelled name to the closest stored title', async () => {
      await expect(fixture.courseSearch.resolveCourseName('into x')).resolves.toBe(
        'Intro to X',
      );
      await expect(
        fixture.courseSearch.resolveCourseName('advnced y'),
      ).resolves.toBe('Advanced Y');
    });

    it('should return null when the index fails', async () => {
      fixture.store.failQueriesWith(new Error('connection refused'));

      await expect(
        fixture.courseSearch.resolveCourseName('into x'),
      ).resolves.toBeNull();
    });
  });

  it('should return null for an empty catalog', async () => {
    await fixture.indexing.ensureCollections();

    await expect(
      fixture.courseSearch.resolveCourseName('anything'),
    ).resolves.toBeNull();
  });

  describe('buildFilter', () => {
    it('should return undefined without inputs', () => {
      expect(fixture.courseSearch.buildFilter()).toBeUndefined();
    });

    it('should filter by course title', () => {
      expect(fixture.courseSearch.buildFilter('Intro to X')).toEqual({
        must: [{ key: 'course_title', match: { value: 'Intro to X' } }],
      });
    });

    it('should treat lesson 0 as a lesson filter', () => {
      expect(fixture.courseSearch.buildFilter(undefined, 0)).toEqual({
        must: [{ key: 'lesson_number', match: { value: 0 } }],
      });
    });

    it('should combine course and lesson', () => {
      expect(fixture.courseSearch.buildFilter('Intro to X', 1)).toEqual({
        must: [
          { key: 'course_title', match: { value: 'Intro to X' } },
          { key: 'lesson_number', match: { value: 1 } },
        ],
      });
    });
  });

  describe('search', () => {
    beforeEach(async () => {
      await fixture.indexing.loadCourses([INTRO_TO_X, ADVANCED_Y]);
    });

    it('should only return chunks of the requested lesson', async () => {
      const results = await fixture.courseSearch.search({
        query: 'foo',
        lessonNumber: 2,
      });

      expect(results).toEqual({
        ok: true,
        hits: [
          expect.objectContaining({
            text: 'deep dive into foo internals',
            metadata: {
              courseTitle: 'Advanced Y',
              lessonNumber: 2,
              chunkIndex: 1,
              lessonLink: undefined,
              courseLink: undefined,
            },
          }),
        ],
      });
    });

    it('should find lesson 0 content', async () => {
      const results = await fixture.courseSearch.search({
        query: 'welcome',
        lessonNumber: 0,
      });

      expect(results.ok && results.hits.map((hit) => hit.text)).toEqual([
        'welcome to advanced y',
      ]);
    });

    it('should restrict results to the resolved course', async () => {
      const results = await fixture.courseSearch.search({
        query: 'foo',
        courseName: 'into x',
      });

      expect(results.ok && results.hits.map((hit) => hit.text)).toEqual([
        'foo bar',
      ]);
      expect(fixture.store.queries.at(-1)).toEqual({
        kind: 'search',
        collection: 'course_content',
        filter: {
          must: [{ key: 'course_title', match: { value: 'Intro to X' } }],
        },
        limit: 5,
      });
    });

    it('should rank hits by descending score', async () => {
      const results = await fixture.courseSearch.search({ query: 'foo bar' });

      expect(results.ok).toBe(true);
      if (!results.ok) return;
      expect(results.hits[0].text).toBe('foo bar');
      const scores = results.hits.map((hit) => hit.score);
      expect(scores).toEqual([...scores].sort((a, b) => b - a));
    });

    it('should capture index failures as an error result', async () => {
      fixture.store.failQueriesWith(new Error('connection refused'));

      await expect(fixture.courseSearch.search({ query: 'foo' })).resolves.toEqual(
        { ok: false, error: 'Search error: connection refused' },
      );
    });
  });

  it('should not query content when the course cannot be resolved', async () => {
    await fixture.indexing.ensureCollections();

    const results = await fixture.courseSearch.search({
      query: 'foo',
      courseName: 'Nope',
    });

    expect(results).toEqual({
      ok: false,
      error: "No course found matching 'Nope'",
    });
    expect(
      fixture.store.queries.filter((q) => q.collection === 'course_content'),
    ).toEqual([]);
  });

  it('should cap results at rag.maxResults', async () => {
    fixture = await createCourseFixture({ config: { rag: { maxResults: 2 } } });
    await fixture.indexing.loadCourses([INTRO_TO_X, ADVANCED_Y]);

    const results = await fixture.courseSearch.search({ query: 'foo' });

    expect(results.ok && results.hits.length).toBe(2);
  });

  describe('catalog', () => {
    beforeEach(async () => {
      await fixture.indexing.loadCourses([INTRO_TO_X, ADVANCED_Y]);
    });

    it('should read the outline of the closest course', async () => {
      await expect(
        fixture.courseSearch.getCourseOutline('advnced y'),
      ).resolves.toEqual({
        title: 'Advanced Y',
        courseLink: undefined,
        instructor: 'Grace Example',
        lessons: [
          { lessonNumber: 0, title: 'Welcome', lessonLink: undefined },
          { lessonNumber: 2, title: 'Deep Dive', lessonLink: undefined },
        ],
      });
    });

    it('should count the indexed courses', async () => {
      await expect(fixture.courseSearch.getCourseAnalytics()).resolves.toEqual({
        totalCourses: 2,
        courseTitles: ['Intro to X', 'Advanced Y'],
      });
    });
  });
});
