import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EmbeddingsService } from '../../embeddings/embeddings.service';
import {
  MatchCondition,
  PayloadFilter,
  QdrantService,
} from '../../vector-store/qdrant.service';
import { RagConfig } from '../../../config/rag.config';
import { errorMessage, readString } from '../../../common/utils/guards';
import { Course, toChunkMetadata, toCourse } from '../../models/course.model';
import { SearchResults } from '../../models/search-results';

export interface CourseSearchQuery {
  query: string;
  courseName?: string;
  lessonNumber?: number;
}

export interface CourseAnalytics {
  totalCourses: number;
  courseTitles: string[];
}

/**
 * Stateless query facade over the course catalog and course content
 * collections.
 */
@Injectable()
export class CourseSearchService {
  private readonly logger = new Logger(CourseSearchService.name);
  private readonly maxResults: number;

  constructor(
    private readonly embeddingsService: EmbeddingsService,
    private readonly qdrantService: QdrantService,
    private readonly configService: ConfigService,
  ) {
    this.maxResults = this.configService.getOrThrow<RagConfig>('rag').maxResults;
  }

  /**
   * Map a partial or misspelled course name to the closest stored title.
   * There is no score threshold: any non-empty catalog yields a match.
   */
  async resolveCourseName(courseName: string): Promise<string | null> {
    try {
      const vector = await this.embeddingsService.generateEmbedding(courseName);
      const [best] = await this.qdrantService.searchVectors(
        this.qdrantService.getCatalogCollection(),
        vector,
        1,
      );

      const title = best ? readString(best.payload, 'title') : undefined;
      this.logger.debug(
        `🔍 Course name "${courseName}" → ${title ? `"${title}" (score: ${best.score.toFixed(4)})` : 'no match'}`,
      );
      return title ?? null;
    } catch (error) {
      this.logger.warn(
        `Course name resolution failed for "${courseName}": ${errorMessage(error)}`,
      );
      return null;
    }
  }

  buildFilter(
    courseTitle?: string,
    lessonNumber?: number,
  ): PayloadFilter | undefined {
    const must: MatchCondition[] = [];

    if (courseTitle !== undefined) {
      must.push({ key: 'course_title', match: { value: courseTitle } });
    }
    // Lesson 0 is a valid lesson
    if (lessonNumber !== undefined) {
      must.push({ key: 'lesson_number', match: { value: lessonNumber } });
    }

    return must.length > 0 ? { must } : undefined;
  }

  async search(request: CourseSearchQuery): Promise<SearchResults> {
    const { query, courseName, lessonNumber } = request;

    let courseTitle: string | undefined;
    if (courseName !== undefined) {
      const resolved = await this.resolveCourseName(courseName);
      if (!resolved) {
        return SearchResults.failure(`No course found matching '${courseName}'`);
      }
      courseTitle = resolved;
    }

    const filter = this.buildFilter(courseTitle, lessonNumber);
    this.logger.debug(
      `🔍 Content search "${query}" with filter ${JSON.stringify(filter ?? null)}`,
    );

    try {
      const vector = await this.embeddingsService.generateEmbedding(query);
      const results = await this.qdrantService.searchVectors(
        this.qdrantService.getContentCollection(),
        vector,
        this.maxResults,
        filter,
      );

      this.logger.debug(`📤 Found ${results.length} chunks`);

      return SearchResults.of(
        results
          .sort((a, b) => b.score - a.score)
          .map((r) => ({
            text: readString(r.payload, 'text') ?? '',
            metadata: toChunkMetadata(r.payload),
            score: r.score,
          })),
      );
    } catch (error) {
      return SearchResults.failure(`Search error: ${errorMessage(error)}`);
    }
  }

  /**
   * Catalog entry for the course closest to `courseName`
   */
  async getCourseOutline(courseName: string): Promise<Course | null> {
    const title = await this.resolveCourseName(courseName);
    if (!title) return null;

    const [entry] = await this.qdrantService.scrollPoints(
      this.qdrantService.getCatalogCollection(),
      { must: [{ key: 'title', match: { value: title } }] },
      1,
    );
    return entry ? toCourse(entry.payload) : null;
  }

  async getExistingCourseTitles(): Promise<string[]> {
    const entries = await this.qdrantService.scrollAll(
      this.qdrantService.getCatalogCollection(),
    );
    return entries
      .map((entry) => readString(entry.payload, 'title'))
      .filter((title): title is string => title !== undefined);
  }

  async getCourseAnalytics(): Promise<CourseAnalytics> {
    const courseTitles = await this.getExistingCourseTitles();
    return { totalCourses: courseTitles.length, courseTitles };
  }
}
