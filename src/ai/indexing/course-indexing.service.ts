import { Injectable, Logger } from '@nestjs/common';
import * as crypto from 'crypto';
import { EmbeddingsService } from '../embeddings/embeddings.service';
import { QdrantService, VectorPoint } from '../vector-store/qdrant.service';
import { Course, CourseChunk } from '../models/course.model';
import { errorMessage, readString } from '../../common/utils/guards';
import { CourseExportDto } from './dto/course-export.dto';

export interface CourseDocument {
  course: Course;
  chunks: CourseChunk[];
}

export interface LoadStats {
  courses: number;
  chunks: number;
  skipped: number;
  duration: number;
  errors: string[];
}

@Injectable()
export class CourseIndexingService {
  private readonly logger = new Logger(CourseIndexingService.name);

  constructor(
    private readonly embeddingsService: EmbeddingsService,
    private readonly qdrantService: QdrantService,
  ) {}

  async ensureCollections(): Promise<void> {
    await this.qdrantService.ensureCollection(
      this.qdrantService.getCatalogCollection(),
      [{ field: 'title', schema: 'keyword' }],
    );
    await this.qdrantService.ensureCollection(
      this.qdrantService.getContentCollection(),
      [
        { field: 'course_title', schema: 'keyword' },
        { field: 'lesson_number', schema: 'integer' },
      ],
    );
  }

  /**
   * Upsert the catalog entry of one course. The title embedding is what
   * course name resolution matches against.
   */
  async addCourseMetadata(course: Course): Promise<void> {
    const vector = await this.embeddingsService.generateEmbedding(course.title);

    const payload: Record<string, unknown> = {
      title: course.title,
      lesson_count: course.lessons.length,
      lessons: course.lessons.map((lesson) => ({
        lesson_number: lesson.lessonNumber,
        lesson_title: lesson.title,
        ...(lesson.lessonLink ? { lesson_link: lesson.lessonLink } : {}),
      })),
    };
    if (course.instructor) payload.instructor = course.instructor;
    if (course.courseLink) payload.course_link = course.courseLink;

    await this.qdrantService.upsertPoints(
      this.qdrantService.getCatalogCollection(),
      [{ id: pointId(course.title), vector, payload }],
    );

    this.logger.debug(`✓ Indexed catalog entry: ${course.title}`);
  }

  async addCourseContent(course: Course, chunks: CourseChunk[]): Promise<void> {
    if (chunks.length === 0) return;

    const vectors = await this.embeddingsService.generateBatchEmbeddings(
      chunks.map((chunk) => chunk.content),
    );

    const points: VectorPoint[] = chunks.map((chunk, i) => {
      const payload: Record<string, unknown> = {
        text: chunk.content,
        course_title: chunk.courseTitle,
        chunk_index: chunk.chunkIndex,
      };

      if (chunk.lessonNumber !== undefined) {
        payload.lesson_number = chunk.lessonNumber;
        const lesson = course.lessons.find(
          (l) => l.lessonNumber === chunk.lessonNumber,
        );
        if (lesson?.lessonLink) payload.lesson_link = lesson.lessonLink;
      }
      if (course.courseLink) payload.course_link = course.courseLink;

      return {
        id: pointId(`${chunk.courseTitle}:${chunk.chunkIndex}`),
        vector: vectors[i],
        payload,
      };
    });

    await this.qdrantService.upsertPoints(
      this.qdrantService.getContentCollection(),
      points,
    );

    this.logger.debug(
      `✓ Indexed ${points.length} chunks for course: ${course.title}`,
    );
  }

  async getExistingCourseTitles(): Promise<Set<string>> {
    const entries = await this.qdrantService.scrollAll(
      this.qdrantService.getCatalogCollection(),
    );
    const titles = new Set<string>();
    for (const entry of entries) {
      const title = readString(entry.payload, 'title');
      if (title) titles.add(title);
    }
    return titles;
  }

  /**
   * Load every course not yet in the catalog. A course that fails is
   * reported in `errors` and does not stop the others.
   */
  async loadCourses(documents: CourseDocument[]): Promise<LoadStats> {
    const startTime = Date.now();
    const stats: LoadStats = {
      courses: 0,
      chunks: 0,
      skipped: 0,
      duration: 0,
      errors: [],
    };

    await this.ensureCollections();
    const existing = await this.getExistingCourseTitles();

    for (const { course, chunks } of documents) {
      if (existing.has(course.title)) {
        this.logger.log(`Course already indexed, skipping: ${course.title}`);
        stats.skipped++;
        continue;
      }

      try {
        // Catalog entry last: it marks the course as fully loaded
        await this.addCourseContent(course, chunks);
        await this.addCourseMetadata(course);
        existing.add(course.title);
        stats.courses++;
        stats.chunks += chunks.length;
      } catch (error) {
        const message = `Failed to index course "${course.title}": ${errorMessage(error)}`;
        this.logger.error(message);
        stats.errors.push(message);
      }
    }

    stats.duration = Date.now() - startTime;
    this.logger.log(
      `✅ Loaded ${stats.courses} course(s), ${stats.chunks} chunk(s), skipped ${stats.skipped} in ${stats.duration}ms`,
    );
    return stats;
  }
}

export function toCourseDocument(dto: CourseExportDto): CourseDocument {
  return {
    course: {
      title: dto.title,
      courseLink: dto.course_link,
      instructor: dto.instructor,
      lessons: dto.lessons
        .map((lesson) => ({
          lessonNumber: lesson.lesson_number,
          title: lesson.lesson_title,
          lessonLink: lesson.lesson_link,
        }))
        .sort((a, b) => a.lessonNumber - b.lessonNumber),
    },
    chunks: dto.chunks.map((chunk) => ({
      content: chunk.content,
      courseTitle: dto.title,
      lessonNumber: chunk.lesson_number,
      chunkIndex: chunk.chunk_index,
    })),
  };
}

/** Stable UUID for a point, so loading the same course again overwrites it */
export function pointId(key: string): string {
  const hex = crypto.createHash('md5').update(key).digest('hex');
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20, 32),
  ].join('-');
}
