import { isRecord, readInteger, readString } from '../../common/utils/guards';

export interface Lesson {
  lessonNumber: number;
  title: string;
  lessonLink?: string;
}

export interface Course {
  /** Unique; identifies the course in both collections */
  title: string;
  courseLink?: string;
  instructor?: string;
  lessons: Lesson[];
}

export interface CourseChunk {
  content: string;
  courseTitle: string;
  lessonNumber?: number;
  chunkIndex: number;
}

/** Payload stored with every content point */
export interface ChunkMetadata {
  courseTitle: string;
  lessonNumber?: number;
  chunkIndex: number;
  lessonLink?: string;
  courseLink?: string;
}

export interface RetrievedChunk {
  text: string;
  metadata: ChunkMetadata;
  score: number;
}

/**
 * A citation is a plain label, or a label paired with a link. The `link`
 * key is absent when no link is known.
 */
export interface SourceCitation {
  label: string;
  link?: string;
}

export function toChunkMetadata(
  payload: Record<string, unknown>,
): ChunkMetadata {
  return {
    courseTitle: readString(payload, 'course_title') ?? 'Unknown course',
    lessonNumber: readInteger(payload, 'lesson_number'),
    chunkIndex: readInteger(payload, 'chunk_index') ?? 0,
    lessonLink: readString(payload, 'lesson_link'),
    courseLink: readString(payload, 'course_link'),
  };
}

export function toCourse(payload: Record<string, unknown>): Course | null {
  const title = readString(payload, 'title');
  if (!title) return null;

  const rawLessons = payload['lessons'];
  const lessons: Lesson[] = [];
  if (Array.isArray(rawLessons)) {
    for (const raw of rawLessons) {
      if (!isRecord(raw)) continue;
      const lessonNumber = readInteger(raw, 'lesson_number');
      if (lessonNumber === undefined) continue;
      lessons.push({
        lessonNumber,
        title: readString(raw, 'lesson_title') ?? `Lesson ${lessonNumber}`,
        lessonLink: readString(raw, 'lesson_link'),
      });
    }
  }

  return {
    title,
    courseLink: readString(payload, 'course_link'),
    instructor: readString(payload, 'instructor'),
    lessons: lessons.sort((a, b) => a.lessonNumber - b.lessonNumber),
  };
}
