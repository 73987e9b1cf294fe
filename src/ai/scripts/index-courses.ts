import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { readFile } from 'fs/promises';
import { AppModule } from '../../app.module';
import {
  CourseIndexingService,
  toCourseDocument,
} from '../indexing/course-indexing.service';
import { CourseExportDto } from '../indexing/dto/course-export.dto';
import { errorMessage } from '../../common/utils/guards';

/**
 * Course loader
 * Reads a JSON export (an array of courses) and indexes every course not
 * yet in the catalog
 *
 * Usage: npm run index:courses -- data/courses.sample.json
 */
async function indexCourses(file: string | undefined) {
  if (!file) {
    console.error('Usage: npm run index:courses -- <courses.json>');
    process.exitCode = 1;
    return;
  }

  console.log(`🚀 Loading courses from ${file}...\n`);

  const raw: unknown = JSON.parse(await readFile(file, 'utf8'));
  if (!Array.isArray(raw)) {
    throw new Error('Expected a JSON array of courses');
  }

  const courses = plainToInstance(CourseExportDto, raw);
  const problems = courses.flatMap((dto, i) =>
    validateSync(dto).map((err) => {
      const reasons = Object.values(err.constraints ?? {}).join(', ');
      return `course #${i}: ${reasons || `invalid ${err.property}`}`;
    }),
  );
  if (problems.length > 0) {
    throw new Error(`Invalid course export:\n  ${problems.join('\n  ')}`);
  }

  const app = await NestFactory.createApplicationContext(AppModule);
  try {
    const stats = await app
      .get(CourseIndexingService)
      .loadCourses(courses.map(toCourseDocument));

    console.log('\n✅ Course loading completed!');
    console.log(`\nSummary:`);
    console.log(`  Courses: ${stats.courses}`);
    console.log(`  Chunks:  ${stats.chunks}`);
    console.log(`  Skipped: ${stats.skipped}`);
    console.log(`  Duration: ${(stats.duration / 1000).toFixed(2)}s`);

    if (stats.errors.length > 0) {
      console.log(`\n⚠️  Errors: ${stats.errors.length}`);
      stats.errors.forEach((err) => console.log(`  - ${err}`));
      process.exitCode = 1;
    }
  } finally {
    await app.close();
  }
}

indexCourses(process.argv[2]).catch((error: unknown) => {
  console.error('❌ Course loading failed:', errorMessage(error));
  process.exit(1);
});
