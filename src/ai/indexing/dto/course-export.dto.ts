import { Type } from 'class-transformer';
import {
  IsArray,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Min,
  ValidateNested,
} from 'class-validator';

export class LessonExportDto {
  @IsInt()
  @Min(0)
  lesson_number!: number;

  @IsString()
  @IsNotEmpty()
  lesson_title!: string;

  @IsString()
  @IsOptional()
  lesson_link?: string;
}

export class ChunkExportDto {
  @IsString()
  @IsNotEmpty()
  content!: string;

  @IsInt()
  @Min(0)
  @IsOptional()
  lesson_number?: number;

  @IsInt()
  @Min(0)
  chunk_index!: number;
}

/** One course as written by the export tool: metadata plus text chunks */
export class CourseExportDto {
  @IsString()
  @IsNotEmpty()
  title!: string;

  @IsString()
  @IsOptional()
  course_link?: string;

  @IsString()
  @IsOptional()
  instructor?: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => LessonExportDto)
  lessons!: LessonExportDto[];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ChunkExportDto)
  chunks!: ChunkExportDto[];
}
