import 'reflect-metadata';
import { Transform, TransformFnParams } from 'class-transformer';
import { IsInt, IsNotEmpty, IsOptional, IsString, Min } from 'class-validator';

/** Blank optional arguments mean "no filter" */
function blankToUndefined({ value }: TransformFnParams): unknown {
  return value === '' || value === null ? undefined : value;
}

/**
 * Models sometimes send "2" instead of 2. Only digit strings are converted;
 * any other non-number is left for `@IsInt` to reject.
 */
function toLessonNumber(params: TransformFnParams): unknown {
  const value = blankToUndefined(params);
  if (typeof value === 'string' && /^\s*\d+\s*$/.test(value)) {
    return Number(value);
  }
  return value;
}

export class CourseSearchArgs {
  @IsString()
  @IsNotEmpty()
  query!: string;

  @Transform(blankToUndefined)
  @IsString()
  @IsNotEmpty()
  @IsOptional()
  course_name?: string;

  @Transform(toLessonNumber)
  @IsInt()
  @Min(0)
  @IsOptional()
  lesson_number?: number;
}

export class CourseOutlineArgs {
  @IsString()
  @IsNotEmpty()
  course_name!: string;
}
