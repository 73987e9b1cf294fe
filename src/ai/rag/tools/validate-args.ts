import { plainToInstance, ClassConstructor } from 'class-transformer';
import { validateSync } from 'class-validator';

export type ArgsValidation<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

/**
 * Validate tool arguments produced by the model against a decorated class.
 */
export function validateToolArgs<T extends object>(
  cls: ClassConstructor<T>,
  args: Record<string, unknown>,
): ArgsValidation<T> {
  const value = plainToInstance(cls, args);
  const errors = validateSync(value);

  if (errors.length > 0) {
    const details = errors
      .flatMap((e) => Object.values(e.constraints ?? {}))
      .join('; ');
    return { ok: false, error: `Invalid tool arguments: ${details}` };
  }

  return { ok: true, value };
}
