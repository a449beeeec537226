import type { ZodTypeAny, output } from 'zod';
import { InvalidInputError } from '../errors/game-errors.js';

export function formatIssues(
  issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>,
): string[] {
  return issues.map((i) => `${i.path.join('.')}: ${i.message}`);
}

/** safeParse 실패 시 InvalidInputError (issues는 "path: message" 형식) */
export function parseWithSchema<S extends ZodTypeAny>(
  schema: S,
  value: unknown,
  message = 'Validation failed',
): output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidInputError(message, {
      issues: formatIssues(result.error.issues),
    });
  }
  return result.data;
}
