import type { z } from 'zod';
import { ValidationError } from './errors.js';

/**
 * Parse `raw` with a zod schema, converting the first issue into a
 * ValidationError that names the offending field.
 */
export function parseOrThrow<S extends z.ZodTypeAny>(
  schema: S,
  raw: unknown,
  rootField: string,
  fieldPrefix = '',
): z.output<S> {
  const parsed = schema.safeParse(raw);
  if (parsed.success) return parsed.data;

  const issue = parsed.error.issues[0];
  if (!issue) throw new ValidationError(rootField, 'is invalid');

  const path = issue.path.map(String).join('.');
  const field = path ? `${fieldPrefix}${path}` : rootField;
  throw new ValidationError(field, issue.message);
}
