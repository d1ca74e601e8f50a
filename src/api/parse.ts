import type { z } from 'zod';
import { ResponseFormatError } from '../errors.js';

/**
 * Validates a decoded response body against a schema, returning the mapped value.
 */
export function parseBody<S extends z.ZodTypeAny>(schema: S, data: unknown, resource: string): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'body';
    throw new ResponseFormatError(resource, `${where}: ${issue?.message ?? 'invalid value'}`);
  }
  return result.data;
}
