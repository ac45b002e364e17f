/**
 * Request Validation Helper
 * Layer: Interfaces (HTTP)
 *
 * Checks one part of a request (body, query or params) against a Zod schema
 * before the controller uses it. On success the parsed data comes back with
 * coercions applied ("5" → 5) and its type inferred from the schema:
 *
 *   const { limit } = parseRequest(listRunsQuerySchema, req.query);
 *
 * On failure it throws a ValidationError (400), which the global error
 * handler turns into a JSON error response.
 *
 * The parsed value is returned rather than written back onto `req`, because
 * Express 5 exposes `req.query` through a getter.
 */
import { ValidationError } from '@shared/errors/AppError';
import type { z } from 'zod/v4';

export function parseRequest<T extends z.ZodType>(schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);

  if (!result.success) {
    const messages = result.error.issues
      .map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
      )
      .join('; ');
    throw new ValidationError(messages);
  }

  return result.data;
}
