import type { ZodError, ZodType, ZodTypeDef } from 'zod';

import { ValidationError, type FieldErrors } from '../errors.ts';

/**
 * Groups zod issues by dotted path. Root-level issues land under `non_field_errors`.
 */
export function toFieldErrors(error: ZodError): FieldErrors {
  const details: FieldErrors = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join('.') : 'non_field_errors';
    (details[key] ??= []).push(issue.message);
  }
  return details;
}

/**
 * Parses `data` with `schema`, throwing a ValidationError carrying per-field
 * messages when it does not conform.
 */
export function parseOrThrow<Output, Input>(schema: ZodType<Output, ZodTypeDef, Input>, data: unknown): Output {
  const result = schema.safeParse(data);
  if (!result.success) {
    const details = toFieldErrors(result.error);
    const [firstMessage] = result.error.issues.map((issue) => issue.message);
    throw new ValidationError(firstMessage ?? 'Invalid request', details);
  }
  return result.data;
}

/**
 * Narrows a query parameter that must appear at most once. Fastify parses a
 * repeated key into an array.
 */
export function singleQueryValue(name: string, raw: string | string[] | undefined): string | undefined {
  if (!Array.isArray(raw)) return raw;
  throw new ValidationError(`${name} must be given once`, { [name]: ['Expected a single value.'] });
}
