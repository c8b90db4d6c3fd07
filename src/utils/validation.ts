import type { ZodError } from 'zod';
import type { FieldIssue } from '../models/errors.js';

/**
 * Flatten a ZodError into `{ field, message }` pairs, field as a dotted path.
 */
export function toFieldIssues(error: ZodError): FieldIssue[] {
  return error.errors.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
