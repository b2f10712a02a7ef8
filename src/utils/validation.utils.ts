/**
 * Validation of option objects and credential files with zod, reported
 * through neverthrow Results.
 */

import { z } from 'zod';
import { Result, ok, err } from 'neverthrow';
import { GoogleSheetsInvalidArgumentError, isRecord } from '../errors/index.js';

export interface ValidationIssue {
  code: string;
  path: (string | number)[];
  message: string;
}

export type ValidationResult<T> = Result<T, GoogleSheetsInvalidArgumentError>;

/**
 * Validate `data` against `schema`
 *
 * A single issue is reported with its own message, prefixed by its path;
 * several issues are summarized. All issues stay in the error context.
 */
export function validateInput<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  context?: Record<string, unknown>
): ValidationResult<z.output<S>> {
  const result = schema.safeParse(data);
  if (result.success) {
    return ok(result.data);
  }
  return err(convertZodError(result.error, context));
}

export function convertZodError(
  error: z.ZodError,
  context?: Record<string, unknown>
): GoogleSheetsInvalidArgumentError {
  const validationErrors: ValidationIssue[] = error.issues.map(issue => ({
    code: issue.code,
    path: issue.path,
    message: issue.message,
  }));

  let message: string;
  if (validationErrors.length === 1) {
    const [issue] = validationErrors;
    message = issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
  } else {
    message = `Invalid input data: Found ${validationErrors.length} validation errors`;
  }

  return new GoogleSheetsInvalidArgumentError(message, { ...context, validationErrors });
}

function isValidationIssue(value: unknown): value is ValidationIssue {
  return isRecord(value) && Array.isArray(value.path) && typeof value.message === 'string';
}

/**
 * Format the issues of a failed validation for display
 */
export function formatValidationErrors(result: ValidationResult<unknown>): string[] {
  if (result.isOk()) return [];

  const issues = result.error.context?.validationErrors;
  if (!Array.isArray(issues)) return [result.error.message];

  return issues.filter(isValidationIssue).map(issue => {
    const pathStr = issue.path.length > 0 ? issue.path.join('.') + ': ' : '';
    return `${pathStr}${issue.message}`;
  });
}
