import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';

/**
 * Renders issues as `path: message` pairs, e.g. `[0].number_of_days: Expected number, received string`.
 */
export function formatIssues(issues: ReadonlyArray<StandardSchemaV1.Issue>): string {
  return issues
    .map((issue) => {
      const path = (issue.path ?? [])
        .map((segment) => (typeof segment === 'object' ? segment.key : segment))
        .map((key) => (typeof key === 'number' ? `[${key}]` : `.${String(key)}`))
        .join('')
        .replace(/^\./, '');

      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/**
 * Error representing a validation error when validating with @standard-schema
 */
export class ValidationError extends Error {
  /** ValidationError error-name */
  name = 'ValidationError';
  /** Schema validation issues */
  readonly issues: ReadonlyArray<StandardSchemaV1.Issue>;

  /** Creates a new instance of the ValidationError that extends Error, with accompanying Issues */
  constructor(message: string, issues: ReadonlyArray<StandardSchemaV1.Issue>, opts?: ErrorOptions) {
    super(issues.length ? `${message}; issues: ${formatIssues(issues)}` : message, opts);
    this.issues = issues;
  }
}

/**
 * Type guard for {@link ValidationError}.
 */
export function isValidationError(error: unknown): error is ValidationError {
  return isErrorType(ValidationError, error);
}
