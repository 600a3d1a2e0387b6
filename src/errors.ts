import type { ZodError } from 'zod';
import type { ValidationIssue } from './types.js';

/**
 * An error that carries the HTTP status and client-facing detail it should
 * be answered with. Anything else reaching the error middleware becomes a 500.
 */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly detail: string,
    readonly headers: Record<string, string> = {},
  ) {
    super(detail);
    this.name = 'HttpError';
  }
}

/**
 * Raised when a request body does not match its schema. Rendered as 422 with
 * one issue per failing field.
 */
export class RequestValidationError extends Error {
  constructor(readonly issues: ValidationIssue[]) {
    super('Request validation failed');
    this.name = 'RequestValidationError';
  }

  static fromZodError(error: ZodError): RequestValidationError {
    return new RequestValidationError(
      error.issues.map((issue) => ({
        loc: ['body', ...issue.path],
        msg: issue.message,
        type: issue.code,
      })),
    );
  }
}

/**
 * Errors produced by Express's body parser carry a `type` such as
 * `entity.parse.failed` or `entity.too.large`.
 */
export type BodyParserError = Error & { type: string; status: number };

export function isBodyParserError(error: unknown): error is BodyParserError {
  return (
    error instanceof Error &&
    'type' in error &&
    typeof error.type === 'string' &&
    'status' in error &&
    typeof error.status === 'number'
  );
}
