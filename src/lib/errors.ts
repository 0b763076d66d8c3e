import type { ZodError } from 'zod';

// Malformed caller input (coordinate, k, window, sensor kind). Raised before
// any request is made.
export class ValidationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ValidationError';
    this.issues = issues;
  }

  static fromZod(message: string, error: ZodError): ValidationError {
    return new ValidationError(
      message,
      error.issues.map((issue) =>
        issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }
}

// Upstream unreachable, timed out, or returned something we can't use.
export class DataSourceError extends Error {
  readonly resource: string;

  constructor(message: string, resource: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DataSourceError';
    this.resource = resource;
  }
}

export function toDataSourceError(error: unknown, resource: string): DataSourceError {
  if (error instanceof DataSourceError) return error;
  const reason = error instanceof Error ? error.message : String(error);
  return new DataSourceError(`Request for ${resource} failed: ${reason}`, resource, {
    cause: error,
  });
}
