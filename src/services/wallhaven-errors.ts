/**
 * Wallhaven Errors
 *
 * Closed set of error kinds raised by the parameter builder and the API client.
 * Every error carries a stable `code` so callers can branch without instanceof.
 */

// =============================================================================
// Types
// =============================================================================

export type WallhavenErrorCode =
  | 'VALIDATION_ERROR'
  | 'AUTH_REQUIRED'
  | 'NOT_FOUND'
  | 'RATE_LIMITED'
  | 'HTTP_ERROR';

export interface ValidationIssue {
  path: string;
  message: string;
}

// Known Wallhaven status codes
const HTTP_ERROR_DESCRIPTIONS: Record<number, { title: string; description: string }> = {
  401: {
    title: 'Unauthorized',
    description: 'API key is missing or incorrect.',
  },
  404: {
    title: 'Not Found',
    description: 'The URI requested is invalid or the requested resource does not exist.',
  },
  429: {
    title: 'Too Many Requests',
    description: 'The API rate limit (45 requests per minute) has been exhausted.',
  },
};

/**
 * Human readable description of an HTTP status returned by Wallhaven
 */
export function describeHttpStatus(status: number): string {
  const known = HTTP_ERROR_DESCRIPTIONS[status];
  if (!known) {
    return `${status} Something went wrong`;
  }
  return `${status} ${known.title}: ${known.description}`;
}

// =============================================================================
// Error Classes
// =============================================================================

export class WallhavenError extends Error {
  readonly code: WallhavenErrorCode;
  readonly statusCode?: number;

  constructor(code: WallhavenErrorCode, message: string, statusCode?: number) {
    super(message);
    this.name = 'WallhavenError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

/**
 * Malformed input to a builder setter or client method. No request is made.
 */
export class ValidationError extends WallhavenError {
  readonly details: ValidationIssue[];

  constructor(message: string, details: ValidationIssue[] = []) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * An operation needs an API key that is missing or was rejected.
 */
export class AuthenticationRequiredError extends WallhavenError {
  constructor(message: string = 'This operation requires a Wallhaven API key', statusCode?: number) {
    super('AUTH_REQUIRED', message, statusCode);
    this.name = 'AuthenticationRequiredError';
  }
}

export class NotFoundError extends WallhavenError {
  constructor(message: string = describeHttpStatus(404)) {
    super('NOT_FOUND', message, 404);
    this.name = 'NotFoundError';
  }
}

export class RateLimitError extends WallhavenError {
  /** Seconds until retry, from the Retry-After header */
  readonly retryAfter?: number;

  constructor(retryAfter?: number) {
    super('RATE_LIMITED', describeHttpStatus(429), 429);
    this.name = 'RateLimitError';
    this.retryAfter = retryAfter;
  }
}

/**
 * Any other failed request. `statusCode` is unset for network errors and timeouts.
 */
export class RequestError extends WallhavenError {
  constructor(message: string, statusCode?: number) {
    super('HTTP_ERROR', message, statusCode);
    this.name = 'RequestError';
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Type guard for Wallhaven errors, optionally narrowed to a single code
 */
export function isWallhavenError(error: unknown, code?: WallhavenErrorCode): error is WallhavenError {
  if (!(error instanceof WallhavenError)) {
    return false;
  }
  return code === undefined || error.code === code;
}

/**
 * Convert zod issues into a ValidationError
 */
export function fromZodError(
  message: string,
  error: { issues: ReadonlyArray<{ path: ReadonlyArray<PropertyKey>; message: string }> }
): ValidationError {
  const details = error.issues.map((issue) => ({
    path: issue.path.map(String).join('.'),
    message: issue.message,
  }));
  const summary = details
    .map((d) => (d.path ? `${d.path}: ${d.message}` : d.message))
    .join('; ');
  return new ValidationError(summary ? `${message} (${summary})` : message, details);
}
