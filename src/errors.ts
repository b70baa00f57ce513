export type ErrorCode =
  | 'BAD_REQUEST'
  | 'AUTH'
  | 'NOT_FOUND'
  | 'UPSTREAM_FETCH'
  | 'SCHEMA'
  | 'CONFIG';

export class AppError extends Error {
  constructor(
    message: string,
    readonly code: ErrorCode,
    readonly statusCode: number,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class BadRequestError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'BAD_REQUEST', 400, details);
  }
}

/**
 * Bad or missing token. The message is the same for every cause so callers
 * cannot tell a malformed token from a wrong one.
 */
export class AuthError extends AppError {
  constructor() {
    super('Invalid token', 'AUTH', 401);
  }
}

export class NotFoundError extends AppError {
  constructor(identifier: string) {
    super(`No driver found for identifier ${identifier}`, 'NOT_FOUND', 404);
  }
}

export interface UpstreamDetails extends Record<string, unknown> {
  status?: number;
  contentType?: string;
  sample?: string;
}

export class UpstreamFetchError extends AppError {
  constructor(message: string, details?: UpstreamDetails) {
    super(message, 'UPSTREAM_FETCH', 502, details);
  }
}

export class SchemaError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SCHEMA', 400, details);
  }
}

export class ConfigError extends AppError {
  constructor(message: string, readonly missing: string[] = []) {
    super(message, 'CONFIG', 500, missing.length ? { missing } : undefined);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
