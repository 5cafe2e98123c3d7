// Common error classes and Fastify error mapping utilities
import { hasZodFastifySchemaValidationErrors } from 'fastify-type-provider-zod';

export type ErrorBody = { message: string; code?: string; details?: unknown };

export class AppError extends Error {
  statusCode: number;
  code?: string;
  details?: unknown;
  constructor(message: string, statusCode = 400, options?: { code?: string; details?: unknown; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = options?.code;
    this.details = options?.details;
  }
}

// The total-count query of a paginated listing failed
export class CountError extends AppError {
  constructor(cause: unknown) {
    super('Failed to count items', 500, { code: 'PAGE_COUNT_FAILED', cause });
    this.name = 'CountError';
  }
}

// The page fetch (offset/limit) of a paginated listing failed
export class FetchError extends AppError {
  constructor(cause: unknown) {
    super('Failed to fetch page', 500, { code: 'PAGE_FETCH_FAILED', cause });
    this.name = 'FetchError';
  }
}

export function toErrorResponse(err: unknown): { statusCode: number; body: ErrorBody } {
  if (err instanceof AppError) {
    return {
      statusCode: err.statusCode,
      body: { message: err.message, code: err.code, details: err.details },
    };
  }
  if (hasZodFastifySchemaValidationErrors(err)) {
    return {
      statusCode: 400,
      body: { message: err.message, code: 'VALIDATION_ERROR', details: err.validation },
    };
  }
  // Client errors raised by Fastify itself or its plugins (rate limit, bad JSON)
  if (isClientError(err)) {
    return { statusCode: err.statusCode, body: { message: err.message, code: err.code } };
  }
  return { statusCode: 500, body: { message: 'Internal Server Error' } };
}

function isClientError(err: unknown): err is Error & { statusCode: number; code?: string } {
  if (!(err instanceof Error) || !('statusCode' in err)) return false;
  const { statusCode } = err;
  return typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500;
}
