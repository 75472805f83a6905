/**
 * Error handling for the API
 * Maps validation, application and HTTP errors to structured JSON responses.
 * Hono routes every error thrown by a handler or middleware to app.onError,
 * so the mapping is registered there.
 */
import type { Context, ErrorHandler, NotFoundHandler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import { errorMessage } from '@cloud-prospector/lib';
import type { PlaylistError } from '@cloud-prospector/agents/playlists';
import type { AppEnv } from '../types';
import type { ApiLogger } from '../logger';

// Error codes for client consumption
export const ErrorCodes = {
  // Client errors (4xx)
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  CONFLICT: 'CONFLICT',

  // Server errors (5xx)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// Structured error response
export interface ErrorResponse {
  success: false;
  error: string;
  code: ErrorCode;
  details?: Record<string, unknown>;
  timestamp: string;
  requestId?: string;
}

// Custom application error
export class AppError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public status: ContentfulStatusCode = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

// Helper functions to create common errors
export function validationError(message: string, details?: Record<string, unknown>): AppError {
  return new AppError(message, ErrorCodes.VALIDATION_ERROR, 400, details);
}

export function notFoundError(resource: string): AppError {
  return new AppError(`${resource} not found`, ErrorCodes.NOT_FOUND, 404);
}

export function conflictError(message: string): AppError {
  return new AppError(message, ErrorCodes.CONFLICT, 409);
}

export function serviceError(service: string, message: string): AppError {
  return new AppError(`${service} service error: ${message}`, ErrorCodes.SERVICE_UNAVAILABLE, 503);
}

/**
 * Translate a playlist engine failure into the matching HTTP error
 */
export function playlistError(error: PlaylistError): AppError {
  switch (error.kind) {
    case 'invalid':
      return validationError(error.message, error.details ? { errors: error.details } : undefined);
    case 'not_found':
      return new AppError(error.message, ErrorCodes.NOT_FOUND, 404);
    case 'not_dynamic':
    case 'not_static':
    case 'archived':
      return conflictError(error.message);
    case 'store_failed':
      return serviceError('store', error.message);
  }
}

/**
 * zValidator hook: rethrow the ZodError so onError formats it like every
 * other validation failure
 */
export function rejectInvalid(result: { success: true } | { success: false; error: ZodError }): void {
  if (!result.success) {
    throw result.error;
  }
}

/**
 * Read a JSON body for handlers that validate it themselves; a body that
 * does not parse is a validation error rather than a server error
 */
export async function readJsonBody(c: Context<AppEnv>): Promise<unknown> {
  try {
    const body: unknown = await c.req.json();
    return body;
  } catch {
    throw validationError('Malformed JSON in request body');
  }
}

/**
 * Format Zod validation errors into a user-friendly structure
 */
function formatZodError(error: ZodError): Record<string, string[]> {
  const formatted: Record<string, string[]> = {};

  for (const issue of error.issues) {
    const key = issue.path.join('.') || 'root';
    (formatted[key] ??= []).push(issue.message);
  }

  return formatted;
}

/**
 * Build error response object
 */
function buildErrorResponse(
  message: string,
  code: ErrorCode,
  details?: Record<string, unknown>,
  requestId?: string
): ErrorResponse {
  return {
    success: false,
    error: message,
    code,
    details,
    timestamp: new Date().toISOString(),
    requestId,
  };
}

function httpExceptionCode(status: number): ErrorCode {
  if (status === 404) return ErrorCodes.NOT_FOUND;
  if (status === 409) return ErrorCodes.CONFLICT;
  if (status >= 400 && status < 500) return ErrorCodes.VALIDATION_ERROR;
  return ErrorCodes.INTERNAL_ERROR;
}

function toErrorResponse(err: unknown, requestId: string | undefined): { body: ErrorResponse; status: ContentfulStatusCode } {
  // Handle Zod validation errors
  if (err instanceof ZodError) {
    return {
      body: buildErrorResponse('Validation failed', ErrorCodes.VALIDATION_ERROR, { fields: formatZodError(err) }, requestId),
      status: 400,
    };
  }

  // Handle custom application errors
  if (err instanceof AppError) {
    return { body: buildErrorResponse(err.message, err.code, err.details, requestId), status: err.status };
  }

  // Handle Hono HTTP exceptions (e.g. malformed JSON bodies)
  if (err instanceof HTTPException) {
    return {
      body: buildErrorResponse(err.message || 'HTTP error', httpExceptionCode(err.status), undefined, requestId),
      status: err.status,
    };
  }

  // Don't expose internal error details
  return {
    body: buildErrorResponse('Internal server error', ErrorCodes.INTERNAL_ERROR, undefined, requestId),
    status: 500,
  };
}

/**
 * onError handler: every thrown error ends here
 */
export function errorHandler(log: ApiLogger): ErrorHandler<AppEnv> {
  return (err, c) => {
    const requestId = c.get('requestId');
    const { body, status } = toErrorResponse(err, requestId);

    log.requestError({
      request_id: requestId,
      method: c.req.method,
      path: c.req.path,
      status,
      code: body.code,
      error_message: status >= 500 ? errorMessage(err) : body.error,
    });

    return c.json(body, status);
  };
}

export function notFoundHandler(): NotFoundHandler<AppEnv> {
  return (c) =>
    c.json(buildErrorResponse('Not found', ErrorCodes.NOT_FOUND, undefined, c.get('requestId')), 404);
}
