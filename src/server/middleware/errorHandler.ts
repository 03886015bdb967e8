import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';

import { SiteError } from '../errors.js';
import type { ErrorResponse } from '../types/index.js';

/**
 * Maps known error codes to HTTP status codes.
 * Unrecognised codes default to 500.
 */
const STATUS_MAP: Record<string, number> = {
  VALIDATION_ERROR: 400,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  BACKUP_NOT_FOUND: 404,
  DUPLICATE_CHAT_ID: 409,
  UNSUPPORTED_FORMAT: 415,
  INVALID_DOCUMENT: 422,
};

/**
 * Derives an error code from a Fastify error or falls back to INTERNAL_ERROR.
 */
function deriveErrorCode(error: FastifyError | Error): string {
  if ('code' in error && typeof error.code === 'string') {
    // Fastify validation errors use FST_ERR_VALIDATION
    if (error.code.startsWith('FST_ERR_VALIDATION')) return 'VALIDATION_ERROR';
    return error.code;
  }
  return 'INTERNAL_ERROR';
}

function deriveDetails(error: FastifyError | SiteError): unknown {
  if (error instanceof SiteError) return error.details;
  return error.validation;
}

/**
 * Structured error handler for the preview server.
 * Returns consistent JSON error responses.
 */
export function errorHandler(
  error: FastifyError | SiteError,
  _request: FastifyRequest,
  reply: FastifyReply,
): void {
  const code = deriveErrorCode(error);
  const statusCode = error.statusCode ?? STATUS_MAP[code] ?? 500;

  const response: ErrorResponse = {
    error: {
      code,
      message: error.message || 'An unexpected error occurred',
    },
  };

  // Details can include file names and schema issues; keep them out of production
  const details = deriveDetails(error);
  if (process.env.NODE_ENV !== 'production' && details !== undefined) {
    response.error.details = details;
  }

  reply.status(statusCode).send(response);
}
