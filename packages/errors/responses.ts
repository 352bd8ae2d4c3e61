/**
 * Standardized API response helpers.
 *
 * Every error response from every route MUST conform to the canonical shape:
 * { error: string, code: string, requestId: string, details?: unknown }
 *
 * Use these helpers instead of ad-hoc reply.status(...).send({ error: ... }) calls.
 */

import type { FastifyReply } from 'fastify';
import { AppError, ErrorCodes, type ErrorCode, type ErrorResponse } from './index';

/**
 * Send a standardized error response.
 * Reads X-Request-ID from the request, falling back to Fastify's request id.
 * Only includes `details` in development.
 */
export function sendError(
  reply: FastifyReply,
  statusCode: number,
  code: ErrorCode,
  message: string,
  opts?: { details?: unknown }
): FastifyReply {
  const rawRequestId = reply.request.headers['x-request-id'];
  const requestId = (typeof rawRequestId === 'string' ? rawRequestId : Array.isArray(rawRequestId) ? rawRequestId[0] : undefined) ?? reply.request.id;
  const isDevelopment = process.env['NODE_ENV'] === 'development';
  const body: ErrorResponse = {
    error: message,
    code,
    requestId,
  };
  if (opts?.details !== undefined && isDevelopment) {
    body.details = opts.details;
  }
  return reply.status(statusCode).send(body);
}

/**
 * Send an AppError with its own status code and code.
 */
export function sendAppError(reply: FastifyReply, error: AppError): FastifyReply {
  return sendError(reply, error.statusCode, error.code, error.message, { details: error.details });
}

/** Convenience helpers for common error responses. */
export const errors = {
  notFound: (reply: FastifyReply, resource = 'Resource', code: ErrorCode = ErrorCodes.NOT_FOUND) =>
    sendError(reply, 404, code, `${resource} not found`),

  validationFailed: (reply: FastifyReply, details?: unknown) =>
    sendError(reply, 400, ErrorCodes.VALIDATION_ERROR, 'Validation failed', { details }),

  internal: (reply: FastifyReply, msg = 'An error occurred processing your request') =>
    sendError(reply, 500, ErrorCodes.INTERNAL_ERROR, msg),
} as const;
