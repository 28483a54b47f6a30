import type { FastifyReply } from 'fastify';
import { isConflictEngineError, type ConflictErrorCode } from '@store-sync/conflict-engine';

const STATUS_BY_CODE: Record<ConflictErrorCode, { statusCode: number; error: string }> = {
  NOT_FOUND: { statusCode: 404, error: 'Not Found' },
  DATA_ERROR: { statusCode: 422, error: 'Unprocessable Entity' },
  APPLY_FAILED: { statusCode: 502, error: 'Bad Gateway' },
  BUSY: { statusCode: 409, error: 'Conflict' },
  INVALID_REQUEST: { statusCode: 400, error: 'Bad Request' },
};

export function badRequest(reply: FastifyReply, message: string): FastifyReply {
  return reply.status(400).send({ error: 'Bad Request', message });
}

/**
 * Label an engine error for a response body. Anything else is rethrown.
 */
export function engineErrorBody(err: unknown): { statusCode: number; error: string; message: string } {
  if (!isConflictEngineError(err)) {
    throw err;
  }
  return { ...STATUS_BY_CODE[err.code], message: err.message };
}

/**
 * Send an engine error with its mapped status. Anything else is rethrown
 * for Fastify's default 500 handling.
 */
export function sendEngineError(reply: FastifyReply, err: unknown): FastifyReply {
  const { statusCode, error, message } = engineErrorBody(err);
  return reply.status(statusCode).send({ error, message });
}
