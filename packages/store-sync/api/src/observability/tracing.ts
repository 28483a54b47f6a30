/**
 * Request tracing with correlation IDs
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { randomUUID } from 'node:crypto';
import type { RequestContext } from './types.js';

/** Header name for correlation ID (sync session id from the store) */
export const CORRELATION_ID_HEADER = 'x-correlation-id';

/** Header name for request ID */
export const REQUEST_ID_HEADER = 'x-request-id';

declare module 'fastify' {
  interface FastifyRequest {
    traceContext?: RequestContext;
  }
}

/**
 * Register request tracing hooks
 * Adds correlation ID and request ID to all requests
 */
export function registerTracing(fastify: FastifyInstance): void {
  fastify.addHook('onRequest', async (request: FastifyRequest, reply: FastifyReply) => {
    // Reuse the caller's correlation ID so a whole sync session can be followed
    const header = request.headers[CORRELATION_ID_HEADER];
    const correlationId = typeof header === 'string' && header.length > 0 ? header : randomUUID();
    const requestId = randomUUID();

    request.traceContext = {
      correlationId,
      requestId,
      startTime: Date.now(),
      method: request.method,
      path: request.url.split('?')[0] ?? request.url,
      userAgent: request.headers['user-agent'],
      clientIp: request.ip,
    };

    void reply.header(CORRELATION_ID_HEADER, correlationId);
    void reply.header(REQUEST_ID_HEADER, requestId);
  });

  // Log request completion with timing
  fastify.addHook('onResponse', async (request: FastifyRequest, reply: FastifyReply) => {
    if (!request.traceContext) {
      return;
    }

    request.log.info(
      {
        correlationId: request.traceContext.correlationId,
        requestId: request.traceContext.requestId,
        method: request.traceContext.method,
        path: request.traceContext.path,
        statusCode: reply.statusCode,
        duration: Date.now() - request.traceContext.startTime,
      },
      'request completed'
    );
  });
}
