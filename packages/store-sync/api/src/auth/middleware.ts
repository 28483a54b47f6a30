import * as crypto from 'node:crypto';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { config } from '../config.js';

/** Header name for API key */
const API_KEY_HEADER = 'x-api-key';
/** Header name for Authorization Bearer token */
const AUTH_HEADER = 'authorization';

/**
 * Extract API key from request headers.
 * Supports both x-api-key header and Authorization: Bearer token.
 */
function extractApiKey(request: FastifyRequest): string | null {
  const apiKeyHeader = request.headers[API_KEY_HEADER];
  if (typeof apiKeyHeader === 'string' && apiKeyHeader.length > 0) {
    return apiKeyHeader;
  }

  const authHeader = request.headers[AUTH_HEADER];
  if (typeof authHeader === 'string') {
    const match = authHeader.match(/^Bearer\s+(.+)$/i);
    if (match && match[1]) {
      return match[1];
    }
  }

  return null;
}

/**
 * Constant-time key comparison (hashing first evens out lengths).
 */
export function keysMatch(provided: string, expected: string): boolean {
  const a = crypto.createHash('sha256').update(provided).digest();
  const b = crypto.createHash('sha256').update(expected).digest();
  return crypto.timingSafeEqual(a, b);
}

export interface AuthPluginOptions {
  /** Paths served without a key (e.g., ['/api/health']) */
  excludePaths?: string[];
}

/**
 * Register API key authentication as a Fastify hook.
 * SKIP_AUTH=true disables the check (local development only).
 */
export function registerAuthMiddleware(
  fastify: FastifyInstance,
  options: AuthPluginOptions = {}
): void {
  const excludePaths = new Set(options.excludePaths ?? []);

  fastify.addHook('onRequest', async (request: FastifyRequest, reply: FastifyReply) => {
    if (config.skipAuth) {
      return;
    }

    const urlPath = request.url.split('?')[0] ?? '';
    if (excludePaths.has(urlPath)) {
      return;
    }

    const rawKey = extractApiKey(request);
    if (!rawKey) {
      return reply.status(401).send({
        error: 'Unauthorized',
        message: 'API key is required. Provide via x-api-key header or Authorization: Bearer token.',
      });
    }

    if (!config.operatorApiKey || !keysMatch(rawKey, config.operatorApiKey)) {
      request.log.warn({ path: urlPath }, 'Rejected request with invalid API key');
      return reply.status(401).send({
        error: 'Unauthorized',
        message: 'Invalid API key',
      });
    }
  });
}
