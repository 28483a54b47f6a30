import { randomUUID } from 'node:crypto';
import Fastify from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import type { FastifyInstance } from 'fastify';
import { healthRoutes } from './routes/health.js';
import { conflictRoutes } from './routes/conflicts.js';
import { ruleRoutes } from './routes/rules.js';
import { registerAuthMiddleware } from './auth/index.js';
import { getConflictEngine } from './engine.js';
import { config } from './config.js';
import { pingMongo } from './db/mongo.js';
import { registerTracing, addHealthCheck, memoryCheck, mongoCheck, backlogCheck } from './observability/index.js';

export async function buildApp(): Promise<FastifyInstance> {
  const app = Fastify({
    logger: {
      level: config.logLevel,
      // Structured JSON logging in production
      transport:
        config.nodeEnv === 'development'
          ? {
              target: 'pino-pretty',
              options: {
                colorize: true,
              },
            }
          : undefined,
      serializers: {
        req(request) {
          return {
            method: request.method,
            url: request.url,
            hostname: request.hostname,
            remoteAddress: request.ip,
          };
        },
      },
    },
    // Completion is logged by the tracing hook
    disableRequestLogging: true,
    genReqId: () => randomUUID(),
  });

  // Correlation IDs and request timing
  registerTracing(app);

  addHealthCheck('memory', memoryCheck());
  if (config.mongodbUri) {
    addHealthCheck('mongodb', mongoCheck(pingMongo));
  }
  addHealthCheck('conflictBacklog', backlogCheck(async () => (await getConflictEngine().countByStatus()).Pending));

  // Security middleware
  await app.register(helmet);
  await app.register(cors, {
    origin: config.corsOrigin,
    credentials: true,
  });

  registerAuthMiddleware(app, {
    excludePaths: ['/api/health', '/api/health/ready', '/api/health/live'],
  });

  await app.register(healthRoutes, { prefix: '/api' });
  await app.register(conflictRoutes, { prefix: '/api' });
  await app.register(ruleRoutes, { prefix: '/api' });

  return app;
}
