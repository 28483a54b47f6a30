/**
 * Health checks and request tracing
 */

export type {
  HealthStatus,
  ComponentHealth,
  HealthReport,
  ReadinessReport,
  RequestContext,
} from './types.js';

export {
  addHealthCheck,
  resetHealthChecks,
  checkHealth,
  checkReadiness,
  memoryCheck,
  mongoCheck,
  backlogCheck,
  BACKLOG_DEGRADED_AT,
  type HealthCheck,
} from './health.js';

export {
  registerTracing,
  CORRELATION_ID_HEADER,
  REQUEST_ID_HEADER,
} from './tracing.js';
