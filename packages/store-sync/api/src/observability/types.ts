/**
 * Health report and request tracing types
 */

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface ComponentHealth {
  status: HealthStatus;
  message?: string;
  latencyMs?: number;
}

/** Body of GET /health: the worst component status wins */
export interface HealthReport {
  status: HealthStatus;
  checkedAt: string;
  version: string;
  uptimeSeconds: number;
  components: Record<string, ComponentHealth>;
}

/** Body of GET /health/ready */
export interface ReadinessReport {
  ready: boolean;
  components: Record<string, HealthStatus>;
}

/**
 * Request context for tracing
 */
export interface RequestContext {
  correlationId: string;
  requestId: string;
  startTime: number;
  method: string;
  path: string;
  userAgent?: string;
  clientIp?: string;
}
