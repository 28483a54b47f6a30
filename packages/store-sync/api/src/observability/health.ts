/**
 * Service health.
 *
 * Three things decide whether the sync service is fit to take traffic:
 * heap pressure, the MongoDB connection (when configured) and the size of
 * the Pending conflict backlog. Each is a named check; the report takes
 * the worst status among them.
 */

import { getHeapStatistics } from 'node:v8';
import type { ComponentHealth, HealthReport, HealthStatus, ReadinessReport } from './types.js';

export type HealthCheck = () => Promise<ComponentHealth>;

const SEVERITY: Record<HealthStatus, number> = { healthy: 0, degraded: 1, unhealthy: 2 };

/** Shares of the heap limit that degrade and fail the memory check */
const HEAP_DEGRADED_RATIO = 0.75;
const HEAP_UNHEALTHY_RATIO = 0.9;

/** Pending conflicts above this count degrade the backlog check */
export const BACKLOG_DEGRADED_AT = 1000;

const VERSION = process.env['npm_package_version'] ?? '0.1.0';
const startedAt = Date.now();

const checks = new Map<string, HealthCheck>();

export function addHealthCheck(name: string, check: HealthCheck): void {
  checks.set(name, check);
}

export function resetHealthChecks(): void {
  checks.clear();
}

async function runCheck(check: HealthCheck): Promise<ComponentHealth> {
  const began = Date.now();
  try {
    const result = await check();
    return { ...result, latencyMs: result.latencyMs ?? Date.now() - began };
  } catch (err) {
    return {
      status: 'unhealthy',
      message: err instanceof Error ? err.message : String(err),
      latencyMs: Date.now() - began,
    };
  }
}

/**
 * Run every check concurrently.
 */
export async function checkHealth(): Promise<HealthReport> {
  const entries = [...checks.entries()];
  const results = await Promise.all(entries.map(([, check]) => runCheck(check)));

  const components: Record<string, ComponentHealth> = {};
  let status: HealthStatus = 'healthy';
  entries.forEach(([name], i) => {
    const result = results[i];
    if (!result) {
      return;
    }
    components[name] = result;
    if (SEVERITY[result.status] > SEVERITY[status]) {
      status = result.status;
    }
  });

  return {
    status,
    checkedAt: new Date().toISOString(),
    version: VERSION,
    uptimeSeconds: Math.round((Date.now() - startedAt) / 1000),
    components,
  };
}

/**
 * Ready unless a component is unhealthy; a degraded one still serves.
 */
export async function checkReadiness(): Promise<ReadinessReport> {
  const report = await checkHealth();
  const components: Record<string, HealthStatus> = {};
  for (const [name, health] of Object.entries(report.components)) {
    components[name] = health.status;
  }
  return { ready: report.status !== 'unhealthy', components };
}

export function memoryCheck(): HealthCheck {
  return async () => {
    const { used_heap_size: used, heap_size_limit: limit } = getHeapStatistics();
    const ratio = limit > 0 ? used / limit : 0;
    const status: HealthStatus =
      ratio > HEAP_UNHEALTHY_RATIO ? 'unhealthy' : ratio > HEAP_DEGRADED_RATIO ? 'degraded' : 'healthy';
    const mb = (bytes: number): string => (bytes / 1024 / 1024).toFixed(1);
    return { status, message: `heap ${mb(used)}MB of ${mb(limit)}MB` };
  };
}

export function mongoCheck(ping: () => Promise<boolean>): HealthCheck {
  return async () =>
    (await ping())
      ? { status: 'healthy', message: 'ping ok' }
      : { status: 'unhealthy', message: 'ping failed' };
}

export function backlogCheck(countPending: () => Promise<number>): HealthCheck {
  return async () => {
    const pending = await countPending();
    return {
      status: pending > BACKLOG_DEGRADED_AT ? 'degraded' : 'healthy',
      message: `${pending} pending conflicts`,
    };
  };
}
