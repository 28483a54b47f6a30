/**
 * Engine configuration builder.
 *
 * Reads from environment variables with sensible defaults.
 * All values can be overridden programmatically.
 */

import type { ResolutionType } from './types.js';
import { isResolutionType } from './types.js';

export interface ConflictEngineConfig {
  /** Policy used when no entity or property rule matches */
  defaultResolution: ResolutionType;

  /** How long a claim protects a transition in flight (ms) */
  claimLeaseMs: number;

  /** How long a losing writer waits for the winner to finish (ms) */
  claimWaitMs: number;

  /** Poll interval while waiting for the winner (ms) */
  claimPollMs: number;

  /** Default purge threshold for terminal conflicts (days) */
  retentionDays: number;
}

export const DEFAULT_ENGINE_CONFIG: ConflictEngineConfig = {
  defaultResolution: 'LastWriteWins',
  claimLeaseMs: 30_000,
  claimWaitMs: 5_000,
  claimPollMs: 50,
  retentionDays: 30,
};

function getEnvNumber(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  const parsed = parseInt(raw, 10);
  return isNaN(parsed) ? fallback : parsed;
}

function getEnvResolution(key: string, fallback: ResolutionType): ResolutionType {
  const raw = process.env[key];
  return isResolutionType(raw) ? raw : fallback;
}

/**
 * Build engine config from environment variables and optional overrides.
 *
 * Environment variables:
 * - CONFLICT_DEFAULT_RESOLUTION: global default policy (default: LastWriteWins)
 * - CONFLICT_CLAIM_LEASE_MS: claim lease (default: 30000)
 * - CONFLICT_CLAIM_WAIT_MS: wait for a concurrent writer (default: 5000)
 * - CONFLICT_CLAIM_POLL_MS: poll interval while waiting (default: 50)
 * - CONFLICT_RETENTION_DAYS: purge threshold (default: 30)
 */
export function buildEngineConfig(overrides?: Partial<ConflictEngineConfig>): ConflictEngineConfig {
  return {
    defaultResolution:
      overrides?.defaultResolution ??
      getEnvResolution('CONFLICT_DEFAULT_RESOLUTION', DEFAULT_ENGINE_CONFIG.defaultResolution),
    claimLeaseMs: overrides?.claimLeaseMs ?? getEnvNumber('CONFLICT_CLAIM_LEASE_MS', DEFAULT_ENGINE_CONFIG.claimLeaseMs),
    claimWaitMs: overrides?.claimWaitMs ?? getEnvNumber('CONFLICT_CLAIM_WAIT_MS', DEFAULT_ENGINE_CONFIG.claimWaitMs),
    claimPollMs: overrides?.claimPollMs ?? getEnvNumber('CONFLICT_CLAIM_POLL_MS', DEFAULT_ENGINE_CONFIG.claimPollMs),
    retentionDays: overrides?.retentionDays ?? getEnvNumber('CONFLICT_RETENTION_DAYS', DEFAULT_ENGINE_CONFIG.retentionDays),
  };
}

/**
 * Validate an engine configuration.
 * Returns an array of error messages (empty = valid).
 */
export function validateEngineConfig(config: ConflictEngineConfig): string[] {
  const errors: string[] = [];

  if (config.defaultResolution === 'Manual') {
    errors.push('defaultResolution must not be Manual: the global default has to resolve automatically');
  }

  if (config.claimLeaseMs < 1000) {
    errors.push('claimLeaseMs must be at least 1000 (1 second)');
  }

  if (config.claimWaitMs < 0) {
    errors.push('claimWaitMs must not be negative');
  }

  if (config.claimWaitMs > config.claimLeaseMs * 2) {
    errors.push('claimWaitMs must not exceed twice claimLeaseMs');
  }

  if (config.claimPollMs < 1) {
    errors.push('claimPollMs must be at least 1');
  }

  if (config.retentionDays < 1) {
    errors.push('retentionDays must be at least 1');
  }

  return errors;
}
