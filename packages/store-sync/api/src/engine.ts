/**
 * Conflict engine singleton.
 *
 * Without MongoDB the engine runs over the in-memory repository and
 * entity store, which is what tests and local development use.
 */

import {
  ConflictEngine,
  InMemoryConflictRepository,
  InMemoryEntityStore,
  RuleStore,
  buildEngineConfig,
  validateEngineConfig,
  type ConflictRepository,
  type EntityStore,
  type ResolutionRule,
} from '@store-sync/conflict-engine';
import { getLogger } from './logger.js';

export interface EngineInitOptions {
  repository?: ConflictRepository;
  entityStore?: EntityStore;

  /** Stored rule table; defaults when omitted */
  rules?: ResolutionRule[];
}

let engine: ConflictEngine | null = null;

/**
 * Build the engine. Replaces any existing instance.
 */
export function initConflictEngine(options: EngineInitOptions = {}): ConflictEngine {
  const logger = getLogger();
  const config = buildEngineConfig();

  const errors = validateEngineConfig(config);
  if (errors.length > 0) {
    throw new Error(`Invalid engine configuration: ${errors.join('; ')}`);
  }

  engine = new ConflictEngine({
    repository: options.repository ?? new InMemoryConflictRepository(),
    entityStore: options.entityStore ?? new InMemoryEntityStore(),
    rules: new RuleStore(logger, { defaultResolution: config.defaultResolution, rules: options.rules }),
    logger,
    config,
  });

  logger.info(
    {
      defaultResolution: config.defaultResolution,
      claimLeaseMs: config.claimLeaseMs,
      retentionDays: config.retentionDays,
    },
    'Conflict engine initialized'
  );

  return engine;
}

/**
 * Get the engine, creating an in-memory one on first use.
 */
export function getConflictEngine(): ConflictEngine {
  return engine ?? initConflictEngine();
}

/**
 * Drop the engine (for testing).
 */
export function resetConflictEngine(): void {
  engine = null;
}
