export { ConflictEngine } from './conflict-engine.js';
export type { ConflictEngineDeps } from './conflict-engine.js';

export { ConflictDetector } from './snapshot/conflict-detector.js';
export {
  parseSnapshot,
  canonicalize,
  valuesEqual,
  conflictingFields,
  hasMeaningfulDifference,
} from './snapshot/snapshot-differ.js';

export { RuleStore } from './rules/rule-store.js';
export type { RuleStoreOptions } from './rules/rule-store.js';
export { DEFAULT_RULES } from './rules/default-rules.js';

export { ConflictResolver } from './resolver/conflict-resolver.js';
export {
  computeResolution,
  computeUniformResolution,
  mergeValues,
  localIsNewer,
} from './resolver/resolution-policy.js';
export type { FieldPolicy } from './resolver/resolution-policy.js';

export { ResolutionApplier } from './applier/resolution-applier.js';
export type { ApplyOptions, ResolutionApplierDeps } from './applier/resolution-applier.js';

export { AuditTrail } from './audit/audit-trail.js';
export type { AuditEntryParams } from './audit/audit-trail.js';

export { BatchCoordinator } from './batch/batch-coordinator.js';
export type { BatchCoordinatorDeps } from './batch/batch-coordinator.js';

export type { ConflictRepository } from './repository/conflict-repository.js';
export { InMemoryConflictRepository } from './repository/in-memory-repository.js';
export { InMemoryEntityStore } from './repository/in-memory-entity-store.js';

export { buildEngineConfig, validateEngineConfig, DEFAULT_ENGINE_CONFIG } from './config.js';
export type { ConflictEngineConfig } from './config.js';

export { ConflictEngineError, isConflictEngineError } from './errors.js';
export type { ConflictErrorCode } from './errors.js';

export { validateManualResolveRequest, validateRule } from './validation.js';

export {
  ENTITY_TYPES,
  CONFLICT_STATUSES,
  RESOLUTION_TYPES,
  isEntityType,
  isResolutionType,
} from './types.js';
export type {
  JsonValue,
  Snapshot,
  SnapshotInput,
  EntityType,
  ConflictStatus,
  ResolutionType,
  ConflictClaim,
  Conflict,
  DetectConflictInput,
  RuleKey,
  ResolutionRule,
  GlobalDefaultRule,
  ApplicableRule,
  AuditAction,
  AuditEntry,
  ConflictTransition,
  ResolutionOutcome,
  ResolutionResult,
  ComputedResolution,
  ManualResolveRequest,
  EntityWrite,
  EntityStore,
  ConflictQuery,
  ConflictFilter,
  ConflictListResponse,
  StatusCounts,
  ConflictSummary,
  BatchOptions,
} from './types.js';
