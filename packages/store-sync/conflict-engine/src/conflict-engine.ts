/**
 * Conflict engine facade.
 *
 * Wires detector, rule store, resolver, applier, audit trail and batch
 * coordinator over one repository and one entity store, and exposes the
 * operations used by the sync transport and the operator API.
 */

import type { Logger } from 'pino';
import type {
  ApplicableRule,
  AuditEntry,
  BatchOptions,
  Conflict,
  ConflictFilter,
  ConflictListResponse,
  ConflictQuery,
  ConflictSummary,
  DetectConflictInput,
  EntityStore,
  EntityType,
  ManualResolveRequest,
  ResolutionResult,
  ResolutionRule,
  ResolutionType,
  StatusCounts,
} from './types.js';
import type { ConflictRepository } from './repository/conflict-repository.js';
import type { ConflictEngineConfig } from './config.js';
import { buildEngineConfig } from './config.js';
import { AuditTrail } from './audit/audit-trail.js';
import { ConflictDetector } from './snapshot/conflict-detector.js';
import { RuleStore } from './rules/rule-store.js';
import { ResolutionApplier } from './applier/resolution-applier.js';
import { ConflictResolver } from './resolver/conflict-resolver.js';
import { BatchCoordinator } from './batch/batch-coordinator.js';
import { notFound } from './errors.js';

/** Number of conflicts in the summary's recent list */
const SUMMARY_RECENT_COUNT = 10;

/** Default page size for conflict listings */
const DEFAULT_QUERY_LIMIT = 50;

export interface ConflictEngineDeps {
  repository: ConflictRepository;
  entityStore: EntityStore;
  logger: Logger;

  /** Rule table; built from defaults when omitted */
  rules?: RuleStore;

  config?: Partial<ConflictEngineConfig>;

  /** Clock (default: wall clock) */
  now?: () => Date;
}

export class ConflictEngine {
  readonly config: ConflictEngineConfig;
  readonly rules: RuleStore;
  readonly audit: AuditTrail;

  private readonly repository: ConflictRepository;
  private readonly detector: ConflictDetector;
  private readonly applier: ResolutionApplier;
  private readonly resolver: ConflictResolver;
  private readonly batch: BatchCoordinator;
  private readonly now: () => Date;

  constructor(deps: ConflictEngineDeps) {
    this.config = buildEngineConfig(deps.config);
    this.now = deps.now ?? (() => new Date());
    this.repository = deps.repository;

    const logger = deps.logger;
    this.rules = deps.rules ?? new RuleStore(logger, { defaultResolution: this.config.defaultResolution });
    this.audit = new AuditTrail(deps.repository, logger, this.now);
    this.detector = new ConflictDetector(deps.repository, this.audit, logger, this.now);
    this.applier = new ResolutionApplier({
      repository: deps.repository,
      entityStore: deps.entityStore,
      audit: this.audit,
      logger,
      config: this.config,
      now: this.now,
    });
    this.resolver = new ConflictResolver(deps.repository, this.rules, this.applier, logger);
    this.batch = new BatchCoordinator({
      repository: deps.repository,
      rules: this.rules,
      resolver: this.resolver,
      applier: this.applier,
      audit: this.audit,
      logger,
    });
  }

  // ─── Detection ──────────────────────────────────────────────────────

  detect(input: DetectConflictInput): Promise<Conflict | null> {
    return this.detector.detect(input);
  }

  // ─── Resolution ─────────────────────────────────────────────────────

  resolve(conflict: Conflict): Promise<ResolutionResult> {
    return this.resolver.resolve(conflict);
  }

  resolveById(conflictId: string): Promise<ResolutionResult> {
    return this.resolver.resolveById(conflictId);
  }

  manualResolve(request: ManualResolveRequest): Promise<ResolutionResult> {
    return this.applier.manualResolve(request);
  }

  ignore(conflictId: string, userId: string, notes?: string | null): Promise<ResolutionResult> {
    return this.applier.ignore(conflictId, userId, notes);
  }

  // ─── Batch ──────────────────────────────────────────────────────────

  autoResolveAll(options?: BatchOptions): Promise<number> {
    return this.batch.autoResolveAll(options);
  }

  bulkResolve(
    conflictIds: readonly string[],
    resolutionType: ResolutionType,
    userId: string,
    notes?: string | null,
    options?: BatchOptions
  ): Promise<number> {
    return this.batch.bulkResolve(conflictIds, resolutionType, userId, notes, options);
  }

  /**
   * Purge terminal conflicts. Defaults to the configured retention.
   */
  purgeResolved(olderThan?: Date): Promise<number> {
    const threshold =
      olderThan ?? new Date(this.now().getTime() - this.config.retentionDays * 24 * 60 * 60 * 1000);
    return this.batch.purgeResolved(threshold);
  }

  // ─── Queries ────────────────────────────────────────────────────────

  async getConflictById(conflictId: string): Promise<Conflict> {
    const conflict = await this.repository.findById(conflictId);
    if (!conflict) {
      throw notFound(conflictId);
    }
    return conflict;
  }

  async queryConflicts(query: ConflictQuery = {}): Promise<ConflictListResponse> {
    const filter: ConflictFilter = {
      entityType: query.entityType,
      entityId: query.entityId,
      storeId: query.storeId,
      syncBatchId: query.syncBatchId,
      from: query.from,
      to: query.to,
    };
    const [page, counts] = await Promise.all([
      this.repository.find({ ...query, limit: query.limit ?? DEFAULT_QUERY_LIMIT }),
      this.repository.countByStatus(filter),
    ]);

    return {
      conflicts: page.conflicts,
      total: page.total,
      pending: counts.Pending,
      resolved: counts.Resolved,
      ignored: counts.Ignored,
    };
  }

  countByStatus(storeId?: string): Promise<StatusCounts> {
    return this.repository.countByStatus({ storeId });
  }

  async getSummary(storeId?: string): Promise<ConflictSummary> {
    const { conflicts } = await this.repository.find({
      storeId,
      sortBy: 'detectedAt',
      sortDirection: 'desc',
    });

    const summary: ConflictSummary = {
      total: conflicts.length,
      pending: 0,
      autoResolved: 0,
      manuallyResolved: 0,
      ignored: 0,
      byEntityType: {},
      recent: conflicts.slice(0, SUMMARY_RECENT_COUNT),
      generatedAt: this.now(),
    };

    for (const conflict of conflicts) {
      summary.byEntityType[conflict.entityType] = (summary.byEntityType[conflict.entityType] ?? 0) + 1;

      switch (conflict.status) {
        case 'Pending':
          summary.pending++;
          break;
        case 'Ignored':
          summary.ignored++;
          break;
        case 'Resolved':
          if (conflict.resolvedBy === null) {
            summary.autoResolved++;
          } else {
            summary.manuallyResolved++;
          }
          break;
      }
    }

    return summary;
  }

  getAuditTrail(conflictId: string): Promise<AuditEntry[]> {
    return this.audit.getTrail(conflictId);
  }

  // ─── Rules ──────────────────────────────────────────────────────────

  getApplicableRule(entityType: EntityType, propertyName?: string | null): ApplicableRule {
    return this.rules.getApplicableRule(entityType, propertyName);
  }

  getAllRules(): ResolutionRule[] {
    return this.rules.getAllRules();
  }

  addOrUpdateRule(rule: ResolutionRule): void {
    this.rules.addOrUpdateRule(rule);
  }

  removeRule(entityType: EntityType, propertyName?: string | null): boolean {
    return this.rules.removeRule(entityType, propertyName ?? null);
  }

  resetRulesToDefaults(): void {
    this.rules.resetToDefaults();
  }

  /** Replace the whole rule table */
  loadRules(rules: readonly ResolutionRule[]): void {
    this.rules.load(rules);
  }
}
