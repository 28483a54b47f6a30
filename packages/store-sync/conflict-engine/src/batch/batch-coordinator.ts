/**
 * Batch sweeps over many conflicts.
 *
 * Sweeps are not atomic as a whole: each conflict commits on its own, so
 * an interrupted sweep leaves the conflicts it reached resolved and a
 * re-run skips them as terminal. Aborting the signal stops the sweep
 * before the next conflict.
 */

import type { Logger } from 'pino';
import type { BatchOptions, Conflict, ResolutionType } from '../types.js';
import type { ConflictRepository } from '../repository/conflict-repository.js';
import type { RuleStore } from '../rules/rule-store.js';
import type { ConflictResolver } from '../resolver/conflict-resolver.js';
import type { ResolutionApplier } from '../applier/resolution-applier.js';
import type { AuditTrail } from '../audit/audit-trail.js';
import { ConflictEngineError, isConflictEngineError } from '../errors.js';

/** Page size used when scanning Pending conflicts */
const SCAN_PAGE_SIZE = 100;

export interface BatchCoordinatorDeps {
  repository: ConflictRepository;
  rules: RuleStore;
  resolver: ConflictResolver;
  applier: ResolutionApplier;
  audit: AuditTrail;
  logger: Logger;
}

export class BatchCoordinator {
  private readonly repository: ConflictRepository;
  private readonly rules: RuleStore;
  private readonly resolver: ConflictResolver;
  private readonly applier: ResolutionApplier;
  private readonly audit: AuditTrail;
  private readonly logger: Logger;

  constructor(deps: BatchCoordinatorDeps) {
    this.repository = deps.repository;
    this.rules = deps.rules;
    this.resolver = deps.resolver;
    this.applier = deps.applier;
    this.audit = deps.audit;
    this.logger = deps.logger.child({ component: 'batch-coordinator' });
  }

  /**
   * Resolve every Pending conflict whose fields all have automatic rules.
   *
   * @returns Number of conflicts resolved by this sweep
   */
  async autoResolveAll(options: BatchOptions = {}): Promise<number> {
    const pending = await this.loadPending();
    let resolved = 0;
    let skipped = 0;
    let failed = 0;

    for (const conflict of pending) {
      if (options.signal?.aborted) {
        this.logger.info({ resolved, remaining: pending.length - resolved - skipped - failed }, 'Auto-resolve sweep cancelled');
        break;
      }

      if (this.rules.requiresManualReview(conflict.entityType, conflict.conflictingFields).length > 0) {
        skipped++;
        continue;
      }

      try {
        const result = await this.resolver.resolve(conflict);
        if (result.outcome === 'resolved') {
          resolved++;
        }
      } catch (err) {
        if (!isConflictEngineError(err)) {
          throw err;
        }
        failed++;
        this.logger.warn(
          { conflictId: conflict.id, code: err.code, error: err.message },
          'Auto-resolve failed for conflict'
        );
      }
    }

    this.logger.info({ scanned: pending.length, resolved, skipped, failed }, 'Auto-resolve sweep complete');
    return resolved;
  }

  /**
   * Apply one resolution type to many conflicts.
   * Missing and terminal conflicts are skipped.
   *
   * @returns Number of conflicts resolved by this call
   */
  async bulkResolve(
    conflictIds: readonly string[],
    resolutionType: ResolutionType,
    userId: string,
    notes?: string | null,
    options: BatchOptions = {}
  ): Promise<number> {
    if (resolutionType === 'Manual') {
      throw new ConflictEngineError('INVALID_REQUEST', 'Bulk resolution cannot use Manual');
    }
    if (!userId) {
      throw new ConflictEngineError('INVALID_REQUEST', 'userId is required');
    }

    let resolved = 0;

    for (const conflictId of new Set(conflictIds)) {
      if (options.signal?.aborted) {
        this.logger.info({ resolved }, 'Bulk resolve cancelled');
        break;
      }

      try {
        const result = await this.applier.manualResolve(
          { conflictId, resolutionType, userId, notes: notes ?? 'Bulk resolution' },
          'BulkResolved'
        );
        if (result.outcome === 'resolved') {
          resolved++;
        }
      } catch (err) {
        if (!isConflictEngineError(err)) {
          throw err;
        }
        this.logger.warn({ conflictId, code: err.code, error: err.message }, 'Bulk resolve skipped conflict');
      }
    }

    this.logger.info({ requested: conflictIds.length, resolved, resolutionType, userId }, 'Bulk resolve complete');
    return resolved;
  }

  /**
   * Delete terminal conflicts whose resolution is strictly older than
   * `olderThan`. Pending conflicts are never removed.
   *
   * @returns Number of conflicts purged
   */
  async purgeResolved(olderThan: Date): Promise<number> {
    const purged = await this.repository.purgeTerminal(olderThan, (conflict) =>
      this.audit.buildEntry({
        conflictId: conflict.id,
        action: 'Purged',
        oldStatus: conflict.status,
        newStatus: conflict.status,
        details: `Purged (resolved ${conflict.resolvedAt?.toISOString() ?? 'unknown'})`,
      })
    );

    this.logger.info({ purged: purged.length, olderThan: olderThan.toISOString() }, 'Purged terminal conflicts');
    return purged.length;
  }

  private async loadPending(): Promise<Conflict[]> {
    const pending: Conflict[] = [];
    let offset = 0;

    for (;;) {
      const page = await this.repository.find({
        status: 'Pending',
        sortBy: 'detectedAt',
        sortDirection: 'asc',
        offset,
        limit: SCAN_PAGE_SIZE,
      });
      pending.push(...page.conflicts);
      offset += page.conflicts.length;
      if (page.conflicts.length < SCAN_PAGE_SIZE || offset >= page.total) {
        return pending;
      }
    }
  }
}
