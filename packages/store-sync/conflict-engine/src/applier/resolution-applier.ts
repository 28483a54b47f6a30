/**
 * Resolution applier.
 *
 * Every terminal transition runs claim -> (entity write) -> guarded commit:
 * - claim: lease on the conflict, granted only while it is Pending and unheld
 * - write: replace the canonical entity (resolutions only)
 * - commit: flip the status and append the audit entry, guarded on the
 *   conflict still being Pending under our claim
 * A writer that loses the claim waits for the winner and returns the
 * winner's result instead of applying a second time.
 */

import * as crypto from 'node:crypto';
import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from 'pino';
import type {
  AuditAction,
  Conflict,
  ConflictTransition,
  EntityStore,
  ManualResolveRequest,
  ResolutionResult,
  ResolutionType,
  Snapshot,
} from '../types.js';
import type { ConflictRepository } from '../repository/conflict-repository.js';
import type { AuditTrail } from '../audit/audit-trail.js';
import type { ConflictEngineConfig } from '../config.js';
import { DEFAULT_ENGINE_CONFIG } from '../config.js';
import { ConflictEngineError, notFound } from '../errors.js';
import { parseSnapshot } from '../snapshot/snapshot-differ.js';
import { computeUniformResolution } from '../resolver/resolution-policy.js';
import { validateManualResolveRequest } from '../validation.js';

export interface ApplyOptions {
  resolutionType: ResolutionType;
  action: Extract<AuditAction, 'AutoResolved' | 'ManuallyResolved' | 'BulkResolved'>;
  resolvedBy: string | null;
  notes: string | null;
}

export interface ResolutionApplierDeps {
  repository: ConflictRepository;
  entityStore: EntityStore;
  audit: AuditTrail;
  logger: Logger;
  config?: Partial<ConflictEngineConfig>;
  now?: () => Date;
}

/** Result describing a conflict as it is stored */
export function toResult(
  conflict: Conflict,
  outcome: ResolutionResult['outcome'],
  manualFields: string[] = []
): ResolutionResult {
  return {
    conflictId: conflict.id,
    outcome,
    status: conflict.status,
    resolutionType: conflict.resolutionType,
    resolvedSnapshot: conflict.resolvedSnapshot,
    manualFields,
    conflict,
  };
}

/** Stored result of a terminal conflict */
export function terminalResult(conflict: Conflict): ResolutionResult {
  return toResult(conflict, conflict.status === 'Ignored' ? 'already_ignored' : 'already_resolved');
}

export class ResolutionApplier {
  private readonly repository: ConflictRepository;
  private readonly entityStore: EntityStore;
  private readonly audit: AuditTrail;
  private readonly logger: Logger;
  private readonly config: ConflictEngineConfig;
  private readonly now: () => Date;

  constructor(deps: ResolutionApplierDeps) {
    this.repository = deps.repository;
    this.entityStore = deps.entityStore;
    this.audit = deps.audit;
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...deps.config };
    this.now = deps.now ?? (() => new Date());
    this.logger = deps.logger.child({ component: 'resolution-applier' });
  }

  /**
   * Write `record` to the canonical entity store and mark the conflict Resolved.
   *
   * Throws APPLY_FAILED when the entity store write fails; the conflict
   * stays Pending and can be retried.
   */
  async apply(conflict: Conflict, record: Snapshot, options: ApplyOptions): Promise<ResolutionResult> {
    const token = await this.acquire(conflict.id);
    if (typeof token !== 'string') {
      return token;
    }

    try {
      await this.entityStore.replaceEntity({
        entityType: conflict.entityType,
        entityId: conflict.entityId,
        record,
        conflictId: conflict.id,
      });
    } catch (err) {
      await this.repository.releaseClaim(conflict.id, token);
      const message = err instanceof Error ? err.message : String(err);

      this.logger.error(
        {
          conflictId: conflict.id,
          entityType: conflict.entityType,
          entityId: conflict.entityId,
          error: message,
        },
        'Failed to apply resolution'
      );

      throw new ConflictEngineError(
        'APPLY_FAILED',
        `Failed to write ${conflict.entityType}:${conflict.entityId}: ${message}`,
        { cause: err }
      );
    }

    const result = await this.commit(conflict.id, token, options.action, {
      status: 'Resolved',
      resolutionType: options.resolutionType,
      resolvedSnapshot: record,
      resolvedBy: options.resolvedBy,
      resolvedAt: this.now(),
      notes: options.notes,
    }, `Applied resolution: ${options.resolutionType}`);

    if (result.outcome === 'resolved') {
      this.logger.info(
        {
          conflictId: conflict.id,
          entityType: conflict.entityType,
          entityId: conflict.entityId,
          resolutionType: options.resolutionType,
          resolvedBy: options.resolvedBy,
        },
        'Conflict resolved'
      );
    }

    return result;
  }

  /**
   * Resolve with an operator-chosen type and, optionally, an explicit record.
   * Rule lookup is bypassed. A terminal conflict returns its stored result.
   */
  async manualResolve(
    request: ManualResolveRequest,
    action: 'ManuallyResolved' | 'BulkResolved' = 'ManuallyResolved'
  ): Promise<ResolutionResult> {
    const errors = validateManualResolveRequest(request);
    if (errors.length > 0) {
      throw new ConflictEngineError('INVALID_REQUEST', errors.join('; '));
    }

    const conflict = await this.repository.findById(request.conflictId);
    if (!conflict) {
      throw notFound(request.conflictId);
    }
    if (conflict.status !== 'Pending') {
      return terminalResult(conflict);
    }

    const record =
      request.resolvedSnapshot !== undefined && request.resolvedSnapshot !== null
        ? parseSnapshot(request.resolvedSnapshot, 'resolved')
        : computeUniformResolution(conflict, request.resolutionType).record;

    return this.apply(conflict, record, {
      resolutionType: request.resolutionType,
      action,
      resolvedBy: request.userId,
      notes: request.notes ?? null,
    });
  }

  /**
   * Mark a conflict Ignored. The canonical entity is never touched.
   */
  async ignore(conflictId: string, userId: string, notes?: string | null): Promise<ResolutionResult> {
    if (!userId) {
      throw new ConflictEngineError('INVALID_REQUEST', 'userId is required');
    }

    const token = await this.acquire(conflictId);
    if (typeof token !== 'string') {
      return token;
    }

    const result = await this.commit(conflictId, token, 'Ignored', {
      status: 'Ignored',
      resolutionType: null,
      resolvedSnapshot: null,
      resolvedBy: userId,
      resolvedAt: this.now(),
      notes: notes ?? null,
    }, notes ?? null);

    if (result.outcome === 'ignored') {
      this.logger.info({ conflictId, userId }, 'Conflict ignored');
    }
    return result;
  }

  /**
   * Claim the conflict, or wait for whoever holds it to finish.
   * Returns the claim token, or the stored result of a terminal conflict.
   */
  private async acquire(conflictId: string): Promise<string | ResolutionResult> {
    const maxPolls = Math.ceil(this.config.claimWaitMs / this.config.claimPollMs);

    for (let polls = 0; ; polls++) {
      const now = this.now();
      const token = crypto.randomUUID();
      const claimed = await this.repository.claim(
        conflictId,
        { token, expiresAt: new Date(now.getTime() + this.config.claimLeaseMs) },
        now
      );
      if (claimed) {
        return token;
      }

      const current = await this.repository.findById(conflictId);
      if (!current) {
        throw notFound(conflictId);
      }
      if (current.status !== 'Pending') {
        this.logger.debug({ conflictId, status: current.status }, 'Conflict already terminal');
        return terminalResult(current);
      }

      if (polls >= maxPolls) {
        throw new ConflictEngineError('BUSY', `Conflict ${conflictId} is being resolved by another writer`);
      }
      await sleep(this.config.claimPollMs);
    }
  }

  private async commit(
    conflictId: string,
    token: string,
    action: AuditAction,
    transition: ConflictTransition,
    details: string | null
  ): Promise<ResolutionResult> {
    const entry = this.audit.buildEntry({
      conflictId,
      action,
      oldStatus: 'Pending',
      newStatus: transition.status,
      userId: transition.resolvedBy,
      details,
    });

    const committed = await this.repository.commitTransition(conflictId, token, transition, entry);
    if (committed) {
      return toResult(committed, transition.status === 'Resolved' ? 'resolved' : 'ignored');
    }

    // Lease expired and another writer finished first
    this.logger.warn({ conflictId, action }, 'Claim lost before commit');
    const current = await this.repository.findById(conflictId);
    if (current && current.status !== 'Pending') {
      return terminalResult(current);
    }
    throw new ConflictEngineError('BUSY', `Conflict ${conflictId} changed hands before commit`);
  }
}
