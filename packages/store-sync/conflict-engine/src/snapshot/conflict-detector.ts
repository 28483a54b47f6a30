/**
 * Conflict detector for entity sync.
 *
 * Compares the local and remote snapshots handed over by a sync session.
 * Snapshots with no meaningful difference never become a conflict; any
 * other pair is persisted as a Pending conflict together with its
 * Detected audit entry.
 */

import * as crypto from 'node:crypto';
import type { Logger } from 'pino';
import type { Conflict, DetectConflictInput } from '../types.js';
import { ENTITY_TYPES, isEntityType } from '../types.js';
import type { ConflictRepository } from '../repository/conflict-repository.js';
import type { AuditTrail } from '../audit/audit-trail.js';
import { ConflictEngineError } from '../errors.js';
import { conflictingFields, parseSnapshot } from './snapshot-differ.js';

export class ConflictDetector {
  private readonly repository: ConflictRepository;
  private readonly audit: AuditTrail;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    repository: ConflictRepository,
    audit: AuditTrail,
    logger: Logger,
    now: () => Date = () => new Date()
  ) {
    this.repository = repository;
    this.audit = audit;
    this.now = now;
    this.logger = logger.child({ component: 'conflict-detector' });
  }

  /**
   * Check a snapshot pair and persist a conflict when they differ.
   *
   * @returns The new Pending conflict, or null if the snapshots agree
   */
  async detect(input: DetectConflictInput): Promise<Conflict | null> {
    if (!isEntityType(input.entityType)) {
      throw new ConflictEngineError(
        'DATA_ERROR',
        `Unknown entity type '${input.entityType}'; expected one of: ${ENTITY_TYPES.join(', ')}`
      );
    }
    if (!input.entityId) {
      throw new ConflictEngineError('DATA_ERROR', 'entityId is required');
    }
    for (const [side, ts] of [['local', input.localTimestamp], ['remote', input.remoteTimestamp]] as const) {
      if (!(ts instanceof Date) || isNaN(ts.getTime())) {
        throw new ConflictEngineError('DATA_ERROR', `Invalid ${side} timestamp`);
      }
    }

    const local = parseSnapshot(input.localSnapshot, 'local');
    const remote = parseSnapshot(input.remoteSnapshot, 'remote');
    const fields = conflictingFields(local, remote);

    this.logger.debug(
      {
        entityType: input.entityType,
        entityId: input.entityId,
        conflictingFields: fields,
      },
      'Conflict check'
    );

    if (fields.length === 0) {
      return null;
    }

    const conflict: Conflict = {
      id: this.generateId(),
      entityType: input.entityType,
      entityId: input.entityId,
      storeId: input.storeId ?? null,
      localSnapshot: local,
      remoteSnapshot: remote,
      localTimestamp: new Date(input.localTimestamp),
      remoteTimestamp: new Date(input.remoteTimestamp),
      conflictingFields: fields,
      status: 'Pending',
      resolutionType: null,
      resolvedSnapshot: null,
      resolvedBy: null,
      resolvedAt: null,
      notes: null,
      syncBatchId: input.syncBatchId ?? null,
      detectedAt: this.now(),
      claim: null,
    };

    const entry = this.audit.buildEntry({
      conflictId: conflict.id,
      action: 'Detected',
      oldStatus: null,
      newStatus: 'Pending',
      details: `Conflicting fields: ${fields.join(', ')}`,
    });

    await this.repository.insertWithAudit(conflict, entry);

    this.logger.info(
      {
        conflictId: conflict.id,
        entityType: conflict.entityType,
        entityId: conflict.entityId,
        storeId: conflict.storeId,
        syncBatchId: conflict.syncBatchId,
      },
      'Conflict detected'
    );

    return conflict;
  }

  private generateId(): string {
    return `conflict-${Date.now()}-${crypto.randomBytes(4).toString('hex')}`;
  }
}
