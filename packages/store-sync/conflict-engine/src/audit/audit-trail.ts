/**
 * Append-only audit trail of conflict state transitions.
 *
 * Entries are never updated or deleted. Transition entries are built here
 * and handed to the repository together with the transition they
 * describe, so the entry and the state change commit as one unit.
 */

import * as crypto from 'node:crypto';
import type { Logger } from 'pino';
import type { AuditAction, AuditEntry, ConflictStatus } from '../types.js';
import type { ConflictRepository } from '../repository/conflict-repository.js';

export interface AuditEntryParams {
  conflictId: string;
  action: AuditAction;
  oldStatus: ConflictStatus | null;
  newStatus: ConflictStatus;
  userId?: string | null;
  details?: string | null;
}

export class AuditTrail {
  private readonly repository: ConflictRepository;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(repository: ConflictRepository, logger: Logger, now: () => Date = () => new Date()) {
    this.repository = repository;
    this.logger = logger.child({ component: 'audit-trail' });
    this.now = now;
  }

  /**
   * Build an entry without storing it.
   * Used for entries that commit together with a transition.
   */
  buildEntry(params: AuditEntryParams): AuditEntry {
    return {
      id: `audit-${crypto.randomUUID()}`,
      conflictId: params.conflictId,
      action: params.action,
      oldStatus: params.oldStatus,
      newStatus: params.newStatus,
      userId: params.userId ?? null,
      timestamp: this.now(),
      details: params.details ?? null,
    };
  }

  /** Append one standalone entry */
  async log(params: AuditEntryParams): Promise<AuditEntry> {
    const entry = this.buildEntry(params);
    await this.repository.appendAudit(entry);

    this.logger.debug(
      {
        conflictId: entry.conflictId,
        action: entry.action,
        oldStatus: entry.oldStatus,
        newStatus: entry.newStatus,
      },
      'Audit entry appended'
    );

    return entry;
  }

  /** Entries for one conflict, oldest first */
  async getTrail(conflictId: string): Promise<AuditEntry[]> {
    return this.repository.getAudit(conflictId);
  }
}
