/**
 * In-memory conflict repository.
 *
 * Backs tests and single-process deployments without MongoDB. Every
 * method runs synchronously inside its promise, so each claim and commit
 * is atomic with respect to other callers on the same event loop.
 * Returned conflicts are copies; mutating them never changes the store.
 */

import type {
  AuditEntry,
  Conflict,
  ConflictClaim,
  ConflictFilter,
  ConflictQuery,
  ConflictTransition,
  StatusCounts,
} from '../types.js';
import type { ConflictRepository } from './conflict-repository.js';

function matchesFilter(conflict: Conflict, filter: ConflictFilter): boolean {
  if (filter.entityType && conflict.entityType !== filter.entityType) return false;
  if (filter.entityId && conflict.entityId !== filter.entityId) return false;
  if (filter.storeId && conflict.storeId !== filter.storeId) return false;
  if (filter.syncBatchId && conflict.syncBatchId !== filter.syncBatchId) return false;
  if (filter.from && conflict.detectedAt.getTime() < filter.from.getTime()) return false;
  if (filter.to && conflict.detectedAt.getTime() > filter.to.getTime()) return false;
  return true;
}

export class InMemoryConflictRepository implements ConflictRepository {
  private readonly conflicts: Map<string, Conflict> = new Map();
  private readonly audit: AuditEntry[] = [];

  /** Number of stored conflicts */
  get size(): number {
    return this.conflicts.size;
  }

  async insertWithAudit(conflict: Conflict, entry: AuditEntry): Promise<void> {
    if (this.conflicts.has(conflict.id)) {
      throw new Error(`Duplicate conflict id: ${conflict.id}`);
    }
    this.conflicts.set(conflict.id, structuredClone(conflict));
    this.audit.push(structuredClone(entry));
  }

  async findById(id: string): Promise<Conflict | null> {
    const conflict = this.conflicts.get(id);
    return conflict ? structuredClone(conflict) : null;
  }

  async find(query: ConflictQuery): Promise<{ conflicts: Conflict[]; total: number }> {
    let results = Array.from(this.conflicts.values()).filter((c) => matchesFilter(c, query));
    if (query.status) {
      results = results.filter((c) => c.status === query.status);
    }

    const sortBy = query.sortBy ?? 'detectedAt';
    const multiplier = (query.sortDirection ?? 'desc') === 'asc' ? 1 : -1;

    results.sort((a, b) => {
      switch (sortBy) {
        case 'detectedAt':
          return (a.detectedAt.getTime() - b.detectedAt.getTime()) * multiplier;
        case 'resolvedAt':
          return ((a.resolvedAt?.getTime() ?? 0) - (b.resolvedAt?.getTime() ?? 0)) * multiplier;
        case 'entityType':
          return a.entityType.localeCompare(b.entityType) * multiplier;
        default:
          return 0;
      }
    });

    const total = results.length;
    const offset = query.offset ?? 0;
    const limit = query.limit ?? results.length;

    return {
      conflicts: results.slice(offset, offset + limit).map((c) => structuredClone(c)),
      total,
    };
  }

  async countByStatus(filter: ConflictFilter = {}): Promise<StatusCounts> {
    const counts: StatusCounts = { Pending: 0, Resolved: 0, Ignored: 0 };
    for (const conflict of this.conflicts.values()) {
      if (matchesFilter(conflict, filter)) {
        counts[conflict.status]++;
      }
    }
    return counts;
  }

  async claim(id: string, claim: ConflictClaim, now: Date): Promise<Conflict | null> {
    const conflict = this.conflicts.get(id);
    if (!conflict || conflict.status !== 'Pending') {
      return null;
    }
    if (conflict.claim && conflict.claim.expiresAt.getTime() > now.getTime()) {
      return null;
    }

    conflict.claim = { token: claim.token, expiresAt: new Date(claim.expiresAt) };
    return structuredClone(conflict);
  }

  async releaseClaim(id: string, token: string): Promise<void> {
    const conflict = this.conflicts.get(id);
    if (conflict?.claim?.token === token) {
      conflict.claim = null;
    }
  }

  async commitTransition(
    id: string,
    token: string,
    transition: ConflictTransition,
    entry: AuditEntry
  ): Promise<Conflict | null> {
    const conflict = this.conflicts.get(id);
    if (!conflict || conflict.status !== 'Pending' || conflict.claim?.token !== token) {
      return null;
    }

    Object.assign(conflict, structuredClone(transition), { claim: null });
    this.audit.push(structuredClone(entry));
    return structuredClone(conflict);
  }

  async appendAudit(entry: AuditEntry): Promise<void> {
    this.audit.push(structuredClone(entry));
  }

  async getAudit(conflictId: string): Promise<AuditEntry[]> {
    return this.audit
      .filter((e) => e.conflictId === conflictId)
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime())
      .map((e) => structuredClone(e));
  }

  async purgeTerminal(olderThan: Date, describe: (conflict: Conflict) => AuditEntry): Promise<Conflict[]> {
    const purged = Array.from(this.conflicts.values()).filter(
      (c) => c.status !== 'Pending' && c.resolvedAt !== null && c.resolvedAt.getTime() < olderThan.getTime()
    );
    // Build every entry before touching the store
    const entries = purged.map((c) => describe(structuredClone(c)));

    for (const conflict of purged) {
      this.conflicts.delete(conflict.id);
    }
    this.audit.push(...entries.map((e) => structuredClone(e)));
    return purged;
  }

  /** Remove everything (for tests) */
  clear(): void {
    this.conflicts.clear();
    this.audit.length = 0;
  }
}
