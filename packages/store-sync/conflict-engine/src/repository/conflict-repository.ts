/**
 * Storage contract for conflicts and their audit entries.
 *
 * Conflicts are updated in place only through claim/commit; audit entries
 * are insert-only. Implementations must make `claim` and `commitTransition`
 * atomic per conflict id: they are the guards that keep a resolution from
 * being applied twice by concurrent sync sessions.
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

export interface ConflictRepository {
  /** Persist a new Pending conflict together with its Detected entry */
  insertWithAudit(conflict: Conflict, entry: AuditEntry): Promise<void>;

  findById(id: string): Promise<Conflict | null>;

  /** Filtered, sorted and paginated listing plus the unpaginated total */
  find(query: ConflictQuery): Promise<{ conflicts: Conflict[]; total: number }>;

  countByStatus(filter?: ConflictFilter): Promise<StatusCounts>;

  /**
   * Take the lease on a Pending conflict.
   * Succeeds only if no live claim exists at `now`. Returns the claimed
   * conflict, or null when the conflict is terminal, missing or held.
   */
  claim(id: string, claim: ConflictClaim, now: Date): Promise<Conflict | null>;

  /** Drop a lease without transitioning; no-op if the token no longer holds it */
  releaseClaim(id: string, token: string): Promise<void>;

  /**
   * Apply a terminal transition and append its audit entry atomically.
   * Succeeds only while the conflict is Pending and `token` holds the claim.
   * Returns the updated conflict, or null when the guard fails.
   */
  commitTransition(
    id: string,
    token: string,
    transition: ConflictTransition,
    entry: AuditEntry
  ): Promise<Conflict | null>;

  appendAudit(entry: AuditEntry): Promise<void>;

  /** Entries for one conflict in chronological order */
  getAudit(conflictId: string): Promise<AuditEntry[]>;

  /**
   * Physically delete terminal conflicts with resolvedAt strictly before
   * `olderThan` and append the entry `describe` builds for each, as one
   * unit: either every conflict is gone and audited, or nothing changes.
   * Returns the deleted conflicts.
   */
  purgeTerminal(olderThan: Date, describe: (conflict: Conflict) => AuditEntry): Promise<Conflict[]>;
}
