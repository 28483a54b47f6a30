/**
 * Conflict resolver.
 *
 * Looks up the applicable rule for each conflicting field, composes the
 * resolved record and hands it to the applier. Conflicts with a field
 * that needs an operator are left Pending.
 */

import type { Logger } from 'pino';
import type { Conflict, ResolutionResult } from '../types.js';
import type { ConflictRepository } from '../repository/conflict-repository.js';
import type { RuleStore } from '../rules/rule-store.js';
import type { ResolutionApplier } from '../applier/resolution-applier.js';
import { terminalResult, toResult } from '../applier/resolution-applier.js';
import { notFound } from '../errors.js';
import { computeResolution } from './resolution-policy.js';

export class ConflictResolver {
  private readonly repository: ConflictRepository;
  private readonly rules: RuleStore;
  private readonly applier: ResolutionApplier;
  private readonly logger: Logger;

  constructor(
    repository: ConflictRepository,
    rules: RuleStore,
    applier: ResolutionApplier,
    logger: Logger
  ) {
    this.repository = repository;
    this.rules = rules;
    this.applier = applier;
    this.logger = logger.child({ component: 'conflict-resolver' });
  }

  /**
   * Resolve a conflict through the rule table.
   *
   * The stored copy decides: a conflict that is already terminal returns
   * its stored result without touching the entity store, whatever state
   * the passed object is in.
   */
  async resolve(conflict: Conflict): Promise<ResolutionResult> {
    return this.resolveById(conflict.id);
  }

  async resolveById(conflictId: string): Promise<ResolutionResult> {
    const conflict = await this.repository.findById(conflictId);
    if (!conflict) {
      throw notFound(conflictId);
    }
    return this.resolveStored(conflict);
  }

  private async resolveStored(conflict: Conflict): Promise<ResolutionResult> {
    if (conflict.status !== 'Pending') {
      return terminalResult(conflict);
    }

    const manualFields = this.rules.requiresManualReview(conflict.entityType, conflict.conflictingFields);
    if (manualFields.length > 0) {
      this.logger.info(
        {
          conflictId: conflict.id,
          entityType: conflict.entityType,
          manualFields,
        },
        'Conflict requires manual resolution'
      );
      return toResult(conflict, 'manual_required', manualFields);
    }

    const computed = computeResolution(
      conflict,
      (field) => this.rules.getApplicableRule(conflict.entityType, field).resolution
    );

    this.logger.debug(
      {
        conflictId: conflict.id,
        fieldPolicies: computed.fieldPolicies,
        resolutionType: computed.resolutionType,
      },
      'Resolution computed'
    );

    const summary = Object.entries(computed.fieldPolicies)
      .map(([field, policy]) => `${field}=${policy}`)
      .join(', ');

    return this.applier.apply(conflict, computed.record, {
      resolutionType: computed.resolutionType,
      action: 'AutoResolved',
      resolvedBy: null,
      notes: `Auto-resolved by rules: ${summary}`,
    });
  }
}
