/**
 * Resolution rule table.
 *
 * Rules are keyed by (entity type, optional field). Lookup walks three
 * tiers in order and returns the first active match:
 *   1. rule for (entityType, propertyName)
 *   2. entity-wide rule for (entityType, null)
 *   3. the global default
 * Mutations are visible to the next lookup. Conflicts resolved earlier
 * keep the record they were resolved with.
 */

import type { Logger } from 'pino';
import type {
  ApplicableRule,
  EntityType,
  GlobalDefaultRule,
  ResolutionRule,
  ResolutionType,
} from '../types.js';
import { DEFAULT_RULES } from './default-rules.js';

export interface RuleStoreOptions {
  /** Policy returned when no rule matches (default: LastWriteWins) */
  defaultResolution?: ResolutionType;

  /** Initial table (default: DEFAULT_RULES) */
  rules?: readonly ResolutionRule[];
}

export class RuleStore {
  private readonly rules: Map<EntityType, Map<string | null, ResolutionRule>> = new Map();
  private readonly defaultResolution: ResolutionType;
  private readonly logger: Logger;

  constructor(logger: Logger, options: RuleStoreOptions = {}) {
    this.logger = logger.child({ component: 'rule-store' });
    this.defaultResolution = options.defaultResolution ?? 'LastWriteWins';
    this.load(options.rules ?? DEFAULT_RULES);
  }

  /**
   * Most specific active rule for a field; never fails.
   */
  getApplicableRule(entityType: EntityType, propertyName?: string | null): ApplicableRule {
    const entityRules = this.rules.get(entityType);

    if (entityRules) {
      if (propertyName) {
        const propertyRule = entityRules.get(propertyName);
        if (propertyRule?.isActive) {
          return { ...propertyRule };
        }
      }

      const entityRule = entityRules.get(null);
      if (entityRule?.isActive) {
        return { ...entityRule };
      }
    }

    return this.globalDefault(entityType);
  }

  /**
   * Fields whose applicable rule blocks automatic resolution.
   */
  requiresManualReview(entityType: EntityType, fields: readonly string[]): string[] {
    return fields.filter((field) => {
      const rule = this.getApplicableRule(entityType, field);
      return rule.resolution === 'Manual' || rule.requireManualReview;
    });
  }

  /** All rules ordered by priority, then entity type, then field */
  getAllRules(): ResolutionRule[] {
    const all: ResolutionRule[] = [];
    for (const entityRules of this.rules.values()) {
      for (const rule of entityRules.values()) {
        all.push({ ...rule });
      }
    }

    return all.sort(
      (a, b) =>
        a.priority - b.priority ||
        a.entityType.localeCompare(b.entityType) ||
        (a.propertyName ?? '').localeCompare(b.propertyName ?? '')
    );
  }

  /** Insert a rule, replacing any rule with the same key */
  addOrUpdateRule(rule: ResolutionRule): void {
    let entityRules = this.rules.get(rule.entityType);
    if (!entityRules) {
      entityRules = new Map();
      this.rules.set(rule.entityType, entityRules);
    }

    const replaced = entityRules.has(rule.propertyName);
    entityRules.set(rule.propertyName, { ...rule });

    this.logger.info(
      {
        entityType: rule.entityType,
        propertyName: rule.propertyName ?? '*',
        resolution: rule.resolution,
        replaced,
      },
      'Rule added/updated'
    );
  }

  /**
   * Remove the rule for an exact key.
   * Returns true if a rule was removed.
   */
  removeRule(entityType: EntityType, propertyName: string | null = null): boolean {
    const entityRules = this.rules.get(entityType);
    if (!entityRules?.delete(propertyName)) {
      return false;
    }
    if (entityRules.size === 0) {
      this.rules.delete(entityType);
    }

    this.logger.info({ entityType, propertyName: propertyName ?? '*' }, 'Rule removed');
    return true;
  }

  resetToDefaults(): void {
    this.load(DEFAULT_RULES);
    this.logger.info({ rules: DEFAULT_RULES.length }, 'Rules reset to defaults');
  }

  /** Replace the whole table (e.g. from persisted rules) */
  load(rules: readonly ResolutionRule[]): void {
    this.rules.clear();
    for (const rule of rules) {
      let entityRules = this.rules.get(rule.entityType);
      if (!entityRules) {
        entityRules = new Map();
        this.rules.set(rule.entityType, entityRules);
      }
      entityRules.set(rule.propertyName, { ...rule });
    }
  }

  private globalDefault(entityType: EntityType): GlobalDefaultRule {
    return {
      entityType,
      propertyName: null,
      resolution: this.defaultResolution,
      requireManualReview: false,
      priority: Number.MAX_SAFE_INTEGER,
      isActive: true,
      description: `Default: ${this.defaultResolution}`,
      isGlobalDefault: true,
    };
  }
}
