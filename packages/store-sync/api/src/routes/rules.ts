/**
 * Resolution Rule Routes
 *
 * Operators read and edit the rule table. Every change carries the
 * operator's userId. With MongoDB configured the new table is written
 * through before the change is answered; a failed write restores the
 * previous table in memory.
 */

import type { FastifyBaseLogger, FastifyInstance, FastifyPluginCallback, FastifyReply } from 'fastify';
import { ENTITY_TYPES, isEntityType, validateRule, type ConflictEngine } from '@store-sync/conflict-engine';
import { getConflictEngine } from '../engine.js';
import { saveRules } from '../data/rule-persistence.js';
import { config } from '../config.js';
import { badRequest } from '../errors.js';

interface RuleParams {
  entityType: string;
}

interface ApplicableRuleQuery {
  propertyName?: string;
}

interface RemoveRuleQuery {
  propertyName?: string;
  userId?: string;
}

interface ResetRulesBody {
  userId?: string;
}

function readUserId(value: unknown): string | null {
  return typeof value === 'string' && value.trim().length > 0 ? value : null;
}

/**
 * Apply a change to the rule table and persist the result.
 * `change` reports whether the table changed; an unchanged table is not
 * written. Returns an error message when the save failed and the
 * previous table was restored.
 */
async function commitRuleChange(
  log: FastifyBaseLogger,
  change: (engine: ConflictEngine) => boolean
): Promise<string | null> {
  const engine = getConflictEngine();
  const previous = engine.getAllRules();
  if (!change(engine) || !config.mongodbUri) {
    return null;
  }

  try {
    await saveRules(engine.getAllRules());
    return null;
  } catch (err) {
    engine.loadRules(previous);
    log.error({ err }, 'Failed to save resolution rules; change rolled back');
    return `Failed to save resolution rules: ${err instanceof Error ? err.message : String(err)}`;
  }
}

function persistenceFailed(reply: FastifyReply, message: string): FastifyReply {
  return reply.status(503).send({ error: 'Service Unavailable', message });
}

export const ruleRoutes: FastifyPluginCallback = (
  fastify: FastifyInstance,
  _opts,
  done
): void => {
  // Full table, ordered by priority
  fastify.get('/rules', async (_request, reply) => {
    const rules = getConflictEngine().getAllRules();
    return reply.send({ count: rules.length, rules });
  });

  // Rule that would apply to a field
  fastify.get<{ Params: RuleParams; Querystring: ApplicableRuleQuery }>(
    '/rules/:entityType/applicable',
    async (request, reply) => {
      const { entityType } = request.params;
      if (!isEntityType(entityType)) {
        return badRequest(reply, `Invalid entityType. Must be one of: ${ENTITY_TYPES.join(', ')}`);
      }
      return reply.send(getConflictEngine().getApplicableRule(entityType, request.query.propertyName ?? null));
    }
  );

  // Add or replace the rule for (entityType, propertyName)
  fastify.put<{ Body: unknown }>('/rules', async (request, reply) => {
    const body: unknown = request.body;
    const userId = typeof body === 'object' && body !== null && 'userId' in body ? readUserId(body.userId) : null;
    if (!userId) {
      return badRequest(reply, 'userId is required');
    }

    const { rule, errors } = validateRule(body);
    if (!rule) {
      return badRequest(reply, errors.join('; '));
    }

    const failure = await commitRuleChange(request.log, (engine) => {
      engine.addOrUpdateRule(rule);
      return true;
    });
    if (failure) {
      return persistenceFailed(reply, failure);
    }

    request.log.info(
      { entityType: rule.entityType, propertyName: rule.propertyName, resolution: rule.resolution, userId },
      'Resolution rule saved'
    );
    return reply.send(rule);
  });

  // Remove the entity rule, or a property rule with ?propertyName=
  fastify.delete<{ Params: RuleParams; Querystring: RemoveRuleQuery }>(
    '/rules/:entityType',
    async (request, reply) => {
      const { entityType } = request.params;
      const propertyName = request.query.propertyName || null;
      const userId = readUserId(request.query.userId);

      if (!userId) {
        return badRequest(reply, 'userId is required');
      }
      if (!isEntityType(entityType)) {
        return badRequest(reply, `Invalid entityType. Must be one of: ${ENTITY_TYPES.join(', ')}`);
      }

      let removed = false;
      const failure = await commitRuleChange(request.log, (engine) => {
        removed = engine.removeRule(entityType, propertyName);
        return removed;
      });
      if (failure) {
        return persistenceFailed(reply, failure);
      }

      if (!removed) {
        return reply.status(404).send({
          error: 'Not Found',
          message: propertyName
            ? `No rule for ${entityType}.${propertyName}`
            : `No entity rule for ${entityType}`,
        });
      }

      request.log.info({ entityType, propertyName, userId }, 'Resolution rule removed');
      return reply.status(204).send();
    }
  );

  // Restore the default table
  fastify.post<{ Body: ResetRulesBody }>('/rules/reset', async (request, reply) => {
    const userId = readUserId(request.body?.userId);
    if (!userId) {
      return badRequest(reply, 'userId is required');
    }

    const failure = await commitRuleChange(request.log, (engine) => {
      engine.resetRulesToDefaults();
      return true;
    });
    if (failure) {
      return persistenceFailed(reply, failure);
    }

    request.log.info({ userId }, 'Resolution rules reset to defaults');
    const rules = getConflictEngine().getAllRules();
    return reply.send({ count: rules.length, rules });
  });

  done();
};
