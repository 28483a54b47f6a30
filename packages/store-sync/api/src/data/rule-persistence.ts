/**
 * Resolution rule persistence.
 *
 * The rule table is small and read on every resolution, so the engine
 * keeps it in memory. MongoDB holds the durable copy: it is loaded at
 * startup (seeded with the defaults when empty) and rewritten as a whole
 * after each change.
 */

import type { Collection, Db } from 'mongodb';
import type { Logger } from 'pino';
import { DEFAULT_RULES, validateRule, type ResolutionRule } from '@store-sync/conflict-engine';
import { getDb, getMongoClient } from '../db/mongo.js';

const COLLECTION = 'resolution_rules';

function getCollection(db?: Db): Collection<ResolutionRule> {
  return (db ?? getDb()).collection<ResolutionRule>(COLLECTION);
}

/**
 * Load the stored rule table. Seeds the defaults on first start.
 * Documents that no longer validate are skipped.
 */
export async function loadRules(logger: Logger): Promise<ResolutionRule[]> {
  const col = getCollection();
  const docs = await col.find({}, { projection: { _id: 0 } }).toArray();

  if (docs.length === 0) {
    await saveRules(DEFAULT_RULES);
    logger.info({ count: DEFAULT_RULES.length }, 'Seeded default resolution rules');
    return DEFAULT_RULES.map((rule) => ({ ...rule }));
  }

  const rules: ResolutionRule[] = [];
  for (const doc of docs) {
    const { rule, errors } = validateRule(doc);
    if (rule) {
      rules.push(rule);
    } else {
      logger.warn({ errors, entityType: doc.entityType, propertyName: doc.propertyName }, 'Skipping invalid stored rule');
    }
  }
  return rules;
}

/**
 * Replace the stored table with `rules`.
 */
export async function saveRules(rules: readonly ResolutionRule[]): Promise<void> {
  const col = getCollection();
  const session = getMongoClient().startSession();
  try {
    await session.withTransaction(async () => {
      await col.deleteMany({}, { session });
      if (rules.length > 0) {
        await col.insertMany(rules.map((rule) => ({ ...rule })), { session });
      }
    });
  } finally {
    await session.endSession();
  }
}

export async function ensureRuleIndexes(db?: Db): Promise<void> {
  await getCollection(db).createIndex({ entityType: 1, propertyName: 1 }, { unique: true });
}
