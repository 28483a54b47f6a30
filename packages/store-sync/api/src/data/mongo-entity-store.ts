/**
 * Canonical entity store backed by the `entities` collection.
 *
 * One document per (entityType, entityId). Each write records the conflict
 * that produced it; replaying a write for the same conflict leaves the
 * document untouched.
 */

import type { Collection, Db } from 'mongodb';
import type { EntityStore, EntityType, EntityWrite, Snapshot } from '@store-sync/conflict-engine';

const COLLECTION = 'entities';

export interface EntityDocument {
  entityType: EntityType;
  entityId: string;
  record: Snapshot;
  lastConflictId: string;
  updatedAt: Date;
}

export class MongoEntityStore implements EntityStore {
  private readonly entities: Collection<EntityDocument>;

  constructor(db: Db) {
    this.entities = db.collection<EntityDocument>(COLLECTION);
  }

  async ensureIndexes(): Promise<void> {
    await this.entities.createIndex({ entityType: 1, entityId: 1 }, { unique: true });
  }

  async replaceEntity(write: EntityWrite): Promise<void> {
    const existing = await this.entities.findOne(
      { entityType: write.entityType, entityId: write.entityId },
      { projection: { lastConflictId: 1 } }
    );
    if (existing?.lastConflictId === write.conflictId) {
      return;
    }

    await this.entities.replaceOne(
      { entityType: write.entityType, entityId: write.entityId },
      {
        entityType: write.entityType,
        entityId: write.entityId,
        record: write.record,
        lastConflictId: write.conflictId,
        updatedAt: new Date(),
      },
      { upsert: true }
    );
  }
}
