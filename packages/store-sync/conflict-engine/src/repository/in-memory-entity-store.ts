/**
 * In-memory canonical entity store.
 *
 * Keeps the latest record per (entityType, entityId) and the id of the
 * conflict that wrote it. A write carrying the conflict id already
 * recorded for that entity is a no-op.
 */

import type { EntityStore, EntityType, EntityWrite, Snapshot } from '../types.js';

interface StoredEntity {
  record: Snapshot;
  lastConflictId: string;
  updatedAt: Date;
}

export class InMemoryEntityStore implements EntityStore {
  private readonly entities: Map<string, StoredEntity> = new Map();

  async replaceEntity(write: EntityWrite): Promise<void> {
    const key = this.key(write.entityType, write.entityId);
    if (this.entities.get(key)?.lastConflictId === write.conflictId) {
      return;
    }
    this.entities.set(key, {
      record: structuredClone(write.record),
      lastConflictId: write.conflictId,
      updatedAt: new Date(),
    });
  }

  /** Current record of an entity, or null if never written */
  async getEntity(entityType: EntityType, entityId: string): Promise<Snapshot | null> {
    const stored = this.entities.get(this.key(entityType, entityId));
    return stored ? structuredClone(stored.record) : null;
  }

  get size(): number {
    return this.entities.size;
  }

  private key(entityType: EntityType, entityId: string): string {
    return `${entityType}:${entityId}`;
  }
}
