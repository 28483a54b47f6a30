/**
 * MongoDB conflict repository.
 *
 * Conflicts live in `conflicts`, audit entries in `conflict_audit`.
 * Snapshots are stored as canonical JSON text so arbitrary field names
 * survive the round trip. Claims and commits are single findOneAndUpdate
 * calls guarded on status and claim token; every write that pairs a
 * conflict change with an audit entry runs in a transaction.
 */

import type {
  ClientSession,
  Collection,
  Db,
  Filter,
  FilterOperators,
  MongoClient,
  Sort,
} from 'mongodb';
import {
  canonicalize,
  parseSnapshot,
  type AuditEntry,
  type Conflict,
  type ConflictClaim,
  type ConflictFilter,
  type ConflictQuery,
  type ConflictRepository,
  type ConflictStatus,
  type ConflictTransition,
  type EntityType,
  type ResolutionType,
  type StatusCounts,
} from '@store-sync/conflict-engine';

const CONFLICTS_COLLECTION = 'conflicts';
const AUDIT_COLLECTION = 'conflict_audit';

export interface ConflictDocument {
  id: string;
  entityType: EntityType;
  entityId: string;
  storeId: string | null;
  localSnapshot: string;
  remoteSnapshot: string;
  localTimestamp: Date;
  remoteTimestamp: Date;
  conflictingFields: string[];
  status: ConflictStatus;
  resolutionType: ResolutionType | null;
  resolvedSnapshot: string | null;
  resolvedBy: string | null;
  resolvedAt: Date | null;
  notes: string | null;
  syncBatchId: string | null;
  detectedAt: Date;
  claim: ConflictClaim | null;
}

export function toDocument(conflict: Conflict): ConflictDocument {
  return {
    ...conflict,
    localSnapshot: canonicalize(conflict.localSnapshot),
    remoteSnapshot: canonicalize(conflict.remoteSnapshot),
    resolvedSnapshot: conflict.resolvedSnapshot ? canonicalize(conflict.resolvedSnapshot) : null,
  };
}

export function fromDocument(doc: ConflictDocument): Conflict {
  return {
    id: doc.id,
    entityType: doc.entityType,
    entityId: doc.entityId,
    storeId: doc.storeId,
    localSnapshot: parseSnapshot(doc.localSnapshot, 'local'),
    remoteSnapshot: parseSnapshot(doc.remoteSnapshot, 'remote'),
    localTimestamp: doc.localTimestamp,
    remoteTimestamp: doc.remoteTimestamp,
    conflictingFields: doc.conflictingFields,
    status: doc.status,
    resolutionType: doc.resolutionType,
    resolvedSnapshot: doc.resolvedSnapshot === null ? null : parseSnapshot(doc.resolvedSnapshot, 'resolved'),
    resolvedBy: doc.resolvedBy,
    resolvedAt: doc.resolvedAt,
    notes: doc.notes,
    syncBatchId: doc.syncBatchId,
    detectedAt: doc.detectedAt,
    claim: doc.claim,
  };
}

export function buildConflictFilter(query: ConflictQuery): Filter<ConflictDocument> {
  const filter: Filter<ConflictDocument> = {};

  if (query.status) filter.status = query.status;
  if (query.entityType) filter.entityType = query.entityType;
  if (query.entityId) filter.entityId = query.entityId;
  if (query.storeId) filter.storeId = query.storeId;
  if (query.syncBatchId) filter.syncBatchId = query.syncBatchId;

  if (query.from || query.to) {
    const range: FilterOperators<Date> = {};
    if (query.from) range.$gte = query.from;
    if (query.to) range.$lte = query.to;
    filter.detectedAt = range;
  }

  return filter;
}

export class MongoConflictRepository implements ConflictRepository {
  private readonly client: MongoClient;
  private readonly conflicts: Collection<ConflictDocument>;
  private readonly audit: Collection<AuditEntry>;

  constructor(client: MongoClient, db: Db) {
    this.client = client;
    this.conflicts = db.collection<ConflictDocument>(CONFLICTS_COLLECTION);
    this.audit = db.collection<AuditEntry>(AUDIT_COLLECTION);
  }

  async ensureIndexes(): Promise<void> {
    await this.conflicts.createIndex({ id: 1 }, { unique: true });
    await this.conflicts.createIndex({ status: 1, detectedAt: -1 });
    await this.conflicts.createIndex({ storeId: 1, status: 1 });
    await this.conflicts.createIndex({ entityType: 1, entityId: 1 });
    await this.conflicts.createIndex({ status: 1, resolvedAt: 1 });
    await this.audit.createIndex({ conflictId: 1, timestamp: 1 });
  }

  async insertWithAudit(conflict: Conflict, entry: AuditEntry): Promise<void> {
    await this.inTransaction(async (session) => {
      await this.conflicts.insertOne(toDocument(conflict), { session });
      await this.audit.insertOne({ ...entry }, { session });
    });
  }

  async findById(id: string): Promise<Conflict | null> {
    const doc = await this.conflicts.findOne({ id }, { projection: { _id: 0 } });
    return doc ? fromDocument(doc) : null;
  }

  async find(query: ConflictQuery): Promise<{ conflicts: Conflict[]; total: number }> {
    const filter = buildConflictFilter(query);
    const sort: Sort = {
      [query.sortBy ?? 'detectedAt']: query.sortDirection === 'asc' ? 1 : -1,
      id: 1,
    };

    let cursor = this.conflicts
      .find(filter, { projection: { _id: 0 } })
      .sort(sort)
      .skip(query.offset ?? 0);
    if (query.limit !== undefined) {
      cursor = cursor.limit(query.limit);
    }

    const [docs, total] = await Promise.all([cursor.toArray(), this.conflicts.countDocuments(filter)]);
    return { conflicts: docs.map(fromDocument), total };
  }

  async countByStatus(filter: ConflictFilter = {}): Promise<StatusCounts> {
    const match = buildConflictFilter(filter);
    const rows = await this.conflicts
      .aggregate<{ _id: ConflictStatus; count: number }>([
        { $match: match },
        { $group: { _id: '$status', count: { $sum: 1 } } },
      ])
      .toArray();

    const counts: StatusCounts = { Pending: 0, Resolved: 0, Ignored: 0 };
    for (const row of rows) {
      counts[row._id] = row.count;
    }
    return counts;
  }

  async claim(id: string, claim: ConflictClaim, now: Date): Promise<Conflict | null> {
    const doc = await this.conflicts.findOneAndUpdate(
      {
        id,
        status: 'Pending',
        $or: [{ claim: null }, { 'claim.expiresAt': { $lte: now } }],
      },
      { $set: { claim } },
      { returnDocument: 'after', projection: { _id: 0 } }
    );
    return doc ? fromDocument(doc) : null;
  }

  async releaseClaim(id: string, token: string): Promise<void> {
    await this.conflicts.updateOne({ id, 'claim.token': token }, { $set: { claim: null } });
  }

  async commitTransition(
    id: string,
    token: string,
    transition: ConflictTransition,
    entry: AuditEntry
  ): Promise<Conflict | null> {
    return this.inTransaction(async (session) => {
      const doc = await this.conflicts.findOneAndUpdate(
        { id, status: 'Pending', 'claim.token': token },
        {
          $set: {
            ...transition,
            resolvedSnapshot: transition.resolvedSnapshot ? canonicalize(transition.resolvedSnapshot) : null,
            claim: null,
          },
        },
        { session, returnDocument: 'after', projection: { _id: 0 } }
      );
      if (!doc) {
        return null;
      }
      await this.audit.insertOne({ ...entry }, { session });
      return fromDocument(doc);
    });
  }

  async appendAudit(entry: AuditEntry): Promise<void> {
    await this.audit.insertOne({ ...entry });
  }

  async getAudit(conflictId: string): Promise<AuditEntry[]> {
    return this.audit
      .find({ conflictId }, { projection: { _id: 0 } })
      .sort({ timestamp: 1, _id: 1 })
      .toArray();
  }

  async purgeTerminal(olderThan: Date, describe: (conflict: Conflict) => AuditEntry): Promise<Conflict[]> {
    return this.inTransaction(async (session) => {
      const docs = await this.conflicts
        .find(
          { status: { $ne: 'Pending' }, resolvedAt: { $lt: olderThan } },
          { session, projection: { _id: 0 } }
        )
        .toArray();
      if (docs.length === 0) {
        return [];
      }
      const purged = docs.map(fromDocument);
      await this.conflicts.deleteMany({ id: { $in: purged.map((c) => c.id) } }, { session });
      await this.audit.insertMany(
        purged.map((c) => ({ ...describe(c) })),
        { session }
      );
      return purged;
    });
  }

  private async inTransaction<T>(work: (session: ClientSession) => Promise<T>): Promise<T> {
    const session = this.client.startSession();
    const box: { result?: { value: T } } = {};
    try {
      await session.withTransaction(async () => {
        box.result = { value: await work(session) };
      });
    } finally {
      await session.endSession();
    }
    if (!box.result) {
      throw new Error('Transaction completed without a result');
    }
    return box.result.value;
  }
}
