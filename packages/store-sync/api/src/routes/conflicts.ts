/**
 * Conflict Routes
 *
 * Detection for the sync transport, plus listing, inspection and
 * resolution for operators.
 */

import type { FastifyInstance, FastifyPluginCallback } from 'fastify';
import {
  CONFLICT_STATUSES,
  ENTITY_TYPES,
  RESOLUTION_TYPES,
  isEntityType,
  isResolutionType,
  type AuditEntry,
  type Conflict,
  type ConflictQuery,
  type ConflictStatus,
  type ResolutionResult,
  type ResolutionType,
  type SnapshotInput,
} from '@store-sync/conflict-engine';
import { getConflictEngine } from '../engine.js';
import { badRequest, engineErrorBody, sendEngineError } from '../errors.js';

/** Upper bound for one page of conflicts */
const MAX_PAGE_SIZE = 500;

const SORT_FIELDS: readonly NonNullable<ConflictQuery['sortBy']>[] = ['detectedAt', 'resolvedAt', 'entityType'];

interface ConflictParams {
  id: string;
}

interface StoreQuery {
  storeId?: string;
}

interface ListConflictsQuery {
  status?: string;
  entityType?: string;
  entityId?: string;
  storeId?: string;
  syncBatchId?: string;
  from?: string;
  to?: string;
  sortBy?: string;
  sortDirection?: string;
  offset?: string;
  limit?: string;
}

interface DetectBody {
  entityType?: string;
  entityId?: string;
  localSnapshot?: SnapshotInput;
  remoteSnapshot?: SnapshotInput;
  localTimestamp?: string;
  remoteTimestamp?: string;
  syncBatchId?: string | null;
  storeId?: string | null;
  // Run the rule table right after detection
  autoResolve?: boolean;
}

interface ManualResolveBody {
  resolutionType?: string;
  resolvedSnapshot?: SnapshotInput | null;
  userId?: string;
  notes?: string | null;
}

interface IgnoreBody {
  userId?: string;
  notes?: string | null;
}

interface BulkResolveBody {
  conflictIds?: string[];
  resolutionType?: string;
  userId?: string;
  notes?: string | null;
}

interface PurgeBody {
  olderThan?: string;
}

interface ConflictResponse {
  id: string;
  entityType: string;
  entityId: string;
  storeId: string | null;
  localSnapshot: Conflict['localSnapshot'];
  remoteSnapshot: Conflict['remoteSnapshot'];
  localTimestamp: string;
  remoteTimestamp: string;
  conflictingFields: string[];
  status: ConflictStatus;
  resolutionType: ResolutionType | null;
  resolvedSnapshot: Conflict['resolvedSnapshot'];
  resolvedBy: string | null;
  resolvedAt: string | null;
  notes: string | null;
  syncBatchId: string | null;
  detectedAt: string;
}

interface AuditEntryResponse {
  id: string;
  action: string;
  oldStatus: ConflictStatus | null;
  newStatus: ConflictStatus;
  userId: string | null;
  timestamp: string;
  details: string | null;
}

export function conflictToResponse(conflict: Conflict): ConflictResponse {
  return {
    id: conflict.id,
    entityType: conflict.entityType,
    entityId: conflict.entityId,
    storeId: conflict.storeId,
    localSnapshot: conflict.localSnapshot,
    remoteSnapshot: conflict.remoteSnapshot,
    localTimestamp: conflict.localTimestamp.toISOString(),
    remoteTimestamp: conflict.remoteTimestamp.toISOString(),
    conflictingFields: conflict.conflictingFields,
    status: conflict.status,
    resolutionType: conflict.resolutionType,
    resolvedSnapshot: conflict.resolvedSnapshot,
    resolvedBy: conflict.resolvedBy,
    resolvedAt: conflict.resolvedAt?.toISOString() ?? null,
    notes: conflict.notes,
    syncBatchId: conflict.syncBatchId,
    detectedAt: conflict.detectedAt.toISOString(),
  };
}

function resultToResponse(result: ResolutionResult): Record<string, unknown> {
  return {
    conflictId: result.conflictId,
    outcome: result.outcome,
    status: result.status,
    resolutionType: result.resolutionType,
    resolvedSnapshot: result.resolvedSnapshot,
    manualFields: result.manualFields,
    conflict: conflictToResponse(result.conflict),
  };
}

function auditToResponse(entry: AuditEntry): AuditEntryResponse {
  return {
    id: entry.id,
    action: entry.action,
    oldStatus: entry.oldStatus,
    newStatus: entry.newStatus,
    userId: entry.userId,
    timestamp: entry.timestamp.toISOString(),
    details: entry.details,
  };
}

function parseDate(value: unknown): Date | null {
  if (typeof value !== 'string' || value.length === 0) {
    return null;
  }
  const date = new Date(value);
  return isNaN(date.getTime()) ? null : date;
}

function parseNonNegativeInt(value: string): number | null {
  if (!/^\d+$/.test(value)) {
    return null;
  }
  return parseInt(value, 10);
}

function isConflictStatus(value: string): value is ConflictStatus {
  return (CONFLICT_STATUSES as readonly string[]).includes(value);
}

function isSortField(value: string): value is NonNullable<ConflictQuery['sortBy']> {
  return (SORT_FIELDS as readonly string[]).includes(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Turn listing query parameters into a ConflictQuery.
 * Returns an error message for the first invalid parameter.
 */
export function parseListQuery(raw: ListConflictsQuery): { query: ConflictQuery } | { error: string } {
  const query: ConflictQuery = {};

  if (raw.status !== undefined) {
    if (!isConflictStatus(raw.status)) {
      return { error: `Invalid status. Must be one of: ${CONFLICT_STATUSES.join(', ')}` };
    }
    query.status = raw.status;
  }

  if (raw.entityType !== undefined) {
    if (!isEntityType(raw.entityType)) {
      return { error: `Invalid entityType. Must be one of: ${ENTITY_TYPES.join(', ')}` };
    }
    query.entityType = raw.entityType;
  }

  if (raw.entityId) query.entityId = raw.entityId;
  if (raw.storeId) query.storeId = raw.storeId;
  if (raw.syncBatchId) query.syncBatchId = raw.syncBatchId;

  for (const key of ['from', 'to'] as const) {
    const value = raw[key];
    if (value !== undefined) {
      const date = parseDate(value);
      if (!date) {
        return { error: `${key} must be an ISO 8601 timestamp` };
      }
      query[key] = date;
    }
  }

  if (raw.sortBy !== undefined) {
    if (!isSortField(raw.sortBy)) {
      return { error: `Invalid sortBy. Must be one of: ${SORT_FIELDS.join(', ')}` };
    }
    query.sortBy = raw.sortBy;
  }

  if (raw.sortDirection !== undefined) {
    if (raw.sortDirection !== 'asc' && raw.sortDirection !== 'desc') {
      return { error: 'Invalid sortDirection. Must be asc or desc' };
    }
    query.sortDirection = raw.sortDirection;
  }

  if (raw.offset !== undefined) {
    const offset = parseNonNegativeInt(raw.offset);
    if (offset === null) {
      return { error: 'offset must be a non-negative integer' };
    }
    query.offset = offset;
  }

  if (raw.limit !== undefined) {
    const limit = parseNonNegativeInt(raw.limit);
    if (limit === null || limit < 1 || limit > MAX_PAGE_SIZE) {
      return { error: `limit must be between 1 and ${MAX_PAGE_SIZE}` };
    }
    query.limit = limit;
  }

  return { query };
}

export const conflictRoutes: FastifyPluginCallback = (
  fastify: FastifyInstance,
  _opts,
  done
): void => {
  // Sync transport hands over a local/remote snapshot pair
  fastify.post<{ Body: DetectBody }>('/conflicts/detect', async (request, reply) => {
    const body: DetectBody = request.body ?? {};

    if (!isNonEmptyString(body.entityType)) {
      return badRequest(reply, 'entityType is required');
    }
    if (!isNonEmptyString(body.entityId)) {
      return badRequest(reply, 'entityId is required');
    }
    if (body.localSnapshot === undefined || body.remoteSnapshot === undefined) {
      return badRequest(reply, 'localSnapshot and remoteSnapshot are required');
    }

    const localTimestamp = parseDate(body.localTimestamp);
    const remoteTimestamp = parseDate(body.remoteTimestamp);
    if (!localTimestamp || !remoteTimestamp) {
      return badRequest(reply, 'localTimestamp and remoteTimestamp must be ISO 8601 timestamps');
    }

    const engine = getConflictEngine();
    try {
      const conflict = await engine.detect({
        entityType: body.entityType,
        entityId: body.entityId,
        localSnapshot: body.localSnapshot,
        remoteSnapshot: body.remoteSnapshot,
        localTimestamp,
        remoteTimestamp,
        syncBatchId: body.syncBatchId ?? null,
        storeId: body.storeId ?? null,
      });

      if (!conflict) {
        return reply.send({ detected: false });
      }

      if (body.autoResolve === true) {
        // The conflict is stored either way; a failed resolve stays Pending
        // and is reported beside it.
        try {
          const resolution = await engine.resolve(conflict);
          return reply.status(201).send({ detected: true, resolution: resultToResponse(resolution) });
        } catch (resolveErr) {
          const { error, message } = engineErrorBody(resolveErr);
          request.log.warn({ conflictId: conflict.id, error, message }, 'Auto-resolve after detection failed');
          return reply.status(201).send({
            detected: true,
            conflict: conflictToResponse(conflict),
            resolution: { error, message },
          });
        }
      }

      return reply.status(201).send({ detected: true, conflict: conflictToResponse(conflict) });
    } catch (err) {
      return sendEngineError(reply, err);
    }
  });

  // List conflicts with filters and pagination
  fastify.get<{ Querystring: ListConflictsQuery }>('/conflicts', async (request, reply) => {
    const parsed = parseListQuery(request.query);
    if ('error' in parsed) {
      return badRequest(reply, parsed.error);
    }

    const response = await getConflictEngine().queryConflicts(parsed.query);
    return reply.send({
      conflicts: response.conflicts.map(conflictToResponse),
      total: response.total,
      pending: response.pending,
      resolved: response.resolved,
      ignored: response.ignored,
    });
  });

  // Dashboard summary
  fastify.get<{ Querystring: StoreQuery }>('/conflicts/summary', async (request, reply) => {
    const summary = await getConflictEngine().getSummary(request.query.storeId || undefined);
    return reply.send({
      total: summary.total,
      pending: summary.pending,
      autoResolved: summary.autoResolved,
      manuallyResolved: summary.manuallyResolved,
      ignored: summary.ignored,
      byEntityType: summary.byEntityType,
      recent: summary.recent.map(conflictToResponse),
      generatedAt: summary.generatedAt.toISOString(),
    });
  });

  // Counts per status
  fastify.get<{ Querystring: StoreQuery }>('/conflicts/counts', async (request, reply) => {
    const counts = await getConflictEngine().countByStatus(request.query.storeId || undefined);
    return reply.send(counts);
  });

  // Resolve every Pending conflict the rules can handle
  fastify.post('/conflicts/auto-resolve', async (_request, reply) => {
    const resolved = await getConflictEngine().autoResolveAll();
    return reply.send({ resolved });
  });

  // Apply one resolution type to many conflicts
  fastify.post<{ Body: BulkResolveBody }>('/conflicts/bulk-resolve', async (request, reply) => {
    const body: BulkResolveBody = request.body ?? {};

    if (!Array.isArray(body.conflictIds) || !body.conflictIds.every(isNonEmptyString)) {
      return badRequest(reply, 'conflictIds must be an array of conflict ids');
    }
    if (!isResolutionType(body.resolutionType)) {
      return badRequest(reply, `Invalid resolutionType. Must be one of: ${RESOLUTION_TYPES.join(', ')}`);
    }
    if (!isNonEmptyString(body.userId)) {
      return badRequest(reply, 'userId is required');
    }

    try {
      const resolved = await getConflictEngine().bulkResolve(
        body.conflictIds,
        body.resolutionType,
        body.userId,
        body.notes ?? null
      );
      return reply.send({ requested: body.conflictIds.length, resolved });
    } catch (err) {
      return sendEngineError(reply, err);
    }
  });

  // Delete terminal conflicts older than a threshold (default: retention)
  fastify.post<{ Body: PurgeBody }>('/conflicts/purge', async (request, reply) => {
    const body: PurgeBody = request.body ?? {};

    let olderThan: Date | undefined;
    if (body.olderThan !== undefined) {
      const parsed = parseDate(body.olderThan);
      if (!parsed) {
        return badRequest(reply, 'olderThan must be an ISO 8601 timestamp');
      }
      olderThan = parsed;
    }

    const purged = await getConflictEngine().purgeResolved(olderThan);
    return reply.send({ purged });
  });

  // Get a specific conflict
  fastify.get<{ Params: ConflictParams }>('/conflicts/:id', async (request, reply) => {
    try {
      const conflict = await getConflictEngine().getConflictById(request.params.id);
      return reply.send(conflictToResponse(conflict));
    } catch (err) {
      return sendEngineError(reply, err);
    }
  });

  // Audit trail of a conflict
  fastify.get<{ Params: ConflictParams }>('/conflicts/:id/audit', async (request, reply) => {
    const { id } = request.params;
    const entries = await getConflictEngine().getAuditTrail(id);
    return reply.send({ conflictId: id, entries: entries.map(auditToResponse) });
  });

  // Resolve through the rule table
  fastify.post<{ Params: ConflictParams }>('/conflicts/:id/resolve', async (request, reply) => {
    try {
      const result = await getConflictEngine().resolveById(request.params.id);
      return reply.send(resultToResponse(result));
    } catch (err) {
      return sendEngineError(reply, err);
    }
  });

  // Operator-chosen resolution
  fastify.post<{ Params: ConflictParams; Body: ManualResolveBody }>(
    '/conflicts/:id/manual-resolve',
    async (request, reply) => {
      const body: ManualResolveBody = request.body ?? {};

      if (!isResolutionType(body.resolutionType)) {
        return badRequest(reply, `Invalid resolutionType. Must be one of: ${RESOLUTION_TYPES.join(', ')}`);
      }

      try {
        const result = await getConflictEngine().manualResolve({
          conflictId: request.params.id,
          resolutionType: body.resolutionType,
          resolvedSnapshot: body.resolvedSnapshot ?? null,
          userId: body.userId ?? '',
          notes: body.notes ?? null,
        });
        return reply.send(resultToResponse(result));
      } catch (err) {
        return sendEngineError(reply, err);
      }
    }
  );

  // Close without applying anything
  fastify.post<{ Params: ConflictParams; Body: IgnoreBody }>('/conflicts/:id/ignore', async (request, reply) => {
    const body: IgnoreBody = request.body ?? {};

    if (!isNonEmptyString(body.userId)) {
      return badRequest(reply, 'userId is required');
    }

    try {
      const result = await getConflictEngine().ignore(request.params.id, body.userId, body.notes ?? null);
      return reply.send(resultToResponse(result));
    } catch (err) {
      return sendEngineError(reply, err);
    }
  });

  done();
};
