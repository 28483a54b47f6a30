import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../app.js';
import { initConflictEngine, resetConflictEngine } from '../engine.js';
import { resetHealthChecks } from '../observability/index.js';
import { createConflict, del, detectPayload, get, post, type ErrorResponse } from './helpers.js';

vi.mock('../config.js', async () => {
  const actual = await vi.importActual<typeof import('../config.js')>('../config.js');
  return {
    config: {
      ...actual.config,
      nodeEnv: 'test',
      logLevel: 'silent',
      mongodbUri: '',
      operatorApiKey: 'test-api-key',
      skipAuth: false,
    },
  };
});

interface ConflictBody {
  id: string;
  entityType: string;
  entityId: string;
  storeId: string | null;
  conflictingFields: string[];
  status: string;
  resolutionType: string | null;
  resolvedSnapshot: Record<string, unknown> | null;
  resolvedBy: string | null;
  resolvedAt: string | null;
  notes: string | null;
  localTimestamp: string;
  detectedAt: string;
}

interface ResultBody {
  conflictId: string;
  outcome: string;
  status: string;
  resolutionType: string | null;
  resolvedSnapshot: Record<string, unknown> | null;
  manualFields: string[];
  conflict: ConflictBody;
}

describe('Conflict Routes', () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    resetHealthChecks();
    resetConflictEngine();
    app = await buildApp();
  });

  afterEach(async () => {
    await app.close();
    resetConflictEngine();
  });

  describe('POST /api/conflicts/detect', () => {
    it('should create a Pending conflict', async () => {
      const response = await post(app, '/api/conflicts/detect', detectPayload());

      expect(response.statusCode).toBe(201);
      const data = response.json<{ detected: boolean; conflict: ConflictBody }>();
      expect(data.detected).toBe(true);
      expect(data.conflict.status).toBe('Pending');
      expect(data.conflict.entityType).toBe('Product');
      expect(data.conflict.storeId).toBe('store-nairobi');
      expect(data.conflict.conflictingFields).toEqual(['price']);
      expect(data.conflict.localTimestamp).toBe('2024-05-01T10:00:00.000Z');
      expect(data.conflict).not.toHaveProperty('claim');
    });

    it('should report no conflict for equal snapshots', async () => {
      const response = await post(
        app,
        '/api/conflicts/detect',
        detectPayload({ localSnapshot: '{"name":"Tea","price":120}' })
      );

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ detected: false });
    });

    it('should resolve immediately when asked to', async () => {
      const response = await post(app, '/api/conflicts/detect', detectPayload({ autoResolve: true }));

      expect(response.statusCode).toBe(201);
      const data = response.json<{ detected: boolean; resolution: ResultBody }>();
      expect(data.resolution.outcome).toBe('resolved');
      expect(data.resolution.resolutionType).toBe('RemoteWins');
      expect(data.resolution.resolvedSnapshot).toEqual({ price: 120, name: 'Tea' });
    });

    it('should keep the conflict and report a failed auto-resolve beside it', async () => {
      let failNextWrite = true;
      initConflictEngine({
        entityStore: {
          replaceEntity: async () => {
            if (failNextWrite) {
              failNextWrite = false;
              throw new Error('entity store unavailable');
            }
          },
        },
      });

      const response = await post(app, '/api/conflicts/detect', detectPayload({ autoResolve: true }));

      expect(response.statusCode).toBe(201);
      const data = response.json<{ detected: boolean; conflict: ConflictBody; resolution: ErrorResponse }>();
      expect(data.conflict.status).toBe('Pending');
      expect(data.resolution).toEqual({
        error: 'Bad Gateway',
        message: 'Failed to write Product:product-42: entity store unavailable',
      });
      expect((await get(app, '/api/conflicts/counts')).json()).toEqual({ Pending: 1, Resolved: 0, Ignored: 0 });

      const retry = await post(app, `/api/conflicts/${data.conflict.id}/resolve`);

      expect(retry.statusCode).toBe(200);
      expect(retry.json<ResultBody>().outcome).toBe('resolved');
      expect((await get(app, '/api/conflicts/counts')).json()).toEqual({ Pending: 0, Resolved: 1, Ignored: 0 });
    });

    it('should map a malformed snapshot to 422', async () => {
      const response = await post(app, '/api/conflicts/detect', detectPayload({ remoteSnapshot: '{price:' }));

      expect(response.statusCode).toBe(422);
      expect(response.json<ErrorResponse>()).toEqual({
        error: 'Unprocessable Entity',
        message: 'Malformed remote snapshot: invalid JSON',
      });
    });

    it('should map an unknown entity type to 422', async () => {
      const response = await post(app, '/api/conflicts/detect', detectPayload({ entityType: 'Spaceship' }));

      expect(response.statusCode).toBe(422);
    });

    it('should reject missing fields with 400', async () => {
      const response = await post(app, '/api/conflicts/detect', detectPayload({ entityId: '' }));

      expect(response.statusCode).toBe(400);
      expect(response.json<ErrorResponse>().message).toBe('entityId is required');
    });

    it('should reject bad timestamps with 400', async () => {
      const response = await post(app, '/api/conflicts/detect', detectPayload({ localTimestamp: 'yesterday' }));

      expect(response.statusCode).toBe(400);
      expect(response.json<ErrorResponse>().message).toBe(
        'localTimestamp and remoteTimestamp must be ISO 8601 timestamps'
      );
    });
  });

  describe('GET /api/conflicts', () => {
    it('should list conflicts with status counts', async () => {
      await createConflict(app);
      await createConflict(app, { entityId: 'product-43', storeId: 'store-mombasa' });

      const response = await get(app, '/api/conflicts');

      expect(response.statusCode).toBe(200);
      const data = response.json<{ conflicts: ConflictBody[]; total: number; pending: number }>();
      expect(data.total).toBe(2);
      expect(data.pending).toBe(2);
      expect(data.conflicts).toHaveLength(2);
    });

    it('should filter by store', async () => {
      await createConflict(app);
      await createConflict(app, { entityId: 'product-43', storeId: 'store-mombasa' });

      const response = await get(app, '/api/conflicts?storeId=store-mombasa');

      const data = response.json<{ conflicts: ConflictBody[]; total: number }>();
      expect(data.total).toBe(1);
      expect(data.conflicts[0]!.entityId).toBe('product-43');
    });

    it('should paginate', async () => {
      await createConflict(app);
      await createConflict(app, { entityId: 'product-43' });
      await createConflict(app, { entityId: 'product-44' });

      const response = await get(app, '/api/conflicts?limit=2&offset=2');

      const data = response.json<{ conflicts: ConflictBody[]; total: number }>();
      expect(data.total).toBe(3);
      expect(data.conflicts).toHaveLength(1);
    });

    it('should reject an invalid status', async () => {
      const response = await get(app, '/api/conflicts?status=Open');

      expect(response.statusCode).toBe(400);
      expect(response.json<ErrorResponse>().message).toBe('Invalid status. Must be one of: Pending, Resolved, Ignored');
    });

    it('should reject an out-of-range limit', async () => {
      const response = await get(app, '/api/conflicts?limit=0');

      expect(response.statusCode).toBe(400);
      expect(response.json<ErrorResponse>().message).toBe('limit must be between 1 and 500');
    });
  });

  describe('GET /api/conflicts/:id', () => {
    it('should return a conflict', async () => {
      const id = await createConflict(app);

      const response = await get(app, `/api/conflicts/${id}`);

      expect(response.statusCode).toBe(200);
      expect(response.json<ConflictBody>().id).toBe(id);
    });

    it('should return 404 for an unknown id', async () => {
      const response = await get(app, '/api/conflicts/conflict-missing');

      expect(response.statusCode).toBe(404);
      expect(response.json<ErrorResponse>()).toEqual({
        error: 'Not Found',
        message: 'Conflict not found: conflict-missing',
      });
    });
  });

  describe('POST /api/conflicts/:id/resolve', () => {
    it('should resolve through the rule table', async () => {
      const id = await createConflict(app);

      const response = await post(app, `/api/conflicts/${id}/resolve`);

      expect(response.statusCode).toBe(200);
      const data = response.json<ResultBody>();
      expect(data.outcome).toBe('resolved');
      expect(data.status).toBe('Resolved');
      expect(data.conflict.resolvedBy).toBeNull();
    });

    it('should report already_resolved on a repeat', async () => {
      const id = await createConflict(app);
      await post(app, `/api/conflicts/${id}/resolve`);

      const response = await post(app, `/api/conflicts/${id}/resolve`);

      expect(response.json<ResultBody>().outcome).toBe('already_resolved');
    });

    it('should report manual_required for points changes', async () => {
      const id = await createConflict(app, {
        entityType: 'Customer',
        entityId: 'customer-7',
        localSnapshot: { PointsBalance: 10 },
        remoteSnapshot: { PointsBalance: 25 },
      });

      const response = await post(app, `/api/conflicts/${id}/resolve`);

      const data = response.json<ResultBody>();
      expect(data.outcome).toBe('manual_required');
      expect(data.manualFields).toEqual(['PointsBalance']);
      expect(data.status).toBe('Pending');
    });

    it('should map an entity store failure to 502', async () => {
      initConflictEngine({
        entityStore: {
          replaceEntity: async () => {
            throw new Error('entity store unavailable');
          },
        },
      });
      const id = await createConflict(app);

      const response = await post(app, `/api/conflicts/${id}/resolve`);

      expect(response.statusCode).toBe(502);
      expect(response.json<ErrorResponse>().message).toBe(
        'Failed to write Product:product-42: entity store unavailable'
      );
      expect((await get(app, `/api/conflicts/${id}`)).json<ConflictBody>().status).toBe('Pending');
    });
  });

  describe('POST /api/conflicts/:id/manual-resolve', () => {
    it('should apply an operator snapshot', async () => {
      const id = await createConflict(app);

      const response = await post(app, `/api/conflicts/${id}/manual-resolve`, {
        resolutionType: 'Manual',
        resolvedSnapshot: { price: 110, name: 'Tea' },
        userId: 'operator-1',
        notes: 'agreed with store manager',
      });

      expect(response.statusCode).toBe(200);
      const data = response.json<ResultBody>();
      expect(data.resolvedSnapshot).toEqual({ price: 110, name: 'Tea' });
      expect(data.conflict.resolvedBy).toBe('operator-1');
      expect(data.conflict.notes).toBe('agreed with store manager');
    });

    it('should require a snapshot for Manual', async () => {
      const id = await createConflict(app);

      const response = await post(app, `/api/conflicts/${id}/manual-resolve`, {
        resolutionType: 'Manual',
        userId: 'operator-1',
      });

      expect(response.statusCode).toBe(400);
      expect(response.json<ErrorResponse>().message).toBe('resolvedSnapshot is required for Manual resolution');
    });

    it('should require a user', async () => {
      const id = await createConflict(app);

      const response = await post(app, `/api/conflicts/${id}/manual-resolve`, { resolutionType: 'LocalWins' });

      expect(response.statusCode).toBe(400);
      expect(response.json<ErrorResponse>().message).toBe('userId is required');
    });

    it('should reject an unknown resolution type', async () => {
      const id = await createConflict(app);

      const response = await post(app, `/api/conflicts/${id}/manual-resolve`, {
        resolutionType: 'Coinflip',
        userId: 'operator-1',
      });

      expect(response.statusCode).toBe(400);
    });
  });

  describe('POST /api/conflicts/:id/ignore', () => {
    it('should ignore a conflict and record it in the audit trail', async () => {
      const id = await createConflict(app);

      const response = await post(app, `/api/conflicts/${id}/ignore`, { userId: 'operator-2', notes: 'test data' });

      expect(response.statusCode).toBe(200);
      expect(response.json<ResultBody>().outcome).toBe('ignored');

      const audit = await get(app, `/api/conflicts/${id}/audit`);
      const entries = audit.json<{ conflictId: string; entries: { action: string; userId: string | null; details: string | null }[] }>();
      expect(entries.conflictId).toBe(id);
      expect(entries.entries.map((e) => e.action)).toEqual(['Detected', 'Ignored']);
      expect(entries.entries[1]).toMatchObject({ userId: 'operator-2', details: 'test data' });
    });

    it('should require a user', async () => {
      const id = await createConflict(app);

      const response = await post(app, `/api/conflicts/${id}/ignore`, {});

      expect(response.statusCode).toBe(400);
    });

    it('should return 404 for an unknown id', async () => {
      const response = await post(app, '/api/conflicts/conflict-missing/ignore', { userId: 'operator-2' });

      expect(response.statusCode).toBe(404);
    });
  });

  describe('batch operations', () => {
    it('should auto-resolve everything the rules can handle', async () => {
      await createConflict(app);
      await createConflict(app, {
        entityType: 'Customer',
        entityId: 'customer-7',
        localSnapshot: { PointsBalance: 10 },
        remoteSnapshot: { PointsBalance: 25 },
      });

      const response = await post(app, '/api/conflicts/auto-resolve');

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ resolved: 1 });
    });

    it('should bulk resolve listed conflicts', async () => {
      const first = await createConflict(app);
      const second = await createConflict(app, { entityId: 'product-43' });

      const response = await post(app, '/api/conflicts/bulk-resolve', {
        conflictIds: [first, second, 'conflict-missing'],
        resolutionType: 'LocalWins',
        userId: 'operator-1',
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ requested: 3, resolved: 2 });
      expect((await get(app, `/api/conflicts/${first}`)).json<ConflictBody>().resolvedSnapshot).toEqual({
        price: 100,
        name: 'Tea',
      });
    });

    it('should refuse a Manual bulk resolution', async () => {
      const id = await createConflict(app);

      const response = await post(app, '/api/conflicts/bulk-resolve', {
        conflictIds: [id],
        resolutionType: 'Manual',
        userId: 'operator-1',
      });

      expect(response.statusCode).toBe(400);
      expect(response.json<ErrorResponse>().message).toBe('Bulk resolution cannot use Manual');
    });

    it('should purge terminal conflicts before the threshold', async () => {
      const resolved = await createConflict(app);
      const pending = await createConflict(app, { entityId: 'product-43' });
      await post(app, `/api/conflicts/${resolved}/resolve`);

      const response = await post(app, '/api/conflicts/purge', { olderThan: '2999-01-01T00:00:00.000Z' });

      expect(response.json()).toEqual({ purged: 1 });
      expect((await get(app, `/api/conflicts/${resolved}`)).statusCode).toBe(404);
      expect((await get(app, `/api/conflicts/${pending}`)).statusCode).toBe(200);

      const audit = await get(app, `/api/conflicts/${resolved}/audit`);
      const actions = audit.json<{ entries: { action: string }[] }>().entries.map((e) => e.action);
      expect(actions).toEqual(['Detected', 'AutoResolved', 'Purged']);
    });

    it('should keep recent resolutions under the default retention', async () => {
      const id = await createConflict(app);
      await post(app, `/api/conflicts/${id}/resolve`);

      const response = await post(app, '/api/conflicts/purge');

      expect(response.json()).toEqual({ purged: 0 });
    });
  });

  describe('summary and counts', () => {
    it('should summarise conflicts', async () => {
      const auto = await createConflict(app);
      const manual = await createConflict(app, { entityId: 'product-43' });
      await createConflict(app, {
        entityType: 'Inventory',
        entityId: 'inventory-1',
        localSnapshot: { quantity: 3 },
        remoteSnapshot: { quantity: 4 },
      });
      await post(app, `/api/conflicts/${auto}/resolve`);
      await post(app, `/api/conflicts/${manual}/manual-resolve`, { resolutionType: 'LocalWins', userId: 'operator-1' });

      const response = await get(app, '/api/conflicts/summary');

      const data = response.json<{
        total: number;
        pending: number;
        autoResolved: number;
        manuallyResolved: number;
        ignored: number;
        byEntityType: Record<string, number>;
        recent: ConflictBody[];
      }>();
      expect(data.total).toBe(3);
      expect(data.pending).toBe(1);
      expect(data.autoResolved).toBe(1);
      expect(data.manuallyResolved).toBe(1);
      expect(data.ignored).toBe(0);
      expect(data.byEntityType).toEqual({ Product: 2, Inventory: 1 });
      expect(data.recent).toHaveLength(3);
    });

    it('should count by status', async () => {
      const id = await createConflict(app);
      await createConflict(app, { entityId: 'product-43', storeId: 'store-mombasa' });
      await post(app, `/api/conflicts/${id}/ignore`, { userId: 'operator-2' });

      expect((await get(app, '/api/conflicts/counts')).json()).toEqual({ Pending: 1, Resolved: 0, Ignored: 1 });
      expect((await get(app, '/api/conflicts/counts?storeId=store-mombasa')).json()).toEqual({
        Pending: 1,
        Resolved: 0,
        Ignored: 0,
      });
    });
  });

  it('should not expose a DELETE on conflicts', async () => {
    const id = await createConflict(app);

    const response = await del(app, `/api/conflicts/${id}`);

    expect(response.statusCode).toBe(404);
  });
});
