import { describe, it, expect, beforeEach } from 'vitest';
import { setTimeout as sleep } from 'node:timers/promises';
import type { Conflict } from '../types.js';
import { ConflictEngineError } from '../errors.js';
import { createTestEngine, makeDetectInput, type TestEngine } from './helpers.js';

async function detectOrFail(t: TestEngine): Promise<Conflict> {
  const conflict = await t.engine.detect(makeDetectInput());
  if (!conflict) {
    throw new Error('expected a conflict');
  }
  return conflict;
}

describe('ResolutionApplier', () => {
  let t: TestEngine;

  beforeEach(() => {
    t = createTestEngine();
  });

  describe('entity store failures', () => {
    it('should keep the conflict Pending and raise APPLY_FAILED', async () => {
      const conflict = await detectOrFail(t);
      t.entityStore.failNext = 1;

      const error = await t.engine.resolveById(conflict.id).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ConflictEngineError);
      expect((error as ConflictEngineError).code).toBe('APPLY_FAILED');
      expect((error as ConflictEngineError).message).toBe(
        'Failed to write Product:product-42: entity store unavailable'
      );

      const stored = await t.engine.getConflictById(conflict.id);
      expect(stored.status).toBe('Pending');
      expect(stored.claim).toBeNull();
      expect(await t.engine.getAuditTrail(conflict.id)).toHaveLength(1);
    });

    it('should resolve on retry once the store recovers', async () => {
      const conflict = await detectOrFail(t);
      t.entityStore.failNext = 1;
      await expect(t.engine.resolveById(conflict.id)).rejects.toMatchObject({ code: 'APPLY_FAILED' });

      const result = await t.engine.resolveById(conflict.id);

      expect(result.outcome).toBe('resolved');
      expect(t.entityStore.writes).toHaveLength(1);
    });
  });

  describe('manualResolve', () => {
    it('should write an explicit snapshot and record the operator', async () => {
      const conflict = await detectOrFail(t);

      const result = await t.engine.manualResolve({
        conflictId: conflict.id,
        resolutionType: 'Manual',
        resolvedSnapshot: '{"price":110,"name":"Tea"}',
        userId: 'operator-1',
        notes: 'split the difference',
      });

      expect(result.outcome).toBe('resolved');
      expect(result.resolutionType).toBe('Manual');
      expect(result.resolvedSnapshot).toEqual({ price: 110, name: 'Tea' });
      expect(result.conflict.resolvedBy).toBe('operator-1');
      expect(result.conflict.notes).toBe('split the difference');
      expect(result.conflict.resolvedAt).toEqual(new Date('2024-05-01T10:00:00.000Z'));
      expect(t.entityStore.writes[0]!.record).toEqual({ price: 110, name: 'Tea' });

      const trail = await t.engine.getAuditTrail(conflict.id);
      expect(trail.map((e) => e.action)).toEqual(['Detected', 'ManuallyResolved']);
      expect(trail[1]).toMatchObject({
        oldStatus: 'Pending',
        newStatus: 'Resolved',
        userId: 'operator-1',
        details: 'Applied resolution: Manual',
      });
    });

    it('should compute the record from the chosen type when no snapshot is given', async () => {
      const conflict = await detectOrFail(t);

      const result = await t.engine.manualResolve({
        conflictId: conflict.id,
        resolutionType: 'LocalWins',
        userId: 'operator-1',
      });

      expect(result.resolutionType).toBe('LocalWins');
      expect(result.resolvedSnapshot).toEqual({ price: 100, name: 'Tea' });
      expect(result.conflict.notes).toBeNull();
    });

    it('should reject Manual without a snapshot', async () => {
      const conflict = await detectOrFail(t);

      await expect(
        t.engine.manualResolve({ conflictId: conflict.id, resolutionType: 'Manual', userId: 'operator-1' })
      ).rejects.toThrow('resolvedSnapshot is required for Manual resolution');
      expect((await t.engine.getConflictById(conflict.id)).status).toBe('Pending');
    });

    it('should reject a request without a user', async () => {
      const conflict = await detectOrFail(t);

      await expect(
        t.engine.manualResolve({ conflictId: conflict.id, resolutionType: 'RemoteWins', userId: '' })
      ).rejects.toMatchObject({ code: 'INVALID_REQUEST', message: 'userId is required' });
    });

    it('should reject a malformed explicit snapshot', async () => {
      const conflict = await detectOrFail(t);

      await expect(
        t.engine.manualResolve({
          conflictId: conflict.id,
          resolutionType: 'Manual',
          resolvedSnapshot: '{oops',
          userId: 'operator-1',
        })
      ).rejects.toMatchObject({ code: 'DATA_ERROR' });
      expect(t.entityStore.writes).toHaveLength(0);
    });

    it('should return the stored result for a terminal conflict', async () => {
      const conflict = await detectOrFail(t);
      await t.engine.resolveById(conflict.id);

      const result = await t.engine.manualResolve({
        conflictId: conflict.id,
        resolutionType: 'LocalWins',
        userId: 'operator-1',
      });

      expect(result.outcome).toBe('already_resolved');
      expect(result.resolvedSnapshot).toEqual({ price: 120, name: 'Tea' });
      expect(t.entityStore.writes).toHaveLength(1);
    });

    it('should raise NOT_FOUND for an unknown conflict', async () => {
      await expect(
        t.engine.manualResolve({ conflictId: 'conflict-missing', resolutionType: 'LocalWins', userId: 'operator-1' })
      ).rejects.toThrow('Conflict not found: conflict-missing');
    });
  });

  describe('ignore', () => {
    it('should mark the conflict Ignored without writing the entity', async () => {
      const conflict = await detectOrFail(t);

      const result = await t.engine.ignore(conflict.id, 'operator-2', 'duplicate upload');

      expect(result.outcome).toBe('ignored');
      expect(result.status).toBe('Ignored');
      expect(result.resolvedSnapshot).toBeNull();
      expect(result.resolutionType).toBeNull();
      expect(result.conflict.resolvedBy).toBe('operator-2');
      expect(result.conflict.resolvedAt).toEqual(new Date('2024-05-01T10:00:00.000Z'));
      expect(t.entityStore.writes).toHaveLength(0);

      const trail = await t.engine.getAuditTrail(conflict.id);
      expect(trail[1]).toMatchObject({
        action: 'Ignored',
        oldStatus: 'Pending',
        newStatus: 'Ignored',
        userId: 'operator-2',
        details: 'duplicate upload',
      });
    });

    it('should report already_ignored on a second call', async () => {
      const conflict = await detectOrFail(t);
      await t.engine.ignore(conflict.id, 'operator-2');

      const again = await t.engine.ignore(conflict.id, 'operator-3');

      expect(again.outcome).toBe('already_ignored');
      expect(again.conflict.resolvedBy).toBe('operator-2');
      expect(await t.engine.getAuditTrail(conflict.id)).toHaveLength(2);
    });

    it('should not resolve an ignored conflict', async () => {
      const conflict = await detectOrFail(t);
      await t.engine.ignore(conflict.id, 'operator-2');

      const result = await t.engine.resolveById(conflict.id);

      expect(result.outcome).toBe('already_ignored');
      expect(t.entityStore.writes).toHaveLength(0);
    });

    it('should require a user', async () => {
      const conflict = await detectOrFail(t);

      await expect(t.engine.ignore(conflict.id, '')).rejects.toMatchObject({ code: 'INVALID_REQUEST' });
    });
  });

  describe('concurrent writers', () => {
    it('should apply once and hand the winner result to the loser', async () => {
      const conflict = await detectOrFail(t);
      t.entityStore.delayMs = 20;

      const [a, b] = await Promise.all([t.engine.resolveById(conflict.id), t.engine.resolveById(conflict.id)]);

      expect(t.entityStore.writes).toHaveLength(1);
      expect([a.outcome, b.outcome].sort()).toEqual(['already_resolved', 'resolved']);
      expect(a.resolvedSnapshot).toEqual(b.resolvedSnapshot);

      const trail = await t.engine.getAuditTrail(conflict.id);
      expect(trail.map((e) => e.action)).toEqual(['Detected', 'AutoResolved']);
    });

    it('should let a concurrent ignore lose to a resolution in flight', async () => {
      const conflict = await detectOrFail(t);
      t.entityStore.delayMs = 20;

      const pending = t.engine.resolveById(conflict.id);
      await sleep(5);
      const ignored = await t.engine.ignore(conflict.id, 'operator-2');
      const resolved = await pending;

      expect(resolved.outcome).toBe('resolved');
      expect(ignored.outcome).toBe('already_resolved');
      expect((await t.engine.getConflictById(conflict.id)).status).toBe('Resolved');
    });

    it('should raise BUSY when the holder outlasts the wait', async () => {
      const busy = createTestEngine({ claimWaitMs: 10, claimPollMs: 5 });
      const conflict = await busy.engine.detect(makeDetectInput());
      busy.entityStore.delayMs = 200;

      const first = busy.engine.resolveById(conflict!.id);
      await sleep(5);
      const second = busy.engine.resolveById(conflict!.id).catch((err: unknown) => err);

      expect(await second).toMatchObject({ code: 'BUSY' });
      expect((await first).outcome).toBe('resolved');
    });

    it('should let a writer take over an expired claim', async () => {
      const conflict = await detectOrFail(t);
      const taken = await t.repository.claim(
        conflict.id,
        { token: 'stale-token', expiresAt: new Date('2024-05-01T10:00:30.000Z') },
        t.clock.now()
      );
      expect(taken).not.toBeNull();

      t.clock.advance(31_000);
      const result = await t.engine.resolveById(conflict.id);

      expect(result.outcome).toBe('resolved');
      expect(await t.repository.commitTransition(
        conflict.id,
        'stale-token',
        {
          status: 'Ignored',
          resolutionType: null,
          resolvedSnapshot: null,
          resolvedBy: 'operator-9',
          resolvedAt: t.clock.now(),
          notes: null,
        },
        t.engine.audit.buildEntry({ conflictId: conflict.id, action: 'Ignored', oldStatus: 'Pending', newStatus: 'Ignored' })
      )).toBeNull();
    });
  });
});
