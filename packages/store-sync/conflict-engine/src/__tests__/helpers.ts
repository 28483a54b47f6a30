import { vi } from 'vitest';
import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from 'pino';
import { ConflictEngine } from '../conflict-engine.js';
import { InMemoryConflictRepository } from '../repository/in-memory-repository.js';
import type { ConflictEngineConfig } from '../config.js';
import type { DetectConflictInput, EntityStore, EntityWrite } from '../types.js';

export function createMockLogger(): Logger {
  return {
    child: () => createMockLogger(),
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

/** Controllable clock */
export class TestClock {
  private current: number;

  constructor(start = '2024-05-01T10:00:00.000Z') {
    this.current = new Date(start).getTime();
  }

  now = (): Date => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }
}

/** Entity store stand-in recording every write */
export class FakeEntityStore implements EntityStore {
  readonly writes: EntityWrite[] = [];
  failNext = 0;
  delayMs = 0;

  async replaceEntity(write: EntityWrite): Promise<void> {
    if (this.delayMs > 0) {
      await sleep(this.delayMs);
    }
    if (this.failNext > 0) {
      this.failNext--;
      throw new Error('entity store unavailable');
    }
    this.writes.push(structuredClone(write));
  }
}

export interface TestEngine {
  engine: ConflictEngine;
  repository: InMemoryConflictRepository;
  entityStore: FakeEntityStore;
  clock: TestClock;
}

export function createTestEngine(config?: Partial<ConflictEngineConfig>): TestEngine {
  const repository = new InMemoryConflictRepository();
  const entityStore = new FakeEntityStore();
  const clock = new TestClock();
  const engine = new ConflictEngine({
    repository,
    entityStore,
    logger: createMockLogger(),
    now: clock.now,
    config: { claimPollMs: 5, claimWaitMs: 1000, ...config },
  });
  return { engine, repository, entityStore, clock };
}

/** Local {price:100,name:"Tea"} at 10:00, remote {price:120,name:"Tea"} at 10:05 */
export function makeDetectInput(overrides?: Partial<DetectConflictInput>): DetectConflictInput {
  return {
    entityType: 'Product',
    entityId: 'product-42',
    localSnapshot: { price: 100, name: 'Tea' },
    remoteSnapshot: { price: 120, name: 'Tea' },
    localTimestamp: new Date('2024-05-01T10:00:00.000Z'),
    remoteTimestamp: new Date('2024-05-01T10:05:00.000Z'),
    syncBatchId: 'batch-1',
    storeId: 'store-nairobi',
    ...overrides,
  };
}
