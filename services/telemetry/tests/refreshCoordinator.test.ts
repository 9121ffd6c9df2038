import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTimeout as delay } from 'node:timers/promises';
import { createSilentLogger } from '../src/logger';
import { computeExponentialBackoff } from '../src/refresh/backoff';
import { RefreshCoordinator, refreshKeyId, type Recomputer } from '../src/refresh/coordinator';
import type { RecomputeInput, RecomputeOutcome } from '../src/rollup/engine';
import { buildTestConfig } from './testEnv';

type Behaviour = (call: number) => Promise<void>;

class FakeRecomputer implements Recomputer {
  readonly calls: string[] = [];
  active = 0;
  maxActive = 0;

  constructor(private readonly behaviour: Behaviour = async () => {}) {}

  async recompute(input: RecomputeInput): Promise<RecomputeOutcome> {
    const bucketStart = new Date(input.bucketStart).toISOString();
    this.calls.push(`${input.granularity}:${input.machineId}:${bucketStart}`);
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      await this.behaviour(this.calls.length);
    } finally {
      this.active -= 1;
    }
    return { status: 'removed', granularity: input.granularity, machineId: input.machineId, bucketStart };
  }
}

function createCoordinator(engine: Recomputer, env: NodeJS.ProcessEnv = {}): RefreshCoordinator {
  return new RefreshCoordinator({
    engine,
    config: buildTestConfig(env),
    logger: createSilentLogger(),
    random: () => 0.5
  });
}

async function waitFor(predicate: () => boolean, timeoutMs = 1_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error('condition not met in time');
    }
    await delay(2);
  }
}

test('backoff doubles from the base delay and stays within bounds', () => {
  const options = { baseMs: 100, maxMs: 1_000, random: () => 0.5 };
  assert.equal(computeExponentialBackoff(1, options), 100);
  assert.equal(computeExponentialBackoff(3, options), 400);
  assert.equal(computeExponentialBackoff(10, options), 1_000);
  assert.equal(computeExponentialBackoff(2, { ...options, random: () => 1 }), 240);
  assert.equal(computeExponentialBackoff(1, { ...options, random: () => 0 }), 100);
  assert.equal(computeExponentialBackoff(0, { ...options, jitterRatio: 0 }), 100);
});

test('refresh key ids normalise the bucket start', () => {
  assert.equal(
    refreshKeyId({ granularity: 'hourly', machineId: 'M1', bucketStart: '2026-06-01T10:00:00Z' }),
    refreshKeyId({ granularity: 'hourly', machineId: 'M1', bucketStart: '2026-06-01T10:00:00.000Z' })
  );
});

test('requests within the debounce window coalesce into one recompute', async () => {
  const engine = new FakeRecomputer();
  const coordinator = createCoordinator(engine);

  const key = coordinator.requestRefresh({
    granularity: 'hourly',
    machineId: 'M1',
    bucketStart: '2026-06-01T10:17:00.000Z'
  });
  assert.equal(key.bucketStart, '2026-06-01T10:00:00.000Z');
  coordinator.requestRefresh({ granularity: 'hourly', machineId: 'M1', bucketStart: '2026-06-01T10:45:00.000Z' });
  coordinator.requestRefresh({ granularity: 'hourly', machineId: 'M1', bucketStart: '2026-06-01T10:59:00.000Z' });
  assert.equal(coordinator.stats().pending, 1);

  await coordinator.settle();

  assert.deepEqual(engine.calls, ['hourly:M1:2026-06-01T10:00:00.000Z']);
  assert.equal(coordinator.stats().coalesced, 2);
  assert.equal(coordinator.stats().completed, 1);
  await coordinator.close();
});

test('write events schedule the hourly and daily buckets of the reading', async () => {
  const engine = new FakeRecomputer();
  const coordinator = createCoordinator(engine);

  coordinator.handleWriteEvent({
    id: '1',
    machineId: 'M1',
    clientId: 'C1',
    readingId: 1,
    sensorType: 'multi_sensor',
    timestamp: '2026-06-01T10:17:00.000Z',
    bucketHour: '2026-06-01T10:00:00.000Z',
    occurredAt: '2026-06-01T10:17:00.000Z'
  });
  await coordinator.settle();

  assert.deepEqual([...engine.calls].sort(), [
    'daily:M1:2026-06-01T00:00:00.000Z',
    'hourly:M1:2026-06-01T10:00:00.000Z'
  ]);
  await coordinator.close();
});

test('a key never runs twice at once and a write during a run triggers one more pass', async () => {
  let release: () => void = () => {};
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  const engine = new FakeRecomputer(async (call) => {
    if (call === 1) {
      await gate;
    }
  });
  const coordinator = createCoordinator(engine);
  const request = { granularity: 'hourly' as const, machineId: 'M1', bucketStart: '2026-06-01T10:00:00.000Z' };

  coordinator.requestRefresh(request);
  await waitFor(() => engine.calls.length === 1);
  assert.equal(coordinator.stats().running, 1);

  coordinator.requestRefresh(request);
  coordinator.requestRefresh(request);
  release();
  await coordinator.settle();

  assert.equal(engine.calls.length, 2);
  assert.equal(engine.maxActive, 1);
  assert.equal(coordinator.stats().completed, 2);
  await coordinator.close();
});

test('failed recomputes are retried with backoff', async () => {
  const engine = new FakeRecomputer(async (call) => {
    if (call < 3) {
      throw new Error(`transient failure ${call}`);
    }
  });
  const coordinator = createCoordinator(engine);

  coordinator.requestRefresh({ granularity: 'daily', machineId: 'M1', bucketStart: '2026-06-01T10:00:00.000Z' });
  await coordinator.settle();

  assert.equal(engine.calls.length, 3);
  assert.deepEqual(coordinator.stats(), {
    pending: 0,
    queued: 0,
    running: 0,
    completed: 1,
    coalesced: 0,
    failed: 0
  });
  await coordinator.close();
});

test('a key is abandoned after the configured number of attempts', async () => {
  const engine = new FakeRecomputer(async () => {
    throw new Error('always failing');
  });
  const coordinator = createCoordinator(engine, { TELEMETRY_REFRESH_MAX_ATTEMPTS: '2' });

  coordinator.requestRefresh({ granularity: 'hourly', machineId: 'M1', bucketStart: '2026-06-01T10:00:00.000Z' });
  await coordinator.settle();

  assert.equal(engine.calls.length, 2);
  assert.equal(coordinator.stats().failed, 1);
  assert.equal(coordinator.stats().completed, 0);
  await coordinator.close();
});

test('the pool runs distinct keys up to the configured concurrency', async () => {
  let release: () => void = () => {};
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  const engine = new FakeRecomputer(async () => {
    await gate;
  });
  const coordinator = createCoordinator(engine, { TELEMETRY_REFRESH_CONCURRENCY: '2' });

  for (const machineId of ['M1', 'M2', 'M3']) {
    coordinator.requestRefresh({ granularity: 'hourly', machineId, bucketStart: '2026-06-01T10:00:00.000Z' });
  }
  await waitFor(() => engine.calls.length === 2 && coordinator.stats().queued === 1);
  assert.equal(coordinator.stats().running, 2);

  release();
  await coordinator.settle();
  assert.equal(engine.calls.length, 3);
  assert.equal(engine.maxActive, 2);
  await coordinator.close();
});

test('close drops keys that have not started', async () => {
  const engine = new FakeRecomputer();
  const coordinator = createCoordinator(engine, { TELEMETRY_REFRESH_DEBOUNCE_MS: '1000' });

  coordinator.requestRefresh({ granularity: 'hourly', machineId: 'M1', bucketStart: '2026-06-01T10:00:00.000Z' });
  await coordinator.close();
  await coordinator.settle();

  coordinator.requestRefresh({ granularity: 'hourly', machineId: 'M2', bucketStart: '2026-06-01T10:00:00.000Z' });
  assert.deepEqual(engine.calls, []);
  assert.equal(coordinator.stats().pending, 0);
});
