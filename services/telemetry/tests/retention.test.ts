import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTimeout as delay } from 'node:timers/promises';
import { RetentionScheduler } from '../src/lifecycle/scheduler';
import type { RetentionReport, RetentionTrigger } from '../src/lifecycle/types';
import { createSilentLogger } from '../src/logger';
import { createMemoryStorage } from '../src/storage/memory';
import type { TelemetryRepository } from '../src/storage/types';
import { createTelemetryService } from '../src/service';
import { buildTestConfig, createRecordingEventHandle, createTestService, fixedClock, seedTenant } from './testEnv';

// 730 days before this instant is 2026-06-02T12:00:00.000Z.
const NOW = '2028-06-01T12:00:00.000Z';

test('a sweep drops whole chunks that ended before the two-year cutoff', async () => {
  const { service, recorder } = await createTestService({ now: fixedClock(NOW) });
  await seedTenant(service, 'C1', ['M1']);

  for (const timestamp of ['2026-06-02T10:20:00.000Z', '2026-06-02T11:30:00.000Z', '2026-06-02T12:10:00.000Z']) {
    await service.store.append({ machineId: 'M1', clientId: 'C1', timestamp, temperature: 60 });
  }
  await service.refresh.settle();

  const report = await service.retention.sweep(new Date(NOW));
  assert.equal(report.status, 'completed');
  assert.equal(report.trigger, 'manual');
  assert.equal(report.cutoff, '2026-06-02T12:00:00.000Z');
  assert.deepEqual(report.droppedChunks, ['readings_202606021000']);
  assert.deepEqual(report.failedChunks, []);
  assert.equal(report.rollupsDeleted, 1);
  assert.equal(report.rollupsRecomputed, 1);
  await service.refresh.settle();

  const remaining = await service.store.listChunks();
  assert.deepEqual(
    remaining.map((chunk) => chunk.id),
    ['readings_202606021100', 'readings_202606021200']
  );
  const readings = await service.store.query({
    machineId: 'M1',
    from: '2026-06-02T00:00:00.000Z',
    to: '2026-06-03T00:00:00.000Z'
  });
  assert.deepEqual(
    readings.map((reading) => reading.timestamp),
    ['2026-06-02T12:10:00.000Z', '2026-06-02T11:30:00.000Z']
  );

  assert.equal(await service.rollups.get('hourly', 'M1', new Date('2026-06-02T10:00:00.000Z')), null);
  assert.equal((await service.rollups.get('hourly', 'M1', new Date('2026-06-02T11:00:00.000Z')))?.readingCount, 1);
  const daily = await service.rollups.get('daily', 'M1', new Date('2026-06-02T00:00:00.000Z'));
  assert.equal(daily?.readingCount, readings.length);

  const published = recorder.ofType('telemetry.retention.completed');
  assert.equal(published.length, 1);
  assert.deepEqual(published[0].payload, {
    runAt: NOW,
    cutoff: '2026-06-02T12:00:00.000Z',
    droppedChunks: ['readings_202606021000'],
    failedChunks: [],
    rollupsDeleted: 1,
    rollupsRecomputed: 1,
    alertsPurged: 0,
    anomaliesPurged: 0
  });

  const second = await service.retention.sweep(new Date(NOW));
  assert.equal(second.status, 'skipped');
  assert.equal(second.message, 'no chunks or records met retention criteria');
  assert.equal(recorder.ofType('telemetry.retention.completed').length, 1);

  await service.close();
});

test('entity retention purges closed records and keeps referenced anomalies', async () => {
  const { service } = await createTestService({ now: fixedClock(NOW) });
  await seedTenant(service, 'C1', ['M1']);
  const old = '2020-01-01T00:00:00.000Z';
  const base = { machineId: 'M1', clientId: 'C1', anomalyType: 'temperature_spike', confidenceScore: 0.9 };

  const resolved = await service.anomalies.record({ ...base, timestamp: old });
  await service.anomalies.acknowledge(resolved.id, 'operator1');
  await service.anomalies.resolve(resolved.id, 'operator1');

  const referenced = await service.anomalies.record({ ...base, timestamp: old });
  await service.anomalies.markFalsePositive(referenced.id, 'operator1');

  const open = await service.anomalies.record({ ...base, timestamp: old });

  const closedAlert = await service.alerts.create({
    machineId: 'M1',
    clientId: 'C1',
    alertType: 'threshold',
    severity: 'warning',
    title: 'Temperature high',
    message: 'Temperature exceeded 80C',
    timestamp: old
  });
  await service.alerts.resolve(closedAlert.id, 'operator1');
  const openAlert = await service.alerts.create({
    machineId: 'M1',
    clientId: 'C1',
    alertType: 'anomaly',
    severity: 'critical',
    title: 'False positive review',
    message: 'Review flagged reading',
    timestamp: old,
    relatedAnomalyId: referenced.id
  });

  const report = await service.retention.sweep(new Date(NOW));
  assert.equal(report.status, 'completed');
  assert.equal(report.alertsPurged, 1);
  assert.equal(report.anomaliesPurged, 1);

  const anomalies = await service.anomalies.list({ clientId: 'C1' });
  assert.deepEqual(
    anomalies.map((record) => record.id).sort(),
    [referenced.id, open.id].sort()
  );
  const alerts = await service.alerts.list({ clientId: 'C1' });
  assert.deepEqual(
    alerts.map((record) => record.id),
    [openAlert.id]
  );

  await service.close();
});

test('an entity retention of zero hours disables entity purges', async () => {
  const { service } = await createTestService({
    now: fixedClock(NOW),
    env: { TELEMETRY_RETENTION_ENTITY_MAX_AGE_HOURS: '0' }
  });
  const report = await service.retention.sweep(new Date(NOW));
  assert.equal(report.entityCutoff, null);
  assert.equal(report.status, 'skipped');
  await service.close();
});

test('rollups of a bucket only partly past the cutoff keep matching its surviving readings', async () => {
  const { service } = await createTestService({
    now: fixedClock(NOW),
    env: { TELEMETRY_CHUNK_INTERVAL_MINUTES: '120' }
  });
  await seedTenant(service, 'C1', ['M1']);
  await service.store.append({
    machineId: 'M1',
    clientId: 'C1',
    timestamp: '2026-06-02T10:20:00.000Z',
    temperature: 60
  });
  await service.refresh.settle();

  // The 10:00-12:00 chunk ends exactly at the cutoff, so it and its hourly bucket survive.
  const report = await service.retention.sweep(new Date(NOW));
  assert.equal(report.status, 'skipped');
  assert.deepEqual(report.droppedChunks, []);
  assert.equal(report.rollupsDeleted, 0);
  assert.deepEqual(
    (await service.store.listChunks()).map((chunk) => chunk.id),
    ['readings_202606021000']
  );
  assert.equal((await service.rollups.get('hourly', 'M1', new Date('2026-06-02T10:00:00.000Z')))?.readingCount, 1);

  await service.close();
});

test('chunks that fail to drop are reported and retried on the next sweep', async () => {
  const memory = createMemoryStorage();
  let failingChunkId: string | null = 'readings_202606020900';
  const telemetry: TelemetryRepository = {
    insertReading: (chunk, reading) => memory.telemetry.insertReading(chunk, reading),
    queryReadings: (query) => memory.telemetry.queryReadings(query),
    readRange: (machineId, from, to) => memory.telemetry.readRange(machineId, from, to),
    latestByClient: (clientId) => memory.telemetry.latestByClient(clientId),
    listChunks: () => memory.telemetry.listChunks(),
    dropChunk: async (chunkId) => {
      if (chunkId === failingChunkId) {
        throw new Error('lock timeout');
      }
      return memory.telemetry.dropChunk(chunkId);
    }
  };
  const recorder = createRecordingEventHandle();
  const service = await createTelemetryService({
    config: buildTestConfig(),
    logger: createSilentLogger(),
    storage: { ...memory, telemetry },
    eventHandle: recorder.handle,
    now: fixedClock(NOW)
  });
  await seedTenant(service, 'C1', ['M1']);
  for (const timestamp of ['2026-06-02T09:15:00.000Z', '2026-06-02T10:15:00.000Z', '2026-06-02T12:10:00.000Z']) {
    await service.store.append({ machineId: 'M1', clientId: 'C1', timestamp, temperature: 50 });
  }
  await service.refresh.settle();

  const dayStart = new Date('2026-06-02T00:00:00.000Z');
  const storedDailyCount = async () => (await service.rollups.get('daily', 'M1', dayStart))?.readingCount;
  const remainingCount = async () =>
    (
      await service.store.query({
        machineId: 'M1',
        from: '2026-06-02T00:00:00.000Z',
        to: '2026-06-03T00:00:00.000Z'
      })
    ).length;

  const first = await service.retention.sweep(new Date(NOW), 'schedule');
  assert.equal(first.status, 'completed');
  assert.equal(first.trigger, 'schedule');
  assert.deepEqual(first.droppedChunks, ['readings_202606021000']);
  assert.deepEqual(first.failedChunks, ['readings_202606020900']);
  assert.equal(first.rollupsDeleted, 1);
  assert.equal(first.rollupsRecomputed, 1);
  await service.refresh.settle();
  assert.equal(await remainingCount(), 2);
  assert.equal(await storedDailyCount(), 2);
  assert.equal((await service.rollups.get('hourly', 'M1', new Date('2026-06-02T09:00:00.000Z')))?.readingCount, 1);

  failingChunkId = null;
  const second = await service.retention.sweep(new Date(NOW), 'schedule');
  assert.deepEqual(second.droppedChunks, ['readings_202606020900']);
  assert.deepEqual(second.failedChunks, []);
  assert.equal(second.rollupsDeleted, 1);
  assert.equal(second.rollupsRecomputed, 1);
  await service.refresh.settle();
  assert.equal(await remainingCount(), 1);
  assert.equal(await storedDailyCount(), 1);
  assert.deepEqual(
    (await service.store.listChunks()).map((chunk) => chunk.id),
    ['readings_202606021200']
  );
  assert.equal(recorder.ofType('telemetry.retention.completed').length, 2);

  await service.close();
});

test('overlapping sweeps are skipped while one is running', async () => {
  const { service } = await createTestService();
  const first = service.retention.sweep(new Date(NOW));
  const second = await service.retention.sweep(new Date(NOW));
  assert.equal(second.status, 'skipped');
  assert.equal(second.message, 'a retention sweep is already running');
  assert.equal((await first).status, 'skipped');
  await service.close();
});

test('the inline scheduler runs sweeps on its timer until stopped', async () => {
  const triggers: RetentionTrigger[] = [];
  const scheduler = new RetentionScheduler({
    enforcer: {
      sweep: async (now: Date = new Date(), trigger: RetentionTrigger = 'manual'): Promise<RetentionReport> => {
        triggers.push(trigger);
        return {
          status: 'skipped',
          trigger,
          runAt: now.toISOString(),
          cutoff: now.toISOString(),
          entityCutoff: null,
          droppedChunks: [],
          failedChunks: [],
          rollupsDeleted: 0,
          rollupsRecomputed: 0,
          alertsPurged: 0,
          anomaliesPurged: 0,
          durationMs: 0
        };
      }
    },
    config: buildTestConfig({ TELEMETRY_LIFECYCLE_ENABLED: 'true', TELEMETRY_LIFECYCLE_JITTER_SECONDS: '0' }),
    logger: createSilentLogger(),
    now: fixedClock(NOW)
  });

  await scheduler.start();
  assert.equal(scheduler.isRunning(), true);
  const deadline = Date.now() + 1_000;
  while (triggers.length === 0 && Date.now() < deadline) {
    await delay(5);
  }
  await scheduler.stop();

  assert.deepEqual(triggers, ['schedule']);
  assert.equal(scheduler.isRunning(), false);
});
