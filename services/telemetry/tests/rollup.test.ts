import assert from 'node:assert/strict';
import { test } from 'node:test';
import { computeRollup } from '../src/rollup/compute';
import { bucketStartFor, resolveThresholds } from '../src/rollup/engine';
import type { ReadingRecord } from '../src/telemetry/types';
import { createTestService, fixedClock, seedTenant } from './testEnv';

function reading(id: number, timestamp: string, values: Partial<ReadingRecord> = {}): ReadingRecord {
  return {
    id,
    machineId: 'M1',
    clientId: 'C1',
    sensorType: 'multi_sensor',
    timestamp,
    temperature: null,
    vibration: null,
    power: null,
    pressure: null,
    speed: null,
    efficiency: null,
    customFields: {},
    rawData: null,
    createdAt: timestamp,
    updatedAt: timestamp,
    ...values
  };
}

test('computeRollup uses the sample standard deviation and strict threshold comparisons', () => {
  const aggregate = computeRollup(
    [
      reading(3, '2026-06-01T10:40:00.000Z', { temperature: 90, vibration: 5 }),
      reading(1, '2026-06-01T10:00:00.000Z', { temperature: 70, vibration: 6.5 }),
      reading(2, '2026-06-01T10:20:00.000Z', { temperature: 80, power: 12 })
    ],
    { highTemperature: 80, highVibration: 5 }
  );

  assert.equal(aggregate.readingCount, 3);
  assert.equal(aggregate.avgTemperature, 80);
  assert.equal(aggregate.minTemperature, 70);
  assert.equal(aggregate.maxTemperature, 90);
  assert.equal(aggregate.temperatureStddev, 10);
  assert.equal(aggregate.highTemperatureCount, 1);
  assert.equal(aggregate.highVibrationCount, 1);
  assert.equal(aggregate.maxVibration, 6.5);
  assert.equal(aggregate.avgPower, 12);
  assert.equal(aggregate.powerStddev, null);
});

test('computeRollup yields nulls for fields without samples', () => {
  const aggregate = computeRollup([reading(1, '2026-06-01T10:00:00.000Z')], {
    highTemperature: 80,
    highVibration: 5
  });
  assert.equal(aggregate.readingCount, 1);
  assert.equal(aggregate.avgTemperature, null);
  assert.equal(aggregate.maxVibration, null);
  assert.equal(aggregate.highTemperatureCount, 0);
});

test('bucket starts floor to the hour and the UTC day', () => {
  const ts = Date.parse('2026-06-01T10:42:00.000Z');
  assert.equal(new Date(bucketStartFor('hourly', ts)).toISOString(), '2026-06-01T10:00:00.000Z');
  assert.equal(new Date(bucketStartFor('daily', ts)).toISOString(), '2026-06-01T00:00:00.000Z');
});

test('machine thresholds override the defaults field by field', () => {
  assert.deepEqual(resolveThresholds({ highTemperature: 80, highVibration: 5 }, { thresholds: { highVibration: 3 } }), {
    highTemperature: 80,
    highVibration: 3
  });
  assert.deepEqual(resolveThresholds({ highTemperature: 80, highVibration: 5 }, { thresholds: null }), {
    highTemperature: 80,
    highVibration: 5
  });
});

test('appends refresh the hourly and daily rollups of their buckets', async () => {
  const { service } = await createTestService({ now: fixedClock('2026-06-02T00:00:00.000Z') });
  await seedTenant(service, 'C1', ['M1']);

  await service.store.append({ machineId: 'M1', clientId: 'C1', timestamp: '2026-06-01T10:05:00.000Z', vibration: 6.2 });
  await service.store.append({ machineId: 'M1', clientId: 'C1', timestamp: '2026-06-01T10:35:00.000Z', vibration: 1 });
  await service.store.append({ machineId: 'M1', clientId: 'C1', timestamp: '2026-06-01T14:00:00.000Z', vibration: 2 });
  await service.refresh.settle();

  const hourly = await service.rollups.get('hourly', 'M1', new Date('2026-06-01T10:59:00.000Z'));
  assert.ok(hourly);
  assert.equal(hourly.bucketStart, '2026-06-01T10:00:00.000Z');
  assert.equal(hourly.bucketEnd, '2026-06-01T11:00:00.000Z');
  assert.equal(hourly.clientId, 'C1');
  assert.equal(hourly.readingCount, 2);
  assert.equal(hourly.maxVibration, 6.2);
  assert.equal(hourly.highVibrationCount, 1);
  assert.equal(hourly.computedAt, '2026-06-02T00:00:00.000Z');

  const daily = await service.rollups.query({
    machineId: 'M1',
    granularity: 'daily',
    from: '2026-06-01T00:00:00.000Z',
    to: '2026-06-02T00:00:00.000Z'
  });
  assert.equal(daily.length, 1);
  assert.equal(daily[0].readingCount, 3);
  assert.equal(daily[0].highVibrationCount, 1);

  const hours = await service.rollups.query({
    machineId: 'M1',
    granularity: 'hourly',
    from: '2026-06-01T00:00:00.000Z',
    to: '2026-06-02T00:00:00.000Z'
  });
  assert.deepEqual(
    hours.map((record) => [record.bucketStart, record.readingCount]),
    [
      ['2026-06-01T10:00:00.000Z', 2],
      ['2026-06-01T14:00:00.000Z', 1]
    ]
  );

  const otherClient = await service.rollups.query({
    machineId: 'M1',
    clientId: 'C2',
    granularity: 'hourly',
    from: '2026-06-01T00:00:00.000Z',
    to: '2026-06-02T00:00:00.000Z'
  });
  assert.deepEqual(otherClient, []);

  await service.close();
});

test('recompute is idempotent and removes buckets that lost their readings', async () => {
  const { service } = await createTestService({ now: fixedClock('2026-06-02T00:00:00.000Z') });
  await seedTenant(service, 'C1', ['M1']);
  await service.store.append({ machineId: 'M1', clientId: 'C1', timestamp: '2026-06-01T10:05:00.000Z', temperature: 70 });
  await service.store.append({ machineId: 'M1', clientId: 'C1', timestamp: '2026-06-01T10:06:00.000Z', temperature: 90 });
  await service.refresh.settle();

  const key = { granularity: 'hourly' as const, machineId: 'M1', bucketStart: '2026-06-01T10:30:00.000Z' };
  const first = await service.rollups.recompute(key);
  const second = await service.rollups.recompute(key);
  assert.equal(first.status, 'published');
  assert.deepEqual(second, first);
  if (first.status === 'published') {
    assert.equal(first.record.bucketStart, '2026-06-01T10:00:00.000Z');
    assert.equal(first.record.avgTemperature, 80);
    assert.equal(first.record.highTemperatureCount, 1);
  }

  assert.equal(await service.storage.telemetry.dropChunk('readings_202606011000'), true);
  const removed = await service.rollups.recompute(key);
  assert.deepEqual(removed, {
    status: 'removed',
    granularity: 'hourly',
    machineId: 'M1',
    bucketStart: '2026-06-01T10:00:00.000Z'
  });
  assert.equal(await service.rollups.get('hourly', 'M1', new Date('2026-06-01T10:00:00.000Z')), null);

  await service.close();
});

test('per-machine thresholds apply on the next recompute', async () => {
  const { service } = await createTestService();
  await seedTenant(service, 'C1', ['M1']);
  await service.store.append({ machineId: 'M1', clientId: 'C1', timestamp: '2026-06-01T10:05:00.000Z', temperature: 78 });
  await service.refresh.settle();

  const key = { granularity: 'hourly' as const, machineId: 'M1', bucketStart: '2026-06-01T10:00:00.000Z' };
  const before = await service.rollups.recompute(key);
  assert.equal(before.status === 'published' && before.record.highTemperatureCount, 0);

  await service.tenants.updateMachine('M1', { thresholds: { highTemperature: 75 } });
  const after = await service.rollups.recompute(key);
  assert.equal(after.status === 'published' && after.record.highTemperatureCount, 1);

  await service.close();
});

test('rollup input is validated', async () => {
  const { service } = await createTestService();
  await assert.rejects(
    service.rollups.recompute({ granularity: 'hourly', machineId: '', bucketStart: '2026-06-01T10:00:00Z' }),
    { code: 'validation_failed' }
  );
  await assert.rejects(
    service.rollups.query({
      machineId: 'M1',
      granularity: 'daily',
      from: '2026-06-02T00:00:00Z',
      to: '2026-06-01T00:00:00Z'
    }),
    { code: 'validation_failed' }
  );
  await service.close();
});
