import assert from 'node:assert/strict';
import { test } from 'node:test';
import { chunkFor, floorToInterval, formatChunkId, HOUR_MS, overlaps } from '../src/telemetry/chunks';

test('chunk ids encode the UTC start minute', () => {
  assert.equal(formatChunkId(Date.parse('2026-03-04T05:00:00.000Z')), 'readings_202603040500');
  assert.equal(formatChunkId(Date.parse('2026-12-31T23:45:00.000Z')), 'readings_202612312345');
});

test('chunkFor covers the hour containing the timestamp', () => {
  const chunk = chunkFor(Date.parse('2026-03-04T05:59:59.999Z'), HOUR_MS);
  assert.deepEqual(chunk, {
    id: 'readings_202603040500',
    rangeStart: '2026-03-04T05:00:00.000Z',
    rangeEnd: '2026-03-04T06:00:00.000Z'
  });

  const boundary = chunkFor(Date.parse('2026-03-04T06:00:00.000Z'), HOUR_MS);
  assert.equal(boundary.id, 'readings_202603040600');
});

test('custom intervals floor to their own boundaries', () => {
  const quarterHour = 15 * 60 * 1000;
  assert.equal(
    floorToInterval(Date.parse('2026-03-04T05:44:10.000Z'), quarterHour),
    Date.parse('2026-03-04T05:30:00.000Z')
  );
  assert.equal(chunkFor(Date.parse('2026-03-04T05:44:10.000Z'), quarterHour).rangeEnd, '2026-03-04T05:45:00.000Z');
});

test('overlaps treats ranges as half-open', () => {
  assert.equal(overlaps(0, 10, 10, 20), false);
  assert.equal(overlaps(0, 10, 9, 20), true);
  assert.equal(overlaps(10, 20, 0, 10), false);
});
