import type { ChunkDescriptor } from './types';

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

export function floorToInterval(timestampMs: number, intervalMs: number): number {
  return Math.floor(timestampMs / intervalMs) * intervalMs;
}

export function formatChunkId(rangeStartMs: number): string {
  const date = new Date(rangeStartMs);
  return (
    'readings_' +
    pad(date.getUTCFullYear(), 4) +
    pad(date.getUTCMonth() + 1) +
    pad(date.getUTCDate()) +
    pad(date.getUTCHours()) +
    pad(date.getUTCMinutes())
  );
}

/** The chunk covering `timestampMs`: `[floor(ts / interval) * interval, + interval)` in UTC. */
export function chunkFor(timestampMs: number, intervalMs: number): ChunkDescriptor {
  const start = floorToInterval(timestampMs, intervalMs);
  return {
    id: formatChunkId(start),
    rangeStart: new Date(start).toISOString(),
    rangeEnd: new Date(start + intervalMs).toISOString()
  };
}

export function overlaps(rangeStartMs: number, rangeEndMs: number, fromMs: number, toMs: number): boolean {
  return rangeStartMs < toMs && rangeEndMs > fromMs;
}
