import type { RollupGranularity, RollupKey, RollupListQuery, RollupRecord } from '../../rollup/types';
import type { RollupRepository } from '../types';

function bucketKey(key: Pick<RollupKey, 'granularity' | 'bucketStart'>): string {
  return `${key.granularity}:${key.bucketStart}`;
}

/** Records are grouped by machine, mirroring the (machine_id, bucket) index of the Postgres table. */
export class MemoryRollupRepository implements RollupRepository {
  private readonly machines = new Map<string, Map<string, Readonly<RollupRecord>>>();

  async publish(record: RollupRecord): Promise<void> {
    let buckets = this.machines.get(record.machineId);
    if (!buckets) {
      buckets = new Map();
      this.machines.set(record.machineId, buckets);
    }
    // Readers holding the previous object keep a consistent snapshot.
    buckets.set(bucketKey(record), Object.freeze({ ...record }));
  }

  async remove(key: RollupKey): Promise<boolean> {
    const buckets = this.machines.get(key.machineId);
    if (!buckets || !buckets.delete(bucketKey(key))) {
      return false;
    }
    if (buckets.size === 0) {
      this.machines.delete(key.machineId);
    }
    return true;
  }

  async get(key: RollupKey): Promise<RollupRecord | null> {
    const record = this.machines.get(key.machineId)?.get(bucketKey(key));
    return record ? { ...record } : null;
  }

  async list(query: RollupListQuery): Promise<RollupRecord[]> {
    const buckets = this.machines.get(query.machineId);
    if (!buckets) {
      return [];
    }
    const fromMs = query.from.getTime();
    const toMs = query.to.getTime();
    const results: RollupRecord[] = [];
    for (const record of buckets.values()) {
      if (record.granularity !== query.granularity) {
        continue;
      }
      const startMs = Date.parse(record.bucketStart);
      if (startMs >= fromMs && startMs < toMs) {
        results.push({ ...record });
      }
    }
    return results.sort((a, b) => Date.parse(a.bucketStart) - Date.parse(b.bucketStart));
  }

  async listBefore(granularity: RollupGranularity, cutoff: Date): Promise<RollupRecord[]> {
    const cutoffMs = cutoff.getTime();
    const results: RollupRecord[] = [];
    for (const buckets of this.machines.values()) {
      for (const record of buckets.values()) {
        if (record.granularity === granularity && Date.parse(record.bucketStart) < cutoffMs) {
          results.push({ ...record });
        }
      }
    }
    return results;
  }
}
