import { overlaps } from '../../telemetry/chunks';
import type {
  ChunkDescriptor,
  ChunkRecord,
  NewReading,
  ReadingQuery,
  ReadingRecord
} from '../../telemetry/types';
import type { TelemetryRepository } from '../types';

interface StoredReading {
  timestampMs: number;
  record: ReadingRecord;
}

interface MemoryChunk {
  descriptor: ChunkDescriptor;
  rangeStartMs: number;
  rangeEndMs: number;
  rows: number;
  byMachine: Map<string, StoredReading[]>;
  byClient: Map<string, StoredReading[]>;
}

function newestFirst(a: StoredReading, b: StoredReading): number {
  return b.timestampMs - a.timestampMs || b.record.id - a.record.id;
}

function oldestFirst(a: StoredReading, b: StoredReading): number {
  return a.timestampMs - b.timestampMs || a.record.id - b.record.id;
}

function appendToIndex(index: Map<string, StoredReading[]>, key: string, entry: StoredReading): void {
  const bucket = index.get(key);
  if (bucket) {
    bucket.push(entry);
  } else {
    index.set(key, [entry]);
  }
}

export class MemoryTelemetryRepository implements TelemetryRepository {
  private readonly chunks = new Map<string, MemoryChunk>();
  private nextId = 1;

  async insertReading(chunk: ChunkDescriptor, reading: NewReading): Promise<ReadingRecord> {
    const target = this.ensureChunk(chunk);
    const record: ReadingRecord = { ...structuredClone(reading), id: this.nextId };
    this.nextId += 1;
    const entry: StoredReading = { timestampMs: Date.parse(record.timestamp), record };
    appendToIndex(target.byMachine, record.machineId, entry);
    appendToIndex(target.byClient, record.clientId, entry);
    target.rows += 1;
    return structuredClone(record);
  }

  async queryReadings(query: ReadingQuery): Promise<ReadingRecord[]> {
    const fromMs = query.from.getTime();
    const toMs = query.to.getTime();
    const results: StoredReading[] = [];

    for (const chunk of this.chunksInRange(fromMs, toMs).reverse()) {
      const index = query.scope.machineId !== undefined
        ? chunk.byMachine.get(query.scope.machineId)
        : chunk.byClient.get(query.scope.clientId);
      if (!index) {
        continue;
      }
      for (const entry of index) {
        if (entry.timestampMs < fromMs || entry.timestampMs >= toMs) {
          continue;
        }
        if (query.sensorType && entry.record.sensorType !== query.sensorType) {
          continue;
        }
        results.push(entry);
      }
      // Older chunks cannot hold anything newer than what is already collected.
      if (results.length >= query.limit) {
        break;
      }
    }

    return results
      .sort(newestFirst)
      .slice(0, query.limit)
      .map((entry) => structuredClone(entry.record));
  }

  async readRange(machineId: string, from: Date, to: Date): Promise<ReadingRecord[]> {
    const fromMs = from.getTime();
    const toMs = to.getTime();
    const results: StoredReading[] = [];
    for (const chunk of this.chunksInRange(fromMs, toMs)) {
      for (const entry of chunk.byMachine.get(machineId) ?? []) {
        if (entry.timestampMs >= fromMs && entry.timestampMs < toMs) {
          results.push(entry);
        }
      }
    }
    return results.sort(oldestFirst).map((entry) => structuredClone(entry.record));
  }

  async latestByClient(clientId: string): Promise<ReadingRecord[]> {
    const latest = new Map<string, StoredReading>();
    for (const chunk of this.chunks.values()) {
      for (const entry of chunk.byClient.get(clientId) ?? []) {
        const current = latest.get(entry.record.machineId);
        if (!current || newestFirst(entry, current) < 0) {
          latest.set(entry.record.machineId, entry);
        }
      }
    }
    return Array.from(latest.values())
      .sort(newestFirst)
      .map((entry) => structuredClone(entry.record));
  }

  async listChunks(): Promise<ChunkRecord[]> {
    return this.sortedChunks().map((chunk) => ({ ...chunk.descriptor, rowCount: chunk.rows }));
  }

  async dropChunk(chunkId: string): Promise<boolean> {
    return this.chunks.delete(chunkId);
  }

  private ensureChunk(descriptor: ChunkDescriptor): MemoryChunk {
    const existing = this.chunks.get(descriptor.id);
    if (existing) {
      return existing;
    }
    const created: MemoryChunk = {
      descriptor: { ...descriptor },
      rangeStartMs: Date.parse(descriptor.rangeStart),
      rangeEndMs: Date.parse(descriptor.rangeEnd),
      rows: 0,
      byMachine: new Map(),
      byClient: new Map()
    };
    this.chunks.set(descriptor.id, created);
    return created;
  }

  private sortedChunks(): MemoryChunk[] {
    return Array.from(this.chunks.values()).sort((a, b) => a.rangeStartMs - b.rangeStartMs);
  }

  private chunksInRange(fromMs: number, toMs: number): MemoryChunk[] {
    return this.sortedChunks().filter((chunk) => overlaps(chunk.rangeStartMs, chunk.rangeEndMs, fromMs, toMs));
  }
}
