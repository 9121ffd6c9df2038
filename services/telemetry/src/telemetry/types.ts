import type { JsonValue } from '@plantsight/event-bus';
import type { JsonObject } from '../tenancy/types';

export interface ReadingRecord {
  id: number;
  machineId: string;
  clientId: string;
  sensorType: string;
  timestamp: string;
  temperature: number | null;
  vibration: number | null;
  power: number | null;
  pressure: number | null;
  speed: number | null;
  efficiency: number | null;
  customFields: JsonObject;
  rawData: JsonValue | null;
  createdAt: string;
  updatedAt: string;
}

export type NewReading = Omit<ReadingRecord, 'id'>;

export interface ChunkDescriptor {
  id: string;
  rangeStart: string;
  rangeEnd: string;
}

export interface ChunkRecord extends ChunkDescriptor {
  rowCount: number;
}

export type ReadingScope = { machineId: string; clientId?: undefined } | { clientId: string; machineId?: undefined };

export interface ReadingQuery {
  scope: ReadingScope;
  from: Date;
  to: Date;
  sensorType?: string;
  limit: number;
}
