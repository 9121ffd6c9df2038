import {
  ALERT_FLAGS,
  TERMINAL_ANOMALY_STATUSES,
  type AlertGuard,
  type AlertListFilter,
  type AlertPatch,
  type AlertRecord,
  type AnomalyListFilter,
  type AnomalyRecord,
  type AnomalyStatus,
  type AnomalyTransitionPatch,
  type ModelListFilter,
  type ModelRecord,
  type NewAlert,
  type NewAnomaly,
  type NewModel
} from '../../entities/types';
import type { AlertRepository, AnomalyRepository, ModelRepository } from '../types';

interface TimeScoped {
  id: number;
  clientId: string;
  machineId: string;
  timestamp: string;
}

function matchesScope(
  record: TimeScoped,
  filter: { clientId?: string; machineId?: string; from?: Date; to?: Date }
): boolean {
  if (filter.clientId && record.clientId !== filter.clientId) {
    return false;
  }
  if (filter.machineId && record.machineId !== filter.machineId) {
    return false;
  }
  const timestampMs = Date.parse(record.timestamp);
  if (filter.from && timestampMs < filter.from.getTime()) {
    return false;
  }
  if (filter.to && timestampMs >= filter.to.getTime()) {
    return false;
  }
  return true;
}

function newestFirst(a: TimeScoped, b: TimeScoped): number {
  return Date.parse(b.timestamp) - Date.parse(a.timestamp) || b.id - a.id;
}

function applyLimit<T>(records: T[], limit: number | undefined): T[] {
  return limit === undefined ? records : records.slice(0, limit);
}

export class MemoryAlertRepository implements AlertRepository {
  private readonly records = new Map<number, AlertRecord>();
  private nextId = 1;

  async insert(record: NewAlert): Promise<AlertRecord> {
    const stored: AlertRecord = { ...structuredClone(record), id: this.nextId };
    this.nextId += 1;
    this.records.set(stored.id, stored);
    return structuredClone(stored);
  }

  async get(id: number): Promise<AlertRecord | null> {
    const record = this.records.get(id);
    return record ? structuredClone(record) : null;
  }

  async list(filter: AlertListFilter): Promise<AlertRecord[]> {
    const matches = Array.from(this.records.values())
      .filter((record) => matchesScope(record, filter))
      .filter((record) => !filter.severity || record.severity === filter.severity)
      .filter((record) => !filter.unresolvedOnly || !record.resolved)
      .sort(newestFirst);
    return applyLimit(matches, filter.limit).map((record) => structuredClone(record));
  }

  async updateIf(id: number, guard: AlertGuard, patch: AlertPatch): Promise<AlertRecord | null> {
    const existing = this.records.get(id);
    if (!existing) {
      return null;
    }
    for (const flag of ALERT_FLAGS) {
      if (guard[flag] === false && existing[flag]) {
        return null;
      }
    }
    const next: AlertRecord = { ...existing, ...patch };
    this.records.set(id, next);
    return structuredClone(next);
  }

  async purge(cutoff: Date): Promise<number> {
    const cutoffMs = cutoff.getTime();
    let removed = 0;
    for (const [id, record] of this.records) {
      if (record.resolved && Date.parse(record.timestamp) < cutoffMs) {
        this.records.delete(id);
        removed += 1;
      }
    }
    return removed;
  }

  referencesAnomaly(anomalyId: number): boolean {
    for (const record of this.records.values()) {
      if (record.relatedAnomalyId === anomalyId) {
        return true;
      }
    }
    return false;
  }
}

export class MemoryAnomalyRepository implements AnomalyRepository {
  private readonly records = new Map<number, AnomalyRecord>();
  private nextId = 1;

  constructor(private readonly alerts: MemoryAlertRepository) {}

  async insert(record: NewAnomaly): Promise<AnomalyRecord> {
    const stored: AnomalyRecord = { ...structuredClone(record), id: this.nextId };
    this.nextId += 1;
    this.records.set(stored.id, stored);
    return structuredClone(stored);
  }

  async get(id: number): Promise<AnomalyRecord | null> {
    const record = this.records.get(id);
    return record ? structuredClone(record) : null;
  }

  async list(filter: AnomalyListFilter): Promise<AnomalyRecord[]> {
    const matches = Array.from(this.records.values())
      .filter((record) => matchesScope(record, filter))
      .filter((record) => !filter.status || record.status === filter.status)
      .filter((record) => !filter.severity || record.severity === filter.severity)
      .sort(newestFirst);
    return applyLimit(matches, filter.limit).map((record) => structuredClone(record));
  }

  async transition(
    id: number,
    expected: AnomalyStatus,
    patch: AnomalyTransitionPatch
  ): Promise<AnomalyRecord | null> {
    const existing = this.records.get(id);
    if (!existing || existing.status !== expected) {
      return null;
    }
    const next: AnomalyRecord = { ...existing, ...patch };
    this.records.set(id, next);
    return structuredClone(next);
  }

  async purge(cutoff: Date): Promise<number> {
    const cutoffMs = cutoff.getTime();
    let removed = 0;
    for (const [id, record] of this.records) {
      if (
        TERMINAL_ANOMALY_STATUSES.includes(record.status) &&
        Date.parse(record.timestamp) < cutoffMs &&
        !this.alerts.referencesAnomaly(id)
      ) {
        this.records.delete(id);
        removed += 1;
      }
    }
    return removed;
  }
}

export class MemoryModelRepository implements ModelRepository {
  private readonly records = new Map<number, ModelRecord>();
  private nextId = 1;

  async insert(record: NewModel): Promise<ModelRecord> {
    if (record.isActive) {
      this.deactivateOthers(record.machineId, record.modelType, null);
    }
    const stored: ModelRecord = { ...structuredClone(record), id: this.nextId };
    this.nextId += 1;
    this.records.set(stored.id, stored);
    return structuredClone(stored);
  }

  async activate(id: number, deployedAt: string): Promise<ModelRecord | null> {
    const existing = this.records.get(id);
    if (!existing) {
      return null;
    }
    this.deactivateOthers(existing.machineId, existing.modelType, id);
    const next: ModelRecord = { ...existing, isActive: true, deployedAt };
    this.records.set(id, next);
    return structuredClone(next);
  }

  async deactivate(id: number): Promise<ModelRecord | null> {
    const existing = this.records.get(id);
    if (!existing) {
      return null;
    }
    const next: ModelRecord = { ...existing, isActive: false };
    this.records.set(id, next);
    return structuredClone(next);
  }

  async get(id: number): Promise<ModelRecord | null> {
    const record = this.records.get(id);
    return record ? structuredClone(record) : null;
  }

  async getActive(machineId: string, modelType: string): Promise<ModelRecord | null> {
    for (const record of this.records.values()) {
      if (record.isActive && record.machineId === machineId && record.modelType === modelType) {
        return structuredClone(record);
      }
    }
    return null;
  }

  async list(filter: ModelListFilter): Promise<ModelRecord[]> {
    return Array.from(this.records.values())
      .filter((record) => !filter.clientId || record.clientId === filter.clientId)
      .filter((record) => !filter.machineId || record.machineId === filter.machineId)
      .filter((record) => !filter.modelType || record.modelType === filter.modelType)
      .filter((record) => !filter.activeOnly || record.isActive)
      .sort((a, b) => Date.parse(b.createdAt) - Date.parse(a.createdAt) || b.id - a.id)
      .map((record) => structuredClone(record));
  }

  private deactivateOthers(machineId: string, modelType: string, keepId: number | null): void {
    for (const [id, record] of this.records) {
      if (id !== keepId && record.isActive && record.machineId === machineId && record.modelType === modelType) {
        this.records.set(id, { ...record, isActive: false });
      }
    }
  }
}
