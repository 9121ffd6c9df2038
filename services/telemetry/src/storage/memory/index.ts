import type { Storage } from '../types';
import { MemoryAlertRepository, MemoryAnomalyRepository, MemoryModelRepository } from './entities';
import { MemoryRollupRepository } from './rollups';
import { MemoryTelemetryRepository } from './telemetry';
import { MemoryTenantRepository } from './tenants';

export function createMemoryStorage(): Storage {
  const alerts = new MemoryAlertRepository();
  return {
    kind: 'memory',
    tenants: new MemoryTenantRepository(),
    telemetry: new MemoryTelemetryRepository(),
    rollups: new MemoryRollupRepository(),
    anomalies: new MemoryAnomalyRepository(alerts),
    alerts,
    models: new MemoryModelRepository(),
    close: async () => {}
  } satisfies Storage;
}

export {
  MemoryAlertRepository,
  MemoryAnomalyRepository,
  MemoryModelRepository,
  MemoryRollupRepository,
  MemoryTelemetryRepository,
  MemoryTenantRepository
};
