export { buildServiceConfig, loadServiceConfig, resetCachedServiceConfig } from './config/serviceConfig';
export type { ServiceConfig, StorageDriver, ThresholdPolicy } from './config/serviceConfig';
export { createLogger, createSilentLogger } from './logger';
export type { Logger } from './logger';
export {
  ConflictError,
  NotFoundError,
  TelemetryError,
  TransientError,
  ValidationError,
  isTelemetryError,
  toTelemetryError
} from './errors';
export type { TelemetryErrorKind } from './errors';
export { createTelemetryService } from './service';
export type { TelemetryService, TelemetryServiceOptions } from './service';
export { TenantRegistry } from './tenancy/registry';
export type { ClientInput, MachineInput, UserInput } from './tenancy/registry';
export { TelemetryStore } from './telemetry/store';
export type { ReadingInput, ReadingQueryInput } from './telemetry/store';
export { chunkFor, formatChunkId } from './telemetry/chunks';
export { RollupEngine } from './rollup/engine';
export { computeRollup } from './rollup/compute';
export { RefreshCoordinator } from './refresh/coordinator';
export type { RefreshStats } from './refresh/coordinator';
export { RetentionEnforcer } from './lifecycle/retention';
export { RetentionScheduler } from './lifecycle/scheduler';
export type { RetentionReport } from './lifecycle/types';
export { AnomalyService } from './entities/anomalies';
export { AlertService } from './entities/alerts';
export { ModelRegistry } from './entities/models';
export { WriteNotificationStream, formatWriteEventFrame, formatWriteStreamComment } from './events/writeStream';
export type { WriteEvent, WriteStreamFilter } from './events/writeStream';
export { TelemetryEventPublisher } from './events/publisher';
export type { TelemetryEventType } from './events/publisher';
export { createMemoryStorage, createPostgresStorage, createStorage } from './storage';
export type { Storage } from './storage';
export { renderMetrics, setupMetrics } from './observability/metrics';
export type * from './tenancy/types';
export type * from './telemetry/types';
export type * from './rollup/types';
export type * from './entities/types';
