import type { EventPublisherHandle } from '@plantsight/event-bus';
import type { ServiceConfig } from './config/serviceConfig';
import { AlertService } from './entities/alerts';
import { AnomalyService } from './entities/anomalies';
import { ModelRegistry } from './entities/models';
import { TelemetryEventPublisher } from './events/publisher';
import { WriteNotificationStream } from './events/writeStream';
import { RetentionEnforcer } from './lifecycle/retention';
import { RetentionScheduler } from './lifecycle/scheduler';
import { createLogger, type Logger } from './logger';
import { setupMetrics } from './observability/metrics';
import { RefreshCoordinator } from './refresh/coordinator';
import { RollupEngine } from './rollup/engine';
import { createStorage } from './storage';
import type { Storage } from './storage/types';
import { TelemetryStore } from './telemetry/store';
import { TenantRegistry } from './tenancy/registry';

export interface TelemetryServiceOptions {
  config: ServiceConfig;
  logger?: Logger;
  storage?: Storage;
  eventHandle?: EventPublisherHandle;
  now?: () => Date;
  random?: () => number;
}

export interface TelemetryService {
  config: ServiceConfig;
  logger: Logger;
  storage: Storage;
  tenants: TenantRegistry;
  store: TelemetryStore;
  stream: WriteNotificationStream;
  rollups: RollupEngine;
  refresh: RefreshCoordinator;
  retention: RetentionEnforcer;
  scheduler: RetentionScheduler;
  anomalies: AnomalyService;
  alerts: AlertService;
  models: ModelRegistry;
  events: TelemetryEventPublisher;
  start(): Promise<void>;
  close(): Promise<void>;
}

export async function createTelemetryService(options: TelemetryServiceOptions): Promise<TelemetryService> {
  const { config } = options;
  const logger = options.logger ?? createLogger({ level: config.logLevel, name: 'telemetry' });
  setupMetrics(config.observability.metrics);

  const storage = options.storage ?? (await createStorage(config, logger));
  const now = options.now;

  const stream = new WriteNotificationStream(logger);
  const events = new TelemetryEventPublisher({
    source: config.events.source,
    logger,
    handle: options.eventHandle,
    mode: config.inlineMode ? 'inline' : undefined
  });
  const tenants = new TenantRegistry({ repository: storage.tenants, logger, now });
  const store = new TelemetryStore({
    repository: storage.telemetry,
    tenants,
    stream,
    config,
    logger,
    now
  });
  const rollups = new RollupEngine({
    telemetry: storage.telemetry,
    rollups: storage.rollups,
    tenants,
    config,
    logger,
    now
  });
  const refresh = new RefreshCoordinator({ engine: rollups, config, logger, random: options.random });
  refresh.attach(stream);

  const retention = new RetentionEnforcer({ storage, config, events, rollups, refresh, logger });
  const scheduler = new RetentionScheduler({
    enforcer: retention,
    config,
    logger,
    random: options.random,
    now
  });

  const anomalies = new AnomalyService({ repository: storage.anomalies, tenants, events, logger, now });
  const alerts = new AlertService({
    repository: storage.alerts,
    anomalies: storage.anomalies,
    tenants,
    events,
    logger,
    now
  });
  const models = new ModelRegistry({ repository: storage.models, tenants, events, logger, now });

  let started = false;
  let closed = false;

  return {
    config,
    logger,
    storage,
    tenants,
    store,
    stream,
    rollups,
    refresh,
    retention,
    scheduler,
    anomalies,
    alerts,
    models,
    events,
    async start() {
      if (started || closed) {
        return;
      }
      started = true;
      if (config.lifecycle.enabled) {
        await scheduler.start();
      }
      logger.info(
        { storage: storage.kind, inlineMode: config.inlineMode, lifecycle: config.lifecycle.enabled },
        'telemetry service started'
      );
    },
    async close() {
      if (closed) {
        return;
      }
      closed = true;
      await scheduler.stop();
      await refresh.close();
      await events.close();
      await storage.close();
      logger.info('telemetry service closed');
    }
  };
}
