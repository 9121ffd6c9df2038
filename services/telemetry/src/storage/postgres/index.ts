import { createDatabase, type Database } from '../../db/client';
import type { ServiceConfig } from '../../config/serviceConfig';
import type { Logger } from '../../logger';
import type { Storage } from '../types';
import { PostgresAlertRepository, PostgresAnomalyRepository, PostgresModelRepository } from './entities';
import { PostgresRollupRepository } from './rollups';
import { PostgresTelemetryRepository } from './telemetry';
import { PostgresTenantRepository } from './tenants';

export interface PostgresStorageOptions {
  config: Pick<ServiceConfig, 'database'>;
  logger: Logger;
  database?: Database;
}

/** Builds the repositories over a shared pool. Call `ensureSchemaReady` before first use. */
export function createPostgresStorage(options: PostgresStorageOptions): Storage & { database: Database } {
  const database = options.database ?? createDatabase(options.config, options.logger);
  return {
    kind: 'postgres',
    database,
    tenants: new PostgresTenantRepository(database),
    telemetry: new PostgresTelemetryRepository(database, options.logger),
    rollups: new PostgresRollupRepository(database),
    anomalies: new PostgresAnomalyRepository(database),
    alerts: new PostgresAlertRepository(database),
    models: new PostgresModelRepository(database),
    close: () => database.close()
  };
}

export {
  PostgresAlertRepository,
  PostgresAnomalyRepository,
  PostgresModelRepository,
  PostgresRollupRepository,
  PostgresTelemetryRepository,
  PostgresTenantRepository
};
