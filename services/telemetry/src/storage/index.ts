import type { ServiceConfig } from '../config/serviceConfig';
import type { Logger } from '../logger';
import { createMemoryStorage } from './memory';
import { createPostgresStorage } from './postgres';
import type { Storage } from './types';

export async function createStorage(
  config: Pick<ServiceConfig, 'storage' | 'database'>,
  logger: Logger
): Promise<Storage> {
  if (config.storage.driver === 'memory') {
    logger.info('using in-memory telemetry storage');
    return createMemoryStorage();
  }
  const storage = createPostgresStorage({ config, logger });
  try {
    await storage.database.ensureSchemaReady();
  } catch (err) {
    await storage.close();
    throw err;
  }
  logger.info({ schema: config.database.schema }, 'postgres telemetry storage ready');
  return storage;
}

export { createMemoryStorage } from './memory';
export { createPostgresStorage } from './postgres';
export type {
  AlertRepository,
  AnomalyRepository,
  ModelRepository,
  RollupRepository,
  Storage,
  StorageKind,
  TelemetryRepository,
  TenantRepository
} from './types';
