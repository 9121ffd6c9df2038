import {
  normalizeEventEnvelope,
  type EventEnvelope,
  type EventPublisherHandle
} from '@plantsight/event-bus';
import { buildServiceConfig, type ServiceConfig } from '../src/config/serviceConfig';
import { createSilentLogger } from '../src/logger';
import { createTelemetryService, type TelemetryService } from '../src/service';
import { createMemoryStorage } from '../src/storage/memory';

export const INLINE_TEST_ENV: NodeJS.ProcessEnv = {
  REDIS_URL: 'inline',
  PLANTSIGHT_ALLOW_INLINE_MODE: 'true',
  TELEMETRY_LOG_LEVEL: 'silent',
  TELEMETRY_METRICS_ENABLED: 'false',
  TELEMETRY_LIFECYCLE_ENABLED: 'false',
  TELEMETRY_REFRESH_DEBOUNCE_MS: '5',
  TELEMETRY_REFRESH_RETRY_BASE_MS: '5',
  TELEMETRY_REFRESH_RETRY_MAX_MS: '20'
};

export function buildTestConfig(overrides: NodeJS.ProcessEnv = {}): ServiceConfig {
  return buildServiceConfig({ ...INLINE_TEST_ENV, ...overrides });
}

export interface RecordingEventHandle {
  handle: EventPublisherHandle;
  events: EventEnvelope[];
  ofType(type: string): EventEnvelope[];
}

export function createRecordingEventHandle(): RecordingEventHandle {
  const events: EventEnvelope[] = [];
  const handle: EventPublisherHandle = {
    publish: async (event) => {
      const envelope = normalizeEventEnvelope(event);
      events.push(envelope);
      return envelope;
    },
    close: async () => {},
    queue: null
  };
  return {
    handle,
    events,
    ofType: (type) => events.filter((event) => event.type === type)
  };
}

export interface TestService {
  service: TelemetryService;
  recorder: RecordingEventHandle;
}

export interface TestServiceOptions {
  env?: NodeJS.ProcessEnv;
  now?: () => Date;
}

export async function createTestService(options: TestServiceOptions = {}): Promise<TestService> {
  const recorder = createRecordingEventHandle();
  const service = await createTelemetryService({
    config: buildTestConfig(options.env),
    logger: createSilentLogger(),
    storage: createMemoryStorage(),
    eventHandle: recorder.handle,
    now: options.now,
    random: () => 0.5
  });
  return { service, recorder };
}

/** Registers client `clientId` with one active machine per id. */
export async function seedTenant(
  service: TelemetryService,
  clientId: string,
  machineIds: string[],
  maxMachines = 25
): Promise<void> {
  await service.tenants.registerClient({ clientId, companyName: `${clientId} Manufacturing`, maxMachines });
  for (const machineId of machineIds) {
    await service.tenants.registerMachine({ machineId, clientId, machineName: `Press ${machineId}` });
  }
}

export function fixedClock(iso: string): () => Date {
  const value = Date.parse(iso);
  return () => new Date(value);
}
