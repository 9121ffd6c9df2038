import { performance } from 'node:perf_hooks';
import { z } from 'zod';
import { jsonValueSchema } from '@plantsight/event-bus';
import type { ServiceConfig } from '../config/serviceConfig';
import { ValidationError, isTelemetryError } from '../errors';
import type { WriteNotificationStream } from '../events/writeStream';
import type { Logger } from '../logger';
import { observeAppend } from '../observability/metrics';
import type { TelemetryRepository } from '../storage/types';
import type { TenantRegistry } from '../tenancy/registry';
import {
  identifierSchema,
  jsonObjectSchema,
  optionalNumberSchema,
  parseWith,
  timestampSchema
} from '../validation';
import { HOUR_MS, chunkFor, floorToInterval } from './chunks';
import type { ChunkRecord, ReadingRecord, ReadingScope } from './types';

const readingInputSchema = z
  .object({
    machineId: identifierSchema,
    clientId: identifierSchema,
    sensorType: z.string().trim().min(1).max(50).default('multi_sensor'),
    timestamp: timestampSchema,
    temperature: optionalNumberSchema,
    vibration: optionalNumberSchema,
    power: optionalNumberSchema,
    pressure: optionalNumberSchema,
    speed: optionalNumberSchema,
    efficiency: optionalNumberSchema,
    customFields: jsonObjectSchema.default({}),
    rawData: jsonValueSchema.nullable().optional()
  })
  .strict();

const readingQuerySchema = z
  .object({
    machineId: identifierSchema.optional(),
    clientId: identifierSchema.optional(),
    from: timestampSchema,
    to: timestampSchema,
    sensorType: z.string().trim().min(1).optional(),
    limit: z.number().int().positive().optional()
  })
  .strict()
  .superRefine((value, ctx) => {
    if ((value.machineId === undefined) === (value.clientId === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'exactly one of machineId or clientId is required'
      });
    }
    if (value.from.getTime() >= value.to.getTime()) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'from must be before to', path: ['from'] });
    }
  });

export type ReadingInput = z.input<typeof readingInputSchema>;
export type ReadingQueryInput = z.input<typeof readingQuerySchema>;

export interface TelemetryStoreOptions {
  repository: TelemetryRepository;
  tenants: TenantRegistry;
  stream: WriteNotificationStream;
  config: Pick<ServiceConfig, 'chunks' | 'ingestion' | 'query'>;
  logger: Logger;
  now?: () => Date;
}

export class TelemetryStore {
  private readonly repository: TelemetryRepository;
  private readonly tenants: TenantRegistry;
  private readonly stream: WriteNotificationStream;
  private readonly config: TelemetryStoreOptions['config'];
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: TelemetryStoreOptions) {
    this.repository = options.repository;
    this.tenants = options.tenants;
    this.stream = options.stream;
    this.config = options.config;
    this.logger = options.logger.child({ component: 'telemetry-store' });
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Validates and persists one reading into the chunk covering its timestamp, then emits exactly
   * one write event. Rejected input leaves no trace in storage or on the stream.
   */
  async append(input: ReadingInput): Promise<ReadingRecord> {
    const started = performance.now();
    try {
      const parsed = parseWith(readingInputSchema, input, 'invalid reading');
      const { min, max } = this.config.ingestion.temperatureRange;
      if (parsed.temperature !== undefined && parsed.temperature !== null) {
        if (parsed.temperature < min || parsed.temperature > max) {
          throw new ValidationError(
            `temperature ${parsed.temperature} is outside the plausible range ${min}..${max}`,
            'out_of_range',
            { field: 'temperature', value: parsed.temperature, min, max }
          );
        }
      }
      await this.tenants.assertMachineOwnership(parsed.clientId, parsed.machineId);

      const timestampMs = parsed.timestamp.getTime();
      const createdAt = this.now().toISOString();
      const record = await this.repository.insertReading(chunkFor(timestampMs, this.config.chunks.intervalMs), {
        machineId: parsed.machineId,
        clientId: parsed.clientId,
        sensorType: parsed.sensorType,
        timestamp: parsed.timestamp.toISOString(),
        temperature: parsed.temperature ?? null,
        vibration: parsed.vibration ?? null,
        power: parsed.power ?? null,
        pressure: parsed.pressure ?? null,
        speed: parsed.speed ?? null,
        efficiency: parsed.efficiency ?? null,
        customFields: parsed.customFields,
        rawData: parsed.rawData ?? null,
        createdAt,
        updatedAt: createdAt
      });

      this.stream.emit({
        machineId: record.machineId,
        clientId: record.clientId,
        readingId: record.id,
        sensorType: record.sensorType,
        timestamp: record.timestamp,
        bucketHour: new Date(floorToInterval(timestampMs, HOUR_MS)).toISOString(),
        occurredAt: createdAt
      });

      observeAppend({ result: 'success', durationSeconds: (performance.now() - started) / 1000 });
      return record;
    } catch (err) {
      const rejected = isTelemetryError(err, 'validation');
      observeAppend({ result: rejected ? 'rejected' : 'failure' });
      if (!rejected) {
        this.logger.error({ err }, 'telemetry append failed');
      }
      throw err;
    }
  }

  /** Readings with `from <= timestamp < to`, newest first. */
  async query(input: ReadingQueryInput): Promise<ReadingRecord[]> {
    const parsed = parseWith(readingQuerySchema, input, 'invalid reading query');
    const scope = this.resolveScope(parsed.machineId, parsed.clientId);
    const limit = Math.min(parsed.limit ?? this.config.query.defaultLimit, this.config.query.maxLimit);
    return this.repository.queryReadings({
      scope,
      from: parsed.from,
      to: parsed.to,
      sensorType: parsed.sensorType,
      limit
    });
  }

  /** The most recent reading of each machine owned by the client, newest first. */
  async latestByClient(clientId: string): Promise<ReadingRecord[]> {
    await this.tenants.getClient(clientId);
    return this.repository.latestByClient(clientId);
  }

  async listChunks(): Promise<ChunkRecord[]> {
    return this.repository.listChunks();
  }

  private resolveScope(machineId: string | undefined, clientId: string | undefined): ReadingScope {
    if (machineId !== undefined) {
      return { machineId };
    }
    if (clientId !== undefined) {
      return { clientId };
    }
    throw new ValidationError('exactly one of machineId or clientId is required');
  }
}
