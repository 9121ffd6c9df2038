import { performance } from 'node:perf_hooks';
import { z } from 'zod';
import type { ServiceConfig, ThresholdPolicy } from '../config/serviceConfig';
import type { Logger } from '../logger';
import { observeRollupRecompute } from '../observability/metrics';
import type { RollupRepository, TelemetryRepository } from '../storage/types';
import { DAY_MS, HOUR_MS, floorToInterval } from '../telemetry/chunks';
import type { TenantRegistry } from '../tenancy/registry';
import type { MachineRecord } from '../tenancy/types';
import { identifierSchema, parseWith, timestampSchema } from '../validation';
import { computeRollup } from './compute';
import type { RollupGranularity, RollupRecord } from './types';

const granularitySchema = z.enum(['hourly', 'daily']);

const recomputeSchema = z
  .object({
    granularity: granularitySchema,
    machineId: identifierSchema,
    bucketStart: timestampSchema
  })
  .strict();

const rollupQuerySchema = z
  .object({
    machineId: identifierSchema,
    granularity: granularitySchema,
    from: timestampSchema,
    to: timestampSchema,
    clientId: identifierSchema.optional()
  })
  .strict()
  .refine((value) => value.from.getTime() < value.to.getTime(), {
    message: 'from must be before to',
    path: ['from']
  });

export type RecomputeInput = z.input<typeof recomputeSchema>;
export type RollupQueryInput = z.input<typeof rollupQuerySchema>;

export type RecomputeOutcome =
  | { status: 'published'; record: RollupRecord }
  | { status: 'removed'; granularity: RollupGranularity; machineId: string; bucketStart: string };

export function bucketSizeMs(granularity: RollupGranularity): number {
  return granularity === 'hourly' ? HOUR_MS : DAY_MS;
}

export function bucketStartFor(granularity: RollupGranularity, timestampMs: number): number {
  return floorToInterval(timestampMs, bucketSizeMs(granularity));
}

export function resolveThresholds(defaults: ThresholdPolicy, machine: Pick<MachineRecord, 'thresholds'>): ThresholdPolicy {
  return {
    highTemperature: machine.thresholds?.highTemperature ?? defaults.highTemperature,
    highVibration: machine.thresholds?.highVibration ?? defaults.highVibration
  };
}

export interface RollupEngineOptions {
  telemetry: TelemetryRepository;
  rollups: RollupRepository;
  tenants: TenantRegistry;
  config: Pick<ServiceConfig, 'rollup'>;
  logger: Logger;
  now?: () => Date;
}

export class RollupEngine {
  private readonly telemetry: TelemetryRepository;
  private readonly rollups: RollupRepository;
  private readonly tenants: TenantRegistry;
  private readonly thresholds: ThresholdPolicy;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: RollupEngineOptions) {
    this.telemetry = options.telemetry;
    this.rollups = options.rollups;
    this.tenants = options.tenants;
    this.thresholds = options.config.rollup.thresholds;
    this.logger = options.logger.child({ component: 'rollup-engine' });
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Rebuilds one bucket from its readings and replaces the stored record in one step. Readers see
   * either the previous record or the new one. An empty bucket removes the record.
   */
  async recompute(input: RecomputeInput): Promise<RecomputeOutcome> {
    const parsed = parseWith(recomputeSchema, input, 'invalid rollup key');
    const { granularity, machineId } = parsed;
    const startMs = bucketStartFor(granularity, parsed.bucketStart.getTime());
    const endMs = startMs + bucketSizeMs(granularity);
    const bucketStart = new Date(startMs).toISOString();
    const started = performance.now();

    try {
      const machine = await this.tenants.getMachine(machineId);
      const readings = await this.telemetry.readRange(machineId, new Date(startMs), new Date(endMs));

      if (readings.length === 0) {
        await this.rollups.remove({ granularity, machineId, bucketStart });
        observeRollupRecompute({
          granularity,
          result: 'removed',
          durationSeconds: (performance.now() - started) / 1000
        });
        return { status: 'removed', granularity, machineId, bucketStart };
      }

      const aggregate = computeRollup(readings, resolveThresholds(this.thresholds, machine));
      const record: RollupRecord = {
        granularity,
        machineId,
        clientId: machine.clientId,
        bucketStart,
        bucketEnd: new Date(endMs).toISOString(),
        ...aggregate,
        computedAt: this.now().toISOString()
      };
      await this.rollups.publish(record);
      observeRollupRecompute({
        granularity,
        result: 'published',
        durationSeconds: (performance.now() - started) / 1000
      });
      this.logger.debug(
        { granularity, machineId, bucketStart, readingCount: record.readingCount },
        'rollup published'
      );
      return { status: 'published', record };
    } catch (err) {
      observeRollupRecompute({ granularity, result: 'failure' });
      throw err;
    }
  }

  /** Records with `from <= bucketStart < to`, oldest bucket first. */
  async query(input: RollupQueryInput): Promise<RollupRecord[]> {
    const parsed = parseWith(rollupQuerySchema, input, 'invalid rollup query');
    const records = await this.rollups.list({
      machineId: parsed.machineId,
      granularity: parsed.granularity,
      from: parsed.from,
      to: parsed.to
    });
    if (parsed.clientId === undefined) {
      return records;
    }
    return records.filter((record) => record.clientId === parsed.clientId);
  }

  async get(granularity: RollupGranularity, machineId: string, bucketStart: Date): Promise<RollupRecord | null> {
    const startMs = bucketStartFor(granularity, bucketStart.getTime());
    return this.rollups.get({ granularity, machineId, bucketStart: new Date(startMs).toISOString() });
  }
}
