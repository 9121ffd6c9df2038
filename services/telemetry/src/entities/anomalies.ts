import { z } from 'zod';
import { ConflictError, NotFoundError } from '../errors';
import type { TelemetryEventPublisher } from '../events/publisher';
import type { Logger } from '../logger';
import type { AnomalyRepository } from '../storage/types';
import type { TenantRegistry } from '../tenancy/registry';
import {
  identifierSchema,
  jsonObjectSchema,
  parseWith,
  scoreSchema,
  timestampSchema
} from '../validation';
import type { AnomalyRecord, AnomalyStatus, AnomalyTransitionPatch } from './types';

const severitySchema = z.enum(['low', 'medium', 'high', 'critical']);
const statusSchema = z.enum(['active', 'acknowledged', 'resolved', 'false_positive']);

const anomalyInputSchema = z
  .object({
    machineId: identifierSchema,
    clientId: identifierSchema,
    anomalyType: z.string().trim().min(1).max(50),
    confidenceScore: scoreSchema,
    timestamp: timestampSchema,
    sensorValues: jsonObjectSchema.default({}),
    description: z.string().nullable().optional(),
    severity: severitySchema.default('medium'),
    modelVersion: z.string().max(20).nullable().optional(),
    thresholdValues: jsonObjectSchema.default({})
  })
  .strict();

const anomalyListSchema = z
  .object({
    clientId: identifierSchema.optional(),
    machineId: identifierSchema.optional(),
    status: statusSchema.optional(),
    severity: severitySchema.optional(),
    from: timestampSchema.optional(),
    to: timestampSchema.optional(),
    limit: z.number().int().positive().max(10_000).optional()
  })
  .strict();

const actorSchema = z.string().trim().min(1).max(50);

export type AnomalyInput = z.input<typeof anomalyInputSchema>;
export type AnomalyListInput = z.input<typeof anomalyListSchema>;

type AnomalyAction = 'acknowledge' | 'resolve' | 'mark_false_positive';

const ALLOWED_SOURCES: Record<AnomalyAction, readonly AnomalyStatus[]> = {
  acknowledge: ['active'],
  resolve: ['acknowledged'],
  mark_false_positive: ['active', 'acknowledged']
};

function buildPatch(action: AnomalyAction, actor: string, at: string): AnomalyTransitionPatch {
  switch (action) {
    case 'acknowledge':
      return { status: 'acknowledged', acknowledgedAt: at, acknowledgedBy: actor };
    case 'resolve':
      return { status: 'resolved', resolvedAt: at, resolvedBy: actor };
    case 'mark_false_positive':
      return { status: 'false_positive', resolvedAt: at, resolvedBy: actor };
  }
}

export interface AnomalyServiceOptions {
  repository: AnomalyRepository;
  tenants: TenantRegistry;
  events: Pick<TelemetryEventPublisher, 'publishTelemetryEvent'>;
  logger: Logger;
  now?: () => Date;
}

/**
 * Anomaly lifecycle: `active -> acknowledged -> resolved`, with `false_positive` reachable from
 * either open state. Terminal states accept no further transition.
 */
export class AnomalyService {
  private readonly repository: AnomalyRepository;
  private readonly tenants: TenantRegistry;
  private readonly events: AnomalyServiceOptions['events'];
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: AnomalyServiceOptions) {
    this.repository = options.repository;
    this.tenants = options.tenants;
    this.events = options.events;
    this.logger = options.logger.child({ component: 'anomalies' });
    this.now = options.now ?? (() => new Date());
  }

  async record(input: AnomalyInput): Promise<AnomalyRecord> {
    const parsed = parseWith(anomalyInputSchema, input, 'invalid anomaly');
    await this.tenants.assertMachineOwnership(parsed.clientId, parsed.machineId);
    const record = await this.repository.insert({
      machineId: parsed.machineId,
      clientId: parsed.clientId,
      anomalyType: parsed.anomalyType,
      confidenceScore: parsed.confidenceScore,
      timestamp: parsed.timestamp.toISOString(),
      sensorValues: parsed.sensorValues,
      description: parsed.description ?? null,
      severity: parsed.severity,
      status: 'active',
      modelVersion: parsed.modelVersion ?? null,
      thresholdValues: parsed.thresholdValues,
      createdAt: this.now().toISOString(),
      acknowledgedAt: null,
      acknowledgedBy: null,
      resolvedAt: null,
      resolvedBy: null
    });
    this.logger.info(
      { anomalyId: record.id, machineId: record.machineId, severity: record.severity },
      'anomaly recorded'
    );
    await this.publish(record, 'recorded');
    return record;
  }

  async get(id: number): Promise<AnomalyRecord> {
    const record = await this.repository.get(id);
    if (!record) {
      throw new NotFoundError(`Anomaly ${id} not found`, { anomalyId: id });
    }
    return record;
  }

  /** Newest first. */
  async list(input: AnomalyListInput = {}): Promise<AnomalyRecord[]> {
    const parsed = parseWith(anomalyListSchema, input, 'invalid anomaly query');
    return this.repository.list(parsed);
  }

  async acknowledge(id: number, actor: string): Promise<AnomalyRecord> {
    return this.transition(id, 'acknowledge', actor);
  }

  async resolve(id: number, actor: string): Promise<AnomalyRecord> {
    return this.transition(id, 'resolve', actor);
  }

  async markFalsePositive(id: number, actor: string): Promise<AnomalyRecord> {
    return this.transition(id, 'mark_false_positive', actor);
  }

  private async transition(id: number, action: AnomalyAction, actorInput: string): Promise<AnomalyRecord> {
    const actor = parseWith(actorSchema, actorInput, 'invalid actor');
    const current = await this.get(id);
    if (!ALLOWED_SOURCES[action].includes(current.status)) {
      throw new ConflictError(
        `Cannot ${action.replace(/_/g, ' ')} anomaly ${id} in status ${current.status}`,
        'invalid_transition',
        { anomalyId: id, status: current.status, action }
      );
    }
    const updated = await this.repository.transition(
      id,
      current.status,
      buildPatch(action, actor, this.now().toISOString())
    );
    if (!updated) {
      throw new ConflictError(
        `Anomaly ${id} changed status concurrently`,
        'invalid_transition',
        { anomalyId: id, expected: current.status, action }
      );
    }
    this.logger.info({ anomalyId: id, from: current.status, to: updated.status, actor }, 'anomaly transitioned');
    await this.publish(updated, action);
    return updated;
  }

  private async publish(record: AnomalyRecord, action: AnomalyAction | 'recorded'): Promise<void> {
    await this.events.publishTelemetryEvent('telemetry.anomaly.updated', {
      action,
      anomalyId: record.id,
      machineId: record.machineId,
      clientId: record.clientId,
      status: record.status,
      severity: record.severity
    });
  }
}
