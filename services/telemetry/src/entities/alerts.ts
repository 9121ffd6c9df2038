import { z } from 'zod';
import { ConflictError, NotFoundError, ValidationError } from '../errors';
import type { TelemetryEventPublisher } from '../events/publisher';
import type { Logger } from '../logger';
import type { AlertRepository, AnomalyRepository } from '../storage/types';
import type { TenantRegistry } from '../tenancy/registry';
import { identifierSchema, jsonObjectSchema, parseWith, timestampSchema } from '../validation';
import { ALERT_FLAGS, type AlertFlag, type AlertGuard, type AlertPatch, type AlertRecord } from './types';

const severitySchema = z.enum(['info', 'warning', 'critical']);

const alertInputSchema = z
  .object({
    machineId: identifierSchema,
    clientId: identifierSchema,
    alertType: z.string().trim().min(1).max(50),
    severity: severitySchema,
    title: z.string().trim().min(1).max(200),
    message: z.string().min(1),
    timestamp: timestampSchema.optional(),
    relatedAnomalyId: z.number().int().positive().nullable().optional(),
    metadata: jsonObjectSchema.default({})
  })
  .strict();

const alertListSchema = z
  .object({
    clientId: identifierSchema.optional(),
    machineId: identifierSchema.optional(),
    severity: severitySchema.optional(),
    unresolvedOnly: z.boolean().optional(),
    from: timestampSchema.optional(),
    to: timestampSchema.optional(),
    limit: z.number().int().positive().max(10_000).optional()
  })
  .strict();

const actorSchema = z.string().trim().min(1).max(50);
const notesSchema = z.string().max(10_000).optional();

export type AlertInput = z.input<typeof alertInputSchema>;
export type AlertListInput = z.input<typeof alertListSchema>;

type AlertAction = 'acknowledge' | 'resolve' | 'escalate' | 'mark_notification_sent';

const FLAG_LABELS: Record<AlertFlag, string> = {
  acknowledged: 'acknowledged',
  resolved: 'resolved',
  escalated: 'escalated',
  notificationSent: 'notified'
};

export interface AlertServiceOptions {
  repository: AlertRepository;
  anomalies: AnomalyRepository;
  tenants: TenantRegistry;
  events: Pick<TelemetryEventPublisher, 'publishTelemetryEvent'>;
  logger: Logger;
  now?: () => Date;
}

/**
 * Alerts carry independent once-only flags. A resolved alert is closed: acknowledge, resolve and
 * escalate all fail with a ConflictError.
 */
export class AlertService {
  private readonly repository: AlertRepository;
  private readonly anomalies: AnomalyRepository;
  private readonly tenants: TenantRegistry;
  private readonly events: AlertServiceOptions['events'];
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: AlertServiceOptions) {
    this.repository = options.repository;
    this.anomalies = options.anomalies;
    this.tenants = options.tenants;
    this.events = options.events;
    this.logger = options.logger.child({ component: 'alerts' });
    this.now = options.now ?? (() => new Date());
  }

  async create(input: AlertInput): Promise<AlertRecord> {
    const parsed = parseWith(alertInputSchema, input, 'invalid alert');
    await this.tenants.assertMachineOwnership(parsed.clientId, parsed.machineId);

    const relatedAnomalyId = parsed.relatedAnomalyId ?? null;
    if (relatedAnomalyId !== null) {
      const anomaly = await this.anomalies.get(relatedAnomalyId);
      if (!anomaly || anomaly.clientId !== parsed.clientId) {
        throw new ValidationError(
          `Related anomaly ${relatedAnomalyId} does not exist for client ${parsed.clientId}`,
          'unknown_anomaly',
          { relatedAnomalyId, clientId: parsed.clientId }
        );
      }
    }

    const now = this.now();
    const record = await this.repository.insert({
      machineId: parsed.machineId,
      clientId: parsed.clientId,
      alertType: parsed.alertType,
      severity: parsed.severity,
      title: parsed.title,
      message: parsed.message,
      timestamp: (parsed.timestamp ?? now).toISOString(),
      acknowledged: false,
      acknowledgedBy: null,
      acknowledgedAt: null,
      resolved: false,
      resolvedBy: null,
      resolvedAt: null,
      resolutionNotes: null,
      notificationSent: false,
      escalated: false,
      escalatedAt: null,
      relatedAnomalyId,
      metadata: parsed.metadata,
      createdAt: now.toISOString()
    });
    this.logger.info({ alertId: record.id, machineId: record.machineId, severity: record.severity }, 'alert created');
    await this.publish(record, 'created');
    return record;
  }

  async get(id: number): Promise<AlertRecord> {
    const record = await this.repository.get(id);
    if (!record) {
      throw new NotFoundError(`Alert ${id} not found`, { alertId: id });
    }
    return record;
  }

  /** Newest first. */
  async list(input: AlertListInput = {}): Promise<AlertRecord[]> {
    const parsed = parseWith(alertListSchema, input, 'invalid alert query');
    return this.repository.list(parsed);
  }

  async acknowledge(id: number, actorInput: string): Promise<AlertRecord> {
    const actor = parseWith(actorSchema, actorInput, 'invalid actor');
    return this.update(id, 'acknowledge', { resolved: false, acknowledged: false }, {
      acknowledged: true,
      acknowledgedBy: actor,
      acknowledgedAt: this.now().toISOString()
    });
  }

  async resolve(id: number, actorInput: string, notesInput?: string): Promise<AlertRecord> {
    const actor = parseWith(actorSchema, actorInput, 'invalid actor');
    const notes = parseWith(notesSchema, notesInput, 'invalid resolution notes');
    return this.update(id, 'resolve', { resolved: false }, {
      resolved: true,
      resolvedBy: actor,
      resolvedAt: this.now().toISOString(),
      resolutionNotes: notes ?? null
    });
  }

  async escalate(id: number): Promise<AlertRecord> {
    return this.update(id, 'escalate', { resolved: false, escalated: false }, {
      escalated: true,
      escalatedAt: this.now().toISOString()
    });
  }

  async markNotificationSent(id: number): Promise<AlertRecord> {
    return this.update(id, 'mark_notification_sent', { notificationSent: false }, { notificationSent: true });
  }

  private async update(id: number, action: AlertAction, guard: AlertGuard, patch: AlertPatch): Promise<AlertRecord> {
    const updated = await this.repository.updateIf(id, guard, patch);
    if (!updated) {
      const current = await this.get(id);
      const blocking = ALERT_FLAGS.find(
        (flag) => guard[flag] === false && current[flag]
      );
      throw new ConflictError(
        `Cannot ${action.replace(/_/g, ' ')} alert ${id}: already ${blocking ? FLAG_LABELS[blocking] : 'changed'}`,
        'invalid_transition',
        { alertId: id, action, blockedBy: blocking ?? null }
      );
    }
    this.logger.info({ alertId: id, action }, 'alert updated');
    await this.publish(updated, action);
    return updated;
  }

  private async publish(record: AlertRecord, action: AlertAction | 'created'): Promise<void> {
    await this.events.publishTelemetryEvent('telemetry.alert.updated', {
      action,
      alertId: record.id,
      machineId: record.machineId,
      clientId: record.clientId,
      severity: record.severity,
      acknowledged: record.acknowledged,
      resolved: record.resolved,
      escalated: record.escalated
    });
  }
}
