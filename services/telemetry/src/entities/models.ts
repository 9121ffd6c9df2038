import { z } from 'zod';
import { ConflictError, NotFoundError, isTelemetryError, toTelemetryError } from '../errors';
import type { TelemetryEventPublisher } from '../events/publisher';
import type { Logger } from '../logger';
import type { ModelRepository } from '../storage/types';
import type { TenantRegistry } from '../tenancy/registry';
import { identifierSchema, jsonObjectSchema, parseWith, scoreSchema } from '../validation';
import type { ModelRecord } from './types';

const modelInputSchema = z
  .object({
    machineId: identifierSchema,
    clientId: identifierSchema,
    modelType: z.string().trim().min(1).max(50),
    modelVersion: z.string().trim().min(1).max(20),
    accuracyScore: scoreSchema.nullable().optional(),
    precisionScore: scoreSchema.nullable().optional(),
    recallScore: scoreSchema.nullable().optional(),
    f1Score: scoreSchema.nullable().optional(),
    trainingDataCount: z.number().int().nonnegative().nullable().optional(),
    modelFilePath: z.string().max(500).nullable().optional(),
    modelSizeMb: z.number().finite().nonnegative().nullable().optional(),
    hyperparameters: jsonObjectSchema.default({}),
    featureImportance: jsonObjectSchema.default({}),
    trainingDurationSeconds: z.number().int().nonnegative().nullable().optional(),
    performanceMetrics: jsonObjectSchema.default({}),
    isActive: z.boolean().default(true)
  })
  .strict();

const modelListSchema = z
  .object({
    clientId: identifierSchema.optional(),
    machineId: identifierSchema.optional(),
    modelType: z.string().trim().min(1).optional(),
    activeOnly: z.boolean().optional()
  })
  .strict();

export type ModelInput = z.input<typeof modelInputSchema>;
export type ModelListInput = z.input<typeof modelListSchema>;

export interface ModelRegistryOptions {
  repository: ModelRepository;
  tenants: TenantRegistry;
  events: Pick<TelemetryEventPublisher, 'publishTelemetryEvent'>;
  logger: Logger;
  now?: () => Date;
}

function activationConflict(err: unknown, machineId: string, modelType: string): unknown {
  const normalized = toTelemetryError(err);
  if (isTelemetryError(normalized, 'conflict')) {
    return new ConflictError(
      `Another model was activated concurrently for ${machineId}/${modelType}`,
      'duplicate',
      { machineId, modelType }
    );
  }
  return err;
}

/** Keeps at most one active model per (machine, model type). Activation swaps atomically. */
export class ModelRegistry {
  private readonly repository: ModelRepository;
  private readonly tenants: TenantRegistry;
  private readonly events: ModelRegistryOptions['events'];
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: ModelRegistryOptions) {
    this.repository = options.repository;
    this.tenants = options.tenants;
    this.events = options.events;
    this.logger = options.logger.child({ component: 'model-registry' });
    this.now = options.now ?? (() => new Date());
  }

  async register(input: ModelInput): Promise<ModelRecord> {
    const parsed = parseWith(modelInputSchema, input, 'invalid model');
    await this.tenants.assertMachineOwnership(parsed.clientId, parsed.machineId);
    const now = this.now().toISOString();
    let record: ModelRecord;
    try {
      record = await this.repository.insert({
        machineId: parsed.machineId,
        clientId: parsed.clientId,
        modelType: parsed.modelType,
        modelVersion: parsed.modelVersion,
        accuracyScore: parsed.accuracyScore ?? null,
        precisionScore: parsed.precisionScore ?? null,
        recallScore: parsed.recallScore ?? null,
        f1Score: parsed.f1Score ?? null,
        trainingDataCount: parsed.trainingDataCount ?? null,
        modelFilePath: parsed.modelFilePath ?? null,
        modelSizeMb: parsed.modelSizeMb ?? null,
        hyperparameters: parsed.hyperparameters,
        featureImportance: parsed.featureImportance,
        trainingDurationSeconds: parsed.trainingDurationSeconds ?? null,
        performanceMetrics: parsed.performanceMetrics,
        isActive: parsed.isActive,
        deployedAt: parsed.isActive ? now : null,
        createdAt: now
      });
    } catch (err) {
      throw activationConflict(err, parsed.machineId, parsed.modelType);
    }
    this.logger.info(
      { modelId: record.id, machineId: record.machineId, modelType: record.modelType, active: record.isActive },
      'model registered'
    );
    if (record.isActive) {
      await this.publishActivation(record);
    }
    return record;
  }

  async activate(id: number): Promise<ModelRecord> {
    const current = await this.get(id);
    let record: ModelRecord | null;
    try {
      record = await this.repository.activate(id, this.now().toISOString());
    } catch (err) {
      throw activationConflict(err, current.machineId, current.modelType);
    }
    if (!record) {
      throw new NotFoundError(`Model ${id} not found`, { modelId: id });
    }
    this.logger.info({ modelId: id, machineId: record.machineId, modelType: record.modelType }, 'model activated');
    await this.publishActivation(record);
    return record;
  }

  async deactivate(id: number): Promise<ModelRecord> {
    const record = await this.repository.deactivate(id);
    if (!record) {
      throw new NotFoundError(`Model ${id} not found`, { modelId: id });
    }
    this.logger.info({ modelId: id }, 'model deactivated');
    return record;
  }

  async get(id: number): Promise<ModelRecord> {
    const record = await this.repository.get(id);
    if (!record) {
      throw new NotFoundError(`Model ${id} not found`, { modelId: id });
    }
    return record;
  }

  async getActive(machineId: string, modelType: string): Promise<ModelRecord | null> {
    return this.repository.getActive(machineId, modelType);
  }

  /** Newest first. */
  async list(input: ModelListInput = {}): Promise<ModelRecord[]> {
    const parsed = parseWith(modelListSchema, input, 'invalid model query');
    return this.repository.list(parsed);
  }

  private async publishActivation(record: ModelRecord): Promise<void> {
    await this.events.publishTelemetryEvent('telemetry.model.activated', {
      modelId: record.id,
      machineId: record.machineId,
      clientId: record.clientId,
      modelType: record.modelType,
      modelVersion: record.modelVersion,
      deployedAt: record.deployedAt
    });
  }
}
