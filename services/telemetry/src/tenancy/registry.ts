import { z } from 'zod';
import { NotFoundError, ValidationError } from '../errors';
import type { Logger } from '../logger';
import type { TenantRepository } from '../storage/types';
import {
  identifierSchema,
  jsonObjectSchema,
  parseWith,
  timestampSchema,
  toIsoOrNull
} from '../validation';
import type {
  ClientPatch,
  ClientRecord,
  MachineListFilter,
  MachinePatch,
  MachineRecord,
  UserListFilter,
  UserPatch,
  UserRecord
} from './types';

const criticalitySchema = z.enum(['low', 'medium', 'high', 'critical']);
const roleSchema = z.enum(['admin', 'client_admin', 'operator', 'viewer']);

const thresholdsSchema = z
  .object({
    highTemperature: z.number().finite().optional(),
    highVibration: z.number().finite().optional()
  })
  .strict();

const clientFields = {
  companyName: z.string().trim().min(1).max(200),
  industry: z.string().max(100).nullable().optional(),
  contactEmail: z.string().email().max(100).nullable().optional(),
  contactPhone: z.string().max(20).nullable().optional(),
  subscriptionTier: z.string().trim().min(1).max(20).optional(),
  maxMachines: z.number().int().nonnegative().optional(),
  settings: jsonObjectSchema.optional(),
  isActive: z.boolean().optional()
};

const clientInputSchema = z.object({ clientId: identifierSchema, ...clientFields }).strict();
const clientPatchSchema = z.object(clientFields).strict().partial();

const machineFields = {
  machineName: z.string().trim().min(1).max(100),
  machineType: z.string().max(50).nullable().optional(),
  location: z.string().max(200).nullable().optional(),
  manufacturer: z.string().max(100).nullable().optional(),
  model: z.string().max(100).nullable().optional(),
  installationDate: timestampSchema.nullable().optional(),
  specifications: jsonObjectSchema.optional(),
  maintenanceSchedule: jsonObjectSchema.optional(),
  lastMaintenance: timestampSchema.nullable().optional(),
  nextMaintenance: timestampSchema.nullable().optional(),
  criticalityLevel: criticalitySchema.optional(),
  operatingHours: z.number().int().nonnegative().optional(),
  thresholds: thresholdsSchema.nullable().optional(),
  isActive: z.boolean().optional()
};

const machineInputSchema = z
  .object({ machineId: identifierSchema, clientId: identifierSchema, ...machineFields })
  .strict();
const machinePatchSchema = z.object(machineFields).strict().partial();

const userFields = {
  email: z.string().email().max(100),
  passwordHash: z.string().min(1).max(255),
  firstName: z.string().max(50).nullable().optional(),
  lastName: z.string().max(50).nullable().optional(),
  role: roleSchema.optional(),
  permissions: z.array(z.string().min(1)).optional(),
  isActive: z.boolean().optional()
};

const userInputSchema = z
  .object({
    username: z.string().trim().min(1).max(50),
    clientId: identifierSchema.nullable().optional(),
    ...userFields
  })
  .strict();
const userPatchSchema = z.object(userFields).strict().partial();

export type ClientInput = z.input<typeof clientInputSchema>;
export type ClientPatchInput = z.input<typeof clientPatchSchema>;
export type MachineInput = z.input<typeof machineInputSchema>;
export type MachinePatchInput = z.input<typeof machinePatchSchema>;
export type UserInput = z.input<typeof userInputSchema>;
export type UserPatchInput = z.input<typeof userPatchSchema>;

export interface TenantRegistryOptions {
  repository: TenantRepository;
  logger: Logger;
  now?: () => Date;
}

function dateOrNull(value: Date | null | undefined): string | null | undefined {
  return value === undefined ? undefined : toIsoOrNull(value);
}

function withoutUndefined<T extends object>(value: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(value) as Array<keyof T>) {
    if (value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
}

/**
 * Owns the tenant entity graph. Every telemetry and lifecycle entity resolves its machine and
 * client through `assertMachineOwnership` before it is stored.
 */
export class TenantRegistry {
  private readonly repository: TenantRepository;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: TenantRegistryOptions) {
    this.repository = options.repository;
    this.logger = options.logger.child({ component: 'tenant-registry' });
    this.now = options.now ?? (() => new Date());
  }

  async registerClient(input: ClientInput): Promise<ClientRecord> {
    const parsed = parseWith(clientInputSchema, input, 'invalid client');
    const timestamp = this.now().toISOString();
    const record = await this.repository.createClient({
      clientId: parsed.clientId,
      companyName: parsed.companyName,
      industry: parsed.industry ?? null,
      contactEmail: parsed.contactEmail ?? null,
      contactPhone: parsed.contactPhone ?? null,
      subscriptionTier: parsed.subscriptionTier ?? 'starter',
      maxMachines: parsed.maxMachines ?? 25,
      settings: parsed.settings ?? {},
      isActive: parsed.isActive ?? true,
      createdAt: timestamp,
      updatedAt: timestamp
    });
    this.logger.info({ clientId: record.clientId }, 'client registered');
    return record;
  }

  async updateClient(clientId: string, input: ClientPatchInput): Promise<ClientRecord> {
    const patch: ClientPatch = withoutUndefined(parseWith(clientPatchSchema, input, 'invalid client update'));
    const record = await this.repository.updateClient(clientId, patch, this.now().toISOString());
    if (!record) {
      throw new NotFoundError(`Client ${clientId} not found`, { clientId });
    }
    return record;
  }

  async getClient(clientId: string): Promise<ClientRecord> {
    const record = await this.repository.getClient(clientId);
    if (!record) {
      throw new NotFoundError(`Client ${clientId} not found`, { clientId });
    }
    return record;
  }

  async listClients(): Promise<ClientRecord[]> {
    return this.repository.listClients();
  }

  async registerMachine(input: MachineInput): Promise<MachineRecord> {
    const parsed = parseWith(machineInputSchema, input, 'invalid machine');
    const client = await this.repository.getClient(parsed.clientId);
    if (!client) {
      throw new ValidationError(`Unknown client ${parsed.clientId}`, 'unknown_client', {
        clientId: parsed.clientId
      });
    }
    const timestamp = this.now().toISOString();
    const record = await this.repository.createMachine({
      machineId: parsed.machineId,
      clientId: parsed.clientId,
      machineName: parsed.machineName,
      machineType: parsed.machineType ?? null,
      location: parsed.location ?? null,
      manufacturer: parsed.manufacturer ?? null,
      model: parsed.model ?? null,
      installationDate: toIsoOrNull(parsed.installationDate),
      specifications: parsed.specifications ?? {},
      maintenanceSchedule: parsed.maintenanceSchedule ?? {},
      lastMaintenance: toIsoOrNull(parsed.lastMaintenance),
      nextMaintenance: toIsoOrNull(parsed.nextMaintenance),
      criticalityLevel: parsed.criticalityLevel ?? 'medium',
      operatingHours: parsed.operatingHours ?? 0,
      thresholds: parsed.thresholds ?? null,
      isActive: parsed.isActive ?? true,
      createdAt: timestamp,
      updatedAt: timestamp
    });
    this.logger.info({ machineId: record.machineId, clientId: record.clientId }, 'machine registered');
    return record;
  }

  async updateMachine(machineId: string, input: MachinePatchInput): Promise<MachineRecord> {
    const parsed = parseWith(machinePatchSchema, input, 'invalid machine update');
    const patch: MachinePatch = withoutUndefined({
      ...parsed,
      installationDate: dateOrNull(parsed.installationDate),
      lastMaintenance: dateOrNull(parsed.lastMaintenance),
      nextMaintenance: dateOrNull(parsed.nextMaintenance)
    });
    const record = await this.repository.updateMachine(machineId, patch, this.now().toISOString());
    if (!record) {
      throw new NotFoundError(`Machine ${machineId} not found`, { machineId });
    }
    return record;
  }

  async deactivateMachine(machineId: string): Promise<MachineRecord> {
    return this.updateMachine(machineId, { isActive: false });
  }

  async getMachine(machineId: string): Promise<MachineRecord> {
    const record = await this.repository.getMachine(machineId);
    if (!record) {
      throw new NotFoundError(`Machine ${machineId} not found`, { machineId });
    }
    return record;
  }

  async listMachines(filter: MachineListFilter = {}): Promise<MachineRecord[]> {
    return this.repository.listMachines(filter);
  }

  async registerUser(input: UserInput): Promise<UserRecord> {
    const parsed = parseWith(userInputSchema, input, 'invalid user');
    if (parsed.clientId) {
      const client = await this.repository.getClient(parsed.clientId);
      if (!client) {
        throw new ValidationError(`Unknown client ${parsed.clientId}`, 'unknown_client', {
          clientId: parsed.clientId
        });
      }
    }
    const timestamp = this.now().toISOString();
    const record = await this.repository.createUser({
      username: parsed.username,
      email: parsed.email,
      passwordHash: parsed.passwordHash,
      firstName: parsed.firstName ?? null,
      lastName: parsed.lastName ?? null,
      clientId: parsed.clientId ?? null,
      role: parsed.role ?? 'operator',
      permissions: parsed.permissions ?? [],
      isActive: parsed.isActive ?? true,
      createdAt: timestamp,
      updatedAt: timestamp
    });
    this.logger.info({ username: record.username, clientId: record.clientId }, 'user registered');
    return record;
  }

  async updateUser(username: string, input: UserPatchInput): Promise<UserRecord> {
    const patch: UserPatch = withoutUndefined(parseWith(userPatchSchema, input, 'invalid user update'));
    const record = await this.repository.updateUser(username, patch, this.now().toISOString());
    if (!record) {
      throw new NotFoundError(`User ${username} not found`, { username });
    }
    return record;
  }

  async getUser(username: string): Promise<UserRecord> {
    const record = await this.repository.getUser(username);
    if (!record) {
      throw new NotFoundError(`User ${username} not found`, { username });
    }
    return record;
  }

  async listUsers(filter: UserListFilter = {}): Promise<UserRecord[]> {
    return this.repository.listUsers(filter);
  }

  /**
   * Resolves a (client, machine) reference. Fails with a ValidationError when either side is
   * unknown or the machine belongs to another client.
   */
  async assertMachineOwnership(clientId: string, machineId: string): Promise<MachineRecord> {
    const [client, machine] = await Promise.all([
      this.repository.getClient(clientId),
      this.repository.getMachine(machineId)
    ]);
    if (!client) {
      throw new ValidationError(`Unknown client ${clientId}`, 'unknown_client', { clientId });
    }
    if (!machine) {
      throw new ValidationError(`Unknown machine ${machineId}`, 'unknown_machine', { machineId });
    }
    if (machine.clientId !== clientId) {
      throw new ValidationError(
        `Machine ${machineId} does not belong to client ${clientId}`,
        'machine_client_mismatch',
        { clientId, machineId }
      );
    }
    return machine;
  }
}
