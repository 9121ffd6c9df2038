import type { Database, Queryable, Row } from '../../db/client';
import { ConflictError, ValidationError, toTelemetryError } from '../../errors';
import type {
  ClientPatch,
  ClientRecord,
  CriticalityLevel,
  MachineListFilter,
  MachinePatch,
  MachineRecord,
  MachineThresholds,
  UserListFilter,
  UserPatch,
  UserRecord,
  UserRole
} from '../../tenancy/types';
import type { TenantRepository } from '../types';
import {
  UpdateBuilder,
  WhereBuilder,
  jsonParam,
  readBoolean,
  readEnum,
  readJsonObject,
  readNullableText,
  readNullableTimestamp,
  readNumber,
  readText,
  readTextArray,
  readTimestamp,
  requireRow
} from './rows';

const CRITICALITY_LEVELS: readonly CriticalityLevel[] = ['low', 'medium', 'high', 'critical'];
const USER_ROLES: readonly UserRole[] = ['admin', 'client_admin', 'operator', 'viewer'];

function mapClient(row: Row): ClientRecord {
  return {
    clientId: readText(row, 'client_id'),
    companyName: readText(row, 'company_name'),
    industry: readNullableText(row, 'industry'),
    contactEmail: readNullableText(row, 'contact_email'),
    contactPhone: readNullableText(row, 'contact_phone'),
    subscriptionTier: readText(row, 'subscription_tier'),
    maxMachines: readNumber(row, 'max_machines'),
    settings: readJsonObject(row, 'settings'),
    isActive: readBoolean(row, 'is_active'),
    createdAt: readTimestamp(row, 'created_at'),
    updatedAt: readTimestamp(row, 'updated_at')
  };
}

function mapThresholds(row: Row): MachineThresholds | null {
  if (row.thresholds === null || row.thresholds === undefined) {
    return null;
  }
  const raw = readJsonObject(row, 'thresholds');
  const thresholds: MachineThresholds = {};
  if (typeof raw.highTemperature === 'number') {
    thresholds.highTemperature = raw.highTemperature;
  }
  if (typeof raw.highVibration === 'number') {
    thresholds.highVibration = raw.highVibration;
  }
  return thresholds;
}

function thresholdsParam(thresholds: MachineThresholds | null | undefined): string | null | undefined {
  if (thresholds === undefined) {
    return undefined;
  }
  return thresholds === null ? null : JSON.stringify(thresholds);
}

function mapMachine(row: Row): MachineRecord {
  return {
    machineId: readText(row, 'machine_id'),
    clientId: readText(row, 'client_id'),
    machineName: readText(row, 'machine_name'),
    machineType: readNullableText(row, 'machine_type'),
    location: readNullableText(row, 'location'),
    manufacturer: readNullableText(row, 'manufacturer'),
    model: readNullableText(row, 'model'),
    installationDate: readNullableTimestamp(row, 'installation_date'),
    specifications: readJsonObject(row, 'specifications'),
    maintenanceSchedule: readJsonObject(row, 'maintenance_schedule'),
    lastMaintenance: readNullableTimestamp(row, 'last_maintenance'),
    nextMaintenance: readNullableTimestamp(row, 'next_maintenance'),
    criticalityLevel: readEnum(row, 'criticality_level', CRITICALITY_LEVELS),
    operatingHours: readNumber(row, 'operating_hours'),
    thresholds: mapThresholds(row),
    isActive: readBoolean(row, 'is_active'),
    createdAt: readTimestamp(row, 'created_at'),
    updatedAt: readTimestamp(row, 'updated_at')
  };
}

function mapUser(row: Row): UserRecord {
  return {
    username: readText(row, 'username'),
    email: readText(row, 'email'),
    passwordHash: readText(row, 'password_hash'),
    firstName: readNullableText(row, 'first_name'),
    lastName: readNullableText(row, 'last_name'),
    clientId: readNullableText(row, 'client_id'),
    role: readEnum(row, 'role', USER_ROLES),
    permissions: readTextArray(row, 'permissions'),
    isActive: readBoolean(row, 'is_active'),
    createdAt: readTimestamp(row, 'created_at'),
    updatedAt: readTimestamp(row, 'updated_at')
  };
}

function quotaExceeded(clientId: string, maxMachines: number): ConflictError {
  return new ConflictError(
    `Client ${clientId} already has ${maxMachines} active machines`,
    'machine_quota_exceeded',
    { clientId, maxMachines }
  );
}

function duplicate(err: unknown, message: string, details: Record<string, unknown>): unknown {
  const normalized = toTelemetryError(err);
  return normalized.kind === 'conflict' ? new ConflictError(message, 'duplicate', details) : normalized;
}

/** Locks the client row and verifies it can take one more active machine. */
async function assertQuota(client: Queryable, clientId: string): Promise<void> {
  const { rows } = await client.query(
    'SELECT max_machines FROM clients WHERE client_id = $1 FOR UPDATE',
    [clientId]
  );
  const clientRow = rows[0];
  if (!clientRow) {
    throw new ValidationError(`Unknown client ${clientId}`, 'unknown_client', { clientId });
  }
  const maxMachines = readNumber(clientRow, 'max_machines');
  const countResult = await client.query(
    'SELECT COUNT(*) AS active_count FROM machines WHERE client_id = $1 AND is_active',
    [clientId]
  );
  const countRow = countResult.rows[0];
  const activeCount = countRow ? readNumber(countRow, 'active_count') : 0;
  if (activeCount >= maxMachines) {
    throw quotaExceeded(clientId, maxMachines);
  }
}

export class PostgresTenantRepository implements TenantRepository {
  constructor(private readonly db: Database) {}

  async createClient(record: ClientRecord): Promise<ClientRecord> {
    try {
      const { rows } = await this.db.withConnection((client) =>
        client.query(
          `INSERT INTO clients (
             client_id, company_name, industry, contact_email, contact_phone,
             subscription_tier, max_machines, settings, is_active, created_at, updated_at
           ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8::jsonb, $9, $10, $11)
           RETURNING *`,
          [
            record.clientId,
            record.companyName,
            record.industry,
            record.contactEmail,
            record.contactPhone,
            record.subscriptionTier,
            record.maxMachines,
            jsonParam(record.settings),
            record.isActive,
            record.createdAt,
            record.updatedAt
          ]
        )
      );
      return mapClient(requireRow(rows, 'insert client'));
    } catch (err) {
      throw duplicate(err, `Client ${record.clientId} already exists`, { clientId: record.clientId });
    }
  }

  async updateClient(clientId: string, patch: ClientPatch, updatedAt: string): Promise<ClientRecord | null> {
    const update = new UpdateBuilder([clientId])
      .set('company_name', patch.companyName)
      .set('industry', patch.industry)
      .set('contact_email', patch.contactEmail)
      .set('contact_phone', patch.contactPhone)
      .set('subscription_tier', patch.subscriptionTier)
      .set('max_machines', patch.maxMachines)
      .set('settings', patch.settings === undefined ? undefined : jsonParam(patch.settings), 'jsonb')
      .set('is_active', patch.isActive)
      .set('updated_at', updatedAt);
    const { rows } = await this.db.withConnection((client) =>
      client.query(`UPDATE clients SET ${update.toSql()} WHERE client_id = $1 RETURNING *`, update.values)
    );
    const row = rows[0];
    return row ? mapClient(row) : null;
  }

  async getClient(clientId: string): Promise<ClientRecord | null> {
    const { rows } = await this.db.withConnection((client) =>
      client.query('SELECT * FROM clients WHERE client_id = $1', [clientId])
    );
    const row = rows[0];
    return row ? mapClient(row) : null;
  }

  async listClients(): Promise<ClientRecord[]> {
    const { rows } = await this.db.withConnection((client) =>
      client.query('SELECT * FROM clients ORDER BY client_id')
    );
    return rows.map(mapClient);
  }

  async createMachine(record: MachineRecord): Promise<MachineRecord> {
    try {
      return await this.db.withTransaction(async (client) => {
        if (record.isActive) {
          await assertQuota(client, record.clientId);
        }
        const { rows } = await client.query(
          `INSERT INTO machines (
             machine_id, client_id, machine_name, machine_type, location, manufacturer, model,
             installation_date, specifications, maintenance_schedule, last_maintenance, next_maintenance,
             criticality_level, operating_hours, thresholds, is_active, created_at, updated_at
           ) VALUES (
             $1, $2, $3, $4, $5, $6, $7, $8, $9::jsonb, $10::jsonb, $11, $12, $13, $14, $15::jsonb, $16, $17, $18
           )
           RETURNING *`,
          [
            record.machineId,
            record.clientId,
            record.machineName,
            record.machineType,
            record.location,
            record.manufacturer,
            record.model,
            record.installationDate,
            jsonParam(record.specifications),
            jsonParam(record.maintenanceSchedule),
            record.lastMaintenance,
            record.nextMaintenance,
            record.criticalityLevel,
            record.operatingHours,
            thresholdsParam(record.thresholds),
            record.isActive,
            record.createdAt,
            record.updatedAt
          ]
        );
        return mapMachine(requireRow(rows, 'insert machine'));
      });
    } catch (err) {
      const normalized = toTelemetryError(err);
      if (normalized.kind === 'validation' && normalized.code === 'validation_failed') {
        // Foreign key violation on client_id when the quota check was skipped.
        throw new ValidationError(`Unknown client ${record.clientId}`, 'unknown_client', {
          clientId: record.clientId
        });
      }
      if (normalized.kind === 'conflict' && normalized.code === 'duplicate') {
        throw new ConflictError(`Machine ${record.machineId} already exists`, 'duplicate', {
          machineId: record.machineId
        });
      }
      throw normalized;
    }
  }

  async updateMachine(machineId: string, patch: MachinePatch, updatedAt: string): Promise<MachineRecord | null> {
    return this.db.withTransaction(async (client) => {
      const existing = await client.query(
        'SELECT client_id, is_active FROM machines WHERE machine_id = $1 FOR UPDATE',
        [machineId]
      );
      const current = existing.rows[0];
      if (!current) {
        return null;
      }
      if (patch.isActive === true && !readBoolean(current, 'is_active')) {
        await assertQuota(client, readText(current, 'client_id'));
      }
      const update = new UpdateBuilder([machineId])
        .set('machine_name', patch.machineName)
        .set('machine_type', patch.machineType)
        .set('location', patch.location)
        .set('manufacturer', patch.manufacturer)
        .set('model', patch.model)
        .set('installation_date', patch.installationDate)
        .set('specifications', patch.specifications === undefined ? undefined : jsonParam(patch.specifications), 'jsonb')
        .set(
          'maintenance_schedule',
          patch.maintenanceSchedule === undefined ? undefined : jsonParam(patch.maintenanceSchedule),
          'jsonb'
        )
        .set('last_maintenance', patch.lastMaintenance)
        .set('next_maintenance', patch.nextMaintenance)
        .set('criticality_level', patch.criticalityLevel)
        .set('operating_hours', patch.operatingHours)
        .set('thresholds', thresholdsParam(patch.thresholds), 'jsonb')
        .set('is_active', patch.isActive)
        .set('updated_at', updatedAt);
      const { rows } = await client.query(
        `UPDATE machines SET ${update.toSql()} WHERE machine_id = $1 RETURNING *`,
        update.values
      );
      const row = rows[0];
      return row ? mapMachine(row) : null;
    });
  }

  async getMachine(machineId: string): Promise<MachineRecord | null> {
    const { rows } = await this.db.withConnection((client) =>
      client.query('SELECT * FROM machines WHERE machine_id = $1', [machineId])
    );
    const row = rows[0];
    return row ? mapMachine(row) : null;
  }

  async listMachines(filter: MachineListFilter = {}): Promise<MachineRecord[]> {
    const where = new WhereBuilder().add((p) => `client_id = ${p}`, filter.clientId);
    if (filter.activeOnly) {
      where.raw('is_active');
    }
    const { rows } = await this.db.withConnection((client) =>
      client.query(`SELECT * FROM machines ${where.toSql()} ORDER BY machine_id`, where.values)
    );
    return rows.map(mapMachine);
  }

  async createUser(record: UserRecord): Promise<UserRecord> {
    try {
      const { rows } = await this.db.withConnection((client) =>
        client.query(
          `INSERT INTO users (
             username, email, password_hash, first_name, last_name, client_id,
             role, permissions, is_active, created_at, updated_at
           ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
           RETURNING *`,
          [
            record.username,
            record.email,
            record.passwordHash,
            record.firstName,
            record.lastName,
            record.clientId,
            record.role,
            record.permissions,
            record.isActive,
            record.createdAt,
            record.updatedAt
          ]
        )
      );
      return mapUser(requireRow(rows, 'insert user'));
    } catch (err) {
      throw duplicate(err, `User ${record.username} or email ${record.email} already exists`, {
        username: record.username
      });
    }
  }

  async updateUser(username: string, patch: UserPatch, updatedAt: string): Promise<UserRecord | null> {
    const update = new UpdateBuilder([username])
      .set('email', patch.email)
      .set('password_hash', patch.passwordHash)
      .set('first_name', patch.firstName)
      .set('last_name', patch.lastName)
      .set('role', patch.role)
      .set('permissions', patch.permissions)
      .set('is_active', patch.isActive)
      .set('updated_at', updatedAt);
    try {
      const { rows } = await this.db.withConnection((client) =>
        client.query(`UPDATE users SET ${update.toSql()} WHERE username = $1 RETURNING *`, update.values)
      );
      const row = rows[0];
      return row ? mapUser(row) : null;
    } catch (err) {
      throw duplicate(err, `Email ${patch.email ?? ''} is already in use`, { username });
    }
  }

  async getUser(username: string): Promise<UserRecord | null> {
    const { rows } = await this.db.withConnection((client) =>
      client.query('SELECT * FROM users WHERE username = $1', [username])
    );
    const row = rows[0];
    return row ? mapUser(row) : null;
  }

  async listUsers(filter: UserListFilter = {}): Promise<UserRecord[]> {
    const where = new WhereBuilder().add((p) => `client_id = ${p}`, filter.clientId);
    const { rows } = await this.db.withConnection((client) =>
      client.query(`SELECT * FROM users ${where.toSql()} ORDER BY username`, where.values)
    );
    return rows.map(mapUser);
  }
}
