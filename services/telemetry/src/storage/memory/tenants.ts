import { ConflictError, ValidationError } from '../../errors';
import type {
  ClientPatch,
  ClientRecord,
  MachineListFilter,
  MachinePatch,
  MachineRecord,
  UserListFilter,
  UserPatch,
  UserRecord
} from '../../tenancy/types';
import type { TenantRepository } from '../types';

function quotaExceeded(clientId: string, maxMachines: number): ConflictError {
  return new ConflictError(
    `Client ${clientId} already has ${maxMachines} active machines`,
    'machine_quota_exceeded',
    { clientId, maxMachines }
  );
}

export class MemoryTenantRepository implements TenantRepository {
  private readonly clients = new Map<string, ClientRecord>();
  private readonly machines = new Map<string, MachineRecord>();
  private readonly users = new Map<string, UserRecord>();

  async createClient(record: ClientRecord): Promise<ClientRecord> {
    if (this.clients.has(record.clientId)) {
      throw new ConflictError(`Client ${record.clientId} already exists`, 'duplicate', {
        clientId: record.clientId
      });
    }
    this.clients.set(record.clientId, structuredClone(record));
    return structuredClone(record);
  }

  async updateClient(clientId: string, patch: ClientPatch, updatedAt: string): Promise<ClientRecord | null> {
    const existing = this.clients.get(clientId);
    if (!existing) {
      return null;
    }
    const next: ClientRecord = { ...existing, ...structuredClone(patch), updatedAt };
    this.clients.set(clientId, next);
    return structuredClone(next);
  }

  async getClient(clientId: string): Promise<ClientRecord | null> {
    const record = this.clients.get(clientId);
    return record ? structuredClone(record) : null;
  }

  async listClients(): Promise<ClientRecord[]> {
    return Array.from(this.clients.values())
      .sort((a, b) => a.clientId.localeCompare(b.clientId))
      .map((record) => structuredClone(record));
  }

  async createMachine(record: MachineRecord): Promise<MachineRecord> {
    const client = this.clients.get(record.clientId);
    if (!client) {
      throw new ValidationError(`Unknown client ${record.clientId}`, 'unknown_client', {
        clientId: record.clientId
      });
    }
    if (this.machines.has(record.machineId)) {
      throw new ConflictError(`Machine ${record.machineId} already exists`, 'duplicate', {
        machineId: record.machineId
      });
    }
    if (record.isActive && this.countActiveMachines(record.clientId) >= client.maxMachines) {
      throw quotaExceeded(record.clientId, client.maxMachines);
    }
    this.machines.set(record.machineId, structuredClone(record));
    return structuredClone(record);
  }

  async updateMachine(machineId: string, patch: MachinePatch, updatedAt: string): Promise<MachineRecord | null> {
    const existing = this.machines.get(machineId);
    if (!existing) {
      return null;
    }
    if (patch.isActive === true && !existing.isActive) {
      const client = this.clients.get(existing.clientId);
      const maxMachines = client?.maxMachines ?? 0;
      if (this.countActiveMachines(existing.clientId) >= maxMachines) {
        throw quotaExceeded(existing.clientId, maxMachines);
      }
    }
    const next: MachineRecord = { ...existing, ...structuredClone(patch), updatedAt };
    this.machines.set(machineId, next);
    return structuredClone(next);
  }

  async getMachine(machineId: string): Promise<MachineRecord | null> {
    const record = this.machines.get(machineId);
    return record ? structuredClone(record) : null;
  }

  async listMachines(filter: MachineListFilter = {}): Promise<MachineRecord[]> {
    return Array.from(this.machines.values())
      .filter((record) => !filter.clientId || record.clientId === filter.clientId)
      .filter((record) => !filter.activeOnly || record.isActive)
      .sort((a, b) => a.machineId.localeCompare(b.machineId))
      .map((record) => structuredClone(record));
  }

  async createUser(record: UserRecord): Promise<UserRecord> {
    if (this.users.has(record.username)) {
      throw new ConflictError(`User ${record.username} already exists`, 'duplicate', {
        username: record.username
      });
    }
    this.assertEmailAvailable(record.email, null);
    this.users.set(record.username, structuredClone(record));
    return structuredClone(record);
  }

  async updateUser(username: string, patch: UserPatch, updatedAt: string): Promise<UserRecord | null> {
    const existing = this.users.get(username);
    if (!existing) {
      return null;
    }
    if (patch.email !== undefined) {
      this.assertEmailAvailable(patch.email, username);
    }
    const next: UserRecord = { ...existing, ...structuredClone(patch), updatedAt };
    this.users.set(username, next);
    return structuredClone(next);
  }

  async getUser(username: string): Promise<UserRecord | null> {
    const record = this.users.get(username);
    return record ? structuredClone(record) : null;
  }

  async listUsers(filter: UserListFilter = {}): Promise<UserRecord[]> {
    return Array.from(this.users.values())
      .filter((record) => !filter.clientId || record.clientId === filter.clientId)
      .sort((a, b) => a.username.localeCompare(b.username))
      .map((record) => structuredClone(record));
  }

  private countActiveMachines(clientId: string): number {
    let count = 0;
    for (const machine of this.machines.values()) {
      if (machine.clientId === clientId && machine.isActive) {
        count += 1;
      }
    }
    return count;
  }

  private assertEmailAvailable(email: string, owner: string | null): void {
    const normalized = email.toLowerCase();
    for (const user of this.users.values()) {
      if (user.username !== owner && user.email.toLowerCase() === normalized) {
        throw new ConflictError(`Email ${email} is already registered`, 'duplicate', { email });
      }
    }
  }
}
