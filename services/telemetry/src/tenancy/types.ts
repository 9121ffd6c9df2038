import type { JsonValue } from '@plantsight/event-bus';

export type JsonObject = { [key: string]: JsonValue };

export type CriticalityLevel = 'low' | 'medium' | 'high' | 'critical';

export type UserRole = 'admin' | 'client_admin' | 'operator' | 'viewer';

export interface ClientRecord {
  clientId: string;
  companyName: string;
  industry: string | null;
  contactEmail: string | null;
  contactPhone: string | null;
  subscriptionTier: string;
  maxMachines: number;
  settings: JsonObject;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}

export type ClientPatch = Partial<
  Pick<
    ClientRecord,
    | 'companyName'
    | 'industry'
    | 'contactEmail'
    | 'contactPhone'
    | 'subscriptionTier'
    | 'maxMachines'
    | 'settings'
    | 'isActive'
  >
>;

/** Per-machine overrides of the exceedance thresholds used by rollups. */
export interface MachineThresholds {
  highTemperature?: number;
  highVibration?: number;
}

export interface MachineRecord {
  machineId: string;
  clientId: string;
  machineName: string;
  machineType: string | null;
  location: string | null;
  manufacturer: string | null;
  model: string | null;
  installationDate: string | null;
  specifications: JsonObject;
  maintenanceSchedule: JsonObject;
  lastMaintenance: string | null;
  nextMaintenance: string | null;
  criticalityLevel: CriticalityLevel;
  operatingHours: number;
  thresholds: MachineThresholds | null;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}

export type MachinePatch = Partial<
  Omit<MachineRecord, 'machineId' | 'clientId' | 'createdAt' | 'updatedAt'>
>;

export interface UserRecord {
  username: string;
  email: string;
  passwordHash: string;
  firstName: string | null;
  lastName: string | null;
  clientId: string | null;
  role: UserRole;
  permissions: string[];
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}

export type UserPatch = Partial<
  Pick<UserRecord, 'email' | 'passwordHash' | 'firstName' | 'lastName' | 'role' | 'permissions' | 'isActive'>
>;

export interface MachineListFilter {
  clientId?: string;
  activeOnly?: boolean;
}

export interface UserListFilter {
  clientId?: string;
}
