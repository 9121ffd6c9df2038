import type {
  AlertGuard,
  AlertListFilter,
  AlertPatch,
  AlertRecord,
  AnomalyListFilter,
  AnomalyRecord,
  AnomalyStatus,
  AnomalyTransitionPatch,
  ModelListFilter,
  ModelRecord,
  NewAlert,
  NewAnomaly,
  NewModel
} from '../entities/types';
import type { RollupGranularity, RollupKey, RollupListQuery, RollupRecord } from '../rollup/types';
import type {
  ChunkDescriptor,
  ChunkRecord,
  NewReading,
  ReadingQuery,
  ReadingRecord
} from '../telemetry/types';
import type {
  ClientPatch,
  ClientRecord,
  MachineListFilter,
  MachinePatch,
  MachineRecord,
  UserListFilter,
  UserPatch,
  UserRecord
} from '../tenancy/types';

export type StorageKind = 'memory' | 'postgres';

export interface TenantRepository {
  /** Rejects an existing client id with a `duplicate` conflict. */
  createClient(record: ClientRecord): Promise<ClientRecord>;
  updateClient(clientId: string, patch: ClientPatch, updatedAt: string): Promise<ClientRecord | null>;
  getClient(clientId: string): Promise<ClientRecord | null>;
  listClients(): Promise<ClientRecord[]>;
  /**
   * Inserts an active machine only while its client owns fewer than `maxMachines` active machines.
   * The count and the insert happen in one atomic step.
   */
  createMachine(record: MachineRecord): Promise<MachineRecord>;
  /** Reactivating a machine runs the same quota check as registration. */
  updateMachine(machineId: string, patch: MachinePatch, updatedAt: string): Promise<MachineRecord | null>;
  getMachine(machineId: string): Promise<MachineRecord | null>;
  listMachines(filter?: MachineListFilter): Promise<MachineRecord[]>;
  createUser(record: UserRecord): Promise<UserRecord>;
  updateUser(username: string, patch: UserPatch, updatedAt: string): Promise<UserRecord | null>;
  getUser(username: string): Promise<UserRecord | null>;
  listUsers(filter?: UserListFilter): Promise<UserRecord[]>;
}

export interface TelemetryRepository {
  /** Creates the chunk when absent and stores the reading inside it. */
  insertReading(chunk: ChunkDescriptor, reading: NewReading): Promise<ReadingRecord>;
  /** Newest first, ties broken by id descending. */
  queryReadings(query: ReadingQuery): Promise<ReadingRecord[]>;
  /** Readings of one machine in `[from, to)`, oldest first by (timestamp, id). */
  readRange(machineId: string, from: Date, to: Date): Promise<ReadingRecord[]>;
  latestByClient(clientId: string): Promise<ReadingRecord[]>;
  /** Oldest first. */
  listChunks(): Promise<ChunkRecord[]>;
  /** Removes the chunk and every reading in it. Returns false when the chunk no longer exists. */
  dropChunk(chunkId: string): Promise<boolean>;
}

export interface RollupRepository {
  /** Replaces the stored record for the key in one atomic step. */
  publish(record: RollupRecord): Promise<void>;
  remove(key: RollupKey): Promise<boolean>;
  get(key: RollupKey): Promise<RollupRecord | null>;
  /** Records with `from <= bucketStart < to`, bucketStart ascending. */
  list(query: RollupListQuery): Promise<RollupRecord[]>;
  /** Records whose bucket starts before the cutoff, across all machines. */
  listBefore(granularity: RollupGranularity, cutoff: Date): Promise<RollupRecord[]>;
}

export interface AnomalyRepository {
  insert(record: NewAnomaly): Promise<AnomalyRecord>;
  get(id: number): Promise<AnomalyRecord | null>;
  list(filter: AnomalyListFilter): Promise<AnomalyRecord[]>;
  /** Compare-and-set on the status. Returns null when the stored status is no longer `expected`. */
  transition(id: number, expected: AnomalyStatus, patch: AnomalyTransitionPatch): Promise<AnomalyRecord | null>;
  /** Deletes terminal anomalies older than the cutoff that no alert references. */
  purge(cutoff: Date): Promise<number>;
}

export interface AlertRepository {
  insert(record: NewAlert): Promise<AlertRecord>;
  get(id: number): Promise<AlertRecord | null>;
  list(filter: AlertListFilter): Promise<AlertRecord[]>;
  /** Applies the patch only while every guarded flag is still false. Returns null otherwise. */
  updateIf(id: number, guard: AlertGuard, patch: AlertPatch): Promise<AlertRecord | null>;
  /** Deletes resolved alerts older than the cutoff. */
  purge(cutoff: Date): Promise<number>;
}

export interface ModelRepository {
  /** When the record is active, deactivates the current active model of its (machine, type) atomically. */
  insert(record: NewModel): Promise<ModelRecord>;
  activate(id: number, deployedAt: string): Promise<ModelRecord | null>;
  deactivate(id: number): Promise<ModelRecord | null>;
  get(id: number): Promise<ModelRecord | null>;
  getActive(machineId: string, modelType: string): Promise<ModelRecord | null>;
  list(filter: ModelListFilter): Promise<ModelRecord[]>;
}

export interface Storage {
  kind: StorageKind;
  tenants: TenantRepository;
  telemetry: TelemetryRepository;
  rollups: RollupRepository;
  anomalies: AnomalyRepository;
  alerts: AlertRepository;
  models: ModelRepository;
  close(): Promise<void>;
}
