import type { Database, Queryable, Row } from '../../db/client';
import { quoteIdentifier, quoteLiteral } from '../../db/client';
import { ValidationError } from '../../errors';
import type { Logger } from '../../logger';
import type {
  ChunkDescriptor,
  ChunkRecord,
  NewReading,
  ReadingQuery,
  ReadingRecord
} from '../../telemetry/types';
import type { TelemetryRepository } from '../types';
import {
  WhereBuilder,
  jsonParam,
  readBoolean,
  readJsonObject,
  readNullableJson,
  readNullableNumber,
  readNumber,
  readText,
  readTimestamp,
  requireRow
} from './rows';

const READINGS_TABLE = 'telemetry_readings';
const CHUNK_ID_PATTERN = /^readings_\d{12}$/;
const NO_PARTITION_CODE = '23514';

function mapReading(row: Row): ReadingRecord {
  return {
    id: readNumber(row, 'id'),
    machineId: readText(row, 'machine_id'),
    clientId: readText(row, 'client_id'),
    sensorType: readText(row, 'sensor_type'),
    timestamp: readTimestamp(row, 'recorded_at'),
    temperature: readNullableNumber(row, 'temperature'),
    vibration: readNullableNumber(row, 'vibration'),
    power: readNullableNumber(row, 'power'),
    pressure: readNullableNumber(row, 'pressure'),
    speed: readNullableNumber(row, 'speed'),
    efficiency: readNullableNumber(row, 'efficiency'),
    customFields: readJsonObject(row, 'custom_fields'),
    rawData: readNullableJson(row, 'raw_data'),
    createdAt: readTimestamp(row, 'created_at'),
    updatedAt: readTimestamp(row, 'updated_at')
  };
}

function isMissingPartition(err: unknown): boolean {
  return Boolean(err && typeof err === 'object' && 'code' in err && err.code === NO_PARTITION_CODE);
}

/** Chunk ids double as partition table names, so only the generated shape is accepted. */
function partitionName(chunkId: string): string {
  if (!CHUNK_ID_PATTERN.test(chunkId)) {
    throw new ValidationError(`Invalid chunk id ${chunkId}`, 'invalid_chunk_id', { chunkId });
  }
  return quoteIdentifier(chunkId);
}

/**
 * An interrupted `DETACH ... CONCURRENTLY` leaves the partition pending detach, and only
 * `FINALIZE` can complete it. A partition that is no longer attached just needs dropping.
 */
async function detachPartition(client: Queryable, table: string, chunkId: string): Promise<void> {
  const { rows } = await client.query(
    'SELECT inhdetachpending AS detach_pending FROM pg_inherits WHERE inhrelid = to_regclass($1) AND inhparent = to_regclass($2)',
    [chunkId, READINGS_TABLE]
  );
  const link = rows[0];
  if (!link) {
    return;
  }
  if (readBoolean(link, 'detach_pending')) {
    await client.query(`ALTER TABLE ${READINGS_TABLE} DETACH PARTITION ${table} FINALIZE`);
    return;
  }
  // DETACH ... CONCURRENTLY cannot run inside a transaction block.
  await client.query(`ALTER TABLE ${READINGS_TABLE} DETACH PARTITION ${table} CONCURRENTLY`);
}

/**
 * Readings live in a range-partitioned table with one partition per chunk. Partitions are created
 * on first write under an advisory lock keyed by the chunk id, and dropped by detaching first.
 */
export class PostgresTelemetryRepository implements TelemetryRepository {
  private readonly knownChunks = new Set<string>();
  private readonly logger: Logger;

  constructor(private readonly db: Database, logger: Logger) {
    this.logger = logger.child({ component: 'postgres-telemetry' });
  }

  async insertReading(chunk: ChunkDescriptor, reading: NewReading): Promise<ReadingRecord> {
    await this.ensureChunk(chunk);
    try {
      return await this.insertRow(reading);
    } catch (err) {
      if (!isMissingPartition(err)) {
        throw err;
      }
      // Another process dropped the partition after it was cached.
      this.knownChunks.delete(chunk.id);
      await this.ensureChunk(chunk);
      return this.insertRow(reading);
    }
  }

  async queryReadings(query: ReadingQuery): Promise<ReadingRecord[]> {
    const where = new WhereBuilder();
    if (query.scope.machineId !== undefined) {
      where.add((p) => `machine_id = ${p}`, query.scope.machineId);
    } else {
      where.add((p) => `client_id = ${p}`, query.scope.clientId);
    }
    where
      .add((p) => `recorded_at >= ${p}`, query.from.toISOString())
      .add((p) => `recorded_at < ${p}`, query.to.toISOString())
      .add((p) => `sensor_type = ${p}`, query.sensorType);
    const limit = where.nextPlaceholder(query.limit);
    const { rows } = await this.db.withConnection((client) =>
      client.query(
        `SELECT * FROM ${READINGS_TABLE} ${where.toSql()}
         ORDER BY recorded_at DESC, id DESC
         LIMIT ${limit}`,
        where.values
      )
    );
    return rows.map(mapReading);
  }

  async readRange(machineId: string, from: Date, to: Date): Promise<ReadingRecord[]> {
    const { rows } = await this.db.withConnection((client) =>
      client.query(
        `SELECT * FROM ${READINGS_TABLE}
         WHERE machine_id = $1 AND recorded_at >= $2 AND recorded_at < $3
         ORDER BY recorded_at ASC, id ASC`,
        [machineId, from.toISOString(), to.toISOString()]
      )
    );
    return rows.map(mapReading);
  }

  async latestByClient(clientId: string): Promise<ReadingRecord[]> {
    const { rows } = await this.db.withConnection((client) =>
      client.query(
        `SELECT * FROM (
           SELECT DISTINCT ON (machine_id) *
             FROM ${READINGS_TABLE}
            WHERE client_id = $1
            ORDER BY machine_id, recorded_at DESC, id DESC
         ) latest
         ORDER BY recorded_at DESC, id DESC`,
        [clientId]
      )
    );
    return rows.map(mapReading);
  }

  async listChunks(): Promise<ChunkRecord[]> {
    const { rows } = await this.db.withConnection((client) =>
      client.query(
        `SELECT c.id, c.range_start, c.range_end,
                (SELECT COUNT(*) FROM ${READINGS_TABLE} r
                  WHERE r.recorded_at >= c.range_start AND r.recorded_at < c.range_end) AS row_count
           FROM telemetry_chunks c
          ORDER BY c.range_start ASC`
      )
    );
    return rows.map((row) => ({
      id: readText(row, 'id'),
      rangeStart: readTimestamp(row, 'range_start'),
      rangeEnd: readTimestamp(row, 'range_end'),
      rowCount: readNumber(row, 'row_count')
    }));
  }

  async dropChunk(chunkId: string): Promise<boolean> {
    const table = partitionName(chunkId);
    this.knownChunks.delete(chunkId);
    return this.db.withConnection(async (client) => {
      const registered = await client.query('SELECT id FROM telemetry_chunks WHERE id = $1', [chunkId]);
      if (registered.rows.length === 0) {
        return false;
      }
      const existing = await client.query('SELECT to_regclass($1) AS relation', [chunkId]);
      const relation = existing.rows[0]?.relation;
      if (relation !== null && relation !== undefined) {
        await detachPartition(client, table, chunkId);
        await client.query(`DROP TABLE IF EXISTS ${table}`);
      }
      await client.query('DELETE FROM telemetry_chunks WHERE id = $1', [chunkId]);
      this.logger.info({ chunkId }, 'dropped telemetry chunk');
      return true;
    });
  }

  private async ensureChunk(chunk: ChunkDescriptor): Promise<void> {
    if (this.knownChunks.has(chunk.id)) {
      return;
    }
    const table = partitionName(chunk.id);
    await this.db.withTransaction(async (client) => {
      await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [`telemetry_chunk:${chunk.id}`]);
      await createPartition(client, table, chunk);
      await client.query(
        `INSERT INTO telemetry_chunks (id, range_start, range_end)
         VALUES ($1, $2, $3)
         ON CONFLICT (id) DO NOTHING`,
        [chunk.id, chunk.rangeStart, chunk.rangeEnd]
      );
    });
    this.knownChunks.add(chunk.id);
  }

  private async insertRow(reading: NewReading): Promise<ReadingRecord> {
    const { rows } = await this.db.withConnection((client) =>
      client.query(
        `INSERT INTO ${READINGS_TABLE} (
           machine_id, client_id, sensor_type, recorded_at, temperature, vibration, power,
           pressure, speed, efficiency, custom_fields, raw_data, created_at, updated_at
         ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11::jsonb, $12::jsonb, $13, $14)
         RETURNING *`,
        [
          reading.machineId,
          reading.clientId,
          reading.sensorType,
          reading.timestamp,
          reading.temperature,
          reading.vibration,
          reading.power,
          reading.pressure,
          reading.speed,
          reading.efficiency,
          jsonParam(reading.customFields),
          jsonParam(reading.rawData),
          reading.createdAt,
          reading.updatedAt
        ]
      )
    );
    return mapReading(requireRow(rows, 'insert reading'));
  }
}

async function createPartition(client: Queryable, table: string, chunk: ChunkDescriptor): Promise<void> {
  await client.query(
    `CREATE TABLE IF NOT EXISTS ${table}
       PARTITION OF ${READINGS_TABLE}
       FOR VALUES FROM (${quoteLiteral(chunk.rangeStart)}) TO (${quoteLiteral(chunk.rangeEnd)})`
  );
}
