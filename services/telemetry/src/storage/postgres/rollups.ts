import type { Database, Row } from '../../db/client';
import {
  ROLLUP_GRANULARITIES,
  type RollupGranularity,
  type RollupKey,
  type RollupListQuery,
  type RollupRecord
} from '../../rollup/types';
import type { RollupRepository } from '../types';
import { readEnum, readNullableNumber, readNumber, readText, readTimestamp } from './rows';

function mapRollup(row: Row): RollupRecord {
  return {
    granularity: readEnum(row, 'granularity', ROLLUP_GRANULARITIES),
    machineId: readText(row, 'machine_id'),
    clientId: readText(row, 'client_id'),
    bucketStart: readTimestamp(row, 'bucket_start'),
    bucketEnd: readTimestamp(row, 'bucket_end'),
    readingCount: readNumber(row, 'reading_count'),
    avgTemperature: readNullableNumber(row, 'avg_temperature'),
    maxTemperature: readNullableNumber(row, 'max_temperature'),
    minTemperature: readNullableNumber(row, 'min_temperature'),
    temperatureStddev: readNullableNumber(row, 'temperature_stddev'),
    avgVibration: readNullableNumber(row, 'avg_vibration'),
    maxVibration: readNullableNumber(row, 'max_vibration'),
    vibrationStddev: readNullableNumber(row, 'vibration_stddev'),
    avgPower: readNullableNumber(row, 'avg_power'),
    maxPower: readNullableNumber(row, 'max_power'),
    powerStddev: readNullableNumber(row, 'power_stddev'),
    highTemperatureCount: readNumber(row, 'high_temperature_count'),
    highVibrationCount: readNumber(row, 'high_vibration_count'),
    computedAt: readTimestamp(row, 'computed_at')
  };
}

export class PostgresRollupRepository implements RollupRepository {
  constructor(private readonly db: Database) {}

  /** A single upsert statement, so readers see either the previous record or the new one. */
  async publish(record: RollupRecord): Promise<void> {
    await this.db.withConnection((client) =>
      client.query(
        `INSERT INTO machine_rollups (
           granularity, machine_id, client_id, bucket_start, bucket_end, reading_count,
           avg_temperature, max_temperature, min_temperature, temperature_stddev,
           avg_vibration, max_vibration, vibration_stddev,
           avg_power, max_power, power_stddev,
           high_temperature_count, high_vibration_count, computed_at
         ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18, $19)
         ON CONFLICT (granularity, machine_id, bucket_start) DO UPDATE SET
           client_id = EXCLUDED.client_id,
           bucket_end = EXCLUDED.bucket_end,
           reading_count = EXCLUDED.reading_count,
           avg_temperature = EXCLUDED.avg_temperature,
           max_temperature = EXCLUDED.max_temperature,
           min_temperature = EXCLUDED.min_temperature,
           temperature_stddev = EXCLUDED.temperature_stddev,
           avg_vibration = EXCLUDED.avg_vibration,
           max_vibration = EXCLUDED.max_vibration,
           vibration_stddev = EXCLUDED.vibration_stddev,
           avg_power = EXCLUDED.avg_power,
           max_power = EXCLUDED.max_power,
           power_stddev = EXCLUDED.power_stddev,
           high_temperature_count = EXCLUDED.high_temperature_count,
           high_vibration_count = EXCLUDED.high_vibration_count,
           computed_at = EXCLUDED.computed_at`,
        [
          record.granularity,
          record.machineId,
          record.clientId,
          record.bucketStart,
          record.bucketEnd,
          record.readingCount,
          record.avgTemperature,
          record.maxTemperature,
          record.minTemperature,
          record.temperatureStddev,
          record.avgVibration,
          record.maxVibration,
          record.vibrationStddev,
          record.avgPower,
          record.maxPower,
          record.powerStddev,
          record.highTemperatureCount,
          record.highVibrationCount,
          record.computedAt
        ]
      )
    );
  }

  async remove(key: RollupKey): Promise<boolean> {
    const { rowCount } = await this.db.withConnection((client) =>
      client.query(
        'DELETE FROM machine_rollups WHERE granularity = $1 AND machine_id = $2 AND bucket_start = $3',
        [key.granularity, key.machineId, key.bucketStart]
      )
    );
    return (rowCount ?? 0) > 0;
  }

  async get(key: RollupKey): Promise<RollupRecord | null> {
    const { rows } = await this.db.withConnection((client) =>
      client.query(
        'SELECT * FROM machine_rollups WHERE granularity = $1 AND machine_id = $2 AND bucket_start = $3',
        [key.granularity, key.machineId, key.bucketStart]
      )
    );
    const row = rows[0];
    return row ? mapRollup(row) : null;
  }

  async list(query: RollupListQuery): Promise<RollupRecord[]> {
    const { rows } = await this.db.withConnection((client) =>
      client.query(
        `SELECT * FROM machine_rollups
          WHERE granularity = $1 AND machine_id = $2 AND bucket_start >= $3 AND bucket_start < $4
          ORDER BY bucket_start ASC`,
        [query.granularity, query.machineId, query.from.toISOString(), query.to.toISOString()]
      )
    );
    return rows.map(mapRollup);
  }

  async listBefore(granularity: RollupGranularity, cutoff: Date): Promise<RollupRecord[]> {
    const { rows } = await this.db.withConnection((client) =>
      client.query(
        `SELECT * FROM machine_rollups
          WHERE granularity = $1 AND bucket_start < $2
          ORDER BY machine_id ASC, bucket_start ASC`,
        [granularity, cutoff.toISOString()]
      )
    );
    return rows.map(mapRollup);
  }
}
