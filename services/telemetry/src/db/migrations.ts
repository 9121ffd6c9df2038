import type { Logger } from '../logger';
import type { Queryable } from './client';

type Migration = {
  id: string;
  statements: string[];
};

const MIGRATION_TABLE = 'telemetry_schema_migrations';

const migrations: Migration[] = [
  {
    id: '001_tenancy',
    statements: [
      `CREATE TABLE IF NOT EXISTS clients (
         client_id TEXT PRIMARY KEY,
         company_name TEXT NOT NULL,
         industry TEXT,
         contact_email TEXT,
         contact_phone TEXT,
         subscription_tier TEXT NOT NULL DEFAULT 'starter',
         max_machines INTEGER NOT NULL DEFAULT 25 CHECK (max_machines >= 0),
         settings JSONB NOT NULL DEFAULT '{}'::jsonb,
         is_active BOOLEAN NOT NULL DEFAULT TRUE,
         created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
         updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
       );`,
      `CREATE TABLE IF NOT EXISTS machines (
         machine_id TEXT PRIMARY KEY,
         client_id TEXT NOT NULL REFERENCES clients(client_id),
         machine_name TEXT NOT NULL,
         machine_type TEXT,
         location TEXT,
         manufacturer TEXT,
         model TEXT,
         installation_date TIMESTAMPTZ,
         specifications JSONB NOT NULL DEFAULT '{}'::jsonb,
         maintenance_schedule JSONB NOT NULL DEFAULT '{}'::jsonb,
         last_maintenance TIMESTAMPTZ,
         next_maintenance TIMESTAMPTZ,
         criticality_level TEXT NOT NULL DEFAULT 'medium',
         operating_hours DOUBLE PRECISION NOT NULL DEFAULT 0,
         thresholds JSONB,
         is_active BOOLEAN NOT NULL DEFAULT TRUE,
         created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
         updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
       );`,
      `CREATE INDEX IF NOT EXISTS idx_machines_client ON machines(client_id, is_active);`,
      `CREATE TABLE IF NOT EXISTS users (
         username TEXT PRIMARY KEY,
         email TEXT NOT NULL,
         password_hash TEXT NOT NULL,
         first_name TEXT,
         last_name TEXT,
         client_id TEXT REFERENCES clients(client_id),
         role TEXT NOT NULL DEFAULT 'operator',
         permissions TEXT[] NOT NULL DEFAULT '{}',
         is_active BOOLEAN NOT NULL DEFAULT TRUE,
         created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
         updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
       );`,
      `CREATE UNIQUE INDEX IF NOT EXISTS idx_users_email ON users (LOWER(email));`
    ]
  },
  {
    id: '002_readings',
    statements: [
      `CREATE TABLE IF NOT EXISTS telemetry_readings (
         id BIGSERIAL NOT NULL,
         machine_id TEXT NOT NULL,
         client_id TEXT NOT NULL,
         sensor_type TEXT NOT NULL,
         recorded_at TIMESTAMPTZ NOT NULL,
         temperature DOUBLE PRECISION,
         vibration DOUBLE PRECISION,
         power DOUBLE PRECISION,
         pressure DOUBLE PRECISION,
         speed DOUBLE PRECISION,
         efficiency DOUBLE PRECISION,
         custom_fields JSONB NOT NULL DEFAULT '{}'::jsonb,
         raw_data JSONB,
         created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
         updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
         PRIMARY KEY (id, recorded_at)
       ) PARTITION BY RANGE (recorded_at);`,
      `CREATE INDEX IF NOT EXISTS idx_readings_machine_time ON telemetry_readings (machine_id, recorded_at DESC);`,
      `CREATE INDEX IF NOT EXISTS idx_readings_client_time ON telemetry_readings (client_id, recorded_at DESC);`,
      `CREATE INDEX IF NOT EXISTS idx_readings_sensor_time ON telemetry_readings (sensor_type, recorded_at DESC);`,
      `CREATE TABLE IF NOT EXISTS telemetry_chunks (
         id TEXT PRIMARY KEY,
         range_start TIMESTAMPTZ NOT NULL,
         range_end TIMESTAMPTZ NOT NULL,
         created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
         CHECK (range_end > range_start)
       );`,
      `CREATE INDEX IF NOT EXISTS idx_chunks_range ON telemetry_chunks (range_start);`
    ]
  },
  {
    id: '003_rollups',
    statements: [
      `CREATE TABLE IF NOT EXISTS machine_rollups (
         granularity TEXT NOT NULL CHECK (granularity IN ('hourly', 'daily')),
         machine_id TEXT NOT NULL,
         client_id TEXT NOT NULL,
         bucket_start TIMESTAMPTZ NOT NULL,
         bucket_end TIMESTAMPTZ NOT NULL,
         reading_count INTEGER NOT NULL,
         avg_temperature DOUBLE PRECISION,
         max_temperature DOUBLE PRECISION,
         min_temperature DOUBLE PRECISION,
         temperature_stddev DOUBLE PRECISION,
         avg_vibration DOUBLE PRECISION,
         max_vibration DOUBLE PRECISION,
         vibration_stddev DOUBLE PRECISION,
         avg_power DOUBLE PRECISION,
         max_power DOUBLE PRECISION,
         power_stddev DOUBLE PRECISION,
         high_temperature_count INTEGER NOT NULL DEFAULT 0,
         high_vibration_count INTEGER NOT NULL DEFAULT 0,
         computed_at TIMESTAMPTZ NOT NULL,
         PRIMARY KEY (granularity, machine_id, bucket_start)
       );`,
      `CREATE INDEX IF NOT EXISTS idx_rollups_bucket_end ON machine_rollups (granularity, bucket_end);`
    ]
  },
  {
    id: '004_entities',
    statements: [
      `CREATE TABLE IF NOT EXISTS anomalies (
         id BIGSERIAL PRIMARY KEY,
         machine_id TEXT NOT NULL,
         client_id TEXT NOT NULL,
         anomaly_type TEXT NOT NULL,
         confidence_score DOUBLE PRECISION NOT NULL CHECK (confidence_score >= 0 AND confidence_score <= 1),
         detected_at TIMESTAMPTZ NOT NULL,
         sensor_values JSONB NOT NULL DEFAULT '{}'::jsonb,
         description TEXT,
         severity TEXT NOT NULL DEFAULT 'medium',
         status TEXT NOT NULL DEFAULT 'active',
         model_version TEXT,
         threshold_values JSONB NOT NULL DEFAULT '{}'::jsonb,
         created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
         acknowledged_at TIMESTAMPTZ,
         acknowledged_by TEXT,
         resolved_at TIMESTAMPTZ,
         resolved_by TEXT
       );`,
      `CREATE INDEX IF NOT EXISTS idx_anomalies_machine_time ON anomalies (machine_id, detected_at DESC);`,
      `CREATE INDEX IF NOT EXISTS idx_anomalies_client_status ON anomalies (client_id, status);`,
      `CREATE TABLE IF NOT EXISTS alerts (
         id BIGSERIAL PRIMARY KEY,
         machine_id TEXT NOT NULL,
         client_id TEXT NOT NULL,
         alert_type TEXT NOT NULL,
         severity TEXT NOT NULL,
         title TEXT NOT NULL,
         message TEXT NOT NULL,
         raised_at TIMESTAMPTZ NOT NULL,
         acknowledged BOOLEAN NOT NULL DEFAULT FALSE,
         acknowledged_by TEXT,
         acknowledged_at TIMESTAMPTZ,
         resolved BOOLEAN NOT NULL DEFAULT FALSE,
         resolved_by TEXT,
         resolved_at TIMESTAMPTZ,
         resolution_notes TEXT,
         notification_sent BOOLEAN NOT NULL DEFAULT FALSE,
         escalated BOOLEAN NOT NULL DEFAULT FALSE,
         escalated_at TIMESTAMPTZ,
         related_anomaly_id BIGINT REFERENCES anomalies(id),
         metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
         created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
       );`,
      `CREATE INDEX IF NOT EXISTS idx_alerts_machine_time ON alerts (machine_id, raised_at DESC);`,
      `CREATE INDEX IF NOT EXISTS idx_alerts_client_open ON alerts (client_id) WHERE NOT resolved;`,
      `CREATE INDEX IF NOT EXISTS idx_alerts_related_anomaly ON alerts (related_anomaly_id);`,
      `CREATE TABLE IF NOT EXISTS ml_models (
         id BIGSERIAL PRIMARY KEY,
         machine_id TEXT NOT NULL,
         client_id TEXT NOT NULL,
         model_type TEXT NOT NULL,
         model_version TEXT NOT NULL,
         accuracy_score DOUBLE PRECISION,
         precision_score DOUBLE PRECISION,
         recall_score DOUBLE PRECISION,
         f1_score DOUBLE PRECISION,
         training_data_count INTEGER,
         model_file_path TEXT,
         model_size_mb DOUBLE PRECISION,
         hyperparameters JSONB NOT NULL DEFAULT '{}'::jsonb,
         feature_importance JSONB NOT NULL DEFAULT '{}'::jsonb,
         training_duration_seconds INTEGER,
         performance_metrics JSONB NOT NULL DEFAULT '{}'::jsonb,
         is_active BOOLEAN NOT NULL DEFAULT FALSE,
         deployed_at TIMESTAMPTZ,
         created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
       );`,
      `CREATE UNIQUE INDEX IF NOT EXISTS idx_ml_models_single_active
         ON ml_models (machine_id, model_type)
         WHERE is_active;`
    ]
  }
];

export function listMigrationIds(): string[] {
  return migrations.map((migration) => migration.id);
}

export async function runMigrations(client: Queryable, logger: Logger): Promise<void> {
  await client.query(
    `CREATE TABLE IF NOT EXISTS ${MIGRATION_TABLE} (
       id TEXT PRIMARY KEY,
       applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
     )`
  );

  const { rows } = await client.query(`SELECT id FROM ${MIGRATION_TABLE}`);
  const applied = new Set<string>();
  for (const row of rows) {
    if (typeof row.id === 'string') {
      applied.add(row.id);
    }
  }

  for (const migration of migrations) {
    if (applied.has(migration.id)) {
      continue;
    }
    await client.query('BEGIN');
    try {
      for (const statement of migration.statements) {
        await client.query(statement);
      }
      await client.query(`INSERT INTO ${MIGRATION_TABLE} (id) VALUES ($1)`, [migration.id]);
      await client.query('COMMIT');
      logger.info({ migration: migration.id }, 'applied migration');
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    }
  }
}
