import type { Database, Row } from '../../db/client';
import { ConflictError, toTelemetryError } from '../../errors';
import {
  ALERT_FLAGS,
  TERMINAL_ANOMALY_STATUSES,
  type AlertFlag,
  type AlertGuard,
  type AlertListFilter,
  type AlertPatch,
  type AlertRecord,
  type AlertSeverity,
  type AnomalyListFilter,
  type AnomalyRecord,
  type AnomalySeverity,
  type AnomalyStatus,
  type AnomalyTransitionPatch,
  type ModelListFilter,
  type ModelRecord,
  type NewAlert,
  type NewAnomaly,
  type NewModel
} from '../../entities/types';
import type { AlertRepository, AnomalyRepository, ModelRepository } from '../types';
import {
  UpdateBuilder,
  WhereBuilder,
  jsonParam,
  readBoolean,
  readEnum,
  readJsonObject,
  readNullableNumber,
  readNullableText,
  readNullableTimestamp,
  readNumber,
  readText,
  readTimestamp,
  requireRow
} from './rows';

const ANOMALY_SEVERITIES: readonly AnomalySeverity[] = ['low', 'medium', 'high', 'critical'];
const ANOMALY_STATUSES: readonly AnomalyStatus[] = ['active', 'acknowledged', 'resolved', 'false_positive'];
const ALERT_SEVERITIES: readonly AlertSeverity[] = ['info', 'warning', 'critical'];

const ALERT_FLAG_COLUMNS: Record<AlertFlag, string> = {
  acknowledged: 'acknowledged',
  resolved: 'resolved',
  escalated: 'escalated',
  notificationSent: 'notification_sent'
};

function mapAnomaly(row: Row): AnomalyRecord {
  return {
    id: readNumber(row, 'id'),
    machineId: readText(row, 'machine_id'),
    clientId: readText(row, 'client_id'),
    anomalyType: readText(row, 'anomaly_type'),
    confidenceScore: readNumber(row, 'confidence_score'),
    timestamp: readTimestamp(row, 'detected_at'),
    sensorValues: readJsonObject(row, 'sensor_values'),
    description: readNullableText(row, 'description'),
    severity: readEnum(row, 'severity', ANOMALY_SEVERITIES),
    status: readEnum(row, 'status', ANOMALY_STATUSES),
    modelVersion: readNullableText(row, 'model_version'),
    thresholdValues: readJsonObject(row, 'threshold_values'),
    createdAt: readTimestamp(row, 'created_at'),
    acknowledgedAt: readNullableTimestamp(row, 'acknowledged_at'),
    acknowledgedBy: readNullableText(row, 'acknowledged_by'),
    resolvedAt: readNullableTimestamp(row, 'resolved_at'),
    resolvedBy: readNullableText(row, 'resolved_by')
  };
}

function mapAlert(row: Row): AlertRecord {
  return {
    id: readNumber(row, 'id'),
    machineId: readText(row, 'machine_id'),
    clientId: readText(row, 'client_id'),
    alertType: readText(row, 'alert_type'),
    severity: readEnum(row, 'severity', ALERT_SEVERITIES),
    title: readText(row, 'title'),
    message: readText(row, 'message'),
    timestamp: readTimestamp(row, 'raised_at'),
    acknowledged: readBoolean(row, 'acknowledged'),
    acknowledgedBy: readNullableText(row, 'acknowledged_by'),
    acknowledgedAt: readNullableTimestamp(row, 'acknowledged_at'),
    resolved: readBoolean(row, 'resolved'),
    resolvedBy: readNullableText(row, 'resolved_by'),
    resolvedAt: readNullableTimestamp(row, 'resolved_at'),
    resolutionNotes: readNullableText(row, 'resolution_notes'),
    notificationSent: readBoolean(row, 'notification_sent'),
    escalated: readBoolean(row, 'escalated'),
    escalatedAt: readNullableTimestamp(row, 'escalated_at'),
    relatedAnomalyId: readNullableNumber(row, 'related_anomaly_id'),
    metadata: readJsonObject(row, 'metadata'),
    createdAt: readTimestamp(row, 'created_at')
  };
}

function mapModel(row: Row): ModelRecord {
  return {
    id: readNumber(row, 'id'),
    machineId: readText(row, 'machine_id'),
    clientId: readText(row, 'client_id'),
    modelType: readText(row, 'model_type'),
    modelVersion: readText(row, 'model_version'),
    accuracyScore: readNullableNumber(row, 'accuracy_score'),
    precisionScore: readNullableNumber(row, 'precision_score'),
    recallScore: readNullableNumber(row, 'recall_score'),
    f1Score: readNullableNumber(row, 'f1_score'),
    trainingDataCount: readNullableNumber(row, 'training_data_count'),
    modelFilePath: readNullableText(row, 'model_file_path'),
    modelSizeMb: readNullableNumber(row, 'model_size_mb'),
    hyperparameters: readJsonObject(row, 'hyperparameters'),
    featureImportance: readJsonObject(row, 'feature_importance'),
    trainingDurationSeconds: readNullableNumber(row, 'training_duration_seconds'),
    performanceMetrics: readJsonObject(row, 'performance_metrics'),
    isActive: readBoolean(row, 'is_active'),
    deployedAt: readNullableTimestamp(row, 'deployed_at'),
    createdAt: readTimestamp(row, 'created_at')
  };
}

function scopeFilter(
  filter: { clientId?: string; machineId?: string; from?: Date; to?: Date },
  timeColumn: string
): WhereBuilder {
  return new WhereBuilder()
    .add((p) => `client_id = ${p}`, filter.clientId)
    .add((p) => `machine_id = ${p}`, filter.machineId)
    .add((p) => `${timeColumn} >= ${p}`, filter.from?.toISOString())
    .add((p) => `${timeColumn} < ${p}`, filter.to?.toISOString());
}

function limitClause(where: WhereBuilder, limit: number | undefined): string {
  return limit === undefined ? '' : `LIMIT ${where.nextPlaceholder(limit)}`;
}

export class PostgresAnomalyRepository implements AnomalyRepository {
  constructor(private readonly db: Database) {}

  async insert(record: NewAnomaly): Promise<AnomalyRecord> {
    const { rows } = await this.db.withConnection((client) =>
      client.query(
        `INSERT INTO anomalies (
           machine_id, client_id, anomaly_type, confidence_score, detected_at, sensor_values,
           description, severity, status, model_version, threshold_values, created_at,
           acknowledged_at, acknowledged_by, resolved_at, resolved_by
         ) VALUES ($1, $2, $3, $4, $5, $6::jsonb, $7, $8, $9, $10, $11::jsonb, $12, $13, $14, $15, $16)
         RETURNING *`,
        [
          record.machineId,
          record.clientId,
          record.anomalyType,
          record.confidenceScore,
          record.timestamp,
          jsonParam(record.sensorValues),
          record.description,
          record.severity,
          record.status,
          record.modelVersion,
          jsonParam(record.thresholdValues),
          record.createdAt,
          record.acknowledgedAt,
          record.acknowledgedBy,
          record.resolvedAt,
          record.resolvedBy
        ]
      )
    );
    return mapAnomaly(requireRow(rows, 'insert anomaly'));
  }

  async get(id: number): Promise<AnomalyRecord | null> {
    const { rows } = await this.db.withConnection((client) =>
      client.query('SELECT * FROM anomalies WHERE id = $1', [id])
    );
    const row = rows[0];
    return row ? mapAnomaly(row) : null;
  }

  async list(filter: AnomalyListFilter): Promise<AnomalyRecord[]> {
    const where = scopeFilter(filter, 'detected_at')
      .add((p) => `status = ${p}`, filter.status)
      .add((p) => `severity = ${p}`, filter.severity);
    const limit = limitClause(where, filter.limit);
    const { rows } = await this.db.withConnection((client) =>
      client.query(
        `SELECT * FROM anomalies ${where.toSql()} ORDER BY detected_at DESC, id DESC ${limit}`,
        where.values
      )
    );
    return rows.map(mapAnomaly);
  }

  async transition(
    id: number,
    expected: AnomalyStatus,
    patch: AnomalyTransitionPatch
  ): Promise<AnomalyRecord | null> {
    const update = new UpdateBuilder([id, expected])
      .set('status', patch.status)
      .set('acknowledged_at', patch.acknowledgedAt)
      .set('acknowledged_by', patch.acknowledgedBy)
      .set('resolved_at', patch.resolvedAt)
      .set('resolved_by', patch.resolvedBy);
    const { rows } = await this.db.withConnection((client) =>
      client.query(
        `UPDATE anomalies SET ${update.toSql()} WHERE id = $1 AND status = $2 RETURNING *`,
        update.values
      )
    );
    const row = rows[0];
    return row ? mapAnomaly(row) : null;
  }

  async purge(cutoff: Date): Promise<number> {
    const { rowCount } = await this.db.withConnection((client) =>
      client.query(
        `DELETE FROM anomalies a
          WHERE a.status = ANY($1::text[])
            AND a.detected_at < $2
            AND NOT EXISTS (SELECT 1 FROM alerts al WHERE al.related_anomaly_id = a.id)`,
        [[...TERMINAL_ANOMALY_STATUSES], cutoff.toISOString()]
      )
    );
    return rowCount ?? 0;
  }
}

export class PostgresAlertRepository implements AlertRepository {
  constructor(private readonly db: Database) {}

  async insert(record: NewAlert): Promise<AlertRecord> {
    const { rows } = await this.db.withConnection((client) =>
      client.query(
        `INSERT INTO alerts (
           machine_id, client_id, alert_type, severity, title, message, raised_at,
           acknowledged, acknowledged_by, acknowledged_at, resolved, resolved_by, resolved_at,
           resolution_notes, notification_sent, escalated, escalated_at, related_anomaly_id,
           metadata, created_at
         ) VALUES (
           $1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18, $19::jsonb, $20
         )
         RETURNING *`,
        [
          record.machineId,
          record.clientId,
          record.alertType,
          record.severity,
          record.title,
          record.message,
          record.timestamp,
          record.acknowledged,
          record.acknowledgedBy,
          record.acknowledgedAt,
          record.resolved,
          record.resolvedBy,
          record.resolvedAt,
          record.resolutionNotes,
          record.notificationSent,
          record.escalated,
          record.escalatedAt,
          record.relatedAnomalyId,
          jsonParam(record.metadata),
          record.createdAt
        ]
      )
    );
    return mapAlert(requireRow(rows, 'insert alert'));
  }

  async get(id: number): Promise<AlertRecord | null> {
    const { rows } = await this.db.withConnection((client) =>
      client.query('SELECT * FROM alerts WHERE id = $1', [id])
    );
    const row = rows[0];
    return row ? mapAlert(row) : null;
  }

  async list(filter: AlertListFilter): Promise<AlertRecord[]> {
    const where = scopeFilter(filter, 'raised_at').add((p) => `severity = ${p}`, filter.severity);
    if (filter.unresolvedOnly) {
      where.raw('NOT resolved');
    }
    const limit = limitClause(where, filter.limit);
    const { rows } = await this.db.withConnection((client) =>
      client.query(
        `SELECT * FROM alerts ${where.toSql()} ORDER BY raised_at DESC, id DESC ${limit}`,
        where.values
      )
    );
    return rows.map(mapAlert);
  }

  async updateIf(id: number, guard: AlertGuard, patch: AlertPatch): Promise<AlertRecord | null> {
    const update = new UpdateBuilder([id])
      .set('acknowledged', patch.acknowledged)
      .set('acknowledged_by', patch.acknowledgedBy)
      .set('acknowledged_at', patch.acknowledgedAt)
      .set('resolved', patch.resolved)
      .set('resolved_by', patch.resolvedBy)
      .set('resolved_at', patch.resolvedAt)
      .set('resolution_notes', patch.resolutionNotes)
      .set('notification_sent', patch.notificationSent)
      .set('escalated', patch.escalated)
      .set('escalated_at', patch.escalatedAt);
    const conditions = ['id = $1'];
    for (const flag of ALERT_FLAGS) {
      if (guard[flag] === false) {
        conditions.push(`NOT ${ALERT_FLAG_COLUMNS[flag]}`);
      }
    }
    const { rows } = await this.db.withConnection((client) =>
      client.query(
        `UPDATE alerts SET ${update.toSql()} WHERE ${conditions.join(' AND ')} RETURNING *`,
        update.values
      )
    );
    const row = rows[0];
    return row ? mapAlert(row) : null;
  }

  async purge(cutoff: Date): Promise<number> {
    const { rowCount } = await this.db.withConnection((client) =>
      client.query('DELETE FROM alerts WHERE resolved AND raised_at < $1', [cutoff.toISOString()])
    );
    return rowCount ?? 0;
  }
}

function activeConflict(err: unknown, machineId: string, modelType: string): unknown {
  const normalized = toTelemetryError(err);
  if (normalized.kind === 'conflict') {
    return new ConflictError(`An active ${modelType} model already exists for ${machineId}`, 'duplicate', {
      machineId,
      modelType
    });
  }
  return normalized;
}

/**
 * The partial unique index on `(machine_id, model_type) WHERE is_active` backs the single-active
 * rule; swaps deactivate the previous model and activate the new one in one transaction.
 */
export class PostgresModelRepository implements ModelRepository {
  constructor(private readonly db: Database) {}

  async insert(record: NewModel): Promise<ModelRecord> {
    try {
      return await this.db.withTransaction(async (client) => {
        if (record.isActive) {
          await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [
            `ml_model:${record.machineId}:${record.modelType}`
          ]);
          await client.query(
            'UPDATE ml_models SET is_active = FALSE WHERE machine_id = $1 AND model_type = $2 AND is_active',
            [record.machineId, record.modelType]
          );
        }
        const { rows } = await client.query(
          `INSERT INTO ml_models (
             machine_id, client_id, model_type, model_version, accuracy_score, precision_score,
             recall_score, f1_score, training_data_count, model_file_path, model_size_mb,
             hyperparameters, feature_importance, training_duration_seconds, performance_metrics,
             is_active, deployed_at, created_at
           ) VALUES (
             $1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12::jsonb, $13::jsonb, $14, $15::jsonb, $16, $17, $18
           )
           RETURNING *`,
          [
            record.machineId,
            record.clientId,
            record.modelType,
            record.modelVersion,
            record.accuracyScore,
            record.precisionScore,
            record.recallScore,
            record.f1Score,
            record.trainingDataCount,
            record.modelFilePath,
            record.modelSizeMb,
            jsonParam(record.hyperparameters),
            jsonParam(record.featureImportance),
            record.trainingDurationSeconds,
            jsonParam(record.performanceMetrics),
            record.isActive,
            record.deployedAt,
            record.createdAt
          ]
        );
        return mapModel(requireRow(rows, 'insert model'));
      });
    } catch (err) {
      throw activeConflict(err, record.machineId, record.modelType);
    }
  }

  async activate(id: number, deployedAt: string): Promise<ModelRecord | null> {
    return this.db.withTransaction(async (client) => {
      const existing = await client.query('SELECT machine_id, model_type FROM ml_models WHERE id = $1', [id]);
      const current = existing.rows[0];
      if (!current) {
        return null;
      }
      const machineId = readText(current, 'machine_id');
      const modelType = readText(current, 'model_type');
      await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [`ml_model:${machineId}:${modelType}`]);
      await client.query(
        `UPDATE ml_models SET is_active = FALSE
          WHERE machine_id = $1 AND model_type = $2 AND is_active AND id <> $3`,
        [machineId, modelType, id]
      );
      const { rows } = await client.query(
        'UPDATE ml_models SET is_active = TRUE, deployed_at = $2 WHERE id = $1 RETURNING *',
        [id, deployedAt]
      );
      return mapModel(requireRow(rows, 'activate model'));
    });
  }

  async deactivate(id: number): Promise<ModelRecord | null> {
    const { rows } = await this.db.withConnection((client) =>
      client.query('UPDATE ml_models SET is_active = FALSE WHERE id = $1 RETURNING *', [id])
    );
    const row = rows[0];
    return row ? mapModel(row) : null;
  }

  async get(id: number): Promise<ModelRecord | null> {
    const { rows } = await this.db.withConnection((client) =>
      client.query('SELECT * FROM ml_models WHERE id = $1', [id])
    );
    const row = rows[0];
    return row ? mapModel(row) : null;
  }

  async getActive(machineId: string, modelType: string): Promise<ModelRecord | null> {
    const { rows } = await this.db.withConnection((client) =>
      client.query('SELECT * FROM ml_models WHERE machine_id = $1 AND model_type = $2 AND is_active', [
        machineId,
        modelType
      ])
    );
    const row = rows[0];
    return row ? mapModel(row) : null;
  }

  async list(filter: ModelListFilter): Promise<ModelRecord[]> {
    const where = new WhereBuilder()
      .add((p) => `client_id = ${p}`, filter.clientId)
      .add((p) => `machine_id = ${p}`, filter.machineId)
      .add((p) => `model_type = ${p}`, filter.modelType);
    if (filter.activeOnly) {
      where.raw('is_active');
    }
    const { rows } = await this.db.withConnection((client) =>
      client.query(`SELECT * FROM ml_models ${where.toSql()} ORDER BY created_at DESC, id DESC`, where.values)
    );
    return rows.map(mapModel);
  }
}
