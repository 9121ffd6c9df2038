import type { JsonObject } from '../tenancy/types';

export type AnomalySeverity = 'low' | 'medium' | 'high' | 'critical';

export type AnomalyStatus = 'active' | 'acknowledged' | 'resolved' | 'false_positive';

export const TERMINAL_ANOMALY_STATUSES: readonly AnomalyStatus[] = ['resolved', 'false_positive'];

export interface AnomalyRecord {
  id: number;
  machineId: string;
  clientId: string;
  anomalyType: string;
  confidenceScore: number;
  timestamp: string;
  sensorValues: JsonObject;
  description: string | null;
  severity: AnomalySeverity;
  status: AnomalyStatus;
  modelVersion: string | null;
  thresholdValues: JsonObject;
  createdAt: string;
  acknowledgedAt: string | null;
  acknowledgedBy: string | null;
  resolvedAt: string | null;
  resolvedBy: string | null;
}

export type NewAnomaly = Omit<AnomalyRecord, 'id'>;

export type AnomalyTransitionPatch = Pick<AnomalyRecord, 'status'> &
  Partial<Pick<AnomalyRecord, 'acknowledgedAt' | 'acknowledgedBy' | 'resolvedAt' | 'resolvedBy'>>;

export interface AnomalyListFilter {
  clientId?: string;
  machineId?: string;
  status?: AnomalyStatus;
  severity?: AnomalySeverity;
  from?: Date;
  to?: Date;
  limit?: number;
}

export type AlertSeverity = 'info' | 'warning' | 'critical';

export type AlertFlag = 'acknowledged' | 'resolved' | 'escalated' | 'notificationSent';

export const ALERT_FLAGS: readonly AlertFlag[] = ['resolved', 'acknowledged', 'escalated', 'notificationSent'];

export interface AlertRecord {
  id: number;
  machineId: string;
  clientId: string;
  alertType: string;
  severity: AlertSeverity;
  title: string;
  message: string;
  timestamp: string;
  acknowledged: boolean;
  acknowledgedBy: string | null;
  acknowledgedAt: string | null;
  resolved: boolean;
  resolvedBy: string | null;
  resolvedAt: string | null;
  resolutionNotes: string | null;
  notificationSent: boolean;
  escalated: boolean;
  escalatedAt: string | null;
  relatedAnomalyId: number | null;
  metadata: JsonObject;
  createdAt: string;
}

export type NewAlert = Omit<AlertRecord, 'id'>;

/** Flags that must still be unset for a guarded alert update to apply. */
export type AlertGuard = Partial<Record<AlertFlag, false>>;

export type AlertPatch = Partial<
  Pick<
    AlertRecord,
    | 'acknowledged'
    | 'acknowledgedBy'
    | 'acknowledgedAt'
    | 'resolved'
    | 'resolvedBy'
    | 'resolvedAt'
    | 'resolutionNotes'
    | 'notificationSent'
    | 'escalated'
    | 'escalatedAt'
  >
>;

export interface AlertListFilter {
  clientId?: string;
  machineId?: string;
  severity?: AlertSeverity;
  unresolvedOnly?: boolean;
  from?: Date;
  to?: Date;
  limit?: number;
}

export interface ModelRecord {
  id: number;
  machineId: string;
  clientId: string;
  modelType: string;
  modelVersion: string;
  accuracyScore: number | null;
  precisionScore: number | null;
  recallScore: number | null;
  f1Score: number | null;
  trainingDataCount: number | null;
  modelFilePath: string | null;
  modelSizeMb: number | null;
  hyperparameters: JsonObject;
  featureImportance: JsonObject;
  trainingDurationSeconds: number | null;
  performanceMetrics: JsonObject;
  isActive: boolean;
  deployedAt: string | null;
  createdAt: string;
}

export type NewModel = Omit<ModelRecord, 'id'>;

export interface ModelListFilter {
  clientId?: string;
  machineId?: string;
  modelType?: string;
  activeOnly?: boolean;
}
