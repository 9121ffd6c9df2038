export type RetentionStatus = 'completed' | 'skipped' | 'failed';

export type RetentionTrigger = 'schedule' | 'manual';

export interface RetentionReport {
  status: RetentionStatus;
  trigger: RetentionTrigger;
  runAt: string;
  cutoff: string;
  entityCutoff: string | null;
  droppedChunks: string[];
  failedChunks: string[];
  rollupsDeleted: number;
  rollupsRecomputed: number;
  alertsPurged: number;
  anomaliesPurged: number;
  durationMs: number;
  message?: string;
}

export interface LifecycleJobPayload {
  trigger: RetentionTrigger;
  requestId: string;
  requestedAt: string;
}
