import type { ServiceConfig } from '../config/serviceConfig';
import { TransientError, toTelemetryError } from '../errors';
import type { TelemetryEventPublisher } from '../events/publisher';
import type { Logger } from '../logger';
import { observeRetentionRun } from '../observability/metrics';
import type { Recomputer, RefreshCoordinator } from '../refresh/coordinator';
import { ROLLUP_GRANULARITIES } from '../rollup/types';
import type { Storage } from '../storage/types';
import { HOUR_MS } from '../telemetry/chunks';
import type { RetentionReport, RetentionTrigger } from './types';

export interface RetentionEnforcerOptions {
  storage: Pick<Storage, 'telemetry' | 'rollups' | 'anomalies' | 'alerts'>;
  config: Pick<ServiceConfig, 'lifecycle'>;
  events: Pick<TelemetryEventPublisher, 'publishTelemetryEvent'>;
  rollups: Recomputer;
  /** Re-queues changed buckets so a refresh that read pre-sweep readings runs again. */
  refresh?: Pick<RefreshCoordinator, 'requestRefresh'>;
  logger: Logger;
}

/**
 * Expires telemetry by whole chunks. A chunk is dropped once its range ended before
 * `now - rawMaxAgeHours`; rows are never deleted one by one.
 *
 * Rollups are never expired on their own clock. Every bucket that starts before the cutoff is
 * rebuilt from the readings that survived, so a bucket disappears exactly when its last chunk does.
 */
export class RetentionEnforcer {
  private readonly storage: RetentionEnforcerOptions['storage'];
  private readonly retention: ServiceConfig['lifecycle']['retention'];
  private readonly events: RetentionEnforcerOptions['events'];
  private readonly rollups: Recomputer;
  private readonly refresh: RetentionEnforcerOptions['refresh'];
  private readonly logger: Logger;
  private running = false;

  constructor(options: RetentionEnforcerOptions) {
    this.storage = options.storage;
    this.retention = options.config.lifecycle.retention;
    this.events = options.events;
    this.rollups = options.rollups;
    this.refresh = options.refresh;
    this.logger = options.logger.child({ component: 'retention' });
  }

  isRunning(): boolean {
    return this.running;
  }

  async sweep(now: Date = new Date(), trigger: RetentionTrigger = 'manual'): Promise<RetentionReport> {
    const cutoff = new Date(now.getTime() - this.retention.rawMaxAgeHours * HOUR_MS);
    const entityCutoff =
      this.retention.entityMaxAgeHours > 0
        ? new Date(now.getTime() - this.retention.entityMaxAgeHours * HOUR_MS)
        : null;
    const report: RetentionReport = {
      status: 'skipped',
      trigger,
      runAt: now.toISOString(),
      cutoff: cutoff.toISOString(),
      entityCutoff: entityCutoff ? entityCutoff.toISOString() : null,
      droppedChunks: [],
      failedChunks: [],
      rollupsDeleted: 0,
      rollupsRecomputed: 0,
      alertsPurged: 0,
      anomaliesPurged: 0,
      durationMs: 0
    };

    if (this.running) {
      report.message = 'a retention sweep is already running';
      observeRetentionRun({ status: 'skipped' });
      return report;
    }

    this.running = true;
    const started = Date.now();
    try {
      await this.dropExpiredChunks(cutoff, report);
      await this.reconcileRollups(cutoff, report);
      if (entityCutoff) {
        report.alertsPurged = await this.storage.alerts.purge(entityCutoff);
        report.anomaliesPurged = await this.storage.anomalies.purge(entityCutoff);
      }
    } catch (err) {
      const error = toTelemetryError(err);
      report.status = 'failed';
      report.message = error.message;
      report.durationMs = Date.now() - started;
      this.logger.error({ err: error, cutoff: report.cutoff }, 'retention sweep failed');
      observeRetentionRun({ status: 'failed', durationSeconds: report.durationMs / 1000 });
      return report;
    } finally {
      this.running = false;
    }
    report.durationMs = Date.now() - started;

    const changed =
      report.droppedChunks.length +
      report.failedChunks.length +
      report.rollupsDeleted +
      report.rollupsRecomputed +
      report.alertsPurged +
      report.anomaliesPurged;
    if (changed === 0) {
      report.message = 'no chunks or records met retention criteria';
      observeRetentionRun({ status: 'skipped', durationSeconds: report.durationMs / 1000 });
      return report;
    }

    report.status = 'completed';
    observeRetentionRun({
      status: 'completed',
      chunksDropped: report.droppedChunks.length,
      durationSeconds: report.durationMs / 1000
    });
    this.logger.info(
      {
        cutoff: report.cutoff,
        droppedChunks: report.droppedChunks.length,
        failedChunks: report.failedChunks.length,
        rollupsDeleted: report.rollupsDeleted,
        rollupsRecomputed: report.rollupsRecomputed,
        alertsPurged: report.alertsPurged,
        anomaliesPurged: report.anomaliesPurged
      },
      'retention sweep completed'
    );
    await this.events.publishTelemetryEvent('telemetry.retention.completed', {
      runAt: report.runAt,
      cutoff: report.cutoff,
      droppedChunks: report.droppedChunks,
      failedChunks: report.failedChunks,
      rollupsDeleted: report.rollupsDeleted,
      rollupsRecomputed: report.rollupsRecomputed,
      alertsPurged: report.alertsPurged,
      anomaliesPurged: report.anomaliesPurged
    });
    return report;
  }

  private async dropExpiredChunks(cutoff: Date, report: RetentionReport): Promise<void> {
    const cutoffMs = cutoff.getTime();
    const chunks = await this.storage.telemetry.listChunks();
    for (const chunk of chunks) {
      if (Date.parse(chunk.rangeEnd) >= cutoffMs) {
        continue;
      }
      try {
        if (await this.storage.telemetry.dropChunk(chunk.id)) {
          report.droppedChunks.push(chunk.id);
        }
      } catch (err) {
        const failure = new TransientError(`failed to drop chunk ${chunk.id}`, err, { chunkId: chunk.id });
        report.failedChunks.push(chunk.id);
        this.logger.warn({ err: failure, chunkId: chunk.id }, 'chunk drop failed, retrying on next sweep');
      }
    }
  }

  private async reconcileRollups(cutoff: Date, report: RetentionReport): Promise<void> {
    for (const granularity of ROLLUP_GRANULARITIES) {
      const stale = await this.storage.rollups.listBefore(granularity, cutoff);
      for (const previous of stale) {
        const outcome = await this.rollups.recompute({
          granularity,
          machineId: previous.machineId,
          bucketStart: previous.bucketStart
        });
        if (outcome.status === 'published' && outcome.record.readingCount === previous.readingCount) {
          continue;
        }
        if (outcome.status === 'removed') {
          report.rollupsDeleted += 1;
        } else {
          report.rollupsRecomputed += 1;
        }
        this.refresh?.requestRefresh({
          granularity,
          machineId: previous.machineId,
          bucketStart: previous.bucketStart
        });
      }
    }
  }
}
