import { collectDefaultMetrics, Counter, Gauge, Histogram, Registry } from 'prom-client';

export interface MetricsOptions {
  enabled: boolean;
  collectDefaultMetrics: boolean;
  prefix: string;
}

export interface AppendMetricsInput {
  result: 'success' | 'rejected' | 'failure';
  durationSeconds?: number;
}

export interface RollupMetricsInput {
  granularity: 'hourly' | 'daily';
  result: 'published' | 'removed' | 'failure';
  durationSeconds?: number;
}

export type RefreshBacklogState = 'pending' | 'queued' | 'running';

export type RefreshBacklogCounts = Record<RefreshBacklogState, number>;

export interface RetentionMetricsInput {
  status: 'completed' | 'failed' | 'skipped';
  chunksDropped?: number;
  durationSeconds?: number;
}

interface MetricsState {
  enabled: boolean;
  collectDefaultMetrics: boolean;
  registry: Registry;
  prefix: string;
  readingsAppendedTotal: Counter<string> | null;
  appendDurationSeconds: Histogram<string> | null;
  rollupRecomputesTotal: Counter<string> | null;
  rollupRecomputeDurationSeconds: Histogram<string> | null;
  refreshBacklog: Gauge<string> | null;
  refreshCoalescedTotal: Counter<string> | null;
  retentionRunsTotal: Counter<string> | null;
  retentionDurationSeconds: Histogram<string> | null;
  retentionChunksDroppedTotal: Counter<string> | null;
}

const APPEND_BUCKETS = [0.0005, 0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1];
const ROLLUP_BUCKETS = [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5];
const RETENTION_BUCKETS = [0.1, 0.5, 1, 2, 5, 10, 30, 60, 120, 300];

let metricsState: MetricsState | null = null;

/**
 * The registry is process-wide. Calling again with the same options returns the current state;
 * different options replace it, so the most recently created service decides what is recorded.
 */
export function setupMetrics(options: MetricsOptions): MetricsState {
  const enabled = options.enabled;
  const prefix = options.prefix.endsWith('_') ? options.prefix : `${options.prefix}_`;
  if (
    metricsState &&
    metricsState.enabled === enabled &&
    metricsState.prefix === prefix &&
    metricsState.collectDefaultMetrics === options.collectDefaultMetrics
  ) {
    return metricsState;
  }

  const registry = new Registry();

  const registerMetrics = enabled ? [registry] : undefined;

  const readingsAppendedTotal = enabled
    ? new Counter({
        name: `${prefix}readings_appended_total`,
        help: 'Telemetry appends grouped by result',
        labelNames: ['result'],
        registers: registerMetrics
      })
    : null;

  const appendDurationSeconds = enabled
    ? new Histogram({
        name: `${prefix}append_duration_seconds`,
        help: 'Latency of telemetry appends in seconds',
        buckets: APPEND_BUCKETS,
        registers: registerMetrics
      })
    : null;

  const rollupRecomputesTotal = enabled
    ? new Counter({
        name: `${prefix}rollup_recomputes_total`,
        help: 'Rollup recomputations grouped by granularity and result',
        labelNames: ['granularity', 'result'],
        registers: registerMetrics
      })
    : null;

  const rollupRecomputeDurationSeconds = enabled
    ? new Histogram({
        name: `${prefix}rollup_recompute_duration_seconds`,
        help: 'Duration of rollup recomputations in seconds',
        labelNames: ['granularity'],
        buckets: ROLLUP_BUCKETS,
        registers: registerMetrics
      })
    : null;

  const refreshBacklog = enabled
    ? new Gauge({
        name: `${prefix}refresh_backlog`,
        help: 'Refresh coordinator keys grouped by state',
        labelNames: ['state'],
        registers: registerMetrics
      })
    : null;

  const refreshCoalescedTotal = enabled
    ? new Counter({
        name: `${prefix}refresh_coalesced_total`,
        help: 'Write events folded into an already scheduled refresh',
        registers: registerMetrics
      })
    : null;

  const retentionRunsTotal = enabled
    ? new Counter({
        name: `${prefix}retention_runs_total`,
        help: 'Retention sweeps grouped by status',
        labelNames: ['status'],
        registers: registerMetrics
      })
    : null;

  const retentionDurationSeconds = enabled
    ? new Histogram({
        name: `${prefix}retention_duration_seconds`,
        help: 'Duration of retention sweeps in seconds',
        buckets: RETENTION_BUCKETS,
        registers: registerMetrics
      })
    : null;

  const retentionChunksDroppedTotal = enabled
    ? new Counter({
        name: `${prefix}retention_chunks_dropped_total`,
        help: 'Telemetry chunks dropped by retention',
        registers: registerMetrics
      })
    : null;

  if (enabled && options.collectDefaultMetrics) {
    collectDefaultMetrics({ register: registry, prefix });
  }

  metricsState = {
    enabled,
    collectDefaultMetrics: options.collectDefaultMetrics,
    registry,
    prefix,
    readingsAppendedTotal,
    appendDurationSeconds,
    rollupRecomputesTotal,
    rollupRecomputeDurationSeconds,
    refreshBacklog,
    refreshCoalescedTotal,
    retentionRunsTotal,
    retentionDurationSeconds,
    retentionChunksDroppedTotal
  } satisfies MetricsState;

  return metricsState;
}

export function getMetrics(): MetricsState | null {
  return metricsState;
}

export function resetMetrics(): void {
  metricsState = null;
}

export async function renderMetrics(): Promise<string> {
  const state = metricsState;
  if (!state?.enabled) {
    return '';
  }
  return state.registry.metrics();
}

export function observeAppend(input: AppendMetricsInput): void {
  const state = metricsState;
  if (!state?.enabled || !state.readingsAppendedTotal) {
    return;
  }
  state.readingsAppendedTotal.inc({ result: input.result });
  if (input.durationSeconds !== undefined && state.appendDurationSeconds) {
    state.appendDurationSeconds.observe(input.durationSeconds);
  }
}

export function observeRollupRecompute(input: RollupMetricsInput): void {
  const state = metricsState;
  if (!state?.enabled || !state.rollupRecomputesTotal) {
    return;
  }
  state.rollupRecomputesTotal.inc({ granularity: input.granularity, result: input.result });
  if (input.durationSeconds !== undefined && state.rollupRecomputeDurationSeconds) {
    state.rollupRecomputeDurationSeconds.observe({ granularity: input.granularity }, input.durationSeconds);
  }
}

export function updateRefreshBacklog(counts: RefreshBacklogCounts): void {
  const state = metricsState;
  if (!state?.enabled || !state.refreshBacklog) {
    return;
  }
  for (const [backlogState, value] of Object.entries(counts)) {
    state.refreshBacklog.set({ state: backlogState }, value);
  }
}

export function recordRefreshCoalesced(): void {
  const state = metricsState;
  if (!state?.enabled || !state.refreshCoalescedTotal) {
    return;
  }
  state.refreshCoalescedTotal.inc();
}

export function observeRetentionRun(input: RetentionMetricsInput): void {
  const state = metricsState;
  if (!state?.enabled || !state.retentionRunsTotal) {
    return;
  }
  state.retentionRunsTotal.inc({ status: input.status });
  if (input.durationSeconds !== undefined && state.retentionDurationSeconds) {
    state.retentionDurationSeconds.observe(input.durationSeconds);
  }
  if (input.chunksDropped && state.retentionChunksDroppedTotal) {
    state.retentionChunksDroppedTotal.inc(input.chunksDropped);
  }
}
