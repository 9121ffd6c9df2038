import { z } from 'zod';
import type { ServiceConfig } from '../config/serviceConfig';
import type { WriteEvent, WriteNotificationStream } from '../events/writeStream';
import type { Logger } from '../logger';
import { recordRefreshCoalesced, updateRefreshBacklog } from '../observability/metrics';
import { bucketStartFor, type RecomputeInput, type RecomputeOutcome } from '../rollup/engine';
import { ROLLUP_GRANULARITIES, type RollupGranularity } from '../rollup/types';
import { identifierSchema, parseWith, timestampSchema } from '../validation';
import { computeExponentialBackoff } from './backoff';

export interface RefreshKey {
  granularity: RollupGranularity;
  machineId: string;
  bucketStart: string;
}

export interface RefreshStats {
  pending: number;
  queued: number;
  running: number;
  completed: number;
  coalesced: number;
  failed: number;
}

export interface Recomputer {
  recompute(input: RecomputeInput): Promise<RecomputeOutcome>;
}

type KeyPhase = 'debouncing' | 'retrying' | 'queued' | 'running';

interface KeyState {
  id: string;
  key: RefreshKey;
  phase: KeyPhase;
  dirty: boolean;
  attempts: number;
  timer: NodeJS.Timeout | null;
}

const refreshRequestSchema = z
  .object({
    granularity: z.enum(['hourly', 'daily']),
    machineId: identifierSchema,
    bucketStart: timestampSchema
  })
  .strict();

export type RefreshRequest = z.input<typeof refreshRequestSchema>;

export function refreshKeyId(key: RefreshKey): string {
  return `${key.granularity}:${key.machineId}:${Date.parse(key.bucketStart)}`;
}

export interface RefreshCoordinatorOptions {
  engine: Recomputer;
  config: Pick<ServiceConfig, 'refresh'>;
  logger: Logger;
  random?: () => number;
}

/**
 * Turns write events into rollup recomputations. Keys are debounced, a key never runs twice at
 * once, and a bounded pool drains the FIFO backlog.
 */
export class RefreshCoordinator {
  private readonly engine: Recomputer;
  private readonly settings: ServiceConfig['refresh'];
  private readonly logger: Logger;
  private readonly random: () => number;
  private readonly states = new Map<string, KeyState>();
  private readonly queue: string[] = [];
  private readonly inflight = new Set<Promise<void>>();
  private idleWaiters: Array<() => void> = [];
  private unsubscribe: (() => void) | null = null;
  private running = 0;
  private completed = 0;
  private coalesced = 0;
  private failed = 0;
  private closed = false;

  constructor(options: RefreshCoordinatorOptions) {
    this.engine = options.engine;
    this.settings = options.config.refresh;
    this.logger = options.logger.child({ component: 'refresh-coordinator' });
    this.random = options.random ?? Math.random;
  }

  attach(stream: WriteNotificationStream): void {
    if (this.unsubscribe) {
      return;
    }
    this.unsubscribe = stream.subscribe((event) => this.handleWriteEvent(event));
  }

  handleWriteEvent(event: WriteEvent): void {
    const timestampMs = Date.parse(event.timestamp);
    for (const granularity of ROLLUP_GRANULARITIES) {
      this.schedule({
        granularity,
        machineId: event.machineId,
        bucketStart: new Date(bucketStartFor(granularity, timestampMs)).toISOString()
      });
    }
  }

  requestRefresh(request: RefreshRequest): RefreshKey {
    const parsed = parseWith(refreshRequestSchema, request, 'invalid refresh request');
    const key: RefreshKey = {
      granularity: parsed.granularity,
      machineId: parsed.machineId,
      bucketStart: new Date(bucketStartFor(parsed.granularity, parsed.bucketStart.getTime())).toISOString()
    };
    this.schedule(key);
    return key;
  }

  /** Resolves once no key is debouncing, queued, running or awaiting a retry. */
  settle(): Promise<void> {
    if (this.states.size === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  stats(): RefreshStats {
    let pending = 0;
    let queued = 0;
    for (const state of this.states.values()) {
      if (state.phase === 'debouncing' || state.phase === 'retrying') {
        pending += 1;
      } else if (state.phase === 'queued') {
        queued += 1;
      }
    }
    return {
      pending,
      queued,
      running: this.running,
      completed: this.completed,
      coalesced: this.coalesced,
      failed: this.failed
    };
  }

  /** Stops accepting events, drops keys that have not started and waits for running ones. */
  async close(): Promise<void> {
    this.closed = true;
    this.unsubscribe?.();
    this.unsubscribe = null;
    for (const [id, state] of this.states) {
      if (state.phase !== 'running') {
        this.clearTimer(state);
        this.states.delete(id);
      }
    }
    this.queue.length = 0;
    await Promise.all(Array.from(this.inflight));
    this.states.clear();
    this.publishBacklog();
    this.notifyIfIdle();
  }

  private schedule(key: RefreshKey): void {
    if (this.closed) {
      return;
    }
    const id = refreshKeyId(key);
    const existing = this.states.get(id);
    if (existing) {
      if (existing.phase === 'running') {
        existing.dirty = true;
      }
      this.coalesced += 1;
      recordRefreshCoalesced();
      return;
    }
    const state: KeyState = { id, key, phase: 'debouncing', dirty: false, attempts: 0, timer: null };
    this.states.set(id, state);
    this.startTimer(state, this.settings.debounceMs);
    this.publishBacklog();
  }

  private startTimer(state: KeyState, delayMs: number): void {
    this.clearTimer(state);
    state.timer = setTimeout(() => {
      state.timer = null;
      this.enqueue(state);
    }, delayMs);
  }

  private clearTimer(state: KeyState): void {
    if (state.timer) {
      clearTimeout(state.timer);
      state.timer = null;
    }
  }

  private enqueue(state: KeyState): void {
    if (this.closed || this.states.get(state.id) !== state) {
      return;
    }
    state.phase = 'queued';
    this.queue.push(state.id);
    this.drain();
  }

  private drain(): void {
    while (!this.closed && this.running < this.settings.concurrency && this.queue.length > 0) {
      const id = this.queue.shift();
      const state = id === undefined ? undefined : this.states.get(id);
      if (!state || state.phase !== 'queued') {
        continue;
      }
      state.phase = 'running';
      state.dirty = false;
      this.running += 1;
      const run: Promise<void> = this.execute(state).finally(() => {
        this.inflight.delete(run);
      });
      this.inflight.add(run);
    }
    this.publishBacklog();
  }

  private async execute(state: KeyState): Promise<void> {
    state.attempts += 1;
    let succeeded = false;
    try {
      await this.engine.recompute(state.key);
      succeeded = true;
      this.completed += 1;
    } catch (err) {
      this.handleFailure(state, err);
    } finally {
      this.running -= 1;
    }

    if (succeeded) {
      if (state.dirty && !this.closed) {
        state.phase = 'debouncing';
        state.dirty = false;
        state.attempts = 0;
        this.startTimer(state, this.settings.debounceMs);
      } else {
        this.states.delete(state.id);
      }
    }

    this.drain();
    this.notifyIfIdle();
  }

  private handleFailure(state: KeyState, err: unknown): void {
    const { key } = state;
    if (this.closed) {
      this.logger.warn({ err, ...key }, 'rollup refresh failed during shutdown');
      this.states.delete(state.id);
      return;
    }
    if (state.attempts < this.settings.maxAttempts) {
      const delayMs = computeExponentialBackoff(state.attempts, {
        baseMs: this.settings.retryBaseMs,
        maxMs: this.settings.retryMaxMs,
        random: this.random
      });
      this.logger.warn({ err, ...key, attempt: state.attempts, delayMs }, 'rollup refresh failed, retrying');
      state.phase = 'retrying';
      state.dirty = false;
      this.startTimer(state, delayMs);
      return;
    }
    this.failed += 1;
    this.logger.error({ err, ...key, attempts: state.attempts }, 'rollup refresh abandoned');
    if (state.dirty) {
      state.phase = 'debouncing';
      state.dirty = false;
      state.attempts = 0;
      this.startTimer(state, this.settings.debounceMs);
      return;
    }
    this.states.delete(state.id);
  }

  private publishBacklog(): void {
    const { pending, queued, running } = this.stats();
    updateRefreshBacklog({ pending, queued, running });
  }

  private notifyIfIdle(): void {
    if (this.states.size > 0 || this.idleWaiters.length === 0) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
