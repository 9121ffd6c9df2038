import type { ServiceConfig } from '../config/serviceConfig';
import type { Logger } from '../logger';
import { closeLifecycleQueue, scheduleRetentionJob } from './queue';
import type { RetentionEnforcer } from './retention';

export interface RetentionSchedulerOptions {
  enforcer: Pick<RetentionEnforcer, 'sweep'>;
  config: Pick<ServiceConfig, 'inlineMode' | 'redisUrl' | 'lifecycle'>;
  logger: Logger;
  random?: () => number;
  now?: () => Date;
}

/**
 * Drives retention sweeps. Inline mode runs them on an unref'd in-process timer; otherwise a
 * repeatable BullMQ job is registered and the lifecycle worker executes it.
 */
export class RetentionScheduler {
  private readonly enforcer: RetentionSchedulerOptions['enforcer'];
  private readonly config: RetentionSchedulerOptions['config'];
  private readonly logger: Logger;
  private readonly random: () => number;
  private readonly now: () => Date;
  private startTimer: NodeJS.Timeout | null = null;
  private intervalTimer: NodeJS.Timeout | null = null;
  private currentTick: Promise<void> | null = null;
  private usesQueue = false;

  constructor(options: RetentionSchedulerOptions) {
    this.enforcer = options.enforcer;
    this.config = options.config;
    this.logger = options.logger.child({ component: 'retention-scheduler' });
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
  }

  isRunning(): boolean {
    return this.startTimer !== null || this.intervalTimer !== null || this.usesQueue;
  }

  async start(): Promise<void> {
    if (this.isRunning()) {
      return;
    }
    if (!this.config.inlineMode) {
      await scheduleRetentionJob(this.config, this.logger, this.random);
      this.usesQueue = true;
      this.logger.info(
        { queue: this.config.lifecycle.queueName, intervalSeconds: this.config.lifecycle.intervalSeconds },
        'retention job scheduled'
      );
      return;
    }

    const intervalMs = this.config.lifecycle.intervalSeconds * 1000;
    const jitterMs = Math.floor(this.random() * this.config.lifecycle.jitterSeconds * 1000);
    this.startTimer = setTimeout(() => {
      this.startTimer = null;
      this.tick();
      this.intervalTimer = setInterval(() => this.tick(), intervalMs);
      this.intervalTimer.unref();
    }, jitterMs);
    this.startTimer.unref();
    this.logger.info({ intervalMs, jitterMs }, 'inline retention timer started');
  }

  async stop(): Promise<void> {
    if (this.startTimer) {
      clearTimeout(this.startTimer);
      this.startTimer = null;
    }
    if (this.intervalTimer) {
      clearInterval(this.intervalTimer);
      this.intervalTimer = null;
    }
    if (this.currentTick) {
      await this.currentTick;
    }
    if (this.usesQueue) {
      this.usesQueue = false;
      await closeLifecycleQueue();
    }
  }

  private tick(): void {
    if (this.currentTick) {
      this.logger.debug('previous retention tick still running');
      return;
    }
    this.currentTick = this.enforcer
      .sweep(this.now(), 'schedule')
      .then(
        (report) => {
          this.logger.debug({ status: report.status }, 'retention tick finished');
        },
        (err: unknown) => {
          this.logger.error({ err }, 'retention tick failed');
        }
      )
      .finally(() => {
        this.currentTick = null;
      });
  }
}
