import { randomUUID } from 'node:crypto';
import { Queue, Worker, type Processor, type WorkerOptions } from 'bullmq';
import IORedis, { type Redis } from 'ioredis';
import type { ServiceConfig } from '../config/serviceConfig';
import type { Logger } from '../logger';
import type { LifecycleJobPayload } from './types';

export const RETENTION_JOB_NAME = 'telemetry.retention';
export const RETENTION_REPEAT_JOB_ID = 'telemetry-retention';

type LifecycleConfig = Pick<ServiceConfig, 'inlineMode' | 'redisUrl' | 'lifecycle'>;

let queueInstance: Queue<LifecycleJobPayload> | null = null;
let connectionInstance: Redis | null = null;

function assertQueueMode(config: LifecycleConfig, context: string): void {
  if (config.inlineMode) {
    throw new Error(`${context} unavailable in inline mode`);
  }
}

function ensureConnection(config: LifecycleConfig, logger: Logger): Redis {
  if (connectionInstance) {
    return connectionInstance;
  }
  connectionInstance = new IORedis(config.redisUrl, {
    maxRetriesPerRequest: null,
    lazyConnect: true
  });
  connectionInstance.on('error', (err: Error) => {
    logger.error({ err }, 'lifecycle redis connection error');
  });
  return connectionInstance;
}

export async function verifyLifecycleQueueConnection(config: LifecycleConfig, logger: Logger): Promise<void> {
  assertQueueMode(config, 'Lifecycle queue');
  const connection = ensureConnection(config, logger);
  if (connection.status === 'wait') {
    await connection.connect();
  }
  await connection.ping();
}

export function ensureLifecycleQueue(config: LifecycleConfig, logger: Logger): Queue<LifecycleJobPayload> {
  assertQueueMode(config, 'Lifecycle queue');
  if (queueInstance) {
    return queueInstance;
  }
  queueInstance = new Queue<LifecycleJobPayload>(config.lifecycle.queueName, {
    connection: ensureConnection(config, logger)
  });
  return queueInstance;
}

export function createLifecycleWorker(
  config: LifecycleConfig,
  logger: Logger,
  processor: Processor<LifecycleJobPayload>,
  options: Omit<WorkerOptions, 'connection'> = {}
): Worker<LifecycleJobPayload> {
  assertQueueMode(config, 'Lifecycle worker');
  return new Worker<LifecycleJobPayload>(config.lifecycle.queueName, processor, {
    connection: ensureConnection(config, logger),
    ...options
  });
}

export function buildRetentionPayload(trigger: LifecycleJobPayload['trigger']): LifecycleJobPayload {
  return {
    trigger,
    requestId: randomUUID(),
    requestedAt: new Date().toISOString()
  };
}

/** Registers the repeatable retention job. Re-registering with the same id replaces the schedule. */
export async function scheduleRetentionJob(
  config: LifecycleConfig,
  logger: Logger,
  random: () => number = Math.random
): Promise<void> {
  const queue = ensureLifecycleQueue(config, logger);
  const jitterMs = config.lifecycle.jitterSeconds * 1000;
  await queue.add(RETENTION_JOB_NAME, buildRetentionPayload('schedule'), {
    jobId: RETENTION_REPEAT_JOB_ID,
    repeat: {
      every: config.lifecycle.intervalSeconds * 1000
    },
    delay: jitterMs > 0 ? Math.floor(random() * jitterMs) : undefined,
    removeOnComplete: true,
    removeOnFail: false
  });
}

export async function closeLifecycleQueue(): Promise<void> {
  if (queueInstance) {
    await queueInstance.close();
    queueInstance = null;
  }
  if (connectionInstance) {
    await connectionInstance.quit();
    connectionInstance = null;
  }
}
