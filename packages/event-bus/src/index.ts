import { Queue, type ConnectionOptions, type JobsOptions, type QueueOptions } from 'bullmq';
import {
  jsonValueSchema,
  normalizeEventEnvelope,
  normalizeStringValue,
  toJsonValue,
  type EventEnvelope,
  type EventEnvelopeInput,
  type EventPublisher,
  type EventPublisherHandleBase,
  type JsonValue
} from './core';

export type EventIngressJobData = {
  envelope: EventEnvelope;
};

export type PublishEventOptions = {
  jobName?: string;
  jobOptions?: JobsOptions;
};

export type EventQueueLike = {
  add: (name: string, data: EventIngressJobData, opts?: JobsOptions) => Promise<unknown>;
  close: () => Promise<void>;
};

export type EventPublisherHandle = EventPublisherHandleBase<EventQueueLike, PublishEventOptions>;

export type EventPublisherOptions = {
  queue?: EventQueueLike;
  queueName?: string;
  queueOptions?: Partial<QueueOptions>;
  jobName?: string;
  mode?: 'inline' | 'redis';
};

export type InlineEventListener = (envelope: EventEnvelope) => void;

export const DEFAULT_EVENT_QUEUE_NAME = 'plantsight_event_ingress_queue';
export const DEFAULT_EVENT_JOB_NAME = 'plantsight.event';

const inlineListeners = new Set<InlineEventListener>();

/**
 * Registers a listener for envelopes published while the bus runs inline. Returns an
 * unsubscribe function.
 */
export function onInlineEvent(listener: InlineEventListener): () => void {
  inlineListeners.add(listener);
  return () => {
    inlineListeners.delete(listener);
  };
}

function deliverInline(envelope: EventEnvelope): void {
  for (const listener of inlineListeners) {
    try {
      listener(envelope);
    } catch (error) {
      console.warn('[event-bus] inline listener failed', {
        type: envelope.type,
        error: error instanceof Error ? error.message : error
      });
    }
  }
}

export function isInlineEventMode(env: NodeJS.ProcessEnv = process.env): boolean {
  const mode = (env.PLANTSIGHT_EVENTS_MODE ?? '').trim().toLowerCase();
  if (mode === 'inline') {
    return true;
  }
  if (mode === 'redis') {
    return false;
  }
  const redisUrl = (env.REDIS_URL ?? '').trim().toLowerCase();
  return redisUrl === 'inline';
}

export function createEventPublisher(options: EventPublisherOptions = {}): EventPublisherHandle {
  const inline = options.mode ? options.mode === 'inline' : !options.queue && isInlineEventMode();
  let closed = false;

  if (inline) {
    const publish: EventPublisher<PublishEventOptions> = async (event) => {
      if (closed) {
        throw new Error('Event publisher is closed');
      }
      const envelope = normalizeEventEnvelope(event);
      deliverInline(envelope);
      return envelope;
    };

    const close = async () => {
      closed = true;
    };

    return { publish, close, queue: null } satisfies EventPublisherHandle;
  }

  const queueName =
    options.queueName ?? process.env.PLANTSIGHT_EVENT_QUEUE_NAME ?? DEFAULT_EVENT_QUEUE_NAME;
  const queue = options.queue ?? createQueue(queueName, options.queueOptions);
  const jobName = options.jobName ?? DEFAULT_EVENT_JOB_NAME;

  const publish: EventPublisher<PublishEventOptions> = async (event, overrides) => {
    if (closed) {
      throw new Error('Event publisher is closed');
    }
    const envelope = normalizeEventEnvelope(event);
    await queue.add(overrides?.jobName ?? jobName, { envelope }, overrides?.jobOptions);
    return envelope;
  };

  const close = async () => {
    if (closed) {
      return;
    }
    closed = true;
    if (!options.queue) {
      await queue.close();
    }
  };

  return { publish, close, queue } satisfies EventPublisherHandle;
}

function createQueue(queueName: string, queueOptions: Partial<QueueOptions> | undefined): EventQueueLike {
  const fallbackRedisUrl = normalizeStringValue(process.env.REDIS_URL);
  const connection =
    queueOptions?.connection ?? (fallbackRedisUrl ? parseRedisConnection(fallbackRedisUrl) : undefined);
  if (!connection) {
    throw new Error('REDIS_URL must be set to a redis:// connection string or PLANTSIGHT_EVENTS_MODE=inline');
  }
  return new Queue<EventIngressJobData>(queueName, { ...queueOptions, connection });
}

type RedisConnectionSettings = {
  host: string;
  port: number;
  username?: string;
  password?: string;
  db?: number;
  tls?: Record<string, never>;
};

export function parseRedisConnection(connectionString: string): ConnectionOptions | undefined {
  const trimmed = connectionString.trim();
  if (!trimmed || trimmed.toLowerCase() === 'inline') {
    return undefined;
  }

  let url: URL;
  try {
    url = new URL(trimmed.includes('://') ? trimmed : `redis://${trimmed}`);
  } catch {
    return undefined;
  }

  if (url.protocol !== 'redis:' && url.protocol !== 'rediss:') {
    return undefined;
  }

  const connection: RedisConnectionSettings = {
    host: url.hostname,
    port: url.port ? Number(url.port) : 6379
  };

  if (url.username) {
    connection.username = decodeURIComponent(url.username);
  }
  if (url.password) {
    connection.password = decodeURIComponent(url.password);
  }

  const pathname = url.pathname.replace(/^\//, '');
  if (pathname) {
    const db = Number(pathname);
    if (!Number.isNaN(db)) {
      connection.db = db;
    }
  }

  if (url.protocol === 'rediss:') {
    connection.tls = {};
  }

  return connection;
}

export {
  jsonValueSchema,
  normalizeEventEnvelope,
  toJsonValue
};

export type {
  EventEnvelope,
  EventEnvelopeInput,
  EventPublisher,
  JsonValue
};
