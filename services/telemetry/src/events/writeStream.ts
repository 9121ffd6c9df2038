import { EventEmitter } from 'node:events';
import type { Logger } from '../logger';

export type WriteEvent = {
  id: string;
  machineId: string;
  clientId: string;
  readingId: number;
  sensorType: string;
  timestamp: string;
  bucketHour: string;
  occurredAt: string;
};

export type WriteEventListener = (event: WriteEvent) => void | Promise<void>;

export interface WriteStreamFilter {
  machineId?: string;
  clientId?: string;
}

/**
 * In-process fan-out of telemetry writes. Each append emits exactly one event. Listener failures
 * are logged and never reach the writer.
 */
export class WriteNotificationStream {
  private readonly emitter = new EventEmitter();
  private nextId = 0;
  private subscriberCount = 0;

  constructor(private readonly logger: Logger) {
    this.emitter.setMaxListeners(0);
  }

  emit(event: Omit<WriteEvent, 'id'>): WriteEvent {
    this.nextId += 1;
    const delivered: WriteEvent = { ...event, id: String(this.nextId) };
    this.emitter.emit('write', delivered);
    return delivered;
  }

  subscribe(listener: WriteEventListener, filter: WriteStreamFilter = {}): () => void {
    const handler = (event: WriteEvent) => {
      if (filter.machineId && event.machineId !== filter.machineId) {
        return;
      }
      if (filter.clientId && event.clientId !== filter.clientId) {
        return;
      }
      try {
        const result = listener(event);
        if (result instanceof Promise) {
          result.catch((err: unknown) => this.reportListenerFailure(event, err));
        }
      } catch (err) {
        this.reportListenerFailure(event, err);
      }
    };

    this.subscriberCount += 1;
    this.emitter.on('write', handler);
    let active = true;
    return () => {
      if (!active) {
        return;
      }
      active = false;
      this.emitter.off('write', handler);
      this.subscriberCount = Math.max(0, this.subscriberCount - 1);
    };
  }

  getSubscriberCount(): number {
    return this.subscriberCount;
  }

  private reportListenerFailure(event: WriteEvent, err: unknown): void {
    this.logger.error(
      { err, machineId: event.machineId, readingId: event.readingId },
      'write stream listener failed'
    );
  }
}

export function formatWriteEventFrame(event: WriteEvent): string {
  const payload = JSON.stringify({
    machineId: event.machineId,
    clientId: event.clientId,
    readingId: event.readingId,
    sensorType: event.sensorType,
    timestamp: event.timestamp,
    bucketHour: event.bucketHour,
    occurredAt: event.occurredAt
  });
  return 'event: telemetry.reading.appended\n' + `id: ${event.id}\n` + `data: ${payload}\n\n`;
}

export function formatWriteStreamComment(comment: string): string {
  return `:${comment}\n\n`;
}
