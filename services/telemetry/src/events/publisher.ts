import {
  createEventPublisher,
  toJsonValue,
  type EventEnvelope,
  type EventPublisherHandle
} from '@plantsight/event-bus';
import type { Logger } from '../logger';

export type TelemetryEventType =
  | 'telemetry.retention.completed'
  | 'telemetry.anomaly.updated'
  | 'telemetry.alert.updated'
  | 'telemetry.model.activated';

export interface TelemetryEventPublisherOptions {
  source: string;
  logger: Logger;
  handle?: EventPublisherHandle;
  /** Forces the bus mode of a lazily created handle; the environment decides when omitted. */
  mode?: 'inline' | 'redis';
}

/**
 * Publishes domain events on the shared event bus. Publishing is best effort: failures are
 * logged and never surface to the domain operation that triggered them.
 */
export class TelemetryEventPublisher {
  private handle: EventPublisherHandle | null;
  private readonly ownsHandle: boolean;
  private closed = false;

  constructor(private readonly options: TelemetryEventPublisherOptions) {
    this.handle = options.handle ?? null;
    this.ownsHandle = !options.handle;
  }

  async publishTelemetryEvent(
    type: TelemetryEventType,
    payload: Record<string, unknown>
  ): Promise<EventEnvelope | null> {
    if (this.closed) {
      this.options.logger.debug({ type }, 'event publisher closed, dropping telemetry event');
      return null;
    }
    try {
      return await this.getHandle().publish({
        type,
        source: this.options.source,
        payload: toJsonValue(payload)
      });
    } catch (err) {
      this.options.logger.warn({ err, type }, 'failed to publish telemetry event');
      return null;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    if (this.handle && this.ownsHandle) {
      await this.handle.close();
    }
    this.handle = null;
  }

  private getHandle(): EventPublisherHandle {
    if (!this.handle) {
      this.handle = createEventPublisher(this.options.mode ? { mode: this.options.mode } : {});
    }
    return this.handle;
  }
}
