import { EventEmitter } from 'node:events';

import type { AuditEvent } from '../domain/models.js';
import { hashObject } from '../domain/models.js';

import type { EventHandler, TradingEventMap, TradingEventName } from './events.js';

export type EventBusOptions = {
  /** Emits raised from inside a handler are delivered after the current one finishes. */
  queueEmits?: boolean;
  now?: () => number;
};

type PendingEmit<TName extends TradingEventName = TradingEventName> = {
  event: TName;
  payload: TradingEventMap[TName];
};

/**
 * Typed pub/sub for engine events. A handler that throws or rejects never
 * reaches the emitter; it is reported as an `audit.event` with step
 * `events.handler.<event>`.
 */
export class EventBus {
  private readonly emitter = new EventEmitter();
  private readonly queueEmits: boolean;
  private readonly now: () => number;
  private readonly pending: PendingEmit[] = [];
  private draining = false;
  private failureSequence = 0;

  constructor(options: EventBusOptions = {}) {
    this.queueEmits = options.queueEmits ?? false;
    this.now = options.now ?? Date.now;
  }

  on<TName extends TradingEventName>(event: TName, handler: EventHandler<TradingEventMap[TName]>): () => void {
    const listener = this.guard(event, handler);
    this.emitter.on(event, listener);

    return () => {
      this.emitter.off(event, listener);
    };
  }

  once<TName extends TradingEventName>(event: TName, handler: EventHandler<TradingEventMap[TName]>): void {
    this.emitter.once(event, this.guard(event, handler));
  }

  emit<TName extends TradingEventName>(event: TName, payload: TradingEventMap[TName]): void {
    if (!this.queueEmits) {
      this.emitter.emit(event, payload);
      return;
    }

    this.pending.push({ event, payload });
    this.drain();
  }

  listenerCount(event: TradingEventName): number {
    return this.emitter.listenerCount(event);
  }

  getPendingCount(): number {
    return this.pending.length;
  }

  private guard<TName extends TradingEventName>(
    event: TName,
    handler: EventHandler<TradingEventMap[TName]>
  ): (payload: TradingEventMap[TName]) => void {
    const run = async (payload: TradingEventMap[TName]) => {
      try {
        await handler(payload);
      } catch (error: unknown) {
        this.reportHandlerFailure(event, payload, error);
      }
    };

    return (payload) => {
      void run(payload);
    };
  }

  private drain(): void {
    if (this.draining) {
      return;
    }

    this.draining = true;
    try {
      let next = this.pending.shift();
      while (next) {
        this.emitter.emit(next.event, next.payload);
        next = this.pending.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  private reportHandlerFailure<TName extends TradingEventName>(
    event: TName,
    payload: TradingEventMap[TName],
    error: unknown
  ): void {
    const message = error instanceof Error ? error.message : 'Unknown handler error';
    if (event === 'audit.event') {
      // Reporting through audit.event again would loop back into the failing handler.
      process.emitWarning(`audit.event handler failed: ${message}`, 'EventBusWarning');
      return;
    }

    this.failureSequence += 1;
    const ts = this.now();

    const audit: AuditEvent = {
      id: `audit-${ts}-bus-${this.failureSequence}`,
      ts,
      step: `events.handler.${event}`,
      level: 'error',
      message,
      inputsHash: hashObject(payload),
      outputsHash: hashObject({ event, message }),
      metadata: {
        event,
        errorName: error instanceof Error ? error.name : 'UnknownError'
      }
    };

    this.emitter.emit('audit.event', audit);
  }
}
