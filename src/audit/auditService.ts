import type { AuditEvent } from '../domain/models.js';
import { hashObject } from '../domain/models.js';
import type { EventBus } from '../events/eventBus.js';

export type AuditLogInput = {
  step: string;
  level: AuditEvent['level'];
  message: string;
  reason?: string;
  inputs: unknown;
  outputs: unknown;
  metadata?: Record<string, unknown>;
};

export type AuditServiceOptions = {
  eventBus: EventBus;
  now?: () => number;
};

/**
 * Publishes hashed audit records on the event bus. Whoever subscribes to
 * `audit.event` decides where they end up (the runtime sends them to pino).
 */
export class AuditService {
  private readonly eventBus: EventBus;
  private readonly now: () => number;
  private sequence = 0;

  constructor(options: AuditServiceOptions) {
    this.eventBus = options.eventBus;
    this.now = options.now ?? Date.now;
  }

  log(input: AuditLogInput): AuditEvent {
    this.sequence += 1;
    const ts = this.now();

    const event: AuditEvent = {
      id: `audit-${ts}-${this.sequence}`,
      ts,
      step: input.step,
      level: input.level,
      message: input.message,
      reason: input.reason,
      inputsHash: hashObject(input.inputs),
      outputsHash: hashObject(input.outputs),
      metadata: input.metadata ?? {}
    };

    this.eventBus.emit('audit.event', event);
    return event;
  }
}
