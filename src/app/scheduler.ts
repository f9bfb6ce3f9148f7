import pino, { type Logger } from 'pino';

import type { TickResult } from './engine.js';

export type Tickable = {
  tick(): Promise<TickResult>;
};

export type TickSchedulerOptions = {
  engine: Tickable;
  intervalMs: number;
  /** Stops after this many ticks; unbounded when unset. */
  maxTicks?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
};

/**
 * Runs one tick, waits the interval, repeats. Ticks never overlap and a stop
 * request takes effect between ticks.
 */
export class TickScheduler {
  private readonly engine: Tickable;
  private readonly intervalMs: number;
  private readonly maxTicks?: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;
  private stopRequested = false;
  private ticks = 0;

  constructor(options: TickSchedulerOptions) {
    this.engine = options.engine;
    this.intervalMs = options.intervalMs;
    this.maxTicks = options.maxTicks;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.logger = options.logger ?? pino({ name: 'tick-scheduler' });
  }

  get tickCount(): number {
    return this.ticks;
  }

  stop(): void {
    this.stopRequested = true;
  }

  async run(): Promise<number> {
    this.stopRequested = false;
    this.logger.info({ intervalMs: this.intervalMs }, 'scheduler started');

    while (!this.stopRequested) {
      const result = await this.engine.tick();
      this.ticks += 1;

      if (result.status === 'FAILED') {
        this.logger.warn({ errorName: result.error.name, message: result.error.message }, 'tick failed, waiting for next');
      }

      if (this.maxTicks !== undefined && this.ticks >= this.maxTicks) {
        break;
      }

      if (this.stopRequested) {
        break;
      }

      await this.sleep(this.intervalMs);
    }

    this.logger.info({ ticks: this.ticks }, 'scheduler stopped');
    return this.ticks;
  }
}
