import pino, { type Logger } from 'pino';

import type { AccountState, Direction, Signal } from '../domain/models.js';
import type { EventBus } from '../events/eventBus.js';
import type { Broker } from '../execution/broker.js';
import type { Executor, SignalOutcome } from '../execution/executor.js';
import type { PositionTracker } from '../portfolio/positionTracker.js';
import type { DailyStats } from '../risk/dailyLossCounter.js';
import type { ExposureGuard } from '../risk/exposureGuard.js';
import type { SignalSource } from '../signals/signalSource.js';

export type PositionView = {
  id: number;
  direction: Direction;
  volume: number;
  entryPrice: number;
  stopLoss: number;
  profit: number;
  trailingLevel: number;
  lockedProfit: number | null;
  hedged: boolean;
};

export type EngineSummary = {
  openCount: number;
  totalProfit: number;
  winningCount: number;
  losingCount: number;
  hedgedCount: number;
  positions: readonly PositionView[];
};

export type EngineStatus = {
  symbol: string;
  tag: number;
  account: AccountState;
  summary: EngineSummary;
  dailyStats: DailyStats;
};

export type TickResult =
  | { status: 'OK'; durationMs: number; signals: SignalOutcome[]; summary: EngineSummary }
  | { status: 'SKIPPED'; reason: string }
  | { status: 'FAILED'; error: Error };

export type TradingEngineOptions = {
  broker: Broker;
  executor: Executor;
  tracker: PositionTracker;
  guard: ExposureGuard;
  signalSource?: SignalSource;
  eventBus?: EventBus;
  logger?: Logger;
  now?: () => number;
};

const EMPTY_SUMMARY: EngineSummary = Object.freeze({
  openCount: 0,
  totalProfit: 0,
  winningCount: 0,
  losingCount: 0,
  hedgedCount: 0,
  positions: Object.freeze([])
});

/**
 * Single-flight tick loop around the executor. Callers only ever see the
 * summary published at the end of the last completed tick.
 */
export class TradingEngine {
  private readonly broker: Broker;
  private readonly executor: Executor;
  private readonly tracker: PositionTracker;
  private readonly guard: ExposureGuard;
  private readonly signalSource?: SignalSource;
  private readonly eventBus?: EventBus;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly pendingSignals: Signal[] = [];
  private ticking = false;
  private summary: EngineSummary = EMPTY_SUMMARY;

  constructor(options: TradingEngineOptions) {
    this.broker = options.broker;
    this.executor = options.executor;
    this.tracker = options.tracker;
    this.guard = options.guard;
    this.signalSource = options.signalSource;
    this.eventBus = options.eventBus;
    this.logger = options.logger ?? pino({ name: 'trading-engine' });
    this.now = options.now ?? Date.now;
  }

  /** Queued for the next tick. */
  submitSignal(signal: Signal): void {
    this.pendingSignals.push(signal);
  }

  async tick(): Promise<TickResult> {
    if (this.ticking) {
      return { status: 'SKIPPED', reason: 'tick already in progress' };
    }

    this.ticking = true;
    const startedAt = this.now();

    try {
      if (this.signalSource) {
        this.pendingSignals.push(...(await this.signalSource.poll()));
      }

      const signals: SignalOutcome[] = [];
      while (this.pendingSignals.length > 0) {
        const signal = this.pendingSignals.shift();
        if (!signal) {
          continue;
        }

        const outcome = await this.executor.evaluateNewSignal(signal);
        this.logger.info({ signal, outcome: outcome.status }, 'signal evaluated');
        signals.push(outcome);
      }

      await this.executor.manageOpenPositions();

      this.summary = this.buildSummary();
      const durationMs = this.now() - startedAt;
      this.eventBus?.emit('tick.completed', { startedAt, durationMs, openCount: this.summary.openCount });

      return { status: 'OK', durationMs, signals, summary: this.summary };
    } catch (caught: unknown) {
      const error = caught instanceof Error ? caught : new Error(String(caught));
      this.logger.error({ err: error }, 'tick failed');
      this.eventBus?.emit('tick.failed', { startedAt, errorName: error.name, message: error.message });
      return { status: 'FAILED', error };
    } finally {
      this.ticking = false;
    }
  }

  getSummary(): EngineSummary {
    return this.summary;
  }

  getDailyStats(): DailyStats {
    return this.guard.getDailyStats();
  }

  async getStatus(): Promise<EngineStatus> {
    const account = await this.broker.getAccountState();
    return {
      symbol: this.executor.symbol,
      tag: this.executor.tag,
      account,
      summary: this.summary,
      dailyStats: this.getDailyStats()
    };
  }

  private buildSummary(): EngineSummary {
    const positions: PositionView[] = this.tracker.list().map((record) => ({
      id: record.positionId,
      direction: record.position.direction,
      volume: record.position.volume,
      entryPrice: record.position.entryPrice,
      stopLoss: record.position.stopLoss,
      profit: record.position.profit,
      trailingLevel: record.trailingLevel,
      lockedProfit: record.lockedProfit,
      hedged: record.hedged
    }));

    const totalProfit = positions.reduce((acc, position) => acc + position.profit, 0);

    return Object.freeze({
      openCount: positions.length,
      totalProfit: Math.round(totalProfit * 100) / 100,
      winningCount: positions.filter((position) => position.profit > 0).length,
      losingCount: positions.filter((position) => position.profit < 0).length,
      hedgedCount: positions.filter((position) => position.hedged).length,
      positions: Object.freeze(positions.map((position) => Object.freeze(position)))
    });
  }
}
