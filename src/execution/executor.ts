import pino, { type Logger } from 'pino';

import type { AuditService } from '../audit/auditService.js';
import { StateInconsistencyError, ValidationError, ZeroStopDistanceError } from '../domain/errors.js';
import {
  directionFromSignal,
  oppositeDirection,
  type Direction,
  type Position,
  type Quote,
  type Signal
} from '../domain/models.js';
import type { EventBus } from '../events/eventBus.js';
import type { HedgeTrigger } from '../portfolio/hedgeTrigger.js';
import type { PositionTracker, ReconcileResult, TrackingRecord } from '../portfolio/positionTracker.js';
import { countByDirection, type PositionSnapshotReader } from '../portfolio/snapshotReader.js';
import { entryProtection, evaluateTrailingStop, pipStop, type TrailingPolicy } from '../portfolio/trailingPolicy.js';
import type { ExposureGuard } from '../risk/exposureGuard.js';
import { riskRewardRatio, validateOrderParams } from '../risk/orderValidation.js';
import { clampVolume, normalizeVolume, sizePosition } from '../risk/sizing.js';

import type { Broker, CloseResult } from './broker.js';

export type EntrySettings = {
  /** Fixed order volume. Unset sizes every order from the risk budget. */
  lotSize?: number;
  /** Distance of the reference stop used for risk sizing. */
  stopLossPips: number;
  pointsPerPip: number;
  onePositionPerDirection: boolean;
};

export type ExecutorOptions = {
  broker: Broker;
  snapshotReader: PositionSnapshotReader;
  tracker: PositionTracker;
  guard: ExposureGuard;
  policy: TrailingPolicy;
  hedge?: HedgeTrigger;
  entry?: Partial<EntrySettings>;
  eventBus?: EventBus;
  auditService?: AuditService;
  logger?: Logger;
};

export type SignalOutcome =
  | { status: 'NOOP' }
  | { status: 'SKIPPED'; reason: string }
  | { status: 'REJECTED'; reason: string }
  | { status: 'INVALID'; error: ValidationError }
  | { status: 'SUBMITTED'; positionId: number; direction: Direction; volume: number; price: number }
  | { status: 'CLOSED'; positionIds: number[] };

export type ManageSummary = {
  adopted: number;
  closed: number;
  modified: number;
  hedged: number;
  reconciledAgain: boolean;
};

const DEFAULT_ENTRY: EntrySettings = {
  stopLossPips: 35,
  pointsPerPip: 10,
  onePositionPerDirection: true
};

export class Executor {
  private readonly broker: Broker;
  private readonly snapshotReader: PositionSnapshotReader;
  private readonly tracker: PositionTracker;
  private readonly guard: ExposureGuard;
  private readonly policy: TrailingPolicy;
  private readonly hedge?: HedgeTrigger;
  private readonly entry: EntrySettings;
  private readonly eventBus?: EventBus;
  private readonly auditService?: AuditService;
  private readonly logger: Logger;

  constructor(options: ExecutorOptions) {
    this.broker = options.broker;
    this.snapshotReader = options.snapshotReader;
    this.tracker = options.tracker;
    this.guard = options.guard;
    this.policy = options.policy;
    this.hedge = options.hedge;
    this.entry = { ...DEFAULT_ENTRY, ...options.entry };
    this.eventBus = options.eventBus;
    this.auditService = options.auditService;
    this.logger = options.logger ?? pino({ name: 'executor' });
  }

  get symbol(): string {
    return this.snapshotReader.symbol;
  }

  get tag(): number {
    return this.snapshotReader.tag;
  }

  async evaluateNewSignal(signal: Signal): Promise<SignalOutcome> {
    switch (signal) {
      case 'HOLD':
        return { status: 'NOOP' };
      case 'CLOSE':
        return { status: 'CLOSED', positionIds: await this.closeAll() };
      case 'BUY':
      case 'SELL':
        return this.openFromSignal(signal);
    }
  }

  /** Reconciles, then applies at most one hedge and one stop move per tracked position. */
  async manageOpenPositions(): Promise<ManageSummary> {
    const reconciled = await this.reconcile();
    const summary: ManageSummary = {
      adopted: reconciled.adopted.length,
      closed: reconciled.closed.length,
      modified: 0,
      hedged: 0,
      reconciledAgain: false
    };

    const records = this.tracker.list();
    if (records.length === 0) {
      return summary;
    }

    const quote = await this.broker.getQuote(this.symbol);
    let openCount = records.length;
    let stale = false;

    for (const record of records) {
      if (this.hedge?.shouldHedge(record.position, record)) {
        const opened = await this.openHedge(record, openCount, quote);
        openCount += opened;
        if (opened > 0) {
          summary.hedged += 1;
        }
      }

      const outcome = await this.applyTrailing(record.positionId, quote);
      if (outcome === 'MODIFIED') {
        summary.modified += 1;
      } else if (outcome === 'NOT_FOUND') {
        stale = true;
      }
    }

    if (stale) {
      await this.reconcile();
      summary.reconciledAgain = true;
    }

    return summary;
  }

  /** Closes every tracked position and returns the ids the venue confirmed. */
  async closeAll(): Promise<number[]> {
    await this.reconcile();
    const closed: number[] = [];

    for (const record of this.tracker.list()) {
      const result = await this.closePosition(record.positionId);
      if (result.status === 'CLOSED') {
        closed.push(record.positionId);
      }
    }

    this.logger.info({ closed, count: closed.length }, 'close all finished');
    return closed;
  }

  async closePosition(positionId: number): Promise<CloseResult> {
    const result = await this.broker.closePosition(positionId);

    switch (result.status) {
      case 'CLOSED': {
        this.tracker.release(positionId);
        this.guard.recordRealized(positionId, result.profit);
        this.eventBus?.emit('position.closed', { positionId, profit: result.profit, closedBy: 'engine' });
        this.logger.info({ positionId, profit: result.profit }, 'position closed');
        break;
      }
      case 'NOT_FOUND': {
        const error = new StateInconsistencyError(positionId, `position ${positionId} is no longer open`);
        this.logger.warn({ positionId, err: error }, 'close target missing, reconciling');
        await this.reconcile();
        break;
      }
      case 'REJECTED':
        this.logger.warn({ positionId, reason: result.reason }, 'close rejected');
        break;
    }

    return result;
  }

  /** Pulls the live snapshot into the tracker and settles positions the venue closed. */
  async reconcile(): Promise<ReconcileResult & { live: Position[] }> {
    const live = await this.snapshotReader.getOpenPositions();
    const result = this.tracker.reconcile(live);

    for (const closed of result.closed) {
      this.guard.recordRealized(closed.record.positionId, closed.profit);
      this.eventBus?.emit('position.closed', {
        positionId: closed.record.positionId,
        profit: closed.profit,
        closedBy: 'venue'
      });
      this.logger.info({ positionId: closed.record.positionId, profit: closed.profit }, 'position closed by venue');
    }

    for (const position of result.adopted) {
      this.eventBus?.emit('position.adopted', position);
      this.logger.info(
        { positionId: position.id, direction: position.direction, stopLoss: position.stopLoss },
        'position adopted'
      );
    }

    return { ...result, live };
  }

  private async openFromSignal(signal: 'BUY' | 'SELL'): Promise<SignalOutcome> {
    const direction = directionFromSignal(signal);
    const { live } = await this.reconcile();

    if (this.entry.onePositionPerDirection && countByDirection(live, direction) > 0) {
      const reason = `${direction} position already open`;
      this.logger.info({ signal, reason }, 'signal skipped');
      return { status: 'SKIPPED', reason };
    }

    const account = await this.broker.getAccountState();
    const decision = this.guard.canOpen(account, live, direction);
    if (decision.status === 'REJECT') {
      this.eventBus?.emit('risk.rejected', { direction, reason: decision.reason });
      this.logger.warn({ signal, reason: decision.reason }, 'signal rejected by exposure guard');
      return { status: 'REJECTED', reason: decision.reason };
    }

    const quote = await this.broker.getQuote(this.symbol);
    const entryPrice = direction === 'Long' ? quote.ask : quote.bid;

    const volume = this.resolveVolume(account.equity, direction, entryPrice, quote);
    if (volume instanceof ValidationError) {
      return this.invalid(signal, volume);
    }

    const protection = entryProtection(this.policy, { direction, entryPrice, volume }, quote);
    const validation = validateOrderParams(quote, volume, protection.stopLoss, protection.takeProfit);
    if (!validation.valid) {
      return this.invalid(signal, validation.error);
    }

    if (validation.warnings.length > 0) {
      this.logger.debug({ signal, warnings: validation.warnings }, 'order warnings');
    }

    this.logger.info(
      {
        signal,
        volume,
        entryPrice,
        stopLoss: protection.stopLoss,
        takeProfit: protection.takeProfit,
        riskReward: riskRewardRatio(entryPrice, protection.stopLoss, protection.takeProfit)
      },
      'submitting order'
    );

    const comment = this.policy.kind === 'BREAKEVEN_TRAIL' ? 'Tango_Initial' : `Bot_${this.tag}_${signal}`;
    const result = await this.broker.submitOrder({
      symbol: this.symbol,
      direction,
      volume,
      stopLoss: protection.stopLoss > 0 ? protection.stopLoss : undefined,
      takeProfit: protection.takeProfit > 0 ? protection.takeProfit : undefined,
      tag: this.tag,
      comment
    });

    if (result.status === 'REJECTED') {
      this.eventBus?.emit('order.rejected', { symbol: this.symbol, direction, reason: result.reason });
      this.logger.warn({ signal, reason: result.reason }, 'order rejected by venue');
      return { status: 'REJECTED', reason: result.reason };
    }

    this.eventBus?.emit('order.submitted', {
      positionId: result.positionId,
      symbol: this.symbol,
      direction,
      volume: result.volume,
      price: result.price,
      stopLoss: protection.stopLoss,
      takeProfit: protection.takeProfit,
      comment
    });

    return {
      status: 'SUBMITTED',
      positionId: result.positionId,
      direction,
      volume: result.volume,
      price: result.price
    };
  }

  private resolveVolume(equity: number, direction: Direction, entryPrice: number, quote: Quote): number | ValidationError {
    if (this.entry.lotSize !== undefined) {
      return clampVolume(normalizeVolume(this.entry.lotSize, quote.volumeStep), quote.volumeMin, quote.volumeMax);
    }

    const stopPrice = pipStop(direction, entryPrice, this.entry.stopLossPips, quote.point, this.entry.pointsPerPip);
    const sized = sizePosition({
      equity,
      entryPrice,
      stopPrice,
      maxRiskFraction: this.guard.limits.maxRiskPerTrade,
      symbol: quote
    });

    if (sized.status === 'ZERO_STOP_DISTANCE') {
      return new ZeroStopDistanceError();
    }

    this.logger.debug(
      { rawVolume: sized.rawVolume, volume: sized.volume, riskAmount: sized.riskAmount, pointsAtRisk: sized.pointsAtRisk },
      'position sized'
    );
    return sized.volume;
  }

  private invalid(signal: Signal, error: ValidationError): SignalOutcome {
    this.logger.warn({ signal, field: error.field, err: error }, 'order skipped by validation');
    this.auditService?.log({
      step: 'execution.validation',
      level: 'warn',
      message: 'order skipped',
      reason: error.message,
      inputs: { signal, field: error.field },
      outputs: { status: 'INVALID' },
      metadata: { errorName: error.name }
    });
    return { status: 'INVALID', error };
  }

  private async openHedge(record: TrackingRecord, openCount: number, quote: Quote): Promise<number> {
    const legs = this.hedge?.legsToOpen(openCount) ?? 0;
    const losing = record.position;
    if (legs === 0) {
      this.logger.warn({ positionId: losing.id, openCount }, 'cannot hedge, no free position slots');
      return 0;
    }

    const direction = oppositeDirection(losing.direction);
    const volume = this.entry.lotSize ?? losing.volume;
    const opened: number[] = [];

    try {
      for (let leg = 1; leg <= legs; leg += 1) {
        const result = await this.broker.submitOrder({
          symbol: this.symbol,
          direction,
          volume: clampVolume(normalizeVolume(volume, quote.volumeStep), quote.volumeMin, quote.volumeMax),
          tag: this.tag,
          comment: `Hedge_${losing.id}_${leg}`
        });

        if (result.status === 'FILLED') {
          opened.push(result.positionId);
        } else {
          this.logger.error({ positionId: losing.id, leg, reason: result.reason }, 'hedge leg rejected');
        }
      }
    } finally {
      // Marked on the first filled leg, also when a later leg throws.
      if (opened.length > 0) {
        this.tracker.markHedged(losing.id);
      }
    }

    if (opened.length > 0) {
      this.eventBus?.emit('hedge.opened', {
        positionId: losing.id,
        direction,
        legs: opened,
        lossAtTrigger: losing.profit
      });
      this.logger.info({ positionId: losing.id, profit: losing.profit, legs: opened }, 'hedge opened');
    }

    return opened.length;
  }

  private async applyTrailing(positionId: number, quote: Quote): Promise<'NONE' | 'MODIFIED' | 'NOT_FOUND'> {
    const record = this.tracker.get(positionId);
    if (!record) {
      return 'NONE';
    }

    const position = record.position;
    const decision = evaluateTrailingStop(this.policy, position, record, quote);

    switch (decision.action) {
      case 'NONE':
        return 'NONE';

      case 'SYNC_LEVEL':
        this.tracker.advanceTrailing(positionId, decision.level, decision.lockedProfit);
        this.logger.debug({ positionId, level: decision.level }, 'venue stop already at lock, level synced');
        return 'NONE';

      case 'MODIFY': {
        const result = await this.broker.modifyStop(positionId, decision.stopPrice, position.takeProfit);

        if (result.status === 'NOT_FOUND') {
          const error = new StateInconsistencyError(positionId, `position ${positionId} vanished before modify`);
          this.logger.warn({ positionId, err: error }, 'modify target missing');
          return 'NOT_FOUND';
        }

        if (result.status === 'REJECTED') {
          this.logger.warn({ positionId, reason: result.reason, stopPrice: decision.stopPrice }, 'stop modify rejected');
          return 'NONE';
        }

        this.tracker.advanceTrailing(positionId, decision.level, decision.lockedProfit, decision.stopPrice);
        this.eventBus?.emit('stop.modified', {
          positionId,
          previousStop: position.stopLoss,
          stopPrice: decision.stopPrice,
          lockedProfit: decision.lockedProfit,
          level: decision.level,
          profit: position.profit
        });
        this.logger.info(
          { positionId, profit: position.profit, from: position.stopLoss, to: decision.stopPrice, locked: decision.lockedProfit },
          'trailing stop moved'
        );
        return 'MODIFIED';
      }
    }
  }
}
