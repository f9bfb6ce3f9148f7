import pino, { type Logger } from 'pino';

import { AuditService } from '../audit/auditService.js';
import { loadTerminalEnv } from '../config/env.js';
import { loadConfig, type AppConfig } from '../config/index.js';
import { buildEngineParams, type EngineParams } from '../config/params.js';
import { EventBus } from '../events/eventBus.js';
import type { Broker } from '../execution/broker.js';
import { Executor } from '../execution/executor.js';
import { PaperBroker } from '../execution/paperBroker.js';
import { TerminalBroker } from '../execution/terminalBroker.js';
import { HedgeTrigger } from '../portfolio/hedgeTrigger.js';
import { PositionTracker } from '../portfolio/positionTracker.js';
import { PositionSnapshotReader } from '../portfolio/snapshotReader.js';
import { DailyLossCounter } from '../risk/dailyLossCounter.js';
import { ExposureGuard } from '../risk/exposureGuard.js';
import { QueuedSignalSource } from '../signals/signalSource.js';
import { TerminalClient } from '../terminal/client.js';

import { TradingEngine } from './engine.js';
import { TickScheduler } from './scheduler.js';

export type RuntimeOptions = {
  env?: NodeJS.ProcessEnv;
  /** Already parsed configuration; `env` is then only read for terminal credentials. */
  config?: AppConfig;
  logger?: Logger;
  /** Replaces the broker chosen from PAPER_MODE. */
  broker?: Broker;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

export type RuntimeContext = {
  config: AppConfig;
  params: Readonly<EngineParams>;
  logger: Logger;
  eventBus: EventBus;
  auditService: AuditService;
  broker: Broker;
  tracker: PositionTracker;
  guard: ExposureGuard;
  executor: Executor;
  signals: QueuedSignalSource;
  engine: TradingEngine;
  scheduler: TickScheduler;
};

export async function bootRuntime(options: RuntimeOptions = {}): Promise<RuntimeContext> {
  const logger = options.logger ?? pino({ name: 'runtime' });
  const env = options.env ?? process.env;
  const now = options.now ?? Date.now;

  const boot = (step: string) => logger.info({ step }, `boot: ${step}`);

  try {
    boot('1.ConfigLoader');
    const config = options.config ?? loadConfig(env);
    const params = buildEngineParams(config);

    boot('2.EventBus');
    const eventBus = new EventBus({ queueEmits: true, now });
    subscribeEventLogging(eventBus, logger.child({ component: 'events' }));

    boot('3.AuditService');
    const auditService = new AuditService({ eventBus, now });

    boot('4.Broker');
    const broker = options.broker ?? (await createBroker(params, env, logger));

    boot('5.ExposureGuard');
    const counter = new DailyLossCounter({
      now,
      onRollover: (previous) => eventBus.emit('daily.rollover', previous)
    });
    const guard = new ExposureGuard({ limits: params.limits, counter, auditService });

    boot('6.PositionTracker');
    const tracker = new PositionTracker({ now });
    const snapshotReader = new PositionSnapshotReader({ broker, symbol: params.symbol, tag: params.tag });

    boot('7.Executor');
    const executor = new Executor({
      broker,
      snapshotReader,
      tracker,
      guard,
      policy: params.policy,
      hedge: params.hedge.enabled ? new HedgeTrigger(params.hedge) : undefined,
      entry: params.entry,
      eventBus,
      auditService,
      logger: logger.child({ component: 'executor' })
    });

    boot('8.TradingEngine');
    const signals = new QueuedSignalSource();
    const engine = new TradingEngine({
      broker,
      executor,
      tracker,
      guard,
      signalSource: signals,
      eventBus,
      logger: logger.child({ component: 'engine' }),
      now
    });

    const scheduler = new TickScheduler({
      engine,
      intervalMs: params.tickIntervalMs,
      sleep: options.sleep,
      logger: logger.child({ component: 'scheduler' })
    });

    logger.info(
      { symbol: params.symbol, tag: params.tag, policy: params.policy.kind, paperMode: params.paperMode },
      'runtime booted'
    );

    return { config, params, logger, eventBus, auditService, broker, tracker, guard, executor, signals, engine, scheduler };
  } catch (error: unknown) {
    logger.error({ err: error }, 'runtime boot failed');
    throw error;
  }
}

async function createBroker(params: Readonly<EngineParams>, env: NodeJS.ProcessEnv, logger: Logger): Promise<Broker> {
  if (params.paperMode) {
    return new PaperBroker();
  }

  const client = new TerminalClient({ env: loadTerminalEnv(env), logger: logger.child({ service: 'terminal' }) });
  const broker = new TerminalBroker({ client, logger: logger.child({ component: 'terminal-broker' }) });
  await broker.connect();
  return broker;
}

function subscribeEventLogging(eventBus: EventBus, logger: Logger): void {
  eventBus.on('order.submitted', (order) => {
    logger.info({ positionId: order.positionId, direction: order.direction, volume: order.volume, price: order.price }, 'order.submitted');
  });

  eventBus.on('order.rejected', (rejection) => {
    logger.warn({ direction: rejection.direction, reason: rejection.reason }, 'order.rejected');
  });

  eventBus.on('risk.rejected', (rejection) => {
    logger.warn({ direction: rejection.direction, reason: rejection.reason }, 'risk.rejected');
  });

  eventBus.on('position.adopted', (position) => {
    logger.info({ positionId: position.id, direction: position.direction, comment: position.comment }, 'position.adopted');
  });

  eventBus.on('position.closed', (closed) => {
    logger.info({ positionId: closed.positionId, profit: closed.profit, closedBy: closed.closedBy }, 'position.closed');
  });

  eventBus.on('stop.modified', (moved) => {
    logger.info({ positionId: moved.positionId, stopPrice: moved.stopPrice, lockedProfit: moved.lockedProfit }, 'stop.modified');
  });

  eventBus.on('hedge.opened', (hedge) => {
    logger.info({ positionId: hedge.positionId, legs: hedge.legs, lossAtTrigger: hedge.lossAtTrigger }, 'hedge.opened');
  });

  eventBus.on('daily.rollover', (stats) => {
    logger.info(stats, 'daily summary');
  });

  eventBus.on('tick.failed', (failure) => {
    logger.warn({ errorName: failure.errorName, message: failure.message }, 'tick.failed');
  });

  eventBus.on('audit.event', (audit) => {
    logger.debug({ step: audit.step, level: audit.level, reason: audit.reason, inputsHash: audit.inputsHash }, 'audit');
  });
}
