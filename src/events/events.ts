import type { AuditEvent, Direction, Position } from '../domain/models.js';
import type { DailyStats } from '../risk/dailyLossCounter.js';

export type OrderSubmittedPayload = {
  positionId: number;
  symbol: string;
  direction: Direction;
  volume: number;
  price: number;
  stopLoss: number;
  takeProfit: number;
  comment: string;
};

export type OrderRejectedPayload = {
  symbol: string;
  direction: Direction;
  reason: string;
};

export type RiskRejectedPayload = {
  direction: Direction;
  reason: string;
};

export type PositionClosedPayload = {
  positionId: number;
  profit: number;
  closedBy: 'venue' | 'engine';
};

export type StopModifiedPayload = {
  positionId: number;
  previousStop: number;
  stopPrice: number;
  lockedProfit: number;
  level: number;
  profit: number;
};

export type HedgeOpenedPayload = {
  positionId: number;
  direction: Direction;
  legs: number[];
  lossAtTrigger: number;
};

export type TickCompletedPayload = {
  startedAt: number;
  durationMs: number;
  openCount: number;
};

export type TickFailedPayload = {
  startedAt: number;
  errorName: string;
  message: string;
};

export type TradingEventMap = {
  'order.submitted': OrderSubmittedPayload;
  'order.rejected': OrderRejectedPayload;
  'risk.rejected': RiskRejectedPayload;
  'position.adopted': Position;
  'position.closed': PositionClosedPayload;
  'stop.modified': StopModifiedPayload;
  'hedge.opened': HedgeOpenedPayload;
  'daily.rollover': DailyStats;
  'tick.completed': TickCompletedPayload;
  'tick.failed': TickFailedPayload;
  'audit.event': AuditEvent;
};

export type TradingEventName = keyof TradingEventMap;
export type EventHandler<TPayload> = (payload: TPayload) => void | Promise<void>;
