export { EventBus, type EventBusOptions } from './eventBus.js';

export type {
  EventHandler,
  HedgeOpenedPayload,
  OrderRejectedPayload,
  OrderSubmittedPayload,
  PositionClosedPayload,
  RiskRejectedPayload,
  StopModifiedPayload,
  TickCompletedPayload,
  TickFailedPayload,
  TradingEventMap,
  TradingEventName
} from './events.js';
