export {
  accountStateSchema,
  auditEventSchema,
  auditLevelSchema,
  closedTradeSchema,
  directionSchema,
  orderRequestSchema,
  positionSchema,
  quoteSchema,
  signalSchema,
  decimalsOf,
  directionFromSignal,
  hashObject,
  normalizePrice,
  oppositeDirection
} from './models.js';

export type {
  AccountState,
  AuditEvent,
  ClosedTrade,
  Direction,
  OrderRequest,
  Position,
  Quote,
  Signal
} from './models.js';

export {
  ConnectivityError,
  StateInconsistencyError,
  ValidationError,
  ZeroStopDistanceError,
  describeError
} from './errors.js';
