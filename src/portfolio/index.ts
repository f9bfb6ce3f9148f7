export { HedgeTrigger, type HedgeConfig } from './hedgeTrigger.js';
export {
  PositionTracker,
  type ClosedRecord,
  type PositionTrackerOptions,
  type ReconcileResult,
  type TrackingRecord
} from './positionTracker.js';
export { PositionSnapshotReader, countByDirection, type SnapshotReaderOptions } from './snapshotReader.js';
export { nextTrackingState, type TrackingEvent, type TrackingState } from './stateMachine.js';
export {
  DEFAULT_TRAILING_LADDER,
  entryProtection,
  evaluateTrailingStop,
  highestReachedIndex,
  improvesStop,
  pipStop,
  priceForProfit,
  stepLadderLock,
  type EntryProtection,
  type LadderStep,
  type PriceSpec,
  type TrailingDecision,
  type TrailingPolicy,
  type TrailingPolicyKind
} from './trailingPolicy.js';
