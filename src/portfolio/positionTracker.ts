import type { Position } from '../domain/models.js';

import { nextTrackingState, type TrackingState } from './stateMachine.js';

export type TrackingRecord = {
  positionId: number;
  state: TrackingState;
  /** Index into the active ladder; -1 until the first trailing move. */
  trailingLevel: number;
  /** Dollars locked by the last confirmed stop move, null when none. */
  lockedProfit: number | null;
  hedged: boolean;
  /** Last observed venue mirror. Price and profit are never authoritative. */
  position: Position;
  adoptedAt: number;
  updatedAt: number;
};

export type ClosedRecord = {
  record: TrackingRecord;
  /** Profit last observed before the position disappeared. */
  profit: number;
};

export type ReconcileResult = {
  adopted: Position[];
  closed: ClosedRecord[];
  monitored: TrackingRecord[];
};

export type PositionTrackerOptions = {
  now?: () => number;
};

/**
 * Arena of tracking records keyed by the broker's position id. `reconcile`
 * is the only place records are created, and the garbage-collection pass
 * that drops them once the id leaves the live snapshot.
 */
export class PositionTracker {
  private readonly records = new Map<number, TrackingRecord>();
  private readonly now: () => number;

  constructor(options: PositionTrackerOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  reconcile(live: readonly Position[]): ReconcileResult {
    const nowMs = this.now();
    const liveIds = new Set(live.map((position) => position.id));
    const closed: ClosedRecord[] = [];
    const adopted: Position[] = [];

    for (const [id, record] of this.records) {
      if (liveIds.has(id)) {
        continue;
      }

      this.records.delete(id);
      closed.push({
        record: { ...record, state: nextTrackingState(record.state, 'POSITION_GONE'), updatedAt: nowMs },
        profit: record.position.profit
      });
    }

    for (const position of live) {
      const existing = this.records.get(position.id);
      if (existing) {
        this.records.set(position.id, { ...existing, position, updatedAt: nowMs });
        continue;
      }

      const record: TrackingRecord = {
        positionId: position.id,
        state: 'ADOPTED',
        trailingLevel: -1,
        lockedProfit: null,
        hedged: false,
        position,
        adoptedAt: nowMs,
        updatedAt: nowMs
      };

      this.records.set(position.id, { ...record, state: nextTrackingState(record.state, 'RECONCILED') });
      adopted.push(position);
    }

    return { adopted, closed, monitored: this.list() };
  }

  get(positionId: number): TrackingRecord | undefined {
    return this.records.get(positionId);
  }

  has(positionId: number): boolean {
    return this.records.has(positionId);
  }

  list(): TrackingRecord[] {
    return [...this.records.values()];
  }

  get size(): number {
    return this.records.size;
  }

  /** Levels only move forward. */
  advanceTrailing(positionId: number, level: number, lockedProfit: number | null, stopLoss?: number): void {
    const record = this.records.get(positionId);
    if (!record || level < record.trailingLevel) {
      return;
    }

    const position = stopLoss === undefined ? record.position : { ...record.position, stopLoss };
    this.records.set(positionId, {
      ...record,
      trailingLevel: level,
      lockedProfit: lockedProfit ?? record.lockedProfit,
      position,
      updatedAt: this.now()
    });
  }

  markHedged(positionId: number): void {
    const record = this.records.get(positionId);
    if (!record) {
      return;
    }

    this.records.set(positionId, { ...record, hedged: true, updatedAt: this.now() });
  }

  /**
   * Drops a record for a position the engine closed itself. The caller owns
   * the realized profit, so the next reconciliation will not see it again.
   */
  release(positionId: number): TrackingRecord | undefined {
    const record = this.records.get(positionId);
    if (!record) {
      return undefined;
    }

    this.records.delete(positionId);
    return { ...record, state: nextTrackingState(record.state, 'CLOSED_BY_ENGINE'), updatedAt: this.now() };
  }
}
