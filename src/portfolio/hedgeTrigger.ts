import type { Position } from '../domain/models.js';

import type { TrackingRecord } from './positionTracker.js';

export type HedgeConfig = {
  /** Loss in dollars, positive. Hedging starts at profit <= -lossTrigger. */
  lossTrigger: number;
  maxPositions: number;
  legs: number;
};

const DEFAULT_HEDGE_CONFIG: HedgeConfig = {
  lossTrigger: 10,
  maxPositions: 3,
  legs: 2
};

export class HedgeTrigger {
  readonly config: Readonly<HedgeConfig>;

  constructor(config?: Partial<HedgeConfig>) {
    this.config = Object.freeze({ ...DEFAULT_HEDGE_CONFIG, ...config });
  }

  shouldHedge(position: Position, record: Pick<TrackingRecord, 'hedged'> | undefined): boolean {
    if (record?.hedged) {
      return false;
    }

    return position.profit <= -this.config.lossTrigger;
  }

  /** Counter-positions to open given how many are already open. */
  legsToOpen(openCount: number): number {
    return Math.max(0, Math.min(this.config.legs, this.config.maxPositions - openCount));
  }
}
