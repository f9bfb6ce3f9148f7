import { normalizePrice, type Direction, type Position, type Quote } from '../domain/models.js';

import type { TrackingRecord } from './positionTracker.js';

export type LadderStep = {
  trigger: number;
  lock: number;
};

export type TrailingPolicy =
  | {
      kind: 'FIXED_DISTANCE';
      stopLossPips: number;
      takeProfitPips: number;
      pointsPerPip: number;
    }
  | {
      kind: 'DOLLAR_LADDER';
      ladder: readonly LadderStep[];
      /** Loss in dollars the opening stop allows, e.g. 35 for a -$35 stop. */
      initialStopDollars?: number;
    }
  | {
      kind: 'STEP_LADDER';
      stepSize: number;
      firstStepLock: number;
      initialStopDollars?: number;
    }
  | {
      kind: 'BREAKEVEN_TRAIL';
      profitBreakeven: number;
      trailStep: number;
    };

export type TrailingPolicyKind = TrailingPolicy['kind'];

export type TrailingDecision =
  | { action: 'NONE'; reason: string }
  | { action: 'MODIFY'; stopPrice: number; level: number; lockedProfit: number }
  /** The venue already holds a stop at least this protective; only the level moves. */
  | { action: 'SYNC_LEVEL'; level: number; lockedProfit: number };

export type PriceSpec = Pick<Quote, 'point' | 'contractSize'>;

export type EntryProtection = {
  stopLoss: number;
  takeProfit: number;
};

export const DEFAULT_TRAILING_LADDER: readonly LadderStep[] = [
  { trigger: 20, lock: 5 },
  { trigger: 40, lock: 20 },
  { trigger: 60, lock: 40 },
  { trigger: 80, lock: 60 },
  { trigger: 100, lock: 80 },
  { trigger: 120, lock: 100 },
  { trigger: 140, lock: 120 },
  { trigger: 160, lock: 140 },
  { trigger: 180, lock: 160 },
  { trigger: 200, lock: 180 }
];

/**
 * Price at which the position shows `dollars` of profit (negative for a
 * loss). One price unit is worth `volume * contractSize` dollars.
 */
export function priceForProfit(
  position: Pick<Position, 'direction' | 'entryPrice' | 'volume'>,
  dollars: number,
  symbol: PriceSpec
): number {
  const distance = dollars / (position.volume * symbol.contractSize);
  const raw = position.direction === 'Long' ? position.entryPrice + distance : position.entryPrice - distance;
  return normalizePrice(raw, symbol.point);
}

/** Strictly tighter than the current stop. An unset stop (0) is always improved upon. */
export function improvesStop(direction: Direction, candidate: number, currentStop: number): boolean {
  if (currentStop <= 0) {
    return true;
  }

  return direction === 'Long' ? candidate > currentStop : candidate < currentStop;
}

export function pipStop(direction: Direction, entryPrice: number, pips: number, point: number, pointsPerPip: number): number {
  const distance = pips * point * pointsPerPip;
  return normalizePrice(direction === 'Long' ? entryPrice - distance : entryPrice + distance, point);
}

export function highestReachedIndex(ladder: readonly LadderStep[], profit: number): number {
  let reached = -1;
  ladder.forEach((step, index) => {
    if (profit >= step.trigger) {
      reached = index;
    }
  });

  return reached;
}

export function stepLadderLock(steps: number, stepSize: number, firstStepLock: number): number {
  return steps === 1 ? firstStepLock : (steps - 1) * stepSize;
}

/** Stop and take-profit attached when the order is placed. */
export function entryProtection(
  policy: TrailingPolicy,
  order: Pick<Position, 'direction' | 'entryPrice' | 'volume'>,
  symbol: PriceSpec
): EntryProtection {
  switch (policy.kind) {
    case 'FIXED_DISTANCE': {
      const stopLoss = pipStop(order.direction, order.entryPrice, policy.stopLossPips, symbol.point, policy.pointsPerPip);
      const takeProfit =
        policy.takeProfitPips > 0
          ? pipStop(order.direction, order.entryPrice, -policy.takeProfitPips, symbol.point, policy.pointsPerPip)
          : 0;
      return { stopLoss, takeProfit };
    }
    case 'DOLLAR_LADDER':
    case 'STEP_LADDER':
      return {
        stopLoss: policy.initialStopDollars ? priceForProfit(order, -policy.initialStopDollars, symbol) : 0,
        takeProfit: 0
      };
    case 'BREAKEVEN_TRAIL':
      return { stopLoss: 0, takeProfit: 0 };
  }
}

export function evaluateTrailingStop(
  policy: TrailingPolicy,
  position: Position,
  record: Pick<TrackingRecord, 'trailingLevel' | 'lockedProfit'>,
  symbol: PriceSpec
): TrailingDecision {
  switch (policy.kind) {
    case 'FIXED_DISTANCE':
      return none('fixed distance stop does not trail');

    case 'DOLLAR_LADDER': {
      const index = highestReachedIndex(policy.ladder, position.profit);
      const step = policy.ladder[index];
      if (!step) {
        return none('below first ladder trigger');
      }

      if (index <= record.trailingLevel) {
        return none('ladder level already applied');
      }

      return lockCandidate(position, index, step.lock, symbol);
    }

    case 'STEP_LADDER': {
      const steps = Math.floor(position.profit / policy.stepSize);
      if (steps < 1) {
        return none('below first step');
      }

      const target = stepLadderLock(steps, policy.stepSize, policy.firstStepLock);
      if (record.lockedProfit !== null && target <= record.lockedProfit) {
        return none('step lock already applied');
      }

      return lockCandidate(position, steps, target, symbol);
    }

    case 'BREAKEVEN_TRAIL': {
      if (position.profit < policy.profitBreakeven) {
        return none('below breakeven threshold');
      }

      const steps = Math.floor(position.profit / policy.trailStep);
      if (steps < 1) {
        return none('below first trail step');
      }

      if (steps <= record.trailingLevel) {
        return none('trail step already applied');
      }

      const lockDistance = (steps - 1) * policy.trailStep;
      const candidate = priceForProfit(position, lockDistance, symbol);
      const onProfitSide =
        position.direction === 'Long' ? candidate >= position.entryPrice : candidate <= position.entryPrice;
      if (!onProfitSide) {
        return none('candidate stop on the losing side of entry');
      }

      return lockCandidate(position, steps, lockDistance, symbol);
    }
  }
}

function lockCandidate(position: Position, level: number, lockedProfit: number, symbol: PriceSpec): TrailingDecision {
  const stopPrice = priceForProfit(position, lockedProfit, symbol);

  if (improvesStop(position.direction, stopPrice, position.stopLoss)) {
    return { action: 'MODIFY', stopPrice, level, lockedProfit };
  }

  return { action: 'SYNC_LEVEL', level, lockedProfit };
}

function none(reason: string): TrailingDecision {
  return { action: 'NONE', reason };
}
