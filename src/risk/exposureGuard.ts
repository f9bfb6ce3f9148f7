import type { AuditService } from '../audit/auditService.js';
import type { AccountState, Direction, Position } from '../domain/models.js';

import { DailyLossCounter, type DailyStats } from './dailyLossCounter.js';

export type ExposureLimits = {
  maxPositions: number;
  /** Unset means no per-direction cap. */
  maxSameDirection?: number;
  /** Fraction of equity risked per trade. */
  maxRiskPerTrade: number;
  /** Fraction of equity the day may lose before new entries stop. */
  maxDailyLoss: number;
  /** Percent. */
  minMarginLevel: number;
};

export type ExposureDecision =
  | { status: 'APPROVE' }
  | { status: 'REJECT'; reason: string };

export type ExposureGuardOptions = {
  limits?: Partial<ExposureLimits>;
  counter?: DailyLossCounter;
  auditService?: AuditService;
};

export const DEFAULT_EXPOSURE_LIMITS: ExposureLimits = {
  maxPositions: 3,
  maxRiskPerTrade: 0.02,
  maxDailyLoss: 0.05,
  minMarginLevel: 150
};

export class ExposureGuard {
  readonly limits: Readonly<ExposureLimits>;
  private readonly counter: DailyLossCounter;
  private readonly auditService?: AuditService;

  constructor(options: ExposureGuardOptions = {}) {
    this.limits = Object.freeze({ ...DEFAULT_EXPOSURE_LIMITS, ...options.limits });
    this.counter = options.counter ?? new DailyLossCounter();
    this.auditService = options.auditService;
  }

  canOpen(account: AccountState, openPositions: readonly Position[], direction: Direction): ExposureDecision {
    const decision = this.evaluate(account, openPositions, direction);
    this.auditDecision(decision, account, openPositions, direction);
    return decision;
  }

  recordRealized(positionId: number, profit: number): void {
    this.counter.record(positionId, profit);
  }

  get dailyRealizedProfit(): number {
    return this.counter.value;
  }

  getDailyStats(): DailyStats {
    return this.counter.stats();
  }

  private evaluate(account: AccountState, openPositions: readonly Position[], direction: Direction): ExposureDecision {
    if (openPositions.length >= this.limits.maxPositions) {
      return reject(`max open positions reached (${this.limits.maxPositions})`);
    }

    const { maxSameDirection } = this.limits;
    if (maxSameDirection !== undefined) {
      const sameDirection = openPositions.filter((position) => position.direction === direction).length;
      if (sameDirection >= maxSameDirection) {
        return reject(`max ${direction} positions reached (${maxSameDirection})`);
      }
    }

    const realized = this.counter.value;
    const lossLimit = account.equity * this.limits.maxDailyLoss;
    if (realized < 0 && realized <= -lossLimit) {
      return reject(`daily loss limit reached (${formatPct(this.limits.maxDailyLoss)}, realized ${realized.toFixed(2)})`);
    }

    if (account.equity <= 0) {
      return reject('no equity available');
    }

    if (account.marginLevel > 0 && account.marginLevel < this.limits.minMarginLevel) {
      return reject(`insufficient margin (level ${account.marginLevel.toFixed(2)}%)`);
    }

    return { status: 'APPROVE' };
  }

  private auditDecision(
    decision: ExposureDecision,
    account: AccountState,
    openPositions: readonly Position[],
    direction: Direction
  ): void {
    this.auditService?.log({
      step: 'risk.decision',
      level: decision.status === 'APPROVE' ? 'info' : 'warn',
      message: decision.status === 'APPROVE' ? 'approve' : 'reject',
      reason: decision.status === 'REJECT' ? decision.reason : undefined,
      inputs: { account, openPositionIds: openPositions.map((position) => position.id), direction },
      outputs: decision,
      metadata: {
        direction,
        openCount: openPositions.length,
        dailyRealizedProfit: this.counter.value
      }
    });
  }
}

function reject(reason: string): ExposureDecision {
  return { status: 'REJECT', reason };
}

function formatPct(fraction: number): string {
  return `${Number((fraction * 100).toFixed(4))}%`;
}
