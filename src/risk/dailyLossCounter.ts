import type { ClosedTrade } from '../domain/models.js';

export type DailyLossState = {
  /** Local calendar date, `YYYY-MM-DD`. */
  date: string;
  realizedProfit: number;
  trades: readonly ClosedTrade[];
};

export type DailyStats = {
  date: string;
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  winRate: number;
  totalProfit: number;
  avgWin: number;
  avgLoss: number;
};

export type RolloverResult = {
  state: DailyLossState;
  /** Stats of the day that was closed out, when a reset happened. */
  previous: DailyStats | null;
};

export function localDateKey(ms: number): string {
  const date = new Date(ms);
  const year = date.getFullYear();
  const month = `${date.getMonth() + 1}`.padStart(2, '0');
  const day = `${date.getDate()}`.padStart(2, '0');
  return `${year}-${month}-${day}`;
}

export function emptyDailyLossState(date: string): DailyLossState {
  return { date, realizedProfit: 0, trades: [] };
}

/**
 * Pure reset rule: a state belonging to an earlier date is replaced by an
 * empty one for `today`. Any number of skipped days collapses into one reset.
 */
export function rollDailyLoss(state: DailyLossState, today: string): RolloverResult {
  if (today <= state.date) {
    return { state, previous: null };
  }

  return { state: emptyDailyLossState(today), previous: summarizeDay(state) };
}

export function recordRealizedClose(state: DailyLossState, trade: ClosedTrade): DailyLossState {
  return {
    date: state.date,
    realizedProfit: state.realizedProfit + trade.profit,
    trades: [...state.trades, trade]
  };
}

export function summarizeDay(state: DailyLossState): DailyStats {
  const wins = state.trades.filter((trade) => trade.profit > 0);
  const losses = state.trades.filter((trade) => trade.profit < 0);
  const total = state.trades.length;

  return {
    date: state.date,
    totalTrades: total,
    winningTrades: wins.length,
    losingTrades: losses.length,
    winRate: total > 0 ? wins.length / total : 0,
    totalProfit: state.realizedProfit,
    avgWin: wins.length > 0 ? sum(wins) / wins.length : 0,
    avgLoss: losses.length > 0 ? sum(losses) / losses.length : 0
  };
}

function sum(trades: ClosedTrade[]): number {
  return trades.reduce((acc, trade) => acc + trade.profit, 0);
}

export type DailyLossCounterOptions = {
  now?: () => number;
  onRollover?: (previous: DailyStats) => void;
};

/**
 * Holds the engine's realized P&L for the current local day. Every read and
 * write first applies the rollover rule, so an idle process still resets on
 * its first access after midnight.
 */
export class DailyLossCounter {
  private readonly now: () => number;
  private readonly onRollover?: (previous: DailyStats) => void;
  private state: DailyLossState;

  constructor(options: DailyLossCounterOptions = {}) {
    this.now = options.now ?? Date.now;
    this.onRollover = options.onRollover;
    this.state = emptyDailyLossState(localDateKey(this.now()));
  }

  get value(): number {
    return this.current().realizedProfit;
  }

  record(positionId: number, profit: number): void {
    const closedAt = this.now();
    this.state = recordRealizedClose(this.current(), { positionId, profit, closedAt });
  }

  stats(): DailyStats {
    return summarizeDay(this.current());
  }

  snapshot(): DailyLossState {
    return this.current();
  }

  private current(): DailyLossState {
    const rolled = rollDailyLoss(this.state, localDateKey(this.now()));
    if (rolled.previous) {
      this.state = rolled.state;
      this.onRollover?.(rolled.previous);
    }

    return this.state;
  }
}
