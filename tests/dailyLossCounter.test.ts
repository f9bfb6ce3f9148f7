import {
  DailyLossCounter,
  emptyDailyLossState,
  localDateKey,
  recordRealizedClose,
  rollDailyLoss,
  summarizeDay,
  type DailyStats
} from '../src/risk/dailyLossCounter.js';

describe('daily loss counter', () => {
  it('formats local calendar dates', () => {
    expect(localDateKey(new Date(2024, 2, 5, 10, 30).getTime())).toBe('2024-03-05');
  });

  it('keeps the state on the same day', () => {
    const state = recordRealizedClose(emptyDailyLossState('2024-01-15'), { positionId: 1, profit: -20, closedAt: 1 });
    const rolled = rollDailyLoss(state, '2024-01-15');

    expect(rolled.state).toBe(state);
    expect(rolled.previous).toBeNull();
  });

  it('resets once for any number of skipped days', () => {
    const state = recordRealizedClose(emptyDailyLossState('2024-01-15'), { positionId: 1, profit: -20, closedAt: 1 });
    const rolled = rollDailyLoss(state, '2024-01-19');

    expect(rolled.state).toEqual({ date: '2024-01-19', realizedProfit: 0, trades: [] });
    expect(rolled.previous?.date).toBe('2024-01-15');
    expect(rolled.previous?.totalProfit).toBe(-20);
  });

  it('summarizes wins and losses', () => {
    let state = emptyDailyLossState('2024-01-15');
    state = recordRealizedClose(state, { positionId: 1, profit: 20, closedAt: 1 });
    state = recordRealizedClose(state, { positionId: 2, profit: -10, closedAt: 2 });
    state = recordRealizedClose(state, { positionId: 3, profit: 10, closedAt: 3 });

    const stats = summarizeDay(state);

    expect(stats.totalTrades).toBe(3);
    expect(stats.winningTrades).toBe(2);
    expect(stats.losingTrades).toBe(1);
    expect(stats.winRate).toBeCloseTo(2 / 3);
    expect(stats.totalProfit).toBe(20);
    expect(stats.avgWin).toBe(15);
    expect(stats.avgLoss).toBe(-10);
  });

  it('summarizes an empty day with zeros', () => {
    expect(summarizeDay(emptyDailyLossState('2024-01-15'))).toEqual({
      date: '2024-01-15',
      totalTrades: 0,
      winningTrades: 0,
      losingTrades: 0,
      winRate: 0,
      totalProfit: 0,
      avgWin: 0,
      avgLoss: 0
    });
  });

  it('rolls over lazily on first access after midnight', () => {
    let nowMs = new Date(2024, 0, 15, 23, 0).getTime();
    const rollovers: DailyStats[] = [];
    const counter = new DailyLossCounter({ now: () => nowMs, onRollover: (stats) => rollovers.push(stats) });

    counter.record(1, -30);
    expect(counter.value).toBe(-30);

    nowMs = new Date(2024, 0, 16, 0, 5).getTime();
    expect(rollovers).toHaveLength(0);

    expect(counter.value).toBe(0);
    expect(counter.value).toBe(0);
    expect(rollovers).toHaveLength(1);
    expect(rollovers[0]?.date).toBe('2024-01-15');
    expect(rollovers[0]?.totalProfit).toBe(-30);
    expect(counter.snapshot().date).toBe('2024-01-16');
  });
});
