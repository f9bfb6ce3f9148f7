import { loadTerminalEnv } from '../src/config/env.js';
import { loadConfig } from '../src/config/index.js';
import { createLogger } from '../src/config/logger.js';
import { buildEngineParams, parseLadder } from '../src/config/params.js';
import { DEFAULT_TRAILING_LADDER } from '../src/portfolio/trailingPolicy.js';

describe('configuration', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      NODE_ENV: 'development',
      SYMBOL: 'EURUSD',
      MAGIC_TAG: 234000,
      PAPER_MODE: true,
      HEDGE_ENABLED: false,
      TRAILING_POLICY: 'DOLLAR_LADDER',
      MAX_POSITIONS: 3,
      ONE_POSITION_PER_DIRECTION: true
    });
    expect(config.LOT_SIZE).toBeUndefined();
    expect(config.MAX_SAME_DIRECTION).toBeUndefined();
  });

  it('parses flags and optional numbers from strings', () => {
    const config = loadConfig({ PAPER_MODE: 'false', HEDGE_ENABLED: '1', LOT_SIZE: '0.05', MAX_SAME_DIRECTION: '' });

    expect(config.PAPER_MODE).toBe(false);
    expect(config.HEDGE_ENABLED).toBe(true);
    expect(config.LOT_SIZE).toBe(0.05);
    expect(config.MAX_SAME_DIRECTION).toBeUndefined();
  });

  it('rejects out of range values', () => {
    expect(() => loadConfig({ MAX_RISK_PER_TRADE: '2' })).toThrow(/^Invalid configuration/);
    expect(() => loadConfig({ TRAILING_POLICY: 'MOON' })).toThrow(/^Invalid configuration/);
  });

  it('requires terminal credentials outside paper mode', () => {
    expect(() => loadTerminalEnv({})).toThrow(/^Invalid terminal environment configuration/);
    expect(loadTerminalEnv({ TERMINAL_API_KEY: 'test-key', TERMINAL_API_SECRET: 'test-secret' })).toEqual({
      TERMINAL_API_KEY: 'test-key',
      TERMINAL_API_SECRET: 'test-secret',
      TERMINAL_BASE_URL: 'http://127.0.0.1:8228',
      RECV_WINDOW_MS: 5000
    });
  });
});

describe('createLogger', () => {
  it('uses the configured level', () => {
    expect(createLogger({ LOG_LEVEL: 'warn', SYMBOL: 'EURUSD', PAPER_MODE: true }).level).toBe('warn');
  });
});

describe('trailing ladder parsing', () => {
  it('parses trigger:lock pairs', () => {
    const ladder = parseLadder(' 20:5, 40:20 ');

    expect(ladder).toEqual([
      { trigger: 20, lock: 5 },
      { trigger: 40, lock: 20 }
    ]);
    expect(Object.isFrozen(ladder)).toBe(true);
  });

  it('rejects a lock at or above its trigger', () => {
    expect(() => parseLadder('20:25')).toThrow('step 0: lock 25 must be below trigger 20');
  });

  it('rejects steps that do not increase', () => {
    expect(() => parseLadder('20:5,15:10')).toThrow('step 1: trigger and lock must increase strictly');
  });

  it('rejects malformed pairs', () => {
    expect(() => parseLadder('20')).toThrow(/^Invalid trailing ladder "20"/);
  });
});

describe('engine params', () => {
  it('builds the default dollar ladder policy', () => {
    const params = buildEngineParams(loadConfig({}));

    expect(params.policy).toEqual({ kind: 'DOLLAR_LADDER', ladder: DEFAULT_TRAILING_LADDER, initialStopDollars: undefined });
    expect(params.limits).toEqual({
      maxPositions: 3,
      maxSameDirection: undefined,
      maxRiskPerTrade: 0.02,
      maxDailyLoss: 0.05,
      minMarginLevel: 150
    });
    expect(params.hedge).toEqual({ enabled: false, lossTrigger: 10, maxPositions: 3, legs: 2 });
    expect(Object.isFrozen(params)).toBe(true);
  });

  it('maps each policy kind', () => {
    expect(buildEngineParams(loadConfig({ TRAILING_POLICY: 'STEP_LADDER' })).policy).toEqual({
      kind: 'STEP_LADDER',
      stepSize: 10,
      firstStepLock: 5,
      initialStopDollars: undefined
    });
    expect(buildEngineParams(loadConfig({ TRAILING_POLICY: 'BREAKEVEN_TRAIL', PROFIT_TRAIL_STEP: '5' })).policy).toEqual({
      kind: 'BREAKEVEN_TRAIL',
      profitBreakeven: 10,
      trailStep: 5
    });
    expect(
      buildEngineParams(loadConfig({ TRAILING_POLICY: 'FIXED_DISTANCE', STOP_LOSS_PIPS: '20', TAKE_PROFIT_PIPS: '40' })).policy
    ).toEqual({ kind: 'FIXED_DISTANCE', stopLossPips: 20, takeProfitPips: 40, pointsPerPip: 10 });
  });

  it('rejects a first step lock that is not below the step size', () => {
    expect(() => buildEngineParams(loadConfig({ TRAILING_POLICY: 'STEP_LADDER', STEP_FIRST_LOCK: '10' }))).toThrow(
      'STEP_FIRST_LOCK must be below STEP_SIZE'
    );
  });
});
