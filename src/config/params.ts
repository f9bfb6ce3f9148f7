import { z } from 'zod';

import type { EntrySettings } from '../execution/executor.js';
import type { HedgeConfig } from '../portfolio/hedgeTrigger.js';
import type { LadderStep, TrailingPolicy } from '../portfolio/trailingPolicy.js';
import type { ExposureLimits } from '../risk/exposureGuard.js';

import type { AppConfig } from './schema.js';

/**
 * Example:
 * [
 *   { "trigger": 20, "lock": 5 },
 *   { "trigger": 40, "lock": 20 }
 * ]
 */
export const trailingLadderSchema = z
  .array(
    z.object({
      trigger: z.number().finite().positive(),
      lock: z.number().finite().nonnegative()
    })
  )
  .min(1, 'ladder needs at least one step')
  .superRefine((steps, ctx) => {
    steps.forEach((step, index) => {
      if (step.lock >= step.trigger) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `step ${index}: lock ${step.lock} must be below trigger ${step.trigger}`,
          path: [index, 'lock']
        });
      }

      const previous = index > 0 ? steps[index - 1] : undefined;
      if (previous && (step.trigger <= previous.trigger || step.lock <= previous.lock)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `step ${index}: trigger and lock must increase strictly`,
          path: [index]
        });
      }
    });
  });

export type EngineParams = {
  symbol: string;
  tag: number;
  tickIntervalMs: number;
  paperMode: boolean;
  limits: ExposureLimits;
  policy: TrailingPolicy;
  hedge: HedgeConfig & { enabled: boolean };
  entry: EntrySettings;
};

/** Parses `"20:5,40:20"` into validated ladder steps. */
export function parseLadder(text: string): readonly LadderStep[] {
  const steps = text
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => {
      const [trigger, lock] = part.split(':');
      return { trigger: Number(trigger), lock: Number(lock) };
    });

  const parsed = trailingLadderSchema.safeParse(steps);
  if (!parsed.success) {
    throw new Error(`Invalid trailing ladder "${text}": ${parsed.error.issues.map((issue) => issue.message).join('; ')}`);
  }

  return Object.freeze(parsed.data.map((step) => Object.freeze(step)));
}

export function buildEngineParams(config: AppConfig): Readonly<EngineParams> {
  return Object.freeze({
    symbol: config.SYMBOL,
    tag: config.MAGIC_TAG,
    tickIntervalMs: config.TICK_INTERVAL_MS,
    paperMode: config.PAPER_MODE,
    limits: Object.freeze({
      maxPositions: config.MAX_POSITIONS,
      maxSameDirection: config.MAX_SAME_DIRECTION,
      maxRiskPerTrade: config.MAX_RISK_PER_TRADE,
      maxDailyLoss: config.MAX_DAILY_LOSS,
      minMarginLevel: config.MIN_MARGIN_LEVEL
    }),
    policy: Object.freeze(buildPolicy(config)),
    hedge: Object.freeze({
      enabled: config.HEDGE_ENABLED,
      lossTrigger: config.LOSS_TRIGGER,
      maxPositions: config.MAX_POSITIONS,
      legs: config.HEDGE_LEGS
    }),
    entry: Object.freeze({
      lotSize: config.LOT_SIZE,
      stopLossPips: config.STOP_LOSS_PIPS,
      pointsPerPip: config.POINTS_PER_PIP,
      onePositionPerDirection: config.ONE_POSITION_PER_DIRECTION
    })
  });
}

function buildPolicy(config: AppConfig): TrailingPolicy {
  switch (config.TRAILING_POLICY) {
    case 'FIXED_DISTANCE':
      return {
        kind: 'FIXED_DISTANCE',
        stopLossPips: config.STOP_LOSS_PIPS,
        takeProfitPips: config.TAKE_PROFIT_PIPS,
        pointsPerPip: config.POINTS_PER_PIP
      };
    case 'DOLLAR_LADDER':
      return {
        kind: 'DOLLAR_LADDER',
        ladder: parseLadder(config.TRAILING_LADDER),
        initialStopDollars: config.INITIAL_STOP_DOLLARS
      };
    case 'STEP_LADDER':
      if (config.STEP_FIRST_LOCK >= config.STEP_SIZE) {
        throw new Error('STEP_FIRST_LOCK must be below STEP_SIZE');
      }

      return {
        kind: 'STEP_LADDER',
        stepSize: config.STEP_SIZE,
        firstStepLock: config.STEP_FIRST_LOCK,
        initialStopDollars: config.INITIAL_STOP_DOLLARS
      };
    case 'BREAKEVEN_TRAIL':
      return {
        kind: 'BREAKEVEN_TRAIL',
        profitBreakeven: config.PROFIT_BREAKEVEN,
        trailStep: config.PROFIT_TRAIL_STEP
      };
  }
}
