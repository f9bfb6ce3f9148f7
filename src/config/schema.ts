import { z } from 'zod';

const flag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback)
    .transform((value) => value === 'true' || value === '1');

const optionalPositive = (schema: z.ZodNumber) =>
  z.preprocess((value) => (value === '' ? undefined : value), schema.positive().optional());

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  SYMBOL: z.string().min(1).default('EURUSD'),
  MAGIC_TAG: z.coerce.number().int().nonnegative().default(234000),
  TICK_INTERVAL_MS: z.coerce.number().int().positive().default(10_000),
  PAPER_MODE: flag('true'),
  LOT_SIZE: optionalPositive(z.coerce.number()),

  TRAILING_POLICY: z.enum(['FIXED_DISTANCE', 'DOLLAR_LADDER', 'STEP_LADDER', 'BREAKEVEN_TRAIL']).default('DOLLAR_LADDER'),
  /** `trigger:lock` pairs in dollars, comma separated. */
  TRAILING_LADDER: z.string().min(1).default('20:5,40:20,60:40,80:60,100:80,120:100,140:120,160:140,180:160,200:180'),
  STEP_SIZE: z.coerce.number().positive().default(10),
  STEP_FIRST_LOCK: z.coerce.number().nonnegative().default(5),
  PROFIT_BREAKEVEN: z.coerce.number().positive().default(10),
  PROFIT_TRAIL_STEP: z.coerce.number().positive().default(10),
  INITIAL_STOP_DOLLARS: optionalPositive(z.coerce.number()),

  HEDGE_ENABLED: flag('false'),
  LOSS_TRIGGER: z.coerce.number().positive().default(10),
  HEDGE_LEGS: z.coerce.number().int().positive().default(2),

  STOP_LOSS_PIPS: z.coerce.number().nonnegative().default(35),
  TAKE_PROFIT_PIPS: z.coerce.number().nonnegative().default(0),
  POINTS_PER_PIP: z.coerce.number().int().positive().default(10),

  MAX_POSITIONS: z.coerce.number().int().positive().default(3),
  MAX_SAME_DIRECTION: optionalPositive(z.coerce.number().int()),
  MAX_RISK_PER_TRADE: z.coerce.number().positive().max(1).default(0.02),
  MAX_DAILY_LOSS: z.coerce.number().positive().max(1).default(0.05),
  MIN_MARGIN_LEVEL: z.coerce.number().nonnegative().default(150),
  ONE_POSITION_PER_DIRECTION: flag('true')
});

export type AppConfig = z.infer<typeof envSchema>;
