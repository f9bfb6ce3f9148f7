import { createHash } from 'node:crypto';

import { z } from 'zod';

const finiteNonNegativeNumber = z.number().finite().nonnegative();
const finitePositiveNumber = z.number().finite().positive();
const epochMsSchema = z.number().int().nonnegative();
const nonEmptyString = z.string().min(1);

export const directionSchema = z.enum(['Long', 'Short']);
export const signalSchema = z.enum(['BUY', 'SELL', 'HOLD', 'CLOSE']);

/**
 * Example:
 * {
 *   "id": 501234,
 *   "symbol": "EURUSD",
 *   "direction": "Long",
 *   "volume": 0.1,
 *   "entryPrice": 1.1,
 *   "stopLoss": 1.0965,
 *   "takeProfit": 0,
 *   "profit": 12.5,
 *   "tag": 234000,
 *   "comment": "Bot_234000_BUY"
 * }
 */
export const positionSchema = z
  .object({
    id: z.number().int().nonnegative(),
    symbol: nonEmptyString,
    direction: directionSchema,
    volume: finitePositiveNumber,
    entryPrice: finiteNonNegativeNumber,
    stopLoss: finiteNonNegativeNumber,
    takeProfit: finiteNonNegativeNumber,
    profit: z.number().finite(),
    tag: z.number().int().nonnegative(),
    comment: z.string()
  })
  .strict();

/**
 * Example:
 * {
 *   "symbol": "EURUSD",
 *   "bid": 1.10012,
 *   "ask": 1.10025,
 *   "point": 0.00001,
 *   "contractSize": 100000,
 *   "volumeMin": 0.01,
 *   "volumeMax": 100,
 *   "volumeStep": 0.01
 * }
 */
export const quoteSchema = z
  .object({
    symbol: nonEmptyString,
    bid: finiteNonNegativeNumber,
    ask: finiteNonNegativeNumber,
    point: finitePositiveNumber,
    contractSize: finitePositiveNumber,
    volumeMin: finitePositiveNumber,
    volumeMax: finitePositiveNumber,
    volumeStep: finitePositiveNumber
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.volumeMin > value.volumeMax) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'volumeMin must not exceed volumeMax',
        path: ['volumeMin']
      });
    }
  });

/**
 * Example:
 * {
 *   "balance": 10000,
 *   "equity": 10012.5,
 *   "profit": 12.5,
 *   "marginLevel": 4210.33
 * }
 *
 * A marginLevel of 0 means the venue has no margin in use.
 */
export const accountStateSchema = z
  .object({
    balance: z.number().finite(),
    equity: z.number().finite(),
    profit: z.number().finite(),
    marginLevel: finiteNonNegativeNumber
  })
  .strict();

/**
 * Example:
 * {
 *   "symbol": "EURUSD",
 *   "direction": "Short",
 *   "volume": 0.1,
 *   "stopLoss": 1.1035,
 *   "takeProfit": 1.09,
 *   "tag": 234000,
 *   "comment": "Bot_234000_SELL"
 * }
 */
export const orderRequestSchema = z
  .object({
    symbol: nonEmptyString,
    direction: directionSchema,
    volume: finitePositiveNumber,
    stopLoss: finiteNonNegativeNumber.optional(),
    takeProfit: finiteNonNegativeNumber.optional(),
    tag: z.number().int().nonnegative(),
    comment: z.string()
  })
  .strict();

export const closedTradeSchema = z
  .object({
    positionId: z.number().int().nonnegative(),
    profit: z.number().finite(),
    closedAt: epochMsSchema
  })
  .strict();

export const auditLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * Example:
 * {
 *   "id": "audit_001",
 *   "ts": 1734303000000,
 *   "step": "risk.decision",
 *   "level": "warn",
 *   "message": "reject",
 *   "inputsHash": "9dbb9f...",
 *   "outputsHash": "a0d1f2...",
 *   "metadata": { "direction": "Long" }
 * }
 */
export const auditEventSchema = z
  .object({
    id: nonEmptyString,
    ts: epochMsSchema,
    step: nonEmptyString,
    level: auditLevelSchema,
    message: nonEmptyString,
    reason: z.string().optional(),
    inputsHash: nonEmptyString,
    outputsHash: nonEmptyString,
    metadata: z.record(z.string(), z.unknown())
  })
  .strict();

export type Direction = z.infer<typeof directionSchema>;
export type Signal = z.infer<typeof signalSchema>;
export type Position = z.infer<typeof positionSchema>;
export type Quote = z.infer<typeof quoteSchema>;
export type AccountState = z.infer<typeof accountStateSchema>;
export type OrderRequest = z.infer<typeof orderRequestSchema>;
export type ClosedTrade = z.infer<typeof closedTradeSchema>;
export type AuditEvent = z.infer<typeof auditEventSchema>;

export function oppositeDirection(direction: Direction): Direction {
  return direction === 'Long' ? 'Short' : 'Long';
}

export function directionFromSignal(signal: 'BUY' | 'SELL'): Direction {
  return signal === 'BUY' ? 'Long' : 'Short';
}

export function decimalsOf(step: number): number {
  const text = step.toString();
  if (text.includes('e-')) {
    return Number(text.split('e-')[1] ?? 0);
  }

  const fraction = text.split('.')[1];
  return fraction ? fraction.length : 0;
}

/** Rounds a price to the symbol's point grid. */
export function normalizePrice(price: number, point: number): number {
  const units = Math.round(price / point);
  return Number((units * point).toFixed(decimalsOf(point)));
}

function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }

  const entries = Object.entries(value).sort(([a], [b]) =>
    a.localeCompare(b)
  );
  const serialized = entries.map(([key, item]) => `${JSON.stringify(key)}:${stableStringify(item)}`);

  return `{${serialized.join(',')}}`;
}

export function hashObject(obj: unknown): string {
  const payload = stableStringify(obj);
  return createHash('sha256').update(payload).digest('hex');
}
