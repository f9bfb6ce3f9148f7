import type { Logger } from 'pino';
import pino from 'pino';
import { z } from 'zod';

import { ConnectivityError, describeError } from '../domain/errors.js';
import type { AccountState, Direction, OrderRequest, Position, Quote } from '../domain/models.js';
import { TerminalHttpError, type TerminalClient } from '../terminal/client.js';

import type { Broker, CloseResult, ModifyResult, PositionQuery, SubmitResult } from './broker.js';

export const TRADE_RETCODE_DONE = 10009;

const wireSideSchema = z.enum(['BUY', 'SELL']);

/**
 * Example:
 * {
 *   "ticket": 501234,
 *   "symbol": "EURUSD",
 *   "type": "BUY",
 *   "volume": 0.1,
 *   "price_open": 1.1,
 *   "sl": 1.0965,
 *   "tp": 0,
 *   "profit": 12.5,
 *   "magic": 234000,
 *   "comment": "Bot_234000_BUY"
 * }
 */
const wirePositionSchema = z.object({
  ticket: z.number().int().nonnegative(),
  symbol: z.string().min(1),
  type: wireSideSchema,
  volume: z.number().positive(),
  price_open: z.number().nonnegative(),
  sl: z.number().nonnegative(),
  tp: z.number().nonnegative(),
  profit: z.number().finite(),
  magic: z.number().int().nonnegative(),
  comment: z.string().default('')
});

const wirePositionsSchema = z.array(wirePositionSchema);

/**
 * Example:
 * {
 *   "symbol": "EURUSD",
 *   "bid": 1.10012,
 *   "ask": 1.10025,
 *   "point": 0.00001,
 *   "volume_min": 0.01,
 *   "volume_max": 100,
 *   "volume_step": 0.01,
 *   "trade_contract_size": 100000
 * }
 */
const wireSymbolSchema = z.object({
  symbol: z.string().min(1),
  bid: z.number().nonnegative(),
  ask: z.number().nonnegative(),
  point: z.number().positive(),
  volume_min: z.number().positive(),
  volume_max: z.number().positive(),
  volume_step: z.number().positive(),
  trade_contract_size: z.number().positive()
});

const wireAccountSchema = z.object({
  balance: z.number().finite(),
  equity: z.number().finite(),
  profit: z.number().finite(),
  margin_level: z.number().nonnegative()
});

const wireTradeResultSchema = z.object({
  retcode: z.number().int(),
  comment: z.string().default(''),
  order: z.number().int().nonnegative().optional(),
  volume: z.number().nonnegative().optional(),
  price: z.number().nonnegative().optional(),
  profit: z.number().finite().optional()
});

type WirePosition = z.infer<typeof wirePositionSchema>;

type Sent = { ok: true; body: unknown } | { ok: false; statusCode: number; message: string };

export type TerminalBrokerOptions = {
  client: TerminalClient;
  logger?: Logger;
};

/** `Broker` over the terminal bridge's REST API. */
export class TerminalBroker implements Broker {
  private readonly client: TerminalClient;
  private readonly logger: Logger;

  constructor(options: TerminalBrokerOptions) {
    this.client = options.client;
    this.logger = options.logger ?? pino({ name: 'terminal-broker' });
  }

  async connect(): Promise<void> {
    try {
      await this.client.synchronizeServerTimeOffset();
    } catch (error: unknown) {
      throw new ConnectivityError('connect', describeError(error), { cause: error });
    }
  }

  async getOpenPositions(query: PositionQuery): Promise<Position[]> {
    const body = await this.read('getOpenPositions', () =>
      this.client.privateGet('/api/v1/positions', { symbol: query.symbol, magic: query.tag })
    );
    return parseOrThrow('getOpenPositions', wirePositionsSchema, body).map(toPosition);
  }

  async getQuote(symbol: string): Promise<Quote> {
    const body = await this.read('getQuote', () => this.client.privateGet(`/api/v1/symbols/${encodeURIComponent(symbol)}`));
    const wire = parseOrThrow('getQuote', wireSymbolSchema, body);

    return {
      symbol: wire.symbol,
      bid: wire.bid,
      ask: wire.ask,
      point: wire.point,
      contractSize: wire.trade_contract_size,
      volumeMin: wire.volume_min,
      volumeMax: wire.volume_max,
      volumeStep: wire.volume_step
    };
  }

  async getAccountState(): Promise<AccountState> {
    const body = await this.read('getAccountState', () => this.client.privateGet('/api/v1/account'));
    const wire = parseOrThrow('getAccountState', wireAccountSchema, body);

    return {
      balance: wire.balance,
      equity: wire.equity,
      profit: wire.profit,
      marginLevel: wire.margin_level
    };
  }

  async submitOrder(request: OrderRequest): Promise<SubmitResult> {
    const sent = await this.send('submitOrder', () =>
      this.client.privatePost('/api/v1/orders', {
        symbol: request.symbol,
        type: toWireSide(request.direction),
        volume: request.volume,
        sl: request.stopLoss ?? 0,
        tp: request.takeProfit ?? 0,
        magic: request.tag,
        comment: request.comment
      })
    );

    if (!sent.ok) {
      return { status: 'REJECTED', reason: sent.message };
    }

    const result = parseOrThrow('submitOrder', wireTradeResultSchema, sent.body);
    if (result.retcode !== TRADE_RETCODE_DONE || result.order === undefined) {
      this.logger.warn({ retcode: result.retcode, comment: result.comment }, 'order refused by terminal');
      return { status: 'REJECTED', reason: refusal(result.retcode, result.comment) };
    }

    return {
      status: 'FILLED',
      positionId: result.order,
      price: result.price ?? 0,
      volume: result.volume ?? request.volume
    };
  }

  async modifyStop(positionId: number, stopLoss: number, takeProfit: number): Promise<ModifyResult> {
    const sent = await this.send('modifyStop', () =>
      this.client.privatePost(`/api/v1/positions/${positionId}/modify`, { sl: stopLoss, tp: takeProfit })
    );

    if (!sent.ok) {
      return sent.statusCode === 404 ? { status: 'NOT_FOUND' } : { status: 'REJECTED', reason: sent.message };
    }

    const result = parseOrThrow('modifyStop', wireTradeResultSchema, sent.body);
    if (result.retcode !== TRADE_RETCODE_DONE) {
      return { status: 'REJECTED', reason: refusal(result.retcode, result.comment) };
    }

    return { status: 'MODIFIED' };
  }

  async closePosition(positionId: number): Promise<CloseResult> {
    const sent = await this.send('closePosition', () =>
      this.client.privatePost(`/api/v1/positions/${positionId}/close`, {})
    );

    if (!sent.ok) {
      return sent.statusCode === 404 ? { status: 'NOT_FOUND' } : { status: 'REJECTED', reason: sent.message };
    }

    const result = parseOrThrow('closePosition', wireTradeResultSchema, sent.body);
    if (result.retcode !== TRADE_RETCODE_DONE) {
      return { status: 'REJECTED', reason: refusal(result.retcode, result.comment) };
    }

    return { status: 'CLOSED', profit: result.profit ?? 0 };
  }

  private async read(operation: string, request: () => Promise<unknown>): Promise<unknown> {
    const sent = await this.send(operation, request);
    if (!sent.ok) {
      throw new ConnectivityError(operation, `HTTP ${sent.statusCode}: ${sent.message}`);
    }

    return sent.body;
  }

  /** Client-side HTTP refusals come back as values; anything else is a connectivity failure. */
  private async send(operation: string, request: () => Promise<unknown>): Promise<Sent> {
    try {
      return { ok: true, body: await request() };
    } catch (error: unknown) {
      if (error instanceof TerminalHttpError && error.statusCode >= 400 && error.statusCode < 500 && error.statusCode !== 429) {
        return { ok: false, statusCode: error.statusCode, message: error.message };
      }

      throw new ConnectivityError(operation, describeError(error), { cause: error });
    }
  }
}

function parseOrThrow<T>(operation: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new ConnectivityError(operation, `unexpected response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`);
  }

  return parsed.data;
}

function toPosition(wire: WirePosition): Position {
  return {
    id: wire.ticket,
    symbol: wire.symbol,
    direction: wire.type === 'BUY' ? 'Long' : 'Short',
    volume: wire.volume,
    entryPrice: wire.price_open,
    stopLoss: wire.sl,
    takeProfit: wire.tp,
    profit: wire.profit,
    tag: wire.magic,
    comment: wire.comment
  };
}

function toWireSide(direction: Direction): z.infer<typeof wireSideSchema> {
  return direction === 'Long' ? 'BUY' : 'SELL';
}

function refusal(retcode: number, comment: string): string {
  return comment ? `retcode ${retcode}: ${comment}` : `retcode ${retcode}`;
}
