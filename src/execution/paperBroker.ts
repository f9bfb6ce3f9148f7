import { ConnectivityError } from '../domain/errors.js';
import { quoteSchema, type AccountState, type OrderRequest, type Position, type Quote } from '../domain/models.js';

import type { Broker, CloseResult, ModifyResult, PositionQuery, SubmitResult } from './broker.js';

export type PaperBrokerOptions = {
  balance?: number;
  /** Percent. 0 reports no margin in use. */
  marginLevel?: number;
  firstPositionId?: number;
};

export type PaperModification = {
  positionId: number;
  stopLoss: number;
  takeProfit: number;
};

type PaperPosition = Omit<Position, 'profit'>;

type CallCounts = {
  getOpenPositions: number;
  submitOrder: number;
  modifyStop: number;
  closePosition: number;
};

const DEFAULT_OPTIONS: Required<PaperBrokerOptions> = {
  balance: 10_000,
  marginLevel: 0,
  firstPositionId: 1
};

/**
 * In-memory venue. Positions are marked to market from the last quote of
 * their symbol and stops fire when a new quote crosses them.
 */
export class PaperBroker implements Broker {
  private readonly quotes = new Map<string, Quote>();
  private readonly positions = new Map<number, PaperPosition>();
  private balance: number;
  private marginLevel: number;
  private nextId: number;
  private connected = true;
  private pendingOrderRejection: string | null = null;
  private pendingModifyRejection: string | null = null;

  readonly calls: CallCounts = { getOpenPositions: 0, submitOrder: 0, modifyStop: 0, closePosition: 0 };
  readonly submitted: OrderRequest[] = [];
  readonly modifications: PaperModification[] = [];

  constructor(options?: PaperBrokerOptions) {
    const resolved = { ...DEFAULT_OPTIONS, ...options };
    this.balance = resolved.balance;
    this.marginLevel = resolved.marginLevel;
    this.nextId = resolved.firstPositionId;
  }

  setQuote(quote: Quote): void {
    const parsed = quoteSchema.parse(quote);
    this.quotes.set(parsed.symbol, parsed);
    this.triggerStops(parsed);
  }

  setMarginLevel(level: number): void {
    this.marginLevel = level;
  }

  setConnectivity(connected: boolean): void {
    this.connected = connected;
  }

  rejectNextOrder(reason: string): void {
    this.pendingOrderRejection = reason;
  }

  rejectNextModify(reason: string): void {
    this.pendingModifyRejection = reason;
  }

  /** Places a position directly, as if another session had opened it. */
  seedPosition(position: PaperPosition): void {
    this.positions.set(position.id, { ...position });
    this.nextId = Math.max(this.nextId, position.id + 1);
  }

  /** Closes a position on the venue side without the engine asking, e.g. a manual close. */
  removePosition(positionId: number): number | null {
    const position = this.positions.get(positionId);
    if (!position) {
      return null;
    }

    const profit = this.markProfit(position);
    this.balance += profit;
    this.positions.delete(positionId);
    return profit;
  }

  async getOpenPositions(query: PositionQuery): Promise<Position[]> {
    this.assertConnected('getOpenPositions');
    this.calls.getOpenPositions += 1;

    return [...this.positions.values()]
      .filter((position) => position.symbol === query.symbol && position.tag === query.tag)
      .map((position) => ({ ...position, profit: this.markProfit(position) }));
  }

  async getQuote(symbol: string): Promise<Quote> {
    this.assertConnected('getQuote');
    const quote = this.quotes.get(symbol);
    if (!quote) {
      throw new ConnectivityError('getQuote', `no quote for ${symbol}`);
    }

    return quote;
  }

  async getAccountState(): Promise<AccountState> {
    this.assertConnected('getAccountState');
    const profit = round2(
      [...this.positions.values()].reduce((acc, position) => acc + this.markProfit(position), 0)
    );

    return {
      balance: this.balance,
      equity: round2(this.balance + profit),
      profit,
      marginLevel: this.marginLevel
    };
  }

  async submitOrder(request: OrderRequest): Promise<SubmitResult> {
    this.assertConnected('submitOrder');
    this.calls.submitOrder += 1;
    this.submitted.push(request);

    if (this.pendingOrderRejection !== null) {
      const reason = this.pendingOrderRejection;
      this.pendingOrderRejection = null;
      return { status: 'REJECTED', reason };
    }

    const quote = this.quotes.get(request.symbol);
    if (!quote) {
      return { status: 'REJECTED', reason: `no quote for ${request.symbol}` };
    }

    const price = request.direction === 'Long' ? quote.ask : quote.bid;
    const positionId = this.nextId;
    this.nextId += 1;

    this.positions.set(positionId, {
      id: positionId,
      symbol: request.symbol,
      direction: request.direction,
      volume: request.volume,
      entryPrice: price,
      stopLoss: request.stopLoss ?? 0,
      takeProfit: request.takeProfit ?? 0,
      tag: request.tag,
      comment: request.comment
    });

    return { status: 'FILLED', positionId, price, volume: request.volume };
  }

  async modifyStop(positionId: number, stopLoss: number, takeProfit: number): Promise<ModifyResult> {
    this.assertConnected('modifyStop');
    this.calls.modifyStop += 1;

    const position = this.positions.get(positionId);
    if (!position) {
      return { status: 'NOT_FOUND' };
    }

    if (this.pendingModifyRejection !== null) {
      const reason = this.pendingModifyRejection;
      this.pendingModifyRejection = null;
      return { status: 'REJECTED', reason };
    }

    this.positions.set(positionId, { ...position, stopLoss, takeProfit });
    this.modifications.push({ positionId, stopLoss, takeProfit });
    return { status: 'MODIFIED' };
  }

  async closePosition(positionId: number): Promise<CloseResult> {
    this.assertConnected('closePosition');
    this.calls.closePosition += 1;

    const profit = this.removePosition(positionId);
    if (profit === null) {
      return { status: 'NOT_FOUND' };
    }

    return { status: 'CLOSED', profit };
  }

  private markProfit(position: PaperPosition, exitPrice?: number): number {
    const quote = this.quotes.get(position.symbol);
    if (!quote) {
      return 0;
    }

    const exit = exitPrice ?? (position.direction === 'Long' ? quote.bid : quote.ask);
    const move = position.direction === 'Long' ? exit - position.entryPrice : position.entryPrice - exit;
    return round2(move * position.volume * quote.contractSize);
  }

  private triggerStops(quote: Quote): void {
    for (const position of [...this.positions.values()]) {
      if (position.symbol !== quote.symbol) {
        continue;
      }

      const exit = stopExit(position, quote);
      if (exit === null) {
        continue;
      }

      this.balance += this.markProfit(position, exit);
      this.positions.delete(position.id);
    }
  }

  private assertConnected(operation: string): void {
    if (!this.connected) {
      throw new ConnectivityError(operation, 'paper venue offline');
    }
  }
}

function stopExit(position: PaperPosition, quote: Quote): number | null {
  if (position.direction === 'Long') {
    if (position.stopLoss > 0 && quote.bid <= position.stopLoss) {
      return position.stopLoss;
    }

    return position.takeProfit > 0 && quote.bid >= position.takeProfit ? position.takeProfit : null;
  }

  if (position.stopLoss > 0 && quote.ask >= position.stopLoss) {
    return position.stopLoss;
  }

  return position.takeProfit > 0 && quote.ask <= position.takeProfit ? position.takeProfit : null;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
