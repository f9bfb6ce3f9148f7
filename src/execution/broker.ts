import type { AccountState, OrderRequest, Position, Quote } from '../domain/models.js';

export type PositionQuery = {
  symbol: string;
  tag: number;
};

export type SubmitResult =
  | { status: 'FILLED'; positionId: number; price: number; volume: number }
  | { status: 'REJECTED'; reason: string };

export type ModifyResult =
  | { status: 'MODIFIED' }
  | { status: 'REJECTED'; reason: string }
  | { status: 'NOT_FOUND' };

export type CloseResult =
  | { status: 'CLOSED'; profit: number }
  | { status: 'REJECTED'; reason: string }
  | { status: 'NOT_FOUND' };

/**
 * Venue capability. Transport failures throw `ConnectivityError`; venue
 * refusals come back as `REJECTED` / `NOT_FOUND` results.
 */
export interface Broker {
  getOpenPositions(query: PositionQuery): Promise<Position[]>;
  getQuote(symbol: string): Promise<Quote>;
  getAccountState(): Promise<AccountState>;
  submitOrder(request: OrderRequest): Promise<SubmitResult>;
  modifyStop(positionId: number, stopLoss: number, takeProfit: number): Promise<ModifyResult>;
  closePosition(positionId: number): Promise<CloseResult>;
}
