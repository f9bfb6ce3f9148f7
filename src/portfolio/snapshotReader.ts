import type { Direction, Position } from '../domain/models.js';
import type { Broker } from '../execution/broker.js';

export type SnapshotReaderOptions = {
  broker: Broker;
  symbol: string;
  tag: number;
};

/** Reads the venue's open positions that belong to this engine. Holds no state. */
export class PositionSnapshotReader {
  private readonly broker: Broker;
  readonly symbol: string;
  readonly tag: number;

  constructor(options: SnapshotReaderOptions) {
    this.broker = options.broker;
    this.symbol = options.symbol;
    this.tag = options.tag;
  }

  async getOpenPositions(): Promise<Position[]> {
    const positions = await this.broker.getOpenPositions({ symbol: this.symbol, tag: this.tag });
    return positions
      .filter((position) => position.tag === this.tag && position.symbol === this.symbol)
      .sort((left, right) => left.id - right.id);
  }
}

export function countByDirection(positions: readonly Position[], direction: Direction): number {
  return positions.filter((position) => position.direction === direction).length;
}
