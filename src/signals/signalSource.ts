import type { Signal } from '../domain/models.js';

/** Anything that can hand the engine directional signals between ticks. */
export interface SignalSource {
  poll(): Promise<Signal[]>;
}

const COMMANDS = new Map<string, Signal>([
  ['b', 'BUY'],
  ['buy', 'BUY'],
  ['s', 'SELL'],
  ['sell', 'SELL'],
  ['c', 'CLOSE'],
  ['close', 'CLOSE'],
  ['h', 'HOLD'],
  ['hold', 'HOLD']
]);

/** Maps a chat command such as `b`, `s` or `c` to a signal; null when unknown. */
export function parseCommand(text: string): Signal | null {
  const key = text.trim().toLowerCase().replace(/^\//, '');
  return COMMANDS.get(key) ?? null;
}

/** FIFO of manually issued signals, drained on each poll. */
export class QueuedSignalSource implements SignalSource {
  private readonly pending: Signal[] = [];

  push(signal: Signal): void {
    this.pending.push(signal);
  }

  pushCommand(text: string): Signal | null {
    const signal = parseCommand(text);
    if (signal) {
      this.push(signal);
    }

    return signal;
  }

  get size(): number {
    return this.pending.length;
  }

  async poll(): Promise<Signal[]> {
    return this.pending.splice(0, this.pending.length);
  }
}
