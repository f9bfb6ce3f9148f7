/** Broker unreachable or a call failed in transport. Aborts the rest of the tick. */
export class ConnectivityError extends Error {
  readonly operation: string;

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super(`${operation}: ${message}`, options);
    this.name = 'ConnectivityError';
    this.operation = operation;
  }
}

/** Volume, SL or TP out of bounds. The action is skipped and not retried until its input changes. */
export class ValidationError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

export class ZeroStopDistanceError extends ValidationError {
  constructor() {
    super('stopPrice', 'stop distance is zero, position size is undefined');
    this.name = 'ZeroStopDistanceError';
  }
}

/** The engine acted on a position the venue no longer holds. */
export class StateInconsistencyError extends Error {
  readonly positionId: number;

  constructor(positionId: number, message: string) {
    super(message);
    this.name = 'StateInconsistencyError';
    this.positionId = positionId;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
