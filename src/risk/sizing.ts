import { decimalsOf, type Quote } from '../domain/models.js';

export type SymbolConstraints = Pick<Quote, 'point' | 'contractSize' | 'volumeMin' | 'volumeMax' | 'volumeStep'>;

export type SizingResult =
  | { status: 'OK'; volume: number; rawVolume: number; riskAmount: number; pointsAtRisk: number }
  | { status: 'ZERO_STOP_DISTANCE' };

export type SizingInput = {
  equity: number;
  entryPrice: number;
  stopPrice: number;
  maxRiskFraction: number;
  symbol: SymbolConstraints;
};

const STEP_EPSILON = 1e-9;

export function computeRawVolume(riskAmount: number, pointsAtRisk: number, valuePerPoint: number): number {
  return riskAmount / (pointsAtRisk * valuePerPoint);
}

/** Rounds down onto the step grid; never rounds up past the risk cap. */
export function normalizeVolume(volume: number, step: number): number {
  const safeStep = Math.max(step, 1e-12);
  const units = Math.floor(volume / safeStep + STEP_EPSILON);
  return Number((units * safeStep).toFixed(decimalsOf(safeStep)));
}

export function clampVolume(volume: number, min: number, max: number): number {
  return Math.max(min, Math.min(volume, max));
}

export function sizePosition(input: SizingInput): SizingResult {
  const { symbol } = input;
  const riskAmount = input.equity * input.maxRiskFraction;
  const pointsAtRisk = Math.abs(input.entryPrice - input.stopPrice) / symbol.point;

  if (pointsAtRisk <= 0 || !Number.isFinite(pointsAtRisk)) {
    return { status: 'ZERO_STOP_DISTANCE' };
  }

  const valuePerPoint = symbol.contractSize * symbol.point;
  const rawVolume = computeRawVolume(riskAmount, pointsAtRisk, valuePerPoint);
  const stepped = normalizeVolume(rawVolume, symbol.volumeStep);

  return {
    status: 'OK',
    volume: clampVolume(stepped, symbol.volumeMin, symbol.volumeMax),
    rawVolume,
    riskAmount,
    pointsAtRisk
  };
}
