import { ValidationError } from '../domain/errors.js';

import type { SymbolConstraints } from './sizing.js';

export type OrderValidation =
  | { valid: true; warnings: string[] }
  | { valid: false; error: ValidationError };

const STEP_TOLERANCE = 1e-4;

export function validateOrderParams(
  symbol: SymbolConstraints,
  volume: number,
  stopLoss: number,
  takeProfit: number
): OrderValidation {
  if (volume < symbol.volumeMin) {
    return { valid: false, error: new ValidationError('volume', `volume too small (min: ${symbol.volumeMin})`) };
  }

  if (volume > symbol.volumeMax) {
    return { valid: false, error: new ValidationError('volume', `volume too large (max: ${symbol.volumeMax})`) };
  }

  const stepsFromMin = (volume - symbol.volumeMin) / symbol.volumeStep;
  const offGrid = Math.abs(stepsFromMin - Math.round(stepsFromMin)) * symbol.volumeStep;
  if (offGrid > STEP_TOLERANCE) {
    return { valid: false, error: new ValidationError('volume', `invalid volume step (step: ${symbol.volumeStep})`) };
  }

  if (stopLoss < 0 || takeProfit < 0) {
    return { valid: false, error: new ValidationError('stopLoss', 'stop loss and take profit must not be negative') };
  }

  const warnings: string[] = [];
  if (stopLoss === 0) {
    warnings.push('no stop loss set');
  }

  if (takeProfit === 0) {
    warnings.push('no take profit set');
  }

  return { valid: true, warnings };
}

export function riskRewardRatio(entryPrice: number, stopLoss: number, takeProfit: number): number {
  if (stopLoss === 0 || takeProfit === 0) {
    return 0;
  }

  const risk = Math.abs(entryPrice - stopLoss);
  if (risk === 0) {
    return 0;
  }

  return Math.abs(takeProfit - entryPrice) / risk;
}
