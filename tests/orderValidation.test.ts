import { ValidationError } from '../src/domain/errors.js';
import { riskRewardRatio, validateOrderParams } from '../src/risk/orderValidation.js';
import type { SymbolConstraints } from '../src/risk/sizing.js';

const eurusd: SymbolConstraints = {
  point: 0.00001,
  contractSize: 100000,
  volumeMin: 0.01,
  volumeMax: 100,
  volumeStep: 0.01
};

function errorMessage(volume: number, stopLoss = 1.09, takeProfit = 1.12): string | null {
  const result = validateOrderParams(eurusd, volume, stopLoss, takeProfit);
  return result.valid ? null : result.error.message;
}

describe('order validation', () => {
  it('rejects volumes outside the venue bounds', () => {
    expect(errorMessage(0.005)).toBe('volume too small (min: 0.01)');
    expect(errorMessage(150)).toBe('volume too large (max: 100)');
  });

  it('rejects volumes off the step grid', () => {
    expect(errorMessage(0.015)).toBe('invalid volume step (step: 0.01)');
    expect(errorMessage(0.07)).toBeNull();
  });

  it('rejects negative protection levels', () => {
    const result = validateOrderParams(eurusd, 0.1, -1, 0);

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error).toBeInstanceOf(ValidationError);
      expect(result.error.field).toBe('stopLoss');
    }
  });

  it('warns about missing stop and take profit', () => {
    expect(validateOrderParams(eurusd, 0.1, 0, 0)).toEqual({
      valid: true,
      warnings: ['no stop loss set', 'no take profit set']
    });
    expect(validateOrderParams(eurusd, 0.1, 1.09, 1.12)).toEqual({ valid: true, warnings: [] });
  });

  it('computes reward over risk', () => {
    expect(riskRewardRatio(1.1, 1.095, 1.11)).toBeCloseTo(2);
    expect(riskRewardRatio(1.1, 0, 1.11)).toBe(0);
    expect(riskRewardRatio(1.1, 1.1, 1.11)).toBe(0);
  });
});
