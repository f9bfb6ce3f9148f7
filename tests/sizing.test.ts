import { clampVolume, computeRawVolume, normalizeVolume, sizePosition, type SymbolConstraints } from '../src/risk/sizing.js';

const indexLike: SymbolConstraints = {
  point: 1,
  contractSize: 1,
  volumeMin: 0.01,
  volumeMax: 2,
  volumeStep: 0.01
};

const eurusd: SymbolConstraints = {
  point: 0.00001,
  contractSize: 100000,
  volumeMin: 0.01,
  volumeMax: 100,
  volumeStep: 0.01
};

describe('position sizing', () => {
  it('sizes from the risk budget and clamps to the venue maximum', () => {
    const result = sizePosition({ equity: 10_000, entryPrice: 1100, stopPrice: 1050, maxRiskFraction: 0.02, symbol: indexLike });

    expect(result).toEqual({ status: 'OK', volume: 2, rawVolume: 4, riskAmount: 200, pointsAtRisk: 50 });
  });

  it('never produces an order for a zero stop distance', () => {
    const result = sizePosition({ equity: 10_000, entryPrice: 1100, stopPrice: 1100, maxRiskFraction: 0.02, symbol: indexLike });

    expect(result).toEqual({ status: 'ZERO_STOP_DISTANCE' });
  });

  it('rounds down onto the volume step', () => {
    const result = sizePosition({ equity: 10_000, entryPrice: 1.1, stopPrice: 1.0965, maxRiskFraction: 0.02, symbol: eurusd });

    expect(result.status === 'OK' && result.volume).toBe(0.57);
  });

  it('clamps a tiny size up to the venue minimum', () => {
    const result = sizePosition({ equity: 10, entryPrice: 1100, stopPrice: 1050, maxRiskFraction: 0.02, symbol: indexLike });

    expect(result.status === 'OK' && result.volume).toBe(0.01);
  });

  it('computes raw volume from points and point value', () => {
    expect(computeRawVolume(200, 50, 1)).toBe(4);
  });

  it('normalizes without drifting across float boundaries', () => {
    expect(normalizeVolume(0.0299999, 0.01)).toBe(0.02);
    expect(normalizeVolume(0.07, 0.01)).toBe(0.07);
    expect(normalizeVolume(0.29, 0.01)).toBe(0.29);
    expect(normalizeVolume(1.26, 0.5)).toBe(1);
  });

  it('clamps into bounds', () => {
    expect(clampVolume(5, 0.01, 2)).toBe(2);
    expect(clampVolume(0, 0.01, 2)).toBe(0.01);
    expect(clampVolume(1, 0.01, 2)).toBe(1);
  });
});
