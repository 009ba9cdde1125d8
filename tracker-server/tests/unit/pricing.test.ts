import { describe, it, expect } from 'vitest';
import { BlackScholesModel, normalCDF, type OptionInput } from '../../src/risk/pricing.js';

const model = new BlackScholesModel();

function atTheMoney(overrides: Partial<OptionInput> = {}): OptionInput {
  return {
    optionType: 'call',
    spot: 100,
    strike: 100,
    timeToExpiration: 1,
    volatility: 0.2,
    riskFreeRate: 0,
    ...overrides,
  };
}

describe('normalCDF', () => {
  it('is one half at zero', () => {
    expect(normalCDF(0)).toBeCloseTo(0.5, 6);
  });

  it('matches known quantiles', () => {
    expect(normalCDF(1.96)).toBeCloseTo(0.975, 3);
    expect(normalCDF(-1.96)).toBeCloseTo(0.025, 3);
  });

  it('is symmetric', () => {
    expect(normalCDF(0.7) + normalCDF(-0.7)).toBeCloseTo(1, 10);
  });
});

describe('BlackScholesModel.greeks', () => {
  it('prices an at-the-money call', () => {
    const greeks = model.greeks(atTheMoney());

    expect(greeks.delta).toBeCloseTo(0.539828, 5);
    expect(greeks.gamma).toBeCloseTo(0.0198476, 6);
    expect(greeks.theta).toBeCloseTo(-0.0108754, 6);
    expect(greeks.vega).toBeCloseTo(0.396953, 5);
  });

  it('gives a put the call delta minus one', () => {
    const greeks = model.greeks(atTheMoney({ optionType: 'put' }));

    expect(greeks.delta).toBeCloseTo(-0.460172, 5);
    expect(greeks.gamma).toBeCloseTo(0.0198476, 6);
    expect(greeks.vega).toBeCloseTo(0.396953, 5);
  });

  it('keeps delta within [-1, 1] and gamma, vega non-negative', () => {
    for (const spot of [50, 90, 100, 110, 200]) {
      for (const optionType of ['call', 'put'] as const) {
        const greeks = model.greeks(atTheMoney({ spot, optionType, riskFreeRate: 0.04 }));
        expect(greeks.delta).toBeGreaterThanOrEqual(-1);
        expect(greeks.delta).toBeLessThanOrEqual(1);
        expect(greeks.gamma).toBeGreaterThanOrEqual(0);
        expect(greeks.vega).toBeGreaterThanOrEqual(0);
      }
    }
  });

  it('returns intrinsic delta once expired', () => {
    expect(model.greeks(atTheMoney({ spot: 110, timeToExpiration: 0 }))).toEqual({
      delta: 1,
      gamma: 0,
      theta: 0,
      vega: 0,
    });
    expect(model.greeks(atTheMoney({ spot: 110, timeToExpiration: 0, optionType: 'put' })).delta).toBe(0);
    expect(model.greeks(atTheMoney({ spot: 90, timeToExpiration: 0, optionType: 'put' })).delta).toBe(-1);
  });
});

describe('BlackScholesModel probabilities', () => {
  it('splits at the spot by the volatility drag', () => {
    const input = atTheMoney();

    expect(model.probabilityAbove(input, 100)).toBeCloseTo(0.460172, 5);
    expect(model.probabilityBelow(input, 100)).toBeCloseTo(0.539828, 5);
  });

  it('treats non-positive levels as always exceeded', () => {
    expect(model.probabilityAbove(atTheMoney(), 0)).toBe(1);
    expect(model.probabilityBelow(atTheMoney(), -5)).toBe(0);
  });

  it('is deterministic for an expired option', () => {
    const expired = atTheMoney({ spot: 105, timeToExpiration: 0 });

    expect(model.probabilityAbove(expired, 100)).toBe(1);
    expect(model.probabilityBelow(expired, 100)).toBe(0);
  });
});
