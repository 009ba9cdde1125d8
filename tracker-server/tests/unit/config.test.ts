import { describe, it, expect } from 'vitest';
import { getRiskConfig, getStoreConfig, isPaperTrading } from '../../src/utils/config.js';

describe('getRiskConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(getRiskConfig({})).toEqual({
      riskFreeRate: 0.04,
      defaultVolatility: 0.3,
      correlationDiscount: 0.2,
      discountMode: 'flat',
      diversificationSectorTarget: 10,
      tiers: {
        extreme: { minAssignmentProbability: 0.7, minMaxLoss: 50000 },
        high: { minAssignmentProbability: 0.5, minMaxLoss: 25000 },
        medium: { minAssignmentProbability: 0.25, minMaxLoss: 10000 },
      },
    });
  });

  it('reads overrides', () => {
    const config = getRiskConfig({
      RISK_FREE_RATE: '0.05',
      CORRELATION_DISCOUNT: '0.1',
      PORTFOLIO_DISCOUNT_MODE: 'Diversification',
      RISK_HIGH_MAX_LOSS: '15000',
    });

    expect(config.riskFreeRate).toBe(0.05);
    expect(config.correlationDiscount).toBe(0.1);
    expect(config.discountMode).toBe('diversification');
    expect(config.tiers.high.minMaxLoss).toBe(15000);
  });

  it('falls back on unparsable numbers', () => {
    expect(getRiskConfig({ DEFAULT_VOLATILITY: 'high' }).defaultVolatility).toBe(0.3);
  });

  it('treats unknown discount modes as flat', () => {
    expect(getRiskConfig({ PORTFOLIO_DISCOUNT_MODE: 'weighted' }).discountMode).toBe('flat');
  });
});

describe('getStoreConfig', () => {
  it('reads the positions file path', () => {
    expect(getStoreConfig({ POSITIONS_FILE: '/tmp/positions.json' }).positionsFile).toBe('/tmp/positions.json');
    expect(getStoreConfig({}).positionsFile).toBeUndefined();
  });
});

describe('isPaperTrading', () => {
  it('defaults to paper', () => {
    expect(isPaperTrading({})).toBe(true);
    expect(isPaperTrading({ PAPER_TRADING: 'FALSE' })).toBe(false);
  });
});
