import { describe, it, expect } from 'vitest';
import { STRATEGY_HANDLERS, strategyHandler } from '../../src/risk/strategies.js';
import { UnrecognizedStrategyError } from '../../src/utils/errors.js';
import { makePosition } from '../helpers/positions.js';

describe('strategy handlers', () => {
  it('covered call: profit is the premium, loss is cost basis less premium', () => {
    const position = makePosition({
      strategy: 'covered_call',
      entry_price: 100,
      quantity: 10,
      premium_received: 200,
    });
    const handler = STRATEGY_HANDLERS.covered_call;

    expect(handler.optionType).toBe('call');
    expect(handler.maxProfit(position)).toBe(200);
    expect(handler.maxLoss(position)).toBe(800);
  });

  it('cash-secured put: loss is the cash securing assignment less premium', () => {
    const position = makePosition({
      strategy: 'cash_secured_put',
      strike_price: 50,
      quantity: 2,
      premium_received: 300,
    });
    const handler = STRATEGY_HANDLERS.cash_secured_put;

    expect(handler.optionType).toBe('put');
    expect(handler.maxProfit(position)).toBe(300);
    expect(handler.maxLoss(position)).toBe(9700);
  });

  it('looks up handlers by strategy value', () => {
    expect(strategyHandler('covered_call')).toBe(STRATEGY_HANDLERS.covered_call);
    expect(strategyHandler('cash_secured_put')).toBe(STRATEGY_HANDLERS.cash_secured_put);
  });

  it('rejects an unrecognized strategy instead of returning zero', () => {
    expect(() => strategyHandler('iron_condor')).toThrow(UnrecognizedStrategyError);
    expect(() => strategyHandler('iron_condor')).toThrow('Unrecognized strategy: iron_condor');
  });
});
