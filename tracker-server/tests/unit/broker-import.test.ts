import { describe, it, expect, beforeEach } from 'vitest';
import { importBrokerPositions, mapBrokerPositions } from '../../src/broker/import.js';
import { brokerPositionsSchema } from '../../src/broker/schemas.js';
import { PositionStore } from '../../src/positions/store.js';
import { STRATEGY_HANDLERS } from '../../src/risk/strategies.js';
import type { BrokerClient } from '../../src/utils/broker-client.js';

const NOW = new Date('2026-10-19T14:00:00.000Z');

const PAYLOAD = [
  { symbol: 'AAPL', qty: '100', avg_entry_price: '170.50', asset_class: 'us_equity', side: 'long' },
  { symbol: 'AAPL261120C00180000', qty: '-1', avg_entry_price: '3.25', asset_class: 'us_option', side: 'short' },
  { symbol: 'MSFT261218P00400000', qty: '-2', avg_entry_price: '5.10', asset_class: 'us_option', side: 'short' },
  { symbol: 'TSLA261120C00250000', qty: '1', avg_entry_price: '4.00', asset_class: 'us_option', side: 'long' },
];

function fakeClient(positions: unknown): BrokerClient {
  return {
    getAccount: async () => ({}),
    getPositions: async () => positions,
    getLatestTrade: async () => ({ Price: 0 }),
  };
}

describe('mapBrokerPositions', () => {
  it('maps short calls and puts and skips long options', () => {
    const { imported, skipped } = mapBrokerPositions(brokerPositionsSchema.parse(PAYLOAD), NOW);

    expect(skipped).toEqual(['TSLA261120C00250000']);
    expect(imported).toHaveLength(2);

    const [call, put] = imported;
    expect(call).toMatchObject({
      id: 'broker_AAPL261120C00180000',
      symbol: 'AAPL',
      strategy: 'covered_call',
      quantity: 1,
      entry_price: 17050,
      strike_price: 180,
      premium_received: 325,
      entry_date: NOW,
      expiration_date: new Date('2026-11-20T00:00:00.000Z'),
      is_open: true,
      status: 'open',
      notes: 'Imported from broker on 2026-10-19',
    });
    expect(put.strategy).toBe('cash_secured_put');
    expect(put.quantity).toBe(2);
    expect(put.entry_price).toBe(40000);
    expect(put.strike_price).toBe(400);
    expect(put.premium_received).toBeCloseTo(1020, 9);
  });

  it('gives imported positions a positive max loss', () => {
    const { imported } = mapBrokerPositions(brokerPositionsSchema.parse(PAYLOAD), NOW);
    const [call, put] = imported;

    expect(STRATEGY_HANDLERS.covered_call.maxLoss(call)).toBe(16725);
    expect(STRATEGY_HANDLERS.cash_secured_put.maxLoss(put)).toBeCloseTo(78980, 9);
  });

  it('skips short calls without enough stock to cover them', () => {
    const payload = brokerPositionsSchema.parse([
      { symbol: 'AAPL', qty: '150', avg_entry_price: '170.50', asset_class: 'us_equity' },
      { symbol: 'AAPL261120C00180000', qty: '-1', avg_entry_price: '3.25', asset_class: 'us_option' },
      { symbol: 'AAPL261120C00190000', qty: '-1', avg_entry_price: '1.10', asset_class: 'us_option' },
      { symbol: 'NVDA261120C00200000', qty: '-1', avg_entry_price: '6.00', asset_class: 'us_option' },
    ]);

    const { imported, skipped } = mapBrokerPositions(payload, NOW);

    expect(imported.map((p) => p.id)).toEqual(['broker_AAPL261120C00180000']);
    expect(skipped).toEqual(['AAPL261120C00190000', 'NVDA261120C00200000']);
  });

  it('keeps entry no later than expiration for expired contracts', () => {
    const payload = brokerPositionsSchema.parse([
      { symbol: 'AAPL260918P00180000', qty: '-1', avg_entry_price: '1.00', asset_class: 'us_option' },
    ]);

    const [position] = mapBrokerPositions(payload, NOW).imported;

    expect(position.entry_date).toEqual(new Date('2026-09-18T00:00:00.000Z'));
  });
});

describe('importBrokerPositions', () => {
  let store: PositionStore;

  beforeEach(() => {
    store = new PositionStore();
  });

  it('upserts imported positions into the store', async () => {
    const result = await importBrokerPositions(fakeClient(PAYLOAD), store, NOW);

    expect(result.imported.map((p) => p.id)).toEqual([
      'broker_AAPL261120C00180000',
      'broker_MSFT261218P00400000',
    ]);
    expect(await store.listOpen()).toHaveLength(2);
  });

  it('keeps sector and notes across re-imports', async () => {
    await importBrokerPositions(fakeClient(PAYLOAD), store, NOW);
    await store.update('broker_AAPL261120C00180000', { sector: 'Tech', notes: 'rolled' });

    await importBrokerPositions(fakeClient(PAYLOAD), store, new Date('2026-10-20T14:00:00.000Z'));

    const position = await store.get('broker_AAPL261120C00180000');
    expect(position.sector).toBe('Tech');
    expect(position.notes).toBe('rolled');
    expect(position.entry_date).toEqual(NOW);
  });

  it('rejects a malformed broker payload', async () => {
    await expect(
      importBrokerPositions(fakeClient([{ symbol: 'AAPL', qty: 'lots' }]), store, NOW)
    ).rejects.toThrow();
  });
});
