import { describe, expect, it, vi } from 'vitest';
import { StateAggregator } from './aggregator';
import { DataIntegrityError, VenueError } from './errors';
import { PaperVenue } from './exchanges/paper';
import type { InstrumentSnapshot } from './types';

function instruments(...entries: [string, number][]): ReadonlyMap<string, InstrumentSnapshot> {
  return new Map(
    entries.map(([instrument, price]): [string, InstrumentSnapshot] => [
      instrument,
      { instrument, ts: 1, price, indicators: {}, status: { state: 'ok' } },
    ]),
  );
}

async function venueWithProtectedLong(): Promise<PaperVenue> {
  const venue = new PaperVenue({ startingBalance: 5000 });
  venue.setMarket('BTCUSDT', { price: 50000 });
  await venue.setLeverage('BTCUSDT', 2);
  await venue.placeOrder({ instrument: 'BTCUSDT', side: 'buy', type: 'market', quantity: 0.02, reduceOnly: false, clientOrderId: 'e' });
  await venue.placeOrder({
    instrument: 'BTCUSDT',
    side: 'sell',
    type: 'stop_market',
    quantity: 0.02,
    stopPrice: 45000,
    reduceOnly: true,
    clientOrderId: 'sl',
  });
  await venue.placeOrder({
    instrument: 'BTCUSDT',
    side: 'sell',
    type: 'take_profit_market',
    quantity: 0.02,
    stopPrice: 60000,
    reduceOnly: true,
    clientOrderId: 'tp',
  });
  return venue;
}

describe('StateAggregator', () => {
  it('merges account, positions and protective orders into one snapshot', async () => {
    const venue = await venueWithProtectedLong();
    const snapshot = await new StateAggregator(venue, { timeoutMs: 100, now: () => 42 }).aggregate(
      instruments(['BTCUSDT', 50000], ['ETHUSDT', 2500]),
    );
    expect(snapshot.ts).toBe(42);
    expect(snapshot.instruments.map((i) => i.instrument)).toEqual(['BTCUSDT', 'ETHUSDT']);
    expect(snapshot.account).toEqual({
      balance: 5000,
      availableBalance: 4500,
      marginUsed: 500,
      unrealizedPnl: 0,
      dailyRealizedPnl: 0,
      dailyTradeCount: 0,
      wins: 0,
      losses: 0,
    });
    expect(snapshot.positions).toHaveLength(1);
    expect(snapshot.positions[0]).toMatchObject({
      instrument: 'BTCUSDT',
      side: 'long',
      quantity: 0.02,
      stopLossOrderIds: ['2'],
      takeProfitOrderIds: ['3'],
    });
    expect(snapshot.orders).toHaveLength(2);
  });

  it('carries positions outside the configured instruments through unchanged', async () => {
    const venue = await venueWithProtectedLong();
    const snapshot = await new StateAggregator(venue, { timeoutMs: 100 }).aggregate(instruments(['ETHUSDT', 2500]));
    expect(snapshot.positions.map((p) => p.instrument)).toEqual(['BTCUSDT']);
  });

  it('returns a deeply frozen snapshot', async () => {
    const venue = await venueWithProtectedLong();
    const snapshot = await new StateAggregator(venue, { timeoutMs: 100 }).aggregate(instruments(['BTCUSDT', 50000]));
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.account)).toBe(true);
    expect(Object.isFrozen(snapshot.positions[0].stopLossOrderIds)).toBe(true);
  });

  it('fails with a data-integrity error when any venue read fails', async () => {
    const venue = new PaperVenue();
    vi.spyOn(venue, 'getPositions').mockRejectedValue(new VenueError('down', 'transient'));
    const aggregator = new StateAggregator(venue, { timeoutMs: 100 });
    await expect(aggregator.aggregate(instruments())).rejects.toBeInstanceOf(DataIntegrityError);
    await expect(aggregator.aggregate(instruments())).rejects.toThrow('venue state unavailable: transient: down');
  });

  it('fails when the venue is too slow', async () => {
    const venue = new PaperVenue();
    vi.spyOn(venue, 'getOpenOrders').mockImplementation(() => new Promise<never>(() => undefined));
    await expect(new StateAggregator(venue, { timeoutMs: 10 }).fetchVenueState()).rejects.toThrow(
      'venue state unavailable: timeout: venue state timed out after 10ms',
    );
  });

  it('rejects non-finite balances', () => {
    const aggregator = new StateAggregator(new PaperVenue(), { timeoutMs: 100 });
    expect(() =>
      aggregator.merge(instruments(), {
        balance: { balance: NaN, availableBalance: 0, marginUsed: 0, unrealizedPnl: 0 },
        performance: { realizedPnl: 0, tradeCount: 0, wins: 0, losses: 0 },
        positions: [],
        orders: [],
      }),
    ).toThrow(DataIntegrityError);
  });

  it('rejects duplicate positions for one instrument', () => {
    const aggregator = new StateAggregator(new PaperVenue(), { timeoutMs: 100 });
    const position = {
      instrument: 'BTCUSDT',
      side: 'long' as const,
      quantity: 1,
      entryPrice: 1,
      markPrice: 1,
      leverage: 1,
      unrealizedPnl: 0,
      stopLossOrderIds: [],
      takeProfitOrderIds: [],
    };
    expect(() =>
      aggregator.merge(instruments(), {
        balance: { balance: 1, availableBalance: 1, marginUsed: 0, unrealizedPnl: 0 },
        performance: { realizedPnl: 0, tradeCount: 0, wins: 0, losses: 0 },
        positions: [position, position],
        orders: [],
      }),
    ).toThrow('duplicate position for BTCUSDT');
  });
});
