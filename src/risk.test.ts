import { describe, expect, it } from 'vitest';
import { evaluate, impliedLossUsd, isActionable } from './risk';
import type { Decision, DecisionItem, MarketSnapshot, PositionRecord, RiskConfig } from './types';
import { deepFreeze } from './util/async';

const risk: RiskConfig = {
  maxPositionSizeUsd: 1000,
  maxLeverage: 5,
  riskPerTradePct: 2,
  maxOpenPositions: 3,
  minConfidence: 0.7,
  minOrderUsd: 10,
};

function position(instrument: string): PositionRecord {
  return {
    instrument,
    side: 'long',
    quantity: 1,
    entryPrice: 100,
    markPrice: 100,
    leverage: 2,
    unrealizedPnl: 0,
    stopLossOrderIds: ['1'],
    takeProfitOrderIds: ['2'],
  };
}

function snapshot(opts: { balance?: number; positions?: PositionRecord[] } = {}): MarketSnapshot {
  const prices: Record<string, number> = { BTCUSDT: 50000, ETHUSDT: 2500, SOLUSDT: 150, XRPUSDT: 0.5 };
  return deepFreeze<MarketSnapshot>({
    ts: 1,
    instruments: [
      ...Object.entries(prices).map(([instrument, price]) => ({
        instrument,
        ts: 1,
        price,
        indicators: {},
        status: { state: 'ok' as const },
      })),
      { instrument: 'DOGEUSDT', ts: 1, price: null, indicators: {}, status: { state: 'failed' as const, reason: 'timeout' } },
    ],
    account: {
      balance: opts.balance ?? 10000,
      availableBalance: opts.balance ?? 10000,
      marginUsed: 0,
      unrealizedPnl: 0,
      dailyRealizedPnl: 0,
      dailyTradeCount: 0,
      wins: 0,
      losses: 0,
    },
    positions: opts.positions ?? [],
    orders: [],
  });
}

function long(overrides: Partial<DecisionItem> = {}): DecisionItem {
  return {
    instrument: 'BTCUSDT',
    action: 'open_long',
    sizeUsd: 500,
    leverage: 3,
    stopLoss: 45000,
    takeProfit: 60000,
    confidence: 0.8,
    rationale: 'trend',
    ...overrides,
  };
}

function decide(...items: DecisionItem[]): Decision {
  return { items, rationale: 'test', strategyNote: null };
}

describe('evaluate', () => {
  it('rejects items below the confidence threshold', () => {
    const [v] = evaluate(decide(long({ confidence: 0.6 })), snapshot(), risk);
    expect(v).toEqual({ itemIndex: 0, instrument: 'BTCUSDT', action: 'open_long', verdict: 'rejected', reason: 'low_confidence' });
  });

  it('clamps an oversized position to the configured maximum', () => {
    const [v] = evaluate(decide(long({ sizeUsd: 5000 })), snapshot(), risk);
    expect(v.verdict).toBe('clamped');
    if (v.verdict !== 'clamped') return;
    expect(v.adjusted).toEqual({ sizeUsd: 1000 });
    expect(v.effective.sizeUsd).toBe(1000);
    expect(v.effective.leverage).toBe(3);
  });

  it('clamps leverage without rejecting', () => {
    const [v] = evaluate(decide(long({ leverage: 20 })), snapshot(), risk);
    expect(v).toMatchObject({ verdict: 'clamped', adjusted: { leverage: 5 }, effective: { leverage: 5, sizeUsd: 500 } });
  });

  it('approves an item inside every limit unchanged', () => {
    const item = long();
    const [v] = evaluate(decide(item), snapshot(), risk);
    expect(v).toEqual({ itemIndex: 0, instrument: 'BTCUSDT', action: 'open_long', verdict: 'approved', effective: item });
  });

  it('accepts a short with the stop above and the target below the price', () => {
    const [v] = evaluate(
      decide(long({ instrument: 'ETHUSDT', action: 'open_short', stopLoss: 2600, takeProfit: 2300 })),
      snapshot(),
      risk,
    );
    expect(v.verdict).toBe('approved');
  });

  it('rejects opens without a stop-loss or take-profit', () => {
    const verdicts = evaluate(decide(long({ stopLoss: null }), long({ instrument: 'ETHUSDT', takeProfit: null })), snapshot(), risk);
    expect(verdicts.map((v) => (v.verdict === 'rejected' ? v.reason : v.verdict))).toEqual([
      'missing_protection',
      'missing_protection',
    ]);
  });

  it('rejects protection on the wrong side of the price', () => {
    const [v] = evaluate(decide(long({ stopLoss: 51000 })), snapshot(), risk);
    expect(v).toMatchObject({ verdict: 'rejected', reason: 'invalid_protection' });
  });

  it('rejects instruments that are failed or absent from the snapshot', () => {
    const verdicts = evaluate(
      decide(long({ instrument: 'DOGEUSDT', stopLoss: 0.1, takeProfit: 0.2 }), long({ instrument: 'ADAUSDT' })),
      snapshot(),
      risk,
    );
    expect(verdicts.map((v) => v.verdict === 'rejected' && v.reason)).toEqual([
      'instrument_unavailable',
      'instrument_unavailable',
    ]);
  });

  it('rejects a second actionable item for the same instrument', () => {
    const verdicts = evaluate(decide(long(), long({ sizeUsd: 300 })), snapshot(), risk);
    expect(verdicts[0].verdict).toBe('approved');
    expect(verdicts[1]).toMatchObject({ itemIndex: 1, verdict: 'rejected', reason: 'duplicate_instrument' });
  });

  it('rejects opening an instrument that already has a position', () => {
    const [v] = evaluate(decide(long()), snapshot({ positions: [position('BTCUSDT')] }), risk);
    expect(v).toMatchObject({ verdict: 'rejected', reason: 'position_exists' });
  });

  it('counts opens approved earlier in the decision toward the position limit', () => {
    const verdicts = evaluate(
      decide(
        long({ instrument: 'ETHUSDT', stopLoss: 2400, takeProfit: 2700 }),
        long({ instrument: 'SOLUSDT', stopLoss: 140, takeProfit: 170 }),
      ),
      snapshot({ positions: [position('XRPUSDT'), position('BNBUSDT')] }),
      risk,
    );
    expect(verdicts[0].verdict).toBe('approved');
    expect(verdicts[1]).toMatchObject({ verdict: 'rejected', reason: 'max_open_positions' });
  });

  it('never approves more opens than the position limit allows', () => {
    const instruments = ['BTCUSDT', 'ETHUSDT', 'SOLUSDT', 'XRPUSDT'];
    const prices: Record<string, number> = { BTCUSDT: 50000, ETHUSDT: 2500, SOLUSDT: 150, XRPUSDT: 0.5 };
    for (let held = 0; held <= 3; held++) {
      const positions = ['AAAUSDT', 'BBBUSDT', 'CCCUSDT'].slice(0, held).map(position);
      const items = instruments.map((instrument) =>
        long({ instrument, stopLoss: prices[instrument] * 0.95, takeProfit: prices[instrument] * 1.1 }),
      );
      const approved = evaluate(decide(...items), snapshot({ positions }), risk).filter(isActionable).length;
      expect(approved + held).toBeLessThanOrEqual(risk.maxOpenPositions);
      expect(approved).toBe(risk.maxOpenPositions - held);
    }
  });

  it('rejects sizes below the minimum order', () => {
    const [v] = evaluate(decide(long({ sizeUsd: 5 })), snapshot(), risk);
    expect(v).toMatchObject({ verdict: 'rejected', reason: 'below_min_order' });
  });

  it('rejects a trade whose stop would lose more than the per-trade budget', () => {
    // 1000 * 15000 / 50000 = 300 > 2% of 10000
    const [v] = evaluate(decide(long({ sizeUsd: 1000, stopLoss: 35000 })), snapshot(), risk);
    expect(v).toMatchObject({ verdict: 'rejected', reason: 'risk_per_trade_exceeded' });
  });

  it('checks the per-trade budget against the clamped size', () => {
    // clamped to 1000: 1000 * 9000 / 50000 = 180 <= 200
    const [v] = evaluate(decide(long({ sizeUsd: 5000, stopLoss: 41000 })), snapshot(), risk);
    expect(v.verdict).toBe('clamped');
  });

  it('approves a close only for an existing position', () => {
    const close = long({ action: 'close', stopLoss: null, takeProfit: null });
    expect(evaluate(decide(close), snapshot(), risk)[0]).toMatchObject({ verdict: 'rejected', reason: 'no_position' });
    expect(evaluate(decide(close), snapshot({ positions: [position('BTCUSDT')] }), risk)[0]).toMatchObject({
      verdict: 'approved',
    });
  });

  it('approves holds without making them actionable', () => {
    const [v] = evaluate(decide(long({ action: 'hold', confidence: 0 })), snapshot(), risk);
    expect(v.verdict).toBe('approved');
    expect(isActionable(v)).toBe(false);
  });

  it('leaves the decision untouched', () => {
    const decision = deepFreeze(decide(long({ sizeUsd: 5000, leverage: 20 })));
    const [v] = evaluate(decision, snapshot(), risk);
    expect(v.verdict).toBe('clamped');
    expect(decision.items[0].sizeUsd).toBe(5000);
    expect(decision.items[0].leverage).toBe(20);
  });
});

describe('impliedLossUsd', () => {
  it('scales the notional by the stop distance', () => {
    expect(impliedLossUsd(1000, 50000, 45000)).toBe(100);
  });
});
