import type {
  ApprovedVerdict,
  ClampedFields,
  ClampedVerdict,
  Decision,
  DecisionItem,
  ExecutableAction,
  MarketSnapshot,
  RejectReason,
  RiskConfig,
  RiskVerdict,
} from './types';

function protectionOnCorrectSide(item: DecisionItem, price: number, stopLoss: number, takeProfit: number): boolean {
  if (item.action === 'open_long') return stopLoss < price && takeProfit > price;
  return stopLoss > price && takeProfit < price;
}

/** Loss in USD if the stop is hit on a position of `sizeUsd` notional entered at `price`. */
export function impliedLossUsd(sizeUsd: number, price: number, stopLoss: number): number {
  return (sizeUsd * Math.abs(price - stopLoss)) / price;
}

/**
 * Validates every decision item against the snapshot and risk limits. Pure: the
 * decision and snapshot are never mutated, and verdicts come back in item order.
 * Opens approved earlier in the same decision count toward the position limit.
 */
export function evaluate(decision: Decision, snapshot: MarketSnapshot, cfg: RiskConfig): RiskVerdict[] {
  const markets = new Map(snapshot.instruments.map((s) => [s.instrument, s]));
  const held = new Set(snapshot.positions.map((p) => p.instrument));
  const claimed = new Set<string>();
  let openCount = snapshot.positions.length;

  return decision.items.map((item, itemIndex): RiskVerdict => {
    const base = { itemIndex, instrument: item.instrument, action: item.action };
    const reject = (reason: RejectReason): RiskVerdict => ({ ...base, verdict: 'rejected', reason });

    if (item.action === 'hold') return { ...base, verdict: 'approved', effective: { ...item } };
    if (item.confidence < cfg.minConfidence) return reject('low_confidence');

    if (item.action === 'close') {
      if (claimed.has(item.instrument)) return reject('duplicate_instrument');
      if (!held.has(item.instrument)) return reject('no_position');
      claimed.add(item.instrument);
      return { ...base, verdict: 'approved', effective: { ...item } };
    }

    const market = markets.get(item.instrument);
    if (!market || market.status.state !== 'ok' || market.price === null) return reject('instrument_unavailable');
    if (item.stopLoss === null || item.takeProfit === null) return reject('missing_protection');
    const price = market.price;
    if (!protectionOnCorrectSide(item, price, item.stopLoss, item.takeProfit)) return reject('invalid_protection');
    if (claimed.has(item.instrument)) return reject('duplicate_instrument');
    if (held.has(item.instrument)) return reject('position_exists');
    if (openCount >= cfg.maxOpenPositions) return reject('max_open_positions');

    const adjusted: ClampedFields = {};
    let sizeUsd = item.sizeUsd;
    if (sizeUsd > cfg.maxPositionSizeUsd) {
      sizeUsd = cfg.maxPositionSizeUsd;
      adjusted.sizeUsd = sizeUsd;
    }
    if (sizeUsd < cfg.minOrderUsd) return reject('below_min_order');

    let leverage = item.leverage;
    if (leverage > cfg.maxLeverage) {
      leverage = cfg.maxLeverage;
      adjusted.leverage = leverage;
    }

    const maxLoss = (snapshot.account.balance * cfg.riskPerTradePct) / 100;
    if (impliedLossUsd(sizeUsd, price, item.stopLoss) > maxLoss) return reject('risk_per_trade_exceeded');

    claimed.add(item.instrument);
    openCount++;
    const effective: DecisionItem = { ...item, sizeUsd, leverage };
    if (adjusted.sizeUsd === undefined && adjusted.leverage === undefined) {
      return { ...base, verdict: 'approved', effective };
    }
    return { ...base, verdict: 'clamped', adjusted, effective };
  });
}

export type ActionableVerdict = (ApprovedVerdict | ClampedVerdict) & { action: ExecutableAction };

/** Approved or clamped opens and closes; holds are approved but never executed. */
export function isActionable(v: RiskVerdict): v is ActionableVerdict {
  return v.verdict !== 'rejected' && v.action !== 'hold';
}
