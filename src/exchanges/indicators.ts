export interface Candle {
  openTime: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

// Series helpers return arrays aligned with their input; warm-up slots hold NaN.

export function ema(values: number[], period: number): number[] {
  const out: number[] = new Array(values.length).fill(NaN);
  if (values.length < period || period <= 0) return out;
  const k = 2 / (period + 1);
  let prev = values.slice(0, period).reduce((a, b) => a + b, 0) / period;
  out[period - 1] = prev;
  for (let i = period; i < values.length; i++) {
    prev = values[i] * k + prev * (1 - k);
    out[i] = prev;
  }
  return out;
}

export function macd(values: number[], fast = 12, slow = 26): number[] {
  const emaFast = ema(values, fast);
  const emaSlow = ema(values, slow);
  return values.map((_, i) =>
    Number.isFinite(emaFast[i]) && Number.isFinite(emaSlow[i]) ? emaFast[i] - emaSlow[i] : NaN,
  );
}

/** Wilder RSI. */
export function rsi(values: number[], period = 14): number[] {
  const out: number[] = new Array(values.length).fill(NaN);
  if (values.length <= period) return out;
  let avgGain = 0;
  let avgLoss = 0;
  for (let i = 1; i <= period; i++) {
    const diff = values[i] - values[i - 1];
    avgGain += Math.max(0, diff);
    avgLoss += Math.max(0, -diff);
  }
  avgGain /= period;
  avgLoss /= period;
  out[period] = toRsi(avgGain, avgLoss);
  for (let i = period + 1; i < values.length; i++) {
    const diff = values[i] - values[i - 1];
    avgGain = (avgGain * (period - 1) + Math.max(0, diff)) / period;
    avgLoss = (avgLoss * (period - 1) + Math.max(0, -diff)) / period;
    out[i] = toRsi(avgGain, avgLoss);
  }
  return out;
}

function toRsi(avgGain: number, avgLoss: number): number {
  if (avgLoss === 0) return avgGain === 0 ? 50 : 100;
  return 100 - 100 / (1 + avgGain / avgLoss);
}

/** Wilder ATR, seeded with the simple mean of the first `period` true ranges. */
export function atr(candles: Candle[], period = 14): number[] {
  const out: number[] = new Array(candles.length).fill(NaN);
  if (candles.length < period || period <= 0) return out;
  const trs = candles.map((c, i) => {
    const prevClose = i === 0 ? c.close : candles[i - 1].close;
    return Math.max(c.high - c.low, Math.abs(c.high - prevClose), Math.abs(c.low - prevClose));
  });
  let prev = trs.slice(0, period).reduce((a, b) => a + b, 0) / period;
  out[period - 1] = prev;
  for (let i = period; i < trs.length; i++) {
    prev = (prev * (period - 1) + trs[i]) / period;
    out[i] = prev;
  }
  return out;
}

export function last(values: number[]): number {
  return values.length ? values[values.length - 1] : NaN;
}

export function mean(values: number[]): number {
  if (values.length === 0) return NaN;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/** Hourly momentum and daily volatility context, keyed by name. Non-finite values are dropped. */
export function summarizeCandles(hourly: Candle[], daily: Candle[]): Record<string, number> {
  const closes1h = hourly.map((c) => c.close);
  const closes1d = daily.map((c) => c.close);
  const volumes1d = daily.map((c) => c.volume);
  const raw: Record<string, number> = {
    ema_9_1h: last(ema(closes1h, 9)),
    macd_1h: last(macd(closes1h)),
    rsi_7_1h: last(rsi(closes1h, 7)),
    rsi_14_1h: last(rsi(closes1h, 14)),
    ema_9_1d: last(ema(closes1d, 9)),
    ema_21_1d: last(ema(closes1d, 21)),
    macd_1d: last(macd(closes1d)),
    rsi_14_1d: last(rsi(closes1d, 14)),
    atr_14_1d: last(atr(daily, 14)),
    atr_28_1d: last(atr(daily, 28)),
    volume_1d: last(volumes1d),
    avg_volume_1d: mean(volumes1d),
  };
  return finiteOnly(raw);
}

export function finiteOnly(values: Record<string, number>): Record<string, number> {
  const out: Record<string, number> = {};
  for (const [key, value] of Object.entries(values)) {
    if (Number.isFinite(value)) out[key] = value;
  }
  return out;
}
