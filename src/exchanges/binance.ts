import axios from 'axios';
import type { AxiosInstance, Method } from 'axios';
import { createHmac } from 'crypto';
import { z } from 'zod';
import { VenueError, describeError } from '../errors';
import { componentLogger } from '../logger';
import type { OrderRecord, OrderStatus, OrderType, PositionRecord } from '../types';
import { finiteOnly, mean, summarizeCandles } from './indicators';
import type { Candle } from './indicators';
import type { DailyPerformance, MarketIndicators, OrderSpec, VenueBalance, VenueGateway } from './types';

export const BINANCE_FUTURES_TESTNET = 'https://testnet.binancefuture.com';

const log = componentLogger('binance');

// Binance codes that mean the key, signature or IP allow-list is wrong
const AUTH_CODES = new Set([-1002, -1022, -2014, -2015]);
// disconnected, too many requests, backend timeout
const TRANSIENT_CODES = new Set([-1001, -1003, -1007, -1008]);
const ORDER_DOES_NOT_EXIST = -2013;

export interface BinanceOptions {
  baseURL?: string;
  apiKey?: string;
  apiSecret?: string;
  recvWindow?: number;
  timeoutMs?: number;
  http?: AxiosInstance;
  now?: () => number;
}

type Params = Record<string, string | number | boolean | undefined>;

const num = z.coerce.number().finite();

const accountSchema = z.object({
  totalWalletBalance: num,
  availableBalance: num,
  totalUnrealizedProfit: num,
  totalInitialMargin: num,
});

const incomeSchema = z.array(z.object({ income: num, time: z.number(), incomeType: z.string() }));

const positionRiskSchema = z.array(
  z.object({
    symbol: z.string(),
    positionAmt: num,
    entryPrice: num,
    markPrice: num,
    unRealizedProfit: num,
    leverage: num,
  }),
);

const orderSchema = z.object({
  orderId: z.union([z.number(), z.string()]).transform(String),
  clientOrderId: z.string().optional(),
  symbol: z.string(),
  side: z.enum(['BUY', 'SELL']),
  type: z.string(),
  origQty: num,
  executedQty: num,
  price: num.optional(),
  stopPrice: num.optional(),
  avgPrice: num.optional(),
  reduceOnly: z.boolean().optional(),
  status: z.string(),
});

const tickerSchema = z.object({ price: num });
const klinesSchema = z.array(z.array(z.union([z.string(), z.number()])).min(6));
const openInterestSchema = z.array(z.object({ sumOpenInterest: num }));
const premiumIndexSchema = z.object({ lastFundingRate: num });
const exchangeInfoSchema = z.object({
  symbols: z.array(
    z.object({
      symbol: z.string(),
      filters: z.array(
        z.object({ filterType: z.string(), stepSize: z.string().optional(), tickSize: z.string().optional() }),
      ),
    }),
  ),
});

type BinanceOrder = z.infer<typeof orderSchema>;

interface SymbolRules {
  stepSize: string;
  tickSize: string;
}

function parse<S extends z.ZodTypeAny>(schema: S, data: unknown, what: string): z.output<S> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new VenueError(`malformed ${what} response: ${parsed.error.issues[0]?.message ?? 'invalid'}`, 'unknown');
  }
  return parsed.data;
}

export function toVenueError(err: unknown, operation: string): VenueError {
  if (err instanceof VenueError) return err;
  if (axios.isAxiosError(err)) {
    const response = err.response;
    if (!response) {
      return new VenueError(`${operation}: ${err.message}`, 'transient', { cause: err });
    }
    const body = z.object({ code: z.number().optional(), msg: z.string().optional() }).safeParse(response.data);
    const code = body.success ? body.data.code : undefined;
    const message = `${operation}: ${(body.success && body.data.msg) || err.message}`;
    const status = response.status;
    if (status === 401 || status === 403 || (code !== undefined && AUTH_CODES.has(code))) {
      return new VenueError(message, 'auth', { code, cause: err });
    }
    if (status === 418 || status === 429 || status >= 500 || (code !== undefined && TRANSIENT_CODES.has(code))) {
      return new VenueError(message, 'transient', { code, cause: err });
    }
    if (status >= 400) return new VenueError(message, 'rejected', { code, cause: err });
    return new VenueError(message, 'unknown', { code, cause: err });
  }
  return new VenueError(`${operation}: ${describeError(err)}`, 'unknown', { cause: err });
}

function decimalsOf(step: string): number {
  const [, frac = ''] = step.split('.');
  return frac.replace(/0+$/, '').length;
}

export function floorToStep(value: number, step: string): string {
  const s = Number(step);
  if (!(s > 0)) return String(value);
  const units = Math.floor(value / s + 1e-9);
  return (units * s).toFixed(decimalsOf(step));
}

export function roundToTick(value: number, tick: string): string {
  const t = Number(tick);
  if (!(t > 0)) return String(value);
  return (Math.round(value / t) * t).toFixed(decimalsOf(tick));
}

const ORDER_TYPES: Record<string, OrderType> = {
  MARKET: 'market',
  LIMIT: 'limit',
  STOP: 'stop_market',
  STOP_MARKET: 'stop_market',
  TRAILING_STOP_MARKET: 'stop_market',
  TAKE_PROFIT: 'take_profit_market',
  TAKE_PROFIT_MARKET: 'take_profit_market',
};

const ORDER_STATUSES: Record<string, OrderStatus> = {
  NEW: 'pending',
  PARTIALLY_FILLED: 'partially_filled',
  FILLED: 'filled',
  CANCELED: 'canceled',
  EXPIRED: 'canceled',
  EXPIRED_IN_MATCH: 'canceled',
  REJECTED: 'rejected',
};

const ORDER_TYPE_CODES: Record<OrderSpec['type'], string> = {
  market: 'MARKET',
  stop_market: 'STOP_MARKET',
  take_profit_market: 'TAKE_PROFIT_MARKET',
};

function positive(value: number | undefined): number | null {
  return value !== undefined && value > 0 ? value : null;
}

export function mapOrder(o: BinanceOrder): OrderRecord {
  return {
    orderId: o.orderId,
    clientOrderId: o.clientOrderId ?? null,
    instrument: o.symbol,
    side: o.side === 'BUY' ? 'buy' : 'sell',
    type: ORDER_TYPES[o.type] ?? 'limit',
    quantity: o.origQty,
    filledQuantity: o.executedQty,
    price: positive(o.price),
    stopPrice: positive(o.stopPrice),
    avgPrice: positive(o.avgPrice),
    reduceOnly: o.reduceOnly ?? false,
    status: ORDER_STATUSES[o.status] ?? 'pending',
  };
}

function toCandles(rows: z.infer<typeof klinesSchema>): Candle[] {
  return rows.map((r) => ({
    openTime: Number(r[0]),
    open: Number(r[1]),
    high: Number(r[2]),
    low: Number(r[3]),
    close: Number(r[4]),
    volume: Number(r[5]),
  }));
}

function utcMidnight(ts: number): number {
  const d = new Date(ts);
  return Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate());
}

/** Binance USDⓈ-M futures REST gateway. Market data endpoints are public; account and order endpoints are signed. */
export class BinanceFuturesGateway implements VenueGateway {
  readonly id = 'binance-futures';
  private readonly http: AxiosInstance;
  private readonly apiKey?: string;
  private readonly apiSecret?: string;
  private readonly recvWindow: number;
  private readonly now: () => number;
  private rules: Promise<Map<string, SymbolRules>> | null = null;

  constructor(opts: BinanceOptions = {}) {
    this.http =
      opts.http ??
      axios.create({
        baseURL: opts.baseURL ?? process.env.BINANCE_FUTURES_BASE_URL ?? BINANCE_FUTURES_TESTNET,
        timeout: opts.timeoutMs ?? 8000,
      });
    this.apiKey = opts.apiKey;
    this.apiSecret = opts.apiSecret;
    this.recvWindow = opts.recvWindow ?? 5000;
    this.now = opts.now ?? Date.now;
  }

  private async publicGet(path: string, params: Params, signal?: AbortSignal): Promise<unknown> {
    try {
      const res = await this.http.get(path, { params, signal });
      return res.data;
    } catch (err) {
      throw toVenueError(err, `GET ${path}`);
    }
  }

  private async signed(method: Method, path: string, params: Params, signal?: AbortSignal): Promise<unknown> {
    if (!this.apiKey || !this.apiSecret) {
      throw new VenueError(`${method} ${path}: missing API credentials`, 'auth');
    }
    const query = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) query.append(key, String(value));
    }
    query.append('recvWindow', String(this.recvWindow));
    query.append('timestamp', String(this.now()));
    const signature = createHmac('sha256', this.apiSecret).update(query.toString()).digest('hex');
    query.append('signature', signature);
    try {
      const res = await this.http.request({
        method,
        url: `${path}?${query.toString()}`,
        headers: { 'X-MBX-APIKEY': this.apiKey },
        signal,
      });
      return res.data;
    } catch (err) {
      throw toVenueError(err, `${method} ${path}`);
    }
  }

  async getBalance(signal?: AbortSignal): Promise<VenueBalance> {
    const a = parse(accountSchema, await this.signed('GET', '/fapi/v2/account', {}, signal), 'account');
    return {
      balance: a.totalWalletBalance,
      availableBalance: a.availableBalance,
      marginUsed: a.totalInitialMargin,
      unrealizedPnl: a.totalUnrealizedProfit,
    };
  }

  async getDailyPerformance(signal?: AbortSignal): Promise<DailyPerformance> {
    const rows = parse(
      incomeSchema,
      await this.signed(
        'GET',
        '/fapi/v1/income',
        { incomeType: 'REALIZED_PNL', startTime: utcMidnight(this.now()), limit: 1000 },
        signal,
      ),
      'income',
    );
    const wins = rows.filter((r) => r.income > 0).length;
    return {
      realizedPnl: rows.reduce((acc, r) => acc + r.income, 0),
      tradeCount: rows.length,
      wins,
      losses: rows.length - wins,
    };
  }

  async getPositions(signal?: AbortSignal): Promise<PositionRecord[]> {
    const rows = parse(positionRiskSchema, await this.signed('GET', '/fapi/v2/positionRisk', {}, signal), 'positionRisk');
    return rows
      .filter((p) => p.positionAmt !== 0)
      .map((p) => ({
        instrument: p.symbol,
        side: p.positionAmt > 0 ? 'long' : 'short',
        quantity: Math.abs(p.positionAmt),
        entryPrice: p.entryPrice,
        markPrice: p.markPrice,
        leverage: p.leverage,
        unrealizedPnl: p.unRealizedProfit,
        stopLossOrderIds: [],
        takeProfitOrderIds: [],
      }));
  }

  async getOpenOrders(signal?: AbortSignal): Promise<OrderRecord[]> {
    const rows = parse(z.array(orderSchema), await this.signed('GET', '/fapi/v1/openOrders', {}, signal), 'openOrders');
    return rows.map(mapOrder);
  }

  async getIndicators(instrument: string, signal?: AbortSignal): Promise<MarketIndicators> {
    const [ticker, hourly, daily] = await Promise.all([
      this.publicGet('/fapi/v1/ticker/price', { symbol: instrument }, signal),
      this.publicGet('/fapi/v1/klines', { symbol: instrument, interval: '1h', limit: 100 }, signal),
      this.publicGet('/fapi/v1/klines', { symbol: instrument, interval: '1d', limit: 100 }, signal),
    ]);
    const price = parse(tickerSchema, ticker, 'ticker').price;
    const indicators = summarizeCandles(
      toCandles(parse(klinesSchema, hourly, 'klines')),
      toCandles(parse(klinesSchema, daily, 'klines')),
    );
    return { price, indicators: { ...indicators, ...(await this.derivativesMetrics(instrument, signal)) } };
  }

  // Open interest and funding are context, not truth; missing values are left out, never zeroed.
  private async derivativesMetrics(instrument: string, signal?: AbortSignal): Promise<Record<string, number>> {
    const out: Record<string, number> = {};
    try {
      const oi = parse(
        openInterestSchema,
        await this.publicGet('/futures/data/openInterestHist', { symbol: instrument, period: '1h', limit: 24 }, signal),
        'openInterestHist',
      );
      if (oi.length) {
        out.open_interest = oi[oi.length - 1].sumOpenInterest;
        out.open_interest_avg = mean(oi.map((r) => r.sumOpenInterest));
      }
    } catch (err) {
      log.warn({ err, instrument }, 'open interest unavailable');
    }
    try {
      const premium = parse(
        premiumIndexSchema,
        await this.publicGet('/fapi/v1/premiumIndex', { symbol: instrument }, signal),
        'premiumIndex',
      );
      out.funding_rate_pct = premium.lastFundingRate * 100;
    } catch (err) {
      log.warn({ err, instrument }, 'funding rate unavailable');
    }
    return finiteOnly(out);
  }

  async getOrder(instrument: string, clientOrderId: string, signal?: AbortSignal): Promise<OrderRecord | null> {
    try {
      const raw = await this.signed('GET', '/fapi/v1/order', { symbol: instrument, origClientOrderId: clientOrderId }, signal);
      return mapOrder(parse(orderSchema, raw, 'order'));
    } catch (err) {
      if (err instanceof VenueError && err.code === ORDER_DOES_NOT_EXIST) return null;
      throw err;
    }
  }

  async placeOrder(spec: OrderSpec): Promise<OrderRecord> {
    const rules = await this.symbolRules(spec.instrument);
    const quantity = floorToStep(spec.quantity, rules.stepSize);
    if (!(Number(quantity) > 0)) {
      throw new VenueError(`quantity ${spec.quantity} rounds to zero for ${spec.instrument}`, 'rejected');
    }
    const raw = await this.signed('POST', '/fapi/v1/order', {
      symbol: spec.instrument,
      side: spec.side === 'buy' ? 'BUY' : 'SELL',
      type: ORDER_TYPE_CODES[spec.type],
      quantity,
      stopPrice: spec.stopPrice !== undefined ? roundToTick(spec.stopPrice, rules.tickSize) : undefined,
      workingType: spec.type === 'market' ? undefined : 'MARK_PRICE',
      reduceOnly: spec.reduceOnly ? 'true' : undefined,
      newClientOrderId: spec.clientOrderId,
      newOrderRespType: 'RESULT',
    });
    return mapOrder(parse(orderSchema, raw, 'order'));
  }

  async cancelOrder(instrument: string, orderId: string): Promise<OrderRecord> {
    const raw = await this.signed('DELETE', '/fapi/v1/order', { symbol: instrument, orderId });
    return mapOrder(parse(orderSchema, raw, 'order'));
  }

  async setLeverage(instrument: string, leverage: number): Promise<void> {
    await this.signed('POST', '/fapi/v1/leverage', { symbol: instrument, leverage });
  }

  private async symbolRules(instrument: string): Promise<SymbolRules> {
    if (!this.rules) {
      const loading = this.loadRules();
      this.rules = loading;
      loading.catch(() => {
        if (this.rules === loading) this.rules = null;
      });
    }
    const rules = (await this.rules).get(instrument);
    if (!rules) throw new VenueError(`unknown instrument ${instrument}`, 'rejected');
    return rules;
  }

  private async loadRules(): Promise<Map<string, SymbolRules>> {
    const info = parse(exchangeInfoSchema, await this.publicGet('/fapi/v1/exchangeInfo', {}), 'exchangeInfo');
    const out = new Map<string, SymbolRules>();
    for (const s of info.symbols) {
      const lot = s.filters.find((f) => f.filterType === 'MARKET_LOT_SIZE') ?? s.filters.find((f) => f.filterType === 'LOT_SIZE');
      const priceFilter = s.filters.find((f) => f.filterType === 'PRICE_FILTER');
      out.set(s.symbol, { stepSize: lot?.stepSize ?? '0.001', tickSize: priceFilter?.tickSize ?? '0.01' });
    }
    return out;
  }
}
