import axios, { AxiosError, AxiosHeaders } from 'axios';
import type { AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { createHmac } from 'crypto';
import { describe, expect, it } from 'vitest';
import { VenueError } from '../errors';
import { BinanceFuturesGateway, floorToStep, roundToTick, toVenueError } from './binance';

const NOW = 1_700_000_000_000; // 2023-11-14T22:13:20Z

interface Reply {
  status?: number;
  data: unknown;
}

type Route = (path: string, config: InternalAxiosRequestConfig) => Reply;

function stub(route: Route) {
  const calls: { method: string; path: string; query: URLSearchParams; config: InternalAxiosRequestConfig }[] = [];
  const http = axios.create({
    baseURL: 'https://venue.test',
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      const [path, qs = ''] = (config.url ?? '').split('?');
      calls.push({ method: (config.method ?? 'get').toUpperCase(), path, query: new URLSearchParams(qs), config });
      const { status = 200, data } = route(path, config);
      const response: AxiosResponse = { data, status, statusText: String(status), headers: {}, config };
      if (status >= 400) {
        throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_REQUEST, config, null, response);
      }
      return response;
    },
  });
  const gateway = new BinanceFuturesGateway({ http, apiKey: 'test-key', apiSecret: 'test-secret', now: () => NOW });
  return { gateway, calls };
}

function candles(n: number): string[][] {
  return Array.from({ length: n }, (_, i) => [String(i * 3_600_000), '100', '101', '99', '100', '10']);
}

const exchangeInfo = {
  symbols: [
    {
      symbol: 'BTCUSDT',
      filters: [
        { filterType: 'PRICE_FILTER', tickSize: '0.10' },
        { filterType: 'LOT_SIZE', stepSize: '0.0001' },
        { filterType: 'MARKET_LOT_SIZE', stepSize: '0.001' },
      ],
    },
  ],
};

function axiosFailure(status: number, data: unknown): AxiosError {
  const config: InternalAxiosRequestConfig = { headers: new AxiosHeaders() };
  return new AxiosError('Request failed', AxiosError.ERR_BAD_RESPONSE, config, null, {
    data,
    status,
    statusText: '',
    headers: {},
    config,
  });
}

describe('BinanceFuturesGateway', () => {
  it('signs private requests with the api secret', async () => {
    const { gateway, calls } = stub(() => ({
      data: { totalWalletBalance: '1000.5', availableBalance: '800', totalUnrealizedProfit: '-12.25', totalInitialMargin: '200.5' },
    }));
    expect(await gateway.getBalance()).toEqual({ balance: 1000.5, availableBalance: 800, marginUsed: 200.5, unrealizedPnl: -12.25 });

    const [call] = calls;
    expect(call.path).toBe('/fapi/v2/account');
    expect(call.config.headers['X-MBX-APIKEY']).toBe('test-key');
    const payload = `recvWindow=5000&timestamp=${NOW}`;
    expect(call.query.get('timestamp')).toBe(String(NOW));
    expect(call.query.get('signature')).toBe(createHmac('sha256', 'test-secret').update(payload).digest('hex'));
  });

  it('refuses private calls without credentials', async () => {
    const gateway = new BinanceFuturesGateway({ http: axios.create() });
    await expect(gateway.getPositions()).rejects.toMatchObject({ kind: 'auth' });
  });

  it('sums realized pnl since the start of the UTC day', async () => {
    const { gateway, calls } = stub(() => ({
      data: [
        { income: '12.5', time: NOW - 1000, incomeType: 'REALIZED_PNL' },
        { income: '-2.5', time: NOW - 500, incomeType: 'REALIZED_PNL' },
        { income: '0', time: NOW - 100, incomeType: 'REALIZED_PNL' },
      ],
    }));
    expect(await gateway.getDailyPerformance()).toEqual({ realizedPnl: 10, tradeCount: 3, wins: 1, losses: 2 });
    expect(calls[0].query.get('incomeType')).toBe('REALIZED_PNL');
    expect(calls[0].query.get('startTime')).toBe(String(Date.UTC(2023, 10, 14)));
  });

  it('maps open positions and drops flat ones', async () => {
    const { gateway } = stub(() => ({
      data: [
        { symbol: 'BTCUSDT', positionAmt: '-0.050', entryPrice: '50000', markPrice: '49000', unRealizedProfit: '50', leverage: '3' },
        { symbol: 'ETHUSDT', positionAmt: '0.000', entryPrice: '0', markPrice: '2500', unRealizedProfit: '0', leverage: '20' },
      ],
    }));
    expect(await gateway.getPositions()).toEqual([
      {
        instrument: 'BTCUSDT',
        side: 'short',
        quantity: 0.05,
        entryPrice: 50000,
        markPrice: 49000,
        leverage: 3,
        unrealizedPnl: 50,
        stopLossOrderIds: [],
        takeProfitOrderIds: [],
      },
    ]);
  });

  it('quantizes orders to the symbol filters', async () => {
    const { gateway, calls } = stub((path) => {
      if (path === '/fapi/v1/exchangeInfo') return { data: exchangeInfo };
      return {
        data: {
          orderId: 123,
          clientOrderId: 'abc-sl',
          symbol: 'BTCUSDT',
          side: 'SELL',
          type: 'STOP_MARKET',
          origQty: '0.020',
          executedQty: '0',
          price: '0',
          stopPrice: '45000.0',
          avgPrice: '0.00',
          reduceOnly: true,
          status: 'NEW',
        },
      };
    });
    const order = await gateway.placeOrder({
      instrument: 'BTCUSDT',
      side: 'sell',
      type: 'stop_market',
      quantity: 0.0209,
      stopPrice: 45000.04,
      reduceOnly: true,
      clientOrderId: 'abc-sl',
    });
    expect(order).toEqual({
      orderId: '123',
      clientOrderId: 'abc-sl',
      instrument: 'BTCUSDT',
      side: 'sell',
      type: 'stop_market',
      quantity: 0.02,
      filledQuantity: 0,
      price: null,
      stopPrice: 45000,
      avgPrice: null,
      reduceOnly: true,
      status: 'pending',
    });

    const post = calls[1];
    expect(post.method).toBe('POST');
    expect(post.path).toBe('/fapi/v1/order');
    expect(Object.fromEntries(post.query)).toMatchObject({
      symbol: 'BTCUSDT',
      side: 'SELL',
      type: 'STOP_MARKET',
      quantity: '0.020',
      stopPrice: '45000.0',
      workingType: 'MARK_PRICE',
      reduceOnly: 'true',
      newClientOrderId: 'abc-sl',
      newOrderRespType: 'RESULT',
    });

    await gateway.placeOrder({
      instrument: 'BTCUSDT',
      side: 'buy',
      type: 'market',
      quantity: 0.5,
      reduceOnly: false,
      clientOrderId: 'abc-e',
    });
    expect(calls.filter((c) => c.path === '/fapi/v1/exchangeInfo')).toHaveLength(1);
    expect(calls[2].query.get('workingType')).toBeNull();
    expect(calls[2].query.get('reduceOnly')).toBeNull();
  });

  it('rejects a quantity below one lot without sending it', async () => {
    const { gateway, calls } = stub(() => ({ data: exchangeInfo }));
    const err = await gateway
      .placeOrder({ instrument: 'BTCUSDT', side: 'buy', type: 'market', quantity: 0.0004, reduceOnly: false, clientOrderId: 'x' })
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(VenueError);
    expect(err).toMatchObject({ kind: 'rejected' });
    expect(calls.map((c) => c.path)).toEqual(['/fapi/v1/exchangeInfo']);
  });

  it('returns null for an order the venue has never seen', async () => {
    const { gateway } = stub(() => ({ status: 400, data: { code: -2013, msg: 'Order does not exist.' } }));
    expect(await gateway.getOrder('BTCUSDT', 'abc-e')).toBeNull();
  });

  it('raises other lookup failures', async () => {
    const { gateway } = stub(() => ({ status: 503, data: { code: -1001, msg: 'Internal error' } }));
    await expect(gateway.getOrder('BTCUSDT', 'abc-e')).rejects.toMatchObject({
      kind: 'transient',
      message: 'GET /fapi/v1/order: Internal error',
    });
  });

  it('reports a malformed response as unknown', async () => {
    const { gateway } = stub(() => ({ data: { totalWalletBalance: 'lots' } }));
    await expect(gateway.getBalance()).rejects.toMatchObject({ kind: 'unknown' });
  });

  it('collects price, candle indicators and derivatives metrics', async () => {
    const { gateway } = stub((path) => {
      switch (path) {
        case '/fapi/v1/ticker/price':
          return { data: { symbol: 'BTCUSDT', price: '50123.4' } };
        case '/fapi/v1/klines':
          return { data: candles(100) };
        case '/futures/data/openInterestHist':
          return { data: [{ sumOpenInterest: '100' }, { sumOpenInterest: '200' }, { sumOpenInterest: '300' }] };
        default:
          return { data: { lastFundingRate: '0.0001' } };
      }
    });
    const { price, indicators } = await gateway.getIndicators('BTCUSDT');
    expect(price).toBe(50123.4);
    expect(indicators.ema_9_1h).toBe(100);
    expect(indicators.volume_1d).toBe(10);
    expect(indicators.open_interest).toBe(300);
    expect(indicators.open_interest_avg).toBe(200);
    expect(indicators.funding_rate_pct).toBeCloseTo(0.01, 12);
  });

  it('leaves out derivatives metrics it could not fetch', async () => {
    const { gateway } = stub((path) => {
      if (path === '/fapi/v1/ticker/price') return { data: { price: '2500' } };
      if (path === '/fapi/v1/klines') return { data: candles(30) };
      return { status: 500, data: {} };
    });
    const { price, indicators } = await gateway.getIndicators('ETHUSDT');
    expect(price).toBe(2500);
    expect(indicators).not.toHaveProperty('open_interest');
    expect(indicators).not.toHaveProperty('funding_rate_pct');
    expect(indicators.avg_volume_1d).toBe(10);
  });
});

describe('toVenueError', () => {
  it('classifies failures by status and venue code', () => {
    expect(toVenueError(axiosFailure(401, {}), 'GET /x').kind).toBe('auth');
    expect(toVenueError(axiosFailure(400, { code: -2015, msg: 'Invalid API-key' }), 'GET /x')).toMatchObject({
      kind: 'auth',
      code: -2015,
      message: 'GET /x: Invalid API-key',
    });
    expect(toVenueError(axiosFailure(429, {}), 'GET /x').kind).toBe('transient');
    expect(toVenueError(axiosFailure(502, 'Bad Gateway'), 'GET /x').kind).toBe('transient');
    expect(toVenueError(axiosFailure(400, { code: -1003, msg: 'Too many requests' }), 'GET /x').kind).toBe('transient');
    expect(toVenueError(axiosFailure(400, { code: -2019, msg: 'Margin is insufficient.' }), 'POST /x')).toMatchObject({
      kind: 'rejected',
      code: -2019,
    });
  });

  it('treats a request without a response as transient', () => {
    const err = new AxiosError('socket hang up', AxiosError.ECONNABORTED);
    expect(toVenueError(err, 'GET /x')).toMatchObject({ kind: 'transient', message: 'GET /x: socket hang up' });
  });

  it('wraps anything else as unknown', () => {
    expect(toVenueError(new Error('boom'), 'GET /x')).toMatchObject({ kind: 'unknown', message: 'GET /x: boom' });
  });
});

describe('quantization helpers', () => {
  it('floors quantities to the lot step', () => {
    expect(floorToStep(0.0209, '0.001')).toBe('0.020');
    expect(floorToStep(1.5, '1')).toBe('1');
    expect(floorToStep(0.3, '0.1')).toBe('0.3');
  });

  it('rounds prices to the tick size', () => {
    expect(roundToTick(45000.04, '0.10')).toBe('45000.0');
    expect(roundToTick(0.123456, '0.0001')).toBe('0.1235');
  });
});
