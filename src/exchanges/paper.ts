import { VenueError } from '../errors';
import { componentLogger } from '../logger';
import type { OrderRecord, OrderSide, PositionRecord, PositionSide } from '../types';
import type { DailyPerformance, MarketIndicators, OrderSpec, VenueBalance, VenueGateway } from './types';

const log = componentLogger('paper');

export type IndicatorSource = (instrument: string, signal?: AbortSignal) => Promise<MarketIndicators>;

export interface PaperVenueOptions {
  startingBalance?: number;
  // when set, getIndicators pulls live data and marks the book to it
  indicatorSource?: IndicatorSource;
}

interface PaperPosition {
  side: PositionSide;
  quantity: number;
  entryPrice: number;
}

/**
 * In-memory futures venue. Market orders fill at the last price set for the
 * instrument; stop and take-profit orders rest until a price update crosses them.
 */
export class PaperVenue implements VenueGateway {
  readonly id = 'paper';
  private balance: number;
  private readonly markets = new Map<string, MarketIndicators>();
  private readonly positions = new Map<string, PaperPosition>();
  private readonly leverage = new Map<string, number>();
  private readonly orders = new Map<string, OrderRecord>();
  private readonly byClientId = new Map<string, string>();
  private readonly indicatorSource?: IndicatorSource;
  private seq = 0;
  private realizedPnl = 0;
  private wins = 0;
  private losses = 0;

  constructor(opts: PaperVenueOptions = {}) {
    this.balance = opts.startingBalance ?? 10000;
    this.indicatorSource = opts.indicatorSource;
  }

  setMarket(instrument: string, market: { price: number; indicators?: Record<string, number> }): void {
    this.markets.set(instrument, { price: market.price, indicators: { ...(market.indicators ?? {}) } });
    this.triggerResting(instrument, market.price);
  }

  async getBalance(): Promise<VenueBalance> {
    let marginUsed = 0;
    let unrealizedPnl = 0;
    for (const [instrument, p] of this.positions) {
      marginUsed += (p.quantity * p.entryPrice) / this.leverageFor(instrument);
      unrealizedPnl += this.unrealized(instrument, p);
    }
    return {
      balance: this.balance,
      availableBalance: this.balance - marginUsed,
      marginUsed,
      unrealizedPnl,
    };
  }

  async getDailyPerformance(): Promise<DailyPerformance> {
    return {
      realizedPnl: this.realizedPnl,
      tradeCount: this.wins + this.losses,
      wins: this.wins,
      losses: this.losses,
    };
  }

  async getPositions(): Promise<PositionRecord[]> {
    return Array.from(this.positions, ([instrument, p]) => ({
      instrument,
      side: p.side,
      quantity: p.quantity,
      entryPrice: p.entryPrice,
      markPrice: this.markets.get(instrument)?.price ?? p.entryPrice,
      leverage: this.leverageFor(instrument),
      unrealizedPnl: this.unrealized(instrument, p),
      stopLossOrderIds: [],
      takeProfitOrderIds: [],
    }));
  }

  async getOpenOrders(): Promise<OrderRecord[]> {
    return Array.from(this.orders.values())
      .filter((o) => o.status === 'pending')
      .map((o) => ({ ...o }));
  }

  async getIndicators(instrument: string, signal?: AbortSignal): Promise<MarketIndicators> {
    if (this.indicatorSource) {
      const live = await this.indicatorSource(instrument, signal);
      this.setMarket(instrument, live);
    }
    const market = this.markets.get(instrument);
    if (!market) throw new VenueError(`no market data for ${instrument}`, 'rejected');
    return { price: market.price, indicators: { ...market.indicators } };
  }

  async getOrder(_instrument: string, clientOrderId: string): Promise<OrderRecord | null> {
    const orderId = this.byClientId.get(clientOrderId);
    const order = orderId ? this.orders.get(orderId) : undefined;
    return order ? { ...order } : null;
  }

  async placeOrder(spec: OrderSpec): Promise<OrderRecord> {
    if (this.byClientId.has(spec.clientOrderId)) {
      throw new VenueError(`client order id ${spec.clientOrderId} is duplicated`, 'rejected', { code: -4116 });
    }
    if (!(spec.quantity > 0)) {
      throw new VenueError(`invalid quantity ${spec.quantity}`, 'rejected', { code: -4003 });
    }
    const market = this.markets.get(spec.instrument);
    if (!market) throw new VenueError(`no market data for ${spec.instrument}`, 'rejected');

    const order: OrderRecord = {
      orderId: String(++this.seq),
      clientOrderId: spec.clientOrderId,
      instrument: spec.instrument,
      side: spec.side,
      type: spec.type,
      quantity: spec.quantity,
      filledQuantity: 0,
      price: null,
      stopPrice: spec.stopPrice ?? null,
      avgPrice: null,
      reduceOnly: spec.reduceOnly,
      status: 'pending',
    };

    if (spec.type === 'market') {
      let quantity = spec.quantity;
      if (spec.reduceOnly) {
        const position = this.positions.get(spec.instrument);
        if (!position || closingSide(position.side) !== spec.side) {
          throw new VenueError(`reduce-only order would not reduce ${spec.instrument}`, 'rejected', { code: -2022 });
        }
        quantity = Math.min(quantity, position.quantity);
      }
      this.fill(spec.instrument, spec.side, quantity, market.price);
      order.quantity = quantity;
      order.filledQuantity = quantity;
      order.avgPrice = market.price;
      order.status = 'filled';
    } else if (spec.stopPrice === undefined || !(spec.stopPrice > 0)) {
      throw new VenueError(`${spec.type} requires a stop price`, 'rejected', { code: -2021 });
    }

    this.orders.set(order.orderId, order);
    this.byClientId.set(spec.clientOrderId, order.orderId);
    return { ...order };
  }

  async cancelOrder(instrument: string, orderId: string): Promise<OrderRecord> {
    const order = this.orders.get(orderId);
    if (!order || order.instrument !== instrument || order.status !== 'pending') {
      throw new VenueError(`unknown order ${orderId}`, 'rejected', { code: -2011 });
    }
    order.status = 'canceled';
    return { ...order };
  }

  async setLeverage(instrument: string, leverage: number): Promise<void> {
    if (!Number.isInteger(leverage) || leverage < 1 || leverage > 125) {
      throw new VenueError(`invalid leverage ${leverage}`, 'rejected', { code: -4028 });
    }
    this.leverage.set(instrument, leverage);
  }

  private leverageFor(instrument: string): number {
    return this.leverage.get(instrument) ?? 1;
  }

  private unrealized(instrument: string, p: PaperPosition): number {
    const mark = this.markets.get(instrument)?.price ?? p.entryPrice;
    return (mark - p.entryPrice) * p.quantity * (p.side === 'long' ? 1 : -1);
  }

  private fill(instrument: string, side: OrderSide, quantity: number, price: number): void {
    const position = this.positions.get(instrument);
    const opening: PositionSide = side === 'buy' ? 'long' : 'short';
    if (!position) {
      this.positions.set(instrument, { side: opening, quantity, entryPrice: price });
      return;
    }
    if (position.side === opening) {
      const total = position.quantity + quantity;
      position.entryPrice = (position.entryPrice * position.quantity + price * quantity) / total;
      position.quantity = total;
      return;
    }
    const closed = Math.min(quantity, position.quantity);
    const pnl = (price - position.entryPrice) * closed * (position.side === 'long' ? 1 : -1);
    this.realizedPnl += pnl;
    this.balance += pnl;
    if (pnl > 0) this.wins++;
    else this.losses++;
    position.quantity -= closed;
    const flipped = quantity - closed;
    if (position.quantity <= 1e-12) {
      this.positions.delete(instrument);
      if (flipped > 1e-12) this.positions.set(instrument, { side: opening, quantity: flipped, entryPrice: price });
    }
  }

  private triggerResting(instrument: string, price: number): void {
    for (const order of this.orders.values()) {
      if (order.instrument !== instrument || order.status !== 'pending' || order.stopPrice === null) continue;
      if (!crosses(order, price)) continue;
      const position = this.positions.get(instrument);
      if (order.reduceOnly && (!position || closingSide(position.side) !== order.side)) {
        order.status = 'canceled';
        continue;
      }
      const quantity = order.reduceOnly && position ? Math.min(order.quantity, position.quantity) : order.quantity;
      this.fill(instrument, order.side, quantity, price);
      order.filledQuantity = quantity;
      order.avgPrice = price;
      order.status = 'filled';
      log.debug({ instrument, orderId: order.orderId, type: order.type, price }, 'resting order triggered');
    }
  }
}

function closingSide(side: PositionSide): OrderSide {
  return side === 'long' ? 'sell' : 'buy';
}

function crosses(order: OrderRecord, price: number): boolean {
  const stop = order.stopPrice ?? 0;
  if (order.type === 'stop_market') return order.side === 'sell' ? price <= stop : price >= stop;
  if (order.type === 'take_profit_market') return order.side === 'sell' ? price >= stop : price <= stop;
  return false;
}
