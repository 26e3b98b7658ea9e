import type { OrderRecord, OrderSide, PositionRecord } from '../types';

export interface VenueBalance {
  balance: number;
  availableBalance: number;
  marginUsed: number;
  unrealizedPnl: number;
}

export interface DailyPerformance {
  realizedPnl: number;
  tradeCount: number;
  wins: number;
  losses: number;
}

export interface MarketIndicators {
  price: number;
  indicators: Record<string, number>;
}

export type PlaceableOrderType = 'market' | 'stop_market' | 'take_profit_market';

export interface OrderSpec {
  instrument: string;
  side: OrderSide;
  type: PlaceableOrderType;
  quantity: number;
  stopPrice?: number;
  reduceOnly: boolean;
  clientOrderId: string;
}

/**
 * Authenticated trading venue. Every method either resolves with a typed value
 * or rejects with a VenueError (transient | rejected | auth | unknown).
 * Read-only calls honour the optional AbortSignal.
 */
export interface VenueGateway {
  readonly id: string;
  getBalance(signal?: AbortSignal): Promise<VenueBalance>;
  getDailyPerformance(signal?: AbortSignal): Promise<DailyPerformance>;
  // protective order ids are attached later by the aggregator
  getPositions(signal?: AbortSignal): Promise<PositionRecord[]>;
  getOpenOrders(signal?: AbortSignal): Promise<OrderRecord[]>;
  getIndicators(instrument: string, signal?: AbortSignal): Promise<MarketIndicators>;
  /** Looks an order up by client order id; null when the venue has never seen it. */
  getOrder(instrument: string, clientOrderId: string, signal?: AbortSignal): Promise<OrderRecord | null>;
  placeOrder(spec: OrderSpec): Promise<OrderRecord>;
  cancelOrder(instrument: string, orderId: string): Promise<OrderRecord>;
  setLeverage(instrument: string, leverage: number): Promise<void>;
}
