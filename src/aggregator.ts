import { DataIntegrityError, describeError } from './errors';
import type { DailyPerformance, VenueBalance, VenueGateway } from './exchanges/types';
import { componentLogger } from './logger';
import type { AccountState, InstrumentSnapshot, MarketSnapshot, OrderRecord, PositionRecord } from './types';
import { deepFreeze, withTimeout } from './util/async';

export interface VenueState {
  balance: VenueBalance;
  performance: DailyPerformance;
  positions: PositionRecord[];
  orders: OrderRecord[];
}

export interface AggregatorOptions {
  timeoutMs: number;
  now?: () => number;
}

function requireFinite(value: number, field: string): number {
  if (!Number.isFinite(value)) throw new DataIntegrityError(`venue returned non-finite ${field}`);
  return value;
}

export class StateAggregator {
  private readonly logger = componentLogger('aggregator');
  private readonly now: () => number;

  constructor(
    private readonly venue: VenueGateway,
    private readonly opts: AggregatorOptions,
  ) {
    this.now = opts.now ?? Date.now;
  }

  async fetchVenueState(signal?: AbortSignal): Promise<VenueState> {
    try {
      return await withTimeout(
        'venue state',
        this.opts.timeoutMs,
        async (s) => {
          const [balance, performance, positions, orders] = await Promise.all([
            this.venue.getBalance(s),
            this.venue.getDailyPerformance(s),
            this.venue.getPositions(s),
            this.venue.getOpenOrders(s),
          ]);
          return { balance, performance, positions, orders };
        },
        signal,
      );
    } catch (err) {
      this.logger.error({ err }, 'venue state fetch failed');
      throw new DataIntegrityError(`venue state unavailable: ${describeError(err)}`, { cause: err });
    }
  }

  /**
   * Builds the immutable snapshot the rest of the cycle reads. Stop-loss and
   * take-profit ids come from open reduce-only orders on the same instrument.
   */
  merge(instruments: ReadonlyMap<string, InstrumentSnapshot>, state: VenueState): MarketSnapshot {
    const account: AccountState = {
      balance: requireFinite(state.balance.balance, 'balance'),
      availableBalance: requireFinite(state.balance.availableBalance, 'availableBalance'),
      marginUsed: requireFinite(state.balance.marginUsed, 'marginUsed'),
      unrealizedPnl: requireFinite(state.balance.unrealizedPnl, 'unrealizedPnl'),
      dailyRealizedPnl: requireFinite(state.performance.realizedPnl, 'realizedPnl'),
      dailyTradeCount: state.performance.tradeCount,
      wins: state.performance.wins,
      losses: state.performance.losses,
    };

    const seen = new Set<string>();
    const positions = state.positions.map((p) => {
      if (seen.has(p.instrument)) throw new DataIntegrityError(`duplicate position for ${p.instrument}`);
      seen.add(p.instrument);
      if (!(requireFinite(p.quantity, `${p.instrument} quantity`) > 0)) {
        throw new DataIntegrityError(`non-positive position quantity for ${p.instrument}`);
      }
      const protective = state.orders.filter((o) => o.instrument === p.instrument && o.reduceOnly);
      return {
        ...p,
        stopLossOrderIds: protective.filter((o) => o.type === 'stop_market').map((o) => o.orderId),
        takeProfitOrderIds: protective.filter((o) => o.type === 'take_profit_market').map((o) => o.orderId),
      };
    });

    return deepFreeze<MarketSnapshot>({
      ts: this.now(),
      instruments: Array.from(instruments.values()),
      account,
      positions,
      orders: state.orders.map((o) => ({ ...o })),
    });
  }

  async aggregate(instruments: ReadonlyMap<string, InstrumentSnapshot>, signal?: AbortSignal): Promise<MarketSnapshot> {
    return this.merge(instruments, await this.fetchVenueState(signal));
  }
}
