import { createHash } from 'crypto';
import { VenueError, describeError, isRetryableSubmission } from './errors';
import type { OrderSpec, VenueGateway } from './exchanges/types';
import { componentLogger } from './logger';
import type { Logger } from './logger';
import type {
  ApprovedVerdict,
  ClampedVerdict,
  ClosedExecution,
  ExecutableAction,
  ExecutionResult,
  FailedExecution,
  MarketSnapshot,
  OpenedExecution,
  OrderRecord,
  OrderSide,
} from './types';
import { KeyedSerialQueue, withRetries, withTimeout } from './util/async';

export type ExecutableVerdict = ApprovedVerdict | ClampedVerdict;

export interface ExecutionContext {
  cycleId: string;
  snapshot: MarketSnapshot;
}

export interface ExecutorOptions {
  orderTimeoutMs: number;
  // total tries per submission, each preceded by a lookup of its client order id
  protectiveAttempts: number;
  retryDelayMs: number;
}

const MAX_CACHED_RESULTS = 1000;

export function idempotencyKey(cycleId: string, instrument: string, action: ExecutableAction): string {
  return createHash('sha256').update(`${cycleId}|${instrument}|${action}`).digest('hex').slice(0, 16);
}

interface Submitted {
  order: OrderRecord;
  reused: boolean;
}

type ExecutionBase = Pick<FailedExecution, 'cycleId' | 'itemIndex' | 'instrument' | 'action' | 'idempotencyKey'>;

function failed(base: ExecutionBase, reason: string, orders: OrderRecord[]): FailedExecution {
  return { ...base, status: 'failed', reason, orders };
}

function opposite(side: OrderSide): OrderSide {
  return side === 'buy' ? 'sell' : 'buy';
}

function isResting(order: OrderRecord): boolean {
  return order.status === 'pending' || order.status === 'partially_filled';
}

interface SettledEntry {
  order: OrderRecord | null;
  // venue position on the entry side, base units
  held: number;
}

/**
 * Turns approved verdicts into venue orders. Every submission uses a
 * deterministic client order id and is preceded by a lookup, so re-running
 * the same (cycle, instrument, action) never places a second order.
 */
export class TradeExecutor {
  private readonly logger = componentLogger('executor');
  private readonly queue = new KeyedSerialQueue();
  private readonly results = new Map<string, ExecutionResult>();

  constructor(
    private readonly venue: VenueGateway,
    private readonly opts: ExecutorOptions,
  ) {}

  execute(verdict: ExecutableVerdict, ctx: ExecutionContext): Promise<ExecutionResult> {
    const item = verdict.effective;
    const action = item.action;
    if (action === 'hold') {
      return Promise.reject(new Error(`hold item ${verdict.itemIndex} is not executable`));
    }
    const key = idempotencyKey(ctx.cycleId, item.instrument, action);
    const base: ExecutionBase = {
      cycleId: ctx.cycleId,
      itemIndex: verdict.itemIndex,
      instrument: item.instrument,
      action,
      idempotencyKey: key,
    };
    const log = this.logger.child({ cycleId: ctx.cycleId, instrument: item.instrument, action, key });

    return this.queue.run(item.instrument, async () => {
      const cached = this.results.get(key);
      if (cached) {
        log.info('execution already completed; reusing result');
        return cached.status === 'failed' ? cached : { ...cached, reused: true };
      }
      const result =
        action === 'close' ? await this.close(base, ctx, log) : await this.open(base, verdict, ctx, log);
      this.remember(key, result);
      return result;
    });
  }

  private async open(
    base: ExecutionBase,
    verdict: ExecutableVerdict,
    ctx: ExecutionContext,
    log: Logger,
  ): Promise<OpenedExecution | FailedExecution> {
    const item = verdict.effective;
    const price = ctx.snapshot.instruments.find((s) => s.instrument === item.instrument)?.price ?? null;
    if (price === null) return failed(base, 'instrument_unavailable', []);
    if (item.stopLoss === null || item.takeProfit === null) return failed(base, 'missing_protection', []);

    const entrySide: OrderSide = item.action === 'open_long' ? 'buy' : 'sell';
    const exitSide = opposite(entrySide);
    const orders: OrderRecord[] = [];

    try {
      await this.call(`leverage ${item.instrument}`, () => this.venue.setLeverage(item.instrument, item.leverage));
    } catch (err) {
      log.error({ err }, 'set leverage failed');
      return failed(base, `leverage_failed: ${describeError(err)}`, orders);
    }

    const entryId = `${base.idempotencyKey}-e`;
    let entry: Submitted;
    try {
      entry = await this.submit(
        {
          instrument: item.instrument,
          side: entrySide,
          type: 'market',
          quantity: item.sizeUsd / price,
          reduceOnly: false,
          clientOrderId: entryId,
        },
        log,
      );
    } catch (err) {
      if (!isRetryableSubmission(err)) {
        log.error({ err }, 'entry order failed');
        return failed(base, `entry_failed: ${describeError(err)}`, orders);
      }
      // the entry may have reached the venue even though no response did
      log.error({ err }, 'entry outcome unknown; checking venue');
      const settled = await this.settleEntry(item.instrument, entryId, entrySide, log);
      if (!settled) return failed(base, `entry_unverified: ${describeError(err)}`, orders);
      if (!settled.order) {
        if (settled.held > 0) {
          return this.flatten(base, { instrument: item.instrument, side: exitSide, quantity: settled.held }, [], orders, err, log);
        }
        return failed(base, `entry_failed: ${describeError(err)}`, orders);
      }
      entry = { order: settled.order, reused: false };
    }
    orders.push(entry.order);

    let entryOrder = entry.order;
    let held = 0;
    if (isResting(entryOrder)) {
      // market entries should not rest; anything left working is canceled
      const canceled = await this.cancelQuietly(entryOrder, log);
      if (canceled) {
        orders.push(canceled);
        entryOrder = canceled;
      } else {
        // the cancel may have lost a race with the fill, so the order we hold is stale
        const settled = await this.settleEntry(item.instrument, entryId, entrySide, log);
        if (!settled) return failed(base, 'entry_unverified: cancel failed', orders);
        if (settled.order) entryOrder = settled.order;
        held = settled.held;
      }
    }

    const filled = entryOrder.filledQuantity;
    if (!(filled > 0)) {
      if (held > 0) {
        return this.flatten(
          base,
          { instrument: item.instrument, side: exitSide, quantity: held },
          [],
          orders,
          new VenueError(`entry ${entryOrder.orderId} reports no fill but ${held} is held`, 'unknown'),
          log,
        );
      }
      log.warn({ status: entryOrder.status }, 'entry not filled');
      return failed(base, 'entry_not_filled', orders);
    }
    log.info({ filled, avgPrice: entryOrder.avgPrice, sizeUsd: item.sizeUsd }, 'entry filled');

    const landed: OrderRecord[] = [];
    let stopLoss: Submitted;
    let takeProfit: Submitted;
    try {
      stopLoss = await this.protect(
        {
          instrument: item.instrument,
          side: exitSide,
          type: 'stop_market',
          quantity: filled,
          stopPrice: item.stopLoss,
          reduceOnly: true,
          clientOrderId: `${base.idempotencyKey}-sl`,
        },
        log,
      );
      landed.push(stopLoss.order);
      orders.push(stopLoss.order);
      takeProfit = await this.protect(
        {
          instrument: item.instrument,
          side: exitSide,
          type: 'take_profit_market',
          quantity: filled,
          stopPrice: item.takeProfit,
          reduceOnly: true,
          clientOrderId: `${base.idempotencyKey}-tp`,
        },
        log,
      );
      orders.push(takeProfit.order);
    } catch (err) {
      return this.flatten(base, { instrument: item.instrument, side: exitSide, quantity: filled }, landed, orders, err, log);
    }

    return {
      ...base,
      status: 'opened',
      entryOrder,
      stopLossOrder: stopLoss.order,
      takeProfitOrder: takeProfit.order,
      reused: entry.reused,
    };
  }

  private async close(base: ExecutionBase, ctx: ExecutionContext, log: Logger): Promise<ClosedExecution | FailedExecution> {
    const position = ctx.snapshot.positions.find((p) => p.instrument === base.instrument);
    if (!position) return failed(base, 'no_position', []);

    let closeOrder: Submitted;
    try {
      closeOrder = await this.submit(
        {
          instrument: position.instrument,
          side: position.side === 'long' ? 'sell' : 'buy',
          type: 'market',
          quantity: position.quantity,
          reduceOnly: true,
          clientOrderId: `${base.idempotencyKey}-x`,
        },
        log,
      );
    } catch (err) {
      log.error({ err }, 'close order failed');
      return failed(base, `close_failed: ${describeError(err)}`, []);
    }
    if (!(closeOrder.order.filledQuantity > 0)) {
      log.warn({ status: closeOrder.order.status }, 'close not filled');
      return failed(base, 'close_not_filled', [closeOrder.order]);
    }

    const canceledOrderIds: string[] = [];
    const protective = ctx.snapshot.orders.filter(
      (o) => o.instrument === position.instrument && o.reduceOnly && o.status === 'pending',
    );
    for (const order of protective) {
      const canceled = await this.cancelQuietly(order, log);
      if (canceled) canceledOrderIds.push(order.orderId);
    }
    log.info({ quantity: closeOrder.order.filledQuantity, canceledOrderIds }, 'position closed');
    return { ...base, status: 'closed', closeOrder: closeOrder.order, canceledOrderIds, reused: closeOrder.reused };
  }

  /** Cancels whichever protective leg landed and market-closes the filled quantity. */
  private async flatten(
    base: ExecutionBase,
    position: { instrument: string; side: OrderSide; quantity: number },
    landed: OrderRecord[],
    orders: OrderRecord[],
    cause: unknown,
    log: Logger,
  ): Promise<FailedExecution> {
    log.error({ err: cause }, 'protective order failed; closing unprotected position');
    for (const leg of landed) {
      const canceled = await this.cancelQuietly(leg, log);
      if (canceled) orders.push(canceled);
    }
    try {
      const close = await this.submit(
        {
          instrument: position.instrument,
          side: position.side,
          type: 'market',
          quantity: position.quantity,
          reduceOnly: true,
          clientOrderId: `${base.idempotencyKey}-x`,
        },
        log,
      );
      orders.push(close.order);
      if (!(close.order.filledQuantity > 0)) {
        throw new VenueError(`close order ${close.order.orderId} not filled (${close.order.status})`, 'unknown');
      }
      return failed(base, 'unprotected_position_closed', orders);
    } catch (err) {
      log.fatal({ err, quantity: position.quantity }, 'unprotected position could not be closed');
      return failed(base, 'unprotected_position_close_failed', orders);
    }
  }

  /**
   * Re-reads an entry whose outcome is unknown: the order by client id and the
   * position it would have opened. A resting order is canceled first. Null when
   * the venue cannot be reached within the retry budget.
   */
  private async settleEntry(
    instrument: string,
    clientOrderId: string,
    side: OrderSide,
    log: Logger,
  ): Promise<SettledEntry | null> {
    const positionSide = side === 'buy' ? 'long' : 'short';
    try {
      return await withRetries(
        async () => {
          let order = await this.call(`lookup ${clientOrderId}`, () => this.venue.getOrder(instrument, clientOrderId));
          if (order && isResting(order)) order = (await this.cancelQuietly(order, log)) ?? order;
          const positions = await this.call(`positions ${instrument}`, () => this.venue.getPositions());
          const position = positions.find((p) => p.instrument === instrument && p.side === positionSide);
          log.info({ clientOrderId, status: order?.status ?? null, held: position?.quantity ?? 0 }, 'entry settled');
          return { order, held: position?.quantity ?? 0 };
        },
        {
          attempts: this.opts.protectiveAttempts,
          delayMs: this.opts.retryDelayMs,
          isRetryable: isRetryableSubmission,
          label: `settle entry ${instrument}`,
          logger: log,
        },
      );
    } catch (err) {
      log.fatal({ err, clientOrderId }, 'entry outcome could not be verified');
      return null;
    }
  }

  private async protect(spec: OrderSpec, log: Logger): Promise<Submitted> {
    const leg = await this.submit(spec, log);
    if (leg.order.status === 'rejected' || leg.order.status === 'canceled') {
      throw new VenueError(`${spec.type} ${leg.order.orderId} is ${leg.order.status}`, 'rejected');
    }
    return leg;
  }

  private submit(spec: OrderSpec, log: Logger): Promise<Submitted> {
    return withRetries(
      async () => {
        const existing = await this.call(`lookup ${spec.clientOrderId}`, () =>
          this.venue.getOrder(spec.instrument, spec.clientOrderId),
        );
        if (existing) return { order: existing, reused: true };
        const order = await this.call(`place ${spec.clientOrderId}`, () => this.venue.placeOrder(spec));
        log.info({ orderId: order.orderId, clientOrderId: spec.clientOrderId, type: spec.type, status: order.status }, 'order placed');
        return { order, reused: false };
      },
      {
        attempts: this.opts.protectiveAttempts,
        delayMs: this.opts.retryDelayMs,
        isRetryable: isRetryableSubmission,
        label: `submit ${spec.type} ${spec.instrument}`,
        logger: log,
      },
    );
  }

  private async cancelQuietly(order: OrderRecord, log: Logger): Promise<OrderRecord | null> {
    try {
      return await this.call(`cancel ${order.orderId}`, () => this.venue.cancelOrder(order.instrument, order.orderId));
    } catch (err) {
      log.warn({ err, orderId: order.orderId }, 'cancel failed');
      return null;
    }
  }

  // mutating calls never receive the abort signal; only the timeout bounds them
  private call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withTimeout(operation, this.opts.orderTimeoutMs, () => fn());
  }

  private remember(key: string, result: ExecutionResult): void {
    this.results.set(key, result);
    if (this.results.size > MAX_CACHED_RESULTS) {
      const oldest = this.results.keys().next();
      if (!oldest.done) this.results.delete(oldest.value);
    }
  }
}
