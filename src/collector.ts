import { describeError, isTransient } from './errors';
import type { VenueGateway } from './exchanges/types';
import { componentLogger } from './logger';
import type { InstrumentSnapshot } from './types';
import { deepFreeze, withRetries, withTimeout } from './util/async';

export interface CollectorOptions {
  concurrency: number;
  fetchTimeoutMs: number;
  // additional attempts after the first, transient failures only
  retries: number;
  retryDelayMs: number;
  now?: () => number;
}

export class MarketDataCollector {
  private readonly logger = componentLogger('collector');
  private readonly now: () => number;

  constructor(
    private readonly venue: VenueGateway,
    private readonly opts: CollectorOptions,
  ) {
    this.now = opts.now ?? Date.now;
  }

  /**
   * Fetches price and indicators for every instrument. A failed instrument yields
   * a `failed` snapshot instead of rejecting the whole collection.
   */
  async collect(instruments: readonly string[], signal?: AbortSignal): Promise<ReadonlyMap<string, InstrumentSnapshot>> {
    const out = new Map<string, InstrumentSnapshot>();
    const concurrency = Math.max(1, this.opts.concurrency);
    for (let i = 0; i < instruments.length; i += concurrency) {
      const batch = instruments.slice(i, i + concurrency);
      const snapshots = await Promise.all(batch.map((instrument) => this.fetchOne(instrument, signal)));
      for (const s of snapshots) out.set(s.instrument, s);
    }
    return out;
  }

  private async fetchOne(instrument: string, signal?: AbortSignal): Promise<InstrumentSnapshot> {
    try {
      const market = await withRetries(
        () => withTimeout(`indicators ${instrument}`, this.opts.fetchTimeoutMs, (s) => this.venue.getIndicators(instrument, s), signal),
        {
          attempts: this.opts.retries + 1,
          delayMs: this.opts.retryDelayMs,
          isRetryable: isTransient,
          label: `indicators ${instrument}`,
          logger: this.logger,
          signal,
        },
      );
      if (!Number.isFinite(market.price) || market.price <= 0) {
        return this.failed(instrument, `invalid price ${market.price}`);
      }
      return deepFreeze<InstrumentSnapshot>({
        instrument,
        ts: this.now(),
        price: market.price,
        indicators: { ...market.indicators },
        status: { state: 'ok' },
      });
    } catch (err) {
      return this.failed(instrument, describeError(err));
    }
  }

  private failed(instrument: string, reason: string): InstrumentSnapshot {
    this.logger.warn({ instrument, reason }, 'market data unavailable');
    return deepFreeze<InstrumentSnapshot>({ instrument, ts: this.now(), price: null, indicators: {}, status: { state: 'failed', reason } });
  }
}
