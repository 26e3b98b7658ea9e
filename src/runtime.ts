import type Database from 'better-sqlite3';
import { StateAggregator } from './aggregator';
import { MarketDataCollector } from './collector';
import type { AppConfig } from './config';
import { SqliteCycleRepository, openDatabase } from './db';
import { loadDecisionService } from './decisionLoader';
import { BinanceFuturesGateway } from './exchanges/binance';
import { PaperVenue } from './exchanges/paper';
import type { VenueGateway } from './exchanges/types';
import { TradeExecutor } from './executor';
import { SqliteCycleLock } from './lock';
import { CycleOrchestrator } from './orchestrator';
import { createPgMirror } from './pg';
import type { PgCycleMirror } from './pg';

export interface Runtime {
  cfg: AppConfig;
  venue: VenueGateway;
  db: Database.Database;
  repository: SqliteCycleRepository;
  orchestrator: CycleOrchestrator;
  close(): Promise<void>;
}

export function createVenue(cfg: AppConfig): VenueGateway {
  if (cfg.VENUE === 'binance-futures') {
    return new BinanceFuturesGateway({
      baseURL: cfg.BINANCE_FUTURES_BASE_URL,
      apiKey: cfg.BINANCE_API_KEY,
      apiSecret: cfg.BINANCE_API_SECRET,
      recvWindow: cfg.BINANCE_RECV_WINDOW,
      timeoutMs: cfg.FETCH_TIMEOUT_MS,
    });
  }
  // paper trading still marks to live public market data
  const marketData = new BinanceFuturesGateway({ baseURL: cfg.BINANCE_FUTURES_BASE_URL, timeoutMs: cfg.FETCH_TIMEOUT_MS });
  return new PaperVenue({
    startingBalance: cfg.PAPER_STARTING_BALANCE,
    indicatorSource: (instrument, signal) => marketData.getIndicators(instrument, signal),
  });
}

export function createRuntime(cfg: AppConfig): Runtime {
  const venue = createVenue(cfg);
  const db = openDatabase(cfg.DB_PATH);
  const mirror: PgCycleMirror | null = createPgMirror(cfg.DATABASE_URL);
  const repository = new SqliteCycleRepository(db, mirror);
  const orchestrator = new CycleOrchestrator(
    {
      instruments: cfg.symbolList,
      collector: new MarketDataCollector(venue, {
        concurrency: cfg.MARKET_DATA_CONCURRENCY,
        fetchTimeoutMs: cfg.FETCH_TIMEOUT_MS,
        retries: cfg.FETCH_RETRIES,
        retryDelayMs: cfg.RETRY_DELAY_MS,
      }),
      aggregator: new StateAggregator(venue, { timeoutMs: cfg.AGGREGATION_TIMEOUT_MS }),
      decisionService: loadDecisionService(cfg),
      executor: new TradeExecutor(venue, {
        orderTimeoutMs: cfg.ORDER_TIMEOUT_MS,
        protectiveAttempts: cfg.PROTECTIVE_ORDER_ATTEMPTS,
        retryDelayMs: cfg.RETRY_DELAY_MS,
      }),
      repository,
      lock: new SqliteCycleLock(db),
      riskConfig: () => cfg.riskConfig,
    },
    { lockTtlMs: cfg.CYCLE_LOCK_TTL_MS, decisionTimeoutMs: cfg.DECISION_TIMEOUT_MS },
  );

  return {
    cfg,
    venue,
    db,
    repository,
    orchestrator,
    async close() {
      await orchestrator.stop();
      if (mirror) await mirror.close();
      db.close();
    },
  };
}
