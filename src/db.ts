import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { componentLogger } from './logger';
import type { PgCycleMirror } from './pg';
import type { CycleRecord, CycleStatus, ExecutionResult } from './types';

const log = componentLogger('db');

export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }
  const db = new Database(dbPath);
  if (dbPath !== ':memory:') db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');
  db.exec(`
    CREATE TABLE IF NOT EXISTS cycles (
      cycle_id TEXT PRIMARY KEY,
      started_at INTEGER NOT NULL,
      ended_at INTEGER NOT NULL,
      status TEXT NOT NULL,
      abort_reason TEXT,
      decision_service TEXT NOT NULL,
      strategy_note TEXT,
      error_count INTEGER NOT NULL,
      record_json TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_cycles_started_at ON cycles(started_at);

    CREATE TABLE IF NOT EXISTS cycle_executions (
      cycle_id TEXT NOT NULL REFERENCES cycles(cycle_id),
      item_index INTEGER NOT NULL,
      instrument TEXT NOT NULL,
      action TEXT NOT NULL,
      status TEXT NOT NULL,
      reason TEXT,
      idempotency_key TEXT NOT NULL,
      entry_order_id TEXT,
      stop_loss_order_id TEXT,
      take_profit_order_id TEXT,
      close_order_id TEXT,
      PRIMARY KEY (cycle_id, item_index)
    );
    CREATE INDEX IF NOT EXISTS idx_cycle_executions_instrument ON cycle_executions(instrument, cycle_id);

    CREATE TABLE IF NOT EXISTS cycle_locks (
      resource TEXT PRIMARY KEY,
      owner TEXT NOT NULL,
      acquired_at INTEGER NOT NULL,
      expires_at INTEGER NOT NULL
    );
  `);
  return db;
}

export interface CycleRepository {
  /** Persists a finalized cycle exactly once; a second append for the same id rejects. */
  append(record: CycleRecord): Promise<void>;
  lastStrategyNote(): Promise<StrategyMemory | null>;
}

export interface StrategyMemory {
  note: string;
  recordedAt: number;
}

export interface CycleSummary {
  cycleId: string;
  startedAt: number;
  endedAt: number;
  status: CycleStatus;
  abortReason: string | null;
  decisionService: string;
  executions: number;
  errors: number;
}

interface CycleRow {
  cycle_id: string;
  started_at: number;
  ended_at: number;
  status: CycleStatus;
  abort_reason: string | null;
  decision_service: string;
  error_count: number;
  executions: number;
}

interface ExecutionRow {
  cycleId: string;
  itemIndex: number;
  instrument: string;
  action: string;
  status: string;
  reason: string | null;
  key: string;
  entry: string | null;
  stopLoss: string | null;
  takeProfit: string | null;
  close: string | null;
}

function executionRow(e: ExecutionResult): ExecutionRow {
  return {
    cycleId: e.cycleId,
    itemIndex: e.itemIndex,
    instrument: e.instrument,
    action: e.action,
    status: e.status,
    reason: e.status === 'failed' ? e.reason : null,
    key: e.idempotencyKey,
    entry: e.status === 'opened' ? e.entryOrder.orderId : null,
    stopLoss: e.status === 'opened' ? e.stopLossOrder.orderId : null,
    takeProfit: e.status === 'opened' ? e.takeProfitOrder.orderId : null,
    close: e.status === 'closed' ? e.closeOrder.orderId : null,
  };
}

export class SqliteCycleRepository implements CycleRepository {
  private readonly write: (record: CycleRecord) => void;

  constructor(
    private readonly db: Database.Database,
    private readonly mirror: PgCycleMirror | null = null,
  ) {
    const cycleStmt = db.prepare(
      `INSERT INTO cycles (cycle_id, started_at, ended_at, status, abort_reason, decision_service, strategy_note, error_count, record_json)
       VALUES (@cycleId, @startedAt, @endedAt, @status, @abortReason, @decisionService, @strategyNote, @errorCount, @json)`,
    );
    const execStmt = db.prepare(
      `INSERT INTO cycle_executions (cycle_id, item_index, instrument, action, status, reason, idempotency_key,
         entry_order_id, stop_loss_order_id, take_profit_order_id, close_order_id)
       VALUES (@cycleId, @itemIndex, @instrument, @action, @status, @reason, @key, @entry, @stopLoss, @takeProfit, @close)`,
    );
    this.write = db.transaction((record: CycleRecord) => {
      cycleStmt.run({
        cycleId: record.cycleId,
        startedAt: record.startedAt,
        endedAt: record.endedAt,
        status: record.status,
        abortReason: record.abortReason,
        decisionService: record.decisionServiceId,
        strategyNote: record.decision?.strategyNote ?? null,
        errorCount: record.errors.length,
        json: JSON.stringify(record),
      });
      for (const e of record.executions) execStmt.run(executionRow(e));
    });
  }

  async append(record: CycleRecord): Promise<void> {
    this.write(record);
    if (this.mirror) {
      this.mirror.mirrorCycle(record).catch((err: unknown) => {
        log.warn({ err, cycleId: record.cycleId }, 'postgres mirror write failed');
      });
    }
  }

  async lastStrategyNote(): Promise<StrategyMemory | null> {
    const row = this.db
      .prepare<[], { strategy_note: string; ended_at: number }>(
        `SELECT strategy_note, ended_at FROM cycles
         WHERE strategy_note IS NOT NULL AND status != 'aborted'
         ORDER BY started_at DESC LIMIT 1`,
      )
      .get();
    return row ? { note: row.strategy_note, recordedAt: row.ended_at } : null;
  }

  listCycles(limit = 20): CycleSummary[] {
    return this.db
      .prepare<[number], CycleRow>(
        `SELECT c.cycle_id, c.started_at, c.ended_at, c.status, c.abort_reason, c.decision_service, c.error_count,
                (SELECT COUNT(*) FROM cycle_executions e WHERE e.cycle_id = c.cycle_id) AS executions
         FROM cycles c ORDER BY c.started_at DESC LIMIT ?`,
      )
      .all(limit)
      .map((r) => ({
        cycleId: r.cycle_id,
        startedAt: r.started_at,
        endedAt: r.ended_at,
        status: r.status,
        abortReason: r.abort_reason,
        decisionService: r.decision_service,
        executions: r.executions,
        errors: r.error_count,
      }));
  }

  getCycle(cycleId: string): CycleRecord | null {
    const row = this.db
      .prepare<[string], { record_json: string }>(`SELECT record_json FROM cycles WHERE cycle_id = ?`)
      .get(cycleId);
    if (!row) return null;
    const record: CycleRecord = JSON.parse(row.record_json);
    return record;
  }
}
