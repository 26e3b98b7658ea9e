import { randomUUID } from 'crypto';
import os from 'os';
import type { StateAggregator, VenueState } from './aggregator';
import type { MarketDataCollector } from './collector';
import type { CycleRepository, StrategyMemory } from './db';
import { AbortedError, describeError } from './errors';
import { idempotencyKey } from './executor';
import type { TradeExecutor } from './executor';
import type { DecisionService } from './llm/types';
import { parseDecision } from './llm/decisionSchema';
import type { CycleLock } from './lock';
import { componentLogger } from './logger';
import type { Logger } from './logger';
import { evaluate, isActionable } from './risk';
import type {
  CycleError,
  CycleOutcome,
  CycleRecord,
  CycleStatus,
  Decision,
  ExecutionResult,
  InstrumentSnapshot,
  MarketSnapshot,
  RiskConfig,
  RiskVerdict,
  SkippedCycle,
} from './types';
import { withRetries, withTimeout } from './util/async';

export const CYCLE_LOCK_RESOURCE = 'execution-cycle';
const MIN_INTERVAL_MS = 5_000;

export interface OrchestratorDeps {
  instruments: readonly string[];
  collector: MarketDataCollector;
  aggregator: StateAggregator;
  decisionService: DecisionService;
  executor: TradeExecutor;
  repository: CycleRepository;
  lock: CycleLock;
  // resolved once at the start of every cycle
  riskConfig: () => RiskConfig;
}

export interface OrchestratorOptions {
  lockTtlMs: number;
  decisionTimeoutMs: number;
  recordAttempts?: number;
  recordRetryDelayMs?: number;
  owner?: string;
  now?: () => number;
  newCycleId?: () => string;
}

interface CycleDraft {
  cycleId: string;
  startedAt: number;
  decisionServiceId: string;
  riskConfig: RiskConfig | null;
  snapshot: MarketSnapshot | null;
  rawDecision: string | null;
  decision: Decision | null;
  verdicts: RiskVerdict[];
  executions: ExecutionResult[];
  errors: CycleError[];
}

interface InFlight {
  controller: AbortController;
  done: Promise<CycleRecord>;
}

export class CycleOrchestrator {
  private readonly logger = componentLogger('orchestrator');
  private readonly owner: string;
  private readonly now: () => number;
  private readonly newCycleId: () => string;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: InFlight | null = null;
  private stopping = false;

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly opts: OrchestratorOptions,
  ) {
    this.owner = opts.owner ?? `${os.hostname()}:${process.pid}`;
    this.now = opts.now ?? Date.now;
    this.newCycleId = opts.newCycleId ?? randomUUID;
  }

  /**
   * Runs one cycle under the single-flight lock. Never rejects: failures end up
   * in the returned CycleRecord, and a held lock yields a `skipped` outcome.
   */
  async runCycle(): Promise<CycleOutcome> {
    if (this.stopping) return this.skip('shutting_down');
    const cycleId = this.newCycleId();
    const holder = `${this.owner}:${cycleId}`;
    let acquired: boolean;
    try {
      acquired = await this.deps.lock.tryAcquire(CYCLE_LOCK_RESOURCE, holder, this.opts.lockTtlMs);
    } catch (err) {
      this.logger.error({ err, cycleId }, 'cycle lock unavailable');
      return this.skip('lock_unavailable');
    }
    if (!acquired) return this.skip('cycle_in_progress');

    const controller = new AbortController();
    const done = this.runLocked(cycleId, controller.signal);
    const inFlight: InFlight = { controller, done };
    this.inFlight = inFlight;
    try {
      return await done;
    } finally {
      if (this.inFlight === inFlight) this.inFlight = null;
      try {
        await this.deps.lock.release(CYCLE_LOCK_RESOURCE, holder);
      } catch (err) {
        this.logger.error({ err, cycleId }, 'cycle lock release failed; lease will expire');
      }
    }
  }

  start(intervalMs: number): void {
    if (this.timer) return;
    this.stopping = false;
    const interval = Math.max(intervalMs, MIN_INTERVAL_MS);
    this.logger.info({ intervalMs: interval, instruments: this.deps.instruments }, 'orchestrator start');
    this.trigger();
    this.timer = setInterval(() => this.trigger(), interval);
  }

  /** Stops scheduling, cancels read-only work of the running cycle and waits for it to be recorded. */
  async stop(): Promise<void> {
    this.stopping = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    const current = this.inFlight;
    if (!current) return;
    this.logger.info('waiting for in-flight cycle');
    current.controller.abort();
    await current.done;
  }

  private trigger(): void {
    this.runCycle().catch((err: unknown) => {
      this.logger.error({ err }, 'cycle rejected unexpectedly');
    });
  }

  private skip(reason: SkippedCycle['reason']): SkippedCycle {
    this.logger.info({ reason }, 'cycle skipped');
    return { status: 'skipped', reason };
  }

  private async runLocked(cycleId: string, signal: AbortSignal): Promise<CycleRecord> {
    const log = this.logger.child({ cycleId });
    const draft: CycleDraft = {
      cycleId,
      startedAt: this.now(),
      decisionServiceId: this.deps.decisionService.id,
      riskConfig: null,
      snapshot: null,
      rawDecision: null,
      decision: null,
      verdicts: [],
      executions: [],
      errors: [],
    };
    log.info({ instruments: this.deps.instruments.length }, 'cycle start');

    let record: CycleRecord;
    try {
      record = await this.phases(draft, signal, log);
    } catch (err) {
      log.error({ err }, 'cycle failed unexpectedly');
      record = this.finalize(draft, 'aborted', `internal_error: ${describeError(err)}`);
    }

    await this.persist(record, log);
    log.info(
      {
        status: record.status,
        abortReason: record.abortReason,
        executions: record.executions.length,
        durationMs: record.endedAt - record.startedAt,
      },
      'cycle end',
    );
    return record;
  }

  private async phases(draft: CycleDraft, signal: AbortSignal, log: Logger): Promise<CycleRecord> {
    const riskConfig = this.deps.riskConfig();
    draft.riskConfig = riskConfig;

    const [collected, venue] = await Promise.allSettled([
      this.deps.collector.collect(this.deps.instruments, signal),
      this.deps.aggregator.fetchVenueState(signal),
    ]);
    if (signal.aborted) return this.finalize(draft, 'aborted', 'shutdown');
    if (collected.status === 'rejected') {
      draft.errors.push({ stage: 'collect', message: describeError(collected.reason) });
      return this.finalize(draft, 'aborted', 'aggregation_failed');
    }
    for (const s of collected.value.values()) {
      if (s.status.state === 'failed') {
        draft.errors.push({ stage: 'collect', instrument: s.instrument, message: s.status.reason });
      }
    }
    if (venue.status === 'rejected') {
      draft.errors.push({ stage: 'aggregate', message: describeError(venue.reason) });
      return this.finalize(draft, 'aborted', 'aggregation_failed');
    }

    const snapshot = this.merge(collected.value, venue.value, draft, log);
    if (!snapshot) return this.finalize(draft, 'aborted', 'aggregation_failed');
    draft.snapshot = snapshot;
    if (!(snapshot.account.balance > 0)) {
      log.warn({ balance: snapshot.account.balance }, 'no balance; skipping decision');
      return this.finalize(draft, 'aborted', 'no_balance');
    }

    const memory = await this.strategyMemory(log);
    let payload: unknown;
    try {
      payload = await withTimeout(
        `decision ${this.deps.decisionService.id}`,
        this.opts.decisionTimeoutMs,
        (s) =>
          this.deps.decisionService.propose(
            {
              snapshot,
              risk: riskConfig,
              memory: { previousStrategy: memory?.note ?? null, lastCycleAt: memory?.recordedAt ?? null },
            },
            s,
          ),
        signal,
      );
    } catch (err) {
      if (err instanceof AbortedError) return this.finalize(draft, 'aborted', 'shutdown');
      log.error({ err }, 'decision service failed');
      draft.errors.push({ stage: 'decide', message: describeError(err) });
      return this.finalize(draft, 'aborted', 'decision_unavailable');
    }
    draft.rawDecision = rawPayload(payload);

    let decision: Decision;
    try {
      decision = parseDecision(payload);
    } catch (err) {
      log.error({ err }, 'decision payload rejected');
      draft.errors.push({ stage: 'decide', message: describeError(err) });
      return this.finalize(draft, 'aborted', 'decision_invalid');
    }
    draft.decision = decision;
    if (signal.aborted) return this.finalize(draft, 'aborted', 'shutdown');

    const verdicts = evaluate(decision, snapshot, riskConfig);
    draft.verdicts = verdicts;
    for (const v of verdicts) {
      if (v.verdict === 'rejected') {
        log.info({ itemIndex: v.itemIndex, instrument: v.instrument, action: v.action, reason: v.reason }, 'item rejected');
      } else if (v.verdict === 'clamped') {
        log.info({ itemIndex: v.itemIndex, instrument: v.instrument, adjusted: v.adjusted }, 'item clamped');
      }
    }

    const actionable = verdicts.filter(isActionable);
    draft.executions = await Promise.all(
      actionable.map((v) =>
        this.deps.executor.execute(v, { cycleId: draft.cycleId, snapshot }).catch(
          (err: unknown): ExecutionResult => ({
            cycleId: draft.cycleId,
            itemIndex: v.itemIndex,
            instrument: v.instrument,
            action: v.action,
            idempotencyKey: idempotencyKey(draft.cycleId, v.instrument, v.action),
            status: 'failed',
            reason: `executor_error: ${describeError(err)}`,
            orders: [],
          }),
        ),
      ),
    );
    for (const e of draft.executions) {
      if (e.status === 'failed') draft.errors.push({ stage: 'execute', instrument: e.instrument, message: e.reason });
    }
    const failed = draft.executions.some((e) => e.status === 'failed');
    return this.finalize(draft, failed ? 'completed_with_errors' : 'completed', null);
  }

  private merge(
    collected: ReadonlyMap<string, InstrumentSnapshot>,
    venue: VenueState,
    draft: CycleDraft,
    log: Logger,
  ): MarketSnapshot | null {
    try {
      return this.deps.aggregator.merge(collected, venue);
    } catch (err) {
      log.error({ err }, 'snapshot merge failed');
      draft.errors.push({ stage: 'aggregate', message: describeError(err) });
      return null;
    }
  }

  private async strategyMemory(log: Logger): Promise<StrategyMemory | null> {
    try {
      return await this.deps.repository.lastStrategyNote();
    } catch (err) {
      log.warn({ err }, 'previous strategy unavailable');
      return null;
    }
  }

  private finalize(draft: CycleDraft, status: CycleStatus, abortReason: string | null): CycleRecord {
    return { ...draft, endedAt: this.now(), status, abortReason };
  }

  private async persist(record: CycleRecord, log: Logger): Promise<void> {
    try {
      await withRetries(() => this.deps.repository.append(record), {
        attempts: this.opts.recordAttempts ?? 3,
        delayMs: this.opts.recordRetryDelayMs ?? 200,
        isRetryable: () => true,
        label: 'record cycle',
        logger: log,
      });
    } catch (err) {
      log.fatal({ err, record }, 'cycle record could not be persisted');
    }
  }
}

/** The decision payload as received, kept on the record for audit. */
function rawPayload(payload: unknown): string | null {
  if (typeof payload === 'string') return payload;
  if (payload === undefined) return null;
  try {
    return JSON.stringify(payload) ?? null;
  } catch {
    return String(payload);
  }
}
