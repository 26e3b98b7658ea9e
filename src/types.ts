export type FetchStatus = { state: 'ok' } | { state: 'failed'; reason: string };

export interface InstrumentSnapshot {
  instrument: string;
  ts: number;
  // null when the fetch failed; failed instruments are never zero-filled
  price: number | null;
  indicators: Record<string, number>;
  status: FetchStatus;
}

export interface AccountState {
  balance: number; // total wallet balance, USD
  availableBalance: number;
  marginUsed: number;
  unrealizedPnl: number;
  dailyRealizedPnl: number;
  dailyTradeCount: number;
  wins: number;
  losses: number;
}

export type PositionSide = 'long' | 'short';

export interface PositionRecord {
  instrument: string;
  side: PositionSide;
  quantity: number; // absolute, base units
  entryPrice: number;
  markPrice: number;
  leverage: number;
  unrealizedPnl: number;
  stopLossOrderIds: string[];
  takeProfitOrderIds: string[];
}

export type OrderSide = 'buy' | 'sell';
export type OrderType = 'market' | 'limit' | 'stop_market' | 'take_profit_market';
export type OrderStatus = 'pending' | 'filled' | 'partially_filled' | 'canceled' | 'rejected';

export interface OrderRecord {
  orderId: string;
  clientOrderId: string | null;
  instrument: string;
  side: OrderSide;
  type: OrderType;
  quantity: number;
  filledQuantity: number;
  price: number | null;
  stopPrice: number | null;
  avgPrice: number | null;
  reduceOnly: boolean;
  status: OrderStatus;
}

export interface MarketSnapshot {
  ts: number;
  instruments: InstrumentSnapshot[];
  account: AccountState;
  positions: PositionRecord[];
  orders: OrderRecord[];
}

export type DecisionAction = 'open_long' | 'open_short' | 'close' | 'hold';
export type ExecutableAction = Exclude<DecisionAction, 'hold'>;

export interface DecisionItem {
  instrument: string;
  action: DecisionAction;
  sizeUsd: number; // requested notional, USD
  leverage: number;
  stopLoss: number | null;
  takeProfit: number | null;
  confidence: number;
  rationale: string;
}

export interface Decision {
  items: DecisionItem[];
  rationale: string;
  strategyNote: string | null;
}

export type RejectReason =
  | 'low_confidence'
  | 'instrument_unavailable'
  | 'missing_protection'
  | 'invalid_protection'
  | 'duplicate_instrument'
  | 'position_exists'
  | 'max_open_positions'
  | 'below_min_order'
  | 'risk_per_trade_exceeded'
  | 'no_position';

export interface ClampedFields {
  sizeUsd?: number;
  leverage?: number;
}

interface VerdictBase {
  itemIndex: number;
  instrument: string;
  action: DecisionAction;
}

export interface ApprovedVerdict extends VerdictBase {
  verdict: 'approved';
  effective: DecisionItem;
}

export interface ClampedVerdict extends VerdictBase {
  verdict: 'clamped';
  adjusted: ClampedFields;
  effective: DecisionItem;
}

export interface RejectedVerdict extends VerdictBase {
  verdict: 'rejected';
  reason: RejectReason;
}

export type RiskVerdict = ApprovedVerdict | ClampedVerdict | RejectedVerdict;

export interface RiskConfig {
  maxPositionSizeUsd: number;
  maxLeverage: number;
  riskPerTradePct: number;
  maxOpenPositions: number;
  minConfidence: number;
  minOrderUsd: number;
}

interface ExecutionBase {
  cycleId: string;
  itemIndex: number;
  instrument: string;
  action: ExecutableAction;
  idempotencyKey: string;
}

export interface OpenedExecution extends ExecutionBase {
  status: 'opened';
  entryOrder: OrderRecord;
  stopLossOrder: OrderRecord;
  takeProfitOrder: OrderRecord;
  reused: boolean;
}

export interface ClosedExecution extends ExecutionBase {
  status: 'closed';
  closeOrder: OrderRecord;
  canceledOrderIds: string[];
  reused: boolean;
}

export interface FailedExecution extends ExecutionBase {
  status: 'failed';
  reason: string;
  orders: OrderRecord[];
}

export type ExecutionResult = OpenedExecution | ClosedExecution | FailedExecution;

export type CycleStatus = 'completed' | 'completed_with_errors' | 'aborted';
export type CycleStage = 'collect' | 'aggregate' | 'decide' | 'validate' | 'execute' | 'record';

export interface CycleError {
  stage: CycleStage;
  message: string;
  instrument?: string;
}

export interface CycleRecord {
  cycleId: string;
  startedAt: number;
  endedAt: number;
  status: CycleStatus;
  abortReason: string | null;
  decisionServiceId: string;
  // null only when the risk provider itself failed
  riskConfig: RiskConfig | null;
  snapshot: MarketSnapshot | null;
  // decision payload exactly as the service returned it
  rawDecision: string | null;
  decision: Decision | null;
  verdicts: RiskVerdict[];
  executions: ExecutionResult[];
  errors: CycleError[];
}

export interface SkippedCycle {
  status: 'skipped';
  reason: 'cycle_in_progress' | 'lock_unavailable' | 'shutting_down';
}

export type CycleOutcome = CycleRecord | SkippedCycle;
