import type { MarketSnapshot, RiskConfig } from '../types';

export const DECISION_PROVIDERS = ['openai', 'openrouter', 'mock'] as const;
export type DecisionProvider = (typeof DECISION_PROVIDERS)[number];

export interface DecisionRequest {
  snapshot: MarketSnapshot;
  risk: RiskConfig;
  memory: {
    previousStrategy: string | null;
    lastCycleAt: number | null;
  };
}

/**
 * Produces a raw decision payload for a snapshot. The payload is untrusted:
 * the orchestrator validates it before anything reads it.
 */
export interface DecisionService {
  id: string;
  propose(request: DecisionRequest, signal: AbortSignal): Promise<unknown>;
}
