import type { Decision } from '../types';
import type { DecisionService } from './types';

// Holds every instrument; lets the cycle run end to end without a model.
export function createMockDecisionService(id = 'mock'): DecisionService {
  return {
    id,
    async propose({ snapshot }) {
      const decision: Decision = {
        items: snapshot.instruments.map((s) => ({
          instrument: s.instrument,
          action: 'hold',
          sizeUsd: 0,
          leverage: 1,
          stopLoss: null,
          takeProfit: null,
          confidence: 1,
          rationale: 'mock decision service',
        })),
        rationale: 'hold all instruments',
        strategyNote: null,
      };
      return decision;
    },
  };
}
