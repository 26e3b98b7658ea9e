import type { AppConfig } from './config';
import { createMockDecisionService } from './llm/mock';
import { createOpenAIDecisionService } from './llm/openai';
import type { DecisionService } from './llm/types';

export function loadDecisionService(cfg: AppConfig): DecisionService {
  const provider = cfg.DECISION_PROVIDER;
  if (provider === 'mock') return createMockDecisionService();
  if (!cfg.LLM_MODEL || !cfg.LLM_API_KEY) {
    throw new Error(`LLM_MODEL and LLM_API_KEY are required for DECISION_PROVIDER=${provider}`);
  }
  return createOpenAIDecisionService({
    id: `${provider}:${cfg.LLM_MODEL}`,
    provider,
    apiKey: cfg.LLM_API_KEY,
    model: cfg.LLM_MODEL,
    baseURL: cfg.LLM_BASE_URL,
    temperature: cfg.LLM_TEMPERATURE,
    maxTokens: cfg.LLM_MAX_TOKENS,
  });
}
