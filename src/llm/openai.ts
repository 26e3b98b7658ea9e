import OpenAI from 'openai';
import { DecisionUnavailableError } from '../errors';
import type { DecisionProvider, DecisionRequest, DecisionService } from './types';

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

export interface OpenAIDecisionOptions {
  id: string;
  provider: Exclude<DecisionProvider, 'mock'>;
  apiKey: string;
  model: string;
  baseURL?: string;
  temperature: number;
  maxTokens: number;
  client?: OpenAI;
}

const SYSTEM_PROMPT = [
  'You manage a USD-margined perpetual futures account.',
  'Respond with one JSON object: {"items":[...],"rationale":"...","strategyNote":"..."}.',
  'Each item: {"instrument":"BTCUSDT","action":"open_long|open_short|close|hold","sizeUsd":N,"leverage":N,',
  '"stopLoss":N|null,"takeProfit":N|null,"confidence":0..1,"rationale":"..."}.',
  'sizeUsd is the position notional in USD. Every open_long/open_short needs both stopLoss and takeProfit.',
  'Instruments with a null price have no data this cycle; do not open them.',
  'strategyNote is carried to the next cycle as memory.previousStrategy.',
].join(' ');

export function buildUserMessage(request: DecisionRequest): string {
  const { snapshot, risk, memory } = request;
  return JSON.stringify({
    account: snapshot.account,
    instruments: snapshot.instruments.map((s) => ({
      instrument: s.instrument,
      price: s.price,
      indicators: s.indicators,
      ...(s.status.state === 'failed' ? { unavailable: s.status.reason } : {}),
    })),
    positions: snapshot.positions.map((p) => ({
      instrument: p.instrument,
      side: p.side,
      quantity: p.quantity,
      entryPrice: p.entryPrice,
      markPrice: p.markPrice,
      unrealizedPnl: p.unrealizedPnl,
      leverage: p.leverage,
      protected: p.stopLossOrderIds.length > 0 && p.takeProfitOrderIds.length > 0,
    })),
    limits: risk,
    memory,
  });
}

/** OpenAI-compatible chat completion; also used for OpenRouter. Returns the raw JSON text. */
export function createOpenAIDecisionService(opts: OpenAIDecisionOptions): DecisionService {
  const isOpenRouter = opts.provider === 'openrouter';
  const client =
    opts.client ??
    new OpenAI({
      apiKey: opts.apiKey,
      baseURL: opts.baseURL ?? (isOpenRouter ? OPENROUTER_BASE_URL : undefined),
      defaultHeaders: isOpenRouter ? { 'X-Title': process.env.OPENROUTER_APP_TITLE ?? 'cycle-trader' } : undefined,
      maxRetries: 0,
    });

  return {
    id: opts.id,
    async propose(request, signal) {
      const res = await client.chat.completions.create(
        {
          model: opts.model,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: buildUserMessage(request) },
          ],
          temperature: opts.temperature,
          max_tokens: opts.maxTokens,
          response_format: { type: 'json_object' },
        },
        { signal },
      );
      const content = res.choices[0]?.message?.content;
      if (!content) throw new DecisionUnavailableError(`${opts.id} returned an empty completion`);
      return content;
    },
  };
}
