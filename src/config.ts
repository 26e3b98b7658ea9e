import { z } from 'zod';
import { DECISION_PROVIDERS } from './llm/types';
import type { RiskConfig } from './types';

// dotenv turns `KEY=` into an empty string
const optionalString = z.preprocess((v) => (v === '' ? undefined : v), z.string().optional());
const optionalUrl = z.preprocess((v) => (v === '' ? undefined : v), z.string().url().optional());

const configSchema = z
  .object({
    VENUE: z.enum(['paper', 'binance-futures']).default('paper'),
    SYMBOLS: z.string().min(1).default('BTCUSDT,ETHUSDT'),
    CYCLE_INTERVAL_MS: z.coerce.number().int().positive().default(300000),
    CYCLE_LOCK_TTL_MS: z.coerce.number().int().positive().default(900000),
    MARKET_DATA_CONCURRENCY: z.coerce.number().int().positive().default(4),
    FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
    FETCH_RETRIES: z.coerce.number().int().min(0).max(3).default(1),
    RETRY_DELAY_MS: z.coerce.number().int().min(0).default(500),
    AGGREGATION_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
    DECISION_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
    ORDER_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
    PROTECTIVE_ORDER_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(2),
    MAX_POSITION_SIZE_USD: z.coerce.number().positive().default(1000),
    MAX_LEVERAGE: z.coerce.number().int().positive().default(5),
    RISK_PER_TRADE_PCT: z.coerce.number().positive().max(100).default(2),
    MAX_OPEN_POSITIONS: z.coerce.number().int().min(0).default(3),
    MIN_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.7),
    MIN_ORDER_USD: z.coerce.number().min(0).default(10),
    BINANCE_API_KEY: optionalString,
    BINANCE_API_SECRET: optionalString,
    BINANCE_FUTURES_BASE_URL: z.string().url().default('https://testnet.binancefuture.com'),
    BINANCE_RECV_WINDOW: z.coerce.number().int().positive().default(5000),
    PAPER_STARTING_BALANCE: z.coerce.number().min(0).default(10000),
    DECISION_PROVIDER: z.enum(DECISION_PROVIDERS).default('mock'),
    LLM_MODEL: optionalString,
    LLM_API_KEY: optionalString,
    LLM_BASE_URL: optionalUrl,
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
    LLM_MAX_TOKENS: z.coerce.number().int().positive().default(2000),
    DB_PATH: z.string().min(1).default('data/cycles.sqlite'),
    DATABASE_URL: optionalString,
    LOG_LEVEL: z.string().default('info'),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.VENUE === 'binance-futures' && (!cfg.BINANCE_API_KEY || !cfg.BINANCE_API_SECRET)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['BINANCE_API_KEY'],
        message: 'BINANCE_API_KEY and BINANCE_API_SECRET are required for VENUE=binance-futures',
      });
    }
    if (cfg.DECISION_PROVIDER !== 'mock' && (!cfg.LLM_MODEL || !cfg.LLM_API_KEY)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['LLM_MODEL'],
        message: `LLM_MODEL and LLM_API_KEY are required for DECISION_PROVIDER=${cfg.DECISION_PROVIDER}`,
      });
    }
  });

export type AppConfig = z.infer<typeof configSchema> & {
  symbolList: string[];
  riskConfig: RiskConfig;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${parsed.error.toString()}`);
  }
  const cfg = parsed.data;
  return {
    ...cfg,
    symbolList: Array.from(
      new Set(
        cfg.SYMBOLS.split(',')
          .map((s) => s.trim().toUpperCase())
          .filter(Boolean),
      ),
    ),
    riskConfig: {
      maxPositionSizeUsd: cfg.MAX_POSITION_SIZE_USD,
      maxLeverage: cfg.MAX_LEVERAGE,
      riskPerTradePct: cfg.RISK_PER_TRADE_PCT,
      maxOpenPositions: cfg.MAX_OPEN_POSITIONS,
      minConfidence: cfg.MIN_CONFIDENCE,
      minOrderUsd: cfg.MIN_ORDER_USD,
    },
  };
}
