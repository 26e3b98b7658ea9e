import { z } from 'zod';
import { DataIntegrityError } from '../errors';
import type { Decision } from '../types';

const price = z.number().finite().positive();

const itemSchema = z.object({
  instrument: z
    .string()
    .min(1)
    .transform((s) => s.trim().toUpperCase()),
  action: z.enum(['open_long', 'open_short', 'close', 'hold']),
  sizeUsd: z.number().finite().nonnegative().default(0),
  leverage: z.number().int().positive().default(1),
  stopLoss: price.nullable().default(null),
  takeProfit: price.nullable().default(null),
  confidence: z.number().min(0).max(1),
  rationale: z.string().default(''),
});

export const decisionSchema = z.object({
  items: z.array(itemSchema),
  rationale: z.string().default(''),
  strategyNote: z.string().nullable().default(null),
});

/** Accepts a decoded object or a JSON string; anything that does not match throws DataIntegrityError. */
export function parseDecision(payload: unknown): Decision {
  let value = payload;
  if (typeof payload === 'string') {
    try {
      value = JSON.parse(payload);
    } catch (err) {
      throw new DataIntegrityError('decision payload is not valid JSON', { cause: err });
    }
  }
  const parsed = decisionSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join('.') || '(root)' : '(root)';
    throw new DataIntegrityError(`invalid decision at ${where}: ${issue?.message ?? 'unknown'}`, { cause: parsed.error });
  }
  return parsed.data;
}
