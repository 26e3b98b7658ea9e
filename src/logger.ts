import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

export const logger = pino({ level: process.env.LOG_LEVEL ?? 'info' });

export function componentLogger(component: string): Logger {
  return logger.child({ component });
}
