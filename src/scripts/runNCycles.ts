import 'dotenv/config';
import { loadConfig } from '../config';
import { logger } from '../logger';
import { createRuntime } from '../runtime';
import { sleep } from '../util/async';

function getArg(name: string, fallback?: string): string | undefined {
  const p = process.argv.find((v) => v.startsWith(name + '='));
  return p ? p.slice(name.length + 1) : fallback;
}

async function main(): Promise<void> {
  const count = Number(getArg('--count', '2'));
  const delayMs = Number(getArg('--delay', '10000'));
  const runtime = createRuntime(loadConfig());
  try {
    for (let i = 0; i < count; i++) {
      logger.info({ cycle: i + 1, of: count }, 'running cycle');
      const outcome = await runtime.orchestrator.runCycle();
      logger.info({ status: outcome.status }, 'cycle finished');
      if (i < count - 1) await sleep(delayMs);
    }
  } finally {
    await runtime.close();
  }
  logger.info('runNCycles completed');
}

main().catch((err) => {
  logger.error({ err }, 'runNCycles failed');
  process.exit(1);
});
