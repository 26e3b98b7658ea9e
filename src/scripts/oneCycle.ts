import 'dotenv/config';
import { loadConfig } from '../config';
import { logger } from '../logger';
import { createRuntime } from '../runtime';

async function main(): Promise<void> {
  const runtime = createRuntime(loadConfig());
  try {
    const outcome = await runtime.orchestrator.runCycle();
    if (outcome.status === 'skipped') {
      logger.warn({ reason: outcome.reason }, 'cycle skipped');
      return;
    }
    logger.info(
      { cycleId: outcome.cycleId, status: outcome.status, abortReason: outcome.abortReason, executions: outcome.executions.length },
      'one cycle completed',
    );
  } finally {
    await runtime.close();
  }
}

main().catch((err) => {
  logger.error({ err }, 'oneCycle failed');
  process.exit(1);
});
