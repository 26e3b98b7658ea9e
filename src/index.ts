import 'dotenv/config';
import { loadConfig } from './config';
import { logger } from './logger';
import { createRuntime } from './runtime';

async function main(): Promise<void> {
  const cfg = loadConfig();
  logger.info({ venue: cfg.VENUE, decisionProvider: cfg.DECISION_PROVIDER, symbols: cfg.symbolList }, 'cycle-trader starting');
  const runtime = createRuntime(cfg);
  runtime.orchestrator.start(cfg.CYCLE_INTERVAL_MS);

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'shutting down');
    runtime
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, 'shutdown failed');
        process.exit(1);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
  process.on('unhandledRejection', (err) => {
    logger.error({ err }, 'unhandled rejection');
  });
}

main().catch((err) => {
  logger.error({ err }, 'fatal error');
  process.exit(1);
});
