import 'dotenv/config';
import { loadConfig } from '../config';
import { SqliteCycleRepository, openDatabase } from '../db';

function main(): void {
  const limit = Number(process.argv[2] ?? '20');
  const db = openDatabase(loadConfig().DB_PATH);
  try {
    const rows = new SqliteCycleRepository(db).listCycles(limit);
    if (!rows.length) {
      console.log('No cycles recorded yet. Run a cycle first.');
      return;
    }
    console.table(
      rows.map((r) => ({
        Cycle: r.cycleId,
        Started: new Date(r.startedAt).toISOString(),
        Status: r.status,
        Abort: r.abortReason ?? '',
        Executions: r.executions,
        Errors: r.errors,
        Decider: r.decisionService,
      })),
    );
  } finally {
    db.close();
  }
}

main();
