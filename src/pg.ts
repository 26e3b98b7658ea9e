import { Pool } from 'pg';
import type { CycleRecord } from './types';

// The slice of pg.Pool the mirror uses.
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<unknown>;
  end(): Promise<void>;
}

/** Best-effort Postgres copy of finalized cycles, for dashboards that already live in Postgres. */
export class PgCycleMirror {
  private schema: Promise<void> | null = null;

  constructor(private readonly pool: Queryable) {}

  private ensureSchema(): Promise<void> {
    if (!this.schema) {
      const creating = this.pool
        .query(
          `CREATE TABLE IF NOT EXISTS cycles (
            cycle_id TEXT PRIMARY KEY,
            started_at BIGINT NOT NULL,
            ended_at BIGINT NOT NULL,
            status TEXT NOT NULL,
            abort_reason TEXT,
            decision_service TEXT NOT NULL,
            record JSONB NOT NULL
          );
          CREATE INDEX IF NOT EXISTS idx_cycles_started_at ON cycles(started_at);`,
        )
        .then(() => undefined);
      creating.catch(() => {
        if (this.schema === creating) this.schema = null;
      });
      this.schema = creating;
    }
    return this.schema;
  }

  async mirrorCycle(record: CycleRecord): Promise<void> {
    await this.ensureSchema();
    await this.pool.query(
      `INSERT INTO cycles (cycle_id, started_at, ended_at, status, abort_reason, decision_service, record)
       VALUES ($1,$2,$3,$4,$5,$6,$7)
       ON CONFLICT (cycle_id) DO NOTHING`,
      [
        record.cycleId,
        record.startedAt,
        record.endedAt,
        record.status,
        record.abortReason,
        record.decisionServiceId,
        JSON.stringify(record),
      ],
    );
  }

  close(): Promise<void> {
    return this.pool.end();
  }
}

export function createPgMirror(url: string | undefined): PgCycleMirror | null {
  if (!url) return null;
  return new PgCycleMirror(new Pool({ connectionString: url, ssl: { rejectUnauthorized: false } }));
}
