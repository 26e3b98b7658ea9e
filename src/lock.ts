import type Database from 'better-sqlite3';

/**
 * Single-flight guard. `tryAcquire` is an atomic check-and-set: it succeeds only
 * when the resource is free or the previous lease has expired.
 */
export interface CycleLock {
  tryAcquire(resource: string, owner: string, ttlMs: number): Promise<boolean>;
  // a no-op unless `owner` still holds the lease
  release(resource: string, owner: string): Promise<void>;
}

export class SqliteCycleLock implements CycleLock {
  private readonly acquireStmt: Database.Statement<[string, string, number, number, number]>;
  private readonly releaseStmt: Database.Statement<[string, string]>;

  constructor(
    db: Database.Database,
    private readonly now: () => number = Date.now,
  ) {
    this.acquireStmt = db.prepare<[string, string, number, number, number]>(
      `INSERT INTO cycle_locks (resource, owner, acquired_at, expires_at) VALUES (?, ?, ?, ?)
       ON CONFLICT(resource) DO UPDATE SET
         owner = excluded.owner,
         acquired_at = excluded.acquired_at,
         expires_at = excluded.expires_at
       WHERE cycle_locks.expires_at <= ?`,
    );
    this.releaseStmt = db.prepare<[string, string]>(`DELETE FROM cycle_locks WHERE resource = ? AND owner = ?`);
  }

  async tryAcquire(resource: string, owner: string, ttlMs: number): Promise<boolean> {
    const now = this.now();
    return this.acquireStmt.run(resource, owner, now, now + ttlMs, now).changes === 1;
  }

  async release(resource: string, owner: string): Promise<void> {
    this.releaseStmt.run(resource, owner);
  }
}

export class InMemoryCycleLock implements CycleLock {
  private readonly leases = new Map<string, { owner: string; expiresAt: number }>();

  constructor(private readonly now: () => number = Date.now) {}

  async tryAcquire(resource: string, owner: string, ttlMs: number): Promise<boolean> {
    const now = this.now();
    const lease = this.leases.get(resource);
    if (lease && lease.expiresAt > now) return false;
    this.leases.set(resource, { owner, expiresAt: now + ttlMs });
    return true;
  }

  async release(resource: string, owner: string): Promise<void> {
    if (this.leases.get(resource)?.owner === owner) this.leases.delete(resource);
  }
}
