import Database from "better-sqlite3";
import type { Database as DatabaseInstance } from "better-sqlite3";
import { z } from "zod";
import type { Lease, LeaseManager } from "../types/index.js";
import type { LeaseClockOptions } from "./InMemoryLeaseManager.js";

export interface SqliteLeaseManagerConfig extends LeaseClockOptions {
  databasePath?: string;
  database?: DatabaseInstance;
}

const LeaseRowSchema = z.object({
  task_id: z.string(),
  holder_id: z.string(),
  acquired_at: z.number().int(),
  expires_at: z.number().int(),
});

type LeaseRow = z.infer<typeof LeaseRowSchema>;

/**
 * 每个任务一行租约；其他持有者的租约过期后可被接管。
 */
export class SqliteLeaseManager implements LeaseManager {
  private readonly db: DatabaseInstance;

  private readonly now: () => number;

  constructor(config: SqliteLeaseManagerConfig = {}) {
    this.db = config.database ?? new Database(config.databasePath ?? ":memory:");
    this.now = config.now ?? Date.now;
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS task_leases (
        task_id TEXT PRIMARY KEY,
        holder_id TEXT NOT NULL,
        acquired_at INTEGER NOT NULL,
        expires_at INTEGER NOT NULL
      );
    `);
  }

  async acquire(taskId: string, holderId: string, ttlMs: number): Promise<Lease | null> {
    const take = this.db.transaction((): Lease | null => {
      const now = this.now();
      const current = this.readRow(taskId);
      if (current && current.holder_id !== holderId && current.expires_at > now) {
        return null;
      }
      this.db
        .prepare(
          `INSERT INTO task_leases (task_id, holder_id, acquired_at, expires_at)
           VALUES (?, ?, ?, ?)
           ON CONFLICT(task_id) DO UPDATE SET
             holder_id = excluded.holder_id,
             acquired_at = excluded.acquired_at,
             expires_at = excluded.expires_at`
        )
        .run(taskId, holderId, now, now + ttlMs);
      return { taskId, holderId, acquiredAt: now, expiresAt: now + ttlMs };
    });
    return take();
  }

  async renew(lease: Lease, ttlMs: number): Promise<Lease | null> {
    const expiresAt = this.now() + ttlMs;
    const result = this.db
      .prepare("UPDATE task_leases SET expires_at = ? WHERE task_id = ? AND holder_id = ?")
      .run(expiresAt, lease.taskId, lease.holderId);
    if (result.changes === 0) {
      return null;
    }
    const row = this.readRow(lease.taskId);
    return row ? toLease(row) : null;
  }

  async release(lease: Lease): Promise<void> {
    this.db
      .prepare("DELETE FROM task_leases WHERE task_id = ? AND holder_id = ?")
      .run(lease.taskId, lease.holderId);
  }

  private readRow(taskId: string): LeaseRow | null {
    const raw = this.db.prepare("SELECT * FROM task_leases WHERE task_id = ?").get(taskId);
    return raw === undefined ? null : LeaseRowSchema.parse(raw);
  }
}

function toLease(row: LeaseRow): Lease {
  return {
    taskId: row.task_id,
    holderId: row.holder_id,
    acquiredAt: row.acquired_at,
    expiresAt: row.expires_at,
  };
}
