import Database from "better-sqlite3";
import type { Database as DatabaseInstance } from "better-sqlite3";
import { z } from "zod";
import type {
  TaskEvent,
  TaskEventDraft,
  TaskState,
  TaskStore,
} from "../types/index.js";
import {
  PersistenceConflictError,
  TaskNotFoundError,
  TerminalStateError,
} from "../core/errors.js";
import { EventKindSchema, TaskStatusSchema, isTerminalStatus } from "../types/taskState.js";
import { buildEvent, checkWritable, validateState } from "./taskRecord.js";

export interface SqliteTaskStoreConfig {
  databasePath?: string;
  database?: DatabaseInstance;
}

const TaskRowSchema = z.object({
  task_id: z.string(),
  version: z.number().int(),
  status: z.string(),
  state: z.string(),
});

const EventRowSchema = z.object({
  seq: z.number().int(),
  timestamp: z.number().int(),
  source: z.string(),
  kind: EventKindSchema,
  message: z.string(),
  payload: z.string().nullable(),
});

const MaxSeqRowSchema = z.object({ max_seq: z.number().int().nullable() });

/**
 * tasks 表保存不含事件的状态 JSON 与乐观并发版本号；
 * task_events 子表按 seq 追加，永不更新或删除。
 */
export class SqliteTaskStore implements TaskStore {
  private readonly db: DatabaseInstance;

  constructor(config: SqliteTaskStoreConfig = {}) {
    this.db = config.database ?? new Database(config.databasePath ?? ":memory:");
    this.initSchema();
  }

  async create(state: TaskState): Promise<TaskState> {
    const created = validateState({ ...state, version: 1 });
    const insert = this.db.transaction(() => {
      const existing = this.readRow(created.taskId);
      if (existing) {
        throw new PersistenceConflictError(created.taskId, 0, existing.version);
      }
      this.db
        .prepare(
          `INSERT INTO tasks (task_id, version, status, state, updated_at)
           VALUES (?, ?, ?, ?, ?)`
        )
        .run(
          created.taskId,
          created.version,
          created.status,
          encodeState(created),
          created.updatedAt
        );
      this.insertEvents(created.taskId, created.events);
    });
    insert();
    return created;
  }

  async save(state: TaskState): Promise<TaskState> {
    const write = this.db.transaction((): TaskState => {
      const stored = this.loadSync(state.taskId);
      const version = checkWritable(stored, state);
      const saved = validateState({ ...state, version });
      this.db
        .prepare(
          `UPDATE tasks SET version = ?, status = ?, state = ?, updated_at = ?
           WHERE task_id = ? AND version = ?`
        )
        .run(
          saved.version,
          saved.status,
          encodeState(saved),
          saved.updatedAt,
          saved.taskId,
          state.version
        );
      const persistedCount = stored?.events.length ?? 0;
      this.insertEvents(saved.taskId, saved.events.slice(persistedCount));
      return saved;
    });
    return write();
  }

  async load(taskId: string): Promise<TaskState | null> {
    return this.loadSync(taskId);
  }

  async logEvent(taskId: string, draft: TaskEventDraft): Promise<TaskEvent> {
    const append = this.db.transaction((): TaskEvent => {
      const row = this.readRow(taskId);
      if (!row) {
        throw new TaskNotFoundError(taskId);
      }
      const status = TaskStatusSchema.parse(row.status);
      if (isTerminalStatus(status)) {
        throw new TerminalStateError(taskId, status);
      }
      const maxRow = MaxSeqRowSchema.parse(
        this.db
          .prepare("SELECT MAX(seq) AS max_seq FROM task_events WHERE task_id = ?")
          .get(taskId)
      );
      const event = buildEvent(draft, (maxRow.max_seq ?? 0) + 1);
      this.insertEvents(taskId, [event]);
      this.db
        .prepare("UPDATE tasks SET version = version + 1, updated_at = ? WHERE task_id = ?")
        .run(event.timestamp, taskId);
      return event;
    });
    return append();
  }

  public close(): void {
    this.db.close();
  }

  private loadSync(taskId: string): TaskState | null {
    const row = this.readRow(taskId);
    if (!row) {
      return null;
    }
    const events = this.db
      .prepare(
        `SELECT seq, timestamp, source, kind, message, payload
         FROM task_events WHERE task_id = ? ORDER BY seq ASC`
      )
      .all(taskId)
      .map((raw) => decodeEvent(EventRowSchema.parse(raw)));
    const body: unknown = JSON.parse(row.state);
    if (typeof body !== "object" || body === null) {
      throw new PersistenceConflictError(taskId, row.version, null);
    }
    return validateState({ ...body, events, version: row.version });
  }

  private readRow(taskId: string): z.infer<typeof TaskRowSchema> | null {
    const raw = this.db
      .prepare("SELECT task_id, version, status, state FROM tasks WHERE task_id = ?")
      .get(taskId);
    return raw === undefined ? null : TaskRowSchema.parse(raw);
  }

  private insertEvents(taskId: string, events: TaskEvent[]): void {
    const statement = this.db.prepare(
      `INSERT INTO task_events (task_id, seq, timestamp, source, kind, message, payload)
       VALUES (?, ?, ?, ?, ?, ?, ?)`
    );
    for (const event of events) {
      statement.run(
        taskId,
        event.seq,
        event.timestamp,
        event.source,
        event.kind,
        event.message,
        event.payload ? JSON.stringify(event.payload) : null
      );
    }
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS tasks (
        task_id TEXT PRIMARY KEY,
        version INTEGER NOT NULL,
        status TEXT NOT NULL,
        state TEXT NOT NULL,
        updated_at INTEGER NOT NULL
      );
      CREATE TABLE IF NOT EXISTS task_events (
        task_id TEXT NOT NULL REFERENCES tasks(task_id),
        seq INTEGER NOT NULL,
        timestamp INTEGER NOT NULL,
        source TEXT NOT NULL,
        kind TEXT NOT NULL,
        message TEXT NOT NULL,
        payload TEXT,
        PRIMARY KEY (task_id, seq)
      );
    `);
  }
}

function encodeState(state: TaskState): string {
  const { events: _events, version: _version, ...body } = state;
  return JSON.stringify(body);
}

function decodeEvent(row: z.infer<typeof EventRowSchema>): TaskEvent {
  const payload: unknown = row.payload ? JSON.parse(row.payload) : undefined;
  return {
    seq: row.seq,
    timestamp: row.timestamp,
    source: row.source,
    kind: row.kind,
    message: row.message,
    ...(isPayload(payload) ? { payload } : {}),
  };
}

function isPayload(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
