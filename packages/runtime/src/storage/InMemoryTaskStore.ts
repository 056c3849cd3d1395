import type {
  TaskEvent,
  TaskEventDraft,
  TaskState,
  TaskStore,
} from "../types/index.js";
import { PersistenceConflictError, TaskNotFoundError, TerminalStateError } from "../core/errors.js";
import { isTerminalStatus } from "../types/taskState.js";
import { buildEvent, checkWritable, validateState } from "./taskRecord.js";

export class InMemoryTaskStore implements TaskStore {
  private records = new Map<string, TaskState>();

  async create(state: TaskState): Promise<TaskState> {
    if (this.records.has(state.taskId)) {
      throw new PersistenceConflictError(state.taskId, 0, this.records.get(state.taskId)?.version ?? null);
    }
    const created = validateState({ ...structuredClone(state), version: 1 });
    this.records.set(created.taskId, created);
    return structuredClone(created);
  }

  async save(state: TaskState): Promise<TaskState> {
    const stored = this.records.get(state.taskId) ?? null;
    const version = checkWritable(stored, state);
    const saved = validateState({ ...structuredClone(state), version });
    this.records.set(saved.taskId, saved);
    return structuredClone(saved);
  }

  async load(taskId: string): Promise<TaskState | null> {
    const stored = this.records.get(taskId);
    return stored ? structuredClone(stored) : null;
  }

  async logEvent(taskId: string, draft: TaskEventDraft): Promise<TaskEvent> {
    const stored = this.records.get(taskId);
    if (!stored) {
      throw new TaskNotFoundError(taskId);
    }
    if (isTerminalStatus(stored.status)) {
      throw new TerminalStateError(taskId, stored.status);
    }
    const event = buildEvent(draft, stored.events.length + 1);
    this.records.set(taskId, {
      ...stored,
      events: [...stored.events, event],
      version: stored.version + 1,
      updatedAt: event.timestamp,
    });
    return structuredClone(event);
  }
}
