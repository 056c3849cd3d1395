import {
  EventLogRewriteError,
  InvalidTransitionError,
  PersistenceConflictError,
  TerminalStateError,
} from "../core/errors.js";
import {
  TaskStateSchema,
  canTransition,
  isTerminalStatus,
} from "../types/taskState.js";
import type {
  TaskEvent,
  TaskEventDraft,
  TaskState,
} from "../types/index.js";

function sameEvent(left: TaskEvent, right: TaskEvent): boolean {
  return (
    left.seq === right.seq &&
    left.timestamp === right.timestamp &&
    left.source === right.source &&
    left.kind === right.kind &&
    left.message === right.message &&
    JSON.stringify(left.payload ?? null) === JSON.stringify(right.payload ?? null)
  );
}

/**
 * 乐观并发检查：版本一致、终态不可覆盖、状态单调、事件日志只追加。
 * 返回写入后的新版本号。
 */
export function checkWritable(stored: TaskState | null, next: TaskState): number {
  if (!stored) {
    throw new PersistenceConflictError(next.taskId, next.version, null);
  }
  if (isTerminalStatus(stored.status)) {
    throw new TerminalStateError(stored.taskId, stored.status);
  }
  if (stored.version !== next.version) {
    throw new PersistenceConflictError(next.taskId, next.version, stored.version);
  }
  if (!canTransition(stored.status, next.status)) {
    throw new InvalidTransitionError(next.taskId, stored.status, next.status);
  }
  if (next.events.length < stored.events.length) {
    throw new PersistenceConflictError(next.taskId, next.version, stored.version);
  }
  stored.events.forEach((event, index) => {
    const candidate = next.events[index];
    if (!candidate || !sameEvent(event, candidate)) {
      throw new EventLogRewriteError(next.taskId, event.seq);
    }
  });
  return stored.version + 1;
}

export function buildEvent(
  draft: TaskEventDraft,
  seq: number,
  timestamp: number = Date.now()
): TaskEvent {
  return {
    seq,
    timestamp,
    source: draft.source,
    kind: draft.kind,
    message: draft.message,
    ...(draft.payload ? { payload: draft.payload } : {}),
  };
}

/** 每次读写都经过 schema 校验，保证游标/事件序号不变量 */
export function validateState(state: unknown): TaskState {
  return TaskStateSchema.parse(state);
}
