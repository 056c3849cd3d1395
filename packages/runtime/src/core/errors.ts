import type { ErrorKind } from "../types/taskState.js";

export class TaskforgeError extends Error {
  public readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = kind;
    this.kind = kind;
  }
}

/** 计划为空或格式不合法：致命，不重试 */
export class PlanningFailureError extends TaskforgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PlanningFailure", message, options);
  }
}

/** 单个步骤执行失败，cause 保留底层原因（ProviderError / SandboxTimeout 等） */
export class StepFailureError extends TaskforgeError {
  public readonly causeKind: ErrorKind;

  constructor(message: string, causeKind: ErrorKind, options?: { cause?: unknown }) {
    super("StepFailure", message, options);
    this.causeKind = causeKind;
  }
}

export class IterationLimitExceededError extends TaskforgeError {
  constructor(limit: number) {
    super("IterationLimitExceeded", `iteration limit exceeded (${limit})`);
  }
}

export class ProviderError extends TaskforgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ProviderError", message, options);
  }
}

export class SandboxTimeoutError extends TaskforgeError {
  constructor(timeoutMs: number) {
    super("SandboxTimeout", `sandbox execution timed out after ${timeoutMs}ms`);
  }
}

export class SandboxFaultError extends TaskforgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("SandboxFault", message, options);
  }
}

export class PersistenceConflictError extends TaskforgeError {
  public readonly taskId: string;

  constructor(taskId: string, expectedVersion: number, actualVersion: number | null) {
    super(
      "PersistenceConflict",
      `task ${taskId} version mismatch (expected ${expectedVersion}, found ${
        actualVersion ?? "none"
      })`
    );
    this.taskId = taskId;
  }
}

/** 存储拒绝覆盖已终结的任务记录 */
export class TerminalStateError extends TaskforgeError {
  public readonly taskId: string;

  constructor(taskId: string, status: string) {
    super("PersistenceConflict", `task ${taskId} is already ${status}`);
    this.taskId = taskId;
  }
}

export class InvalidTransitionError extends TaskforgeError {
  constructor(taskId: string, from: string, to: string) {
    super("Internal", `task ${taskId} cannot move from ${from} to ${to}`);
  }
}

/** 写入的事件日志改动了已落盘的前缀 */
export class EventLogRewriteError extends TaskforgeError {
  constructor(taskId: string, seq: number) {
    super("Internal", `task ${taskId} rewrites event ${seq} of its append-only log`);
  }
}

export class TaskNotFoundError extends TaskforgeError {
  constructor(taskId: string) {
    super("TaskNotFound", `task ${taskId} not found`);
  }
}

export class LeaseUnavailableError extends TaskforgeError {
  constructor(taskId: string) {
    super("LeaseUnavailable", `task ${taskId} is leased by another driver`);
  }
}

export class ConfigError extends TaskforgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ConfigError", message, options);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorKindOf(error: unknown): ErrorKind {
  if (error instanceof StepFailureError) {
    return error.causeKind;
  }
  if (error instanceof TaskforgeError) {
    return error.kind;
  }
  return "Internal";
}
