import type { Subject } from "rxjs";
import type {
  Lease,
  LeaseManager,
  TaskEvent,
  TaskEventDraft,
  TaskState,
  TaskStore,
} from "../types/index.js";
import type { EventBus } from "../event/EventBus.js";
import {
  LeaseUnavailableError,
  PersistenceConflictError,
  TaskNotFoundError,
  describeError,
} from "./errors.js";
import { buildEvent } from "../storage/taskRecord.js";

/** 对任务状态的一次原地修改，冲突重放时会在重新加载的状态上再次执行 */
export type TaskMutation = (draft: TaskState) => void;

export interface TaskContextOptions {
  state: TaskState;
  store: TaskStore;
  eventBus: EventBus;
  snapshots: Subject<TaskState>;
  lease: Lease | null;
  leaseManager: LeaseManager;
  leaseTtlMs: number;
  maxConflictRetries: number;
  now?: () => number;
}

/**
 * 单个驱动器持有的任务状态工作副本。
 * 所有修改经 mutate 记录；checkpoint 时按乐观并发写入存储，
 * 版本冲突时重新加载并重放尚未落盘的修改。
 */
export class TaskContext {
  private state: TaskState;

  private pending: TaskMutation[] = [];

  private lease: Lease | null;

  private leaseLost = false;

  private renewing = false;

  private readonly options: TaskContextOptions;

  private readonly now: () => number;

  constructor(options: TaskContextOptions) {
    this.options = options;
    this.state = structuredClone(options.state);
    this.lease = options.lease;
    this.now = options.now ?? Date.now;
  }

  public get taskId(): string {
    return this.state.taskId;
  }

  /** 只读视图；修改必须走 mutate */
  public get current(): Readonly<TaskState> {
    return this.state;
  }

  public snapshot(): TaskState {
    return structuredClone(this.state);
  }

  public mutate(mutation: TaskMutation): void {
    mutation(this.state);
    this.state.updatedAt = this.now();
    this.pending.push(mutation);
  }

  public appendEvent(draft: TaskEventDraft): TaskEvent {
    const timestamp = this.now();
    this.mutate((draftState) => {
      draftState.events.push(buildEvent(draft, draftState.events.length + 1, timestamp));
    });
    const event = buildEvent(draft, this.state.events.length, timestamp);
    this.options.eventBus.publish("task.event", this.taskId, { event });
    const level = draft.kind === "error" ? "error" : draft.kind === "warning" ? "warn" : "info";
    console[level](`[Task ${this.taskId}] ${draft.source}: ${draft.message}`);
    return event;
  }

  /**
   * 每次写入前先续租；租约已被接管时直接放弃，不再重放本地修改。
   * 版本冲突时最多重试 maxConflictRetries 次。
   */
  public async checkpoint(): Promise<TaskState> {
    let conflicts = 0;
    let stale = false;
    for (;;) {
      await this.renewLease();
      if (stale) {
        await this.reloadAndReplay();
      }
      try {
        const saved = await this.options.store.save(this.state);
        this.state = saved;
        this.pending = [];
        break;
      } catch (error) {
        if (!(error instanceof PersistenceConflictError) || conflicts >= this.options.maxConflictRetries) {
          throw error;
        }
        conflicts += 1;
        stale = true;
        console.warn(
          `[TaskContext] Version conflict on ${this.taskId}, replaying ${this.pending.length} change(s) (attempt ${conflicts})`
        );
      }
    }

    this.options.eventBus.publish("task.checkpoint", this.taskId, {
      version: this.state.version,
      status: this.state.status,
      cursor: this.state.cursor,
      iteration: this.state.iteration,
    });
    this.options.snapshots.next(this.snapshot());
    return this.snapshot();
  }

  /**
   * 在 work 执行期间按 TTL 的三分之一定时续租。
   * 心跳发现租约丢失后，下一次 checkpoint 会抛出 LeaseUnavailableError。
   */
  public async keepLeaseAlive<T>(work: () => Promise<T>): Promise<T> {
    if (!this.lease) {
      return work();
    }
    const timer = setInterval(
      () => this.heartbeat(),
      Math.max(1, Math.floor(this.options.leaseTtlMs / 3))
    );
    try {
      return await work();
    } finally {
      clearInterval(timer);
    }
  }

  /** 从存储重新读取取消标记，不影响未落盘的修改 */
  public async refreshCancelFlag(): Promise<boolean> {
    const stored = await this.options.store.load(this.taskId);
    if (!stored) {
      throw new TaskNotFoundError(this.taskId);
    }
    if (stored.cancelRequested && !this.state.cancelRequested) {
      this.mutate((draft) => {
        draft.cancelRequested = true;
      });
    }
    return this.state.cancelRequested;
  }

  private async reloadAndReplay(): Promise<void> {
    const stored = await this.options.store.load(this.taskId);
    if (!stored) {
      throw new TaskNotFoundError(this.taskId);
    }
    const replayed = structuredClone(stored);
    for (const mutation of this.pending) {
      mutation(replayed);
    }
    replayed.updatedAt = this.now();
    this.state = replayed;
  }

  private async renewLease(): Promise<void> {
    if (!this.lease) {
      return;
    }
    if (this.leaseLost) {
      throw new LeaseUnavailableError(this.taskId);
    }
    const renewed = await this.options.leaseManager.renew(this.lease, this.options.leaseTtlMs);
    if (!renewed) {
      this.leaseLost = true;
      throw new LeaseUnavailableError(this.taskId);
    }
    this.lease = renewed;
  }

  private heartbeat(): void {
    const lease = this.lease;
    if (!lease || this.leaseLost || this.renewing) {
      return;
    }
    this.renewing = true;
    void this.options.leaseManager
      .renew(lease, this.options.leaseTtlMs)
      .then((renewed) => {
        if (renewed) {
          this.lease = renewed;
        } else {
          this.leaseLost = true;
          console.warn(`[TaskContext] Lease on ${this.taskId} was taken over during a step`);
        }
      })
      .catch((error: unknown) => {
        console.warn(`[TaskContext] Lease heartbeat for ${this.taskId} failed: ${describeError(error)}`);
      })
      .finally(() => {
        this.renewing = false;
      });
  }
}
