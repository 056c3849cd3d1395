import { nanoid } from "nanoid";
import { Subject } from "rxjs";
import { createActor } from "xstate";
import type {
  AgentRegistry,
  DriveOptions,
  DriveResult,
  LeaseManager,
  LoopPhase,
  ObjectStore,
  Reflector,
  RuntimeEventStream,
  SubmitOptions,
  TaskEvent,
  TaskHandle,
  TaskQueue,
  TaskState,
  TaskStateView,
  TaskStore,
} from "../types/index.js";
import { createInitialTaskState, isTerminalStatus } from "../types/taskState.js";
import type { EngineConfig } from "../config/EngineConfig.js";
import { EventBus } from "../event/EventBus.js";
import type { CaseLibrary } from "../cbr/CaseLibrary.js";
import { StepContextBuilder } from "../context/StepContextBuilder.js";
import { StepReflector } from "../reflector/StepReflector.js";
import { InMemoryTaskQueue } from "../queue/InMemoryTaskQueue.js";
import { buildEvent } from "../storage/taskRecord.js";
import { createLoopRun, createTaskMachine, isLoopPhase } from "../fsm/taskMachine.js";
import type { LoopDeps, LoopRun } from "../fsm/taskMachine.js";
import { Executor } from "./Executor.js";
import { TaskContext } from "./TaskContext.js";
import {
  LeaseUnavailableError,
  PersistenceConflictError,
  TaskNotFoundError,
  TerminalStateError,
  describeError,
} from "./errors.js";

export interface OrchestratorOptions {
  config: EngineConfig;
  store: TaskStore;
  leaseManager: LeaseManager;
  agentRegistry: AgentRegistry;
  caseLibrary: CaseLibrary;
  objectStore: ObjectStore;
  queue?: TaskQueue;
  reflector?: Reflector;
  contextBuilder?: StepContextBuilder;
  eventBus?: EventBus;
  /** 租约持有者前缀，每次驱动再附加随机后缀 */
  holderId?: string;
  now?: () => number;
}

export interface ResumeOptions {
  timeoutMs?: number;
}

/** 取消空闲任务时使用的短租约 */
const CANCEL_LEASE_MS = 5_000;

/**
 * 任务编排入口：创建并持久化任务、同步驱动或入队、取消与状态查询。
 * 执行循环本身由 xstate 状态机承担，每次驱动都在租约保护下进行。
 */
export class Orchestrator {
  public readonly eventBus: EventBus;

  public readonly queue: TaskQueue;

  private readonly options: OrchestratorOptions;

  private readonly snapshot$ = new Subject<TaskState>();

  private readonly holderId: string;

  private readonly now: () => number;

  private readonly loopDeps: LoopDeps;

  constructor(options: OrchestratorOptions) {
    this.options = options;
    this.eventBus = options.eventBus ?? new EventBus();
    this.queue = options.queue ?? new InMemoryTaskQueue();
    this.holderId = options.holderId ?? `driver-${nanoid(8)}`;
    this.now = options.now ?? Date.now;
    this.loopDeps = {
      executor: new Executor({
        agentRegistry: options.agentRegistry,
        eventBus: this.eventBus,
        stepTimeoutMs: options.config.stepTimeoutMs,
      }),
      reflector: options.reflector ?? new StepReflector(),
      contextBuilder: options.contextBuilder ?? new StepContextBuilder(),
      caseLibrary: options.caseLibrary,
      agentRegistry: options.agentRegistry,
      objectStore: options.objectStore,
      eventBus: this.eventBus,
      config: options.config,
      now: this.now,
    };
  }

  public get streams(): RuntimeEventStream {
    return {
      events$: this.eventBus.events(),
      snapshots$: this.snapshot$.asObservable(),
    };
  }

  /**
   * 持久化初始状态后再运行任何 agent。异步模式入队失败时记录
   * queue_failed 警告并退回同步执行。
   */
  public async submit(goal: string, options: SubmitOptions = {}): Promise<TaskHandle> {
    const { config, store } = this.options;
    const taskId = nanoid();
    const createdAt = this.now();
    const initial = createInitialTaskState({
      taskId,
      goal,
      ...(options.name !== undefined ? { name: options.name } : {}),
      ...(options.metadata ? { metadata: options.metadata } : {}),
      options: {
        recursionLimit: options.recursionLimit ?? config.recursionLimit,
        caseReuse: options.caseReuse ?? config.caseReuse,
      },
      now: createdAt,
    });
    initial.events.push(
      buildEvent({ source: "system", kind: "info", message: "Task created" }, 1, createdAt)
    );
    const created = await store.create(initial);
    this.eventBus.publish("task.created", taskId, { name: created.name, goal });
    console.info(`[Orchestrator] Task ${taskId} created`);

    if (!options.sync) {
      try {
        const messageId = await this.queue.enqueue(taskId);
        await store.logEvent(taskId, {
          source: "system",
          kind: "info",
          message: "Task queued",
          payload: { messageId },
        });
        return { taskId, status: "created" };
      } catch (error) {
        console.warn(
          `[Orchestrator] Enqueue failed for ${taskId}, running inline: ${describeError(error)}`
        );
        await store.logEvent(taskId, {
          source: "system",
          kind: "warning",
          message: `queue_failed: ${describeError(error)}`,
          payload: { code: "queue_failed" },
        });
      }
    }

    const result = await this.drive(
      taskId,
      options.timeoutMs !== undefined ? { deadline: createdAt + options.timeoutMs } : {}
    );
    return { taskId, status: result.status };
  }

  /** 在当前调用中继续执行挂起的任务 */
  public async resume(taskId: string, options: ResumeOptions = {}): Promise<TaskHandle> {
    const result = await this.drive(
      taskId,
      options.timeoutMs !== undefined ? { deadline: this.now() + options.timeoutMs } : {}
    );
    return { taskId, status: result.status };
  }

  /**
   * 在租约保护下推进任务直到终态或让出控制权。终态任务直接返回；
   * 租约被其他驱动器持有时抛出 LeaseUnavailableError。
   */
  public async drive(taskId: string, options: DriveOptions = {}): Promise<DriveResult> {
    const { store, leaseManager, config } = this.options;
    const stored = await store.load(taskId);
    if (!stored) {
      throw new TaskNotFoundError(taskId);
    }
    if (isTerminalStatus(stored.status)) {
      return {
        taskId,
        status: stored.status,
        phase: stored.status === "completed" ? "done" : "failed",
        stepsExecuted: 0,
      };
    }

    const lease = await leaseManager.acquire(
      taskId,
      `${this.holderId}:${nanoid(6)}`,
      config.leaseTtlMs
    );
    if (!lease) {
      throw new LeaseUnavailableError(taskId);
    }

    try {
      const current = await store.load(taskId);
      if (!current) {
        throw new TaskNotFoundError(taskId);
      }
      if (isTerminalStatus(current.status)) {
        return {
          taskId,
          status: current.status,
          phase: current.status === "completed" ? "done" : "failed",
          stepsExecuted: 0,
        };
      }
      const task = new TaskContext({
        state: current,
        store,
        eventBus: this.eventBus,
        snapshots: this.snapshot$,
        lease,
        leaseManager,
        leaseTtlMs: config.leaseTtlMs,
        maxConflictRetries: config.maxConflictRetries,
        now: this.now,
      });
      return await this.runLoop(task, createLoopRun(options));
    } catch (error) {
      if (error instanceof PersistenceConflictError && !(error instanceof TerminalStateError)) {
        await this.failAfterConflict(taskId, error);
      }
      throw error;
    } finally {
      await leaseManager.release(lease);
    }
  }

  /**
   * 乐观写入取消标记；未被租用的 created/suspended 任务立即失败。
   */
  public async cancel(taskId: string): Promise<{ ok: boolean }> {
    const { store, leaseManager, config } = this.options;
    for (let conflicts = 0; ; conflicts += 1) {
      const state = await store.load(taskId);
      if (!state || isTerminalStatus(state.status)) {
        return { ok: false };
      }
      if (state.cancelRequested) {
        break;
      }
      try {
        await store.save({ ...state, cancelRequested: true, updatedAt: this.now() });
        break;
      } catch (error) {
        if (error instanceof TerminalStateError) {
          return { ok: false };
        }
        if (!(error instanceof PersistenceConflictError) || conflicts >= config.maxConflictRetries) {
          throw error;
        }
      }
    }
    console.info(`[Orchestrator] Cancellation requested for ${taskId}`);

    const lease = await leaseManager.acquire(taskId, `${this.holderId}:cancel`, CANCEL_LEASE_MS);
    if (!lease) {
      return { ok: true };
    }
    try {
      const current = await store.load(taskId);
      if (current && (current.status === "created" || current.status === "suspended")) {
        const task = new TaskContext({
          state: current,
          store,
          eventBus: this.eventBus,
          snapshots: this.snapshot$,
          lease,
          leaseManager,
          leaseTtlMs: CANCEL_LEASE_MS,
          maxConflictRetries: config.maxConflictRetries,
          now: this.now,
        });
        const at = this.now();
        task.mutate((draft) => {
          draft.status = "failed";
          draft.lastError = { kind: "Cancelled", message: "Cancellation requested", at };
          draft.finishedAt = at;
        });
        task.appendEvent({
          source: "system",
          kind: "error",
          message: "Cancelled: Cancellation requested",
          payload: { errorKind: "Cancelled" },
        });
        await task.checkpoint();
        this.eventBus.publish("task.finished", taskId, { status: "failed", errorKind: "Cancelled" });
      }
    } finally {
      await leaseManager.release(lease);
    }
    return { ok: true };
  }

  public async getTask(taskId: string): Promise<TaskState | null> {
    return this.options.store.load(taskId);
  }

  public async getState(taskId: string): Promise<TaskStateView | null> {
    const state = await this.options.store.load(taskId);
    if (!state) {
      return null;
    }
    return {
      taskId: state.taskId,
      name: state.name,
      status: state.status,
      cursor: state.cursor,
      planLength: state.plan?.length ?? 0,
      outputsSummary: Object.fromEntries(
        Object.entries(state.outputs).map(([agent, output]) => [agent, Object.keys(output).sort()])
      ),
      score: state.score,
      lowConfidence: state.lowConfidence,
      lastError: state.lastError,
      finalArtifact: state.finalArtifact,
      events: state.events,
    };
  }

  public async listEvents(taskId: string): Promise<TaskEvent[]> {
    const state = await this.options.store.load(taskId);
    if (!state) {
      throw new TaskNotFoundError(taskId);
    }
    return state.events;
  }

  private runLoop(task: TaskContext, run: LoopRun): Promise<DriveResult> {
    const machine = createTaskMachine(this.loopDeps);
    const actor = createActor(machine, { input: { task, run } });
    let lastPhase: LoopPhase | null = null;

    return new Promise<DriveResult>((resolve, reject) => {
      const subscription = actor.subscribe({
        next: (snapshot) => {
          const phase = isLoopPhase(snapshot.value) ? snapshot.value : null;
          if (phase && phase !== lastPhase) {
            lastPhase = phase;
            this.eventBus.publish("task.transition", task.taskId, {
              phase,
              status: task.current.status,
              cursor: task.current.cursor,
              iteration: task.current.iteration,
            });
          }
          if (snapshot.status === "done") {
            subscription.unsubscribe();
            resolve({
              taskId: task.taskId,
              status: task.current.status,
              phase: phase ?? "done",
              stepsExecuted: snapshot.context.run.stepsExecuted,
            });
          }
        },
        error: (error) => {
          subscription.unsubscribe();
          reject(error);
        },
      });

      try {
        actor.start();
      } catch (error) {
        subscription.unsubscribe();
        reject(error);
      }
    });
  }

  /** 冲突重试耗尽：以最新存储状态为基础直接标记失败 */
  private async failAfterConflict(taskId: string, cause: PersistenceConflictError): Promise<void> {
    const { store } = this.options;
    try {
      const latest = await store.load(taskId);
      if (!latest || isTerminalStatus(latest.status)) {
        return;
      }
      const at = this.now();
      await store.save({
        ...latest,
        status: "failed",
        lastError: { kind: "PersistenceConflict", message: cause.message, at },
        finishedAt: at,
        updatedAt: at,
        events: [
          ...latest.events,
          buildEvent(
            {
              source: "system",
              kind: "error",
              message: `PersistenceConflict: ${cause.message}`,
              payload: { errorKind: "PersistenceConflict" },
            },
            latest.events.length + 1,
            at
          ),
        ],
      });
      this.eventBus.publish("task.finished", taskId, {
        status: "failed",
        errorKind: "PersistenceConflict",
      });
    } catch (error) {
      console.error(
        `[Orchestrator] Could not mark ${taskId} failed after conflicts: ${describeError(error)}`
      );
    }
  }
}
