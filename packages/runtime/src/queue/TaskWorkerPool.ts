import type { QueueMessage, TaskQueue, TaskStore } from "../types/index.js";
import type { Orchestrator } from "../core/Orchestrator.js";
import { LeaseUnavailableError, TaskNotFoundError, describeError } from "../core/errors.js";

export interface TaskWorkerPoolOptions {
  orchestrator: Pick<Orchestrator, "drive">;
  queue: TaskQueue;
  store: TaskStore;
  concurrency: number;
  pollIntervalMs: number;
  /** 每个时间片最多执行的步骤尝试数 */
  maxStepsPerSlice: number;
  visibilityTimeoutMs: number;
  maxDeliveries: number;
  now?: () => number;
}

export type SliceOutcome =
  | "idle"
  | "finished"
  | "requeued"
  | "released"
  | "dead-lettered"
  | "missing"
  | "crashed";

/**
 * 从队列取任务并按时间片驱动：终态 ack；挂起 ack 后重新入队；
 * 运行期间续期消息可见性；租约被占用时延迟交还且不计投递次数；
 * 崩溃不 ack，等待可见性超时后重投。
 */
export class TaskWorkerPool {
  private readonly options: TaskWorkerPoolOptions;

  private readonly now: () => number;

  private running = false;

  private loops: Promise<void>[] = [];

  private sleepers = new Set<() => void>();

  constructor(options: TaskWorkerPoolOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
  }

  public get isRunning(): boolean {
    return this.running;
  }

  public start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    for (let index = 0; index < this.options.concurrency; index += 1) {
      this.loops.push(this.workerLoop(index));
    }
    console.info(`[TaskWorkerPool] Started ${this.options.concurrency} worker(s)`);
  }

  public async stop(): Promise<void> {
    this.running = false;
    for (const wake of this.sleepers) {
      wake();
    }
    this.sleepers.clear();
    await Promise.all(this.loops);
    this.loops = [];
  }

  /** 处理至多一条消息 */
  public async processNext(): Promise<SliceOutcome> {
    const { queue, orchestrator, maxDeliveries, maxStepsPerSlice } = this.options;
    const message = await queue.receive(this.options.visibilityTimeoutMs);
    if (!message) {
      return "idle";
    }
    if (message.deliveries > maxDeliveries) {
      await this.deadLetter(message);
      return "dead-lettered";
    }

    try {
      const result = await this.holdMessage(message, () =>
        orchestrator.drive(message.taskId, { maxSteps: maxStepsPerSlice })
      );
      await queue.ack(message);
      if (result.status === "suspended") {
        await queue.enqueue(message.taskId);
        return "requeued";
      }
      return "finished";
    } catch (error) {
      if (error instanceof LeaseUnavailableError) {
        await queue.release(message, this.options.visibilityTimeoutMs);
        return "released";
      }
      if (error instanceof TaskNotFoundError) {
        console.warn(`[TaskWorkerPool] Dropping message for unknown task ${message.taskId}`);
        await queue.ack(message);
        return "missing";
      }
      console.error(
        `[TaskWorkerPool] Slice for ${message.taskId} crashed (delivery ${message.deliveries}): ${describeError(error)}`
      );
      return "crashed";
    }
  }

  /**
   * 串行处理直到队列中没有可见消息，返回处理的消息数。
   */
  public async runUntilIdle(maxMessages = 1_000): Promise<number> {
    let processed = 0;
    while (processed < maxMessages) {
      const outcome = await this.processNext();
      if (outcome === "idle") {
        break;
      }
      processed += 1;
      if (outcome === "released" || outcome === "crashed") {
        break;
      }
    }
    return processed;
  }

  /** 时间片运行期间每半个可见性超时续期一次，避免消息被其他 worker 重新取到 */
  private async holdMessage<T>(message: QueueMessage, work: () => Promise<T>): Promise<T> {
    const { queue, visibilityTimeoutMs } = this.options;
    const timer = setInterval(() => {
      void queue.extend(message, visibilityTimeoutMs).catch((error: unknown) => {
        console.warn(
          `[TaskWorkerPool] Could not extend visibility of ${message.taskId}: ${describeError(error)}`
        );
      });
    }, Math.max(1, Math.floor(visibilityTimeoutMs / 2)));
    try {
      return await work();
    } finally {
      clearInterval(timer);
    }
  }

  private async deadLetter(message: QueueMessage): Promise<void> {
    const { queue, store, maxDeliveries } = this.options;
    const state = await store.load(message.taskId);
    const lastErrorEvent =
      state?.events
        .slice()
        .reverse()
        .find((event) => event.kind === "error") ?? null;
    await queue.deadLetter(message, {
      messageId: message.messageId,
      taskId: message.taskId,
      deliveries: message.deliveries,
      reason: `exceeded ${maxDeliveries} deliveries`,
      lastErrorEvent,
      deadLetteredAt: this.now(),
    });
    console.warn(
      `[TaskWorkerPool] Task ${message.taskId} moved to dead letters after ${message.deliveries} deliveries`
    );
  }

  private async workerLoop(index: number): Promise<void> {
    while (this.running) {
      let outcome: SliceOutcome;
      try {
        outcome = await this.processNext();
      } catch (error) {
        console.error(`[TaskWorkerPool] Worker ${index} failed: ${describeError(error)}`);
        outcome = "crashed";
      }
      if (outcome === "idle" || outcome === "released" || outcome === "crashed") {
        await this.sleep(this.options.pollIntervalMs);
      }
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const wake = (): void => {
        clearTimeout(timer);
        this.sleepers.delete(wake);
        resolve();
      };
      const timer = setTimeout(wake, ms);
      this.sleepers.add(wake);
    });
  }
}
