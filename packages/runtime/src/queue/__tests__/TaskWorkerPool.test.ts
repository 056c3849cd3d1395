import { describe, expect, it, vi } from "vitest";
import type { DriveOptions, DriveResult } from "../../types/index.js";
import { createInitialTaskState } from "../../types/taskState.js";
import { TaskWorkerPool } from "../TaskWorkerPool.js";
import type { TaskWorkerPoolOptions } from "../TaskWorkerPool.js";
import { InMemoryTaskQueue } from "../InMemoryTaskQueue.js";
import { InMemoryTaskStore } from "../../storage/InMemoryTaskStore.js";
import { buildEvent } from "../../storage/taskRecord.js";
import { LeaseUnavailableError, TaskNotFoundError } from "../../core/errors.js";
import { createTestRuntime } from "../../__tests__/fixtures.js";

type Driver = (taskId: string, options?: DriveOptions) => Promise<DriveResult>;

function createPool(drive: Driver, overrides: Partial<TaskWorkerPoolOptions> = {}) {
  let clock = 0;
  const queue = new InMemoryTaskQueue({ now: () => clock });
  const store = new InMemoryTaskStore();
  const pool = new TaskWorkerPool({
    orchestrator: { drive },
    queue,
    store,
    concurrency: 1,
    pollIntervalMs: 5,
    maxStepsPerSlice: 3,
    visibilityTimeoutMs: 100,
    maxDeliveries: 2,
    now: () => clock,
    ...overrides,
  });
  return {
    pool,
    queue,
    store,
    advance: (ms: number) => {
      clock += ms;
    },
  };
}

describe("InMemoryTaskQueue", () => {
  it("hides received messages until acked or the visibility timeout passes", async () => {
    let clock = 0;
    const queue = new InMemoryTaskQueue({ now: () => clock });
    await queue.enqueue("t1");

    const first = await queue.receive(100);
    expect(first).toMatchObject({ taskId: "t1", deliveries: 1 });
    expect(await queue.receive(100)).toBeNull();

    clock = 101;
    const second = await queue.receive(100);
    expect(second?.deliveries).toBe(2);
    if (!second) throw new Error("message not redelivered");

    await queue.release(second, 50);
    expect(await queue.receive(100)).toBeNull();
    clock = 151;
    const third = await queue.receive(100);
    expect(third?.deliveries).toBe(2);
    if (!third) throw new Error("released message not redelivered");
    await queue.ack(third);
    expect(queue.depth()).toBe(0);
  });

  it("keeps an extended message hidden past its original timeout", async () => {
    let clock = 0;
    const queue = new InMemoryTaskQueue({ now: () => clock });
    await queue.enqueue("t1");
    const message = await queue.receive(100);
    if (!message) throw new Error("message not delivered");

    clock = 80;
    await queue.extend(message, 100);
    clock = 150;
    expect(await queue.receive(100)).toBeNull();
    clock = 181;
    expect((await queue.receive(100))?.deliveries).toBe(2);
  });
});

describe("TaskWorkerPool", () => {
  it("drives each message for one slice and requeues suspended tasks", async () => {
    const calls: Array<DriveOptions | undefined> = [];
    const results: Array<Omit<DriveResult, "taskId">> = [
      { status: "suspended", phase: "suspended", stepsExecuted: 3 },
      { status: "completed", phase: "done", stepsExecuted: 2 },
    ];
    const { pool, queue } = createPool(async (taskId, options) => {
      calls.push(options);
      const next = results.shift();
      if (!next) throw new Error("driven too often");
      return { taskId, ...next };
    });
    await queue.enqueue("t1");

    expect(await pool.processNext()).toBe("requeued");
    expect(queue.depth()).toBe(1);
    expect(await pool.processNext()).toBe("finished");
    expect(await pool.processNext()).toBe("idle");
    expect(calls).toEqual([{ maxSteps: 3 }, { maxSteps: 3 }]);
  });

  it("hands the message back later without counting the delivery when another driver holds the lease", async () => {
    const { pool, queue, advance } = createPool(async (taskId) => {
      throw new LeaseUnavailableError(taskId);
    });
    await queue.enqueue("t1");
    for (let round = 0; round < 4; round += 1) {
      expect(await pool.processNext()).toBe("released");
      expect(await pool.processNext()).toBe("idle");
      advance(100);
    }
    expect(await queue.listDeadLetters()).toEqual([]);
    expect((await queue.receive(100))?.deliveries).toBe(1);
  });

  it("does not dead-letter a slice that runs longer than the visibility timeout", async () => {
    const queue = new InMemoryTaskQueue();
    let active = 0;
    let drives = 0;
    const pool = new TaskWorkerPool({
      orchestrator: {
        drive: async (taskId) => {
          if (active > 0) {
            throw new LeaseUnavailableError(taskId);
          }
          active += 1;
          drives += 1;
          try {
            await new Promise((resolve) => setTimeout(resolve, 400));
            return { taskId, status: "completed", phase: "done", stepsExecuted: 1 };
          } finally {
            active -= 1;
          }
        },
      },
      queue,
      store: new InMemoryTaskStore(),
      concurrency: 2,
      pollIntervalMs: 5,
      maxStepsPerSlice: 3,
      visibilityTimeoutMs: 50,
      maxDeliveries: 5,
    });
    await queue.enqueue("t1");

    pool.start();
    await vi.waitFor(
      () => {
        expect(queue.depth()).toBe(0);
      },
      { timeout: 5_000, interval: 10 }
    );
    await pool.stop();

    expect(drives).toBe(1);
    expect(await queue.listDeadLetters()).toEqual([]);
  });

  it("drops messages for unknown tasks", async () => {
    const { pool, queue } = createPool(async (taskId) => {
      throw new TaskNotFoundError(taskId);
    });
    await queue.enqueue("ghost");
    expect(await pool.processNext()).toBe("missing");
    expect(queue.depth()).toBe(0);
  });

  it("dead-letters a message that keeps crashing", async () => {
    const { pool, queue, store, advance } = createPool(async () => {
      throw new Error("boom");
    });
    const state = createInitialTaskState({
      taskId: "t1",
      goal: "g",
      options: { recursionLimit: 5, caseReuse: true },
      now: 0,
    });
    state.events.push(
      buildEvent({ source: "system", kind: "info", message: "Task created" }, 1, 0),
      buildEvent({ source: "weather", kind: "error", message: "Step failed: boom" }, 2, 0)
    );
    await store.create(state);
    const messageId = await queue.enqueue("t1");

    expect(await pool.processNext()).toBe("crashed");
    advance(101);
    expect(await pool.processNext()).toBe("crashed");
    advance(101);
    expect(await pool.processNext()).toBe("dead-lettered");

    expect(queue.depth()).toBe(0);
    expect(await queue.listDeadLetters()).toEqual([
      {
        messageId,
        taskId: "t1",
        deliveries: 3,
        reason: "exceeded 2 deliveries",
        lastErrorEvent: state.events[1],
        deadLetteredAt: 202,
      },
    ]);
  });

  it("runs queued tasks in the background until stopped", async () => {
    const runtime = createTestRuntime({ config: { queue: { pollIntervalMs: 5, concurrency: 2 } } });
    const first = await runtime.orchestrator.submit("What is the weather in Oslo today?");
    const second = await runtime.orchestrator.submit("Calculate 6 * 7");

    runtime.workers.start();
    expect(runtime.workers.isRunning).toBe(true);
    await vi.waitFor(
      async () => {
        expect((await runtime.orchestrator.getTask(first.taskId))?.status).toBe("completed");
        expect((await runtime.orchestrator.getTask(second.taskId))?.status).toBe("completed");
      },
      { timeout: 5_000, interval: 10 }
    );
    await runtime.workers.stop();
    expect(runtime.workers.isRunning).toBe(false);

    const calculator = await runtime.orchestrator.getTask(second.taskId);
    expect(calculator?.outputs.calculator?.text).toBe("6 * 7 = 42");
  });
});
