import { describe, expect, it } from "vitest";
import type { DriveResult, TaskState } from "../../types/index.js";
import { InMemoryTaskStore } from "../../storage/InMemoryTaskStore.js";
import { InMemoryTaskQueue } from "../../queue/InMemoryTaskQueue.js";
import { OfflineWeatherProvider } from "../../providers/OpenMeteoWeatherProvider.js";
import { formatReport } from "../../agents/WeatherAgent.js";
import { succeed } from "../../agents/response.js";
import {
  IterationLimitExceededError,
  LeaseUnavailableError,
  PersistenceConflictError,
  TerminalStateError,
} from "../errors.js";
import {
  FIXED_TODAY,
  FixedCaseStore,
  createTestRuntime,
  hangingAgent,
  parisCase,
  stubAgent,
} from "../../__tests__/fixtures.js";

const WEATHER_GOAL = "What is the weather in Paris tomorrow?";

async function expectedParisReport(): Promise<string> {
  const provider = new OfflineWeatherProvider({ today: () => new Date(FIXED_TODAY) });
  return formatReport(await provider.lookup("Paris", { day: "tomorrow" }));
}

/** 在天气步骤产出后持续报告版本冲突 */
class ContendedTaskStore extends InMemoryTaskStore {
  public readonly taskIds: string[] = [];

  public conflicts = 0;

  async create(state: TaskState): Promise<TaskState> {
    this.taskIds.push(state.taskId);
    return super.create(state);
  }

  async save(state: TaskState): Promise<TaskState> {
    if (state.status === "running" && "weather" in state.outputs) {
      this.conflicts += 1;
      throw new PersistenceConflictError(state.taskId, state.version, state.version + 1);
    }
    return super.save(state);
  }
}

function requireTask(task: TaskState | null): TaskState {
  if (!task) {
    throw new Error("task not found");
  }
  return task;
}

describe("Orchestrator", () => {
  it("runs the weather goal through perception, planning, execution and critique", async () => {
    const runtime = createTestRuntime();
    const handle = await runtime.orchestrator.submit(WEATHER_GOAL, { sync: true });
    expect(handle.status).toBe("completed");

    const task = requireTask(await runtime.orchestrator.getTask(handle.taskId));
    expect(task.descriptor).toMatchObject({
      intent: "weather",
      entities: ["Paris"],
      complexity: "low",
    });
    const plan = task.plan ?? [];
    expect(plan.map((step) => step.agent)).toEqual(["weather", "writer"]);
    expect(plan[0].payload).toEqual({ task: WEATHER_GOAL, location: "Paris", day: "tomorrow" });
    expect(plan[1].dependsOn).toEqual([plan[0].id]);
    expect(task.planSource).toBe("synthesized");
    expect(task.cursor).toBe(2);
    expect(task.iteration).toBe(2);
    expect(task.score).toBe(1);
    expect(task.lowConfidence).toBe(false);
    expect(task.lastError).toBeNull();
    expect(task.name).toBe(WEATHER_GOAL);

    const report = await expectedParisReport();
    expect(task.outputs.weather.text).toBe(report);
    expect(task.finalArtifact).toEqual({
      kind: "inline",
      content: `Summarize the results for: ${WEATHER_GOAL}\n- weather: ${report}`,
      mediaType: "text/plain",
    });

    expect(task.events.map((event) => `${event.source}:${event.kind}`)).toEqual([
      "system:info",
      "system:info",
      "perceptor:info",
      "planner:info",
      "weather:result",
      "critic:info",
      "system:info",
      "system:result",
    ]);
    expect(task.events.map((event) => event.seq)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
    expect(task.events[7].message).toBe("Task completed with score 1");

    const stored = await runtime.caseLibrary.retrieve(WEATHER_GOAL);
    expect(stored).toHaveLength(1);
    expect(stored[0].case.plan).toHaveLength(2);
    expect(stored[0].similarity).toBeCloseTo(1, 6);
  });

  it("retries a timed-out step, records the failure marker and continues", async () => {
    const runtime = createTestRuntime({
      config: { stepTimeoutMs: 20, maxStepAttempts: 2 },
      agents: [hangingAgent("weather")],
    });
    const handle = await runtime.orchestrator.submit(WEATHER_GOAL, { sync: true });
    expect(handle.status).toBe("completed");

    const task = requireTask(await runtime.orchestrator.getTask(handle.taskId));
    const plan = task.plan ?? [];
    const stepFailures = task.events.filter(
      (event) => event.kind === "error" && event.payload?.errorKind === "StepFailure"
    );
    expect(stepFailures).toHaveLength(2);
    expect(stepFailures.map((event) => event.payload?.attempt)).toEqual([1, 2]);
    expect(stepFailures.map((event) => event.payload?.cause)).toEqual(["StepTimeout", "StepTimeout"]);

    expect(task.stepRecords[plan[0].id]).toEqual({
      agent: "weather",
      status: "failed",
      attempts: 2,
      error: { kind: "StepTimeout", message: "Agent weather timed out after 20ms" },
    });
    expect(task.stepRecords[plan[1].id]).toEqual({
      agent: "writer",
      status: "succeeded",
      attempts: 1,
    });
    expect(task.outputs.writer.text).toBe(
      `Summarize the results for: ${WEATHER_GOAL}\nNo findings were available.`
    );
    expect(task.iteration).toBe(3);
    expect(task.score).toBe(0.65);
    expect(task.lowConfidence).toBe(true);
    expect(task.status).toBe("completed");
    expect(await runtime.caseLibrary.retrieve(WEATHER_GOAL)).toEqual([]);
  });

  it("fails a low-confidence result under the strict quality gate", async () => {
    const runtime = createTestRuntime({
      config: { stepTimeoutMs: 20, qualityGate: "strict" },
      agents: [hangingAgent("weather")],
    });
    const handle = await runtime.orchestrator.submit(WEATHER_GOAL, { sync: true });
    expect(handle.status).toBe("failed");

    const view = await runtime.orchestrator.getState(handle.taskId);
    expect(view?.lastError?.kind).toBe("QualityGate");
    expect(view?.score).toBe(0.65);
    expect(view?.finalArtifact?.kind).toBe("inline");
  });

  it("adapts a sufficiently similar case instead of synthesizing a plan", async () => {
    const caseStore = new FixedCaseStore([{ case: parisCase(), similarity: 0.95 }]);
    const runtime = createTestRuntime({ caseStore });
    const handle = await runtime.orchestrator.submit("What is the weather in Berlin tomorrow?", {
      sync: true,
    });
    expect(handle.status).toBe("completed");

    const task = requireTask(await runtime.orchestrator.getTask(handle.taskId));
    const plan = task.plan ?? [];
    expect(task.planSource).toBe("case");
    expect(task.references).toEqual(["case-paris"]);
    expect(plan).toHaveLength(parisCase().plan.length);
    expect(plan.map((step) => step.origin)).toEqual(["case", "case", "case"]);
    expect(plan.map((step) => step.id).some((id) => ["c1", "c2", "c3"].includes(id))).toBe(false);
    expect(plan[0].payload).toEqual({
      task: "weather in Berlin tomorrow",
      location: "Berlin",
      day: "tomorrow",
    });
    expect(plan[1].title).toBe("Chart Berlin temperatures");
    expect(plan[2].dependsOn).toEqual([plan[0].id, plan[1].id]);
    expect(caseStore.writes).toHaveLength(1);
    expect(caseStore.writes[0].entities).toEqual(["Berlin"]);
  });

  it("synthesizes a fresh plan when case reuse is disabled", async () => {
    const caseStore = new FixedCaseStore([{ case: parisCase(), similarity: 0.95 }]);
    const runtime = createTestRuntime({ caseStore });
    const handle = await runtime.orchestrator.submit("What is the weather in Berlin tomorrow?", {
      sync: true,
      caseReuse: false,
    });

    const task = requireTask(await runtime.orchestrator.getTask(handle.taskId));
    expect(task.planSource).toBe("synthesized");
    expect(task.references).toEqual(["case-paris"]);
    expect((task.plan ?? []).map((step) => step.agent)).toEqual(["weather", "writer"]);
  });

  it("fails with IterationLimitExceeded when hints keep extending the plan", async () => {
    const runtime = createTestRuntime({
      agents: [
        stubAgent("writer", async () =>
          succeed({ text: "more" }, { nextSteps: [{ agent: "writer", title: "Keep going" }] })
        ),
      ],
    });
    const handle = await runtime.orchestrator.submit("Draft a note", {
      sync: true,
      recursionLimit: 5,
    });
    expect(handle.status).toBe("failed");

    const task = requireTask(await runtime.orchestrator.getTask(handle.taskId));
    expect(task.lastError).toMatchObject({
      kind: "IterationLimitExceeded",
      message: "iteration limit exceeded (5)",
    });
    expect(task.lastError?.message).toBe(new IterationLimitExceededError(5).message);
    expect(task.events.at(-1)).toMatchObject({
      kind: "error",
      message: "IterationLimitExceeded: iteration limit exceeded (5)",
      payload: { errorKind: "IterationLimitExceeded" },
    });
    expect(task.iteration).toBe(5);
    expect(task.cursor).toBe(5);
    expect(task.plan).toHaveLength(6);
    expect((task.plan ?? []).slice(1).every((step) => step.origin === "hint")).toBe(true);
    expect(task.finishedAt).not.toBeNull();
  });

  it("fails an empty goal with PlanningFailure", async () => {
    const runtime = createTestRuntime();
    const handle = await runtime.orchestrator.submit("", { sync: true });
    expect(handle.status).toBe("failed");

    const task = requireTask(await runtime.orchestrator.getTask(handle.taskId));
    expect(task.plan).toBeNull();
    expect(task.lastError).toMatchObject({
      kind: "PlanningFailure",
      message: "Agent planner failed: Planner produced an empty plan",
    });
    expect(task.events[task.events.length - 1].message).toBe(
      "PlanningFailure: Agent planner failed: Planner produced an empty plan"
    );
  });

  it("suspends at the deadline-free step budget and resumes to the same result", async () => {
    const full = createTestRuntime();
    const fullHandle = await full.orchestrator.submit(WEATHER_GOAL, { sync: true });
    const expected = requireTask(await full.orchestrator.getTask(fullHandle.taskId));

    const sliced = createTestRuntime();
    const handle = await sliced.orchestrator.submit(WEATHER_GOAL);
    expect(handle.status).toBe("created");

    const first = await sliced.orchestrator.drive(handle.taskId, { maxSteps: 1 });
    expect(first).toEqual({
      taskId: handle.taskId,
      status: "suspended",
      phase: "suspended",
      stepsExecuted: 1,
    });
    const suspended = requireTask(await sliced.orchestrator.getTask(handle.taskId));
    expect(suspended.cursor).toBe(1);
    expect(suspended.events[suspended.events.length - 1].message).toBe(
      "Suspended at step 1/2 (step budget of 1 used)"
    );

    const resumed = await sliced.orchestrator.resume(handle.taskId);
    expect(resumed.status).toBe("completed");

    const actual = requireTask(await sliced.orchestrator.getTask(handle.taskId));
    const strip = (task: TaskState) => (task.plan ?? []).map(({ id: _id, dependsOn: _deps, ...rest }) => rest);
    expect(strip(actual)).toEqual(strip(expected));
    expect(actual.outputs).toEqual(expected.outputs);
    expect((actual.plan ?? []).map((step) => actual.stepRecords[step.id])).toEqual(
      (expected.plan ?? []).map((step) => expected.stepRecords[step.id])
    );
    expect(actual.finalArtifact).toEqual(expected.finalArtifact);
    expect(actual.score).toBe(expected.score);
    expect(actual.iteration).toBe(expected.iteration);
    expect(actual.events.some((event) => event.message === "Execution resumed at step 1/2")).toBe(
      true
    );
  });

  it("suspends a synchronous submission whose timeout has already passed", async () => {
    let clock = 1_700_000_000_000;
    const runtime = createTestRuntime({
      now: () => {
        clock += 1_000;
        return clock;
      },
    });
    const handle = await runtime.orchestrator.submit(WEATHER_GOAL, { sync: true, timeoutMs: 1 });
    expect(handle.status).toBe("suspended");

    const task = requireTask(await runtime.orchestrator.getTask(handle.taskId));
    expect(task.cursor).toBe(0);
    expect(task.plan).toHaveLength(2);

    const resumed = await runtime.orchestrator.resume(handle.taskId);
    expect(resumed.status).toBe("completed");
  });

  it("keeps the cursor within the plan at every checkpoint", async () => {
    const runtime = createTestRuntime();
    const snapshots: TaskState[] = [];
    const subscription = runtime.orchestrator.streams.snapshots$.subscribe((state) => {
      snapshots.push(state);
    });
    await runtime.orchestrator.submit(WEATHER_GOAL, { sync: true });
    subscription.unsubscribe();

    expect(snapshots.length).toBeGreaterThan(4);
    for (const state of snapshots) {
      expect(state.cursor).toBeLessThanOrEqual(state.plan?.length ?? 0);
    }
    const versions = snapshots.map((state) => state.version);
    expect(versions).toEqual([...versions].sort((a, b) => a - b));
    expect(new Set(versions).size).toBe(versions.length);
    expect(snapshots[snapshots.length - 1].status).toBe("completed");
  });

  it("publishes transitions and step traffic on the event stream", async () => {
    const runtime = createTestRuntime();
    const types: string[] = [];
    const phases: unknown[] = [];
    const subscription = runtime.orchestrator.streams.events$.subscribe((event) => {
      types.push(event.type);
      if (event.type === "task.transition") {
        phases.push(event.payload.phase);
      }
    });
    const handle = await runtime.orchestrator.submit(WEATHER_GOAL, { sync: true });
    subscription.unsubscribe();

    expect(types[0]).toBe("task.created");
    expect(types.filter((type) => type === "step.request")).toHaveLength(2);
    expect(types.filter((type) => type === "task.finished")).toHaveLength(1);
    expect(phases.filter((phase) => phase !== "resume").slice(0, 5)).toEqual([
      "perceiving",
      "planning",
      "checkingControl",
      "acting",
      "reflecting",
    ]);
    expect(phases).not.toContain("routing");
    expect(phases[phases.length - 1]).toBe("done");
    expect(handle.status).toBe("completed");
  });

  it("refuses to change a terminal task", async () => {
    const store = new InMemoryTaskStore();
    const runtime = createTestRuntime({ store });
    const handle = await runtime.orchestrator.submit(WEATHER_GOAL, { sync: true });
    const task = requireTask(await store.load(handle.taskId));

    await expect(store.save({ ...task, status: "failed" })).rejects.toBeInstanceOf(
      TerminalStateError
    );
    await expect(
      store.logEvent(handle.taskId, { source: "test", kind: "info", message: "late" })
    ).rejects.toBeInstanceOf(TerminalStateError);
    expect(await runtime.orchestrator.drive(handle.taskId)).toEqual({
      taskId: handle.taskId,
      status: "completed",
      phase: "done",
      stepsExecuted: 0,
    });
    expect(await runtime.orchestrator.cancel(handle.taskId)).toEqual({ ok: false });
    expect(requireTask(await store.load(handle.taskId))).toEqual(task);
  });

  it("cancels a queued task immediately", async () => {
    const runtime = createTestRuntime();
    const handle = await runtime.orchestrator.submit(WEATHER_GOAL);
    expect(await runtime.orchestrator.cancel(handle.taskId)).toEqual({ ok: true });

    const view = await runtime.orchestrator.getState(handle.taskId);
    expect(view?.status).toBe("failed");
    expect(view?.lastError).toMatchObject({ kind: "Cancelled", message: "Cancellation requested" });
    expect(view?.events.map((event) => event.message)).toEqual([
      "Task created",
      "Task queued",
      "Cancelled: Cancellation requested",
    ]);

    expect(await runtime.workers.runUntilIdle()).toBe(1);
    expect(requireTask(await runtime.orchestrator.getTask(handle.taskId)).status).toBe("failed");
    expect(await runtime.orchestrator.cancel("missing")).toEqual({ ok: false });
  });

  it("stops a running task at the next step boundary after cancellation", async () => {
    const runtime = createTestRuntime();
    runtime.agentRegistry.register(
      stubAgent("weather", async (context) => {
        await runtime.orchestrator.cancel(context.taskId);
        return succeed({ text: "sunny" });
      })
    );
    const handle = await runtime.orchestrator.submit(WEATHER_GOAL, { sync: true });
    expect(handle.status).toBe("failed");

    const task = requireTask(await runtime.orchestrator.getTask(handle.taskId));
    const plan = task.plan ?? [];
    expect(task.cancelRequested).toBe(true);
    expect(task.lastError?.kind).toBe("Cancelled");
    expect(task.stepRecords[plan[0].id]?.status).toBe("succeeded");
    expect(task.stepRecords[plan[1].id]).toBeUndefined();
    expect(task.cursor).toBe(1);
  });

  it("runs queued tasks through the worker pool in slices", async () => {
    const runtime = createTestRuntime({ config: { queue: { maxStepsPerSlice: 1 } } });
    const handle = await runtime.orchestrator.submit(WEATHER_GOAL);

    expect(await runtime.workers.runUntilIdle()).toBe(2);
    const view = await runtime.orchestrator.getState(handle.taskId);
    expect(view?.status).toBe("completed");
    expect(view?.planLength).toBe(2);
    expect(view?.outputsSummary).toEqual({
      weather: ["day", "location", "report", "text"],
      writer: ["sources", "task", "text"],
    });
  });

  it("falls back to synchronous execution when the queue rejects", async () => {
    class OfflineQueue extends InMemoryTaskQueue {
      async enqueue(): Promise<string> {
        throw new Error("queue offline");
      }
    }
    const runtime = createTestRuntime({ queue: new OfflineQueue() });
    const handle = await runtime.orchestrator.submit(WEATHER_GOAL);
    expect(handle.status).toBe("completed");

    const events = await runtime.orchestrator.listEvents(handle.taskId);
    expect(events[1]).toMatchObject({
      kind: "warning",
      message: "queue_failed: queue offline",
    });
  });

  it("carries name and metadata into agent invocations", async () => {
    const seen: Array<{ name: string; metadata: Record<string, unknown> }> = [];
    const runtime = createTestRuntime({
      agents: [
        stubAgent("writer", async (context) => {
          seen.push({ name: context.name, metadata: context.metadata });
          return succeed({ text: "done" });
        }),
      ],
    });
    await runtime.orchestrator.submit("Draft a note", {
      sync: true,
      name: "note",
      metadata: { requester: "test" },
    });
    expect(seen).toEqual([{ name: "note", metadata: { requester: "test" } }]);
  });

  it("fails the task once persistence conflicts are exhausted", async () => {
    const store = new ContendedTaskStore();
    const runtime = createTestRuntime({ store });

    await expect(runtime.orchestrator.submit(WEATHER_GOAL, { sync: true })).rejects.toBeInstanceOf(
      PersistenceConflictError
    );
    expect(store.conflicts).toBe(4);

    const task = requireTask(await runtime.orchestrator.getTask(store.taskIds[0] ?? ""));
    expect(task.status).toBe("failed");
    expect(task.lastError?.kind).toBe("PersistenceConflict");
    expect(task.lastError?.message).toMatch(/version mismatch/);
    expect(task.finishedAt).not.toBeNull();
    expect(task.outputs).toEqual({});
    expect(task.events.at(-1)).toMatchObject({
      kind: "error",
      payload: { errorKind: "PersistenceConflict" },
    });
  });

  it("lets only the current lease holder write when a step outlives the lease", async () => {
    let clock = 1_000_000;
    let taskId = "";
    let weatherCalls = 0;
    let writerCalls = 0;
    const takeover: DriveResult[] = [];
    const runtime = createTestRuntime({
      now: () => clock,
      agents: [
        stubAgent("weather", async () => {
          weatherCalls += 1;
          if (weatherCalls === 1) {
            clock += runtime.config.leaseTtlMs + 1;
            takeover.push(await runtime.orchestrator.drive(taskId));
          }
          return succeed({ text: "sunny" });
        }),
        stubAgent("writer", async () => {
          writerCalls += 1;
          return succeed({ text: "report" });
        }),
      ],
    });
    taskId = (await runtime.orchestrator.submit(WEATHER_GOAL)).taskId;

    await expect(runtime.orchestrator.drive(taskId)).rejects.toBeInstanceOf(LeaseUnavailableError);
    expect(takeover).toEqual([{ taskId, status: "completed", phase: "done", stepsExecuted: 2 }]);
    expect(weatherCalls).toBe(2);
    expect(writerCalls).toBe(1);

    const task = requireTask(await runtime.orchestrator.getTask(taskId));
    const plan = task.plan ?? [];
    expect(plan.map((step) => step.agent)).toEqual(["weather", "writer"]);
    expect(task.status).toBe("completed");
    expect(task.cursor).toBe(2);
    expect(task.iteration).toBe(2);
    expect(task.stepRecords).toEqual({
      [plan[0].id]: { agent: "weather", status: "succeeded", attempts: 1 },
      [plan[1].id]: { agent: "writer", status: "succeeded", attempts: 1 },
    });
    expect(task.outputs.writer.text).toBe("report");
  });
});
