import { nanoid } from "nanoid";
import { fromPromise } from "xstate";
import { z } from "zod";
import type {
  AgentEventDraft,
  AgentResponse,
  GoalDescriptor,
  Step,
  StepHint,
  StepOutcome,
} from "../types/index.js";
import { GoalDescriptorSchema, StepSchema } from "../types/taskState.js";
import type { TaskContext } from "../core/TaskContext.js";
import { describeError } from "../core/errors.js";
import { materializeArtifact, selectArtifactText } from "../core/artifact.js";
import { heuristicScore } from "../agents/CriticAgent.js";
import type { LoopDeps, MachineContext, PendingFailure } from "./taskTypes.js";

/** 阶段服务的结果：null 表示继续，否则为需要进入 failing 的循环级失败 */
export type StageResult = PendingFailure | null;

const PlannerOutputSchema = z.object({
  steps: z.array(StepSchema),
  planSource: z.enum(["case", "synthesized"]),
  references: z.array(z.string()).default([]),
});

const CriticOutputSchema = z.object({
  score: z.number().min(0).max(1),
  feedback: z.array(z.string()).default([]),
});

function foldEvents(task: TaskContext, source: string, events: AgentEventDraft[]): void {
  for (const event of events) {
    task.appendEvent({ source, ...event });
  }
}

function fallbackDescriptor(goal: string): GoalDescriptor {
  const normalizedGoal = goal.trim().replace(/\s+/g, " ");
  return {
    rawGoal: goal,
    normalizedGoal,
    intent: "unknown",
    entities: [],
    complexity: "low",
    subtasks: normalizedGoal ? [normalizedGoal] : [],
  };
}

export function createResumeService(deps: LoopDeps) {
  return fromPromise<StageResult, MachineContext>(async ({ input }) => {
    const { task } = input;
    const state = task.current;
    const resumed = state.startedAt !== null;
    const startedAt = deps.now();
    task.mutate((draft) => {
      draft.status = "running";
      if (draft.startedAt === null) {
        draft.startedAt = startedAt;
      }
    });
    task.appendEvent({
      source: "system",
      kind: "info",
      message: resumed
        ? `Execution resumed at step ${state.cursor}/${state.plan?.length ?? 0}`
        : "Execution started",
    });
    await task.checkpoint();
    return null;
  });
}

/**
 * 感知失败不致命：退化为原始目标 + unknown 意图，并记录警告。
 */
export function createPerceiveService(deps: LoopDeps) {
  return fromPromise<StageResult, MachineContext>(async ({ input }) => {
    const { task } = input;
    const goal = task.current.goal;
    let descriptor: GoalDescriptor | null = null;
    let problem = "invalid descriptor";
    try {
      const response = await deps.executor.invoke(
        "perceptor",
        deps.contextBuilder.build(task.current, null, 1)
      );
      foldEvents(task, "perceptor", response.events);
      const parsed = GoalDescriptorSchema.safeParse(response.output.descriptor);
      if (response.success && parsed.success) {
        descriptor = parsed.data;
      } else {
        problem = response.message ?? problem;
      }
    } catch (error) {
      problem = describeError(error);
    }

    if (!descriptor) {
      descriptor = fallbackDescriptor(goal);
      task.appendEvent({
        source: "system",
        kind: "warning",
        message: `Perception failed (${problem}), using the raw goal`,
      });
    }
    const resolved = descriptor;
    task.mutate((draft) => {
      draft.descriptor = structuredClone(resolved);
    });
    await task.checkpoint();
    return null;
  });
}

export function createPlanService(deps: LoopDeps) {
  return fromPromise<StageResult, MachineContext>(async ({ input }) => {
    const { task } = input;
    const draft = deps.contextBuilder.build(task.current, null, 1);
    let response: AgentResponse;
    try {
      response = await deps.executor.invoke("planner", {
        ...draft,
        payload: { caseReuse: task.current.options.caseReuse },
      });
    } catch (error) {
      return { kind: "PlanningFailure", message: describeError(error) };
    }

    foldEvents(task, "planner", response.events);
    if (!response.success) {
      return { kind: "PlanningFailure", message: response.message ?? "Planner reported failure" };
    }
    const parsed = PlannerOutputSchema.safeParse(response.output);
    if (!parsed.success) {
      return {
        kind: "PlanningFailure",
        message: `Planner returned an invalid plan: ${parsed.error.message}`,
      };
    }
    if (parsed.data.steps.length === 0) {
      return { kind: "PlanningFailure", message: "Planner produced an empty plan" };
    }

    const plan = parsed.data;
    task.mutate((state) => {
      state.plan = structuredClone(plan.steps);
      state.planSource = plan.planSource;
      state.references = [...plan.references];
      state.cursor = 0;
      state.currentAttempts = 0;
    });
    await task.checkpoint();
    return null;
  });
}

/** 在步骤之间读取外部取消标记 */
export function createControlService() {
  return fromPromise<StageResult, MachineContext>(async ({ input }) => {
    const cancelled = await input.task.refreshCancelFlag();
    return cancelled ? { kind: "Cancelled", message: "Cancellation requested" } : null;
  });
}

export function createActService(deps: LoopDeps) {
  return fromPromise<StepOutcome, MachineContext>(async ({ input }) => {
    const state = input.task.current;
    const step = state.plan?.[state.cursor];
    if (!step) {
      throw new Error(`No step at cursor ${state.cursor}`);
    }
    const attempt = state.currentAttempts + 1;
    return input.task.keepLeaseAlive(() =>
      deps.executor.execute({
        step,
        stepIndex: state.cursor,
        attempt,
        invocation: deps.contextBuilder.build(state, step, attempt),
      })
    );
  });
}

function acceptHints(deps: LoopDeps, task: TaskContext, source: Step, hints: StepHint[]): Step[] {
  const accepted: Step[] = [];
  for (const hint of hints) {
    if (!deps.agentRegistry.has(hint.agent)) {
      task.appendEvent({
        source: source.agent,
        kind: "warning",
        message: `Ignored follow-up step "${hint.title}": agent ${hint.agent} is not registered`,
      });
      continue;
    }
    accepted.push({
      id: nanoid(10),
      agent: hint.agent,
      title: hint.title,
      payload: hint.payload ?? {},
      ...(hint.dependsOn ? { dependsOn: hint.dependsOn } : {}),
      origin: "hint",
    });
  }
  return accepted;
}

/**
 * 折叠一次步骤尝试：无论成败迭代数 +1；成功写入输出并推进游标，
 * 失败按反思结果重试或写入失败标记后跳过。
 */
export function createReflectService(deps: LoopDeps) {
  return fromPromise<StageResult, MachineContext>(async ({ input }) => {
    const { task, run } = input;
    const outcome = run.outcome;
    if (!outcome) {
      throw new Error("Reflection invoked without a step outcome");
    }
    const { step, attempt, response, error } = outcome;
    const reflection = await deps.reflector.reflect({
      state: task.snapshot(),
      outcome,
      maxAttempts: deps.config.maxStepAttempts,
    });

    task.mutate((draft) => {
      draft.iteration += 1;
    });
    if (response) {
      foldEvents(task, step.agent, response.events);
    }
    if (error) {
      const at = deps.now();
      task.appendEvent({
        source: step.agent,
        kind: "error",
        message: `Step "${step.title}" failed: ${error.message}`,
        payload: { errorKind: "StepFailure", cause: error.kind, stepId: step.id, attempt },
      });
      task.mutate((draft) => {
        draft.lastError = { kind: "StepFailure", message: error.message, at };
      });
    }

    switch (reflection.directive) {
      case "advance": {
        const output = structuredClone(response?.output ?? {});
        const hints = acceptHints(deps, task, step, response?.nextSteps ?? []);
        task.mutate((draft) => {
          draft.outputs[step.agent] = structuredClone(output);
          draft.stepRecords[step.id] = { agent: step.agent, status: "succeeded", attempts: attempt };
          draft.plan = [...(draft.plan ?? []), ...structuredClone(hints)];
          draft.cursor += 1;
          draft.currentAttempts = 0;
        });
        if (hints.length > 0) {
          task.appendEvent({ source: "system", kind: "info", message: reflection.message });
        }
        break;
      }
      case "retry":
        task.mutate((draft) => {
          draft.currentAttempts = attempt;
        });
        task.appendEvent({ source: "system", kind: "info", message: reflection.message });
        break;
      case "skip": {
        const failure = error ?? { kind: "StepFailure" as const, message: "step failed" };
        task.mutate((draft) => {
          draft.stepRecords[step.id] = {
            agent: step.agent,
            status: "failed",
            attempts: attempt,
            error: { kind: failure.kind, message: failure.message },
          };
          draft.cursor += 1;
          draft.currentAttempts = 0;
        });
        task.appendEvent({ source: "system", kind: "warning", message: reflection.message });
        break;
      }
    }

    await task.checkpoint();
    return null;
  });
}

/**
 * 评审失败时退化为启发式分数；低于验收阈值只标记低置信度。
 */
export function createCritiqueService(deps: LoopDeps) {
  return fromPromise<StageResult, MachineContext>(async ({ input }) => {
    const { task } = input;
    let verdict: z.infer<typeof CriticOutputSchema> | null = null;
    let problem = "invalid verdict";
    try {
      const response = await deps.executor.invoke(
        "critic",
        deps.contextBuilder.build(task.current, null, 1)
      );
      foldEvents(task, "critic", response.events);
      const parsed = CriticOutputSchema.safeParse(response.output);
      if (response.success && parsed.success) {
        verdict = parsed.data;
      } else {
        problem = response.message ?? problem;
      }
    } catch (error) {
      problem = describeError(error);
    }

    if (!verdict) {
      const state = task.current;
      const plan = state.plan ?? [];
      const succeeded = plan.filter((step) => state.stepRecords[step.id]?.status === "succeeded");
      const artifact = selectArtifactText({
        plan,
        stepRecords: state.stepRecords,
        outputs: state.outputs,
      });
      verdict = {
        score: heuristicScore(plan.length === 0 ? 0 : succeeded.length / plan.length, artifact !== null),
        feedback: [`${succeeded.length}/${plan.length} step(s) succeeded`],
      };
      task.appendEvent({
        source: "system",
        kind: "warning",
        message: `Critic unavailable (${problem}), using heuristic score ${verdict.score}`,
      });
    }

    const { score, feedback } = verdict;
    const threshold = deps.config.acceptanceThreshold;
    task.mutate((draft) => {
      draft.score = score;
      draft.feedback = [...feedback];
      draft.lowConfidence = score < threshold;
    });
    if (score < threshold) {
      task.appendEvent({
        source: "system",
        kind: "warning",
        message: `Score ${score} is below the acceptance threshold ${threshold}`,
      });
    }
    await task.checkpoint();
    return null;
  });
}

export function createFinalizeService(deps: LoopDeps) {
  return fromPromise<StageResult, MachineContext>(async ({ input }) => {
    const { task } = input;
    const state = task.current;
    const plan = state.plan ?? [];
    const selected = selectArtifactText({
      plan,
      stepRecords: state.stepRecords,
      outputs: state.outputs,
    });
    const artifact = selected
      ? await materializeArtifact(
          state.taskId,
          selected,
          deps.config.artifactInlineLimitBytes,
          deps.objectStore
        )
      : null;
    const score = state.score ?? 0;
    const rejected = state.lowConfidence && deps.config.qualityGate === "strict";

    if (!rejected && state.score !== null && score >= deps.config.writeBackThreshold && plan.length > 0) {
      try {
        const { caseId, written } = await deps.caseLibrary.writeBack({
          goal: state.goal,
          entities: state.descriptor?.entities ?? [],
          plan,
          score,
        });
        task.appendEvent({
          source: "system",
          kind: "info",
          message: written ? `Stored case ${caseId}` : `Case ${caseId} is already stored`,
          payload: { caseId, written },
        });
      } catch (error) {
        task.appendEvent({
          source: "system",
          kind: "warning",
          message: `Case write-back failed: ${describeError(error)}`,
        });
      }
    }

    const at = deps.now();
    const gateMessage = `Score ${score} did not pass the strict quality gate (${deps.config.acceptanceThreshold})`;
    task.mutate((draft) => {
      draft.finalArtifact = artifact ? structuredClone(artifact) : null;
      draft.status = rejected ? "failed" : "completed";
      draft.finishedAt = at;
      if (rejected) {
        draft.lastError = { kind: "QualityGate", message: gateMessage, at };
      }
    });
    task.appendEvent(
      rejected
        ? {
            source: "system",
            kind: "error",
            message: gateMessage,
            payload: { errorKind: "QualityGate" },
          }
        : {
            source: "system",
            kind: "result",
            message: `Task completed with score ${score}`,
            payload: { score, lowConfidence: state.lowConfidence },
          }
    );
    const saved = await task.checkpoint();
    deps.eventBus.publish("task.finished", saved.taskId, { status: saved.status, score });
    return null;
  });
}

export function createFailService(deps: LoopDeps) {
  return fromPromise<StageResult, MachineContext>(async ({ input }) => {
    const { task, run } = input;
    const failure = run.failure ?? { kind: "Internal", message: "loop failed without a cause" };
    const at = deps.now();
    task.mutate((draft) => {
      draft.status = "failed";
      draft.lastError = { kind: failure.kind, message: failure.message, at };
      draft.finishedAt = at;
    });
    task.appendEvent({
      source: "system",
      kind: "error",
      message: `${failure.kind}: ${failure.message}`,
      payload: { errorKind: failure.kind },
    });
    const saved = await task.checkpoint();
    deps.eventBus.publish("task.finished", saved.taskId, {
      status: saved.status,
      errorKind: failure.kind,
    });
    return null;
  });
}

export function createSuspendService() {
  return fromPromise<StageResult, MachineContext>(async ({ input }) => {
    const { task, run } = input;
    const state = task.current;
    const reason = run.yieldReason ?? "yield";
    task.mutate((draft) => {
      draft.status = "suspended";
    });
    task.appendEvent({
      source: "system",
      kind: "info",
      message: `Suspended at step ${state.cursor}/${state.plan?.length ?? 0} (${reason})`,
      payload: { reason, cursor: state.cursor },
    });
    await task.checkpoint();
    return null;
  });
}
