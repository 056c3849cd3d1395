import { assign, setup } from "xstate";
import type { LoopDeps, MachineContext } from "./taskTypes.js";
import { IterationLimitExceededError } from "../core/errors.js";
import {
  createActService,
  createControlService,
  createCritiqueService,
  createFailService,
  createFinalizeService,
  createPerceiveService,
  createPlanService,
  createReflectService,
  createResumeService,
  createSuspendService,
} from "./taskServices.js";

export type { LoopDeps, LoopRun, MachineContext, PendingFailure } from "./taskTypes.js";
export { createLoopRun, isLoopPhase } from "./taskTypes.js";

/**
 * 任务执行循环。每个阶段在落盘检查点后才转移；
 * routing 按 失败 -> 计划耗尽 -> 迭代上限 -> 让出 -> 继续 的顺序判定。
 */
export function createTaskMachine(deps: LoopDeps) {
  return setup({
    types: {
      context: {} as MachineContext,
      input: {} as MachineContext,
    },
    actors: {
      resumeService: createResumeService(deps),
      perceiveService: createPerceiveService(deps),
      planService: createPlanService(deps),
      controlService: createControlService(),
      actService: createActService(deps),
      reflectService: createReflectService(deps),
      critiqueService: createCritiqueService(deps),
      finalizeService: createFinalizeService(deps),
      failService: createFailService(deps),
      suspendService: createSuspendService(),
    },
    guards: {
      needsPerception: ({ context }) => context.task.current.descriptor === null,
      needsPlan: ({ context }) => context.task.current.plan === null,
      hasFailure: ({ context }) => context.run.failure !== null,
      planExhausted: ({ context }) => {
        const state = context.task.current;
        return state.cursor >= (state.plan?.length ?? 0);
      },
      iterationLimitReached: ({ context }) => {
        const state = context.task.current;
        return state.iteration >= state.options.recursionLimit;
      },
      yieldRequested: ({ context }) => {
        const { deadline, maxSteps, stepsExecuted } = context.run;
        return (
          (deadline !== null && deps.now() >= deadline) ||
          (maxSteps !== null && stepsExecuted >= maxSteps)
        );
      },
    },
    actions: {
      recordIterationLimit: assign({
        run: ({ context }) => {
          const error = new IterationLimitExceededError(context.task.current.options.recursionLimit);
          return { ...context.run, failure: { kind: error.kind, message: error.message } };
        },
      }),
      recordYield: assign({
        run: ({ context }) => {
          const { deadline, maxSteps, stepsExecuted } = context.run;
          const reason =
            maxSteps !== null && stepsExecuted >= maxSteps
              ? `step budget of ${maxSteps} used`
              : `deadline ${deadline ?? 0} passed`;
          return { ...context.run, yieldReason: reason };
        },
      }),
    },
  }).createMachine({
    id: "task-loop",
    initial: "resume",
    context: ({ input }) => input,
    states: {
      resume: {
        invoke: {
          src: "resumeService",
          input: ({ context }) => context,
          onDone: [
            { target: "perceiving", guard: "needsPerception" },
            { target: "planning", guard: "needsPlan" },
            { target: "routing" },
          ],
        },
      },
      perceiving: {
        invoke: {
          src: "perceiveService",
          input: ({ context }) => context,
          onDone: { target: "planning" },
        },
      },
      planning: {
        invoke: {
          src: "planService",
          input: ({ context }) => context,
          onDone: {
            target: "routing",
            actions: assign({
              run: ({ context, event }) => ({ ...context.run, failure: event.output }),
            }),
          },
        },
      },
      routing: {
        always: [
          { target: "failing", guard: "hasFailure" },
          { target: "critiquing", guard: "planExhausted" },
          { target: "failing", guard: "iterationLimitReached", actions: "recordIterationLimit" },
          { target: "suspending", guard: "yieldRequested", actions: "recordYield" },
          { target: "checkingControl" },
        ],
      },
      checkingControl: {
        invoke: {
          src: "controlService",
          input: ({ context }) => context,
          onDone: [
            {
              target: "failing",
              guard: ({ event }) => event.output !== null,
              actions: assign({
                run: ({ context, event }) => ({ ...context.run, failure: event.output }),
              }),
            },
            { target: "acting" },
          ],
        },
      },
      acting: {
        invoke: {
          src: "actService",
          input: ({ context }) => context,
          onDone: {
            target: "reflecting",
            actions: assign({
              run: ({ context, event }) => ({
                ...context.run,
                outcome: event.output,
                stepsExecuted: context.run.stepsExecuted + 1,
              }),
            }),
          },
        },
      },
      reflecting: {
        invoke: {
          src: "reflectService",
          input: ({ context }) => context,
          onDone: {
            target: "routing",
            actions: assign({
              run: ({ context }) => ({ ...context.run, outcome: null }),
            }),
          },
        },
      },
      critiquing: {
        invoke: {
          src: "critiqueService",
          input: ({ context }) => context,
          onDone: { target: "finalizing" },
        },
      },
      finalizing: {
        invoke: {
          src: "finalizeService",
          input: ({ context }) => context,
          onDone: { target: "done" },
        },
      },
      failing: {
        invoke: {
          src: "failService",
          input: ({ context }) => context,
          onDone: { target: "failed" },
        },
      },
      suspending: {
        invoke: {
          src: "suspendService",
          input: ({ context }) => context,
          onDone: { target: "suspended" },
        },
      },
      done: { type: "final" },
      failed: { type: "final" },
      suspended: { type: "final" },
    },
  });
}

export type TaskMachine = ReturnType<typeof createTaskMachine>;
