import type {
  AgentRegistry,
  ErrorKind,
  LoopPhase,
  ObjectStore,
  Reflector,
  StepOutcome,
} from "../types/index.js";
import type { TaskContext } from "../core/TaskContext.js";
import type { Executor } from "../core/Executor.js";
import type { CaseLibrary } from "../cbr/CaseLibrary.js";
import type { StepContextBuilder } from "../context/StepContextBuilder.js";
import type { EngineConfig } from "../config/EngineConfig.js";
import type { EventBus } from "../event/EventBus.js";

/** 循环级失败：置入后路由直接进入 failing */
export interface PendingFailure {
  kind: ErrorKind;
  message: string;
}

export interface LoopRun {
  /** 本次驱动已执行的步骤尝试数 */
  stepsExecuted: number;
  /** 绝对截止时间，null 表示不限 */
  deadline: number | null;
  /** 本次驱动允许的最大步骤尝试数，null 表示不限 */
  maxSteps: number | null;
  /** 最近一次步骤执行结果，供反思阶段使用 */
  outcome: StepOutcome | null;
  failure: PendingFailure | null;
  /** 让出控制权的原因（deadline / step budget） */
  yieldReason: string | null;
}

export interface MachineContext {
  /** 任务状态的工作副本，负责修改记录与检查点 */
  task: TaskContext;
  run: LoopRun;
}

/** 循环各阶段共享的协作者，由编排器在每次驱动时注入 */
export interface LoopDeps {
  executor: Executor;
  reflector: Reflector;
  contextBuilder: StepContextBuilder;
  caseLibrary: CaseLibrary;
  agentRegistry: AgentRegistry;
  objectStore: ObjectStore;
  eventBus: EventBus;
  config: EngineConfig;
  now: () => number;
}

export const LOOP_PHASES: readonly LoopPhase[] = [
  "resume",
  "perceiving",
  "planning",
  "routing",
  "checkingControl",
  "acting",
  "reflecting",
  "critiquing",
  "finalizing",
  "failing",
  "suspending",
  "done",
  "failed",
  "suspended",
];

export function isLoopPhase(value: unknown): value is LoopPhase {
  return typeof value === "string" && LOOP_PHASES.some((phase) => phase === value);
}

export function createLoopRun(options: { deadline?: number; maxSteps?: number }): LoopRun {
  return {
    stepsExecuted: 0,
    deadline: options.deadline ?? null,
    maxSteps: options.maxSteps ?? null,
    outcome: null,
    failure: null,
    yieldReason: null,
  };
}
