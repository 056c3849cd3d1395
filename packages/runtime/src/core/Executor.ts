// 执行器：按步骤绑定的 agent 名称从注册表解析并调用，同时在总线上广播请求/结果事件
import type {
  AgentInvocation,
  AgentRegistry,
  AgentResponse,
  Step,
  StepOutcome,
} from "../types/index.js";
import { AgentResponseSchema } from "../types/taskState.js";
import { EventBus } from "../event/EventBus.js";
import { StepFailureError, TaskforgeError, describeError, errorKindOf } from "./errors.js";

export interface ExecutorOptions {
  agentRegistry: AgentRegistry;
  eventBus: EventBus;
  stepTimeoutMs: number;
}

export type InvocationDraft = Omit<AgentInvocation, "signal">;

export class Executor {
  private agentRegistry: AgentRegistry;

  private eventBus: EventBus;

  private stepTimeoutMs: number;

  constructor(options: ExecutorOptions) {
    this.agentRegistry = options.agentRegistry;
    this.eventBus = options.eventBus;
    this.stepTimeoutMs = options.stepTimeoutMs;
  }

  /**
   * 调用任意 agent（含感知/规划/评审阶段），超时或返回不合法响应都抛出 StepFailureError。
   */
  public async invoke(agentName: string, draft: InvocationDraft): Promise<AgentResponse> {
    const agent = this.agentRegistry.get(agentName);
    if (!agent) {
      throw new StepFailureError(`Agent ${agentName} is not registered`, "StepFailure");
    }

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // 先让超时赢得竞争，再通知 agent 中止
        reject(
          new StepFailureError(
            `Agent ${agentName} timed out after ${this.stepTimeoutMs}ms`,
            "StepTimeout"
          )
        );
        controller.abort();
      }, this.stepTimeoutMs);
    });

    try {
      const raw = await Promise.race([
        agent.invoke({ ...draft, signal: controller.signal }),
        timeout,
      ]);
      const parsed = AgentResponseSchema.safeParse(raw);
      if (!parsed.success) {
        throw new StepFailureError(
          `Agent ${agentName} returned a malformed response: ${parsed.error.message}`,
          "StepFailure"
        );
      }
      return parsed.data;
    } catch (error) {
      if (error instanceof StepFailureError) {
        throw error;
      }
      throw new StepFailureError(
        `Agent ${agentName} failed: ${describeError(error)}`,
        error instanceof TaskforgeError ? error.kind : "Internal",
        { cause: error }
      );
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * 执行计划中的一步。步骤级失败不会抛出，而是折叠进 StepOutcome。
   */
  public async execute({
    step,
    stepIndex,
    attempt,
    invocation,
  }: {
    step: Step;
    stepIndex: number;
    attempt: number;
    invocation: InvocationDraft;
  }): Promise<StepOutcome> {
    const taskId = invocation.taskId;
    this.eventBus.publish("step.request", taskId, {
      agent: step.agent,
      stepId: step.id,
      stepIndex,
      attempt,
    });

    const startedAt = Date.now();
    let outcome: StepOutcome;
    try {
      const response = await this.invoke(step.agent, invocation);
      outcome = {
        step,
        stepIndex,
        attempt,
        response,
        error: response.success
          ? null
          : {
              kind: "StepFailure",
              message: response.message ?? `Agent ${step.agent} reported failure`,
            },
        latencyMs: Date.now() - startedAt,
      };
    } catch (error) {
      outcome = {
        step,
        stepIndex,
        attempt,
        response: null,
        error: { kind: errorKindOf(error), message: describeError(error) },
        latencyMs: Date.now() - startedAt,
      };
    }

    this.eventBus.publish("step.result", taskId, {
      agent: step.agent,
      stepId: step.id,
      stepIndex,
      attempt,
      success: outcome.error === null,
      latencyMs: outcome.latencyMs,
      ...(outcome.error ? { error: outcome.error } : {}),
    });
    return outcome;
  }
}
