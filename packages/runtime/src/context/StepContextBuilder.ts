import type { Step, TaskState } from "../types/index.js";
import type { InvocationDraft } from "../core/Executor.js";

export interface StepContextBuilderOptions {
  /**
   * 提示词中每个前序输出保留的最大字符数。
   */
  maxOutputChars?: number;
}

/**
 * 把任务状态转换为 agent 调用上下文：目标、步骤负载与全部已累积输出，
 * 使后续步骤可以消费前序结果（例如 writer 消费 researcher 的输出）。
 */
export class StepContextBuilder {
  private readonly maxOutputChars: number;

  constructor(options: StepContextBuilderOptions = {}) {
    this.maxOutputChars = options.maxOutputChars ?? 1_200;
  }

  build(state: Readonly<TaskState>, step: Step | null, attempt: number): InvocationDraft {
    const dependencies: Record<string, Record<string, unknown>> = {};
    for (const dependencyId of step?.dependsOn ?? []) {
      const record = state.stepRecords[dependencyId];
      const output = record?.status === "succeeded" ? state.outputs[record.agent] : undefined;
      if (output) {
        dependencies[dependencyId] = structuredClone(output);
      }
    }
    return {
      taskId: state.taskId,
      goal: state.goal,
      name: state.name,
      metadata: structuredClone(state.metadata),
      descriptor: state.descriptor ? structuredClone(state.descriptor) : null,
      step: step ? structuredClone(step) : null,
      plan: structuredClone(state.plan ?? []),
      payload: step ? structuredClone(step.payload) : {},
      priorOutputs: structuredClone(state.outputs),
      dependencies,
      stepRecords: structuredClone(state.stepRecords),
      attempt,
    };
  }

  /** 把前序输出整理成提示词片段，按 agent 名称排序保证确定性 */
  formatPriorOutputs(priorOutputs: Record<string, Record<string, unknown>>): string {
    const entries = Object.entries(priorOutputs).sort(([a], [b]) => a.localeCompare(b));
    if (entries.length === 0) {
      return "(no prior outputs)";
    }
    return entries
      .map(([agent, output]) => {
        const text = typeof output.text === "string" ? output.text : JSON.stringify(output);
        const clipped =
          text.length > this.maxOutputChars ? `${text.slice(0, this.maxOutputChars)}…` : text;
        return `- ${agent}: ${clipped}`;
      })
      .join("\n");
  }
}
