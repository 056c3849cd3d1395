import type { Agent, AgentInvocation, AgentResponse, LanguageModel } from "../types/index.js";
import { StepContextBuilder } from "../context/StepContextBuilder.js";
import { readString, succeed } from "./response.js";

const WRITER_PROMPT =
  "You are a precise technical writer. Use only the provided findings; say so when information is missing.";

/**
 * 写作 agent：消费前序步骤的输出。未配置模型时按前序输出拼出确定性的摘要。
 */
export class WriterAgent implements Agent {
  public readonly name = "writer";

  public readonly description = "Writes the answer from the goal and earlier step outputs.";

  private readonly llm: LanguageModel;

  private readonly contextBuilder: StepContextBuilder;

  constructor(llm: LanguageModel, contextBuilder: StepContextBuilder = new StepContextBuilder()) {
    this.llm = llm;
    this.contextBuilder = contextBuilder;
  }

  async invoke(context: AgentInvocation): Promise<AgentResponse> {
    const task = readString(context.payload, "task") ?? context.goal;
    const agentOf = new Map(context.plan.map((step) => [step.id, step.agent]));
    const sources = Object.keys(context.dependencies).length > 0
      ? Object.fromEntries(
          Object.entries(context.dependencies).map(([stepId, output]) => [
            agentOf.get(stepId) ?? stepId,
            output,
          ])
        )
      : context.priorOutputs;
    const findings = this.contextBuilder.formatPriorOutputs(sources);

    const text = this.llm.isConfigured()
      ? await this.llm.complete(
          [`Goal: ${context.goal}`, `Task: ${task}`, "Findings:", findings].join("\n"),
          {
            taskId: context.taskId,
            agent: this.name,
            systemPrompt: WRITER_PROMPT,
            maxTokens: 800,
            signal: context.signal,
          }
        )
      : composeDigest(task, sources);

    const missing = context.step?.dependsOn?.filter((id) => !(id in context.dependencies)) ?? [];
    return succeed(
      { task, text, sources: Object.keys(sources).sort() },
      {
        events:
          missing.length > 0
            ? [{ kind: "warning", message: `${missing.length} input step(s) produced no output` }]
            : [],
        message: "Writing completed",
      }
    );
  }
}

function composeDigest(task: string, sources: Record<string, Record<string, unknown>>): string {
  const lines = Object.entries(sources)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([name, output]) => {
      const text = typeof output.text === "string" ? output.text : JSON.stringify(output);
      return `- ${name}: ${text}`;
    });
  return lines.length > 0
    ? `${task}\n${lines.join("\n")}`
    : `${task}\nNo findings were available.`;
}
