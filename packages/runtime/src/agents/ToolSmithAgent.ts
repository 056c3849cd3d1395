import type {
  Agent,
  AgentInvocation,
  AgentResponse,
  LanguageModel,
  ObjectStore,
  Sandbox,
} from "../types/index.js";
import { readString, stripCodeFence, succeed } from "./response.js";

export interface ToolSmithAgentOptions {
  llm: LanguageModel;
  sandbox: Sandbox;
  objectStore: ObjectStore;
  sandboxTimeoutMs: number;
}

const TOOLSMITH_PROMPT =
  "Write a small self-contained JavaScript ES module for Node.js that performs the task and prints its result with console.log. Reply with code only.";

/**
 * 工具 agent：生成一段 JavaScript 并在沙箱中验证；payload.persist 为真时把代码存入对象存储。
 * 沙箱超时或故障直接抛出，交给执行循环的重试策略。
 */
export class ToolSmithAgent implements Agent {
  public readonly name = "toolsmith";

  public readonly description = "Writes a small utility script and checks it in the sandbox.";

  private readonly options: ToolSmithAgentOptions;

  constructor(options: ToolSmithAgentOptions) {
    this.options = options;
  }

  async invoke(context: AgentInvocation): Promise<AgentResponse> {
    const task = readString(context.payload, "task") ?? context.goal;
    const code = readString(context.payload, "code") ?? (await this.generate(task, context));

    const result = await this.options.sandbox.run(code, this.options.sandboxTimeoutMs);
    const output: Record<string, unknown> = {
      task,
      code,
      stdout: result.stdout,
      stderr: result.stderr,
      exitStatus: result.exitStatus,
      text: result.stdout.trim(),
    };

    if (context.payload.persist === true) {
      output.uri = await this.options.objectStore.put(code, {
        key: `${context.taskId}/toolsmith-${context.step?.id ?? "tool"}.mjs`,
        mediaType: "text/javascript",
      });
    }

    if (result.exitStatus !== 0) {
      return {
        success: false,
        output,
        events: [{ kind: "error", message: `Sandbox exited with status ${result.exitStatus}` }],
        message: result.stderr.trim().split("\n")[0] || `exit status ${result.exitStatus}`,
      };
    }
    return succeed(output, {
      events: [{ kind: "result", message: "Tool script ran successfully in the sandbox" }],
      message: "Tool created",
    });
  }

  private async generate(task: string, context: AgentInvocation): Promise<string> {
    if (!this.options.llm.isConfigured()) {
      return `console.log(${JSON.stringify(`Tool stub for: ${task}`)});\n`;
    }
    const answer = await this.options.llm.complete(`Task: ${task}`, {
      taskId: context.taskId,
      agent: this.name,
      systemPrompt: TOOLSMITH_PROMPT,
      maxTokens: 800,
      signal: context.signal,
    });
    return stripCodeFence(answer);
  }
}
