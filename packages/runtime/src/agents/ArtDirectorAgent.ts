import type { Agent, AgentInvocation, AgentResponse, LanguageModel } from "../types/index.js";
import { readString, succeed } from "./response.js";

const ART_PROMPT =
  "You are an art director. Produce a concise visual brief: subject, layout, palette, labels.";

export class ArtDirectorAgent implements Agent {
  public readonly name = "art_director";

  public readonly description = "Drafts a visual brief for diagrams, charts and images.";

  private readonly llm: LanguageModel;

  constructor(llm: LanguageModel) {
    this.llm = llm;
  }

  async invoke(context: AgentInvocation): Promise<AgentResponse> {
    const task = readString(context.payload, "task") ?? context.goal;
    const brief = this.llm.isConfigured()
      ? await this.llm.complete(`Visual task: ${task}\nGoal: ${context.goal}`, {
          taskId: context.taskId,
          agent: this.name,
          systemPrompt: ART_PROMPT,
          signal: context.signal,
        })
      : [
          `Visual brief: ${task}`,
          "Layout: single panel, title on top, legend bottom-right",
          "Palette: neutral background with one accent colour",
          `Labels: ${(context.descriptor?.entities ?? []).join(", ") || "derived from the data"}`,
        ].join("\n");

    return succeed({ task, brief, text: brief }, { message: "Visual brief drafted" });
  }
}
