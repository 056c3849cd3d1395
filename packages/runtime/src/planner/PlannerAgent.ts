import { z } from "zod";
import type {
  Agent,
  AgentEventDraft,
  AgentInvocation,
  AgentRegistry,
  AgentResponse,
  LanguageModel,
  Step,
} from "../types/index.js";
import type { CaseLibrary } from "../cbr/CaseLibrary.js";
import { PlanningFailureError, describeError } from "../core/errors.js";
import { parseJson, succeed } from "../agents/response.js";
import { synthesizeSteps } from "./planRules.js";

export interface PlannerAgentOptions {
  caseLibrary: CaseLibrary;
  agentRegistry: AgentRegistry;
  llm: LanguageModel;
}

const SubtaskListSchema = z.array(z.string().trim().min(1)).min(1).max(8);

const DECOMPOSE_PROMPT = [
  "Decompose the goal into 2-6 concrete, ordered subtasks.",
  "Answer with a JSON array of short imperative strings and nothing else.",
].join(" ");

/**
 * 规划阶段：先查案例库，命中阈值且允许复用时改写历史计划；
 * 否则按子任务关键词规则合成。空计划或未注册的 agent 直接判定规划失败。
 */
export class PlannerAgent implements Agent {
  public readonly name = "planner";

  public readonly description = "Builds the step plan from cases or keyword rules.";

  private readonly options: PlannerAgentOptions;

  constructor(options: PlannerAgentOptions) {
    this.options = options;
  }

  async invoke(context: AgentInvocation): Promise<AgentResponse> {
    const events: AgentEventDraft[] = [];
    const caseReuse = context.payload.caseReuse !== false;
    const descriptor = context.descriptor;
    const entities = descriptor?.entities ?? [];

    const { candidates, match } = await this.options.caseLibrary.findMatch(context.goal);
    const references = candidates.map((candidate) => candidate.case.caseId);
    if (candidates.length > 0) {
      events.push({
        kind: "info",
        message: `Consulted ${candidates.length} case(s), best similarity ${(
          candidates[0]?.similarity ?? 0
        ).toFixed(3)}`,
        payload: { references },
      });
    }

    let steps: Step[];
    let planSource: "case" | "synthesized";
    if (match && caseReuse) {
      steps = this.options.caseLibrary.adapt(match.case, entities);
      planSource = "case";
      events.push({
        kind: "info",
        message: `Adapted case ${match.case.caseId} (similarity ${match.similarity.toFixed(3)})`,
        payload: { caseId: match.case.caseId, similarity: match.similarity },
      });
    } else {
      if (match) {
        events.push({ kind: "info", message: "Case reuse disabled, synthesizing a new plan" });
      }
      const subtasks = await this.resolveSubtasks(context, events);
      steps = synthesizeSteps(context.goal, subtasks);
      planSource = "synthesized";
    }

    this.validate(steps);
    events.push({
      kind: "info",
      message: `Plan ready with ${steps.length} step(s): ${steps.map((step) => step.agent).join(" -> ")}`,
    });
    return succeed({ steps, planSource, references }, { events, message: "Planning completed" });
  }

  private async resolveSubtasks(
    context: AgentInvocation,
    events: AgentEventDraft[]
  ): Promise<string[]> {
    const descriptor = context.descriptor;
    const subtasks = descriptor?.subtasks ?? (context.goal.trim() ? [context.goal.trim()] : []);
    const shouldDecompose =
      descriptor?.complexity === "high" &&
      subtasks.length === 1 &&
      this.options.llm.isConfigured();
    if (!shouldDecompose) {
      return subtasks;
    }

    try {
      const answer = await this.options.llm.complete(`Goal: ${context.goal}`, {
        taskId: context.taskId,
        agent: this.name,
        systemPrompt: DECOMPOSE_PROMPT,
        temperature: 0.3,
        signal: context.signal,
      });
      const parsed = SubtaskListSchema.safeParse(parseJson(answer));
      if (parsed.success) {
        events.push({
          kind: "info",
          message: `Model decomposed the goal into ${parsed.data.length} subtask(s)`,
        });
        return parsed.data;
      }
      events.push({
        kind: "warning",
        message: "Model decomposition was not a valid JSON array, falling back to keyword rules",
      });
    } catch (error) {
      events.push({
        kind: "warning",
        message: `Model decomposition failed (${describeError(error)}), falling back to keyword rules`,
      });
    }
    return subtasks;
  }

  private validate(steps: Step[]): void {
    if (steps.length === 0) {
      throw new PlanningFailureError("Planner produced an empty plan");
    }
    const unknown = steps.filter((step) => !this.options.agentRegistry.has(step.agent));
    if (unknown.length > 0) {
      throw new PlanningFailureError(
        `Plan references unregistered agent(s): ${[...new Set(unknown.map((step) => step.agent))].join(", ")}`
      );
    }
  }
}
