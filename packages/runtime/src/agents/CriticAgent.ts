import { z } from "zod";
import type {
  Agent,
  AgentEventDraft,
  AgentInvocation,
  AgentResponse,
  LanguageModel,
} from "../types/index.js";
import { describeError } from "../core/errors.js";
import { selectArtifactText } from "../core/artifact.js";
import { parseJson, succeed } from "./response.js";

const CriticVerdictSchema = z.object({
  verdict: z.enum(["approve", "revise", "reject"]),
  score: z.number().min(0).max(1),
  issues: z.array(z.string()).default([]),
});

const CRITIC_PROMPT =
  'Review the artifact against the goal. Answer only with JSON: {"verdict": "approve"|"revise"|"reject", "score": number between 0 and 1, "issues": string[]}.';

export function roundScore(value: number): number {
  return Math.round(Math.min(1, Math.max(0, value)) * 10_000) / 10_000;
}

/** 0.2 基础分 + 0.7 × 覆盖率 + 0.1 × 是否有产物 */
export function heuristicScore(coverage: number, hasArtifact: boolean): number {
  return roundScore(0.2 + 0.7 * coverage + (hasArtifact ? 0.1 : 0));
}

/**
 * 评审阶段：纯评估，不重试也不修改计划。
 * 模型给出合法 JSON 时与启发式分数取平均。
 */
export class CriticAgent implements Agent {
  public readonly name = "critic";

  public readonly description = "Scores the accumulated outputs against the goal.";

  private readonly llm: LanguageModel;

  constructor(llm: LanguageModel) {
    this.llm = llm;
  }

  async invoke(context: AgentInvocation): Promise<AgentResponse> {
    const plan = context.plan;
    const succeeded = plan.filter((step) => context.stepRecords[step.id]?.status === "succeeded");
    const failed = plan.filter((step) => context.stepRecords[step.id]?.status === "failed");
    const coverage = plan.length === 0 ? 0 : succeeded.length / plan.length;
    const artifact = selectArtifactText({
      plan,
      stepRecords: context.stepRecords,
      outputs: context.priorOutputs,
    });
    const heuristic = heuristicScore(coverage, artifact !== null);

    const feedback: string[] = [`${succeeded.length}/${plan.length} step(s) succeeded`];
    for (const step of failed) {
      const record = context.stepRecords[step.id];
      feedback.push(
        `Step "${step.title}" (${step.agent}) produced no output: ${record?.error?.message ?? "failed"}`
      );
    }
    if (!artifact) {
      feedback.push("No artifact was produced");
    }

    const events: AgentEventDraft[] = [];
    let score = heuristic;
    let verdict: string = heuristic >= 0.7 ? "approve" : "revise";
    if (this.llm.isConfigured() && artifact) {
      try {
        const answer = await this.llm.complete(
          `Goal: ${context.goal}\n\nArtifact:\n${artifact.text.slice(0, 4_000)}`,
          {
            taskId: context.taskId,
            agent: this.name,
            systemPrompt: CRITIC_PROMPT,
            responseFormat: "json_object",
            temperature: 0,
            signal: context.signal,
          }
        );
        const parsed = CriticVerdictSchema.safeParse(parseJson(answer));
        if (parsed.success) {
          score = roundScore((heuristic + parsed.data.score) / 2);
          verdict = parsed.data.verdict;
          feedback.push(...parsed.data.issues);
        } else {
          events.push({ kind: "warning", message: "Model review was not valid JSON, using heuristic score" });
        }
      } catch (error) {
        events.push({
          kind: "warning",
          message: `Model review failed (${describeError(error)}), using heuristic score`,
        });
      }
    }

    for (const item of feedback) {
      events.push({ kind: "info", message: item });
    }
    return succeed(
      { score, heuristic, coverage, verdict, feedback },
      { events, message: `Critic score ${score}` }
    );
  }
}
