import type {
  Agent,
  AgentEventDraft,
  AgentInvocation,
  AgentResponse,
  GoalDescriptor,
} from "../types/index.js";
import { succeed } from "./response.js";

type Intent = GoalDescriptor["intent"];

const INTENT_RULES: Array<[Intent, RegExp]> = [
  ["weather", /\b(weather|forecast|temperature|rain|snow)\b|天气/i],
  ["calculation", /\b(calculate|compute|sum|average)\b|\d+(\.\d+)?\s*[-+*/^%]\s*\d+|计算/i],
  ["visual", /\b(diagram|image|visual|plot|chart|draw|illustrat\w*)\b|图表|画/i],
  ["code", /\b(code|script|function|tool|utility|helper|program)\b|代码|脚本/i],
  ["research", /\b(search|research|find|compare|investigate|look up)\b|搜索|研究/i],
  ["writing", /\b(write|summari[sz]e|report|essay|draft|explain|describe)\b|总结|报告/i],
];

// 句首动词等大写词不算实体
const NON_ENTITY_WORDS = new Set([
  "A", "An", "The", "I", "Please", "What", "How", "Why", "When", "Where",
  "Weather", "Write", "Search", "Find", "Compare", "Research", "Summarize",
  "Summarise", "Calculate", "Compute", "Create", "Draw", "Build", "Generate",
  "Make", "Tell", "Give", "Show", "Explain", "Describe", "Then", "And",
]);

const BULLET = /^\s*(?:[-*•]|\d+[.)])\s*/;

export function normalizeGoal(goal: string): string {
  return goal.replace(/\s+/g, " ").trim();
}

export function classifyIntent(text: string): Intent {
  const match = INTENT_RULES.find(([, pattern]) => pattern.test(text));
  return match ? match[0] : "unknown";
}

export function extractEntities(text: string): string[] {
  const entities: string[] = [];
  const push = (value: string) => {
    const trimmed = value.trim();
    if (trimmed && !entities.includes(trimmed)) entities.push(trimmed);
  };

  const quoted = /"([^"]+)"|“([^”]+)”/g;
  for (const match of text.matchAll(quoted)) {
    push(match[1] ?? match[2] ?? "");
  }
  const unquoted = text.replace(quoted, " ");

  let run: string[] = [];
  const flush = () => {
    if (run.length > 0) push(run.join(" "));
    run = [];
  };
  for (const raw of unquoted.split(/\s+/)) {
    const word = raw.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, "");
    if (/^\p{Lu}[\p{L}\p{N}'-]*$/u.test(word) && !NON_ENTITY_WORDS.has(word)) {
      run.push(word);
    } else {
      flush();
      if (/^\d+(\.\d+)?$/.test(word)) push(word);
    }
    if (/[,.;:!?]$/.test(raw)) flush();
  }
  flush();
  return entities;
}

export function splitSubtasks(goal: string): string[] {
  const lines = goal
    .split(/\r?\n/)
    .map((line) => line.replace(BULLET, "").trim())
    .filter((line) => line.length > 0);
  if (lines.length > 1) {
    return lines;
  }
  const single = lines[0] ?? "";
  const clauses = single
    .split(/\s*;\s*|\s*,?\s+\band then\b\s+|\s*,?\s+\bthen\b\s+/i)
    .map((clause) => clause.trim())
    .filter((clause) => clause.length > 0);
  return clauses.length > 0 ? clauses : single ? [single] : [];
}

export function estimateComplexity(normalized: string, subtasks: string[]): GoalDescriptor["complexity"] {
  const words = normalized.split(" ").filter(Boolean).length;
  if (words > 30 || subtasks.length >= 4) return "high";
  if (words <= 12 && subtasks.length <= 1) return "low";
  return "medium";
}

/**
 * 感知阶段：把原始目标整理为结构化描述。无法提取结构时原样透传并记录告警，从不阻断流程。
 */
export class PerceptorAgent implements Agent {
  public readonly name = "perceptor";

  public readonly description = "Classifies the goal and extracts entities and subtasks.";

  async invoke(context: AgentInvocation): Promise<AgentResponse> {
    const normalizedGoal = normalizeGoal(context.goal);
    const subtasks = splitSubtasks(context.goal);
    const descriptor: GoalDescriptor = {
      rawGoal: context.goal,
      normalizedGoal,
      intent: classifyIntent(normalizedGoal),
      entities: extractEntities(context.goal),
      complexity: estimateComplexity(normalizedGoal, subtasks),
      subtasks,
    };

    const events: AgentEventDraft[] = [];
    if (descriptor.intent === "unknown" && descriptor.entities.length === 0) {
      events.push({
        kind: "warning",
        message: "Goal structure could not be inferred; passing the raw goal through",
      });
    } else {
      events.push({
        kind: "info",
        message: `Intent ${descriptor.intent}, ${descriptor.subtasks.length} subtask(s), complexity ${descriptor.complexity}`,
        payload: { entities: descriptor.entities },
      });
    }
    return succeed({ descriptor }, { events, message: "Perception completed" });
  }
}
