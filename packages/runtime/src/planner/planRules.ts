import { nanoid } from "nanoid";
import type { Step } from "../types/index.js";

export const AGENT = {
  weather: "weather",
  researcher: "researcher",
  calculator: "calculator",
  toolsmith: "toolsmith",
  artDirector: "art_director",
  writer: "writer",
} as const;

const AGENT_RULES: Array<{ agent: string; pattern: RegExp }> = [
  { agent: AGENT.weather, pattern: /\b(weather|forecast|temperature)\b|天气/i },
  { agent: AGENT.calculator, pattern: /\b(calculate|compute)\b|\d+(\.\d+)?\s*[-+*/^%]\s*\d+|计算/i },
  { agent: AGENT.artDirector, pattern: /\b(diagram|image|visual|plot|chart|illustrat\w*)\b|图表/i },
  { agent: AGENT.toolsmith, pattern: /\b(tool|utility|helper|script)\b|脚本/i },
  { agent: AGENT.researcher, pattern: /\b(search|research|find|compare|investigate|look up)\b|搜索|研究/i },
];

/** 产出数据、需要 writer 汇总的 agent */
const GATHERING_AGENTS = new Set<string>([AGENT.weather, AGENT.researcher, AGENT.calculator]);

export function assignAgent(subtask: string): string {
  return AGENT_RULES.find(({ pattern }) => pattern.test(subtask))?.agent ?? AGENT.writer;
}

export function extractLocation(text: string): string | undefined {
  const match =
    /\b(?:in|for|at)\s+(.+?)(?:\s+(?:today|tomorrow|tonight|this week|now))?\s*[?.!]*$/i.exec(text);
  const location = match?.[1]?.trim();
  return location && location.length > 0 ? location : undefined;
}

export function extractDay(text: string): "today" | "tomorrow" {
  return /\btomorrow\b|明天/i.test(text) ? "tomorrow" : "today";
}

export function extractExpression(text: string): string | undefined {
  const candidates = text.match(/[\d.()\s]*\d[\d.()\s]*(?:[-+*/^%][\d.()\s]*\d[\d.()\s]*)+/g) ?? [];
  const best = candidates
    .map((candidate) => candidate.trim())
    .sort((a, b) => b.length - a.length)[0];
  return best && best.length > 0 ? best : undefined;
}

function payloadFor(agent: string, subtask: string): Record<string, unknown> {
  switch (agent) {
    case AGENT.weather: {
      const location = extractLocation(subtask);
      return { task: subtask, ...(location ? { location } : {}), day: extractDay(subtask) };
    }
    case AGENT.calculator: {
      const expression = extractExpression(subtask);
      return { task: subtask, ...(expression ? { expression } : {}) };
    }
    case AGENT.researcher:
      return { task: subtask, query: subtask };
    default:
      return { task: subtask };
  }
}

/**
 * 按关键词规则把每个子任务映射为一步；计划收集了数据却没有 writer 时追加一个汇总步骤。
 */
export function synthesizeSteps(goal: string, subtasks: string[]): Step[] {
  const steps: Step[] = subtasks
    .map((subtask) => subtask.trim())
    .filter((subtask) => subtask.length > 0)
    .map((subtask) => {
      const agent = assignAgent(subtask);
      return {
        id: nanoid(10),
        agent,
        title: subtask.length > 80 ? `${subtask.slice(0, 77)}...` : subtask,
        payload: payloadFor(agent, subtask),
        origin: "planner" as const,
      };
    });

  const gathering = steps.filter((step) => GATHERING_AGENTS.has(step.agent));
  const hasWriter = steps.some((step) => step.agent === AGENT.writer);
  if (gathering.length > 0 && !hasWriter) {
    steps.push({
      id: nanoid(10),
      agent: AGENT.writer,
      title: "Summarize results",
      payload: { task: `Summarize the results for: ${goal}`, summarize: true },
      dependsOn: gathering.map((step) => step.id),
      origin: "planner",
    });
  }
  return steps;
}
