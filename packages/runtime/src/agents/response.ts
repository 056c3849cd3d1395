import type { AgentEventDraft, AgentResponse, StepHint } from "../types/index.js";

export function succeed(
  output: Record<string, unknown>,
  extras: { events?: AgentEventDraft[]; nextSteps?: StepHint[]; message?: string } = {}
): AgentResponse {
  return {
    success: true,
    output,
    events: extras.events ?? [],
    ...(extras.nextSteps && extras.nextSteps.length > 0 ? { nextSteps: extras.nextSteps } : {}),
    ...(extras.message ? { message: extras.message } : {}),
  };
}

export function fail(
  message: string,
  output: Record<string, unknown> = {},
  events: AgentEventDraft[] = []
): AgentResponse {
  return { success: false, output, events, message };
}

export function readString(payload: Record<string, unknown>, key: string): string | undefined {
  const value = payload[key];
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined;
}

/** 去掉模型回答外层的 ``` 代码围栏 */
export function stripCodeFence(text: string): string {
  const match = /```[\w-]*\n([\s\S]*?)```/.exec(text);
  return (match?.[1] ?? text).trim();
}

/** 解析模型回答中的 JSON，允许外层代码围栏；无法解析时返回 null */
export function parseJson(text: string): unknown {
  const trimmed = text.trim();
  const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(trimmed);
  try {
    return JSON.parse(fenced?.[1] ?? trimmed);
  } catch {
    return null;
  }
}
