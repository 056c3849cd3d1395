import type { CompletionContext, LanguageModel } from "../types/index.js";
import type { EngineConfig } from "../config/EngineConfig.js";
import { ChatModelClient } from "./ChatModelClient.js";

const PROMPT_HEAD_LIMIT = 180;

/**
 * 未配置模型密钥时使用的确定性补全：回显提示词首行。
 * 同一提示词总是得到同一结果，恢复执行与完整执行可逐字比较。
 */
export class OfflineLanguageModel implements LanguageModel {
  public isConfigured(): boolean {
    return false;
  }

  public async complete(prompt: string, _context?: CompletionContext): Promise<string> {
    const head = (prompt.trim().split("\n")[0] ?? "").slice(0, PROMPT_HEAD_LIMIT);
    return `Offline completion (mock LLM). Echo of prompt head: ${head}`;
  }
}

export function createLanguageModel(
  llm: EngineConfig["llm"],
  env: NodeJS.ProcessEnv = process.env
): LanguageModel {
  const client = new ChatModelClient({
    ...(llm.provider ? { provider: llm.provider } : {}),
    ...(llm.apiKey !== undefined ? { apiKey: llm.apiKey } : {}),
    ...(llm.baseURL ? { baseURL: llm.baseURL } : {}),
    ...(llm.model ? { model: llm.model } : {}),
    requestTimeoutMs: llm.requestTimeoutMs,
    env,
  });
  if (client.isConfigured()) {
    return client;
  }
  console.warn("[LanguageModel] No provider key configured, using offline completions");
  return new OfflineLanguageModel();
}
