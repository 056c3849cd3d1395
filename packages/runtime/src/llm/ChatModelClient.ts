import { z } from "zod";
import { ProviderError, describeError } from "../core/errors.js";
import type { CompletionContext, LanguageModel } from "../types/index.js";

export type ChatModelProvider = "openai" | "deepseek";

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatModelClientOptions {
  provider?: ChatModelProvider;
  apiKey?: string | null;
  baseURL?: string;
  model?: string;
  requestTimeoutMs?: number;
  headers?: Record<string, string>;
  /** 读取默认密钥/地址的环境变量来源，默认 process.env */
  env?: NodeJS.ProcessEnv;
  /** 测试可替换的 fetch 实现 */
  fetchImpl?: typeof fetch;
}

interface ProviderDefaults {
  apiKeyEnv: string;
  baseUrlEnv: string;
  modelEnv: string;
  baseURL: string;
  model: string;
}

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({ content: z.string().nullable().optional() })
          .optional(),
      })
    )
    .optional(),
});

const PROVIDER_DEFAULTS: Record<ChatModelProvider, ProviderDefaults> = {
  openai: {
    apiKeyEnv: "OPENAI_API_KEY",
    baseUrlEnv: "OPENAI_BASE_URL",
    modelEnv: "OPENAI_MODEL",
    baseURL: "https://api.openai.com/v1",
    model: "gpt-4o-mini",
  },
  deepseek: {
    apiKeyEnv: "DEEPSEEK_API_KEY",
    baseUrlEnv: "DEEPSEEK_BASE_URL",
    modelEnv: "DEEPSEEK_MODEL",
    baseURL: "https://api.deepseek.com/v1",
    model: "deepseek-chat",
  },
};

const DEFAULT_REQUEST_TIMEOUT_MS = 15_000;

/**
 * OpenAI 兼容的 chat/completions 客户端。额度、超时、非 2xx 与空响应
 * 都以 ProviderError 抛出，由执行循环按步骤失败处理。
 */
export class ChatModelClient implements LanguageModel {
  private readonly provider: ChatModelProvider;

  private readonly apiKey: string | null;

  private readonly endpoint: string;

  private readonly model: string;

  private readonly requestTimeoutMs: number;

  private readonly headers: Record<string, string>;

  private readonly fetchImpl: typeof fetch;

  constructor(options: ChatModelClientOptions = {}) {
    const env = options.env ?? process.env;
    this.provider = resolveProvider(options, env);
    const defaults = PROVIDER_DEFAULTS[this.provider];

    const resolvedApiKey = options.apiKey ?? env[defaults.apiKeyEnv] ?? null;
    this.apiKey =
      typeof resolvedApiKey === "string" && resolvedApiKey.length > 0
        ? resolvedApiKey
        : null;

    const baseURL = options.baseURL ?? env[defaults.baseUrlEnv] ?? defaults.baseURL;
    this.endpoint = `${stripTrailingSlash(baseURL)}/chat/completions`;
    this.model = options.model ?? env[defaults.modelEnv] ?? defaults.model;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.headers = {
      "Content-Type": "application/json",
      ...(options.headers ?? {}),
    };
    this.fetchImpl = options.fetchImpl ?? fetch;

    console.info("[ChatModelClient] Initialized", {
      provider: this.provider,
      baseURL,
      model: this.model,
      requestTimeoutMs: this.requestTimeoutMs,
      hasApiKey: Boolean(this.apiKey),
    });
  }

  public getProvider(): ChatModelProvider {
    return this.provider;
  }

  public isConfigured(): boolean {
    return Boolean(this.apiKey);
  }

  public async complete(prompt: string, context: CompletionContext = {}): Promise<string> {
    const messages: ChatMessage[] = [];
    if (context.systemPrompt) {
      messages.push({ role: "system", content: context.systemPrompt });
    }
    messages.push({ role: "user", content: prompt });
    return this.chat(messages, context);
  }

  public async chat(messages: ChatMessage[], context: CompletionContext = {}): Promise<string> {
    if (!this.apiKey) {
      throw new ProviderError(
        `ChatModelClient (${this.provider}) is not configured with an API key`
      );
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.requestTimeoutMs);
    const forwardAbort = () => controller.abort();
    context.signal?.addEventListener("abort", forwardAbort, { once: true });

    const body: Record<string, unknown> = {
      model: this.model,
      temperature: context.temperature ?? 0.2,
      max_tokens: context.maxTokens ?? 400,
      messages,
    };
    if (context.responseFormat === "json_object") {
      body.response_format = { type: "json_object" };
    }

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(this.endpoint, {
          method: "POST",
          headers: { ...this.headers, Authorization: `Bearer ${this.apiKey}` },
          body: JSON.stringify(body),
          signal: controller.signal,
        });
      } catch (error) {
        throw new ProviderError(
          controller.signal.aborted
            ? `${capitalize(this.provider)} request aborted after ${this.requestTimeoutMs}ms`
            : `${capitalize(this.provider)} request failed: ${describeError(error)}`,
          { cause: error }
        );
      }

      console.info("[ChatModelClient] Response", {
        provider: this.provider,
        taskId: context.taskId,
        agent: context.agent,
        status: response.status,
      });

      if (!response.ok) {
        const errText = await response.text().catch(() => "");
        throw new ProviderError(
          `${capitalize(this.provider)} request failed with status ${response.status} ${
            response.statusText
          }${errText ? `: ${errText}` : ""}`
        );
      }

      const parsed = ChatCompletionResponseSchema.safeParse(
        await response.json().catch(() => null)
      );
      const content = parsed.success
        ? parsed.data.choices?.[0]?.message?.content?.trim()
        : undefined;
      if (!content) {
        throw new ProviderError(
          `${capitalize(this.provider)} response did not contain any message content`
        );
      }
      return content;
    } finally {
      clearTimeout(timeout);
      context.signal?.removeEventListener("abort", forwardAbort);
    }
  }
}

function resolveProvider(
  options: ChatModelClientOptions,
  env: NodeJS.ProcessEnv
): ChatModelProvider {
  if (options.provider) {
    return options.provider;
  }

  const envProvider = (env.LLM_PROVIDER ?? "").toLowerCase();
  if (envProvider === "openai" || envProvider === "deepseek") {
    return envProvider;
  }

  const preferredProviders: ChatModelProvider[] = ["openai", "deepseek"];
  for (const provider of preferredProviders) {
    if (env[PROVIDER_DEFAULTS[provider].apiKeyEnv]) {
      return provider;
    }
  }

  return "openai";
}

function stripTrailingSlash(value: string): string {
  return value.replace(/\/+$/, "");
}

function capitalize(value: string): string {
  if (!value) return value;
  return value.charAt(0).toUpperCase() + value.slice(1);
}
