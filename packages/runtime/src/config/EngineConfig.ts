import { readFile } from "fs/promises";
import { z } from "zod";
import { ConfigError } from "../core/errors.js";

const threshold = z.coerce.number().min(0).max(1);

export const LlmConfigSchema = z
  .object({
    provider: z.enum(["openai", "deepseek"]).optional(),
    apiKey: z.string().nullable().optional(),
    baseURL: z.string().url().optional(),
    model: z.string().min(1).optional(),
    requestTimeoutMs: z.coerce.number().int().positive().default(15_000),
  })
  .strict();

export const QueueConfigSchema = z
  .object({
    /** 消息被取出后对其他 worker 隐藏的时长 */
    visibilityTimeoutMs: z.coerce.number().int().positive().default(60_000),
    /** 超过该投递次数进入死信列表 */
    maxDeliveries: z.coerce.number().int().positive().default(5),
    pollIntervalMs: z.coerce.number().int().positive().default(250),
    concurrency: z.coerce.number().int().positive().default(2),
    /** 每个时间片最多执行的步骤尝试数，之后挂起并重新入队 */
    maxStepsPerSlice: z.coerce.number().int().positive().default(25),
  })
  .strict();

export const StorageConfigSchema = z
  .object({
    /** SQLite 文件路径；缺省时使用内存存储 */
    databasePath: z.string().min(1).optional(),
    /** 对象存储目录；缺省时使用内存对象存储 */
    objectStoreDir: z.string().min(1).optional(),
  })
  .strict();

export const EngineConfigSchema = z
  .object({
    recursionLimit: z.coerce.number().int().positive().default(100),
    caseReuse: z.boolean().default(true),
    maxStepAttempts: z.coerce.number().int().positive().default(2),
    stepTimeoutMs: z.coerce.number().int().positive().default(60_000),
    sandboxTimeoutMs: z.coerce.number().int().positive().default(10_000),
    caseTopK: z.coerce.number().int().positive().default(3),
    caseSimilarityThreshold: threshold.default(0.9),
    /** 低于该分数标记为低置信度 */
    acceptanceThreshold: threshold.default(0.7),
    /** 高于（含）该分数才写回案例库，与 acceptanceThreshold 相互独立 */
    writeBackThreshold: threshold.default(0.8),
    qualityGate: z.enum(["advisory", "strict"]).default("advisory"),
    artifactInlineLimitBytes: z.coerce.number().int().nonnegative().default(16 * 1024),
    maxConflictRetries: z.coerce.number().int().nonnegative().default(3),
    /** 须大于 stepTimeoutMs；执行步骤期间另有心跳续租 */
    leaseTtlMs: z.coerce.number().int().positive().default(90_000),
    llm: LlmConfigSchema.default({}),
    queue: QueueConfigSchema.default({}),
    storage: StorageConfigSchema.default({}),
  })
  .strict()
  .superRefine((config, ctx) => {
    if (config.leaseTtlMs <= config.stepTimeoutMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["leaseTtlMs"],
        message: `must exceed stepTimeoutMs (${config.stepTimeoutMs})`,
      });
    }
  });

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

type Section = "llm" | "queue" | "storage";

interface EnvBinding {
  env: string;
  key: string;
  section?: Section;
  kind?: "boolean";
}

const ENV_BINDINGS: EnvBinding[] = [
  { env: "TASKFORGE_RECURSION_LIMIT", key: "recursionLimit" },
  { env: "TASKFORGE_CASE_REUSE", key: "caseReuse", kind: "boolean" },
  { env: "TASKFORGE_MAX_STEP_ATTEMPTS", key: "maxStepAttempts" },
  { env: "TASKFORGE_STEP_TIMEOUT_MS", key: "stepTimeoutMs" },
  { env: "TASKFORGE_SANDBOX_TIMEOUT_MS", key: "sandboxTimeoutMs" },
  { env: "TASKFORGE_CASE_TOP_K", key: "caseTopK" },
  { env: "TASKFORGE_CASE_SIMILARITY", key: "caseSimilarityThreshold" },
  { env: "TASKFORGE_ACCEPTANCE_THRESHOLD", key: "acceptanceThreshold" },
  { env: "TASKFORGE_WRITE_BACK_THRESHOLD", key: "writeBackThreshold" },
  { env: "TASKFORGE_QUALITY_GATE", key: "qualityGate" },
  { env: "TASKFORGE_ARTIFACT_INLINE_LIMIT", key: "artifactInlineLimitBytes" },
  { env: "TASKFORGE_LEASE_TTL_MS", key: "leaseTtlMs" },
  { env: "LLM_PROVIDER", key: "provider", section: "llm" },
  { env: "TASKFORGE_LLM_TIMEOUT_MS", key: "requestTimeoutMs", section: "llm" },
  { env: "TASKFORGE_VISIBILITY_TIMEOUT_MS", key: "visibilityTimeoutMs", section: "queue" },
  { env: "TASKFORGE_MAX_DELIVERIES", key: "maxDeliveries", section: "queue" },
  { env: "TASKFORGE_WORKER_CONCURRENCY", key: "concurrency", section: "queue" },
  { env: "TASKFORGE_STEPS_PER_SLICE", key: "maxStepsPerSlice", section: "queue" },
  { env: "TASKFORGE_DATABASE_PATH", key: "databasePath", section: "storage" },
  { env: "TASKFORGE_OBJECT_STORE_DIR", key: "objectStoreDir", section: "storage" },
];

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseBoolean(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  throw new ConfigError(`${name} must be a boolean, received "${value}"`);
}

export function configFromEnv(env: NodeJS.ProcessEnv): RawConfig {
  const raw: RawConfig = {};
  for (const binding of ENV_BINDINGS) {
    const value = env[binding.env];
    if (value === undefined || value === "") {
      continue;
    }
    const parsed = binding.kind === "boolean" ? parseBoolean(binding.env, value) : value;
    if (binding.section) {
      const section = raw[binding.section];
      raw[binding.section] = {
        ...(isRecord(section) ? section : {}),
        [binding.key]: parsed,
      };
    } else {
      raw[binding.key] = parsed;
    }
  }
  return raw;
}

function mergeRaw(base: RawConfig, extra: RawConfig): RawConfig {
  const merged: RawConfig = { ...base };
  for (const [key, value] of Object.entries(extra)) {
    if (value === undefined) continue;
    const existing = merged[key];
    merged[key] =
      isRecord(existing) && isRecord(value) ? { ...existing, ...value } : value;
  }
  return merged;
}

function parseConfig(raw: RawConfig): EngineConfig {
  const result = EngineConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid engine configuration: ${details}`, {
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * 显式参数优先，其次是环境变量，最后是默认值。
 * 返回的对象由调用方在构造时传入各组件，不存在进程级单例。
 */
export function resolveEngineConfig(
  overrides: EngineConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): EngineConfig {
  return parseConfig(mergeRaw(configFromEnv(env), overrides));
}

export async function loadEngineConfigFile(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<EngineConfig> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(configPath, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Failed to read config file ${configPath}`, {
      cause: error,
    });
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${configPath} must contain a JSON object`);
  }
  return parseConfig(mergeRaw(configFromEnv(env), parsed));
}
