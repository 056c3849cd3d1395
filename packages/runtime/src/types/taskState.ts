import { z } from "zod";

export const TaskStatusSchema = z.enum([
  "created", // 已创建，尚未有驱动器执行
  "running", // 正在被某个驱动器推进
  "suspended", // 让出控制权，等待恢复
  "completed", // 终态：流程结束（可能为低置信度）
  "failed", // 终态：循环级失败或被取消
]);

export const EventKindSchema = z.enum(["info", "warning", "error", "result"]);

export const ErrorKindSchema = z.enum([
  "PlanningFailure",
  "StepFailure",
  "StepTimeout",
  "IterationLimitExceeded",
  "ProviderError",
  "SandboxTimeout",
  "SandboxFault",
  "PersistenceConflict",
  "Cancelled",
  "TaskNotFound",
  "LeaseUnavailable",
  "ConfigError",
  "QualityGate",
  "Internal",
]);

export const TaskEventSchema = z
  .object({
    /** 追加顺序号，从 1 开始，全序即追加序 */
    seq: z.number().int().min(1),
    /** 事件发生时间（毫秒时间戳） */
    timestamp: z.number().int().nonnegative(),
    /** 事件来源：agent 名称或 "system" */
    source: z.string().min(1),
    kind: EventKindSchema,
    message: z.string(),
    /** 可选：结构化负载 */
    payload: z.record(z.string(), z.unknown()).optional(),
  })
  .strict();

export const StepOriginSchema = z.enum([
  "planner", // Planner 从零拆解
  "case", // 由历史案例改写
  "hint", // 执行期间由 agent 追加
]);

export const StepSchema = z
  .object({
    /** 步骤唯一标识 */
    id: z.string().min(1),
    /** 绑定的 agent 名称，经注册表解析 */
    agent: z.string().min(1),
    /** 便于日志展示的标题 */
    title: z.string().min(1),
    /** 交给 agent 的不透明输入 */
    payload: z.record(z.string(), z.unknown()),
    /** 可选：依赖的前序步骤 ID */
    dependsOn: z.array(z.string().min(1)).optional(),
    origin: StepOriginSchema,
  })
  .strict();

export const StepHintSchema = z
  .object({
    agent: z.string().min(1),
    title: z.string().min(1),
    payload: z.record(z.string(), z.unknown()).optional(),
    dependsOn: z.array(z.string().min(1)).optional(),
  })
  .strict();

export const StepRecordSchema = z
  .object({
    agent: z.string().min(1),
    status: z.enum(["succeeded", "failed"]),
    attempts: z.number().int().min(1),
    error: z
      .object({ kind: ErrorKindSchema, message: z.string() })
      .strict()
      .optional(),
  })
  .strict();

export const GoalDescriptorSchema = z
  .object({
    rawGoal: z.string(),
    normalizedGoal: z.string(),
    intent: z.enum([
      "weather",
      "research",
      "calculation",
      "code",
      "visual",
      "writing",
      "unknown",
    ]),
    entities: z.array(z.string()),
    complexity: z.enum(["low", "medium", "high"]),
    subtasks: z.array(z.string()),
  })
  .strict();

export const ArtifactSchema = z.discriminatedUnion("kind", [
  z
    .object({
      kind: z.literal("inline"),
      content: z.string(),
      mediaType: z.string(),
    })
    .strict(),
  z
    .object({
      kind: z.literal("blob"),
      uri: z.string().min(1),
      sizeBytes: z.number().int().nonnegative(),
      mediaType: z.string(),
    })
    .strict(),
]);

export const LastErrorSchema = z
  .object({
    kind: ErrorKindSchema,
    message: z.string(),
    at: z.number().int().nonnegative(),
  })
  .strict();

export const TaskOptionsSchema = z
  .object({
    recursionLimit: z.number().int().positive(),
    caseReuse: z.boolean(),
  })
  .strict();

export const TaskStateSchema = z
  .object({
    taskId: z.string().min(1),
    name: z.string(),
    goal: z.string(),
    metadata: z.record(z.string(), z.unknown()),
    status: TaskStatusSchema,
    options: TaskOptionsSchema,
    /** Perceptor 产出的目标描述，未感知前为 null */
    descriptor: GoalDescriptorSchema.nullable(),
    /** 活动计划，Planner 运行前为 null；执行期只追加 */
    plan: z.array(StepSchema).nullable(),
    /** 下一个待执行步骤的索引 */
    cursor: z.number().int().min(0),
    /** agent 名称 -> 最近一次结构化输出 */
    outputs: z.record(z.string(), z.record(z.string(), z.unknown())),
    /** step id -> 执行结果标记（含失败标记） */
    stepRecords: z.record(z.string(), StepRecordSchema),
    finalArtifact: ArtifactSchema.nullable(),
    score: z.number().min(0).max(1).nullable(),
    lowConfidence: z.boolean(),
    feedback: z.array(z.string()),
    events: z.array(TaskEventSchema),
    /** 已消耗的循环迭代数（每次步骤尝试 +1） */
    iteration: z.number().int().min(0),
    /** 游标所指步骤已失败的尝试次数，推进游标时清零 */
    currentAttempts: z.number().int().min(0),
    cancelRequested: z.boolean(),
    lastError: LastErrorSchema.nullable(),
    planSource: z.enum(["case", "synthesized"]).nullable(),
    references: z.array(z.string()),
    /** 乐观并发版本号，每次持久化 +1 */
    version: z.number().int().min(0),
    createdAt: z.number().int().nonnegative(),
    updatedAt: z.number().int().nonnegative(),
    startedAt: z.number().int().nonnegative().nullable(),
    finishedAt: z.number().int().nonnegative().nullable(),
  })
  .strict()
  .refine((state) => state.cursor <= (state.plan?.length ?? 0), {
    path: ["cursor"],
    message: "cursor must not exceed plan length",
  })
  .refine(
    (state) => state.events.every((event, index) => event.seq === index + 1),
    {
      path: ["events"],
      message: "event sequence numbers must follow append order",
    }
  );

export const AgentEventDraftSchema = z
  .object({
    kind: EventKindSchema,
    message: z.string(),
    payload: z.record(z.string(), z.unknown()).optional(),
  })
  .strict();

export const AgentResponseSchema = z
  .object({
    success: z.boolean(),
    output: z.record(z.string(), z.unknown()),
    events: z.array(AgentEventDraftSchema),
    nextSteps: z.array(StepHintSchema).optional(),
    message: z.string().optional(),
  })
  .strict();

export const CaseSchema = z
  .object({
    /** fingerprintKey + planHash，写入幂等键 */
    caseId: z.string().min(1),
    fingerprint: z.array(z.number()),
    fingerprintKey: z.string().min(1),
    goal: z.string(),
    entities: z.array(z.string()),
    plan: z.array(StepSchema).min(1),
    planHash: z.string().min(1),
    score: z.number().min(0).max(1),
    createdAt: z.number().int().nonnegative(),
  })
  .strict();

export type TaskStatus = z.infer<typeof TaskStatusSchema>;
export type EventKind = z.infer<typeof EventKindSchema>;
export type ErrorKind = z.infer<typeof ErrorKindSchema>;
export type TaskEvent = z.infer<typeof TaskEventSchema>;
export type StepOrigin = z.infer<typeof StepOriginSchema>;
export type Step = z.infer<typeof StepSchema>;
export type StepHint = z.infer<typeof StepHintSchema>;
export type StepRecord = z.infer<typeof StepRecordSchema>;
export type GoalDescriptor = z.infer<typeof GoalDescriptorSchema>;
export type Artifact = z.infer<typeof ArtifactSchema>;
export type LastError = z.infer<typeof LastErrorSchema>;
export type TaskOptions = z.infer<typeof TaskOptionsSchema>;
export type TaskState = z.infer<typeof TaskStateSchema>;
export type AgentEventDraft = z.infer<typeof AgentEventDraftSchema>;
export type AgentResponse = z.infer<typeof AgentResponseSchema>;
export type Case = z.infer<typeof CaseSchema>;

export const TERMINAL_STATUSES: readonly TaskStatus[] = ["completed", "failed"];

const ALLOWED_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  created: ["running", "failed"],
  running: ["suspended", "completed", "failed"],
  suspended: ["running", "failed"],
  completed: [],
  failed: [],
};

export function isTerminalStatus(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return from === to
    ? !isTerminalStatus(from)
    : ALLOWED_TRANSITIONS[from].includes(to);
}

export function serializeTaskState(state: TaskState): string {
  return JSON.stringify(TaskStateSchema.parse(state));
}

export function deserializeTaskState(raw: string): TaskState {
  const parsed: unknown = JSON.parse(raw);
  return TaskStateSchema.parse(parsed);
}

export interface InitialTaskStateInput {
  taskId: string;
  goal: string;
  name?: string;
  metadata?: Record<string, unknown>;
  options: TaskOptions;
  now?: number;
}

/** 任务名缺省时取目标的前 120 个字符 */
export const TASK_NAME_LIMIT = 120;

export function createInitialTaskState(input: InitialTaskStateInput): TaskState {
  const now = input.now ?? Date.now();
  return TaskStateSchema.parse({
    taskId: input.taskId,
    name: input.name ?? input.goal.slice(0, TASK_NAME_LIMIT),
    goal: input.goal,
    metadata: input.metadata ?? {},
    status: "created",
    options: input.options,
    descriptor: null,
    plan: null,
    cursor: 0,
    outputs: {},
    stepRecords: {},
    finalArtifact: null,
    score: null,
    lowConfidence: false,
    feedback: [],
    events: [],
    iteration: 0,
    currentAttempts: 0,
    cancelRequested: false,
    lastError: null,
    planSource: null,
    references: [],
    version: 0,
    createdAt: now,
    updatedAt: now,
    startedAt: null,
    finishedAt: null,
  });
}
