import type { Observable } from "rxjs";
import type {
  AgentResponse,
  Case,
  ErrorKind,
  EventKind,
  GoalDescriptor,
  Step,
  StepRecord,
  TaskEvent,
  TaskState,
  TaskStatus,
} from "./taskState.js";

export {
  AgentEventDraftSchema,
  AgentResponseSchema,
  ArtifactSchema,
  CaseSchema,
  ErrorKindSchema,
  EventKindSchema,
  GoalDescriptorSchema,
  LastErrorSchema,
  StepHintSchema,
  StepOriginSchema,
  StepRecordSchema,
  StepSchema,
  TaskEventSchema,
  TaskOptionsSchema,
  TaskStateSchema,
  TaskStatusSchema,
  TERMINAL_STATUSES,
  TASK_NAME_LIMIT,
  canTransition,
  createInitialTaskState,
  deserializeTaskState,
  isTerminalStatus,
  serializeTaskState,
} from "./taskState.js";

export type {
  AgentEventDraft,
  AgentResponse,
  Artifact,
  Case,
  ErrorKind,
  EventKind,
  GoalDescriptor,
  InitialTaskStateInput,
  LastError,
  Step,
  StepHint,
  StepOrigin,
  StepRecord,
  TaskEvent,
  TaskOptions,
  TaskState,
  TaskStatus,
} from "./taskState.js";

// ---------------------------------------------------------------- agents

export interface AgentInvocation {
  taskId: string;
  goal: string;
  /** 任务名称，默认取目标前 120 个字符 */
  name: string;
  /** 提交时附带的自定义元数据 */
  metadata: Record<string, unknown>;
  /** Perceptor 产出的目标描述；感知阶段本身为 null */
  descriptor: GoalDescriptor | null;
  /** 当前步骤；感知/规划/评审阶段为 null */
  step: Step | null;
  /** 活动计划的副本；规划完成前为空数组 */
  plan: Step[];
  payload: Record<string, unknown>;
  /** 已累积的各 agent 输出 */
  priorOutputs: Record<string, Record<string, unknown>>;
  /** dependsOn 中每个步骤对应的输出（缺失即为失败或未执行） */
  dependencies: Record<string, Record<string, unknown>>;
  stepRecords: Record<string, StepRecord>;
  /** 当前尝试次数，从 1 开始 */
  attempt: number;
  signal: AbortSignal;
}

export interface Agent {
  /** 注册表键，也是 outputs 中的键 */
  name: string;
  description: string;
  invoke(context: AgentInvocation): Promise<AgentResponse>;
}

export interface AgentRegistry {
  get(name: string): Agent | undefined;
  has(name: string): boolean;
  list(): Agent[];
}

// ---------------------------------------------------------------- capabilities

export interface CompletionContext {
  taskId?: string;
  agent?: string;
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
  responseFormat?: "json_object" | "text";
  signal?: AbortSignal;
}

export interface LanguageModel {
  /** 失败时抛出 ProviderError（额度、超时、响应格式错误） */
  complete(prompt: string, context?: CompletionContext): Promise<string>;
  isConfigured(): boolean;
}

export interface Embedder {
  embed(text: string): Promise<number[]>;
}

export interface SandboxResult {
  stdout: string;
  stderr: string;
  exitStatus: number;
}

export interface Sandbox {
  /** 超时抛出 SandboxTimeoutError，进程无法启动抛出 SandboxFaultError */
  run(code: string, timeoutMs: number): Promise<SandboxResult>;
}

export interface ObjectPutOptions {
  key?: string;
  mediaType?: string;
}

export interface ObjectStore {
  put(blob: Buffer | string, options?: ObjectPutOptions): Promise<string>;
  get(uri: string): Promise<Buffer>;
}

export interface WeatherReport {
  location: string;
  day: string;
  temperatureMaxC: number;
  temperatureMinC: number;
  precipitationMm: number;
  condition: string;
}

export interface WeatherProvider {
  lookup(
    location: string,
    options: { day: "today" | "tomorrow"; signal?: AbortSignal }
  ): Promise<WeatherReport>;
}

export interface SearchResult {
  title: string;
  url: string;
  snippet: string;
}

export interface SearchProvider {
  search(query: string, limit: number, signal?: AbortSignal): Promise<SearchResult[]>;
}

// ---------------------------------------------------------------- persistence

export interface TaskEventDraft {
  source: string;
  kind: EventKind;
  message: string;
  payload?: Record<string, unknown>;
}

export interface TaskStore {
  /** 首次写入，返回 version = 1 的状态 */
  create(state: TaskState): Promise<TaskState>;
  /**
   * 事务性保存：存储中的版本必须等于 state.version，否则抛出
   * PersistenceConflictError；已是终态的记录拒绝覆盖。
   */
  save(state: TaskState): Promise<TaskState>;
  load(taskId: string): Promise<TaskState | null>;
  /** 只追加：写入一条事件并推进版本号 */
  logEvent(taskId: string, draft: TaskEventDraft): Promise<TaskEvent>;
}

export interface ScoredCase {
  case: Case;
  similarity: number;
}

export interface CaseStore {
  topK(fingerprint: number[], k: number): Promise<ScoredCase[]>;
  /** 以 caseId 幂等写入；已存在时返回 false */
  write(entry: Case): Promise<boolean>;
  get(caseId: string): Promise<Case | null>;
}

export interface Lease {
  taskId: string;
  holderId: string;
  acquiredAt: number;
  expiresAt: number;
}

export interface LeaseManager {
  /** 其他持有者仍在有效期内时返回 null */
  acquire(taskId: string, holderId: string, ttlMs: number): Promise<Lease | null>;
  renew(lease: Lease, ttlMs: number): Promise<Lease | null>;
  release(lease: Lease): Promise<void>;
}

// ---------------------------------------------------------------- queue

export interface QueueMessage {
  messageId: string;
  taskId: string;
  /** 已投递次数（含本次） */
  deliveries: number;
  enqueuedAt: number;
}

export interface DeadLetterEntry {
  messageId: string;
  taskId: string;
  deliveries: number;
  reason: string;
  lastErrorEvent: TaskEvent | null;
  deadLetteredAt: number;
}

export interface TaskQueue {
  enqueue(taskId: string): Promise<string>;
  /** 取出一条消息并在 visibilityTimeoutMs 内对其他消费者隐藏 */
  receive(visibilityTimeoutMs: number): Promise<QueueMessage | null>;
  ack(message: QueueMessage): Promise<void>;
  /** 处理中续期：从现在起再隐藏 visibilityTimeoutMs */
  extend(message: QueueMessage, visibilityTimeoutMs: number): Promise<void>;
  /** 未处理就交还：delayMs 后重新可见，本次投递不计入投递次数 */
  release(message: QueueMessage, delayMs?: number): Promise<void>;
  deadLetter(message: QueueMessage, entry: DeadLetterEntry): Promise<void>;
  listDeadLetters(): Promise<DeadLetterEntry[]>;
}

// ---------------------------------------------------------------- execution loop

export type ReflectionDirective = "advance" | "retry" | "skip";

export interface StepOutcome {
  step: Step;
  stepIndex: number;
  attempt: number;
  response: AgentResponse | null;
  error: { kind: ErrorKind; message: string } | null;
  latencyMs: number;
}

export interface ReflectInput {
  state: TaskState;
  outcome: StepOutcome;
  maxAttempts: number;
}

export interface ReflectionResult {
  directive: ReflectionDirective;
  message: string;
}

export interface Reflector {
  reflect(input: ReflectInput): Promise<ReflectionResult>;
}

export type LoopPhase =
  | "resume"
  | "perceiving"
  | "planning"
  | "routing"
  | "checkingControl"
  | "acting"
  | "reflecting"
  | "critiquing"
  | "finalizing"
  | "failing"
  | "suspending"
  | "done"
  | "failed"
  | "suspended";

// ---------------------------------------------------------------- bus

export type EventType =
  | "task.created"
  | "task.transition"
  | "task.checkpoint"
  | "task.event"
  | "step.request"
  | "step.result"
  | "task.finished";

export interface BusEvent {
  eventId: string;
  type: EventType;
  timestamp: number;
  /** 链路追踪 ID：即 taskId */
  traceId: string;
  payload: Record<string, unknown>;
}

export interface RuntimeEventStream {
  events$: Observable<BusEvent>;
  snapshots$: Observable<TaskState>;
}

// ---------------------------------------------------------------- orchestrator surface

export interface SubmitOptions {
  sync?: boolean;
  recursionLimit?: number;
  caseReuse?: boolean;
  /** 同步模式下的调用方超时；到期后任务挂起 */
  timeoutMs?: number;
  name?: string;
  metadata?: Record<string, unknown>;
}

export interface TaskHandle {
  taskId: string;
  status: TaskStatus;
}

export interface TaskStateView {
  taskId: string;
  name: string;
  status: TaskStatus;
  cursor: number;
  planLength: number;
  outputsSummary: Record<string, string[]>;
  score: number | null;
  lowConfidence: boolean;
  lastError: TaskState["lastError"];
  finalArtifact: TaskState["finalArtifact"];
  events: TaskEvent[];
}

export interface DriveOptions {
  /** 绝对截止时间（毫秒时间戳），到期后在步骤之间挂起 */
  deadline?: number;
  /** 本次驱动最多执行的步骤尝试数，用于异步模式下让出控制权 */
  maxSteps?: number;
}

export interface DriveResult {
  taskId: string;
  status: TaskStatus;
  phase: LoopPhase;
  stepsExecuted: number;
}
