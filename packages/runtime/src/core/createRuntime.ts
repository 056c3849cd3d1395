import Database from "better-sqlite3";
import type { Database as DatabaseInstance } from "better-sqlite3";
import type {
  Agent,
  CaseStore,
  Embedder,
  LanguageModel,
  LeaseManager,
  ObjectStore,
  Sandbox,
  SearchProvider,
  TaskQueue,
  TaskStore,
  WeatherProvider,
} from "../types/index.js";
import { resolveEngineConfig } from "../config/EngineConfig.js";
import type { EngineConfig, EngineConfigInput } from "../config/EngineConfig.js";
import { EventBus } from "../event/EventBus.js";
import { InMemoryAgentRegistry } from "../registry/AgentRegistry.js";
import { CaseLibrary } from "../cbr/CaseLibrary.js";
import { StepContextBuilder } from "../context/StepContextBuilder.js";
import { createLanguageModel } from "../llm/OfflineLanguageModel.js";
import { HashEmbedder } from "../llm/HashEmbedder.js";
import { ProcessSandbox } from "../sandbox/ProcessSandbox.js";
import { OpenMeteoWeatherProvider } from "../providers/OpenMeteoWeatherProvider.js";
import { InMemoryTaskStore } from "../storage/InMemoryTaskStore.js";
import { InMemoryCaseStore } from "../storage/InMemoryCaseStore.js";
import { InMemoryLeaseManager } from "../storage/InMemoryLeaseManager.js";
import { SqliteTaskStore } from "../storage/SqliteTaskStore.js";
import { SqliteCaseStore } from "../storage/SqliteCaseStore.js";
import { SqliteLeaseManager } from "../storage/SqliteLeaseManager.js";
import { FileSystemObjectStore, InMemoryObjectStore } from "../storage/ObjectStores.js";
import { InMemoryTaskQueue } from "../queue/InMemoryTaskQueue.js";
import { TaskWorkerPool } from "../queue/TaskWorkerPool.js";
import { PerceptorAgent } from "../agents/PerceptorAgent.js";
import { PlannerAgent } from "../planner/PlannerAgent.js";
import { CriticAgent } from "../agents/CriticAgent.js";
import { WeatherAgent } from "../agents/WeatherAgent.js";
import { ResearcherAgent } from "../agents/ResearcherAgent.js";
import { CalculatorAgent } from "../agents/CalculatorAgent.js";
import { WriterAgent } from "../agents/WriterAgent.js";
import { ToolSmithAgent } from "../agents/ToolSmithAgent.js";
import { ArtDirectorAgent } from "../agents/ArtDirectorAgent.js";
import { Orchestrator } from "./Orchestrator.js";

export interface RuntimeOverrides {
  config?: EngineConfigInput;
  env?: NodeJS.ProcessEnv;
  /** 与 storage.databasePath 二选一；三个 SQLite 组件共用同一连接 */
  database?: DatabaseInstance;
  llm?: LanguageModel;
  embedder?: Embedder;
  sandbox?: Sandbox;
  objectStore?: ObjectStore;
  weather?: WeatherProvider;
  search?: SearchProvider;
  store?: TaskStore;
  caseStore?: CaseStore;
  leaseManager?: LeaseManager;
  queue?: TaskQueue;
  eventBus?: EventBus;
  /** 追加或替换同名的默认 agent */
  agents?: Agent[];
  now?: () => number;
}

export interface Runtime {
  config: EngineConfig;
  orchestrator: Orchestrator;
  workers: TaskWorkerPool;
  agentRegistry: InMemoryAgentRegistry;
  caseLibrary: CaseLibrary;
  eventBus: EventBus;
  /** 关闭由运行时自己打开的数据库连接 */
  close(): void;
}

export interface DefaultAgentDeps {
  config: EngineConfig;
  llm: LanguageModel;
  caseLibrary: CaseLibrary;
  agentRegistry: InMemoryAgentRegistry;
  sandbox: Sandbox;
  objectStore: ObjectStore;
  weather: WeatherProvider;
  search?: SearchProvider;
}

export function createDefaultAgents(deps: DefaultAgentDeps): Agent[] {
  const contextBuilder = new StepContextBuilder();
  return [
    new PerceptorAgent(),
    new PlannerAgent({
      caseLibrary: deps.caseLibrary,
      agentRegistry: deps.agentRegistry,
      llm: deps.llm,
    }),
    new CriticAgent(deps.llm),
    new WeatherAgent(deps.weather),
    new ResearcherAgent({ llm: deps.llm, ...(deps.search ? { search: deps.search } : {}) }),
    new CalculatorAgent(),
    new WriterAgent(deps.llm, contextBuilder),
    new ToolSmithAgent({
      llm: deps.llm,
      sandbox: deps.sandbox,
      objectStore: deps.objectStore,
      sandboxTimeoutMs: deps.config.sandboxTimeoutMs,
    }),
    new ArtDirectorAgent(deps.llm),
  ];
}

/**
 * 按配置装配一套完整运行时：配置了 databasePath 时使用 SQLite，
 * 否则全部使用内存实现。显式传入的组件优先。
 */
export function createRuntime(overrides: RuntimeOverrides = {}): Runtime {
  const env = overrides.env ?? process.env;
  const config = resolveEngineConfig(overrides.config ?? {}, env);

  let ownedDatabase: DatabaseInstance | null = null;
  let database = overrides.database ?? null;
  if (!database && config.storage.databasePath) {
    ownedDatabase = new Database(config.storage.databasePath);
    database = ownedDatabase;
  }

  const store = overrides.store ?? (database ? new SqliteTaskStore({ database }) : new InMemoryTaskStore());
  const caseStore =
    overrides.caseStore ?? (database ? new SqliteCaseStore({ database }) : new InMemoryCaseStore());
  const leaseManager =
    overrides.leaseManager ??
    (database
      ? new SqliteLeaseManager({ database, ...(overrides.now ? { now: overrides.now } : {}) })
      : new InMemoryLeaseManager(overrides.now ? { now: overrides.now } : {}));
  const objectStore =
    overrides.objectStore ??
    (config.storage.objectStoreDir
      ? new FileSystemObjectStore(config.storage.objectStoreDir)
      : new InMemoryObjectStore());
  const queue = overrides.queue ?? new InMemoryTaskQueue(overrides.now ? { now: overrides.now } : {});
  const eventBus = overrides.eventBus ?? new EventBus();
  const llm = overrides.llm ?? createLanguageModel(config.llm, env);

  const caseLibrary = new CaseLibrary({
    store: caseStore,
    embedder: overrides.embedder ?? new HashEmbedder(),
    topK: config.caseTopK,
    similarityThreshold: config.caseSimilarityThreshold,
    ...(overrides.now ? { now: overrides.now } : {}),
  });

  const agentRegistry = new InMemoryAgentRegistry();
  const agents = createDefaultAgents({
    config,
    llm,
    caseLibrary,
    agentRegistry,
    sandbox: overrides.sandbox ?? new ProcessSandbox(),
    objectStore,
    weather: overrides.weather ?? new OpenMeteoWeatherProvider(),
    ...(overrides.search ? { search: overrides.search } : {}),
  });
  for (const agent of agents) {
    agentRegistry.register(agent);
  }
  for (const agent of overrides.agents ?? []) {
    agentRegistry.register(agent);
  }

  const orchestrator = new Orchestrator({
    config,
    store,
    leaseManager,
    agentRegistry,
    caseLibrary,
    objectStore,
    queue,
    eventBus,
    ...(overrides.now ? { now: overrides.now } : {}),
  });
  const workers = new TaskWorkerPool({
    orchestrator,
    queue,
    store,
    concurrency: config.queue.concurrency,
    pollIntervalMs: config.queue.pollIntervalMs,
    maxStepsPerSlice: config.queue.maxStepsPerSlice,
    visibilityTimeoutMs: config.queue.visibilityTimeoutMs,
    maxDeliveries: config.queue.maxDeliveries,
    ...(overrides.now ? { now: overrides.now } : {}),
  });

  return {
    config,
    orchestrator,
    workers,
    agentRegistry,
    caseLibrary,
    eventBus,
    close: () => {
      ownedDatabase?.close();
    },
  };
}
