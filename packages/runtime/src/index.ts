export * from './types/index.js';
export * from './core/errors.js';
export * from './core/Orchestrator.js';
export * from './core/createRuntime.js';
export * from './core/Executor.js';
export * from './core/TaskContext.js';
export * from './core/artifact.js';
export * from './config/EngineConfig.js';
export * from './event/EventBus.js';
export * from './registry/AgentRegistry.js';
export * from './fsm/taskMachine.js';
export * from './cbr/CaseLibrary.js';
export * from './cbr/similarity.js';
export * from './context/StepContextBuilder.js';
export * from './reflector/StepReflector.js';
export * from './planner/PlannerAgent.js';
export * from './planner/planRules.js';
export * from './agents/PerceptorAgent.js';
export * from './agents/CriticAgent.js';
export * from './agents/WeatherAgent.js';
export * from './agents/ResearcherAgent.js';
export * from './agents/CalculatorAgent.js';
export * from './agents/WriterAgent.js';
export * from './agents/ToolSmithAgent.js';
export * from './agents/ArtDirectorAgent.js';
export * from './agents/response.js';
export * from './llm/ChatModelClient.js';
export * from './llm/OfflineLanguageModel.js';
export * from './llm/HashEmbedder.js';
export * from './sandbox/ProcessSandbox.js';
export * from './providers/OpenMeteoWeatherProvider.js';
export * from './storage/InMemoryTaskStore.js';
export * from './storage/SqliteTaskStore.js';
export * from './storage/InMemoryCaseStore.js';
export * from './storage/SqliteCaseStore.js';
export * from './storage/InMemoryLeaseManager.js';
export * from './storage/SqliteLeaseManager.js';
export * from './storage/ObjectStores.js';
export * from './queue/InMemoryTaskQueue.js';
export * from './queue/TaskWorkerPool.js';
