import type {
  Agent,
  AgentInvocation,
  AgentResponse,
  Case,
  CaseStore,
  CompletionContext,
  LanguageModel,
  Sandbox,
  SandboxResult,
  ScoredCase,
} from "../types/index.js";
import { createRuntime } from "../core/createRuntime.js";
import type { Runtime, RuntimeOverrides } from "../core/createRuntime.js";
import { OfflineLanguageModel } from "../llm/OfflineLanguageModel.js";
import { OfflineWeatherProvider } from "../providers/OpenMeteoWeatherProvider.js";
import { InMemoryObjectStore } from "../storage/ObjectStores.js";

export const FIXED_TODAY = "2024-05-01T00:00:00.000Z";

export class EchoSandbox implements Sandbox {
  public readonly runs: string[] = [];

  async run(code: string): Promise<SandboxResult> {
    this.runs.push(code);
    return { stdout: "sandbox ok\n", stderr: "", exitStatus: 0 };
  }
}

/** 不连网、不起子进程、日期固定的运行时 */
export function createTestRuntime(overrides: RuntimeOverrides = {}): Runtime {
  return createRuntime({
    env: {},
    llm: new OfflineLanguageModel(),
    weather: new OfflineWeatherProvider({ today: () => new Date(FIXED_TODAY) }),
    sandbox: new EchoSandbox(),
    objectStore: new InMemoryObjectStore(),
    ...overrides,
  });
}

export function invocation(overrides: Partial<AgentInvocation> = {}): AgentInvocation {
  return {
    taskId: "task-test",
    goal: "test goal",
    name: "test goal",
    metadata: {},
    descriptor: null,
    step: null,
    plan: [],
    payload: {},
    priorOutputs: {},
    dependencies: {},
    stepRecords: {},
    attempt: 1,
    signal: new AbortController().signal,
    ...overrides,
  };
}

/** 按顺序返回预设回答的已配置模型 */
export class ScriptedModel implements LanguageModel {
  public readonly prompts: Array<{ prompt: string; context: CompletionContext | undefined }> = [];

  private readonly replies: Array<string | Error>;

  constructor(replies: Array<string | Error>) {
    this.replies = [...replies];
  }

  isConfigured(): boolean {
    return true;
  }

  async complete(prompt: string, context?: CompletionContext): Promise<string> {
    this.prompts.push({ prompt, context });
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error("no scripted reply left");
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}

export function stubAgent(
  name: string,
  invoke: (context: AgentInvocation) => Promise<AgentResponse>
): Agent {
  return { name, description: `stub ${name}`, invoke };
}

/** 调用时一直等到被中止 */
export function hangingAgent(name: string): Agent {
  return stubAgent(
    name,
    (context) =>
      new Promise<AgentResponse>((_, reject) => {
        context.signal.addEventListener("abort", () => reject(new Error("aborted")), {
          once: true,
        });
      })
  );
}

/** 固定返回一组候选案例，并记录写入 */
export class FixedCaseStore implements CaseStore {
  public readonly writes: Case[] = [];

  private readonly candidates: ScoredCase[];

  constructor(candidates: ScoredCase[]) {
    this.candidates = candidates;
  }

  async topK(_fingerprint: number[], k: number): Promise<ScoredCase[]> {
    return this.candidates.slice(0, k);
  }

  async write(entry: Case): Promise<boolean> {
    this.writes.push(entry);
    return true;
  }

  async get(caseId: string): Promise<Case | null> {
    return this.candidates.find((candidate) => candidate.case.caseId === caseId)?.case ?? null;
  }
}

export function parisCase(): Case {
  return {
    caseId: "case-paris",
    fingerprint: [1, 0, 0],
    fingerprintKey: "0000beef",
    goal: "What is the weather in Paris tomorrow?",
    entities: ["Paris"],
    plan: [
      {
        id: "c1",
        agent: "weather",
        title: "Forecast for Paris",
        payload: { task: "weather in Paris tomorrow", location: "Paris", day: "tomorrow" },
        origin: "planner",
      },
      {
        id: "c2",
        agent: "art_director",
        title: "Chart Paris temperatures",
        payload: { task: "Chart Paris temperatures" },
        origin: "planner",
      },
      {
        id: "c3",
        agent: "writer",
        title: "Summarize results",
        payload: { task: "Summarize the Paris forecast" },
        dependsOn: ["c1", "c2"],
        origin: "planner",
      },
    ],
    planHash: "0000cafe",
    score: 0.92,
    createdAt: 1_700_000_000_000,
  };
}
