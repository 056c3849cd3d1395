import type {
  Agent,
  AgentInvocation,
  AgentResponse,
  LanguageModel,
  SearchProvider,
  SearchResult,
} from "../types/index.js";
import { readString, succeed } from "./response.js";

export interface ResearcherAgentOptions {
  llm: LanguageModel;
  search?: SearchProvider;
  maxResults?: number;
}

export function formatResults(results: SearchResult[]): string {
  if (results.length === 0) {
    return "No search results found.";
  }
  return results
    .map((result, index) => `${index + 1}. ${result.title}\n   URL: ${result.url}\n   ${result.snippet}`)
    .join("\n");
}

/**
 * 检索 agent：有搜索提供方时汇总检索结果，否则直接向模型提问。
 */
export class ResearcherAgent implements Agent {
  public readonly name = "researcher";

  public readonly description = "Searches for information and condenses the findings.";

  private readonly options: ResearcherAgentOptions;

  constructor(options: ResearcherAgentOptions) {
    this.options = options;
  }

  async invoke(context: AgentInvocation): Promise<AgentResponse> {
    const query =
      readString(context.payload, "query") ?? readString(context.payload, "task") ?? context.goal;
    const completion = {
      taskId: context.taskId,
      agent: this.name,
      signal: context.signal,
    };

    if (!this.options.search) {
      const findings = await this.options.llm.complete(
        `Research the following and list the key facts:\n${query}`,
        completion
      );
      return succeed(
        { query, sources: [], text: findings },
        {
          events: [{ kind: "info", message: "No search provider configured, answered from the model" }],
          message: "Research completed",
        }
      );
    }

    const results = await this.options.search.search(
      query,
      this.options.maxResults ?? 5,
      context.signal
    );
    const digest = formatResults(results);
    const text = this.options.llm.isConfigured()
      ? await this.options.llm.complete(
          `Summarize these search results for "${query}":\n${digest}`,
          completion
        )
      : digest;
    return succeed(
      { query, sources: results.map((result) => result.url), results, text },
      {
        events: [{ kind: "result", message: `Found ${results.length} search result(s)` }],
        message: "Research completed",
      }
    );
  }
}
