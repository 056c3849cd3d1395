import type {
  Agent,
  AgentInvocation,
  AgentResponse,
  WeatherProvider,
  WeatherReport,
} from "../types/index.js";
import { extractDay, extractLocation } from "../planner/planRules.js";
import { fail, readString, succeed } from "./response.js";

export function formatReport(report: WeatherReport): string {
  return [
    `Forecast for ${report.location} on ${report.day}: ${report.condition}.`,
    `High ${report.temperatureMaxC}°C, low ${report.temperatureMinC}°C,`,
    `precipitation ${report.precipitationMm} mm.`,
  ].join(" ");
}

export class WeatherAgent implements Agent {
  public readonly name = "weather";

  public readonly description = "Looks up today's or tomorrow's forecast for a location.";

  private readonly provider: WeatherProvider;

  constructor(provider: WeatherProvider) {
    this.provider = provider;
  }

  async invoke(context: AgentInvocation): Promise<AgentResponse> {
    const task = readString(context.payload, "task") ?? context.goal;
    const location = readString(context.payload, "location") ?? extractLocation(task);
    if (!location) {
      return fail(`No location found in "${task}"`);
    }
    const day = context.payload.day === "tomorrow" || context.payload.day === "today"
      ? context.payload.day
      : extractDay(task);

    // 提供方错误（ProviderError）直接抛出，由执行循环按步骤失败重试
    const report = await this.provider.lookup(location, { day, signal: context.signal });
    return succeed(
      { location: report.location, day: report.day, report, text: formatReport(report) },
      {
        events: [{ kind: "result", message: `Weather retrieved for ${report.location}` }],
        message: "Weather lookup completed",
      }
    );
  }
}
