import { z } from "zod";
import { ProviderError, describeError } from "../core/errors.js";
import type { WeatherProvider, WeatherReport } from "../types/index.js";
import { fnv1a } from "../cbr/similarity.js";

export interface OpenMeteoOptions {
  geocodingURL?: string;
  forecastURL?: string;
  requestTimeoutMs?: number;
  fetchImpl?: typeof fetch;
}

type LookupOptions = Parameters<WeatherProvider["lookup"]>[1];

const GeocodingSchema = z.object({
  results: z
    .array(
      z.object({
        name: z.string(),
        latitude: z.number(),
        longitude: z.number(),
      })
    )
    .optional(),
});

const ForecastSchema = z.object({
  daily: z.object({
    time: z.array(z.string()),
    temperature_2m_max: z.array(z.number()),
    temperature_2m_min: z.array(z.number()),
    precipitation_sum: z.array(z.number()),
    weathercode: z.array(z.number()),
  }),
});

/** WMO 天气代码分组 */
export function describeWeatherCode(code: number): string {
  if (code === 0) return "clear sky";
  if (code <= 3) return "partly cloudy";
  if (code <= 48) return "fog";
  if (code <= 67) return "rain";
  if (code <= 77) return "snow";
  if (code <= 82) return "rain showers";
  if (code <= 86) return "snow showers";
  return "thunderstorm";
}

/**
 * Open-Meteo 免费接口：先地理编码城市名，再取两天的逐日预报。
 */
export class OpenMeteoWeatherProvider implements WeatherProvider {
  private readonly geocodingURL: string;

  private readonly forecastURL: string;

  private readonly requestTimeoutMs: number;

  private readonly fetchImpl: typeof fetch;

  constructor(options: OpenMeteoOptions = {}) {
    this.geocodingURL = options.geocodingURL ?? "https://geocoding-api.open-meteo.com/v1/search";
    this.forecastURL = options.forecastURL ?? "https://api.open-meteo.com/v1/forecast";
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async lookup(location: string, options: LookupOptions): Promise<WeatherReport> {
    const geocoding = GeocodingSchema.parse(
      await this.getJson(
        `${this.geocodingURL}?${new URLSearchParams({ name: location, count: "1" })}`,
        options.signal
      )
    );
    const place = geocoding.results?.[0];
    if (!place) {
      throw new ProviderError(`Unknown location "${location}"`);
    }
    const params = new URLSearchParams({
      latitude: String(place.latitude),
      longitude: String(place.longitude),
      daily: "temperature_2m_max,temperature_2m_min,precipitation_sum,weathercode",
      timezone: "auto",
      forecast_days: "2",
    });
    const forecast = ForecastSchema.safeParse(
      await this.getJson(`${this.forecastURL}?${params}`, options.signal)
    );
    if (!forecast.success) {
      throw new ProviderError("Malformed forecast response", { cause: forecast.error });
    }
    const index = options.day === "tomorrow" ? 1 : 0;
    const daily = forecast.data.daily;
    const day = daily.time[index];
    const max = daily.temperature_2m_max[index];
    const min = daily.temperature_2m_min[index];
    const precipitation = daily.precipitation_sum[index];
    const code = daily.weathercode[index];
    if (
      day === undefined ||
      max === undefined ||
      min === undefined ||
      precipitation === undefined ||
      code === undefined
    ) {
      throw new ProviderError(`Forecast for ${options.day} is missing`);
    }
    return {
      location: place.name,
      day,
      temperatureMaxC: max,
      temperatureMinC: min,
      precipitationMm: precipitation,
      condition: describeWeatherCode(code),
    };
  }

  private async getJson(url: string, signal?: AbortSignal): Promise<unknown> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.requestTimeoutMs);
    const forwardAbort = () => controller.abort();
    signal?.addEventListener("abort", forwardAbort, { once: true });
    try {
      const response = await this.fetchImpl(url, { signal: controller.signal });
      if (!response.ok) {
        throw new ProviderError(`Weather request failed with status ${response.status}`);
      }
      const body: unknown = await response.json();
      return body;
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      throw new ProviderError(`Weather request failed: ${describeError(error)}`, {
        cause: error,
      });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", forwardAbort);
    }
  }
}

/**
 * 离线天气数据：由地点与日期哈希得到的稳定数值，供无网络环境与测试使用。
 */
export class OfflineWeatherProvider implements WeatherProvider {
  private readonly today: () => Date;

  constructor(options: { today?: () => Date } = {}) {
    this.today = options.today ?? (() => new Date());
  }

  async lookup(location: string, options: LookupOptions): Promise<WeatherReport> {
    const date = this.today();
    if (options.day === "tomorrow") {
      date.setUTCDate(date.getUTCDate() + 1);
    }
    const day = date.toISOString().slice(0, 10);
    const seed = parseInt(fnv1a(`${location.toLowerCase()}|${day}`), 16);
    const max = 10 + (seed % 20);
    return {
      location,
      day,
      temperatureMaxC: max,
      temperatureMinC: max - 4 - (seed % 5),
      precipitationMm: (seed >>> 8) % 7,
      condition: describeWeatherCode([0, 2, 45, 61, 71, 80, 95][(seed >>> 4) % 7] ?? 0),
    };
  }
}
