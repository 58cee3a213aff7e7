import { z } from "zod";
import type { ServiceConfig } from "./config.js";
import { RelayError, describeError } from "./errors.js";
import { type FetchLike, readBodyText, readErrorText, rejectionFor, requestWithTimeout } from "./http.js";
import type { Logger } from "./logger.js";
import { type Sleep, weatherRetryPolicy, withRetry } from "./retry.js";
import type { WeatherReading } from "./types.js";

const weatherPayloadSchema = z.object({
  dt: z.number().optional(),
  main: z.object({
    temp: z.number(),
    humidity: z.number()
  }),
  weather: z.array(z.object({ description: z.string().optional() }).passthrough()).optional()
});

export type WeatherPayload = z.infer<typeof weatherPayloadSchema>;

export type WeatherClientDependencies = {
  fetch?: FetchLike;
  sleep?: Sleep;
  now?: () => Date;
};

export function buildWeatherUrl(config: ServiceConfig): URL {
  const url = new URL(config.WEATHER_API_URL);
  url.searchParams.set("lat", String(config.WEATHER_LAT));
  url.searchParams.set("lon", String(config.WEATHER_LON));
  url.searchParams.set("appid", config.WEATHER_API_KEY ?? "");
  url.searchParams.set("units", config.WEATHER_UNITS);
  return url;
}

export function toWeatherReading(payload: WeatherPayload, fetchedAt: Date): WeatherReading {
  const observedAt = payload.dt === undefined ? fetchedAt : new Date(payload.dt * 1000);
  return Object.freeze({
    temperature: payload.main.temp,
    humidity: Math.round(payload.main.humidity),
    description: payload.weather?.[0]?.description ?? "Unknown",
    observedAt: observedAt.toISOString()
  });
}

export class WeatherClient {
  private readonly config: ServiceConfig;
  private readonly logger: Logger;
  private readonly fetchImpl: FetchLike;
  private readonly sleep?: Sleep;
  private readonly now: () => Date;

  constructor(config: ServiceConfig, logger: Logger, deps: WeatherClientDependencies = {}) {
    this.config = config;
    this.logger = logger;
    this.fetchImpl = deps.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = deps.sleep;
    this.now = deps.now ?? (() => new Date());
  }

  /** Resolves to `null` once every attempt has failed; the reason is only logged. */
  async fetchReading(signal?: AbortSignal): Promise<WeatherReading | null> {
    try {
      const reading = await withRetry(weatherRetryPolicy(this.config), () => this.fetchOnce(signal), {
        sleep: this.sleep,
        signal,
        onRetry: (err, attempt, waitMs) => {
          this.logger.warn({ attempt, waitMs, reason: describeError(err) }, "Weather fetch failed, retrying");
        }
      });
      this.logger.info(
        { temperature: reading.temperature, humidity: reading.humidity, description: reading.description },
        "Fetched weather reading"
      );
      return reading;
    }
    catch (err) {
      this.logger.error({ reason: describeError(err) }, "Weather reading unavailable");
      return null;
    }
  }

  private async fetchOnce(signal?: AbortSignal): Promise<WeatherReading> {
    const label = "Weather request";
    const timing = { timeoutMs: this.config.WEATHER_TIMEOUT_MS, signal };
    const response = await requestWithTimeout(this.fetchImpl, {
      url: buildWeatherUrl(this.config),
      init: { method: "GET", headers: { Accept: "application/json" } },
      label,
      ...timing
    });
    if (!response.ok) {
      throw rejectionFor(label, response, await readErrorText(response, label, timing));
    }

    const text = await readBodyText(response, label, timing);
    let body: unknown;
    try {
      body = JSON.parse(text);
    }
    catch (err) {
      throw new RelayError("malformed_response", "Weather response is not valid JSON", { cause: err });
    }

    const parsed = weatherPayloadSchema.safeParse(body);
    if (!parsed.success) {
      const fields = parsed.error.issues.map((issue) => issue.path.join(".")).join(", ");
      throw new RelayError("malformed_response", `Weather response missing fields: ${fields}`);
    }
    return toWeatherReading(parsed.data, this.now());
  }
}
