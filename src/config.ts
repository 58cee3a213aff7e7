import path from "node:path";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

// largest delay Node timers accept
const MAX_TIMER_MS = 2_147_483_647;

const envSchema = z.object({
  NODE_ENV: z.string().optional(),
  PORT: z.coerce.number().int().positive().optional(),
  HOST: z.string().optional(),
  PLATFORM_TOKEN: optionalSecret,
  PLATFORM_USERNAME: optionalSecret,
  PLATFORM_SERVER_URL: optionalSecret.pipe(z.string().url().optional()),
  WEATHER_API_KEY: optionalSecret,
  WEATHER_API_URL: z.string().url().default("https://api.openweathermap.org/data/2.5/weather"),
  WEATHER_LAT: z.coerce.number().min(-90).max(90).default(37.9838),
  WEATHER_LON: z.coerce.number().min(-180).max(180).default(23.7275),
  WEATHER_UNITS: z.enum(["standard", "metric", "imperial"]).default("metric"),
  DEVICE_PREFIX: z.string().default("CAL"),
  DEVICE_RANGE_START: z.coerce.number().int().nonnegative().default(251),
  DEVICE_RANGE_END: z.coerce.number().int().nonnegative().default(351),
  PROBE_CONCURRENCY: z.coerce.number().int().positive().default(10),
  DISPATCH_CONCURRENCY: z.coerce.number().int().positive().default(3),
  BATCH_SIZE: z.coerce.number().int().positive().default(8),
  INTER_DEVICE_DELAY_MS: z.coerce.number().int().nonnegative().max(MAX_TIMER_MS).default(100),
  PROBE_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_TIMER_MS).default(10_000),
  PUSH_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_TIMER_MS).default(15_000),
  WEATHER_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_TIMER_MS).default(30_000),
  BATCH_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_TIMER_MS).default(5 * 60 * 1000),
  PROBE_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(3).default(2),
  PROBE_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().max(MAX_TIMER_MS).default(500),
  PUSH_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  PUSH_RETRY_BASE_MS: z.coerce.number().int().nonnegative().max(MAX_TIMER_MS).default(1000),
  WEATHER_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  WEATHER_RETRY_BASE_MS: z.coerce.number().int().nonnegative().max(MAX_TIMER_MS).default(2000),
  SUCCESS_THRESHOLD: z.coerce.number().min(0).max(1).default(0.8),
  DATA_DIR: z.string().default(path.join(process.cwd(), "var", "relay")),
  RUN_MODE: z.enum(["once", "schedule", "check"]).default("once"),
  CRON_SCHEDULE: z.string().default("*/30 * * * *"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
}).refine((value) => value.DEVICE_RANGE_END >= value.DEVICE_RANGE_START, {
  message: "DEVICE_RANGE_END must not precede DEVICE_RANGE_START",
  path: ["DEVICE_RANGE_END"]
});

export type ServiceConfig = Readonly<z.infer<typeof envSchema> & {
  port: number;
  host: string;
}>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join("."));
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigurationError(`Invalid configuration (${details})`, keys);
  }

  return Object.freeze({
    ...parsed.data,
    port: parsed.data.PORT ?? 4020,
    host: parsed.data.HOST ?? "0.0.0.0"
  });
}

const requiredForRun = ["PLATFORM_TOKEN", "PLATFORM_USERNAME", "PLATFORM_SERVER_URL", "WEATHER_API_KEY"] as const;

export type RequiredRunKey = (typeof requiredForRun)[number];

export function missingRunSettings(config: ServiceConfig): RequiredRunKey[] {
  return requiredForRun.filter((key) => !config[key]);
}

export type PlatformCredentials = {
  token: string;
  username: string;
  serverUrl: string;
};

export function platformCredentials(config: ServiceConfig): PlatformCredentials {
  const { PLATFORM_TOKEN, PLATFORM_USERNAME, PLATFORM_SERVER_URL } = config;
  if (!PLATFORM_TOKEN || !PLATFORM_USERNAME || !PLATFORM_SERVER_URL) {
    throw new ConfigurationError("Platform credentials are not configured", missingRunSettings(config));
  }
  return { token: PLATFORM_TOKEN, username: PLATFORM_USERNAME, serverUrl: PLATFORM_SERVER_URL };
}

export function describeConfig(config: ServiceConfig): Record<string, unknown> {
  return {
    server: config.PLATFORM_SERVER_URL ?? null,
    username: config.PLATFORM_USERNAME ?? null,
    location: { lat: config.WEATHER_LAT, lon: config.WEATHER_LON, units: config.WEATHER_UNITS },
    devices: `${config.DEVICE_PREFIX}${config.DEVICE_RANGE_START}..${config.DEVICE_PREFIX}${config.DEVICE_RANGE_END}`,
    probeConcurrency: config.PROBE_CONCURRENCY,
    dispatchConcurrency: config.DISPATCH_CONCURRENCY,
    batchSize: config.BATCH_SIZE,
    successThreshold: config.SUCCESS_THRESHOLD,
    mode: config.RUN_MODE,
    schedule: config.RUN_MODE === "schedule" ? config.CRON_SCHEDULE : null
  };
}
