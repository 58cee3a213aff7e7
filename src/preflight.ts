import { candidatesFromConfig } from "./candidates.js";
import { type ServiceConfig, missingRunSettings } from "./config.js";
import type { Logger } from "./logger.js";
import type { PlatformClient, ProbeStatus } from "./platformClient.js";
import type { WeatherSource } from "./coordinator.js";

export type PlatformCheck = "ok" | "resource_missing" | "unauthorized" | "unexpected_status" | "unreachable";

export type PreflightReport = {
  ok: boolean;
  missing: string[];
  sampleDevice: string | null;
  platform: PlatformCheck | null;
  statusCode: number | null;
  weather: boolean | null;
};

export function classifyProbeStatus(status: ProbeStatus): PlatformCheck {
  if (status.kind === "unreachable") return "unreachable";
  if (status.statusCode === 200) return "ok";
  if (status.statusCode === 404) return "resource_missing";
  if (status.statusCode === 401 || status.statusCode === 403) return "unauthorized";
  return "unexpected_status";
}

const fatalChecks = new Set<PlatformCheck>(["unauthorized", "unreachable"]);

export type PreflightDependencies = {
  platform: (config: ServiceConfig) => Pick<PlatformClient, "probeStatus">;
  weather: (config: ServiceConfig) => WeatherSource;
};

/**
 * Checks the credentials against the first candidate device and fetches one
 * weather reading. A missing device resource is reported but not fatal.
 */
export async function runPreflight(config: ServiceConfig, logger: Logger, deps: PreflightDependencies): Promise<PreflightReport> {
  const missing = missingRunSettings(config);
  if (missing.length > 0) {
    logger.error({ missing }, "Required settings are missing");
    return { ok: false, missing, sampleDevice: null, platform: null, statusCode: null, weather: null };
  }

  const [sampleDevice] = candidatesFromConfig(config);
  const status = await deps.platform(config).probeStatus(sampleDevice);
  const platform = classifyProbeStatus(status);
  const statusCode = status.kind === "status" ? status.statusCode : null;

  switch (platform) {
    case "ok":
      logger.info({ deviceId: sampleDevice }, "Platform resource reachable");
      break;
    case "resource_missing":
      logger.warn({ deviceId: sampleDevice }, "Sample device or its resource was not found; devices must be created before they receive data");
      break;
    case "unauthorized":
      logger.error({ deviceId: sampleDevice, statusCode }, "Platform rejected the token");
      break;
    case "unexpected_status":
      logger.warn({ deviceId: sampleDevice, statusCode }, "Platform returned an unexpected status");
      break;
    case "unreachable":
      logger.error({ deviceId: sampleDevice, reason: status.kind === "unreachable" ? status.message : null }, "Platform unreachable");
      break;
  }

  if (fatalChecks.has(platform)) {
    return { ok: false, missing, sampleDevice, platform, statusCode, weather: null };
  }

  const reading = await deps.weather(config).fetchReading();
  if (!reading) {
    logger.error("Weather provider check failed");
  }
  return { ok: reading !== null, missing, sampleDevice, platform, statusCode, weather: reading !== null };
}
