import { describe, expect, it } from "vitest";
import { describeConfig, loadConfig, missingRunSettings, platformCredentials } from "../src/config.js";
import { ConfigurationError } from "../src/errors.js";
import { baseEnv, buildTestConfig } from "./testUtils/testEnv.js";

describe("loadConfig", () => {
  it("applies defaults for the relay pipeline", () => {
    const config = loadConfig({});
    expect(config.DEVICE_PREFIX).toBe("CAL");
    expect(config.DEVICE_RANGE_START).toBe(251);
    expect(config.DEVICE_RANGE_END).toBe(351);
    expect(config.PROBE_CONCURRENCY).toBe(10);
    expect(config.DISPATCH_CONCURRENCY).toBe(3);
    expect(config.BATCH_SIZE).toBe(8);
    expect(config.INTER_DEVICE_DELAY_MS).toBe(100);
    expect(config.PROBE_TIMEOUT_MS).toBe(10_000);
    expect(config.PUSH_TIMEOUT_MS).toBe(15_000);
    expect(config.WEATHER_TIMEOUT_MS).toBe(30_000);
    expect(config.SUCCESS_THRESHOLD).toBe(0.8);
    expect(config.RUN_MODE).toBe("once");
    expect(config.port).toBe(4020);
    expect(config.host).toBe("0.0.0.0");
  });

  it("coerces numeric settings from strings", () => {
    const config = buildTestConfig({ BATCH_SIZE: "5", SUCCESS_THRESHOLD: "0.5", PORT: "8080" });
    expect(config.BATCH_SIZE).toBe(5);
    expect(config.SUCCESS_THRESHOLD).toBe(0.5);
    expect(config.port).toBe(8080);
  });

  it("returns a frozen value", () => {
    const config = buildTestConfig();
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("rejects a range whose end precedes its start", () => {
    expect(() => loadConfig({ ...baseEnv, DEVICE_RANGE_START: "300", DEVICE_RANGE_END: "299" })).toThrow(ConfigurationError);
  });

  it("lists the offending keys", () => {
    let caught: unknown = null;
    try {
      loadConfig({ ...baseEnv, SUCCESS_THRESHOLD: "1.5", BATCH_SIZE: "zero" });
    }
    catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    if (caught instanceof ConfigurationError) {
      expect(caught.keys).toEqual(["BATCH_SIZE", "SUCCESS_THRESHOLD"]);
      expect(caught.reason).toBe("configuration");
    }
  });

  it("rejects timer settings beyond what Node timers accept", () => {
    let caught: unknown = null;
    try {
      loadConfig({ ...baseEnv, BATCH_TIMEOUT_MS: "2147483648", PUSH_TIMEOUT_MS: "4294967296" });
    }
    catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    if (caught instanceof ConfigurationError) {
      expect([...caught.keys].sort()).toEqual(["BATCH_TIMEOUT_MS", "PUSH_TIMEOUT_MS"]);
    }
  });

  it("accepts the largest timer delay", () => {
    expect(loadConfig({ ...baseEnv, BATCH_TIMEOUT_MS: "2147483647" }).BATCH_TIMEOUT_MS).toBe(2_147_483_647);
  });
});

describe("missingRunSettings", () => {
  it("reports blank credentials as missing", () => {
    const config = buildTestConfig({ PLATFORM_TOKEN: "   ", WEATHER_API_KEY: undefined });
    expect(missingRunSettings(config)).toEqual(["PLATFORM_TOKEN", "WEATHER_API_KEY"]);
  });

  it("is empty for a complete configuration", () => {
    expect(missingRunSettings(buildTestConfig())).toEqual([]);
  });
});

describe("platformCredentials", () => {
  it("extracts the platform credentials", () => {
    expect(platformCredentials(buildTestConfig())).toEqual({
      token: "test-token",
      username: "relay-user",
      serverUrl: "https://platform.test"
    });
  });

  it("throws when a credential is absent", () => {
    expect(() => platformCredentials(buildTestConfig({ PLATFORM_USERNAME: "" }))).toThrow(ConfigurationError);
  });
});

describe("describeConfig", () => {
  it("never includes credentials", () => {
    const described = describeConfig(buildTestConfig());
    expect(described.devices).toBe("CAL251..CAL351");
    expect(JSON.stringify(described)).not.toContain("test-token");
    expect(JSON.stringify(described)).not.toContain("test-weather-key");
  });
});
