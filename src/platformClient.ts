import type { PlatformCredentials, ServiceConfig } from "./config.js";
import { RelayError, describeError } from "./errors.js";
import { type FetchLike, readErrorText, rejectionFor, requestWithTimeout } from "./http.js";
import type { Logger } from "./logger.js";
import { type Sleep, probeRetryPolicy, pushRetryPolicy, withRetry } from "./retry.js";
import type { DeviceId, DeviceOutcome } from "./types.js";

export const DEVICE_RESOURCE = "OutTemp";

export type PushPayload = {
  exterror: 0;
  webout: number;
};

export type PlatformClientDependencies = {
  fetch?: FetchLike;
  sleep?: Sleep;
};

export type ProbeStatus =
  | { kind: "status"; statusCode: number }
  | { kind: "unreachable"; message: string };

export function deviceResourceUrl(credentials: PlatformCredentials, deviceId: DeviceId): string {
  const base = credentials.serverUrl.replace(/\/+$/, "");
  const user = encodeURIComponent(credentials.username);
  const device = encodeURIComponent(deviceId);
  return `${base}/v1/users/${user}/devices/${device}/${DEVICE_RESOURCE}`;
}

/**
 * Device control platform: an existence probe and a value push against the
 * per-device `OutTemp` resource.
 */
export class PlatformClient {
  private readonly config: ServiceConfig;
  private readonly credentials: PlatformCredentials;
  private readonly logger: Logger;
  private readonly fetchImpl: FetchLike;
  private readonly sleep?: Sleep;

  constructor(config: ServiceConfig, credentials: PlatformCredentials, logger: Logger, deps: PlatformClientDependencies = {}) {
    this.config = config;
    this.credentials = credentials;
    this.logger = logger;
    this.fetchImpl = deps.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = deps.sleep;
  }

  async probe(deviceId: DeviceId, signal?: AbortSignal): Promise<boolean> {
    try {
      await withRetry(probeRetryPolicy(this.config), () => this.probeOnce(deviceId, signal), { sleep: this.sleep, signal });
      return true;
    }
    catch (err) {
      this.logger.debug({ deviceId, reason: describeError(err) }, "Device not reachable");
      return false;
    }
  }

  /** Single unclassified probe, used by the preflight check. */
  async probeStatus(deviceId: DeviceId): Promise<ProbeStatus> {
    try {
      const response = await this.get(deviceId);
      await response.body?.cancel();
      return { kind: "status", statusCode: response.status };
    }
    catch (err) {
      return { kind: "unreachable", message: describeError(err) };
    }
  }

  async push(deviceId: DeviceId, value: number, signal?: AbortSignal): Promise<DeviceOutcome> {
    try {
      await withRetry(pushRetryPolicy(this.config), () => this.pushOnce(deviceId, value, signal), {
        sleep: this.sleep,
        signal,
        onRetry: (err, attempt, waitMs) => {
          this.logger.debug({ deviceId, attempt, waitMs, reason: describeError(err) }, "Push failed, retrying");
        }
      });
      this.logger.info({ deviceId, value }, "Value delivered");
      return "delivered";
    }
    catch (err) {
      if (err instanceof RelayError && err.reason === "resource_absent") {
        this.logger.warn({ deviceId }, "Device or resource not found");
        return "not_found";
      }
      if (err instanceof RelayError && err.reason === "cancelled") {
        this.logger.debug({ deviceId }, "Push cancelled");
        return "failed";
      }
      this.logger.error({ deviceId, reason: describeError(err) }, "Push failed");
      return "failed";
    }
  }

  private get(deviceId: DeviceId, signal?: AbortSignal): Promise<Response> {
    return requestWithTimeout(this.fetchImpl, {
      url: deviceResourceUrl(this.credentials, deviceId),
      init: {
        method: "GET",
        headers: {
          Authorization: `Bearer ${this.credentials.token}`,
          Accept: "application/json"
        }
      },
      timeoutMs: this.config.PROBE_TIMEOUT_MS,
      label: `Probe ${deviceId}`,
      signal
    });
  }

  private async probeOnce(deviceId: DeviceId, signal?: AbortSignal): Promise<void> {
    const response = await this.get(deviceId, signal);
    await response.body?.cancel();
    if (response.status === 200) return;
    if (response.status === 404) {
      throw new RelayError("resource_absent", `Probe ${deviceId}: not found`, { statusCode: 404 });
    }
    throw rejectionFor(`Probe ${deviceId}`, response);
  }

  private async pushOnce(deviceId: DeviceId, value: number, signal?: AbortSignal): Promise<void> {
    const label = `Push ${deviceId}`;
    const timing = { timeoutMs: this.config.PUSH_TIMEOUT_MS, signal };
    const payload: PushPayload = { exterror: 0, webout: value };
    const response = await requestWithTimeout(this.fetchImpl, {
      url: deviceResourceUrl(this.credentials, deviceId),
      init: {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.credentials.token}`,
          "Content-Type": "application/json"
        },
        body: JSON.stringify(payload)
      },
      label,
      ...timing
    });
    if (response.ok) {
      await response.body?.cancel();
      return;
    }
    if (response.status === 404) {
      await response.body?.cancel();
      throw new RelayError("resource_absent", `${label}: device or resource not found`, { statusCode: 404 });
    }
    throw rejectionFor(label, response, await readErrorText(response, label, timing));
  }
}
