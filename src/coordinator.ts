import { randomUUID } from "node:crypto";
import { candidatesFromConfig } from "./candidates.js";
import { type ServiceConfig, missingRunSettings, platformCredentials } from "./config.js";
import type { DiagnosticsSink } from "./diagnostics.js";
import { Discoverer } from "./discoverer.js";
import { Dispatcher } from "./dispatcher.js";
import { describeError } from "./errors.js";
import type { FetchLike } from "./http.js";
import type { Logger } from "./logger.js";
import { PlatformClient } from "./platformClient.js";
import type { Sleep } from "./retry.js";
import type {
  AbortReason,
  DeviceId,
  RunResult,
  RunState,
  RunStatus,
  RunSummary,
  WeatherReading
} from "./types.js";
import { WeatherClient } from "./weatherClient.js";

export interface WeatherSource {
  fetchReading(signal?: AbortSignal): Promise<WeatherReading | null>;
}

type ResolvedDependencies = {
  discoverer: Pick<Discoverer, "discover">;
  dispatcher: Pick<Dispatcher, "dispatch">;
  weather: WeatherSource;
  candidates: () => DeviceId[];
  sinks: DiagnosticsSink[];
  onStateChange: (state: RunState) => void;
  fetch: FetchLike;
  sleep: Sleep;
  now: () => number;
  createRunId: () => string;
};

export type RunCoordinatorDependencies = Partial<ResolvedDependencies>;

export type RunClassification = {
  successRatio: number;
  status: Extract<RunStatus, "passed" | "failed">;
};

/** Success ratio over reachable devices; the threshold boundary is inclusive. */
export function classifyRun(delivered: number, reachable: number, threshold: number): RunClassification {
  const successRatio = reachable > 0 ? delivered / reachable : 0;
  return {
    successRatio,
    status: successRatio >= threshold ? "passed" : "failed"
  };
}

class RunAborted extends Error {
  constructor(readonly abortReason: AbortReason) {
    super(`run aborted: ${abortReason}`);
    Object.setPrototypeOf(this, RunAborted.prototype);
  }
}

type RunDraft = {
  summary: Omit<RunSummary, "executionDurationMs">;
  reading: WeatherReading | null;
  reachableDevices: DeviceId[];
};

export class RunCoordinator {
  private readonly config: ServiceConfig;
  private readonly logger: Logger;
  private readonly deps: RunCoordinatorDependencies;
  private readonly now: () => number;
  private state: RunState = "idle";

  constructor(config: ServiceConfig, logger: Logger, deps: RunCoordinatorDependencies = {}) {
    this.config = config;
    this.logger = logger;
    this.deps = deps;
    this.now = deps.now ?? Date.now;
  }

  get currentState(): RunState {
    return this.state;
  }

  /** Always resolves: every failure is reflected in the returned status. */
  async run(signal?: AbortSignal): Promise<RunResult> {
    const runId = (this.deps.createRunId ?? randomUUID)();
    const startedAt = this.now();
    const draft: RunDraft = {
      summary: { searched: 0, reachable: 0, delivered: 0, failed: 0, notFound: 0, successRatio: 0 },
      reading: null,
      reachableDevices: []
    };
    const log = this.logger.child({ runId });
    this.state = "idle";

    let status: RunStatus;
    let abortReason: AbortReason | null = null;
    try {
      status = await this.execute(draft, log, signal);
    }
    catch (err) {
      abortReason = err instanceof RunAborted ? err.abortReason : "unexpected";
      if (!(err instanceof RunAborted)) {
        log.error({ err }, "Run failed unexpectedly");
      }
      status = "aborted";
    }
    this.transition(status, log);

    const finishedAt = this.now();
    const result: RunResult = {
      runId,
      status,
      abortReason,
      threshold: this.config.SUCCESS_THRESHOLD,
      summary: { ...draft.summary, executionDurationMs: finishedAt - startedAt },
      reading: draft.reading,
      reachableDevices: draft.reachableDevices,
      startedAt: new Date(startedAt).toISOString(),
      finishedAt: new Date(finishedAt).toISOString()
    };

    const level = status === "passed" ? "info" : "warn";
    log[level]({ status, abortReason, ...result.summary, threshold: result.threshold }, "Run finished");

    await this.notifySinks(result, log);
    return result;
  }

  private async execute(draft: RunDraft, log: Logger, signal?: AbortSignal): Promise<Extract<RunStatus, "passed" | "failed">> {
    this.transition("validating_config", log);
    const missing = missingRunSettings(this.config);
    if (missing.length > 0) {
      log.error({ missing }, "Required settings are missing");
      throw new RunAborted("configuration");
    }
    const { discoverer, dispatcher, weather } = this.collaborators(log);
    const candidates = (this.deps.candidates ?? (() => candidatesFromConfig(this.config)))();

    this.transition("discovering", log);
    const discovery = await discoverer.discover(candidates, {
      concurrency: this.config.PROBE_CONCURRENCY,
      signal
    });
    draft.summary.searched = discovery.searched;
    draft.summary.reachable = discovery.reachable.length;
    draft.reachableDevices = discovery.reachable;
    this.throwIfCancelled(signal, discovery.cancelled);
    if (discovery.reachable.length === 0) {
      log.warn({ searched: discovery.searched }, "No reachable devices");
      throw new RunAborted("no_reachable_devices");
    }

    this.transition("fetching_weather", log);
    const reading = await weather.fetchReading(signal);
    this.throwIfCancelled(signal);
    if (!reading) {
      throw new RunAborted("weather_unavailable");
    }
    draft.reading = reading;

    this.transition("dispatching", log);
    const dispatched = await dispatcher.dispatch(discovery.reachable, reading.temperature, {
      batchSize: this.config.BATCH_SIZE,
      concurrency: this.config.DISPATCH_CONCURRENCY,
      interDeviceDelayMs: this.config.INTER_DEVICE_DELAY_MS,
      batchTimeoutMs: this.config.BATCH_TIMEOUT_MS,
      signal
    });
    draft.summary.delivered = dispatched.delivered;
    draft.summary.failed = dispatched.failed;
    draft.summary.notFound = dispatched.notFound;
    if (dispatched.cancelled > 0) {
      log.warn({ cancelled: dispatched.cancelled }, "Dispatch interrupted");
    }
    this.throwIfCancelled(signal, dispatched.cancelled > 0);

    this.transition("summarizing", log);
    const classification = classifyRun(dispatched.delivered, discovery.reachable.length, this.config.SUCCESS_THRESHOLD);
    draft.summary.successRatio = classification.successRatio;
    return classification.status;
  }

  private collaborators(log: Logger): Pick<ResolvedDependencies, "discoverer" | "dispatcher" | "weather"> {
    const { discoverer, dispatcher, weather } = this.deps;
    if (discoverer && dispatcher && weather) {
      return { discoverer, dispatcher, weather };
    }
    const clientDeps = { fetch: this.deps.fetch, sleep: this.deps.sleep };
    const platform = new PlatformClient(this.config, platformCredentials(this.config), log, clientDeps);
    return {
      discoverer: discoverer ?? new Discoverer((deviceId, signal) => platform.probe(deviceId, signal), log),
      dispatcher: dispatcher ?? new Dispatcher((deviceId, value, signal) => platform.push(deviceId, value, signal), log, { sleep: this.deps.sleep }),
      weather: weather ?? new WeatherClient(this.config, log, clientDeps)
    };
  }

  private throwIfCancelled(signal?: AbortSignal, interrupted = false) {
    if (interrupted || signal?.aborted) {
      throw new RunAborted("cancelled");
    }
  }

  private transition(next: RunState, log: Logger) {
    const previous = this.state;
    this.state = next;
    log.info({ from: previous, to: next }, "Run state changed");
    this.deps.onStateChange?.(next);
  }

  private async notifySinks(result: RunResult, log: Logger) {
    for (const sink of this.deps.sinks ?? []) {
      try {
        await sink.record(result);
      }
      catch (err) {
        log.warn({ reason: describeError(err) }, "Failed to write run diagnostics");
      }
    }
  }
}

export function exitCodeFor(status: RunStatus): number {
  if (status === "passed") return 0;
  if (status === "failed") return 1;
  return 2;
}
