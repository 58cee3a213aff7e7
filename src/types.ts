export type DeviceId = string;

export type WeatherReading = {
  readonly temperature: number;
  readonly humidity: number;
  readonly description: string;
  readonly observedAt: string;
};

export type DeviceOutcome = "delivered" | "failed" | "not_found";

export type DeviceOutcomeRecord = {
  deviceId: DeviceId;
  outcome: DeviceOutcome;
};

export type DispatchTally = {
  delivered: number;
  failed: number;
  notFound: number;
};

export type DispatchResult = DispatchTally & {
  batches: number;
  cancelled: number;
  outcomes: DeviceOutcomeRecord[];
};

export type RunState =
  | "idle"
  | "validating_config"
  | "discovering"
  | "fetching_weather"
  | "dispatching"
  | "summarizing"
  | "passed"
  | "failed"
  | "aborted";

export type RunStatus = Extract<RunState, "passed" | "failed" | "aborted">;

export type AbortReason = "configuration" | "no_reachable_devices" | "weather_unavailable" | "cancelled" | "unexpected";

export type RunSummary = {
  searched: number;
  reachable: number;
  delivered: number;
  failed: number;
  notFound: number;
  executionDurationMs: number;
  successRatio: number;
};

export type RunResult = {
  runId: string;
  status: RunStatus;
  abortReason: AbortReason | null;
  threshold: number;
  summary: RunSummary;
  reading: WeatherReading | null;
  reachableDevices: DeviceId[];
  startedAt: string;
  finishedAt: string;
};
