import type { RunResult } from "./types.js";

/**
 * Keeps the latest finished run and collapses overlapping triggers onto the run
 * already in flight.
 */
export class RunTracker {
  private readonly runner: (signal?: AbortSignal) => Promise<RunResult>;
  private inFlight: Promise<RunResult> | null = null;
  private latest: RunResult | null = null;

  constructor(runner: (signal?: AbortSignal) => Promise<RunResult>) {
    this.runner = runner;
  }

  get running(): boolean {
    return this.inFlight !== null;
  }

  get latestResult(): RunResult | null {
    return this.latest;
  }

  /** Resolves once no run is in flight, whatever the outcome of the current one. */
  async idle(): Promise<void> {
    if (this.inFlight) {
      await this.inFlight.catch(() => undefined);
    }
  }

  trigger(signal?: AbortSignal): Promise<RunResult> {
    if (this.inFlight) {
      return this.inFlight;
    }
    const job = this.runner(signal)
      .then((result) => {
        this.latest = result;
        return result;
      })
      .finally(() => {
        this.inFlight = null;
      });
    this.inFlight = job;
    return job;
  }
}
