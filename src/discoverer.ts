import type { Logger } from "./logger.js";
import { runPool } from "./pool.js";
import { sortDeviceIds } from "./candidates.js";
import type { DeviceId } from "./types.js";

export type DeviceProbe = (deviceId: DeviceId, signal?: AbortSignal) => Promise<boolean>;

export type DiscoverOptions = {
  concurrency: number;
  signal?: AbortSignal;
};

export type DiscoveryResult = {
  searched: number;
  reachable: DeviceId[];
  cancelled: boolean;
};

export class Discoverer {
  private readonly probe: DeviceProbe;
  private readonly logger: Logger;

  constructor(probe: DeviceProbe, logger: Logger) {
    this.probe = probe;
    this.logger = logger;
  }

  async discover(candidates: readonly DeviceId[], options: DiscoverOptions): Promise<DiscoveryResult> {
    const unique = sortDeviceIds(candidates);
    const started = Date.now();

    const results = await runPool(unique, (deviceId) => this.probe(deviceId, options.signal), {
      concurrency: options.concurrency,
      signal: options.signal
    });

    const reachable: DeviceId[] = [];
    let skipped = 0;
    results.forEach((result, idx) => {
      if (result.status === "fulfilled" && result.value) {
        reachable.push(unique[idx]);
      }
      else if (result.status === "rejected") {
        this.logger.debug({ deviceId: unique[idx], err: result.reason }, "Probe threw, treating as unreachable");
      }
      else if (result.status === "skipped") {
        skipped += 1;
      }
    });

    this.logger.info(
      { searched: unique.length, reachable: reachable.length, skipped, durationMs: Date.now() - started },
      "Discovery finished"
    );

    return {
      searched: unique.length,
      reachable,
      cancelled: skipped > 0
    };
  }
}
