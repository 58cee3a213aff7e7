import { partition } from "./candidates.js";
import { RelayError, describeError } from "./errors.js";
import type { Logger } from "./logger.js";
import { runPool } from "./pool.js";
import { type Sleep, defaultSleep } from "./retry.js";
import type { DeviceId, DeviceOutcome, DeviceOutcomeRecord, DispatchResult, DispatchTally } from "./types.js";

export type DevicePush = (deviceId: DeviceId, value: number, signal?: AbortSignal) => Promise<DeviceOutcome>;

export type DispatchOptions = {
  batchSize: number;
  concurrency: number;
  interDeviceDelayMs: number;
  batchTimeoutMs: number;
  signal?: AbortSignal;
};

type BatchReport = DispatchTally & {
  outcomes: DeviceOutcomeRecord[];
};

export function emptyTally(): DispatchTally {
  return { delivered: 0, failed: 0, notFound: 0 };
}

export function addOutcome(tally: DispatchTally, outcome: DeviceOutcome): void {
  if (outcome === "delivered") tally.delivered += 1;
  else if (outcome === "not_found") tally.notFound += 1;
  else tally.failed += 1;
}

function isCancellation(err: unknown): boolean {
  return err instanceof RelayError && err.reason === "cancelled";
}

function deadline(ms: number, batchNumber: number, signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    const timer = setTimeout(() => {
      reject(new RelayError("transport", `Batch ${batchNumber} exceeded ${ms}ms`));
    }, ms);
    signal.addEventListener("abort", () => clearTimeout(timer), { once: true });
  });
}

export class Dispatcher {
  private readonly push: DevicePush;
  private readonly logger: Logger;
  private readonly sleep: Sleep;

  constructor(push: DevicePush, logger: Logger, deps: { sleep?: Sleep } = {}) {
    this.push = push;
    this.logger = logger;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async dispatch(devices: readonly DeviceId[], value: number, options: DispatchOptions): Promise<DispatchResult> {
    const batches = partition(devices, options.batchSize);
    this.logger.info(
      { devices: devices.length, batches: batches.length, batchSize: options.batchSize, concurrency: options.concurrency },
      "Dispatching value to reachable devices"
    );

    const results = await runPool(batches, (batch, idx) => this.runBatch(batch, idx + 1, value, options), {
      concurrency: options.concurrency,
      signal: options.signal
    });

    const total: DispatchResult = { ...emptyTally(), batches: batches.length, cancelled: 0, outcomes: [] };
    results.forEach((result, idx) => {
      const batch = batches[idx];
      if (result.status === "fulfilled") {
        total.delivered += result.value.delivered;
        total.failed += result.value.failed;
        total.notFound += result.value.notFound;
        total.outcomes.push(...result.value.outcomes);
        return;
      }
      if (result.status === "skipped" || isCancellation(result.reason)) {
        total.cancelled += batch.length;
        return;
      }
      this.logger.error({ batch: idx + 1, devices: batch.length, reason: describeError(result.reason) }, "Batch failed, counting every device as failed");
      total.failed += batch.length;
      total.outcomes.push(...batch.map((deviceId): DeviceOutcomeRecord => ({ deviceId, outcome: "failed" })));
    });

    return total;
  }

  private async runBatch(batch: DeviceId[], batchNumber: number, value: number, options: DispatchOptions): Promise<BatchReport> {
    const controller = new AbortController();
    const timer = new AbortController();
    const parent = options.signal;
    const forwardAbort = () => controller.abort();
    if (parent?.aborted) controller.abort();
    parent?.addEventListener("abort", forwardAbort, { once: true });

    this.logger.debug({ batch: batchNumber, devices: batch.length }, "Processing batch");
    const work = this.processBatch(batch, value, options.interDeviceDelayMs, controller.signal);
    try {
      return await Promise.race([work, deadline(options.batchTimeoutMs, batchNumber, timer.signal)]);
    }
    catch (err) {
      // the pool slot stays taken until the batch's in-flight push has stopped
      controller.abort();
      await work.then(
        () => undefined,
        (workErr: unknown) => {
          this.logger.debug({ batch: batchNumber, reason: describeError(workErr) }, "Batch stopped");
        }
      );
      throw err;
    }
    finally {
      timer.abort();
      controller.abort();
      parent?.removeEventListener("abort", forwardAbort);
    }
  }

  private async processBatch(batch: DeviceId[], value: number, interDeviceDelayMs: number, signal: AbortSignal): Promise<BatchReport> {
    const report: BatchReport = { ...emptyTally(), outcomes: [] };
    for (const [idx, deviceId] of batch.entries()) {
      if (signal.aborted) {
        throw new RelayError("cancelled", "Batch cancelled");
      }
      if (idx > 0 && interDeviceDelayMs > 0) {
        try {
          await this.sleep(interDeviceDelayMs, signal);
        }
        catch (err) {
          throw new RelayError("cancelled", "Batch cancelled", { cause: err });
        }
      }
      const outcome = await this.push(deviceId, value, signal);
      if (outcome === "failed" && signal.aborted) {
        throw new RelayError("cancelled", "Batch cancelled");
      }
      addOutcome(report, outcome);
      report.outcomes.push({ deviceId, outcome });
    }
    return report;
  }
}
