import { setTimeout as delay } from "node:timers/promises";
import { describe, expect, it, vi } from "vitest";
import { enumerateCandidates } from "../src/candidates.js";
import { type DevicePush, type DispatchOptions, Dispatcher } from "../src/dispatcher.js";
import type { DeviceOutcome } from "../src/types.js";
import { logger, noSleep } from "./testUtils/testEnv.js";

const devices = enumerateCandidates("CAL", 251, 267);

function oracle(deviceId: string): DeviceOutcome {
  const n = Number(deviceId.slice(3));
  if (n % 5 === 0) return "not_found";
  if (n % 4 === 0) return "failed";
  return "delivered";
}

function options(overrides: Partial<DispatchOptions> = {}): DispatchOptions {
  return { batchSize: 8, concurrency: 3, interDeviceDelayMs: 0, batchTimeoutMs: 60_000, ...overrides };
}

describe("Dispatcher", () => {
  it("produces identical totals for any batch size", async () => {
    const push: DevicePush = async (deviceId) => oracle(deviceId);
    const dispatcher = new Dispatcher(push, logger, { sleep: noSleep });

    const byEight = await dispatcher.dispatch(devices, 21.5, options({ batchSize: 8 }));
    const byFive = await dispatcher.dispatch(devices, 21.5, options({ batchSize: 5 }));

    // 255, 260, 265 are absent; 252, 256, 264 fail
    const expected = { delivered: 11, failed: 3, notFound: 3 };
    expect(byEight).toMatchObject({ ...expected, batches: 3, cancelled: 0 });
    expect(byFive).toMatchObject({ ...expected, batches: 4, cancelled: 0 });
    expect(byEight.outcomes).toHaveLength(17);
    expect(new Set(byFive.outcomes.map((record) => record.deviceId))).toEqual(new Set(devices));
  });

  it("pushes the value to every device exactly once", async () => {
    const push = vi.fn<DevicePush>(async () => "delivered");
    const dispatcher = new Dispatcher(push, logger, { sleep: noSleep });

    await dispatcher.dispatch(devices, 19.25, options());

    expect(push).toHaveBeenCalledTimes(17);
    expect(push.mock.calls.every((call) => call[1] === 19.25)).toBe(true);
    expect(push.mock.calls.map((call) => call[0]).sort()).toEqual([...devices].sort());
  });

  it("waits between devices within a batch but not before the first", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const dispatcher = new Dispatcher(async () => "delivered", logger, { sleep });

    await dispatcher.dispatch(enumerateCandidates("CAL", 1, 5), 1, options({ batchSize: 3, interDeviceDelayMs: 100 }));

    // batches of 3 and 2 devices
    expect(sleep).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.every((call) => call[0] === 100)).toBe(true);
  });

  it("keeps devices of a batch sequential and batches under the cap", async () => {
    let active = 0;
    let peak = 0;
    const dispatcher = new Dispatcher(async () => {
      active += 1;
      peak = Math.max(peak, active);
      await delay(2);
      active -= 1;
      return "delivered";
    }, logger, { sleep: noSleep });

    const result = await dispatcher.dispatch(devices, 1, options({ batchSize: 2, concurrency: 3 }));
    expect(result.delivered).toBe(17);
    expect(peak).toBe(3);
  });

  it("counts every device of a batch as failed when the batch errors", async () => {
    const dispatcher = new Dispatcher(async (deviceId) => {
      if (deviceId === "CAL260") throw new Error("unexpected");
      return "delivered";
    }, logger, { sleep: noSleep });

    const result = await dispatcher.dispatch(devices, 1, options({ batchSize: 8 }));
    // CAL259..CAL266 form the second batch
    expect(result).toMatchObject({ delivered: 9, failed: 8, notFound: 0 });
    expect(result.outcomes.filter((record) => record.outcome === "failed").map((record) => record.deviceId))
      .toEqual(enumerateCandidates("CAL", 259, 266));
  });

  it("counts a batch that exceeds its deadline as failed", async () => {
    const dispatcher = new Dispatcher(async (deviceId) => {
      if (deviceId === "CAL252") await delay(200);
      return "delivered";
    }, logger, { sleep: noSleep });

    const result = await dispatcher.dispatch(enumerateCandidates("CAL", 251, 254), 1, options({ batchSize: 2, batchTimeoutMs: 40 }));
    expect(result).toMatchObject({ delivered: 2, failed: 2, notFound: 0, cancelled: 0 });
  });

  it("holds the batch slot until a timed-out batch has stopped", async () => {
    let active = 0;
    let peak = 0;
    const dispatcher = new Dispatcher(async () => {
      active += 1;
      peak = Math.max(peak, active);
      await delay(60);
      active -= 1;
      return "delivered";
    }, logger, { sleep: noSleep });

    const result = await dispatcher.dispatch(
      enumerateCandidates("CAL", 251, 256),
      1,
      options({ batchSize: 1, concurrency: 1, batchTimeoutMs: 20 })
    );
    expect(peak).toBe(1);
    expect(result).toMatchObject({ delivered: 0, failed: 6, notFound: 0, cancelled: 0 });
  });

  it("aborts the in-flight push of a timed-out batch", async () => {
    const signals: AbortSignal[] = [];
    const dispatcher = new Dispatcher(async (_deviceId, _value, signal) => {
      if (signal) signals.push(signal);
      await delay(40);
      return "delivered";
    }, logger, { sleep: noSleep });

    await dispatcher.dispatch(["CAL251"], 1, options({ batchTimeoutMs: 10 }));
    expect(signals).toHaveLength(1);
    expect(signals[0]?.aborted).toBe(true);
  });

  it("drops batches that did not complete before cancellation", async () => {
    const controller = new AbortController();
    const dispatcher = new Dispatcher(async (deviceId) => {
      if (deviceId === "CAL253") controller.abort();
      return "delivered";
    }, logger, { sleep: noSleep });

    const result = await dispatcher.dispatch(
      enumerateCandidates("CAL", 251, 258),
      1,
      options({ batchSize: 2, concurrency: 1, signal: controller.signal })
    );
    // first batch completes, the second stops before CAL254, the rest never start
    expect(result).toMatchObject({ delivered: 2, failed: 0, notFound: 0, cancelled: 6 });
  });

  it("does nothing for an empty device list", async () => {
    const push = vi.fn<DevicePush>(async () => "delivered");
    const result = await new Dispatcher(push, logger).dispatch([], 1, options());
    expect(result).toMatchObject({ delivered: 0, failed: 0, notFound: 0, batches: 0 });
    expect(push).not.toHaveBeenCalled();
  });
});
