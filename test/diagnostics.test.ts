import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileDiagnosticsSink } from "../src/diagnostics.js";
import type { RunResult } from "../src/types.js";

const result: RunResult = {
  runId: "run-7",
  status: "failed",
  abortReason: null,
  threshold: 0.8,
  summary: { searched: 10, reachable: 3, delivered: 2, failed: 0, notFound: 1, executionDurationMs: 900, successRatio: 2 / 3 },
  reading: { temperature: 21.5, humidity: 60, description: "clear", observedAt: "2024-01-01T00:00:00.000Z" },
  reachableDevices: ["CAL251", "CAL253", "CAL255"],
  startedAt: "2024-01-01T00:00:00.000Z",
  finishedAt: "2024-01-01T00:00:00.900Z"
};

describe("FileDiagnosticsSink", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "relay-diagnostics-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("writes the run snapshot and heartbeat, creating the directory", async () => {
    const sink = new FileDiagnosticsSink(path.join(root, "nested", "relay"));
    await sink.record(result);

    const snapshot = JSON.parse(await readFile(sink.snapshotFile, "utf8")) as RunResult;
    expect(snapshot.reachableDevices).toEqual(["CAL251", "CAL253", "CAL255"]);
    expect(snapshot.summary.notFound).toBe(1);

    const heartbeat = JSON.parse(await readFile(sink.heartbeatFile, "utf8")) as unknown;
    expect(heartbeat).toEqual({ runId: "run-7", status: "failed", finishedAt: "2024-01-01T00:00:00.900Z" });
  });

  it("rejects when the directory cannot be created", async () => {
    const blocker = path.join(root, "blocker");
    await writeFile(blocker, "not a directory");
    const sink = new FileDiagnosticsSink(path.join(blocker, "relay"));

    await expect(sink.record(result)).rejects.toThrow();
  });
});
