import { promises as fs } from "node:fs";
import path from "node:path";
import type { RunResult } from "./types.js";

export interface DiagnosticsSink {
  record(result: RunResult): Promise<void>;
}

export type HeartbeatShape = {
  runId: string;
  status: RunResult["status"];
  finishedAt: string;
};

async function writeJsonFile(filePath: string, data: unknown) {
  const payload = JSON.stringify(data, null, 2);
  const tmpPath = `${filePath}.tmp`;
  await fs.writeFile(tmpPath, payload, "utf8");
  await fs.rename(tmpPath, filePath);
}

/**
 * Writes `last-run.json` and `heartbeat.json` under the data directory. The files
 * are diagnostics for operators and are never read by the service.
 */
export class FileDiagnosticsSink implements DiagnosticsSink {
  private readonly dataDir: string;

  constructor(dataDir: string) {
    this.dataDir = dataDir;
  }

  get snapshotFile(): string {
    return path.join(this.dataDir, "last-run.json");
  }

  get heartbeatFile(): string {
    return path.join(this.dataDir, "heartbeat.json");
  }

  async record(result: RunResult): Promise<void> {
    await fs.mkdir(this.dataDir, { recursive: true });
    await writeJsonFile(this.snapshotFile, result);
    const heartbeat: HeartbeatShape = {
      runId: result.runId,
      status: result.status,
      finishedAt: result.finishedAt
    };
    await writeJsonFile(this.heartbeatFile, heartbeat);
  }
}
