import type { ServiceConfig } from "./config.js";
import type { DeviceId } from "./types.js";

export function enumerateCandidates(prefix: string, start: number, end: number): DeviceId[] {
  if (end < start) return [];
  return Array.from({ length: end - start + 1 }, (_, idx) => `${prefix}${start + idx}`);
}

export function candidatesFromConfig(config: ServiceConfig): DeviceId[] {
  return enumerateCandidates(config.DEVICE_PREFIX, config.DEVICE_RANGE_START, config.DEVICE_RANGE_END);
}

export function compareDeviceIds(a: DeviceId, b: DeviceId): number {
  return a.localeCompare(b, "en", { numeric: true });
}

export function sortDeviceIds(ids: Iterable<DeviceId>): DeviceId[] {
  return [...new Set(ids)].sort(compareDeviceIds);
}

export function partition<T>(items: readonly T[], size: number): T[][] {
  const chunkSize = Math.max(1, Math.floor(size));
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += chunkSize) {
    chunks.push(items.slice(i, i + chunkSize));
  }
  return chunks;
}
