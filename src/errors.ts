export type RelayErrorReason =
  | "transport"
  | "upstream_rejection"
  | "resource_absent"
  | "malformed_response"
  | "configuration"
  | "cancelled";

export class RelayError extends Error {
  readonly reason: RelayErrorReason;
  readonly statusCode?: number;

  constructor(reason: RelayErrorReason, message: string, options?: { statusCode?: number; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.reason = reason;
    this.statusCode = options?.statusCode;
    Object.setPrototypeOf(this, RelayError.prototype);
  }
}

export class ConfigurationError extends RelayError {
  readonly keys: string[];

  constructor(message: string, keys: string[]) {
    super("configuration", message);
    this.keys = keys;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export function isRetryableReason(reason: RelayErrorReason): boolean {
  return reason === "transport" || reason === "upstream_rejection";
}

export function describeError(err: unknown): string {
  if (err instanceof RelayError) {
    return err.statusCode === undefined ? `${err.reason}: ${err.message}` : `${err.reason} (${err.statusCode}): ${err.message}`;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}
