import { RelayError } from "./errors.js";

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export type TimedRequest = {
  url: string | URL;
  init?: RequestInit;
  timeoutMs: number;
  label: string;
  signal?: AbortSignal;
};

export function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
}

function requestSignal(request: TimedRequest): AbortSignal {
  const timeout = AbortSignal.timeout(request.timeoutMs);
  return request.signal ? AbortSignal.any([request.signal, timeout]) : timeout;
}

/** A caller abort becomes `cancelled`; a timeout or network fault becomes `transport`. */
export function transportError(label: string, err: unknown, request: Pick<TimedRequest, "timeoutMs" | "signal">): RelayError {
  if (request.signal?.aborted) {
    return new RelayError("cancelled", `${label} cancelled`, { cause: err });
  }
  if (isTimeout(err)) {
    return new RelayError("transport", `${label} timed out after ${request.timeoutMs}ms`, { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new RelayError("transport", `${label} failed: ${message}`, { cause: err });
}

export async function requestWithTimeout(fetchImpl: FetchLike, request: TimedRequest): Promise<Response> {
  try {
    return await fetchImpl(request.url, {
      ...request.init,
      signal: requestSignal(request)
    });
  }
  catch (err) {
    throw transportError(request.label, err, request);
  }
}

/** Reads the whole body; a failure while reading counts as a transport fault. */
export async function readBodyText(response: Response, label: string, request: Pick<TimedRequest, "timeoutMs" | "signal">): Promise<string> {
  try {
    return await response.text();
  }
  catch (err) {
    throw transportError(label, err, request);
  }
}

export async function readErrorText(response: Response, label: string, request: Pick<TimedRequest, "timeoutMs" | "signal">): Promise<string> {
  const text = await readBodyText(response, label, request);
  return text || response.statusText;
}

export function rejectionFor(label: string, response: Response, detail?: string): RelayError {
  const suffix = detail ? `: ${detail}` : "";
  return new RelayError("upstream_rejection", `${label} rejected (${response.status})${suffix}`, { statusCode: response.status });
}
