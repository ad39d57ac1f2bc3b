import { TranscriptError } from "../transcript/errors";

export const DEFAULT_HTTP_TIMEOUT_MS = 15000;

export type FetchFn = (input: string | URL, init?: RequestInit) => Promise<Response>;

function isAbortError(error: unknown): boolean {
  if (!error || typeof error !== "object") return false;
  return "name" in error && error.name === "AbortError";
}

const describeCause = (error: unknown): string => {
  if (!(error instanceof Error)) return String(error);
  const cause = error.cause;
  if (cause instanceof Error && cause.message) return `${error.message} (${cause.message})`;
  return error.message;
};

export type HttpResult = {
  response: Response;
  body: string;
};

/** Settles with `promise`, or rejects with the signal's reason once it aborts. */
const untilAborted = <T>(promise: Promise<T>, signal: AbortSignal): Promise<T> => {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
};

/**
 * Single round trip with a hard deadline covering both the headers and the
 * body. Transport failures and timeouts surface as `network` errors; HTTP
 * statuses are left to the caller.
 */
export async function fetchWithTimeout(
  input: string | URL,
  init: RequestInit = {},
  options: { timeoutMs?: number; fetchFn?: FetchFn } = {}
): Promise<HttpResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const resolvedTimeout = Number.isFinite(timeoutMs) && timeoutMs > 0
    ? timeoutMs
    : DEFAULT_HTTP_TIMEOUT_MS;
  const fetchFn = options.fetchFn ?? globalThis.fetch;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), resolvedTimeout);

  if (init.signal) {
    if (init.signal.aborted) {
      controller.abort();
    } else {
      init.signal.addEventListener("abort", () => controller.abort(), { once: true });
    }
  }

  try {
    const response = await untilAborted(fetchFn(input, { ...init, signal: controller.signal }), controller.signal);
    const body = await untilAborted(response.text(), controller.signal);
    return { response, body };
  } catch (error) {
    if (isAbortError(error) && init.signal?.aborted) {
      throw new TranscriptError("network", "Request aborted", {
        details: { url: String(input) },
        cause: error
      });
    }
    if (isAbortError(error)) {
      throw new TranscriptError("network", `Request timed out after ${resolvedTimeout}ms`, {
        details: { url: String(input), timeoutMs: resolvedTimeout },
        cause: error
      });
    }
    throw new TranscriptError("network", describeCause(error), {
      details: { url: String(input) },
      cause: error
    });
  } finally {
    clearTimeout(timeoutId);
  }
}
