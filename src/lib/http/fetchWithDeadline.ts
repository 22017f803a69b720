import { NetworkError, errorMessage } from "../errors";
import { isObject } from "../json/getPath";

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

/**
 * True for the deadline firing. The signal stays attached to the response, so
 * this also covers a body read that outlives `timeoutMs`.
 */
export function isAbort(err: unknown): boolean {
  return isObject(err) && (err.name === "TimeoutError" || err.name === "AbortError");
}

/**
 * Single outbound call bounded by `timeoutMs`. Anything that prevents a
 * response from arriving (DNS, refused connection, deadline) surfaces as a
 * NetworkError; HTTP error statuses are returned as-is.
 */
export async function fetchWithDeadline(args: {
  fetchFn?: FetchFn;
  url: string;
  init: RequestInit;
  timeoutMs: number;
}): Promise<Response> {
  const fetchFn = args.fetchFn ?? fetch;
  try {
    return await fetchFn(args.url, { ...args.init, signal: AbortSignal.timeout(args.timeoutMs) });
  } catch (err) {
    if (isAbort(err)) {
      throw new NetworkError(`Request timed out after ${args.timeoutMs}ms`, {
        cause: err,
        timedOut: true,
      });
    }
    throw new NetworkError(errorMessage(err), { cause: err });
  }
}
