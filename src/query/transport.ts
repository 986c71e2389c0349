/**
 * Transport helpers
 *
 * One POST attempt under its own timeout, the abortable delay between
 * attempts, and the rule for which failures are worth another attempt.
 */

import { setTimeout as delay } from "node:timers/promises";
import { RETRYABLE_STATUS_CODES } from "../constants.js";

/**
 * What a single attempt produced.
 * A "failure" means no response arrived (network error or timeout).
 */
export type AttemptOutcome =
  | { kind: "response"; status: number; ok: boolean; body: string }
  | { kind: "failure"; timedOut: boolean; error: unknown };

/**
 * Raised internally when the caller's signal fires; the client turns this
 * into a RequestAbortedError carrying the attempt count.
 * @internal
 */
export class AbortedByCaller extends Error {
  constructor(public readonly reason: unknown) {
    super("Aborted by caller");
    this.name = "AbortedByCaller";
  }
}

/**
 * Whether a non-2xx status may succeed on a later attempt.
 */
export function isRetryableStatus(status: number): boolean {
  return status >= 500 || RETRYABLE_STATUS_CODES.has(status);
}

/**
 * POST once with a timeout, linked to the caller's signal.
 * The caller checks `signal.aborted` before calling.
 *
 * @throws {AbortedByCaller} If the caller's signal fires before a response is read
 * @internal
 */
export async function sendAttempt(
  fetchImpl: typeof fetch,
  url: string,
  init: { headers: Record<string, string>; body: string },
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<AttemptOutcome> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  const onAbort = () => controller.abort(signal?.reason);
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    const response = await fetchImpl(url, {
      method: "POST",
      headers: init.headers,
      body: init.body,
      signal: controller.signal,
    });
    const body = await response.text();
    return { kind: "response", status: response.status, ok: response.ok, body };
  } catch (error) {
    if (signal?.aborted) {
      throw new AbortedByCaller(signal.reason);
    }
    return { kind: "failure", timedOut: controller.signal.aborted, error };
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener("abort", onAbort);
  }
}

/**
 * Wait between attempts.
 *
 * @throws {AbortedByCaller} If the caller's signal fires while waiting
 * @internal
 */
export async function waitBeforeRetry(
  ms: number,
  signal?: AbortSignal,
): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) {
      throw new AbortedByCaller(signal.reason);
    }
    throw error;
  }
}
