/**
 * Hook Invocation Helpers
 *
 * Safely invoke user-provided hooks with error handling.
 */

import type {
  RequestContext,
  ResponseContext,
  ErrorContext,
} from "../types.js";
import { createLogger } from "../logger.js";

const logger = createLogger("client");

/**
 * Check if a value is a Promise
 * @internal
 */
export function isPromise(value: unknown): value is Promise<unknown> {
  return (
    value !== null &&
    typeof value === "object" &&
    "then" in value &&
    typeof value.then === "function"
  );
}

/**
 * Invoke the beforeRequest hook.
 * Errors propagate: throwing is how the hook aborts a query.
 *
 * @internal
 */
export async function invokeBeforeRequest(
  hook: ((ctx: RequestContext) => void | Promise<void>) | undefined,
  ctx: RequestContext,
): Promise<void> {
  if (!hook) return;
  const result = hook(ctx);
  if (isPromise(result)) {
    await result;
  }
}

/**
 * Safely invoke the afterResponse hook.
 * Errors in the hook are logged but don't affect the response.
 *
 * @internal
 */
export async function invokeAfterResponse(
  hook: ((ctx: ResponseContext) => void | Promise<void>) | undefined,
  ctx: ResponseContext,
): Promise<void> {
  if (!hook) return;

  try {
    const result = hook(ctx);
    if (isPromise(result)) {
      await result;
    }
  } catch (err) {
    logger.warn("afterResponse hook error:", err);
  }
}

/**
 * Safely invoke the onError hook.
 * Errors in the hook are logged but don't affect error propagation.
 *
 * @internal
 */
export async function invokeOnError(
  hook: ((ctx: ErrorContext) => void | Promise<void>) | undefined,
  ctx: ErrorContext,
): Promise<void> {
  if (!hook) return;

  try {
    const result = hook(ctx);
    if (isPromise(result)) {
      await result;
    }
  } catch (err) {
    logger.warn("onError hook error:", err);
  }
}
