/**
 * Span Utilities
 *
 * Helpers for annotating query spans with results and failures.
 */

import {
  trace,
  SpanStatusCode,
  type Attributes,
  type Span,
  type Tracer,
} from "@opentelemetry/api";
import { PACKAGE_NAME, VERSION } from "../constants.js";
import { RequestAbortedError, RequestFailedError } from "../errors.js";
import type { QueryResult } from "../types.js";
import { GEN_AI_ATTRIBUTES, PPLX_ATTRIBUTES } from "../types.js";

// The tracer instance
let tracer: Tracer | null = null;

/**
 * Get or create the pplx-query tracer.
 * Lazily initializes the tracer on first access.
 *
 * @internal
 */
export function getTracer(): Tracer {
  if (!tracer) {
    tracer = trace.getTracer(PACKAGE_NAME, VERSION);
  }
  return tracer;
}

/**
 * Sanitize error messages to remove potential API keys.
 *
 * @internal
 */
export function sanitizeErrorMessage(error: unknown): string {
  if (!(error instanceof Error)) {
    return "Unknown error";
  }

  let message = error.message;

  // Perplexity keys
  message = message.replace(/pplx-[a-zA-Z0-9]{8,}/g, "pplx-***");

  // Redact Bearer tokens
  message = message.replace(/Bearer\s+[a-zA-Z0-9._-]+/gi, "Bearer ***");

  // Redact api_key parameters
  message = message.replace(/api[_-]?key[:=]\s*[^\s&"']+/gi, "api_key=***");

  // Redact authorization headers
  message = message.replace(
    /authorization[:=]\s*[^\s&"']+/gi,
    "authorization=***",
  );

  return message;
}

/**
 * Add a successful result to a span and end it.
 *
 * @internal
 */
export function endSpanWithResult(
  span: Span,
  result: QueryResult,
  attempts: number,
): void {
  const attributes: Attributes = {
    [PPLX_ATTRIBUTES.COST_USD]: result.estimatedCost,
    [PPLX_ATTRIBUTES.CITATION_COUNT]: result.citations.length,
    [PPLX_ATTRIBUTES.ATTEMPTS]: attempts,
  };

  if (result.usage) {
    attributes[GEN_AI_ATTRIBUTES.INPUT_TOKENS] = result.usage.promptTokens;
    attributes[GEN_AI_ATTRIBUTES.OUTPUT_TOKENS] = result.usage.completionTokens;
  }

  span.setAttributes(attributes);
  span.setStatus({ code: SpanStatusCode.OK });
  span.end();
}

/**
 * Record a failure on a span and end it.
 *
 * @internal
 */
export function endSpanWithError(span: Span, error: Error): void {
  if (error instanceof RequestFailedError) {
    span.setAttribute(PPLX_ATTRIBUTES.ATTEMPTS, error.attempts);
    if (error.status !== null) {
      span.setAttribute(PPLX_ATTRIBUTES.STATUS_CODE, error.status);
    }
  } else if (error instanceof RequestAbortedError) {
    span.setAttribute(PPLX_ATTRIBUTES.ATTEMPTS, error.attempts);
  }

  const message = sanitizeErrorMessage(error);
  span.recordException({ name: error.name, message });
  span.setStatus({ code: SpanStatusCode.ERROR, message });
  span.end();
}
