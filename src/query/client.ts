/**
 * Query Client
 *
 * Sends a question plus conversation history to Perplexity, retries
 * transient failures, and returns the answer with its citations and an
 * estimated cost.
 */

import { context, trace, SpanKind } from "@opentelemetry/api";
import { recordCost } from "../client/withCost.js";
import { loadConfig, resolveOptions, validateConfig } from "../config.js";
import { PROVIDER, SPAN_NAME } from "../constants.js";
import {
  PplxQueryError,
  RequestAbortedError,
  RequestFailedError,
} from "../errors.js";
import {
  invokeAfterResponse,
  invokeBeforeRequest,
  invokeOnError,
} from "../instrumentation/hooks.js";
import {
  endSpanWithError,
  endSpanWithResult,
  getTracer,
} from "../instrumentation/span-utils.js";
import { createLogger } from "../logger.js";
import { estimateCost as estimateRawCost } from "../pricing/cost.js";
import type {
  ConversationHistory,
  Message,
  PriceSchedule,
  QueryClientConfig,
  QueryClientOptions,
  QueryOptions,
  QueryResult,
  RequestContext,
} from "../types.js";
import { GEN_AI_ATTRIBUTES } from "../types.js";
import { buildAuthHeaders, buildQuery } from "./messages.js";
import { extractCitations, parseResponse } from "./response.js";
import {
  AbortedByCaller,
  isRetryableStatus,
  sendAttempt,
  waitBeforeRetry,
} from "./transport.js";

const logger = createLogger("client");

/**
 * Map whatever a query threw to the Error surfaced to the caller.
 */
function toQueryError(caught: unknown, attempts: number): Error {
  if (caught instanceof AbortedByCaller) {
    return new RequestAbortedError("Query aborted by caller", attempts, {
      cause: caught.reason,
    });
  }
  if (caught instanceof Error) {
    return caught;
  }
  return new PplxQueryError("Query failed", { cause: caught });
}

/**
 * Query client interface
 */
export interface QueryClient {
  /** Model every query is sent to */
  readonly model: string;
  /** Frozen price schedule used for estimates */
  readonly prices: Readonly<PriceSchedule>;
  /** Ask a question with optional prior conversation */
  query(
    question: string,
    history?: ConversationHistory,
    options?: QueryOptions,
  ): Promise<QueryResult>;
  /** Build the message list that query() would send */
  buildQuery(question: string, history?: ConversationHistory): Message[];
  /** Build the request headers for this client's key */
  buildAuthHeaders(): Record<string, string>;
  /** Estimate the cost of a raw response; 0 if it cannot be estimated */
  estimateCost(response: unknown): number;
  /** Extract citation URLs from a raw response */
  extractCitations(response: unknown): string[];
  /** Parse a successful response body */
  parseResponse(body: string): QueryResult;
}

/**
 * Create a Perplexity query client.
 *
 * Configuration and options are validated up front; an invalid value throws
 * and no client is returned.
 *
 * @throws {ConfigurationError} If the configuration or options are invalid
 *
 * @example
 * ```typescript
 * import { createQueryClient } from 'pplx-query';
 *
 * const client = createQueryClient({
 *   apiKey: process.env.PERPLEXITY_API_KEY ?? '',
 *   apiUrl: 'https://api.perplexity.ai/chat/completions',
 *   model: 'sonar',
 *   prices: {
 *     inputPricePerMillion: 1,
 *     outputPricePerMillion: 1,
 *     searchPricePerThousand: 5,
 *   },
 * });
 *
 * const { answer, citations, estimatedCost } = await client.query(
 *   'What changed in the latest TypeScript release?',
 * );
 * ```
 */
export function createQueryClient(
  config: QueryClientConfig,
  options: QueryClientOptions = {},
): QueryClient {
  logger.info("Starting Perplexity query client...");

  validateConfig(config);
  const resolved = resolveOptions(options);

  const { apiKey, apiUrl, model } = config;
  const prices: Readonly<PriceSchedule> = Object.freeze({
    inputPricePerMillion: config.prices.inputPricePerMillion,
    outputPricePerMillion: config.prices.outputPricePerMillion,
    searchPricePerThousand: config.prices.searchPricePerThousand,
  });
  const tracer = options.tracer ?? getTracer();
  const { beforeRequest, afterResponse, onError } = options;

  /**
   * Run the attempt loop and return the body of the first 2xx response.
   * Reports the attempt count through `track` so failures can carry it.
   */
  async function send(
    payload: string,
    signal: AbortSignal | undefined,
    track: (attempts: number) => void,
  ): Promise<string> {
    const headers = buildAuthHeaders(apiKey);
    const { maxRetries, retryDelayMs, timeoutMs } = resolved;
    let lastStatus: number | null = null;
    let lastError: unknown;

    for (let retry = 0; retry <= maxRetries; retry += 1) {
      if (retry > 0) {
        logger.error(
          `Request to Perplexity failed, retrying ${retry}/${maxRetries}...`,
        );
        await waitBeforeRetry(retryDelayMs, signal);
      }

      if (signal?.aborted) {
        throw new AbortedByCaller(signal.reason);
      }
      track(retry + 1);
      const outcome = await sendAttempt(
        resolved.fetch,
        apiUrl,
        { headers, body: payload },
        timeoutMs,
        signal,
      );

      if (outcome.kind === "response") {
        if (outcome.ok) {
          return outcome.body;
        }
        lastStatus = outcome.status;
        lastError = undefined;
        if (!isRetryableStatus(outcome.status)) {
          logger.error(
            `Request to Perplexity rejected with status ${outcome.status}, not retrying.`,
          );
          throw new RequestFailedError(
            `Request failed with status code ${outcome.status}.`,
            outcome.status,
            retry + 1,
          );
        }
      } else {
        lastStatus = null;
        lastError = outcome.error;
        logger.debug(
          outcome.timedOut
            ? `Attempt ${retry + 1} timed out after ${timeoutMs}ms`
            : `Attempt ${retry + 1} failed without a response`,
          outcome.error,
        );
      }
    }

    logger.error(`Request to Perplexity failed after ${maxRetries} retries.`);
    throw new RequestFailedError(
      lastStatus === null
        ? "Request failed: no response received."
        : `Request failed with status code ${lastStatus}.`,
      lastStatus,
      maxRetries + 1,
      { cause: lastError },
    );
  }

  async function query(
    question: string,
    history: ConversationHistory = [],
    queryOptions: QueryOptions = {},
  ): Promise<QueryResult> {
    const { signal, temperature, maxTokens } = queryOptions;
    const messages = buildQuery(question, history);
    const requestContext: RequestContext = { question, model, messages };

    const span = tracer.startSpan(SPAN_NAME, {
      kind: SpanKind.CLIENT,
      attributes: {
        [GEN_AI_ATTRIBUTES.SYSTEM]: PROVIDER,
        [GEN_AI_ATTRIBUTES.MODEL]: model,
      },
    });
    const startTime = Date.now();
    let attempts = 0;

    return context.with(trace.setSpan(context.active(), span), async () => {
      try {
        await invokeBeforeRequest(beforeRequest, requestContext);

        const request: Record<string, unknown> = { model, messages };
        if (temperature !== undefined) {
          request.temperature = temperature;
        }
        if (maxTokens !== undefined) {
          request.max_tokens = maxTokens;
        }
        const payload = JSON.stringify(request);

        const body = await send(payload, signal, (n) => {
          attempts = n;
        });
        const result = parseResponse(body, prices);

        recordCost(result.estimatedCost);
        endSpanWithResult(span, result, attempts);
        await invokeAfterResponse(afterResponse, {
          ...requestContext,
          result,
          attempts,
          durationMs: Date.now() - startTime,
        });

        return result;
      } catch (caught) {
        const error = toQueryError(caught, attempts);

        endSpanWithError(span, error);
        await invokeOnError(onError, {
          ...requestContext,
          error,
          attempts,
          durationMs: Date.now() - startTime,
        });

        throw error;
      }
    });
  }

  logger.info("Perplexity query client initialized.");

  return {
    model,
    prices,
    query,
    buildQuery,
    buildAuthHeaders: () => buildAuthHeaders(apiKey),
    estimateCost(response: unknown): number {
      logger.debug("Perplexity response:", response);
      const estimate = estimateRawCost(response, prices);
      if (!estimate.ok) {
        logger.error(`Error computing cost: ${estimate.reason}`);
        return 0;
      }
      logger.debug(`Estimated cost: ${estimate.cost} USD`);
      return estimate.cost;
    },
    extractCitations,
    parseResponse: (body: string) => parseResponse(body, prices),
  };
}

/**
 * Create a query client configured from environment variables.
 *
 * @throws {ConfigurationError} If a variable is missing or invalid
 * @see loadConfig for the variables read
 */
export function createQueryClientFromEnv(
  env: Record<string, string | undefined> = process.env,
  options: QueryClientOptions = {},
): QueryClient {
  return createQueryClient(loadConfig(env), options);
}
