/**
 * pplx-query - Core Types
 */

import type { Tracer } from "@opentelemetry/api";

// ============================================================================
// Conversation Types
// ============================================================================

/**
 * A single chat message as sent to the API.
 */
export interface Message {
  /** Free text, typically "user", "assistant" or "system" */
  role: string;
  content: string;
}

/**
 * Prior conversation, oldest first. Owned by the caller and never mutated.
 * Entries are message-like; anything without a string role and content is
 * dropped when the request is built.
 */
export type ConversationHistory = ReadonlyArray<Partial<Message>>;

// ============================================================================
// Pricing Types
// ============================================================================

/**
 * Prices used for cost estimation, in USD.
 */
export interface PriceSchedule {
  /** Cost per million prompt tokens */
  inputPricePerMillion: number;
  /** Cost per million completion tokens */
  outputPricePerMillion: number;
  /** Cost per thousand searches */
  searchPricePerThousand: number;
}

/**
 * Counters read from one response.
 * citationCount stands in for the number of searches performed.
 */
export interface UsageCounters {
  promptTokens: number;
  completionTokens: number;
  citationCount: number;
}

/**
 * Outcome of cost estimation. Failure is a value, not an exception:
 * the caller decides what a failed estimate is worth.
 */
export type CostEstimate =
  | {
      ok: true;
      /** Cost in USD, rounded half-up to 4 decimal places */
      cost: number;
      usage: UsageCounters;
    }
  | {
      ok: false;
      reason: string;
    };

// ============================================================================
// Response Types
// ============================================================================

/**
 * Perplexity chat-completions response body (the fields this library reads).
 */
export interface PerplexityResponse {
  id?: string;
  model?: string;
  choices: Array<{
    index?: number;
    message: {
      role?: string;
      content: string;
    };
    finish_reason?: string;
  }>;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens?: number;
  };
  /** Source URLs backing the answer */
  citations?: string[];
}

/**
 * Result of one successful query.
 */
export interface QueryResult {
  /** Answer text from choices[0].message.content */
  answer: string;
  /** Citation URLs in response order */
  citations: string[];
  /** Estimated cost in USD (4 decimal places, 0 if estimation failed) */
  estimatedCost: number;
  /** Counters the estimate was computed from, or null if estimation failed */
  usage: UsageCounters | null;
}

// ============================================================================
// Client Types
// ============================================================================

/**
 * Everything a client needs from the configuration provider.
 */
export interface QueryClientConfig {
  /** Perplexity API key (secret) */
  apiKey: string;
  /** Chat-completions endpoint */
  apiUrl: string;
  /** Model identifier, e.g. "sonar" */
  model: string;
  /** Prices for cost estimation */
  prices: PriceSchedule;
}

/**
 * Context passed to the beforeRequest hook.
 */
export interface RequestContext {
  question: string;
  model: string;
  /** Messages about to be sent (read-only) */
  messages: readonly Message[];
}

/**
 * Context passed to the afterResponse hook.
 */
export interface ResponseContext extends RequestContext {
  result: QueryResult;
  /** Attempts made, initial attempt included */
  attempts: number;
  /** Query duration in milliseconds, retries and delays included */
  durationMs: number;
}

/**
 * Context passed to the onError hook.
 */
export interface ErrorContext extends RequestContext {
  error: Error;
  attempts: number;
  durationMs: number;
}

/**
 * Options for createQueryClient()
 */
export interface QueryClientOptions {
  /**
   * fetch-compatible transport.
   * @default globalThis.fetch
   */
  fetch?: typeof fetch;

  /**
   * Timeout for a single attempt in milliseconds.
   * @default 60000
   */
  timeoutMs?: number;

  /**
   * Retries after the initial attempt. Only timeouts, network errors and
   * 408/429/5xx responses are retried.
   * @default 3
   */
  maxRetries?: number;

  /**
   * Fixed delay between attempts in milliseconds.
   * @default 1000
   */
  retryDelayMs?: number;

  /**
   * Tracer for query spans. Defaults to the global tracer provider.
   */
  tracer?: Tracer;

  /**
   * Called before the first attempt. Can throw to abort the query.
   *
   * @example
   * ```typescript
   * const client = createQueryClient(config, {
   *   beforeRequest: (ctx) => {
   *     if (ctx.messages.length > 50) {
   *       throw new Error('History too long');
   *     }
   *   }
   * });
   * ```
   */
  beforeRequest?: (context: RequestContext) => void | Promise<void>;

  /**
   * Called after a successful query with its result and cost.
   *
   * @example
   * ```typescript
   * const client = createQueryClient(config, {
   *   afterResponse: (ctx) => {
   *     trackSpend(ctx.model, ctx.result.estimatedCost);
   *   }
   * });
   * ```
   */
  afterResponse?: (context: ResponseContext) => void | Promise<void>;

  /**
   * Called when a query fails for any reason.
   */
  onError?: (context: ErrorContext) => void | Promise<void>;
}

/**
 * Per-call options for query()
 */
export interface QueryOptions {
  /** Cancels the query at the next opportunity, including mid-attempt */
  signal?: AbortSignal;
  /** Sampling temperature, sent only when set */
  temperature?: number;
  /** Completion token cap, sent as max_tokens only when set */
  maxTokens?: number;
}

// ============================================================================
// Semantic conventions
// ============================================================================

/**
 * pplx-query span attributes
 */
export const PPLX_ATTRIBUTES = {
  /** Estimated cost in USD */
  COST_USD: "pplx.cost_usd",
  /** Number of citations returned */
  CITATION_COUNT: "pplx.citation_count",
  /** Attempts made, initial attempt included */
  ATTEMPTS: "pplx.attempts",
  /** Last HTTP status received */
  STATUS_CODE: "http.response.status_code",
} as const;

/**
 * Standard GenAI semantic conventions
 */
export const GEN_AI_ATTRIBUTES = {
  /** Input tokens */
  INPUT_TOKENS: "gen_ai.usage.input_tokens",
  /** Output tokens */
  OUTPUT_TOKENS: "gen_ai.usage.output_tokens",
  /** Model name */
  MODEL: "gen_ai.request.model",
  /** System/provider */
  SYSTEM: "gen_ai.system",
} as const;

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check that a value is a non-null, non-array object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Check that a history entry is a well-formed message.
 */
export function isMessage(value: unknown): value is Message {
  return (
    isRecord(value) &&
    typeof value.role === "string" &&
    typeof value.content === "string"
  );
}
