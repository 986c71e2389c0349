/**
 * pplx-query
 *
 * Typed Perplexity chat-completions client with bounded retries, citation
 * extraction and per-query cost estimation.
 *
 * @example
 * ```typescript
 * import { createQueryClientFromEnv, withCost } from 'pplx-query';
 *
 * // 1. Construct once at startup (throws ConfigurationError if misconfigured)
 * const client = createQueryClientFromEnv();
 *
 * // 2. Ask, passing prior turns as context
 * const { answer, citations, estimatedCost } = await client.query(
 *   'Summarize the latest fusion research',
 *   [{ role: 'assistant', content: 'Earlier answer...' }],
 * );
 *
 * // 3. Total the spend of a whole workflow
 * const { cost } = await withCost(() => client.query('Follow-up question'));
 * ```
 */

// Client
export {
  createQueryClient,
  createQueryClientFromEnv,
  type QueryClient,
} from "./query/client.js";

// Request and response helpers
export { buildQuery, buildAuthHeaders } from "./query/messages.js";
export { extractCitations, parseResponse } from "./query/response.js";
export { isRetryableStatus } from "./query/transport.js";

// Pricing
export {
  estimateCost,
  calculateCost,
  extractUsageCounters,
  roundHalfUp,
} from "./pricing/cost.js";

// Cost capture
export { withCost } from "./client/withCost.js";
export type { WithCostResult, CostCapture } from "./client/withCost.js";

// Configuration
export { loadConfig, validateConfig } from "./config.js";

// Errors
export {
  PplxQueryError,
  ConfigurationError,
  RequestFailedError,
  ResponseParseError,
  RequestAbortedError,
} from "./errors.js";

// Types
export type {
  Message,
  ConversationHistory,
  PriceSchedule,
  UsageCounters,
  CostEstimate,
  PerplexityResponse,
  QueryResult,
  QueryClientConfig,
  QueryClientOptions,
  QueryOptions,
  RequestContext,
  ResponseContext,
  ErrorContext,
} from "./types.js";

// Semantic conventions
export { PPLX_ATTRIBUTES, GEN_AI_ATTRIBUTES, isMessage } from "./types.js";

// Constants
export { DEFAULTS, ENV_VARS, VERSION } from "./constants.js";

// Logger configuration
export {
  configureLogger,
  getLoggerConfig,
  resetLogger,
  type LogLevel,
  type LoggerConfig,
} from "./logger.js";
