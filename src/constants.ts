/**
 * pplx-query Constants
 *
 * Centralized constants used across the library to avoid magic strings.
 */

/**
 * Package version (should match package.json)
 * Used for OpenTelemetry tracer identification.
 */
export const VERSION = "0.1.0";

/**
 * Package name
 */
export const PACKAGE_NAME = "pplx-query";

/**
 * Defaults applied when configuration leaves a value out.
 */
export const DEFAULTS = {
  /** Perplexity chat-completions endpoint */
  API_URL: "https://api.perplexity.ai/chat/completions",
  /** Model used when none is configured */
  MODEL: "sonar",
  /** Per-attempt timeout */
  TIMEOUT_MS: 60_000,
  /** Retries after the initial attempt */
  MAX_RETRIES: 3,
  /** Fixed delay between attempts */
  RETRY_DELAY_MS: 1_000,
} as const;

/**
 * Accepted ranges for client options, inclusive.
 */
export const LIMITS = {
  TIMEOUT_MS: { min: 1, max: 600_000 },
  MAX_RETRIES: { min: 0, max: 10 },
  RETRY_DELAY_MS: { min: 0, max: 60_000 },
} as const satisfies Record<string, { min: number; max: number }>;

/**
 * Environment variables read by loadConfig().
 */
export const ENV_VARS = {
  API_KEY: "PERPLEXITY_API_KEY",
  API_URL: "PERPLEXITY_API_URL",
  MODEL: "PERPLEXITY_MODEL",
  INPUT_PRICE_PPM: "PERPLEXITY_INPUT_PRICE_PPM",
  OUTPUT_PRICE_PPM: "PERPLEXITY_OUTPUT_PRICE_PPM",
  SEARCH_PRICE_PPK: "PERPLEXITY_SEARCH_PRICE_PPK",
} as const;

/**
 * HTTP header names sent with every request.
 */
export const HEADERS = {
  AUTHORIZATION: "Authorization",
  CONTENT_TYPE: "Content-Type",
} as const;

/**
 * Status codes worth another attempt besides the 5xx range.
 * Any other non-2xx status is treated as a permanent rejection.
 */
export const RETRYABLE_STATUS_CODES = new Set([408, 429]);

/**
 * Number of fractional digits kept in cost estimates.
 */
export const COST_DECIMALS = 4;

/**
 * Divisors for the price schedule units.
 *
 * @example
 * // input price is per million tokens
 * const costPerToken = price / UNIT_DIVISORS.PER_MILLION;
 */
export const UNIT_DIVISORS = {
  PER_MILLION: 1_000_000,
  PER_THOUSAND: 1_000,
} as const;

/**
 * Span name for a single query (all attempts included).
 */
export const SPAN_NAME = "perplexity.chat.completions";

/**
 * Provider identifier reported as gen_ai.system.
 */
export const PROVIDER = "perplexity";
