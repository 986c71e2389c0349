/**
 * Configuration
 *
 * Loads client configuration from the environment and validates
 * programmatic configuration. Every failure is a ConfigurationError naming
 * the offending field.
 */

import { DEFAULTS, ENV_VARS, LIMITS } from "./constants.js";
import { ConfigurationError } from "./errors.js";
import { createLogger } from "./logger.js";
import type {
  PriceSchedule,
  QueryClientConfig,
  QueryClientOptions,
} from "./types.js";

const logger = createLogger("config");

/**
 * Client options with defaults applied.
 * @internal
 */
export interface ResolvedOptions {
  fetch: typeof fetch;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
}

/**
 * Check that a URL parses and uses http or https.
 */
function isValidApiUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return parsed.protocol === "https:" || parsed.protocol === "http:";
  } catch {
    return false;
  }
}

function requireNonEmpty(value: unknown, field: string): void {
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigurationError(
      `Invalid ${field}: must be a non-empty string.`,
      field,
    );
  }
}

function requirePrice(value: unknown, field: string): void {
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(
      `Invalid ${field}: ${String(value)}. Must be a non-negative number.`,
      field,
    );
  }
}

function requireInRange(
  value: number,
  field: string,
  range: { min: number; max: number },
  integer = false,
): void {
  if (
    !Number.isFinite(value) ||
    value < range.min ||
    value > range.max ||
    (integer && !Number.isInteger(value))
  ) {
    throw new ConfigurationError(
      `Invalid ${field}: ${value}. Must be ${integer ? "an integer " : ""}${range.min}-${range.max}.`,
      field,
    );
  }
}

/**
 * Validate a client configuration.
 *
 * @throws {ConfigurationError} If any field is missing or invalid
 */
export function validateConfig(config: QueryClientConfig): void {
  requireNonEmpty(config.apiKey, "apiKey");
  requireNonEmpty(config.model, "model");

  if (typeof config.apiUrl !== "string" || !isValidApiUrl(config.apiUrl)) {
    throw new ConfigurationError(
      `Invalid apiUrl: ${String(config.apiUrl)}. Must be an http(s) URL.`,
      "apiUrl",
    );
  }

  if (config.prices === null || typeof config.prices !== "object") {
    throw new ConfigurationError("prices must be an object", "prices");
  }
  requirePrice(config.prices.inputPricePerMillion, "prices.inputPricePerMillion");
  requirePrice(
    config.prices.outputPricePerMillion,
    "prices.outputPricePerMillion",
  );
  requirePrice(
    config.prices.searchPricePerThousand,
    "prices.searchPricePerThousand",
  );
}

/**
 * Validate client options and apply defaults.
 *
 * @throws {ConfigurationError} If an option is out of range or no fetch is available
 * @internal
 */
export function resolveOptions(options: QueryClientOptions): ResolvedOptions {
  const timeoutMs = options.timeoutMs ?? DEFAULTS.TIMEOUT_MS;
  const maxRetries = options.maxRetries ?? DEFAULTS.MAX_RETRIES;
  const retryDelayMs = options.retryDelayMs ?? DEFAULTS.RETRY_DELAY_MS;

  requireInRange(timeoutMs, "timeoutMs", LIMITS.TIMEOUT_MS);
  requireInRange(maxRetries, "maxRetries", LIMITS.MAX_RETRIES, true);
  requireInRange(retryDelayMs, "retryDelayMs", LIMITS.RETRY_DELAY_MS);

  const fetchImpl = options.fetch ?? globalThis.fetch;
  if (typeof fetchImpl !== "function") {
    throw new ConfigurationError(
      "No fetch implementation available. Pass one via options.fetch.",
      "fetch",
    );
  }

  return { fetch: fetchImpl, timeoutMs, maxRetries, retryDelayMs };
}

/**
 * Read a variable, treating empty strings as missing.
 */
function readEnv(
  env: Record<string, string | undefined>,
  name: string,
): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readPrice(
  env: Record<string, string | undefined>,
  name: string,
): number {
  const raw = readEnv(env, name);
  if (raw === undefined) {
    throw new ConfigurationError(`Missing ${name}`, name);
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(
      `Invalid ${name}: ${raw}. Must be a non-negative number.`,
      name,
    );
  }
  return value;
}

/**
 * Load client configuration from environment variables.
 *
 * | Variable | Required | Default |
 * |---|---|---|
 * | PERPLEXITY_API_KEY | yes | |
 * | PERPLEXITY_API_URL | no | https://api.perplexity.ai/chat/completions |
 * | PERPLEXITY_MODEL | no | sonar |
 * | PERPLEXITY_INPUT_PRICE_PPM | yes | |
 * | PERPLEXITY_OUTPUT_PRICE_PPM | yes | |
 * | PERPLEXITY_SEARCH_PRICE_PPK | yes | |
 *
 * @throws {ConfigurationError} If a required variable is missing or invalid
 *
 * @example
 * ```typescript
 * import { loadConfig, createQueryClient } from 'pplx-query';
 *
 * const client = createQueryClient(loadConfig());
 * ```
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): QueryClientConfig {
  const apiKey = readEnv(env, ENV_VARS.API_KEY);
  if (apiKey === undefined) {
    throw new ConfigurationError(
      `Missing ${ENV_VARS.API_KEY}`,
      ENV_VARS.API_KEY,
    );
  }

  const apiUrl = readEnv(env, ENV_VARS.API_URL) ?? DEFAULTS.API_URL;
  if (!isValidApiUrl(apiUrl)) {
    throw new ConfigurationError(
      `Invalid ${ENV_VARS.API_URL}: ${apiUrl}. Must be an http(s) URL.`,
      ENV_VARS.API_URL,
    );
  }

  const prices: PriceSchedule = {
    inputPricePerMillion: readPrice(env, ENV_VARS.INPUT_PRICE_PPM),
    outputPricePerMillion: readPrice(env, ENV_VARS.OUTPUT_PRICE_PPM),
    searchPricePerThousand: readPrice(env, ENV_VARS.SEARCH_PRICE_PPK),
  };

  const model = readEnv(env, ENV_VARS.MODEL) ?? DEFAULTS.MODEL;
  logger.debug(`Loaded configuration for model ${model}`);

  return { apiKey, apiUrl, model, prices };
}
