/**
 * Cost Estimation
 *
 * Turns the usage counters of a response into a USD estimate:
 *
 *   promptTokens     * inputPricePerMillion   / 1_000_000
 * + completionTokens * outputPricePerMillion  / 1_000_000
 * + citationCount    * searchPricePerThousand / 1_000
 *
 * rounded half-up to 4 decimal places. Citation count stands in for the
 * number of searches, which the API does not report.
 */

import { COST_DECIMALS, UNIT_DIVISORS } from "../constants.js";
import type { CostEstimate, PriceSchedule, UsageCounters } from "../types.js";
import { isRecord } from "../types.js";

/**
 * Round half-up (away from zero on ties) to a fixed number of decimals.
 *
 * The scaled value is first trimmed to 15 significant digits so binary noise
 * such as 1.4999999999999998 is read as the decimal 1.5 it came from.
 *
 * @example
 * roundHalfUp(0.00015) // 0.0002
 * roundHalfUp(0.00014) // 0.0001
 */
export function roundHalfUp(value: number, decimals = COST_DECIMALS): number {
  const factor = 10 ** decimals;
  const scaled = Number((Math.abs(value) * factor).toPrecision(15));
  const rounded = Math.round(scaled) / factor;
  return value < 0 ? -rounded : rounded;
}

/**
 * Read a token counter as a non-negative integer.
 * Accepts finite numbers (truncated toward zero) and strings of digits.
 * Returns null for anything else.
 */
function readCount(value: unknown): number | null {
  if (typeof value === "number") {
    if (!Number.isFinite(value) || value < 0) {
      return null;
    }
    return Math.trunc(value);
  }
  if (typeof value === "string" && /^\d+$/.test(value.trim())) {
    return Number.parseInt(value.trim(), 10);
  }
  return null;
}

/**
 * Count citation entries. Absent or non-array citations count as none.
 */
function countCitations(response: Record<string, unknown>): number {
  return Array.isArray(response.citations) ? response.citations.length : 0;
}

/**
 * Extract usage counters from a raw response.
 *
 * @returns The counters, or a reason string describing what was malformed
 */
export function extractUsageCounters(
  response: unknown,
): UsageCounters | string {
  if (!isRecord(response)) {
    return "response is not an object";
  }
  if (!isRecord(response.usage)) {
    return "response has no usage object";
  }

  const promptTokens = readCount(response.usage.prompt_tokens);
  if (promptTokens === null) {
    return `invalid usage.prompt_tokens: ${String(response.usage.prompt_tokens)}`;
  }

  const completionTokens = readCount(response.usage.completion_tokens);
  if (completionTokens === null) {
    return `invalid usage.completion_tokens: ${String(response.usage.completion_tokens)}`;
  }

  return {
    promptTokens,
    completionTokens,
    citationCount: countCitations(response),
  };
}

/**
 * Calculate the cost of a set of counters under a price schedule.
 * Prices are validated at client construction; the result is never negative.
 */
export function calculateCost(
  usage: UsageCounters,
  prices: PriceSchedule,
): number {
  const cost =
    (usage.promptTokens * prices.inputPricePerMillion) /
      UNIT_DIVISORS.PER_MILLION +
    (usage.completionTokens * prices.outputPricePerMillion) /
      UNIT_DIVISORS.PER_MILLION +
    (usage.citationCount * prices.searchPricePerThousand) /
      UNIT_DIVISORS.PER_THOUSAND;

  return Math.max(0, roundHalfUp(cost));
}

/**
 * Estimate the cost of a raw Perplexity response.
 *
 * Never throws. A malformed response yields `{ ok: false, reason }`;
 * whether that counts as zero is up to the caller.
 *
 * @example
 * ```typescript
 * const estimate = estimateCost(body, prices);
 * const cost = estimate.ok ? estimate.cost : 0;
 * ```
 */
export function estimateCost(
  response: unknown,
  prices: PriceSchedule,
): CostEstimate {
  const usage = extractUsageCounters(response);
  if (typeof usage === "string") {
    return { ok: false, reason: usage };
  }

  const cost = calculateCost(usage, prices);
  if (!Number.isFinite(cost)) {
    return { ok: false, reason: `cost is not finite: ${cost}` };
  }

  return { ok: true, cost, usage };
}
