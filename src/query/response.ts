/**
 * Response parsing
 */

import { ResponseParseError } from "../errors.js";
import { createLogger } from "../logger.js";
import { estimateCost } from "../pricing/cost.js";
import type { PriceSchedule, QueryResult } from "../types.js";
import { isRecord } from "../types.js";

const logger = createLogger("client");

/**
 * Extract citation URLs from a raw response.
 * Returns an empty array when citations are absent or not an array.
 */
export function extractCitations(response: unknown): string[] {
  if (!isRecord(response) || !Array.isArray(response.citations)) {
    logger.debug("Extracted citations:", []);
    return [];
  }

  const citations = response.citations.filter(
    (citation): citation is string => typeof citation === "string",
  );
  logger.debug("Extracted citations:", citations);
  return citations;
}

/**
 * Read choices[0].message.content, or null if the path is missing or not text.
 */
function readAnswer(response: unknown): string | null {
  if (!isRecord(response) || !Array.isArray(response.choices)) {
    return null;
  }
  const first: unknown = response.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) {
    return null;
  }
  return typeof first.message.content === "string"
    ? first.message.content
    : null;
}

/**
 * Parse a successful response body into a query result.
 *
 * Cost estimation failures degrade to a cost of 0 (logged). A body that is
 * not JSON, or has no answer text, is fatal.
 *
 * @throws {ResponseParseError} If the body is not JSON or lacks choices[0].message.content
 */
export function parseResponse(
  body: string,
  prices: PriceSchedule,
): QueryResult {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (err) {
    logger.error("Error parsing Perplexity response: body is not JSON", err);
    throw new ResponseParseError("Response body is not valid JSON", {
      cause: err,
    });
  }

  logger.debug("Perplexity response:", data);

  const answer = readAnswer(data);
  if (answer === null) {
    logger.error(
      "Error parsing Perplexity response: missing choices[0].message.content",
    );
    throw new ResponseParseError(
      "Response has no choices[0].message.content",
    );
  }

  const estimate = estimateCost(data, prices);
  if (!estimate.ok) {
    logger.error(`Error computing cost: ${estimate.reason}`);
  } else {
    logger.debug(`Estimated cost: ${estimate.cost} USD`);
  }

  return {
    answer,
    citations: extractCitations(data),
    estimatedCost: estimate.ok ? estimate.cost : 0,
    usage: estimate.ok ? estimate.usage : null,
  };
}
