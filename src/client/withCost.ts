/**
 * withCost Utility
 *
 * Totals the estimated cost of every query completed inside a scope.
 * Uses AsyncLocalStorage, so queries started anywhere below the callback
 * (awaited helpers, Promise.all branches) are counted.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { roundHalfUp } from "../pricing/cost.js";

/**
 * Running totals for one withCost scope
 */
export interface CostCapture {
  /** Sum of estimated costs in USD */
  cost: number;
  /** Number of queries that completed */
  queries: number;
}

/**
 * Result from withCost including the callback's value and the totals
 */
export interface WithCostResult<T> {
  /** The callback's return value */
  result: T;
  /** Total estimated cost in USD, rounded half-up to 4 decimal places */
  cost: number;
  /** Number of queries that completed inside the scope */
  queries: number;
}

// AsyncLocalStorage for capturing cost in the current execution context
const costCaptureStorage = new AsyncLocalStorage<CostCapture>();

/**
 * Add one query's cost to the current scope, if any (internal use by the client)
 * @internal
 */
export function recordCost(cost: number): void {
  const capture = costCaptureStorage.getStore();
  if (capture) {
    capture.cost = roundHalfUp(capture.cost + cost);
    capture.queries += 1;
  }
}

/**
 * Execute a function and total the cost of the queries made within.
 *
 * @example
 * ```typescript
 * import { createQueryClient, loadConfig, withCost } from 'pplx-query';
 *
 * const client = createQueryClient(loadConfig());
 *
 * const { result, cost, queries } = await withCost(async () => {
 *   const first = await client.query('What is a tokamak?');
 *   return client.query('Who is building one?', [
 *     { role: 'assistant', content: first.answer },
 *   ]);
 * });
 *
 * console.log(`${queries} queries, $${cost.toFixed(4)}`);
 * ```
 */
export async function withCost<T>(
  fn: () => Promise<T>,
): Promise<WithCostResult<T>> {
  const capture: CostCapture = { cost: 0, queries: 0 };

  const result = await costCaptureStorage.run(capture, fn);

  return {
    result,
    cost: capture.cost,
    queries: capture.queries,
  };
}
