/**
 * Tests for withCost
 */

import { describe, it, expect, vi } from "vitest";
import { withCost, recordCost } from "../client/withCost.js";
import { createQueryClient } from "../query/client.js";
import type { QueryClientConfig } from "../types.js";

const config: QueryClientConfig = {
  apiKey: "test-key",
  apiUrl: "https://api.test/chat/completions",
  model: "sonar",
  prices: {
    inputPricePerMillion: 1,
    outputPricePerMillion: 1,
    searchPricePerThousand: 5,
  },
};

function respond(): Response {
  return new Response(
    JSON.stringify({
      choices: [{ message: { content: "ok" } }],
      usage: { prompt_tokens: 1000, completion_tokens: 500 },
      citations: ["https://a.example", "https://b.example", "https://c.example"],
    }),
    { status: 200 },
  );
}

describe("withCost", () => {
  it("should total the cost of every query in the scope", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(async () => respond());
    const client = createQueryClient(config, { fetch: fetchMock });

    const { result, cost, queries } = await withCost(async () => {
      const first = await client.query("first");
      const second = await client.query("second", [
        { role: "assistant", content: first.answer },
      ]);
      return second.answer;
    });

    expect(result).toBe("ok");
    expect(queries).toBe(2);
    // 2 * 0.0165
    expect(cost).toBe(0.033);
  });

  it("should count concurrent queries started in the scope", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(async () => respond());
    const client = createQueryClient(config, { fetch: fetchMock });

    const { cost, queries } = await withCost(() =>
      Promise.all([client.query("a"), client.query("b"), client.query("c")]),
    );

    expect(queries).toBe(3);
    // 3 * 0.0165 = 0.0495
    expect(cost).toBe(0.0495);
  });

  it("should not count failed queries", async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockImplementation(async () => new Response("{}", { status: 400 }));
    const client = createQueryClient(config, { fetch: fetchMock });

    const { result, cost, queries } = await withCost(() =>
      client.query("q").then(
        () => "ok",
        () => "failed",
      ),
    );

    expect(result).toBe("failed");
    expect(cost).toBe(0);
    expect(queries).toBe(0);
  });

  it("should keep separate scopes separate", async () => {
    const outer = await withCost(async () => {
      recordCost(0.001);
      const inner = await withCost(async () => {
        recordCost(0.002);
      });
      return inner.cost;
    });

    expect(outer.result).toBe(0.002);
    expect(outer.cost).toBe(0.001);
    expect(outer.queries).toBe(1);
  });

  it("should ignore costs recorded outside a scope", () => {
    expect(() => recordCost(1)).not.toThrow();
  });
});
