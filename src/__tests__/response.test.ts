/**
 * Tests for response parsing
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import { extractCitations, parseResponse } from "../query/response.js";
import { ResponseParseError } from "../errors.js";
import { configureLogger, resetLogger } from "../logger.js";
import type { PriceSchedule } from "../types.js";

const prices: PriceSchedule = {
  inputPricePerMillion: 1,
  outputPricePerMillion: 1,
  searchPricePerThousand: 5,
};

describe("extractCitations", () => {
  it("should return the citations in order", () => {
    expect(
      extractCitations({
        citations: ["https://b.example", "https://a.example", "https://b.example"],
      }),
    ).toEqual(["https://b.example", "https://a.example", "https://b.example"]);
  });

  it("should return an empty array when citations are missing", () => {
    expect(extractCitations({ choices: [] })).toEqual([]);
  });

  it("should return an empty array for non-array citations or non-objects", () => {
    expect(extractCitations({ citations: "https://a.example" })).toEqual([]);
    expect(extractCitations(null)).toEqual([]);
    expect(extractCitations(42)).toEqual([]);
  });

  it("should skip entries that are not strings", () => {
    expect(
      extractCitations({ citations: ["https://a.example", 7, null, "not-a-url"] }),
    ).toEqual(["https://a.example", "not-a-url"]);
  });
});

describe("parseResponse", () => {
  afterEach(() => {
    resetLogger();
  });

  it("should parse answer, citations and cost", () => {
    const body = JSON.stringify({
      id: "resp-1",
      model: "sonar",
      choices: [{ index: 0, message: { role: "assistant", content: "Plasma." } }],
      usage: { prompt_tokens: 1000, completion_tokens: 500, total_tokens: 1500 },
      citations: ["https://a.example", "https://b.example", "https://c.example"],
    });

    expect(parseResponse(body, prices)).toEqual({
      answer: "Plasma.",
      citations: ["https://a.example", "https://b.example", "https://c.example"],
      estimatedCost: 0.0165,
      usage: { promptTokens: 1000, completionTokens: 500, citationCount: 3 },
    });
  });

  it("should default citations and cost when usage and citations are absent", () => {
    const result = parseResponse(
      '{"choices":[{"message":{"content":"hi"}}]}',
      prices,
    );

    expect(result).toEqual({
      answer: "hi",
      citations: [],
      estimatedCost: 0,
      usage: null,
    });
  });

  it("should log the cost failure it absorbs", () => {
    const errorSpy = vi.fn();
    configureLogger({
      level: "error",
      custom: (level, message) => {
        if (level === "error") errorSpy(message);
      },
    });

    parseResponse(
      '{"choices":[{"message":{"content":"hi"}}],"usage":{"prompt_tokens":"x","completion_tokens":1}}',
      prices,
    );

    expect(errorSpy).toHaveBeenCalledWith(
      "[pplx-query:client] Error computing cost: invalid usage.prompt_tokens: x",
    );
  });

  it("should throw ResponseParseError for a body that is not JSON", () => {
    expect(() => parseResponse("<html>bad gateway</html>", prices)).toThrow(
      ResponseParseError,
    );
    expect(() => parseResponse("<html>bad gateway</html>", prices)).toThrow(
      "Response body is not valid JSON",
    );
  });

  it("should throw ResponseParseError when the answer path is missing", () => {
    for (const body of [
      "{}",
      '{"choices":[]}',
      '{"choices":[{}]}',
      '{"choices":[{"message":{}}]}',
      '{"choices":[{"message":{"content":42}}]}',
      '{"choices":"nope"}',
      "null",
      "[1,2]",
    ]) {
      expect(() => parseResponse(body, prices)).toThrow(
        "Response has no choices[0].message.content",
      );
    }
  });

  it("should log parse failures before throwing", () => {
    const errorSpy = vi.fn();
    configureLogger({
      level: "error",
      custom: (level, message) => {
        if (level === "error") errorSpy(message);
      },
    });

    expect(() => parseResponse("{}", prices)).toThrow(ResponseParseError);
    expect(errorSpy).toHaveBeenCalledWith(
      "[pplx-query:client] Error parsing Perplexity response: missing choices[0].message.content",
    );
  });
});
