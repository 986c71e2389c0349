/**
 * Tests for request building
 */

import { describe, it, expect } from "vitest";
import { buildQuery, buildAuthHeaders } from "../query/messages.js";
import type { ConversationHistory } from "../types.js";

describe("buildQuery", () => {
  it("should place the question first as a user message", () => {
    const messages = buildQuery("What is a tokamak?", []);

    expect(messages).toEqual([{ role: "user", content: "What is a tokamak?" }]);
  });

  it("should default to an empty history", () => {
    expect(buildQuery("hello")).toEqual([{ role: "user", content: "hello" }]);
  });

  it("should append history entries in their original order", () => {
    const history: ConversationHistory = [
      { role: "system", content: "Be brief." },
      { role: "user", content: "first" },
      { role: "assistant", content: "second" },
    ];

    expect(buildQuery("third", history)).toEqual([
      { role: "user", content: "third" },
      { role: "system", content: "Be brief." },
      { role: "user", content: "first" },
      { role: "assistant", content: "second" },
    ]);
  });

  it("should drop entries missing role or content", () => {
    const history: ConversationHistory = [
      { role: "user" },
      { content: "orphan" },
      {},
      { role: "assistant", content: "kept" },
    ];

    const messages = buildQuery("q", history);

    expect(messages).toHaveLength(2);
    expect(messages[1]).toEqual({ role: "assistant", content: "kept" });
  });

  it("should drop entries whose fields are not strings", () => {
    const history: unknown[] = JSON.parse(
      '[{"role": 1, "content": "x"}, {"role": "user", "content": null}, null, "text", {"role": "user", "content": "ok"}]',
    );

    expect(buildQuery("q", history)).toEqual([
      { role: "user", content: "q" },
      { role: "user", content: "ok" },
    ]);
  });

  it("should copy only role and content", () => {
    const history = [{ role: "user", content: "hi", name: "extra" }];

    expect(buildQuery("q", history)[1]).toEqual({ role: "user", content: "hi" });
  });

  it("should not mutate the caller's history", () => {
    const entry = { role: "user", content: "before" };
    const history = [entry];

    const messages = buildQuery("q", history);
    messages[1].content = "after";

    expect(history).toEqual([{ role: "user", content: "before" }]);
    expect(messages[1]).not.toBe(entry);
  });

  it("should preserve every well-formed pair when read back", () => {
    const history: ConversationHistory = [
      { role: "user", content: "a" },
      { role: "assistant", content: "b" },
      { role: "user" },
      { role: "assistant", content: "c" },
    ];

    const roundTripped = buildQuery("q", history).slice(1);

    expect(roundTripped).toEqual([
      { role: "user", content: "a" },
      { role: "assistant", content: "b" },
      { role: "assistant", content: "c" },
    ]);
  });
});

describe("buildAuthHeaders", () => {
  it("should return exactly the bearer and content-type headers", () => {
    expect(buildAuthHeaders("test-key")).toEqual({
      Authorization: "Bearer test-key",
      "Content-Type": "application/json",
    });
  });
});
