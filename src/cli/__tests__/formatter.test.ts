/**
 * Tests for output formatting and token estimates.
 */

import { describe, it, expect } from "@jest/globals";
import { formatOutput, formatCheck, formatDryRun, formatTimestamp } from "../output/formatter";
import { estimateTokens } from "../utils/tokens";

// Local time so formatTimestamp output is the same in every timezone
const NOW = new Date(2025, 2, 7, 9, 5, 3);

describe("estimateTokens", () => {
  it("multiplies the word count by 1.3 and rounds down", () => {
    expect(estimateTokens("one two three four five six seven eight nine ten")).toBe(13);
    expect(estimateTokens("You are a expert.")).toBe(5);
  });

  it("ignores surrounding and repeated whitespace", () => {
    expect(estimateTokens("  a \n\n b\t c  ")).toBe(3);
  });

  it("returns zero for blank text", () => {
    expect(estimateTokens("   ")).toBe(0);
  });
});

describe("formatTimestamp", () => {
  it("pads every field", () => {
    expect(formatTimestamp(NOW)).toBe("2025-03-07 09:05:03");
  });
});

describe("formatOutput", () => {
  it("prints only the prompt in text format by default", () => {
    expect(formatOutput({ prompt: "Hello", showTokens: false, now: NOW }, "text")).toBe("Hello");
  });

  it("appends tokens and the response in text format", () => {
    const out = formatOutput({ prompt: "one two", response: "Reply", showTokens: true, now: NOW }, "text");
    expect(out).toBe("one two\n\n[Tokens: 2]\n\n---\nReply");
  });

  it("renders markdown with metadata and response sections", () => {
    const out = formatOutput({ prompt: "one two", response: "Reply", showTokens: true, now: NOW }, "markdown");
    expect(out).toBe(
      "# Prompt\n\none two\n\n## Metadata\n- Tokens: 2\n- Timestamp: 2025-03-07 09:05:03\n\n# Simulated Response\n\nReply",
    );
  });

  it("renders markdown without optional sections", () => {
    expect(formatOutput({ prompt: "p", showTokens: false, now: NOW }, "markdown")).toBe("# Prompt\n\np");
  });

  it("renders JSON with optional fields only when present", () => {
    const plain = JSON.parse(formatOutput({ prompt: "p", showTokens: false, now: NOW }, "json"));
    expect(plain).toEqual({ prompt: "p", timestamp: NOW.toISOString() });

    const full = JSON.parse(formatOutput({ prompt: "a b c", response: "r", showTokens: true, now: NOW }, "json"));
    expect(full).toEqual({ prompt: "a b c", timestamp: NOW.toISOString(), tokens: 3, response: "r" });
  });

  it("keeps a zero token estimate in JSON", () => {
    const out = JSON.parse(formatOutput({ prompt: "", showTokens: true, now: NOW }, "json"));
    expect(out.tokens).toBe(0);
  });
});

describe("formatCheck", () => {
  it("lists required and defaulted variables", () => {
    const out = formatCheck(
      [
        { name: "role", required: false, default: "assistant" },
        { name: "task", required: true },
      ],
      "text",
    );
    expect(out).toBe('Template variables:\n  - role (default: "assistant")\n  - task (required)');
  });

  it("says so when there are no variables", () => {
    expect(formatCheck([], "markdown")).toBe("No template variables found.");
  });

  it("emits JSON when asked", () => {
    const descriptions = [{ name: "task", required: true }];
    expect(JSON.parse(formatCheck(descriptions, "json"))).toEqual(descriptions);
  });
});

describe("formatDryRun", () => {
  it("prefixes the preview header", () => {
    expect(formatDryRun("Hi")).toBe("=== DRY RUN ===\nHi");
  });
});
