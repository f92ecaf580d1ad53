/**
 * Tests for the response simulation rule engine.
 */

import { describe, it, expect } from "@jest/globals";
import {
  simulateResponse,
  findMatchingRule,
  responseText,
  builtinRuleSet,
  compileRules,
  BUILTIN_RULES,
  NO_MATCH_RESPONSE,
} from "../../simulate";

describe("ruleEngine", () => {
  const builtin = builtinRuleSet();

  it("has six built-in rules ending with a catch-all", () => {
    expect(BUILTIN_RULES).toHaveLength(6);
    expect(BUILTIN_RULES[5].regex).toBe(".*");
  });

  it("matches a code prompt to the code rule", () => {
    const result = simulateResponse("write a python function", builtin, {});
    expect(result).toMatchObject({ matched: true, index: 0 });
    expect(responseText(result)).toBe(
      "Here's a code implementation:\n\n```\n# Implementation\n```\n\nThis demonstrates the functionality.",
    );
  });

  it("matches case-insensitively anywhere in the prompt", () => {
    expect(findMatchingRule("Please EXPLAIN recursion", builtin)).toBe(1);
    expect(findMatchingRule("Give me the steps", builtin)).toBe(2);
    expect(findMatchingRule("there is an Error here", builtin)).toBe(3);
    expect(findMatchingRule("Review my essay", builtin)).toBe(4);
  });

  it("falls through to the catch-all", () => {
    const result = simulateResponse("hello there", builtin, {});
    expect(result).toMatchObject({ matched: true, index: 5 });
    expect(responseText(result)).toBe("I understand. Here's a response addressing your needs.");
  });

  it("picks the first rule in list order when several match", () => {
    // "explain" and "code" both match; the code rule comes first
    expect(findMatchingRule("explain this code", builtin)).toBe(0);

    const reordered = compileRules(
      [
        { regex: "explain", response: "E" },
        { regex: "code", response: "C" },
      ],
      "test",
    );
    expect(responseText(simulateResponse("explain this code", reordered, {}))).toBe("E");
  });

  it("renders the matched response with the prompt variables", () => {
    const rules = compileRules(
      [{ regex: "review", response: 'As a {{role}}, reviewing {{topic|default="x"}}. {{other}}' }],
      "test",
    );
    const result = simulateResponse("please review", rules, { role: "critic", topic: "the draft" });
    expect(responseText(result)).toBe("As a critic, reviewing the draft. {{other}}");
  });

  it("reports no match when no rule applies", () => {
    const rules = compileRules([{ regex: "^only this$", response: "x" }], "test");
    const result = simulateResponse("something else", rules, {});
    expect(result).toEqual({ matched: false });
    expect(responseText(result)).toBe(NO_MATCH_RESPONSE);
  });

  it("reports no match for an empty rule set", () => {
    expect(simulateResponse("anything", [], {})).toEqual({ matched: false });
  });
});
