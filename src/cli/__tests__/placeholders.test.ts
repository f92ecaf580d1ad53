/**
 * Tests for placeholder parsing.
 */

import { describe, it, expect } from "@jest/globals";
import { parsePlaceholders, describePlaceholders } from "../engine/placeholders";

describe("parsePlaceholders", () => {
  it("returns an empty list for an empty template", () => {
    expect(parsePlaceholders("")).toEqual([]);
  });

  it("extracts required and defaulted placeholders in first-seen order", () => {
    const template = 'Role: {{role|default="assistant"}}\nTask: {{task}}';
    expect(parsePlaceholders(template)).toEqual([{ name: "role", default: "assistant" }, { name: "task" }]);
  });

  it("deduplicates repeated names", () => {
    expect(parsePlaceholders("{{a}} {{b}} {{a}}")).toEqual([{ name: "a" }, { name: "b" }]);
  });

  it("accepts whitespace inside the braces", () => {
    expect(parsePlaceholders('{{ role }} {{ tone | default = "calm" }}')).toEqual([
      { name: "role" },
      { name: "tone", default: "calm" },
    ]);
  });

  it("treats an empty default as a real default", () => {
    expect(parsePlaceholders('{{suffix|default=""}}')).toEqual([{ name: "suffix", default: "" }]);
  });

  it("ignores brace sequences that are not placeholders", () => {
    expect(parsePlaceholders("{{not a name}} {{dash-name}} {single} {{}} {{ok_1}}")).toEqual([{ name: "ok_1" }]);
  });

  it("keeps the first default when a name is declared with several", () => {
    const template = '{{tone|default="calm"}} {{tone|default="loud"}}';
    expect(parsePlaceholders(template)).toEqual([{ name: "tone", default: "calm" }]);
  });

  it("takes a later default when the first occurrence had none", () => {
    expect(parsePlaceholders('{{tone}} {{tone|default="calm"}}')).toEqual([{ name: "tone", default: "calm" }]);
  });
});

describe("describePlaceholders", () => {
  it("marks placeholders without a default as required", () => {
    const placeholders = parsePlaceholders('{{role|default="assistant"}} {{task}}');
    expect(describePlaceholders(placeholders)).toEqual([
      { name: "role", required: false, default: "assistant" },
      { name: "task", required: true },
    ]);
  });
});
