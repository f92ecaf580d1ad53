// Deterministic response simulation
// Scans rules in order and renders the first match's response

import type { RuleSet, SimulationResult } from "./types";
import { renderTemplate, type VariableMapping } from "../utils/templates";

export const NO_MATCH_RESPONSE = "No matching response.";

/**
 * Returns the index of the first rule whose pattern occurs anywhere in the prompt, or -1.
 */
export function findMatchingRule(prompt: string, rules: RuleSet): number {
  return rules.findIndex((rule) => rule.pattern.test(prompt));
}

/**
 * Simulates a model response for a rendered prompt.
 * The matched rule's response is rendered with the same variables as the prompt.
 */
export function simulateResponse(prompt: string, rules: RuleSet, values: VariableMapping): SimulationResult {
  const index = findMatchingRule(prompt, rules);
  if (index < 0) {
    return { matched: false };
  }

  const rule = rules[index];
  return {
    matched: true,
    index,
    rule,
    response: renderTemplate(rule.response, values),
  };
}

/**
 * Response text for a simulation result, with the fallback line when nothing matched.
 */
export function responseText(result: SimulationResult): string {
  return result.matched ? result.response : NO_MATCH_RESPONSE;
}
