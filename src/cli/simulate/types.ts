// Simulation rule types

/**
 * A rule as written in a rules file or the built-in set.
 * `response` is itself a template rendered with the prompt's variables.
 */
export interface SimulationRule {
  regex: string;
  response: string;
}

/**
 * A rule whose pattern has been compiled (case-insensitive, unanchored).
 */
export interface CompiledRule extends SimulationRule {
  pattern: RegExp;
}

/**
 * Ordered rule set. Evaluated front to back; the first match wins.
 */
export type RuleSet = readonly CompiledRule[];

/**
 * Outcome of matching a prompt against a rule set.
 */
export type SimulationResult =
  | {
      matched: true;
      /** Position of the matched rule in the rule set. */
      index: number;
      rule: CompiledRule;
      /** The rule's response rendered with the variable mapping. */
      response: string;
    }
  | { matched: false };
