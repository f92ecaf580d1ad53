// Rule set loading: compiles patterns up front so bad regexes fail before any output.
import { z } from "zod";
import { readJsonFile } from "../utils/fileOps";
import { ForgeError } from "../utils/errorHandler";
import { BUILTIN_RULES } from "./builtinRules";
import type { CompiledRule, RuleSet, SimulationRule } from "./types";

export const RulesFileSchema = z.object({
  rules: z.array(
    z.object({
      regex: z.string(),
      response: z.string(),
    }),
  ),
});

/**
 * Compiles every rule's pattern, case-insensitive.
 *
 * @param source - where the rules came from, used in error messages
 * @throws {ForgeError} InvalidRulePattern naming the first rule that fails
 */
export function compileRules(rules: readonly SimulationRule[], source: string): RuleSet {
  return rules.map((rule, index): CompiledRule => {
    try {
      return { regex: rule.regex, response: rule.response, pattern: new RegExp(rule.regex, "i") };
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ForgeError(
        "InvalidRulePattern",
        `Invalid regex in rule ${index + 1} of ${source}: ${rule.regex} (${reason})`,
        [source, rule.regex],
      );
    }
  });
}

/**
 * The six built-in rules, compiled.
 */
export function builtinRuleSet(): RuleSet {
  return compileRules(BUILTIN_RULES, "built-in rules");
}

/**
 * Loads a rules file. Its rules replace the built-in set entirely.
 *
 * @throws {ForgeError} MalformedRulesFile when the file is unreadable or the wrong shape
 * @throws {ForgeError} InvalidRulePattern when a pattern does not compile
 */
export async function loadRules(filePath: string): Promise<RuleSet> {
  const read = await readJsonFile(filePath);
  if (!read.ok) {
    throw new ForgeError("MalformedRulesFile", `Cannot read rules file ${filePath}: ${read.message}`, [filePath]);
  }

  const parsed = RulesFileSchema.safeParse(read.data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "/"}: ${issue.message}`)
      .join("; ");
    throw new ForgeError("MalformedRulesFile", `Invalid rules file ${filePath}: ${issues}`, [filePath]);
  }

  return compileRules(parsed.data.rules, filePath);
}
