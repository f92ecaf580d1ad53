// Variable sources consulted by the resolver, highest priority first.
import type { Placeholder } from "./placeholders";

export type VariableSourceName = "cli" | "file" | "default" | "interactive";

/**
 * A synchronous source that may supply a value for a placeholder.
 */
export interface VariableSource {
  readonly name: Exclude<VariableSourceName, "interactive">;
  lookup(placeholder: Placeholder): string | undefined;
}

/**
 * Asks the user for values of the placeholders no other source supplied.
 * Returned names that were not asked for are ignored.
 */
export type InteractivePrompter = (missing: readonly Placeholder[]) => Promise<Record<string, string>>;

function fromMapping(
  name: "cli" | "file",
  values: Readonly<Record<string, string>>,
): VariableSource {
  return {
    name,
    lookup: (placeholder) =>
      Object.prototype.hasOwnProperty.call(values, placeholder.name) ? values[placeholder.name] : undefined,
  };
}

/** Values given as `--var KEY=VALUE`. */
export function cliSource(values: Readonly<Record<string, string>>): VariableSource {
  return fromMapping("cli", values);
}

/** Values loaded from a `--vars` JSON file. */
export function fileSource(values: Readonly<Record<string, string>>): VariableSource {
  return fromMapping("file", values);
}

/** Defaults declared in the template itself. */
export const defaultSource: VariableSource = {
  name: "default",
  lookup: (placeholder) => placeholder.default,
};

/**
 * Terminal prompter backed by @inquirer/prompts.
 * Answers are trimmed; an empty answer is kept as the empty string.
 */
export const terminalPrompter: InteractivePrompter = async (missing) => {
  // Lazy import keeps the prompt library out of non-interactive runs
  const { input } = await import("@inquirer/prompts");
  const answers = new Map<string, string>();
  for (const placeholder of missing) {
    const answer = await input({ message: `Enter '${placeholder.name}':` });
    answers.set(placeholder.name, answer.trim());
  }
  return Object.fromEntries(answers);
};
