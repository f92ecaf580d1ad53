// Variable resolution: merges CLI, file, default and interactive values per placeholder.
import type { Placeholder } from "./placeholders";
import type { VariableMapping } from "../utils/templates";
import { UnresolvedVariablesError } from "../utils/errorHandler";
import {
  cliSource,
  fileSource,
  defaultSource,
  type InteractivePrompter,
  type VariableSource,
  type VariableSourceName,
} from "./sources";

export interface ResolveOptions {
  /** Values from `--var`, already parsed. */
  cliValues?: Readonly<Record<string, string>>;
  /** Values from the `--vars` file, already stringified. */
  fileValues?: Readonly<Record<string, string>>;
  /** Consulted only for names no other source supplied. */
  prompter?: InteractivePrompter;
}

export interface Resolution {
  values: VariableMapping;
  /** Which source supplied each name. */
  provenance: Readonly<Record<string, VariableSourceName>>;
  /** Supplied names (CLI and file) that no placeholder declares, sorted. */
  unused: string[];
}

/**
 * Builds the ordered source list. Order is priority: the first source with a value wins.
 */
export function buildSources(options: ResolveOptions): VariableSource[] {
  return [cliSource(options.cliValues ?? {}), fileSource(options.fileValues ?? {}), defaultSource];
}

/**
 * Resolves every placeholder to a value.
 *
 * @throws {UnresolvedVariablesError} listing every name still missing, sorted
 */
export async function resolveVariables(
  placeholders: readonly Placeholder[],
  options: ResolveOptions = {},
): Promise<Resolution> {
  const sources = buildSources(options);
  const values = new Map<string, string>();
  const provenance = new Map<string, VariableSourceName>();
  const pending: Placeholder[] = [];

  for (const placeholder of placeholders) {
    let resolved = false;
    for (const source of sources) {
      const value = source.lookup(placeholder);
      if (value !== undefined) {
        values.set(placeholder.name, value);
        provenance.set(placeholder.name, source.name);
        resolved = true;
        break;
      }
    }
    if (!resolved) {
      pending.push(placeholder);
    }
  }

  if (pending.length > 0 && options.prompter) {
    const answers = await options.prompter(pending);
    for (const placeholder of pending) {
      if (Object.prototype.hasOwnProperty.call(answers, placeholder.name)) {
        values.set(placeholder.name, answers[placeholder.name]);
        provenance.set(placeholder.name, "interactive");
      }
    }
  }

  const missing = placeholders
    .map((p) => p.name)
    .filter((name) => !values.has(name))
    .sort();
  if (missing.length > 0) {
    throw new UnresolvedVariablesError(missing);
  }

  return {
    // fromEntries defines own properties, so names like __proto__ survive
    values: Object.freeze(Object.fromEntries(values)),
    provenance: Object.freeze(Object.fromEntries(provenance)),
    unused: findUnusedVariables(placeholders, options),
  };
}

/**
 * Names supplied through CLI or file that the template never declares.
 */
export function findUnusedVariables(placeholders: readonly Placeholder[], options: ResolveOptions): string[] {
  const declared = new Set(placeholders.map((p) => p.name));
  const supplied = new Set([...Object.keys(options.cliValues ?? {}), ...Object.keys(options.fileValues ?? {})]);
  return [...supplied].filter((name) => !declared.has(name)).sort();
}
