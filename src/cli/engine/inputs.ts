// Variable inputs: --var KEY=VALUE pairs and the --vars JSON file.
import { z } from "zod";
import { readJsonFile } from "../utils/fileOps";
import { ForgeError } from "../utils/errorHandler";

const ScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

/**
 * Top-level JSON object whose values are scalars, as `[name, value]` entries.
 * Validated as entries because a record schema drops a `__proto__` key.
 */
export const VariablesFileSchema = z
  .custom<object>((value) => typeof value === "object" && value !== null && !Array.isArray(value))
  .transform((value) => Object.entries(value))
  .pipe(z.array(z.tuple([z.string(), ScalarSchema])));

/**
 * Renders a JSON scalar to the string used for substitution.
 */
function scalarToString(value: z.infer<typeof ScalarSchema>): string {
  return typeof value === "string" ? value : String(value);
}

/**
 * Parses `KEY=VALUE` tokens. The value is everything after the first `=`.
 * Later tokens for the same key override earlier ones.
 *
 * @throws {ForgeError} InvalidVariableSyntax with the offending token
 */
export function parseVarPairs(pairs: readonly string[]): Record<string, string> {
  const values = new Map<string, string>();
  for (const pair of pairs) {
    const separator = pair.indexOf("=");
    if (separator <= 0) {
      throw new ForgeError("InvalidVariableSyntax", `Invalid --var: ${pair} (use KEY=VALUE)`, [pair]);
    }
    values.set(pair.slice(0, separator), pair.slice(separator + 1));
  }
  return Object.fromEntries(values);
}

/**
 * Loads a variables file and stringifies its values.
 *
 * @throws {ForgeError} MalformedVariablesFile with the file path
 */
export async function loadVariablesFile(filePath: string): Promise<Record<string, string>> {
  const read = await readJsonFile(filePath);
  if (!read.ok) {
    throw new ForgeError(
      "MalformedVariablesFile",
      `Cannot read variables file ${filePath}: ${read.message}`,
      [filePath],
    );
  }

  const parsed = VariablesFileSchema.safeParse(read.data);
  if (!parsed.success) {
    throw new ForgeError(
      "MalformedVariablesFile",
      `Variables file ${filePath} must be a JSON object of string, number, boolean or null values`,
      [filePath],
    );
  }

  return Object.fromEntries(parsed.data.map(([key, value]): [string, string] => [key, scalarToString(value)]));
}
