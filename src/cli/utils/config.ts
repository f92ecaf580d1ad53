// Environment-backed defaults for the CLI. Flags always take precedence.
import dotenv from "dotenv";
import { paths } from "./paths";
import { ForgeError } from "./errorHandler";

export const OUTPUT_FORMATS = ["text", "markdown", "json"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface ForgeConfig {
  /** History log used by a bare `--save`. */
  historyFile: string;
  /** Rules file used by `--simulate` when `--rules` is absent. */
  rulesFile?: string;
  format: OutputFormat;
  verbose: boolean;
}

/**
 * Narrows an arbitrary string to a known output format.
 */
export function isOutputFormat(value: string): value is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(value);
}

/**
 * Loads `.env` from the working directory into `process.env`.
 * Existing environment variables are not overwritten.
 */
export function loadEnvFile(): void {
  dotenv.config({ quiet: true });
}

/**
 * Builds the configuration from environment variables.
 *
 * @throws {ForgeError} InvalidConfig for an unknown PROMPT_FORGE_FORMAT
 */
export function readConfig(env: NodeJS.ProcessEnv = process.env): ForgeConfig {
  const format = env.PROMPT_FORGE_FORMAT?.trim().toLowerCase();
  if (format && !isOutputFormat(format)) {
    throw new ForgeError(
      "InvalidConfig",
      `Invalid PROMPT_FORGE_FORMAT "${env.PROMPT_FORGE_FORMAT}". Valid formats: ${OUTPUT_FORMATS.join(", ")}`,
      ["PROMPT_FORGE_FORMAT"],
    );
  }

  return {
    historyFile: env.PROMPT_FORGE_HISTORY || paths.defaultHistory(),
    rulesFile: env.PROMPT_FORGE_RULES || undefined,
    format: format && isOutputFormat(format) ? format : "text",
    verbose: env.PROMPT_FORGE_VERBOSE === "1",
  };
}
