// Error kinds and top-level error handling for the CLI.
import chalk from "chalk";
import { isVerbose, logger } from "./logger";

/** Exit codes for the CLI. */
export const ExitCode = {
  Success: 0,
  GeneralError: 1,
  UsageError: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export type ForgeErrorKind =
  | "MissingTemplate"
  | "TemplateNotFound"
  | "InvalidVariableSyntax"
  | "UnresolvedVariables"
  | "MalformedVariablesFile"
  | "MalformedRulesFile"
  | "InvalidRulePattern"
  | "ConflictingOptions"
  | "InvalidConfig";

/**
 * Fatal error raised anywhere in the forge pipeline.
 * `details` carries the offending value(s): a token, a file path, missing names.
 */
export class ForgeError extends Error {
  constructor(
    public readonly kind: ForgeErrorKind,
    message: string,
    public readonly details: readonly string[] = [],
    public readonly exitCode: ExitCode = ExitCode.GeneralError,
  ) {
    super(message);
    this.name = "ForgeError";
  }
}

/** Raised when placeholders remain without a value after every source ran. */
export class UnresolvedVariablesError extends ForgeError {
  constructor(public readonly missing: readonly string[]) {
    super("UnresolvedVariables", `Missing: ${missing.join(", ")}`, missing);
    this.name = "UnresolvedVariablesError";
  }
}

/** Handles errors at the top level and exits with the appropriate code. */
export function handleError(error: unknown): never {
  if (error instanceof ForgeError) {
    logger.error(error.message);
    if (isVerbose() && error.stack) {
      console.error(chalk.gray(error.stack));
    }
    process.exit(error.exitCode);
  }

  if (error instanceof Error) {
    if (isVerbose()) {
      console.error(chalk.red(error.stack ?? error.message));
    } else {
      logger.error(error.message);
    }
    process.exit(ExitCode.GeneralError);
  }

  logger.error(String(error));
  process.exit(ExitCode.GeneralError);
}
