#!/usr/bin/env node
// CLI entrypoint for prompt-forge.
import { Command, Option } from "commander";
import { runForge, type ForgeOptions } from "./commands/forge";
import { helpBanner } from "./theme/banner";
import { handleError } from "./utils/errorHandler";
import { setVerbose } from "./utils/logger";
import { loadEnvFile, readConfig, OUTPUT_FORMATS, type OutputFormat } from "./utils/config";

export const VERSION = "1.0.0";

interface CliOptions {
  var: string[];
  vars?: string;
  interactive?: boolean;
  template?: string;
  simulate?: boolean;
  rules?: string;
  format?: OutputFormat;
  showTokens?: boolean;
  save?: string | boolean;
  check?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Maps parsed command-line options onto the forge command's options.
 */
export function toForgeOptions(templateFile: string | undefined, opts: CliOptions): ForgeOptions {
  return {
    templateFile,
    inlineTemplate: opts.template,
    vars: opts.var,
    varsFile: opts.vars,
    interactive: !!opts.interactive,
    simulate: !!opts.simulate,
    rulesFile: opts.rules,
    format: opts.format,
    showTokens: !!opts.showTokens,
    save: opts.save,
    check: !!opts.check,
    dryRun: !!opts.dryRun,
  };
}

/**
 * Builds the command-line program. The action is passed in so tests can capture options.
 */
export function buildProgram(
  action: (options: ForgeOptions, verbose: boolean) => Promise<void>,
): Command {
  const program = new Command();

  program
    .name("prompt-forge")
    .description("Craft and test AI prompts locally")
    .version(`prompt-forge v${VERSION}`, "--version", "Show version number")
    .argument("[template]", "Template file (or stdin)")
    .option("--var <pair>", "Variable as KEY=VALUE (repeatable)", collect, [])
    .option("--vars <file>", "JSON file of variables")
    .option("-i, --interactive", "Prompt for missing variables")
    .option("--template <text>", "Inline template")
    .option("--simulate", "Simulate a response")
    .option("--rules <file>", "Custom simulation rules (replaces the built-in rules)")
    .addOption(new Option("--format <format>", "Output format").choices(OUTPUT_FORMATS))
    .option("--show-tokens", "Show a token estimate")
    .option("--save [file]", "Append to the history log")
    .option("--check", "List template variables")
    .option("--dry-run", "Preview the rendered prompt")
    .option("--verbose", "Print debug output to stderr")
    .option("--no-banner", "Suppress ASCII banner on the help screen")
    .addHelpText("beforeAll", () => helpBanner(process.argv))
    .action(async (templateFile: string | undefined, opts: CliOptions) => {
      await action(toForgeOptions(templateFile, opts), !!opts.verbose);
    });

  return program;
}

/**
 * The real forge action. Configuration is read only once a command runs,
 * so `--help` and `--version` work whatever the environment holds.
 */
export function forgeAction(
  env: NodeJS.ProcessEnv = process.env,
): (options: ForgeOptions, verbose: boolean) => Promise<void> {
  return async (options, verbose) => {
    const config = readConfig(env);
    setVerbose(verbose || config.verbose);
    await runForge(options, { config });
  };
}

async function main(): Promise<void> {
  loadEnvFile();
  await buildProgram(forgeAction()).parseAsync();
}

// Run CLI (only when this file is executed directly)
if (require.main === module) {
  main().catch(handleError);
}
