// Command handler for rendering a prompt template.
import { parsePlaceholders, describePlaceholders } from "../engine/placeholders";
import { resolveVariables } from "../engine/resolver";
import { terminalPrompter, type InteractivePrompter } from "../engine/sources";
import { parseVarPairs, loadVariablesFile } from "../engine/inputs";
import { loadTemplate, renderTemplate } from "../utils/templates";
import { readAll, type TextInput } from "../utils/fileOps";
import { ForgeError, ExitCode } from "../utils/errorHandler";
import { logger } from "../utils/logger";
import { readConfig, type ForgeConfig, type OutputFormat } from "../utils/config";
import { saveToHistory } from "../utils/history";
import { formatCheck, formatDryRun, formatOutput } from "../output/formatter";
import { builtinRuleSet, loadRules, simulateResponse, responseText, type RuleSet } from "../simulate";

/**
 * Options for the forge command, as parsed from the command line.
 */
export interface ForgeOptions {
  /** Positional template file. */
  templateFile?: string;
  /** `--template <text>`. */
  inlineTemplate?: string;
  /** Raw `--var KEY=VALUE` tokens. */
  vars?: string[];
  /** `--vars <file>`. */
  varsFile?: string;
  interactive?: boolean;
  simulate?: boolean;
  /** `--rules <file>`; replaces the built-in rules. */
  rulesFile?: string;
  format?: OutputFormat;
  showTokens?: boolean;
  /** `--save` alone is `true` (default history file); `--save <file>` is the path. */
  save?: string | boolean;
  check?: boolean;
  dryRun?: boolean;
}

/**
 * Collaborators that tests replace.
 */
export interface ForgeDeps {
  stdin?: TextInput;
  prompter?: InteractivePrompter;
  now?: () => Date;
  config?: ForgeConfig;
}

/**
 * Rejects option combinations that make no sense together.
 */
export function validateOptions(options: ForgeOptions): void {
  if (options.templateFile !== undefined && options.inlineTemplate !== undefined) {
    throw new ForgeError(
      "ConflictingOptions",
      "Cannot specify both a template file and --template",
      [],
      ExitCode.UsageError,
    );
  }
  if (options.check && (options.simulate || isSaveRequested(options.save))) {
    throw new ForgeError(
      "ConflictingOptions",
      "Cannot combine --check with --simulate or --save",
      [],
      ExitCode.UsageError,
    );
  }
}

function isSaveRequested(save: ForgeOptions["save"]): boolean {
  return save !== undefined && save !== false;
}

/**
 * Obtains the template text from --template, a file, or piped stdin, in that order.
 *
 * @throws {ForgeError} MissingTemplate when no source is available
 */
export async function readTemplateSource(options: ForgeOptions, stdin: TextInput): Promise<string> {
  if (options.inlineTemplate !== undefined) {
    logger.debug("Template source: --template");
    return options.inlineTemplate;
  }
  if (options.templateFile !== undefined) {
    logger.debug(`Template source: ${options.templateFile}`);
    return loadTemplate(options.templateFile);
  }
  if (stdin.isTTY) {
    throw new ForgeError("MissingTemplate", "No template (use file, --template, or stdin)");
  }
  logger.debug("Template source: stdin");
  return readAll(stdin);
}

async function selectRules(options: ForgeOptions, config: ForgeConfig): Promise<RuleSet> {
  const rulesFile = options.rulesFile ?? config.rulesFile;
  if (rulesFile) {
    logger.debug(`Loading rules from ${rulesFile}`);
    return loadRules(rulesFile);
  }
  return builtinRuleSet();
}

/**
 * Renders a template and, depending on options, lists its variables, previews it,
 * simulates a response, and appends it to the history log.
 *
 * Every fatal error is raised before anything is written to stdout.
 */
export async function runForge(options: ForgeOptions, deps: ForgeDeps = {}): Promise<void> {
  const config = deps.config ?? readConfig();
  const now = deps.now ?? (() => new Date());
  const format = options.format ?? config.format;

  validateOptions(options);

  const template = await readTemplateSource(options, deps.stdin ?? process.stdin);
  const placeholders = parsePlaceholders(template);

  if (options.check) {
    logger.info(formatCheck(describePlaceholders(placeholders), format));
    return;
  }

  const cliValues = parseVarPairs(options.vars ?? []);
  const fileValues = options.varsFile ? await loadVariablesFile(options.varsFile) : undefined;
  if (!options.simulate && options.rulesFile) {
    logger.debug("--rules has no effect without --simulate");
  }

  const resolution = await resolveVariables(placeholders, {
    cliValues,
    fileValues,
    prompter: options.interactive ? deps.prompter ?? terminalPrompter : undefined,
  });
  for (const [name, source] of Object.entries(resolution.provenance)) {
    logger.debug(`${name} <- ${source}`);
  }
  if (resolution.unused.length > 0) {
    logger.warn(`Unused: ${resolution.unused.join(", ")}`);
  }

  const prompt = renderTemplate(template, resolution.values);

  if (options.dryRun) {
    logger.info(formatDryRun(prompt));
    return;
  }

  let response: string | undefined;
  if (options.simulate) {
    const rules = await selectRules(options, config);
    const result = simulateResponse(prompt, rules, resolution.values);
    logger.debug(result.matched ? `Matched rule ${result.index + 1}: ${result.rule.regex}` : "No rule matched");
    response = responseText(result);
  }

  const timestamp = now();
  logger.info(formatOutput({ prompt, response, showTokens: !!options.showTokens, now: timestamp }, format));

  if (isSaveRequested(options.save)) {
    const target = typeof options.save === "string" ? options.save : config.historyFile;
    const written = await saveToHistory(target, { prompt, response, now: timestamp });
    logger.notice(`Saved to ${written}`);
  }
}
