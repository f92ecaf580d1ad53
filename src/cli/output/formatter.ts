// Output formatting for rendered prompts, simulated responses and the --check listing.
import type { OutputFormat } from "../utils/config";
import type { PlaceholderDescription } from "../engine/placeholders";
import { estimateTokens } from "../utils/tokens";

export interface RenderedOutput {
  prompt: string;
  /** Present when --simulate was requested. */
  response?: string;
  showTokens: boolean;
  now: Date;
}

/**
 * Formats a date as `YYYY-MM-DD HH:MM:SS` in local time.
 */
export function formatTimestamp(d: Date): string {
  const pad = (n: number) => n.toString().padStart(2, "0");
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
  );
}

function formatText(output: RenderedOutput, tokens: number | undefined): string {
  const parts = [output.prompt];
  if (tokens !== undefined) {
    parts.push(`\n[Tokens: ${tokens}]`);
  }
  if (output.response !== undefined) {
    parts.push(`\n---\n${output.response}`);
  }
  return parts.join("\n");
}

function formatMarkdown(output: RenderedOutput, tokens: number | undefined): string {
  const parts = [`# Prompt\n\n${output.prompt}`];
  if (tokens !== undefined) {
    parts.push(`\n## Metadata\n- Tokens: ${tokens}\n- Timestamp: ${formatTimestamp(output.now)}`);
  }
  if (output.response !== undefined) {
    parts.push(`\n# Simulated Response\n\n${output.response}`);
  }
  return parts.join("\n");
}

function formatJson(output: RenderedOutput, tokens: number | undefined): string {
  const payload: { prompt: string; timestamp: string; tokens?: number; response?: string } = {
    prompt: output.prompt,
    timestamp: output.now.toISOString(),
  };
  if (tokens !== undefined) {
    payload.tokens = tokens;
  }
  if (output.response !== undefined) {
    payload.response = output.response;
  }
  return JSON.stringify(payload, null, 2);
}

/**
 * Formats the rendered prompt (and optional response and token estimate).
 */
export function formatOutput(output: RenderedOutput, format: OutputFormat): string {
  const tokens = output.showTokens ? estimateTokens(output.prompt) : undefined;
  switch (format) {
    case "json":
      return formatJson(output, tokens);
    case "markdown":
      return formatMarkdown(output, tokens);
    case "text":
      return formatText(output, tokens);
  }
}

/**
 * Formats the `--check` listing of template variables.
 */
export function formatCheck(descriptions: readonly PlaceholderDescription[], format: OutputFormat): string {
  if (format === "json") {
    return JSON.stringify(descriptions, null, 2);
  }
  if (descriptions.length === 0) {
    return "No template variables found.";
  }
  const lines = descriptions.map((d) =>
    d.required ? `  - ${d.name} (required)` : `  - ${d.name} (default: "${d.default ?? ""}")`,
  );
  return ["Template variables:", ...lines].join("\n");
}

/**
 * Formats the `--dry-run` preview.
 */
export function formatDryRun(prompt: string): string {
  return `=== DRY RUN ===\n${prompt}`;
}
