// History log - appends each forged prompt (and simulated response) to a flat file
import { appendFileSafe } from "./fileOps";
import { expandHome } from "./paths";
import { formatTimestamp } from "../output/formatter";

export interface HistoryEntry {
  prompt: string;
  response?: string;
  now: Date;
}

/**
 * Formats one history entry.
 */
export function formatHistoryEntry(entry: HistoryEntry): string {
  const lines = [
    "",
    `=== ${formatTimestamp(entry.now)} ===`,
    "Prompt:",
    entry.prompt,
    "",
  ];
  if (entry.response !== undefined) {
    lines.push("Response:", entry.response, "");
  }
  lines.push("---", "");
  return lines.join("\n");
}

/**
 * Appends an entry to the history log and returns the resolved path written to.
 * Write failures propagate to the caller.
 */
export async function saveToHistory(filePath: string, entry: HistoryEntry): Promise<string> {
  const target = expandHome(filePath);
  await appendFileSafe(target, formatHistoryEntry(entry));
  return target;
}
