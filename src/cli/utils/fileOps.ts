// Safe file operations utilities.
import { promises as fs } from "fs";
import path from "path";

/**
 * Reads a file, returning null if it doesn't exist or can't be read.
 */
export async function readFileSafe(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch {
    return null;
  }
}

/**
 * Result of reading and parsing a JSON file.
 * Distinguishes a missing file from malformed content so callers can report both.
 */
export type JsonReadResult =
  | { ok: true; data: unknown }
  | { ok: false; reason: "missing" | "invalid"; message: string };

/**
 * Reads and parses a JSON file without throwing.
 */
export async function readJsonFile(filePath: string): Promise<JsonReadResult> {
  const content = await readFileSafe(filePath);
  if (content === null) {
    return { ok: false, reason: "missing", message: "file not found or unreadable" };
  }
  try {
    return { ok: true, data: JSON.parse(content) };
  } catch (err) {
    return { ok: false, reason: "invalid", message: err instanceof Error ? err.message : String(err) };
  }
}

/**
 * Appends to a file, creating parent directories if needed.
 */
export async function appendFileSafe(filePath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.appendFile(filePath, content, "utf-8");
}

/**
 * Minimal view of an input stream: what `process.stdin` offers and a test can fake.
 */
export interface TextInput extends AsyncIterable<string | Buffer> {
  isTTY?: boolean;
}

/**
 * Reads an input stream to the end as UTF-8 text.
 */
export async function readAll(input: AsyncIterable<string | Buffer>): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of input) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : chunk);
  }
  return Buffer.concat(chunks).toString("utf-8");
}
