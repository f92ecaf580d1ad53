// Path helpers for the CLI.
import path from "path";
import { homedir } from "os";

/** File name of the history log kept in the home directory. */
export const HISTORY_FILE_NAME = ".prompt-forge.log";

/**
 * Expands a leading `~` to the user's home directory and resolves the result
 * against the working directory.
 */
export function expandHome(filePath: string, home: string = homedir()): string {
  if (filePath === "~") {
    return home;
  }
  if (filePath.startsWith("~/") || filePath.startsWith("~\\")) {
    return path.join(home, filePath.slice(2));
  }
  return path.resolve(filePath);
}

/**
 * Path builders for common locations.
 */
export const paths = {
  defaultHistory: (home: string = homedir()) => path.join(home, HISTORY_FILE_NAME),
};
