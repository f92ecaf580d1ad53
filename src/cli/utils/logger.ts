// Console logger. Diagnostics go to stderr so stdout only carries rendered output.
import chalk from "chalk";

let verbose = false;

/** Enable or disable verbose logging. */
export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

/** Returns whether verbose mode is active. */
export function isVerbose(): boolean {
  return verbose;
}

export const logger = {
  debug(message: string): void {
    if (verbose) {
      console.error(chalk.gray(`[debug] ${message}`));
    }
  },

  info(message: string): void {
    console.log(message);
  },

  /** Plain stderr line, for status messages that are not warnings. */
  notice(message: string): void {
    console.error(message);
  },

  warn(message: string): void {
    console.error(chalk.yellow(`Warning: ${message}`));
  },

  error(message: string): void {
    console.error(chalk.red(`Error: ${message}`));
  },
};
