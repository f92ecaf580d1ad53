// ASCII banner utility for the help screen
import figlet from "figlet";

// Below this width the short banner is used
const FULL_BANNER_MIN_WIDTH = 70;

const TAGLINE = "Craft and test AI prompts locally";

/**
 * Gets the banner text sized to the terminal width.
 */
export function getBanner(terminalWidth: number = process.stdout.columns || 100): string {
  if (terminalWidth >= FULL_BANNER_MIN_WIDTH) {
    return figlet.textSync("Prompt Forge", { font: "Small Slant" });
  }
  return figlet.textSync("PF", { font: "Slant" });
}

/**
 * Checks if banner should be displayed based on environment
 * Returns false in CI, non-TTY, or when --no-banner flag is present
 */
export function shouldShowBanner(args: string[]): boolean {
  if (process.env.CI) {
    return false;
  }

  // Piped or redirected output
  if (!process.stdout.isTTY) {
    return false;
  }

  return !args.includes("--no-banner");
}

/**
 * Banner and centered tagline for the help screen, or an empty string when
 * the banner is suppressed.
 */
export function helpBanner(args: string[]): string {
  if (!shouldShowBanner(args)) {
    return "";
  }

  const banner = getBanner();
  const width = Math.max(...banner.split("\n").map((l) => l.length));
  const padding = Math.max(0, Math.floor((width - TAGLINE.length) / 2));

  return `${banner}\n${" ".repeat(padding)}${TAGLINE}\n`;
}
