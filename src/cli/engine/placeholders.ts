// Placeholder parsing for {{name}} and {{name|default="value"}} markers.

/**
 * A variable reference declared in a template.
 * `default` is absent when the variable is required; an empty string is a real default.
 */
export interface Placeholder {
  name: string;
  default?: string;
}

/**
 * Check-mode view of a placeholder.
 */
export interface PlaceholderDescription {
  name: string;
  required: boolean;
  default?: string;
}

/**
 * Source of the placeholder pattern. Group 1 is the name, group 2 the default literal.
 * Whitespace is allowed just inside the braces and around `|` and `=`.
 */
const PLACEHOLDER_SOURCE = String.raw`\{\{\s*([A-Za-z0-9_]+)\s*(?:\|\s*default\s*=\s*"([^"]*)"\s*)?\}\}`;

/**
 * Returns a fresh global regex for placeholder occurrences.
 * A new instance per call keeps `lastIndex` state local to the caller.
 */
export function placeholderPattern(): RegExp {
  return new RegExp(PLACEHOLDER_SOURCE, "g");
}

/**
 * Extracts distinct placeholders in first-seen order.
 *
 * When a name appears more than once, the first occurrence carrying a default
 * supplies it; later defaults for the same name are ignored.
 */
export function parsePlaceholders(template: string): Placeholder[] {
  const byName = new Map<string, Placeholder>();

  for (const match of template.matchAll(placeholderPattern())) {
    const name = match[1];
    const defaultValue: string | undefined = match[2];
    const existing = byName.get(name);

    if (!existing) {
      byName.set(name, defaultValue === undefined ? { name } : { name, default: defaultValue });
    } else if (existing.default === undefined && defaultValue !== undefined) {
      existing.default = defaultValue;
    }
  }

  return [...byName.values()];
}

/**
 * Describes placeholders for the `--check` listing.
 */
export function describePlaceholders(placeholders: readonly Placeholder[]): PlaceholderDescription[] {
  return placeholders.map((p) =>
    p.default === undefined
      ? { name: p.name, required: true }
      : { name: p.name, required: false, default: p.default },
  );
}
