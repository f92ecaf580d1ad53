// Template rendering utilities.
import { readFileSafe } from "./fileOps";
import { ForgeError } from "./errorHandler";
import { placeholderPattern } from "../engine/placeholders";

/**
 * Name to value mapping used for substitution.
 */
export type VariableMapping = Readonly<Record<string, string>>;

/**
 * Renders a template by replacing placeholders.
 *
 * Every occurrence, with or without a default, is replaced in a single pass, so
 * substituted values are never scanned again. Occurrences whose name is not in
 * `values` are left as written.
 */
export function renderTemplate(template: string, values: VariableMapping): string {
  return template.replace(placeholderPattern(), (occurrence: string, name: string) =>
    Object.prototype.hasOwnProperty.call(values, name) ? String(values[name]) : occurrence,
  );
}

/**
 * Loads a template file.
 */
export async function loadTemplate(templatePath: string): Promise<string> {
  const content = await readFileSafe(templatePath);
  if (content === null) {
    throw new ForgeError("TemplateNotFound", `Template not found: ${templatePath}`, [templatePath]);
  }
  return content;
}
