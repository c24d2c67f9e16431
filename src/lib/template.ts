/**
 * Step template compilation and rendering
 *
 * Step command lines are stored as compiled templates: the source string,
 * the ordered list of `${NAME}` placeholders it requires, and the parsed parts.
 * Compiling up front lets every step of a target be rendered, and every
 * substitution failure reported, before a single process starts.
 *
 * Only the braced form is a placeholder. `$HOME`, `$(pwd)` and other shell
 * syntax pass through untouched, and `$${` renders as a literal `${`.
 *
 */

import { TemplateSyntaxError, UnresolvedPlaceholderError } from "./errors.js";
import type { VariableEnvironment } from "./variable-environment.js";

/**
 * Valid placeholder and variable name
 *
 * @public
 */
export const VARIABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Parsed template fragment
 *
 * @public
 */
export type TemplatePart =
  | { readonly kind: "text"; readonly value: string }
  | { readonly kind: "placeholder"; readonly name: string };

/**
 * Compiled step template
 *
 * @public
 */
export interface Template {
  /**
   * Template as written in the catalog
   */
  readonly source: string;

  /**
   * Distinct placeholder names in order of first appearance
   */
  readonly placeholders: readonly string[];

  /**
   * Literal text and placeholder fragments in source order
   */
  readonly parts: readonly TemplatePart[];
}

/**
 * Parse a template source string
 *
 * @param source - Template text containing `${NAME}` placeholders
 * @returns Compiled template
 * @throws TemplateSyntaxError for an unterminated `${` or an invalid name
 *
 * @public
 */
export function compileTemplate(source: string): Template {
  const parts: TemplatePart[] = [];
  const placeholders: string[] = [];
  let text = "";
  let cursor = 0;

  while (cursor < source.length) {
    if (source.startsWith("$${", cursor)) {
      text += "${";
      cursor += 3;
      continue;
    }

    if (source.startsWith("${", cursor)) {
      const end = source.indexOf("}", cursor + 2);
      if (end === -1) {
        throw new TemplateSyntaxError(`Unterminated placeholder in '${source}'`, source, cursor);
      }

      const name = source.slice(cursor + 2, end);
      if (!VARIABLE_NAME_PATTERN.test(name)) {
        throw new TemplateSyntaxError(
          `Invalid placeholder name '${name}' in '${source}'`,
          source,
          cursor,
        );
      }

      if (text.length > 0) {
        parts.push({ kind: "text", value: text });
        text = "";
      }
      parts.push({ kind: "placeholder", name });
      if (!placeholders.includes(name)) {
        placeholders.push(name);
      }

      cursor = end + 1;
      continue;
    }

    text += source.charAt(cursor);
    cursor++;
  }

  if (text.length > 0) {
    parts.push({ kind: "text", value: text });
  }

  return { source, placeholders, parts };
}

/**
 * Substitute placeholder values into a compiled template
 *
 * A variable that is defined but empty renders as an empty string; only an
 * absent variable is unresolved.
 *
 * @param template - Compiled template
 * @param environment - Variable values
 * @returns Rendered string
 * @throws UnresolvedPlaceholderError naming the first undefined placeholder
 *
 * @public
 */
export function renderTemplate(template: Template, environment: VariableEnvironment): string {
  let rendered = "";

  for (const part of template.parts) {
    if (part.kind === "text") {
      rendered += part.value;
      continue;
    }

    const value = Object.hasOwn(environment, part.name) ? environment[part.name] : undefined;
    if (value === undefined) {
      throw new UnresolvedPlaceholderError(part.name, template.source);
    }
    rendered += value;
  }

  return rendered;
}
