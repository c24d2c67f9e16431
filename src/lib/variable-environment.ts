/**
 * Variable environment construction and invocation parsing
 *
 * The variable environment is built once per invocation and frozen before a
 * target runs. Layers, lowest precedence first: catalog defaults, the
 * inherited process environment, command-line `KEY=VALUE` assignments.
 *
 */

import { ValidationError } from "./errors.js";
import { VARIABLE_NAME_PATTERN } from "./template.js";

/**
 * Immutable name to value mapping used for guards, rendering and child processes
 *
 * @public
 */
export type VariableEnvironment = Readonly<Record<string, string>>;

/**
 * Sources layered into a variable environment
 *
 * @public
 */
export interface VariableSources {
  /**
   * Catalog-level defaults
   */
  defaults?: Readonly<Record<string, string>>;

  /**
   * Inherited process environment
   */
  inherited?: Readonly<Record<string, string | undefined>>;

  /**
   * Command-line assignments
   */
  overrides?: Readonly<Record<string, string>>;
}

/**
 * Parsed command-line invocation
 *
 * @public
 */
export interface Invocation {
  /**
   * Requested target, undefined when only assignments were given
   */
  targetName?: string;

  /**
   * `KEY=VALUE` assignments in argument order, later keys winning
   */
  assignments: Record<string, string>;
}

/**
 * Build a frozen variable environment from its layered sources
 *
 * @param sources - Defaults, inherited environment and overrides
 * @returns Frozen variable environment
 *
 * @public
 */
export function createVariableEnvironment(sources: VariableSources = {}): VariableEnvironment {
  // Object.fromEntries defines own properties, so names like `__proto__` survive
  const merged = new Map<string, string>(Object.entries(sources.defaults ?? {}));

  for (const [name, value] of Object.entries(sources.inherited ?? {})) {
    if (value !== undefined) {
      merged.set(name, value);
    }
  }

  for (const [name, value] of Object.entries(sources.overrides ?? {})) {
    merged.set(name, value);
  }

  return Object.freeze(Object.fromEntries(merged));
}

/**
 * Split raw arguments into a target name and variable assignments
 *
 * Assignments may appear before or after the target name.
 *
 * @param argv - Positional arguments after flag parsing
 * @returns Parsed invocation
 * @throws ValidationError for an invalid variable name or more than one target
 *
 * @public
 */
export function parseInvocation(argv: readonly string[]): Invocation {
  let targetName: string | undefined;
  const assignments = new Map<string, string>();

  for (const argument of argv) {
    const separator = argument.indexOf("=");

    if (separator === -1) {
      if (targetName !== undefined) {
        throw new ValidationError(
          `Only one target can run per invocation, got '${targetName}' and '${argument}'`,
          "target",
          argument,
        );
      }
      targetName = argument;
      continue;
    }

    const name = argument.slice(0, separator);
    if (!VARIABLE_NAME_PATTERN.test(name)) {
      throw new ValidationError(
        `Invalid variable name '${name}' in assignment '${argument}'`,
        "assignment",
        argument,
        { expectedFormat: "KEY=VALUE" },
      );
    }

    assignments.set(name, argument.slice(separator + 1));
  }

  return {
    ...(targetName !== undefined && { targetName }),
    assignments: Object.fromEntries(assignments),
  };
}
