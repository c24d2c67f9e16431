/**
 * Guard mechanism for target preconditions
 *
 * A guard requires a variable to be present and non-blank before any step of
 * its target runs. This is the only validation applied to variable values.
 *
 */

import { MissingGuardedVariableError } from "../../lib/errors.js";
import type { VariableEnvironment } from "../../lib/variable-environment.js";

/**
 * Find guarded variables that are missing or blank
 *
 * @param guardedVariables - Variable names declared by the target
 * @param environment - Current variable environment
 * @returns Missing names in declared order, without duplicates
 *
 * @public
 */
export function findMissingVariables(
  guardedVariables: readonly string[],
  environment: VariableEnvironment,
): string[] {
  const missing: string[] = [];

  for (const name of guardedVariables) {
    const value = Object.hasOwn(environment, name) ? environment[name] : undefined;
    if ((value === undefined || value.trim().length === 0) && !missing.includes(name)) {
      missing.push(name);
    }
  }

  return missing;
}

/**
 * Verify every guarded variable has a non-blank value
 *
 * @param guardedVariables - Variable names declared by the target
 * @param environment - Current variable environment
 * @param targetName - Target being checked, for the error message
 * @throws MissingGuardedVariableError listing every missing name
 *
 * @public
 */
export function checkGuards(
  guardedVariables: readonly string[],
  environment: VariableEnvironment,
  targetName?: string,
): void {
  const missing = findMissingVariables(guardedVariables, environment);

  if (missing.length > 0) {
    throw new MissingGuardedVariableError(missing, targetName);
  }
}
