/**
 * @module dispatch-guidance
 * Resolution guidance for target dispatch errors
 *
 * Separated from error definitions to avoid circular imports.
 *
 */

/**
 * Error-like interface for structural typing
 */
interface ErrorLike {
  code: string;
  metadata: Record<string, unknown>;
}

/**
 * Narrow an unknown value to the error shape used by guidance lookups
 *
 * @internal
 */
function isErrorLike(error: unknown): error is ErrorLike {
  if (typeof error !== "object" || error === null) {
    return false;
  }

  return (
    "code" in error &&
    typeof error.code === "string" &&
    "metadata" in error &&
    typeof error.metadata === "object" &&
    error.metadata !== null
  );
}

/**
 * Read a string array out of error metadata
 *
 * @internal
 */
function metadataStrings(metadata: Record<string, unknown>, key: string): string[] {
  const value = metadata[key];
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];
}

/**
 * Get guidance for MissingGuardedVariableError
 *
 * @internal
 */
function getMissingVariableGuidance(error: ErrorLike): string {
  const names = metadataStrings(error.metadata, "variableNames");
  const target = typeof error.metadata.targetName === "string" ? error.metadata.targetName : "<target>";
  const assignments = names.map((name) => `${name}=<value>`).join(" ");

  return [
    "Provide the missing value on the command line or in the environment:",
    `  infra-run ${target} ${assignments}`,
    "",
    "Note: blank values do not satisfy a guard",
  ].join("\n");
}

/**
 * Get guidance for UnknownTargetError
 *
 * @internal
 */
function getUnknownTargetGuidance(error: ErrorLike): string {
  const requested = typeof error.metadata.targetName === "string" ? error.metadata.targetName : "";
  const prefix = requested.split("-")[0] ?? "";
  const similar = metadataStrings(error.metadata, "knownTargets").filter(
    (name) => prefix.length > 0 && name.startsWith(`${prefix}-`),
  );

  const lines = ["Run 'infra-run help' to list the available targets."];
  if (similar.length > 0) {
    lines.push("", `Similar targets: ${similar.join(", ")}`);
  }

  return lines.join("\n");
}

/**
 * Get resolution guidance for a dispatch error
 *
 * @param error - Any thrown value
 * @returns Guidance text, or undefined when none applies
 *
 * @public
 */
export function getDispatchErrorGuidance(error: unknown): string | undefined {
  if (!isErrorLike(error)) {
    return undefined;
  }

  switch (error.code) {
    case "MISSING_GUARDED_VARIABLE": {
      return getMissingVariableGuidance(error);
    }
    case "UNKNOWN_TARGET": {
      return getUnknownTargetGuidance(error);
    }
    case "UNRESOLVED_PLACEHOLDER": {
      return "Define the variable on the command line (KEY=VALUE), in the environment, or under 'variables' in the catalog.";
    }
    case "CONFIGURATION_ERROR":
    case "TEMPLATE_SYNTAX_ERROR": {
      return "Check the target catalog (--file, INFRA_RUN_FILE or ./targets.json).";
    }
    default: {
      return undefined;
    }
  }
}
