/**
 * Error categorization system for the target runner
 *
 * Provides structured error types with consistent error codes, exit codes and
 * user-friendly messages. Integrates with Oclif's error handling through the
 * exit code carried on every error.
 *
 * @file
 * **Invocation errors:**
 * - ValidationError: malformed command-line invocation
 * - ConfigurationError: missing or invalid target catalog
 * - TemplateSyntaxError: malformed step template in the catalog
 *
 * **Dispatch errors:**
 * - UnknownTargetError: target name not present in the registry
 * - MissingGuardedVariableError: guard check failed
 * - UnresolvedPlaceholderError: template references an undefined variable
 * - StepExecutionError: a step exited non-zero
 *
 */

import { getDispatchErrorGuidance } from "./dispatch-guidance.js";

/**
 * Process exit codes used for runner failures
 *
 * Step failures exit with the step's own code and are not listed here.
 *
 * @public
 */
export const EXIT_CODES = {
  USAGE: 64,
  MISSING_GUARDED_VARIABLE: 65,
  UNKNOWN_TARGET: 66,
  UNRESOLVED_PLACEHOLDER: 67,
  CONFIGURATION: 78,
} as const;

/**
 * Base error class for all runner errors
 *
 * Extends the standard Error class with error codes, exit codes and
 * structured metadata for consistent error handling across the application.
 *
 * @public
 */
export abstract class BaseError extends Error {
  /**
   * Unique error code for this error type
   */
  public readonly code: string;

  /**
   * Additional error metadata
   */
  public readonly metadata: Record<string, unknown>;

  /**
   * Process exit code to use when this error ends the invocation
   */
  public readonly exitCode: number;

  /**
   * Create a new base error
   *
   * @param message - Human-readable error message
   * @param code - Unique error code
   * @param metadata - Additional error context
   * @param exitCode - Process exit code for this error
   */
  constructor(
    message: string,
    code: string,
    metadata: Record<string, unknown> = {},
    exitCode = 1,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.metadata = metadata;
    this.exitCode = exitCode;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Validation error for a malformed invocation
 *
 * @public
 */
export class ValidationError extends BaseError {
  /**
   * Create a new validation error
   *
   * @param message - User-friendly validation error message
   * @param field - The argument that failed validation
   * @param value - The invalid value that was provided
   * @param metadata - Additional validation context
   */
  constructor(
    message: string,
    field?: string,
    value?: unknown,
    metadata: Record<string, unknown> = {},
  ) {
    super(
      message,
      "VALIDATION_ERROR",
      {
        field,
        value,
        ...metadata,
      },
      EXIT_CODES.USAGE,
    );
  }
}

/**
 * Configuration error for a missing or invalid target catalog
 *
 * @public
 */
export class ConfigurationError extends BaseError {
  /**
   * Create a new configuration error
   *
   * @param message - User-friendly configuration error message
   * @param configPath - Path of the catalog file involved
   * @param metadata - Additional configuration context
   */
  constructor(message: string, configPath?: string, metadata: Record<string, unknown> = {}) {
    super(
      message,
      "CONFIGURATION_ERROR",
      {
        configPath,
        ...metadata,
      },
      EXIT_CODES.CONFIGURATION,
    );
  }
}

/**
 * Template syntax error for malformed `${NAME}` placeholders
 *
 * @public
 */
export class TemplateSyntaxError extends BaseError {
  /**
   * Create a new template syntax error
   *
   * @param message - Description of the syntax problem
   * @param template - Template source that failed to parse
   * @param position - Zero-based offset of the offending `${`
   */
  constructor(message: string, template: string, position: number) {
    super(message, "TEMPLATE_SYNTAX_ERROR", { template, position }, EXIT_CODES.CONFIGURATION);
  }
}

/**
 * Raised when the requested target is not in the registry
 *
 * @public
 */
export class UnknownTargetError extends BaseError {
  /**
   * Create a new unknown target error
   *
   * @param targetName - Name the user asked for
   * @param knownTargets - Names present in the registry
   */
  constructor(
    public readonly targetName: string,
    knownTargets: readonly string[] = [],
  ) {
    super(
      `Unknown target '${targetName}'`,
      "UNKNOWN_TARGET",
      { targetName, knownTargets: [...knownTargets] },
      EXIT_CODES.UNKNOWN_TARGET,
    );
  }
}

/**
 * Raised when one or more guarded variables are missing or blank
 *
 * @public
 */
export class MissingGuardedVariableError extends BaseError {
  /**
   * Create a new missing guarded variable error
   *
   * @param variableNames - Missing variable names, in declared order
   * @param targetName - Target whose guard failed
   */
  constructor(
    public readonly variableNames: readonly string[],
    targetName?: string,
  ) {
    const plural = variableNames.length > 1 ? "s" : "";
    const suffix = targetName ? ` for target '${targetName}'` : "";
    super(
      `Missing required variable${plural} ${variableNames.join(", ")}${suffix}`,
      "MISSING_GUARDED_VARIABLE",
      { variableNames: [...variableNames], targetName },
      EXIT_CODES.MISSING_GUARDED_VARIABLE,
    );
  }
}

/**
 * Raised when a template placeholder has no value in the environment
 *
 * @public
 */
export class UnresolvedPlaceholderError extends BaseError {
  /**
   * Create a new unresolved placeholder error
   *
   * @param placeholder - Placeholder name without the `${}` wrapper
   * @param template - Template source containing the placeholder
   */
  constructor(
    public readonly placeholder: string,
    template: string,
  ) {
    super(
      `Unresolved placeholder \${${placeholder}} in '${template}'`,
      "UNRESOLVED_PLACEHOLDER",
      { placeholder, template },
      EXIT_CODES.UNRESOLVED_PLACEHOLDER,
    );
  }
}

/**
 * How a stopped step ended, for error messages
 *
 * @internal
 */
function describeStepOutcome(stepExitCode: number, interruptSignal: unknown): string {
  return typeof interruptSignal === "string"
    ? `was interrupted by ${interruptSignal}`
    : `failed with exit code ${stepExitCode}`;
}

/**
 * Raised when a step exits with a non-zero code or is interrupted
 *
 * @public
 */
export class StepExecutionError extends BaseError {
  /**
   * Create a new step execution error
   *
   * @param targetName - Target the step belongs to
   * @param stepIndex - Zero-based index of the failing step
   * @param stepCount - Number of steps in the target
   * @param stepExitCode - Exit code reported for the step
   * @param metadata - Additional execution context; an `interruptSignal` name
   *   reports the step as interrupted
   */
  constructor(
    targetName: string,
    public readonly stepIndex: number,
    stepCount: number,
    stepExitCode: number,
    metadata: Record<string, unknown> = {},
  ) {
    super(
      `Step ${stepIndex + 1} of ${stepCount} in target '${targetName}' ` +
        describeStepOutcome(stepExitCode, metadata.interruptSignal),
      "STEP_EXECUTION_FAILED",
      { targetName, stepIndex, stepExitCode, ...metadata },
      stepExitCode,
    );
  }
}

/**
 * Check if an error is one of our custom error types
 *
 * @param error - The error to check
 * @returns True if the error is a BaseError instance
 *
 * @public
 */
export function isBaseError(error: unknown): error is BaseError {
  return error instanceof BaseError;
}

/**
 * Resolve the process exit code for any thrown value
 *
 * @param error - The error that ended the invocation
 * @returns Exit code carried by the error, or 1
 *
 * @public
 */
export function getExitCode(error: unknown): number {
  return isBaseError(error) ? error.exitCode : 1;
}

/**
 * Format error for user display with appropriate detail level
 *
 * @param error - The error to format
 * @param includeMetadata - Whether to include error metadata in output
 * @returns Formatted error message for user display
 *
 * @public
 */
export function formatError(error: unknown, includeMetadata = false): string {
  if (isBaseError(error)) {
    let formatted = `${error.code}: ${error.message}`;

    if (includeMetadata && Object.keys(error.metadata).length > 0) {
      formatted += `\nDetails: ${JSON.stringify(error.metadata, undefined, 2)}`;
    }

    return formatted;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

/**
 * Format error for user display with remediation guidance
 *
 * @param error - The error to format
 * @param includeMetadata - Whether to include error metadata in output
 * @returns Formatted error message with guidance when one applies
 *
 * @public
 */
export function formatErrorWithGuidance(error: unknown, includeMetadata = false): string {
  const basicMessage = formatError(error, includeMetadata);
  const guidance = getDispatchErrorGuidance(error);

  return guidance ? `${basicMessage}\n\n${guidance}` : basicMessage;
}
