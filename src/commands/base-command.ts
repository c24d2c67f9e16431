/**
 * @module base-command
 * Base command class for standardized command patterns
 *
 * Provides common functionality for CLI commands including error formatting,
 * exit code mapping and logger construction.
 *
 * @example Basic command implementation
 * ```typescript
 * export default class MyCommand extends BaseCommand {
 *   static override readonly description = "My command description";
 *
 *   static override readonly flags = {
 *     ...BaseCommand.commonFlags,
 *   };
 *
 *   async run(): Promise<void> {
 *     const { flags } = await this.parse(MyCommand);
 *     const logger = this.createLogger(flags.verbose);
 *
 *     try {
 *       await doWork(logger);
 *     } catch (error) {
 *       this.fail(error, flags.verbose);
 *     }
 *   }
 * }
 * ```
 *
 * @public
 */

import { Command, Flags } from "@oclif/core";
import { BaseError, formatErrorWithGuidance, getExitCode } from "../lib/errors.js";
import { Logger, LogLevel, parseLogLevel } from "../lib/logger.js";

/**
 * Base command class providing common functionality for all commands
 *
 * @public
 */
export abstract class BaseCommand extends Command {
  /**
   * Common flags shared across all commands
   */
  static readonly commonFlags = {
    file: Flags.string({
      char: "f",
      description: "Target catalog file (defaults to INFRA_RUN_FILE, ./targets.json, then the bundled catalog)",
      helpValue: "PATH",
    }),

    verbose: Flags.boolean({
      char: "v",
      description: "Enable verbose output with debug information",
      default: false,
    }),
  };

  /**
   * Format error with context and guidance
   *
   * @param error - Error to format
   * @param verbose - Whether to include metadata and stack traces
   * @returns Formatted error message
   */
  protected formatError(error: unknown, verbose = false): string {
    if (error instanceof BaseError) {
      let message = formatErrorWithGuidance(error, verbose);

      if (verbose && error.stack) {
        message += `\n\nStack trace:\n${error.stack}`;
      }

      return message;
    }

    if (error instanceof Error) {
      return verbose && error.stack ? `${error.message}\n\nStack trace:\n${error.stack}` : error.message;
    }

    return String(error);
  }

  /**
   * End the command with a formatted error and its exit code
   *
   * @param error - Error that ended the command
   * @param verbose - Whether to include verbose details
   */
  protected fail(error: unknown, verbose = false): never {
    this.error(this.formatError(error, verbose), { exit: getExitCode(error) });
  }

  /**
   * Create the command logger
   *
   * @param verbose - Force debug level
   * @returns Logger writing to stderr; WARN unless LOG_LEVEL says otherwise
   */
  protected createLogger(verbose = false): Logger {
    const level = verbose
      ? LogLevel.DEBUG
      : (parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.WARN);

    return new Logger({ level, component: this.config.bin });
  }
}
