/**
 * Process runners for rendered steps
 *
 * The shell runner hands a rendered command line to the system shell with
 * execa, passing the child's output streams straight through to the terminal
 * and capturing only its exit status. The dry-run runner prints what would
 * run instead.
 *
 */

import { execa } from "execa";
import type { Logger } from "../../lib/logger.js";
import { exitCodeForSignal } from "../../lib/signals.js";
import type { ProcessRunner, RenderedStep, RunOptions, StepOutcome } from "./types.js";

/**
 * Exit code reported when a step's process could not be started
 *
 * @public
 */
export const SPAWN_FAILURE_EXIT_CODE = 127;

/**
 * Configuration options for the shell runner
 *
 * @public
 */
export interface ShellProcessRunnerOptions {
  /**
   * Shell to run commands with; true selects the platform default
   */
  shell?: boolean | string;

  /**
   * Logger for subprocess diagnostics
   */
  logger?: Logger;
}

/**
 * Runs rendered steps through the system shell
 *
 * @public
 */
export class ShellProcessRunner implements ProcessRunner {
  private readonly shell: boolean | string;
  private readonly logger: Logger | undefined;

  /**
   * Create a new shell runner
   *
   * @param options - Shell selection and logging
   */
  constructor(options: ShellProcessRunnerOptions = {}) {
    this.shell = options.shell ?? true;
    this.logger = options.logger;
  }

  /**
   * Run one step and wait for it to exit
   *
   * @param step - Rendered step
   * @param options - Complete child environment and cancellation signal
   * @returns Exit status; never rejects for a failing command
   */
  async run(step: RenderedStep, options: RunOptions): Promise<StepOutcome> {
    this.logger?.debug("Spawning step", {
      command: step.command,
      shell: this.shell,
      ...(step.cwd !== undefined && { cwd: step.cwd }),
    });

    const result = await execa(step.command, {
      shell: this.shell,
      cwd: step.cwd,
      env: options.env,
      extendEnv: false,
      stdio: "inherit",
      reject: false,
      cancelSignal: options.signal,
    });

    if (result.exitCode !== undefined) {
      this.logger?.debug("Step exited", { exitCode: result.exitCode });
      return { exitCode: result.exitCode };
    }

    if (result.signal) {
      return {
        exitCode: exitCodeForSignal(result.signal) ?? 1,
        errorMessage: `Command was killed with ${result.signal}: ${step.command}`,
      };
    }

    return {
      exitCode: SPAWN_FAILURE_EXIT_CODE,
      errorMessage:
        typeof result.shortMessage === "string"
          ? result.shortMessage
          : `Failed to start command: ${step.command}`,
    };
  }
}

/**
 * Prints rendered steps instead of running them
 *
 * @public
 */
export class DryRunProcessRunner implements ProcessRunner {
  private readonly write: (line: string) => void;

  /**
   * Create a new dry-run runner
   *
   * @param write - Sink for the printed command lines
   */
  constructor(write: (line: string) => void) {
    this.write = write;
  }

  /**
   * Print the step as a shell command line
   *
   * @param step - Rendered step
   * @returns Successful outcome
   */
  run(step: RenderedStep): Promise<StepOutcome> {
    this.write(formatCommandLine(step));
    return Promise.resolve({ exitCode: 0 });
  }
}

/**
 * Shell command line equivalent of a rendered step
 *
 * @param step - Rendered step
 * @returns `cd <cwd> && <command>`, or the bare command without a cwd
 *
 * @public
 */
export function formatCommandLine(step: RenderedStep): string {
  return step.cwd === undefined ? step.command : `cd ${step.cwd} && ${step.command}`;
}
