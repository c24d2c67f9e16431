/**
 * @module types
 * Type definitions for target registration and dispatch
 *
 * Provides interfaces for target definitions, rendered steps, process
 * runners and execution results. Follows the dependency injection pattern
 * used across the service layer: the dispatcher receives its registry and
 * process runner rather than constructing them.
 *
 */

import type { Logger } from "../../lib/logger.js";
import type { Template } from "../../lib/template.js";
import type { VariableEnvironment } from "../../lib/variable-environment.js";

/**
 * One command of a target, before rendering
 *
 * @public
 */
export interface StepTemplate {
  /**
   * Shell command line template
   */
  readonly command: Template;

  /**
   * Working directory template, relative to the invocation directory
   */
  readonly cwd?: Template;
}

/**
 * Named, invocable unit of work
 *
 * @public
 */
export interface TargetDefinition {
  /**
   * Unique target name
   */
  readonly name: string;

  /**
   * Category label used to group targets in help output
   */
  readonly category: string;

  /**
   * One-line help text; undescribed targets are hidden from help
   */
  readonly description?: string;

  /**
   * Message announced before the steps run
   */
  readonly banner?: string;

  /**
   * Variables that must be present and non-blank before any step runs
   */
  readonly guardedVariables: readonly string[];

  /**
   * Steps in execution order
   */
  readonly steps: readonly StepTemplate[];
}

/**
 * Step with every placeholder substituted
 *
 * @public
 */
export interface RenderedStep {
  /**
   * Zero-based position within the target
   */
  readonly index: number;

  /**
   * Command line handed to the shell
   */
  readonly command: string;

  /**
   * Working directory for the command
   */
  readonly cwd?: string;
}

/**
 * Dispatch lifecycle state
 *
 * `aborted`, `failed` and `succeeded` are terminal.
 *
 * @public
 */
export type DispatchState =
  | "idle"
  | "guard-checking"
  | "aborted"
  | "step-running"
  | "failed"
  | "succeeded";

/**
 * State change notification emitted by the dispatcher
 *
 * @public
 */
export interface StateTransition {
  readonly targetName: string;
  readonly from: DispatchState;
  readonly to: DispatchState;
  /**
   * Step index for `step-running` and `failed`
   */
  readonly stepIndex?: number;
}

/**
 * Outcome of a single dispatch
 *
 * @public
 */
export interface ExecutionResult {
  readonly targetName: string;

  /**
   * 0 when every step succeeded, otherwise the failing step's code
   */
  readonly exitCode: number;

  /**
   * Index of the step that stopped the dispatch, undefined on success
   */
  readonly stoppedAtStepIndex: number | undefined;

  readonly state: "succeeded" | "failed";

  /**
   * Whether an interrupt signal ended the dispatch
   */
  readonly interrupted: boolean;

  /**
   * Signal that interrupted the dispatch
   */
  readonly interruptSignal?: string;

  /**
   * Every step as rendered, including those that never ran
   */
  readonly steps: readonly RenderedStep[];
}

/**
 * Result reported by a process runner for one step
 *
 * @public
 */
export interface StepOutcome {
  readonly exitCode: number;

  /**
   * Failure description when the process could not be started or was killed
   */
  readonly errorMessage?: string;
}

/**
 * Per-step execution options
 *
 * @public
 */
export interface RunOptions {
  /**
   * Complete environment for the child process
   */
  readonly env: VariableEnvironment;

  /**
   * Terminates the running child when aborted
   */
  readonly signal?: AbortSignal;
}

/**
 * Executes a rendered step as an external process
 *
 * @public
 */
export interface ProcessRunner {
  /**
   * Run one step to completion
   *
   * @param step - Rendered step
   * @param options - Environment and cancellation
   * @returns Exit status of the step
   */
  run(step: RenderedStep, options: RunOptions): Promise<StepOutcome>;
}

/**
 * Registry of available targets
 *
 * @public
 */
export interface ITargetRegistry {
  /**
   * Register a new target
   *
   * @param target - Target definition to register
   * @throws When the name is invalid, reserved or already registered
   */
  register(target: TargetDefinition): void;

  /**
   * Get a target by name
   *
   * @param name - Target name
   * @returns Target definition or undefined if not found
   */
  getTarget(name: string): TargetDefinition | undefined;

  /**
   * Get all registered target names in registration order
   */
  getAllTargetNames(): readonly string[];

  /**
   * Get targets grouped by category, categories in first-seen order
   */
  getTargetsByCategory(): ReadonlyMap<string, readonly TargetDefinition[]>;
}

/**
 * Configuration options for the target dispatcher
 *
 * @public
 */
export interface DispatcherOptions {
  /**
   * Runner that executes rendered steps
   */
  runner: ProcessRunner;

  /**
   * Logger for debug diagnostics
   */
  logger?: Logger;

  /**
   * Observer for state machine transitions
   */
  onStateChange?: (transition: StateTransition) => void;
}
