/**
 * Target dispatcher
 *
 * Looks up a target, checks its guards, renders every step and runs the
 * rendered steps in order through the injected process runner, halting at the
 * first non-zero exit code.
 *
 * State machine:
 * `idle -> guard-checking -> { aborted | step-running(0) }`,
 * `step-running(i) -> { step-running(i+1) | failed | succeeded }`.
 *
 */

import { UnknownTargetError } from "../../lib/errors.js";
import { Logger, LogLevel } from "../../lib/logger.js";
import { exitCodeForAbort, signalForAbort } from "../../lib/signals.js";
import { renderTemplate } from "../../lib/template.js";
import type { VariableEnvironment } from "../../lib/variable-environment.js";
import { checkGuards } from "./guard.js";
import type {
  DispatcherOptions,
  DispatchState,
  ExecutionResult,
  ITargetRegistry,
  ProcessRunner,
  RenderedStep,
  StateTransition,
  TargetDefinition,
} from "./types.js";

/**
 * Sequential, guard-checked target executor
 *
 * @public
 */
export class TargetDispatcher {
  private readonly registry: ITargetRegistry;
  private readonly runner: ProcessRunner;
  private readonly logger: Logger;
  private readonly onStateChange: ((transition: StateTransition) => void) | undefined;

  /**
   * Create a new dispatcher
   *
   * @param registry - Registry to resolve target names against
   * @param options - Runner, logger and lifecycle hooks
   */
  constructor(registry: ITargetRegistry, options: DispatcherOptions) {
    this.registry = registry;
    this.runner = options.runner;
    this.logger = options.logger ?? new Logger({ component: "dispatcher", level: LogLevel.WARN });
    this.onStateChange = options.onStateChange;
  }

  /**
   * Run a target to completion
   *
   * @param targetName - Target to run
   * @param environment - Frozen variable environment
   * @param signal - Aborts the running step and skips the rest
   * @returns Execution result; a failing step is reported here, not thrown
   * @throws UnknownTargetError before any check when the name is not registered
   * @throws MissingGuardedVariableError when a guard fails
   * @throws UnresolvedPlaceholderError when a step cannot be rendered
   */
  async dispatch(
    targetName: string,
    environment: VariableEnvironment,
    signal?: AbortSignal,
  ): Promise<ExecutionResult> {
    const target = this.registry.getTarget(targetName);
    if (!target) {
      throw new UnknownTargetError(targetName, this.registry.getAllTargetNames());
    }

    let state: DispatchState = "idle";
    const transition = (to: DispatchState, stepIndex?: number): void => {
      const from = state;
      state = to;
      this.logger.debug(`${from} -> ${to}`, {
        target: targetName,
        ...(stepIndex !== undefined && { stepIndex }),
      });
      this.onStateChange?.({
        targetName,
        from,
        to,
        ...(stepIndex !== undefined && { stepIndex }),
      });
    };

    transition("guard-checking");

    let steps: RenderedStep[];
    try {
      checkGuards(target.guardedVariables, environment, target.name);
      steps = this.renderSteps(target, environment);
    } catch (error) {
      transition("aborted");
      throw error;
    }

    for (const step of steps) {
      if (signal?.aborted) {
        transition("failed", step.index);
        return this.createInterruptedResult(targetName, steps, step.index, signal);
      }

      transition("step-running", step.index);
      this.logger.debug(`Running step ${step.index + 1}/${steps.length}`, {
        command: step.command,
        ...(step.cwd !== undefined && { cwd: step.cwd }),
      });

      const outcome = await this.runner.run(step, {
        env: environment,
        ...(signal && { signal }),
      });

      if (signal?.aborted) {
        transition("failed", step.index);
        return this.createInterruptedResult(targetName, steps, step.index, signal);
      }

      if (outcome.exitCode !== 0) {
        if (outcome.errorMessage) {
          this.logger.error(outcome.errorMessage, { target: targetName, stepIndex: step.index });
        }
        transition("failed", step.index);
        return this.createResult(targetName, steps, outcome.exitCode, step.index);
      }

      this.logger.debug(`Step ${step.index + 1}/${steps.length} succeeded`);
    }

    transition("succeeded");
    return this.createResult(targetName, steps, 0, undefined);
  }

  /**
   * Render every step of a target before anything runs
   *
   * @internal
   */
  private renderSteps(target: TargetDefinition, environment: VariableEnvironment): RenderedStep[] {
    return target.steps.map((step, index) => {
      const command = renderTemplate(step.command, environment);

      return step.cwd
        ? { index, command, cwd: renderTemplate(step.cwd, environment) }
        : { index, command };
    });
  }

  /**
   * Build the result of a dispatch stopped by an interrupt
   *
   * @internal
   */
  private createInterruptedResult(
    targetName: string,
    steps: readonly RenderedStep[],
    stepIndex: number,
    signal: AbortSignal,
  ): ExecutionResult {
    return this.createResult(
      targetName,
      steps,
      exitCodeForAbort(signal),
      stepIndex,
      signalForAbort(signal),
    );
  }

  /**
   * Build the execution result
   *
   * @internal
   */
  private createResult(
    targetName: string,
    steps: readonly RenderedStep[],
    exitCode: number,
    stoppedAtStepIndex: number | undefined,
    interruptSignal?: string,
  ): ExecutionResult {
    const interrupted = interruptSignal !== undefined;

    return {
      targetName,
      exitCode,
      stoppedAtStepIndex,
      state: exitCode === 0 && !interrupted ? "succeeded" : "failed",
      interrupted,
      ...(interruptSignal !== undefined && { interruptSignal }),
      steps,
    };
  }
}
