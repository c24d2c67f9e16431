/**
 * Target runner command
 *
 * Runs one target from the catalog: parses `KEY=VALUE` assignments, checks
 * the target's guards, renders its steps and executes them in order. The
 * `help` pseudo-target, or no target at all, lists the available targets.
 *
 */

import { Flags } from "@oclif/core";
import { StepExecutionError } from "../lib/errors.js";
import { formatTargetHelp } from "../lib/help-formatter.js";
import type { Logger } from "../lib/logger.js";
import { INTERRUPT_SIGNALS } from "../lib/signals.js";
import {
  createVariableEnvironment,
  parseInvocation,
  type VariableEnvironment,
} from "../lib/variable-environment.js";
import { CatalogLoader, type LoadedCatalog } from "../services/targets/catalog-loader.js";
import { TargetDispatcher } from "../services/targets/dispatcher.js";
import { DryRunProcessRunner, ShellProcessRunner } from "../services/targets/process-runner.js";
import type { ExecutionResult, ProcessRunner, StateTransition } from "../services/targets/types.js";
import { BaseCommand } from "./base-command.js";

/**
 * Pseudo-target that lists the catalog
 *
 * @public
 */
export const HELP_TARGET = "help";

/**
 * Environment variable selecting the shell steps run in
 *
 * @public
 */
export const SHELL_ENV_VAR = "INFRA_RUN_SHELL";

/**
 * Run command for catalog targets
 *
 * @public
 */
export default class RunCommand extends BaseCommand {
  static override readonly description =
    "Run a target from the catalog. Variables are taken from the catalog defaults, the environment and KEY=VALUE arguments, in increasing precedence.";

  static override readonly summary = "Run a guarded target";

  static override readonly usage = ["<target> [KEY=VALUE...]", "help"];

  static override readonly strict = false;

  static override readonly examples = [
    {
      description: "List the available targets",
      command: "<%= config.bin %> help",
    },
    {
      description: "Plan a service's infrastructure",
      command: "<%= config.bin %> terraform-plan SERVICE=network ENV=staging",
    },
    {
      description: "Print the commands a target would run",
      command: "<%= config.bin %> terraform-apply SERVICE=network ENV=prod --dry-run",
    },
    {
      description: "Use another catalog",
      command: "<%= config.bin %> --file ./ops/targets.json license ACTION=check",
    },
  ];

  static override readonly flags = {
    ...BaseCommand.commonFlags,

    "dry-run": Flags.boolean({
      char: "n",
      description: "Print the rendered commands instead of running them",
      default: false,
    }),
  };

  /**
   * Execute the run command
   *
   * @returns Promise resolving when the target completed successfully
   */
  async run(): Promise<void> {
    const { argv, flags } = await this.parse(RunCommand);
    const logger = this.createLogger(flags.verbose);

    let result: ExecutionResult | undefined;
    try {
      const invocation = parseInvocation(
        argv.filter((argument): argument is string => typeof argument === "string"),
      );
      const catalog = await new CatalogLoader({ logger }).load(flags.file);
      const targetName = invocation.targetName ?? HELP_TARGET;

      if (targetName === HELP_TARGET) {
        this.log(formatTargetHelp(catalog.registry, this.config.bin));
        return;
      }

      const environment = createVariableEnvironment({
        defaults: catalog.variables,
        inherited: process.env,
        overrides: invocation.assignments,
      });

      const dispatcher = new TargetDispatcher(catalog.registry, {
        runner: this.createRunner(flags["dry-run"], logger),
        logger: logger.child({ target: targetName }, "dispatcher"),
        onStateChange: (transition) => this.announce(catalog, transition),
      });

      result = await this.dispatchWithInterrupts(dispatcher, targetName, environment, logger);
    } catch (error) {
      this.fail(error, flags.verbose);
    }

    if (result && result.exitCode !== 0) {
      const stepIndex = result.stoppedAtStepIndex ?? 0;
      this.error(
        this.formatError(
          new StepExecutionError(result.targetName, stepIndex, result.steps.length, result.exitCode, {
            interrupted: result.interrupted,
            ...(result.interruptSignal !== undefined && {
              interruptSignal: result.interruptSignal,
            }),
          }),
          flags.verbose,
        ),
        { exit: result.exitCode },
      );
    }
  }

  /**
   * Pick the runner for this invocation
   *
   * @param dryRun - Print instead of executing
   * @param logger - Command logger
   * @returns Process runner
   */
  protected createRunner(dryRun: boolean, logger: Logger): ProcessRunner {
    if (dryRun) {
      return new DryRunProcessRunner((line) => this.log(line));
    }

    const shell = process.env[SHELL_ENV_VAR]?.trim();
    return new ShellProcessRunner({ shell: shell || true, logger });
  }

  /**
   * Print the target banner once its guards have passed
   *
   * @param catalog - Loaded catalog
   * @param transition - Dispatcher state change
   */
  private announce(catalog: LoadedCatalog, transition: StateTransition): void {
    if (transition.from !== "guard-checking" || transition.to === "aborted") {
      return;
    }

    const target = catalog.registry.getTarget(transition.targetName);
    const banner = target?.banner ?? target?.description ?? transition.targetName;
    this.logToStderr(`[${catalog.name}] ${banner}`);
  }

  /**
   * Dispatch with SIGINT and SIGTERM forwarded to the running step
   *
   * @param dispatcher - Configured dispatcher
   * @param targetName - Target to run
   * @param environment - Frozen variable environment
   * @param logger - Command logger
   * @returns Execution result
   */
  private async dispatchWithInterrupts(
    dispatcher: TargetDispatcher,
    targetName: string,
    environment: VariableEnvironment,
    logger: Logger,
  ): Promise<ExecutionResult> {
    const controller = new AbortController();
    const onSignal = (signal: NodeJS.Signals): void => {
      logger.warn(`Received ${signal}, stopping target '${targetName}'`);
      controller.abort(signal);
    };

    for (const signal of INTERRUPT_SIGNALS) {
      process.on(signal, onSignal);
    }

    try {
      return await dispatcher.dispatch(targetName, environment, controller.signal);
    } finally {
      for (const signal of INTERRUPT_SIGNALS) {
        process.off(signal, onSignal);
      }
    }
  }
}
