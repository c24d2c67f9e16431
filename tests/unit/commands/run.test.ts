/**
 * Unit tests for RunCommand
 *
 * Runs the command against the fixture catalog with the shell runner mocked,
 * covering help output, variable precedence, error exit codes and dry runs.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import RunCommand from "../../../src/commands/run.js";
import { ShellProcessRunner } from "../../../src/services/targets/process-runner.js";
import {
  createCliTestContext,
  mockEnvironment,
  runCommand,
  type CliTestContext,
} from "../../utils/cli-test-utilities.js";

const { runMock } = vi.hoisted(() => ({ runMock: vi.fn() }));

vi.mock("../../../src/services/targets/process-runner.js", async (importOriginal) => {
  const actual =
    await importOriginal<typeof import("../../../src/services/targets/process-runner.js")>();
  return {
    ...actual,
    ShellProcessRunner: vi.fn().mockImplementation(() => ({ run: runMock })),
  };
});

const FIXTURE = ["--file", "tests/fixtures/targets.json"];

describe("RunCommand", () => {
  let cliContext: CliTestContext;
  let restoreEnvironment: (() => void) | undefined;

  beforeEach(async () => {
    vi.clearAllMocks();
    runMock.mockResolvedValue({ exitCode: 0 });
    cliContext = await createCliTestContext();
  });

  afterEach(() => {
    restoreEnvironment?.();
    restoreEnvironment = undefined;
  });

  describe("help", () => {
    const expectedHelp = [
      "",
      "Usage:",
      "  infra-run <target> [KEY=VALUE...]",
      "",
      "Basics",
      `  ${"greet".padEnd(25)} Print a greeting`,
      "",
      "Deploy",
      `  ${"deploy".padEnd(25)} Deploy an environment (DEPLOY_ENV=xxx)`,
      "",
    ].join("\n");

    it("should list described targets for the help target", async () => {
      const output = await runCommand(RunCommand, [...FIXTURE, "help"], cliContext);

      expect(output.exitCode).toBe(0);
      expect(output.stdout).toBe(expectedHelp);
      expect(runMock).not.toHaveBeenCalled();
    });

    it("should list targets when no target is given", async () => {
      const output = await runCommand(RunCommand, [...FIXTURE, "DEPLOY_ENV=staging"], cliContext);

      expect(output.exitCode).toBe(0);
      expect(output.stdout).toBe(expectedHelp);
    });
  });

  describe("dispatch", () => {
    it("should run each rendered step with the merged environment", async () => {
      const output = await runCommand(
        RunCommand,
        [...FIXTURE, "deploy", "DEPLOY_ENV=staging"],
        cliContext,
      );

      expect(output.exitCode).toBe(0);
      expect(output.stderr).toContain("[fixture] Deploying\n");
      expect(runMock).toHaveBeenCalledTimes(2);
      expect(runMock).toHaveBeenNthCalledWith(
        1,
        { index: 0, command: "prepare staging" },
        expect.objectContaining({
          env: expect.objectContaining({ DEPLOY_ENV: "staging", FIXTURE_REGION: "test-region-1" }),
        }),
      );
      expect(runMock).toHaveBeenNthCalledWith(
        2,
        { index: 1, command: "apply --region test-region-1 staging", cwd: "stacks/staging" },
        expect.anything(),
      );
    });

    it("should let the environment override catalog defaults", async () => {
      restoreEnvironment = mockEnvironment({ FIXTURE_REGION: "env-region", DEPLOY_ENV: "qa" });

      await runCommand(RunCommand, [...FIXTURE, "deploy"], cliContext);

      expect(runMock).toHaveBeenLastCalledWith(
        { index: 1, command: "apply --region env-region qa", cwd: "stacks/qa" },
        expect.anything(),
      );
    });

    it("should let command-line assignments override the environment", async () => {
      restoreEnvironment = mockEnvironment({ FIXTURE_REGION: "env-region" });

      await runCommand(
        RunCommand,
        [...FIXTURE, "deploy", "DEPLOY_ENV=prod", "FIXTURE_REGION=cli-region"],
        cliContext,
      );

      expect(runMock).toHaveBeenLastCalledWith(
        { index: 1, command: "apply --region cli-region prod", cwd: "stacks/prod" },
        expect.anything(),
      );
    });

    it("should use the platform shell unless INFRA_RUN_SHELL is set", async () => {
      await runCommand(RunCommand, [...FIXTURE, "greet"], cliContext);
      expect(ShellProcessRunner).toHaveBeenLastCalledWith(expect.objectContaining({ shell: true }));

      restoreEnvironment = mockEnvironment({ INFRA_RUN_SHELL: "/bin/bash" });
      await runCommand(RunCommand, [...FIXTURE, "greet"], cliContext);
      expect(ShellProcessRunner).toHaveBeenLastCalledWith(
        expect.objectContaining({ shell: "/bin/bash" }),
      );
    });

    it("should print commands instead of running them in dry-run mode", async () => {
      const output = await runCommand(
        RunCommand,
        [...FIXTURE, "deploy", "DEPLOY_ENV=staging", "--dry-run"],
        cliContext,
      );

      expect(output.exitCode).toBe(0);
      expect(output.stdout).toBe(
        "prepare staging\ncd stacks/staging && apply --region test-region-1 staging\n",
      );
      expect(runMock).not.toHaveBeenCalled();
    });

    it("should remove its signal handlers when done", async () => {
      const sigintListeners = process.listenerCount("SIGINT");
      const sigtermListeners = process.listenerCount("SIGTERM");

      await runCommand(RunCommand, [...FIXTURE, "greet"], cliContext);

      expect(process.listenerCount("SIGINT")).toBe(sigintListeners);
      expect(process.listenerCount("SIGTERM")).toBe(sigtermListeners);
    });
  });

  describe("errors", () => {
    it("should exit 65 with guidance when a guard fails", async () => {
      const output = await runCommand(RunCommand, [...FIXTURE, "deploy"], cliContext);

      expect(output.exitCode).toBe(65);
      expect(output.error?.message).toBe(
        [
          "MISSING_GUARDED_VARIABLE: Missing required variable DEPLOY_ENV for target 'deploy'",
          "",
          "Provide the missing value on the command line or in the environment:",
          "  infra-run deploy DEPLOY_ENV=<value>",
          "",
          "Note: blank values do not satisfy a guard",
        ].join("\n"),
      );
      expect(output.stderr).not.toContain("Deploying");
      expect(runMock).not.toHaveBeenCalled();
    });

    it("should reject blank guarded values", async () => {
      const output = await runCommand(RunCommand, [...FIXTURE, "deploy", "DEPLOY_ENV=  "], cliContext);

      expect(output.exitCode).toBe(65);
      expect(runMock).not.toHaveBeenCalled();
    });

    it("should exit 66 for an unknown target", async () => {
      const output = await runCommand(RunCommand, [...FIXTURE, "destroy"], cliContext);

      expect(output.exitCode).toBe(66);
      expect(output.error?.message).toBe(
        "UNKNOWN_TARGET: Unknown target 'destroy'\n\nRun 'infra-run help' to list the available targets.",
      );
    });

    it("should exit 67 for an unresolved placeholder", async () => {
      const output = await runCommand(RunCommand, [...FIXTURE, "broken"], cliContext);

      expect(output.exitCode).toBe(67);
      expect(output.error?.message.split("\n")[0]).toBe(
        "UNRESOLVED_PLACEHOLDER: Unresolved placeholder ${RELEASE_TAG} in 'release ${RELEASE_TAG}'",
      );
      expect(runMock).not.toHaveBeenCalled();
    });

    it("should exit with the failing step's code", async () => {
      runMock.mockResolvedValueOnce({ exitCode: 0 }).mockResolvedValueOnce({ exitCode: 4 });

      const output = await runCommand(
        RunCommand,
        [...FIXTURE, "deploy", "DEPLOY_ENV=staging"],
        cliContext,
      );

      expect(output.exitCode).toBe(4);
      expect(output.error?.message).toBe(
        "STEP_EXECUTION_FAILED: Step 2 of 2 in target 'deploy' failed with exit code 4",
      );
    });

    it("should stop on SIGINT and exit 130", async () => {
      const existing = process.listeners("SIGINT");
      runMock.mockImplementationOnce(() => {
        for (const listener of process.listeners("SIGINT")) {
          if (!existing.includes(listener)) {
            listener("SIGINT");
          }
        }
        return Promise.resolve({ exitCode: 130 });
      });

      const output = await runCommand(
        RunCommand,
        [...FIXTURE, "deploy", "DEPLOY_ENV=staging"],
        cliContext,
      );

      expect(output.exitCode).toBe(130);
      expect(runMock).toHaveBeenCalledTimes(1);
      expect(output.error?.message).toBe(
        "STEP_EXECUTION_FAILED: Step 1 of 2 in target 'deploy' was interrupted by SIGINT",
      );
    });

    it("should exit 64 for a malformed assignment", async () => {
      const output = await runCommand(RunCommand, [...FIXTURE, "deploy", "1ENV=x"], cliContext);

      expect(output.exitCode).toBe(64);
      expect(output.error?.message.split("\n")[0]).toBe(
        "VALIDATION_ERROR: Invalid variable name '1ENV' in assignment '1ENV=x'",
      );
    });

    it("should exit 64 when more than one target is named", async () => {
      const output = await runCommand(RunCommand, [...FIXTURE, "greet", "deploy"], cliContext);

      expect(output.exitCode).toBe(64);
    });

    it("should exit 78 when the catalog cannot be read", async () => {
      const output = await runCommand(
        RunCommand,
        ["--file", "tests/fixtures/missing.json", "greet"],
        cliContext,
      );

      expect(output.exitCode).toBe(78);
      expect(output.error?.message.split("\n")[0]).toMatch(
        /^CONFIGURATION_ERROR: Cannot read target catalog '.+missing\.json'$/,
      );
    });
  });
});
