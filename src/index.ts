#!/usr/bin/env node

/**
 * infra-run - Main entry point
 *
 * Oclif single-command CLI that runs guarded shell targets from a catalog.
 *
 */

import { execute } from "@oclif/core";

/**
 * CLI application entry point
 *
 * Initializes the Oclif CLI framework and executes the run command.
 */
async function run(): Promise<void> {
  await execute({ dir: import.meta.url });
}

/**
 * Execute the CLI with proper error handling
 *
 * Catches and formats any unhandled errors that escape the Oclif
 * error handling system, ensuring clean exit behavior.
 */
try {
  await run();
} catch (error: unknown) {
  const { handle } = await import("@oclif/core/handle");
  await handle(error instanceof Error ? error : new Error(String(error)));
}
