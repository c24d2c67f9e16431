/**
 * Signal helpers for interrupt handling and exit code mapping
 *
 */

import { constants } from "node:os";

/**
 * Signals that interrupt a running dispatch
 *
 * @public
 */
export const INTERRUPT_SIGNALS = ["SIGINT", "SIGTERM"] as const;

/**
 * Interrupt signal name
 *
 * @public
 */
export type InterruptSignal = (typeof INTERRUPT_SIGNALS)[number];

/**
 * Shell-style exit code for a process killed by a signal
 *
 * @param signal - Signal name such as "SIGINT"
 * @returns 128 plus the signal number, or undefined for an unknown name
 *
 * @public
 */
export function exitCodeForSignal(signal: string): number | undefined {
  const entry = Object.entries(constants.signals).find(([name]) => name === signal);
  return entry ? 128 + entry[1] : undefined;
}

/**
 * Signal that aborted a dispatch
 *
 * @param signal - Abort signal whose reason may carry the signal name
 * @returns The named signal, SIGINT when the reason names no known signal
 *
 * @public
 */
export function signalForAbort(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  return typeof reason === "string" && exitCodeForSignal(reason) !== undefined ? reason : "SIGINT";
}

/**
 * Exit code for an aborted dispatch
 *
 * @param signal - Abort signal whose reason may carry the signal name
 * @returns Exit code for the signal, 130 when the reason names none
 *
 * @public
 */
export function exitCodeForAbort(signal: AbortSignal): number {
  return exitCodeForSignal(signalForAbort(signal)) ?? 130;
}
