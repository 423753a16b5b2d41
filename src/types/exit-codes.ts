/**
 * Exit codes used by both launchers.
 * A downstream failure is not listed here: the child's own code is propagated.
 */

import { constants } from 'os';

export const ExitCode = {
  /** Downstream process (or dry run) completed successfully */
  SUCCESS: 0,
  /** Unexpected/unhandled error inside the router */
  UNEXPECTED_ERROR: 1,
  /** Invalid CLI usage: missing flag value, bad process count, no mode */
  USAGE_ERROR: 2,
  /** Config file or environment failed validation */
  CONFIG_ERROR: 3,
  /** The downstream executable could not be started */
  LAUNCH_FAILED: 127,
  /** Interrupted by the operator (Ctrl+C) before anything launched */
  INTERRUPTED: 130,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function getExitCodeDescription(code: number): string {
  switch (code) {
    case ExitCode.SUCCESS:
      return 'Successful execution';
    case ExitCode.UNEXPECTED_ERROR:
      return 'Unexpected or unhandled error';
    case ExitCode.USAGE_ERROR:
      return 'Invalid CLI usage';
    case ExitCode.CONFIG_ERROR:
      return 'Configuration failed validation';
    case ExitCode.LAUNCH_FAILED:
      return 'Downstream command could not be started';
    case ExitCode.INTERRUPTED:
      return 'Interrupted';
    default:
      return code > 128 ? 'Downstream process terminated by signal' : 'Downstream process failed';
  }
}

/**
 * Shell convention for a process terminated by a signal: 128 + signal number
 */
export function exitCodeForSignal(signal: NodeJS.Signals): number {
  // Not every name in NodeJS.Signals exists on every platform
  const signo: unknown = Reflect.get(constants.signals, signal);
  return typeof signo === 'number' ? 128 + signo : ExitCode.UNEXPECTED_ERROR;
}
