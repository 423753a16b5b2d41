/**
 * RouterError: every expected failure of parse, plan and launch.
 * Discriminated on `code`; each variant carries what its report needs.
 */

import { ExitCode } from './exit-codes';

export type RouterError =
  | { code: 'MissingFlagValue'; message: string; flag: string }
  | { code: 'InvalidProcessCount'; message: string; value: string | null }
  | { code: 'NoModeSelected'; message: string }
  | { code: 'ConfigInvalid'; message: string; source: string; issues: string[] }
  | { code: 'LaunchFailed'; message: string; command: string; cause?: Error }
  | {
      code: 'DownstreamFailure';
      message: string;
      command: string;
      exitCode: number;
      signal?: NodeJS.Signals;
    }
  | { code: 'PromptCancelled'; message: string };

export type RouterErrorCode = RouterError['code'];

export function missingFlagValue(flag: string): RouterError {
  return { code: 'MissingFlagValue', flag, message: `${flag} requires a value` };
}

export function invalidProcessCount(value: string | null): RouterError {
  const message =
    value === null
      ? '-np <count> is required'
      : `-np must be a positive integer (got "${value}")`;
  return { code: 'InvalidProcessCount', value, message };
}

export function noModeSelected(): RouterError {
  return { code: 'NoModeSelected', message: 'No action selected: pass --build, --run or --default' };
}

export function configInvalid(source: string, issues: string[]): RouterError {
  return {
    code: 'ConfigInvalid',
    source,
    issues,
    message: `Invalid configuration in ${source}`,
  };
}

export function launchFailed(command: string, cause: Error): RouterError {
  const notFound = 'code' in cause && cause.code === 'ENOENT';
  return {
    code: 'LaunchFailed',
    command,
    cause,
    message: notFound ? `${command}: command not found` : `${command} could not be started: ${cause.message}`,
  };
}

export function downstreamFailure(
  command: string,
  exitCode: number,
  signal?: NodeJS.Signals
): RouterError {
  return {
    code: 'DownstreamFailure',
    command,
    exitCode,
    signal,
    message: signal
      ? `${command} terminated by ${signal} (exit code ${exitCode})`
      : `${command} exited with code ${exitCode}`,
  };
}

export function promptCancelled(): RouterError {
  return { code: 'PromptCancelled', message: 'Cancelled by user' };
}

/**
 * Usage errors are reported together with the usage text
 */
export function isUsageError(error: RouterError): boolean {
  return (
    error.code === 'MissingFlagValue' ||
    error.code === 'InvalidProcessCount' ||
    error.code === 'NoModeSelected'
  );
}

export function exitCodeForError(error: RouterError): number {
  switch (error.code) {
    case 'MissingFlagValue':
    case 'InvalidProcessCount':
    case 'NoModeSelected':
      return ExitCode.USAGE_ERROR;
    case 'ConfigInvalid':
      return ExitCode.CONFIG_ERROR;
    case 'LaunchFailed':
      return ExitCode.LAUNCH_FAILED;
    case 'DownstreamFailure':
      return error.exitCode;
    case 'PromptCancelled':
      return ExitCode.INTERRUPTED;
  }
}
