/**
 * Types module - shared interfaces and types
 * This module provides all injectable interfaces for testability
 */

// Result type for expected failures
export type { Result, Ok, Err } from './result';
export { ok, err } from './result';

// Exit codes
export { ExitCode, getExitCodeDescription, exitCodeForSignal } from './exit-codes';

// Error taxonomy
export type { RouterError, RouterErrorCode } from './router-error';
export {
  missingFlagValue,
  invalidProcessCount,
  noModeSelected,
  configInvalid,
  launchFailed,
  downstreamFailure,
  promptCancelled,
  isUsageError,
  exitCodeForError,
} from './router-error';

// Process runner interface
export type { ProcessRunner, SpawnOptions, SpawnResult } from './process-runner';

// Prompter interface
export type { Prompter, ConfirmOptions, PrompterError, PrompterErrorCode } from './prompter';
export { createPrompterError } from './prompter';

// Logger interface
export type {
  Logger,
  LogLevel,
  LogEventType,
  LauncherVariant,
  LogMetadata,
  LogEvent,
  LoggerOptions,
} from './logger';
export {
  LOG_LEVELS,
  compareLogLevels,
  shouldLog,
  levelForEvent,
  DEFAULT_REDACT_PATTERNS,
  redactSecrets,
} from './logger';
