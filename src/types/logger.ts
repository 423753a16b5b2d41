/**
 * Logger interface
 * Structured logging with event types and metadata
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Structured event types for the parse-plan-launch lifecycle
 */
export type LogEventType =
  // Routing
  | 'request_parsed'
  | 'usage_error'
  | 'config_resolved'
  // Planning
  | 'plan_created'
  // Launching
  | 'step_started'
  | 'step_completed'
  | 'step_failed'
  | 'dry_run_step'
  | 'signal_forwarded'
  // General
  | 'debug'
  | 'info'
  | 'warn'
  | 'error';

/** Which launcher produced the event */
export type LauncherVariant = 'train' | 'deploy';

export interface LogMetadata {
  /** Launcher that is running */
  variant?: LauncherVariant;
  /** Launch step id (image-build, train, ...) */
  step?: string;
  /** Exit code of a finished step */
  exitCode?: number;
  [key: string]: unknown;
}

export interface LogEvent {
  /** ISO 8601 */
  timestamp: string;
  level: LogLevel;
  eventType: LogEventType;
  message: string;
  metadata: LogMetadata;
}

export interface LoggerOptions {
  /** Minimum log level to emit */
  minLevel?: LogLevel;
  /** Whether to include timestamps in console output */
  includeTimestamp?: boolean;
  /** Emit one JSON object per line instead of pretty text */
  jsonOutput?: boolean;
  /** Patterns to redact from log output */
  redactPatterns?: RegExp[];
}

/**
 * Interface for structured logging
 * Implementations can write to the console or to a buffer (for testing)
 */
export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;

  /**
   * Log a structured event; the level is derived from the event type
   */
  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void;

  /**
   * Set context (variant, ...) merged into all subsequent events
   */
  setContext(context: Partial<LogMetadata>): void;

  /**
   * Apply settings that are only known once configuration is resolved
   */
  configure(options: Pick<LoggerOptions, 'minLevel' | 'jsonOutput'>): void;

  child(additionalContext: Partial<LogMetadata>): Logger;
}

/**
 * Compare log levels (returns positive if a > b)
 */
export function compareLogLevels(a: LogLevel, b: LogLevel): number {
  return LOG_LEVELS.indexOf(a) - LOG_LEVELS.indexOf(b);
}

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return compareLogLevels(level, minLevel) >= 0;
}

/**
 * Level for each structured event type
 */
export function levelForEvent(eventType: LogEventType): LogLevel {
  switch (eventType) {
    case 'error':
      return 'error';
    case 'warn':
    case 'signal_forwarded':
      return 'warn';
    case 'debug':
    case 'step_failed':
    case 'usage_error':
    case 'config_resolved':
    case 'request_parsed':
      return 'debug';
    default:
      return 'info';
  }
}

/**
 * Secrets that can end up in forwarded arguments or registry settings
 */
export const DEFAULT_REDACT_PATTERNS: RegExp[] = [
  // Bearer tokens
  /Bearer\s+[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+/gi,
  // Credentials embedded in a registry URL
  /(?<=:\/\/)[^/\s:@]+:[^/\s@]+(?=@)/g,
  // key=value style secrets in arguments
  /(?:password|secret|token|api[_-]?key)[=:]\s*['"]?[^\s'"]{4,}['"]?/gi,
];

export function redactSecrets(text: string, patterns: RegExp[] = DEFAULT_REDACT_PATTERNS): string {
  let result = text;
  for (const pattern of patterns) {
    // Reset lastIndex for stateful regexes
    pattern.lastIndex = 0;
    result = result.replace(pattern, (match) => {
      const visible = Math.min(4, Math.floor(match.length / 4));
      return match.slice(0, visible) + '[REDACTED]';
    });
  }
  return result;
}
