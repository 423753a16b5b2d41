/**
 * Console Logger implementation
 * Writes every level to stderr: stdout belongs to the downstream process.
 */

import type { Logger, LogLevel, LogEventType, LogMetadata, LogEvent, LoggerOptions } from '../types/logger';
import { shouldLog, levelForEvent, redactSecrets, DEFAULT_REDACT_PATTERNS } from '../types/logger';

export interface ConsoleLoggerOptions extends LoggerOptions {
  /** Destination stream (default: process.stderr) */
  stream?: NodeJS.WritableStream;
}

const BASIC_EVENT_TYPES: readonly LogEventType[] = ['debug', 'info', 'warn', 'error'];

export class ConsoleLogger implements Logger {
  private minLevel: LogLevel;
  private jsonOutput: boolean;
  private context: Partial<LogMetadata> = {};
  private readonly options: ConsoleLoggerOptions;
  private readonly stream: NodeJS.WritableStream;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.minLevel = options.minLevel ?? 'info';
    this.jsonOutput = options.jsonOutput ?? false;
    this.stream = options.stream ?? process.stderr;
    this.options = {
      includeTimestamp: true,
      redactPatterns: DEFAULT_REDACT_PATTERNS,
      ...options,
    };
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', 'debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', 'info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', 'warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', 'error', message, metadata);
  }

  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void {
    this.log(levelForEvent(eventType), eventType, message, metadata);
  }

  setContext(context: Partial<LogMetadata>): void {
    this.context = { ...this.context, ...context };
  }

  configure(options: Pick<LoggerOptions, 'minLevel' | 'jsonOutput'>): void {
    if (options.minLevel !== undefined) this.minLevel = options.minLevel;
    if (options.jsonOutput !== undefined) this.jsonOutput = options.jsonOutput;
  }

  child(additionalContext: Partial<LogMetadata>): Logger {
    const childLogger = new ConsoleLogger({
      ...this.options,
      minLevel: this.minLevel,
      jsonOutput: this.jsonOutput,
    });
    childLogger.setContext({ ...this.context, ...additionalContext });
    return childLogger;
  }

  private log(
    level: LogLevel,
    eventType: LogEventType,
    message: string,
    metadata?: LogMetadata
  ): void {
    if (!shouldLog(level, this.minLevel)) {
      return;
    }

    const event: LogEvent = {
      timestamp: new Date().toISOString(),
      level,
      eventType,
      message: this.redact(message),
      metadata: this.mergeMetadata(metadata),
    };

    this.stream.write((this.jsonOutput ? JSON.stringify(event) : this.formatPretty(event)) + '\n');
  }

  private mergeMetadata(metadata?: LogMetadata): LogMetadata {
    const merged: LogMetadata = { ...this.context, ...metadata };
    for (const [key, value] of Object.entries(merged)) {
      if (typeof value === 'string') {
        merged[key] = this.redact(value);
      }
    }
    return merged;
  }

  private redact(text: string): string {
    return redactSecrets(text, this.options.redactPatterns);
  }

  private formatPretty(event: LogEvent): string {
    const parts: string[] = [];

    if (this.options.includeTimestamp) {
      const time = new Date(event.timestamp).toLocaleTimeString();
      parts.push(`[${time}]`);
    }

    parts.push(event.level.toUpperCase());

    if (!BASIC_EVENT_TYPES.includes(event.eventType)) {
      parts.push(`(${event.eventType})`);
    }

    parts.push(event.message);

    const { variant, step, exitCode } = event.metadata;
    const metaParts: string[] = [];
    if (variant) metaParts.push(`variant=${variant}`);
    if (step) metaParts.push(`step=${step}`);
    if (exitCode !== undefined) metaParts.push(`exit=${exitCode}`);

    if (metaParts.length > 0) {
      parts.push(`{${metaParts.join(', ')}}`);
    }

    return parts.join(' ');
  }
}

export function createConsoleLogger(options?: ConsoleLoggerOptions): Logger {
  return new ConsoleLogger(options);
}
