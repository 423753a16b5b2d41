/**
 * Buffer Logger implementation
 * For testing - stores events in memory without output
 */

import type { Logger, LogLevel, LogEventType, LogMetadata, LogEvent, LoggerOptions } from '../types/logger';
import { shouldLog, levelForEvent, redactSecrets, DEFAULT_REDACT_PATTERNS } from '../types/logger';

export class BufferLogger implements Logger {
  private minLevel: LogLevel;
  private context: Partial<LogMetadata> = {};
  private readonly events: LogEvent[];
  private readonly redactPatterns: RegExp[];

  /**
   * Children share the parent's event buffer so a test sees every event
   */
  constructor(options: LoggerOptions = {}, sharedEvents: LogEvent[] = []) {
    this.minLevel = options.minLevel ?? 'debug'; // Capture all by default for testing
    this.redactPatterns = options.redactPatterns ?? DEFAULT_REDACT_PATTERNS;
    this.events = sharedEvents;
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
  }

  child(additionalContext: Partial<LogMetadata>): Logger {
    const childLogger = new BufferLogger(
      { minLevel: this.minLevel, redactPatterns: this.redactPatterns },
      this.events
    );
    childLogger.setContext({ ...this.context, ...additionalContext });
    return childLogger;
  }

  getEvents(): LogEvent[] {
    return [...this.events];
  }

  getEventsByType(eventType: LogEventType): LogEvent[] {
    return this.events.filter((e) => e.eventType === eventType);
  }

  hasEventType(eventType: LogEventType): boolean {
    return this.events.some((e) => e.eventType === eventType);
  }

  getMessages(): string[] {
    return this.events.map((e) => e.message);
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

    const merged: LogMetadata = { ...this.context, ...metadata };
    for (const [key, value] of Object.entries(merged)) {
      if (typeof value === 'string') {
        merged[key] = redactSecrets(value, this.redactPatterns);
      }
    }

    this.events.push({
      timestamp: new Date().toISOString(),
      level,
      eventType,
      message: redactSecrets(message, this.redactPatterns),
      metadata: merged,
    });
  }
}

export function createBufferLogger(options?: LoggerOptions): BufferLogger {
  return new BufferLogger(options);
}
