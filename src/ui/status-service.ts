/**
 * Status Service
 * Persistent status lines around each launch step. The downstream process
 * owns the terminal while it runs, so lines are printed, never animated.
 */

import ora, { Ora } from 'ora';

export interface StatusLineOptions {
  /** Text shown when the line is announced */
  text: string;
  /** Color for the status symbol */
  color?: 'red' | 'green' | 'yellow' | 'blue' | 'cyan' | 'gray';
}

/**
 * One status line: announced once, then resolved with a final state
 */
export interface StatusLine {
  /** Print the line as in progress */
  announce(): void;
  /** Print a success line */
  succeed(text?: string): void;
  /** Print a failure line */
  fail(text?: string): void;
  /** Print a warning line */
  warn(text?: string): void;
}

export interface StatusServiceConfig {
  /** Whether the output stream is a terminal */
  isTTY: boolean;
  /** Suppress all status output */
  quiet: boolean;
  /** Output stream; stderr so the child's stdout stays clean */
  stream: NodeJS.WritableStream;
}

class NullStatusLine implements StatusLine {
  announce(): void {
    // No-op
  }
  succeed(): void {
    // No-op
  }
  fail(): void {
    // No-op
  }
  warn(): void {
    // No-op
  }
}

/**
 * Plain text lines for logs and pipes
 */
class TextStatusLine implements StatusLine {
  constructor(
    private readonly text: string,
    private readonly stream: NodeJS.WritableStream
  ) {}

  announce(): void {
    this.stream.write(`> ${this.text}\n`);
  }

  succeed(text?: string): void {
    this.stream.write(`✔ ${text ?? this.text}\n`);
  }

  fail(text?: string): void {
    this.stream.write(`✖ ${text ?? this.text}\n`);
  }

  warn(text?: string): void {
    this.stream.write(`⚠ ${text ?? this.text}\n`);
  }
}

/**
 * ora-rendered lines (colored symbols) for terminals
 */
class OraStatusLine implements StatusLine {
  private readonly oraInstance: Ora;

  constructor(text: string, stream: NodeJS.WritableStream, color?: StatusLineOptions['color']) {
    this.oraInstance = ora({ text, color, stream });
  }

  announce(): void {
    this.oraInstance.info();
  }

  succeed(text?: string): void {
    this.oraInstance.succeed(text);
  }

  fail(text?: string): void {
    this.oraInstance.fail(text);
  }

  warn(text?: string): void {
    this.oraInstance.warn(text);
  }
}

export class StatusService {
  private readonly config: StatusServiceConfig;

  constructor(config: Partial<StatusServiceConfig> = {}) {
    this.config = {
      isTTY: config.isTTY ?? process.stderr.isTTY ?? false,
      quiet: config.quiet ?? false,
      stream: config.stream ?? process.stderr,
    };
  }

  create(options: StatusLineOptions): StatusLine {
    if (this.config.quiet) {
      return new NullStatusLine();
    }
    if (this.config.isTTY) {
      return new OraStatusLine(options.text, this.config.stream, options.color);
    }
    return new TextStatusLine(options.text, this.config.stream);
  }
}

export function createStatusService(config?: Partial<StatusServiceConfig>): StatusService {
  return new StatusService(config);
}
