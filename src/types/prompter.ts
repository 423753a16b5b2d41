/**
 * Prompter interface
 * Abstracts user prompts for testability and non-interactive mode support
 */

import type { Result } from './result';

export interface ConfirmOptions {
  /** The question to ask */
  message: string;
  /** Answer used when the user just presses enter, or when not interactive */
  default?: boolean;
}

export type PrompterErrorCode = 'CANCELLED' | 'NON_INTERACTIVE' | 'IO_ERROR';

export interface PrompterError {
  code: PrompterErrorCode;
  message: string;
  cause?: Error;
}

/**
 * Interface for user prompts
 * Implementations can be real (inquirer) or scripted (for testing)
 */
export interface Prompter {
  /**
   * Ask for confirmation (yes/no)
   */
  confirm(options: ConfirmOptions): Promise<Result<boolean, PrompterError>>;

  /**
   * Check if prompts are available (TTY and interactive mode)
   */
  isInteractive(): boolean;
}

export function createPrompterError(
  code: PrompterErrorCode,
  message: string,
  cause?: Error
): PrompterError {
  return { code, message, cause };
}
