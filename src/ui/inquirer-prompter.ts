/**
 * Inquirer-based Prompter Implementation
 * Real implementation of Prompter interface using inquirer
 */

import inquirer from 'inquirer';
import type { Prompter, ConfirmOptions, PrompterError } from '../types/prompter';
import { createPrompterError } from '../types/prompter';
import type { Result } from '../types/result';
import { ok, err } from '../types/result';

export interface InquirerPrompterConfig {
  /** Whether prompts may be shown at all */
  interactive: boolean;
  /** Whether stdin/stdout are attached to a terminal */
  isTTY: boolean;
}

export class InquirerPrompter implements Prompter {
  private readonly config: InquirerPrompterConfig;

  constructor(config: Partial<InquirerPrompterConfig> = {}) {
    this.config = {
      interactive: config.interactive ?? true,
      isTTY: config.isTTY ?? ((process.stdin.isTTY ?? false) && (process.stdout.isTTY ?? false)),
    };
  }

  isInteractive(): boolean {
    return this.config.interactive && this.config.isTTY;
  }

  async confirm(options: ConfirmOptions): Promise<Result<boolean, PrompterError>> {
    if (!this.isInteractive()) {
      if (options.default !== undefined) {
        return ok(options.default);
      }
      return err(
        createPrompterError('NON_INTERACTIVE', 'Cannot prompt for confirmation in non-interactive mode')
      );
    }

    try {
      const response = await inquirer.prompt<{ value: boolean }>([
        {
          type: 'confirm',
          name: 'value',
          message: options.message,
          default: options.default ?? true,
        },
      ]);
      return ok(response.value);
    } catch (error) {
      if (this.isCancelledError(error)) {
        return err(createPrompterError('CANCELLED', 'User cancelled the prompt'));
      }
      return err(
        createPrompterError(
          'IO_ERROR',
          `confirm failed: ${error instanceof Error ? error.message : String(error)}`,
          error instanceof Error ? error : undefined
        )
      );
    }
  }

  private isCancelledError(error: unknown): boolean {
    // Ctrl+C while the prompt is open
    if (error instanceof Error) {
      return (
        error.message.includes('User force closed') ||
        error.message.includes('cancelled') ||
        error.name === 'ExitPromptError'
      );
    }
    return false;
  }
}

export function createInquirerPrompter(config?: Partial<InquirerPrompterConfig>): Prompter {
  return new InquirerPrompter(config);
}
