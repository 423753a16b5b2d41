/**
 * Turn a RouterError into terminal output and an exit code
 */

import type { CommandDeps } from './command-deps';
import type { RouterError } from '../types/router-error';
import { exitCodeForError, isUsageError } from '../types/router-error';

export function reportRouterError(error: RouterError, deps: CommandDeps, usageText: string): number {
  const exitCode = exitCodeForError(error);

  if (isUsageError(error)) {
    deps.logger.event('usage_error', error.message, { code: error.code, exitCode });
    deps.output.stderr(`Error: ${error.message}\n\n${usageText}\n`);
    return exitCode;
  }

  switch (error.code) {
    case 'ConfigInvalid':
      deps.logger.error(`${error.message}:\n${error.issues.map((issue) => `  - ${issue}`).join('\n')}`, {
        code: error.code,
        exitCode,
      });
      break;
    case 'PromptCancelled':
      deps.logger.warn(error.message, { code: error.code, exitCode });
      break;
    default:
      deps.logger.error(error.message, { code: error.code, exitCode });
  }
  return exitCode;
}
