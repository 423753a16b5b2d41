/**
 * Command dependencies
 * Everything a launcher command touches outside its own logic, injected so
 * tests can swap in mocks.
 */

import type { ProcessRunner } from '../types/process-runner';
import type { Logger } from '../types/logger';
import type { Prompter } from '../types/prompter';
import type { SignalSource } from '../core/signal-forwarding';
import { StatusService, createStatusService } from '../ui/status-service';
import { createInquirerPrompter } from '../ui/inquirer-prompter';
import { createConsoleLogger } from '../logging/console-logger';
import { createRealProcessRunner } from '../process/real-process-runner';

/**
 * Plain text output (usage, help) that is not a log event
 */
export interface TerminalOutput {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface CommandDeps {
  runner: ProcessRunner;
  logger: Logger;
  prompter: Prompter;
  status: StatusService;
  output: TerminalOutput;
  /** Environment for config resolution and for the children */
  env: NodeJS.ProcessEnv;
  cwd: string;
  signalSource?: SignalSource;
  /** Ctrl+C on the shared terminal already reaches the child */
  terminalDeliversInterrupt?: boolean;
}

/**
 * Dependencies backed by the real process, terminal and environment
 */
export function createRealCommandDeps(): CommandDeps {
  return {
    runner: createRealProcessRunner(),
    logger: createConsoleLogger(),
    prompter: createInquirerPrompter(),
    status: createStatusService(),
    output: {
      stdout: (text) => {
        process.stdout.write(text);
      },
      stderr: (text) => {
        process.stderr.write(text);
      },
    },
    env: process.env,
    cwd: process.cwd(),
    terminalDeliversInterrupt: process.stdin.isTTY ?? false,
  };
}
