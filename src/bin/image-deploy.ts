#!/usr/bin/env node

import { runDeployCommand } from '../commands/deploy';
import { createRealCommandDeps } from '../commands/command-deps';
import { ExitCode } from '../types/exit-codes';

runDeployCommand(process.argv.slice(2), createRealCommandDeps()).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    console.error('Fatal error:', error instanceof Error ? error.stack ?? error.message : error);
    process.exitCode = ExitCode.UNEXPECTED_ERROR;
  }
);
