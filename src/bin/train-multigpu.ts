#!/usr/bin/env node

import { runTrainCommand } from '../commands/train';
import { createRealCommandDeps } from '../commands/command-deps';
import { ExitCode } from '../types/exit-codes';

runTrainCommand(process.argv.slice(2), createRealCommandDeps()).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    console.error('Fatal error:', error instanceof Error ? error.stack ?? error.message : error);
    process.exitCode = ExitCode.UNEXPECTED_ERROR;
  }
);
